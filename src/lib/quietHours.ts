const CLOCK_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const MINUTES_PER_DAY = 24 * 60;

export function isClock(value: string): boolean {
  return CLOCK_RE.test(value);
}

/** Minutes since midnight for "HH:MM", or null when the value is not a 24h clock time. */
export function parseClock(value: string): number | null {
  const m = CLOCK_RE.exec(value.trim());
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function minuteOfDayUtc(ms: number): number {
  const d = new Date(ms);
  return d.getUTCHours() * 60 + d.getUTCMinutes();
}

/**
 * Whether `minute` falls in [start, end). A window with end before start wraps past
 * midnight; start equal to end is empty.
 */
export function inWindow(startMinute: number, endMinute: number, minute: number): boolean {
  if (startMinute === endMinute) return false;
  if (startMinute < endMinute) return minute >= startMinute && minute < endMinute;
  return minute >= startMinute || minute < endMinute;
}

export function isQuietTime(args: { enabled: boolean; start: string; end: string; now_ms: number }): boolean {
  if (!args.enabled) return false;
  const start = parseClock(args.start);
  const end = parseClock(args.end);
  if (start === null || end === null) return false;
  return inWindow(start, end, minuteOfDayUtc(args.now_ms));
}
