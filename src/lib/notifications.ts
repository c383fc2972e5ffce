import { WEEKDAYS, type NotificationSettings, type SeverityCounts } from "../db/types.js";
import { isQuietTime, minuteOfDayUtc, parseClock } from "./quietHours.js";

export type ScanOutcome = {
  new: number;
  fixed: number;
  still_open: number;
  new_by_severity: SeverityCounts;
};

export type TriggerDecision = {
  fire: boolean;
  suppressed: boolean;
  reason: string;
};

export type TriggerDecisions = {
  critical: TriggerDecision;
  summary: TriggerDecision;
};

export function evaluateCriticalTrigger(settings: NotificationSettings, outcome: ScanOutcome, now_ms: number): TriggerDecision {
  if (!settings.critical_immediate_enabled) {
    return { fire: false, suppressed: false, reason: "critical alerts disabled" };
  }
  const critical = outcome.new_by_severity.critical;
  const high = outcome.new_by_severity.high;
  const hit = critical >= settings.critical_threshold || high >= settings.high_threshold;
  if (!hit) {
    return {
      fire: false,
      suppressed: false,
      reason: `below threshold critical=${critical}/${settings.critical_threshold} high=${high}/${settings.high_threshold}`
    };
  }
  if (
    isQuietTime({
      enabled: settings.quiet_hours_enabled,
      start: settings.quiet_hours_start,
      end: settings.quiet_hours_end,
      now_ms
    })
  ) {
    return {
      fire: false,
      suppressed: true,
      reason: `quiet hours ${settings.quiet_hours_start}-${settings.quiet_hours_end} UTC`
    };
  }
  return { fire: true, suppressed: false, reason: `critical=${critical} high=${high}` };
}

export function evaluateSummaryTrigger(settings: NotificationSettings, outcome: ScanOutcome): TriggerDecision {
  if (!settings.scan_summary_enabled) {
    return { fire: false, suppressed: false, reason: "scan summaries disabled" };
  }
  switch (settings.summary_send_when) {
    case "always":
      return { fire: true, suppressed: false, reason: "always" };
    case "has_changes": {
      const changed = outcome.new > 0 || outcome.fixed >= settings.fixed_threshold;
      return {
        fire: changed,
        suppressed: false,
        reason: changed ? `new=${outcome.new} fixed=${outcome.fixed}` : "no changes"
      };
    }
    case "has_critical_high": {
      const n = outcome.new_by_severity.critical + outcome.new_by_severity.high;
      return { fire: n > 0, suppressed: false, reason: n > 0 ? `new critical/high=${n}` : "no new critical or high findings" };
    }
  }
}

/** Quiet hours hold back critical alerts only; summaries go out regardless. */
export function evaluateTriggers(settings: NotificationSettings, outcome: ScanOutcome, now_ms: number): TriggerDecisions {
  return {
    critical: evaluateCriticalTrigger(settings, outcome, now_ms),
    summary: evaluateSummaryTrigger(settings, outcome)
  };
}

/**
 * The weekly digest is due on the configured UTC weekday once the configured time has
 * passed, at most once per day.
 */
export function isWeeklyDigestDue(settings: NotificationSettings, now_ms: number, last_sent_ms: number | null): boolean {
  if (!settings.weekly_summary_enabled || settings.weekly_recipients.length === 0) return false;
  const now = new Date(now_ms);
  if (WEEKDAYS[now.getUTCDay()] !== settings.weekly_day) return false;
  const at = parseClock(settings.weekly_time);
  if (at === null || minuteOfDayUtc(now_ms) < at) return false;
  const dayStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return last_sent_ms === null || last_sent_ms < dayStart;
}
