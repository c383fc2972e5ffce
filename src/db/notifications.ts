import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { SqliteDb } from "./db.js";
import { nowMs } from "./repo.js";
import type {
  NotificationHistoryEntry,
  NotificationSettings,
  NotificationStatus,
  NotificationType,
  SummarySendWhen,
  Weekday
} from "./types.js";
import { SUMMARY_SEND_WHEN, WEEKDAYS } from "./types.js";

type SettingsRow = {
  project_id: string;
  critical_recipients_json: string;
  summary_recipients_json: string;
  weekly_recipients_json: string;
  critical_immediate_enabled: number;
  scan_summary_enabled: number;
  weekly_summary_enabled: number;
  scan_failed_enabled: number;
  critical_threshold: number;
  high_threshold: number;
  fixed_threshold: number;
  summary_send_when: string;
  summary_include_fixed: number;
  summary_include_new: number;
  summary_include_still_open: number;
  weekly_day: string;
  weekly_time: string;
  weekly_include_trends: number;
  digest_mode: number;
  quiet_hours_enabled: number;
  quiet_hours_start: string;
  quiet_hours_end: string;
  created_at: number;
  updated_at: number;
};

type HistoryRow = Omit<NotificationHistoryEntry, "recipients"> & { recipients_json: string };

const RecipientsSchema = z.array(z.string());
const SendWhenSchema = z.enum(SUMMARY_SEND_WHEN);
const WeekdaySchema = z.enum(WEEKDAYS);

export function defaultNotificationSettings(project_id: string, now_ms: number): NotificationSettings {
  return {
    project_id,
    critical_recipients: [],
    summary_recipients: [],
    weekly_recipients: [],
    critical_immediate_enabled: true,
    scan_summary_enabled: true,
    weekly_summary_enabled: true,
    scan_failed_enabled: true,
    critical_threshold: 1,
    high_threshold: 5,
    fixed_threshold: 1,
    summary_send_when: "has_changes",
    summary_include_fixed: true,
    summary_include_new: true,
    summary_include_still_open: true,
    weekly_day: "monday",
    weekly_time: "09:00",
    weekly_include_trends: true,
    digest_mode: false,
    quiet_hours_enabled: false,
    quiet_hours_start: "22:00",
    quiet_hours_end: "08:00",
    created_at: now_ms,
    updated_at: now_ms
  };
}

export function getNotificationSettings(db: SqliteDb, project_id: string): NotificationSettings | null {
  const row = db.prepare<unknown[], SettingsRow>(`SELECT * FROM notification_settings WHERE project_id=?`).get(project_id);
  return row ? hydrateSettings(row) : null;
}

export function getOrCreateNotificationSettings(db: SqliteDb, project_id: string, now_ms: number = nowMs()): NotificationSettings {
  const existing = getNotificationSettings(db, project_id);
  if (existing) return existing;
  const settings = defaultNotificationSettings(project_id, now_ms);
  writeSettings(db, settings);
  return settings;
}

export type NotificationSettingsPatch = Partial<Omit<NotificationSettings, "project_id" | "created_at" | "updated_at">>;

export function updateNotificationSettings(
  db: SqliteDb,
  project_id: string,
  patch: NotificationSettingsPatch,
  now_ms: number = nowMs()
): NotificationSettings {
  const current = getOrCreateNotificationSettings(db, project_id, now_ms);
  const next: NotificationSettings = { ...current, ...patch, project_id, updated_at: now_ms };
  writeSettings(db, next);
  return next;
}

function writeSettings(db: SqliteDb, s: NotificationSettings): void {
  db.prepare(
    `INSERT INTO notification_settings (
       project_id,critical_recipients_json,summary_recipients_json,weekly_recipients_json,
       critical_immediate_enabled,scan_summary_enabled,weekly_summary_enabled,scan_failed_enabled,
       critical_threshold,high_threshold,fixed_threshold,summary_send_when,
       summary_include_fixed,summary_include_new,summary_include_still_open,
       weekly_day,weekly_time,weekly_include_trends,digest_mode,
       quiet_hours_enabled,quiet_hours_start,quiet_hours_end,created_at,updated_at
     ) VALUES (
       @project_id,@critical_recipients_json,@summary_recipients_json,@weekly_recipients_json,
       @critical_immediate_enabled,@scan_summary_enabled,@weekly_summary_enabled,@scan_failed_enabled,
       @critical_threshold,@high_threshold,@fixed_threshold,@summary_send_when,
       @summary_include_fixed,@summary_include_new,@summary_include_still_open,
       @weekly_day,@weekly_time,@weekly_include_trends,@digest_mode,
       @quiet_hours_enabled,@quiet_hours_start,@quiet_hours_end,@created_at,@updated_at
     )
     ON CONFLICT(project_id) DO UPDATE SET
       critical_recipients_json=excluded.critical_recipients_json,
       summary_recipients_json=excluded.summary_recipients_json,
       weekly_recipients_json=excluded.weekly_recipients_json,
       critical_immediate_enabled=excluded.critical_immediate_enabled,
       scan_summary_enabled=excluded.scan_summary_enabled,
       weekly_summary_enabled=excluded.weekly_summary_enabled,
       scan_failed_enabled=excluded.scan_failed_enabled,
       critical_threshold=excluded.critical_threshold,
       high_threshold=excluded.high_threshold,
       fixed_threshold=excluded.fixed_threshold,
       summary_send_when=excluded.summary_send_when,
       summary_include_fixed=excluded.summary_include_fixed,
       summary_include_new=excluded.summary_include_new,
       summary_include_still_open=excluded.summary_include_still_open,
       weekly_day=excluded.weekly_day,
       weekly_time=excluded.weekly_time,
       weekly_include_trends=excluded.weekly_include_trends,
       digest_mode=excluded.digest_mode,
       quiet_hours_enabled=excluded.quiet_hours_enabled,
       quiet_hours_start=excluded.quiet_hours_start,
       quiet_hours_end=excluded.quiet_hours_end,
       updated_at=excluded.updated_at`
  ).run({
    project_id: s.project_id,
    critical_recipients_json: JSON.stringify(s.critical_recipients),
    summary_recipients_json: JSON.stringify(s.summary_recipients),
    weekly_recipients_json: JSON.stringify(s.weekly_recipients),
    critical_immediate_enabled: flag(s.critical_immediate_enabled),
    scan_summary_enabled: flag(s.scan_summary_enabled),
    weekly_summary_enabled: flag(s.weekly_summary_enabled),
    scan_failed_enabled: flag(s.scan_failed_enabled),
    critical_threshold: s.critical_threshold,
    high_threshold: s.high_threshold,
    fixed_threshold: s.fixed_threshold,
    summary_send_when: s.summary_send_when,
    summary_include_fixed: flag(s.summary_include_fixed),
    summary_include_new: flag(s.summary_include_new),
    summary_include_still_open: flag(s.summary_include_still_open),
    weekly_day: s.weekly_day,
    weekly_time: s.weekly_time,
    weekly_include_trends: flag(s.weekly_include_trends),
    digest_mode: flag(s.digest_mode),
    quiet_hours_enabled: flag(s.quiet_hours_enabled),
    quiet_hours_start: s.quiet_hours_start,
    quiet_hours_end: s.quiet_hours_end,
    created_at: s.created_at,
    updated_at: s.updated_at
  });
}

// History

export type RecordNotificationInput = {
  project_id: string;
  scan_id: string | null;
  notification_type: NotificationType;
  subject: string;
  recipients: string[];
  status: NotificationStatus;
  reason?: string | null;
  error_message?: string | null;
  counts?: Partial<Pick<NotificationHistoryEntry, "critical_count" | "high_count" | "fixed_count" | "new_count" | "still_open_count">>;
};

/**
 * Returns null when a record for the same (scan, type) already exists, so a retried
 * scan completion never produces a second notification.
 */
export function recordNotification(
  db: SqliteDb,
  input: RecordNotificationInput,
  now_ms: number = nowMs()
): NotificationHistoryEntry | null {
  const entry: NotificationHistoryEntry = {
    notification_id: uuidv4(),
    project_id: input.project_id,
    scan_id: input.scan_id,
    notification_type: input.notification_type,
    subject: input.subject,
    recipients: input.recipients,
    sent_at: now_ms,
    status: input.status,
    reason: input.reason ?? null,
    error_message: input.error_message ?? null,
    critical_count: input.counts?.critical_count ?? 0,
    high_count: input.counts?.high_count ?? 0,
    fixed_count: input.counts?.fixed_count ?? 0,
    new_count: input.counts?.new_count ?? 0,
    still_open_count: input.counts?.still_open_count ?? 0
  };
  const { recipients, ...rest } = entry;
  const result = db
    .prepare(
      `INSERT OR IGNORE INTO notification_history (
         notification_id,project_id,scan_id,notification_type,subject,recipients_json,sent_at,status,reason,error_message,
         critical_count,high_count,fixed_count,new_count,still_open_count
       ) VALUES (
         @notification_id,@project_id,@scan_id,@notification_type,@subject,@recipients_json,@sent_at,@status,@reason,@error_message,
         @critical_count,@high_count,@fixed_count,@new_count,@still_open_count
       )`
    )
    .run({ ...rest, recipients_json: JSON.stringify(recipients) });
  return result.changes > 0 ? entry : null;
}

export function hasNotification(db: SqliteDb, scan_id: string, notification_type: NotificationType): boolean {
  const row = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM notification_history WHERE scan_id=? AND notification_type=?`)
    .get(scan_id, notification_type);
  return (row?.n ?? 0) > 0;
}

export function updateNotificationOutcome(
  db: SqliteDb,
  notification_id: string,
  status: NotificationStatus,
  error_message: string | null
): void {
  db.prepare(`UPDATE notification_history SET status=?, error_message=? WHERE notification_id=?`).run(
    status,
    error_message,
    notification_id
  );
}

export function listNotificationHistory(
  db: SqliteDb,
  args: { project_id: string; notification_type?: NotificationType; limit: number; offset: number }
): NotificationHistoryEntry[] {
  const rows = args.notification_type
    ? db
        .prepare<unknown[], HistoryRow>(
          `SELECT * FROM notification_history WHERE project_id=? AND notification_type=? ORDER BY sent_at DESC LIMIT ? OFFSET ?`
        )
        .all(args.project_id, args.notification_type, args.limit, args.offset)
    : db
        .prepare<unknown[], HistoryRow>(`SELECT * FROM notification_history WHERE project_id=? ORDER BY sent_at DESC LIMIT ? OFFSET ?`)
        .all(args.project_id, args.limit, args.offset);
  return rows.map(hydrateHistory);
}

export function latestNotificationAt(db: SqliteDb, project_id: string, notification_type: NotificationType): number | null {
  const row = db
    .prepare<unknown[], { sent_at: number | null }>(
      `SELECT MAX(sent_at) AS sent_at FROM notification_history WHERE project_id=? AND notification_type=?`
    )
    .get(project_id, notification_type);
  return row?.sent_at ?? null;
}

export function clearNotificationHistory(db: SqliteDb, project_id: string): number {
  return db.prepare(`DELETE FROM notification_history WHERE project_id=?`).run(project_id).changes;
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function parseRecipients(raw: string): string[] {
  const parsed = RecipientsSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : [];
}

function hydrateSettings(row: SettingsRow): NotificationSettings {
  const sendWhen: SummarySendWhen = SendWhenSchema.catch("has_changes").parse(row.summary_send_when);
  const weekday: Weekday = WeekdaySchema.catch("monday").parse(row.weekly_day);
  return {
    project_id: row.project_id,
    critical_recipients: parseRecipients(row.critical_recipients_json),
    summary_recipients: parseRecipients(row.summary_recipients_json),
    weekly_recipients: parseRecipients(row.weekly_recipients_json),
    critical_immediate_enabled: row.critical_immediate_enabled === 1,
    scan_summary_enabled: row.scan_summary_enabled === 1,
    weekly_summary_enabled: row.weekly_summary_enabled === 1,
    scan_failed_enabled: row.scan_failed_enabled === 1,
    critical_threshold: row.critical_threshold,
    high_threshold: row.high_threshold,
    fixed_threshold: row.fixed_threshold,
    summary_send_when: sendWhen,
    summary_include_fixed: row.summary_include_fixed === 1,
    summary_include_new: row.summary_include_new === 1,
    summary_include_still_open: row.summary_include_still_open === 1,
    weekly_day: weekday,
    weekly_time: row.weekly_time,
    weekly_include_trends: row.weekly_include_trends === 1,
    digest_mode: row.digest_mode === 1,
    quiet_hours_enabled: row.quiet_hours_enabled === 1,
    quiet_hours_start: row.quiet_hours_start,
    quiet_hours_end: row.quiet_hours_end,
    created_at: row.created_at,
    updated_at: row.updated_at
  };
}

function hydrateHistory(row: HistoryRow): NotificationHistoryEntry {
  const { recipients_json, ...rest } = row;
  return { ...rest, recipients: parseRecipients(recipients_json) };
}
