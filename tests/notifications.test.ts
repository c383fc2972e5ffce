import fs from "node:fs";
import { afterEach, describe, expect, test } from "vitest";
import type { SqliteDb } from "../src/db/db.js";
import { defaultNotificationSettings, listNotificationHistory, updateNotificationSettings } from "../src/db/notifications.js";
import { createScan } from "../src/db/repo.js";
import { emptySeverityCounts, type NotificationSettings, type Project, type SeverityCounts } from "../src/db/types.js";
import { evaluateTriggers, isWeeklyDigestDue, type ScanOutcome } from "../src/lib/notifications.js";
import { Notifier } from "../src/lib/notifier.js";
import { inWindow, isClock, isQuietTime, parseClock } from "../src/lib/quietHours.js";
import { CapturingSender, seedProject, tempDb } from "./helpers.js";

// 2026-01-05 is a Monday.
const MONDAY = (hour: number, minute = 0) => Date.UTC(2026, 0, 5, hour, minute);
const DAY_MS = 24 * 60 * 60 * 1000;

function outcome(patch: Partial<Omit<ScanOutcome, "new_by_severity">> & { severity?: Partial<SeverityCounts> } = {}): ScanOutcome {
  const { severity, ...rest } = patch;
  return { new: 0, fixed: 0, still_open: 0, ...rest, new_by_severity: { ...emptySeverityCounts(), ...severity } };
}

function settings(patch: Partial<NotificationSettings> = {}): NotificationSettings {
  return { ...defaultNotificationSettings("p1", 0), ...patch };
}

describe("quiet hours", () => {
  test("parses 24h clock times only", () => {
    expect(parseClock(" 07:05 ")).toBe(425);
    expect(parseClock("24:00")).toBeNull();
    expect(parseClock("7:05")).toBeNull();
    expect(isClock("23:59")).toBe(true);
    expect(isClock("23:60")).toBe(false);
  });

  test("windows are start-inclusive, end-exclusive and may wrap midnight", () => {
    expect(inWindow(22 * 60, 8 * 60, 23 * 60)).toBe(true);
    expect(inWindow(22 * 60, 8 * 60, 7 * 60 + 59)).toBe(true);
    expect(inWindow(22 * 60, 8 * 60, 8 * 60)).toBe(false);
    expect(inWindow(22 * 60, 8 * 60, 12 * 60)).toBe(false);
    expect(inWindow(9 * 60, 17 * 60, 9 * 60)).toBe(true);
    expect(inWindow(9 * 60, 17 * 60, 17 * 60)).toBe(false);
    expect(inWindow(600, 600, 600)).toBe(false);
  });

  test("only applies when enabled and evaluates in UTC", () => {
    expect(isQuietTime({ enabled: true, start: "22:00", end: "08:00", now_ms: MONDAY(23, 30) })).toBe(true);
    expect(isQuietTime({ enabled: false, start: "22:00", end: "08:00", now_ms: MONDAY(23, 30) })).toBe(false);
    expect(isQuietTime({ enabled: true, start: "bad", end: "08:00", now_ms: MONDAY(23, 30) })).toBe(false);
  });
});

describe("trigger evaluation", () => {
  test("critical alert fires at either threshold", () => {
    expect(evaluateTriggers(settings(), outcome({ new: 1, severity: { critical: 1 } }), MONDAY(12)).critical).toEqual({
      fire: true,
      suppressed: false,
      reason: "critical=1 high=0"
    });
    expect(evaluateTriggers(settings(), outcome({ new: 4, severity: { high: 4 } }), MONDAY(12)).critical).toEqual({
      fire: false,
      suppressed: false,
      reason: "below threshold critical=0/1 high=4/5"
    });
    expect(evaluateTriggers(settings(), outcome({ new: 5, severity: { high: 5 } }), MONDAY(12)).critical.fire).toBe(true);
    expect(evaluateTriggers(settings({ critical_immediate_enabled: false }), outcome({ severity: { critical: 3 } }), MONDAY(12)).critical).toEqual({
      fire: false,
      suppressed: false,
      reason: "critical alerts disabled"
    });
  });

  test("quiet hours suppress the critical alert but not the summary", () => {
    const decisions = evaluateTriggers(settings({ quiet_hours_enabled: true }), outcome({ new: 1, severity: { critical: 1 } }), MONDAY(23, 30));
    expect(decisions.critical).toEqual({ fire: false, suppressed: true, reason: "quiet hours 22:00-08:00 UTC" });
    expect(decisions.summary).toEqual({ fire: true, suppressed: false, reason: "new=1 fixed=0" });
  });

  test("summary policies", () => {
    const now = MONDAY(12);
    expect(evaluateTriggers(settings(), outcome({ still_open: 3 }), now).summary).toEqual({ fire: false, suppressed: false, reason: "no changes" });
    expect(evaluateTriggers(settings(), outcome({ fixed: 1 }), now).summary.fire).toBe(true);
    expect(evaluateTriggers(settings({ fixed_threshold: 2 }), outcome({ fixed: 1 }), now).summary.fire).toBe(false);
    expect(evaluateTriggers(settings({ summary_send_when: "always" }), outcome(), now).summary).toEqual({
      fire: true,
      suppressed: false,
      reason: "always"
    });
    expect(evaluateTriggers(settings({ summary_send_when: "has_critical_high" }), outcome({ new: 2, severity: { medium: 2 } }), now).summary).toEqual({
      fire: false,
      suppressed: false,
      reason: "no new critical or high findings"
    });
    expect(evaluateTriggers(settings({ summary_send_when: "has_critical_high" }), outcome({ new: 1, severity: { high: 1 } }), now).summary.reason).toBe(
      "new critical/high=1"
    );
    expect(evaluateTriggers(settings({ scan_summary_enabled: false }), outcome({ new: 1 }), now).summary.reason).toBe("scan summaries disabled");
  });

  test("weekly digest is due once on the configured weekday after the configured time", () => {
    const weekly = settings({ weekly_recipients: ["sec@example.test"] });
    expect(isWeeklyDigestDue(weekly, MONDAY(9, 30), null)).toBe(true);
    expect(isWeeklyDigestDue(weekly, MONDAY(8, 59), null)).toBe(false);
    expect(isWeeklyDigestDue(weekly, MONDAY(9, 30) + DAY_MS, null)).toBe(false);
    expect(isWeeklyDigestDue(weekly, MONDAY(12), MONDAY(9, 10))).toBe(false);
    expect(isWeeklyDigestDue(weekly, MONDAY(12), MONDAY(9, 10) - 7 * DAY_MS)).toBe(true);
    expect(isWeeklyDigestDue(settings(), MONDAY(9, 30), null)).toBe(false);
  });
});

describe("notifier", () => {
  const opened: Array<{ db: SqliteDb; tmpDir: string }> = [];

  afterEach(() => {
    while (opened.length > 0) {
      const item = opened.pop();
      if (!item) continue;
      item.db.close();
      fs.rmSync(item.tmpDir, { recursive: true, force: true });
    }
  });

  function setup(patch: Partial<NotificationSettings> = {}): { db: SqliteDb; project: Project; sender: CapturingSender; notifier: Notifier } {
    const handle = tempDb();
    opened.push(handle);
    const project = seedProject(handle.db);
    updateNotificationSettings(handle.db, project.project_id, patch, 0);
    const sender = new CapturingSender();
    const notifier = new Notifier({ db: handle.db, sender, dashboard_url: "http://dashboard.test/" });
    return { db: handle.db, project, sender, notifier };
  }

  test("sends critical and summary mail for a completed scan exactly once", async () => {
    const { db, project, sender, notifier } = setup({
      critical_recipients: ["oncall@example.test"],
      summary_recipients: ["team@example.test"]
    });
    const scan = createScan(db, { project_id: project.project_id, scan_type: "upload", metadata: {} });
    const result = outcome({ new: 1, still_open: 2, severity: { critical: 1 } });

    const entries = await notifier.notifyScanCompleted({ project, scan, outcome: result, now_ms: MONDAY(12) });
    expect(entries.map((e) => [e.notification_type, e.status])).toEqual([
      ["critical", "sent"],
      ["summary", "sent"]
    ]);
    expect(sender.sent.map((m) => [m.to, m.subject])).toEqual([
      [["oncall@example.test"], 'CRITICAL ALERT: Project "infra" - 1 critical, 0 high new findings'],
      [["team@example.test"], 'Scan Complete: "infra" - 0 Fixed, 1 New Issues']
    ]);
    expect(sender.sent[0]?.text).toContain(`View details: http://dashboard.test/scans/${scan.scan_id}`);
    expect(sender.sent[1]?.text).toContain("Still Open:   2 vulnerabilities");

    const again = await notifier.notifyScanCompleted({ project, scan, outcome: result, now_ms: MONDAY(12, 5) });
    expect(again).toEqual([]);
    expect(sender.sent).toHaveLength(2);
    expect(listNotificationHistory(db, { project_id: project.project_id, limit: 10, offset: 0 })).toHaveLength(2);
  });

  test("records skipped decisions when nobody is subscribed", async () => {
    const { db, project, sender, notifier } = setup();
    const scan = createScan(db, { project_id: project.project_id, scan_type: "upload", metadata: {} });
    const entries = await notifier.notifyScanCompleted({ project, scan, outcome: outcome({ severity: { critical: 1 }, new: 1 }), now_ms: MONDAY(12) });
    expect(entries.map((e) => [e.notification_type, e.status, e.reason])).toEqual([
      ["critical", "skipped", "no recipients configured"],
      ["summary", "skipped", "no recipients configured"]
    ]);
    expect(sender.sent).toEqual([]);
  });

  test("records decisions as skipped while email delivery is turned off", async () => {
    const handle = tempDb();
    opened.push(handle);
    const project = seedProject(handle.db);
    updateNotificationSettings(handle.db, project.project_id, { critical_recipients: ["oncall@example.test"], summary_recipients: ["team@example.test"] }, 0);
    const sender = new CapturingSender();
    const notifier = new Notifier({ db: handle.db, sender, dashboard_url: "http://dashboard.test", delivery_enabled: false });
    const scan = createScan(handle.db, { project_id: project.project_id, scan_type: "upload", metadata: {} });

    const entries = await notifier.notifyScanCompleted({ project, scan, outcome: outcome({ severity: { critical: 1 }, new: 1 }), now_ms: MONDAY(12) });
    expect(entries.map((e) => [e.notification_type, e.status, e.reason])).toEqual([
      ["critical", "skipped", "email notifications disabled"],
      ["summary", "skipped", "email notifications disabled"]
    ]);
    expect(sender.sent).toEqual([]);
  });

  test("holds the critical alert during quiet hours", async () => {
    const { db, project, sender, notifier } = setup({
      critical_recipients: ["oncall@example.test"],
      summary_recipients: ["team@example.test"],
      quiet_hours_enabled: true
    });
    const scan = createScan(db, { project_id: project.project_id, scan_type: "upload", metadata: {} });
    const entries = await notifier.notifyScanCompleted({ project, scan, outcome: outcome({ new: 1, severity: { critical: 1 } }), now_ms: MONDAY(23, 30) });
    expect(entries.map((e) => [e.notification_type, e.status])).toEqual([
      ["critical", "suppressed"],
      ["summary", "sent"]
    ]);
    expect(sender.sent.map((m) => m.to)).toEqual([["team@example.test"]]);
  });

  test("keeps delivery failures in history without throwing", async () => {
    const { db, project, sender, notifier } = setup({ summary_recipients: ["team@example.test"] });
    sender.failWith = "smtp unreachable";
    const scan = createScan(db, { project_id: project.project_id, scan_type: "upload", metadata: {} });
    const entries = await notifier.notifyScanCompleted({ project, scan, outcome: outcome({ fixed: 2 }), now_ms: MONDAY(12) });
    expect(entries[1]).toMatchObject({ notification_type: "summary", status: "failed", error_message: "smtp unreachable" });
    const stored = listNotificationHistory(db, { project_id: project.project_id, notification_type: "summary", limit: 10, offset: 0 });
    expect(stored.map((e) => [e.status, e.error_message, e.fixed_count])).toEqual([["failed", "smtp unreachable", 2]]);
  });

  test("alerts on failed scans", async () => {
    const { db, project, sender, notifier } = setup({ critical_recipients: ["oncall@example.test"] });
    const scan = createScan(db, { project_id: project.project_id, scan_type: "upload", metadata: {} });
    const entry = await notifier.notifyScanFailed({ project, scan: { ...scan, status: "failed", error_message: "checkov timed out" }, now_ms: MONDAY(12) });
    expect(entry).toMatchObject({ notification_type: "scan_failed", status: "sent" });
    expect(sender.sent[0]?.subject).toBe('Scan Failed: "infra" - Action Required');
    expect(sender.sent[0]?.text).toContain("Error: checkov timed out");
  });

  test("test notifications go to every distinct recipient", async () => {
    const { project, sender, notifier } = setup({
      critical_recipients: ["a@example.test", "b@example.test"],
      summary_recipients: ["b@example.test"],
      weekly_recipients: ["c@example.test"]
    });
    const entry = await notifier.sendTest({ project, now_ms: MONDAY(12) });
    expect(entry).toMatchObject({ notification_type: "test", status: "sent", scan_id: null });
    expect(sender.sent[0]?.to).toEqual(["a@example.test", "b@example.test", "c@example.test"]);
  });

  test("weekly digest goes out once per due day", async () => {
    const { project, sender, notifier } = setup({ weekly_recipients: ["c@example.test"], weekly_include_trends: false });
    expect(await notifier.sendWeeklyIfDue({ project, now_ms: MONDAY(8) })).toBeNull();
    const sent = await notifier.sendWeeklyIfDue({ project, now_ms: MONDAY(10) });
    expect(sent).toMatchObject({ notification_type: "weekly", status: "sent" });
    expect(sender.sent[0]?.subject).toBe('Weekly digest: "infra" - 0 critical, 0 high open');
    expect(await notifier.sendWeeklyIfDue({ project, now_ms: MONDAY(11) })).toBeNull();
    expect(sender.sent).toHaveLength(1);
  });
});
