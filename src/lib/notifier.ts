import type { SqliteDb } from "../db/db.js";
import {
  getOrCreateNotificationSettings,
  latestNotificationAt,
  recordNotification,
  updateNotificationOutcome,
  type RecordNotificationInput
} from "../db/notifications.js";
import { nowMs } from "../db/repo.js";
import type { NotificationHistoryEntry, NotificationSettings, NotificationType, Project, Scan } from "../db/types.js";
import { NotificationDeliveryFailed, errorMessage } from "./errors.js";
import { evaluateTriggers, isWeeklyDigestDue, type ScanOutcome, type TriggerDecision } from "./notifications.js";
import { severityHistogram, trendSeries } from "./rollup.js";

export type OutgoingMessage = {
  to: string[];
  subject: string;
  text: string;
};

export interface NotificationSender {
  send(message: OutgoingMessage): Promise<void>;
}

/** Mail transport lives outside this service; this sender writes what would be sent to the log. */
export class LoggingSender implements NotificationSender {
  async send(message: OutgoingMessage): Promise<void> {
    console.log(`Notification sent to=${message.to.join(",")} subject="${message.subject}"`);
  }
}

const RULE = "=".repeat(60);

export class Notifier {
  private readonly db: SqliteDb;
  private readonly sender: NotificationSender;
  private readonly dashboardUrl: string;
  private readonly deliveryEnabled: boolean;

  constructor(args: { db: SqliteDb; sender: NotificationSender; dashboard_url: string; delivery_enabled?: boolean }) {
    this.db = args.db;
    this.sender = args.sender;
    this.dashboardUrl = args.dashboard_url.replace(/\/+$/, "");
    this.deliveryEnabled = args.delivery_enabled ?? true;
  }

  /**
   * Records one decision per kind for a completed scan and delivers what fired. Delivery
   * problems end up in history and the log, never in the caller.
   */
  async notifyScanCompleted(args: { project: Project; scan: Scan; outcome: ScanOutcome; now_ms?: number }): Promise<NotificationHistoryEntry[]> {
    const now = args.now_ms ?? nowMs();
    const settings = getOrCreateNotificationSettings(this.db, args.project.project_id, now);
    const decisions = evaluateTriggers(settings, args.outcome, now);
    const counts = {
      critical_count: args.outcome.new_by_severity.critical,
      high_count: args.outcome.new_by_severity.high,
      fixed_count: args.outcome.fixed,
      new_count: args.outcome.new,
      still_open_count: args.outcome.still_open
    };

    const out: NotificationHistoryEntry[] = [];
    const critical = await this.dispatch({
      project: args.project,
      scan_id: args.scan.scan_id,
      type: "critical",
      decision: decisions.critical,
      recipients: settings.critical_recipients,
      subject: `CRITICAL ALERT: Project "${args.project.name}" - ${counts.critical_count} critical, ${counts.high_count} high new findings`,
      text: this.renderCritical(args.project, args.scan, args.outcome),
      counts,
      now_ms: now
    });
    if (critical) out.push(critical);

    const summary = await this.dispatch({
      project: args.project,
      scan_id: args.scan.scan_id,
      type: "summary",
      decision: decisions.summary,
      recipients: settings.summary_recipients,
      subject: `Scan Complete: "${args.project.name}" - ${counts.fixed_count} Fixed, ${counts.new_count} New Issues`,
      text: this.renderSummary(args.project, args.scan, args.outcome, settings),
      counts,
      now_ms: now
    });
    if (summary) out.push(summary);
    return out;
  }

  async notifyScanFailed(args: { project: Project; scan: Scan; now_ms?: number }): Promise<NotificationHistoryEntry | null> {
    const now = args.now_ms ?? nowMs();
    const settings = getOrCreateNotificationSettings(this.db, args.project.project_id, now);
    const decision: TriggerDecision = settings.scan_failed_enabled
      ? { fire: true, suppressed: false, reason: "scan failed" }
      : { fire: false, suppressed: false, reason: "scan failure alerts disabled" };
    return this.dispatch({
      project: args.project,
      scan_id: args.scan.scan_id,
      type: "scan_failed",
      decision,
      recipients: settings.critical_recipients,
      subject: `Scan Failed: "${args.project.name}" - Action Required`,
      text: [
        `SCAN FAILED: ${args.project.name}`,
        "",
        `Project: ${args.project.name}`,
        `Scan: ${args.scan.scan_id}`,
        `Error: ${args.scan.error_message ?? "unknown error"}`,
        "",
        `View scan: ${this.dashboardUrl}/scans/${args.scan.scan_id}`
      ].join("\n"),
      counts: {},
      now_ms: now
    });
  }

  async sendTest(args: { project: Project; now_ms?: number }): Promise<NotificationHistoryEntry | null> {
    const now = args.now_ms ?? nowMs();
    const settings = getOrCreateNotificationSettings(this.db, args.project.project_id, now);
    const recipients = uniqueRecipients(settings);
    return this.dispatch({
      project: args.project,
      scan_id: null,
      type: "test",
      decision: { fire: true, suppressed: false, reason: "test requested" },
      recipients,
      subject: `Test notification: "${args.project.name}"`,
      text: `This is a test notification for project ${args.project.name}.\n\nProject page: ${this.dashboardUrl}/projects/${args.project.project_id}`,
      counts: {},
      now_ms: now
    });
  }

  async sendWeeklyIfDue(args: { project: Project; now_ms?: number }): Promise<NotificationHistoryEntry | null> {
    const now = args.now_ms ?? nowMs();
    const settings = getOrCreateNotificationSettings(this.db, args.project.project_id, now);
    const last = latestNotificationAt(this.db, args.project.project_id, "weekly");
    if (!isWeeklyDigestDue(settings, now, last)) return null;

    const histogram = severityHistogram(this.db, args.project.project_id);
    const lines = [
      `Weekly security digest: ${args.project.name}`,
      "",
      RULE,
      "OPEN FINDINGS",
      RULE,
      `Critical: ${histogram.critical}`,
      `High:     ${histogram.high}`,
      `Medium:   ${histogram.medium}`,
      `Low:      ${histogram.low}`,
      `Info:     ${histogram.info}`
    ];
    if (settings.weekly_include_trends) {
      const trends = trendSeries(this.db, { days: 7, now_ms: now, project_id: args.project.project_id });
      lines.push("", RULE, "LAST 7 DAYS", RULE);
      trends.scans.forEach((point, i) => {
        lines.push(`${point.date}  scans=${point.value} new=${trends.vulnerabilities[i]?.value ?? 0} pass_rate=${trends.pass_rate[i]?.value ?? 0}`);
      });
    }
    lines.push("", `Project page: ${this.dashboardUrl}/projects/${args.project.project_id}`);

    return this.dispatch({
      project: args.project,
      scan_id: null,
      type: "weekly",
      decision: { fire: true, suppressed: false, reason: `weekly ${settings.weekly_day} ${settings.weekly_time} UTC` },
      recipients: settings.weekly_recipients,
      subject: `Weekly digest: "${args.project.name}" - ${histogram.critical} critical, ${histogram.high} high open`,
      text: lines.join("\n"),
      counts: { critical_count: histogram.critical, high_count: histogram.high },
      now_ms: now
    });
  }

  private async dispatch(args: {
    project: Project;
    scan_id: string | null;
    type: NotificationType;
    decision: TriggerDecision;
    recipients: string[];
    subject: string;
    text: string;
    counts: RecordNotificationInput["counts"];
    now_ms: number;
  }): Promise<NotificationHistoryEntry | null> {
    const willSend = args.decision.fire && args.recipients.length > 0 && this.deliveryEnabled;
    const status = willSend ? "sent" : args.decision.suppressed ? "suppressed" : "skipped";
    const reason = !args.decision.fire
      ? args.decision.reason
      : args.recipients.length === 0
        ? "no recipients configured"
        : this.deliveryEnabled
          ? args.decision.reason
          : "email notifications disabled";

    const entry = recordNotification(
      this.db,
      {
        project_id: args.project.project_id,
        scan_id: args.scan_id,
        notification_type: args.type,
        subject: args.subject,
        recipients: args.recipients,
        status,
        reason,
        counts: args.counts
      },
      args.now_ms
    );
    if (!entry) {
      // already decided for this scan
      return null;
    }
    if (args.decision.suppressed) {
      console.log(`Notification suppressed project_id=${args.project.project_id} scan_id=${args.scan_id ?? "-"} type=${args.type} reason="${reason}"`);
    }
    if (args.decision.fire && !this.deliveryEnabled && args.recipients.length > 0) {
      console.log(`Notification not delivered project_id=${args.project.project_id} scan_id=${args.scan_id ?? "-"} type=${args.type} reason="${reason}"`);
    }
    if (!willSend) return entry;

    try {
      await this.sender.send({ to: args.recipients, subject: args.subject, text: args.text });
      return entry;
    } catch (e) {
      const failure = new NotificationDeliveryFailed(errorMessage(e));
      updateNotificationOutcome(this.db, entry.notification_id, "failed", failure.message);
      console.warn(
        `Notification delivery failed project_id=${args.project.project_id} scan_id=${args.scan_id ?? "-"} type=${args.type}: ${failure.message}`
      );
      return { ...entry, status: "failed", error_message: failure.message };
    }
  }

  private renderCritical(project: Project, scan: Scan, outcome: ScanOutcome): string {
    return [
      `CRITICAL ALERT: ${outcome.new_by_severity.critical} critical and ${outcome.new_by_severity.high} high findings detected`,
      "",
      `Project: ${project.name} (${project.framework})`,
      `Scan: ${scan.scan_id}`,
      "",
      RULE,
      "ACTION REQUIRED WITHIN 24 HOURS",
      RULE,
      "",
      `View details: ${this.dashboardUrl}/scans/${scan.scan_id}`,
      `Project page: ${this.dashboardUrl}/projects/${project.project_id}`
    ].join("\n");
  }

  private renderSummary(project: Project, scan: Scan, outcome: ScanOutcome, settings: NotificationSettings): string {
    const lines = [
      `Scan Complete: ${project.name}`,
      "",
      `Project: ${project.name} (${project.framework})`,
      `Scan: ${scan.scan_id}`,
      "",
      RULE,
      "SCAN SUMMARY",
      RULE,
      ""
    ];
    if (settings.summary_include_fixed) lines.push(`Fixed:        ${outcome.fixed} vulnerabilities`);
    if (settings.summary_include_new) lines.push(`New:          ${outcome.new} vulnerabilities`);
    if (settings.summary_include_still_open) lines.push(`Still Open:   ${outcome.still_open} vulnerabilities`);
    lines.push(`Total Checks: ${scan.passed_checks} passed, ${scan.failed_checks} failed`, "", `View full report: ${this.dashboardUrl}/scans/${scan.scan_id}`);
    return lines.join("\n");
  }
}

function uniqueRecipients(settings: NotificationSettings): string[] {
  return [...new Set([...settings.critical_recipients, ...settings.summary_recipients, ...settings.weekly_recipients])];
}
