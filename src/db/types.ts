export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const VULNERABILITY_STATUSES = ["open", "in_progress", "resolved", "ignored"] as const;
export type VulnerabilityStatus = (typeof VULNERABILITY_STATUSES)[number];

export const SCAN_STATUSES = ["pending", "running", "completed", "failed"] as const;
export type ScanStatus = (typeof SCAN_STATUSES)[number];

export type ScanType = "upload" | "rescan" | "manual";

export type SeverityCounts = Record<Severity, number>;

export interface Project {
  project_id: string;
  name: string;
  description: string | null;
  repository_url: string | null;
  framework: string;
  status: string;
  created_at: number;
  updated_at: number;
}

export interface ScanMetadata {
  upload_id?: string;
  upload_path?: string;
  frameworks_scanned?: string[];
  total_files?: number;
  skip_checks?: string[];
  dropped_findings?: number;
  reconciliation?: {
    new: number;
    still_open: number;
    fixed: number;
    regressions: number;
    ignored: number;
    new_by_severity: SeverityCounts;
  };
  trigger?: string;
}

export interface Scan {
  scan_id: string;
  project_id: string;
  scan_type: ScanType;
  status: ScanStatus;
  total_checks: number;
  passed_checks: number;
  failed_checks: number;
  skipped_checks: number;
  metadata: ScanMetadata;
  error_message: string | null;
  created_at: number;
  updated_at: number;
  started_at: number | null;
  completed_at: number | null;
  duration_ms: number | null;
  lease_owner: string | null;
  lease_expires_at: number | null;
  attempt_count: number;
}

export interface Vulnerability {
  vulnerability_id: string;
  project_id: string;
  scan_id: string | null;
  check_id: string;
  check_name: string;
  severity: Severity;
  status: VulnerabilityStatus;
  resource_type: string | null;
  resource_name: string | null;
  file_path: string;
  line_start: number | null;
  line_end: number | null;
  description: string;
  remediation: string;
  guideline_url: string | null;
  content_hash: string;
  detected_at: number;
  last_seen_at: number;
  resolved_at: number | null;
  resolution_scan_id: string | null;
  regression_count: number;
}

export interface Policy {
  check_id: string;
  name: string;
  platform: string;
  severity: Severity;
  category: string | null;
  description: string | null;
  guideline_url: string | null;
  built_in: boolean;
  file_path: string | null;
  code: string | null;
  created_at: number;
  updated_at: number;
}

export interface PolicyConfig {
  config_id: string;
  project_id: string | null;
  check_id: string;
  enabled: boolean;
  severity_override: Severity | null;
  custom_message: string | null;
  created_at: number;
  updated_at: number;
}

export const SUMMARY_SEND_WHEN = ["always", "has_changes", "has_critical_high"] as const;
export type SummarySendWhen = (typeof SUMMARY_SEND_WHEN)[number];

export const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export interface NotificationSettings {
  project_id: string;
  critical_recipients: string[];
  summary_recipients: string[];
  weekly_recipients: string[];
  critical_immediate_enabled: boolean;
  scan_summary_enabled: boolean;
  weekly_summary_enabled: boolean;
  scan_failed_enabled: boolean;
  critical_threshold: number;
  high_threshold: number;
  fixed_threshold: number;
  summary_send_when: SummarySendWhen;
  summary_include_fixed: boolean;
  summary_include_new: boolean;
  summary_include_still_open: boolean;
  weekly_day: Weekday;
  weekly_time: string;
  weekly_include_trends: boolean;
  digest_mode: boolean;
  quiet_hours_enabled: boolean;
  quiet_hours_start: string;
  quiet_hours_end: string;
  created_at: number;
  updated_at: number;
}

export type NotificationType = "critical" | "summary" | "scan_failed" | "weekly" | "test";
export type NotificationStatus = "sent" | "failed" | "suppressed" | "skipped";

export interface NotificationHistoryEntry {
  notification_id: string;
  project_id: string;
  scan_id: string | null;
  notification_type: NotificationType;
  subject: string;
  recipients: string[];
  sent_at: number;
  status: NotificationStatus;
  reason: string | null;
  error_message: string | null;
  critical_count: number;
  high_count: number;
  fixed_count: number;
  new_count: number;
  still_open_count: number;
}

export interface FileVersion {
  version_id: string;
  upload_id: string;
  project_id: string;
  file_path: string;
  content: string;
  content_hash: string;
  version_number: number;
  scan_id: string | null;
  change_summary: string | null;
  edited_by: string | null;
  created_at: number;
}

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && (SEVERITIES as readonly string[]).includes(value);
}

/** A normalized finding from one scan run, before it is reconciled into a row. */
export interface FindingDraft {
  check_id: string;
  check_name: string;
  severity: Severity;
  resource_type: string | null;
  resource_name: string | null;
  file_path: string;
  line_start: number | null;
  line_end: number | null;
  description: string;
  remediation: string;
  guideline_url: string | null;
  content_hash: string;
}
