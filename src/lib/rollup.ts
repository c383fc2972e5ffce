import type { SqliteDb } from "../db/db.js";
import { getProjectById, listCompletedScans, listScans } from "../db/repo.js";
import {
  countByStatus,
  countOpenBySeverity,
  countOpenBySeverityForScan,
  detectionTimestamps,
  openCountsByProject,
  projectsByFramework,
  scanActivitySince,
  scanTotals,
  topOpenChecks,
  type ProjectOpenCountRow,
  type SeverityCountRow,
  type TopCheckRow
} from "../db/rollups.js";
import {
  emptySeverityCounts,
  VULNERABILITY_STATUSES,
  type Scan,
  type SeverityCounts,
  type VulnerabilityStatus
} from "../db/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_TREND_DAYS = 30;

export type PassRatePoint = {
  scan_id: string;
  completed_at: number;
  total_checks: number;
  passed_checks: number;
  pass_rate: number;
};

export type TrendPoint = { date: string; value: number };

export type TrendSeries = {
  scans: TrendPoint[];
  vulnerabilities: TrendPoint[];
  pass_rate: TrendPoint[];
};

/** Percentage of passed checks, two decimals; a scan that ran no checks reports 0. */
export function passRate(scan: { total_checks: number; passed_checks: number }): number {
  if (scan.total_checks <= 0) return 0;
  return round((scan.passed_checks / scan.total_checks) * 100, 2);
}

export function toSeverityCounts(rows: SeverityCountRow[]): SeverityCounts {
  const out = emptySeverityCounts();
  for (const row of rows) out[row.severity] += row.n;
  return out;
}

export function severityHistogram(db: SqliteDb, project_id?: string): SeverityCounts {
  return toSeverityCounts(countOpenBySeverity(db, project_id));
}

export function statusBreakdown(db: SqliteDb, project_id?: string): Record<VulnerabilityStatus, number> {
  const out: Record<VulnerabilityStatus, number> = { open: 0, in_progress: 0, resolved: 0, ignored: 0 };
  for (const row of countByStatus(db, project_id)) {
    if (VULNERABILITY_STATUSES.includes(row.status)) out[row.status] += row.n;
  }
  return out;
}

export function passRateSeries(db: SqliteDb, args: { project_id?: string; since_ms?: number }): PassRatePoint[] {
  return listCompletedScans(db, args).map((scan) => ({
    scan_id: scan.scan_id,
    completed_at: scan.completed_at ?? scan.updated_at,
    total_checks: scan.total_checks,
    passed_checks: scan.passed_checks,
    pass_rate: passRate(scan)
  }));
}

export function projectOpenCounts(db: SqliteDb): ProjectOpenCountRow[] {
  return openCountsByProject(db);
}

export function utcDayKey(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function utcDayStart(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

/** Start of the first UTC day in a window of `days` days ending on the day of `now_ms`. */
function windowStart(days: number, now_ms: number): number {
  return utcDayStart(now_ms) - (Math.max(1, Math.floor(days)) - 1) * DAY_MS;
}

/**
 * Daily series over the last `days` UTC days ending today, oldest first. Days without
 * activity are present with value 0.
 */
export function trendSeries(db: SqliteDb, args: { days: number; now_ms: number; project_id?: string }): TrendSeries {
  const days = Math.max(1, Math.floor(args.days));
  const firstDay = windowStart(days, args.now_ms);
  const keys: string[] = [];
  for (let i = 0; i < days; i += 1) keys.push(utcDayKey(firstDay + i * DAY_MS));

  const scansPerDay = new Map<string, number>();
  const rates = new Map<string, number[]>();
  for (const scan of scanActivitySince(db, firstDay, args.project_id)) {
    const key = utcDayKey(scan.started_at ?? scan.created_at);
    scansPerDay.set(key, (scansPerDay.get(key) ?? 0) + 1);
    if (scan.status === "completed" && scan.total_checks > 0) {
      const list = rates.get(key) ?? [];
      list.push(passRate(scan));
      rates.set(key, list);
    }
  }

  const findingsPerDay = new Map<string, number>();
  for (const ts of detectionTimestamps(db, firstDay, args.project_id)) {
    const key = utcDayKey(ts);
    findingsPerDay.set(key, (findingsPerDay.get(key) ?? 0) + 1);
  }

  return {
    scans: keys.map((date) => ({ date, value: scansPerDay.get(date) ?? 0 })),
    vulnerabilities: keys.map((date) => ({ date, value: findingsPerDay.get(date) ?? 0 })),
    pass_rate: keys.map((date) => {
      const list = rates.get(date) ?? [];
      return { date, value: list.length === 0 ? 0 : round(list.reduce((a, b) => a + b, 0) / list.length, 1) };
    })
  };
}

export type RecentScanSummary = {
  scan: Scan;
  project_name: string | null;
  open_by_severity: SeverityCounts;
};

export type DashboardStats = {
  projects: { total_projects: number; frameworks: Record<string, number> };
  scans: { total_scans: number; completed_scans: number; failed_scans: number; average_pass_rate: number };
  vulnerabilities: SeverityCounts;
  status_breakdown: Record<VulnerabilityStatus, number>;
  trends: TrendSeries;
  top_vulnerabilities: TopCheckRow[];
  recent_scans: RecentScanSummary[];
  vulnerabilities_by_project: ProjectOpenCountRow[];
};

export function dashboardStats(db: SqliteDb, args: { days: number; now_ms: number }): DashboardStats {
  const frameworks: Record<string, number> = {};
  let totalProjects = 0;
  for (const row of projectsByFramework(db)) {
    frameworks[row.framework] = row.n;
    totalProjects += row.n;
  }

  const totals = scanTotals(db);
  const rates = listCompletedScans(db, {})
    .filter((s) => s.total_checks > 0)
    .map(passRate);
  const average = rates.length === 0 ? 0 : round(rates.reduce((a, b) => a + b, 0) / rates.length, 2);

  const recent = listScans(db, { limit: 5, offset: 0 }).map((scan) => ({
    scan,
    project_name: getProjectById(db, scan.project_id)?.name ?? null,
    open_by_severity: toSeverityCounts(countOpenBySeverityForScan(db, scan.scan_id))
  }));

  return {
    projects: { total_projects: totalProjects, frameworks },
    scans: {
      total_scans: totals.total,
      completed_scans: totals.completed,
      failed_scans: totals.failed,
      average_pass_rate: average
    },
    vulnerabilities: severityHistogram(db),
    status_breakdown: statusBreakdown(db),
    trends: trendSeries(db, { days: args.days, now_ms: args.now_ms }),
    top_vulnerabilities: topOpenChecks(db, 10),
    recent_scans: recent,
    vulnerabilities_by_project: projectOpenCounts(db)
  };
}

export type ProjectRollup = {
  project_id: string;
  open_by_severity: SeverityCounts;
  status_breakdown: Record<VulnerabilityStatus, number>;
  pass_rate_series: PassRatePoint[];
  trends: TrendSeries;
  top_vulnerabilities: TopCheckRow[];
};

export function projectRollup(db: SqliteDb, args: { project_id: string; days: number; now_ms: number }): ProjectRollup {
  return {
    project_id: args.project_id,
    open_by_severity: severityHistogram(db, args.project_id),
    status_breakdown: statusBreakdown(db, args.project_id),
    pass_rate_series: passRateSeries(db, { project_id: args.project_id, since_ms: windowStart(args.days, args.now_ms) }),
    trends: trendSeries(db, { days: args.days, now_ms: args.now_ms, project_id: args.project_id }),
    top_vulnerabilities: topOpenChecks(db, 10, args.project_id)
  };
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
