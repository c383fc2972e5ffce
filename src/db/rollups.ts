import type { SqliteDb } from "./db.js";
import type { Severity, VulnerabilityStatus } from "./types.js";

export type SeverityCountRow = { severity: Severity; n: number };
export type StatusCountRow = { status: VulnerabilityStatus; n: number };

export function countOpenBySeverity(db: SqliteDb, project_id?: string): SeverityCountRow[] {
  if (project_id) {
    return db
      .prepare<unknown[], SeverityCountRow>(
        `SELECT severity, COUNT(*) AS n FROM vulnerabilities
          WHERE project_id=? AND status IN ('open','in_progress')
          GROUP BY severity`
      )
      .all(project_id);
  }
  return db
    .prepare<unknown[], SeverityCountRow>(
      `SELECT severity, COUNT(*) AS n FROM vulnerabilities WHERE status IN ('open','in_progress') GROUP BY severity`
    )
    .all();
}

export function countByStatus(db: SqliteDb, project_id?: string): StatusCountRow[] {
  if (project_id) {
    return db
      .prepare<unknown[], StatusCountRow>(`SELECT status, COUNT(*) AS n FROM vulnerabilities WHERE project_id=? GROUP BY status`)
      .all(project_id);
  }
  return db.prepare<unknown[], StatusCountRow>(`SELECT status, COUNT(*) AS n FROM vulnerabilities GROUP BY status`).all();
}

export function countOpenBySeverityForScan(db: SqliteDb, scan_id: string): SeverityCountRow[] {
  return db
    .prepare<unknown[], SeverityCountRow>(
      `SELECT severity, COUNT(*) AS n FROM vulnerabilities
        WHERE scan_id=? AND status IN ('open','in_progress')
        GROUP BY severity`
    )
    .all(scan_id);
}

export type ProjectOpenCountRow = {
  project_id: string;
  name: string;
  open_count: number;
};

/** Every project appears, including those with nothing open. */
export function openCountsByProject(db: SqliteDb): ProjectOpenCountRow[] {
  return db
    .prepare<unknown[], ProjectOpenCountRow>(
      `SELECT p.project_id AS project_id, p.name AS name, COUNT(v.vulnerability_id) AS open_count
         FROM projects p
         LEFT JOIN vulnerabilities v
           ON v.project_id = p.project_id AND v.status IN ('open','in_progress')
        GROUP BY p.project_id, p.name
        ORDER BY open_count DESC, p.name ASC`
    )
    .all();
}

export type TopCheckRow = {
  check_id: string;
  check_name: string;
  severity: Severity;
  count: number;
};

export function topOpenChecks(db: SqliteDb, limit: number, project_id?: string): TopCheckRow[] {
  const sql = `SELECT check_id, check_name, severity, COUNT(*) AS count
                 FROM vulnerabilities
                WHERE status IN ('open','in_progress') ${project_id ? "AND project_id=?" : ""}
                GROUP BY check_id, check_name, severity
                ORDER BY count DESC, check_id ASC
                LIMIT ?`;
  const stmt = db.prepare<unknown[], TopCheckRow>(sql);
  return project_id ? stmt.all(project_id, limit) : stmt.all(limit);
}

export function detectionTimestamps(db: SqliteDb, since_ms: number, project_id?: string): number[] {
  const rows = project_id
    ? db
        .prepare<unknown[], { detected_at: number }>(`SELECT detected_at FROM vulnerabilities WHERE project_id=? AND detected_at >= ?`)
        .all(project_id, since_ms)
    : db.prepare<unknown[], { detected_at: number }>(`SELECT detected_at FROM vulnerabilities WHERE detected_at >= ?`).all(since_ms);
  return rows.map((r) => r.detected_at);
}

export type ScanActivityRow = {
  scan_id: string;
  project_id: string;
  status: string;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  total_checks: number;
  passed_checks: number;
};

export function scanActivitySince(db: SqliteDb, since_ms: number, project_id?: string): ScanActivityRow[] {
  const cols = `scan_id, project_id, status, created_at, started_at, completed_at, total_checks, passed_checks`;
  return project_id
    ? db
        .prepare<unknown[], ScanActivityRow>(
          `SELECT ${cols} FROM scans WHERE project_id=? AND COALESCE(started_at, created_at) >= ? ORDER BY created_at ASC`
        )
        .all(project_id, since_ms)
    : db
        .prepare<unknown[], ScanActivityRow>(`SELECT ${cols} FROM scans WHERE COALESCE(started_at, created_at) >= ? ORDER BY created_at ASC`)
        .all(since_ms);
}

export type ScanTotalsRow = { total: number; completed: number; failed: number };

export function scanTotals(db: SqliteDb): ScanTotalsRow {
  const row = db
    .prepare<unknown[], ScanTotalsRow>(
      `SELECT COUNT(*) AS total,
              COALESCE(SUM(CASE WHEN status='completed' THEN 1 ELSE 0 END), 0) AS completed,
              COALESCE(SUM(CASE WHEN status='failed' THEN 1 ELSE 0 END), 0) AS failed
         FROM scans`
    )
    .get();
  return row ?? { total: 0, completed: 0, failed: 0 };
}

export function projectsByFramework(db: SqliteDb): Array<{ framework: string; n: number }> {
  return db
    .prepare<unknown[], { framework: string; n: number }>(`SELECT framework, COUNT(*) AS n FROM projects GROUP BY framework ORDER BY framework ASC`)
    .all();
}
