import { v4 as uuidv4 } from "uuid";
import type { SqliteDb } from "./db.js";
import type { FindingDraft, Severity, Vulnerability, VulnerabilityStatus } from "./types.js";

export type VulnerabilityFilter = {
  project_id?: string;
  scan_id?: string;
  severity?: Severity;
  status?: VulnerabilityStatus;
  limit: number;
  offset: number;
};

export function getVulnerabilityById(db: SqliteDb, vulnerability_id: string): Vulnerability | null {
  return db.prepare<unknown[], Vulnerability>(`SELECT * FROM vulnerabilities WHERE vulnerability_id=?`).get(vulnerability_id) ?? null;
}

export function listVulnerabilities(db: SqliteDb, filter: VulnerabilityFilter): Vulnerability[] {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filter.project_id) {
    where.push("project_id=?");
    params.push(filter.project_id);
  }
  if (filter.scan_id) {
    where.push("scan_id=?");
    params.push(filter.scan_id);
  }
  if (filter.severity) {
    where.push("severity=?");
    params.push(filter.severity);
  }
  if (filter.status) {
    where.push("status=?");
    params.push(filter.status);
  }
  const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  return db
    .prepare<unknown[], Vulnerability>(
      `SELECT * FROM vulnerabilities ${clause}
        ORDER BY CASE severity WHEN 'critical' THEN 0 WHEN 'high' THEN 1 WHEN 'medium' THEN 2 WHEN 'low' THEN 3 ELSE 4 END,
                 detected_at ASC, vulnerability_id ASC
        LIMIT ? OFFSET ?`
    )
    .all(...params, filter.limit, filter.offset);
}

/** Rows reconciliation tracks by hash: everything not yet resolved. */
export function listUnresolvedForProject(db: SqliteDb, project_id: string): Vulnerability[] {
  return db
    .prepare<unknown[], Vulnerability>(
      `SELECT * FROM vulnerabilities WHERE project_id=? AND status IN ('open','in_progress','ignored') ORDER BY detected_at ASC`
    )
    .all(project_id);
}

export function findLatestResolvedByHash(db: SqliteDb, project_id: string, content_hash: string): Vulnerability | null {
  return (
    db
      .prepare<unknown[], Vulnerability>(
        `SELECT * FROM vulnerabilities
          WHERE project_id=? AND content_hash=? AND status='resolved'
          ORDER BY resolved_at DESC, detected_at DESC
          LIMIT 1`
      )
      .get(project_id, content_hash) ?? null
  );
}

export function countActiveWithHash(db: SqliteDb, project_id: string, content_hash: string, excluding_id: string): number {
  const row = db
    .prepare<unknown[], { n: number }>(
      `SELECT COUNT(*) AS n FROM vulnerabilities
        WHERE project_id=? AND content_hash=? AND status IN ('open','in_progress') AND vulnerability_id<>?`
    )
    .get(project_id, content_hash, excluding_id);
  return row?.n ?? 0;
}

export function insertVulnerability(
  db: SqliteDb,
  args: { project_id: string; scan_id: string; draft: FindingDraft; now_ms: number }
): Vulnerability {
  const row: Vulnerability = {
    ...args.draft,
    vulnerability_id: uuidv4(),
    project_id: args.project_id,
    scan_id: args.scan_id,
    status: "open",
    detected_at: args.now_ms,
    last_seen_at: args.now_ms,
    resolved_at: null,
    resolution_scan_id: null,
    regression_count: 0
  };
  db.prepare(
    `INSERT INTO vulnerabilities (
       vulnerability_id,project_id,scan_id,check_id,check_name,severity,status,resource_type,resource_name,file_path,
       line_start,line_end,description,remediation,guideline_url,content_hash,detected_at,last_seen_at,resolved_at,resolution_scan_id,regression_count
     ) VALUES (
       @vulnerability_id,@project_id,@scan_id,@check_id,@check_name,@severity,@status,@resource_type,@resource_name,@file_path,
       @line_start,@line_end,@description,@remediation,@guideline_url,@content_hash,@detected_at,@last_seen_at,@resolved_at,@resolution_scan_id,@regression_count
     )`
  ).run(row);
  return row;
}

/** Most recent detector and sighting only; status and annotations stay as they are. */
export function touchVulnerability(db: SqliteDb, vulnerability_id: string, scan_id: string, now_ms: number): void {
  db.prepare(`UPDATE vulnerabilities SET scan_id=?, last_seen_at=? WHERE vulnerability_id=?`).run(scan_id, now_ms, vulnerability_id);
}

export function resolveVulnerability(db: SqliteDb, vulnerability_id: string, resolution_scan_id: string, now_ms: number): void {
  db.prepare(
    `UPDATE vulnerabilities
        SET status='resolved', resolved_at=?, resolution_scan_id=?
      WHERE vulnerability_id=? AND status IN ('open','in_progress')`
  ).run(now_ms, resolution_scan_id, vulnerability_id);
}

export function reviveVulnerability(
  db: SqliteDb,
  args: { vulnerability_id: string; scan_id: string; draft: FindingDraft; now_ms: number }
): void {
  db.prepare(
    `UPDATE vulnerabilities
        SET status='open',
            scan_id=@scan_id,
            check_name=@check_name,
            severity=@severity,
            resource_type=@resource_type,
            line_end=@line_end,
            description=@description,
            remediation=@remediation,
            guideline_url=@guideline_url,
            detected_at=@now_ms,
            last_seen_at=@now_ms,
            resolved_at=NULL,
            resolution_scan_id=NULL,
            regression_count=regression_count + 1
      WHERE vulnerability_id=@vulnerability_id AND status='resolved'`
  ).run({
    vulnerability_id: args.vulnerability_id,
    scan_id: args.scan_id,
    now_ms: args.now_ms,
    check_name: args.draft.check_name,
    severity: args.draft.severity,
    resource_type: args.draft.resource_type,
    line_end: args.draft.line_end,
    description: args.draft.description,
    remediation: args.draft.remediation,
    guideline_url: args.draft.guideline_url
  });
}

export function setVulnerabilityStatus(db: SqliteDb, vulnerability_id: string, status: VulnerabilityStatus): void {
  db.prepare(`UPDATE vulnerabilities SET status=? WHERE vulnerability_id=?`).run(status, vulnerability_id);
}

export function listResolvedInScan(db: SqliteDb, scan_id: string): Vulnerability[] {
  return db.prepare<unknown[], Vulnerability>(`SELECT * FROM vulnerabilities WHERE resolution_scan_id=?`).all(scan_id);
}

/** Records that a scan reported the finding; one row per (scan, hash). */
export function recordSighting(db: SqliteDb, scan_id: string, vulnerability_id: string, content_hash: string): void {
  db.prepare(`INSERT OR IGNORE INTO scan_findings (scan_id, vulnerability_id, content_hash) VALUES (?,?,?)`).run(
    scan_id,
    vulnerability_id,
    content_hash
  );
}

export function listSightedInScan(db: SqliteDb, scan_id: string): Vulnerability[] {
  return db
    .prepare<unknown[], Vulnerability>(
      `SELECT v.* FROM scan_findings sf
         JOIN vulnerabilities v ON v.vulnerability_id = sf.vulnerability_id
        WHERE sf.scan_id=?
        ORDER BY v.file_path ASC, v.check_id ASC`
    )
    .all(scan_id);
}
