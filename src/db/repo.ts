import { createHash } from "node:crypto";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { SqliteDb } from "./db.js";
import type { Project, Scan, ScanMetadata, ScanType } from "./types.js";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function nowMs(): number {
  return Date.now();
}

type ProjectRow = Project;

type ScanRow = Omit<Scan, "metadata"> & { metadata_json: string };

const CountSchema = z.number().int().nonnegative();

const ScanMetadataSchema = z.object({
  upload_id: z.string().optional(),
  upload_path: z.string().optional(),
  frameworks_scanned: z.array(z.string()).optional(),
  total_files: CountSchema.optional(),
  skip_checks: z.array(z.string()).optional(),
  dropped_findings: CountSchema.optional(),
  reconciliation: z
    .object({
      new: CountSchema,
      still_open: CountSchema,
      fixed: CountSchema,
      regressions: CountSchema,
      ignored: CountSchema,
      new_by_severity: z.object({
        critical: CountSchema,
        high: CountSchema,
        medium: CountSchema,
        low: CountSchema,
        info: CountSchema
      })
    })
    .optional(),
  trigger: z.string().optional()
});

// Projects

export type CreateProjectInput = {
  name: string;
  framework: string;
  description?: string | null;
  repository_url?: string | null;
  status?: string;
};

export function createProject(db: SqliteDb, input: CreateProjectInput, now_ms: number = nowMs()): Project {
  const project: Project = {
    project_id: uuidv4(),
    name: input.name,
    framework: input.framework,
    description: input.description ?? null,
    repository_url: input.repository_url ?? null,
    status: input.status ?? "active",
    created_at: now_ms,
    updated_at: now_ms
  };
  db.prepare(
    `INSERT INTO projects (project_id,name,description,repository_url,framework,status,created_at,updated_at)
     VALUES (@project_id,@name,@description,@repository_url,@framework,@status,@created_at,@updated_at)`
  ).run(project);
  return project;
}

export function getProjectById(db: SqliteDb, project_id: string): Project | null {
  return db.prepare<unknown[], ProjectRow>(`SELECT * FROM projects WHERE project_id=?`).get(project_id) ?? null;
}

export function getProjectByName(db: SqliteDb, name: string): Project | null {
  return db.prepare<unknown[], ProjectRow>(`SELECT * FROM projects WHERE name=?`).get(name) ?? null;
}

export function listProjects(db: SqliteDb, args: { limit: number; offset: number }): Project[] {
  return db
    .prepare<unknown[], ProjectRow>(`SELECT * FROM projects ORDER BY created_at ASC, name ASC LIMIT ? OFFSET ?`)
    .all(args.limit, args.offset);
}

export function updateProject(
  db: SqliteDb,
  project_id: string,
  patch: Partial<Pick<Project, "name" | "description" | "repository_url" | "framework" | "status">>
): Project | null {
  const current = getProjectById(db, project_id);
  if (!current) return null;
  const next: Project = { ...current, ...patch, updated_at: nowMs() };
  db.prepare(
    `UPDATE projects
        SET name=@name, description=@description, repository_url=@repository_url, framework=@framework, status=@status, updated_at=@updated_at
      WHERE project_id=@project_id`
  ).run(next);
  return next;
}

export function deleteProject(db: SqliteDb, project_id: string): boolean {
  return db.prepare(`DELETE FROM projects WHERE project_id=?`).run(project_id).changes > 0;
}

// Scans

export type CreateScanInput = {
  project_id: string;
  scan_type: ScanType;
  metadata: ScanMetadata;
};

export function createScan(db: SqliteDb, input: CreateScanInput, now_ms: number = nowMs()): Scan {
  const scan: Scan = {
    scan_id: uuidv4(),
    project_id: input.project_id,
    scan_type: input.scan_type,
    status: "pending",
    total_checks: 0,
    passed_checks: 0,
    failed_checks: 0,
    skipped_checks: 0,
    metadata: input.metadata,
    error_message: null,
    created_at: now_ms,
    updated_at: now_ms,
    started_at: null,
    completed_at: null,
    duration_ms: null,
    lease_owner: null,
    lease_expires_at: null,
    attempt_count: 0
  };
  db.prepare(
    `INSERT INTO scans (scan_id,project_id,scan_type,status,metadata_json,created_at,updated_at,attempt_count)
     VALUES (?,?,?,?,?,?,?,0)`
  ).run(scan.scan_id, scan.project_id, scan.scan_type, scan.status, JSON.stringify(scan.metadata), now_ms, now_ms);
  return scan;
}

export function getScanById(db: SqliteDb, scan_id: string): Scan | null {
  const row = db.prepare<unknown[], ScanRow>(`SELECT * FROM scans WHERE scan_id=?`).get(scan_id);
  return row ? hydrateScan(row) : null;
}

export function listScans(db: SqliteDb, args: { project_id?: string; limit: number; offset: number }): Scan[] {
  const rows = args.project_id
    ? db
        .prepare<unknown[], ScanRow>(`SELECT * FROM scans WHERE project_id=? ORDER BY created_at DESC LIMIT ? OFFSET ?`)
        .all(args.project_id, args.limit, args.offset)
    : db.prepare<unknown[], ScanRow>(`SELECT * FROM scans ORDER BY created_at DESC LIMIT ? OFFSET ?`).all(args.limit, args.offset);
  return rows.map(hydrateScan);
}

export function listCompletedScans(db: SqliteDb, args: { project_id?: string; since_ms?: number }): Scan[] {
  const since = args.since_ms ?? 0;
  const rows = args.project_id
    ? db
        .prepare<unknown[], ScanRow>(
          `SELECT * FROM scans WHERE project_id=? AND status='completed' AND completed_at >= ? ORDER BY completed_at ASC, created_at ASC`
        )
        .all(args.project_id, since)
    : db
        .prepare<unknown[], ScanRow>(
          `SELECT * FROM scans WHERE status='completed' AND completed_at >= ? ORDER BY completed_at ASC, created_at ASC`
        )
        .all(since);
  return rows.map(hydrateScan);
}

/**
 * Findings last seen by the deleted scan fall back to their latest other sighting; the
 * rows themselves, with their status, are kept.
 */
export function deleteScan(db: SqliteDb, scan_id: string): boolean {
  const tx = db.transaction(() => {
    db.prepare(
      `UPDATE vulnerabilities
          SET scan_id = (
            SELECT sf.scan_id
              FROM scan_findings sf
              JOIN scans s ON s.scan_id = sf.scan_id
             WHERE sf.vulnerability_id = vulnerabilities.vulnerability_id
               AND sf.scan_id <> ?
             ORDER BY COALESCE(s.completed_at, s.created_at) DESC, s.created_at DESC
             LIMIT 1
          )
        WHERE scan_id=?`
    ).run(scan_id, scan_id);
    return db.prepare(`DELETE FROM scans WHERE scan_id=?`).run(scan_id).changes > 0;
  });
  return tx();
}

export function markScanRunning(
  db: SqliteDb,
  scan_id: string,
  args: {
    worker_id: string;
    now_ms: number;
    lease_ms: number;
    increment_attempt_count?: boolean;
  }
): void {
  const increment = args.increment_attempt_count ?? true;
  db.prepare(
    `UPDATE scans
       SET status='running',
           updated_at=?,
           lease_owner=?,
           lease_expires_at=?,
           started_at=COALESCE(started_at, ?),
           attempt_count=attempt_count + ?
     WHERE scan_id=?`
  ).run(args.now_ms, args.worker_id, args.now_ms + args.lease_ms, args.now_ms, increment ? 1 : 0, scan_id);
}

export function markScanCompleted(
  db: SqliteDb,
  scan_id: string,
  args: {
    now_ms: number;
    total_checks: number;
    passed_checks: number;
    failed_checks: number;
    skipped_checks: number;
    metadata: ScanMetadata;
  }
): void {
  db.prepare(
    `UPDATE scans
       SET status='completed',
           updated_at=?,
           total_checks=?,
           passed_checks=?,
           failed_checks=?,
           skipped_checks=?,
           metadata_json=?,
           lease_owner=NULL,
           lease_expires_at=NULL,
           completed_at=?,
           duration_ms=? - COALESCE(started_at, created_at),
           error_message=NULL
     WHERE scan_id=?`
  ).run(
    args.now_ms,
    args.total_checks,
    args.passed_checks,
    args.failed_checks,
    args.skipped_checks,
    JSON.stringify(args.metadata),
    args.now_ms,
    args.now_ms,
    scan_id
  );
}

/** Fails a scan that has not finished yet; returns false when it already completed or failed. */
export function markScanFailed(db: SqliteDb, scan_id: string, error_message: string, args: { now_ms: number }): boolean {
  const result = db.prepare(
    `UPDATE scans
       SET status='failed',
           updated_at=?,
           error_message=?,
           lease_owner=NULL,
           lease_expires_at=NULL,
           completed_at=COALESCE(completed_at, ?),
           duration_ms=? - COALESCE(started_at, created_at)
     WHERE scan_id=?
       AND status IN ('pending','running')`
  ).run(args.now_ms, error_message, args.now_ms, args.now_ms, scan_id);
  return result.changes > 0;
}

/**
 * Claims the oldest pending scan whose project has no other scan under a live lease,
 * so at most one scan per project is in flight across all workers.
 */
export function claimNextScan(
  db: SqliteDb,
  args: {
    worker_id: string;
    now_ms: number;
    lease_ms: number;
  }
): Scan | null {
  const tx = db.transaction(() => {
    const candidate = db
      .prepare<unknown[], { scan_id: string }>(
        `SELECT s.scan_id
           FROM scans s
          WHERE (
            s.status='pending'
            OR (s.status='running' AND s.lease_expires_at IS NOT NULL AND s.lease_expires_at <= ?)
          )
            AND NOT EXISTS (
              SELECT 1 FROM scans other
               WHERE other.project_id = s.project_id
                 AND other.scan_id <> s.scan_id
                 AND other.status = 'running'
                 AND other.lease_expires_at IS NOT NULL
                 AND other.lease_expires_at > ?
            )
          ORDER BY s.created_at ASC
          LIMIT 1`
      )
      .get(args.now_ms, args.now_ms);
    if (!candidate) return null;

    const update = db
      .prepare(
        `UPDATE scans
            SET status='running',
                updated_at=?,
                lease_owner=?,
                lease_expires_at=?,
                started_at=COALESCE(started_at, ?),
                attempt_count=attempt_count + 1
          WHERE scan_id=?
            AND (
              status='pending'
              OR (status='running' AND lease_expires_at IS NOT NULL AND lease_expires_at <= ?)
            )`
      )
      .run(args.now_ms, args.worker_id, args.now_ms + args.lease_ms, args.now_ms, candidate.scan_id, args.now_ms);
    if (update.changes === 0) return null;

    return getScanById(db, candidate.scan_id);
  });

  return tx.immediate();
}

/** Extends a running scan's lease while `worker_id` still holds it. */
export function renewScanLease(db: SqliteDb, args: { scan_id: string; worker_id: string; now_ms: number; lease_ms: number }): boolean {
  const result = db
    .prepare(
      `UPDATE scans
          SET lease_expires_at=?,
              updated_at=?
        WHERE scan_id=?
          AND status='running'
          AND lease_owner=?`
    )
    .run(args.now_ms + args.lease_ms, args.now_ms, args.scan_id, args.worker_id);
  return result.changes > 0;
}

export function releaseExpiredLeases(db: SqliteDb, now_ms: number): number {
  const result = db
    .prepare(
      `UPDATE scans
          SET status='pending',
              updated_at=?,
              lease_owner=NULL,
              lease_expires_at=NULL
        WHERE status='running'
          AND lease_expires_at IS NOT NULL
          AND lease_expires_at <= ?`
    )
    .run(now_ms, now_ms);
  return result.changes;
}

function hydrateScan(row: ScanRow): Scan {
  const { metadata_json, ...rest } = row;
  return {
    ...rest,
    metadata: parseMetadata(metadata_json)
  };
}

function parseMetadata(raw: string | null): ScanMetadata {
  if (!raw) return {};
  const parsed = ScanMetadataSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : {};
}
