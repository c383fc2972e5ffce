import type { SqliteDb } from "../db/db.js";
import { getScanById, markScanCompleted } from "../db/repo.js";
import { emptySeverityCounts, type FindingDraft, type ScanMetadata, type SeverityCounts, type Vulnerability } from "../db/types.js";
import {
  findLatestResolvedByHash,
  insertVulnerability,
  listUnresolvedForProject,
  recordSighting,
  resolveVulnerability,
  reviveVulnerability,
  touchVulnerability
} from "../db/vulnerabilities.js";
import { NotFound, ReconciliationConflict, ScanFailed, isSqliteBusy } from "./errors.js";
import type { KeyedLock } from "./projectLock.js";
import { canTransitionByEngine } from "./status.js";

export type ReconcileCounts = {
  new: number;
  still_open: number;
  fixed: number;
  regressions: number;
  ignored: number;
  new_by_severity: SeverityCounts;
};

type Match = { row: Vulnerability; draft: FindingDraft };

export type ReconcilePlan = {
  insert: FindingDraft[];
  revive: Match[];
  still_open: Match[];
  ignored: Match[];
  fixed: Vulnerability[];
};

/**
 * Partitions one scan's drafts against the project's unresolved rows. Ignored rows are
 * neither matched as open nor fixed; a draft whose hash was resolved before is revived.
 */
export function planReconciliation(args: {
  unresolved: Vulnerability[];
  drafts: FindingDraft[];
  findResolved: (content_hash: string) => Vulnerability | null;
}): ReconcilePlan {
  const open = new Map<string, Vulnerability>();
  const ignored = new Map<string, Vulnerability>();
  for (const row of args.unresolved) {
    if (row.status === "open" || row.status === "in_progress") open.set(row.content_hash, row);
    else if (row.status === "ignored") ignored.set(row.content_hash, row);
  }

  const plan: ReconcilePlan = { insert: [], revive: [], still_open: [], ignored: [], fixed: [] };
  const seen = new Set<string>();
  for (const draft of args.drafts) {
    if (seen.has(draft.content_hash)) continue;
    seen.add(draft.content_hash);

    const openRow = open.get(draft.content_hash);
    if (openRow) {
      plan.still_open.push({ row: openRow, draft });
      continue;
    }
    const ignoredRow = ignored.get(draft.content_hash);
    if (ignoredRow) {
      plan.ignored.push({ row: ignoredRow, draft });
      continue;
    }
    const resolved = args.findResolved(draft.content_hash);
    if (resolved) plan.revive.push({ row: resolved, draft });
    else plan.insert.push(draft);
  }

  for (const row of open.values()) {
    if (!seen.has(row.content_hash)) plan.fixed.push(row);
  }
  return plan;
}

export function countPlan(plan: ReconcilePlan): ReconcileCounts {
  const new_by_severity = emptySeverityCounts();
  for (const draft of plan.insert) new_by_severity[draft.severity] += 1;
  for (const { draft } of plan.revive) new_by_severity[draft.severity] += 1;
  return {
    new: plan.insert.length + plan.revive.length,
    still_open: plan.still_open.length,
    fixed: plan.fixed.length,
    regressions: plan.revive.length,
    ignored: plan.ignored.length,
    new_by_severity
  };
}

export type ScanCompletion = {
  total_checks: number;
  passed_checks: number;
  failed_checks: number;
  skipped_checks: number;
  metadata: ScanMetadata;
};

/**
 * Reconciles and completes the scan in one IMMEDIATE transaction, so a scan is either
 * fully applied or not at all. A scan that is already completed keeps its findings and
 * completion data; its stored counts are returned.
 */
export function applyReconciliation(
  db: SqliteDb,
  args: { scan_id: string; drafts: FindingDraft[]; completion: ScanCompletion; now_ms: number }
): ReconcileCounts {
  const tx = db.transaction((): ReconcileCounts => {
    const scan = getScanById(db, args.scan_id);
    if (!scan) throw new NotFound(`scan ${args.scan_id} not found`);
    if (scan.status === "failed") {
      throw new ScanFailed(`scan ${args.scan_id} failed and is not reconciled`);
    }
    if (scan.status === "completed" && scan.metadata.reconciliation) {
      console.warn(`Reconciliation skipped scan_id=${args.scan_id}: already completed`);
      return scan.metadata.reconciliation;
    }
    const project_id = scan.project_id;

    const plan = planReconciliation({
      unresolved: listUnresolvedForProject(db, project_id),
      drafts: args.drafts,
      findResolved: (hash) => findLatestResolvedByHash(db, project_id, hash)
    });

    for (const draft of plan.insert) {
      const row = insertVulnerability(db, { project_id, scan_id: args.scan_id, draft, now_ms: args.now_ms });
      recordSighting(db, args.scan_id, row.vulnerability_id, row.content_hash);
    }
    for (const { row, draft } of plan.revive) {
      if (!canTransitionByEngine(row.status, "open")) continue;
      reviveVulnerability(db, { vulnerability_id: row.vulnerability_id, scan_id: args.scan_id, draft, now_ms: args.now_ms });
      recordSighting(db, args.scan_id, row.vulnerability_id, row.content_hash);
    }
    for (const { row } of [...plan.still_open, ...plan.ignored]) {
      touchVulnerability(db, row.vulnerability_id, args.scan_id, args.now_ms);
      recordSighting(db, args.scan_id, row.vulnerability_id, row.content_hash);
    }
    for (const row of plan.fixed) {
      if (!canTransitionByEngine(row.status, "resolved")) continue;
      resolveVulnerability(db, row.vulnerability_id, args.scan_id, args.now_ms);
    }

    const counts = countPlan(plan);
    markScanCompleted(db, args.scan_id, {
      now_ms: args.now_ms,
      total_checks: args.completion.total_checks,
      passed_checks: args.completion.passed_checks,
      failed_checks: args.completion.failed_checks,
      skipped_checks: args.completion.skipped_checks,
      metadata: {
        ...args.completion.metadata,
        reconciliation: counts
      }
    });
    return counts;
  });
  return tx.immediate();
}

export type ReconcilerDeps = {
  db: SqliteDb;
  lock: KeyedLock;
  max_attempts: number;
  retry_delay_ms: number;
};

export async function reconcileScan(
  deps: ReconcilerDeps,
  args: { project_id: string; scan_id: string; drafts: FindingDraft[]; completion: ScanCompletion; now?: () => number }
): Promise<ReconcileCounts> {
  const now = args.now ?? Date.now;
  return deps.lock.run(args.project_id, async () => {
    const attempts = Math.max(1, deps.max_attempts);
    let conflict: ReconciliationConflict | null = null;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        return applyReconciliation(deps.db, {
          scan_id: args.scan_id,
          drafts: args.drafts,
          completion: args.completion,
          now_ms: now()
        });
      } catch (e) {
        if (!isSqliteBusy(e)) throw e;
        conflict = new ReconciliationConflict(`database busy while reconciling scan ${args.scan_id}`);
        console.warn(`Reconciliation conflict scan_id=${args.scan_id} attempt=${attempt}/${attempts}`);
        if (attempt < attempts) await sleep(deps.retry_delay_ms);
      }
    }
    throw conflict ?? new ReconciliationConflict(`could not reconcile scan ${args.scan_id}`);
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
