import type { AppConfig } from "../config.js";
import type { SqliteDb } from "../db/db.js";
import { effectivePolicyConfigs } from "../db/policies.js";
import { createScan, getProjectById, getScanById, markScanFailed, markScanRunning } from "../db/repo.js";
import type { Project, Scan, ScanType } from "../db/types.js";
import { NotFound, ScanFailed, errorMessage } from "./errors.js";
import { normalizeFindings } from "./normalizer.js";
import type { Notifier } from "./notifier.js";
import type { KeyedLock } from "./projectLock.js";
import { reconcileScan, type ReconcileCounts } from "./reconcile.js";
import type { Scanner, ScannerOutput } from "./scanner.js";
import type { SeverityMap } from "./severity.js";

export type ScanPipelineDeps = {
  db: SqliteDb;
  scanner: Scanner;
  notifier: Notifier;
  lock: KeyedLock;
  severity_map: SeverityMap;
  config: Pick<AppConfig, "CHECKOV_TIMEOUT_MS" | "CUSTOM_POLICIES_DIR" | "RECONCILE_MAX_ATTEMPTS" | "RECONCILE_RETRY_DELAY_MS" | "WORKER_LEASE_MS">;
  now?: () => number;
};

export type ScanExecution = {
  scan: Scan;
  counts: ReconcileCounts | null;
};

/** A new pending scan over the same upload as `source`. */
export function queueRescan(db: SqliteDb, source: Scan, args: { scan_type?: ScanType; trigger: string }): Scan {
  return createScan(db, {
    project_id: source.project_id,
    scan_type: args.scan_type ?? "rescan",
    metadata: {
      upload_id: source.metadata.upload_id,
      upload_path: source.metadata.upload_path,
      skip_checks: source.metadata.skip_checks,
      trigger: args.trigger
    }
  });
}

/** Moves a freshly created scan to running under the caller, before any worker can claim it. */
function claimForSyncRun(deps: ScanPipelineDeps, scan_id: string, worker_id = "api-sync"): void {
  const now = (deps.now ?? Date.now)();
  markScanRunning(deps.db, scan_id, { worker_id, now_ms: now, lease_ms: deps.config.WORKER_LEASE_MS });
}

/**
 * Runs the scanner over the scan's upload, then normalizes and reconciles the findings and
 * notifies. A scanner failure fails the scan and skips reconciliation.
 */
export async function executeScan(deps: ScanPipelineDeps, scan_id: string): Promise<ScanExecution> {
  const now = deps.now ?? Date.now;
  const scan = getScanById(deps.db, scan_id);
  if (!scan) throw new NotFound(`scan ${scan_id} not found`);
  if (scan.status === "completed" || scan.status === "failed") {
    return { scan, counts: null };
  }
  const project = getProjectById(deps.db, scan.project_id);
  if (!project) throw new NotFound(`project ${scan.project_id} not found`);
  if (scan.status === "pending") claimForSyncRun(deps, scan_id);

  let output: ScannerOutput;
  try {
    const upload_path = scan.metadata.upload_path;
    if (!upload_path) throw new ScanFailed("scan has no upload to scan");
    output = await deps.scanner.scan({
      root_dir: upload_path,
      skip_checks: scan.metadata.skip_checks ?? [],
      custom_policies_dir: deps.config.CUSTOM_POLICIES_DIR || null,
      timeout_ms: deps.config.CHECKOV_TIMEOUT_MS
    });
  } catch (e) {
    return { scan: await failScan(deps, project, scan_id, errorMessage(e)), counts: null };
  }

  const normalized = normalizeFindings(output.results, {
    configs: effectivePolicyConfigs(deps.db, project.project_id),
    severity_map: deps.severity_map,
    scan_id
  });

  let counts: ReconcileCounts;
  try {
    counts = await reconcileScan(
      {
        db: deps.db,
        lock: deps.lock,
        max_attempts: deps.config.RECONCILE_MAX_ATTEMPTS,
        retry_delay_ms: deps.config.RECONCILE_RETRY_DELAY_MS
      },
      {
        project_id: project.project_id,
        scan_id,
        drafts: normalized.drafts,
        now,
        completion: {
          total_checks: output.summary.passed + output.summary.failed + output.summary.skipped,
          passed_checks: output.summary.passed,
          failed_checks: output.summary.failed,
          skipped_checks: output.summary.skipped,
          metadata: {
            ...scan.metadata,
            frameworks_scanned: output.frameworks_scanned,
            total_files: output.total_files,
            dropped_findings: normalized.dropped
          }
        }
      }
    );
  } catch (e) {
    return { scan: await failScan(deps, project, scan_id, errorMessage(e)), counts: null };
  }

  const completed = getScanById(deps.db, scan_id);
  if (!completed) throw new NotFound(`scan ${scan_id} not found`);
  console.log(
    `Scan completed scan_id=${scan_id} project_id=${project.project_id} new=${counts.new} still_open=${counts.still_open} fixed=${counts.fixed} regressions=${counts.regressions} ignored=${counts.ignored} dropped=${normalized.dropped} disabled=${normalized.disabled}`
  );

  try {
    await deps.notifier.notifyScanCompleted({
      project,
      scan: completed,
      outcome: { new: counts.new, fixed: counts.fixed, still_open: counts.still_open, new_by_severity: counts.new_by_severity },
      now_ms: now()
    });
  } catch (e) {
    console.warn(`Notification evaluation failed scan_id=${scan_id}: ${errorMessage(e)}`);
  }
  return { scan: completed, counts };
}

async function failScan(deps: ScanPipelineDeps, project: Project, scan_id: string, message: string): Promise<Scan> {
  const now = deps.now ?? Date.now;
  const changed = markScanFailed(deps.db, scan_id, message, { now_ms: now() });
  const failed = getScanById(deps.db, scan_id);
  if (!failed) throw new NotFound(`scan ${scan_id} not found`);
  if (!changed) {
    console.warn(`Scan failure ignored scan_id=${scan_id} status=${failed.status}: ${message}`);
    return failed;
  }
  console.warn(`Scan failed scan_id=${scan_id} project_id=${project.project_id}: ${message}`);
  try {
    await deps.notifier.notifyScanFailed({ project, scan: failed, now_ms: now() });
  } catch (e) {
    console.warn(`Notification evaluation failed scan_id=${scan_id}: ${errorMessage(e)}`);
  }
  return failed;
}
