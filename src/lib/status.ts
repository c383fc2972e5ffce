import type { SqliteDb } from "../db/db.js";
import type { Vulnerability, VulnerabilityStatus } from "../db/types.js";
import { countActiveWithHash, getVulnerabilityById, setVulnerabilityStatus } from "../db/vulnerabilities.js";
import { InvalidStateTransition, NotFound, errorMessage } from "./errors.js";

/** Transitions a user may request. Resolution and revival belong to reconciliation. */
const MANUAL_TRANSITIONS: Record<VulnerabilityStatus, readonly VulnerabilityStatus[]> = {
  open: ["in_progress", "ignored"],
  in_progress: ["ignored"],
  ignored: ["open"],
  resolved: []
};

const ENGINE_TRANSITIONS: Record<VulnerabilityStatus, readonly VulnerabilityStatus[]> = {
  open: ["resolved"],
  in_progress: ["resolved"],
  resolved: ["open"],
  ignored: []
};

export function canTransitionManually(from: VulnerabilityStatus, to: VulnerabilityStatus): boolean {
  return MANUAL_TRANSITIONS[from].includes(to);
}

export function canTransitionByEngine(from: VulnerabilityStatus, to: VulnerabilityStatus): boolean {
  return ENGINE_TRANSITIONS[from].includes(to);
}

export function assertManualTransition(from: VulnerabilityStatus, to: VulnerabilityStatus): void {
  if (to === "resolved") {
    throw new InvalidStateTransition(from, to, "vulnerabilities are resolved only by a scan that no longer reports them");
  }
  if (!canTransitionManually(from, to)) {
    throw new InvalidStateTransition(from, to);
  }
}

/**
 * Applies a user-requested status change. Reopening an ignored row is refused while
 * another row of the project with the same hash is active.
 */
export function changeVulnerabilityStatus(db: SqliteDb, vulnerability_id: string, to: VulnerabilityStatus): Vulnerability {
  const tx = db.transaction((): Vulnerability => {
    const current = getVulnerabilityById(db, vulnerability_id);
    if (!current) throw new NotFound("vulnerability not found");
    assertManualTransition(current.status, to);
    if (to === "open" && countActiveWithHash(db, current.project_id, current.content_hash, current.vulnerability_id) > 0) {
      throw new InvalidStateTransition(current.status, to, "another open finding with the same content hash exists");
    }
    setVulnerabilityStatus(db, vulnerability_id, to);
    return { ...current, status: to };
  });
  return tx.immediate();
}

export type BulkStatusResult = {
  updated: Vulnerability[];
  failed: Array<{ vulnerability_id: string; error_code: string; message: string }>;
};

export function bulkChangeStatus(db: SqliteDb, vulnerability_ids: string[], to: VulnerabilityStatus): BulkStatusResult {
  const result: BulkStatusResult = { updated: [], failed: [] };
  for (const id of vulnerability_ids) {
    try {
      result.updated.push(changeVulnerabilityStatus(db, id, to));
    } catch (e) {
      if (e instanceof InvalidStateTransition || e instanceof NotFound) {
        result.failed.push({ vulnerability_id: id, error_code: e.error_code, message: e.message });
        continue;
      }
      throw new Error(`bulk status update failed at ${id}: ${errorMessage(e)}`);
    }
  }
  return result;
}
