import type { SqliteDb } from "../db/db.js";
import { getScanById, listCompletedScans } from "../db/repo.js";
import type { Scan, Vulnerability } from "../db/types.js";
import { listSightedInScan } from "../db/vulnerabilities.js";
import { BadRequest, NotFound } from "./errors.js";

export type ScanComparison = {
  base_scan: Scan;
  target_scan: Scan;
  new: Vulnerability[];
  existing: Vulnerability[];
  fixed: Vulnerability[];
  summary: { new: number; existing: number; fixed: number };
};

/**
 * Finding sets of two completed scans of one project, matched by content hash. Without
 * explicit ids the project's latest two completed scans are compared.
 */
export function compareScans(
  db: SqliteDb,
  args: { project_id: string; base_scan_id?: string; target_scan_id?: string }
): ScanComparison {
  let base: Scan | null;
  let target: Scan | null;
  if (args.base_scan_id && args.target_scan_id) {
    base = getScanById(db, args.base_scan_id);
    target = getScanById(db, args.target_scan_id);
  } else {
    const completed = listCompletedScans(db, { project_id: args.project_id });
    if (completed.length < 2) {
      throw new BadRequest("at least two completed scans are needed for a comparison");
    }
    base = completed[completed.length - 2] ?? null;
    target = completed[completed.length - 1] ?? null;
  }
  if (!base || !target || base.project_id !== args.project_id || target.project_id !== args.project_id) {
    throw new NotFound("scan not found for project");
  }
  if (base.status !== "completed" || target.status !== "completed") {
    throw new BadRequest("only completed scans can be compared");
  }

  const before = new Map(listSightedInScan(db, base.scan_id).map((v) => [v.content_hash, v]));
  const after = new Map(listSightedInScan(db, target.scan_id).map((v) => [v.content_hash, v]));

  const added: Vulnerability[] = [];
  const existing: Vulnerability[] = [];
  for (const [hash, v] of after) {
    if (before.has(hash)) existing.push(v);
    else added.push(v);
  }
  const fixed = [...before].filter(([hash]) => !after.has(hash)).map(([, v]) => v);

  return {
    base_scan: base,
    target_scan: target,
    new: added,
    existing,
    fixed,
    summary: { new: added.length, existing: existing.length, fixed: fixed.length }
  };
}
