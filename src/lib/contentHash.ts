import { sha256Hex } from "../db/repo.js";

/** Slash-normalized, case-preserving form of a scanner-reported path. */
export function normalizeFindingPath(p: string): string {
  let out = p.trim().replace(/\\/g, "/").replace(/\/{2,}/g, "/");
  while (out.startsWith("./")) out = out.slice(2);
  while (out.length > 1 && out.endsWith("/")) out = out.slice(0, -1);
  return out;
}

export type HashIdentity = {
  check_id: string;
  file_path: string;
  line_start: number | null | undefined;
  resource_name: string | null | undefined;
};

export function hashKey(identity: HashIdentity): string {
  const line = typeof identity.line_start === "number" && identity.line_start > 0 ? String(identity.line_start) : "";
  return [identity.check_id, normalizeFindingPath(identity.file_path), line, identity.resource_name ?? ""].join("|");
}

export function computeContentHash(identity: HashIdentity): string {
  return sha256Hex(hashKey(identity));
}
