import type { FindingDraft, PolicyConfig } from "../db/types.js";
import { computeContentHash, normalizeFindingPath } from "./contentHash.js";
import { MalformedFinding, errorMessage } from "./errors.js";
import { redactText } from "./redact.js";
import type { RawFinding } from "./scanner.js";
import { parseSeverity, resolveSeverity, type SeverityMap } from "./severity.js";

const MAX_CODE_LINES = 10;
const MAX_DETAILS = 3;

export type NormalizeResult = {
  drafts: FindingDraft[];
  dropped: number;
  disabled: number;
  duplicates: number;
};

export type NormalizeOptions = {
  /** Effective configs by check id, project rows already layered over global ones. */
  configs: Map<string, PolicyConfig>;
  severity_map: SeverityMap;
  scan_id?: string;
};

export function requireIdentity(raw: RawFinding): { check_id: string; file_path: string } {
  const check_id = raw.check_id?.trim() ?? "";
  if (!check_id) throw new MalformedFinding("finding has no check_id");
  const file_path = normalizeFindingPath(raw.file_path ?? "");
  if (!file_path) throw new MalformedFinding(`finding ${check_id} has no file_path`);
  return { check_id, file_path };
}

export function normalizeFindings(raw: RawFinding[], opts: NormalizeOptions): NormalizeResult {
  const byHash = new Map<string, FindingDraft>();
  let dropped = 0;
  let disabled = 0;
  let duplicates = 0;

  raw.forEach((finding, index) => {
    let identity: { check_id: string; file_path: string };
    try {
      identity = requireIdentity(finding);
    } catch (e) {
      dropped += 1;
      console.warn(`Dropped malformed finding scan_id=${opts.scan_id ?? "-"} index=${index}: ${errorMessage(e)}`);
      return;
    }

    const config = opts.configs.get(identity.check_id);
    if (config && !config.enabled) {
      disabled += 1;
      return;
    }

    const draft = buildDraft(finding, identity, config ?? null, opts.severity_map);
    if (byHash.has(draft.content_hash)) {
      duplicates += 1;
      return;
    }
    byHash.set(draft.content_hash, draft);
  });

  return { drafts: [...byHash.values()], dropped, disabled, duplicates };
}

function buildDraft(
  raw: RawFinding,
  identity: { check_id: string; file_path: string },
  config: PolicyConfig | null,
  severityMap: SeverityMap
): FindingDraft {
  const [line_start, line_end] = lineRange(raw.file_line_range);
  const resource_name = raw.resource?.trim() || null;
  const check_name = raw.check_name?.trim() || "Unknown Check";
  const severity =
    config?.severity_override ??
    parseSeverity(raw.severity) ??
    resolveSeverity(severityMap, identity.check_id, categoryFromCheckClass(raw.check_class));

  return {
    check_id: identity.check_id,
    check_name,
    severity,
    resource_type: raw.resource_type?.trim() || resourceTypeOf(resource_name),
    resource_name,
    file_path: identity.file_path,
    line_start,
    line_end,
    description: redactText(describe(config?.custom_message || check_name, raw)),
    remediation: raw.guideline ? `See: ${raw.guideline}` : "",
    guideline_url: raw.guideline || null,
    content_hash: computeContentHash({
      check_id: identity.check_id,
      file_path: identity.file_path,
      line_start,
      resource_name
    })
  };
}

function lineRange(range: number[] | null | undefined): [number | null, number | null] {
  const start = range?.[0];
  if (typeof start !== "number" || !Number.isInteger(start) || start <= 0) return [null, null];
  const end = range?.[1];
  return [start, typeof end === "number" && Number.isInteger(end) && end >= start ? end : start];
}

function resourceTypeOf(resource: string | null): string | null {
  if (!resource) return null;
  const dot = resource.indexOf(".");
  return dot > 0 ? resource.slice(0, dot) : null;
}

function categoryFromCheckClass(checkClass: string | null | undefined): string | null {
  if (!checkClass || !checkClass.toLowerCase().includes("categories")) return null;
  const parts = checkClass.split(".");
  return parts[parts.length - 1] || null;
}

function describe(head: string, raw: RawFinding): string {
  const lines = [head];
  const code = raw.code_block ?? [];
  if (code.length > 0) {
    lines.push("", "Code:");
    for (const [lineNo, text] of code.slice(0, MAX_CODE_LINES)) {
      lines.push(`${lineNo}: ${text.trimEnd()}`);
    }
  }
  const details = raw.details ?? [];
  if (details.length > 0) {
    lines.push("", "Details:");
    for (const detail of details.slice(0, MAX_DETAILS)) {
      lines.push(`- ${detail}`);
    }
  }
  return lines.join("\n");
}
