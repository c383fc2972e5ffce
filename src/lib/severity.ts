import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { SEVERITIES, type Severity } from "../db/types.js";

const SeveritySchema = z.enum(SEVERITIES);

const SeverityMapSchema = z.object({
  checks: z.record(SeveritySchema, z.array(z.string())),
  prefixes: z.record(z.string(), SeveritySchema),
  context_rules: z.array(
    z.object({
      category: z.string(),
      check_keywords: z.array(z.string()).optional(),
      check_keywords_all: z.array(z.string()).optional(),
      severity: SeveritySchema
    })
  ),
  category_keywords: z.array(z.object({ severity: SeveritySchema, keywords: z.array(z.string()) })),
  categories: z.record(z.string(), SeveritySchema),
  default: SeveritySchema
});

export type SeverityMap = z.infer<typeof SeverityMapSchema>;

export const SEVERITY_RANK: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3, info: 4 };

export function defaultSeverityMapPath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(moduleDir, "../../data/severity-map.json");
}

export function loadSeverityMap(filePath: string = defaultSeverityMapPath()): SeverityMap {
  const parsed = SeverityMapSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
  if (!parsed.success) {
    throw new Error(`Invalid severity map ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function parseSeverity(value: unknown): Severity | null {
  if (typeof value !== "string") return null;
  const parsed = SeveritySchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}

/**
 * Severity for a check the scanner reported without one. Explicit check lists win,
 * then id prefixes, then category-specific keyword rules, then the category itself.
 */
export function resolveSeverity(map: SeverityMap, check_id: string, category?: string | null): Severity {
  for (const severity of SEVERITIES) {
    if (map.checks[severity]?.includes(check_id)) return severity;
  }
  for (const [prefix, severity] of Object.entries(map.prefixes)) {
    if (check_id.startsWith(prefix)) return severity;
  }
  if (!category) return map.default;

  const cat = category.toUpperCase();
  const id = check_id.toLowerCase();
  for (const rule of map.context_rules) {
    if (rule.category !== cat) continue;
    if (rule.check_keywords?.some((k) => id.includes(k))) return rule.severity;
    if (rule.check_keywords_all && rule.check_keywords_all.every((k) => id.includes(k))) return rule.severity;
  }
  for (const rule of map.category_keywords) {
    if (rule.keywords.some((k) => cat.includes(k))) return rule.severity;
  }
  return map.categories[cat] ?? map.default;
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}
