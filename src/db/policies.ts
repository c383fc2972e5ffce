import { v4 as uuidv4 } from "uuid";
import type { SqliteDb } from "./db.js";
import { nowMs } from "./repo.js";
import type { Policy, PolicyConfig, Severity } from "./types.js";

type PolicyRow = Omit<Policy, "built_in"> & { built_in: number };
type PolicyConfigRow = Omit<PolicyConfig, "enabled"> & { enabled: number };

export type PolicyFilter = {
  platform?: string;
  severity?: Severity;
  built_in?: boolean;
  search?: string;
  limit: number;
  offset: number;
};

export function listPolicies(db: SqliteDb, filter: PolicyFilter): Policy[] {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filter.platform) {
    where.push("platform=?");
    params.push(filter.platform);
  }
  if (filter.severity) {
    where.push("severity=?");
    params.push(filter.severity);
  }
  if (filter.built_in !== undefined) {
    where.push("built_in=?");
    params.push(filter.built_in ? 1 : 0);
  }
  if (filter.search) {
    where.push("(check_id LIKE ? OR name LIKE ?)");
    params.push(`%${filter.search}%`, `%${filter.search}%`);
  }
  const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  return db
    .prepare<unknown[], PolicyRow>(`SELECT * FROM policies ${clause} ORDER BY check_id ASC LIMIT ? OFFSET ?`)
    .all(...params, filter.limit, filter.offset)
    .map(hydratePolicy);
}

export function getPolicy(db: SqliteDb, check_id: string): Policy | null {
  const row = db.prepare<unknown[], PolicyRow>(`SELECT * FROM policies WHERE check_id=?`).get(check_id);
  return row ? hydratePolicy(row) : null;
}

export type UpsertPolicyInput = Omit<Policy, "created_at" | "updated_at">;

export function upsertPolicy(db: SqliteDb, input: UpsertPolicyInput, now_ms: number = nowMs()): Policy {
  const existing = getPolicy(db, input.check_id);
  const policy: Policy = {
    ...input,
    created_at: existing?.created_at ?? now_ms,
    updated_at: now_ms
  };
  db.prepare(
    `INSERT INTO policies (check_id,name,platform,severity,category,description,guideline_url,built_in,file_path,code,created_at,updated_at)
     VALUES (@check_id,@name,@platform,@severity,@category,@description,@guideline_url,@built_in,@file_path,@code,@created_at,@updated_at)
     ON CONFLICT(check_id) DO UPDATE SET
       name=excluded.name,
       platform=excluded.platform,
       severity=excluded.severity,
       category=excluded.category,
       description=excluded.description,
       guideline_url=excluded.guideline_url,
       built_in=excluded.built_in,
       file_path=excluded.file_path,
       code=excluded.code,
       updated_at=excluded.updated_at`
  ).run({ ...policy, built_in: policy.built_in ? 1 : 0 });
  return policy;
}

export function deletePolicy(db: SqliteDb, check_id: string): boolean {
  return db.prepare(`DELETE FROM policies WHERE check_id=?`).run(check_id).changes > 0;
}

// Policy configs

export function listPolicyConfigs(db: SqliteDb, args: { project_id?: string | null }): PolicyConfig[] {
  if (args.project_id === undefined) {
    return db
      .prepare<unknown[], PolicyConfigRow>(`SELECT * FROM policy_configs ORDER BY check_id ASC, created_at ASC`)
      .all()
      .map(hydrateConfig);
  }
  if (args.project_id === null) {
    return db
      .prepare<unknown[], PolicyConfigRow>(`SELECT * FROM policy_configs WHERE project_id IS NULL ORDER BY check_id ASC`)
      .all()
      .map(hydrateConfig);
  }
  return db
    .prepare<unknown[], PolicyConfigRow>(`SELECT * FROM policy_configs WHERE project_id=? ORDER BY check_id ASC`)
    .all(args.project_id)
    .map(hydrateConfig);
}

export function getPolicyConfig(db: SqliteDb, config_id: string): PolicyConfig | null {
  const row = db.prepare<unknown[], PolicyConfigRow>(`SELECT * FROM policy_configs WHERE config_id=?`).get(config_id);
  return row ? hydrateConfig(row) : null;
}

export function findPolicyConfig(db: SqliteDb, project_id: string | null, check_id: string): PolicyConfig | null {
  const row = db
    .prepare<unknown[], PolicyConfigRow>(`SELECT * FROM policy_configs WHERE IFNULL(project_id,'')=? AND check_id=?`)
    .get(project_id ?? "", check_id);
  return row ? hydrateConfig(row) : null;
}

export type PolicyConfigInput = {
  project_id: string | null;
  check_id: string;
  enabled: boolean;
  severity_override: Severity | null;
  custom_message: string | null;
};

/** One config per (project or global, check); a second write for the same pair updates it. */
export function upsertPolicyConfig(db: SqliteDb, input: PolicyConfigInput, now_ms: number = nowMs()): PolicyConfig {
  const existing = findPolicyConfig(db, input.project_id, input.check_id);
  if (existing) {
    return updatePolicyConfig(db, existing.config_id, input, now_ms) ?? existing;
  }
  const config: PolicyConfig = {
    config_id: uuidv4(),
    ...input,
    created_at: now_ms,
    updated_at: now_ms
  };
  db.prepare(
    `INSERT INTO policy_configs (config_id,project_id,check_id,enabled,severity_override,custom_message,created_at,updated_at)
     VALUES (@config_id,@project_id,@check_id,@enabled,@severity_override,@custom_message,@created_at,@updated_at)`
  ).run({ ...config, enabled: config.enabled ? 1 : 0 });
  return config;
}

export function updatePolicyConfig(
  db: SqliteDb,
  config_id: string,
  patch: Partial<Pick<PolicyConfig, "enabled" | "severity_override" | "custom_message">>,
  now_ms: number = nowMs()
): PolicyConfig | null {
  const current = getPolicyConfig(db, config_id);
  if (!current) return null;
  const next: PolicyConfig = {
    ...current,
    enabled: patch.enabled ?? current.enabled,
    severity_override: patch.severity_override !== undefined ? patch.severity_override : current.severity_override,
    custom_message: patch.custom_message !== undefined ? patch.custom_message : current.custom_message,
    updated_at: now_ms
  };
  db.prepare(
    `UPDATE policy_configs SET enabled=?, severity_override=?, custom_message=?, updated_at=? WHERE config_id=?`
  ).run(next.enabled ? 1 : 0, next.severity_override, next.custom_message, now_ms, config_id);
  return next;
}

export function deletePolicyConfig(db: SqliteDb, config_id: string): boolean {
  return db.prepare(`DELETE FROM policy_configs WHERE config_id=?`).run(config_id).changes > 0;
}

export function bulkTogglePolicies(
  db: SqliteDb,
  args: { project_id: string | null; check_ids: string[]; enabled: boolean },
  now_ms: number = nowMs()
): PolicyConfig[] {
  const tx = db.transaction(() =>
    args.check_ids.map((check_id) => {
      const existing = findPolicyConfig(db, args.project_id, check_id);
      if (existing) {
        return updatePolicyConfig(db, existing.config_id, { enabled: args.enabled }, now_ms) ?? existing;
      }
      return upsertPolicyConfig(
        db,
        { project_id: args.project_id, check_id, enabled: args.enabled, severity_override: null, custom_message: null },
        now_ms
      );
    })
  );
  return tx();
}

/**
 * Configs that apply to a project's scans, keyed by check id.
 * A project-specific config replaces the global one for the same check.
 */
export function effectivePolicyConfigs(db: SqliteDb, project_id: string): Map<string, PolicyConfig> {
  const out = new Map<string, PolicyConfig>();
  for (const cfg of listPolicyConfigs(db, { project_id: null })) {
    out.set(cfg.check_id, cfg);
  }
  for (const cfg of listPolicyConfigs(db, { project_id })) {
    out.set(cfg.check_id, cfg);
  }
  return out;
}

function hydratePolicy(row: PolicyRow): Policy {
  return { ...row, built_in: row.built_in === 1 };
}

function hydrateConfig(row: PolicyConfigRow): PolicyConfig {
  return { ...row, enabled: row.enabled === 1 };
}
