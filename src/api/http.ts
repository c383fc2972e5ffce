import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { SqliteDb } from "../db/db.js";
import { getProjectById } from "../db/repo.js";
import type {
  FileVersion,
  NotificationHistoryEntry,
  NotificationSettings,
  Policy,
  PolicyConfig,
  Project,
  Scan,
  Vulnerability
} from "../db/types.js";
import { BadRequest, NotFound } from "../lib/errors.js";
import { passRate } from "../lib/rollup.js";

/** Express 4 does not forward rejected promises; this hands them to the error middleware. */
export function route(fn: (req: Request, res: Response) => unknown): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequest(parsed.error.message);
  }
  return parsed.data;
}

export const Pagination = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0)
});

export const DaysQuery = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30)
});

export function requireProject(db: SqliteDb, project_id: string): Project {
  const project = getProjectById(db, project_id);
  if (!project) throw new NotFound("project not found");
  return project;
}

export function toIso(ms: number): string;
export function toIso(ms: number | null): string | null;
export function toIso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

export function projectView(p: Project) {
  return {
    ...p,
    created_at: toIso(p.created_at),
    updated_at: toIso(p.updated_at)
  };
}

export function scanView(s: Scan) {
  const { lease_owner: _owner, lease_expires_at: _expires, ...rest } = s;
  return {
    ...rest,
    pass_rate: passRate(s),
    created_at: toIso(s.created_at),
    updated_at: toIso(s.updated_at),
    started_at: toIso(s.started_at),
    completed_at: toIso(s.completed_at)
  };
}

export function vulnerabilityView(v: Vulnerability) {
  return {
    ...v,
    detected_at: toIso(v.detected_at),
    last_seen_at: toIso(v.last_seen_at),
    resolved_at: toIso(v.resolved_at)
  };
}

export function policyView(p: Policy) {
  return { ...p, created_at: toIso(p.created_at), updated_at: toIso(p.updated_at) };
}

export function policyConfigView(c: PolicyConfig) {
  return { ...c, created_at: toIso(c.created_at), updated_at: toIso(c.updated_at) };
}

export function notificationSettingsView(s: NotificationSettings) {
  return { ...s, created_at: toIso(s.created_at), updated_at: toIso(s.updated_at) };
}

export function notificationView(n: NotificationHistoryEntry) {
  return { ...n, sent_at: toIso(n.sent_at) };
}

export function fileVersionView(v: FileVersion, opts: { include_content: boolean }) {
  const { content, ...rest } = v;
  return {
    ...rest,
    ...(opts.include_content ? { content } : {}),
    created_at: toIso(v.created_at)
  };
}
