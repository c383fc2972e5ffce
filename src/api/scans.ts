import type { Router } from "express";
import express from "express";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createScan, deleteScan, getScanById, listScans } from "../db/repo.js";
import { countOpenBySeverityForScan } from "../db/rollups.js";
import type { Scan } from "../db/types.js";
import { normalizeInlineFiles, normalizeZip, persistUpload, type IntakeLimits, type NormalizedUpload } from "../lib/artifact.js";
import { Conflict, NotFound, ScanFailed } from "../lib/errors.js";
import type { ReconcileCounts } from "../lib/reconcile.js";
import { toSeverityCounts } from "../lib/rollup.js";
import { executeScan, queueRescan } from "../lib/scanPipeline.js";
import { pipelineDeps, type AppServices } from "../services.js";
import { Pagination, parseInput, requireProject, route, scanView } from "./http.js";

const ASYNC_BYTES_THRESHOLD = 2 * 1024 * 1024;
const ASYNC_FILES_THRESHOLD = 500;

const InlineFile = z
  .object({
    path: z.string().min(1),
    content: z.string()
  })
  .strict();

const ScanCreateRequest = z
  .object({
    files: z.array(InlineFile).min(1).optional(),
    zip_b64: z.string().min(1).optional(),
    skip_checks: z.array(z.string().min(1)).default([]),
    scan_type: z.enum(["upload", "manual"]).default("upload"),
    async: z.boolean().optional()
  })
  .strict()
  .superRefine((v, ctx) => {
    if ((v.files ? 1 : 0) + (v.zip_b64 ? 1 : 0) !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exactly one of files or zip_b64 must be provided"
      });
    }
  });

const RescanRequest = z
  .object({
    async: z.boolean().optional()
  })
  .strict();

const ScanListQuery = Pagination.extend({
  project_id: z.string().optional()
});

export type StartedScan = {
  http_status: 201 | 202;
  scan: Scan;
  counts: ReconcileCounts | null;
};

/**
 * Runs the scan in the request when it is small and async was not asked for; otherwise
 * leaves it pending for the worker. A scan that fails in the request surfaces as ScanFailed.
 */
export async function startScan(services: AppServices, scan: Scan, opts: { async: boolean }): Promise<StartedScan> {
  if (opts.async || services.config.SCAN_FORCE_ASYNC) {
    console.log(`Scan queued scan_id=${scan.scan_id} project_id=${scan.project_id} type=${scan.scan_type}`);
    return { http_status: 202, scan, counts: null };
  }
  const out = await executeScan(pipelineDeps(services), scan.scan_id);
  if (out.scan.status === "failed") {
    throw new ScanFailed(`scan ${scan.scan_id} failed: ${out.scan.error_message ?? "unknown error"}`);
  }
  return { http_status: 201, scan: out.scan, counts: out.counts };
}

export function startedView(started: StartedScan) {
  return {
    ...scanView(started.scan),
    ...(started.counts
      ? {
          reconciliation: {
            new: started.counts.new,
            still_open: started.counts.still_open,
            fixed: started.counts.fixed,
            regressions: started.counts.regressions,
            ignored: started.counts.ignored,
            new_by_severity: started.counts.new_by_severity
          }
        }
      : {})
  };
}

export function buildScanRouter(services: AppServices): Router {
  const { config, db } = services;
  const router = express.Router();
  const limits: IntakeLimits = {
    max_files: config.INTAKE_MAX_FILES,
    max_total_bytes: config.INTAKE_MAX_TOTAL_BYTES,
    max_single_file_bytes: config.INTAKE_MAX_SINGLE_FILE_BYTES
  };

  router.post(
    "/projects/:project_id/scans",
    route(async (req, res) => {
      const project = requireProject(db, req.params.project_id);
      const input = parseInput(ScanCreateRequest, req.body);

      const upload: NormalizedUpload = input.files ? normalizeInlineFiles(input.files, limits) : normalizeZip({ zip_b64: input.zip_b64 ?? "" }, limits);
      const upload_id = uuidv4();
      const upload_path = persistUpload(config.UPLOAD_STORAGE_DIR, project.project_id, upload_id, upload);
      console.log(`Upload stored project_id=${project.project_id} upload_id=${upload_id} files=${upload.files.length} bytes=${upload.total_bytes}`);

      const scan = createScan(db, {
        project_id: project.project_id,
        scan_type: input.scan_type,
        metadata: { upload_id, upload_path, skip_checks: input.skip_checks, trigger: input.scan_type }
      });
      const large = upload.total_bytes > ASYNC_BYTES_THRESHOLD || upload.files.length > ASYNC_FILES_THRESHOLD;
      const started = await startScan(services, scan, { async: Boolean(input.async) || large });
      return res.status(started.http_status).json(startedView(started));
    })
  );

  router.get(
    "/scans",
    route((req, res) => {
      const query = parseInput(ScanListQuery, req.query);
      if (query.project_id) requireProject(db, query.project_id);
      const scans = listScans(db, query);
      return res.status(200).json({ scans: scans.map(scanView), limit: query.limit, offset: query.offset });
    })
  );

  router.get(
    "/scans/:scan_id",
    route((req, res) => {
      const scan = getScanById(db, req.params.scan_id);
      if (!scan) throw new NotFound("scan not found");
      return res.status(200).json({
        ...scanView(scan),
        open_by_severity: toSeverityCounts(countOpenBySeverityForScan(db, scan.scan_id))
      });
    })
  );

  router.delete(
    "/scans/:scan_id",
    route((req, res) => {
      const scan = getScanById(db, req.params.scan_id);
      if (!scan) throw new NotFound("scan not found");
      if (scan.status === "running") {
        throw new Conflict("scan is running", "SCAN_RUNNING");
      }
      deleteScan(db, scan.scan_id);
      console.log(`Scan deleted scan_id=${scan.scan_id} project_id=${scan.project_id}`);
      return res.status(204).end();
    })
  );

  router.post(
    "/scans/:scan_id/rescan",
    route(async (req, res) => {
      const source = getScanById(db, req.params.scan_id);
      if (!source) throw new NotFound("scan not found");
      const input = parseInput(RescanRequest, req.body ?? {});
      if (!source.metadata.upload_path) {
        throw new Conflict("scan has no upload to rescan", "NO_UPLOAD");
      }
      const scan = queueRescan(db, source, { trigger: `rescan of ${source.scan_id}` });
      const started = await startScan(services, scan, { async: Boolean(input.async) });
      return res.status(started.http_status).json(startedView(started));
    })
  );

  return router;
}
