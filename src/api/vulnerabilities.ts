import type { Router } from "express";
import express from "express";
import { z } from "zod";
import { SEVERITIES, VULNERABILITY_STATUSES } from "../db/types.js";
import { getVulnerabilityById, listVulnerabilities } from "../db/vulnerabilities.js";
import { compareScans } from "../lib/compare.js";
import { NotFound } from "../lib/errors.js";
import { severityHistogram, statusBreakdown } from "../lib/rollup.js";
import { bulkChangeStatus, changeVulnerabilityStatus } from "../lib/status.js";
import type { AppServices } from "../services.js";
import { Pagination, parseInput, requireProject, route, scanView, vulnerabilityView } from "./http.js";

const VulnerabilityListQuery = Pagination.extend({
  project_id: z.string().optional(),
  scan_id: z.string().optional(),
  severity: z.enum(SEVERITIES).optional(),
  status: z.enum(VULNERABILITY_STATUSES).optional()
});

const StatusChangeRequest = z
  .object({
    status: z.enum(VULNERABILITY_STATUSES)
  })
  .strict();

const BulkStatusRequest = z
  .object({
    vulnerability_ids: z.array(z.string().min(1)).min(1).max(1000),
    status: z.enum(VULNERABILITY_STATUSES)
  })
  .strict();

const SummaryQuery = z.object({
  project_id: z.string().optional()
});

const CompareQuery = z
  .object({
    base_scan_id: z.string().optional(),
    target_scan_id: z.string().optional()
  })
  .refine((q) => Boolean(q.base_scan_id) === Boolean(q.target_scan_id), {
    message: "base_scan_id and target_scan_id must be given together"
  });

export function buildVulnerabilityRouter(services: AppServices): Router {
  const { db } = services;
  const router = express.Router();

  router.get(
    "/vulnerabilities",
    route((req, res) => {
      const query = parseInput(VulnerabilityListQuery, req.query);
      const rows = listVulnerabilities(db, query);
      return res.status(200).json({ vulnerabilities: rows.map(vulnerabilityView), limit: query.limit, offset: query.offset });
    })
  );

  router.get(
    "/vulnerabilities/summary",
    route((req, res) => {
      const query = parseInput(SummaryQuery, req.query);
      if (query.project_id) requireProject(db, query.project_id);
      const bySeverity = severityHistogram(db, query.project_id);
      const byStatus = statusBreakdown(db, query.project_id);
      return res.status(200).json({
        project_id: query.project_id ?? null,
        total_open: byStatus.open + byStatus.in_progress,
        by_severity: bySeverity,
        by_status: byStatus
      });
    })
  );

  router.post(
    "/vulnerabilities/bulk-status",
    route((req, res) => {
      const input = parseInput(BulkStatusRequest, req.body);
      const result = bulkChangeStatus(db, input.vulnerability_ids, input.status);
      console.log(`Bulk status change to=${input.status} updated=${result.updated.length} failed=${result.failed.length}`);
      return res.status(200).json({
        updated: result.updated.map(vulnerabilityView),
        failed: result.failed
      });
    })
  );

  router.get(
    "/vulnerabilities/:vulnerability_id",
    route((req, res) => {
      const row = getVulnerabilityById(db, req.params.vulnerability_id);
      if (!row) throw new NotFound("vulnerability not found");
      return res.status(200).json(vulnerabilityView(row));
    })
  );

  router.patch(
    "/vulnerabilities/:vulnerability_id/status",
    route((req, res) => {
      const input = parseInput(StatusChangeRequest, req.body);
      const updated = changeVulnerabilityStatus(db, req.params.vulnerability_id, input.status);
      return res.status(200).json(vulnerabilityView(updated));
    })
  );

  router.get(
    "/projects/:project_id/compare",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const query = parseInput(CompareQuery, req.query);
      const comparison = compareScans(db, { project_id: project.project_id, ...query });
      return res.status(200).json({
        base_scan: scanView(comparison.base_scan),
        target_scan: scanView(comparison.target_scan),
        new: comparison.new.map(vulnerabilityView),
        existing: comparison.existing.map(vulnerabilityView),
        fixed: comparison.fixed.map(vulnerabilityView),
        summary: comparison.summary
      });
    })
  );

  return router;
}
