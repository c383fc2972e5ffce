import type { Router } from "express";
import express from "express";
import { nowMs } from "../db/repo.js";
import { dashboardStats, projectRollup } from "../lib/rollup.js";
import type { AppServices } from "../services.js";
import { DaysQuery, parseInput, projectView, requireProject, route, scanView, toIso } from "./http.js";

export function buildDashboardRouter(services: AppServices): Router {
  const { db } = services;
  const router = express.Router();

  router.get(
    "/dashboard/stats",
    route((req, res) => {
      const { days } = parseInput(DaysQuery, req.query);
      const stats = dashboardStats(db, { days, now_ms: nowMs() });
      return res.status(200).json({
        ...stats,
        recent_scans: stats.recent_scans.map((r) => ({
          ...scanView(r.scan),
          project_name: r.project_name,
          open_by_severity: r.open_by_severity
        }))
      });
    })
  );

  router.get(
    "/projects/:project_id/rollup",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const { days } = parseInput(DaysQuery, req.query);
      const rollup = projectRollup(db, { project_id: project.project_id, days, now_ms: nowMs() });
      return res.status(200).json({
        ...rollup,
        project: projectView(project),
        pass_rate_series: rollup.pass_rate_series.map((p) => ({ ...p, completed_at: toIso(p.completed_at) }))
      });
    })
  );

  return router;
}
