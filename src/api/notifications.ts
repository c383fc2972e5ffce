import type { Router } from "express";
import express from "express";
import { z } from "zod";
import {
  clearNotificationHistory,
  getOrCreateNotificationSettings,
  listNotificationHistory,
  updateNotificationSettings
} from "../db/notifications.js";
import { SUMMARY_SEND_WHEN, WEEKDAYS } from "../db/types.js";
import { isClock } from "../lib/quietHours.js";
import type { AppServices } from "../services.js";
import { Pagination, notificationSettingsView, notificationView, parseInput, requireProject, route } from "./http.js";

const Recipients = z.array(z.string().trim().email()).max(50);
const Clock = z.string().refine(isClock, { message: "expected HH:MM" });
const Threshold = z.number().int().min(0).max(10_000);

const SettingsUpdateRequest = z
  .object({
    critical_recipients: Recipients.optional(),
    summary_recipients: Recipients.optional(),
    weekly_recipients: Recipients.optional(),
    critical_immediate_enabled: z.boolean().optional(),
    scan_summary_enabled: z.boolean().optional(),
    weekly_summary_enabled: z.boolean().optional(),
    scan_failed_enabled: z.boolean().optional(),
    critical_threshold: Threshold.optional(),
    high_threshold: Threshold.optional(),
    fixed_threshold: Threshold.optional(),
    summary_send_when: z.enum(SUMMARY_SEND_WHEN).optional(),
    summary_include_fixed: z.boolean().optional(),
    summary_include_new: z.boolean().optional(),
    summary_include_still_open: z.boolean().optional(),
    weekly_day: z.enum(WEEKDAYS).optional(),
    weekly_time: Clock.optional(),
    weekly_include_trends: z.boolean().optional(),
    digest_mode: z.boolean().optional(),
    quiet_hours_enabled: z.boolean().optional(),
    quiet_hours_start: Clock.optional(),
    quiet_hours_end: Clock.optional()
  })
  .strict();

const HistoryQuery = Pagination.extend({
  notification_type: z.enum(["critical", "summary", "scan_failed", "weekly", "test"]).optional()
});

export function buildNotificationRouter(services: AppServices): Router {
  const { db, notifier } = services;
  const router = express.Router();

  router.get(
    "/projects/:project_id/notifications/settings",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      return res.status(200).json(notificationSettingsView(getOrCreateNotificationSettings(db, project.project_id)));
    })
  );

  router.put(
    "/projects/:project_id/notifications/settings",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const patch = parseInput(SettingsUpdateRequest, req.body);
      const settings = updateNotificationSettings(db, project.project_id, patch);
      console.log(`Notification settings updated project_id=${project.project_id} fields=${Object.keys(patch).join(",")}`);
      return res.status(200).json(notificationSettingsView(settings));
    })
  );

  router.get(
    "/projects/:project_id/notifications/history",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const query = parseInput(HistoryQuery, req.query);
      const entries = listNotificationHistory(db, { project_id: project.project_id, ...query });
      return res.status(200).json({ notifications: entries.map(notificationView), limit: query.limit, offset: query.offset });
    })
  );

  router.delete(
    "/projects/:project_id/notifications/history",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const deleted = clearNotificationHistory(db, project.project_id);
      return res.status(200).json({ deleted });
    })
  );

  router.post(
    "/projects/:project_id/notifications/test",
    route(async (req, res) => {
      const project = requireProject(db, req.params.project_id);
      const entry = await notifier.sendTest({ project });
      return res.status(200).json({ notification: entry ? notificationView(entry) : null });
    })
  );

  return router;
}
