import type { Router } from "express";
import express from "express";
import { z } from "zod";
import { createProject, deleteProject, getProjectByName, listProjects, updateProject } from "../db/repo.js";
import { removeProjectUploads } from "../lib/artifact.js";
import { Conflict, NotFound } from "../lib/errors.js";
import { severityHistogram } from "../lib/rollup.js";
import type { AppServices } from "../services.js";
import { Pagination, parseInput, projectView, requireProject, route } from "./http.js";

const FRAMEWORKS = ["terraform", "cloudformation", "kubernetes", "dockerfile", "helm", "arm", "bicep", "serverless", "mixed"] as const;

const ProjectCreateRequest = z
  .object({
    name: z.string().trim().min(1).max(200),
    framework: z.enum(FRAMEWORKS).default("terraform"),
    description: z.string().max(5000).nullable().optional(),
    repository_url: z.string().url().nullable().optional()
  })
  .strict();

const ProjectUpdateRequest = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    framework: z.enum(FRAMEWORKS).optional(),
    description: z.string().max(5000).nullable().optional(),
    repository_url: z.string().url().nullable().optional(),
    status: z.enum(["active", "archived"]).optional()
  })
  .strict();

export function buildProjectRouter(services: AppServices): Router {
  const { config, db } = services;
  const router = express.Router();

  router.get(
    "/projects",
    route((req, res) => {
      const page = parseInput(Pagination, req.query);
      return res.status(200).json({ projects: listProjects(db, page).map(projectView), ...page });
    })
  );

  router.post(
    "/projects",
    route((req, res) => {
      const input = parseInput(ProjectCreateRequest, req.body);
      if (getProjectByName(db, input.name)) {
        throw new Conflict(`project ${input.name} already exists`);
      }
      const project = createProject(db, input);
      console.log(`Project created project_id=${project.project_id} name="${project.name}"`);
      return res.status(201).json(projectView(project));
    })
  );

  router.get(
    "/projects/:project_id",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      return res.status(200).json({
        ...projectView(project),
        open_by_severity: severityHistogram(db, project.project_id)
      });
    })
  );

  router.put(
    "/projects/:project_id",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      const patch = parseInput(ProjectUpdateRequest, req.body);
      if (patch.name && patch.name !== project.name && getProjectByName(db, patch.name)) {
        throw new Conflict(`project ${patch.name} already exists`);
      }
      const updated = updateProject(db, project.project_id, patch);
      if (!updated) throw new NotFound("project not found");
      return res.status(200).json(projectView(updated));
    })
  );

  router.delete(
    "/projects/:project_id",
    route((req, res) => {
      const project = requireProject(db, req.params.project_id);
      deleteProject(db, project.project_id);
      removeProjectUploads(config.UPLOAD_STORAGE_DIR, project.project_id);
      console.log(`Project deleted project_id=${project.project_id}`);
      return res.status(204).end();
    })
  );

  return router;
}
