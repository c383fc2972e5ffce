import type { Router } from "express";
import express from "express";
import { z } from "zod";
import type { SqliteDb } from "../db/db.js";
import { getScanById, listScans } from "../db/repo.js";
import type { Scan, Vulnerability } from "../db/types.js";
import { getVulnerabilityById } from "../db/vulnerabilities.js";
import type { FixContext } from "../lib/ai.js";
import { readUploadFile, uploadDir } from "../lib/artifact.js";
import { AiUnavailable, Conflict, NotFound, ScanFailed } from "../lib/errors.js";
import { applyFileChange } from "../lib/fileHistory.js";
import { queueRescan } from "../lib/scanPipeline.js";
import type { AppServices } from "../services.js";
import { fileVersionView, parseInput, requireProject, route, scanView } from "./http.js";
import { startScan, startedView } from "./scans.js";

const VulnerabilityRequest = z
  .object({
    vulnerability_id: z.string().min(1)
  })
  .strict();

const ApplyFixRequest = z
  .object({
    vulnerability_id: z.string().min(1),
    fixed_code: z.string().min(1).optional()
  })
  .strict();

const EditFileRequest = z
  .object({
    project_id: z.string().min(1),
    file_path: z.string().min(1),
    instruction: z.string().trim().min(1).max(5000),
    upload_id: z.string().min(1).optional()
  })
  .strict();

type VulnerabilitySource = {
  vulnerability: Vulnerability;
  scan: Scan;
  upload_id: string;
  upload_path: string;
};

/** The upload the finding was last seen in; its files are what suggestions read and fixes write. */
function vulnerabilitySource(db: SqliteDb, vulnerability_id: string): VulnerabilitySource {
  const vulnerability = getVulnerabilityById(db, vulnerability_id);
  if (!vulnerability) throw new NotFound("vulnerability not found");
  const scan = vulnerability.scan_id ? getScanById(db, vulnerability.scan_id) : null;
  const upload_id = scan?.metadata.upload_id;
  const upload_path = scan?.metadata.upload_path;
  if (!scan || !upload_id || !upload_path) {
    throw new Conflict("vulnerability has no stored upload", "NO_UPLOAD");
  }
  return { vulnerability, scan, upload_id, upload_path };
}

function fixContext(v: Vulnerability, file_content: string): FixContext {
  return {
    check_id: v.check_id,
    check_name: v.check_name,
    description: v.description,
    file_path: v.file_path,
    line_start: v.line_start,
    file_content
  };
}

export function buildAiRouter(services: AppServices): Router {
  const { ai, config, db } = services;
  const router = express.Router();
  const signal = (): AbortSignal => AbortSignal.timeout(config.AI_TIMEOUT_MS);

  const requireAi = (): void => {
    if (!ai.isAvailable()) {
      throw new AiUnavailable(`AI provider ${ai.name} is not configured`);
    }
  };

  router.get(
    "/ai/status",
    route((_req, res) => {
      return res.status(200).json({ available: ai.isAvailable(), provider: ai.name, model: ai.model });
    })
  );

  router.post(
    "/ai/suggest-fix",
    route(async (req, res) => {
      const input = parseInput(VulnerabilityRequest, req.body);
      requireAi();
      const source = vulnerabilitySource(db, input.vulnerability_id);
      const content = readUploadFile(source.upload_path, source.vulnerability.file_path);
      const suggestion = await ai.suggestFix(fixContext(source.vulnerability, content), signal());
      console.log(`AI fix suggested vulnerability_id=${input.vulnerability_id} model=${suggestion.model_used} risk=${suggestion.risk_level}`);
      return res.status(200).json({ vulnerability_id: input.vulnerability_id, file_path: source.vulnerability.file_path, ...suggestion });
    })
  );

  router.post(
    "/ai/edit-file",
    route(async (req, res) => {
      const input = parseInput(EditFileRequest, req.body);
      const project = requireProject(db, input.project_id);
      requireAi();
      let upload_path: string | undefined;
      if (input.upload_id) {
        upload_path = uploadDir(config.UPLOAD_STORAGE_DIR, project.project_id, input.upload_id);
      } else {
        upload_path = listScans(db, { project_id: project.project_id, limit: 100, offset: 0 }).find((s) => s.metadata.upload_path)
          ?.metadata.upload_path;
      }
      if (!upload_path) throw new NotFound("project has no uploaded files");
      const content = readUploadFile(upload_path, input.file_path);
      const edit = await ai.editFile({ file_path: input.file_path, content, instruction: input.instruction }, signal());
      return res.status(200).json({ file_path: input.file_path, ...edit });
    })
  );

  router.post(
    "/ai/analyze-vulnerability",
    route(async (req, res) => {
      const input = parseInput(VulnerabilityRequest, req.body);
      requireAi();
      const v = getVulnerabilityById(db, input.vulnerability_id);
      if (!v) throw new NotFound("vulnerability not found");
      const result = await ai.analyzeVulnerability(
        { check_id: v.check_id, check_name: v.check_name, resource_type: v.resource_type, description: v.description },
        signal()
      );
      return res.status(200).json({ vulnerability_id: v.vulnerability_id, ...result });
    })
  );

  router.post(
    "/ai/apply-fix",
    route(async (req, res) => {
      const input = parseInput(ApplyFixRequest, req.body);
      const source = vulnerabilitySource(db, input.vulnerability_id);
      const v = source.vulnerability;

      let fixed_code = input.fixed_code;
      if (fixed_code === undefined) {
        requireAi();
        const content = readUploadFile(source.upload_path, v.file_path);
        fixed_code = (await ai.suggestFix(fixContext(v, content), signal())).fixed_code;
      }

      const applied = applyFileChange(db, {
        upload_path: source.upload_path,
        upload_id: source.upload_id,
        project_id: v.project_id,
        file_path: v.file_path,
        content: fixed_code,
        change_summary: `AI apply-fix for ${v.check_id}`,
        edited_by: "ai",
        original_scan_id: source.scan.scan_id
      });
      console.log(
        `AI fix applied vulnerability_id=${v.vulnerability_id} file=${v.file_path} version=${applied.version.version_number} upload_id=${source.upload_id}`
      );

      const rescan = queueRescan(db, source.scan, { trigger: `ai apply-fix for ${v.vulnerability_id}` });
      const rescanView = await startScan(services, rescan, { async: false }).then(startedView, (e: unknown) => {
        const failed = getScanById(db, rescan.scan_id);
        if (!(e instanceof ScanFailed) || !failed) throw e;
        return scanView(failed);
      });

      return res.status(200).json({
        vulnerability_id: v.vulnerability_id,
        file_path: v.file_path,
        original_recorded: applied.original_recorded,
        version: fileVersionView(applied.version, { include_content: false }),
        rescan: rescanView
      });
    })
  );

  return router;
}
