import type { Router } from "express";
import express from "express";
import { z } from "zod";
import { getFileVersion, listFileVersions } from "../db/fileVersions.js";
import { uploadDir } from "../lib/artifact.js";
import { NotFound } from "../lib/errors.js";
import { diffFileVersions, restoreFileVersion } from "../lib/fileHistory.js";
import type { AppServices } from "../services.js";
import { fileVersionView, parseInput, route } from "./http.js";

const VersionListQuery = z.object({
  file_path: z.string().min(1).optional()
});

const DiffQuery = z.object({
  file_path: z.string().min(1),
  from: z.coerce.number().int().min(1),
  to: z.coerce.number().int().min(1)
});

const RestoreRequest = z
  .object({
    version_id: z.string().min(1)
  })
  .strict();

export function buildFileVersionRouter(services: AppServices): Router {
  const { config, db } = services;
  const router = express.Router();

  router.get(
    "/file-versions/:upload_id/diff",
    route((req, res) => {
      const query = parseInput(DiffQuery, req.query);
      const diff = diffFileVersions(db, { upload_id: req.params.upload_id, ...query });
      return res.status(200).json({ upload_id: req.params.upload_id, ...diff });
    })
  );

  router.get(
    "/file-versions/:upload_id",
    route((req, res) => {
      const query = parseInput(VersionListQuery, req.query);
      const versions = listFileVersions(db, req.params.upload_id, query.file_path);
      return res.status(200).json({
        upload_id: req.params.upload_id,
        versions: versions.map((v) => fileVersionView(v, { include_content: false }))
      });
    })
  );

  router.get(
    "/file-version/:version_id",
    route((req, res) => {
      const version = getFileVersion(db, req.params.version_id);
      if (!version) throw new NotFound("file version not found");
      return res.status(200).json(fileVersionView(version, { include_content: true }));
    })
  );

  router.post(
    "/file-versions/restore",
    route((req, res) => {
      const input = parseInput(RestoreRequest, req.body);
      const version = getFileVersion(db, input.version_id);
      if (!version) throw new NotFound("file version not found");
      const upload_path = uploadDir(config.UPLOAD_STORAGE_DIR, version.project_id, version.upload_id);
      const restored = restoreFileVersion(db, { version, upload_path });
      console.log(
        `File restored upload_id=${version.upload_id} file=${version.file_path} from=v${version.version_number} as=v${restored.version.version_number}`
      );
      return res.status(200).json({
        restored_from: version.version_number,
        version: fileVersionView(restored.version, { include_content: false })
      });
    })
  );

  return router;
}
