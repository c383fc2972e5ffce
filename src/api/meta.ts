import type { Router } from "express";
import express from "express";
import type { AppServices } from "../services.js";

export function buildMetaRouter(services: AppServices): Router {
  const { ai, config } = services;
  const router = express.Router();

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION,
      scanner: config.CHECKOV_PATH,
      ai_provider: ai.isAvailable() ? ai.name : null
    });
  });

  return router;
}
