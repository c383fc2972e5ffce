import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ErrorRequestHandler } from "express";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import { buildAiRouter } from "./api/ai.js";
import { buildDashboardRouter } from "./api/dashboard.js";
import { buildFileVersionRouter } from "./api/fileVersions.js";
import { buildMetaRouter } from "./api/meta.js";
import { buildNotificationRouter } from "./api/notifications.js";
import { buildPolicyRouter } from "./api/policies.js";
import { buildProjectRouter } from "./api/projects.js";
import { buildScanRouter } from "./api/scans.js";
import { buildVulnerabilityRouter } from "./api/vulnerabilities.js";
import { AppError, errorMessage } from "./lib/errors.js";
import type { AppServices } from "./services.js";

function errorBody(error_code: string, message: string) {
  return { error: { error_code, message } };
}

/** Numeric `status` set by body-parser on the errors it raises (400 malformed JSON, 413 too large). */
function bodyParserStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !("status" in err) || !("type" in err)) return null;
  return typeof err.status === "number" ? err.status : null;
}

const handleErrors: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof AppError) {
    if (err.status >= 500) {
      console.error(`Request failed method=${req.method} path=${req.path} error_code=${err.error_code}: ${err.message}`);
    }
    res.status(err.status).json(errorBody(err.error_code, err.message));
    return;
  }
  const status = bodyParserStatus(err);
  if (status === 413) {
    res.status(413).json(errorBody("PAYLOAD_TOO_LARGE", "request body too large"));
    return;
  }
  if (status !== null && status >= 400 && status < 500) {
    res.status(400).json(errorBody("BAD_REQUEST", errorMessage(err)));
    return;
  }
  console.error(`Unhandled error method=${req.method} path=${req.path}:`, err);
  res.status(500).json(errorBody("INTERNAL_ERROR", "internal error"));
};

export function buildApp(services: AppServices) {
  const { config } = services;
  const app = express();

  if (config.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors());
  app.use(
    rateLimit({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      max: config.RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) => res.status(429).json(errorBody("RATE_LIMITED", "too many requests"))
    })
  );
  app.use(express.json({ limit: config.HTTP_JSON_BODY_LIMIT_BYTES }));
  app.use(express.urlencoded({ extended: false, limit: config.HTTP_JSON_BODY_LIMIT_BYTES }));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const openapiYaml = fs.readFileSync(path.join(moduleDir, "../openapi/iac-sentry.openapi.yaml"), "utf8");
  const openapiObj = YAML.parse(openapiYaml);
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildProjectRouter(services));
  app.use("/v1", buildScanRouter(services));
  app.use("/v1", buildVulnerabilityRouter(services));
  app.use("/v1", buildDashboardRouter(services));
  app.use("/v1", buildPolicyRouter(services));
  app.use("/v1", buildNotificationRouter(services));
  app.use("/v1", buildAiRouter(services));
  app.use("/v1", buildFileVersionRouter(services));
  app.use("/v1", buildMetaRouter(services));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.use((_req, res) => {
    res.status(404).json(errorBody("NOT_FOUND", "route not found"));
  });
  app.use(handleErrors);

  return app;
}
