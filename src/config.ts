import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

const OptionalSecret = z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), z.string().optional());

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const raw = fs.readFileSync(path.resolve(moduleDir, "../package.json"), "utf8");
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BASE_URL: z.string().url().default("http://localhost:8080"),

  SQLITE_PATH: z.string().default("./iac-sentry.sqlite"),
  MIGRATIONS_DIR: z.string().default(path.resolve(moduleDir, "../migrations")),
  UPLOAD_STORAGE_DIR: z.string().default("./uploads"),
  INTAKE_MAX_FILES: z.coerce.number().int().positive().default(5000),
  INTAKE_MAX_TOTAL_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  INTAKE_MAX_SINGLE_FILE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(80 * 1024 * 1024),

  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),

  SCAN_FORCE_ASYNC: BooleanFromEnv.default(false),
  WORKER_POLL_MS: z.coerce.number().int().positive().default(500),
  WORKER_LEASE_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  IAC_SENTRY_ROLE: z.enum(["api", "worker", "all"]).default("all"),

  CHECKOV_PATH: z.string().default("checkov"),
  CHECKOV_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  CUSTOM_POLICIES_DIR: z.string().default("./custom_policies"),
  SEVERITY_MAP_FILE: z.string().default(path.resolve(moduleDir, "../data/severity-map.json")),

  AI_PROVIDER: z.enum(["openai", "gemini"]).default("openai"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_API_KEY: OptionalSecret,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  GEMINI_API_KEY: OptionalSecret,
  GEMINI_MODEL: z.string().default("gemini-1.5-flash"),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),

  EMAIL_NOTIFICATIONS_ENABLED: BooleanFromEnv.default(false),
  DASHBOARD_URL: z.string().url().default("http://localhost:3000"),

  RECONCILE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RECONCILE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(250),

  VERSION: z.string().default(resolveDefaultVersion())
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  return parsed.data;
}
