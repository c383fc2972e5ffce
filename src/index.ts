import fs from "node:fs";
import { loadConfig } from "./config.js";
import { applyMigrations, openDb } from "./db/db.js";
import { buildApp } from "./app.js";
import { buildServices } from "./services.js";
import { startWorkerLoop } from "./worker/scan-worker.js";

const config = loadConfig(process.env);
fs.mkdirSync(config.UPLOAD_STORAGE_DIR, { recursive: true });

const db = openDb(config.SQLITE_PATH);
const applied = applyMigrations(db, config.MIGRATIONS_DIR);
console.log(`Migrations applied count=${applied.length}`);

const services = buildServices({ config, db });

if (config.IAC_SENTRY_ROLE === "worker" || config.IAC_SENTRY_ROLE === "all") {
  startWorkerLoop({ services });
  console.log("Scan worker loop started");
}

if (config.IAC_SENTRY_ROLE === "api" || config.IAC_SENTRY_ROLE === "all") {
  const app = buildApp(services);
  app.listen(config.PORT, () => {
    console.log(`IaC Sentry API listening on ${config.BASE_URL}`);
  });
}
