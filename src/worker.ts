import fs from "node:fs";
import { loadConfig } from "./config.js";
import { applyMigrations, openDb } from "./db/db.js";
import { buildServices } from "./services.js";
import { startWorkerLoop } from "./worker/scan-worker.js";

const config = loadConfig(process.env);
fs.mkdirSync(config.UPLOAD_STORAGE_DIR, { recursive: true });

const db = openDb(config.SQLITE_PATH);
applyMigrations(db, config.MIGRATIONS_DIR);
startWorkerLoop({ services: buildServices({ config, db }) });

console.log("Scan worker started");
