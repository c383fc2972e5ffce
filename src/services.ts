import type { AppConfig } from "./config.js";
import type { SqliteDb } from "./db/db.js";
import { buildAiProvider, type AiRemediationProvider } from "./lib/ai.js";
import { CheckovScanner } from "./lib/checkov.js";
import { LoggingSender, Notifier, type NotificationSender } from "./lib/notifier.js";
import { KeyedLock } from "./lib/projectLock.js";
import type { ScanPipelineDeps } from "./lib/scanPipeline.js";
import type { Scanner } from "./lib/scanner.js";
import { loadSeverityMap, type SeverityMap } from "./lib/severity.js";

export type AppServices = {
  config: AppConfig;
  db: SqliteDb;
  scanner: Scanner;
  ai: AiRemediationProvider;
  notifier: Notifier;
  lock: KeyedLock;
  severity_map: SeverityMap;
};

/** Wires the collaborators from config; tests pass fakes for the outside-facing ones. */
export function buildServices(args: {
  config: AppConfig;
  db: SqliteDb;
  scanner?: Scanner;
  ai?: AiRemediationProvider;
  sender?: NotificationSender;
  severity_map?: SeverityMap;
}): AppServices {
  const { config, db } = args;
  return {
    config,
    db,
    scanner: args.scanner ?? new CheckovScanner({ checkov_path: config.CHECKOV_PATH }),
    ai: args.ai ?? buildAiProvider(config),
    notifier: new Notifier({
      db,
      sender: args.sender ?? new LoggingSender(),
      dashboard_url: config.DASHBOARD_URL,
      delivery_enabled: config.EMAIL_NOTIFICATIONS_ENABLED
    }),
    lock: new KeyedLock(),
    severity_map: args.severity_map ?? loadSeverityMap(config.SEVERITY_MAP_FILE)
  };
}

export function pipelineDeps(services: AppServices): ScanPipelineDeps {
  return {
    db: services.db,
    scanner: services.scanner,
    notifier: services.notifier,
    lock: services.lock,
    severity_map: services.severity_map,
    config: services.config
  };
}
