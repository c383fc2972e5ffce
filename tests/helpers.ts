import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import inject from "light-my-request";
import { buildApp } from "../src/app.js";
import { loadConfig, type AppConfig } from "../src/config.js";
import { applyMigrations, openDb, type SqliteDb } from "../src/db/db.js";
import { createProject } from "../src/db/repo.js";
import type { Project } from "../src/db/types.js";
import { LlmRemediationProvider, type ChatCompletion, type ChatMessage } from "../src/lib/ai.js";
import type { NotificationSender, OutgoingMessage } from "../src/lib/notifier.js";
import type { RawFinding, ScanRequest, Scanner, ScannerOutput } from "../src/lib/scanner.js";
import { buildServices, type AppServices } from "../src/services.js";

/** Returns queued outputs in order; an Error in the queue is thrown instead. */
export class FakeScanner implements Scanner {
  readonly name = "fake";
  readonly requests: ScanRequest[] = [];
  private readonly queue: Array<ScannerOutput | Error> = [];
  delayMs = 0;

  enqueue(...outputs: Array<ScannerOutput | Error>): this {
    this.queue.push(...outputs);
    return this;
  }

  async scan(request: ScanRequest): Promise<ScannerOutput> {
    this.requests.push(request);
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    const next = this.queue.shift() ?? scannerOutput([]);
    if (next instanceof Error) throw next;
    return next;
  }
}

export class CapturingSender implements NotificationSender {
  readonly sent: OutgoingMessage[] = [];
  failWith: string | null = null;

  async send(message: OutgoingMessage): Promise<void> {
    if (this.failWith) throw new Error(this.failWith);
    this.sent.push(message);
  }
}

export type FakeChat = {
  complete: ChatCompletion;
  calls: Array<{ messages: ChatMessage[]; temperature: number }>;
  replies: string[];
};

export function fakeChat(...replies: string[]): FakeChat {
  const chat: FakeChat = {
    calls: [],
    replies: [...replies],
    complete: async (messages, opts) => {
      chat.calls.push({ messages, temperature: opts.temperature });
      const reply = chat.replies.shift();
      if (reply === undefined) throw new Error("no reply queued");
      return reply;
    }
  };
  return chat;
}

export function finding(check_id: string, file_path: string, line: number | null, extra: Partial<RawFinding> = {}): RawFinding {
  return {
    check_id,
    check_name: `${check_id} check`,
    file_path,
    file_line_range: line === null ? null : [line, line + 2],
    resource: `aws_s3_bucket.${check_id.toLowerCase()}`,
    ...extra
  };
}

export function scannerOutput(results: RawFinding[], passed = 0): ScannerOutput {
  return {
    summary: { passed, failed: results.length, skipped: 0 },
    results,
    frameworks_scanned: ["terraform"],
    total_files: 1
  };
}

export type Fixture = {
  app: ReturnType<typeof buildApp>;
  services: AppServices;
  db: SqliteDb;
  config: AppConfig;
  tmpDir: string;
  scanner: FakeScanner;
  sender: CapturingSender;
  chat: FakeChat;
};

export function createFixture(opts: { env?: Record<string, string>; replies?: string[]; ai?: boolean } = {}): Fixture {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "iac-sentry-test-"));
  const config = loadConfig({
    SQLITE_PATH: path.join(tmpDir, "test.sqlite"),
    UPLOAD_STORAGE_DIR: path.join(tmpDir, "uploads"),
    CUSTOM_POLICIES_DIR: path.join(tmpDir, "custom_policies"),
    RATE_LIMIT_MAX: "100000",
    RECONCILE_RETRY_DELAY_MS: "0",
    WORKER_POLL_MS: "20",
    EMAIL_NOTIFICATIONS_ENABLED: "true",
    ...opts.env
  });
  fs.mkdirSync(config.UPLOAD_STORAGE_DIR, { recursive: true });
  const db = openDb(config.SQLITE_PATH);
  applyMigrations(db, path.join(process.cwd(), "migrations"));

  const scanner = new FakeScanner();
  const sender = new CapturingSender();
  const chat = fakeChat(...(opts.replies ?? []));
  const ai = new LlmRemediationProvider({ name: "fake", model: "fake-model", complete: opts.ai === false ? null : chat.complete });
  const services = buildServices({ config, db, scanner, ai, sender });
  const app = buildApp(services);
  return { app, services, db, config, tmpDir, scanner, sender, chat };
}

export function disposeFixture(fixture: Fixture): void {
  fixture.db.close();
  fs.rmSync(fixture.tmpDir, { recursive: true, force: true });
}

export function tempDb(): { db: SqliteDb; tmpDir: string } {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "iac-sentry-db-"));
  const db = openDb(path.join(tmpDir, "test.sqlite"));
  applyMigrations(db, path.join(process.cwd(), "migrations"));
  return { db, tmpDir };
}

export function seedProject(db: SqliteDb, name = "infra"): Project {
  return createProject(db, { name, framework: "terraform" });
}

export async function jsonRequest(
  app: ReturnType<typeof buildApp>,
  args: {
    method: "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
    url: string;
    payload?: unknown;
  }
) {
  const headers: Record<string, string> = {};
  let payload: string | undefined;
  if (args.payload !== undefined) {
    headers["content-type"] = "application/json";
    payload = JSON.stringify(args.payload);
  }

  const res = await inject(app, {
    method: args.method,
    url: args.url,
    headers,
    payload
  });
  return {
    statusCode: res.statusCode,
    body: res.payload.length ? res.json() : {}
  };
}
