import { afterEach, describe, expect, test } from "vitest";
import { claimNextScan, createScan, getScanById, releaseExpiredLeases } from "../src/db/repo.js";
import { startWorkerLoop } from "../src/worker/scan-worker.js";
import { createFixture, disposeFixture, finding, jsonRequest, scannerOutput, seedProject, type Fixture } from "./helpers.js";

const fixtures: Fixture[] = [];

afterEach(() => {
  while (fixtures.length > 0) {
    const fixture = fixtures.pop();
    if (fixture) disposeFixture(fixture);
  }
});

function fixtureWith(env: Record<string, string> = {}): Fixture {
  const fixture = createFixture({ env });
  fixtures.push(fixture);
  return fixture;
}

describe("queue and worker loop", () => {
  test("returns 202 when SCAN_FORCE_ASYNC=true and the worker completes queued scans", async () => {
    const fixture = fixtureWith({ SCAN_FORCE_ASYNC: "true" });
    fixture.scanner.enqueue(scannerOutput([finding("CKV_AWS_1", "main.tf", 1)], 4));
    const worker = startWorkerLoop({ services: fixture.services, worker_id: "worker-test" });

    try {
      const project = await jsonRequest(fixture.app, { method: "POST", url: "/v1/projects", payload: { name: "infra" } });
      const created = await jsonRequest(fixture.app, {
        method: "POST",
        url: `/v1/projects/${project.body.project_id}/scans`,
        payload: { files: [{ path: "main.tf", content: 'resource "aws_s3_bucket" "a" {}' }] }
      });
      expect(created.statusCode).toBe(202);
      expect(created.body.status).toBe("pending");

      const completed = await waitForScan(fixture, created.body.scan_id, 2000);
      expect(completed.body).toMatchObject({ status: "completed", total_checks: 5, passed_checks: 4, failed_checks: 1, pass_rate: 80, attempt_count: 1 });
      expect(completed.body.open_by_severity.critical).toBe(1);
    } finally {
      await worker.stop();
    }
  });

  test("the worker keeps its lease while a scan outlasts the lease period", async () => {
    const fixture = fixtureWith({ SCAN_FORCE_ASYNC: "true", WORKER_LEASE_MS: "90" });
    fixture.scanner.delayMs = 400;
    fixture.scanner.enqueue(scannerOutput([finding("CKV_AWS_1", "main.tf", 1)], 4));
    const worker = startWorkerLoop({ services: fixture.services, worker_id: "worker-test" });

    try {
      const project = await jsonRequest(fixture.app, { method: "POST", url: "/v1/projects", payload: { name: "infra" } });
      const created = await jsonRequest(fixture.app, {
        method: "POST",
        url: `/v1/projects/${project.body.project_id}/scans`,
        payload: { files: [{ path: "main.tf", content: 'resource "aws_s3_bucket" "a" {}' }] }
      });
      expect(created.statusCode).toBe(202);

      const completed = await waitForScan(fixture, created.body.scan_id, 3000);
      expect(completed.body).toMatchObject({ status: "completed", attempt_count: 1 });
      expect(fixture.scanner.requests).toHaveLength(1);
    } finally {
      await worker.stop();
    }
  });

  test("the worker records scanner failures on the scan", async () => {
    const fixture = fixtureWith();
    fixture.scanner.enqueue(new Error("checkov timed out"));
    const project = seedProject(fixture.db);
    const scan = createScan(fixture.db, { project_id: project.project_id, scan_type: "upload", metadata: { upload_path: fixture.tmpDir } });
    const worker = startWorkerLoop({ services: fixture.services, worker_id: "worker-test" });

    try {
      const done = await waitForScan(fixture, scan.scan_id, 2000);
      expect(done.body).toMatchObject({ status: "failed", error_message: "checkov timed out" });
    } finally {
      await worker.stop();
    }
  });

  test("reclaims running scans after lease expiration", () => {
    const fixture = fixtureWith();
    const project = seedProject(fixture.db);
    const scan = createScan(fixture.db, { project_id: project.project_id, scan_type: "upload", metadata: {} }, 500);

    const first = claimNextScan(fixture.db, { worker_id: "worker-a", now_ms: 1_000, lease_ms: 1_000 });
    expect(first?.scan_id).toBe(scan.scan_id);
    expect(first?.status).toBe("running");
    expect(first?.attempt_count).toBe(1);
    expect(first?.lease_owner).toBe("worker-a");
    expect(first?.started_at).toBe(1_000);

    expect(claimNextScan(fixture.db, { worker_id: "worker-b", now_ms: 1_500, lease_ms: 1_000 })).toBeNull();

    const afterExpiry = claimNextScan(fixture.db, { worker_id: "worker-b", now_ms: 2_100, lease_ms: 1_000 });
    expect(afterExpiry?.scan_id).toBe(scan.scan_id);
    expect(afterExpiry?.attempt_count).toBe(2);
    expect(afterExpiry?.lease_owner).toBe("worker-b");
    expect(afterExpiry?.started_at).toBe(1_000);
  });

  test("runs one scan per project at a time", () => {
    const fixture = fixtureWith();
    const infra = seedProject(fixture.db, "infra");
    const apps = seedProject(fixture.db, "apps");
    const a1 = createScan(fixture.db, { project_id: infra.project_id, scan_type: "upload", metadata: {} }, 100);
    createScan(fixture.db, { project_id: infra.project_id, scan_type: "upload", metadata: {} }, 200);
    const b1 = createScan(fixture.db, { project_id: apps.project_id, scan_type: "upload", metadata: {} }, 300);

    const lease = { worker_id: "w", now_ms: 1_000, lease_ms: 60_000 };
    expect(claimNextScan(fixture.db, lease)?.scan_id).toBe(a1.scan_id);
    expect(claimNextScan(fixture.db, lease)?.scan_id).toBe(b1.scan_id);
    expect(claimNextScan(fixture.db, lease)).toBeNull();
  });

  test("expired leases go back to pending", () => {
    const fixture = fixtureWith();
    const project = seedProject(fixture.db);
    const scan = createScan(fixture.db, { project_id: project.project_id, scan_type: "upload", metadata: {} }, 500);
    claimNextScan(fixture.db, { worker_id: "worker-a", now_ms: 1_000, lease_ms: 1_000 });

    expect(releaseExpiredLeases(fixture.db, 1_999)).toBe(0);
    expect(releaseExpiredLeases(fixture.db, 2_000)).toBe(1);
    expect(getScanById(fixture.db, scan.scan_id)).toMatchObject({ status: "pending", lease_owner: null, lease_expires_at: null });
  });
});

async function waitForScan(fixture: Fixture, scanId: string, timeoutMs: number) {
  const started = Date.now();
  while (Date.now() - started < timeoutMs) {
    const res = await jsonRequest(fixture.app, { method: "GET", url: `/v1/scans/${scanId}` });
    if (res.body.status === "completed" || res.body.status === "failed") {
      return res;
    }
    await sleep(20);
  }
  throw new Error("timed out waiting for queued scan completion");
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
