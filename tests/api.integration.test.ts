import fs from "node:fs";
import path from "node:path";
import inject from "light-my-request";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createFixture, disposeFixture, finding, jsonRequest, scannerOutput, type Fixture } from "./helpers.js";

const MAIN_TF = 'resource "aws_s3_bucket" "logs" {\n  acl = "public-read"\n}\n';

const noNew = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };

describe("api integration", () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture({ replies: [] });
  });

  afterEach(() => {
    disposeFixture(fixture);
  });

  async function createProject(name = "infra"): Promise<string> {
    const res = await jsonRequest(fixture.app, { method: "POST", url: "/v1/projects", payload: { name, framework: "terraform" } });
    expect(res.statusCode).toBe(201);
    return res.body.project_id;
  }

  async function uploadScan(project_id: string, extra: Record<string, unknown> = {}) {
    return jsonRequest(fixture.app, {
      method: "POST",
      url: `/v1/projects/${project_id}/scans`,
      payload: { files: [{ path: "main.tf", content: MAIN_TF }], ...extra }
    });
  }

  async function listVulns(project_id: string) {
    const res = await jsonRequest(fixture.app, { method: "GET", url: `/v1/vulnerabilities?project_id=${project_id}` });
    expect(res.statusCode).toBe(200);
    return res.body.vulnerabilities;
  }

  function twoFindings() {
    fixture.scanner.enqueue(scannerOutput([finding("CKV_AWS_1", "main.tf", 1), finding("CKV_AWS_20", "main.tf", 5)], 3));
  }

  test("project create, rename, conflict and delete", async () => {
    const created = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/projects",
      payload: { name: "infra", description: "network stack" }
    });
    expect(created.statusCode).toBe(201);
    expect(created.body).toMatchObject({ name: "infra", framework: "terraform", status: "active", description: "network stack" });
    const id = created.body.project_id;

    const dup = await jsonRequest(fixture.app, { method: "POST", url: "/v1/projects", payload: { name: "infra" } });
    expect(dup.statusCode).toBe(409);
    expect(dup.body).toEqual({ error: { error_code: "CONFLICT", message: "project infra already exists" } });

    const invalid = await jsonRequest(fixture.app, { method: "POST", url: "/v1/projects", payload: { name: "" } });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.body.error.error_code).toBe("BAD_REQUEST");

    const renamed = await jsonRequest(fixture.app, { method: "PUT", url: `/v1/projects/${id}`, payload: { name: "platform" } });
    expect(renamed.statusCode).toBe(200);
    expect(renamed.body.name).toBe("platform");

    const fetched = await jsonRequest(fixture.app, { method: "GET", url: `/v1/projects/${id}` });
    expect(fetched.body.open_by_severity).toEqual(noNew);

    const removed = await jsonRequest(fixture.app, { method: "DELETE", url: `/v1/projects/${id}` });
    expect(removed.statusCode).toBe(204);

    const missing = await jsonRequest(fixture.app, { method: "GET", url: `/v1/projects/${id}` });
    expect(missing.statusCode).toBe(404);
    expect(missing.body).toEqual({ error: { error_code: "NOT_FOUND", message: "project not found" } });
  });

  test("a synchronous scan reconciles findings and a rescan resolves the fixed one", async () => {
    const project_id = await createProject();
    await jsonRequest(fixture.app, {
      method: "PUT",
      url: `/v1/projects/${project_id}/notifications/settings`,
      payload: { critical_recipients: ["sec@example.com"], summary_recipients: ["team@example.com"] }
    });

    twoFindings();
    const first = await uploadScan(project_id);
    expect(first.statusCode).toBe(201);
    expect(first.body).toMatchObject({ status: "completed", total_checks: 5, passed_checks: 3, failed_checks: 2, pass_rate: 60 });
    expect(first.body.lease_owner).toBeUndefined();
    expect(first.body.reconciliation).toEqual({
      new: 2,
      still_open: 0,
      fixed: 0,
      regressions: 0,
      ignored: 0,
      new_by_severity: { ...noNew, critical: 1, medium: 1 }
    });
    expect(fixture.scanner.requests[0]?.root_dir).toBe(first.body.metadata.upload_path);
    expect(fs.readFileSync(path.join(first.body.metadata.upload_path, "main.tf"), "utf8")).toBe(MAIN_TF);

    const vulns = await listVulns(project_id);
    expect(vulns.map((v: { check_id: string; severity: string }) => [v.check_id, v.severity])).toEqual([
      ["CKV_AWS_1", "critical"],
      ["CKV_AWS_20", "medium"]
    ]);

    fixture.scanner.enqueue(scannerOutput([finding("CKV_AWS_20", "main.tf", 5)]));
    const second = await jsonRequest(fixture.app, { method: "POST", url: `/v1/scans/${first.body.scan_id}/rescan`, payload: {} });
    expect(second.statusCode).toBe(201);
    expect(second.body.scan_type).toBe("rescan");
    expect(second.body.reconciliation).toEqual({ new: 0, still_open: 1, fixed: 1, regressions: 0, ignored: 0, new_by_severity: noNew });

    const fixedRow = await jsonRequest(fixture.app, { method: "GET", url: `/v1/vulnerabilities/${vulns[0].vulnerability_id}` });
    expect(fixedRow.body.status).toBe("resolved");
    expect(typeof fixedRow.body.resolved_at).toBe("string");

    const summary = await jsonRequest(fixture.app, { method: "GET", url: `/v1/vulnerabilities/summary?project_id=${project_id}` });
    expect(summary.body).toEqual({
      project_id,
      total_open: 1,
      by_severity: { ...noNew, medium: 1 },
      by_status: { open: 1, in_progress: 0, resolved: 1, ignored: 0 }
    });

    const compare = await jsonRequest(fixture.app, {
      method: "GET",
      url: `/v1/projects/${project_id}/compare?base_scan_id=${first.body.scan_id}&target_scan_id=${second.body.scan_id}`
    });
    expect(compare.statusCode).toBe(200);
    expect(compare.body.summary).toEqual({ new: 0, existing: 1, fixed: 1 });
    expect(compare.body.fixed[0].check_id).toBe("CKV_AWS_1");
    expect(compare.body.existing[0].check_id).toBe("CKV_AWS_20");

    expect(fixture.sender.sent.map((m) => [m.to, m.subject])).toEqual([
      [["sec@example.com"], 'CRITICAL ALERT: Project "infra" - 1 critical, 0 high new findings'],
      [["team@example.com"], 'Scan Complete: "infra" - 0 Fixed, 2 New Issues'],
      [["team@example.com"], 'Scan Complete: "infra" - 1 Fixed, 0 New Issues']
    ]);

    const history = await jsonRequest(fixture.app, {
      method: "GET",
      url: `/v1/projects/${project_id}/notifications/history?notification_type=critical`
    });
    expect(history.body.notifications.map((n: { status: string }) => n.status).sort()).toEqual(["sent", "skipped"]);
  });

  test("async scans stay pending for the worker", async () => {
    const project_id = await createProject();
    const res = await uploadScan(project_id, { async: true });
    expect(res.statusCode).toBe(202);
    expect(res.body.status).toBe("pending");
    expect(res.body.reconciliation).toBeUndefined();
    expect(fixture.scanner.requests).toHaveLength(0);

    const listed = await jsonRequest(fixture.app, { method: "GET", url: `/v1/scans?project_id=${project_id}` });
    expect(listed.body.scans.map((s: { scan_id: string }) => s.scan_id)).toEqual([res.body.scan_id]);

    const removed = await jsonRequest(fixture.app, { method: "DELETE", url: `/v1/scans/${res.body.scan_id}` });
    expect(removed.statusCode).toBe(204);
    const gone = await jsonRequest(fixture.app, { method: "GET", url: `/v1/scans/${res.body.scan_id}` });
    expect(gone.statusCode).toBe(404);
  });

  test("a scanner failure fails the scan and alerts", async () => {
    const project_id = await createProject();
    await jsonRequest(fixture.app, {
      method: "PUT",
      url: `/v1/projects/${project_id}/notifications/settings`,
      payload: { critical_recipients: ["sec@example.com"] }
    });
    fixture.scanner.enqueue(new Error("checkov crashed"));

    const res = await uploadScan(project_id);
    expect(res.statusCode).toBe(500);
    expect(res.body.error.error_code).toBe("SCAN_FAILED");
    expect(res.body.error.message).toMatch(/^scan .+ failed: checkov crashed$/);

    const listed = await jsonRequest(fixture.app, { method: "GET", url: `/v1/scans?project_id=${project_id}` });
    expect(listed.body.scans[0]).toMatchObject({ status: "failed", error_message: "checkov crashed" });
    expect(fixture.sender.sent.map((m) => m.subject)).toEqual(['Scan Failed: "infra" - Action Required']);
  });

  test("scan requests need exactly one source", async () => {
    const project_id = await createProject();
    const both = await jsonRequest(fixture.app, {
      method: "POST",
      url: `/v1/projects/${project_id}/scans`,
      payload: { files: [{ path: "main.tf", content: "" }], zip_b64: "UEsFBg==" }
    });
    expect(both.statusCode).toBe(400);
    const neither = await jsonRequest(fixture.app, { method: "POST", url: `/v1/projects/${project_id}/scans`, payload: {} });
    expect(neither.statusCode).toBe(400);
    const traversal = await jsonRequest(fixture.app, {
      method: "POST",
      url: `/v1/projects/${project_id}/scans`,
      payload: { files: [{ path: "../main.tf", content: "" }] }
    });
    expect(traversal.statusCode).toBe(400);
    expect(traversal.body.error.error_code).toBe("INTAKE_FAILED");
  });

  test("status changes through the api", async () => {
    const project_id = await createProject();
    twoFindings();
    await uploadScan(project_id);
    const [critical, medium] = await listVulns(project_id);

    const resolve = await jsonRequest(fixture.app, {
      method: "PATCH",
      url: `/v1/vulnerabilities/${critical.vulnerability_id}/status`,
      payload: { status: "resolved" }
    });
    expect(resolve.statusCode).toBe(409);
    expect(resolve.body).toEqual({
      error: { error_code: "INVALID_STATE_TRANSITION", message: "vulnerabilities are resolved only by a scan that no longer reports them" }
    });

    const ignore = await jsonRequest(fixture.app, {
      method: "PATCH",
      url: `/v1/vulnerabilities/${critical.vulnerability_id}/status`,
      payload: { status: "ignored" }
    });
    expect(ignore.statusCode).toBe(200);
    expect(ignore.body.status).toBe("ignored");

    const bulk = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/vulnerabilities/bulk-status",
      payload: { vulnerability_ids: [critical.vulnerability_id, medium.vulnerability_id], status: "in_progress" }
    });
    expect(bulk.statusCode).toBe(200);
    expect(bulk.body.updated.map((v: { vulnerability_id: string }) => v.vulnerability_id)).toEqual([medium.vulnerability_id]);
    expect(bulk.body.failed).toEqual([
      {
        vulnerability_id: critical.vulnerability_id,
        error_code: "INVALID_STATE_TRANSITION",
        message: "cannot move vulnerability from ignored to in_progress"
      }
    ]);

    const filtered = await jsonRequest(fixture.app, { method: "GET", url: `/v1/vulnerabilities?project_id=${project_id}&status=in_progress` });
    expect(filtered.body.vulnerabilities.map((v: { check_id: string }) => v.check_id)).toEqual(["CKV_AWS_20"]);
  });

  test("dashboard, rollup and meta endpoints", async () => {
    const project_id = await createProject();
    twoFindings();
    await uploadScan(project_id);

    const stats = await jsonRequest(fixture.app, { method: "GET", url: "/v1/dashboard/stats?days=7" });
    expect(stats.statusCode).toBe(200);
    expect(stats.body.projects).toEqual({ total_projects: 1, frameworks: { terraform: 1 } });
    expect(stats.body.scans).toEqual({ total_scans: 1, completed_scans: 1, failed_scans: 0, average_pass_rate: 60 });
    expect(stats.body.vulnerabilities).toEqual({ ...noNew, critical: 1, medium: 1 });
    expect(stats.body.recent_scans[0]).toMatchObject({ project_name: "infra", pass_rate: 60 });
    expect(stats.body.trends.scans).toHaveLength(7);

    const rollup = await jsonRequest(fixture.app, { method: "GET", url: `/v1/projects/${project_id}/rollup` });
    expect(rollup.statusCode).toBe(200);
    expect(rollup.body.project.name).toBe("infra");
    expect(rollup.body.pass_rate_series.map((p: { pass_rate: number }) => p.pass_rate)).toEqual([60]);
    expect(rollup.body.status_breakdown).toEqual({ open: 2, in_progress: 0, resolved: 0, ignored: 0 });

    const tooFewScans = await jsonRequest(fixture.app, { method: "GET", url: `/v1/projects/${project_id}/compare` });
    expect(tooFewScans.statusCode).toBe(400);
    expect(tooFewScans.body.error.message).toBe("at least two completed scans are needed for a comparison");

    expect((await jsonRequest(fixture.app, { method: "GET", url: "/healthz" })).body).toEqual({ ok: true });
    const version = await jsonRequest(fixture.app, { method: "GET", url: "/v1/version" });
    expect(version.body).toEqual({ version: "0.1.0", scanner: "checkov", ai_provider: "fake" });
    const openapi = await jsonRequest(fixture.app, { method: "GET", url: "/openapi.json" });
    expect(openapi.body.openapi).toMatch(/^3\./);
    const unknown = await jsonRequest(fixture.app, { method: "GET", url: "/v1/nope" });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.body).toEqual({ error: { error_code: "NOT_FOUND", message: "route not found" } });
  });

  test("custom policies and policy configs", async () => {
    const project_id = await createProject();
    const created = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/policies/custom",
      payload: { check_id: "CKV_CUSTOM_1", name: "Buckets carry an owner tag", platform: "terraform", severity: "high", code: "# check source" }
    });
    expect(created.statusCode).toBe(201);
    expect(created.body).toMatchObject({ check_id: "CKV_CUSTOM_1", built_in: false, severity: "high", category: "custom" });
    const file = path.join(fixture.config.CUSTOM_POLICIES_DIR, "terraform", "CKV_CUSTOM_1.py");
    expect(created.body.file_path).toBe(path.resolve(file));
    expect(fs.readFileSync(file, "utf8")).toBe("# check source");

    const dup = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/policies/custom",
      payload: { check_id: "CKV_CUSTOM_1", name: "again", platform: "terraform", code: "x" }
    });
    expect(dup.statusCode).toBe(409);

    const updated = await jsonRequest(fixture.app, { method: "PUT", url: "/v1/policies/custom/CKV_CUSTOM_1", payload: { code: "# v2" } });
    expect(updated.statusCode).toBe(200);
    expect(fs.readFileSync(file, "utf8")).toBe("# v2");

    const removed = await jsonRequest(fixture.app, { method: "DELETE", url: "/v1/policies/custom/CKV_CUSTOM_1" });
    expect(removed.statusCode).toBe(204);
    expect(fs.existsSync(file)).toBe(false);

    const disabled = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/policy-configs",
      payload: { project_id, check_id: "CKV_AWS_20", enabled: false }
    });
    expect(disabled.statusCode).toBe(201);
    expect(disabled.body).toMatchObject({ project_id, check_id: "CKV_AWS_20", enabled: false });

    twoFindings();
    const scan = await uploadScan(project_id);
    expect(scan.body.reconciliation.new).toBe(1);
    expect((await listVulns(project_id)).map((v: { check_id: string }) => v.check_id)).toEqual(["CKV_AWS_1"]);

    const configs = await jsonRequest(fixture.app, { method: "GET", url: `/v1/policy-configs?project_id=${project_id}` });
    expect(configs.body.policy_configs).toHaveLength(1);
  });

  test("notification settings validation and test sends", async () => {
    const project_id = await createProject();
    const defaults = await jsonRequest(fixture.app, { method: "GET", url: `/v1/projects/${project_id}/notifications/settings` });
    expect(defaults.body).toMatchObject({ critical_threshold: 1, high_threshold: 5, weekly_day: "monday", quiet_hours_enabled: false });

    const badEmail = await jsonRequest(fixture.app, {
      method: "PUT",
      url: `/v1/projects/${project_id}/notifications/settings`,
      payload: { critical_recipients: ["not-an-email"] }
    });
    expect(badEmail.statusCode).toBe(400);
    const badClock = await jsonRequest(fixture.app, {
      method: "PUT",
      url: `/v1/projects/${project_id}/notifications/settings`,
      payload: { quiet_hours_start: "25:00" }
    });
    expect(badClock.statusCode).toBe(400);

    const unconfigured = await jsonRequest(fixture.app, { method: "POST", url: `/v1/projects/${project_id}/notifications/test` });
    expect(unconfigured.body.notification).toMatchObject({ status: "skipped", reason: "no recipients configured" });

    await jsonRequest(fixture.app, {
      method: "PUT",
      url: `/v1/projects/${project_id}/notifications/settings`,
      payload: { summary_recipients: ["team@example.com"] }
    });
    const sent = await jsonRequest(fixture.app, { method: "POST", url: `/v1/projects/${project_id}/notifications/test` });
    expect(sent.body.notification).toMatchObject({ status: "sent", notification_type: "test" });
    expect(fixture.sender.sent.map((m) => m.subject)).toEqual(['Test notification: "infra"']);

    const cleared = await jsonRequest(fixture.app, { method: "DELETE", url: `/v1/projects/${project_id}/notifications/history` });
    expect(cleared.body).toEqual({ deleted: 2 });
  });

  test("ai suggestions, edits and analysis", async () => {
    const project_id = await createProject();
    twoFindings();
    await uploadScan(project_id);
    const [critical] = await listVulns(project_id);

    const status = await jsonRequest(fixture.app, { method: "GET", url: "/v1/ai/status" });
    expect(status.body).toEqual({ available: true, provider: "fake", model: "fake-model" });

    fixture.chat.replies.push("EXPLANATION:\n- Made the bucket private\nRISK: low\nFIXED_CODE:\n```hcl\nfixed\n```");
    const fix = await jsonRequest(fixture.app, { method: "POST", url: "/v1/ai/suggest-fix", payload: { vulnerability_id: critical.vulnerability_id } });
    expect(fix.statusCode).toBe(200);
    expect(fix.body).toMatchObject({
      vulnerability_id: critical.vulnerability_id,
      file_path: "main.tf",
      original_code: MAIN_TF,
      fixed_code: "fixed",
      risk_level: "low",
      changes_summary: ["Made the bucket private"],
      model_used: "fake-model"
    });

    fixture.chat.replies.push("CHANGES:\n- Added tags\nEDITED_CODE:\n```\nedited\n```");
    const edit = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/ai/edit-file",
      payload: { project_id, file_path: "main.tf", instruction: "add tags" }
    });
    expect(edit.statusCode).toBe(200);
    expect(edit.body).toMatchObject({ file_path: "main.tf", edited_code: "edited", changes_made: ["Added tags"] });

    fixture.chat.replies.push("Public buckets leak data.");
    const analysis = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/ai/analyze-vulnerability",
      payload: { vulnerability_id: critical.vulnerability_id }
    });
    expect(analysis.body).toEqual({ vulnerability_id: critical.vulnerability_id, analysis: "Public buckets leak data.", model_used: "fake-model" });
  });

  test("ai endpoints report an unconfigured provider", async () => {
    disposeFixture(fixture);
    fixture = createFixture({ ai: false });
    const project_id = await createProject();
    twoFindings();
    await uploadScan(project_id);
    const [critical] = await listVulns(project_id);

    const status = await jsonRequest(fixture.app, { method: "GET", url: "/v1/ai/status" });
    expect(status.body.available).toBe(false);
    const fix = await jsonRequest(fixture.app, { method: "POST", url: "/v1/ai/suggest-fix", payload: { vulnerability_id: critical.vulnerability_id } });
    expect(fix.statusCode).toBe(503);
    expect(fix.body).toEqual({ error: { error_code: "AI_UNAVAILABLE", message: "AI provider fake is not configured" } });
  });

  test("applying a fix versions the file and rescans", async () => {
    const project_id = await createProject();
    twoFindings();
    const scan = await uploadScan(project_id);
    const upload_id = scan.body.metadata.upload_id;
    const [critical] = await listVulns(project_id);

    const applied = await jsonRequest(fixture.app, {
      method: "POST",
      url: "/v1/ai/apply-fix",
      payload: { vulnerability_id: critical.vulnerability_id, fixed_code: 'resource "aws_s3_bucket" "logs" {}\n' }
    });
    expect(applied.statusCode).toBe(200);
    expect(applied.body).toMatchObject({ vulnerability_id: critical.vulnerability_id, file_path: "main.tf", original_recorded: true });
    expect(applied.body.version).toMatchObject({ version_number: 2, edited_by: "ai", change_summary: "AI apply-fix for CKV_AWS_1" });
    expect(applied.body.version.content).toBeUndefined();
    expect(applied.body.rescan).toMatchObject({ status: "completed", scan_type: "rescan" });
    expect(applied.body.rescan.reconciliation).toMatchObject({ new: 0, fixed: 2 });
    expect(fs.readFileSync(path.join(scan.body.metadata.upload_path, "main.tf"), "utf8")).toBe('resource "aws_s3_bucket" "logs" {}\n');

    const versions = await jsonRequest(fixture.app, { method: "GET", url: `/v1/file-versions/${upload_id}?file_path=main.tf` });
    expect(versions.body.versions.map((v: { version_number: number }) => v.version_number)).toEqual([2, 1]);
    const original = versions.body.versions[1];

    const full = await jsonRequest(fixture.app, { method: "GET", url: `/v1/file-version/${original.version_id}` });
    expect(full.body).toMatchObject({ version_number: 1, change_summary: "Initial upload", content: MAIN_TF, scan_id: scan.body.scan_id });

    const diff = await jsonRequest(fixture.app, { method: "GET", url: `/v1/file-versions/${upload_id}/diff?file_path=main.tf&from=1&to=2` });
    expect(diff.body).toMatchObject({ upload_id, file_path: "main.tf", from_version: 1, to_version: 2, added: 1, removed: 3 });

    const restored = await jsonRequest(fixture.app, { method: "POST", url: "/v1/file-versions/restore", payload: { version_id: original.version_id } });
    expect(restored.statusCode).toBe(200);
    expect(restored.body).toMatchObject({ restored_from: 1, version: { version_number: 3, edited_by: "restore" } });
    expect(fs.readFileSync(path.join(scan.body.metadata.upload_path, "main.tf"), "utf8")).toBe(MAIN_TF);
  });

  test("malformed json is a bad request", async () => {
    const res = await inject(fixture.app, {
      method: "POST",
      url: "/v1/projects",
      headers: { "content-type": "application/json" },
      payload: "{not json"
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.error_code).toBe("BAD_REQUEST");
  });
});
