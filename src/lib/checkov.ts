import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ScanFailed, errorMessage } from "./errors.js";
import {
  groupFilesByFramework,
  listScannableFiles,
  type RawFinding,
  type ScanRequest,
  type ScanSummary,
  type Scanner,
  type ScannerOutput
} from "./scanner.js";

export type ExecResult = {
  stdout: string;
  stderr: string;
  exit_code: number;
};

export type ExecRunner = (file: string, args: string[], opts: { timeout_ms: number }) => Promise<ExecResult>;

const CountField = z.coerce.number().int().nonnegative().catch(0);

const FailedCheckSchema = z
  .object({
    check_id: z.string().nullish(),
    check_name: z.string().nullish(),
    severity: z.string().nullish(),
    file_path: z.string().nullish(),
    file_line_range: z.array(z.number()).nullish(),
    resource: z.string().nullish(),
    guideline: z.string().nullish(),
    code_block: z.array(z.tuple([z.number(), z.string()])).nullish().catch(null),
    details: z.array(z.string()).nullish().catch(null),
    check_class: z.string().nullish()
  })
  .passthrough();

const ReportSchema = z
  .object({
    check_type: z.string().optional(),
    results: z
      .object({
        failed_checks: z.array(z.unknown()).default([])
      })
      .passthrough()
      .optional(),
    summary: z
      .object({
        passed: CountField.default(0),
        failed: CountField.default(0),
        skipped: CountField.default(0)
      })
      .passthrough()
      .optional(),
    passed: CountField.optional(),
    failed: CountField.optional(),
    skipped: CountField.optional()
  })
  .passthrough();

const OutputSchema = z.union([ReportSchema, z.array(ReportSchema)]);

type Report = z.infer<typeof ReportSchema>;

export type ParsedCheckovOutput = {
  summary: ScanSummary;
  failed_checks: RawFinding[];
  malformed_checks: number;
};

/**
 * Parses one `checkov -o json` document. Checkov prints a bare summary object when a file
 * has no resources, an object per framework otherwise, and an array when several ran.
 */
export function parseCheckovOutput(stdout: string): ParsedCheckovOutput {
  const parsed = OutputSchema.safeParse(JSON.parse(stdout));
  if (!parsed.success) {
    throw new Error(`unexpected checkov output: ${parsed.error.message}`);
  }
  const reports: Report[] = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  const summary: ScanSummary = { passed: 0, failed: 0, skipped: 0 };
  const failed_checks: RawFinding[] = [];
  let malformed_checks = 0;

  for (const report of reports) {
    summary.passed += report.summary?.passed ?? report.passed ?? 0;
    summary.failed += report.summary?.failed ?? report.failed ?? 0;
    summary.skipped += report.summary?.skipped ?? report.skipped ?? 0;
    for (const raw of report.results?.failed_checks ?? []) {
      const check = FailedCheckSchema.safeParse(raw);
      if (!check.success) {
        malformed_checks += 1;
        continue;
      }
      failed_checks.push({
        check_id: check.data.check_id,
        check_name: check.data.check_name,
        severity: check.data.severity,
        file_path: check.data.file_path,
        file_line_range: check.data.file_line_range,
        resource: check.data.resource,
        guideline: check.data.guideline,
        code_block: check.data.code_block,
        details: check.data.details,
        check_class: check.data.check_class
      });
    }
  }
  return { summary, failed_checks, malformed_checks };
}

export const execFileRunner: ExecRunner = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { timeout: opts.timeout_ms, maxBuffer: 64 * 1024 * 1024, encoding: "utf8" }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ stdout, stderr, exit_code: 0 });
        return;
      }
      if (err.killed || err.signal) {
        reject(new ScanFailed(`checkov timed out after ${opts.timeout_ms}ms`));
        return;
      }
      if (typeof err.code === "number") {
        // checkov exits 1 when any check failed
        resolve({ stdout, stderr, exit_code: err.code });
        return;
      }
      reject(new ScanFailed(`checkov could not be started: ${err.message}`));
    });
  });

export class CheckovScanner implements Scanner {
  readonly name = "checkov";
  private readonly checkovPath: string;
  private readonly run: ExecRunner;

  constructor(args: { checkov_path: string; run?: ExecRunner }) {
    this.checkovPath = args.checkov_path;
    this.run = args.run ?? execFileRunner;
  }

  async scan(request: ScanRequest): Promise<ScannerOutput> {
    const files = listScannableFiles(request.root_dir);
    if (files.length === 0) {
      throw new ScanFailed("No scannable files found");
    }
    const byFramework = groupFilesByFramework(request.root_dir, files);
    const summary: ScanSummary = { passed: 0, failed: 0, skipped: 0 };
    const results: RawFinding[] = [];

    for (const [framework, frameworkFiles] of byFramework) {
      console.log(`Checkov scanning framework=${framework} files=${frameworkFiles.length}`);
      const externalDir = request.custom_policies_dir ? path.join(request.custom_policies_dir, framework) : null;
      for (const rel of frameworkFiles) {
        const args = ["-f", path.join(request.root_dir, rel), "--framework", framework, "-o", "json", "--quiet", "--compact"];
        if (externalDir && fs.existsSync(externalDir)) {
          args.push("--external-checks-dir", externalDir);
        }
        if (request.skip_checks.length > 0) {
          args.push("--skip-check", request.skip_checks.join(","));
        }

        const out = await this.run(this.checkovPath, args, { timeout_ms: request.timeout_ms });
        if (out.stderr.trim()) {
          console.warn(`Checkov stderr file=${rel}: ${out.stderr.trim().slice(0, 200)}`);
        }
        if (!out.stdout.trim()) continue;

        let parsed: ParsedCheckovOutput;
        try {
          parsed = parseCheckovOutput(out.stdout);
        } catch (e) {
          console.warn(`Checkov output unparseable file=${rel}: ${errorMessage(e)}`);
          continue;
        }
        if (parsed.malformed_checks > 0) {
          console.warn(`Checkov skipped malformed checks file=${rel} count=${parsed.malformed_checks}`);
        }
        summary.passed += parsed.summary.passed;
        summary.failed += parsed.summary.failed;
        summary.skipped += parsed.summary.skipped;
        // -f scans exactly one file, so its upload-relative path is the finding's path
        for (const finding of parsed.failed_checks) {
          results.push({ ...finding, file_path: rel });
        }
      }
    }

    return {
      summary,
      results,
      frameworks_scanned: [...byFramework.keys()],
      total_files: files.length
    };
  }
}
