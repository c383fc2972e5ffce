import fs from "node:fs";
import path from "node:path";

/** One failed check as the scanner reported it; every field may be missing. */
export type RawFinding = {
  check_id?: string | null;
  check_name?: string | null;
  severity?: string | null;
  file_path?: string | null;
  file_line_range?: number[] | null;
  resource?: string | null;
  resource_type?: string | null;
  guideline?: string | null;
  code_block?: Array<[number, string]> | null;
  details?: string[] | null;
  check_class?: string | null;
};

export type ScanSummary = {
  passed: number;
  failed: number;
  skipped: number;
};

export type ScanRequest = {
  root_dir: string;
  skip_checks: string[];
  custom_policies_dir: string | null;
  timeout_ms: number;
};

export type ScannerOutput = {
  summary: ScanSummary;
  results: RawFinding[];
  frameworks_scanned: string[];
  total_files: number;
};

export interface Scanner {
  readonly name: string;
  scan(request: ScanRequest): Promise<ScannerOutput>;
}

const SKIPPED_DIRS = new Set([".git", "node_modules", ".terraform"]);

/** Files under root, relative and slash-separated, in stable order. */
export function listScannableFiles(root_dir: string): string[] {
  const out: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) walk(abs);
        continue;
      }
      if (entry.isFile()) {
        out.push(path.relative(root_dir, abs).split(path.sep).join("/"));
      }
    }
  };
  if (fs.existsSync(root_dir)) walk(root_dir);
  return out.sort();
}

/**
 * Checkov framework for a file, from its name and, for YAML and JSON, its first bytes.
 * Unrecognized files fall back to terraform.
 */
export function detectFileFramework(relPath: string, head: string): string {
  const fullpath = relPath.toLowerCase();
  const filename = path.posix.basename(fullpath);

  if (filename === "dockerfile" || filename.startsWith("dockerfile.")) return "dockerfile";
  if (filename.endsWith(".tf.json")) return "terraform_json";
  if (filename.endsWith(".tf") || filename.endsWith(".tfvars")) return "terraform";
  if (filename.endsWith(".bicep")) return "bicep";
  if (filename.endsWith(".json") && filename.includes("template")) return "arm";
  if (fullpath.includes(".github/workflows")) return "github_actions";
  if (filename.includes(".gitlab-ci")) return "gitlab_ci";
  if (filename.includes("azure-pipelines")) return "azure_pipelines";
  if (fullpath.includes(".circleci")) return "circleci_pipelines";
  if (filename.includes("bitbucket-pipelines")) return "bitbucket_pipelines";

  const isYaml = filename.endsWith(".yaml") || filename.endsWith(".yml");
  if (filename.includes("argo") && isYaml) return "argo_workflows";
  if (isYaml) {
    const start = head.slice(0, 200);
    if (start.includes("apiVersion") && start.includes("kind")) return "kubernetes";
    if (filename.includes("chart.yaml") || filename.includes("values.yaml")) return "helm";
    if (filename.includes("kustomization.yaml")) return "kustomize";
    if (filename.includes("ansible") || filename.includes("playbook")) return "ansible";
    if (start.includes("AWSTemplateFormatVersion") || start.includes("Resources:")) return "cloudformation";
    if (filename.includes("serverless")) return "serverless";
    const lower = start.toLowerCase();
    if (lower.includes("openapi") || lower.includes("swagger")) return "openapi";
    return "kubernetes";
  }
  if (filename.endsWith(".json")) {
    const start = head.slice(0, 500);
    if (start.includes("AWSTemplateFormatVersion") || start.includes("AWS::CloudFormation")) return "cloudformation";
    return "json";
  }
  return "terraform";
}

export function readHead(absPath: string, bytes = 500): string {
  const fd = fs.openSync(absPath, "r");
  try {
    const buf = Buffer.alloc(bytes);
    const n = fs.readSync(fd, buf, 0, bytes, 0);
    return buf.subarray(0, n).toString("utf8");
  } finally {
    fs.closeSync(fd);
  }
}

export function groupFilesByFramework(root_dir: string, files: string[]): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const rel of files) {
    const fw = detectFileFramework(rel, readHead(path.join(root_dir, rel)));
    const list = out.get(fw) ?? [];
    list.push(rel);
    out.set(fw, list);
  }
  return out;
}
