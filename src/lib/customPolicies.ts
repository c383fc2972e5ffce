import fs from "node:fs";
import path from "node:path";

export const CUSTOM_POLICY_PLATFORMS = [
  "terraform",
  "terraform_json",
  "terraform_plan",
  "kubernetes",
  "kustomize",
  "helm",
  "dockerfile",
  "cloudformation",
  "arm",
  "bicep",
  "ansible",
  "serverless",
  "openapi",
  "github_actions",
  "gitlab_ci",
  "azure_pipelines",
  "circleci_pipelines",
  "bitbucket_pipelines",
  "argo_workflows",
  "cdk",
  "json",
  "yaml"
] as const;
export type CustomPolicyPlatform = (typeof CUSTOM_POLICY_PLATFORMS)[number];

export type CustomPolicyFormat = "python" | "yaml";

export const CHECK_ID_PATTERN = /^[A-Za-z0-9_]+$/;

/** Writes policy source where the scanner picks it up: <dir>/<platform>/<check_id>.<py|yaml>. */
export function writeCustomPolicyFile(
  dir: string,
  args: { platform: string; check_id: string; format: CustomPolicyFormat; code: string }
): string {
  const platformDir = path.resolve(dir, args.platform);
  fs.mkdirSync(platformDir, { recursive: true });
  const init = path.join(platformDir, "__init__.py");
  if (!fs.existsSync(init)) fs.writeFileSync(init, "");
  const file = path.join(platformDir, `${args.check_id}${args.format === "python" ? ".py" : ".yaml"}`);
  fs.writeFileSync(file, args.code, "utf8");
  return file;
}

export function removeCustomPolicyFile(file_path: string | null): void {
  if (!file_path) return;
  fs.rmSync(file_path, { force: true });
}

export function formatOf(file_path: string | null): CustomPolicyFormat {
  return file_path?.endsWith(".py") ? "python" : "yaml";
}
