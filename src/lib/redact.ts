const SECRET_PATTERNS: RegExp[] = [
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  /AKIA[0-9A-Z]{16}/g, // AWS access key id
  /xox[bp]-[A-Za-z0-9-]+/g, // Slack tokens
  /ghp_[A-Za-z0-9]{20,}/g, // GitHub PAT
  /sk-[A-Za-z0-9]{16,}/g,
  /((?:api_key|apikey|secret|token|password|secret_key|access_key)\s*[:=]\s*)"?[A-Za-z0-9_/+\-]{12,}"?/gi
];

/** Masks credential-shaped substrings in text that is stored or sent to an AI provider. */
export function redactText(input: string): string {
  let out = input;
  for (const re of SECRET_PATTERNS) {
    out = out.replace(re, (_match: string, prefix?: string) => (typeof prefix === "string" ? `${prefix}[REDACTED]` : "[REDACTED]"));
  }
  return out;
}
