import path from "node:path";
import axios from "axios";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { AiUnavailable, errorMessage } from "./errors.js";

export type ChatMessage = { role: "system" | "user"; content: string };

/** One round trip to a chat model; resolves to the reply text. */
export type ChatCompletion = (messages: ChatMessage[], opts: { temperature: number; signal?: AbortSignal }) => Promise<string>;

export type RiskLevel = "low" | "medium" | "high";

export type FixContext = {
  check_id: string;
  check_name: string;
  description: string;
  file_path: string;
  line_start: number | null;
  file_content: string;
};

export type FixSuggestion = {
  original_code: string;
  fixed_code: string;
  explanation: string;
  changes_summary: string[];
  risk_level: RiskLevel;
  model_used: string;
};

export type FileEdit = {
  original_code: string;
  edited_code: string;
  explanation: string;
  changes_made: string[];
  model_used: string;
};

export type AnalysisContext = {
  check_id: string;
  check_name: string;
  resource_type: string | null;
  description: string;
};

export type VulnerabilityAnalysis = {
  analysis: string;
  model_used: string;
};

export interface AiRemediationProvider {
  readonly name: string;
  readonly model: string;
  isAvailable(): boolean;
  suggestFix(ctx: FixContext, signal?: AbortSignal): Promise<FixSuggestion>;
  editFile(args: { file_path: string; content: string; instruction: string }, signal?: AbortSignal): Promise<FileEdit>;
  analyzeVulnerability(ctx: AnalysisContext, signal?: AbortSignal): Promise<VulnerabilityAnalysis>;
}

const FIX_SYSTEM_PROMPT =
  "You are a security expert specializing in fixing infrastructure-as-code vulnerabilities. Always provide complete, working code fixes.";
const ANALYZE_SYSTEM_PROMPT = "You are a cybersecurity expert analyzing infrastructure vulnerabilities.";

export function describeLanguage(filePath: string): string {
  const base = path.posix.basename(filePath.replace(/\\/g, "/"));
  if (base.toLowerCase().startsWith("dockerfile")) return "Dockerfile";
  const ext = path.posix.extname(base).slice(1).toLowerCase();
  if (ext === "tf" || ext === "hcl") return "Terraform";
  if (ext === "yaml" || ext === "yml") return "Kubernetes YAML";
  if (ext === "json") return "JSON template";
  if (ext === "bicep") return "Bicep template";
  return "configuration file";
}

export function buildFixPrompt(ctx: FixContext): string {
  return [
    `Fix a security vulnerability in a ${describeLanguage(ctx.file_path)}.`,
    "",
    "**Vulnerability Details:**",
    `- Check ID: ${ctx.check_id}`,
    `- Issue: ${ctx.check_name}`,
    `- Description: ${ctx.description}`,
    `- Location: Line ${ctx.line_start ?? 0} in ${ctx.file_path}`,
    "",
    "**Current File Content:**",
    "```",
    ctx.file_content,
    "```",
    "",
    "**Task:**",
    "1. Identify the exact security issue",
    "2. Provide the fixed version of the ENTIRE file",
    "3. List each change as a bullet and rate the risk of applying the fix",
    "",
    "**Output format:**",
    "EXPLANATION:",
    "- [one bullet per change]",
    "RISK: [low|medium|high]",
    "FIXED_CODE:",
    "```",
    "[Complete fixed file content]",
    "```",
    "",
    "Generate ONLY the explanation, risk and fixed code as specified above."
  ].join("\n");
}

export function buildEditPrompt(args: { file_path: string; content: string; instruction: string }): string {
  return [
    `Edit a ${describeLanguage(args.file_path)} based on user instruction.`,
    "",
    `**File:** ${args.file_path}`,
    "",
    "**Current Content:**",
    "```",
    args.content,
    "```",
    "",
    "**User Instruction:**",
    args.instruction,
    "",
    "**Task:**",
    "1. Apply the requested changes to the file",
    "2. Maintain correct syntax and formatting",
    "3. Preserve comments and structure where possible",
    "",
    "**Output format:**",
    "CHANGES:",
    "- [one bullet per change]",
    "EDITED_CODE:",
    "```",
    "[Complete edited file content]",
    "```",
    "",
    "Generate ONLY the changes summary and edited code as specified above."
  ].join("\n");
}

export function buildAnalysisPrompt(ctx: AnalysisContext): string {
  return [
    "Analyze this security vulnerability:",
    "",
    `**Check ID:** ${ctx.check_id}`,
    `**Check:** ${ctx.check_name}`,
    `**Resource:** ${ctx.resource_type ?? "unknown"}`,
    `**Description:** ${ctx.description}`,
    "",
    "Provide:",
    "1. **Severity Analysis**: Why this is important",
    "2. **Potential Impact**: What could happen if exploited",
    "3. **Remediation Steps**: How to fix it (numbered list)",
    "",
    "Be concise and practical."
  ].join("\n");
}

const FENCE_RE = /```[^\n`]*\n?([\s\S]*?)```/;
const RISK_RE = /^\s*RISK(?:_LEVEL)?:\s*(low|medium|high)\b.*$/im;

export function extractFencedCode(text: string): string | null {
  const m = FENCE_RE.exec(text);
  return m ? (m[1] ?? "").trim() : null;
}

/** Bullet or numbered lines of a summary; the first line stands in when there are none. */
export function summaryLines(text: string): string[] {
  const lines = text.split("\n").map((l) => l.trim()).filter(Boolean);
  const bullets = lines
    .map((l) => /^(?:[-*•]|\d+[.)])\s+(.*)$/.exec(l)?.[1]?.trim())
    .filter((l): l is string => Boolean(l));
  if (bullets.length > 0) return bullets;
  return lines.slice(0, 1);
}

export type SectionedReply = {
  summary: string;
  code: string;
  parsed: boolean;
};

/**
 * Splits a reply of the form `<HEAD> ... <CODE> ```...```` into its summary and code.
 * Without both markers the first fenced block is used, else the fallback code.
 */
export function parseSectionedReply(content: string, labels: { head: string; code: string }, fallbackCode: string): SectionedReply {
  const codeAt = content.indexOf(labels.code);
  if (content.includes(labels.head) && codeAt >= 0) {
    const summary = content.slice(0, codeAt).replace(labels.head, "").trim();
    const codePart = content.slice(codeAt + labels.code.length).trim();
    return { summary, code: extractFencedCode(codePart) ?? codePart, parsed: true };
  }
  return { summary: "", code: extractFencedCode(content) ?? fallbackCode, parsed: false };
}

export function parseFixReply(content: string, originalCode: string): Omit<FixSuggestion, "model_used"> {
  const risk = RISK_RE.exec(content)?.[1]?.toLowerCase();
  const risk_level: RiskLevel = risk === "low" || risk === "high" ? risk : "medium";
  const reply = parseSectionedReply(content.replace(RISK_RE, ""), { head: "EXPLANATION:", code: "FIXED_CODE:" }, originalCode);
  const explanation = reply.parsed ? reply.summary : "AI suggested fix (parsing may be incomplete)";
  return {
    original_code: originalCode,
    fixed_code: reply.code,
    explanation,
    changes_summary: summaryLines(explanation),
    risk_level
  };
}

export function parseEditReply(content: string, originalCode: string): Omit<FileEdit, "model_used"> {
  const reply = parseSectionedReply(content, { head: "CHANGES:", code: "EDITED_CODE:" }, originalCode);
  const explanation = reply.parsed ? reply.summary : "AI made edits (parsing may be incomplete)";
  return {
    original_code: originalCode,
    edited_code: reply.code,
    explanation,
    changes_made: summaryLines(explanation)
  };
}

/** Remediation on top of any chat model; without a completion function it reports unavailable. */
export class LlmRemediationProvider implements AiRemediationProvider {
  readonly name: string;
  readonly model: string;
  private readonly complete: ChatCompletion | null;

  constructor(args: { name: string; model: string; complete: ChatCompletion | null }) {
    this.name = args.name;
    this.model = args.model;
    this.complete = args.complete;
  }

  isAvailable(): boolean {
    return this.complete !== null;
  }

  async suggestFix(ctx: FixContext, signal?: AbortSignal): Promise<FixSuggestion> {
    const reply = await this.ask(
      [
        { role: "system", content: FIX_SYSTEM_PROMPT },
        { role: "user", content: buildFixPrompt(ctx) }
      ],
      0.2,
      signal
    );
    return { ...parseFixReply(reply, ctx.file_content), model_used: this.model };
  }

  async editFile(args: { file_path: string; content: string; instruction: string }, signal?: AbortSignal): Promise<FileEdit> {
    const language = describeLanguage(args.file_path);
    const reply = await this.ask(
      [
        {
          role: "system",
          content: `You are an expert ${language} developer. Edit files precisely according to user instructions while maintaining best practices.`
        },
        { role: "user", content: buildEditPrompt(args) }
      ],
      0.3,
      signal
    );
    return { ...parseEditReply(reply, args.content), model_used: this.model };
  }

  async analyzeVulnerability(ctx: AnalysisContext, signal?: AbortSignal): Promise<VulnerabilityAnalysis> {
    const reply = await this.ask(
      [
        { role: "system", content: ANALYZE_SYSTEM_PROMPT },
        { role: "user", content: buildAnalysisPrompt(ctx) }
      ],
      0.4,
      signal
    );
    return { analysis: reply.trim(), model_used: this.model };
  }

  private async ask(messages: ChatMessage[], temperature: number, signal?: AbortSignal): Promise<string> {
    if (!this.complete) {
      throw new AiUnavailable(`AI provider ${this.name} is not configured`);
    }
    return this.complete(messages, { temperature, signal });
  }
}

const OpenAiReply = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1)
});

const GeminiReply = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) })
      })
    )
    .min(1)
});

function toAiError(provider: string, timeoutMs: number, e: unknown): AiUnavailable {
  if (axios.isAxiosError(e)) {
    if (e.code === "ECONNABORTED" || e.code === "ERR_CANCELED" || e.code === "ETIMEDOUT") {
      return new AiUnavailable(`${provider} request timed out after ${timeoutMs}ms`);
    }
    if (e.response) {
      return new AiUnavailable(`${provider} request failed status=${e.response.status}`);
    }
  }
  return new AiUnavailable(`${provider} request failed: ${errorMessage(e)}`);
}

export function openAiCompletion(args: { api_key: string; model: string; base_url: string; timeout_ms: number }): ChatCompletion {
  const client = axios.create({
    baseURL: args.base_url.replace(/\/+$/, ""),
    timeout: args.timeout_ms,
    headers: { "Content-Type": "application/json", Authorization: `Bearer ${args.api_key}` }
  });
  return async (messages, opts) => {
    let data: unknown;
    try {
      const res = await client.post("/chat/completions", { model: args.model, messages, temperature: opts.temperature }, {
        signal: opts.signal ?? AbortSignal.timeout(args.timeout_ms)
      });
      data = res.data;
    } catch (e) {
      throw toAiError("openai", args.timeout_ms, e);
    }
    const parsed = OpenAiReply.safeParse(data);
    if (!parsed.success) {
      throw new AiUnavailable("openai returned an unexpected response");
    }
    return parsed.data.choices[0]?.message.content ?? "";
  };
}

export function geminiCompletion(args: { api_key: string; model: string; base_url: string; timeout_ms: number }): ChatCompletion {
  const client = axios.create({
    baseURL: args.base_url.replace(/\/+$/, ""),
    timeout: args.timeout_ms,
    headers: { "Content-Type": "application/json", "x-goog-api-key": args.api_key }
  });
  return async (messages, opts) => {
    const system = messages.filter((m) => m.role === "system").map((m) => m.content).join("\n");
    const contents = messages.filter((m) => m.role === "user").map((m) => ({ role: "user", parts: [{ text: m.content }] }));
    let data: unknown;
    try {
      const res = await client.post(
        `/models/${encodeURIComponent(args.model)}:generateContent`,
        {
          ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
          contents,
          generationConfig: { temperature: opts.temperature }
        },
        { signal: opts.signal ?? AbortSignal.timeout(args.timeout_ms) }
      );
      data = res.data;
    } catch (e) {
      throw toAiError("gemini", args.timeout_ms, e);
    }
    const parsed = GeminiReply.safeParse(data);
    if (!parsed.success) {
      throw new AiUnavailable("gemini returned an unexpected response");
    }
    return (parsed.data.candidates[0]?.content.parts ?? []).map((p) => p.text ?? "").join("");
  };
}

type AiConfig = Pick<
  AppConfig,
  | "AI_PROVIDER"
  | "AI_TIMEOUT_MS"
  | "OPENAI_API_KEY"
  | "OPENAI_MODEL"
  | "OPENAI_BASE_URL"
  | "GEMINI_API_KEY"
  | "GEMINI_MODEL"
  | "GEMINI_BASE_URL"
>;

/** The configured provider when its key is set, else the other one when that key is set. */
export function buildAiProvider(config: AiConfig): AiRemediationProvider {
  const openai = (): LlmRemediationProvider | null =>
    config.OPENAI_API_KEY
      ? new LlmRemediationProvider({
          name: "openai",
          model: config.OPENAI_MODEL,
          complete: openAiCompletion({
            api_key: config.OPENAI_API_KEY,
            model: config.OPENAI_MODEL,
            base_url: config.OPENAI_BASE_URL,
            timeout_ms: config.AI_TIMEOUT_MS
          })
        })
      : null;
  const gemini = (): LlmRemediationProvider | null =>
    config.GEMINI_API_KEY
      ? new LlmRemediationProvider({
          name: "gemini",
          model: config.GEMINI_MODEL,
          complete: geminiCompletion({
            api_key: config.GEMINI_API_KEY,
            model: config.GEMINI_MODEL,
            base_url: config.GEMINI_BASE_URL,
            timeout_ms: config.AI_TIMEOUT_MS
          })
        })
      : null;

  const chosen = config.AI_PROVIDER === "gemini" ? gemini() ?? openai() : openai() ?? gemini();
  if (chosen) return chosen;
  console.warn(`AI provider not configured provider=${config.AI_PROVIDER}; AI features disabled`);
  return new LlmRemediationProvider({
    name: config.AI_PROVIDER,
    model: config.AI_PROVIDER === "gemini" ? config.GEMINI_MODEL : config.OPENAI_MODEL,
    complete: null
  });
}
