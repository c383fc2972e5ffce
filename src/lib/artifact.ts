import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { BadRequest, IntakeFailed, NotFound } from "./errors.js";

export type UploadedFile = {
  path: string;
  bytes: Uint8Array;
};

export type NormalizedUpload = {
  files: UploadedFile[];
  total_bytes: number;
};

export interface IntakeLimits {
  max_files: number;
  max_total_bytes: number;
  max_single_file_bytes: number;
}

const DEFAULT_LIMITS: IntakeLimits = {
  max_files: 5000,
  max_total_bytes: 50 * 1024 * 1024,
  max_single_file_bytes: 5 * 1024 * 1024
};

/** Upload-relative path with forward slashes; absolute paths and parent segments are refused. */
export function normalizePath(p: string): string {
  const normalized = p.replace(/\\/g, "/").replace(/\/{2,}/g, "/").replace(/^(\.\/)+/, "");
  if (!normalized || normalized.startsWith("/") || /^[a-zA-Z]:/.test(normalized) || normalized.split("/").includes("..")) {
    throw new IntakeFailed(`Invalid path: ${p}`);
  }
  return normalized;
}

export function normalizeInlineFiles(input: Array<{ path: string; content: string }>, limits: IntakeLimits = DEFAULT_LIMITS): NormalizedUpload {
  if (input.length === 0) throw new IntakeFailed("No files provided");
  if (input.length > limits.max_files) throw new IntakeFailed("Upload has too many files");
  const files: UploadedFile[] = [];
  let total = 0;
  for (const f of input) {
    const p = normalizePath(f.path);
    const bytes = new TextEncoder().encode(f.content);
    if (bytes.byteLength > limits.max_single_file_bytes) throw new IntakeFailed(`File is too large: ${p}`);
    total += bytes.byteLength;
    if (total > limits.max_total_bytes) throw new IntakeFailed("Upload is too large");
    files.push({ path: p, bytes });
  }
  return dedupe(files);
}

export function normalizeZip(input: { zip_b64: string }, limits: IntakeLimits = DEFAULT_LIMITS): NormalizedUpload {
  let zip: AdmZip;
  try {
    zip = new AdmZip(Buffer.from(input.zip_b64, "base64"));
  } catch {
    throw new IntakeFailed("Upload is not a valid zip archive");
  }
  const entries = zip.getEntries().filter((e) => !e.isDirectory && !e.entryName.startsWith("__MACOSX/"));
  if (entries.length === 0) throw new IntakeFailed("Zip archive is empty");
  if (entries.length > limits.max_files) throw new IntakeFailed("Zip has too many files");

  let total = 0;
  const files: UploadedFile[] = [];
  for (const e of entries) {
    const p = normalizePath(e.entryName);
    const disallowedType = detectDisallowedZipEntryType(e);
    if (disallowedType) {
      throw new IntakeFailed(`Zip contains unsupported entry type (${disallowedType}): ${p}`);
    }

    const data = e.getData();
    if (data.length > limits.max_single_file_bytes) throw new IntakeFailed(`Zip contains an oversized file: ${p}`);
    total += data.length;
    if (total > limits.max_total_bytes) throw new IntakeFailed("Zip is too large");
    files.push({ path: p, bytes: new Uint8Array(data) });
  }
  return dedupe(files);
}

function dedupe(input: UploadedFile[]): NormalizedUpload {
  // last write wins
  const byPath = new Map<string, Uint8Array>();
  for (const f of input) byPath.set(f.path, f.bytes);
  const files = [...byPath.entries()].map(([p, bytes]) => ({ path: p, bytes }));
  files.sort((a, b) => a.path.localeCompare(b.path));
  return { files, total_bytes: files.reduce((sum, f) => sum + f.bytes.byteLength, 0) };
}

export function projectUploadDir(storageDir: string, project_id: string): string {
  return path.join(storageDir, `project_${project_id}`);
}

export function uploadDir(storageDir: string, project_id: string, upload_id: string): string {
  return path.resolve(projectUploadDir(storageDir, project_id), normalizePath(upload_id));
}

export function persistUpload(storageDir: string, project_id: string, upload_id: string, upload: NormalizedUpload): string {
  const dir = uploadDir(storageDir, project_id, upload_id);
  fs.mkdirSync(dir, { recursive: true });
  for (const f of upload.files) {
    const target = resolveUploadFile(dir, f.path);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, Buffer.from(f.bytes));
  }
  return dir;
}

export function removeProjectUploads(storageDir: string, project_id: string): void {
  fs.rmSync(projectUploadDir(storageDir, project_id), { recursive: true, force: true });
}

/** Absolute path of an upload-relative file that cannot leave the upload directory. */
export function resolveUploadFile(upload_path: string, relPath: string): string {
  const root = path.resolve(upload_path);
  const target = path.resolve(root, relPath);
  if (target !== root && !target.startsWith(root + path.sep)) {
    throw new BadRequest(`file path escapes the upload: ${relPath}`);
  }
  return target;
}

export function readUploadFile(upload_path: string, relPath: string): string {
  const target = resolveUploadFile(upload_path, relPath);
  if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
    throw new NotFound(`File not found: ${relPath}`);
  }
  return fs.readFileSync(target, "utf8");
}

export function writeUploadFile(upload_path: string, relPath: string, content: string): string {
  const target = resolveUploadFile(upload_path, relPath);
  if (!fs.existsSync(path.dirname(target))) {
    throw new NotFound(`File directory not found: ${relPath}`);
  }
  fs.writeFileSync(target, content, "utf8");
  return target;
}

function detectDisallowedZipEntryType(entry: { attr?: number; isDirectory: boolean }): string | null {
  const attr = typeof entry.attr === "number" ? entry.attr >>> 0 : 0;
  const unixMode = (attr >>> 16) & 0xffff;
  if (unixMode === 0) return null; // no unix mode recorded

  const fileType = unixMode & 0o170000;
  if (fileType === 0o100000) return null;
  if (fileType === 0o040000 && entry.isDirectory) return null;

  if (fileType === 0o120000) return "symlink";
  if (fileType === 0o020000) return "char-device";
  if (fileType === 0o060000) return "block-device";
  if (fileType === 0o010000) return "fifo";
  if (fileType === 0o140000) return "socket";

  return "non-regular";
}
