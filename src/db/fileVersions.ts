import { v4 as uuidv4 } from "uuid";
import type { SqliteDb } from "./db.js";
import { nowMs, sha256Hex } from "./repo.js";
import type { FileVersion } from "./types.js";

export type RecordFileVersionInput = {
  upload_id: string;
  project_id: string;
  file_path: string;
  content: string;
  scan_id?: string | null;
  change_summary?: string | null;
  edited_by?: string | null;
};

export function latestVersionNumber(db: SqliteDb, upload_id: string, file_path: string): number {
  const row = db
    .prepare<unknown[], { v: number | null }>(`SELECT MAX(version_number) AS v FROM file_versions WHERE upload_id=? AND file_path=?`)
    .get(upload_id, file_path);
  return row?.v ?? 0;
}

export function recordFileVersion(db: SqliteDb, input: RecordFileVersionInput, now_ms: number = nowMs()): FileVersion {
  const tx = db.transaction((): FileVersion => {
    const version: FileVersion = {
      version_id: uuidv4(),
      upload_id: input.upload_id,
      project_id: input.project_id,
      file_path: input.file_path,
      content: input.content,
      content_hash: sha256Hex(input.content),
      version_number: latestVersionNumber(db, input.upload_id, input.file_path) + 1,
      scan_id: input.scan_id ?? null,
      change_summary: input.change_summary ?? null,
      edited_by: input.edited_by ?? null,
      created_at: now_ms
    };
    db.prepare(
      `INSERT INTO file_versions (version_id,upload_id,project_id,file_path,content,content_hash,version_number,scan_id,change_summary,edited_by,created_at)
       VALUES (@version_id,@upload_id,@project_id,@file_path,@content,@content_hash,@version_number,@scan_id,@change_summary,@edited_by,@created_at)`
    ).run(version);
    return version;
  });
  return tx.immediate();
}

export function getFileVersion(db: SqliteDb, version_id: string): FileVersion | null {
  return db.prepare<unknown[], FileVersion>(`SELECT * FROM file_versions WHERE version_id=?`).get(version_id) ?? null;
}

export function getFileVersionByNumber(db: SqliteDb, upload_id: string, file_path: string, version_number: number): FileVersion | null {
  return (
    db
      .prepare<unknown[], FileVersion>(`SELECT * FROM file_versions WHERE upload_id=? AND file_path=? AND version_number=?`)
      .get(upload_id, file_path, version_number) ?? null
  );
}

export function listFileVersions(db: SqliteDb, upload_id: string, file_path?: string): FileVersion[] {
  if (file_path) {
    return db
      .prepare<unknown[], FileVersion>(`SELECT * FROM file_versions WHERE upload_id=? AND file_path=? ORDER BY version_number DESC`)
      .all(upload_id, file_path);
  }
  return db
    .prepare<unknown[], FileVersion>(`SELECT * FROM file_versions WHERE upload_id=? ORDER BY file_path ASC, version_number DESC`)
    .all(upload_id);
}
