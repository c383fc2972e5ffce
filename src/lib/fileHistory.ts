import type { SqliteDb } from "../db/db.js";
import { getFileVersionByNumber, latestVersionNumber, recordFileVersion } from "../db/fileVersions.js";
import type { FileVersion } from "../db/types.js";
import { readUploadFile, writeUploadFile } from "./artifact.js";
import { NotFound } from "./errors.js";
import { diffLines, type LineDiff } from "./fileDiff.js";

export type FileChange = {
  upload_path: string;
  upload_id: string;
  project_id: string;
  file_path: string;
  content: string;
  change_summary: string;
  edited_by: string;
  original_scan_id?: string | null;
};

export type AppliedChange = {
  version: FileVersion;
  original_recorded: boolean;
  absolute_path: string;
};

/**
 * Writes new content into an uploaded file and records it as the next version. The
 * content on disk is stored as version 1 first when the file has no history yet.
 */
export function applyFileChange(db: SqliteDb, change: FileChange, now_ms?: number): AppliedChange {
  const current = readUploadFile(change.upload_path, change.file_path);
  let original_recorded = false;
  if (latestVersionNumber(db, change.upload_id, change.file_path) === 0) {
    recordFileVersion(
      db,
      {
        upload_id: change.upload_id,
        project_id: change.project_id,
        file_path: change.file_path,
        content: current,
        scan_id: change.original_scan_id ?? null,
        change_summary: "Initial upload",
        edited_by: null
      },
      now_ms
    );
    original_recorded = true;
  }
  const version = recordFileVersion(
    db,
    {
      upload_id: change.upload_id,
      project_id: change.project_id,
      file_path: change.file_path,
      content: change.content,
      change_summary: change.change_summary,
      edited_by: change.edited_by
    },
    now_ms
  );
  const absolute_path = writeUploadFile(change.upload_path, change.file_path, change.content);
  return { version, original_recorded, absolute_path };
}

export function restoreFileVersion(db: SqliteDb, args: { version: FileVersion; upload_path: string }, now_ms?: number): AppliedChange {
  return applyFileChange(
    db,
    {
      upload_path: args.upload_path,
      upload_id: args.version.upload_id,
      project_id: args.version.project_id,
      file_path: args.version.file_path,
      content: args.version.content,
      change_summary: `Restore to v${args.version.version_number}`,
      edited_by: "restore"
    },
    now_ms
  );
}

export type VersionDiff = LineDiff & {
  file_path: string;
  from_version: number;
  to_version: number;
};

export function diffFileVersions(db: SqliteDb, args: { upload_id: string; file_path: string; from: number; to: number }): VersionDiff {
  const from = getFileVersionByNumber(db, args.upload_id, args.file_path, args.from);
  const to = getFileVersionByNumber(db, args.upload_id, args.file_path, args.to);
  if (!from || !to) {
    throw new NotFound(`file version not found for ${args.file_path}`);
  }
  return {
    file_path: args.file_path,
    from_version: from.version_number,
    to_version: to.version_number,
    ...diffLines(from.content, to.content)
  };
}
