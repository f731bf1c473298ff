/** Shared types for linepatch core. */

import type { PatchRequest } from "./patch/PatchRequest";

export interface DirEntry {
  name: string;
  isDir: boolean;
  size: number;
}

export interface DirectoryListing {
  path: string;
  directories: DirEntry[];
  files: DirEntry[];
}

export type LineEnding = "\n" | "\r\n";

/** How a file's lines were terminated on disk; reproduced on write. */
export interface LineFormat {
  eol: LineEnding;
  trailingNewline: boolean;
}

export interface FileInfo {
  /** Absolute path */
  path: string;
  /** Workspace-relative path, forward slashes */
  relativePath: string;
  size: number;
  lineCount: number;
  extension: string;
  language: string;
  /** md5 of the raw bytes, for change detection */
  hash: string;
  modifiedAt: string;
  format: LineFormat;
}

/** File info plus its current line buffer. */
export interface LoadedFile {
  info: FileInfo;
  lines: string[];
}

/** Workspace config stored at .linepatch/config.json */
export interface PatchConfig {
  autoBackup: boolean;
  /** Advisory to callers; the engine never prompts. */
  confirmApplications: boolean;
  maxPreviewLines: number;
  enableSyntaxHints: boolean;
  backupKeepDays: number;
  showHiddenFiles: boolean;
  enableAdvancedFeatures: boolean;
  backupRotationCount: number;
  diffContextLines: number;
  /** When set, a failed backup aborts the write instead of continuing without one. */
  requireBackup: boolean;
  /** Files larger than this are refused before they are read. */
  maxFileSizeMb: number;
}

export type FixSeverity = "low" | "medium" | "high" | "critical";

/** A named, reusable bundle of patch requests plus the globs it targets. */
export interface PredefinedFix {
  id: string;
  name: string;
  description: string;
  category: string;
  severity: FixSeverity;
  fileGlobPatterns: string[];
  patches: PatchRequest[];
  author?: string;
  version?: string;
}

/** One undoable apply, as stored in .linepatch/history.json */
export interface HistoryEntry {
  id: string;
  timestamp: string;
  filePath: string;
  requests: PatchRequest[];
  backupPath: string | null;
  successfulCount: number;
  failedCount: number;
}

export interface BatchFileResult {
  filePath: string;
  /** False only on a read, validation, backup or write failure */
  ok: boolean;
  changed: boolean;
  successfulCount: number;
  failedCount: number;
  /** Lines touched; replace_pattern_all counts every location */
  changes: number;
  error?: string;
}

export type BatchOperationKind = "find_replace" | "apply_patches";

export interface BatchRecord {
  kind: BatchOperationKind;
  timestamp: string;
  label: string;
  filesProcessed: number;
  filesChanged: number;
  changesApplied: number;
}
