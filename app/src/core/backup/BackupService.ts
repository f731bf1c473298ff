/**
 * Timestamped file backups under .linepatch/backups/.
 *
 * Name: <path with / and \ replaced by __>.<YYYYMMDD_HHMMSS>[.<n>].bak
 * The optional <n> disambiguates backups taken within the same second.
 */

import { constants as fsConstants } from "node:fs";
import { copyFile, mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { PatchError, errorMessage, toError } from "../patch/errors";
import type { WorkspaceService } from "../workspace/WorkspaceService";

export const BACKUP_DIR = "backups";
export const DEFAULT_ROTATION_COUNT = 10;

const BACKUP_NAME = /^(.+)\.(\d{8}_\d{6})(?:\.(\d+))?\.bak$/;

export interface BackupEntry {
  /** Absolute path of the backup file */
  path: string;
  fileName: string;
  /** Flattened source path, e.g. `src__app.py` */
  source: string;
  stamp: string;
  seq: number;
  size: number;
  modifiedAt: Date;
}

export interface BackupServiceOptions {
  rotationCount?: number;
  /** Clock used for backup stamps */
  now?: () => Date;
}

export function flattenPath(relativePath: string): string {
  return relativePath.replace(/[/\\]/g, "__");
}

export function formatStamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

/** Newest first: stamp, then same-second sequence, then mtime. */
function newestFirst(a: BackupEntry, b: BackupEntry): number {
  if (a.stamp !== b.stamp) return a.stamp < b.stamp ? 1 : -1;
  if (a.seq !== b.seq) return b.seq - a.seq;
  return b.modifiedAt.getTime() - a.modifiedAt.getTime();
}

function isExisting(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "EEXIST";
}

export class BackupService {
  rotationCount: number;
  private readonly now: () => Date;

  constructor(private readonly workspace: WorkspaceService, options: BackupServiceOptions = {}) {
    this.rotationCount = options.rotationCount ?? DEFAULT_ROTATION_COUNT;
    this.now = options.now ?? (() => new Date());
  }

  get directory(): string {
    return path.join(this.workspace.stateDir, BACKUP_DIR);
  }

  /**
   * Copy the file's bytes to a fresh backup, then rotate. Returns the backup path.
   * The copy never replaces an existing backup: a name taken between listing and
   * copying moves on to the next sequence number. A failed rotation only warns.
   */
  async createBackup(filePath: string): Promise<string> {
    const rel = this.workspace.relativePath(filePath);
    let target: string;
    try {
      target = await this.copyToFreshName(filePath, flattenPath(rel), formatStamp(this.now()));
    } catch (e) {
      throw new PatchError("BackupFailure", `Could not back up ${rel}: ${errorMessage(e)}`, toError(e));
    }

    try {
      await this.rotate(rel);
    } catch (e) {
      console.warn(`[BackupService] rotation failed for ${rel}: ${errorMessage(e)}`);
    }
    return target;
  }

  private async copyToFreshName(filePath: string, source: string, stamp: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const existing = await this.existingNames();
    const nameFor = (seq: number) => (seq === 0 ? `${source}.${stamp}.bak` : `${source}.${stamp}.${seq}.bak`);
    let seq = 0;
    while (existing.has(nameFor(seq))) seq++;

    for (;;) {
      const target = path.join(this.directory, nameFor(seq));
      try {
        await copyFile(this.workspace.resolvePath(filePath), target, fsConstants.COPYFILE_EXCL);
        return target;
      } catch (e) {
        if (!isExisting(e)) throw e;
        seq++;
      }
    }
  }

  /** Names currently in the backup directory. */
  protected async existingNames(): Promise<Set<string>> {
    return new Set(await readdir(this.directory));
  }

  /** Keep the newest `rotationCount` backups of a file; returns how many were deleted. */
  async rotate(filePath: string): Promise<number> {
    const backups = await this.listBackups(filePath);
    const stale = backups.slice(Math.max(1, this.rotationCount));
    for (const b of stale) await unlink(b.path);
    return stale.length;
  }

  /** Backups of one file, or of every file when none is given; newest first. */
  async listBackups(filePath?: string): Promise<BackupEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch {
      return [];
    }

    const wanted = filePath === undefined ? null : flattenPath(this.workspace.relativePath(filePath));
    const out: BackupEntry[] = [];
    for (const fileName of names) {
      const m = BACKUP_NAME.exec(fileName);
      if (!m) continue;
      if (wanted !== null && m[1] !== wanted) continue;
      const full = path.join(this.directory, fileName);
      const st = await stat(full);
      out.push({
        path: full,
        fileName,
        source: m[1],
        stamp: m[2],
        seq: m[3] ? Number(m[3]) : 0,
        size: st.size,
        modifiedAt: st.mtime,
      });
    }
    return out.sort(newestFirst);
  }

  async latestBackup(filePath: string): Promise<BackupEntry | null> {
    const all = await this.listBackups(filePath);
    return all[0] ?? null;
  }

  /** Copy a backup over the target file. */
  async restoreFrom(backupPath: string, filePath: string): Promise<void> {
    const target = this.workspace.resolvePath(filePath);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await copyFile(backupPath, target);
    } catch (e) {
      throw new PatchError(
        "WriteFailure",
        `Could not restore ${this.workspace.relativePath(filePath)} from ${path.basename(backupPath)}: ${errorMessage(e)}`,
        toError(e)
      );
    }
  }

  async restoreLatest(filePath: string): Promise<BackupEntry> {
    const latest = await this.latestBackup(filePath);
    if (!latest) {
      throw new PatchError("FileNotFound", `No backups found for ${this.workspace.relativePath(filePath)}`);
    }
    await this.restoreFrom(latest.path, filePath);
    return latest;
  }

  /** Delete backups whose mtime is older than `days`; returns the number deleted. */
  async cleanupOlderThan(days: number): Promise<number> {
    const cutoff = this.now().getTime() - days * 24 * 60 * 60 * 1000;
    let deleted = 0;
    for (const b of await this.listBackups()) {
      if (b.modifiedAt.getTime() >= cutoff) continue;
      try {
        await unlink(b.path);
        deleted++;
      } catch (e) {
        console.warn(`[BackupService] could not delete ${b.fileName}: ${errorMessage(e)}`);
      }
    }
    return deleted;
  }
}
