/**
 * PatchHistory: undo/redo over applied batches.
 * Stored at .linepatch/history.json. Undo restores the backup taken before the
 * batch; redo re-applies the recorded requests through the engine.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { PatchEngine, PatchResult } from "../patch/PatchEngine";
import { PatchError, errorMessage } from "../patch/errors";
import type { PatchRequest } from "../patch/PatchRequest";
import { describePatchRequest, parsePatchRequests } from "../patch/PatchRequest";
import type { HistoryEntry } from "../types";

export const HISTORY_FILE = "history.json";
export const MAX_HISTORY = 100;

const entrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  filePath: z.string(),
  requests: z.array(z.unknown()),
  backupPath: z.string().nullable(),
  successfulCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
});

const historyFileSchema = z.object({
  version: z.literal(1),
  undo: z.array(z.unknown()),
  redo: z.array(z.unknown()),
});

export interface SessionSummary {
  totalOperations: number;
  filesModified: number;
  successfulPatches: number;
  failedPatches: number;
  undoAvailable: number;
  redoAvailable: number;
}

export interface HistoryOptions {
  maxSize?: number;
  now?: () => Date;
}

/** Re-validate one stored entry; its requests go through the same parser as user input. */
function toEntry(raw: unknown): HistoryEntry | null {
  const shape = entrySchema.safeParse(raw);
  if (!shape.success) return null;
  const requests = parsePatchRequests(shape.data.requests);
  if (!requests.ok) return null;
  return { ...shape.data, requests: requests.value };
}

export class PatchHistory {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private saving: Promise<void> = Promise.resolve();
  private readonly maxSize: number;
  private readonly now: () => Date;

  constructor(private readonly engine: PatchEngine, options: HistoryOptions = {}) {
    this.maxSize = options.maxSize ?? MAX_HISTORY;
    this.now = options.now ?? (() => new Date());
  }

  get file(): string {
    return path.join(this.engine.workspace.stateDir, HISTORY_FILE);
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf8");
    } catch {
      this.undoStack = [];
      this.redoStack = [];
      return;
    }

    try {
      const data = historyFileSchema.parse(JSON.parse(raw));
      const keep = (items: unknown[]) => {
        const out: HistoryEntry[] = [];
        for (const item of items) {
          const entry = toEntry(item);
          if (entry) out.push(entry);
          else console.warn("[PatchHistory] skipping malformed history entry");
        }
        return out.slice(-this.maxSize);
      };
      this.undoStack = keep(data.undo);
      this.redoStack = keep(data.redo);
    } catch (e) {
      console.warn(`[PatchHistory] ignoring unreadable ${HISTORY_FILE}: ${errorMessage(e)}`);
      this.undoStack = [];
      this.redoStack = [];
    }
  }

  /** Writes are queued so concurrent records never interleave on disk. */
  async save(): Promise<void> {
    const run = this.saving.then(async () => {
      await mkdir(path.dirname(this.file), { recursive: true });
      const data = { version: 1, undo: this.undoStack, redo: this.redoStack };
      await writeFile(this.file, JSON.stringify(data, null, 2) + "\n", "utf8");
    });
    this.saving = run.catch(() => undefined);
    return run;
  }

  private push(stack: HistoryEntry[], entry: HistoryEntry): void {
    stack.push(entry);
    if (stack.length > this.maxSize) stack.splice(0, stack.length - this.maxSize);
  }

  /** Record a written batch. Anything not on disk is ignored. Clears redo. */
  async record(requests: readonly PatchRequest[], result: PatchResult): Promise<HistoryEntry | null> {
    if (!result.written) return null;
    const entry: HistoryEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      filePath: result.filePath,
      requests: [...requests],
      backupPath: result.backupPath,
      successfulCount: result.successfulCount,
      failedCount: result.failedCount,
    };
    this.push(this.undoStack, entry);
    this.redoStack = [];
    await this.save();
    return entry;
  }

  /** Apply through the engine and record the result. */
  async applyAndRecord(filePath: string, requests: readonly PatchRequest[]): Promise<PatchResult> {
    const result = await this.engine.apply(filePath, requests);
    await this.record(requests, result);
    return result;
  }

  peekUndo(): HistoryEntry | null {
    return this.undoStack[this.undoStack.length - 1] ?? null;
  }

  peekRedo(): HistoryEntry | null {
    return this.redoStack[this.redoStack.length - 1] ?? null;
  }

  /** Restore the file from the latest entry's backup. */
  async undo(): Promise<HistoryEntry> {
    const entry = this.peekUndo();
    if (!entry) throw new PatchError("NothingToUndo", "Nothing to undo");
    if (!entry.backupPath) {
      throw new PatchError("BackupFailure", `No backup was taken for ${entry.filePath}; cannot undo`);
    }
    await this.engine.backups.restoreFrom(entry.backupPath, entry.filePath);
    this.undoStack.pop();
    this.push(this.redoStack, entry);
    await this.save();
    return entry;
  }

  /** Re-apply the most recently undone batch. It goes back on the undo stack only if it wrote. */
  async redo(): Promise<{ entry: HistoryEntry; result: PatchResult }> {
    const entry = this.peekRedo();
    if (!entry) throw new PatchError("NothingToRedo", "Nothing to redo");
    const result = await this.engine.apply(entry.filePath, entry.requests);
    if (!result.written) return { entry, result };

    this.redoStack.pop();
    const redone: HistoryEntry = {
      ...entry,
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      backupPath: result.backupPath,
      successfulCount: result.successfulCount,
      failedCount: result.failedCount,
    };
    this.push(this.undoStack, redone);
    await this.save();
    return { entry: redone, result };
  }

  /** Undo entries, oldest first. */
  entries(): HistoryEntry[] {
    return [...this.undoStack];
  }

  redoEntries(): HistoryEntry[] {
    return [...this.redoStack];
  }

  /** Case-insensitive match on file path or request description. */
  search(query: string): HistoryEntry[] {
    const q = query.toLowerCase();
    return this.undoStack.filter(
      (e) =>
        e.filePath.toLowerCase().includes(q) ||
        e.requests.some((r) => describePatchRequest(r).toLowerCase().includes(q) || (r.description ?? "").toLowerCase().includes(q))
    );
  }

  sessionSummary(): SessionSummary {
    let successfulPatches = 0;
    let failedPatches = 0;
    for (const e of this.undoStack) {
      successfulPatches += e.successfulCount;
      failedPatches += e.failedCount;
    }
    return {
      totalOperations: this.undoStack.length,
      filesModified: new Set(this.undoStack.map((e) => e.filePath)).size,
      successfulPatches,
      failedPatches,
      undoAvailable: this.undoStack.length,
      redoAvailable: this.redoStack.length,
    };
  }

  async clear(): Promise<void> {
    this.undoStack = [];
    this.redoStack = [];
    await this.save();
  }

  async exportTo(targetPath: string): Promise<void> {
    const data = { exportedAt: this.now().toISOString(), summary: this.sessionSummary(), entries: this.undoStack };
    await mkdir(path.dirname(path.resolve(targetPath)), { recursive: true });
    await writeFile(targetPath, JSON.stringify(data, null, 2) + "\n", "utf8");
  }
}
