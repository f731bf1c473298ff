/**
 * PredefinedFixes: find the files a fix targets, preview it, apply it file by
 * file through PatchHistory so every write can be undone.
 */

import type { PatchHistory } from "../history/PatchHistory";
import type { PatchEngine, PatchResult } from "../patch/PatchEngine";
import { PatchError } from "../patch/errors";
import type { PatchRequest } from "../patch/PatchRequest";
import type { PredefinedFix } from "../types";
import type { FixLibrary } from "./FixLibrary";

export interface FixFileResult {
  filePath: string;
  result: PatchResult;
}

export interface FixRun {
  fix: PredefinedFix;
  files: FixFileResult[];
}

export interface FixRecord {
  fixId: string;
  name: string;
  timestamp: string;
  filesAffected: number;
  totalFiles: number;
}

export class PredefinedFixes {
  private applied: FixRecord[] = [];

  constructor(
    readonly library: FixLibrary,
    private readonly engine: PatchEngine,
    private readonly history: PatchHistory,
    private readonly now: () => Date = () => new Date()
  ) {}

  private require(fixId: string): PredefinedFix {
    const fix = this.library.get(fixId);
    if (!fix) throw new PatchError("ValidationFailed", `Unknown fix: ${fixId}`);
    return fix;
  }

  /** The fix's requests, labelled with the fix name where they carry no description. */
  private requests(fix: PredefinedFix): PatchRequest[] {
    return fix.patches.map((p) => ({ ...p, description: p.description ?? `Predefined fix: ${fix.name}` }));
  }

  async targetFiles(fix: PredefinedFix): Promise<string[]> {
    return this.engine.workspace.findFiles(fix.fileGlobPatterns);
  }

  /** Dry run over every target file; nothing is written. */
  async preview(fixId: string): Promise<FixRun> {
    const fix = this.require(fixId);
    const requests = this.requests(fix);
    const files: FixFileResult[] = [];
    for (const filePath of await this.targetFiles(fix)) {
      files.push({ filePath, result: await this.engine.preview(filePath, requests) });
    }
    return { fix, files };
  }

  async apply(fixId: string): Promise<FixRun> {
    const fix = this.require(fixId);
    const requests = this.requests(fix);
    const targets = await this.targetFiles(fix);
    const files: FixFileResult[] = [];
    for (const filePath of targets) {
      files.push({ filePath, result: await this.history.applyAndRecord(filePath, requests) });
    }

    this.applied.push({
      fixId: fix.id,
      name: fix.name,
      timestamp: this.now().toISOString(),
      filesAffected: files.filter((f) => f.result.written).length,
      totalFiles: targets.length,
    });
    return { fix, files };
  }

  appliedFixes(): FixRecord[] {
    return [...this.applied];
  }
}
