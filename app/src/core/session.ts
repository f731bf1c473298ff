/**
 * Wire every service for one workspace root from its .linepatch/config.json.
 */

import type chalk from "chalk";
import { BackupService } from "./backup/BackupService";
import { BatchOperations } from "./batch/BatchOperations";
import { FixLibrary } from "./fixes/FixLibrary";
import { PredefinedFixes } from "./fixes/PredefinedFixes";
import { PatchHistory } from "./history/PatchHistory";
import { PatchEngine } from "./patch/PatchEngine";
import { PatternMatcher } from "./patch/PatternMatcher";
import { PreviewRenderer } from "./preview/PreviewRenderer";
import { readPatchConfig } from "./project/patchConfig";
import type { PatchConfig } from "./types";
import { WorkspaceService } from "./workspace/WorkspaceService";

export interface PatchSession {
  config: PatchConfig;
  workspace: WorkspaceService;
  backups: BackupService;
  engine: PatchEngine;
  history: PatchHistory;
  library: FixLibrary;
  fixes: PredefinedFixes;
  batch: BatchOperations;
  renderer: PreviewRenderer;
}

export interface SessionOptions {
  color?: chalk.Chalk;
  /** Clock for backup stamps and history timestamps */
  now?: () => Date;
}

export async function openSession(root: string, options: SessionOptions = {}): Promise<PatchSession> {
  const config = await readPatchConfig(root);
  const workspace = new WorkspaceService(root, { showHiddenFiles: config.showHiddenFiles });
  const backups = new BackupService(workspace, { rotationCount: config.backupRotationCount, now: options.now });
  const engine = new PatchEngine({ workspace, backups, config, matcher: new PatternMatcher() });
  const history = new PatchHistory(engine, { now: options.now });
  const library = new FixLibrary(workspace);
  await Promise.all([history.load(), library.load()]);

  return {
    config,
    workspace,
    backups,
    engine,
    history,
    library,
    fixes: new PredefinedFixes(library, engine, history, options.now),
    batch: new BatchOperations(engine, history, { now: options.now }),
    renderer: new PreviewRenderer({ color: options.color, maxPreviewLines: config.maxPreviewLines }),
  };
}
