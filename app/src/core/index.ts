export * from "./types";
export { PatchError, errorMessage, toError } from "./patch/errors";
export type { PatchErrorCode, PatchErrorInfo } from "./patch/errors";
export {
  PATCH_REQUEST_KINDS,
  describePatchRequest,
  isPatternRequest,
  isRangeRequest,
  parsePatchRequest,
  parsePatchRequests,
  patchAnchor,
  patchPhase,
} from "./patch/PatchRequest";
export type {
  AppendRequest,
  DeleteRangeRequest,
  InsertAfterRequest,
  InsertAtLineRequest,
  InsertBeforeRequest,
  PatchPhase,
  PatchRequest,
  PatchRequestKind,
  ReplacePatternAllRequest,
  ReplacePatternRequest,
  ReplaceRangeRequest,
} from "./patch/PatchRequest";
export { PatternMatcher, fuzzySearch, similarity, escapeRegex, wordPattern } from "./patch/PatternMatcher";
export type { MatchInfo, MultilineMatch, CodeBlock, FuzzyHit } from "./patch/PatternMatcher";
export { applyIndent, detectContextIndent, detectIndentStyle, detectLineIndent } from "./patch/indentation";
export { detectConflicts, validateBatch, validatePatchRequest, validateRawPatchRequest } from "./patch/PatchValidator";
export type { PatchConflict } from "./patch/PatchValidator";
export { PatchEngine, applyPatchRequests, applicationOrder } from "./patch/PatchEngine";
export type { ApplyOptions, PatchOutcome, PatchResult } from "./patch/PatchEngine";
export { unifiedDiff, diffStats, writePatchFile } from "./patch/diff";
export { BackupService } from "./backup/BackupService";
export type { BackupEntry } from "./backup/BackupService";
export { WorkspaceService } from "./workspace/WorkspaceService";
export { splitLines, joinLines } from "./workspace/lineBuffer";
export {
  DEFAULT_CONFIG,
  readPatchConfig,
  writePatchConfig,
  setConfigValue,
  resetPatchConfig,
} from "./project/patchConfig";
export { PatchHistory } from "./history/PatchHistory";
export type { SessionSummary } from "./history/PatchHistory";
export { FixLibrary } from "./fixes/FixLibrary";
export { PredefinedFixes } from "./fixes/PredefinedFixes";
export { BatchOperations } from "./batch/BatchOperations";
export type { BatchSummary, WorkspaceAnalysis } from "./batch/BatchOperations";
export { PreviewRenderer } from "./preview/PreviewRenderer";
export { openSession } from "./session";
export type { PatchSession } from "./session";
