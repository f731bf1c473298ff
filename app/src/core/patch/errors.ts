export type PatchErrorCode =
  | "InvalidPattern"
  | "PatternNotFound"
  | "PatternNotFoundAtHint"
  | "OutOfRange"
  | "MissingField"
  | "WriteFailure"
  | "BackupFailure"
  | "ValidationFailed"
  | "NoChangesApplied"
  | "FileNotFound"
  | "ReadFailure"
  | "ConfigInvalid"
  | "NothingToUndo"
  | "NothingToRedo"
  | "Unsupported";

/** Plain-data form of a PatchError, safe to serialize into results and history. */
export interface PatchErrorInfo {
  code: PatchErrorCode;
  message: string;
}

export class PatchError extends Error {
  readonly code: PatchErrorCode;

  constructor(code: PatchErrorCode, message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = "PatchError";
    this.code = code;
  }

  toInfo(): PatchErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
