import type { CategoryKind } from "@/sync/types";

export type SyncErrorCode =
  | "NORMALIZATION"
  | "BASE_DATA_CONFLICT"
  | "EXTERNAL_WRITE"
  | "PREREQUISITE";

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SyncError";
  }
}

/** A raw record is missing a required field or carries a value that cannot be parsed. */
export class NormalizationError extends SyncError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message, "NORMALIZATION");
    this.name = "NormalizationError";
  }
}

export class BaseDataConflictError extends SyncError {
  constructor(
    public readonly kind: CategoryKind,
    public readonly rawValue: string,
  ) {
    super(`No ${kind} in the external dropdown matches "${rawValue}"`, "BASE_DATA_CONFLICT");
    this.name = "BaseDataConflictError";
  }
}

export class ExternalWriteError extends SyncError {
  constructor(
    public readonly operation: "insert" | "update",
    message: string,
    public readonly externalId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, "EXTERNAL_WRITE", options);
    this.name = "ExternalWriteError";
  }
}

/** One of the fetches every classification depends on failed; the run cannot continue. */
export class PrerequisiteError extends SyncError {
  constructor(
    public readonly prerequisite: "databaseEvents" | "externalEvents" | "dropdowns" | "whitelist",
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? "unknown error");
    super(`Failed to fetch ${prerequisite}: ${reason}`, "PREREQUISITE", options);
    this.name = "PrerequisiteError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
