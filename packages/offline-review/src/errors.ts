import type { CommandFailure } from "./types.js";

export type AnchorErrorKind = "FileNotInDiff" | "LineOutsideHunk" | "AmbiguousRange" | "StaleAnchor";

export type BackendErrorKind = "AuthError" | "RateLimited" | "ValidationError" | "TransientNetworkError";

export type ReviewErrorKind =
  | AnchorErrorKind
  | BackendErrorKind
  | "NotFoundError"
  | "LocalStorageError"
  | "CommentAlreadySubmitted"
  | "InvalidLineSpec"
  | "ConfigError"
  | "GitError"
  | "PublishInProgress"
  | "EmptyReview";

export class ReviewError extends Error {
  readonly kind: ReviewErrorKind;

  constructor(kind: ReviewErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
  }
}

export class NotFoundError extends ReviewError {
  constructor(message: string) {
    super("NotFoundError", message);
  }
}

export class LocalStorageError extends ReviewError {
  readonly file: string;

  constructor(file: string, message: string, cause?: unknown) {
    super("LocalStorageError", message, { cause });
    this.file = file;
  }
}

export class ConfigError extends ReviewError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}

export class AnchorError extends ReviewError {
  declare readonly kind: AnchorErrorKind;
  /** For `StaleAnchor`, the resolution failure that made the anchor stale, if any. */
  readonly reason?: AnchorErrorKind;

  constructor(kind: AnchorErrorKind, message: string, reason?: AnchorErrorKind) {
    super(kind, message);
    this.reason = reason;
  }
}

export class BackendError extends ReviewError {
  declare readonly kind: BackendErrorKind;
  readonly status?: number;
  /** Server-requested wait before retrying, in milliseconds. */
  readonly retryAfterMs?: number;

  constructor(kind: BackendErrorKind, message: string, details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super(kind, message, { cause: details.cause });
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }

  get retryable(): boolean {
    return this.kind === "RateLimited" || this.kind === "TransientNetworkError";
  }
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError;
}

export function toCommandFailure(error: unknown): CommandFailure {
  if (isReviewError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "InternalError", message: error instanceof Error ? error.message : String(error) };
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Process exit status for a failure: 3 for credentials, 2 when a later run may succeed, 1 otherwise. */
export function exitCodeFor(kind: string): number {
  switch (kind) {
    case "AuthError":
      return 3;
    case "RateLimited":
    case "TransientNetworkError":
    case "ValidationError":
      return 2;
    default:
      return 1;
  }
}
