import type { SyncErrorKind } from "@/sync/types";

/** Base of every error the sync engine raises on purpose. */
export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
  /** Whether the governor may try the same request again. */
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Signature or timestamp rejected by the remote (401/403). */
export class AuthError extends SyncError {
  readonly kind = "auth";
  readonly retryable = false;

  constructor(readonly status: number, message = `Onshape rejected the request signature (${status})`) {
    super(message);
  }
}

/** The request never produced an HTTP response. */
export class NetworkError extends SyncError {
  readonly kind = "network";
  readonly retryable = true;
}

export class HttpStatusError extends SyncError {
  readonly kind = "http_status";
  readonly retryable: boolean;

  constructor(
    readonly status: number,
    readonly retryAfterMs: number | null = null,
    message = `Onshape API error: ${status}`,
  ) {
    super(message);
    this.retryable = status === 429 || status >= 500;
  }
}

/** A response body that does not have the shape the walker expects. */
export class MalformedResponseError extends SyncError {
  readonly kind = "malformed_response";
  readonly retryable = true;
}

export class ExhaustedError extends SyncError {
  readonly kind: SyncErrorKind = "exhausted";
  readonly retryable = false;

  constructor(readonly attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts: ${describeError(cause)}`, { cause });
  }
}

/** Retries ran out while the remote kept answering 429. */
export class RateLimitExceededError extends ExhaustedError {
  override readonly kind: SyncErrorKind = "rate_limited";
}

export class OrphanedParentError extends SyncError {
  readonly kind = "orphaned_parent";
  readonly retryable = false;

  constructor(readonly entityKey: string, readonly parentKey: string) {
    super("orphaned parent");
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKindOf(error: unknown): SyncErrorKind {
  return error instanceof SyncError ? error.kind : "internal";
}
