/**
 * Error taxonomy for the sync engine.
 *
 * Adapters raise AdapterError with a retryable/fatal classification and never retry
 * on their own. The engine translates those into SyncError subclasses scoped to the
 * step that failed; callers decide retry policy from `retryable`.
 */

export type FailureClass = "retryable" | "fatal";

export type SyncErrorKind = "resolution" | "repackaging" | "storage" | "registration" | "timeout";

export interface SyncErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  runId?: string;
}

/**
 * Failure reported by a registry or storage adapter.
 */
export class AdapterError extends Error {
  readonly classification: FailureClass;
  readonly operation: string;
  readonly status?: number;

  constructor(
    operation: string,
    message: string,
    classification: FailureClass,
    options: { cause?: unknown; status?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "AdapterError";
    this.operation = operation;
    this.classification = classification;
    this.status = options.status;
  }

  get retryable(): boolean {
    return this.classification === "retryable";
  }
}

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
  readonly retryable: boolean;
  readonly runId?: string;

  protected constructor(message: string, retryable: boolean, options: SyncErrorOptions) {
    super(message, { cause: options.cause });
    this.retryable = retryable;
    this.runId = options.runId;
  }
}

/** Adapter read failure while resolving state. Always retryable. */
export class ResolutionError extends SyncError {
  readonly kind = "resolution";

  constructor(message: string, options: Omit<SyncErrorOptions, "retryable"> = {}) {
    super(message, true, options);
    this.name = "ResolutionError";
  }
}

/** Malformed or unsupported source artifact. Never retryable. */
export class RepackagingError extends SyncError {
  readonly kind = "repackaging";

  constructor(message: string, options: Omit<SyncErrorOptions, "retryable"> = {}) {
    super(message, false, options);
    this.name = "RepackagingError";
  }
}

/** Artifact store failure. Retryable unless the store classified it fatal. */
export class StorageError extends SyncError {
  readonly kind = "storage";

  constructor(message: string, options: SyncErrorOptions = {}) {
    super(message, options.retryable ?? true, options);
    this.name = "StorageError";
  }
}

/** Target registry write failure. Fatal for authorization, validation or not-found. */
export class RegistrationError extends SyncError {
  readonly kind = "registration";

  constructor(message: string, options: SyncErrorOptions = {}) {
    super(message, options.retryable ?? true, options);
    this.name = "RegistrationError";
  }
}

/** Repackaging exceeded its deadline and was cancelled. Always retryable. */
export class TimeoutError extends SyncError {
  readonly kind = "timeout";

  constructor(message: string, options: Omit<SyncErrorOptions, "retryable"> = {}) {
    super(message, true, options);
    this.name = "TimeoutError";
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classification carried by an unknown error, when it has one.
 * Anything that is neither an AdapterError nor a SyncError is treated as transient.
 */
export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof AdapterError) return err.classification;
  if (err instanceof SyncError) return err.retryable ? "retryable" : "fatal";
  return "retryable";
}

/**
 * Classify an HTTP status returned by a registry API.
 * 408, 429 and 5xx are transient; every other failure is fatal.
 */
export function classifyHttpStatus(status: number): FailureClass {
  if (status === 408 || status === 429 || status >= 500) return "retryable";
  return "fatal";
}

/**
 * Wrap any failure of a store operation as StorageError, keeping its classification.
 */
export function toStorageError(err: unknown, message: string, runId?: string): StorageError {
  if (err instanceof StorageError) return err;
  return new StorageError(`${message}: ${errorMessage(err)}`, {
    cause: err,
    retryable: classifyFailure(err) === "retryable",
    runId,
  });
}

/**
 * Wrap any failure of a target write as RegistrationError, keeping its classification.
 */
export function toRegistrationError(err: unknown, message: string, runId?: string): RegistrationError {
  if (err instanceof RegistrationError) return err;
  return new RegistrationError(`${message}: ${errorMessage(err)}`, {
    cause: err,
    retryable: classifyFailure(err) === "retryable",
    runId,
  });
}
