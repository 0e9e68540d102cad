/**
 * errors.ts - Error taxonomy for the retrieval service
 *
 * Every failure the core raises is a RetrievalError with a stable `kind` and
 * a `retryable` flag, so a caller can decide between backing off and giving
 * up without parsing messages. The underlying client error (Voyage AI,
 * Chroma) is kept on `cause`.
 *
 * | kind                  | retryable | raised when                                |
 * |-----------------------|-----------|--------------------------------------------|
 * | InvalidInput          | no        | caller data breaks a precondition          |
 * | RateLimited           | yes       | the embedding provider throttled us        |
 * | ProviderFailure       | no        | any other embedding provider failure       |
 * | CollectionUnavailable | no        | the collection could not be confirmed      |
 * | StorageWriteError     | no        | upsert or delete rejected by the store     |
 * | StorageReadError      | no        | search or count rejected by the store      |
 * | ContractViolation     | no        | a client returned malformed data           |
 * | Timeout               | yes       | a network call exceeded its deadline       |
 */

export type ErrorKind =
  | "InvalidInput"
  | "RateLimited"
  | "ProviderFailure"
  | "CollectionUnavailable"
  | "StorageWriteError"
  | "StorageReadError"
  | "ContractViolation"
  | "Timeout";

/**
 * Base class for every error the core raises.
 */
export class RetrievalError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(
    kind: ErrorKind,
    message: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
  }
}

export class InvalidInputError extends RetrievalError {
  constructor(message: string) {
    super("InvalidInput", message);
  }
}

/**
 * Failure reported by the embedding provider. Use the subclasses; the base
 * exists so callers can catch both with one instanceof check.
 */
export class EmbeddingProviderError extends RetrievalError {}

export class RateLimitedError extends EmbeddingProviderError {
  constructor(message: string, cause?: unknown) {
    super("RateLimited", message, { retryable: true, cause });
  }
}

export class ProviderFailureError extends EmbeddingProviderError {
  /** HTTP status from the provider, when there was one */
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super("ProviderFailure", message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
  }
}

export class CollectionUnavailableError extends RetrievalError {
  readonly collection: string;

  constructor(collection: string, message: string, cause?: unknown) {
    super("CollectionUnavailable", message, { cause });
    this.collection = collection;
  }
}

export class StorageWriteError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super("StorageWriteError", message, { cause });
  }
}

export class StorageReadError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super("StorageReadError", message, { cause });
  }
}

export class ContractViolationError extends RetrievalError {
  constructor(message: string) {
    super("ContractViolation", message);
  }
}

export class TimeoutError extends RetrievalError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("Timeout", `${operation} timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised at startup when the environment is missing or has invalid settings.
 * Not a RetrievalError: it never reaches an operation's caller.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Whether a caller may retry the failed call after backing off.
 * Unknown errors are treated as not retryable.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof RetrievalError && error.retryable;
}

/**
 * Reads the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorSummary {
  kind: ErrorKind | "Internal";
  message: string;
  retryable: boolean;
}

/**
 * Flattens a thrown value into the structured detail front-ends report.
 */
export function toErrorSummary(error: unknown): ErrorSummary {
  if (error instanceof RetrievalError) {
    return { kind: error.kind, message: error.message, retryable: error.retryable };
  }
  return { kind: "Internal", message: errorMessage(error), retryable: false };
}
