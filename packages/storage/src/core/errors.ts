/**
 * Storage error taxonomy
 *
 * Every failure that leaves an accessor is a StorageError carrying one of a
 * closed set of kinds. Adapters translate their native errors at their own
 * boundary with the classifiers below; nothing above the accessor interface
 * looks at SDK or errno types.
 */

/**
 * Closed set of error kinds
 */
export const ErrorKind = {
  NotFound: "NotFound",
  AlreadyExists: "AlreadyExists",
  PermissionDenied: "PermissionDenied",
  InvalidPath: "InvalidPath",
  InvalidInput: "InvalidInput",
  Unsupported: "Unsupported",
  RateLimited: "RateLimited",
  Unavailable: "Unavailable",
  Unexpected: "Unexpected",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Operations an error can be attributed to
 */
export type Operation =
  | "read"
  | "write"
  | "stat"
  | "delete"
  | "list"
  | "createDir"
  | "resolve";

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  ErrorKind.RateLimited,
  ErrorKind.Unavailable,
]);

/**
 * Whether a kind is eligible for automatic re-attempt
 */
export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export interface StorageErrorOptions {
  /** Underlying error, kept for diagnostics */
  cause?: unknown;

  /** Server-provided hint (milliseconds) for RateLimited errors */
  retryAfter?: number;
}

/**
 * The only error type surfaced to callers
 */
export class StorageError extends Error {
  /** Taxonomy kind, for programmatic branching */
  readonly kind: ErrorKind;

  /** Operation that failed */
  readonly operation: Operation;

  /** Normalized path the operation targeted */
  readonly path: string;

  /** Human-readable detail without the operation/path prefix */
  readonly detail: string;

  readonly cause?: unknown;

  readonly retryAfter?: number;

  constructor(
    kind: ErrorKind,
    operation: Operation,
    path: string,
    detail: string,
    options: StorageErrorOptions = {},
  ) {
    super(`${operation} ${path}: ${kind}: ${detail}`);
    this.name = "StorageError";
    this.kind = kind;
    this.operation = operation;
    this.path = path;
    this.detail = detail;
    this.cause = options.cause;
    this.retryAfter = options.retryAfter;

    // Maintain proper stack trace for V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** RateLimited and Unavailable are retryable; nothing else is */
  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }

  /**
   * Same error re-attributed to another operation/path
   */
  withContext(operation: Operation, path: string): StorageError {
    if (operation === this.operation && path === this.path) {
      return this;
    }
    return new StorageError(this.kind, operation, path, this.detail, {
      cause: this.cause,
      retryAfter: this.retryAfter,
    });
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Check if an error is a StorageError of the given kind
 */
export function isErrorKind(error: unknown, kind: ErrorKind): boolean {
  return isStorageError(error) && error.kind === kind;
}

/**
 * Check if an error may be retried
 */
export function isRetryable(error: unknown): boolean {
  return isStorageError(error) && error.retryable;
}

/**
 * Check if an error came from an aborted signal
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Map any thrown value into the taxonomy
 *
 * StorageErrors keep their kind and gain the caller's context; aborts and
 * anything unrecognised become Unexpected.
 */
export function toStorageError(
  error: unknown,
  operation: Operation,
  path: string,
): StorageError {
  if (isStorageError(error)) {
    return error.withContext(operation, path);
  }
  if (isAbortError(error)) {
    return new StorageError(ErrorKind.Unexpected, operation, path, "aborted", {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(ErrorKind.Unexpected, operation, path, message, {
    cause: error,
  });
}

/**
 * Throw the signal's abort reason as an Unexpected StorageError
 */
export function throwIfAborted(
  signal: AbortSignal | undefined,
  operation: Operation,
  path: string,
): void {
  if (signal?.aborted) {
    throw new StorageError(ErrorKind.Unexpected, operation, path, "aborted", {
      cause: signal.reason,
    });
  }
}

// ============================================================================
// Boundary Classifiers
// ============================================================================

/**
 * Classify an HTTP status code returned by an object-store API
 */
export function classifyHttpStatus(status: number): ErrorKind {
  switch (status) {
    case 404:
      return ErrorKind.NotFound;
    case 401:
    case 403:
      return ErrorKind.PermissionDenied;
    case 409:
    case 412:
      return ErrorKind.AlreadyExists;
    case 400:
    case 411:
    case 416:
      return ErrorKind.InvalidInput;
    case 429:
      return ErrorKind.RateLimited;
    case 500:
    case 502:
    case 503:
    case 504:
      return ErrorKind.Unavailable;
    default:
      return ErrorKind.Unexpected;
  }
}

/**
 * Classify a Node.js errno code (`ENOENT`, `EACCES`, ...)
 */
export function classifyErrnoCode(code: string | undefined): ErrorKind {
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
      return ErrorKind.NotFound;
    case "EEXIST":
      return ErrorKind.AlreadyExists;
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return ErrorKind.PermissionDenied;
    case "EISDIR":
    case "ENOTEMPTY":
    case "EINVAL":
    case "ENAMETOOLONG":
      return ErrorKind.InvalidInput;
    case "EAGAIN":
    case "EBUSY":
    case "EMFILE":
    case "ENFILE":
    case "ETIMEDOUT":
    case "ECONNRESET":
      return ErrorKind.Unavailable;
    default:
      return ErrorKind.Unexpected;
  }
}

/**
 * Read the errno code off a Node.js system error
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}
