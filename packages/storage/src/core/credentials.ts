/**
 * Credential and region resolution
 *
 * Adapters ask a resolver for credentials (or a region) lazily, right
 * before their first request. How the value is discovered (environment,
 * instance metadata, a bucket probe) is up to the loader; this module
 * only caches it and classifies failures.
 */

import { ErrorKind, StorageError, isStorageError } from "./errors.js";

export interface CredentialResolver<T> {
  resolve(signal?: AbortSignal): Promise<T>;
}

export type ResolverLoader<T> = (signal?: AbortSignal) => Promise<T>;

export interface CachedResolverOptions {
  /** How long a loaded value stays valid (default: 5 minutes) */
  ttlMs?: number;

  /** Label used in error messages */
  name?: string;

  /** Clock, for tests */
  now?: () => number;
}

export const DEFAULT_RESOLVER_TTL_MS = 5 * 60 * 1000;

const AUTH_ERROR_NAMES = new Set([
  "CredentialsProviderError",
  "AccessDenied",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "ExpiredToken",
  "UnrecognizedClientException",
]);

function httpStatusOf(error: object): number | undefined {
  if ("$metadata" in error) {
    const metadata = error.$metadata;
    if (
      typeof metadata === "object" &&
      metadata !== null &&
      "httpStatusCode" in metadata &&
      typeof metadata.httpStatusCode === "number"
    ) {
      return metadata.httpStatusCode;
    }
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Classify a resolution failure
 *
 * Authentication problems become PermissionDenied; anything else (network,
 * metadata endpoint down, timeouts) is Unavailable and therefore retryable.
 */
export function classifyResolutionError(
  error: unknown,
  name = "credentials",
): StorageError {
  if (isStorageError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  let kind: ErrorKind = ErrorKind.Unavailable;

  if (typeof error === "object" && error !== null) {
    const status = httpStatusOf(error);
    const errorName = error instanceof Error ? error.name : undefined;
    if (
      status === 401 ||
      status === 403 ||
      (errorName !== undefined && AUTH_ERROR_NAMES.has(errorName))
    ) {
      kind = ErrorKind.PermissionDenied;
    }
  }

  return new StorageError(
    kind,
    "resolve",
    name,
    `failed to resolve ${name}: ${message}`,
    { cause: error },
  );
}

/**
 * Resolver that loads once, then serves the cached value until it expires
 *
 * Concurrent callers share one in-flight load. Failures are never cached.
 */
export class CachedResolver<T> implements CredentialResolver<T> {
  private cached: { value: T; expiresAt: number } | null = null;
  private inflight: Promise<T> | null = null;
  private readonly ttlMs: number;
  private readonly name: string;
  private readonly now: () => number;

  constructor(
    private readonly load: ResolverLoader<T>,
    options: CachedResolverOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_RESOLVER_TTL_MS;
    this.name = options.name ?? "credentials";
    this.now = options.now ?? Date.now;
  }

  resolve(signal?: AbortSignal): Promise<T> {
    if (this.cached && this.now() < this.cached.expiresAt) {
      return Promise.resolve(this.cached.value);
    }
    if (this.inflight) {
      return this.inflight;
    }

    this.inflight = this.load(signal)
      .then((value) => {
        this.cached = { value, expiresAt: this.now() + this.ttlMs };
        return value;
      })
      .catch((error: unknown) => {
        throw classifyResolutionError(error, this.name);
      })
      .finally(() => {
        this.inflight = null;
      });

    return this.inflight;
  }

  /**
   * Drop the cached value; the next resolve() loads again
   */
  invalidate(): void {
    this.cached = null;
  }
}

/**
 * Resolver for a value known up front
 */
export function staticResolver<T>(value: T): CredentialResolver<T> {
  return {
    resolve: () => Promise.resolve(value),
  };
}
