/**
 * Retry layer
 *
 * Re-invokes operations that fail with a retryable kind (RateLimited,
 * Unavailable), sleeping with capped exponential backoff in between.
 *
 * - Reads resume mid-stream from the first byte not yet delivered.
 * - Listings resume by re-listing and skipping delivered entries.
 * - Writes are retried only when their input reader is restartable;
 *   otherwise a transient failure surfaces as Unexpected.
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  ErrorKind,
  type Operation,
  StorageError,
  isStorageError,
  throwIfAborted,
  toStorageError,
} from "../core/errors.js";
import { noopLogger } from "../core/logger.js";
import type { ObjectId } from "../core/path.js";
import type { BytesRange } from "../core/range.js";
import type {
  Accessor,
  AccessorInfo,
  DirEntry,
  Lister,
  Metadata,
  OpCreateDir,
  OpDelete,
  OpList,
  OpRead,
  OpStat,
  OpWrite,
  Reader,
  RetryPolicy,
  StorageLogger,
} from "../core/types.js";

// ============================================================================
// Backoff Calculation
// ============================================================================

/**
 * Default retry policy
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 4,
  baseDelay: 200, // 200ms before the second attempt
  maxDelay: 10000, // 10 seconds max
  jitter: true,
});

/** Jitter spreads each delay by up to +/-10% */
const JITTER_FACTOR = 0.1;

/**
 * Merge overrides onto the default policy and validate the result
 *
 * @throws StorageError(InvalidInput) for non-positive attempts or negative delays
 */
export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isSafeInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new StorageError(
      ErrorKind.InvalidInput,
      "resolve",
      "",
      `maxAttempts must be a positive integer, got ${policy.maxAttempts}`,
    );
  }
  if (policy.baseDelay < 0 || policy.maxDelay < 0) {
    throw new StorageError(
      ErrorKind.InvalidInput,
      "resolve",
      "",
      "retry delays must not be negative",
    );
  }

  return Object.freeze(policy);
}

/**
 * Delay before the attempt following failed attempt `attempt` (1-based)
 *
 * @example
 * ```typescript
 * const policy = { maxAttempts: 5, baseDelay: 100, maxDelay: 1000, jitter: false };
 * computeRetryDelay(1, policy); // 100
 * computeRetryDelay(2, policy); // 200
 * computeRetryDelay(3, policy); // 400
 * computeRetryDelay(5, policy); // 1000 (capped)
 * ```
 */
export function computeRetryDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  // Ensure attempt is at least 1
  const safeAttempt = Math.max(1, attempt);

  // 2^(attempt-1) * baseDelay: 1x, 2x, 4x, 8x...
  const exponential = 2 ** (safeAttempt - 1) * policy.baseDelay;
  const spread = policy.jitter
    ? exponential * JITTER_FACTOR * (random() * 2 - 1)
    : 0;

  return Math.max(0, Math.min(Math.floor(exponential + spread), policy.maxDelay));
}

function isRetryableStorageError(error: unknown): error is StorageError {
  return isStorageError(error) && error.retryable;
}

// ============================================================================
// Retry Layer
// ============================================================================

export interface RetryLayerOptions {
  /** Policy overrides; unset fields use DEFAULT_RETRY_POLICY */
  policy?: Partial<RetryPolicy>;

  logger?: StorageLogger;

  /** Random source for jitter, in [0, 1) */
  random?: () => number;
}

export class RetryLayer implements Accessor {
  readonly policy: RetryPolicy;
  private readonly logger: StorageLogger;
  private readonly random: () => number;

  constructor(
    private readonly inner: Accessor,
    options: RetryLayerOptions = {},
  ) {
    this.policy = createRetryPolicy(options.policy);
    this.logger = options.logger ?? noopLogger;
    this.random = options.random ?? Math.random;
  }

  info(): AccessorInfo {
    return this.inner.info();
  }

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    const reader = await this.withRetry("read", id, args.signal, () =>
      this.inner.read(id, args),
    );
    if (this.policy.maxAttempts === 1) {
      return reader;
    }
    return new ResumableReader(this, this.inner, id, args, reader);
  }

  async write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    if (reader.restartable) {
      return this.withRetry("write", id, args.signal, () =>
        this.inner.write(id, reader, args),
      );
    }

    try {
      return await this.inner.write(id, reader, args);
    } catch (error) {
      if (isRetryableStorageError(error)) {
        this.logger.warn(
          { operation: "write", path: id.path, kind: error.kind },
          "Transient write failure with non-restartable input, not retrying",
        );
        throw new StorageError(
          ErrorKind.Unexpected,
          "write",
          id.path,
          `transient failure on a non-restartable input: ${error.detail}`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    return this.withRetry("stat", id, args.signal, () =>
      this.inner.stat(id, args),
    );
  }

  delete(id: ObjectId, args: OpDelete): Promise<void> {
    return this.withRetry("delete", id, args.signal, () =>
      this.inner.delete(id, args),
    );
  }

  async list(id: ObjectId, args: OpList): Promise<Lister> {
    const lister = await this.withRetry("list", id, args.signal, () =>
      this.inner.list(id, args),
    );
    if (this.policy.maxAttempts === 1) {
      return lister;
    }
    return new ResumableLister(this, this.inner, id, args, lister);
  }

  createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    return this.withRetry("createDir", id, args.signal, () =>
      this.inner.createDir(id, args),
    );
  }

  /**
   * Run `fn` until it succeeds, fails permanently, or attempts run out
   */
  private async withRetry<T>(
    operation: Operation,
    id: ObjectId,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (
          !isRetryableStorageError(error) ||
          attempt >= this.policy.maxAttempts
        ) {
          throw error;
        }
        await this.pause(operation, id, attempt, error, signal);
      }
    }
  }

  /**
   * Sleep before the next attempt
   *
   * Cancellation is checked before the sleep starts; the sleep itself is
   * abortable too.
   *
   * @internal
   */
  async pause(
    operation: Operation,
    id: ObjectId,
    attempt: number,
    error: StorageError,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    throwIfAborted(signal, operation, id.path);

    let delay = computeRetryDelay(attempt, this.policy, this.random);
    if (error.retryAfter !== undefined) {
      delay = Math.min(Math.max(delay, error.retryAfter), this.policy.maxDelay);
    }

    this.logger.warn(
      {
        operation,
        path: id.path,
        attempt,
        maxAttempts: this.policy.maxAttempts,
        delay,
        kind: error.kind,
      },
      "Retrying after transient failure",
    );

    try {
      await sleep(delay, undefined, { signal });
    } catch (sleepError) {
      throw toStorageError(sleepError, operation, id.path);
    }
  }
}

// ============================================================================
// Resumable Streams
// ============================================================================

function remainingRange(
  range: BytesRange | undefined,
  delivered: number,
): BytesRange {
  const offset = (range?.offset ?? 0) + delivered;
  if (range?.size === undefined) {
    return { offset };
  }
  return { offset, size: Math.max(0, range.size - delivered) };
}

/**
 * Reader that re-opens the object after a transient mid-stream failure,
 * continuing from the first byte not yet delivered
 */
class ResumableReader implements Reader {
  readonly restartable: boolean;
  readonly size?: number;

  constructor(
    private readonly layer: RetryLayer,
    private readonly inner: Accessor,
    private readonly id: ObjectId,
    private readonly args: OpRead,
    private readonly initial: Reader,
  ) {
    this.restartable = initial.restartable;
    this.size = initial.size;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    let current: Reader | undefined = this.initial;
    let delivered = 0;
    let failures = 0;

    while (true) {
      try {
        if (current === undefined) {
          current = await this.inner.read(this.id, {
            signal: this.args.signal,
            range: remainingRange(this.args.range, delivered),
          });
        }
        for await (const chunk of current) {
          delivered += chunk.length;
          yield chunk;
        }
        return;
      } catch (error) {
        failures += 1;
        if (
          !isRetryableStorageError(error) ||
          failures >= this.layer.policy.maxAttempts
        ) {
          throw error;
        }
        await this.layer.pause(
          "read",
          this.id,
          failures,
          error,
          this.args.signal,
        );
        current = undefined;
      }
    }
  }
}

/**
 * Lister that re-lists after a transient failure and skips the entries it
 * already delivered
 */
class ResumableLister implements Lister {
  constructor(
    private readonly layer: RetryLayer,
    private readonly inner: Accessor,
    private readonly id: ObjectId,
    private readonly args: OpList,
    private readonly initial: Lister,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<DirEntry> {
    let current: Lister | undefined = this.initial;
    let delivered = 0;
    let failures = 0;

    while (true) {
      try {
        if (current === undefined) {
          current = await this.inner.list(this.id, this.args);
        }
        let skip = delivered;
        for await (const entry of current) {
          if (skip > 0) {
            skip -= 1;
            continue;
          }
          delivered += 1;
          yield entry;
        }
        return;
      } catch (error) {
        failures += 1;
        if (
          !isRetryableStorageError(error) ||
          failures >= this.layer.policy.maxAttempts
        ) {
          throw error;
        }
        await this.layer.pause(
          "list",
          this.id,
          failures,
          error,
          this.args.signal,
        );
        current = undefined;
      }
    }
  }
}
