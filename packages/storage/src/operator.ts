/**
 * Operator - the public front door of the storage layer
 *
 * Builds the accessor stack once (retry -> range -> backend) and exposes
 * one method per logical operation. Every method normalizes its path,
 * checks the backend's capability set before any I/O, dispatches through
 * the stack, and returns either a typed result or a StorageError.
 *
 * ```typescript
 * const op = new Operator(new MemoryAccessor());
 * await op.write("a/c/file", "0123456789");
 * await op.stat("a/c/file"); // { isDirectory: false, size: 10, ... }
 * for await (const entry of await op.list("a/c/")) console.log(entry.id.path);
 * ```
 */

import {
  assertCapability,
  assertDirectory,
  assertObject,
} from "./core/capability.js";
import {
  ErrorKind,
  type Operation,
  StorageError,
  isErrorKind,
  toStorageError,
} from "./core/errors.js";
import { noopLogger } from "./core/logger.js";
import { type ObjectId, normalizePath } from "./core/path.js";
import { type BytesRange, validateRange } from "./core/range.js";
import type {
  Accessor,
  AccessorInfo,
  DirEntry,
  Lister,
  Metadata,
  Reader,
  RetryPolicy,
  StorageLogger,
  Writer,
} from "./core/types.js";
import { readAll, toReader, type WriteInput } from "./io/reader.js";
import { BufferedWriter } from "./io/writer.js";
import { RangeLayer } from "./layers/range.js";
import { RetryLayer } from "./layers/retry.js";

export interface OperatorOptions {
  /** Retry policy overrides */
  retry?: Partial<RetryPolicy>;

  logger?: StorageLogger;

  /** Random source for retry jitter, in [0, 1) */
  random?: () => number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ReadOptions extends CallOptions {
  range?: BytesRange;
}

export interface WriteOptions extends CallOptions {
  /** Expected byte count; the write fails InvalidInput on a mismatch */
  sizeHint?: number;

  contentType?: string;
}

const decoder = new TextDecoder();

export class Operator {
  private readonly accessor: Accessor;
  private readonly logger: StorageLogger;

  constructor(backend: Accessor, options: OperatorOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.accessor = new RetryLayer(new RangeLayer(backend), {
      policy: options.retry,
      logger: this.logger,
      random: options.random,
    });

    const info = backend.info();
    this.logger.debug(
      { scheme: info.scheme, root: info.root, name: info.name },
      "Operator initialized",
    );
  }

  /** Retry policy in effect */
  get retryPolicy(): RetryPolicy {
    if (this.accessor instanceof RetryLayer) {
      return this.accessor.policy;
    }
    throw new StorageError(
      ErrorKind.Unexpected,
      "resolve",
      "/",
      "operator stack has no retry layer",
    );
  }

  info(): AccessorInfo {
    return this.accessor.info();
  }

  // ---- Read Operations ----

  /**
   * Open an object for streaming
   *
   * Errors raised while iterating the reader are StorageErrors too.
   */
  read(path: string, options: ReadOptions = {}): Promise<Reader> {
    return this.dispatch("read", path, async (id) => {
      assertObject("read", id);
      assertCapability(this.info(), "read", "read", id);
      const range =
        options.range === undefined ? undefined : validateRange(options.range);
      const reader = await this.accessor.read(id, {
        range,
        signal: options.signal,
      });
      return withReaderContext(reader, id);
    });
  }

  /**
   * Read a whole object (or range) into memory
   */
  async readBytes(path: string, options: ReadOptions = {}): Promise<Uint8Array> {
    const reader = await this.read(path, options);
    try {
      return await readAll(reader, options.signal, path);
    } catch (error) {
      throw toStorageError(error, "read", normalizePath(path).path);
    }
  }

  /**
   * Read a whole object (or range) as UTF-8 text
   */
  async readText(path: string, options: ReadOptions = {}): Promise<string> {
    return decoder.decode(await this.readBytes(path, options));
  }

  /**
   * Get object metadata
   *
   * @throws StorageError(NotFound) if the object does not exist
   */
  stat(path: string, options: CallOptions = {}): Promise<Metadata> {
    return this.dispatch("stat", path, (id) => {
      assertCapability(this.info(), "stat", "stat", id);
      return this.accessor.stat(id, { signal: options.signal });
    });
  }

  /**
   * Check if an object exists
   */
  async exists(path: string, options: CallOptions = {}): Promise<boolean> {
    try {
      await this.stat(path, options);
      return true;
    } catch (error) {
      if (isErrorKind(error, ErrorKind.NotFound)) {
        return false;
      }
      throw error;
    }
  }

  // ---- Write Operations ----

  /**
   * Write an object from a buffer, string, stream or Reader
   *
   * Strings, buffers and restartable readers are retried on transient
   * failures; single-pass streams are not.
   */
  write(
    path: string,
    input: WriteInput,
    options: WriteOptions = {},
  ): Promise<Metadata> {
    return this.dispatch("write", path, (id) => {
      assertObject("write", id);
      const info = this.info();
      assertCapability(info, "write", "write", id);

      const reader = toReader(input, options.sizeHint);
      if (
        options.sizeHint !== undefined &&
        reader.size !== undefined &&
        options.sizeHint !== reader.size
      ) {
        throw new StorageError(
          ErrorKind.InvalidInput,
          "write",
          id.path,
          `size hint ${options.sizeHint} does not match content size ${reader.size}`,
        );
      }

      const size = options.sizeHint ?? reader.size;
      const limit = info.capability.maxRequestSize;
      if (limit !== undefined && size !== undefined && size > limit) {
        throw new StorageError(
          ErrorKind.InvalidInput,
          "write",
          id.path,
          `${size} bytes exceeds the ${limit} byte request limit`,
        );
      }

      return this.accessor.write(id, reader, {
        sizeHint: options.sizeHint,
        contentType: options.contentType,
        signal: options.signal,
      });
    });
  }

  /**
   * Open a buffered writer; the object appears when the writer is closed
   */
  writer(path: string, options: WriteOptions = {}): Writer {
    let id: ObjectId;
    try {
      id = normalizePath(path);
      assertObject("write", id);
      assertCapability(this.info(), "write", "write", id);
    } catch (error) {
      throw toStorageError(error, "write", path);
    }
    return new BufferedWriter(
      (reader) =>
        this.write(id.path, reader, {
          contentType: options.contentType,
          signal: options.signal,
        }),
      id.path,
    );
  }

  /**
   * Create a directory marker
   *
   * No-op if the directory already exists.
   */
  createDir(path: string, options: CallOptions = {}): Promise<void> {
    return this.dispatch("createDir", path, (id) => {
      assertDirectory("createDir", id);
      assertCapability(this.info(), "createDir", "createDir", id);
      return this.accessor.createDir(id, { signal: options.signal });
    });
  }

  // ---- Delete Operations ----

  /**
   * Delete an object
   *
   * No-op if the object doesn't exist (does not throw).
   */
  delete(path: string, options: CallOptions = {}): Promise<void> {
    return this.dispatch("delete", path, (id) => {
      assertCapability(this.info(), "delete", "delete", id);
      return this.accessor.delete(id, { signal: options.signal });
    });
  }

  // ---- List Operations ----

  /**
   * List the direct children of a directory
   *
   * The lister is lazy: pages are fetched as the caller iterates.
   */
  list(path: string, options: CallOptions = {}): Promise<Lister> {
    return this.dispatch("list", path, async (id) => {
      assertDirectory("list", id);
      assertCapability(this.info(), "list", "list", id);
      const lister = await this.accessor.list(id, { signal: options.signal });
      return withListerContext(lister, id);
    });
  }

  /**
   * Normalize, run, and map every failure into the taxonomy
   */
  private async dispatch<T>(
    operation: Operation,
    path: string,
    fn: (id: ObjectId) => Promise<T>,
  ): Promise<T> {
    let id: ObjectId;
    try {
      id = normalizePath(path);
    } catch (error) {
      throw toStorageError(error, operation, path);
    }

    try {
      return await fn(id);
    } catch (error) {
      const storageError = toStorageError(error, operation, id.path);
      this.logger.debug(
        { operation, path: id.path, kind: storageError.kind },
        "Operation failed",
      );
      throw storageError;
    }
  }
}

function withReaderContext(reader: Reader, id: ObjectId): Reader {
  return {
    restartable: reader.restartable,
    size: reader.size,
    async *[Symbol.asyncIterator]() {
      try {
        yield* reader;
      } catch (error) {
        throw toStorageError(error, "read", id.path);
      }
    },
  };
}

function withListerContext(lister: Lister, id: ObjectId): Lister {
  return {
    async *[Symbol.asyncIterator](): AsyncGenerator<DirEntry> {
      try {
        yield* lister;
      } catch (error) {
        throw toStorageError(error, "list", id.path);
      }
    },
  };
}
