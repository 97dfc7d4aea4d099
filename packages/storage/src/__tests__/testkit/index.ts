/**
 * Test helpers shared by the storage test suites
 */

import { expect } from "vitest";
import {
  type ErrorKind,
  StorageError,
  type StorageErrorOptions,
  isStorageError,
} from "../../core/errors.js";
import type { ObjectId } from "../../core/path.js";
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
  StorageLogger,
} from "../../core/types.js";
import { MemoryAccessor } from "../../adapters/memory/index.js";

export type OpName = "read" | "write" | "stat" | "delete" | "list" | "createDir";

interface StreamFailure {
  after: number;
  kind: ErrorKind;
}

/**
 * Accessor that counts calls and fails on demand before delegating
 *
 * - `failNext(op, kind, times)` makes the next calls throw up front
 * - `breakReadsAfter(bytes, kind)` makes the next reader fail mid-stream
 * - `breakListsAfter(entries, kind)` does the same for listers
 */
export class FlakyAccessor implements Accessor {
  readonly calls: Record<OpName, number> = {
    read: 0,
    write: 0,
    stat: 0,
    delete: 0,
    list: 0,
    createDir: 0,
  };
  readonly readArgs: OpRead[] = [];

  private readonly failures = new Map<OpName, StorageError[]>();
  private readonly readFailures: StreamFailure[] = [];
  private readonly listFailures: StreamFailure[] = [];

  constructor(readonly inner: Accessor = new MemoryAccessor()) {}

  failNext(
    op: OpName,
    kind: ErrorKind,
    times = 1,
    options: StorageErrorOptions = {},
  ): this {
    const queue = this.failures.get(op) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(new StorageError(kind, op, "", "injected failure", options));
    }
    this.failures.set(op, queue);
    return this;
  }

  breakReadsAfter(bytes: number, kind: ErrorKind, times = 1): this {
    for (let i = 0; i < times; i++) {
      this.readFailures.push({ after: bytes, kind });
    }
    return this;
  }

  breakListsAfter(entries: number, kind: ErrorKind, times = 1): this {
    for (let i = 0; i < times; i++) {
      this.listFailures.push({ after: entries, kind });
    }
    return this;
  }

  private take(op: OpName, id: ObjectId): void {
    this.calls[op] += 1;
    const failure = this.failures.get(op)?.shift();
    if (failure) {
      throw failure.withContext(op, id.path);
    }
  }

  info(): AccessorInfo {
    return this.inner.info();
  }

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    this.readArgs.push(args);
    this.take("read", id);
    const reader = await this.inner.read(id, args);

    const failure = this.readFailures.shift();
    if (!failure) {
      return reader;
    }

    return {
      restartable: reader.restartable,
      size: reader.size,
      async *[Symbol.asyncIterator]() {
        let sent = 0;
        for await (const chunk of reader) {
          const room = failure.after - sent;
          if (chunk.length >= room) {
            if (room > 0) {
              yield chunk.subarray(0, room);
            }
            throw new StorageError(failure.kind, "read", id.path, "connection reset");
          }
          sent += chunk.length;
          yield chunk;
        }
      },
    };
  }

  async write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    this.take("write", id);
    return this.inner.write(id, reader, args);
  }

  async stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    this.take("stat", id);
    return this.inner.stat(id, args);
  }

  async delete(id: ObjectId, args: OpDelete): Promise<void> {
    this.take("delete", id);
    return this.inner.delete(id, args);
  }

  async list(id: ObjectId, args: OpList): Promise<Lister> {
    this.take("list", id);
    const lister = await this.inner.list(id, args);

    const failure = this.listFailures.shift();
    if (!failure) {
      return lister;
    }

    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<DirEntry> {
        let sent = 0;
        for await (const entry of lister) {
          if (sent === failure.after) {
            throw new StorageError(failure.kind, "list", id.path, "connection reset");
          }
          sent += 1;
          yield entry;
        }
      },
    };
  }

  async createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    this.take("createDir", id);
    return this.inner.createDir(id, args);
  }
}

/**
 * Logger that keeps every call for assertions
 */
export class RecordingLogger implements StorageLogger {
  readonly records: { level: string; obj: object; msg?: string }[] = [];

  debug(obj: object, msg?: string): void {
    this.records.push({ level: "debug", obj, msg });
  }

  info(obj: object, msg?: string): void {
    this.records.push({ level: "info", obj, msg });
  }

  warn(obj: object, msg?: string): void {
    this.records.push({ level: "warn", obj, msg });
  }

  error(obj: object, msg?: string): void {
    this.records.push({ level: "error", obj, msg });
  }

  at(level: string): { obj: object; msg?: string }[] {
    return this.records.filter((record) => record.level === level);
  }
}

/**
 * Await a promise that must reject with a StorageError and return it
 */
export async function expectStorageError(
  promise: Promise<unknown>,
  kind: ErrorKind,
): Promise<StorageError> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  if (!isStorageError(caught)) {
    throw new Error(`expected a StorageError, got ${String(caught)}`);
  }
  expect(caught.kind).toBe(kind);
  return caught;
}

/**
 * Run a function that must throw a StorageError and return it
 */
export function catchStorageError(fn: () => unknown, kind: ErrorKind): StorageError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!isStorageError(caught)) {
    throw new Error(`expected a StorageError, got ${String(caught)}`);
  }
  expect(caught.kind).toBe(kind);
  return caught;
}

/**
 * Bytes 0..n-1 (mod 256)
 */
export function sequence(n: number): Uint8Array {
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i++) out[i] = i % 256;
  return out;
}

export const text = new TextDecoder();
