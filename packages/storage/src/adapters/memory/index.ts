/**
 * In-memory storage adapter
 *
 * Stores all data in memory using a Map. Useful for unit tests
 * where you don't want to hit the filesystem.
 *
 * Directory markers are keys ending in '/'. Listings are one level deep:
 * a key 'a/b/c' shows up under 'a/' as the implicit directory 'a/b/'.
 */

import { createHash } from "node:crypto";
import { FULL_CAPABILITY, defineCapability } from "../../core/capability.js";
import { ErrorKind, StorageError, throwIfAborted } from "../../core/errors.js";
import { noopLogger } from "../../core/logger.js";
import { dirMetadata, fileMetadata } from "../../core/metadata.js";
import {
  ObjectId,
  buildAbsPath,
  buildRelPath,
  normalizeRoot,
} from "../../core/path.js";
import type {
  Accessor,
  AccessorInfo,
  AdapterConfig,
  Capability,
  CapabilityFlag,
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
import { type ListedEntry, PageLister } from "../../io/lister.js";
import { BytesReader, readAll } from "../../io/reader.js";

/**
 * Memory adapter configuration
 */
export interface MemoryAccessorConfig extends AdapterConfig {
  /** Instance name reported by info() (default: 'memory') */
  name?: string;

  /** Prefix every key is stored under (default: '/') */
  root?: string;

  /** Entries per listing page (default: 1000) */
  pageSize?: number;

  /** Narrow the advertised capability set, e.g. to test fallbacks */
  capability?: Partial<Record<CapabilityFlag, boolean>> & {
    maxRequestSize?: number;
  };
}

/**
 * Stored object in memory
 */
interface StoredObject {
  data: Uint8Array;
  metadata: Metadata;
}

export const DEFAULT_PAGE_SIZE = 1000;

/**
 * In-memory accessor
 */
export class MemoryAccessor implements Accessor {
  private readonly store: Map<string, StoredObject> = new Map();
  private readonly logger: StorageLogger;
  private readonly accessorInfo: AccessorInfo;
  private readonly pageSize: number;

  constructor(config: MemoryAccessorConfig = {}) {
    this.logger = config.logger ?? noopLogger;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isSafeInteger(this.pageSize) || this.pageSize < 1) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "resolve",
        "/",
        `pageSize must be a positive integer, got ${this.pageSize}`,
      );
    }

    const capability: Capability = config.capability
      ? defineCapability({ ...FULL_CAPABILITY, ...config.capability })
      : FULL_CAPABILITY;

    this.accessorInfo = Object.freeze({
      scheme: "memory",
      root: normalizeRoot(config.root ?? "/"),
      name: config.name ?? "memory",
      capability,
    });

    this.logger.debug(
      { root: this.accessorInfo.root, pageSize: this.pageSize },
      "MemoryAccessor initialized",
    );
  }

  info(): AccessorInfo {
    return this.accessorInfo;
  }

  private keyOf(id: ObjectId): string {
    return buildAbsPath(this.accessorInfo.root, id);
  }

  // ---- Read Operations ----

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    throwIfAborted(args.signal, "read", id.path);

    const stored = this.store.get(this.keyOf(id));
    if (!stored) {
      throw new StorageError(ErrorKind.NotFound, "read", id.path, "object not found");
    }

    const range = args.range;
    if (range === undefined) {
      return new BytesReader(stored.data);
    }
    if (range.offset > stored.data.length) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "read",
        id.path,
        `range offset ${range.offset} is beyond object size ${stored.data.length}`,
      );
    }

    const end =
      range.size === undefined
        ? stored.data.length
        : Math.min(stored.data.length, range.offset + range.size);
    return new BytesReader(stored.data.subarray(range.offset, end));
  }

  async stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    throwIfAborted(args.signal, "stat", id.path);

    if (id.isDir()) {
      return dirMetadata();
    }

    const stored = this.store.get(this.keyOf(id));
    if (!stored) {
      throw new StorageError(ErrorKind.NotFound, "stat", id.path, "object not found");
    }
    return stored.metadata;
  }

  // ---- Write Operations ----

  async write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    const data = await readAll(reader, args.signal, id.path);

    if (args.sizeHint !== undefined && args.sizeHint !== data.length) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "write",
        id.path,
        `expected ${args.sizeHint} bytes, received ${data.length}`,
      );
    }
    throwIfAborted(args.signal, "write", id.path);

    // Copy: the reader may hand out views into a caller's buffer
    const copy = data.slice();
    const md5 = createHash("md5").update(copy).digest("hex");
    const metadata = fileMetadata(copy.length, {
      lastModified: new Date(),
      etag: `"${md5}"`,
      contentMd5: md5,
      contentType: args.contentType,
    });

    this.store.set(this.keyOf(id), { data: copy, metadata });
    this.logger.debug({ path: id.path, size: copy.length }, "Object stored");
    return metadata;
  }

  async createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    throwIfAborted(args.signal, "createDir", id.path);

    const key = this.keyOf(id);
    if (!this.store.has(key)) {
      this.store.set(key, { data: new Uint8Array(0), metadata: dirMetadata() });
      this.logger.debug({ path: id.path }, "Directory marker stored");
    }
  }

  // ---- Delete Operations ----

  async delete(id: ObjectId, args: OpDelete): Promise<void> {
    throwIfAborted(args.signal, "delete", id.path);

    if (this.store.delete(this.keyOf(id))) {
      this.logger.debug({ path: id.path }, "Object deleted");
    }
  }

  // ---- List Operations ----

  async list(id: ObjectId, args: OpList): Promise<Lister> {
    throwIfAborted(args.signal, "list", id.path);

    return new PageLister(async (cursor) => {
      throwIfAborted(args.signal, "list", id.path);

      // Snapshot per page: writes between pages are picked up
      const children = this.children(id);
      const offset = cursor ? Number.parseInt(cursor, 10) : 0;
      const page = children.slice(offset, offset + this.pageSize);
      const hasMore = offset + this.pageSize < children.length;

      return {
        entries: page,
        nextToken: hasMore ? String(offset + this.pageSize) : undefined,
      };
    });
  }

  /**
   * Direct children of a directory id, sorted by path
   */
  private children(dir: ObjectId): ListedEntry[] {
    const prefix = this.keyOf(dir);
    const found = new Map<string, ListedEntry>();

    for (const [key, stored] of this.store.entries()) {
      if (!key.startsWith(prefix) || key === prefix) continue;

      const rest = key.slice(prefix.length);
      const slash = rest.indexOf("/");
      const childKey = slash < 0 ? key : `${prefix}${rest.slice(0, slash + 1)}`;
      if (found.has(childKey)) continue;

      const child = ObjectId.fromNormalized(
        buildRelPath(this.accessorInfo.root, childKey),
      );
      found.set(childKey, {
        id: child,
        metadata: child.isDir() ? dirMetadata() : stored.metadata,
      });
    }

    return [...found.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, entry]) => entry);
  }

  // ---- Test Utilities ----

  /**
   * Clear all stored objects (useful for tests)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get the number of stored keys, directory markers included
   */
  get size(): number {
    return this.store.size;
  }
}
