/**
 * Local filesystem storage adapter
 *
 * Stores files under a base directory with sidecar .meta.json files for the
 * content type. Writes land in a temp file that is renamed into place, so a
 * reader never sees a partial object.
 */

import { createHash, randomUUID } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import {
  mkdir,
  readdir,
  rename,
  rmdir,
  stat,
  unlink,
} from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve } from "node:path";
import { pipeline } from "node:stream/promises";
import { FULL_CAPABILITY } from "../../core/capability.js";
import {
  ErrorKind,
  type Operation,
  StorageError,
  classifyErrnoCode,
  getErrnoCode,
  isAbortError,
  isStorageError,
  throwIfAborted,
  toStorageError,
} from "../../core/errors.js";
import { noopLogger } from "../../core/logger.js";
import { dirMetadata, fileMetadata } from "../../core/metadata.js";
import { type ObjectId, normalizeRoot } from "../../core/path.js";
import type {
  Accessor,
  AccessorInfo,
  AdapterConfig,
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
import {
  RestartableReader,
  emptyReader,
  mapReaderErrors,
} from "../../io/reader.js";
import {
  deleteMetadata,
  isMetadataFile,
  readMetadata,
  writeMetadata,
} from "./metadata.js";

/**
 * Local storage configuration
 */
export interface LocalAccessorConfig extends AdapterConfig {
  /** Base directory for storage */
  baseDir: string;

  /** File permissions for new files (default: 0o644) */
  fileMode?: number;

  /** Directory permissions (default: 0o755) */
  dirMode?: number;

  /** Entries per listing page (default: 1000) */
  pageSize?: number;
}

/** Marks in-flight writes; object names may not end with it */
const TEMP_SUFFIX = ".unistore-tmp";

function isTempFile(name: string): boolean {
  return name.endsWith(TEMP_SUFFIX);
}

/**
 * Local filesystem accessor
 */
export class LocalAccessor implements Accessor {
  private readonly baseDir: string;
  private readonly fileMode: number;
  private readonly dirMode: number;
  private readonly pageSize: number;
  private readonly logger: StorageLogger;
  private readonly accessorInfo: AccessorInfo;

  constructor(config: LocalAccessorConfig) {
    this.baseDir = resolve(config.baseDir);
    this.fileMode = config.fileMode ?? 0o644;
    this.dirMode = config.dirMode ?? 0o755;
    this.pageSize = config.pageSize ?? 1000;
    this.logger = config.logger ?? noopLogger;

    this.accessorInfo = Object.freeze({
      scheme: "local",
      root: normalizeRoot(this.baseDir),
      name: basename(this.baseDir) || "/",
      capability: FULL_CAPABILITY,
    });

    this.logger.debug({ baseDir: this.baseDir }, "LocalAccessor initialized");
  }

  info(): AccessorInfo {
    return this.accessorInfo;
  }

  /**
   * Get the full filesystem path for an id
   */
  private getFullPath(operation: Operation, id: ObjectId): string {
    const fullPath = resolve(this.baseDir, id.isRoot() ? "." : id.path);

    // Ids are normalized already; re-check against the base directory anyway
    const relativePath = relative(this.baseDir, fullPath);
    if (relativePath.startsWith("..") || isAbsolute(relativePath)) {
      throw new StorageError(
        ErrorKind.InvalidPath,
        operation,
        id.path,
        "path escapes the base directory",
      );
    }
    if (!id.isDir() && isMetadataFile(fullPath)) {
      throw new StorageError(
        ErrorKind.InvalidPath,
        operation,
        id.path,
        "name is reserved for metadata sidecars",
      );
    }
    if (!id.isDir() && isTempFile(fullPath)) {
      throw new StorageError(
        ErrorKind.InvalidPath,
        operation,
        id.path,
        "name is reserved for in-flight writes",
      );
    }

    return fullPath;
  }

  /**
   * Translate a native failure at the adapter boundary
   */
  private toError(error: unknown, operation: Operation, id: ObjectId): StorageError {
    if (isStorageError(error) || isAbortError(error)) {
      return toStorageError(error, operation, id.path);
    }
    const code = getErrnoCode(error);
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(classifyErrnoCode(code), operation, id.path, message, {
      cause: error,
    });
  }

  // ---- Read Operations ----

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    throwIfAborted(args.signal, "read", id.path);
    const filePath = this.getFullPath("read", id);

    let size: number;
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        throw new StorageError(ErrorKind.NotFound, "read", id.path, "not a file");
      }
      size = stats.size;
    } catch (error) {
      throw this.toError(error, "read", id);
    }

    const offset = args.range?.offset ?? 0;
    if (offset > size) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "read",
        id.path,
        `range offset ${offset} is beyond object size ${size}`,
      );
    }
    const available = size - offset;
    const length =
      args.range?.size === undefined
        ? available
        : Math.min(available, args.range.size);
    if (length === 0) {
      return emptyReader();
    }

    const reader = new RestartableReader(
      () =>
        createReadStream(filePath, {
          start: offset,
          end: offset + length - 1,
          signal: args.signal,
        }),
      length,
    );
    return mapReaderErrors(reader, (error) => this.toError(error, "read", id));
  }

  async stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    throwIfAborted(args.signal, "stat", id.path);
    const filePath = this.getFullPath("stat", id);

    try {
      const stats = await stat(filePath);
      if (stats.isDirectory()) {
        return dirMetadata();
      }
      if (id.isDir()) {
        throw new StorageError(ErrorKind.NotFound, "stat", id.path, "not a directory");
      }

      const sidecar = await readMetadata(filePath);
      return fileMetadata(stats.size, {
        lastModified: stats.mtime,
        contentType: sidecar?.contentType,
        contentMd5: sidecar?.contentMd5,
        etag: sidecar?.contentMd5 ? `"${sidecar.contentMd5}"` : undefined,
      });
    } catch (error) {
      throw this.toError(error, "stat", id);
    }
  }

  // ---- Write Operations ----

  async write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    throwIfAborted(args.signal, "write", id.path);
    const filePath = this.getFullPath("write", id);
    const dirPath = dirname(filePath);
    const tempPath = join(dirPath, `.${basename(filePath)}.${randomUUID()}${TEMP_SUFFIX}`);

    const hash = createHash("md5");
    let written = 0;

    try {
      await mkdir(dirPath, { recursive: true, mode: this.dirMode });
      await pipeline(
        async function* () {
          for await (const chunk of reader) {
            hash.update(chunk);
            written += chunk.length;
            yield chunk;
          }
        },
        createWriteStream(tempPath, { mode: this.fileMode }),
        { signal: args.signal },
      );

      if (args.sizeHint !== undefined && args.sizeHint !== written) {
        throw new StorageError(
          ErrorKind.InvalidInput,
          "write",
          id.path,
          `expected ${args.sizeHint} bytes, received ${written}`,
        );
      }

      await rename(tempPath, filePath);
    } catch (error) {
      // Clean up the partial temp file
      await this.removeTemp(tempPath);
      throw this.toError(error, "write", id);
    }

    const contentMd5 = hash.digest("hex");
    try {
      await writeMetadata(
        filePath,
        {
          contentType: args.contentType,
          contentMd5,
          updatedAt: new Date().toISOString(),
        },
        this.fileMode,
      );
      const stats = await stat(filePath);

      this.logger.debug({ path: id.path, size: stats.size }, "File written");

      return fileMetadata(stats.size, {
        lastModified: stats.mtime,
        contentType: args.contentType,
        contentMd5,
        etag: `"${contentMd5}"`,
      });
    } catch (error) {
      throw this.toError(error, "write", id);
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      if (getErrnoCode(cleanupError) !== "ENOENT") {
        this.logger.warn(
          { tempPath, error: String(cleanupError) },
          "Failed to remove temp file",
        );
      }
    }
  }

  async createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    throwIfAborted(args.signal, "createDir", id.path);
    const dirPath = this.getFullPath("createDir", id);

    try {
      await mkdir(dirPath, { recursive: true, mode: this.dirMode });
    } catch (error) {
      throw this.toError(error, "createDir", id);
    }
  }

  // ---- Delete Operations ----

  async delete(id: ObjectId, args: OpDelete): Promise<void> {
    throwIfAborted(args.signal, "delete", id.path);
    if (id.isRoot()) {
      return;
    }
    const fullPath = this.getFullPath("delete", id);

    try {
      if (id.isDir()) {
        await rmdir(fullPath);
      } else {
        await unlink(fullPath);
        await deleteMetadata(fullPath);
      }
      this.logger.debug({ path: id.path }, "File deleted");
    } catch (error) {
      // No-op if file doesn't exist
      if (getErrnoCode(error) !== "ENOENT") {
        throw this.toError(error, "delete", id);
      }
    }
  }

  // ---- List Operations ----

  async list(id: ObjectId, args: OpList): Promise<Lister> {
    throwIfAborted(args.signal, "list", id.path);
    const dirPath = this.getFullPath("list", id);
    const prefix = id.isRoot() ? "" : id.path;

    let names: { name: string; isDir: boolean }[] = [];

    return new PageLister(async (cursor) => {
      throwIfAborted(args.signal, "list", id.path);

      // Each iteration re-reads the directory on its first page
      if (cursor === undefined) {
        names = await this.readChildren(dirPath, id);
      }

      const offset = cursor ? Number.parseInt(cursor, 10) : 0;
      const page = names.slice(offset, offset + this.pageSize);
      const entries: ListedEntry[] = [];

      for (const child of page) {
        const childId = id.join(child.isDir ? `${child.name}/` : child.name);
        if (child.isDir) {
          entries.push({ id: childId, metadata: dirMetadata() });
          continue;
        }
        try {
          const stats = await stat(join(dirPath, child.name));
          entries.push({
            id: childId,
            metadata: fileMetadata(stats.size, { lastModified: stats.mtime }),
          });
        } catch (error) {
          // Removed between readdir and stat
          if (getErrnoCode(error) !== "ENOENT") {
            throw this.toError(error, "list", id);
          }
        }
      }

      const hasMore = offset + this.pageSize < names.length;
      this.logger.debug(
        { path: prefix || "/", count: entries.length, hasMore },
        "Listed page",
      );
      return {
        entries,
        nextToken: hasMore ? String(offset + this.pageSize) : undefined,
      };
    });
  }

  /**
   * Sorted direct children, without sidecars and temp files
   *
   * A missing directory lists as empty.
   */
  private async readChildren(
    dirPath: string,
    id: ObjectId,
  ): Promise<{ name: string; isDir: boolean }[]> {
    try {
      const dirents = await readdir(dirPath, { withFileTypes: true });
      return dirents
        .filter(
          (entry) =>
            entry.isDirectory() ||
            (entry.isFile() && !isMetadataFile(entry.name) && !isTempFile(entry.name)),
        )
        .map((entry) => ({ name: entry.name, isDir: entry.isDirectory() }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (error) {
      if (getErrnoCode(error) === "ENOENT") {
        return [];
      }
      throw this.toError(error, "list", id);
    }
  }
}
