/**
 * @unistore/storage/core - Core types for the storage layer
 *
 * These interfaces define the contract that every backend adapter and every
 * layer implements. They have no runtime dependencies.
 */

import type { ObjectId } from "./path.js";
import type { BytesRange } from "./range.js";

// ============================================================================
// Metadata Types
// ============================================================================

/**
 * Object metadata, produced by stat and list
 *
 * Values are frozen; a new Metadata replaces an old one.
 */
export interface Metadata {
  /** Whether the id denotes a directory */
  readonly isDirectory: boolean;

  /** Size in bytes, when known */
  readonly size?: number;

  /** Last modification time, when known */
  readonly lastModified?: Date;

  /** Opaque entity tag */
  readonly etag?: string;

  /** Hex or base64 MD5 of the content, when the backend reports one */
  readonly contentMd5?: string;

  /** MIME type of the content */
  readonly contentType?: string;
}

/**
 * One listing result
 */
export interface DirEntry {
  readonly id: ObjectId;

  /** Possibly partial: listings rarely carry every field */
  readonly metadata: Metadata;

  /** Hint that the lister has further entries after this one */
  readonly hasMore: boolean;
}

// ============================================================================
// Streaming Types
// ============================================================================

/**
 * Lazy, finite sequence of byte chunks
 *
 * A reader can be iterated once unless `restartable` is set, in which case
 * every new iteration starts again from the first byte.
 */
export interface Reader extends AsyncIterable<Uint8Array> {
  readonly restartable: boolean;

  /** Total byte count, when known up front */
  readonly size?: number;
}

/**
 * Lazy sequence of directory entries
 *
 * Stopping iteration early (break/return) must not trigger further
 * backend requests.
 */
export type Lister = AsyncIterable<DirEntry>;

/**
 * Chunk sink committed as one object on close()
 */
export interface Writer {
  write(chunk: Uint8Array | string): Promise<void>;

  /** Commit everything written so far; nothing is visible before this */
  close(): Promise<Metadata>;

  /** Discard buffered chunks; the writer cannot be used afterwards */
  abort(): void;
}

// ============================================================================
// Capability Types
// ============================================================================

export type CapabilityFlag =
  | "read"
  | "write"
  | "delete"
  | "list"
  | "stat"
  | "createDir"
  | "rangeRead";

/**
 * What a backend supports, fixed at construction
 */
export type Capability = {
  readonly [K in CapabilityFlag]: boolean;
} & {
  /** Largest body accepted by one write request (bytes) */
  readonly maxRequestSize?: number;
};

/**
 * Static description of an accessor
 */
export interface AccessorInfo {
  /** Backend kind, e.g. 'memory', 'local', 's3' */
  readonly scheme: string;

  /** Root the accessor is mounted at, in '/x/y/' form */
  readonly root: string;

  /** Bucket, directory or instance name */
  readonly name: string;

  readonly capability: Capability;
}

// ============================================================================
// Operation Arguments
// ============================================================================

interface OpBase {
  /** Aborts the operation at its next suspension point */
  signal?: AbortSignal;
}

export interface OpRead extends OpBase {
  range?: BytesRange;
}

export interface OpWrite extends OpBase {
  /** Expected byte count; a mismatch fails InvalidInput */
  sizeHint?: number;

  contentType?: string;
}

export type OpStat = OpBase;
export type OpDelete = OpBase;
export type OpList = OpBase;
export type OpCreateDir = OpBase;

// ============================================================================
// Accessor Interface
// ============================================================================

/**
 * The contract every backend adapter implements - the "port" in ports &
 * adapters. Layers implement it too, wrapping another accessor.
 *
 * Ids arrive normalized. Native errors must leave as StorageError.
 */
export interface Accessor {
  info(): AccessorInfo;

  /**
   * Open an object for reading
   *
   * @throws StorageError NotFound, Unsupported (range without rangeRead),
   *   InvalidInput (malformed range)
   */
  read(id: ObjectId, args: OpRead): Promise<Reader>;

  /**
   * Consume `reader` fully and commit it as the object's content
   */
  write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata>;

  /**
   * @throws StorageError NotFound
   */
  stat(id: ObjectId, args: OpStat): Promise<Metadata>;

  /**
   * Remove an object; absent objects are not an error
   */
  delete(id: ObjectId, args: OpDelete): Promise<void>;

  /**
   * List the direct children of a directory id
   */
  list(id: ObjectId, args: OpList): Promise<Lister>;

  /**
   * Create a directory marker; no-op when it exists
   */
  createDir(id: ObjectId, args: OpCreateDir): Promise<void>;
}

// ============================================================================
// Retry Types
// ============================================================================

/**
 * Retry policy, shared read-only by every operation of a RetryLayer
 */
export interface RetryPolicy {
  /** Total attempts including the first */
  readonly maxAttempts: number;

  /** Delay before the second attempt (milliseconds) */
  readonly baseDelay: number;

  /** Cap on any single delay (milliseconds) */
  readonly maxDelay: number;

  /** Spread delays by +/-10% */
  readonly jitter: boolean;
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface required by the storage layer
 *
 * This allows adapters to log without depending on a specific logging library.
 * Users can provide any logger that implements this interface.
 */
export interface StorageLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/**
 * Base adapter configuration
 */
export interface AdapterConfig {
  /** Logger instance */
  logger?: StorageLogger;
}
