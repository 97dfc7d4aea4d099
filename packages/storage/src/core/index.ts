/**
 * @unistore/storage/core - Zero-dependency core
 *
 * Paths, metadata, errors, capabilities and the accessor contract. No
 * adapter or third-party code is reachable from here.
 */

// Types
export type {
  Accessor,
  AccessorInfo,
  AdapterConfig,
  Capability,
  CapabilityFlag,
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
  Writer,
} from "./types.js";

// Errors
export {
  ErrorKind,
  type Operation,
  StorageError,
  type StorageErrorOptions,
  classifyErrnoCode,
  classifyHttpStatus,
  getErrnoCode,
  isAbortError,
  isErrorKind,
  isRetryable,
  isRetryableKind,
  isStorageError,
  throwIfAborted,
  toStorageError,
} from "./errors.js";

// Paths
export {
  ObjectId,
  buildAbsPath,
  buildRelPath,
  normalizePath,
  normalizeRoot,
} from "./path.js";

// Ranges
export {
  type BytesRange,
  bytesRange,
  formatRangeHeader,
  isFullRange,
  rangeFromBounds,
  validateRange,
} from "./range.js";

export { createMetadata, dirMetadata, fileMetadata } from "./metadata.js";

export {
  FULL_CAPABILITY,
  assertCapability,
  assertDirectory,
  assertObject,
  defineCapability,
} from "./capability.js";

export {
  CachedResolver,
  type CachedResolverOptions,
  type CredentialResolver,
  DEFAULT_RESOLVER_TTL_MS,
  type ResolverLoader,
  classifyResolutionError,
  staticResolver,
} from "./credentials.js";

export { noopLogger } from "./logger.js";
