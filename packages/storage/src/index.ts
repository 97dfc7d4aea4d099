/**
 * @unistore/storage - One object-storage API over many backends
 *
 * ## Usage
 *
 * Import the Operator and core types from the main export:
 * ```typescript
 * import { Operator, normalizePath, ErrorKind } from '@unistore/storage';
 * import type { Accessor, Metadata } from '@unistore/storage';
 * ```
 *
 * Import adapters from their specific paths:
 * ```typescript
 * import { LocalAccessor } from '@unistore/storage/local';
 * import { MemoryAccessor } from '@unistore/storage/memory';
 * import { S3Accessor } from '@unistore/storage/s3';
 * ```
 *
 * Or build everything from a config object:
 * ```typescript
 * import { createOperator, parseStorageConfig } from '@unistore/storage/config';
 * ```
 */

// Re-export everything from core
export * from "./core/index.js";

// Streaming I/O
export {
  BytesReader,
  RestartableReader,
  StreamReader,
  type WriteInput,
  concatBytes,
  emptyReader,
  isReader,
  mapReaderErrors,
  readAll,
  toReader,
} from "./io/reader.js";
export { LimitedReader } from "./io/limited-reader.js";
export {
  type ListPage,
  type ListedEntry,
  PageLister,
  type PageFetcher,
  collectEntries,
  staticLister,
} from "./io/lister.js";
export { BufferedWriter, type CommitFn } from "./io/writer.js";

// Layers
export { RangeLayer } from "./layers/range.js";
export {
  DEFAULT_RETRY_POLICY,
  RetryLayer,
  type RetryLayerOptions,
  computeRetryDelay,
  createRetryPolicy,
} from "./layers/retry.js";

// Front door
export {
  type CallOptions,
  Operator,
  type OperatorOptions,
  type ReadOptions,
  type WriteOptions,
} from "./operator.js";
