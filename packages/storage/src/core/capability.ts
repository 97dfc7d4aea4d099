/**
 * Capability sets and fail-fast checks
 */

import { ErrorKind, type Operation, StorageError } from "./errors.js";
import type { ObjectId } from "./path.js";
import type { AccessorInfo, Capability, CapabilityFlag } from "./types.js";

/**
 * Build a frozen capability set; omitted flags are false
 *
 * @example
 * defineCapability({ read: true, stat: true })
 * // => { read: true, stat: true, write: false, ..., rangeRead: false }
 */
export function defineCapability(
  flags: Partial<Record<CapabilityFlag, boolean>> & {
    maxRequestSize?: number;
  },
): Capability {
  const capability: Capability = {
    read: flags.read ?? false,
    write: flags.write ?? false,
    delete: flags.delete ?? false,
    list: flags.list ?? false,
    stat: flags.stat ?? false,
    createDir: flags.createDir ?? false,
    rangeRead: flags.rangeRead ?? false,
    ...(flags.maxRequestSize !== undefined
      ? { maxRequestSize: flags.maxRequestSize }
      : {}),
  };
  return Object.freeze(capability);
}

/**
 * Everything enabled, no request size limit
 */
export const FULL_CAPABILITY: Capability = defineCapability({
  read: true,
  write: true,
  delete: true,
  list: true,
  stat: true,
  createDir: true,
  rangeRead: true,
});

/**
 * Fail with Unsupported before any backend call when a flag is missing
 */
export function assertCapability(
  info: AccessorInfo,
  flag: CapabilityFlag,
  operation: Operation,
  id: ObjectId,
): void {
  if (!info.capability[flag]) {
    throw new StorageError(
      ErrorKind.Unsupported,
      operation,
      id.path,
      `${info.scheme} backend does not support ${flag}`,
    );
  }
}

/**
 * Fail with InvalidPath when an operation needs a directory id
 */
export function assertDirectory(operation: Operation, id: ObjectId): void {
  if (!id.isDir()) {
    throw new StorageError(
      ErrorKind.InvalidPath,
      operation,
      id.path,
      "a directory path (ending with '/') is required",
    );
  }
}

/**
 * Fail with InvalidPath when an operation needs an object id
 */
export function assertObject(operation: Operation, id: ObjectId): void {
  if (id.isDir()) {
    throw new StorageError(
      ErrorKind.InvalidPath,
      operation,
      id.path,
      "an object path (not ending with '/') is required",
    );
  }
}
