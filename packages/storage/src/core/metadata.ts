/**
 * Metadata construction helpers
 */

import { ErrorKind, StorageError } from "./errors.js";
import type { Metadata } from "./types.js";

type MetadataInit = {
  -readonly [K in keyof Metadata]: Metadata[K];
};

/**
 * Validate and freeze a Metadata value
 *
 * Undefined optional fields are dropped so that frozen values compare
 * cleanly with toEqual.
 */
export function createMetadata(init: MetadataInit): Metadata {
  if (
    init.size !== undefined &&
    (!Number.isSafeInteger(init.size) || init.size < 0)
  ) {
    throw new StorageError(
      ErrorKind.Unexpected,
      "stat",
      "",
      `invalid object size ${init.size}`,
    );
  }

  const metadata: MetadataInit = { isDirectory: init.isDirectory };
  if (init.size !== undefined) metadata.size = init.size;
  if (init.lastModified !== undefined) metadata.lastModified = init.lastModified;
  if (init.etag !== undefined) metadata.etag = init.etag;
  if (init.contentMd5 !== undefined) metadata.contentMd5 = init.contentMd5;
  if (init.contentType !== undefined) metadata.contentType = init.contentType;

  return Object.freeze(metadata);
}

export function fileMetadata(
  size: number | undefined,
  extra: Omit<MetadataInit, "isDirectory" | "size"> = {},
): Metadata {
  return createMetadata({ ...extra, isDirectory: false, size });
}

const DIR_METADATA: Metadata = Object.freeze({ isDirectory: true });

export function dirMetadata(): Metadata {
  return DIR_METADATA;
}
