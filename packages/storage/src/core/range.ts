/**
 * Byte ranges for partial reads
 */

import { ErrorKind, StorageError } from "./errors.js";

/**
 * A window into an object: `size` bytes starting at `offset`
 *
 * A missing `size` means "to the end of the object".
 */
export interface BytesRange {
  readonly offset: number;
  readonly size?: number;
}

function assertNonNegativeInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new StorageError(
      ErrorKind.InvalidInput,
      "read",
      "",
      `${label} must be a non-negative integer, got ${value}`,
    );
  }
}

/**
 * Validate and freeze a range
 *
 * @throws StorageError(InvalidInput) on negative or fractional values
 */
export function bytesRange(offset = 0, size?: number): BytesRange {
  assertNonNegativeInteger(offset, "range offset");
  if (size !== undefined) {
    assertNonNegativeInteger(size, "range size");
  }
  return Object.freeze(size === undefined ? { offset } : { offset, size });
}

/**
 * Build a range from half-open bounds `[start, end)`
 *
 * @example
 * rangeFromBounds(10, 15) // => { offset: 10, size: 5 }
 */
export function rangeFromBounds(start: number, end?: number): BytesRange {
  if (end !== undefined && start > end) {
    throw new StorageError(
      ErrorKind.InvalidInput,
      "read",
      "",
      `range start ${start} is after end ${end}`,
    );
  }
  return bytesRange(start, end === undefined ? undefined : end - start);
}

/**
 * Re-validate a caller-supplied range object
 */
export function validateRange(range: BytesRange): BytesRange {
  return bytesRange(range.offset, range.size);
}

/**
 * True when the range selects the whole object
 */
export function isFullRange(range: BytesRange | undefined): boolean {
  return range === undefined || (range.offset === 0 && range.size === undefined);
}

/**
 * Format as an HTTP Range header value
 *
 * @example
 * formatRangeHeader({ offset: 10, size: 5 }) // => 'bytes=10-14'
 * formatRangeHeader({ offset: 10 })          // => 'bytes=10-'
 */
export function formatRangeHeader(range: BytesRange): string {
  if (range.size === undefined) {
    return `bytes=${range.offset}-`;
  }
  return `bytes=${range.offset}-${range.offset + range.size - 1}`;
}
