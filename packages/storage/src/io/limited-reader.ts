/**
 * Client-side byte window over another reader
 *
 * Lets backends without native range support serve ranged reads, and bounds
 * backends that do support them.
 */

import { ErrorKind, StorageError } from "../core/errors.js";
import type { Reader } from "../core/types.js";

function assertWindowValue(value: number, label: string, path: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new StorageError(
      ErrorKind.InvalidInput,
      "read",
      path,
      `${label} must be a non-negative integer, got ${value}`,
    );
  }
}

function beyondEnd(offset: number, size: number, path: string): StorageError {
  return new StorageError(
    ErrorKind.InvalidInput,
    "read",
    path,
    `range offset ${offset} is beyond object size ${size}`,
  );
}

/**
 * Produces at most `length` bytes starting `offset` bytes into `inner`
 *
 * Short chunks from the inner reader are fine. Once the window is full the
 * inner iteration is closed, so nothing past the window is ever pulled. An
 * offset equal to the inner size gives an empty window; a larger one fails.
 *
 * @example
 * // bytes 10..14 of a 100-byte source
 * const reader = new LimitedReader(source, 10, 5);
 */
export class LimitedReader implements Reader {
  readonly restartable: boolean;
  readonly size?: number;

  /**
   * @param length - Window length; omit to read to the end of `inner`
   * @param path - Object path reported in errors
   * @throws StorageError(InvalidInput) for negative or fractional bounds, or
   *   an offset past a known inner size
   */
  constructor(
    private readonly inner: Reader,
    readonly offset: number,
    readonly length?: number,
    private readonly path = "",
  ) {
    assertWindowValue(offset, "offset", path);
    if (length !== undefined) {
      assertWindowValue(length, "length", path);
    }

    this.restartable = inner.restartable;
    if (inner.size !== undefined) {
      if (offset > inner.size) {
        throw beyondEnd(offset, inner.size, path);
      }
      const available = inner.size - offset;
      this.size = length === undefined ? available : Math.min(available, length);
    } else if (length === 0) {
      this.size = 0;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    let toSkip = this.offset;
    let consumed = 0;
    let remaining = this.length ?? Number.POSITIVE_INFINITY;

    if (remaining === 0) {
      return;
    }

    for await (const chunk of this.inner) {
      let view = chunk;
      consumed += chunk.length;

      if (toSkip > 0) {
        if (view.length <= toSkip) {
          toSkip -= view.length;
          continue;
        }
        view = view.subarray(toSkip);
        toSkip = 0;
      }

      if (view.length > remaining) {
        view = view.subarray(0, remaining);
      }
      remaining -= view.length;

      if (view.length > 0) {
        yield view;
      }
      if (remaining === 0) {
        return;
      }
    }

    if (toSkip > 0) {
      throw beyondEnd(this.offset, consumed, this.path);
    }
  }
}
