/**
 * Byte readers
 *
 * All readers are async iterables of Uint8Array chunks. Restartable readers
 * start over on every iteration, which is what makes a write safe to retry.
 */

import { ErrorKind, StorageError, throwIfAborted } from "../core/errors.js";
import type { Reader } from "../core/types.js";

type ByteSource = AsyncIterable<Uint8Array> | ReadableStream<Uint8Array>;

/**
 * Anything Operator.write() accepts as content
 */
export type WriteInput = Reader | Uint8Array | string | ByteSource;

const encoder = new TextEncoder();

async function* iterateWebStream(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let done = false;
  try {
    while (!done) {
      const result = await reader.read();
      if (result.done) {
        done = true;
      } else {
        yield result.value;
      }
    }
  } finally {
    if (!done) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Iterate a web ReadableStream or an async iterable, releasing the source
 * when the consumer stops early
 */
function iterateSource(source: ByteSource): AsyncIterable<Uint8Array> {
  if ("getReader" in source) {
    return iterateWebStream(source);
  }
  return source;
}

/**
 * Restartable reader over an in-memory buffer
 */
export class BytesReader implements Reader {
  readonly restartable = true;
  readonly size: number;
  private readonly chunkSize: number;

  /**
   * @param chunkSize - Split the buffer into chunks of at most this many bytes
   */
  constructor(
    private readonly data: Uint8Array,
    chunkSize?: number,
  ) {
    this.size = data.length;
    this.chunkSize = Math.max(1, chunkSize ?? data.length);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    for (let i = 0; i < this.data.length; i += this.chunkSize) {
      yield this.data.subarray(i, i + this.chunkSize);
    }
  }
}

/**
 * Single-pass reader over a stream
 *
 * A second iteration fails with Unexpected: the bytes are gone.
 */
export class StreamReader implements Reader {
  readonly restartable = false;
  private consumed = false;

  constructor(
    private readonly source: ByteSource,
    readonly size?: number,
  ) {}

  /** Whether iteration has begun */
  get started(): boolean {
    return this.consumed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    if (this.consumed) {
      throw new StorageError(
        ErrorKind.Unexpected,
        "read",
        "",
        "stream reader was already consumed",
      );
    }
    this.consumed = true;
    yield* iterateSource(this.source);
  }
}

/**
 * Restartable reader that re-opens its source on every iteration
 *
 * @example
 * new RestartableReader(() => createReadStream(file))
 */
export class RestartableReader implements Reader {
  readonly restartable = true;

  constructor(
    private readonly open: () => ByteSource,
    readonly size?: number,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    yield* iterateSource(this.open());
  }
}

/**
 * Check if a value already is a Reader
 */
export function isReader(value: unknown): value is Reader {
  return (
    typeof value === "object" &&
    value !== null &&
    "restartable" in value &&
    typeof value.restartable === "boolean" &&
    Symbol.asyncIterator in value
  );
}

/**
 * Wrap write input in a Reader
 *
 * Buffers and strings become restartable readers; streams are single-pass.
 */
export function toReader(input: WriteInput, sizeHint?: number): Reader {
  if (typeof input === "string") {
    return new BytesReader(encoder.encode(input));
  }
  if (input instanceof Uint8Array) {
    return new BytesReader(input);
  }
  if (isReader(input)) {
    return input;
  }
  return new StreamReader(input, sizeHint);
}

/**
 * Join chunks into a single buffer
 */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const [only] = chunks;
  if (chunks.length === 1 && only) {
    return only;
  }
  let total = 0;
  for (const chunk of chunks) total += chunk.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Drain a reader into one buffer
 *
 * The signal is checked between chunks; adapters receive the same signal
 * so in-flight requests abort too.
 */
export async function readAll(
  reader: Reader,
  signal?: AbortSignal,
  path = "",
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  throwIfAborted(signal, "read", path);
  for await (const chunk of reader) {
    throwIfAborted(signal, "read", path);
    chunks.push(chunk);
  }
  return concatBytes(chunks);
}

/**
 * Reader that passes every iteration failure through `mapError`
 *
 * Adapters use this to translate stream errors (socket resets, errno codes)
 * raised after read() has already returned.
 */
export function mapReaderErrors(
  reader: Reader,
  mapError: (error: unknown) => unknown,
): Reader {
  return {
    restartable: reader.restartable,
    size: reader.size,
    async *[Symbol.asyncIterator]() {
      try {
        yield* reader;
      } catch (error) {
        throw mapError(error);
      }
    },
  };
}

/**
 * Empty restartable reader
 */
export function emptyReader(): Reader {
  return new BytesReader(new Uint8Array(0));
}
