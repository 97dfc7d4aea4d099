/**
 * Buffered writer
 *
 * Chunks stay in memory until close(), which commits them through a single
 * backend write. Nothing becomes visible before the commit, and abort()
 * leaves the backend untouched.
 */

import { ErrorKind, StorageError } from "../core/errors.js";
import type { Metadata, Reader, Writer } from "../core/types.js";
import { BytesReader, concatBytes } from "./reader.js";

export type CommitFn = (reader: Reader) => Promise<Metadata>;

type WriterState = "open" | "closed" | "aborted";

const encoder = new TextEncoder();

export class BufferedWriter implements Writer {
  private chunks: Uint8Array[] = [];
  private state: WriterState = "open";
  private written = 0;

  constructor(
    private readonly commit: CommitFn,
    private readonly path: string,
  ) {}

  /** Bytes accepted so far */
  get bytesWritten(): number {
    return this.written;
  }

  async write(chunk: Uint8Array | string): Promise<void> {
    this.assertOpen();
    // Copy: the caller may reuse its buffer
    const bytes =
      typeof chunk === "string" ? encoder.encode(chunk) : chunk.slice();
    this.chunks.push(bytes);
    this.written += bytes.length;
  }

  async close(): Promise<Metadata> {
    this.assertOpen();
    this.state = "closed";
    const data = concatBytes(this.chunks);
    this.chunks = [];
    return this.commit(new BytesReader(data));
  }

  abort(): void {
    this.state = "aborted";
    this.chunks = [];
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "write",
        this.path,
        `writer is ${this.state}`,
      );
    }
  }
}
