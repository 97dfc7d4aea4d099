/**
 * Range layer
 *
 * Makes ranged reads work on every backend. Backends that advertise
 * `rangeRead` receive the range and their output is still bounded to the
 * window; for the rest the whole object is read and limited client-side.
 */

import type { ObjectId } from "../core/path.js";
import { isFullRange, validateRange } from "../core/range.js";
import type {
  Accessor,
  AccessorInfo,
  Lister,
  Metadata,
  OpCreateDir,
  OpDelete,
  OpList,
  OpRead,
  OpStat,
  OpWrite,
  Reader,
} from "../core/types.js";
import { LimitedReader } from "../io/limited-reader.js";

export class RangeLayer implements Accessor {
  constructor(private readonly inner: Accessor) {}

  info(): AccessorInfo {
    return this.inner.info();
  }

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    if (args.range === undefined || isFullRange(args.range)) {
      return this.inner.read(id, { signal: args.signal });
    }

    const range = validateRange(args.range);

    if (this.inner.info().capability.rangeRead) {
      const reader = await this.inner.read(id, { ...args, range });
      return range.size === undefined
        ? reader
        : new LimitedReader(reader, 0, range.size, id.path);
    }

    const reader = await this.inner.read(id, { signal: args.signal });
    return new LimitedReader(reader, range.offset, range.size, id.path);
  }

  write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    return this.inner.write(id, reader, args);
  }

  stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    return this.inner.stat(id, args);
  }

  delete(id: ObjectId, args: OpDelete): Promise<void> {
    return this.inner.delete(id, args);
  }

  list(id: ObjectId, args: OpList): Promise<Lister> {
    return this.inner.list(id, args);
  }

  createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    return this.inner.createDir(id, args);
  }
}
