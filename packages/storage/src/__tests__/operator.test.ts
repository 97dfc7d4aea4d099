import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryAccessor } from "../adapters/memory/index.js";
import { ErrorKind } from "../core/errors.js";
import { fileMetadata } from "../core/metadata.js";
import { type ObjectId, normalizePath } from "../core/path.js";
import type { Lister, OpList, OpRead, Reader } from "../core/types.js";
import {
  type ListPage,
  type ListedEntry,
  PageLister,
  collectEntries,
} from "../io/lister.js";
import { DEFAULT_RETRY_POLICY } from "../layers/retry.js";
import { Operator } from "../operator.js";
import { FlakyAccessor, RecordingLogger, expectStorageError } from "./testkit/index.js";

const instant = { baseDelay: 0, maxDelay: 0, jitter: false };

/**
 * Memory backend whose readers fail with a plain error after one chunk
 */
class BrokenStreamAccessor extends MemoryAccessor {
  override async read(id: ObjectId, args: OpRead): Promise<Reader> {
    const inner = await super.read(id, args);
    return {
      restartable: false,
      size: inner.size,
      async *[Symbol.asyncIterator]() {
        yield new Uint8Array([1]);
        throw new Error("socket hang up");
      },
    };
  }
}

/**
 * Memory backend that lists 1000 entries in pages of 100, counting fetches
 */
class PagedListAccessor extends MemoryAccessor {
  readonly fetchPage = vi.fn(async (token: string | undefined): Promise<ListPage> => {
    const offset = token ? Number(token) : 0;
    const end = Math.min(1000, offset + 100);
    const entries: ListedEntry[] = [];
    for (let i = offset; i < end; i++) {
      entries.push({
        id: normalizePath(`big/f${String(i).padStart(4, "0")}`),
        metadata: fileMetadata(1),
      });
    }
    return { entries, nextToken: end < 1000 ? String(end) : undefined };
  });

  override async list(_id: ObjectId, _args: OpList): Promise<Lister> {
    return new PageLister(this.fetchPage);
  }
}

describe("Operator", () => {
  let backend: FlakyAccessor;
  let op: Operator;

  beforeEach(() => {
    backend = new FlakyAccessor(new MemoryAccessor());
    op = new Operator(backend, { retry: instant });
  });

  describe("end to end", () => {
    it("normalizes paths on every operation", async () => {
      await op.write("a//b/../c/file", "0123456789");

      const metadata = await op.stat("a/c/file");
      expect(metadata.isDirectory).toBe(false);
      expect(metadata.size).toBe(10);

      const entries = await collectEntries(await op.list("a//b/../c/"));
      expect(entries.map((e) => e.id.path)).toEqual(["a/c/file"]);
    });

    it("reads a byte range", async () => {
      await op.write("digits", "0123456789");
      expect(await op.readText("digits", { range: { offset: 2, size: 3 } })).toBe("234");
      expect(await op.readText("digits", { range: { offset: 8 } })).toBe("89");
    });

    it("reads bytes back unchanged", async () => {
      await op.write("bin", new Uint8Array([0, 255, 7]));
      expect(await op.readBytes("bin")).toEqual(new Uint8Array([0, 255, 7]));
    });

    it("stores the content type", async () => {
      await op.write("page.html", "<p></p>", { contentType: "text/html" });
      expect((await op.stat("page.html")).contentType).toBe("text/html");
    });

    it("treats deleting an absent object as success", async () => {
      await op.delete("never/written");
      expect(await op.exists("never/written")).toBe(false);
    });

    it("reports existence", async () => {
      await op.write("here", "x");
      expect(await op.exists("here")).toBe(true);
      await op.delete("here");
      expect(await op.exists("here")).toBe(false);
    });

    it("creates directories that stat as directories", async () => {
      await op.createDir("docs/");
      const entries = await collectEntries(await op.list("/"));
      expect(entries.map((e) => e.id.path)).toEqual(["docs/"]);
      expect((await op.stat("docs/")).isDirectory).toBe(true);
    });
  });

  describe("listing", () => {
    it("fetches one page when only three of 1000 entries are consumed", async () => {
      const paged = new PagedListAccessor();
      const listing = new Operator(paged, { retry: instant });

      const taken = await collectEntries(await listing.list("big/"), 3);

      expect(taken.map((e) => e.id.path)).toEqual([
        "big/f0000",
        "big/f0001",
        "big/f0002",
      ]);
      expect(paged.fetchPage).toHaveBeenCalledTimes(1);
    });
  });

  describe("path validation", () => {
    it("rejects a path escaping the root with the calling operation", async () => {
      const error = await expectStorageError(op.read("../x"), ErrorKind.InvalidPath);
      expect(error.operation).toBe("read");
      expect(error.path).toBe("../x");
      expect(backend.calls.read).toBe(0);
    });

    it("rejects a directory id where an object is required", async () => {
      await expectStorageError(op.write("dir/", "x"), ErrorKind.InvalidPath);
      await expectStorageError(op.read("dir/"), ErrorKind.InvalidPath);
      expect(backend.calls.write).toBe(0);
    });

    it("rejects an object id where a directory is required", async () => {
      await expectStorageError(op.list("file"), ErrorKind.InvalidPath);
      await expectStorageError(op.createDir("file"), ErrorKind.InvalidPath);
      expect(backend.calls.list).toBe(0);
      expect(backend.calls.createDir).toBe(0);
    });
  });

  describe("capability checks", () => {
    it("fails Unsupported without calling the backend", async () => {
      const limited = new FlakyAccessor(
        new MemoryAccessor({ capability: { createDir: false } }),
      );
      const limitedOp = new Operator(limited);

      const error = await expectStorageError(
        limitedOp.createDir("d/"),
        ErrorKind.Unsupported,
      );
      expect(error.message).toBe(
        "createDir d/: Unsupported: memory backend does not support createDir",
      );
      expect(limited.calls.createDir).toBe(0);
    });

    it("enforces the request size limit before writing", async () => {
      const limited = new FlakyAccessor(
        new MemoryAccessor({ capability: { maxRequestSize: 4 } }),
      );
      const limitedOp = new Operator(limited);

      const error = await expectStorageError(
        limitedOp.write("big", "hello"),
        ErrorKind.InvalidInput,
      );
      expect(error.message).toBe(
        "write big: InvalidInput: 5 bytes exceeds the 4 byte request limit",
      );
      expect(limited.calls.write).toBe(0);

      await limitedOp.write("ok", "four");
      expect(limited.calls.write).toBe(1);
    });
  });

  describe("size hints", () => {
    it("rejects a hint that contradicts known content", async () => {
      const error = await expectStorageError(
        op.write("f", "abc", { sizeHint: 4 }),
        ErrorKind.InvalidInput,
      );
      expect(error.detail).toBe("size hint 4 does not match content size 3");
      expect(backend.calls.write).toBe(0);
    });

    it("rejects a stream shorter than its hint", async () => {
      async function* body() {
        yield new TextEncoder().encode("abc");
      }
      const error = await expectStorageError(
        op.write("f", body(), { sizeHint: 4 }),
        ErrorKind.InvalidInput,
      );
      expect(error.detail).toBe("expected 4 bytes, received 3");
      expect(await op.exists("f")).toBe(false);
    });
  });

  describe("writer", () => {
    it("makes the object visible only after close", async () => {
      const writer = op.writer("log/out.txt", { contentType: "text/plain" });
      await writer.write("hello ");
      await writer.write("world");
      expect(await op.exists("log/out.txt")).toBe(false);

      const metadata = await writer.close();

      expect(metadata.size).toBe(11);
      expect(await op.readText("log/out.txt")).toBe("hello world");
      expect((await op.stat("log/out.txt")).contentType).toBe("text/plain");
    });

    it("validates the path up front", () => {
      expect(() => op.writer("dir/")).toThrow("write dir/: InvalidPath");
    });
  });

  describe("errors", () => {
    it("maps reader iteration failures with operation and path", async () => {
      const broken = new BrokenStreamAccessor();
      const brokenOp = new Operator(broken, { retry: instant });
      await brokenOp.write("x/y", "payload");

      const error = await expectStorageError(brokenOp.readBytes("x/y"), ErrorKind.Unexpected);
      expect(error.message).toBe("read x/y: Unexpected: socket hang up");
    });

    it("retries transient failures", async () => {
      await op.write("f", "x");
      backend.failNext("stat", ErrorKind.Unavailable, 2);

      expect((await op.stat("f")).size).toBe(1);
      expect(backend.calls.stat).toBe(3);
    });

    it("lets exists rethrow anything but NotFound", async () => {
      backend.failNext("stat", ErrorKind.PermissionDenied);
      await expectStorageError(op.exists("f"), ErrorKind.PermissionDenied);
    });

    it("reports an aborted call as Unexpected", async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await expectStorageError(
        op.stat("f", { signal: controller.signal }),
        ErrorKind.Unexpected,
      );
      expect(error.detail).toBe("aborted");
    });

    it("logs failed operations at debug level", async () => {
      const logger = new RecordingLogger();
      const loggedOp = new Operator(new MemoryAccessor(), { logger });

      await expectStorageError(loggedOp.stat("missing"), ErrorKind.NotFound);

      const failures = logger.at("debug").filter((r) => r.msg === "Operation failed");
      expect(failures.map((r) => r.obj)).toEqual([
        { operation: "stat", path: "missing", kind: ErrorKind.NotFound },
      ]);
    });
  });

  describe("configuration", () => {
    it("merges retry overrides onto the defaults", () => {
      const custom = new Operator(new MemoryAccessor(), { retry: { maxAttempts: 2 } });
      expect(custom.retryPolicy).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 2 });
    });

    it("reports the backend info", () => {
      const info = new Operator(new MemoryAccessor({ name: "scratch" })).info();
      expect(info.scheme).toBe("memory");
      expect(info.name).toBe("scratch");
      expect(info.root).toBe("/");
    });
  });
});
