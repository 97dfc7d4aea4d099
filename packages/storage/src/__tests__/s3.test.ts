import {
  NoSuchKey,
  S3Client,
  S3ServiceException,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from "@aws-sdk/client-s3";
import type { InitializeMiddleware } from "@smithy/types";
import { describe, expect, it } from "vitest";
import {
  S3Accessor,
  type S3AccessorConfig,
  S3_MAX_PUT_SIZE,
  classifyS3Error,
  resolveEndpoint,
} from "../adapters/s3/index.js";
import { ErrorKind } from "../core/errors.js";
import { normalizePath } from "../core/path.js";
import { collectEntries } from "../io/lister.js";
import { readAll, toReader } from "../io/reader.js";
import { Operator } from "../operator.js";
import { catchStorageError, expectStorageError } from "./testkit/index.js";

const id = normalizePath;

type Respond = (input: ServiceInputTypes) => ServiceOutputTypes;

interface SentCommand {
  command: string;
  input: ServiceInputTypes;
}

/**
 * Real client whose requests are answered in-process before serialization
 */
function stubbedClient(handlers: Record<string, Respond>) {
  const sent: SentCommand[] = [];
  const client = new S3Client({
    region: "us-east-1",
    credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
  });

  const transport: InitializeMiddleware<ServiceInputTypes, ServiceOutputTypes> =
    (_next, context) => async (args) => {
      const command = context.commandName ?? "unknown";
      sent.push({ command, input: args.input });
      const respond = handlers[command];
      if (!respond) {
        throw new Error(`no stub for ${command}`);
      }
      return { output: respond(args.input), response: {} };
    };
  client.middlewareStack.add(transport, {
    step: "initialize",
    priority: "high",
    name: "stubTransport",
  });

  return { client, sent };
}

function accessorWith(
  handlers: Record<string, Respond>,
  config: Partial<S3AccessorConfig> = {},
) {
  const { client, sent } = stubbedClient(handlers);
  const accessor = new S3Accessor({
    bucket: "test-bucket",
    root: "/data/",
    client,
    ...config,
  });
  return { accessor, sent };
}

function notFound(): never {
  throw new NoSuchKey({ message: "The specified key does not exist.", $metadata: {} });
}

function serviceError(name: string, status: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: status >= 500 ? "server" : "client",
    $metadata: { httpStatusCode: status },
    message: name,
  });
}

describe("resolveEndpoint", () => {
  it("uses the regional AWS endpoint by default", () => {
    expect(resolveEndpoint(undefined, "us-east-2", "test")).toBe(
      "https://s3.us-east-2.amazonaws.com",
    );
  });

  it("adds a scheme to a bare host", () => {
    expect(resolveEndpoint("minio.local:9000", "us-east-1", "test")).toBe(
      "https://minio.local:9000",
    );
  });

  it("keeps an explicit http scheme and drops trailing slashes", () => {
    expect(resolveEndpoint("http://localhost:9000/", "us-east-1", "test")).toBe(
      "http://localhost:9000",
    );
  });

  it("strips a bucket baked into the host", () => {
    expect(resolveEndpoint("https://test.s3.amazonaws.com", "eu-west-1", "test")).toBe(
      "https://s3.eu-west-1.amazonaws.com",
    );
  });
});

describe("classifyS3Error", () => {
  it("classifies by S3 error code first", () => {
    expect(classifyS3Error(serviceError("SlowDown", 503), "read", "f").kind).toBe(
      ErrorKind.RateLimited,
    );
    expect(classifyS3Error(serviceError("AccessDenied", 403), "read", "f").kind).toBe(
      ErrorKind.PermissionDenied,
    );
    expect(
      classifyS3Error(serviceError("PreconditionFailed", 412), "write", "f").kind,
    ).toBe(ErrorKind.AlreadyExists);
  });

  it("falls back to the HTTP status", () => {
    expect(classifyS3Error(serviceError("Unknown", 404), "stat", "f").kind).toBe(
      ErrorKind.NotFound,
    );
    expect(classifyS3Error(serviceError("Unknown", 502), "stat", "f").kind).toBe(
      ErrorKind.Unavailable,
    );
  });

  it("treats socket failures as Unavailable", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const dns = Object.assign(new Error("getaddrinfo failed"), { code: "EAI_AGAIN" });
    expect(classifyS3Error(reset, "read", "f").kind).toBe(ErrorKind.Unavailable);
    expect(classifyS3Error(dns, "read", "f").kind).toBe(ErrorKind.Unavailable);
  });

  it("reports unknown errors as Unexpected with context", () => {
    const error = classifyS3Error(new Error("boom"), "list", "d/");
    expect(error.message).toBe("list d/: Unexpected: boom");
  });

  it("carries the Retry-After hint on throttling", () => {
    const throttled = Object.assign(serviceError("SlowDown", 503), {
      $response: { statusCode: 503, headers: { "retry-after": "2" }, body: undefined },
    });
    const error = classifyS3Error(throttled, "read", "f");
    expect(error.kind).toBe(ErrorKind.RateLimited);
    expect(error.retryAfter).toBe(2000);
  });

  it("ignores Retry-After on permanent failures", () => {
    const denied = Object.assign(serviceError("AccessDenied", 403), {
      $response: { statusCode: 403, headers: { "retry-after": "2" }, body: undefined },
    });
    expect(classifyS3Error(denied, "read", "f").retryAfter).toBeUndefined();
    expect(classifyS3Error(serviceError("SlowDown", 503), "read", "f").retryAfter).toBeUndefined();
  });

  it("reports aborts as Unexpected", () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    expect(classifyS3Error(abort, "read", "f").detail).toBe("aborted");
  });
});

describe("S3Accessor", () => {
  describe("configuration", () => {
    it("requires a bucket", () => {
      catchStorageError(() => new S3Accessor({ bucket: "" }), ErrorKind.InvalidInput);
    });

    it("requires an algorithm with a customer key", () => {
      catchStorageError(
        () => new S3Accessor({ bucket: "b", encryption: { customerKey: "dGVzdA==" } }),
        ErrorKind.InvalidInput,
      );
    });

    it("reports its info", () => {
      const { accessor } = accessorWith({});
      const info = accessor.info();
      expect(info.scheme).toBe("s3");
      expect(info.name).toBe("test-bucket");
      expect(info.root).toBe("/data/");
      expect(info.capability.rangeRead).toBe(true);
      expect(info.capability.maxRequestSize).toBe(S3_MAX_PUT_SIZE);
    });
  });

  describe("stat", () => {
    it("maps HeadObject output", async () => {
      const lastModified = new Date("2026-01-02T03:04:05Z");
      const { accessor, sent } = accessorWith({
        HeadObjectCommand: () => ({
          $metadata: {},
          ContentLength: 5,
          ETag: '"abc"',
          ContentType: "text/plain",
          LastModified: lastModified,
        }),
      });

      const metadata = await accessor.stat(id("docs/a.txt"), {});

      expect(metadata).toEqual({
        isDirectory: false,
        size: 5,
        etag: '"abc"',
        contentType: "text/plain",
        lastModified,
      });
      expect(sent[0]?.input).toMatchObject({ Bucket: "test-bucket", Key: "data/docs/a.txt" });
    });

    it("fails NotFound for a missing key", async () => {
      const { accessor } = accessorWith({ HeadObjectCommand: notFound });
      const error = await expectStorageError(accessor.stat(id("nope"), {}), ErrorKind.NotFound);
      expect(error.operation).toBe("stat");
      expect(error.path).toBe("nope");
    });

    it("reports a directory without a marker object", async () => {
      const { accessor } = accessorWith({ HeadObjectCommand: notFound });
      expect((await accessor.stat(id("prefix/"), {})).isDirectory).toBe(true);
    });
  });

  describe("read", () => {
    it("sends the range header", async () => {
      const { accessor, sent } = accessorWith({
        GetObjectCommand: () => ({ $metadata: {} }),
      });

      await accessor.read(id("blob"), { range: { offset: 10, size: 5 } });

      expect(sent.map((s) => s.command)).toEqual(["GetObjectCommand"]);
      expect(sent[0]?.input).toMatchObject({ Key: "data/blob", Range: "bytes=10-14" });
    });

    it("sends an open-ended range", async () => {
      const { accessor, sent } = accessorWith({
        GetObjectCommand: () => ({ $metadata: {} }),
      });

      await accessor.read(id("blob"), { range: { offset: 7 } });
      expect(sent[0]?.input).toMatchObject({ Range: "bytes=7-" });
    });

    it("checks existence for a zero-length range", async () => {
      const { accessor, sent } = accessorWith({
        HeadObjectCommand: () => ({ $metadata: {}, ContentLength: 3 }),
      });

      const reader = await accessor.read(id("blob"), { range: { offset: 1, size: 0 } });

      expect(await readAll(reader)).toEqual(new Uint8Array(0));
      expect(sent.map((s) => s.command)).toEqual(["HeadObjectCommand"]);
    });

    it("passes customer encryption keys", async () => {
      const { accessor, sent } = accessorWith(
        { GetObjectCommand: () => ({ $metadata: {} }) },
        {
          encryption: {
            customerAlgorithm: "AES256",
            customerKey: "dGVzdC1zZWNyZXQ=",
            customerKeyMd5: "dGVzdA==",
          },
        },
      );

      await accessor.read(id("sealed"), {});
      expect(sent[0]?.input).toMatchObject({ SSECustomerAlgorithm: "AES256" });
    });

    it("fails NotFound for a missing key", async () => {
      const { accessor } = accessorWith({ GetObjectCommand: notFound });
      await expectStorageError(accessor.read(id("missing"), {}), ErrorKind.NotFound);
    });
  });

  describe("write", () => {
    it("uploads the body with its length and type", async () => {
      const { accessor, sent } = accessorWith(
        { PutObjectCommand: () => ({ $metadata: {}, ETag: '"etag-1"' }) },
        { encryption: { serverSideEncryption: "AES256" } },
      );

      const metadata = await accessor.write(id("notes/today.txt"), toReader("hello"), {
        contentType: "text/plain",
      });

      expect(metadata.size).toBe(5);
      expect(metadata.etag).toBe('"etag-1"');
      expect(metadata.contentType).toBe("text/plain");
      expect(sent[0]?.input).toMatchObject({
        Bucket: "test-bucket",
        Key: "data/notes/today.txt",
        Body: new TextEncoder().encode("hello"),
        ContentLength: 5,
        ContentType: "text/plain",
        ServerSideEncryption: "AES256",
      });
    });

    it("rejects content that contradicts the size hint", async () => {
      const { accessor, sent } = accessorWith({
        PutObjectCommand: () => ({ $metadata: {} }),
      });

      await expectStorageError(
        accessor.write(id("f"), toReader("abc"), { sizeHint: 10 }),
        ErrorKind.InvalidInput,
      );
      expect(sent).toEqual([]);
    });
  });

  describe("createDir", () => {
    it("stores an empty marker object", async () => {
      const { accessor, sent } = accessorWith({
        PutObjectCommand: () => ({ $metadata: {} }),
      });

      await accessor.createDir(id("photos/"), {});
      expect(sent[0]?.input).toMatchObject({ Key: "data/photos/", ContentLength: 0 });
    });
  });

  describe("delete", () => {
    it("ignores missing keys", async () => {
      const { accessor } = accessorWith({ DeleteObjectCommand: notFound });
      await accessor.delete(id("gone"), {});
    });

    it("surfaces permission failures", async () => {
      const { accessor } = accessorWith({
        DeleteObjectCommand: () => {
          throw serviceError("AccessDenied", 403);
        },
      });
      await expectStorageError(accessor.delete(id("f"), {}), ErrorKind.PermissionDenied);
    });
  });

  describe("list", () => {
    it("pages with continuation tokens and maps prefixes to directories", async () => {
      const pages: Record<string, ServiceOutputTypes> = {
        first: {
          $metadata: {},
          IsTruncated: true,
          NextContinuationToken: "t2",
          CommonPrefixes: [{ Prefix: "data/dir/sub/" }],
          Contents: [
            { Key: "data/dir/", Size: 0 },
            { Key: "data/dir/b", Size: 2 },
          ],
        },
        t2: {
          $metadata: {},
          IsTruncated: false,
          Contents: [{ Key: "data/dir/a", Size: 1 }],
        },
      };
      const { accessor, sent } = accessorWith(
        {
          ListObjectsV2Command: (input) => {
            const token =
              "ContinuationToken" in input ? input.ContinuationToken : undefined;
            return pages[token ?? "first"] ?? { $metadata: {} };
          },
        },
        { pageSize: 2 },
      );

      const entries = await collectEntries(await accessor.list(id("dir/"), {}));

      expect(entries.map((e) => e.id.path)).toEqual(["dir/b", "dir/sub/", "dir/a"]);
      expect(entries.map((e) => e.metadata.isDirectory)).toEqual([false, true, false]);
      expect(entries[0]?.metadata.size).toBe(2);
      expect(sent.map((s) => s.input)).toMatchObject([
        { Prefix: "data/dir/", Delimiter: "/", MaxKeys: 2 },
        { Prefix: "data/dir/", Delimiter: "/", MaxKeys: 2, ContinuationToken: "t2" },
      ]);
    });

    it("classifies failures while paging", async () => {
      const { accessor } = accessorWith({
        ListObjectsV2Command: () => {
          throw serviceError("NoSuchBucket", 404);
        },
      });

      const lister = await accessor.list(id("/"), {});
      const error = await expectStorageError(collectEntries(lister), ErrorKind.NotFound);
      expect(error.operation).toBe("list");
    });
  });

  describe("behind an operator", () => {
    it("retries throttled requests", async () => {
      let attempts = 0;
      const { accessor } = accessorWith({
        HeadObjectCommand: () => {
          attempts += 1;
          if (attempts < 3) {
            throw serviceError("SlowDown", 503);
          }
          return { $metadata: {}, ContentLength: 1 };
        },
      });
      const op = new Operator(accessor, {
        retry: { baseDelay: 0, maxDelay: 0, jitter: false },
      });

      expect((await op.stat("f")).size).toBe(1);
      expect(attempts).toBe(3);
    });

    it("retries a failing region lookup as Unavailable", async () => {
      let calls = 0;
      const accessor = new S3Accessor({
        bucket: "test-bucket",
        credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
        regionResolver: {
          resolve: async () => {
            calls += 1;
            throw new Error("metadata endpoint timed out");
          },
        },
      });
      const op = new Operator(accessor, {
        retry: { maxAttempts: 3, baseDelay: 0, maxDelay: 0, jitter: false },
      });

      const error = await expectStorageError(op.stat("x"), ErrorKind.Unavailable);
      expect(error.message).toBe(
        "stat x: Unavailable: failed to resolve s3 region: metadata endpoint timed out",
      );
      expect(calls).toBe(3);
    });

    it("fails a rejected credential lookup as PermissionDenied without retrying", async () => {
      let calls = 0;
      const accessor = new S3Accessor({
        bucket: "test-bucket",
        region: "eu-west-1",
        credentialResolver: {
          resolve: async () => {
            calls += 1;
            const expired = new Error("The security token included in the request is expired");
            expired.name = "ExpiredToken";
            throw expired;
          },
        },
      });
      const op = new Operator(accessor, {
        retry: { maxAttempts: 3, baseDelay: 0, maxDelay: 0, jitter: false },
      });

      const error = await expectStorageError(op.stat("x"), ErrorKind.PermissionDenied);
      expect(error.operation).toBe("stat");
      expect(error.path).toBe("x");
      expect(calls).toBe(1);
    });
  });
});
