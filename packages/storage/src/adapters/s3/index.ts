/**
 * S3-compatible storage adapter
 *
 * Talks to AWS S3 or any S3-compatible service (MinIO, R2, ...) through
 * @aws-sdk/client-s3. Objects live under `root` inside one bucket; directory
 * markers are empty objects whose key ends in '/'.
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { defineCapability } from "../../core/capability.js";
import {
  type CredentialResolver,
  CachedResolver,
  staticResolver,
} from "../../core/credentials.js";
import {
  ErrorKind,
  type Operation,
  StorageError,
  classifyErrnoCode,
  classifyHttpStatus,
  getErrnoCode,
  isAbortError,
  isErrorKind,
  isStorageError,
  throwIfAborted,
  toStorageError,
} from "../../core/errors.js";
import { noopLogger } from "../../core/logger.js";
import { dirMetadata, fileMetadata } from "../../core/metadata.js";
import {
  ObjectId,
  buildAbsPath,
  buildRelPath,
  normalizeRoot,
} from "../../core/path.js";
import { formatRangeHeader } from "../../core/range.js";
import type {
  Accessor,
  AccessorInfo,
  AdapterConfig,
  Lister,
  Metadata,
  OpCreateDir,
  OpDelete,
  OpList,
  OpRead,
  OpStat,
  OpWrite,
  Reader,
  StorageLogger,
} from "../../core/types.js";
import { type ListedEntry, PageLister } from "../../io/lister.js";
import {
  StreamReader,
  emptyReader,
  mapReaderErrors,
  readAll,
} from "../../io/reader.js";

/**
 * Static or resolved AWS credentials
 */
export interface S3Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

/**
 * Server-side encryption settings
 *
 * - SSE-S3:  `{ serverSideEncryption: 'AES256' }`
 * - SSE-KMS: `{ serverSideEncryption: 'aws:kms', kmsKeyId?: '...' }`
 * - SSE-C:   `{ customerAlgorithm: 'AES256', customerKey: '<base64>', customerKeyMd5: '<base64>' }`
 */
export interface S3Encryption {
  serverSideEncryption?: "AES256" | "aws:kms";
  kmsKeyId?: string;
  customerAlgorithm?: string;
  customerKey?: string;
  customerKeyMd5?: string;
}

/**
 * S3 storage configuration
 */
export interface S3AccessorConfig extends AdapterConfig {
  /** S3 bucket name */
  bucket: string;

  /** Key prefix within the bucket (default: '/') */
  root?: string;

  /** Endpoint for S3-compatible services; default is AWS */
  endpoint?: string;

  /** Signing region; when unset, `regionResolver` or 'us-east-1' */
  region?: string;

  /** Looks up the bucket's region on first use */
  regionResolver?: CredentialResolver<string>;

  /** Static credentials (uses the SDK default chain if neither is given) */
  credentials?: S3Credentials;

  /** Credential source, cached by the adapter */
  credentialResolver?: CredentialResolver<S3Credentials>;

  /** Address buckets as `bucket.host` instead of `host/bucket` */
  virtualHostStyle?: boolean;

  encryption?: S3Encryption;

  /** Keys per ListObjectsV2 request (default: 1000) */
  pageSize?: number;

  /** Preconfigured client; endpoint, region and credentials are then ignored */
  client?: S3Client;
}

export const DEFAULT_S3_ENDPOINT = "https://s3.amazonaws.com";
export const DEFAULT_S3_REGION = "us-east-1";

/** PutObject accepts at most 5 GiB in one request */
export const S3_MAX_PUT_SIZE = 5 * 1024 ** 3;

/**
 * Global endpoints that have a regional form
 */
const ENDPOINT_TEMPLATES = new Map([
  [DEFAULT_S3_ENDPOINT, "https://s3.{region}.amazonaws.com"],
]);

/**
 * Final endpoint URL for a bucket in a region
 *
 * - a missing scheme gets 'https://'
 * - a bucket name baked into the host is stripped
 * - known global endpoints become their regional form
 *
 * @example
 * resolveEndpoint(undefined, 'us-east-2', 'test')          // => 'https://s3.us-east-2.amazonaws.com'
 * resolveEndpoint('minio.local:9000', 'us-east-1', 'test') // => 'https://minio.local:9000'
 */
export function resolveEndpoint(
  endpoint: string | undefined,
  region: string,
  bucket: string,
): string {
  let url = (endpoint ?? DEFAULT_S3_ENDPOINT).trim().replace(/\/+$/, "");
  if (!/^https?:\/\//.test(url)) {
    url = `https://${url}`;
  }
  url = url.replace(`//${bucket}.`, "//");

  const template = ENDPOINT_TEMPLATES.get(url);
  return template ? template.replace("{region}", region) : url;
}

// ============================================================================
// Error Classification
// ============================================================================

const S3_ERROR_KINDS: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  ["NoSuchKey", ErrorKind.NotFound],
  ["NoSuchBucket", ErrorKind.NotFound],
  ["NotFound", ErrorKind.NotFound],
  ["AccessDenied", ErrorKind.PermissionDenied],
  ["InvalidAccessKeyId", ErrorKind.PermissionDenied],
  ["SignatureDoesNotMatch", ErrorKind.PermissionDenied],
  ["ExpiredToken", ErrorKind.PermissionDenied],
  ["CredentialsProviderError", ErrorKind.PermissionDenied],
  ["PreconditionFailed", ErrorKind.AlreadyExists],
  ["InvalidRange", ErrorKind.InvalidInput],
  ["InvalidArgument", ErrorKind.InvalidInput],
  ["EntityTooLarge", ErrorKind.InvalidInput],
  ["SlowDown", ErrorKind.RateLimited],
  ["Throttling", ErrorKind.RateLimited],
  ["ThrottlingException", ErrorKind.RateLimited],
  ["TooManyRequests", ErrorKind.RateLimited],
  ["RequestLimitExceeded", ErrorKind.RateLimited],
  ["InternalError", ErrorKind.Unavailable],
  ["ServiceUnavailable", ErrorKind.Unavailable],
  ["RequestTimeout", ErrorKind.Unavailable],
  ["TimeoutError", ErrorKind.Unavailable],
]);

/**
 * Map an SDK or transport error into the taxonomy
 *
 * The S3 error code wins, then the HTTP status. Transport failures that
 * carry an errno code (socket resets, DNS failures) are Unavailable.
 */
export function classifyS3Error(
  error: unknown,
  operation: Operation,
  path: string,
): StorageError {
  if (isStorageError(error) || isAbortError(error)) {
    return toStorageError(error, operation, path);
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : undefined;

  let kind: ErrorKind | undefined =
    name !== undefined ? S3_ERROR_KINDS.get(name) : undefined;

  if (kind === undefined && error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    kind = status !== undefined ? classifyHttpStatus(status) : ErrorKind.Unexpected;
  }

  if (kind === undefined) {
    // Socket-level failures carry an errno code; anything else is a bug
    const code = getErrnoCode(error);
    const errnoKind = classifyErrnoCode(code);
    kind =
      code !== undefined && errnoKind === ErrorKind.Unexpected
        ? ErrorKind.Unavailable
        : errnoKind;
  }

  const retryAfter =
    kind === ErrorKind.RateLimited || kind === ErrorKind.Unavailable
      ? retryAfterOf(error)
      : undefined;

  return new StorageError(kind, operation, path, message, { cause: error, retryAfter });
}

/**
 * Server's Retry-After hint in milliseconds, as seconds or an HTTP date
 */
function retryAfterOf(error: unknown): number | undefined {
  if (!(error instanceof S3ServiceException)) return undefined;
  const header = error.$response?.headers["retry-after"]?.trim();
  if (!header) return undefined;

  if (/^\d+$/.test(header)) {
    return Number(header) * 1000;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

// ============================================================================
// S3 Accessor
// ============================================================================

/**
 * S3-compatible accessor
 */
export class S3Accessor implements Accessor {
  private readonly bucket: string;
  private readonly logger: StorageLogger;
  private readonly accessorInfo: AccessorInfo;
  private readonly encryption: S3Encryption;
  private readonly pageSize: number;
  private readonly regionResolver?: CredentialResolver<string>;
  private readonly credentialResolver?: CredentialResolver<S3Credentials>;
  private clientPromise: Promise<S3Client> | null = null;

  constructor(private readonly config: S3AccessorConfig) {
    if (!config.bucket) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "resolve",
        "/",
        "bucket is required",
      );
    }

    this.bucket = config.bucket;
    this.logger = config.logger ?? noopLogger;
    this.encryption = config.encryption ?? {};
    this.pageSize = config.pageSize ?? 1000;

    if (this.encryption.customerKey && !this.encryption.customerAlgorithm) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "resolve",
        "/",
        "customerAlgorithm is required with customerKey",
      );
    }

    this.accessorInfo = Object.freeze({
      scheme: "s3",
      root: normalizeRoot(config.root ?? "/"),
      name: config.bucket,
      capability: defineCapability({
        read: true,
        write: true,
        delete: true,
        list: true,
        stat: true,
        createDir: true,
        rangeRead: true,
        maxRequestSize: S3_MAX_PUT_SIZE,
      }),
    });

    // Resolver failures come back classified and are never cached
    const regionSource = config.regionResolver;
    if (regionSource) {
      this.regionResolver = new CachedResolver(
        (signal) => regionSource.resolve(signal),
        { name: "s3 region" },
      );
    }
    const credentialSource = config.credentialResolver;
    if (credentialSource) {
      this.credentialResolver = new CachedResolver(
        (signal) => credentialSource.resolve(signal),
        { name: "s3 credentials" },
      );
    } else if (config.credentials) {
      this.credentialResolver = staticResolver(config.credentials);
    }

    if (config.client) {
      this.clientPromise = Promise.resolve(config.client);
    }

    this.logger.debug(
      { bucket: this.bucket, root: this.accessorInfo.root },
      "S3Accessor initialized",
    );
  }

  info(): AccessorInfo {
    return this.accessorInfo;
  }

  /**
   * Build the client on first use, once the region is known
   */
  private getClient(signal: AbortSignal | undefined): Promise<S3Client> {
    if (!this.clientPromise) {
      const pending = this.createClient(signal);
      this.clientPromise = pending;
      // A failed resolution is retried on the next call
      pending.catch(() => {
        if (this.clientPromise === pending) {
          this.clientPromise = null;
        }
      });
    }
    return this.clientPromise;
  }

  private async createClient(signal: AbortSignal | undefined): Promise<S3Client> {
    const { config } = this;

    let region = config.region;
    if (!region && this.regionResolver) {
      region = await this.regionResolver.resolve(signal);
    }
    region = region || DEFAULT_S3_REGION;

    // Resolve once up front so a bad source fails before any request is sent
    const credentials = this.credentialResolver;
    if (credentials) {
      await credentials.resolve(signal);
    }

    const endpoint = resolveEndpoint(config.endpoint, region, this.bucket);
    this.logger.debug({ endpoint, region }, "S3 client configured");

    return new S3Client({
      region,
      endpoint,
      forcePathStyle: !config.virtualHostStyle,
      ...(credentials ? { credentials: () => credentials.resolve() } : {}),
    });
  }

  private keyOf(id: ObjectId): string {
    return buildAbsPath(this.accessorInfo.root, id);
  }

  private customerKeyParams(): {
    SSECustomerAlgorithm?: string;
    SSECustomerKey?: string;
    SSECustomerKeyMD5?: string;
  } {
    const { customerAlgorithm, customerKey, customerKeyMd5 } = this.encryption;
    if (!customerKey) return {};
    return {
      SSECustomerAlgorithm: customerAlgorithm,
      SSECustomerKey: customerKey,
      SSECustomerKeyMD5: customerKeyMd5,
    };
  }

  // ---- Read Operations ----

  async read(id: ObjectId, args: OpRead): Promise<Reader> {
    throwIfAborted(args.signal, "read", id.path);

    // A zero-length range has no valid Range header; existence still counts
    if (args.range?.size === 0) {
      await this.stat(id, { signal: args.signal });
      return emptyReader();
    }

    try {
      const client = await this.getClient(args.signal);
      const output = await client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.keyOf(id),
          Range: args.range ? formatRangeHeader(args.range) : undefined,
          ...this.customerKeyParams(),
        }),
        { abortSignal: args.signal },
      );

      if (!output.Body) {
        return emptyReader();
      }

      const reader = new StreamReader(
        output.Body.transformToWebStream(),
        output.ContentLength,
      );
      return mapReaderErrors(reader, (error) =>
        classifyS3Error(error, "read", id.path),
      );
    } catch (error) {
      throw classifyS3Error(error, "read", id.path);
    }
  }

  async stat(id: ObjectId, args: OpStat): Promise<Metadata> {
    throwIfAborted(args.signal, "stat", id.path);

    try {
      const client = await this.getClient(args.signal);
      const output = await client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.keyOf(id),
          ...this.customerKeyParams(),
        }),
        { abortSignal: args.signal },
      );

      if (id.isDir()) {
        return dirMetadata();
      }
      return fileMetadata(output.ContentLength, {
        lastModified: output.LastModified,
        etag: output.ETag,
        contentType: output.ContentType,
      });
    } catch (error) {
      const storageError = classifyS3Error(error, "stat", id.path);
      // Directories are prefixes; a missing marker is not a missing directory
      if (id.isDir() && isErrorKind(storageError, ErrorKind.NotFound)) {
        return dirMetadata();
      }
      throw storageError;
    }
  }

  // ---- Write Operations ----

  async write(id: ObjectId, reader: Reader, args: OpWrite): Promise<Metadata> {
    try {
      // PutObject needs the length up front
      const body = await readAll(reader, args.signal, id.path);
      if (args.sizeHint !== undefined && args.sizeHint !== body.length) {
        throw new StorageError(
          ErrorKind.InvalidInput,
          "write",
          id.path,
          `expected ${args.sizeHint} bytes, received ${body.length}`,
        );
      }

      const client = await this.getClient(args.signal);
      const output = await client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.keyOf(id),
          Body: body,
          ContentLength: body.length,
          ContentType: args.contentType,
          ServerSideEncryption: this.encryption.serverSideEncryption,
          SSEKMSKeyId: this.encryption.kmsKeyId,
          ...this.customerKeyParams(),
        }),
        { abortSignal: args.signal },
      );

      this.logger.debug({ path: id.path, size: body.length }, "Object uploaded");

      return fileMetadata(body.length, {
        lastModified: new Date(),
        etag: output.ETag,
        contentType: args.contentType,
      });
    } catch (error) {
      throw classifyS3Error(error, "write", id.path);
    }
  }

  async createDir(id: ObjectId, args: OpCreateDir): Promise<void> {
    throwIfAborted(args.signal, "createDir", id.path);

    try {
      const client = await this.getClient(args.signal);
      await client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.keyOf(id),
          Body: new Uint8Array(0),
          ContentLength: 0,
          ServerSideEncryption: this.encryption.serverSideEncryption,
          SSEKMSKeyId: this.encryption.kmsKeyId,
          ...this.customerKeyParams(),
        }),
        { abortSignal: args.signal },
      );
    } catch (error) {
      throw classifyS3Error(error, "createDir", id.path);
    }
  }

  // ---- Delete Operations ----

  async delete(id: ObjectId, args: OpDelete): Promise<void> {
    throwIfAborted(args.signal, "delete", id.path);

    try {
      const client = await this.getClient(args.signal);
      await client.send(
        new DeleteObjectCommand({ Bucket: this.bucket, Key: this.keyOf(id) }),
        { abortSignal: args.signal },
      );
      this.logger.debug({ path: id.path }, "Object deleted");
    } catch (error) {
      const storageError = classifyS3Error(error, "delete", id.path);
      if (!isErrorKind(storageError, ErrorKind.NotFound)) {
        throw storageError;
      }
    }
  }

  // ---- List Operations ----

  async list(id: ObjectId, args: OpList): Promise<Lister> {
    throwIfAborted(args.signal, "list", id.path);
    const prefix = this.keyOf(id);

    return new PageLister(async (token) => {
      try {
        const client = await this.getClient(args.signal);
        const output = await client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            Delimiter: "/",
            MaxKeys: this.pageSize,
            ContinuationToken: token,
          }),
          { abortSignal: args.signal },
        );

        const entries: ListedEntry[] = [];
        for (const common of output.CommonPrefixes ?? []) {
          if (!common.Prefix) continue;
          entries.push({
            id: this.idOf(common.Prefix),
            metadata: dirMetadata(),
          });
        }
        for (const object of output.Contents ?? []) {
          // Skip the directory's own marker
          if (!object.Key || object.Key === prefix) continue;
          entries.push({
            id: this.idOf(object.Key),
            metadata: object.Key.endsWith("/")
              ? dirMetadata()
              : fileMetadata(object.Size, {
                  lastModified: object.LastModified,
                  etag: object.ETag,
                }),
          });
        }
        entries.sort((a, b) =>
          a.id.path < b.id.path ? -1 : a.id.path > b.id.path ? 1 : 0,
        );

        return {
          entries,
          nextToken: output.IsTruncated
            ? output.NextContinuationToken
            : undefined,
        };
      } catch (error) {
        throw classifyS3Error(error, "list", id.path);
      }
    });
  }

  private idOf(key: string): ObjectId {
    return ObjectId.fromNormalized(buildRelPath(this.accessorInfo.root, key));
  }
}
