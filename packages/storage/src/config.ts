/**
 * Configuration loading
 *
 * A storage config names one backend, an optional retry policy and logging
 * settings. String values may reference environment variables with
 * `${ENV:VAR_NAME}`, resolved before validation.
 *
 * ```typescript
 * const config = parseStorageConfig({
 *   service: { scheme: "s3", bucket: "assets", region: "eu-west-1",
 *     credentials: { accessKeyId: "${ENV:S3_KEY}", secretAccessKey: "${ENV:S3_SECRET}" } },
 *   retry: { maxAttempts: 5 },
 * });
 * const op = createOperator(config);
 * ```
 */

import { createChildLogger, createLogger } from "@unistore/logger";
import { z } from "zod";
import { LocalAccessor } from "./adapters/local/index.js";
import { MemoryAccessor } from "./adapters/memory/index.js";
import { S3Accessor } from "./adapters/s3/index.js";
import { ErrorKind, StorageError } from "./core/errors.js";
import type { Accessor, StorageLogger } from "./core/types.js";
import { Operator } from "./operator.js";

// =============================================================================
// ENVIRONMENT VARIABLE INTERPOLATION
// =============================================================================

const ENV_REFERENCE = /\$\{ENV:([^}]+)\}/g;

/**
 * Interpolate environment variables in a string.
 * Supports ${ENV:VAR_NAME} syntax.
 *
 * @throws StorageError(InvalidInput) when a referenced variable is not set
 *
 * @example
 * interpolateEnvVars("${ENV:BUCKET}-logs", { BUCKET: "assets" }) // "assets-logs"
 */
export function interpolateEnvVars(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return value.replace(ENV_REFERENCE, (_match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      throw new StorageError(
        ErrorKind.InvalidInput,
        "resolve",
        "config",
        `environment variable ${varName} is not set`,
      );
    }
    return envValue;
  });
}

/**
 * Interpolate every string inside a parsed JSON value
 */
function interpolateDeep(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateDeep(item, env));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        interpolateDeep(item, env),
      ]),
    );
  }
  return value;
}

// =============================================================================
// SCHEMAS
// =============================================================================

const nonNegativeInt = z.number().int().nonnegative();
const pageSize = z.number().int().positive().optional();

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().optional(),
  baseDelay: nonNegativeInt.optional(),
  maxDelay: nonNegativeInt.optional(),
  jitter: z.boolean().optional(),
});

const memoryServiceSchema = z.object({
  scheme: z.literal("memory"),
  name: z.string().optional(),
  root: z.string().optional(),
  pageSize,
});

const localServiceSchema = z.object({
  scheme: z.literal("local"),
  baseDir: z.string().min(1),
  fileMode: nonNegativeInt.optional(),
  dirMode: nonNegativeInt.optional(),
  pageSize,
});

const s3ServiceSchema = z.object({
  scheme: z.literal("s3"),
  bucket: z.string().min(1),
  root: z.string().optional(),
  endpoint: z.string().optional(),
  region: z.string().optional(),
  credentials: z
    .object({
      accessKeyId: z.string().min(1),
      secretAccessKey: z.string().min(1),
      sessionToken: z.string().optional(),
    })
    .optional(),
  virtualHostStyle: z.boolean().optional(),
  encryption: z
    .object({
      serverSideEncryption: z.enum(["AES256", "aws:kms"]).optional(),
      kmsKeyId: z.string().optional(),
      customerAlgorithm: z.string().optional(),
      customerKey: z.string().optional(),
      customerKeyMd5: z.string().optional(),
    })
    .optional(),
  pageSize,
});

export const serviceConfigSchema = z.discriminatedUnion("scheme", [
  memoryServiceSchema,
  localServiceSchema,
  s3ServiceSchema,
]);

const loggingSchema = z.object({
  level: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  pretty: z.boolean().optional(),
  service: z.string().default("storage"),
});

export const storageConfigSchema = z.object({
  service: serviceConfigSchema,
  retry: retryPolicySchema.optional(),
  logging: loggingSchema.optional(),
});

export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type StorageConfig = z.infer<typeof storageConfigSchema>;

// =============================================================================
// LOADING
// =============================================================================

/**
 * Validate a raw config value
 *
 * @throws StorageError(InvalidInput) listing every schema violation
 */
export function parseStorageConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): StorageConfig {
  const result = storageConfigSchema.safeParse(interpolateDeep(raw, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StorageError(
      ErrorKind.InvalidInput,
      "resolve",
      "config",
      `invalid storage config: ${issues}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Construct the backend a service config describes
 */
export function createAccessor(
  service: ServiceConfig,
  logger?: StorageLogger,
): Accessor {
  switch (service.scheme) {
    case "memory":
      return new MemoryAccessor({ ...service, logger });
    case "local":
      return new LocalAccessor({ ...service, logger });
    case "s3":
      return new S3Accessor({ ...service, logger });
  }
}

export interface CreateOperatorOptions {
  /** Use this logger instead of building one from `config.logging` */
  logger?: StorageLogger;
}

/**
 * Build a ready Operator from a validated config
 */
export function createOperator(
  config: StorageConfig,
  options: CreateOperatorOptions = {},
): Operator {
  let logger = options.logger;
  if (!logger) {
    const logging: LoggingConfig = config.logging ?? {
      level: "info",
      service: "storage",
    };
    const root = createLogger({
      service: logging.service,
      level: logging.level,
      pretty: logging.pretty,
    });
    logger = createChildLogger(root, config.service.scheme);
  }

  return new Operator(createAccessor(config.service, logger), {
    retry: config.retry,
    logger,
  });
}
