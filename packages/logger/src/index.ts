import {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
  pino,
  transport,
} from "pino";

export type { Logger } from "pino";

export interface LoggerConfig {
  /** Service name for log identification */
  service: string;
  /** Log level (default: "info") */
  level?: string;
  /** Environment name (default: "development") */
  environment?: string;
  /** Enable pretty printing for development (default: false in production) */
  pretty?: boolean;
  /** Custom message format for pretty printing */
  messageFormat?: string;
  /** Fields to ignore in pretty output */
  ignoreFields?: string;
  /** Where JSON lines go when not pretty printing (default: stdout) */
  destination?: DestinationStream;
}

/**
 * Paths censored in every log line
 *
 * Storage configs carry credentials and SSE-C keys; they must never reach a
 * log sink even when a whole config object is logged.
 */
export const REDACTED_PATHS = [
  "secretAccessKey",
  "sessionToken",
  "customerKey",
  "*.secretAccessKey",
  "*.sessionToken",
  "*.customerKey",
  "*.*.secretAccessKey",
  "*.*.sessionToken",
  "*.*.customerKey",
];

/**
 * Creates a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = "info",
    environment = "development",
    pretty = environment !== "production",
    messageFormat = "[{module}] {msg}",
    ignoreFields = "pid,hostname,service,environment",
    destination,
  } = config;

  const base = {
    service,
    environment,
  };

  const options: LoggerOptions = {
    level,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => ({
        ...object,
        ...base,
      }),
    },
  };

  if (pretty && !destination) {
    // Development: Pretty console output
    return pino(
      options,
      transport({
        target: "pino-pretty",
        options: {
          destination: 1, // stdout
          colorize: true,
          translateTime: "SYS:standard",
          messageFormat,
          ignore: ignoreFields,
        },
      }),
    );
  }

  // Production: JSON output to stdout
  return pino(options, destination ?? process.stdout);
}

/**
 * Creates a child logger with an additional context field
 * @param parent - The parent logger instance
 * @param name - The name/module identifier for this child logger
 * @param contextKey - The key to use for the context (default: "module")
 */
export function createChildLogger(
  parent: Logger,
  name: string,
  contextKey = "module",
): Logger {
  return parent.child({ [contextKey]: name });
}
