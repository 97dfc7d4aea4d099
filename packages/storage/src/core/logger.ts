import type { StorageLogger } from "./types.js";

/**
 * No-op logger for when none is provided
 */
export const noopLogger: StorageLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
