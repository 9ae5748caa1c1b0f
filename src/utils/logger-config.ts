/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options and redaction paths.
 *
 * Platform configs routinely carry connection credentials next to the
 * sections the extractor reads; any of these keys that reach a log line
 * are censored.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.password",
  "*.secret",
  "*.token",
  "*.api_key",
  "*.apiKey",
  "*.client_secret",
  "*.access_key_id",
  "*.secret_access_key",
  "*.signing_key",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    name: "extract-preview-data",
    level,
    redact: createRedactConfig(),
  };
}
