/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to the environment variables the
 * extractor reads. The output document never depends on these values; they
 * only tune process behaviour such as log verbosity.
 */

import { z } from "zod";

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  runtime: z.object({
    // unrecognised values (staging, "") must not block the extractor
    nodeEnv: Environment.catch("development"),
    logLevel: LogLevel.default("info"),
  }),
  testing: z.object({
    isVitest: z
      .union([z.string(), z.undefined()])
      .transform((val) => val !== undefined && val !== "" && val !== "false"),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL === "" ? undefined : env.LOG_LEVEL?.toLowerCase().trim(),
    },
    testing: {
      isVitest: env.VITEST,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables (${issues}).`);
  }
  return result.data;
}

/**
 * Parsed once on first access and cached thereafter, so tests can stub
 * environment variables before anything reads them.
 */
let _cachedConfig: Config | null = null;

/**
 * Get configuration
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Check if running in test environment
 */
export function isTest(): boolean {
  const cfg = getConfig();
  return cfg.runtime.nodeEnv === "test" || cfg.testing.isVitest;
}
