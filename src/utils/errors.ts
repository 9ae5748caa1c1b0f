/**
 * Error taxonomy for the preview extractor.
 *
 * Every failure is fatal to the invocation: nothing here is retried. The CLI
 * converts whatever reaches it into an error.v1 body for the log and a single
 * diagnostic line for stderr.
 */

/**
 * Error codes for structured error output
 */
export type ErrorCode = "USAGE" | "LOAD_FAILED" | "WRITE_FAILED" | "INTERNAL";

/**
 * Structured error body (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Wrong number of command-line arguments.
 */
export class UsageError extends Error {
  readonly code = "USAGE" as const;

  constructor(message: string = "Usage: extract-preview-data <config-path> <output-path>") {
    super(message);
    this.name = "UsageError";
    Error.captureStackTrace?.(this, UsageError);
  }
}

/**
 * Source document is missing, unreadable or not valid YAML.
 */
export class LoadError extends Error {
  readonly code = "LOAD_FAILED" as const;

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LoadError";
    Error.captureStackTrace?.(this, LoadError);
  }
}

/**
 * Destination file could not be created or written.
 */
export class WriteError extends Error {
  readonly code = "WRITE_FAILED" as const;

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "WriteError";
    Error.captureStackTrace?.(this, WriteError);
  }
}

export type ExtractorError = UsageError | LoadError | WriteError;

/**
 * Build a structured error body
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/** Message of the underlying cause, when there is one worth showing. */
export function describeCause(cause: unknown): string | undefined {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return undefined;
}

/**
 * Convert any error to ErrorV1
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (error instanceof UsageError) {
    return buildErrorV1(error.code, error.message);
  }

  if (error instanceof LoadError || error instanceof WriteError) {
    const details: Record<string, unknown> = { path: error.path };
    const cause = describeCause(error.cause);
    if (cause !== undefined) {
      details.cause = cause;
    }
    return buildErrorV1(error.code, error.message, details);
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred");
  }

  return buildErrorV1("INTERNAL", String(error));
}
