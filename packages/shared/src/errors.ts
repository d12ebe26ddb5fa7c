/**
 * Error taxonomy
 *
 * Every failure Waypost can raise happens while loading sources at
 * startup, and all of them are fatal. Each carries a stable `code` so the
 * bootstrap can log it without string matching.
 */

import type { SourceName } from "./types/index.js";

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  FILE_READ_FAILED: "FILE_READ_FAILED",
  PARSE_FAILED: "PARSE_FAILED",
  INVALID_RECORD: "INVALID_RECORD",
  STORE_OPEN_FAILED: "STORE_OPEN_FAILED",
  STORE_LOCKED: "STORE_LOCKED",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Classes
// =============================================================================

export interface WaypostErrorOptions {
  source?: SourceName;
  cause?: unknown;
}

/**
 * Base class for all Waypost errors.
 */
export class WaypostError extends Error {
  readonly code: ErrorCode;
  readonly source: SourceName | undefined;

  constructor(code: ErrorCode, message: string, options: WaypostErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.source = options.source;
  }
}

/**
 * A source file could not be read.
 */
export class SourceError extends WaypostError {
  readonly file: string;

  constructor(file: string, options: WaypostErrorOptions = {}) {
    super(ErrorCode.FILE_READ_FAILED, `Cannot read redirect file "${file}"`, options);
    this.file = file;
  }
}

/**
 * Structured data (YAML or JSON) is malformed or has the wrong shape.
 */
export class ParseError extends WaypostError {
  constructor(message: string, options: WaypostErrorOptions = {}) {
    super(ErrorCode.PARSE_FAILED, message, options);
  }
}

/**
 * A single record failed validation.
 */
export class InvalidRecordError extends WaypostError {
  /** Zero-based position of the record in its input */
  readonly index: number;

  /** One human-readable line per failed field */
  readonly issues: readonly string[];

  constructor(index: number, issues: readonly string[], options: WaypostErrorOptions = {}) {
    super(
      ErrorCode.INVALID_RECORD,
      `Invalid redirect record at index ${index}: ${issues.join("; ")}`,
      options
    );
    this.index = index;
    this.issues = issues;
  }
}

/**
 * The key-value store could not be opened, seeded or scanned.
 */
export class StoreError extends WaypostError {
  constructor(
    code: typeof ErrorCode.STORE_OPEN_FAILED | typeof ErrorCode.STORE_LOCKED,
    message: string,
    options: Omit<WaypostErrorOptions, "source"> = {}
  ) {
    super(code, message, { ...options, source: "store" });
  }
}

/**
 * Command-line flags or environment variables are invalid.
 */
export class ConfigError extends WaypostError {
  constructor(message: string, options: Omit<WaypostErrorOptions, "source"> = {}) {
    super(ErrorCode.INVALID_CONFIG, message, options);
  }
}

/**
 * Narrow an unknown thrown value to a Waypost error.
 */
export function isWaypostError(err: unknown): err is WaypostError {
  return err instanceof WaypostError;
}
