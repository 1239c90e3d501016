/**
 * Error types and codes for platform-meta.
 * This is the error contract - all errors should extend PlatformMetaError.
 */

/**
 * Base error class for all platform-meta errors.
 */
export class PlatformMetaError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlatformMetaError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PlatformMetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Platform definition errors (invalid files, bad simulators, duplicates).
 * Error codes: P001-P004
 */
export class PlatformError extends PlatformMetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PlatformError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S003
 */
export class SystemError extends PlatformMetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Platform errors (P001-P004)
  INVALID_PLATFORM: 'P001',
  MISSING_FIELD: 'P002',
  UNSUPPORTED_SIMULATOR: 'P003',
  DUPLICATE_PLATFORM: 'P004',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  SCHEMA_VIOLATION: 'S002',
  FILE_READ_ERROR: 'S003',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
