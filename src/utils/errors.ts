/**
 * Error types and codes for target-sense.
 * All errors raised by the project extend TargetSenseError.
 */

/**
 * Base error class for all target-sense errors.
 */
export class TargetSenseError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TargetSenseError';
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
export class ConfigError extends TargetSenseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends TargetSenseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Failures while building the module search path, such as an interpreter
 * that cannot be started or prints something other than its path list.
 */
export class ResolutionError extends TargetSenseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ResolutionError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // System
  PARSE_ERROR: 'S001',
  FILE_READ_ERROR: 'S002',

  // Resolution infrastructure
  INTERPRETER_FAILED: 'R001',
  INTERPRETER_OUTPUT_INVALID: 'R002',
  INTERPRETER_ABORTED: 'R003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
