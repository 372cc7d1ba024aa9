/**
 * Error Code Infrastructure
 * Stable error codes and their process exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Option Errors (E100–E199)
  INVALID_OPTION = 'E100',

  // Schema Errors (E200–E299)
  SCHEMA_PARSE_FAILED = 'E200',
  INVALID_SCHEMA_STRUCTURE = 'E201',

  // Instance Errors (E300–E399)
  INSTANCE_PARSE_FAILED = 'E300',

  // Validation Errors (E400–E499)
  MAX_DEPTH_EXCEEDED = 'E400',

  // I/O Errors (E500–E599)
  SOURCE_READ_FAILED = 'E500',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

/** Exit status of a run where every instance was valid. */
export const CLEAN_EXIT_CODE = 0;

/** Exit status of a run where at least one instance had validation errors. */
export const VALIDATION_FAILED_EXIT_CODE = 1;

// CLI exit codes mapping for fatal errors
export const EXIT_CODES = {
  [ErrorCode.INVALID_OPTION]: 2,
  [ErrorCode.SCHEMA_PARSE_FAILED]: 3,
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 4,
  [ErrorCode.INSTANCE_PARSE_FAILED]: 5,
  [ErrorCode.MAX_DEPTH_EXCEEDED]: 6,
  [ErrorCode.SOURCE_READ_FAILED]: 7,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
