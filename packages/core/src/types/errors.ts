/**
 * Error hierarchy for jtd-validate
 * Every fatal condition of a run is one of these classes; ordinary
 * validation errors are data and never go through here.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  setting?: string; // CLI flag the error refers to (e.g. 'max-depth')
  value?: string; // Raw value that was rejected
  source?: string; // Input label: a file path or '<stdin>'
  offset?: number; // Byte offset in the source
  tokenOffset?: number; // Byte offset of the malformed token, when known
  index?: number; // 1-based document number in the instance stream
  excerpt?: string; // Safe excerpt of the offending input
  suggestion?: string;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  exitCode: number;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams = Omit<ErrorParams, 'errorCode'>;

/**
 * Base error class for all jtd-validate errors
 */
export abstract class JtdValidateError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  declare readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for debugging output
   * - dev: includes stack
   * - prod: stack omitted
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      exitCode: this.getExitCode(),
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Malformed --max-depth/--max-errors values and other usage errors.
 * Raised before any input is opened.
 */
export class InvalidOptionError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.INVALID_OPTION });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * The schema input is not JSON, or not shaped like a JSON Typedef schema
 */
export class SchemaParseError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.SCHEMA_PARSE_FAILED });
  }
}

/**
 * The schema is well-formed but fails the engine's structural check
 * (undefined ref targets, illegal keyword combinations, ...)
 */
export class SchemaInvalidError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.INVALID_SCHEMA_STRUCTURE });
  }
}

/**
 * Malformed JSON in the instance stream
 */
export class InstanceParseError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.INSTANCE_PARSE_FAILED });
  }

  get offset(): number | undefined {
    return this.context?.offset;
  }

  get index(): number | undefined {
    return this.context?.index;
  }
}

/**
 * Following schema references went deeper than --max-depth allows
 */
export class MaxDepthExceededError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.MAX_DEPTH_EXCEEDED });
  }
}

/**
 * A schema or instance source could not be opened or read
 */
export class SourceReadError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.SOURCE_READ_FAILED });
  }

  static from(source: string, error: unknown): SourceReadError {
    const cause = error instanceof Error ? error : undefined;
    const code = readErrno(error);
    const reason =
      code === 'ENOENT'
        ? 'file not found'
        : code === 'EACCES'
          ? 'permission denied'
          : code === 'EISDIR'
            ? 'is a directory'
            : (cause?.message ?? String(error));
    return new SourceReadError({
      message: `Failed to read ${source}: ${reason}`,
      context: { source },
      cause,
    });
  }
}

/**
 * Anything else: engine exceptions and unexpected throws
 */
export class InternalError extends JtdValidateError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.INTERNAL_ERROR });
  }
}

/**
 * Utility functions for error handling
 */
export function isJtdValidateError(error: unknown): error is JtdValidateError {
  return error instanceof JtdValidateError;
}

/** Wrap an unknown thrown value so the CLI can present it uniformly */
export function toJtdValidateError(error: unknown): JtdValidateError {
  if (isJtdValidateError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError({
    message: message || 'Unexpected error',
    cause: error instanceof Error ? error : undefined,
  });
}

function readErrno(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}
