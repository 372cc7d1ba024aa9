/**
 * Capability boundary between the driver and a JSON Typedef implementation.
 *
 * The driver only ever talks to these interfaces; any engine that can
 * parse, check and validate is substitutable.
 */

import type { Result } from '../types/result.js';
import type { EngineName, ValidationOptions } from '../types/options.js';

/**
 * One violation found in an instance. Segments are raw (unescaped) object
 * keys or array indices in root-to-leaf order; `[]` is the document root.
 */
export interface ValidationError {
  instancePath: string[];
  schemaPath: string[];
}

/**
 * Conditions that stop a run. Never used for ordinary validation errors.
 */
export type EngineFault =
  | { kind: 'maxDepthExceeded'; detail: string }
  | { kind: 'internal'; detail: string; cause?: Error };

export interface TypedefSchema {
  readonly engine: EngineName;
  /** Semantic checks: ref targets exist, form keywords are not mixed, ... */
  checkStructure(): Result<void, string>;
  validate(
    instance: unknown,
    options: ValidationOptions
  ): Result<ValidationError[], EngineFault>;
}

export interface SchemaModel {
  readonly name: EngineName;
  /** Whether validate() can honor a bounded maxDepth */
  readonly supportsMaxDepth: boolean;
  /** Shape check only; run checkStructure() on the result before use. */
  parse(json: unknown): Result<TypedefSchema, string>;
}

export function internalFault(error: unknown): EngineFault {
  const cause = error instanceof Error ? error : undefined;
  return {
    kind: 'internal',
    detail: cause?.message ?? String(error),
    cause,
  };
}
