/**
 * Engine backed by Ajv's JSON Typedef build.
 *
 * Ajv compiles the schema to code, so the structural check is the compile
 * step. It has no notion of a reference depth bound; `supportsMaxDepth` is
 * false and a bounded maxDepth is reported as an internal fault if it ever
 * gets this far.
 */

import Ajv from 'ajv/dist/jtd.js';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

import { ok, err, type Result } from '../types/result.js';
import type { ValidationOptions } from '../types/options.js';
import { parseJsonPointer } from '../util/json-pointer.js';
import {
  internalFault,
  type EngineFault,
  type SchemaModel,
  type TypedefSchema,
  type ValidationError,
} from './engine.js';

function isSchemaObject(json: unknown): json is SchemaObject {
  return typeof json === 'object' && json !== null && !Array.isArray(json);
}

function toValidationError(error: ErrorObject): ValidationError {
  return {
    instancePath: parseJsonPointer(error.instancePath),
    schemaPath: parseJsonPointer(error.schemaPath),
  };
}

class AjvJtdSchema implements TypedefSchema {
  readonly engine = 'ajv' as const;
  #compiled: ValidateFunction | undefined;

  constructor(
    private readonly ajv: Ajv,
    private readonly schema: SchemaObject
  ) {}

  checkStructure(): Result<void, string> {
    const compiled = this.#compile();
    return compiled.isErr() ? err(compiled.error) : ok(undefined);
  }

  validate(
    instance: unknown,
    options: ValidationOptions
  ): Result<ValidationError[], EngineFault> {
    if (options.maxDepth !== 'unbounded') {
      return err({
        kind: 'internal',
        detail: 'the ajv engine cannot bound reference depth',
      });
    }
    const compiled = this.#compile();
    if (compiled.isErr()) {
      return err({ kind: 'internal', detail: compiled.error });
    }
    const fn = compiled.value;
    try {
      if (fn(instance)) return ok([]);
      const errors = (fn.errors ?? []).map(toValidationError);
      return ok(
        options.maxErrors === 'unbounded'
          ? errors
          : errors.slice(0, options.maxErrors)
      );
    } catch (error: unknown) {
      return err(internalFault(error));
    }
  }

  #compile(): Result<ValidateFunction, string> {
    if (this.#compiled) return ok(this.#compiled);
    try {
      this.#compiled = this.ajv.compile(this.schema);
      return ok(this.#compiled);
    } catch (error: unknown) {
      return err(error instanceof Error ? error.message : String(error));
    }
  }
}

export function createAjvSchemaModel(): SchemaModel {
  const ajv = new Ajv({ allErrors: true });
  return {
    name: 'ajv',
    supportsMaxDepth: false,
    parse(json: unknown): Result<TypedefSchema, string> {
      if (!isSchemaObject(json)) {
        return err('a JSON Typedef schema must be a JSON object');
      }
      return ok(new AjvJtdSchema(ajv, json));
    },
  };
}
