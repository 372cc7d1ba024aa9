import { ok, err, type Result } from '../types/result.js';
import type { ValidationOptions } from '../types/options.js';
import type {
  EngineFault,
  SchemaModel,
  TypedefSchema,
  ValidationError,
} from '../validator/engine.js';

export type FakeVerdict = (
  instance: unknown,
  options: ValidationOptions
) => Result<ValidationError[], EngineFault>;

export interface FakeSchemaModelOptions {
  /** Returned from parse(); default accepts every document */
  parseError?: string;
  /** Returned from checkStructure(); default passes */
  structureError?: string;
  verdict?: FakeVerdict;
}

/**
 * Scriptable engine for driver tests. Records every instance it is asked
 * to validate, in order.
 */
export function createFakeSchemaModel(opts: FakeSchemaModelOptions = {}): {
  model: SchemaModel;
  seen: unknown[];
} {
  const seen: unknown[] = [];
  const verdict: FakeVerdict = opts.verdict ?? (() => ok([]));

  const schema: TypedefSchema = {
    engine: 'jtd',
    checkStructure: () =>
      opts.structureError === undefined
        ? ok(undefined)
        : err(opts.structureError),
    validate(instance, options) {
      seen.push(instance);
      return verdict(instance, options);
    },
  };

  const model: SchemaModel = {
    name: 'jtd',
    supportsMaxDepth: true,
    parse: () =>
      opts.parseError === undefined ? ok(schema) : err(opts.parseError),
  };

  return { model, seen };
}
