import {
  isSchema,
  isValidSchema,
  validate,
  MaxDepthExceededError as JtdMaxDepthExceededError,
  type Schema,
} from 'jtd';

import { ok, err, type Result } from '../types/result.js';
import { limitToNumber, type ValidationOptions } from '../types/options.js';
import {
  internalFault,
  type EngineFault,
  type SchemaModel,
  type TypedefSchema,
  type ValidationError,
} from './engine.js';

class JtdSchema implements TypedefSchema {
  readonly engine = 'jtd' as const;

  constructor(private readonly schema: Schema) {}

  checkStructure(): Result<void, string> {
    if (isValidSchema(this.schema)) return ok(undefined);
    return err(
      'schema failed the JSON Typedef structural check ' +
        '(every "ref" must name a root "definitions" entry, ' +
        '"definitions" may only appear at the root, ' +
        'and each schema must use exactly one form)'
    );
  }

  validate(
    instance: unknown,
    options: ValidationOptions
  ): Result<ValidationError[], EngineFault> {
    try {
      const errors = validate(this.schema, instance, {
        maxDepth: limitToNumber(options.maxDepth),
        maxErrors: limitToNumber(options.maxErrors),
      });
      return ok(
        errors.map((e) => ({
          instancePath: e.instancePath.map(String),
          schemaPath: e.schemaPath.map(String),
        }))
      );
    } catch (error: unknown) {
      if (error instanceof JtdMaxDepthExceededError) {
        return err({
          kind: 'maxDepthExceeded',
          detail: `schema references nested deeper than max depth ${String(
            options.maxDepth
          )}`,
        });
      }
      return err(internalFault(error));
    }
  }
}

/**
 * Engine backed by the `jtd` reference library. Supports both limits
 * natively.
 */
export const jtdSchemaModel: SchemaModel = {
  name: 'jtd',
  supportsMaxDepth: true,
  parse(json: unknown): Result<TypedefSchema, string> {
    if (!isSchema(json)) {
      return err('document does not have the shape of a JSON Typedef schema');
    }
    return ok(new JtdSchema(json));
  },
};
