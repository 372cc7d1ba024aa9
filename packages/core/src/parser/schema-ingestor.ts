/**
 * Schema ingestion: read one JSON document, hand it to the engine's schema
 * model, run the structural check. Nothing about instances happens until
 * this has succeeded.
 */

import { readSourceText, type InputSource } from '../io/sources.js';
import { ok, err, type Result } from '../types/result.js';
import {
  SchemaInvalidError,
  SchemaParseError,
  type SourceReadError,
} from '../types/errors.js';
import type { SchemaModel, TypedefSchema } from '../validator/engine.js';
import { excerptOf } from './document-scanner.js';

export type SchemaIngestError =
  | SchemaParseError
  | SchemaInvalidError
  | SourceReadError;

const BOM = '\uFEFF';

/**
 * Turn schema text into a checked TypedefSchema.
 */
export function parseSchemaText(
  model: SchemaModel,
  text: string,
  source: string
): Result<TypedefSchema, SchemaParseError | SchemaInvalidError> {
  const body = text.startsWith(BOM) ? text.slice(BOM.length) : text;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new SchemaParseError({
        message: `Failed to parse schema from ${source}: ${reason}`,
        context: { source, excerpt: excerptOf(body) },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }

  const parsed = model.parse(json);
  if (parsed.isErr()) {
    return err(
      new SchemaParseError({
        message: `Malformed schema in ${source}: ${parsed.error}`,
        context: { source },
      })
    );
  }

  const schema = parsed.value;
  const checked = schema.checkStructure();
  if (checked.isErr()) {
    return err(
      new SchemaInvalidError({
        message: `Invalid schema in ${source}: ${checked.error}`,
        context: { source },
      })
    );
  }
  return ok(schema);
}

export async function ingestSchema(
  model: SchemaModel,
  source: InputSource
): Promise<Result<TypedefSchema, SchemaIngestError>> {
  const text = await readSourceText(source);
  if (text.isErr()) return text;
  return parseSchemaText(model, text.value, source.label);
}
