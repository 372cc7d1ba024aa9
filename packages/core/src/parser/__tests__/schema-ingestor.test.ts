import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';

import { ingestSchema, parseSchemaText } from '../schema-ingestor';
import { jtdSchemaModel } from '../../validator/jtd-engine';
import {
  SchemaInvalidError,
  SchemaParseError,
  SourceReadError,
} from '../../types/errors';
import type { InputSource } from '../../io/sources';

function textSource(text: string): InputSource {
  return {
    label: 'schema.json',
    isStdin: false,
    open: () => Readable.from([text]),
  };
}

describe('parseSchemaText', () => {
  it('accepts a valid JSON Typedef schema', () => {
    const result = parseSchemaText(
      jtdSchemaModel,
      '{"properties":{"id":{"type":"uint32"}}}',
      'schema.json'
    );
    expect(result.isOk()).toBe(true);
  });

  it('strips a byte order mark', () => {
    const result = parseSchemaText(
      jtdSchemaModel,
      '\uFEFF{"type":"string"}',
      'schema.json'
    );
    expect(result.isOk()).toBe(true);
  });

  it('reports text that is not JSON as a parse failure', () => {
    const result = parseSchemaText(jtdSchemaModel, '{"type":', 'schema.json');
    if (!result.isErr()) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SchemaParseError);
    expect(result.error.message).toMatch(
      /^Failed to parse schema from schema\.json: /
    );
    expect(result.error.context?.excerpt).toBe('{"type":');
  });

  it('reports a document of the wrong shape as malformed', () => {
    const result = parseSchemaText(jtdSchemaModel, '[1, 2]', 'schema.json');
    if (!result.isErr()) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SchemaParseError);
    expect(result.error.message).toBe(
      'Malformed schema in schema.json: document does not have the shape of a JSON Typedef schema'
    );
  });

  it('reports a dangling ref as an invalid schema', () => {
    const result = parseSchemaText(
      jtdSchemaModel,
      '{"ref":"missing"}',
      'schema.json'
    );
    if (!result.isErr()) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SchemaInvalidError);
    expect(result.error.message).toMatch(/^Invalid schema in schema\.json: /);
    expect(result.error.getExitCode()).toBe(4);
  });
});

describe('ingestSchema', () => {
  it('reads the whole source before parsing', async () => {
    const source: InputSource = {
      label: 'schema.json',
      isStdin: false,
      open: () => Readable.from(['{"ty', 'pe":"bo', 'olean"}']),
    };
    const result = await ingestSchema(jtdSchemaModel, source);
    expect(result.isOk()).toBe(true);
  });

  it('passes parse failures through', async () => {
    const result = await ingestSchema(jtdSchemaModel, textSource(''));
    if (!result.isErr()) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SchemaParseError);
  });

  it('reports read failures', async () => {
    const source: InputSource = {
      label: 'schema.json',
      isStdin: false,
      open: () =>
        new Readable({
          read() {
            this.destroy(
              Object.assign(new Error('no such file'), { code: 'ENOENT' })
            );
          },
        }),
    };
    const result = await ingestSchema(jtdSchemaModel, source);
    if (!result.isErr()) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SourceReadError);
    expect(result.error.message).toBe(
      'Failed to read schema.json: file not found'
    );
  });
});
