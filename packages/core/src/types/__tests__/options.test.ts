import { describe, it, expect } from 'vitest';

import {
  parseLimit,
  resolveOptions,
  resolveValidationOptions,
  resolveOutputFormat,
  resolveEngineName,
  limitToNumber,
} from '../options';
import { InvalidOptionError } from '../errors';

describe('parseLimit', () => {
  it('treats 0 as unbounded', () => {
    expect(parseLimit('max-depth', '0')).toBe('unbounded');
  });

  it('accepts positive integers', () => {
    expect(parseLimit('max-errors', '1')).toBe(1);
    expect(parseLimit('max-errors', '250')).toBe(250);
  });

  it.each(['', '-1', 'abc', '1.5', '1e3', ' 2', '99999999999999999999'])(
    'rejects %j',
    (raw) => {
      expect(() => parseLimit('max-depth', raw)).toThrow(InvalidOptionError);
    }
  );

  it('names the flag and the raw value', () => {
    try {
      parseLimit('max-errors', 'ten');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionError);
      if (error instanceof InvalidOptionError) {
        expect(error.message).toBe(
          'Invalid --max-errors value "ten". Expected a non-negative integer.'
        );
        expect(error.setting).toBe('max-errors');
        expect(error.context?.value).toBe('ten');
      }
    }
  });
});

describe('resolveValidationOptions', () => {
  it('defaults both limits to unbounded', () => {
    expect(resolveValidationOptions({})).toEqual({
      maxDepth: 'unbounded',
      maxErrors: 'unbounded',
    });
  });

  it('quiet implies a single error', () => {
    expect(resolveValidationOptions({ quiet: true }).maxErrors).toBe(1);
  });

  it('explicit max-errors wins over quiet', () => {
    expect(
      resolveValidationOptions({ quiet: true, maxErrors: '5' }).maxErrors
    ).toBe(5);
    expect(
      resolveValidationOptions({ quiet: true, maxErrors: '0' }).maxErrors
    ).toBe('unbounded');
  });

  it('parses max-depth independently of quiet', () => {
    expect(
      resolveValidationOptions({ quiet: true, maxDepth: '32' })
    ).toEqual({ maxDepth: 32, maxErrors: 1 });
  });
});

describe('resolveOutputFormat / resolveEngineName', () => {
  it('default to json and jtd', () => {
    expect(resolveOutputFormat(undefined)).toBe('json');
    expect(resolveEngineName(undefined)).toBe('jtd');
  });

  it('are case-insensitive', () => {
    expect(resolveOutputFormat('NDJSON')).toBe('ndjson');
    expect(resolveEngineName('Ajv')).toBe('ajv');
  });

  it('reject unknown values', () => {
    expect(() => resolveOutputFormat('yaml')).toThrow(
      'Invalid --format value "yaml". Supported formats are "json" and "ndjson".'
    );
    expect(() => resolveEngineName('zod')).toThrow(
      'Invalid --engine value "zod". Supported engines are "jtd" and "ajv".'
    );
  });
});

describe('resolveOptions', () => {
  it('returns a frozen configuration', () => {
    const resolved = resolveOptions({ quiet: true, failFast: true });
    expect(resolved).toEqual({
      validation: { maxDepth: 'unbounded', maxErrors: 1 },
      quiet: true,
      format: 'json',
      engine: 'jtd',
      failFast: true,
    });
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.validation)).toBe(true);
  });

  it('fails before anything else on a bad limit', () => {
    expect(() => resolveOptions({ maxDepth: 'deep' })).toThrow(
      InvalidOptionError
    );
  });
});

describe('limitToNumber', () => {
  it('spells unbounded as 0', () => {
    expect(limitToNumber('unbounded')).toBe(0);
    expect(limitToNumber(7)).toBe(7);
  });
});
