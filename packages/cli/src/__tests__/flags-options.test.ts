import { describe, it, expect } from 'vitest';
import { resolveOptions } from '@jtd-validate/core';
import { toRawOptions, type CliOptions } from '../flags';

describe('CLI flag helpers', () => {
  it('maps nothing to nothing', () => {
    expect(toRawOptions({})).toEqual({});
  });

  it('copies validation and output flags, dropping CLI-only ones', () => {
    const options: CliOptions = {
      quiet: true,
      maxDepth: '4',
      maxErrors: '0',
      format: 'ndjson',
      engine: 'jtd',
      failFast: true,
      printSummary: true,
      debug: true,
    };
    expect(toRawOptions(options)).toEqual({
      quiet: true,
      maxDepth: '4',
      maxErrors: '0',
      format: 'ndjson',
      engine: 'jtd',
      failFast: true,
    });
  });

  it('feeds the core resolver', () => {
    expect(resolveOptions(toRawOptions({ quiet: true }))).toMatchObject({
      validation: { maxDepth: 'unbounded', maxErrors: 1 },
      quiet: true,
    });
    expect(
      resolveOptions(toRawOptions({ quiet: true, maxErrors: '0' })).validation
        .maxErrors
    ).toBe('unbounded');
  });
});
