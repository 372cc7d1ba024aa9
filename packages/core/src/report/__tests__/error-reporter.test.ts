import { describe, it, expect } from 'vitest';

import {
  ErrorReporter,
  formatIndicators,
  toErrorIndicator,
} from '../error-reporter';

function collector(): { chunks: string[]; write: (c: string) => number } {
  const chunks: string[] = [];
  return { chunks, write: (c: string) => chunks.push(c) };
}

describe('toErrorIndicator', () => {
  it('renders both paths as JSON Pointers', () => {
    expect(
      toErrorIndicator({
        instancePath: ['items', '0', 'm~n'],
        schemaPath: ['properties', 'items', 'elements'],
      })
    ).toEqual({
      instancePath: '/items/0/m~0n',
      schemaPath: '/properties/items/elements',
    });
  });
});

describe('formatIndicators', () => {
  const indicators = [
    { instancePath: '/a', schemaPath: '/properties/a/type' },
    { instancePath: '', schemaPath: '' },
  ];

  it('writes nothing for no indicators', () => {
    expect(formatIndicators([], 'json')).toBe('');
    expect(formatIndicators([], 'ndjson')).toBe('');
  });

  it('json: one compact array line', () => {
    expect(formatIndicators(indicators, 'json')).toBe(
      '[{"instancePath":"/a","schemaPath":"/properties/a/type"},{"instancePath":"","schemaPath":""}]\n'
    );
  });

  it('ndjson: one object per line', () => {
    expect(formatIndicators(indicators, 'ndjson')).toBe(
      '{"instancePath":"/a","schemaPath":"/properties/a/type"}\n' +
        '{"instancePath":"","schemaPath":""}\n'
    );
  });
});

describe('ErrorReporter', () => {
  it('writes failing instances and remembers the failure', () => {
    const sink = collector();
    const reporter = new ErrorReporter(sink, { quiet: false, format: 'json' });

    expect(reporter.report([])).toEqual([]);
    expect(reporter.failed).toBe(false);
    expect(sink.chunks).toEqual([]);

    reporter.report([{ instancePath: [], schemaPath: ['type'] }]);
    expect(reporter.failed).toBe(true);
    expect(sink.chunks).toEqual(['[{"instancePath":"","schemaPath":"/type"}]\n']);

    reporter.report([]);
    expect(reporter.failed).toBe(true);
  });

  it('stays silent in quiet mode but still returns indicators', () => {
    const sink = collector();
    const reporter = new ErrorReporter(sink, { quiet: true, format: 'json' });
    const indicators = reporter.report([
      { instancePath: ['x'], schemaPath: [] },
    ]);
    expect(indicators).toEqual([{ instancePath: '/x', schemaPath: '' }]);
    expect(sink.chunks).toEqual([]);
    expect(reporter.failed).toBe(true);
  });
});
