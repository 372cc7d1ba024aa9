/**
 * Error indicator output. Pure formatting sink: it never throws on its own
 * account, it only writes and remembers whether anything failed.
 */

import type { OutputFormat } from '../types/options.js';
import type { ValidationError } from '../validator/engine.js';
import { toJsonPointer } from '../util/json-pointer.js';

/** Standard JSON Typedef error indicator */
export interface ErrorIndicator {
  instancePath: string;
  schemaPath: string;
}

/** Anything with a write(string) method: process.stdout, a test collector, ... */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ErrorReporterOptions {
  quiet: boolean;
  format: OutputFormat;
}

export function toErrorIndicator(error: ValidationError): ErrorIndicator {
  return {
    instancePath: toJsonPointer(error.instancePath),
    schemaPath: toJsonPointer(error.schemaPath),
  };
}

/**
 * `json`: one compact array per failing instance, one per line.
 * `ndjson`: one compact indicator object per line.
 */
export function formatIndicators(
  indicators: readonly ErrorIndicator[],
  format: OutputFormat
): string {
  if (indicators.length === 0) return '';
  if (format === 'ndjson') {
    return indicators.map((ind) => JSON.stringify(ind)).join('\n') + '\n';
  }
  return JSON.stringify(indicators) + '\n';
}

export class ErrorReporter {
  #failed = false;

  constructor(
    private readonly sink: OutputSink,
    private readonly options: ErrorReporterOptions
  ) {}

  /**
   * Report the errors of one instance. Returns the indicators that were
   * (or, in quiet mode, would have been) written.
   */
  report(errors: readonly ValidationError[]): ErrorIndicator[] {
    if (errors.length === 0) return [];
    this.#failed = true;
    const indicators = errors.map(toErrorIndicator);
    if (!this.options.quiet) {
      this.sink.write(formatIndicators(indicators, this.options.format));
    }
    return indicators;
  }

  /** True once any instance has produced at least one error */
  get failed(): boolean {
    return this.#failed;
  }
}
