import type { RawOptions } from '@jtd-validate/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  quiet?: boolean;
  maxDepth?: string;
  maxErrors?: string;
  format?: string;
  engine?: string;
  failFast?: boolean;
  printSummary?: boolean;
  debug?: boolean;
}

/**
 * Map Commander's option bag onto the core's raw options. Values stay as
 * strings; validating them is the core's job.
 */
export function toRawOptions(options: CliOptions): RawOptions {
  const raw: RawOptions = {};
  if (options.maxDepth !== undefined) raw.maxDepth = options.maxDepth;
  if (options.maxErrors !== undefined) raw.maxErrors = options.maxErrors;
  if (options.quiet !== undefined) raw.quiet = options.quiet;
  if (options.format !== undefined) raw.format = options.format;
  if (options.engine !== undefined) raw.engine = options.engine;
  if (options.failFast !== undefined) raw.failFast = options.failFast;
  return raw;
}
