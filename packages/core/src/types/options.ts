/**
 * Run configuration for jtd-validate
 *
 * Raw command-line strings are resolved exactly once, before any input is
 * opened, into a frozen ResolvedOptions value. Nothing downstream looks at
 * the raw flags again.
 */

import { InvalidOptionError } from './errors.js';

/** A non-negative bound, or no bound at all */
export type Limit = number | 'unbounded';

/**
 * Limits handed to the validation engine for every instance
 */
export interface ValidationOptions {
  /** How deep schema references may be followed (default: unbounded) */
  maxDepth: Limit;
  /** Errors collected per instance before stopping (default: unbounded) */
  maxErrors: Limit;
}

export type OutputFormat = 'json' | 'ndjson';

export type EngineName = 'jtd' | 'ajv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'ndjson'];

export const ENGINE_NAMES: readonly EngineName[] = ['jtd', 'ajv'];

/**
 * Options as they arrive from the command line, all optional
 */
export interface RawOptions {
  maxDepth?: string;
  maxErrors?: string;
  quiet?: boolean;
  format?: string;
  engine?: string;
  failFast?: boolean;
}

export interface ResolvedOptions {
  readonly validation: Readonly<ValidationOptions>;
  /** Suppress error indicator output (exit status still reflects failures) */
  readonly quiet: boolean;
  readonly format: OutputFormat;
  readonly engine: EngineName;
  /** Stop reading instances after the first one with errors */
  readonly failFast: boolean;
}

interface MaxErrorsRule {
  readonly when: (raw: RawOptions) => boolean;
  readonly resolve: (raw: RawOptions) => Limit;
}

// First matching row wins.
const MAX_ERRORS_PRECEDENCE: readonly MaxErrorsRule[] = [
  {
    when: (raw) => raw.maxErrors !== undefined,
    resolve: (raw) => parseLimit('max-errors', raw.maxErrors ?? ''),
  },
  {
    when: (raw) => raw.quiet === true,
    resolve: () => 1,
  },
  {
    when: () => true,
    resolve: () => 'unbounded',
  },
];

/**
 * Parse a --max-depth/--max-errors value. `0` means unbounded.
 */
export function parseLimit(setting: string, raw: string): Limit {
  const value = /^[0-9]+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidOptionError({
      message: `Invalid --${setting} value "${raw}". Expected a non-negative integer.`,
      context: { setting, value: raw },
    });
  }
  return value === 0 ? 'unbounded' : value;
}

export function resolveValidationOptions(raw: RawOptions): ValidationOptions {
  const maxDepth =
    raw.maxDepth === undefined
      ? 'unbounded'
      : parseLimit('max-depth', raw.maxDepth);
  const rule = MAX_ERRORS_PRECEDENCE.find((row) => row.when(raw));
  const maxErrors = rule ? rule.resolve(raw) : 'unbounded';
  return { maxDepth, maxErrors };
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === '') return 'json';
  const normalized = value.toLowerCase();
  const match = OUTPUT_FORMATS.find((format) => format === normalized);
  if (match) return match;
  throw new InvalidOptionError({
    message: `Invalid --format value "${value}". Supported formats are "json" and "ndjson".`,
    context: { setting: 'format', value },
  });
}

/**
 * Resolve engine flag into a known engine or throw.
 */
export function resolveEngineName(value: string | undefined): EngineName {
  if (value === undefined || value === '') return 'jtd';
  const normalized = value.toLowerCase();
  const match = ENGINE_NAMES.find((engine) => engine === normalized);
  if (match) return match;
  throw new InvalidOptionError({
    message: `Invalid --engine value "${value}". Supported engines are "jtd" and "ajv".`,
    context: { setting: 'engine', value },
  });
}

export function resolveOptions(raw: RawOptions = {}): ResolvedOptions {
  return Object.freeze({
    validation: Object.freeze(resolveValidationOptions(raw)),
    quiet: raw.quiet === true,
    format: resolveOutputFormat(raw.format),
    engine: resolveEngineName(raw.engine),
    failFast: raw.failFast === true,
  });
}

/** Engine-facing number: 0 is how both engines spell "no bound". */
export function limitToNumber(limit: Limit): number {
  return limit === 'unbounded' ? 0 : limit;
}
