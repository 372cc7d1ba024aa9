import type { InputSource } from '../io/sources.js';
import type { Instance } from '../parser/instance-stream.js';
import type { ErrorIndicator, OutputSink } from '../report/error-reporter.js';
import type { JtdValidateError } from '../types/errors.js';
import type { ResolvedOptions } from '../types/options.js';
import type { SchemaModel } from '../validator/engine.js';

export interface RunSummary {
  /** Instances read and validated */
  instances: number;
  /** Instances with at least one error */
  failedInstances: number;
  /** Errors reported across all instances (after max-errors truncation) */
  errors: number;
}

export type RunOutcome =
  | { status: 'clean' | 'failed'; summary: RunSummary }
  | { status: 'fatal'; error: JtdValidateError; summary: RunSummary };

export interface RunHooks {
  /** Called after each instance has been validated and reported */
  onInstance?: (instance: Instance, indicators: ErrorIndicator[]) => void;
}

export interface ValidationRequest {
  model: SchemaModel;
  schema: InputSource;
  instances: InputSource;
  options: ResolvedOptions;
  /** Where error indicators go (stdout in the CLI) */
  output: OutputSink;
  hooks?: RunHooks;
}
