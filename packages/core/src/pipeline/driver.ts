/**
 * Validation driver
 *
 * schema ingestion → instance stream → engine → reporter, strictly in that
 * order and one instance at a time. Output order equals input order; the
 * first fatal condition ends the run.
 */

import { ingestSchema } from '../parser/schema-ingestor.js';
import { InstanceStream, type Instance } from '../parser/instance-stream.js';
import { ErrorReporter } from '../report/error-reporter.js';
import {
  InternalError,
  InvalidOptionError,
  MaxDepthExceededError,
  type JtdValidateError,
} from '../types/errors.js';
import type { Result } from '../types/result.js';
import type { ResolvedOptions, ValidationOptions } from '../types/options.js';
import type {
  EngineFault,
  SchemaModel,
  TypedefSchema,
  ValidationError,
} from '../validator/engine.js';
import {
  CLEAN_EXIT_CODE,
  VALIDATION_FAILED_EXIT_CODE,
} from '../errors/codes.js';
import type { RunOutcome, RunSummary, ValidationRequest } from './types.js';

/**
 * Validate one instance. Engine faults come back as values; only the
 * caller decides they end the run.
 */
export function validateInstance(
  schema: TypedefSchema,
  value: unknown,
  options: ValidationOptions
): Result<ValidationError[], EngineFault> {
  return schema.validate(value, options);
}

/**
 * Reject limits the chosen engine cannot enforce, before any input is read.
 */
export function assertEngineSupports(
  options: ResolvedOptions,
  model: SchemaModel
): void {
  if (options.validation.maxDepth !== 'unbounded' && !model.supportsMaxDepth) {
    throw new InvalidOptionError({
      message: `The ${model.name} engine cannot bound reference depth; --max-depth is not supported with --engine ${model.name}.`,
      context: {
        setting: 'max-depth',
        value: String(options.validation.maxDepth),
        suggestion: 'Drop --max-depth or use --engine jtd.',
      },
    });
  }
}

export function faultToError(
  fault: EngineFault,
  instance: Instance,
  source: string
): JtdValidateError {
  const context = { source, offset: instance.offset, index: instance.index };
  if (fault.kind === 'maxDepthExceeded') {
    return new MaxDepthExceededError({
      message: `Failed to validate instance #${instance.index} in ${source}: ${fault.detail}`,
      context: {
        ...context,
        suggestion:
          'Raise --max-depth, or pass 0 to follow references without a ceiling.',
      },
    });
  }
  return new InternalError({
    message: `Failed to validate instance #${instance.index} in ${source}: ${fault.detail}`,
    context,
    cause: fault.cause,
  });
}

export async function runValidation(
  request: ValidationRequest
): Promise<RunOutcome> {
  const { model, options, hooks } = request;
  const summary: RunSummary = { instances: 0, failedInstances: 0, errors: 0 };

  const schema = await ingestSchema(model, request.schema);
  if (schema.isErr()) {
    return { status: 'fatal', error: schema.error, summary };
  }

  const reporter = new ErrorReporter(request.output, {
    quiet: options.quiet,
    format: options.format,
  });
  const stream = InstanceStream.open(request.instances);

  try {
    for (;;) {
      const pull = await stream.next();
      if (pull.kind === 'end') break;
      if (pull.kind === 'error') {
        return { status: 'fatal', error: pull.error, summary };
      }

      const { instance } = pull;
      summary.instances += 1;
      const outcome = validateInstance(
        schema.value,
        instance.value,
        options.validation
      );
      if (outcome.isErr()) {
        return {
          status: 'fatal',
          error: faultToError(outcome.error, instance, request.instances.label),
          summary,
        };
      }

      const indicators = reporter.report(outcome.value);
      hooks?.onInstance?.(instance, indicators);
      if (indicators.length > 0) {
        summary.failedInstances += 1;
        summary.errors += indicators.length;
        if (options.failFast) break;
      }
    }
  } finally {
    stream.close();
  }

  return { status: reporter.failed ? 'failed' : 'clean', summary };
}

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'clean':
      return CLEAN_EXIT_CODE;
    case 'failed':
      return VALIDATION_FAILED_EXIT_CODE;
    case 'fatal':
      return outcome.error.getExitCode();
  }
}
