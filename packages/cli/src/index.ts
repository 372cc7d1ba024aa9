#!/usr/bin/env tsx

// CLI entry point
// - Command name: `jtd-validate <schema> [instances]`.
// - The schema is read whole and checked before the instance source is
//   opened; instances are read as a stream of back-to-back JSON documents
//   from a file or standard input (`-` or omitted).
// - Error indicators go to stdout, one line per failing instance (or per
//   error with --format ndjson). Fatal diagnostics go to stderr.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import type { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  assertEngineSupports,
  assertSingleStdinConsumer,
  createSchemaModel,
  exitCodeFor,
  getExitCode,
  resolveInputSource,
  resolveOptions,
  runValidation,
  toJtdValidateError,
  ErrorCode,
  type OutputSink,
} from '@jtd-validate/core';
import { renderCLIView } from './render.js';
import { toRawOptions, type CliOptions } from './flags.js';
import {
  printEffectiveConfig,
  printInstanceTrace,
  printSummary,
} from './debug.js';

export const VERSION = '0.1.0';

/**
 * Process streams the CLI talks to. Tests pass in-memory stand-ins.
 */
export interface CliIO {
  stdin: Readable;
  stdout: OutputSink;
  stderr: OutputSink;
  cwd: string;
  colors?: boolean;
  terminalWidth?: number;
}

export function processIO(): CliIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    colors: process.stderr.isTTY === true,
    terminalWidth: process.stderr.columns,
  };
}

async function run(
  schemaArg: string,
  instancesArg: string | undefined,
  options: CliOptions,
  io: CliIO
): Promise<number> {
  const resolved = resolveOptions(toRawOptions(options));
  const model = createSchemaModel(resolved.engine);
  assertEngineSupports(resolved, model);

  const schema = resolveInputSource(schemaArg, io.stdin, io.cwd);
  const instances = resolveInputSource(instancesArg, io.stdin, io.cwd);
  assertSingleStdinConsumer(schema, instances);

  if (options.debug) {
    printEffectiveConfig(io.stderr, {
      schema: schema.label,
      instances: instances.label,
      options: resolved,
    });
  }

  const outcome = await runValidation({
    model,
    schema,
    instances,
    options: resolved,
    output: io.stdout,
    hooks: options.debug
      ? {
          onInstance: (instance, indicators) =>
            printInstanceTrace(io.stderr, instance, indicators),
        }
      : undefined,
  });

  if (outcome.status === 'fatal') {
    reportFatal(outcome.error, io, options.debug === true);
  }
  if (options.printSummary) {
    printSummary(io.stderr, outcome.summary);
  }
  return exitCodeFor(outcome);
}

function reportFatal(err: unknown, io: CliIO, debug: boolean): number {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: io.colors,
    terminalWidth: io.terminalWidth,
  });
  const error = toJtdValidateError(err);

  io.stderr.write(`${renderCLIView(presenter.formatForCLI(error))}\n`);
  if (debug) {
    io.stderr.write(
      `[jtd-validate] error: ${JSON.stringify(presenter.formatForDebug(error), null, 2)}\n`
    );
  }
  return error.getExitCode();
}

export function createProgram(
  io: CliIO,
  onExit: (code: number) => void
): Command {
  const program = new Command();

  program
    .name('jtd-validate')
    .description('Validate a stream of JSON documents against a JSON Typedef schema')
    .version(VERSION)
    .argument('<schema>', 'JSON Typedef schema file (- for stdin)')
    .argument('[instances]', 'Instance file of concatenated JSON documents (default: stdin)')
    .option('-q, --quiet', 'Print no error indicators; only the exit status reports failure')
    .option('--max-depth <n>', 'Maximum reference depth to follow (0 = unbounded)')
    .option('--max-errors <n>', 'Maximum errors reported per instance (0 = unbounded)')
    .option('--format <format>', 'Indicator output: json|ndjson', 'json')
    .option('--engine <engine>', 'Validation engine: jtd|ajv', 'jtd')
    .option('--fail-fast', 'Stop at the first instance with errors')
    .option('--print-summary', 'Print a run summary as JSON to stderr')
    .option('--debug', 'Print effective configuration and a per-instance trace to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .action(
      async (
        schemaArg: string,
        instancesArg: string | undefined,
        options: CliOptions
      ) => {
        try {
          onExit(await run(schemaArg, instancesArg, options, io));
        } catch (err: unknown) {
          onExit(reportFatal(err, io, options.debug === true));
        }
      }
    );

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix). Resolves to the
 * process exit status; never calls process.exit.
 */
export async function main(
  args: string[],
  io: CliIO = processIO()
): Promise<number> {
  let exitCode = getExitCode(ErrorCode.INTERNAL_ERROR);
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // help and version exit 0; every other commander error is a usage error
      return err.exitCode === 0
        ? 0
        : getExitCode(ErrorCode.INVALID_OPTION);
    }
    return reportFatal(err, io, false);
  }
  return exitCode;
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  process.exitCode = await main(process.argv.slice(2));
}
