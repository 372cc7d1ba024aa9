import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';

import { ok, err, type Result } from '../types/result.js';
import { InvalidOptionError, SourceReadError } from '../types/errors.js';

export const STDIN_LABEL = '<stdin>';

/**
 * A byte source named on the command line: a file path, or `-` for
 * standard input. Opening is deferred so that the instance source is not
 * touched until the schema has been ingested.
 */
export interface InputSource {
  readonly label: string;
  readonly isStdin: boolean;
  open(): Readable;
}

export function resolveInputSource(
  arg: string | undefined,
  stdin: Readable,
  cwd: string = process.cwd()
): InputSource {
  if (arg === undefined || arg === '-') {
    return { label: STDIN_LABEL, isStdin: true, open: () => stdin };
  }
  const abs = path.resolve(cwd, arg);
  return {
    label: arg,
    isStdin: false,
    open: () => fs.createReadStream(abs),
  };
}

/**
 * Standard input can feed at most one of the two inputs.
 */
export function assertSingleStdinConsumer(
  schema: InputSource,
  instances: InputSource
): void {
  if (schema.isStdin && instances.isStdin) {
    throw new InvalidOptionError({
      message:
        'Schema and instances cannot both be read from standard input.',
      context: {
        setting: 'instances',
        suggestion:
          'Pass the instances as a file path, or read the schema from a file.',
      },
    });
  }
}

/** Normalize a chunk from a byte stream; object-mode streams are rejected. */
export function toBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError(`Expected a byte or string chunk, got ${typeof chunk}`);
}

/**
 * Release a source once it is no longer needed. Standard input is destroyed
 * as well: a writer that keeps the pipe open must not hold the process after
 * the run has stopped.
 */
export function releaseSource(stream: Readable): void {
  if (!stream.destroyed) stream.destroy();
}

/**
 * Read a whole source as UTF-8 text. Used for the schema, which is a single
 * document that must be complete before anything else happens.
 */
export async function readSourceText(
  source: InputSource
): Promise<Result<string, SourceReadError>> {
  const stream = source.open();
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(toBuffer(chunk));
    }
  } catch (error: unknown) {
    return err(SourceReadError.from(source.label, error));
  } finally {
    releaseSource(stream);
  }
  return ok(Buffer.concat(chunks).toString('utf8'));
}
