import type { Readable } from 'node:stream';

import type { InputSource } from '../io/sources.js';
import { releaseSource, toBuffer } from '../io/sources.js';
import { InstanceParseError, SourceReadError } from '../types/errors.js';
import {
  DocumentScanner,
  excerptOf,
  type ScanEvent,
} from './document-scanner.js';

/**
 * One parsed instance and where it came from
 */
export interface Instance {
  value: unknown;
  /** Byte offset of the document's first byte in the source */
  offset: number;
  /** 1-based position in the stream */
  index: number;
}

export type InstancePull =
  | { kind: 'instance'; instance: Instance }
  | { kind: 'end' }
  | { kind: 'error'; error: InstanceParseError | SourceReadError };

/**
 * Byte offset in the source of the position a JSON.parse message names.
 * The parser counts UTF-16 code units from the start of the document.
 */
export function syntaxErrorOffset(
  text: string,
  docOffset: number,
  reason: string
): number | undefined {
  const match = /at position (\d+)/.exec(reason);
  if (!match?.[1]) return undefined;
  const units = Number(match[1]);
  return docOffset + Buffer.byteLength(text.slice(0, units), 'utf8');
}

/**
 * Lazy, forward-only sequence of JSON values read back-to-back from a
 * single source. Each `next()` reads only as many chunks as it takes to
 * complete one document. After `end` or `error` every further pull
 * returns `end`.
 */
export class InstanceStream {
  private readonly _scanner: DocumentScanner;
  private readonly _chunks: AsyncIterator<unknown>;
  private _done = false;

  private constructor(
    private readonly source: InputSource,
    private readonly stream: Readable
  ) {
    this._scanner = new DocumentScanner(source.label);
    this._chunks = stream[Symbol.asyncIterator]();
  }

  static open(source: InputSource): InstanceStream {
    return new InstanceStream(source, source.open());
  }

  async next(): Promise<InstancePull> {
    for (;;) {
      const event = this._scanner.shift();
      if (event) return this.#toPull(event);
      if (this._done) return { kind: 'end' };

      let step: IteratorResult<unknown>;
      try {
        step = await this._chunks.next();
      } catch (error: unknown) {
        this._done = true;
        return {
          kind: 'error',
          error: SourceReadError.from(this.source.label, error),
        };
      }

      if (step.done) {
        this._scanner.end();
        this._done = true;
      } else {
        this._scanner.push(toBuffer(step.value));
      }
    }
  }

  /** Stop reading and release the underlying source. */
  close(): void {
    this.#stop();
    releaseSource(this.stream);
  }

  #toPull(event: ScanEvent): InstancePull {
    if (event.kind === 'error') {
      this.#stop();
      return { kind: 'error', error: event.error };
    }
    const { text, offset, index } = event.document;
    try {
      const value: unknown = JSON.parse(text);
      return { kind: 'instance', instance: { value, offset, index } };
    } catch (error: unknown) {
      this.#stop();
      const reason = error instanceof Error ? error.message : String(error);
      return {
        kind: 'error',
        error: new InstanceParseError({
          message: `Failed to parse instance #${index} in ${this.source.label} at byte ${offset}: ${reason}`,
          context: {
            source: this.source.label,
            offset,
            tokenOffset: syntaxErrorOffset(text, offset, reason),
            index,
            excerpt: excerptOf(text),
          },
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }
  }

  #stop(): void {
    this._done = true;
    this._scanner.clear();
  }
}
