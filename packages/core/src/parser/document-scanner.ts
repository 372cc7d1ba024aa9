/**
 * Splits a byte stream into top-level JSON documents without parsing them.
 *
 * Documents may follow each other with or without whitespace (`{}{}`,
 * `"a" 1 [2]`). Only the bytes of the document currently being scanned are
 * retained between chunks. Every structural character in JSON is ASCII and
 * no byte of a multi-byte UTF-8 sequence is below 0x80, so scanning works on
 * raw bytes and offsets are exact byte offsets.
 */

import { InstanceParseError } from '../types/errors.js';

export interface ScannedDocument {
  /** UTF-8 text of the document, exactly as it appeared in the input */
  text: string;
  /** Byte offset of the document's first byte */
  offset: number;
  /** 1-based position of the document in the stream */
  index: number;
}

export type ScanEvent =
  | { kind: 'document'; document: ScannedDocument }
  | { kind: 'error'; error: InstanceParseError };

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;
const COLON = 0x3a;
const LBRACE = 0x7b;
const RBRACE = 0x7d;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;

const EXCERPT_LENGTH = 40;

function isWhitespace(b: number): boolean {
  return b === SPACE || b === TAB || b === LF || b === CR;
}

function endsScalar(b: number): boolean {
  return (
    isWhitespace(b) ||
    b === QUOTE ||
    b === COMMA ||
    b === COLON ||
    b === LBRACE ||
    b === RBRACE ||
    b === LBRACKET ||
    b === RBRACKET
  );
}

export function excerptOf(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > EXCERPT_LENGTH
    ? `${flat.slice(0, EXCERPT_LENGTH)}…`
    : flat;
}

type Mode = 'between' | 'nested' | 'scalar';

export class DocumentScanner {
  private readonly _queue: ScanEvent[] = [];
  private _parts: Buffer[] = [];
  private _mode: Mode = 'between';
  private _depth = 0;
  private _inString = false;
  private _escaped = false;
  private _docStart = 0;
  private _position = 0;
  private _count = 0;
  private _stopped = false;
  /** Leading bytes held back until the BOM check can be decided */
  private _head: Buffer | undefined = Buffer.alloc(0);

  constructor(private readonly source: string) {}

  /** Feed the next chunk of input. */
  push(chunk: Buffer): void {
    if (this._stopped) return;
    if (this._head === undefined) {
      this.#scan(chunk, 0);
      return;
    }
    // the leading BOM may be split across chunks
    const head = Buffer.concat([this._head, chunk]);
    if (head.length < BOM.length && BOM.subarray(0, head.length).equals(head)) {
      this._head = head;
      return;
    }
    this._head = undefined;
    this.#scan(head, hasByteOrderMark(head) ? BOM.length : 0);
  }

  #scan(chunk: Buffer, start: number): void {
    let segStart = this._mode === 'between' ? -1 : 0;

    for (let i = start; i < chunk.length && !this._stopped; i += 1) {
      const b = chunk[i] ?? SPACE;

      if (this._mode === 'scalar') {
        if (!endsScalar(b)) continue;
        this.#complete(chunk, segStart, i);
        segStart = -1;
        // the terminating byte belongs to whatever comes next
      } else if (this._mode === 'nested') {
        if (this.#scanNested(b)) {
          this.#complete(chunk, segStart, i + 1);
          segStart = -1;
        }
        continue;
      }

      // between documents
      if (isWhitespace(b)) continue;
      if (b === RBRACE || b === RBRACKET || b === COMMA || b === COLON) {
        this.#fail(
          `Unexpected character '${String.fromCharCode(b)}' between documents`,
          this._position + i,
          this._count + 1,
          String.fromCharCode(b)
        );
        break;
      }
      this._docStart = this._position + i;
      this._count += 1;
      segStart = i;
      if (b === LBRACE || b === LBRACKET) {
        this._mode = 'nested';
        this._depth = 1;
      } else if (b === QUOTE) {
        this._mode = 'nested';
        this._depth = 0;
        this._inString = true;
      } else {
        this._mode = 'scalar';
      }
    }

    if (!this._stopped && this._mode !== 'between' && segStart >= 0) {
      this._parts.push(Buffer.from(chunk.subarray(segStart)));
    }
    this._position += chunk.length;
  }

  /** Signal end of input; completes a trailing scalar or reports truncation. */
  end(): void {
    if (this._stopped) return;
    if (this._head !== undefined && this._head.length > 0) {
      const head = this._head;
      this._head = undefined;
      this.#scan(head, 0);
      if (this._stopped) return;
    }
    if (this._mode === 'scalar') {
      this.#complete(Buffer.alloc(0), 0, 0);
    } else if (this._mode === 'nested') {
      const partial = Buffer.concat(this._parts).toString('utf8');
      this.#fail(
        'Unexpected end of input inside document',
        this._docStart,
        this._count,
        excerptOf(partial)
      );
    }
    this._stopped = true;
  }

  /** Take the next completed document or error, in input order. */
  shift(): ScanEvent | undefined {
    return this._queue.shift();
  }

  /** Drop everything queued or buffered and ignore further input. */
  clear(): void {
    this._queue.length = 0;
    this._parts = [];
    this._stopped = true;
  }

  /** Returns true when the byte closes the current document. */
  #scanNested(b: number): boolean {
    if (this._inString) {
      if (this._escaped) {
        this._escaped = false;
      } else if (b === BACKSLASH) {
        this._escaped = true;
      } else if (b === QUOTE) {
        this._inString = false;
        return this._depth === 0;
      }
      return false;
    }
    if (b === QUOTE) {
      this._inString = true;
    } else if (b === LBRACE || b === LBRACKET) {
      this._depth += 1;
    } else if (b === RBRACE || b === RBRACKET) {
      this._depth -= 1;
      return this._depth === 0;
    }
    return false;
  }

  #complete(chunk: Buffer, segStart: number, end: number): void {
    const tail = chunk.subarray(Math.max(segStart, 0), end);
    const bytes =
      this._parts.length > 0 ? Buffer.concat([...this._parts, tail]) : tail;
    this._queue.push({
      kind: 'document',
      document: {
        text: bytes.toString('utf8'),
        offset: this._docStart,
        index: this._count,
      },
    });
    this._parts = [];
    this._mode = 'between';
    this._depth = 0;
    this._inString = false;
    this._escaped = false;
  }

  #fail(reason: string, offset: number, index: number, excerpt: string): void {
    this._queue.push({
      kind: 'error',
      error: new InstanceParseError({
        message: `Failed to parse instance #${index} in ${this.source} at byte ${offset}: ${reason}`,
        context: { source: this.source, offset, index, excerpt },
      }),
    });
    this._parts = [];
    this._stopped = true;
  }
}

const BOM = Buffer.from([0xef, 0xbb, 0xbf]);

function hasByteOrderMark(chunk: Buffer): boolean {
  return chunk.subarray(0, BOM.length).equals(BOM);
}
