/**
 * RFC 6901 JSON Pointer helpers for error indicator paths.
 */

export type PathSegment = string | number;

/** Escape one reference token. `~` must be escaped before `/`. */
export function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** Inverse of escapeToken. `~1` must be decoded before `~0`. */
export function unescapeToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Render a root-to-leaf segment sequence as a JSON Pointer.
 * The empty sequence is the document root and renders as `""`, not `"/"`.
 */
export function toJsonPointer(segments: readonly PathSegment[]): string {
  if (segments.length === 0) return '';
  return '/' + segments.map((seg) => escapeToken(String(seg))).join('/');
}

/**
 * Split a JSON Pointer back into raw segments.
 * A URI fragment form (`#/a/b`) is accepted; percent-encoding is not decoded.
 */
export function parseJsonPointer(pointer: string): string[] {
  const body = pointer.startsWith('#') ? pointer.slice(1) : pointer;
  if (body === '') return [];
  if (!body.startsWith('/')) {
    throw new Error(`Invalid JSON Pointer "${pointer}": must start with "/"`);
  }
  return body.slice(1).split('/').map(unescapeToken);
}
