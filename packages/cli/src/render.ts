import type { CLIErrorView } from '@jtd-validate/core';

type Style = 'bold' | 'red' | 'dim';

const SGR: Record<Style, number> = { bold: 1, red: 31, dim: 2 };

function paint(text: string, styles: readonly Style[], on: boolean): string {
  if (!on) return text;
  const codes = styles.map((style) => SGR[style]).join(';');
  return `\u001B[${codes}m${text}\u001B[0m`;
}

/**
 * Greedy word wrap. Continuation lines are indented by `hang` columns so
 * they sit under the text that follows the section label.
 */
function wrap(text: string, width: number, hang: number): string[] {
  const indent = ' '.repeat(hang);
  const lines: string[] = [];
  let words: string[] = [];
  let used = 0;
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const needed = words.length === 0 ? word.length : word.length + 1;
    if (words.length > 0 && used + needed > width) {
      lines.push(words.join(' '));
      words = [word];
      used = hang + word.length;
      continue;
    }
    words.push(word);
    used += needed;
  }
  if (words.length > 0) lines.push(words.join(' '));
  return lines.map((line, i) => (i === 0 ? line : `${indent}${line}`));
}

const HINT_LABEL = 'Hint: ';

/**
 * Render a presenter view for stderr: the title, then the location,
 * excerpt and hint lines that the view carries.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const lines = [paint(view.title, ['bold', 'red'], view.colors)];

  if (view.location) lines.push(...wrap(view.location, width, 2));
  // input bytes stay on one line
  if (view.excerpt) {
    lines.push(paint(`Excerpt: ${view.excerpt}`, ['dim'], view.colors));
  }
  if (view.workaround) {
    lines.push(
      ...wrap(`${HINT_LABEL}${view.workaround}`, width, HINT_LABEL.length)
    );
  }
  return lines.join('\n');
}

/** Remove the SGR sequences `renderCLIView` emits. */
export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[\d;]*m/g, '');
}
