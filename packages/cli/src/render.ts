import type { CLIErrorView } from '@quotient/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
};

function colorize(text: string, useColor: boolean, ...codes: string[]): string {
  if (!useColor || codes.length === 0) return text;
  return `${codes.join('')}${text}${ANSI.reset}`;
}

/** Greedy word wrap; a single word longer than `width` keeps its own line. */
function wrapText(text: string, width: number): string {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    const candidate = line ? `${line} ${word}` : word;
    if (candidate.length > width && line) {
      lines.push(line);
      line = word;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

/**
 * Render an error view as terminal text:
 *
 *   ❌ Error E011: div: division by zero
 *   📍 Operation: div (divisor)
 *   💡 Workaround: Check the divisor with isZero() before dividing.
 *
 * The input excerpt is printed verbatim so it can be copied back.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines = [colorize(`❌ ${view.title}`, view.colors, ANSI.bold, ANSI.red)];

  if (view.location) {
    lines.push(wrapText(`📍 ${view.location}`, width));
  }
  if (view.excerpt) {
    lines.push(`${colorize('Input:', view.colors, ANSI.dim)} ${view.excerpt}`);
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[0-9;]*m/g, '');
}

export default renderCLIView;
