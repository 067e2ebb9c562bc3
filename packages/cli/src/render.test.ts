import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import { ErrorCode, type CLIErrorView } from '@quotient/core';

describe('renderCLIView', () => {
  it('renders title and sections one per line', () => {
    const view: CLIErrorView = {
      title: 'Error E101: Cannot parse numerator of "x/2"',
      code: ErrorCode.MALFORMED_FRACTION,
      location: 'Operation: fromString (numerator)',
      excerpt: 'x/2',
      workaround: 'Use digits',
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E101: Cannot parse numerator of "x/2"',
        '📍 Operation: fromString (numerator)',
        'Input: x/2',
        '💡 Workaround: Use digits',
      ].join('\n')
    );
  });

  it('omits sections the view does not carry', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: false,
      terminalWidth: 80,
    };
    expect(renderCLIView(view)).toBe('❌ Error E500: Internal error');
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      excerpt: '1/0',
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.startsWith('\u001B[1m\u001B[31m❌ Error E500')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error\nInput: 1/0');
  });

  it('wraps content based on terminalWidth', () => {
    const view: CLIErrorView = {
      title: 'Error E011: div: division by zero',
      code: ErrorCode.DIVISION_BY_ZERO,
      workaround: 'Check the divisor with isZero() before dividing.',
      colors: false,
      terminalWidth: 30,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E011: div: division by zero',
      '💡 Workaround: Check the',
      'divisor with isZero() before',
      'dividing.',
    ]);
  });
});
