import {
  ConfigError,
  ErrorCode,
  FractionParseError,
  bigintEngine,
  unwrap,
  type Fraction,
  type RationalEngine,
} from '@quotient/core';

export type OutputFormat = 'text' | 'json';

export type RoundMode = 'floor' | 'ceil' | 'trunc' | 'round';

export type CalcOperation =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'pow'
  | 'min'
  | 'max'
  | 'cmp';

const ROUND_MODES: readonly RoundMode[] = ['floor', 'ceil', 'trunc', 'round'];

const CALC_OPERATIONS: readonly CalcOperation[] = [
  'add',
  'sub',
  'mul',
  'div',
  'pow',
  'min',
  'max',
  'cmp',
];

/**
 * Options shared by every subcommand, as commander hands them to actions
 */
export interface CliOptions {
  out?: string;
  debug?: boolean;
  printMetrics?: boolean;
  mode?: string;
  maxDenominator?: string;
}

function pick<T extends string>(
  allowed: readonly T[],
  value: string
): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --out value "${String(value)}". Supported formats are "text" and "json".`,
    setting: 'out',
  });
}

export function resolveRoundMode(value: unknown): RoundMode {
  if (value === undefined || value === null || value === '') {
    return 'round';
  }
  const mode = pick(ROUND_MODES, String(value).toLowerCase());
  if (mode) return mode;
  throw new ConfigError({
    message: `Invalid --mode value "${String(value)}". Expected one of ${ROUND_MODES.join('|')}.`,
    setting: 'mode',
  });
}

export function resolveCalcOperation(value: string): CalcOperation {
  const operation = pick(CALC_OPERATIONS, value.toLowerCase());
  if (operation) return operation;
  throw new ConfigError({
    message: `Unknown operation "${value}". Expected one of ${CALC_OPERATIONS.join('|')}.`,
    setting: 'op',
  });
}

/**
 * `--max-denominator` takes a non-negative integer; 0 means unbounded.
 */
export function parseMaxDenominator(value: unknown): number {
  if (value === undefined || value === null || value === '') return 0;
  const num = Number(String(value));
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new ConfigError({
      message: `Invalid --max-denominator value "${String(value)}". Expected a non-negative integer.`,
      setting: 'maxDenominator',
    });
  }
  return num;
}

/** Parse a fraction argument; malformed text throws its FractionParseError. */
export function parseFraction(
  engine: RationalEngine<bigint>,
  text: string
): Fraction<bigint> {
  return unwrap(engine.fromString(text));
}

export function parseExponent(text: string): bigint {
  const exponent = bigintEngine.fromString(text, 10);
  if (exponent === undefined) {
    throw new FractionParseError({
      message: `Exponent "${text}" is not an integer`,
      context: { operation: 'pow', operand: 'exponent', input: text },
    });
  }
  return exponent;
}

/**
 * Decimal, exponent and special-value literals accepted by Number();
 * NaN and infinities pass through so the engine can reject them.
 */
export function parseDouble(text: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (trimmed === '' || (Number.isNaN(value) && trimmed !== 'NaN')) {
    throw new FractionParseError({
      message: `"${text}" is not a number`,
      errorCode: ErrorCode.MALFORMED_FRACTION,
      context: { operation: 'fromDouble', input: text },
    });
  }
  return value;
}
