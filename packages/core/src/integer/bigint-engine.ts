import { ErrorCode } from '../errors/codes.js';
import { PreconditionError } from '../types/errors.js';
import type { IntegerEngine, Ordering } from './engine.js';

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const DIGITS = '0123456789abcdefghijklmnopqrstuvwxyz';

function checkBase(base: number, operation: string): void {
  if (!Number.isInteger(base) || base < 2 || base > 36) {
    throw new PreconditionError({
      message: `Base must be an integer between 2 and 36, got ${base}`,
      errorCode: ErrorCode.INVALID_INTEGER,
      context: { operation, value: base },
    });
  }
}

function magnitude(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Integer engine over the platform bigint. Values are immutable, so
 * retain/release carry no bookkeeping.
 */
export class BigIntEngine implements IntegerEngine<bigint> {
  readonly name = 'bigint';

  zero(): bigint {
    return 0n;
  }

  one(): bigint {
    return 1n;
  }

  fromBigInt(value: bigint): bigint {
    return value;
  }

  add(a: bigint, b: bigint): bigint {
    return a + b;
  }

  sub(a: bigint, b: bigint): bigint {
    return a - b;
  }

  mul(a: bigint, b: bigint): bigint {
    return a * b;
  }

  div(a: bigint, b: bigint): bigint {
    if (b === 0n) {
      throw new PreconditionError({
        message: 'Integer division by zero',
        errorCode: ErrorCode.DIVISION_BY_ZERO,
        context: { operation: 'integer.div', operand: 'divisor' },
      });
    }
    const q = a / b;
    // bigint division truncates; step down when the signs differ and there is a remainder
    if (a % b !== 0n && (a < 0n) !== (b < 0n)) {
      return q - 1n;
    }
    return q;
  }

  gcd(a: bigint, b: bigint): bigint | undefined {
    let x = magnitude(a);
    let y = magnitude(b);
    while (y !== 0n) {
      const t = y;
      y = x % y;
      x = t;
    }
    return x === 0n ? undefined : x;
  }

  negate(a: bigint): bigint {
    return -a;
  }

  abs(a: bigint): bigint {
    return magnitude(a);
  }

  compare(a: bigint, b: bigint): Ordering {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  isZero(a: bigint): boolean {
    return a === 0n;
  }

  isNegative(a: bigint): boolean {
    return a < 0n;
  }

  isOne(a: bigint): boolean {
    return a === 1n;
  }

  retain(a: bigint): bigint {
    return a;
  }

  release(_a: bigint): void {}

  toInt64(a: bigint): bigint | undefined {
    return BigInt.asIntN(64, a) === a ? a : undefined;
  }

  toInt32(a: bigint): number | undefined {
    return a >= INT32_MIN && a <= INT32_MAX ? Number(a) : undefined;
  }

  toDouble(a: bigint): number {
    return Number(a);
  }

  fromString(text: string, base: number): bigint | undefined {
    checkBase(base, 'integer.fromString');
    let digits = text;
    let negative = false;
    if (digits.startsWith('-') || digits.startsWith('+')) {
      negative = digits.startsWith('-');
      digits = digits.slice(1);
    }
    if (digits.length === 0) return undefined;

    const allowed = DIGITS.slice(0, base);
    let value = 0n;
    const radix = BigInt(base);
    for (const ch of digits.toLowerCase()) {
      const digit = allowed.indexOf(ch);
      if (digit < 0) return undefined;
      value = value * radix + BigInt(digit);
    }
    return negative ? -value : value;
  }

  toString(a: bigint, base: number): string {
    checkBase(base, 'integer.toString');
    return a.toString(base);
  }
}

export const bigintEngine = new BigIntEngine();
