import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { BigIntEngine } from '../../integer/bigint-engine.js';
import {
  FractionParseError,
  PreconditionError,
} from '../../types/errors.js';
import { isErr, isOk, unwrap } from '../../types/result.js';
import { RationalEngine } from '../engine.js';
import type { Fraction } from '../fraction.js';

const q = new RationalEngine(new BigIntEngine());
const frac = (n: bigint | number, d: bigint | number = 1): Fraction<bigint> =>
  q.fromIntegers(n, d);
const text = (f: Fraction<bigint>): string => q.toString(f);

function expectPrecondition(fn: () => unknown, code: ErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(PreconditionError);
  if (caught instanceof PreconditionError) {
    expect(caught.errorCode).toBe(code);
  }
}

describe('RationalEngine', () => {
  describe('construction', () => {
    it('reduces to lowest terms', () => {
      const f = frac(6, 8);
      expect(q.numerator(f)).toBe(3n);
      expect(q.denominator(f)).toBe(4n);
    });

    it('moves the sign to the numerator', () => {
      expect(text(frac(3, -4))).toBe('-3/4');
      expect(text(frac(-3, 4))).toBe('-3/4');
      expect(text(frac(-3, -4))).toBe('3/4');
    });

    it('canonicalizes zero to 0/1', () => {
      const f = frac(0, -5);
      expect(q.numerator(f)).toBe(0n);
      expect(q.denominator(f)).toBe(1n);
    });

    it('accepts integers beyond 64 bits', () => {
      expect(text(frac(10n ** 30n, 2n * 10n ** 30n))).toBe('1/2');
    });

    it('rejects a zero denominator', () => {
      expectPrecondition(() => frac(1, 0), ErrorCode.ZERO_DENOMINATOR);
      expectPrecondition(
        () => q.fromEngineValues(1n, 0n),
        ErrorCode.ZERO_DENOMINATOR
      );
    });

    it('rejects numbers that are not safe integers', () => {
      expectPrecondition(() => frac(1.5, 2), ErrorCode.INVALID_INTEGER);
      expectPrecondition(() => frac(1, Number.NaN), ErrorCode.INVALID_INTEGER);
    });

    it('builds from integer engine values', () => {
      expect(text(q.fromEngineValues(4n, -6n))).toBe('-2/3');
    });

    it('builds integers and special values', () => {
      expect(text(q.fromInteger(-7))).toBe('-7');
      expect(text(q.zero())).toBe('0');
      expect(text(q.one())).toBe('1');
      expect(text(q.negOne())).toBe('-1');
    });
  });

  describe('fromDouble', () => {
    it('recovers simple binary fractions', () => {
      expect(text(unwrap(q.fromDouble(0.5, 1000)))).toBe('1/2');
      expect(text(unwrap(q.fromDouble(0.75)))).toBe('3/4');
      expect(text(unwrap(q.fromDouble(-0.75)))).toBe('-3/4');
      expect(text(unwrap(q.fromDouble(5)))).toBe('5');
      expect(text(unwrap(q.fromDouble(0.1)))).toBe('1/10');
    });

    it('respects the denominator bound', () => {
      const third = unwrap(q.fromDouble(0.333333, 1000));
      expect(q.toDouble(third)).toBeCloseTo(1 / 3, 3);
      expect(q.denominator(third) <= 1000n).toBe(true);

      const pi = unwrap(q.fromDouble(3.14159265, 1000));
      expect(Math.abs(q.toDouble(pi) - 3.14159265)).toBeLessThan(0.001);
      expect(q.denominator(pi) <= 1000n).toBe(true);
    });

    it('returns Err for NaN and infinities', () => {
      for (const value of [
        Number.NaN,
        Number.POSITIVE_INFINITY,
        Number.NEGATIVE_INFINITY,
      ]) {
        const result = q.fromDouble(value, 1000);
        expect(isErr(result)).toBe(true);
        if (isErr(result)) {
          expect(result.error).toBeInstanceOf(FractionParseError);
          expect(result.error.errorCode).toBe(ErrorCode.NON_FINITE_INPUT);
        }
      }
    });
  });

  describe('approximate', () => {
    it('reports the convergent count and stop reason with the fraction', () => {
      const { fraction, steps, stop } = unwrap(q.approximate(Math.PI, 1000));
      expect(text(fraction)).toBe('355/113');
      expect(steps).toBe(4);
      expect(stop).toBe('bound');
      q.release(fraction);
    });

    it('returns Err for NaN', () => {
      const result = q.approximate(Number.NaN);
      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.errorCode).toBe(ErrorCode.NON_FINITE_INPUT);
      }
    });
  });

  describe('arithmetic', () => {
    it('adds, subtracts, multiplies and divides', () => {
      expect(text(q.add(frac(1, 2), frac(1, 3)))).toBe('5/6');
      expect(text(q.sub(frac(1, 2), frac(1, 3)))).toBe('1/6');
      expect(text(q.mul(frac(2, 3), frac(3, 4)))).toBe('1/2');
      expect(text(q.div(frac(1, 2), frac(1, 4)))).toBe('2');
      expect(text(q.div(frac(1, 2), frac(-3, 4)))).toBe('-2/3');
    });

    it('reduces the sum of 1/2 and 1/3 to 5/6', () => {
      const sum = q.add(frac(1, 2), frac(1, 3));
      expect(q.numerator(sum)).toBe(5n);
      expect(q.denominator(sum)).toBe(6n);
    });

    it('negates, takes absolute values and reciprocals', () => {
      expect(text(q.negate(frac(3, 4)))).toBe('-3/4');
      expect(text(q.abs(frac(-3, 4)))).toBe('3/4');
      expect(text(q.reciprocal(frac(-2, 3)))).toBe('-3/2');
    });

    it('rejects division by zero', () => {
      expectPrecondition(
        () => q.div(frac(1, 2), q.zero()),
        ErrorCode.DIVISION_BY_ZERO
      );
      expectPrecondition(
        () => q.reciprocal(q.zero()),
        ErrorCode.DIVISION_BY_ZERO
      );
    });

    it('raises to integer powers', () => {
      const inverse = q.pow(frac(2, 3), -1);
      expect(q.numerator(inverse)).toBe(3n);
      expect(q.denominator(inverse)).toBe(2n);

      expect(text(q.pow(frac(2, 3), 3))).toBe('8/27');
      expect(text(q.pow(frac(-2, 3), 2))).toBe('4/9');
      expect(text(q.pow(frac(-1, 2), -3))).toBe('-8');
      expect(text(q.pow(frac(2), 10n))).toBe('1024');
      expect(text(q.pow(frac(5, 7), 1))).toBe('5/7');
    });

    it('treats any base to the zeroth power as one', () => {
      expect(text(q.pow(frac(5, 7), 0))).toBe('1');
      expect(text(q.pow(q.zero(), 0))).toBe('1');
      expect(text(q.pow(q.zero(), 3))).toBe('0');
    });

    it('rejects zero to a negative power and fractional exponents', () => {
      expectPrecondition(
        () => q.pow(q.zero(), -1),
        ErrorCode.ZERO_TO_NEGATIVE_POWER
      );
      expectPrecondition(() => q.pow(frac(2), 0.5), ErrorCode.INVALID_INTEGER);
    });
  });

  describe('comparison and predicates', () => {
    it('orders by cross multiplication', () => {
      expect(q.compare(frac(1, 3), frac(1, 2))).toBe(-1);
      expect(q.compare(frac(1, 2), frac(2, 4))).toBe(0);
      expect(q.compare(frac(-1, 2), frac(-2, 3))).toBe(1);
      expect(q.compare(frac(-1, 2), frac(1, 3))).toBe(-1);
    });

    it('derives the relational predicates from compare', () => {
      const a = frac(1, 3);
      const b = frac(1, 2);
      expect(q.eq(a, b)).toBe(false);
      expect(q.ne(a, b)).toBe(true);
      expect(q.lt(a, b)).toBe(true);
      expect(q.le(a, b)).toBe(true);
      expect(q.le(b, frac(2, 4))).toBe(true);
      expect(q.gt(a, b)).toBe(false);
      expect(q.ge(b, a)).toBe(true);
    });

    it('classifies values structurally', () => {
      expect(q.isZero(frac(0, 7))).toBe(true);
      expect(q.isOne(frac(4, 4))).toBe(true);
      expect(q.isOne(frac(4, 3))).toBe(false);
      expect(q.isNegative(frac(-1, 2))).toBe(true);
      expect(q.isPositive(frac(1, 2))).toBe(true);
      expect(q.isPositive(q.zero())).toBe(false);
      expect(q.isInteger(frac(10, 2))).toBe(true);
      expect(q.isInteger(frac(3, 2))).toBe(false);
    });
  });

  describe('rounding', () => {
    it('floors, ceils and truncates negative values', () => {
      const f = frac(-7, 3);
      expect(text(q.floor(f))).toBe('-3');
      expect(text(q.ceil(f))).toBe('-2');
      expect(text(q.trunc(f))).toBe('-2');
      expect(q.wholePart(f)).toBe(-2n);
      expect(text(q.fractionalPart(f))).toBe('-1/3');
    });

    it('floors, ceils and truncates positive values', () => {
      const f = frac(7, 3);
      expect(text(q.floor(f))).toBe('2');
      expect(text(q.ceil(f))).toBe('3');
      expect(text(q.trunc(f))).toBe('2');
      expect(q.wholePart(f)).toBe(2n);
      expect(text(q.fractionalPart(f))).toBe('1/3');
    });

    it('returns copies for integers', () => {
      const five = frac(5);
      const floored = q.floor(five);
      expect(floored).not.toBe(five);
      expect(text(floored)).toBe('5');
      expect(text(q.ceil(five))).toBe('5');
      expect(text(q.trunc(five))).toBe('5');
      expect(text(q.round(five))).toBe('5');
      expect(text(q.fractionalPart(five))).toBe('0');
    });

    it('rounds exact halves to the even neighbour', () => {
      expect(text(q.round(frac(5, 2)))).toBe('2');
      expect(text(q.round(frac(7, 2)))).toBe('4');
      expect(text(q.round(frac(-5, 2)))).toBe('-2');
      expect(text(q.round(frac(-7, 2)))).toBe('-4');
      expect(text(q.round(frac(1, 2)))).toBe('0');
      expect(text(q.round(frac(-1, 2)))).toBe('0');
      expect(text(q.round(frac(3, 2)))).toBe('2');
    });

    it('rounds non-ties to the nearest integer', () => {
      expect(text(q.round(frac(7, 3)))).toBe('2');
      expect(text(q.round(frac(-7, 3)))).toBe('-2');
      expect(text(q.round(frac(5, 3)))).toBe('2');
      expect(text(q.round(frac(-5, 3)))).toBe('-2');
    });

    it('decides tie parity without narrowing', () => {
      const big = 2n ** 70n;
      expect(text(q.round(frac(2n * big + 1n, 2n)))).toBe(big.toString());
      expect(text(q.round(frac(2n * big + 3n, 2n)))).toBe(
        (big + 2n).toString()
      );
    });

    it('reports the sign', () => {
      expect(q.sign(frac(-1, 2))).toBe(-1);
      expect(q.sign(q.zero())).toBe(0);
      expect(q.sign(frac(3))).toBe(1);
    });

    it('returns copies of the lesser and greater operand', () => {
      const a = frac(1, 2);
      const b = frac(1, 3);
      expect(text(q.min(a, b))).toBe('1/3');
      expect(text(q.max(a, b))).toBe('1/2');
      const tie = q.min(a, frac(2, 4));
      expect(tie).not.toBe(a);
      expect(text(tie)).toBe('1/2');
    });
  });

  describe('conversion', () => {
    it('converts to double', () => {
      expect(q.toDouble(frac(1, 4))).toBe(0.25);
      expect(q.toDouble(frac(-3, 2))).toBe(-1.5);
    });

    it('converts integers within 64 bits', () => {
      expect(q.toInt64(frac(10, 2))).toBe(5n);
      expect(q.toInt64(frac(3, 2))).toBeUndefined();
      expect(q.toInt64(frac(2n ** 63n))).toBeUndefined();
      expect(q.toInt64(frac(-(2n ** 63n)))).toBe(-(2n ** 63n));
    });

    it('formats integers without a denominator', () => {
      expect(text(frac(-7, 3))).toBe('-7/3');
      expect(text(frac(10, 2))).toBe('5');
    });

    it('parses fractions and integers', () => {
      expect(text(unwrap(q.fromString('6/8')))).toBe('3/4');
      expect(text(unwrap(q.fromString('-12')))).toBe('-12');
      expect(text(unwrap(q.fromString('3/-4')))).toBe('-3/4');
      expect(text(unwrap(q.fromString('9223372036854775808/2')))).toBe(
        '4611686018427387904'
      );
    });

    it('reports malformed text as Err', () => {
      for (const input of ['abc', '1/2/3', '', '1/', '/2', '1.5', ' 1/2']) {
        const result = q.fromString(input);
        expect(isErr(result)).toBe(true);
        if (isErr(result)) {
          expect(result.error.errorCode).toBe(ErrorCode.MALFORMED_FRACTION);
        }
      }
    });

    it('reports a zero denominator in text as Err', () => {
      const result = q.fromString('1/0');
      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.errorCode).toBe(ErrorCode.ZERO_DENOMINATOR);
        expect(result.error.input).toBe('1/0');
      }
    });

    it('round-trips through text', () => {
      for (const f of [frac(-7, 3), frac(0), frac(5), frac(1, 1000000)]) {
        const parsed = q.fromString(text(f));
        expect(isOk(parsed)).toBe(true);
        if (isOk(parsed)) {
          expect(q.eq(parsed.value, f)).toBe(true);
          expect(text(parsed.value)).toBe(text(f));
        }
      }
    });
  });

  describe('hash', () => {
    it('hashes equal values equally', () => {
      expect(q.hash(frac(3, 4))).toBe(q.hash(frac(6, 8)));
      expect(q.hash(frac(3, 4))).not.toBe(q.hash(frac(1, 2)));
    });

    it('combines base-33 string hashes of both parts', () => {
      // "3" -> 51, "4" -> 52; 51 ^ (52 << 1)
      expect(q.hash(frac(3, 4))).toBe(91n);
      // "1" -> 49, "2" -> 50; 49 ^ 100
      expect(q.hash(frac(1, 2))).toBe(85n);
      // "-3" -> 45 * 33 + 51
      expect(q.hash(frac(-3, 4))).toBe(1640n);
      expect(q.hash(frac(5))).toBe(87n);
    });

    it('stays within 64 bits for long decimal expansions', () => {
      const h = q.hash(frac(10n ** 40n + 1n, 3n));
      expect(h >= 0n && h < 2n ** 64n).toBe(true);
    });
  });

  describe('fit queries', () => {
    it('checks machine integer ranges', () => {
      const small = frac(100);
      expect(q.fitsInt32(small)).toBe(true);
      expect(q.fitsInt64(small)).toBe(true);
      expect(q.fitsDouble(small)).toBe(true);

      const large = unwrap(q.fromString('9223372036854775807'));
      expect(q.fitsInt32(large)).toBe(false);
      expect(q.fitsInt64(large)).toBe(true);

      const half = frac(3, 2);
      expect(q.fitsInt32(half)).toBe(false);
      expect(q.fitsInt64(half)).toBe(false);
    });

    it('checks double round-trips against the bounded approximation', () => {
      expect(q.fitsDouble(frac(3, 2))).toBe(true);
      expect(q.fitsDouble(frac(1, 3))).toBe(true);
      expect(q.fitsDouble(frac(1, 3000017))).toBe(false);
      expect(q.fitsDouble(frac(10n ** 400n))).toBe(false);
    });
  });

  describe('lifecycle', () => {
    it('retains the same handle and releases down to zero', () => {
      const f = frac(1, 2);
      expect(f.refCount).toBe(1);
      expect(q.retain(f)).toBe(f);
      expect(f.refCount).toBe(2);

      expect(q.release(f)).toBeNull();
      expect(f.released).toBe(false);
      expect(text(f)).toBe('1/2');

      q.release(f);
      expect(f.released).toBe(true);
      expectPrecondition(() => text(f), ErrorCode.USE_AFTER_RELEASE);
      expectPrecondition(() => q.release(f), ErrorCode.USE_AFTER_RELEASE);
      expectPrecondition(() => q.retain(f), ErrorCode.USE_AFTER_RELEASE);
    });

    it('treats releasing nothing as a no-op', () => {
      const missing: Fraction<bigint> | null = null;
      expect(q.release(missing)).toBeNull();
      expect(q.release(undefined)).toBeNull();
    });

    it('copies into an independent handle', () => {
      const f = frac(2, 3);
      const g = q.copy(f);
      expect(g).not.toBe(f);
      q.release(f);
      expect(text(g)).toBe('2/3');
      expect(g.refCount).toBe(1);
    });

    it('rejects null operands from untyped callers', () => {
      expectPrecondition(
        () => Reflect.apply(q.add, q, [null, frac(1)]),
        ErrorCode.NULL_OPERAND
      );
    });

    it('describes itself for debugging', () => {
      const f = frac(-7, 3);
      expect(String(f)).toBe('-7/3');
      q.release(f);
      expect(String(f)).toBe('[released fraction]');
    });
  });
});
