/* eslint-disable max-lines */
import { ErrorCode } from '../errors/codes.js';
import { bigintEngine } from '../integer/bigint-engine.js';
import type { IntegerEngine, Ordering } from '../integer/engine.js';
import { excerpt, FractionParseError, PreconditionError } from '../types/errors.js';
import {
  resolveEngineOptions,
  type EngineDiagnostic,
  type EngineOptions,
  type ResolvedEngineOptions,
} from '../types/options.js';
import { err, isErr, mapResult, ok, type Result } from '../types/result.js';
import { MetricsCollector } from '../util/metrics.js';
import {
  approximateDouble,
  type ApproximationStop,
} from './continued-fraction.js';
import { Fraction, type FractionParts } from './fraction.js';

export type IntegerLike = bigint | number;

export interface FractionApproximation<I> {
  fraction: Fraction<I>;
  steps: number;
  stop: ApproximationStop;
}

const HASH_MASK = (1n << 64n) - 1n;

function polynomialHash(text: string): bigint {
  let h = 0n;
  for (let i = 0; i < text.length; i += 1) {
    h = (h * 33n + BigInt(text.charCodeAt(i))) & HASH_MASK;
  }
  return h;
}

/**
 * Exact rational arithmetic over a pluggable integer engine.
 *
 * Every fraction handed out is reduced, has a positive denominator and
 * starts with one reference. Operations never mutate their operands; each
 * result is a new handle the caller must release.
 */
export class RationalEngine<I> {
  readonly integers: IntegerEngine<I>;
  readonly options: ResolvedEngineOptions;
  readonly metrics: MetricsCollector;

  constructor(integers: IntegerEngine<I>, options: EngineOptions = {}) {
    this.integers = integers;
    this.options = resolveEngineOptions(options);
    this.metrics = new MetricsCollector({ enabled: this.options.metrics });
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  fromIntegers(numerator: IntegerLike, denominator: IntegerLike): Fraction<I> {
    const num = this.#toBigInt(numerator, 'fromIntegers', 'numerator');
    const den = this.#toBigInt(denominator, 'fromIntegers', 'denominator');
    if (den === 0n) throw this.#zeroDenominator('fromIntegers');
    return this.#build(
      this.integers.fromBigInt(num),
      this.integers.fromBigInt(den),
      'fromIntegers'
    );
  }

  /** The caller keeps ownership of `numerator` and `denominator`. */
  fromEngineValues(numerator: I, denominator: I): Fraction<I> {
    if (numerator == null || denominator == null) {
      throw new PreconditionError({
        message: 'fromEngineValues: integer operand cannot be null',
        errorCode: ErrorCode.NULL_OPERAND,
        context: {
          operation: 'fromEngineValues',
          operand: numerator == null ? 'numerator' : 'denominator',
        },
      });
    }
    if (this.integers.isZero(denominator)) {
      throw this.#zeroDenominator('fromEngineValues');
    }
    return this.#build(
      this.integers.retain(numerator),
      this.integers.retain(denominator),
      'fromEngineValues'
    );
  }

  fromInteger(value: IntegerLike): Fraction<I> {
    return this.fromIntegers(value, 1);
  }

  /**
   * Continued-fraction approximation of `value` with denominator at most
   * `maxDenominator` (unbounded when `<= 0`). Err for NaN and infinities.
   */
  fromDouble(
    value: number,
    maxDenominator: number | bigint = this.options.defaultMaxDenominator
  ): Result<Fraction<I>, FractionParseError> {
    return mapResult(
      this.approximate(value, maxDenominator),
      ({ fraction }) => fraction
    );
  }

  /**
   * `fromDouble` that also reports how many convergents were taken and why
   * expansion stopped. The fraction is caller-owned.
   */
  approximate(
    value: number,
    maxDenominator: number | bigint = this.options.defaultMaxDenominator
  ): Result<FractionApproximation<I>, FractionParseError> {
    const approximation = approximateDouble(value, maxDenominator, {
      tolerance: this.options.approximationTolerance,
      overflowGuard: this.options.approximationOverflowGuard,
    });
    if (isErr(approximation)) return approximation;

    const { numerator, denominator, steps, stop } = approximation.value;
    this.metrics.increment('approximationSteps', steps);
    if (stop === 'overflow') {
      this.#diagnose({
        code: 'APPROXIMATION_STOPPED',
        message: 'Continued fraction stopped at the overflow guard',
        details: { value, steps },
      });
    }
    const fraction = this.#build(
      this.integers.fromBigInt(numerator),
      this.integers.fromBigInt(denominator),
      'fromDouble'
    );
    return ok({ fraction, steps, stop });
  }

  copy(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'copy');
    return this.#build(
      this.integers.retain(numerator),
      this.integers.retain(denominator),
      'copy'
    );
  }

  retain(f: Fraction<I>): Fraction<I> {
    this.#live(f, 'retain');
    return f.acquire();
  }

  /**
   * Drops one reference; the last release hands the integers back to the
   * integer engine. Always returns null so callers can clear their binding:
   * `f = engine.release(f)`.
   */
  release(f: Fraction<I> | null | undefined): null {
    if (f == null) return null;
    if (f.relinquish()) {
      this.metrics.increment('released');
    }
    return null;
  }

  zero(): Fraction<I> {
    return this.fromIntegers(0, 1);
  }

  one(): Fraction<I> {
    return this.fromIntegers(1, 1);
  }

  negOne(): Fraction<I> {
    return this.fromIntegers(-1, 1);
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  add(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    return this.#crossCombine(a, b, 'add');
  }

  sub(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    return this.#crossCombine(a, b, 'sub');
  }

  mul(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    const x = this.#live(a, 'mul', 'left');
    const y = this.#live(b, 'mul', 'right');
    return this.#build(
      this.integers.mul(x.numerator, y.numerator),
      this.integers.mul(x.denominator, y.denominator),
      'mul'
    );
  }

  div(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    const x = this.#live(a, 'div', 'dividend');
    const y = this.#live(b, 'div', 'divisor');
    if (this.integers.isZero(y.numerator)) {
      throw new PreconditionError({
        message: 'div: division by zero',
        errorCode: ErrorCode.DIVISION_BY_ZERO,
        context: { operation: 'div', operand: 'divisor' },
      });
    }
    return this.#build(
      this.integers.mul(x.numerator, y.denominator),
      this.integers.mul(x.denominator, y.numerator),
      'div'
    );
  }

  negate(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'negate');
    return this.#build(
      this.integers.negate(numerator),
      this.integers.retain(denominator),
      'negate'
    );
  }

  abs(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'abs');
    return this.#build(
      this.integers.abs(numerator),
      this.integers.retain(denominator),
      'abs'
    );
  }

  reciprocal(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'reciprocal');
    if (this.integers.isZero(numerator)) {
      throw new PreconditionError({
        message: 'reciprocal: reciprocal of zero',
        errorCode: ErrorCode.DIVISION_BY_ZERO,
        context: { operation: 'reciprocal' },
      });
    }
    return this.#build(
      this.integers.retain(denominator),
      this.integers.retain(numerator),
      'reciprocal'
    );
  }

  /**
   * Integer power by repeated squaring. `x^0` is 1 for every x, 0 included;
   * negative exponents invert the base first.
   */
  pow(base: Fraction<I>, exponent: IntegerLike): Fraction<I> {
    this.#live(base, 'pow', 'base');
    const exp = this.#toBigInt(exponent, 'pow', 'exponent');

    if (exp === 0n) return this.one();
    if (exp === 1n) return this.copy(base);

    if (this.isZero(base)) {
      if (exp < 0n) {
        throw new PreconditionError({
          message: 'pow: zero to a negative power is undefined',
          errorCode: ErrorCode.ZERO_TO_NEGATIVE_POWER,
          context: { operation: 'pow', value: String(exp) },
        });
      }
      return this.zero();
    }

    if (exp < 0n) {
      const inverse = this.reciprocal(base);
      try {
        return this.#powPositive(inverse, -exp);
      } finally {
        this.release(inverse);
      }
    }
    return this.#powPositive(base, exp);
  }

  // ==========================================================================
  // Comparison & predicates
  // ==========================================================================

  /** Cross-multiplied order; valid for unreduced operands since denominators are positive. */
  compare(a: Fraction<I>, b: Fraction<I>): Ordering {
    const x = this.#live(a, 'compare', 'left');
    const y = this.#live(b, 'compare', 'right');
    const ad = this.integers.mul(x.numerator, y.denominator);
    const bc = this.integers.mul(y.numerator, x.denominator);
    const order = this.integers.compare(ad, bc);
    this.integers.release(ad);
    this.integers.release(bc);
    return order;
  }

  eq(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) === 0;
  }

  ne(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) !== 0;
  }

  lt(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) < 0;
  }

  le(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) <= 0;
  }

  gt(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) > 0;
  }

  ge(a: Fraction<I>, b: Fraction<I>): boolean {
    return this.compare(a, b) >= 0;
  }

  isZero(f: Fraction<I>): boolean {
    return this.integers.isZero(this.#live(f, 'isZero').numerator);
  }

  isOne(f: Fraction<I>): boolean {
    const { numerator, denominator } = this.#live(f, 'isOne');
    return this.integers.compare(numerator, denominator) === 0;
  }

  isNegative(f: Fraction<I>): boolean {
    return this.integers.isNegative(this.#live(f, 'isNegative').numerator);
  }

  isPositive(f: Fraction<I>): boolean {
    const { numerator } = this.#live(f, 'isPositive');
    return (
      !this.integers.isNegative(numerator) && !this.integers.isZero(numerator)
    );
  }

  isInteger(f: Fraction<I>): boolean {
    return this.integers.isOne(this.#live(f, 'isInteger').denominator);
  }

  // ==========================================================================
  // Rounding
  // ==========================================================================

  floor(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'floor');
    if (this.isInteger(f)) return this.copy(f);
    return this.#build(
      this.integers.div(numerator, denominator),
      this.integers.one(),
      'floor'
    );
  }

  ceil(f: Fraction<I>): Fraction<I> {
    const { numerator, denominator } = this.#live(f, 'ceil');
    if (this.isInteger(f)) return this.copy(f);
    const quotient = this.integers.div(numerator, denominator);
    const one = this.integers.one();
    if (this.#divides(quotient, numerator, denominator)) {
      return this.#build(quotient, one, 'ceil');
    }
    const adjusted = this.integers.add(quotient, one);
    this.integers.release(quotient);
    return this.#build(adjusted, one, 'ceil');
  }

  /** Integer part truncated toward zero, as a caller-owned integer. */
  wholePart(f: Fraction<I>): I {
    const { numerator, denominator } = this.#live(f, 'wholePart');
    const quotient = this.integers.div(numerator, denominator);
    if (
      this.isNegative(f) &&
      !this.#divides(quotient, numerator, denominator)
    ) {
      // floor went one past zero
      const one = this.integers.one();
      const adjusted = this.integers.add(quotient, one);
      this.integers.release(quotient);
      this.integers.release(one);
      return adjusted;
    }
    return quotient;
  }

  trunc(f: Fraction<I>): Fraction<I> {
    this.#live(f, 'trunc');
    if (this.isInteger(f)) return this.copy(f);
    return this.#build(this.wholePart(f), this.integers.one(), 'trunc');
  }

  /** `f - wholePart(f)`; keeps the sign of f, so -7/3 gives -1/3. */
  fractionalPart(f: Fraction<I>): Fraction<I> {
    this.#live(f, 'fractionalPart');
    if (this.isInteger(f)) return this.zero();
    const whole = this.#build(
      this.wholePart(f),
      this.integers.one(),
      'fractionalPart'
    );
    try {
      return this.sub(f, whole);
    } finally {
      this.release(whole);
    }
  }

  /** Nearest integer; exact halves go to the even neighbour. */
  round(f: Fraction<I>): Fraction<I> {
    this.#live(f, 'round');
    if (this.isInteger(f)) return this.copy(f);

    const half = this.fromIntegers(1, 2);
    const fractional = this.fractionalPart(f);
    const distance = this.abs(fractional);
    try {
      if (this.eq(distance, half)) {
        const whole = this.wholePart(f);
        if (this.#isEven(whole)) {
          return this.#build(whole, this.integers.one(), 'round');
        }
        const one = this.integers.one();
        const adjusted = this.isNegative(f)
          ? this.integers.sub(whole, one)
          : this.integers.add(whole, one);
        this.integers.release(whole);
        this.integers.release(one);
        return this.#build(adjusted, this.integers.one(), 'round');
      }

      const signedHalf = this.isNegative(f)
        ? this.negate(half)
        : this.copy(half);
      const shifted = this.add(f, signedHalf);
      this.release(signedHalf);
      try {
        return this.trunc(shifted);
      } finally {
        this.release(shifted);
      }
    } finally {
      this.release(half);
      this.release(fractional);
      this.release(distance);
    }
  }

  sign(f: Fraction<I>): Ordering {
    this.#live(f, 'sign');
    if (this.isZero(f)) return 0;
    if (this.isNegative(f)) return -1;
    return 1;
  }

  min(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    return this.lt(a, b) ? this.copy(a) : this.copy(b);
  }

  max(a: Fraction<I>, b: Fraction<I>): Fraction<I> {
    return this.gt(a, b) ? this.copy(a) : this.copy(b);
  }

  // ==========================================================================
  // Conversion & inspection
  // ==========================================================================

  /** Not exact for large operands: each side is rounded to a double first. */
  toDouble(f: Fraction<I>): number {
    const { numerator, denominator } = this.#live(f, 'toDouble');
    return (
      this.integers.toDouble(numerator) / this.integers.toDouble(denominator)
    );
  }

  toInt64(f: Fraction<I>): bigint | undefined {
    const { numerator } = this.#live(f, 'toInt64');
    if (!this.isInteger(f)) return undefined;
    return this.integers.toInt64(numerator);
  }

  toString(f: Fraction<I>): string {
    const { numerator, denominator } = this.#live(f, 'toString');
    const num = this.integers.toString(numerator, 10);
    if (this.isInteger(f)) return num;
    return `${num}/${this.integers.toString(denominator, 10)}`;
  }

  /**
   * Parses `-?\d+(/\d+)?`, splitting on the first slash. Malformed halves and
   * zero denominators come back as Err.
   */
  fromString(text: string): Result<Fraction<I>, FractionParseError> {
    if (text == null) {
      throw new PreconditionError({
        message: 'fromString: text cannot be null',
        errorCode: ErrorCode.NULL_OPERAND,
        context: { operation: 'fromString' },
      });
    }

    const slash = text.indexOf('/');
    const numeratorText = slash < 0 ? text : text.slice(0, slash);
    const numerator = this.integers.fromString(numeratorText, 10);
    if (numerator === undefined) {
      return err(this.#malformed(text, 'numerator'));
    }
    if (slash < 0) {
      return ok(this.#build(numerator, this.integers.one(), 'fromString'));
    }

    const denominator = this.integers.fromString(text.slice(slash + 1), 10);
    if (denominator === undefined) {
      this.integers.release(numerator);
      return err(this.#malformed(text, 'denominator'));
    }
    if (this.integers.isZero(denominator)) {
      this.integers.release(numerator);
      this.integers.release(denominator);
      return err(
        new FractionParseError({
          message: `Denominator of "${excerpt(text)}" is zero`,
          errorCode: ErrorCode.ZERO_DENOMINATOR,
          context: { operation: 'fromString', input: excerpt(text) },
        })
      );
    }
    return ok(this.#build(numerator, denominator, 'fromString'));
  }

  /** Caller-owned reference to the numerator. */
  numerator(f: Fraction<I>): I {
    return this.integers.retain(this.#live(f, 'numerator').numerator);
  }

  /** Caller-owned reference to the (positive) denominator. */
  denominator(f: Fraction<I>): I {
    return this.integers.retain(this.#live(f, 'denominator').denominator);
  }

  /**
   * Unsigned 64-bit hash of the canonical decimal text. Equal values hash
   * equally because every live fraction is already reduced.
   */
  hash(f: Fraction<I>): bigint {
    const { numerator, denominator } = this.#live(f, 'hash');
    const h1 = polynomialHash(this.integers.toString(numerator, 10));
    const h2 = polynomialHash(this.integers.toString(denominator, 10));
    return (h1 ^ (h2 << 1n)) & HASH_MASK;
  }

  fitsInt32(f: Fraction<I>): boolean {
    const { numerator } = this.#live(f, 'fitsInt32');
    return this.isInteger(f) && this.integers.toInt32(numerator) !== undefined;
  }

  fitsInt64(f: Fraction<I>): boolean {
    const { numerator } = this.#live(f, 'fitsInt64');
    return this.isInteger(f) && this.integers.toInt64(numerator) !== undefined;
  }

  /**
   * Round-trips through toDouble and a bounded fromDouble. Some large values
   * that a double represents exactly still report false.
   */
  fitsDouble(f: Fraction<I>): boolean {
    const d = this.toDouble(f);
    if (!Number.isFinite(d)) return false;
    const converted = this.fromDouble(d, this.options.fitsDoubleMaxDenominator);
    if (isErr(converted)) return false;
    try {
      return this.eq(f, converted.value);
    } finally {
      this.release(converted.value);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  #live(
    f: Fraction<I> | null | undefined,
    operation: string,
    operand = 'operand'
  ): FractionParts<I> {
    if (f == null) {
      throw new PreconditionError({
        message: `${operation}: ${operand} cannot be null`,
        errorCode: ErrorCode.NULL_OPERAND,
        context: { operation, operand },
      });
    }
    return f.parts(operation);
  }

  /**
   * Takes ownership of `numerator` and `denominator`, moves the sign to the
   * numerator, reduces, and mints the handle.
   */
  /**
   * Whether `quotient * denominator` gives back `numerator` exactly. Without
   * a gcd the denominator can exceed 1 for a whole value, so exactness is
   * read from the remainder, not from the layout.
   */
  #divides(quotient: I, numerator: I, denominator: I): boolean {
    const product = this.integers.mul(quotient, denominator);
    const exact = this.integers.compare(product, numerator) === 0;
    this.integers.release(product);
    return exact;
  }

  #build(numerator: I, denominator: I, operation: string): Fraction<I> {
    if (this.integers.isZero(denominator)) {
      this.integers.release(numerator);
      this.integers.release(denominator);
      throw this.#zeroDenominator(operation);
    }

    let num = numerator;
    let den = denominator;
    if (this.integers.isNegative(den)) {
      const negNum = this.integers.negate(num);
      const negDen = this.integers.negate(den);
      this.integers.release(num);
      this.integers.release(den);
      num = negNum;
      den = negDen;
    }

    const reduced = this.#reduce(num, den, operation);
    this.metrics.increment('constructed');
    return new Fraction(reduced.numerator, reduced.denominator, this.integers);
  }

  #reduce(num: I, den: I, operation: string): FractionParts<I> {
    const g = this.integers.gcd(num, den);
    if (g === undefined) {
      this.metrics.increment('reductionsSkipped');
      this.#diagnose({
        code: 'REDUCTION_SKIPPED',
        message: `${operation}: gcd unavailable, fraction left unreduced`,
        details: { operation, integers: this.integers.name },
      });
      return { numerator: num, denominator: den };
    }
    if (this.integers.isOne(g)) {
      this.integers.release(g);
      return { numerator: num, denominator: den };
    }

    // g divides both exactly, so floor division is exact here
    const reducedNum = this.integers.div(num, g);
    const reducedDen = this.integers.div(den, g);
    this.integers.release(num);
    this.integers.release(den);
    this.integers.release(g);
    this.metrics.increment('reductions');
    return { numerator: reducedNum, denominator: reducedDen };
  }

  #crossCombine(
    a: Fraction<I>,
    b: Fraction<I>,
    operation: 'add' | 'sub'
  ): Fraction<I> {
    const x = this.#live(a, operation, 'left');
    const y = this.#live(b, operation, 'right');
    const ad = this.integers.mul(x.numerator, y.denominator);
    const bc = this.integers.mul(y.numerator, x.denominator);
    const num =
      operation === 'add'
        ? this.integers.add(ad, bc)
        : this.integers.sub(ad, bc);
    this.integers.release(ad);
    this.integers.release(bc);
    return this.#build(
      num,
      this.integers.mul(x.denominator, y.denominator),
      operation
    );
  }

  #powPositive(base: Fraction<I>, exponent: bigint): Fraction<I> {
    let result = this.one();
    let current = this.copy(base);
    let remaining = exponent;

    while (remaining > 0n) {
      if ((remaining & 1n) === 1n) {
        const next = this.mul(result, current);
        this.release(result);
        result = next;
      }
      remaining >>= 1n;
      if (remaining > 0n) {
        const squared = this.mul(current, current);
        this.release(current);
        current = squared;
      }
    }

    this.release(current);
    return result;
  }

  #isEven(value: I): boolean {
    const two = this.integers.fromBigInt(2n);
    const half = this.integers.div(value, two);
    const doubled = this.integers.mul(half, two);
    const remainder = this.integers.sub(value, doubled);
    const even = this.integers.isZero(remainder);
    this.integers.release(two);
    this.integers.release(half);
    this.integers.release(doubled);
    this.integers.release(remainder);
    return even;
  }

  #toBigInt(value: IntegerLike, operation: string, operand: string): bigint {
    if (typeof value === 'bigint') return value;
    if (!Number.isSafeInteger(value)) {
      throw new PreconditionError({
        message: `${operation}: ${operand} must be a safe integer, got ${value}`,
        errorCode: ErrorCode.INVALID_INTEGER,
        context: { operation, operand, value },
      });
    }
    return BigInt(value);
  }

  #zeroDenominator(operation: string): PreconditionError {
    return new PreconditionError({
      message: `${operation}: denominator cannot be zero`,
      errorCode: ErrorCode.ZERO_DENOMINATOR,
      context: { operation, operand: 'denominator' },
    });
  }

  #malformed(text: string, part: 'numerator' | 'denominator'): FractionParseError {
    return new FractionParseError({
      message: `Cannot parse ${part} of "${excerpt(text)}"`,
      errorCode: ErrorCode.MALFORMED_FRACTION,
      context: { operation: 'fromString', operand: part, input: excerpt(text) },
    });
  }

  #diagnose(diagnostic: EngineDiagnostic): void {
    this.options.onDiagnostic?.(diagnostic);
  }
}

/** Engine over native bigint with default options. */
export const rational = new RationalEngine(bigintEngine);
