export type Ordering = -1 | 0 | 1;

/**
 * Arbitrary-precision signed integers as seen by the rational engine.
 *
 * `I` is the engine's value handle. Every value an operation returns is owned
 * by the caller and must eventually be passed to `release`; `retain` hands out
 * an additional owned reference to an existing value. Engines over immutable
 * values may implement both as no-ops.
 */
export interface IntegerEngine<I> {
  readonly name: string;

  zero(): I;
  one(): I;
  fromBigInt(value: bigint): I;

  add(a: I, b: I): I;
  sub(a: I, b: I): I;
  mul(a: I, b: I): I;
  /** Floor division: the quotient rounds toward negative infinity. */
  div(a: I, b: I): I;
  /** Greatest common divisor of |a| and |b|; undefined when it cannot be computed. */
  gcd(a: I, b: I): I | undefined;
  negate(a: I): I;
  abs(a: I): I;

  compare(a: I, b: I): Ordering;
  isZero(a: I): boolean;
  isNegative(a: I): boolean;
  isOne(a: I): boolean;

  retain(a: I): I;
  release(a: I): void;

  /** undefined when the value lies outside the signed 64-bit range */
  toInt64(a: I): bigint | undefined;
  /** undefined when the value lies outside the signed 32-bit range */
  toInt32(a: I): number | undefined;
  toDouble(a: I): number;

  /** undefined when `text` is not an integer in `base` */
  fromString(text: string, base: number): I | undefined;
  toString(a: I, base: number): string;
}
