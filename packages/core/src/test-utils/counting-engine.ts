import { BigIntEngine } from '../integer/bigint-engine.js';
import type { IntegerEngine, Ordering } from '../integer/engine.js';

export interface CountedInt {
  readonly value: bigint;
  refs: number;
}

/**
 * Integer engine whose values are reference-counted boxes around bigint.
 * Tracks every live box so tests can assert that an operation released
 * everything it borrowed, and can simulate a failing gcd.
 */
export class CountingIntegerEngine implements IntegerEngine<CountedInt> {
  readonly name = 'counting';
  failGcd = false;

  private readonly inner = new BigIntEngine();
  private readonly handles = new Set<CountedInt>();

  /** Number of boxes minted and not yet released to zero */
  get live(): number {
    return this.handles.size;
  }

  zero(): CountedInt {
    return this.mint(0n);
  }

  one(): CountedInt {
    return this.mint(1n);
  }

  fromBigInt(value: bigint): CountedInt {
    return this.mint(value);
  }

  add(a: CountedInt, b: CountedInt): CountedInt {
    return this.mint(this.read(a) + this.read(b));
  }

  sub(a: CountedInt, b: CountedInt): CountedInt {
    return this.mint(this.read(a) - this.read(b));
  }

  mul(a: CountedInt, b: CountedInt): CountedInt {
    return this.mint(this.read(a) * this.read(b));
  }

  div(a: CountedInt, b: CountedInt): CountedInt {
    return this.mint(this.inner.div(this.read(a), this.read(b)));
  }

  gcd(a: CountedInt, b: CountedInt): CountedInt | undefined {
    const x = this.read(a);
    const y = this.read(b);
    if (this.failGcd) return undefined;
    const g = this.inner.gcd(x, y);
    return g === undefined ? undefined : this.mint(g);
  }

  negate(a: CountedInt): CountedInt {
    return this.mint(-this.read(a));
  }

  abs(a: CountedInt): CountedInt {
    return this.mint(this.inner.abs(this.read(a)));
  }

  compare(a: CountedInt, b: CountedInt): Ordering {
    return this.inner.compare(this.read(a), this.read(b));
  }

  isZero(a: CountedInt): boolean {
    return this.read(a) === 0n;
  }

  isNegative(a: CountedInt): boolean {
    return this.read(a) < 0n;
  }

  isOne(a: CountedInt): boolean {
    return this.read(a) === 1n;
  }

  retain(a: CountedInt): CountedInt {
    this.read(a);
    a.refs += 1;
    return a;
  }

  release(a: CountedInt): void {
    this.read(a);
    a.refs -= 1;
    if (a.refs === 0) this.handles.delete(a);
  }

  toInt64(a: CountedInt): bigint | undefined {
    return this.inner.toInt64(this.read(a));
  }

  toInt32(a: CountedInt): number | undefined {
    return this.inner.toInt32(this.read(a));
  }

  toDouble(a: CountedInt): number {
    return this.inner.toDouble(this.read(a));
  }

  fromString(text: string, base: number): CountedInt | undefined {
    const value = this.inner.fromString(text, base);
    return value === undefined ? undefined : this.mint(value);
  }

  toString(a: CountedInt, base: number): string {
    return this.inner.toString(this.read(a), base);
  }

  private mint(value: bigint): CountedInt {
    const handle: CountedInt = { value, refs: 1 };
    this.handles.add(handle);
    return handle;
  }

  private read(a: CountedInt): bigint {
    if (a.refs <= 0) {
      throw new Error(`integer ${a.value} used after its last release`);
    }
    return a.value;
  }
}
