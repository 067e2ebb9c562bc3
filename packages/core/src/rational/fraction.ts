import { ErrorCode } from '../errors/codes.js';
import type { IntegerEngine } from '../integer/engine.js';
import { PreconditionError } from '../types/errors.js';

export interface FractionParts<I> {
  numerator: I;
  denominator: I;
}

/**
 * Reference-counted handle to a normalized rational value.
 *
 * Handles are only minted by a RationalEngine, which guarantees a positive
 * denominator and lowest terms. Numerator and denominator never change after
 * the handle is returned; the reference count is the only mutable state.
 */
export class Fraction<I> {
  #numerator: I;
  #denominator: I;
  #refCount = 1;
  readonly #integers: IntegerEngine<I>;

  /** @internal takes ownership of both integers */
  constructor(numerator: I, denominator: I, integers: IntegerEngine<I>) {
    this.#numerator = numerator;
    this.#denominator = denominator;
    this.#integers = integers;
  }

  get refCount(): number {
    return this.#refCount;
  }

  get released(): boolean {
    return this.#refCount === 0;
  }

  /**
   * @internal Borrowed views of the integers, valid while the handle is live.
   * Callers that keep a value past the current operation must retain it.
   */
  parts(operation: string): FractionParts<I> {
    if (this.#refCount === 0) {
      throw new PreconditionError({
        message: `${operation}: fraction used after its last release`,
        errorCode: ErrorCode.USE_AFTER_RELEASE,
        context: { operation },
      });
    }
    return { numerator: this.#numerator, denominator: this.#denominator };
  }

  /** @internal */
  acquire(): this {
    this.parts('retain');
    this.#refCount += 1;
    return this;
  }

  /**
   * @internal Drops one reference. Returns true when this call destroyed the
   * handle and handed both integers back to the integer engine.
   */
  relinquish(): boolean {
    this.parts('release');
    this.#refCount -= 1;
    if (this.#refCount > 0) return false;
    this.#integers.release(this.#numerator);
    this.#integers.release(this.#denominator);
    return true;
  }

  toString(): string {
    if (this.#refCount === 0) return '[released fraction]';
    const num = this.#integers.toString(this.#numerator, 10);
    if (this.#integers.isOne(this.#denominator)) return num;
    return `${num}/${this.#integers.toString(this.#denominator, 10)}`;
  }
}
