import { ErrorCode } from '../errors/codes.js';
import { FractionParseError } from '../types/errors.js';
import { DEFAULT_ENGINE_OPTIONS } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';

/** Why expansion ended: the next convergent broke the bound, matched the input, or the reciprocal blew up. */
export type ApproximationStop = 'bound' | 'tolerance' | 'overflow';

export interface Approximation {
  numerator: bigint;
  denominator: bigint;
  steps: number;
  stop: ApproximationStop;
}

export interface ApproximationOptions {
  tolerance?: number;
  overflowGuard?: number;
}

function toBound(maxDenominator: number | bigint): bigint | undefined {
  if (typeof maxDenominator === 'bigint') {
    return maxDenominator > 0n ? maxDenominator : undefined;
  }
  if (!Number.isFinite(maxDenominator) || maxDenominator <= 0) {
    return undefined;
  }
  const floored = BigInt(Math.floor(maxDenominator));
  return floored < 1n ? 1n : floored;
}

/**
 * Best rational approximation of a finite double by continued-fraction
 * convergents, with denominator at most `maxDenominator` (unbounded when
 * `maxDenominator <= 0`).
 *
 * This is not exact reconstruction: the result is only guaranteed to lie
 * within the relative tolerance of `value` or to be the last convergent
 * admitted by the bound, so an arbitrary double does not round-trip
 * bit-for-bit.
 */
export function approximateDouble(
  value: number,
  maxDenominator: number | bigint,
  options: ApproximationOptions = {}
): Result<Approximation, FractionParseError> {
  if (!Number.isFinite(value)) {
    return err(
      new FractionParseError({
        message: `Cannot approximate non-finite value ${value}`,
        errorCode: ErrorCode.NON_FINITE_INPUT,
        context: { operation: 'fromDouble', input: String(value) },
      })
    );
  }

  const tolerance =
    options.tolerance ?? DEFAULT_ENGINE_OPTIONS.approximationTolerance;
  const overflowGuard =
    options.overflowGuard ?? DEFAULT_ENGINE_OPTIONS.approximationOverflowGuard;
  const bound = toBound(maxDenominator);

  const negative = value < 0;
  const target = negative ? -value : value;

  // h[-2]=0, h[-1]=1, k[-2]=1, k[-1]=0
  let h0 = 0n;
  let h1 = 1n;
  let k0 = 1n;
  let k1 = 0n;
  let x = target;
  let steps = 0;
  let stop: ApproximationStop;

  for (;;) {
    const whole = Math.floor(x);
    const a = BigInt(whole);
    const h2 = a * h1 + h0;
    const k2 = a * k1 + k0;

    if (bound !== undefined && k2 > bound) {
      stop = 'bound';
      break;
    }

    h0 = h1;
    h1 = h2;
    k0 = k1;
    k1 = k2;
    steps += 1;

    if (Math.abs(target - Number(h1) / Number(k1)) <= tolerance * target) {
      stop = 'tolerance';
      break;
    }

    x = 1 / (x - whole);
    if (x > overflowGuard) {
      stop = 'overflow';
      break;
    }
  }

  return ok({
    numerator: negative ? -h1 : h1,
    denominator: k1,
    steps,
    stop,
  });
}
