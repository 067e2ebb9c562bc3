import type { Fraction, RationalEngine } from '@quotient/core';

import { parseFraction } from '../flags.js';
import type { CommandReport, ReportValue } from './report.js';

/**
 * `quotient inspect <value>`: every derived view of one fraction. Text
 * output is one `key: value` line per entry, in insertion order.
 */
export function runInspect(
  engine: RationalEngine<bigint>,
  valueText: string
): CommandReport {
  const value = parseFraction(engine, valueText);
  try {
    const derived = (
      op: (f: Fraction<bigint>) => Fraction<bigint>
    ): string => {
      const result = op(value);
      const text = engine.toString(result);
      engine.release(result);
      return text;
    };
    const integer = (n: bigint): string => {
      const text = n.toString();
      engine.integers.release(n);
      return text;
    };

    const data: Record<string, ReportValue> = {
      value: engine.toString(value),
      numerator: integer(engine.numerator(value)),
      denominator: integer(engine.denominator(value)),
      double: engine.toDouble(value),
      sign: engine.sign(value),
      integer: engine.isInteger(value),
      whole: integer(engine.wholePart(value)),
      fractional: derived((f) => engine.fractionalPart(f)),
      floor: derived((f) => engine.floor(f)),
      ceil: derived((f) => engine.ceil(f)),
      round: derived((f) => engine.round(f)),
      fitsInt32: engine.fitsInt32(value),
      fitsInt64: engine.fitsInt64(value),
      fitsDouble: engine.fitsDouble(value),
      hash: engine.hash(value).toString(),
    };

    const text = Object.entries(data)
      .map(([key, entry]) => `${key}: ${String(entry)}`)
      .join('\n');
    return { text, data };
  } finally {
    engine.release(value);
  }
}
