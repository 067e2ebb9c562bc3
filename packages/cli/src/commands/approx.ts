import { unwrap, type RationalEngine } from '@quotient/core';

import { parseDouble, parseMaxDenominator } from '../flags.js';
import type { CommandReport } from './report.js';

/**
 * `quotient approx <double>`: best fraction within `--max-denominator`
 * (0 for unbounded), with the continued-fraction step count and the reason
 * expansion stopped.
 */
export function runApprox(
  engine: RationalEngine<bigint>,
  valueText: string,
  maxDenominatorValue: unknown
): CommandReport {
  const value = parseDouble(valueText);
  const maxDenominator = parseMaxDenominator(maxDenominatorValue);

  const { fraction, steps, stop } = unwrap(
    engine.approximate(value, maxDenominator)
  );
  try {
    const text = engine.toString(fraction);
    return {
      text,
      data: {
        input: value,
        maxDenominator,
        result: text,
        double: engine.toDouble(fraction),
        steps,
        stop,
      },
    };
  } finally {
    engine.release(fraction);
  }
}
