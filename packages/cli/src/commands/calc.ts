import type { Fraction, RationalEngine } from '@quotient/core';

import {
  parseExponent,
  parseFraction,
  resolveCalcOperation,
  type CalcOperation,
} from '../flags.js';
import type { CommandReport } from './report.js';

type BinaryOperation = Exclude<CalcOperation, 'pow' | 'cmp'>;

function applyBinary(
  engine: RationalEngine<bigint>,
  operation: BinaryOperation,
  left: Fraction<bigint>,
  right: Fraction<bigint>
): Fraction<bigint> {
  switch (operation) {
    case 'add':
      return engine.add(left, right);
    case 'sub':
      return engine.sub(left, right);
    case 'mul':
      return engine.mul(left, right);
    case 'div':
      return engine.div(left, right);
    case 'min':
      return engine.min(left, right);
    case 'max':
      return engine.max(left, right);
  }
}

/**
 * `quotient calc <left> <op> <right>`. For `pow` the right operand is an
 * integer exponent; `cmp` prints -1, 0 or 1.
 */
export function runCalc(
  engine: RationalEngine<bigint>,
  leftText: string,
  opText: string,
  rightText: string
): CommandReport {
  const operation = resolveCalcOperation(opText);
  const left = parseFraction(engine, leftText);
  try {
    if (operation === 'pow') {
      const exponent = parseExponent(rightText);
      const result = engine.pow(left, exponent);
      return report(engine, operation, left, exponent.toString(), result);
    }

    const right = parseFraction(engine, rightText);
    try {
      if (operation === 'cmp') {
        const order = engine.compare(left, right);
        return {
          text: String(order),
          data: {
            operation,
            left: engine.toString(left),
            right: engine.toString(right),
            result: order,
          },
        };
      }
      const result = applyBinary(engine, operation, left, right);
      return report(engine, operation, left, engine.toString(right), result);
    } finally {
      engine.release(right);
    }
  } finally {
    engine.release(left);
  }
}

/** Builds the report and releases `result`. */
function report(
  engine: RationalEngine<bigint>,
  operation: CalcOperation,
  left: Fraction<bigint>,
  right: string,
  result: Fraction<bigint>
): CommandReport {
  const text = engine.toString(result);
  engine.release(result);
  return {
    text,
    data: { operation, left: engine.toString(left), right, result: text },
  };
}
