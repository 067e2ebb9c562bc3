import type { Fraction, RationalEngine } from '@quotient/core';

import { parseFraction, resolveRoundMode, type RoundMode } from '../flags.js';
import type { CommandReport } from './report.js';

function applyRounding(
  engine: RationalEngine<bigint>,
  mode: RoundMode,
  value: Fraction<bigint>
): Fraction<bigint> {
  switch (mode) {
    case 'floor':
      return engine.floor(value);
    case 'ceil':
      return engine.ceil(value);
    case 'trunc':
      return engine.trunc(value);
    case 'round':
      return engine.round(value);
  }
}

export function runRound(
  engine: RationalEngine<bigint>,
  valueText: string,
  modeValue: unknown
): CommandReport {
  const mode = resolveRoundMode(modeValue);
  const value = parseFraction(engine, valueText);
  try {
    const rounded = applyRounding(engine, mode, value);
    const text = engine.toString(rounded);
    engine.release(rounded);
    return {
      text,
      data: { value: engine.toString(value), mode, result: text },
    };
  } finally {
    engine.release(value);
  }
}
