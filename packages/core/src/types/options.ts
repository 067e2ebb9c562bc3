/**
 * Configuration options for a RationalEngine
 *
 * All options are optional; resolveEngineOptions fills in the defaults and
 * rejects values the engine cannot honour.
 */

import { ConfigError } from './errors.js';

export type EngineDiagnosticCode =
  | 'REDUCTION_SKIPPED'
  | 'APPROXIMATION_STOPPED';

export interface EngineDiagnostic {
  code: EngineDiagnosticCode;
  message: string;
  details?: Record<string, unknown>;
}

export type DiagnosticSink = (diagnostic: EngineDiagnostic) => void;

export interface EngineOptions {
  /** Denominator bound for fromDouble when the caller passes none (default: 0, unbounded) */
  defaultMaxDenominator?: number;
  /** Relative tolerance that ends continued-fraction expansion (default: 1e-15) */
  approximationTolerance?: number;
  /** Reciprocal magnitude that ends continued-fraction expansion (default: 1e15) */
  approximationOverflowGuard?: number;
  /** Denominator bound used by fitsDouble (default: 1_000_000) */
  fitsDoubleMaxDenominator?: number;
  /** Collect operation counters (default: false) */
  metrics?: boolean;
  onDiagnostic?: DiagnosticSink;
}

export interface ResolvedEngineOptions {
  defaultMaxDenominator: number;
  approximationTolerance: number;
  approximationOverflowGuard: number;
  fitsDoubleMaxDenominator: number;
  metrics: boolean;
  onDiagnostic?: DiagnosticSink;
}

export const DEFAULT_ENGINE_OPTIONS: ResolvedEngineOptions = {
  defaultMaxDenominator: 0,
  approximationTolerance: 1e-15,
  approximationOverflowGuard: 1e15,
  fitsDoubleMaxDenominator: 1_000_000,
  metrics: false,
};

export function resolveEngineOptions(
  userOptions: EngineOptions = {}
): ResolvedEngineOptions {
  const defaults = DEFAULT_ENGINE_OPTIONS;
  // Explicit undefined keeps the default
  const resolved: ResolvedEngineOptions = {
    defaultMaxDenominator:
      userOptions.defaultMaxDenominator ?? defaults.defaultMaxDenominator,
    approximationTolerance:
      userOptions.approximationTolerance ?? defaults.approximationTolerance,
    approximationOverflowGuard:
      userOptions.approximationOverflowGuard ??
      defaults.approximationOverflowGuard,
    fitsDoubleMaxDenominator:
      userOptions.fitsDoubleMaxDenominator ??
      defaults.fitsDoubleMaxDenominator,
    metrics: userOptions.metrics ?? defaults.metrics,
    onDiagnostic: userOptions.onDiagnostic,
  };

  validateEngineOptions(resolved);
  return resolved;
}

export function validateEngineOptions(options: ResolvedEngineOptions): void {
  if (Number.isNaN(options.defaultMaxDenominator)) {
    throw new ConfigError({
      message: 'defaultMaxDenominator must be a number',
      setting: 'defaultMaxDenominator',
      context: { value: options.defaultMaxDenominator },
    });
  }
  if (
    !Number.isFinite(options.approximationTolerance) ||
    options.approximationTolerance < 0
  ) {
    throw new ConfigError({
      message: 'approximationTolerance must be a finite, non-negative number',
      setting: 'approximationTolerance',
      context: { value: options.approximationTolerance },
    });
  }
  if (
    Number.isNaN(options.approximationOverflowGuard) ||
    options.approximationOverflowGuard <= 1
  ) {
    throw new ConfigError({
      message: 'approximationOverflowGuard must be greater than 1',
      setting: 'approximationOverflowGuard',
      context: { value: options.approximationOverflowGuard },
    });
  }
  if (
    !Number.isSafeInteger(options.fitsDoubleMaxDenominator) ||
    options.fitsDoubleMaxDenominator <= 0
  ) {
    throw new ConfigError({
      message: 'fitsDoubleMaxDenominator must be a positive integer',
      setting: 'fitsDoubleMaxDenominator',
      context: { value: options.fitsDoubleMaxDenominator },
    });
  }
  if (
    options.onDiagnostic !== undefined &&
    typeof options.onDiagnostic !== 'function'
  ) {
    throw new ConfigError({
      message: 'onDiagnostic must be a function',
      setting: 'onDiagnostic',
    });
  }
}
