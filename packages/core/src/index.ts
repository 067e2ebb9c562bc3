// @quotient/core entry point
//
// - RationalEngine<I> is the whole arithmetic surface; `rational` is a ready
//   instance over native bigint.
// - IntegerEngine<I> is the contract an arbitrary-precision integer backend
//   implements; BigIntEngine is the default.
// - Degenerate external input (fraction text, non-finite doubles) comes back
//   as Result; caller bugs throw PreconditionError.

export {
  RationalEngine,
  rational,
  type FractionApproximation,
  type IntegerLike,
} from './rational/engine.js';
export { Fraction, type FractionParts } from './rational/fraction.js';
export {
  approximateDouble,
  type Approximation,
  type ApproximationOptions,
  type ApproximationStop,
} from './rational/continued-fraction.js';

export { type IntegerEngine, type Ordering } from './integer/engine.js';
export { BigIntEngine, bigintEngine } from './integer/bigint-engine.js';

export {
  DEFAULT_ENGINE_OPTIONS,
  resolveEngineOptions,
  validateEngineOptions,
  type EngineOptions,
  type ResolvedEngineOptions,
  type EngineDiagnostic,
  type EngineDiagnosticCode,
  type DiagnosticSink,
} from './types/options.js';
export {
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  unwrap,
  unwrapOr,
  type Ok,
  type Err,
  type Result,
} from './types/result.js';
export {
  FractionError,
  PreconditionError,
  FractionParseError,
  ConfigError,
  isFractionError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';

export {
  MetricsCollector,
  METRIC_COUNTERS,
  type MetricCounter,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
