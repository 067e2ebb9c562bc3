/**
 * Error hierarchy for Quotient
 * Precondition violations are thrown; degenerate external input travels in a Result.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  operation?: string; // Engine operation that raised the error (e.g. 'div')
  operand?: string; // Which argument was at fault ('left', 'divisor', ...)
  input?: string; // Offending external text, when there is one
  value?: unknown; // Problematic value (may contain caller data)
  valueExcerpt?: string; // Safe excerpt of value
  setting?: string; // Option name for configuration failures
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

const MAX_EXCERPT = 64;

/**
 * Base error class for all Quotient errors
 */
export abstract class FractionError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and replaces context.value with an excerpt
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Caller bugs: null or released operands, zero denominators, division by
 * zero, zero to a negative power, non-integral numbers where integers are required.
 */
export class PreconditionError extends FractionError {
  constructor(params: Omit<ErrorParams, 'severity'>) {
    super({ ...params, severity: 'error' });
  }

  get operation(): string | undefined {
    return this.context?.operation;
  }
}

/**
 * Malformed fraction text or non-finite doubles. Returned inside an Err,
 * never thrown by the engine itself.
 */
export class FractionParseError extends FractionError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.MALFORMED_FRACTION,
      severity: 'warn',
      context: params.context,
      cause: params.cause,
    });
  }

  get input(): string | undefined {
    return this.context?.input;
  }
}

/**
 * Invalid engine options
 */
export class ConfigError extends FractionError {
  constructor(params: {
    message: string;
    setting: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: params.setting, ...(params.context ?? {}) },
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function isFractionError(error: unknown): error is FractionError {
  return error instanceof FractionError;
}

export function excerpt(value: unknown): string {
  const text = typeof value === 'string' ? value : String(value);
  return text.length > MAX_EXCERPT ? `${text.slice(0, MAX_EXCERPT)}…` : text;
}

function redactContext(context?: ErrorContext): ErrorContext | undefined {
  if (!context || !('value' in context)) return context;
  const { value, ...rest } = context;
  return { ...rest, valueExcerpt: rest.valueExcerpt ?? excerpt(value) };
}
