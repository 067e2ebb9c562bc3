/**
 * ErrorPresenter - pure presentation layer for FractionError instances
 * - No arithmetic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  FractionError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = ['input', 'value'];

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.ZERO_DENOMINATOR]: 'Use a non-zero denominator, e.g. "3/4".',
  [ErrorCode.DIVISION_BY_ZERO]: 'Check the divisor with isZero() before dividing.',
  [ErrorCode.ZERO_TO_NEGATIVE_POWER]: 'Raise zero only to non-negative powers.',
  [ErrorCode.MALFORMED_FRACTION]:
    'Write fractions as digits or digits/digits with an optional sign, e.g. "-7/3".',
  [ErrorCode.NON_FINITE_INPUT]:
    'Pass a finite number; NaN and Infinity have no fraction.',
};

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: FractionError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: error.context?.input ?? error.context?.valueExcerpt,
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: FractionError): ProductionView {
    // Delegate to the error's safe serializer, then drop any additional
    // keys configured in the presenter.
    const base = error.toJSON('prod');
    const redacted = this.#applyAdditionalRedaction(base);
    return { ...redacted, requestId: this.#getRequestId() };
  }

  #formatTitle(error: FractionError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.operation) return undefined;
    return ctx.operand
      ? `Operation: ${ctx.operation} (${ctx.operand})`
      : `Operation: ${ctx.operation}`;
  }

  #formatWorkaround(error: FractionError): string | undefined {
    return error.context?.suggestion ?? WORKAROUNDS[error.errorCode];
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    if (!view.context) return view;
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const context: ErrorContext = {};
    for (const [key, value] of Object.entries(view.context)) {
      context[key] = keys.has(key) ? '[REDACTED]' : value;
    }
    return { ...view, context };
  }
}

export default ErrorPresenter;
