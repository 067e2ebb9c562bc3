/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Precondition violations (E001–E099)
  NULL_OPERAND = 'E001',
  USE_AFTER_RELEASE = 'E002',
  ZERO_DENOMINATOR = 'E010',
  DIVISION_BY_ZERO = 'E011',
  ZERO_TO_NEGATIVE_POWER = 'E012',
  INVALID_INTEGER = 'E020',

  // Degenerate input (E100–E199)
  NON_FINITE_INPUT = 'E100',
  MALFORMED_FRACTION = 'E101',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.NULL_OPERAND]: 10,
  [ErrorCode.USE_AFTER_RELEASE]: 11,
  [ErrorCode.ZERO_DENOMINATOR]: 20,
  [ErrorCode.DIVISION_BY_ZERO]: 21,
  [ErrorCode.ZERO_TO_NEGATIVE_POWER]: 22,
  [ErrorCode.INVALID_INTEGER]: 23,
  [ErrorCode.NON_FINITE_INPUT]: 60,
  [ErrorCode.MALFORMED_FRACTION]: 61,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
