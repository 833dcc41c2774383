/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Definition Errors (E010–E019)
  INVALID_DEFINITION = 'E010',
  DUPLICATE_PROPERTY = 'E011',
  UNKNOWN_OWNER_ROLE = 'E012',

  // Model Errors (E020–E029)
  MISSING_ACCESSOR = 'E020',

  // Population Errors (E030–E039)
  MISSING_NESTED_MODEL = 'E030',
  MALFORMED_INPUT = 'E031',

  // Persistence Errors (E040–E049)
  PERSISTENCE_FAILED = 'E040',

  // Validation (E200–E299)
  VALIDATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_DEFINITION]: 20,
  [ErrorCode.DUPLICATE_PROPERTY]: 21,
  [ErrorCode.UNKNOWN_OWNER_ROLE]: 22,
  [ErrorCode.MISSING_ACCESSOR]: 25,
  [ErrorCode.MISSING_NESTED_MODEL]: 30,
  [ErrorCode.MALFORMED_INPUT]: 31,
  [ErrorCode.PERSISTENCE_FAILED]: 35,
  [ErrorCode.VALIDATION_FAILED]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
