/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Structural conflicts (E100–E199)
  PARAMETER_CONFLICT = 'E100',
  REQUEST_BODY_CONFLICT = 'E101',
  PATH_TEMPLATE_CONFLICT = 'E102',
  SECURITY_SCHEME_CONFLICT = 'E103',
  SCHEMA_NAME_CONFLICT = 'E104',
  PATTERN_NOT_EMBEDDABLE = 'E110',
  SELECTION_NOT_IN_DOCUMENT = 'E111',
  INVALID_ROUTE_TREE = 'E120',

  // Conformance (E200–E299)
  CONFORMANCE_VIOLATION = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  GENERATOR_UNAVAILABLE = 'E301',
  ENCODER_UNAVAILABLE = 'E302',

  // Serialization Errors (E400–E499)
  SERIALIZATION_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.PARAMETER_CONFLICT]: 20,
  [ErrorCode.REQUEST_BODY_CONFLICT]: 21,
  [ErrorCode.PATH_TEMPLATE_CONFLICT]: 22,
  [ErrorCode.SECURITY_SCHEME_CONFLICT]: 23,
  [ErrorCode.SCHEMA_NAME_CONFLICT]: 24,
  [ErrorCode.PATTERN_NOT_EMBEDDABLE]: 25,
  [ErrorCode.SELECTION_NOT_IN_DOCUMENT]: 26,
  [ErrorCode.INVALID_ROUTE_TREE]: 27,
  [ErrorCode.CONFORMANCE_VIOLATION]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.GENERATOR_UNAVAILABLE]: 51,
  [ErrorCode.ENCODER_UNAVAILABLE]: 52,
  [ErrorCode.SERIALIZATION_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

const STRUCTURAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.PARAMETER_CONFLICT,
  ErrorCode.REQUEST_BODY_CONFLICT,
  ErrorCode.PATH_TEMPLATE_CONFLICT,
  ErrorCode.SECURITY_SCHEME_CONFLICT,
  ErrorCode.SCHEMA_NAME_CONFLICT,
  ErrorCode.PATTERN_NOT_EMBEDDABLE,
  ErrorCode.SELECTION_NOT_IN_DOCUMENT,
]);

export function isStructuralConflictCode(code: ErrorCode): boolean {
  return STRUCTURAL_CODES.has(code);
}
