export const DIAGNOSTIC_PHASES = {
  COMPILE: 'compile',
  SELECT: 'select',
  VALIDATE: 'validate',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  // compile: colliding response status resolved right-hand-wins
  RESPONSE_OVERRIDE: 'RESPONSE_OVERRIDE',
  // compile: an explicit response replaced an inferred 400/404
  INFERRED_RESPONSE_SUPERSEDED: 'INFERRED_RESPONSE_SUPERSEDED',
  // select: several pattern leaves resolved to one operation
  SELECTION_DUPLICATE_COLLAPSED: 'SELECTION_DUPLICATE_COLLAPSED',
  // validate: an encoded sample failed its type's schema
  CONFORMANCE_TYPE_FAILED: 'CONFORMANCE_TYPE_FAILED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const PHASE_BY_CODE: Record<DiagnosticCode, DiagnosticPhase> = {
  RESPONSE_OVERRIDE: DIAGNOSTIC_PHASES.COMPILE,
  INFERRED_RESPONSE_SUPERSEDED: DIAGNOSTIC_PHASES.COMPILE,
  SELECTION_DUPLICATE_COLLAPSED: DIAGNOSTIC_PHASES.SELECT,
  CONFORMANCE_TYPE_FAILED: DIAGNOSTIC_PHASES.VALIDATE,
};

export function getDiagnosticPhase(code: DiagnosticCode): DiagnosticPhase {
  return PHASE_BY_CODE[code];
}

export function isKnownDiagnosticCode(code: unknown): code is DiagnosticCode {
  return typeof code === 'string' && code in PHASE_BY_CODE;
}
