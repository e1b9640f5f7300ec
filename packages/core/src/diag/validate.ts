import {
  type DiagnosticCode,
  type DiagnosticPhase,
  getDiagnosticPhase,
  isKnownDiagnosticCode,
} from './codes.js';

export interface DiagnosticEnvelope<Details = unknown> {
  code: DiagnosticCode;
  phase: DiagnosticPhase;
  /** Operation (`GET /users/{id}`), type id, or route tree location */
  location: string;
  details?: Details;
}

export type DiagnosticSink = (diagnostic: DiagnosticEnvelope) => void;

/** Accumulates diagnostics in emission order and forwards them to `sink` */
export class DiagnosticCollector {
  private readonly entries: DiagnosticEnvelope[] = [];

  constructor(private readonly sink?: DiagnosticSink) {}

  emit(code: DiagnosticCode, location: string, details?: unknown): void {
    const envelope: DiagnosticEnvelope = {
      code,
      phase: getDiagnosticPhase(code),
      location,
      details,
    };
    this.entries.push(envelope);
    this.sink?.(envelope);
  }

  list(): DiagnosticEnvelope[] {
    return [...this.entries];
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Throws when `value` is not a well-formed envelope: a known code, the
 * phase that code belongs to, and a string location.
 */
export function assertDiagnosticEnvelope(
  value: unknown
): asserts value is DiagnosticEnvelope {
  if (!isPlainObject(value)) {
    throw new Error('Diagnostic envelope must be an object');
  }
  const { code, phase, location } = value;
  if (!isKnownDiagnosticCode(code)) {
    throw new Error(`Unknown diagnostic code: ${String(code)}`);
  }
  if (phase !== getDiagnosticPhase(code)) {
    throw new Error(
      `Diagnostic ${code} must use phase "${getDiagnosticPhase(code)}", got "${String(phase)}"`
    );
  }
  if (typeof location !== 'string') {
    throw new Error(`Diagnostic ${code} is missing a location`);
  }
}
