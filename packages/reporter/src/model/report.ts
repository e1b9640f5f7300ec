/**
 * Data model for the reporting layer: the core conformance report plus the
 * run metadata a stored report needs to be reproduced.
 */
import type {
  ConformanceSection as CoreConformanceSection,
  ConformanceSummary as CoreConformanceSummary,
  DiagnosticEnvelope as CoreDiagnosticEnvelope,
  MetricsSnapshot as CoreMetricsSnapshot,
  Schema,
  ValidateOptions,
} from '@routespec/core';

export type ConformanceSection = CoreConformanceSection;
export type DiagnosticEnvelope = CoreDiagnosticEnvelope;
export type MetricsSnapshot = CoreMetricsSnapshot;

export interface ReportMeta {
  toolName: string;
  toolVersion: string;
  engineVersion?: string;
  timestamp: string;
  seed: number;
  samplesPerType: number;
  labels?: string[];
}

export interface ReportSummary extends CoreConformanceSummary {
  /** Section type ids that failed, in report order */
  failedTypes: string[];
  timings: {
    validateMs: number;
  };
}

/** Options echoed into the report; functions are reduced to type ids */
export interface ReportOptions {
  samplesPerType: number;
  seed: number;
  validateFormats: boolean;
  patternMatchers: string[];
}

export interface Report {
  apiId: string;
  meta: ReportMeta;
  options: ReportOptions;
  summary: ReportSummary;
  sections: ConformanceSection[];
  components: Record<string, Schema>;
  diagnostics: DiagnosticEnvelope[];
  metrics: MetricsSnapshot;
}

export function echoOptions(
  options: ValidateOptions,
  resolved: { samplesPerType: number; seed: number }
): ReportOptions {
  return {
    samplesPerType: resolved.samplesPerType,
    seed: resolved.seed,
    validateFormats: options.validateFormats ?? true,
    patternMatchers: Object.keys(options.patternMatchers ?? {}).sort(),
  };
}

export function buildReportSummary(
  core: CoreConformanceSummary,
  sections: readonly ConformanceSection[],
  metrics: MetricsSnapshot
): ReportSummary {
  return {
    ...core,
    failedTypes: sections.filter((s) => !s.passed).map((s) => s.typeId),
    timings: { validateMs: metrics.validateMs },
  };
}
