import {
  type DiagnosticEnvelope,
  type MetricsSnapshot,
  jsonSafeReplacer,
} from '@routespec/core';

/**
 * Print diagnostics and metrics to stderr.
 * Used behind the --debug flag.
 */
export function printRunDebug(
  command: string,
  diagnostics: readonly DiagnosticEnvelope[],
  metrics: MetricsSnapshot
): void {
  if (diagnostics.length === 0) {
    process.stderr.write(`[routespec] ${command}.diagnostics: []\n`);
  } else {
    process.stderr.write(
      `[routespec] ${command}.diagnostics: ${JSON.stringify(diagnostics, jsonSafeReplacer, 2)}\n`
    );
  }
  process.stderr.write(
    `[routespec] ${command}.metrics: ${JSON.stringify(metrics)}\n`
  );
}

export function printEffectiveOptions(command: string, options: unknown): void {
  process.stderr.write(
    `[routespec] ${command}.options: ${JSON.stringify(options, jsonSafeReplacer)}\n`
  );
}
