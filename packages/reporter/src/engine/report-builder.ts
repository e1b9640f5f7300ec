import { createRequire } from 'node:module';
import type { ConformanceReport } from '@routespec/core';

import {
  type Report,
  buildReportSummary,
  echoOptions,
} from '../model/report.js';
import type { EngineRunOptions } from './types.js';

const require = createRequire(import.meta.url);

interface PackageInfo {
  name?: string;
  version?: string;
}

function readPackage(specifier: string): PackageInfo {
  try {
    const pkg: unknown = require(specifier);
    if (typeof pkg !== 'object' || pkg === null) return {};
    const name: unknown = Reflect.get(pkg, 'name');
    const version: unknown = Reflect.get(pkg, 'version');
    return {
      name: typeof name === 'string' ? name : undefined,
      version: typeof version === 'string' ? version : undefined,
    };
  } catch (error) {
    // Compiled output sits outside the package directory
    if (error instanceof Error && 'code' in error && error.code === 'MODULE_NOT_FOUND') {
      return {};
    }
    throw error;
  }
}

const reporterPkg = readPackage('../../package.json');
const corePkg = readPackage('@routespec/core/package.json');

const TOOL_NAME = reporterPkg.name ?? '@routespec/reporter';
const TOOL_VERSION = reporterPkg.version ?? '0.0.0';
const ENGINE_VERSION = corePkg.version;

export function buildReportFromConformance(
  options: EngineRunOptions,
  conformance: ConformanceReport
): Report {
  const now = options.now ?? (() => new Date());
  return {
    apiId: options.apiId,
    meta: {
      toolName: TOOL_NAME,
      toolVersion: TOOL_VERSION,
      engineVersion: ENGINE_VERSION,
      timestamp: now().toISOString(),
      seed: conformance.seed,
      samplesPerType: conformance.samplesPerType,
      ...(options.labels !== undefined ? { labels: [...options.labels] } : {}),
    },
    options: echoOptions(options.options ?? {}, conformance),
    summary: buildReportSummary(
      conformance.summary,
      conformance.sections,
      conformance.metrics
    ),
    sections: conformance.sections,
    components: conformance.components,
    diagnostics: conformance.diagnostics,
    metrics: conformance.metrics,
  };
}
