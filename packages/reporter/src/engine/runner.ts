import { validateAll } from '@routespec/core';

import type { Report } from '../model/report.js';
import { buildReportFromConformance } from './report-builder.js';
import type { EngineRunOptions } from './types.js';

/** Runs the conformance validator over `options.tree` and wraps the result */
export function runConformance(options: EngineRunOptions): Report {
  const conformance = validateAll(options.tree, options.options);
  return buildReportFromConformance(options, conformance);
}
