import { jsonSafeReplacer } from '@routespec/core';

import type { Report } from '../model/report.js';

/** Pretty JSON; bigint bounds inside section schemas are written as strings */
export function renderJsonReport(report: Report, space = 2): string {
  return JSON.stringify(report, jsonSafeReplacer, space);
}
