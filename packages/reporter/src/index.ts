export * from './model/report.js';
export type { EngineRunOptions } from './engine/types.js';
export { buildReportFromConformance } from './engine/report-builder.js';
export { runConformance } from './engine/runner.js';
export { renderMarkdownReport } from './render/markdown.js';
export { renderJsonReport } from './render/json.js';
