// @routespec/core entry point
//
// Public API:
// - Route trees: builders (sub/alt/get/...), tree types and guards.
// - Type descriptors: primitives, bounded integers, records, newtypes, enums,
//   plus the SchemaRegistry they declare into.
// - compile()/compileDetailed(): route tree -> OpenAPI 3.0 document.
// - select()/applyOver() and the annotation helpers built on them.
// - validateAll(): wire-encoder conformance against advertised schemas.
// - serializeDocument(): JSON text with exact 64-bit bounds.
// - Errors, diagnostics, metrics and options shared by all of the above.

// OpenAPI object model
export * from './openapi/types.js';

// Route trees
export * from './route/tree.js';
export * from './route/builders.js';

// Type descriptors
export type {
  SchemaContext,
  TypeDescriptor,
  ValueOf,
} from './schema/descriptor.js';
export {
  COMPONENT_SCHEMA_PREFIX,
  SchemaRegistry,
  componentRef,
  type RegistryEntry,
} from './schema/registry.js';
export * as t from './schema/types.js';
export type {
  ArrayOptions,
  FieldInput,
  FieldSpec,
  ObjectOptions,
  RecordValue,
  StringOptions,
} from './schema/types.js';

// Document compiler
export {
  compile,
  compileDetailed,
  foldRouteTree,
  type CompileResult,
} from './compiler/compile.js';
export { mergeOperations, mergePartials } from './compiler/merge.js';
export {
  type PathSegment,
  type PathTemplate,
  pathIdentity,
  renderPath,
} from './compiler/path-template.js';

// Sub-operation selector
export {
  applyOver,
  embeds,
  select,
  selectDetailed,
  type OperationIdentity,
  type OperationSelection,
  type OperationTransform,
  type SelectOptions,
  type SelectResult,
} from './selector/select.js';
export {
  applyTagsFor,
  hasOperation,
  operationsOf,
  setResponseFor,
  type DocumentTransform,
  type OperationEntry,
} from './selector/operations.js';

// Conformance validator
export {
  failedSections,
  validateAll,
  type ConformanceFailure,
  type ConformanceReport,
  type ConformanceSection,
  type ConformanceSummary,
} from './validator/conformance.js';
export { reachableTypes, type ReachableType } from './validator/reachable.js';
export {
  createConformanceAjv,
  type AjvInstance,
} from './validator/ajv-factory.js';
export {
  assertSectionPassed,
  describeFailure,
  registerConformanceTests,
  type TestRegistrar,
} from './testing/conformance-suite.js';

// Serialization
export { serializeDocument } from './serialize/document-json.js';

// Options
export * from './types/options.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
  isStructuralConflictCode,
} from './errors/codes.js';
export * from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';
export { calculateDistance, didYouMean } from './errors/suggestions.js';

// Diagnostics & metrics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  type DiagnosticCode,
  type DiagnosticPhase,
  getDiagnosticPhase,
  isKnownDiagnosticCode,
} from './diag/codes.js';
export {
  DiagnosticCollector,
  assertDiagnosticEnvelope,
  type DiagnosticEnvelope,
  type DiagnosticSink,
} from './diag/validate.js';
export {
  METRIC_PHASES,
  MetricsCollector,
  type MetricPhase,
  type MetricsSnapshot,
} from './util/metrics.js';
export { canonicalJson, structurallyEqual } from './util/canonical-json.js';
export { jsonSafeReplacer } from './util/json-safe.js';
