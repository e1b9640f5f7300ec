import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  DiagnosticCollector,
  type DiagnosticEnvelope,
  type DiagnosticSink,
} from '../diag/validate.js';
import { ErrorCode } from '../errors/codes.js';
import type {
  HttpMethod,
  OpenApiDocument,
  Operation,
  PathItem,
} from '../openapi/types.js';
import {
  type PathSegment,
  operationLocation,
  renderPath,
} from '../compiler/path-template.js';
import type { EndpointTemplate, Qualifier, RouteTree } from '../route/tree.js';
import { StructuralConflictError } from '../types/errors.js';
import { canonicalJson } from '../util/canonical-json.js';
import { MetricsCollector, type MetricsSnapshot } from '../util/metrics.js';

export interface OperationIdentity {
  path: string;
  method: HttpMethod;
}

/** Operation identities in pattern declaration order, without duplicates */
export type OperationSelection = readonly OperationIdentity[];

export type OperationTransform = (
  operation: Operation,
  identity: OperationIdentity
) => Operation;

export interface SelectOptions {
  onDiagnostic?: DiagnosticSink;
  metrics?: boolean;
}

export interface SelectResult {
  selection: OperationSelection;
  diagnostics: DiagnosticEnvelope[];
  metrics: MetricsSnapshot;
}

function isTypeDescriptorLike(
  value: object
): value is { id: string; declare: unknown } {
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'declare') === 'function'
  );
}

/** Replaces type descriptors by their identity so shapes compare by id */
function identityView(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(identityView);
  if (typeof value !== 'object' || value === null) return value;
  if (isTypeDescriptorLike(value)) return { $type: value.id };
  const out: Record<string, unknown> = {};
  for (const [key, member] of Object.entries(value)) {
    out[key] = identityView(member);
  }
  return out;
}

/** One endpoint with every qualifier above it, outermost first */
interface FlatEndpoint {
  qualifiers: readonly Qualifier[];
  endpoint: EndpointTemplate;
}

/** Distributes qualifiers over alternatives, in declaration order */
function flatten(
  tree: RouteTree,
  qualifiers: readonly Qualifier[] = []
): FlatEndpoint[] {
  switch (tree.kind) {
    case 'leaf':
      return [{ qualifiers, endpoint: tree.endpoint }];
    case 'sequential':
      return flatten(tree.subtree, [...qualifiers, tree.qualifier]);
    case 'alternative':
      return [
        ...flatten(tree.left, qualifiers),
        ...flatten(tree.right, qualifiers),
      ];
  }
}

function flatKey(flat: FlatEndpoint): string {
  return canonicalJson(identityView(flat));
}

function pushSegment(
  segments: readonly PathSegment[],
  qualifier: Qualifier
): readonly PathSegment[] {
  switch (qualifier.kind) {
    case 'segment':
      return [...segments, { kind: 'static', literal: qualifier.literal }];
    case 'capture':
      return [
        ...segments,
        { kind: 'capture', name: qualifier.name, all: qualifier.all === true },
      ];
    default:
      return segments;
  }
}

function identityOf(flat: FlatEndpoint): OperationIdentity {
  const segments = flat.qualifiers.reduce<readonly PathSegment[]>(pushSegment, []);
  return { path: renderPath(segments), method: flat.endpoint.method };
}

/**
 * Returns `undefined` when every pattern endpoint, with its qualifier chain,
 * is also an endpoint of `target`; otherwise the location of the first one
 * that is not.
 */
function findEmbeddingFailure(
  pattern: readonly FlatEndpoint[],
  target: RouteTree
): string | undefined {
  const available = new Set(flatten(target).map(flatKey));
  const missing = pattern.find((flat) => !available.has(flatKey(flat)));
  return missing === undefined ? undefined : identityKey(identityOf(missing));
}

export function embeds(pattern: RouteTree, target: RouteTree): boolean {
  return findEmbeddingFailure(flatten(pattern), target) === undefined;
}

function identityKey(identity: OperationIdentity): string {
  return operationLocation(identity.method, identity.path);
}

export function selectDetailed(
  pattern: RouteTree,
  tree: RouteTree,
  options: SelectOptions = {}
): SelectResult {
  const metrics = new MetricsCollector({ enabled: options.metrics ?? true });
  const diagnostics = new DiagnosticCollector(options.onDiagnostic);

  const selection = metrics.measure('SELECT', () => {
    const endpoints = flatten(pattern);
    const failure = findEmbeddingFailure(endpoints, tree);
    if (failure !== undefined) {
      throw new StructuralConflictError({
        message: `Pattern endpoint ${failure} has no counterpart in the route tree`,
        errorCode: ErrorCode.PATTERN_NOT_EMBEDDABLE,
        context: {
          location: failure,
          patternEndpoints: endpoints.length,
          suggestion:
            'Build the pattern from the same qualifiers and endpoint values as the route tree',
        },
      });
    }

    const seen = new Set<string>();
    const unique: OperationIdentity[] = [];
    for (const identity of endpoints.map(identityOf)) {
      const key = identityKey(identity);
      if (seen.has(key)) {
        diagnostics.emit(DIAGNOSTIC_CODES.SELECTION_DUPLICATE_COLLAPSED, key);
        continue;
      }
      seen.add(key);
      unique.push(identity);
    }
    return unique;
  });

  return {
    selection,
    diagnostics: diagnostics.list(),
    metrics: metrics.snapshotMetrics(),
  };
}

/**
 * Identities of the operations `pattern` denotes inside `tree`.
 *
 * @throws {StructuralConflictError} PATTERN_NOT_EMBEDDABLE when the pattern
 * is not a sub-tree of `tree`
 */
export function select(
  pattern: RouteTree,
  tree: RouteTree,
  options: SelectOptions = {}
): OperationSelection {
  return selectDetailed(pattern, tree, options).selection;
}

function lookup(
  document: OpenApiDocument,
  identity: OperationIdentity
): Operation | undefined {
  return document.paths[identity.path]?.[identity.method];
}

/**
 * Applies `transform` to every selected operation, returning a new document.
 * Untouched path items keep their identity; the input is not modified.
 */
export function applyOver(
  selection: OperationSelection,
  document: OpenApiDocument,
  transform: OperationTransform
): OpenApiDocument {
  const missing = selection.filter((identity) => lookup(document, identity) === undefined);
  const firstMissing = missing[0];
  if (firstMissing !== undefined) {
    throw new StructuralConflictError({
      message: `Selected operation ${identityKey(firstMissing)} is not in the document`,
      errorCode: ErrorCode.SELECTION_NOT_IN_DOCUMENT,
      context: {
        path: firstMissing.path,
        method: firstMissing.method,
        missing: missing.map(identityKey),
      },
    });
  }

  const paths: Record<string, PathItem> = { ...document.paths };
  const done = new Set<string>();
  for (const identity of selection) {
    const key = identityKey(identity);
    if (done.has(key)) continue;
    done.add(key);

    const item = paths[identity.path];
    const operation = item?.[identity.method];
    if (item === undefined || operation === undefined) continue;
    paths[identity.path] = {
      ...item,
      [identity.method]: transform(operation, identity),
    };
  }
  return { ...document, paths };
}
