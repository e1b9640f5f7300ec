import { DiagnosticCollector, type DiagnosticEnvelope } from '../diag/validate.js';
import type {
  OpenApiDocument,
  PathItem,
  SecurityScheme,
} from '../openapi/types.js';
import type { Qualifier, RouteTree } from '../route/tree.js';
import { SchemaRegistry } from '../schema/registry.js';
import {
  type CompileOptions,
  type ResolvedCompileOptions,
  resolveCompileOptions,
} from '../types/options.js';
import { MetricsCollector, type MetricsSnapshot } from '../util/metrics.js';
import {
  type MaterializeContext,
  type PartialDocument,
  materializeLeaf,
} from './materialize.js';
import { type MergeContext, mergePartials } from './merge.js';

export interface CompileResult {
  document: OpenApiDocument;
  diagnostics: DiagnosticEnvelope[];
  metrics: MetricsSnapshot;
  /** Registry holding every named type reachable from the tree */
  registry: SchemaRegistry;
}

interface FoldContext extends MaterializeContext, MergeContext {}

/**
 * Folds the tree with an immutable qualifier stack: each leaf becomes one
 * operation, each alternative merges its left fold with its right fold.
 */
export function foldRouteTree(
  tree: RouteTree,
  stack: readonly Qualifier[],
  ctx: FoldContext
): PartialDocument {
  switch (tree.kind) {
    case 'leaf':
      return materializeLeaf(stack, tree.endpoint, ctx);
    case 'sequential':
      return foldRouteTree(tree.subtree, [...stack, tree.qualifier], ctx);
    case 'alternative': {
      const left = foldRouteTree(tree.left, stack, ctx);
      const right = foldRouteTree(tree.right, stack, ctx);
      return mergePartials(left, right, ctx);
    }
  }
}

function assembleDocument(
  partial: PartialDocument,
  registry: SchemaRegistry,
  options: ResolvedCompileOptions
): OpenApiDocument {
  const paths: Record<string, PathItem> = {};
  for (const compiled of partial.paths.values()) {
    const item: PathItem = {};
    for (const [method, operation] of compiled.operations) {
      item[method] = operation;
    }
    paths[compiled.path] = item;
  }

  const document: OpenApiDocument = {
    openapi: '3.0.0',
    info: { ...options.info },
    paths,
    components: { schemas: registry.toComponents() },
  };
  if (options.servers.length > 0) document.servers = options.servers;
  if (options.tags.length > 0) document.tags = options.tags;
  if (partial.securitySchemes.size > 0) {
    const schemes: Record<string, SecurityScheme> = {};
    for (const [name, scheme] of partial.securitySchemes) {
      schemes[name] = scheme;
    }
    document.components.securitySchemes = schemes;
  }
  return document;
}

function countOperations(document: OpenApiDocument): number {
  return Object.values(document.paths).reduce(
    (total, item) => total + Object.keys(item).length,
    0
  );
}

/** Compiles a route tree, returning diagnostics and metrics alongside */
export function compileDetailed(
  tree: RouteTree,
  options: CompileOptions = {}
): CompileResult {
  const resolved = resolveCompileOptions(options);
  const metrics = new MetricsCollector({ enabled: resolved.metrics });
  const diagnostics = new DiagnosticCollector(resolved.onDiagnostic);
  const registry = new SchemaRegistry();

  const document = metrics.measure('COMPILE', () => {
    const partial = foldRouteTree(tree, [], {
      registry,
      options: resolved,
      diagnostics,
      onMergedOperation: () => metrics.addMergedOperation(),
    });
    return assembleDocument(partial, registry, resolved);
  });

  metrics.setOperations(countOperations(document));
  metrics.setSchemas(registry.size);

  return {
    document,
    diagnostics: diagnostics.list(),
    metrics: metrics.snapshotMetrics(),
    registry,
  };
}

/**
 * Compiles a route tree into an OpenAPI 3.0 document.
 *
 * 64-bit bounds stay `bigint`, so `JSON.stringify` rejects the result; write
 * it with `serializeDocument`.
 */
export function compile(
  tree: RouteTree,
  options: CompileOptions = {}
): OpenApiDocument {
  return compileDetailed(tree, options).document;
}
