/**
 * Merge policy for alternatives.
 *
 * Operations that share (path identity, method) are combined field by
 * field; anything that cannot be combined without losing information is a
 * StructuralConflictError. Inputs are never mutated.
 */
import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import type { DiagnosticCollector } from '../diag/validate.js';
import { ErrorCode } from '../errors/codes.js';
import type {
  HttpMethod,
  Operation,
  Parameter,
  RequestBody,
  Responses,
  SecurityRequirement,
  SecurityScheme,
} from '../openapi/types.js';
import { StructuralConflictError } from '../types/errors.js';
import { canonicalJson, structurallyEqual } from '../util/canonical-json.js';
import type { CompiledPath, PartialDocument } from './materialize.js';
import { captureNames, operationLocation } from './path-template.js';

export interface MergeContext {
  diagnostics: DiagnosticCollector;
  /** Called once per pair of operations merged into one */
  onMergedOperation?: () => void;
}

function unionBy<T>(left: readonly T[], right: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set(left.map(key));
  const out = [...left];
  for (const item of right) {
    const k = key(item);
    if (!seen.has(k)) {
      seen.add(k);
      out.push(item);
    }
  }
  return out;
}

function mergeParameters(
  left: readonly Parameter[],
  right: readonly Parameter[],
  location: string
): Parameter[] {
  const out = [...left];
  for (const parameter of right) {
    const index = out.findIndex(
      (p) => p.in === parameter.in && p.name === parameter.name
    );
    const existing = index >= 0 ? out[index] : undefined;
    if (existing === undefined) {
      out.push(parameter);
      continue;
    }
    const sameSchema = structurallyEqual(existing.schema, parameter.schema);
    const sameRequired =
      (existing.required ?? false) === (parameter.required ?? false);
    if (!sameSchema || !sameRequired) {
      throw new StructuralConflictError({
        message: `Parameter "${parameter.name}" in ${parameter.in} is declared twice with ${sameSchema ? 'different required flags' : 'different schemas'} on ${location}`,
        errorCode: ErrorCode.PARAMETER_CONFLICT,
        context: {
          location,
          parameter: parameter.name,
          in: parameter.in,
          left: existing,
          right: parameter,
        },
      });
    }
    out[index] = { ...existing, ...parameter };
  }
  return out;
}

function mergeRequestBodies(
  left: RequestBody | undefined,
  right: RequestBody | undefined,
  location: string
): RequestBody | undefined {
  if (left === undefined) return right;
  if (right === undefined) return left;
  const content = { ...left.content };
  for (const [contentType, media] of Object.entries(right.content)) {
    const existing = content[contentType];
    if (existing !== undefined && !structurallyEqual(existing, media)) {
      throw new StructuralConflictError({
        message: `Request body for ${contentType} is declared with different schemas on ${location}`,
        errorCode: ErrorCode.REQUEST_BODY_CONFLICT,
        context: {
          location,
          contentType,
          left: existing.schema,
          right: media.schema,
          suggestion: 'Use one body type per content type and operation',
        },
      });
    }
    content[contentType] = media;
  }
  const merged: RequestBody = { content };
  const description = right.description ?? left.description;
  if (description !== undefined) merged.description = description;
  return merged;
}

function mergeResponses(
  left: Responses,
  right: Responses,
  location: string,
  ctx: MergeContext
): Responses {
  const merged: Responses = { ...left };
  for (const [status, response] of Object.entries(right)) {
    const existing = merged[status];
    if (existing !== undefined && !structurallyEqual(existing, response)) {
      ctx.diagnostics.emit(DIAGNOSTIC_CODES.RESPONSE_OVERRIDE, location, {
        status,
        replaced: existing.description,
        with: response.description,
      });
    }
    merged[status] = response;
  }
  return merged;
}

export function mergeOperations(
  left: Operation,
  right: Operation,
  location: string,
  ctx: MergeContext
): Operation {
  const merged: Operation = {
    responses: mergeResponses(left.responses, right.responses, location, ctx),
  };

  const tags = unionBy(left.tags ?? [], right.tags ?? [], (tag) => tag);
  if (tags.length > 0) merged.tags = tags;

  const summary = right.summary ?? left.summary;
  if (summary !== undefined) merged.summary = summary;
  const description = right.description ?? left.description;
  if (description !== undefined) merged.description = description;
  const operationId = right.operationId ?? left.operationId;
  if (operationId !== undefined) merged.operationId = operationId;

  const parameters = mergeParameters(
    left.parameters ?? [],
    right.parameters ?? [],
    location
  );
  if (parameters.length > 0) merged.parameters = parameters;

  const requestBody = mergeRequestBodies(
    left.requestBody,
    right.requestBody,
    location
  );
  if (requestBody !== undefined) merged.requestBody = requestBody;

  if (left.deprecated === true || right.deprecated === true) {
    merged.deprecated = true;
  }

  const security = unionBy<SecurityRequirement>(
    left.security ?? [],
    right.security ?? [],
    canonicalJson
  );
  if (security.length > 0) merged.security = security;

  ctx.onMergedOperation?.();
  return merged;
}

function mergePaths(
  left: CompiledPath,
  right: CompiledPath,
  ctx: MergeContext
): CompiledPath {
  if (left.path !== right.path) {
    throw new StructuralConflictError({
      message: `Path templates ${left.path} and ${right.path} differ only in capture names`,
      errorCode: ErrorCode.PATH_TEMPLATE_CONFLICT,
      context: {
        path: left.path,
        left: captureNames(left.template),
        right: captureNames(right.template),
        suggestion: `Rename the captures of ${right.path} to match ${left.path}`,
      },
    });
  }
  const operations = new Map<HttpMethod, Operation>(left.operations);
  for (const [method, operation] of right.operations) {
    const existing = operations.get(method);
    operations.set(
      method,
      existing === undefined
        ? operation
        : mergeOperations(
            existing,
            operation,
            operationLocation(method, left.path),
            ctx
          )
    );
  }
  return { template: left.template, path: left.path, operations };
}

function mergeSecuritySchemes(
  left: ReadonlyMap<string, SecurityScheme>,
  right: ReadonlyMap<string, SecurityScheme>
): Map<string, SecurityScheme> {
  const merged = new Map(left);
  for (const [name, scheme] of right) {
    const existing = merged.get(name);
    if (existing !== undefined && !structurallyEqual(existing, scheme)) {
      throw new StructuralConflictError({
        message: `Security scheme "${name}" is declared with two different definitions`,
        errorCode: ErrorCode.SECURITY_SCHEME_CONFLICT,
        context: { scheme: name, left: existing, right: scheme },
      });
    }
    merged.set(name, scheme);
  }
  return merged;
}

/** Left-then-right union of two partial documents */
export function mergePartials(
  left: PartialDocument,
  right: PartialDocument,
  ctx: MergeContext
): PartialDocument {
  const paths = new Map(left.paths);
  for (const [identity, compiled] of right.paths) {
    const existing = paths.get(identity);
    paths.set(
      identity,
      existing === undefined ? compiled : mergePaths(existing, compiled, ctx)
    );
  }
  return {
    paths,
    securitySchemes: mergeSecuritySchemes(
      left.securitySchemes,
      right.securitySchemes
    ),
  };
}
