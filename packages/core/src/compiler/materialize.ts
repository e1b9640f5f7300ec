import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import type { DiagnosticCollector } from '../diag/validate.js';
import type {
  HttpMethod,
  Header,
  MediaType,
  Operation,
  Parameter,
  RequestBody,
  Response,
  Responses,
  SchemaOrRef,
  SecurityRequirement,
  SecurityScheme,
} from '../openapi/types.js';
import type { TypeDescriptor } from '../schema/descriptor.js';
import type { SchemaRegistry } from '../schema/registry.js';
import type {
  EndpointTemplate,
  Qualifier,
  ResponseHeaderTemplate,
  ResponseTemplate,
} from '../route/tree.js';
import { describeQualifier } from '../route/tree.js';
import { RouteTreeError } from '../types/errors.js';
import type { ResolvedCompileOptions } from '../types/options.js';
import {
  type PathSegment,
  type PathTemplate,
  operationLocation,
  pathIdentity,
  renderPath,
} from './path-template.js';

export interface CompiledPath {
  template: PathTemplate;
  path: string;
  operations: Map<HttpMethod, Operation>;
}

/** Document under construction, keyed by path identity */
export interface PartialDocument {
  paths: Map<string, CompiledPath>;
  securitySchemes: Map<string, SecurityScheme>;
}

export function emptyPartial(): PartialDocument {
  return { paths: new Map(), securitySchemes: new Map() };
}

export interface MaterializeContext {
  registry: SchemaRegistry;
  options: ResolvedCompileOptions;
  diagnostics: DiagnosticCollector;
}

interface OperationDraft {
  segments: PathSegment[];
  parameters: Parameter[];
  requestBody?: RequestBody;
  security: SecurityRequirement[];
  securitySchemes: Map<string, SecurityScheme>;
  summary?: string;
  description?: string;
  /** Names reported by the inferred 400 response */
  decoded: string[];
  /** Capture names reported by the inferred 404 response */
  captured: string[];
}

/** Inline parameter schema; named types without one fall back to a `$ref` */
function parameterSchema(
  type: TypeDescriptor<unknown>,
  ctx: MaterializeContext
): SchemaOrRef {
  return type.paramSchema !== undefined
    ? { ...type.paramSchema }
    : ctx.registry.ref(type);
}

function content(
  type: TypeDescriptor<unknown>,
  contentTypes: readonly string[],
  ctx: MaterializeContext
): Record<string, MediaType> {
  const schema = ctx.registry.ref(type);
  const media: Record<string, MediaType> = {};
  for (const contentType of contentTypes) {
    media[contentType] = { schema };
  }
  return media;
}

function describe<T extends { description?: string }>(
  target: T,
  text: string | undefined
): T {
  if (text !== undefined) target.description = text;
  return target;
}

function applyQualifier(
  draft: OperationDraft,
  qualifier: Qualifier,
  ctx: MaterializeContext
): void {
  switch (qualifier.kind) {
    case 'segment':
      draft.segments.push({ kind: 'static', literal: qualifier.literal });
      return;
    case 'capture': {
      const all = qualifier.all === true;
      const itemSchema = parameterSchema(qualifier.type, ctx);
      const schema: SchemaOrRef = all
        ? { type: 'array', items: itemSchema }
        : itemSchema;
      draft.segments.push({ kind: 'capture', name: qualifier.name, all });
      const parameter: Parameter = {
        name: qualifier.name,
        in: 'path',
        required: true,
        schema,
      };
      draft.parameters.push(describe(parameter, qualifier.description));
      if (qualifier.lenient !== true) draft.captured.push(qualifier.name);
      return;
    }
    case 'query': {
      const base = parameterSchema(qualifier.type, ctx);
      let parameter: Parameter;
      switch (qualifier.style) {
        case 'flag':
          parameter = {
            name: qualifier.name,
            in: 'query',
            required: false,
            allowEmptyValue: true,
            schema: { type: 'boolean' },
          };
          break;
        case 'list':
          parameter = {
            name: qualifier.name,
            in: 'query',
            required: qualifier.required,
            schema: { type: 'array', items: base },
          };
          break;
        case 'single':
          parameter = {
            name: qualifier.name,
            in: 'query',
            required: qualifier.required,
            schema: base,
          };
          break;
      }
      draft.parameters.push(describe(parameter, qualifier.description));
      if (qualifier.style !== 'flag' && qualifier.lenient !== true) {
        draft.decoded.push(qualifier.name);
      }
      return;
    }
    case 'header': {
      const parameter: Parameter = {
        name: qualifier.name,
        in: 'header',
        required: qualifier.required,
        schema: parameterSchema(qualifier.type, ctx),
      };
      draft.parameters.push(describe(parameter, qualifier.description));
      if (qualifier.lenient !== true) draft.decoded.push(qualifier.name);
      return;
    }
    case 'body': {
      if (draft.requestBody !== undefined) {
        throw new RouteTreeError({
          message: `Route declares more than one request body (${describeQualifier(qualifier)})`,
          context: {
            path: renderPath(draft.segments),
            typeId: qualifier.type.id,
            suggestion: 'Keep a single body qualifier per endpoint',
          },
        });
      }
      const requestBody: RequestBody = {
        content: content(
          qualifier.type,
          qualifier.contentTypes ?? [ctx.options.defaultContentType],
          ctx
        ),
      };
      draft.requestBody = describe(requestBody, qualifier.description);
      if (qualifier.lenient !== true) draft.decoded.push('body');
      return;
    }
    case 'security':
      draft.security.push({ [qualifier.name]: [...qualifier.scopes] });
      draft.securitySchemes.set(qualifier.name, qualifier.scheme);
      return;
    case 'summary':
      draft.summary = qualifier.text;
      return;
    case 'description':
      draft.description = qualifier.text;
      return;
  }
}

function responseHeaders(
  headers: readonly ResponseHeaderTemplate[] | undefined,
  ctx: MaterializeContext
): Record<string, Header> | undefined {
  if (headers === undefined || headers.length === 0) return undefined;
  const out: Record<string, Header> = {};
  for (const header of headers) {
    const entry: Header = { schema: parameterSchema(header.type, ctx) };
    out[header.name] = describe(entry, header.description);
  }
  return out;
}

function buildResponse(
  template: ResponseTemplate,
  ctx: MaterializeContext
): Response {
  const response: Response = { description: template.description ?? '' };
  const headers = responseHeaders(template.headers, ctx);
  if (headers !== undefined) response.headers = headers;
  if (template.type !== undefined) {
    response.content = content(
      template.type,
      template.contentTypes ?? [ctx.options.defaultContentType],
      ctx
    );
  }
  return response;
}

/** Innermost name first: each enclosing qualifier appends its own */
function quoteNames(names: readonly string[]): string {
  return [...names]
    .reverse()
    .map((name) => `\`${name}\``)
    .join(' or ');
}

function buildResponses(
  endpoint: EndpointTemplate,
  draft: OperationDraft,
  location: string,
  ctx: MaterializeContext
): Responses {
  const responses: Responses = {};
  responses[String(endpoint.status ?? 200)] = buildResponse(
    {
      type: endpoint.response,
      contentTypes: endpoint.contentTypes,
      headers: endpoint.responseHeaders,
    },
    ctx
  );

  const inferred = new Set<string>();
  if (ctx.options.inferErrorResponses) {
    if (draft.decoded.length > 0) {
      responses['400'] = {
        description: `Invalid ${quoteNames(draft.decoded)}`,
      };
      inferred.add('400');
    }
    if (draft.captured.length > 0) {
      responses['404'] = {
        description: `${quoteNames(draft.captured)} not found`,
      };
      inferred.add('404');
    }
  }

  for (const [status, template] of Object.entries(endpoint.responses ?? {})) {
    if (inferred.has(status)) {
      ctx.diagnostics.emit(DIAGNOSTIC_CODES.INFERRED_RESPONSE_SUPERSEDED, location, {
        status,
        inferred: responses[status]?.description,
      });
    }
    responses[status] = buildResponse(template, ctx);
  }
  return responses;
}

/**
 * Builds the single operation described by one leaf, applying `qualifiers`
 * outer-first.
 */
export function materializeLeaf(
  qualifiers: readonly Qualifier[],
  endpoint: EndpointTemplate,
  ctx: MaterializeContext
): PartialDocument {
  const draft: OperationDraft = {
    segments: [],
    parameters: [],
    security: [],
    securitySchemes: new Map(),
    decoded: [],
    captured: [],
  };
  for (const qualifier of qualifiers) {
    applyQualifier(draft, qualifier, ctx);
  }

  const template: PathTemplate = [...draft.segments];
  const path = renderPath(template);
  const location = operationLocation(endpoint.method, path);

  const operation: Operation = {
    responses: buildResponses(endpoint, draft, location, ctx),
  };
  const tags = endpoint.tags ?? [];
  if (tags.length > 0) operation.tags = [...new Set(tags)];
  const summary = endpoint.summary ?? draft.summary;
  if (summary !== undefined) operation.summary = summary;
  const description = endpoint.description ?? draft.description;
  if (description !== undefined) operation.description = description;
  if (endpoint.operationId !== undefined) {
    operation.operationId = endpoint.operationId;
  }
  if (draft.parameters.length > 0) operation.parameters = draft.parameters;
  if (draft.requestBody !== undefined) {
    operation.requestBody = draft.requestBody;
  }
  if (endpoint.deprecated === true) operation.deprecated = true;
  if (draft.security.length > 0) operation.security = draft.security;

  return {
    paths: new Map([
      [
        pathIdentity(template),
        { template, path, operations: new Map([[endpoint.method, operation]]) },
      ],
    ]),
    securitySchemes: draft.securitySchemes,
  };
}
