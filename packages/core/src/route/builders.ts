/**
 * Combinators for writing route trees by hand:
 *
 * ```ts
 * const api = alt(
 *   sub('users', get(arrayOf(User))),
 *   sub('users', capture('user_id', UserId), get(User))
 * );
 * ```
 *
 * Strings passed to `sub` are static path segments.
 */
import type { HttpMethod, SecurityScheme } from '../openapi/types.js';
import type { TypeDescriptor } from '../schema/descriptor.js';
import { RouteTreeError } from '../types/errors.js';
import type {
  AlternativeNode,
  BodyQualifier,
  CaptureQualifier,
  DescriptionQualifier,
  EndpointTemplate,
  HeaderQualifier,
  LeafNode,
  Qualifier,
  QueryQualifier,
  RouteTree,
  SecurityQualifier,
  SegmentQualifier,
  SummaryQualifier,
} from './tree.js';

export function segment(literal: string): SegmentQualifier {
  if (literal.length === 0 || literal.includes('/')) {
    throw new RouteTreeError({
      message: `Path segment must be non-empty and contain no "/": ${JSON.stringify(literal)}`,
      context: { value: literal },
    });
  }
  return { kind: 'segment', literal };
}

interface ParamOptions {
  description?: string;
  lenient?: boolean;
}

export function capture(
  name: string,
  type: TypeDescriptor<unknown>,
  options: ParamOptions = {}
): CaptureQualifier {
  return { kind: 'capture', name, type, ...options };
}

export function captureAll(
  name: string,
  type: TypeDescriptor<unknown>,
  options: ParamOptions = {}
): CaptureQualifier {
  return { kind: 'capture', name, type, all: true, ...options };
}

export function query(
  name: string,
  type: TypeDescriptor<unknown>,
  options: ParamOptions & { required?: boolean } = {}
): QueryQualifier {
  const { required = false, ...rest } = options;
  return { kind: 'query', name, type, style: 'single', required, ...rest };
}

export function queryList(
  name: string,
  type: TypeDescriptor<unknown>,
  options: ParamOptions = {}
): QueryQualifier {
  return { kind: 'query', name, type, style: 'list', required: false, ...options };
}

export function queryFlag(
  name: string,
  type: TypeDescriptor<unknown>,
  options: { description?: string } = {}
): QueryQualifier {
  return { kind: 'query', name, type, style: 'flag', required: false, ...options };
}

export function header(
  name: string,
  type: TypeDescriptor<unknown>,
  options: ParamOptions & { required?: boolean } = {}
): HeaderQualifier {
  const { required = false, ...rest } = options;
  return { kind: 'header', name, type, required, ...rest };
}

export function body(
  type: TypeDescriptor<unknown>,
  options: ParamOptions & { contentTypes?: string[] } = {}
): BodyQualifier {
  return { kind: 'body', type, ...options };
}

export function security(
  name: string,
  scheme: SecurityScheme,
  scopes: string[] = []
): SecurityQualifier {
  return { kind: 'security', name, scheme, scopes };
}

export function summary(text: string): SummaryQualifier {
  return { kind: 'summary', text };
}

export function description(text: string): DescriptionQualifier {
  return { kind: 'description', text };
}

function toQualifier(part: Qualifier | string): Qualifier {
  return typeof part === 'string' ? segment(part) : part;
}

/** Prefixes `tree` with qualifiers, outermost first */
export function sub(
  ...parts: [...Array<Qualifier | string>, RouteTree]
): RouteTree {
  const tree = parts[parts.length - 1];
  if (tree === undefined || typeof tree === 'string' || !isNode(tree)) {
    throw new RouteTreeError({
      message: 'sub() must end with a route tree',
    });
  }
  const qualifiers = parts.slice(0, -1).map((part) => {
    if (typeof part !== 'string' && isNode(part)) {
      throw new RouteTreeError({
        message: 'sub() takes a single route tree, as its last argument',
      });
    }
    return toQualifier(part);
  });
  return qualifiers.reduceRight<RouteTree>(
    (subtree, qualifier) => ({ kind: 'sequential', qualifier, subtree }),
    tree
  );
}

function isNode(value: Qualifier | RouteTree): value is RouteTree {
  return (
    value.kind === 'sequential' ||
    value.kind === 'alternative' ||
    value.kind === 'leaf'
  );
}

/** Right-nested alternative: `alt(a, b, c)` is `a :<|> (b :<|> c)` */
export function alt(first: RouteTree, ...rest: RouteTree[]): RouteTree {
  const last = rest.pop();
  if (last === undefined) return first;
  const tail = rest.reduceRight<RouteTree>(
    (right, left): AlternativeNode => ({ kind: 'alternative', left, right }),
    last
  );
  return { kind: 'alternative', left: first, right: tail };
}

export type EndpointOptions = Omit<EndpointTemplate, 'method' | 'response'>;

export function endpoint(
  method: HttpMethod,
  response?: TypeDescriptor<unknown>,
  options: EndpointOptions = {}
): LeafNode {
  const status = options.status;
  if (status !== undefined && !isStatusCode(status)) {
    throw new RouteTreeError({
      message: `Invalid status code ${status}`,
      context: { method, value: status },
    });
  }
  for (const code of Object.keys(options.responses ?? {})) {
    if (!isStatusCode(Number(code))) {
      throw new RouteTreeError({
        message: `Invalid status code ${code}`,
        context: { method, value: code },
      });
    }
  }
  return {
    kind: 'leaf',
    endpoint: {
      method,
      ...(response !== undefined ? { response } : {}),
      ...options,
    },
  };
}

function isStatusCode(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 599;
}

type VerbBuilder = (
  response?: TypeDescriptor<unknown>,
  options?: EndpointOptions
) => LeafNode;

const verb =
  (method: HttpMethod): VerbBuilder =>
  (response, options) =>
    endpoint(method, response, options);

export const get = verb('get');
export const post = verb('post');
export const put = verb('put');
export const patch = verb('patch');
export const del = verb('delete');
export const head = verb('head');
export const options = verb('options');
