import type { TypeDescriptor } from '../schema/descriptor.js';
import type { HttpMethod, SecurityScheme } from '../openapi/types.js';

export const DEFAULT_CONTENT_TYPE = 'application/json;charset=utf-8';

export interface SegmentQualifier {
  kind: 'segment';
  literal: string;
}

export interface CaptureQualifier {
  kind: 'capture';
  name: string;
  type: TypeDescriptor<unknown>;
  /** Captures every remaining segment (`{name}` holds an array) */
  all?: boolean;
  description?: string;
  /** Decode failures are handed to the handler, so no 404 is inferred */
  lenient?: boolean;
}

export type QueryStyle = 'single' | 'list' | 'flag';

export interface QueryQualifier {
  kind: 'query';
  name: string;
  type: TypeDescriptor<unknown>;
  style: QueryStyle;
  required: boolean;
  description?: string;
  lenient?: boolean;
}

export interface HeaderQualifier {
  kind: 'header';
  name: string;
  type: TypeDescriptor<unknown>;
  required: boolean;
  description?: string;
  lenient?: boolean;
}

export interface BodyQualifier {
  kind: 'body';
  type: TypeDescriptor<unknown>;
  /** Defaults to the compile option `defaultContentType` */
  contentTypes?: string[];
  description?: string;
  lenient?: boolean;
}

export interface SecurityQualifier {
  kind: 'security';
  name: string;
  scheme: SecurityScheme;
  scopes: string[];
}

export interface SummaryQualifier {
  kind: 'summary';
  text: string;
}

export interface DescriptionQualifier {
  kind: 'description';
  text: string;
}

export type Qualifier =
  | SegmentQualifier
  | CaptureQualifier
  | QueryQualifier
  | HeaderQualifier
  | BodyQualifier
  | SecurityQualifier
  | SummaryQualifier
  | DescriptionQualifier;

export interface ResponseHeaderTemplate {
  name: string;
  type: TypeDescriptor<unknown>;
  description?: string;
}

export interface ResponseTemplate {
  description?: string;
  /** Absent for responses without a body */
  type?: TypeDescriptor<unknown>;
  contentTypes?: string[];
  headers?: ResponseHeaderTemplate[];
}

export interface EndpointTemplate {
  method: HttpMethod;
  /** Success status, 200 unless stated */
  status?: number;
  /** Success body type; absent for no-content endpoints */
  response?: TypeDescriptor<unknown>;
  contentTypes?: string[];
  responseHeaders?: ResponseHeaderTemplate[];
  /** Explicit responses; they win over inferred 400/404 entries */
  responses?: Record<number, ResponseTemplate>;
  summary?: string;
  description?: string;
  operationId?: string;
  tags?: string[];
  deprecated?: boolean;
}

export interface SequentialNode {
  kind: 'sequential';
  qualifier: Qualifier;
  subtree: RouteTree;
}

export interface AlternativeNode {
  kind: 'alternative';
  left: RouteTree;
  right: RouteTree;
}

export interface LeafNode {
  kind: 'leaf';
  endpoint: EndpointTemplate;
}

export type RouteTree = SequentialNode | AlternativeNode | LeafNode;

const ROUTE_KINDS: ReadonlySet<string> = new Set([
  'sequential',
  'alternative',
  'leaf',
]);

/** Shallow shape check for values loaded from user modules */
export function isRouteTree(value: unknown): value is RouteTree {
  if (typeof value !== 'object' || value === null) return false;
  const kind: unknown = Reflect.get(value, 'kind');
  return typeof kind === 'string' && ROUTE_KINDS.has(kind);
}

/** Leaves in left-to-right declaration order */
export function leavesOf(tree: RouteTree): LeafNode[] {
  switch (tree.kind) {
    case 'leaf':
      return [tree];
    case 'sequential':
      return leavesOf(tree.subtree);
    case 'alternative':
      return [...leavesOf(tree.left), ...leavesOf(tree.right)];
  }
}

export function describeQualifier(q: Qualifier): string {
  switch (q.kind) {
    case 'segment':
      return JSON.stringify(q.literal);
    case 'capture':
      return `${q.all === true ? 'CaptureAll' : 'Capture'} ${q.name} :: ${q.type.id}`;
    case 'query':
      return `Query(${q.style}) ${q.name} :: ${q.type.id}`;
    case 'header':
      return `Header ${q.name} :: ${q.type.id}`;
    case 'body':
      return `Body :: ${q.type.id}`;
    case 'security':
      return `Security ${q.name}`;
    case 'summary':
      return `Summary ${JSON.stringify(q.text)}`;
    case 'description':
      return `Description ${JSON.stringify(q.text)}`;
  }
}
