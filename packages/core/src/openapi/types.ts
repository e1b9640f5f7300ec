/**
 * OpenAPI 3.0 object model.
 *
 * Key names and nesting follow the OpenAPI 3.0.3 specification. Integer
 * bounds may be `bigint` so that 64-bit limits survive exactly until
 * serialization (see serialize/document-json.ts).
 */

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: unknown): value is HttpMethod {
  return (
    typeof value === 'string' && HTTP_METHODS.some((method) => method === value)
  );
}

/** JSON-like tree produced by wire encoders */
export type StructuredValue =
  | null
  | boolean
  | number
  | string
  | StructuredValue[]
  | { [key: string]: StructuredValue };

export type NumericBound = number | bigint;

export type SchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object';

export interface Reference {
  $ref: string;
}

export interface Discriminator {
  propertyName: string;
  mapping?: Record<string, string>;
}

export interface Schema {
  type?: SchemaType;
  format?: string;
  title?: string;
  description?: string;
  nullable?: boolean;
  enum?: StructuredValue[];
  default?: StructuredValue;
  example?: StructuredValue;

  minimum?: NumericBound;
  maximum?: NumericBound;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  multipleOf?: number;

  minLength?: number;
  maxLength?: number;
  pattern?: string;

  items?: SchemaOrRef;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  properties?: Record<string, SchemaOrRef>;
  required?: string[];
  additionalProperties?: boolean | SchemaOrRef;
  minProperties?: number;
  maxProperties?: number;

  allOf?: SchemaOrRef[];
  oneOf?: SchemaOrRef[];
  anyOf?: SchemaOrRef[];
  not?: SchemaOrRef;
  discriminator?: Discriminator;

  readOnly?: boolean;
  writeOnly?: boolean;
  deprecated?: boolean;
}

export type SchemaOrRef = Schema | Reference;

export function isReference(value: unknown): value is Reference {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, '$ref') === 'string'
  );
}

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export interface Parameter {
  name: string;
  in: ParameterLocation;
  required?: boolean;
  description?: string;
  deprecated?: boolean;
  allowEmptyValue?: boolean;
  schema: SchemaOrRef;
}

export interface MediaType {
  schema?: SchemaOrRef;
  example?: StructuredValue;
}

export interface RequestBody {
  description?: string;
  content: Record<string, MediaType>;
  required?: boolean;
}

export interface Header {
  description?: string;
  required?: boolean;
  schema?: SchemaOrRef;
}

export interface Response {
  description: string;
  headers?: Record<string, Header>;
  content?: Record<string, MediaType>;
}

/** Response map keyed by status code (`"200"`) or `"default"` */
export type Responses = Record<string, Response>;

/** `{ schemeName: [scopes] }` */
export type SecurityRequirement = Record<string, string[]>;

export interface Operation {
  tags?: string[];
  summary?: string;
  description?: string;
  operationId?: string;
  parameters?: Parameter[];
  requestBody?: RequestBody;
  responses: Responses;
  deprecated?: boolean;
  security?: SecurityRequirement[];
}

export type PathItem = Partial<Record<HttpMethod, Operation>>;

export interface Contact {
  name?: string;
  url?: string;
  email?: string;
}

export interface License {
  name: string;
  url?: string;
}

export interface Info {
  title: string;
  version: string;
  description?: string;
  termsOfService?: string;
  contact?: Contact;
  license?: License;
}

export interface Server {
  url: string;
  description?: string;
}

export interface Tag {
  name: string;
  description?: string;
}

export type SecurityScheme =
  | { type: 'http'; scheme: string; bearerFormat?: string; description?: string }
  | {
      type: 'apiKey';
      name: string;
      in: 'query' | 'header' | 'cookie';
      description?: string;
    }
  | {
      type: 'oauth2';
      flows: Record<string, unknown>;
      description?: string;
    }
  | { type: 'openIdConnect'; openIdConnectUrl: string; description?: string };

export interface Components {
  schemas: Record<string, Schema>;
  securitySchemes?: Record<string, SecurityScheme>;
}

export interface OpenApiDocument {
  openapi: string;
  info: Info;
  servers?: Server[];
  paths: Record<string, PathItem>;
  components: Components;
  security?: SecurityRequirement[];
  tags?: Tag[];
}
