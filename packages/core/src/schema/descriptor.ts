import type { Arbitrary } from 'fast-check';

import type {
  Schema,
  SchemaOrRef,
  StructuredValue,
} from '../openapi/types.js';

/**
 * Resolves a descriptor to a schema usable at the current position: a
 * `$ref` for named types (declaring them on first use), the inline schema
 * otherwise.
 */
export interface SchemaContext {
  ref(descriptor: TypeDescriptor<unknown>): SchemaOrRef;
}

/**
 * Everything routespec needs to know about one payload or parameter type.
 *
 * `id` is the type identity: registry deduplication, conformance sections
 * and pattern matching all compare descriptors by `id` and never by schema
 * shape. Descriptors with a `name` become `components.schemas` entries.
 */
export interface TypeDescriptor<T> {
  readonly id: string;
  readonly name?: string;
  /** Schema of a body/response value; nested types go through `ctx.ref` */
  declare(ctx: SchemaContext): Schema;
  /** Schema for path, query and header positions */
  readonly paramSchema?: Schema;
  /** Sample generator used by the conformance validator */
  readonly arbitrary?: Arbitrary<T>;
  /** Wire encoder used by the conformance validator */
  encode?(value: T): StructuredValue;
}

export type ValueOf<D> = D extends TypeDescriptor<infer T> ? T : never;
