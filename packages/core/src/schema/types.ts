/**
 * Ready-made type descriptors: primitives, bounded integers, arrays,
 * dictionaries, records (named objects), newtypes and string enums.
 *
 * Each descriptor carries its schema, its parameter schema where the type
 * can appear in a path/query/header, a fast-check generator and a wire
 * encoder, so trees built from them can be compiled and validated without
 * further setup.
 */
import fc, { type Arbitrary } from 'fast-check';

import type {
  NumericBound,
  Schema,
  SchemaOrRef,
  StructuredValue,
} from '../openapi/types.js';
import { RouteTreeError } from '../types/errors.js';
import { canonicalJson } from '../util/canonical-json.js';
import type { SchemaContext, TypeDescriptor } from './descriptor.js';

function primitive<T extends StructuredValue>(
  id: string,
  schema: Schema,
  arbitrary: Arbitrary<T>
): TypeDescriptor<T> {
  return {
    id,
    declare: () => ({ ...schema }),
    paramSchema: schema,
    arbitrary,
    encode: (value: T) => value,
  };
}

export interface StringOptions {
  format?: string;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
}

const ISO_MIN_DATE = new Date('1970-01-01T00:00:00.000Z');
const ISO_MAX_DATE = new Date('9999-12-31T23:59:59.999Z');

function isoDates(): Arbitrary<Date> {
  return fc.date({ min: ISO_MIN_DATE, max: ISO_MAX_DATE, noInvalidDate: true });
}

/** Formats whose every value has the same length */
const FIXED_LENGTH_FORMATS: Readonly<Record<string, number>> = {
  uuid: 36,
  'date-time': 24,
  date: 10,
};

function shapedArbitrary(options: StringOptions): Arbitrary<string> | undefined {
  if (options.pattern !== undefined) {
    return fc.stringMatching(new RegExp(options.pattern));
  }
  switch (options.format) {
    case 'uuid':
      return fc.uuid();
    case 'email':
      return fc.emailAddress();
    case 'date-time':
      return isoDates().map((d) => d.toISOString());
    case 'date':
      return isoDates().map((d) => d.toISOString().slice(0, 10));
    default:
      return undefined;
  }
}

function stringArbitrary(options: StringOptions): Arbitrary<string> {
  const { minLength = 0, maxLength } = options;
  const shaped = shapedArbitrary(options);
  if (shaped === undefined) {
    return fc.string({ minLength: options.minLength, maxLength });
  }
  if (options.minLength === undefined && maxLength === undefined) return shaped;
  return shaped.filter(
    (s) => s.length >= minLength && (maxLength === undefined || s.length <= maxLength)
  );
}

function checkLengthBounds(options: StringOptions): void {
  const { minLength = 0, maxLength, format } = options;
  if (maxLength !== undefined && maxLength < minLength) {
    throw new RouteTreeError({
      message: `String maxLength ${maxLength} is below minLength ${minLength}`,
      context: { minLength, maxLength },
    });
  }
  const fixed = format === undefined ? undefined : FIXED_LENGTH_FORMATS[format];
  if (
    options.pattern === undefined &&
    fixed !== undefined &&
    (fixed < minLength || (maxLength !== undefined && fixed > maxLength))
  ) {
    throw new RouteTreeError({
      message: `Format ${format} always has length ${fixed}, outside the declared bounds`,
      context: { format, minLength, maxLength },
    });
  }
}

/**
 * String descriptor. Length bounds also constrain generated `pattern` and
 * `format` values.
 *
 * @throws {RouteTreeError} when the bounds are empty or exclude a
 * fixed-length format
 */
export function string(options: StringOptions = {}): TypeDescriptor<string> {
  checkLengthBounds(options);
  const constrained = Object.keys(options).length > 0;
  const schema: Schema = { type: 'string', ...options };
  return primitive(
    constrained ? `string${canonicalJson(options)}` : 'string',
    schema,
    stringArbitrary(options)
  );
}

export function boolean(): TypeDescriptor<boolean> {
  return primitive('boolean', { type: 'boolean' }, fc.boolean());
}

/** Arbitrary-precision integer: no bounds in the schema */
export function integer(): TypeDescriptor<number> {
  return primitive('integer', { type: 'integer' }, fc.integer());
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

/** Number when exactly representable, bigint otherwise */
export function toNumericBound(value: bigint): NumericBound {
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
}

export function integerBounds(
  bits: number,
  signed: boolean
): { minimum: bigint; maximum: bigint } {
  if (signed) {
    const half = 2n ** BigInt(bits - 1);
    return { minimum: -half, maximum: half - 1n };
  }
  return { minimum: 0n, maximum: 2n ** BigInt(bits) - 1n };
}

function boundedArbitrary(bits: number, signed: boolean): Arbitrary<number> {
  if (bits > 32) {
    return signed ? fc.maxSafeInteger() : fc.maxSafeNat();
  }
  const { minimum, maximum } = integerBounds(bits, signed);
  return fc.integer({ min: Number(minimum), max: Number(maximum) });
}

function bounded(
  id: string,
  bits: number,
  signed: boolean,
  format?: string
): TypeDescriptor<number> {
  const { minimum, maximum } = integerBounds(bits, signed);
  const schema: Schema = {
    type: 'integer',
    ...(format !== undefined ? { format } : {}),
    minimum: toNumericBound(minimum),
    maximum: toNumericBound(maximum),
  };
  return primitive(id, schema, boundedArbitrary(bits, signed));
}

/** Machine integer (64-bit, no format) */
export const int = (): TypeDescriptor<number> => bounded('int', 64, true);
export const int8 = (): TypeDescriptor<number> => bounded('int8', 8, true);
export const int16 = (): TypeDescriptor<number> => bounded('int16', 16, true);
export const int32 = (): TypeDescriptor<number> =>
  bounded('int32', 32, true, 'int32');
export const int64 = (): TypeDescriptor<number> =>
  bounded('int64', 64, true, 'int64');
export const uint8 = (): TypeDescriptor<number> => bounded('uint8', 8, false);
export const uint16 = (): TypeDescriptor<number> =>
  bounded('uint16', 16, false);
export const uint32 = (): TypeDescriptor<number> =>
  bounded('uint32', 32, false);
export const uint64 = (): TypeDescriptor<number> =>
  bounded('uint64', 64, false);

export function double(): TypeDescriptor<number> {
  return primitive(
    'double',
    { type: 'number', format: 'double' },
    fc.double({ noNaN: true, noDefaultInfinity: true })
  );
}

export function float(): TypeDescriptor<number> {
  return primitive(
    'float',
    { type: 'number', format: 'float' },
    fc.float({ noNaN: true, noDefaultInfinity: true })
  );
}

export interface ArrayOptions {
  minItems?: number;
  maxItems?: number;
}

export function arrayOf<T>(
  item: TypeDescriptor<T>,
  options: ArrayOptions = {}
): TypeDescriptor<T[]> {
  const bounds: Schema = {
    ...(options.minItems !== undefined ? { minItems: options.minItems } : {}),
    ...(options.maxItems !== undefined ? { maxItems: options.maxItems } : {}),
  };
  const itemArbitrary = item.arbitrary;
  const encodeItem = item.encode;
  return {
    id: `[${item.id}]`,
    declare: (ctx) => ({ type: 'array', items: ctx.ref(item), ...bounds }),
    paramSchema:
      item.paramSchema !== undefined
        ? { type: 'array', items: item.paramSchema, ...bounds }
        : undefined,
    arbitrary:
      itemArbitrary !== undefined
        ? fc.array(itemArbitrary, {
            minLength: options.minItems ?? 0,
            maxLength: options.maxItems ?? 5,
          })
        : undefined,
    encode:
      encodeItem !== undefined
        ? (values: T[]) => values.map((v) => encodeItem.call(item, v))
        : undefined,
  };
}

export function dictionary<T>(
  value: TypeDescriptor<T>
): TypeDescriptor<Record<string, T>> {
  const valueArbitrary = value.arbitrary;
  const encodeValue = value.encode;
  return {
    id: `{${value.id}}`,
    declare: (ctx) => ({
      type: 'object',
      additionalProperties: ctx.ref(value),
    }),
    arbitrary:
      valueArbitrary !== undefined
        ? fc.dictionary(fc.string(), valueArbitrary, { maxKeys: 4 })
        : undefined,
    encode:
      encodeValue !== undefined
        ? (record: Record<string, T>) => {
            const out: Record<string, StructuredValue> = {};
            for (const [key, v] of Object.entries(record)) {
              out[key] = encodeValue.call(value, v);
            }
            return out;
          }
        : undefined,
  };
}

export interface FieldSpec {
  type: TypeDescriptor<unknown>;
  optional?: boolean;
  description?: string;
}

export type FieldInput = TypeDescriptor<unknown> | FieldSpec;

function isFieldSpec(input: FieldInput): input is FieldSpec {
  return 'type' in input && !('declare' in input);
}

function toFieldSpec(input: FieldInput): FieldSpec {
  return isFieldSpec(input) ? input : { type: input };
}

export type RecordValue = Record<string, unknown>;

export interface ObjectOptions {
  /** Type identity; defaults to the schema name */
  id?: string;
  description?: string;
  arbitrary?: Arbitrary<RecordValue>;
  encode?: (value: RecordValue) => StructuredValue;
}

function declareObject(
  ctx: SchemaContext,
  fields: ReadonlyArray<[string, FieldSpec]>,
  description: string | undefined
): Schema {
  const properties: Record<string, SchemaOrRef> = {};
  const required: string[] = [];
  for (const [key, spec] of fields) {
    const ref = ctx.ref(spec.type);
    properties[key] =
      spec.description !== undefined && !('$ref' in ref)
        ? { ...ref, description: spec.description }
        : ref;
    if (spec.optional !== true) required.push(key);
  }
  return {
    type: 'object',
    ...(description !== undefined ? { description } : {}),
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function objectArbitrary(
  fields: ReadonlyArray<[string, FieldSpec]>
): Arbitrary<RecordValue> | undefined {
  const model: Record<string, Arbitrary<unknown>> = {};
  for (const [key, spec] of fields) {
    const arb = spec.type.arbitrary;
    if (arb === undefined) return undefined;
    model[key] = spec.optional === true ? fc.option(arb, { nil: undefined }) : arb;
  }
  return fc.record(model);
}

function objectEncoder(
  fields: ReadonlyArray<[string, FieldSpec]>
): ((value: RecordValue) => StructuredValue) | undefined {
  if (fields.some(([, spec]) => spec.type.encode === undefined)) {
    return undefined;
  }
  return (value) => {
    const out: Record<string, StructuredValue> = {};
    for (const [key, spec] of fields) {
      const fieldValue = value[key];
      if (fieldValue === undefined && spec.optional === true) continue;
      const encode = spec.type.encode;
      if (encode !== undefined) {
        out[key] = encode.call(spec.type, fieldValue);
      }
    }
    return out;
  };
}

/** Named record type; every non-optional field is required */
export function object(
  name: string,
  fields: Record<string, FieldInput>,
  options: ObjectOptions = {}
): TypeDescriptor<RecordValue> {
  const specs = Object.entries(fields).map(
    ([key, input]): [string, FieldSpec] => [key, toFieldSpec(input)]
  );
  return {
    id: options.id ?? name,
    name,
    declare: (ctx) => declareObject(ctx, specs, options.description),
    arbitrary: options.arbitrary ?? objectArbitrary(specs),
    encode: options.encode ?? objectEncoder(specs),
  };
}

/** Named wrapper that shares the wire form and schema of `inner` */
export function newtype<T>(
  name: string,
  inner: TypeDescriptor<T>,
  options: { id?: string; description?: string } = {}
): TypeDescriptor<T> {
  const describe = (schema: Schema): Schema =>
    options.description !== undefined
      ? { ...schema, description: options.description }
      : schema;
  const encodeInner = inner.encode;
  return {
    id: options.id ?? name,
    name,
    declare: (ctx) => describe(inner.declare(ctx)),
    paramSchema:
      inner.paramSchema !== undefined
        ? describe(inner.paramSchema)
        : undefined,
    arbitrary: inner.arbitrary,
    encode:
      encodeInner !== undefined
        ? (value: T) => encodeInner.call(inner, value)
        : undefined,
  };
}

/** Named string enumeration */
export function enumeration<const V extends string>(
  name: string,
  values: readonly [V, ...V[]]
): TypeDescriptor<V> {
  const schema: Schema = { type: 'string', enum: [...values] };
  return {
    id: name,
    name,
    declare: () => ({ ...schema, enum: [...values] }),
    paramSchema: schema,
    arbitrary: fc.constantFrom(...values),
    encode: (value: V) => value,
  };
}

/** Same identity and schema as `descriptor`, with replaced collaborators */
export function withCollaborators<T>(
  descriptor: TypeDescriptor<T>,
  overrides: {
    arbitrary?: Arbitrary<T> | null;
    encode?: ((value: T) => StructuredValue) | null;
  }
): TypeDescriptor<T> {
  const pick = <V>(override: V | null | undefined, current: V | undefined) =>
    override === null ? undefined : (override ?? current);
  const encodeCurrent = descriptor.encode;
  return {
    id: descriptor.id,
    name: descriptor.name,
    declare: (ctx) => descriptor.declare(ctx),
    paramSchema: descriptor.paramSchema,
    arbitrary: pick(overrides.arbitrary, descriptor.arbitrary),
    encode: pick(
      overrides.encode,
      encodeCurrent !== undefined
        ? (value: T) => encodeCurrent.call(descriptor, value)
        : undefined
    ),
  };
}
