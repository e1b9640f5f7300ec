import AjvModule, { type ErrorObject, type Options as AjvOptions } from 'ajv';
import addFormatsModule from 'ajv-formats';

import type { Schema, SchemaOrRef } from '../openapi/types.js';
import type { PatternMatcher } from '../types/options.js';
import {
  type ValidationFailure,
  createValidationFailure,
} from '../types/errors.js';

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;

export interface ConformanceAjvOptions {
  validateFormats: boolean;
  /** Replaces Ajv's regular expressions for `pattern` keywords */
  patternMatcher?: PatternMatcher;
}

/** Ajv `code.regExp` engine delegating to a pattern matcher */
function matcherEngine(matcher: PatternMatcher): NonNullable<
  NonNullable<AjvOptions['code']>['regExp']
> {
  const engine = (pattern: string, flags: string) => ({
    test: (value: string) => matcher(pattern, value),
    toString: () => `/${pattern}/${flags}`,
  });
  return Object.assign(engine, { code: 'patternMatcher' });
}

/**
 * Ajv configured for OpenAPI 3.0 schemas: unknown keywords (`example`,
 * `components`) are ignored, `nullable` and `discriminator` are honoured.
 */
export function createConformanceAjv(
  options: ConformanceAjvOptions
): AjvInstance {
  const flags: AjvOptions = {
    strictSchema: false,
    strictTypes: false,
    strictTuples: false,
    strictRequired: false,
    allowUnionTypes: true,
    unicodeRegExp: true,
    useDefaults: false,
    removeAdditional: false,
    coerceTypes: false,
    allErrors: false,
    validateSchema: false,
    validateFormats: options.validateFormats,
    discriminator: true,
    logger: false,
  };
  if (options.patternMatcher !== undefined) {
    flags.code = { regExp: matcherEngine(options.patternMatcher) };
  }
  const ajv = new Ajv(flags);
  if (options.validateFormats) {
    addFormats(ajv);
  }
  return ajv;
}

/** Deep copy with bigint bounds turned into numbers, which Ajv expects */
export function toAjvSchema(value: unknown): unknown {
  if (typeof value === 'bigint') return Number(value);
  if (Array.isArray(value)) return value.map(toAjvSchema);
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      out[key] = toAjvSchema(member);
    }
    return out;
  }
  return value;
}

/** Root schema validating `schema` with every component resolvable */
export function validationRoot(
  schema: SchemaOrRef,
  components: Record<string, Schema>
): object {
  return {
    allOf: [toAjvSchema(schema)],
    components: { schemas: toAjvSchema(components) },
  };
}

export function toValidationFailures(
  errors: readonly ErrorObject[] | null | undefined
): ValidationFailure[] {
  return (errors ?? []).map((error) =>
    createValidationFailure(
      error.instancePath,
      error.message ?? `must pass "${error.keyword}"`,
      error.keyword,
      error.schemaPath,
      error.params
    )
  );
}

/** One Ajv per distinct pattern matcher; compiled validators cached per root */
export class AjvPool {
  private readonly instances = new Map<PatternMatcher | undefined, AjvInstance>();

  constructor(private readonly validateFormats: boolean) {}

  get(patternMatcher?: PatternMatcher): AjvInstance {
    const existing = this.instances.get(patternMatcher);
    if (existing !== undefined) return existing;
    const ajv = createConformanceAjv({
      validateFormats: this.validateFormats,
      patternMatcher,
    });
    this.instances.set(patternMatcher, ajv);
    return ajv;
  }
}
