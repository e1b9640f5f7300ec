/**
 * Configuration options for compiling, validating and serializing
 *
 * All options are optional with conservative defaults. Nested objects are
 * merged over their defaults one level deep, then checked as a whole.
 */
import type { DiagnosticSink } from '../diag/validate.js';
import type { Info, Server, Tag } from '../openapi/types.js';
import { DEFAULT_CONTENT_TYPE } from '../route/tree.js';
import { ConfigError } from './errors.js';

/**
 * Decides whether `value` matches the regular expression source `pattern`.
 * Supplied per type id when Ajv's own regular expressions are not the
 * dialect the type's wire encoder follows.
 */
export type PatternMatcher = (pattern: string, value: string) => boolean;

export type BigIntJSONMode = 'number' | 'string' | 'error';

export interface CompileOptions {
  /** Document info; title and version default to "" */
  info?: Partial<Info>;
  servers?: Server[];
  /** Top-level tag descriptions */
  tags?: Tag[];
  /** Add inferred 400/404 responses (default: true) */
  inferErrorResponses?: boolean;
  /** Content type for bodies and responses that declare none */
  defaultContentType?: string;
  onDiagnostic?: DiagnosticSink;
  /** Collect phase timings and counters (default: true) */
  metrics?: boolean;
}

export interface ValidateOptions {
  /** Encoded samples per reachable type (default: 100) */
  samplesPerType?: number;
  /** fast-check seed; type N uses seed + N (default: 424242) */
  seed?: number;
  /** Pattern matchers keyed by type id */
  patternMatchers?: Record<string, PatternMatcher>;
  /** Check `format` keywords with ajv-formats (default: true) */
  validateFormats?: boolean;
  onDiagnostic?: DiagnosticSink;
  metrics?: boolean;
}

export interface SerializeOptions {
  /** How 64-bit bounds beyond the safe integer range are written (default: 'number') */
  bigintJSON?: BigIntJSONMode;
  /** JSON indentation (default: 2) */
  space?: number;
}

export interface ResolvedCompileOptions {
  info: Info;
  servers: Server[];
  tags: Tag[];
  inferErrorResponses: boolean;
  defaultContentType: string;
  onDiagnostic?: DiagnosticSink;
  metrics: boolean;
}

export interface ResolvedValidateOptions {
  samplesPerType: number;
  seed: number;
  patternMatchers: Record<string, PatternMatcher>;
  validateFormats: boolean;
  onDiagnostic?: DiagnosticSink;
  metrics: boolean;
}

export interface ResolvedSerializeOptions {
  bigintJSON: BigIntJSONMode;
  space: number;
}

export const DEFAULT_OPTIONS: {
  compile: ResolvedCompileOptions;
  validate: ResolvedValidateOptions;
  serialize: ResolvedSerializeOptions;
} = {
  compile: {
    info: { title: '', version: '' },
    servers: [],
    tags: [],
    inferErrorResponses: true,
    defaultContentType: DEFAULT_CONTENT_TYPE,
    metrics: true,
  },
  validate: {
    samplesPerType: 100,
    seed: 424242,
    patternMatchers: {},
    validateFormats: true,
    metrics: true,
  },
  serialize: {
    bigintJSON: 'number',
    space: 2,
  },
};

function invalid(setting: string, message: string, value: unknown): never {
  throw new ConfigError({
    message: `${setting} ${message}`,
    context: { setting, value },
  });
}

/**
 * Applies defaults to compile options
 *
 * @throws {ConfigError} When a setting is out of range
 */
export function resolveCompileOptions(
  userOptions: CompileOptions = {}
): ResolvedCompileOptions {
  const defaults = DEFAULT_OPTIONS.compile;
  const resolved: ResolvedCompileOptions = {
    info: { ...defaults.info, ...userOptions.info },
    servers: [...(userOptions.servers ?? defaults.servers)],
    tags: [...(userOptions.tags ?? defaults.tags)],
    inferErrorResponses:
      userOptions.inferErrorResponses ?? defaults.inferErrorResponses,
    defaultContentType:
      userOptions.defaultContentType ?? defaults.defaultContentType,
    onDiagnostic: userOptions.onDiagnostic,
    metrics: userOptions.metrics ?? defaults.metrics,
  };

  if (typeof resolved.info.title !== 'string') {
    invalid('info.title', 'must be a string', resolved.info.title);
  }
  if (typeof resolved.info.version !== 'string') {
    invalid('info.version', 'must be a string', resolved.info.version);
  }
  for (const server of resolved.servers) {
    if (typeof server.url !== 'string' || server.url.length === 0) {
      invalid('servers', 'entries need a non-empty url', server);
    }
  }
  if (typeof resolved.inferErrorResponses !== 'boolean') {
    invalid(
      'inferErrorResponses',
      'must be boolean',
      resolved.inferErrorResponses
    );
  }
  if (resolved.defaultContentType.trim().length === 0) {
    invalid(
      'defaultContentType',
      'must be a non-empty media type',
      resolved.defaultContentType
    );
  }
  return resolved;
}

/**
 * Applies defaults to validate options
 *
 * @throws {ConfigError} When a setting is out of range
 */
export function resolveValidateOptions(
  userOptions: ValidateOptions = {}
): ResolvedValidateOptions {
  const defaults = DEFAULT_OPTIONS.validate;
  const resolved: ResolvedValidateOptions = {
    samplesPerType: userOptions.samplesPerType ?? defaults.samplesPerType,
    seed: userOptions.seed ?? defaults.seed,
    validateFormats: userOptions.validateFormats ?? defaults.validateFormats,
    onDiagnostic: userOptions.onDiagnostic,
    metrics: userOptions.metrics ?? defaults.metrics,
    patternMatchers: {
      ...defaults.patternMatchers,
      ...userOptions.patternMatchers,
    },
  };

  if (!Number.isInteger(resolved.samplesPerType) || resolved.samplesPerType < 1) {
    invalid(
      'samplesPerType',
      'must be a positive integer',
      resolved.samplesPerType
    );
  }
  if (!Number.isSafeInteger(resolved.seed)) {
    invalid('seed', 'must be a safe integer', resolved.seed);
  }
  for (const [typeId, matcher] of Object.entries(resolved.patternMatchers)) {
    if (typeof matcher !== 'function') {
      invalid(`patternMatchers.${typeId}`, 'must be a function', matcher);
    }
  }
  return resolved;
}

export function resolveSerializeOptions(
  userOptions: SerializeOptions = {}
): ResolvedSerializeOptions {
  const resolved: ResolvedSerializeOptions = {
    bigintJSON: userOptions.bigintJSON ?? DEFAULT_OPTIONS.serialize.bigintJSON,
    space: userOptions.space ?? DEFAULT_OPTIONS.serialize.space,
  };
  const mode = resolved.bigintJSON;
  if (mode !== 'number' && mode !== 'string' && mode !== 'error') {
    invalid('bigintJSON', "must be 'number', 'string' or 'error'", mode);
  }
  if (!Number.isInteger(resolved.space) || resolved.space < 0) {
    invalid('space', 'must be a non-negative integer', resolved.space);
  }
  return resolved;
}
