import {
  type BigIntJSONMode,
  type CompileOptions,
  ConfigError,
  type ValidateOptions,
} from '@routespec/core';

export type ReportFormat = 'markdown' | 'json';

/**
 * Option values as Commander hands them to the `compile` action
 */
export interface CompileCliOptions {
  api: string;
  export: string;
  title?: string;
  apiVersion?: string;
  server?: string[];
  out?: string;
  bigintJson?: string;
  inferErrors?: boolean;
  debug?: boolean;
}

export interface ValidateCliOptions {
  api: string;
  export: string;
  samples?: string;
  seed?: string;
  format?: string;
  formats?: boolean;
  debug?: boolean;
}

function invalidFlag(flag: string, expected: string, value: unknown): never {
  throw new ConfigError({
    message: `Invalid ${flag}: expected ${expected}, got ${JSON.stringify(value)}`,
    context: { setting: flag, value },
  });
}

function parseInteger(flag: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) invalidFlag(flag, 'an integer', raw);
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) invalidFlag(flag, 'a safe integer', raw);
  return value;
}

export function parseSamples(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInteger('--samples', raw);
  if (value < 1) invalidFlag('--samples', 'a positive integer', raw);
  return value;
}

export function parseSeed(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  return parseInteger('--seed', raw);
}

export function parseBigIntMode(raw: string | undefined): BigIntJSONMode {
  const value = (raw ?? 'number').toLowerCase();
  if (value === 'number' || value === 'string' || value === 'error') {
    return value;
  }
  return invalidFlag('--bigint-json', 'number|string|error', raw);
}

export function parseReportFormat(raw: string | undefined): ReportFormat {
  const value = (raw ?? 'markdown').toLowerCase();
  if (value === 'md' || value === 'markdown') return 'markdown';
  if (value === 'json') return 'json';
  return invalidFlag('--format', 'markdown|json', raw);
}

/** Commander collector for repeatable `--server <url>` */
export function collectServer(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toCompileOptions(options: CompileCliOptions): CompileOptions {
  const compileOptions: CompileOptions = {
    inferErrorResponses: options.inferErrors !== false,
  };
  if (options.title !== undefined || options.apiVersion !== undefined) {
    compileOptions.info = {};
    if (options.title !== undefined) compileOptions.info.title = options.title;
    if (options.apiVersion !== undefined) {
      compileOptions.info.version = options.apiVersion;
    }
  }
  if (options.server !== undefined && options.server.length > 0) {
    compileOptions.servers = options.server.map((url) => ({ url }));
  }
  return compileOptions;
}

export function toValidateOptions(options: ValidateCliOptions): ValidateOptions {
  const validateOptions: ValidateOptions = {
    validateFormats: options.formats !== false,
  };
  const samples = parseSamples(options.samples);
  if (samples !== undefined) validateOptions.samplesPerType = samples;
  const seed = parseSeed(options.seed);
  if (seed !== undefined) validateOptions.seed = seed;
  return validateOptions;
}
