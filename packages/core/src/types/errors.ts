/**
 * Error hierarchy for routespec
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Rendered path template (e.g., '/users/{id}')
  method?: string; // Lower-case HTTP method
  location?: string; // Route tree location (e.g., 'alt[1] > "users" > GET')
  parameter?: string; // Parameter name for parameter conflicts
  typeId?: string; // Type descriptor identity
  suggestion?: string;
  value?: unknown; // Problematic value (may contain PII)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
  method?: string;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'authorization',
]);

export function redactValue(
  val: unknown,
  keys: ReadonlySet<string> = SENSITIVE_KEYS
): unknown {
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map((v) => redactValue(v, keys));
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactValue(v, keys);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all routespec errors
 */
export abstract class RouteSpecError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
      method: this.context?.method,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * Conflicting declarations for one (path, method) identity, or a pattern
 * that does not embed into its target tree. Always fatal.
 */
export class StructuralConflictError extends RouteSpecError {
  constructor(params: {
    message: string;
    errorCode: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({ ...params, severity: 'error' });
  }
}

/**
 * A route tree that cannot describe any valid endpoint (two request bodies
 * on one path, an out-of-range status code, ...)
 */
export class RouteTreeError extends RouteSpecError {
  constructor(params: { message: string; context?: ErrorContext }) {
    super({ ...params, errorCode: ErrorCode.INVALID_ROUTE_TREE });
  }
}

/**
 * Configuration and setup errors, including missing collaborators
 */
export class ConfigError extends RouteSpecError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Document serialization errors (e.g. bigint bounds under bigintJSON=error)
 */
export class SerializationError extends RouteSpecError {
  constructor(params: { message: string; context?: ErrorContext }) {
    super({ ...params, errorCode: ErrorCode.SERIALIZATION_ERROR });
  }
}

/**
 * An encoded sample rejected by its own type's schema
 */
export class ConformanceViolationError extends RouteSpecError {
  constructor(params: { message: string; context?: ErrorContext }) {
    super({ ...params, errorCode: ErrorCode.CONFORMANCE_VIOLATION });
  }
}

/**
 * Individual schema violation reported for an encoded sample
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  params?: Record<string, unknown>;
}

export function isRouteSpecError(error: unknown): error is RouteSpecError {
  return error instanceof RouteSpecError;
}

export function createValidationFailure(
  path: string,
  message: string,
  keyword: string,
  schemaPath: string,
  params?: Record<string, unknown>
): ValidationFailure {
  return {
    path,
    message,
    keyword,
    schemaPath,
    params,
  };
}
