/**
 * ErrorPresenter - pure presentation layer for RouteSpecError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  type ErrorContext,
  type RouteSpecError,
  type SerializedError,
  redactValue,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  method?: string;
  parameter?: string;
  typeId?: string;
  workaround?: string;
  exitCode: number;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError;

const DEFAULT_REDACT_KEYS = ['password', 'apiKey', 'secret', 'token'];

function contextString(
  ctx: ErrorContext | undefined,
  key: keyof ErrorContext
): string | undefined {
  const value = ctx?.[key];
  return typeof value === 'string' ? value : undefined;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RouteSpecError): CLIErrorView {
    const ctx = error.context;
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(ctx),
      path: contextString(ctx, 'path'),
      method: contextString(ctx, 'method'),
      parameter: contextString(ctx, 'parameter'),
      typeId: contextString(ctx, 'typeId'),
      workaround: this.#formatWorkaround(error),
      exitCode: error.getExitCode(),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: RouteSpecError): ProductionView {
    // Delegate to the error's safe serializer, then ensure any additional
    // keys configured in the presenter are also redacted.
    const base = error.toJSON('prod');
    return this.#applyAdditionalRedaction(base);
  }

  #formatTitle(error: RouteSpecError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    const method = contextString(ctx, 'method');
    const path = contextString(ctx, 'path');
    const loc =
      contextString(ctx, 'location') ??
      (path !== undefined && method !== undefined
        ? `${method.toUpperCase()} ${path}`
        : path);
    return loc !== undefined ? `Location: ${loc}` : undefined;
  }

  #formatWorkaround(error: RouteSpecError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return contextString(error.context, 'suggestion');
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt ?? process.stdout?.columns ?? 80;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    if (!view.context || !('value' in view.context)) return view;
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    // Clone shallowly to avoid mutation of original
    return {
      ...view,
      context: { ...view.context, value: redactValue(view.context.value, keys) },
    };
  }
}

export default ErrorPresenter;
