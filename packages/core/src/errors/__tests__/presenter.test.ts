import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import {
  ConfigError,
  ConformanceViolationError,
  StructuralConflictError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('CLI view carries title, location and exit code', () => {
    const err = new StructuralConflictError({
      message: 'Parameter "limit" in query is declared twice',
      errorCode: ErrorCode.PARAMETER_CONFLICT,
      context: {
        location: 'GET /users',
        parameter: 'limit',
        suggestion: 'Declare the parameter once',
      },
    });
    const view = new ErrorPresenter('dev', {
      colors: false,
      terminalWidth: 60,
    }).formatForCLI(err);

    expect(view.title).toBe(
      'Error E100: Parameter "limit" in query is declared twice'
    );
    expect(view.location).toBe('Location: GET /users');
    expect(view.parameter).toBe('limit');
    expect(view.workaround).toBe('Declare the parameter once');
    expect(view.exitCode).toBe(20);
    expect(view.colors).toBe(false);
    expect(view.terminalWidth).toBe(60);
  });

  test('location falls back to method and path', () => {
    const err = new StructuralConflictError({
      message: 'Selected operation is missing',
      errorCode: ErrorCode.SELECTION_NOT_IN_DOCUMENT,
      context: { path: '/users/{id}', method: 'delete' },
    });
    const view = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(view.location).toBe('Location: DELETE /users/{id}');
    expect(view.method).toBe('delete');
    expect(view.path).toBe('/users/{id}');
  });

  test('suggestions on the error win over the context suggestion', () => {
    const err = new ConfigError({
      message: 'bad option',
      context: { suggestion: 'from context' },
    });
    err.suggestions = ['from error'];
    const view = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(view.workaround).toBe('from error');
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new ConfigError({ message: 'Invalid' });

    process.env.NO_COLOR = '1';
    expect(
      new ErrorPresenter('dev', { colors: true }).formatForCLI(err).colors
    ).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(
      new ErrorPresenter('prod', { colors: false }).formatForCLI(err).colors
    ).toBe(true);
  });

  test('colors default to the environment', () => {
    const err = new ConfigError({ message: 'Invalid' });
    expect(new ErrorPresenter('dev').formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
  });

  test('production view omits the stack and redacts sensitive values', () => {
    const err = new ConformanceViolationError({
      message: 'Sample rejected',
      context: {
        typeId: 'Login',
        value: { user: 'ada', password: 'test-secret', nested: [{ token: 't' }] },
      },
    });
    const prod = new ErrorPresenter('prod', {
      redactKeys: ['password', 'token'],
    }).formatForProduction(err);

    expect(prod.stack).toBeUndefined();
    expect(prod.context?.value).toEqual({
      user: 'ada',
      password: '[REDACTED]',
      nested: [{ token: '[REDACTED]' }],
    });
  });
});
