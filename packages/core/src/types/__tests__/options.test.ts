import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OPTIONS,
  resolveCompileOptions,
  resolveSerializeOptions,
  resolveValidateOptions,
} from '../options.js';
import { ConfigError } from '../errors.js';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveCompileOptions', () => {
  it('applies defaults when no options are provided', () => {
    const resolved = resolveCompileOptions();
    expect(resolved.info).toEqual({ title: '', version: '' });
    expect(resolved.servers).toEqual([]);
    expect(resolved.tags).toEqual([]);
    expect(resolved.inferErrorResponses).toBe(true);
    expect(resolved.defaultContentType).toBe('application/json;charset=utf-8');
    expect(resolved.metrics).toBe(true);
  });

  it('merges info over its defaults', () => {
    const resolved = resolveCompileOptions({ info: { title: 'Users' } });
    expect(resolved.info).toEqual({ title: 'Users', version: '' });
  });

  it('does not share arrays with the defaults', () => {
    const resolved = resolveCompileOptions();
    resolved.servers.push({ url: 'http://localhost' });
    expect(DEFAULT_OPTIONS.compile.servers).toEqual([]);
  });

  it('rejects servers without a url', () => {
    const error = configErrorOf(() =>
      resolveCompileOptions({ servers: [{ url: '' }] })
    );
    expect(error.setting).toBe('servers');
    expect(error.message).toBe('servers entries need a non-empty url');
  });

  it('rejects a blank default content type', () => {
    const error = configErrorOf(() =>
      resolveCompileOptions({ defaultContentType: '  ' })
    );
    expect(error.setting).toBe('defaultContentType');
  });
});

describe('resolveValidateOptions', () => {
  it('applies defaults', () => {
    const resolved = resolveValidateOptions();
    expect(resolved.samplesPerType).toBe(100);
    expect(resolved.seed).toBe(424242);
    expect(resolved.validateFormats).toBe(true);
    expect(resolved.patternMatchers).toEqual({});
  });

  it('keeps user pattern matchers', () => {
    const matcher = (pattern: string, value: string): boolean =>
      value.startsWith(pattern);
    const resolved = resolveValidateOptions({
      patternMatchers: { Slug: matcher },
    });
    expect(resolved.patternMatchers.Slug).toBe(matcher);
  });

  it('rejects a non-positive sample count', () => {
    const error = configErrorOf(() =>
      resolveValidateOptions({ samplesPerType: 0 })
    );
    expect(error.message).toBe('samplesPerType must be a positive integer');
    expect(error.context?.value).toBe(0);
  });

  it('rejects a fractional seed', () => {
    const error = configErrorOf(() => resolveValidateOptions({ seed: 1.5 }));
    expect(error.setting).toBe('seed');
  });
});

describe('resolveSerializeOptions', () => {
  it('defaults to exact numbers with two-space indentation', () => {
    expect(resolveSerializeOptions()).toEqual({ bigintJSON: 'number', space: 2 });
  });

  it('rejects negative indentation', () => {
    const error = configErrorOf(() => resolveSerializeOptions({ space: -1 }));
    expect(error.message).toBe('space must be a non-negative integer');
  });
});
