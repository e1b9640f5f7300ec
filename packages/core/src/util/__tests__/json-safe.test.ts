import { describe, it, expect } from 'vitest';
import { jsonSafeReplacer } from '../json-safe.js';

describe('jsonSafeReplacer', () => {
  it('stringifies bigints and leaves other values alone', () => {
    const s = JSON.stringify({ a: 9223372036854775807n, b: 2, c: 'x' }, jsonSafeReplacer);
    expect(s).toBe('{"a":"9223372036854775807","b":2,"c":"x"}');
  });
});
