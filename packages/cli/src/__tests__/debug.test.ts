import type { MetricsSnapshot } from '@routespec/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { printEffectiveOptions, printRunDebug } from '../debug.js';

const metrics: MetricsSnapshot = {
  compileMs: 1,
  selectMs: 0,
  validateMs: 0,
  operations: 3,
  schemas: 2,
  mergedOperations: 0,
  samplesValidated: 0,
};

describe('debug output', () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints empty diagnostics on one line', () => {
    printRunDebug('compile', [], metrics);
    expect(written).toEqual([
      '[routespec] compile.diagnostics: []\n',
      '[routespec] compile.metrics: {"compileMs":1,"selectMs":0,"validateMs":0,"operations":3,"schemas":2,"mergedOperations":0,"samplesValidated":0}\n',
    ]);
  });

  it('pretty prints diagnostics', () => {
    printRunDebug(
      'select',
      [{ code: 'SELECTION_DUPLICATE_COLLAPSED', phase: 'select', location: 'GET /' }],
      metrics
    );
    expect(written[0]).toBe(
      '[routespec] select.diagnostics: [\n' +
        '  {\n' +
        '    "code": "SELECTION_DUPLICATE_COLLAPSED",\n' +
        '    "phase": "select",\n' +
        '    "location": "GET /"\n' +
        '  }\n' +
        ']\n'
    );
  });

  it('prints options with bigints as strings', () => {
    printEffectiveOptions('validate', { seed: 1, limit: 10n });
    expect(written).toEqual(['[routespec] validate.options: {"seed":1,"limit":"10"}\n']);
  });
});
