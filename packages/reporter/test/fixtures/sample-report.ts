import type { ConformanceSection, Report } from '../../src/model/report.js';

export const passingSection: ConformanceSection = {
  typeId: 'Note',
  name: 'Note',
  firstSeen: '/notes body',
  schema: { $ref: '#/components/schemas/Note' },
  passed: true,
  samplesChecked: 10,
  examples: [{ text: 'hi' }],
};

export const failingSection: ConformanceSection = {
  typeId: 'int32',
  firstSeen: 'GET /count 200',
  schema: { type: 'integer', format: 'int32' },
  passed: false,
  samplesChecked: 1,
  examples: ['5'],
  failure: {
    sampleIndex: 0,
    sample: 5,
    encoded: '5',
    errors: [
      {
        path: '',
        message: 'must be integer',
        keyword: 'type',
        schemaPath: '#/allOf/0/type',
      },
    ],
  },
};

export function sampleReport(): Report {
  return {
    apiId: 'notes.js',
    meta: {
      toolName: '@routespec/reporter',
      toolVersion: '0.1.0',
      engineVersion: '0.1.0',
      timestamp: '2026-01-02T03:04:05.000Z',
      seed: 1,
      samplesPerType: 10,
    },
    options: {
      samplesPerType: 10,
      seed: 1,
      validateFormats: true,
      patternMatchers: [],
    },
    summary: {
      types: 2,
      passed: 1,
      failed: 1,
      samples: 11,
      failedTypes: ['int32'],
      timings: { validateMs: 1.5 },
    },
    sections: [passingSection, failingSection],
    components: {
      Note: {
        type: 'object',
        properties: { text: { type: 'string' } },
        required: ['text'],
      },
      Id: { type: 'integer', minimum: -9223372036854775808n },
    },
    diagnostics: [
      {
        code: 'CONFORMANCE_TYPE_FAILED',
        phase: 'validate',
        location: 'int32',
        details: { sampleIndex: 0 },
      },
    ],
    metrics: {
      compileMs: 0,
      selectMs: 0,
      validateMs: 1.5,
      operations: 0,
      schemas: 1,
      mergedOperations: 0,
      samplesValidated: 11,
    },
  };
}
