import fc, { type Arbitrary } from 'fast-check';

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  DiagnosticCollector,
  type DiagnosticEnvelope,
} from '../diag/validate.js';
import { ErrorCode } from '../errors/codes.js';
import type {
  Schema,
  SchemaOrRef,
  StructuredValue,
} from '../openapi/types.js';
import type { RouteTree } from '../route/tree.js';
import type { TypeDescriptor } from '../schema/descriptor.js';
import { SchemaRegistry } from '../schema/registry.js';
import {
  ConfigError,
  type ValidationFailure,
  createValidationFailure,
} from '../types/errors.js';
import {
  type ResolvedValidateOptions,
  type ValidateOptions,
  resolveValidateOptions,
} from '../types/options.js';
import { MetricsCollector, type MetricsSnapshot } from '../util/metrics.js';
import {
  AjvPool,
  toValidationFailures,
  validationRoot,
} from './ajv-factory.js';
import { type ReachableType, reachableTypes } from './reachable.js';

/** Encoded values kept per section */
const MAX_EXAMPLES = 3;

export interface ConformanceFailure {
  /** Index of the failing sample within the type's run */
  sampleIndex: number;
  sample: unknown;
  /** Absent when the encoder threw */
  encoded?: StructuredValue;
  errors: ValidationFailure[];
}

export interface ConformanceSection {
  typeId: string;
  name?: string;
  firstSeen: string;
  schema: SchemaOrRef;
  passed: boolean;
  samplesChecked: number;
  examples: StructuredValue[];
  failure?: ConformanceFailure;
}

export interface ConformanceSummary {
  types: number;
  passed: number;
  failed: number;
  samples: number;
}

export interface ConformanceReport {
  sections: ConformanceSection[];
  summary: ConformanceSummary;
  /** Every named component the sections' schemas reference */
  components: Record<string, Schema>;
  diagnostics: DiagnosticEnvelope[];
  metrics: MetricsSnapshot;
  seed: number;
  samplesPerType: number;
}

interface Collaborators {
  arbitrary: Arbitrary<unknown>;
  encode: (value: unknown) => StructuredValue;
}

type CheckedType = ReachableType & Collaborators;

function requireCollaborators(
  reachable: readonly ReachableType[]
): CheckedType[] {
  const noGenerator = reachable.filter((t) => t.descriptor.arbitrary === undefined);
  if (noGenerator.length > 0) {
    const ids = noGenerator.map((t) => t.descriptor.id);
    throw new ConfigError({
      message: `No sample generator for ${ids.join(', ')}`,
      errorCode: ErrorCode.GENERATOR_UNAVAILABLE,
      context: {
        typeId: ids[0],
        typeIds: ids,
        suggestion: 'Give the type descriptor an `arbitrary`',
      },
    });
  }
  const noEncoder = reachable.filter((t) => t.descriptor.encode === undefined);
  if (noEncoder.length > 0) {
    const ids = noEncoder.map((t) => t.descriptor.id);
    throw new ConfigError({
      message: `No wire encoder for ${ids.join(', ')}`,
      errorCode: ErrorCode.ENCODER_UNAVAILABLE,
      context: {
        typeId: ids[0],
        typeIds: ids,
        suggestion: 'Give the type descriptor an `encode` function',
      },
    });
  }

  return reachable.flatMap((entry) => {
    const { arbitrary, encode } = entry.descriptor;
    if (arbitrary === undefined || encode === undefined) return [];
    return [
      {
        ...entry,
        arbitrary,
        encode: (value: unknown) => encode.call(entry.descriptor, value),
      },
    ];
  });
}

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function checkType(
  descriptor: TypeDescriptor<unknown>,
  collaborators: Collaborators,
  validate: (value: unknown) => ValidationFailure[],
  samples: readonly unknown[]
): Pick<ConformanceSection, 'passed' | 'samplesChecked' | 'examples' | 'failure'> {
  const examples: StructuredValue[] = [];
  let checked = 0;
  for (const [sampleIndex, sample] of samples.entries()) {
    checked += 1;
    let encoded: StructuredValue;
    try {
      encoded = collaborators.encode(sample);
    } catch (error) {
      return {
        passed: false,
        samplesChecked: checked,
        examples,
        failure: {
          sampleIndex,
          sample,
          errors: [
            createValidationFailure(
              '',
              `encoder for ${descriptor.id} threw: ${describeThrown(error)}`,
              'encode',
              ''
            ),
          ],
        },
      };
    }
    if (examples.length < MAX_EXAMPLES) examples.push(encoded);

    const errors = validate(encoded);
    if (errors.length > 0) {
      return {
        passed: false,
        samplesChecked: checked,
        examples,
        failure: { sampleIndex, sample, encoded, errors },
      };
    }
  }
  return { passed: true, samplesChecked: checked, examples };
}

function runValidation(
  tree: RouteTree,
  options: ResolvedValidateOptions,
  metrics: MetricsCollector,
  diagnostics: DiagnosticCollector
): Omit<ConformanceReport, 'diagnostics' | 'metrics'> {
  const checked = requireCollaborators(reachableTypes(tree));

  const registry = new SchemaRegistry();
  const schemas = checked.map(({ descriptor }) => registry.ref(descriptor));
  const components = registry.toComponents();
  const pool = new AjvPool(options.validateFormats);

  const sections = checked.map((entry, index) => {
    const { descriptor, firstSeen } = entry;
    const schema = schemas[index] ?? registry.ref(descriptor);
    const ajv = pool.get(options.patternMatchers[descriptor.id]);
    const compiled = ajv.compile(validationRoot(schema, components));
    const validate = (value: unknown): ValidationFailure[] =>
      compiled(value) ? [] : toValidationFailures(compiled.errors);

    const samples = fc.sample(entry.arbitrary, {
      numRuns: options.samplesPerType,
      seed: options.seed + index,
    });
    const result = checkType(descriptor, entry, validate, samples);
    metrics.addSamplesValidated(result.samplesChecked);
    if (!result.passed) {
      diagnostics.emit(DIAGNOSTIC_CODES.CONFORMANCE_TYPE_FAILED, descriptor.id, {
        sampleIndex: result.failure?.sampleIndex,
        errors: result.failure?.errors,
      });
    }

    const section: ConformanceSection = {
      typeId: descriptor.id,
      firstSeen,
      schema,
      ...result,
    };
    if (descriptor.name !== undefined) section.name = descriptor.name;
    return section;
  });

  const passed = sections.filter((section) => section.passed).length;
  return {
    sections,
    summary: {
      types: sections.length,
      passed,
      failed: sections.length - passed,
      samples: sections.reduce((total, s) => total + s.samplesChecked, 0),
    },
    components,
    seed: options.seed,
    samplesPerType: options.samplesPerType,
  };
}

/**
 * Checks that every request/response body type of `tree` encodes its
 * generated samples into values its own schema accepts.
 *
 * @throws {ConfigError} GENERATOR_UNAVAILABLE / ENCODER_UNAVAILABLE before
 * any sample is drawn when a reachable type lacks a collaborator
 */
export function validateAll(
  tree: RouteTree,
  options: ValidateOptions = {}
): ConformanceReport {
  const resolved = resolveValidateOptions(options);
  const metrics = new MetricsCollector({ enabled: resolved.metrics });
  const diagnostics = new DiagnosticCollector(resolved.onDiagnostic);

  const report = metrics.measure('VALIDATE', () =>
    runValidation(tree, resolved, metrics, diagnostics)
  );
  metrics.setSchemas(Object.keys(report.components).length);

  return {
    ...report,
    diagnostics: diagnostics.list(),
    metrics: metrics.snapshotMetrics(),
  };
}

export function failedSections(report: ConformanceReport): ConformanceSection[] {
  return report.sections.filter((section) => !section.passed);
}
