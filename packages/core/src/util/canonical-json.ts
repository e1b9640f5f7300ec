/**
 * Canonical JSON text used for structural comparison of schemas,
 * parameters and responses. Object keys are sorted, `undefined` members are
 * dropped, `-0` collapses to `0` and bigints print as plain digits.
 */

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  switch (typeof value) {
    case 'number':
      return JSON.stringify(normalizeNumber(value));
    case 'bigint':
      return value.toString();
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      break;
  }
  if (typeof value !== 'object') return 'null';

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalize(member)}`);
  return `{${entries.join(',')}}`;
}

export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function structurallyEqual(a: unknown, b: unknown): boolean {
  return canonicalize(a) === canonicalize(b);
}
