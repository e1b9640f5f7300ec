import type { OpenApiDocument } from '../openapi/types.js';
import { SerializationError } from '../types/errors.js';
import {
  type SerializeOptions,
  resolveSerializeOptions,
} from '../types/options.js';
import { jsonSafeReplacer } from '../util/json-safe.js';

const BIGINT_MARKER = '\u0000bigint:';

/**
 * Serializes a document to JSON text.
 *
 * Bounds held as bigint are written per `bigintJSON`: `number` writes the
 * exact digits (`9223372036854775807`), `string` quotes them, `error`
 * throws a SerializationError naming the first offending member.
 */
export function serializeDocument(
  document: OpenApiDocument,
  options: SerializeOptions = {}
): string {
  const { bigintJSON, space } = resolveSerializeOptions(options);

  switch (bigintJSON) {
    case 'string':
      return JSON.stringify(document, jsonSafeReplacer, space);
    case 'error':
      return JSON.stringify(
        document,
        (key: string, value: unknown) => {
          if (typeof value === 'bigint') {
            throw new SerializationError({
              message: `Member "${key}" holds ${value.toString()}, which is outside the safe integer range`,
              context: { value: value.toString(), member: key },
            });
          }
          return value;
        },
        space
      );
    case 'number': {
      // Marked strings are unquoted after stringify
      const text = JSON.stringify(
        document,
        (_key: string, value: unknown) =>
          typeof value === 'bigint' ? `${BIGINT_MARKER}${value.toString()}` : value,
        space
      );
      return text.replace(/"\\u0000bigint:(-?\d+)"/g, '$1');
    }
  }
}
