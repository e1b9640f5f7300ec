/** JSON.stringify replacer writing bigints as decimal strings */
export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
