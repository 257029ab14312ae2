/**
 * JSON helpers for values that carry bigints
 */

export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function stringify(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

/**
 * Plain JSON value with bigints rendered as decimal strings
 */
export function toJsonValue(value: unknown): unknown {
  return JSON.parse(stringify(value));
}
