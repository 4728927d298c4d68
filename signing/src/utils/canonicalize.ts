export type CanonicalPrimitive = null | boolean | string | number;
export type CanonicalValue = CanonicalPrimitive | CanonicalValue[] | CanonicalObject;
export interface CanonicalObject {
  [key: string]: CanonicalValue;
}

function canonicalizeObject(value: object): CanonicalObject {
  const result: CanonicalObject = {};

  for (const [key, raw] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (raw === undefined) {
      continue;
    }
    result[key] = canonicalize(raw);
  }

  return result;
}

/**
 * Normalizes a value into a key-sorted JSON tree. Dates become ISO strings;
 * functions, symbols, bigints and non-finite numbers are rejected.
 */
export function canonicalize(value: unknown): CanonicalValue {
  if (value === null) {
    return null;
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error('Non-finite numbers cannot be canonicalized');
    }
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((entry) => canonicalize(entry));
  }

  if (typeof value === 'object') {
    return canonicalizeObject(value);
  }

  throw new Error(`Unsupported value type in canonical payload: ${typeof value}`);
}

export function canonicalJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
