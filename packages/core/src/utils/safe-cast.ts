/**
 * Runtime type-checking utilities to replace unsafe `as` type assertions.
 *
 * Each function validates the runtime type of an unknown value and returns
 * a properly typed result, using a fallback when provided or throwing
 * a descriptive TypeError when the value does not match.
 */

/**
 * Safely extract a string from an unknown value.
 * Returns the value if it is a string, the fallback if provided, or throws.
 */
export function safeString(value: unknown, fallback?: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected string, got ${typeof value}`);
}

/**
 * Safely extract a Record<string, unknown> from an unknown value.
 * Returns the value if it is a non-null, non-array object, the fallback if provided, or throws.
 */
export function safeRecord(
  value: unknown,
  fallback?: Record<string, unknown>,
): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected record (object), got ${value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value}`);
}

/**
 * Parse a base-10 integer, returning the fallback for anything that is not
 * a whole number (`'2.5'`, `'abc'`, `''`, non-strings).
 */
export function safeInteger(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : fallback;
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
