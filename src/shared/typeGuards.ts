/**
 * Type Guard Utilities
 *
 * Runtime-validated type guards used in place of type assertions when reading
 * loosely-shaped data (parsed JSON blobs, attribute values).
 *
 * Usage:
 * ```typescript
 * // Instead of: const env = json.environment as Record<string, unknown>;
 * if (isObject(json.environment)) {
 *   const env = json.environment;
 * }
 * ```
 */

/**
 * Type guard for checking if a value is a non-null object
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for checking if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Type guard for checking if a value is a number
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value);
}

/**
 * Type guard for checking if a value is a boolean
 */
export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

/**
 * Type guard for checking if a string is an http(s) URL
 */
export function isUrl(value: unknown): value is string {
  if (!isString(value)) {
    return false;
  }
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
