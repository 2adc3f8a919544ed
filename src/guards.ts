import type { LeafValue } from './types';

export type Guard<T> = (value: unknown) => value is T;

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether a value is a plain object (object literal or null-prototype
 * object), as opposed to arrays, class instances or boxed primitives.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (!isRecord(value)) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/** Guard verifying the value is a string. */
export const isString: Guard<string> = (value): value is string =>
  typeof value === 'string';

/**
 * Type guard for {@link LeafValue}: the scalar values a leaf field may hold.
 */
export function isLeafValue(value: unknown): value is LeafValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Checks whether `value` can be used verbatim as a host-language identifier
 * (ASCII letters, digits and underscores, not starting with a digit).
 */
export function isIdentifierName(value: unknown): value is string {
  return isString(value) && /^[A-Za-z_][A-Za-z0-9_]*$/.test(value);
}
