/**
 * Type utility functions and helper types.
 *
 * @module shared/types/utils
 */

/**
 * Makes all properties of T readonly recursively.
 */
export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
    : T;

/**
 * Type guard helper for checking if a value is in an enum.
 */
export function isEnumValue<T extends Record<string, string | number>>(
  enumObject: T,
  value: unknown,
): value is T[keyof T] {
  return Object.values(enumObject).some((member) => member === value);
}

/**
 * Narrows an unknown value to a plain string-keyed record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
