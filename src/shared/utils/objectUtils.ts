/**
 * Snapshot helpers shared by the stores.
 *
 * @module shared/utils/objectUtils
 */

/**
 * Freezes a value and everything reachable from it, in place.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Deep copy detached from the source, then frozen.
 */
export function frozenClone<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
