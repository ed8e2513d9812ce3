/**
 * @file Small type guards for object-like values (config modules, error shapes)
 */

/** Narrow unknown to a generic object record (non-null). */
export function isObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object") {
    return false;
  }
  return value !== null;
}

/** Check that an object-like value has a given own property key. */
export function hasOwn<T extends string>(obj: unknown, key: T): obj is Record<T, unknown> {
  if (!isObject(obj)) {
    return false;
  }
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Check that an object-like value exposes every named method. */
export function hasMethods(obj: unknown, ...keys: string[]): boolean {
  if (!isObject(obj)) {
    return false;
  }
  return keys.every((k) => typeof obj[k] === "function");
}
