/**
 * @graphdex/support — Helpers for nested JSON-like objects
 */

import { MissingValueError } from './errors.js';

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Flatten a nested object into dotted keys. Arrays and scalars are leaves.
 *
 * @example
 * ```ts
 * flattenAndStringifyKeys({ index: { number_of_shards: 3 } });
 * // { 'index.number_of_shards': 3 }
 * ```
 */
export function flattenAndStringifyKeys(source: PlainObject, prefix?: string): PlainObject {
  const flat: PlainObject = {};

  const visit = (value: PlainObject, path: string | undefined): void => {
    for (const [key, child] of Object.entries(value)) {
      const childPath = path ? `${path}.${key}` : key;
      if (isPlainObject(child) && Object.keys(child).length > 0) {
        visit(child, childPath);
      } else {
        flat[childPath] = child;
      }
    }
  };

  visit(source, prefix);
  return flat;
}

/**
 * Recursively merge `override` into `base`, returning a new object.
 * Nested objects merge; every other value in `override` replaces the base value.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }

  return merged;
}

/**
 * Fetch the value at a dotted key path.
 *
 * @throws MissingValueError when any segment of the path is absent
 */
export function fetchValueAtPath(source: PlainObject, path: string): unknown {
  let current: unknown = source;

  for (const segment of path.split('.')) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      throw new MissingValueError(path);
    }
    current = current[segment];
  }

  return current;
}

/** Build a nested object holding `value` at the dotted `path`. */
export function nestAtPath(path: string, value: unknown): PlainObject {
  const segments = path.split('.');
  let nested: PlainObject = { [segments.pop() ?? path]: value };
  for (const segment of segments.reverse()) nested = { [segment]: nested };
  return nested;
}

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    return (
      aKeys.length === Object.keys(b).length &&
      aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]))
    );
  }

  return false;
}

/** Read a nested object value, treating anything else as an empty object. */
export function objectAt(source: PlainObject, key: string): PlainObject {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}
