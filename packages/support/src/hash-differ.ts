/**
 * @graphdex/support — Line-oriented diff of two nested objects
 */

import { flattenAndStringifyKeys, deepEqual, type PlainObject } from './hash-util.js';

export interface DiffOptions {
  /** Keys (in flattened, dotted form) to leave out of the diff */
  ignoreKeys?: Iterable<string>;
}

/**
 * Compare two objects key-by-key after flattening them to dotted keys.
 *
 * Returns one line per difference, sorted by key, or null when equal:
 * - `+ key: value` for keys only in `desired`
 * - `- key: value` for keys only in `current`
 * - `~ key: old => new` for keys whose value changed
 */
export function diffHashes(current: PlainObject, desired: PlainObject, options: DiffOptions = {}): string | null {
  const ignored = new Set(options.ignoreKeys);
  const flatCurrent = flattenAndStringifyKeys(current);
  const flatDesired = flattenAndStringifyKeys(desired);

  const keys = [...new Set([...Object.keys(flatCurrent), ...Object.keys(flatDesired)])]
    .filter((key) => !ignored.has(key))
    .sort();

  const lines: string[] = [];
  for (const key of keys) {
    const inCurrent = Object.prototype.hasOwnProperty.call(flatCurrent, key);
    const inDesired = Object.prototype.hasOwnProperty.call(flatDesired, key);

    if (inCurrent && !inDesired) {
      lines.push(`- ${key}: ${render(flatCurrent[key])}`);
    } else if (!inCurrent && inDesired) {
      lines.push(`+ ${key}: ${render(flatDesired[key])}`);
    } else if (!deepEqual(flatCurrent[key], flatDesired[key])) {
      lines.push(`~ ${key}: ${render(flatCurrent[key])} => ${render(flatDesired[key])}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

function render(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}
