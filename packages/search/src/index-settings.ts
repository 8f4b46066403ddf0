/**
 * @graphdex/search — Knowledge about index settings
 */

import { flattenAndStringifyKeys, isPlainObject, type PlainObject } from '@graphdex/support';

/**
 * Settings that can only be set when an index is created (or while it is
 * closed). Changing them on an existing open index is rejected.
 */
export const STATIC_INDEX_SETTINGS: ReadonlySet<string> = new Set([
  'index.number_of_shards',
  'index.number_of_routing_shards',
  'index.codec',
  'index.routing_partition_size',
  'index.soft_deletes.enabled',
  'index.load_fixed_bitset_filters_eagerly',
  'index.shard.check_on_startup',
]);

/** Setting prefixes whose every key is static. */
export const STATIC_INDEX_SETTING_PREFIXES: readonly string[] = ['index.analysis.', 'index.sort.'];

export function isStaticIndexSetting(key: string): boolean {
  return STATIC_INDEX_SETTINGS.has(key) || STATIC_INDEX_SETTING_PREFIXES.some((prefix) => key.startsWith(prefix));
}

/**
 * Convert a settings body (nested or flat, with or without the `index.`
 * prefix) into flat `index.*` keys, the form the datastore reads back.
 * Empty groups such as `analysis: {}` carry no setting and are dropped.
 *
 * @example
 * ```ts
 * flattenIndexSettings({ number_of_shards: 3, 'index.codec': 'best_compression' });
 * // { 'index.number_of_shards': 3, 'index.codec': 'best_compression' }
 * ```
 */
export function flattenIndexSettings(settings: PlainObject): PlainObject {
  return Object.fromEntries(
    Object.entries(flattenAndStringifyKeys(settings))
      .filter(([, value]) => !(isPlainObject(value) && Object.keys(value).length === 0))
      .map(([key, value]) => [key.startsWith('index.') ? key : `index.${key}`, value]),
  );
}
