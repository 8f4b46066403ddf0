/**
 * @graphdex/datastore-core — Index config normalization
 *
 * Brings desired configuration and what the datastore returns into one
 * comparable form:
 *
 * - read-only settings the datastore adds to every index are dropped
 * - settings are flattened to `index.*` keys and their values stringified,
 *   since the datastore returns `"7"` and `"false"` rather than `7` and `false`
 * - `type: "object"` is dropped next to `properties`, which the datastore
 *   omits as the default
 *
 * Every function here is pure and idempotent.
 */

import { isPlainObject, type PlainObject } from '@graphdex/support';
import { flattenIndexSettings, type IndexConfig, type Mappings, type Settings } from '@graphdex/search';

/**
 * Settings the datastore reports on an index that can never be set.
 *
 * `index.routing.allocation.include._tier_preference` is writable but is set
 * by the datastore itself and never managed here.
 */
export const READ_ONLY_SETTINGS: ReadonlySet<string> = new Set([
  'index.creation_date',
  'index.history.uuid',
  'index.provided_name',
  'index.replication.type',
  'index.routing.allocation.include._tier_preference',
  'index.uuid',
  'index.version.created',
  'index.version.upgraded',
]);

export function normalize<T extends IndexConfig>(config: T): T {
  return {
    ...config,
    ...(config.settings && { settings: normalizeSettings(config.settings) }),
    ...(config.mappings && { mappings: normalizeMappings(config.mappings) }),
  };
}

export function normalizeMappings(mappings: Mappings): Mappings {
  const properties = mappings.properties;
  if (!isPlainObject(properties)) return mappings;

  const { type, ...rest } = mappings;
  const normalizedProperties: PlainObject = {};
  for (const [field, definition] of Object.entries(properties)) {
    normalizedProperties[field] = isPlainObject(definition) ? normalizeMappings(definition) : definition;
  }

  return {
    ...(type !== 'object' && type !== undefined && { type }),
    ...rest,
    properties: normalizedProperties,
  };
}

export function normalizeSettings(settings: Settings): Settings {
  const normalized: Settings = {};
  for (const [key, value] of Object.entries(flattenIndexSettings(settings))) {
    if (!READ_ONLY_SETTINGS.has(key)) normalized[key] = normalizeSettingValue(value);
  }
  return normalized;
}

function normalizeSettingValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map(normalizeSettingValue);
  return String(value);
}
