/**
 * @graphdex/admin — Desired vs. current index configuration
 *
 * Both inputs are normalized before comparison, so a second run against an
 * unchanged datastore plans no writes.
 */

import {
  BadDatastoreRequest,
  IndexOperationError,
  deepEqual,
  deepMerge,
  flattenAndStringifyKeys,
  isPlainObject,
  objectAt,
  type PlainObject,
} from '@graphdex/support';
import type { IndexConfig, Mappings, Settings } from '@graphdex/search';
import {
  MAPPING_META_NAMESPACE,
  normalizeMappings,
  normalizeSettings,
  recordedSources,
  type IndexDefinitionBase,
} from '@graphdex/datastore-core';

export const MAPPING_REMOVAL_NOTE =
  'Note: the extra fields listed here will not actually get removed. ' +
  'Mapping removals are unsupported (the fields are left alone and cause no problems).';

/** The parts of an index definition that shape its desired configuration. */
export type ConfiguredDefinition = Pick<IndexDefinitionBase, 'name' | 'currentSources' | 'flattenedEnvSettingOverrides'>;

export interface ConfigChanges {
  desired: Required<IndexConfig>;
  /** Desired mappings plus every property that currently exists */
  mergedMappings: Mappings;
  hasMappingUpdates: boolean;
  /** Changed settings, with settings no longer desired set to null */
  settingsUpdates: Settings;
  /** Dotted paths of fields in the datastore but not in the desired mappings */
  mappingRemovals: string[];
  /** Flattened `….type` keys whose value differs */
  mappingTypeChanges: string[];
}

/**
 * Plan the changes that bring `current` (normalized) to the configuration
 * the definition asks for.
 */
export function planConfigChanges(
  current: Required<IndexConfig>,
  envAgnosticConfig: IndexConfig,
  definition: ConfiguredDefinition,
): ConfigChanges {
  const desired = desiredConfig(current.mappings, envAgnosticConfig, definition);
  const mergedMappings = mergeProperties(desired.mappings, current.mappings);
  const desiredFields = new Set(mappingFieldsFrom(desired.mappings));

  return {
    desired,
    mergedMappings,
    hasMappingUpdates: !deepEqual(mergedMappings, current.mappings),
    settingsUpdates: settingsUpdates(current.settings, desired.settings),
    mappingRemovals: mappingFieldsFrom(current.mappings).filter((field) => !desiredFields.has(field)),
    mappingTypeChanges: mappingTypeChanges(current.mappings, desired.mappings),
  };
}

/**
 * The environment-agnostic config with the environment's setting overrides
 * applied and `_meta` recording every source that has ever fed the index.
 */
export function desiredConfig(
  currentMappings: Mappings,
  envAgnosticConfig: IndexConfig,
  definition: ConfiguredDefinition,
): Required<IndexConfig> {
  const sources = [...new Set([...recordedSources(currentMappings), ...definition.currentSources])].sort();

  return {
    mappings: normalizeMappings(
      deepMerge(envAgnosticConfig.mappings ?? {}, { _meta: { [MAPPING_META_NAMESPACE]: { sources } } }),
    ),
    settings: {
      ...normalizeSettings(envAgnosticConfig.settings ?? {}),
      ...normalizeSettings(definition.flattenedEnvSettingOverrides),
    },
  };
}

/**
 * Desired mappings with every currently existing property kept. Where both
 * sides define sub-properties of a field they are merged the same way;
 * otherwise the desired definition wins.
 */
export function mergeProperties(desired: Mappings, current: Mappings): Mappings {
  if (!isPlainObject(desired.properties) && !isPlainObject(current.properties)) return desired;

  const desiredProperties = objectAt(desired, 'properties');
  const merged: PlainObject = { ...desiredProperties };

  for (const [field, currentDefinition] of Object.entries(objectAt(current, 'properties'))) {
    const desiredDefinition = desiredProperties[field];
    if (desiredDefinition === undefined) {
      merged[field] = currentDefinition;
    } else if (
      isPlainObject(desiredDefinition) &&
      isPlainObject(currentDefinition) &&
      isPlainObject(desiredDefinition.properties) &&
      isPlainObject(currentDefinition.properties)
    ) {
      merged[field] = mergeProperties(desiredDefinition, currentDefinition);
    }
  }

  return { ...desired, properties: merged };
}

export function mappingFieldsFrom(mappings: Mappings, prefix = ''): string[] {
  return Object.entries(objectAt(mappings, 'properties')).flatMap(([name, definition]) => {
    const field = `${prefix}${name}`;
    return isPlainObject(definition) && isPlainObject(definition.properties)
      ? [field, ...mappingFieldsFrom(definition, `${field}.`)]
      : [field];
  });
}

export function mappingTypeChanges(current: Mappings, desired: Mappings): string[] {
  const flatCurrent = flattenAndStringifyKeys(current);
  const flatDesired = flattenAndStringifyKeys(desired);

  return Object.keys(flatCurrent).filter(
    (key) =>
      key.endsWith('.type') &&
      Object.prototype.hasOwnProperty.call(flatDesired, key) &&
      !deepEqual(flatDesired[key], flatCurrent[key]),
  );
}

export function settingsUpdates(current: Settings, desired: Settings): Settings {
  const updates: Settings = {};

  for (const [key, value] of Object.entries(desired)) {
    if (!deepEqual(current[key] ?? null, value)) updates[key] = value;
  }

  // Null restores the datastore default.
  for (const key of Object.keys(current)) {
    if (!Object.prototype.hasOwnProperty.call(desired, key)) updates[key] = null;
  }

  return updates;
}

export function typeChangeError(fields: readonly string[], definitionName: string): string {
  return (
    'The datastore does not support modifying the type of a field from an existing index definition. ' +
    `You are attempting to update type of fields (${JSON.stringify(fields)}) from the ${definitionName} index definition.`
  );
}

export function staticSettingChangeError(settings: readonly string[], indexName: string): string {
  return (
    'The datastore does not support modifying static settings of an existing index. ' +
    `You are attempting to update static settings (${JSON.stringify(settings)}) of the ${indexName} index.`
  );
}

/**
 * Run a datastore write, re-raising a rejected request as an IndexOperationError.
 */
export async function performWrite(description: string, write: () => Promise<void>): Promise<void> {
  try {
    await write();
  } catch (error) {
    if (error instanceof BadDatastoreRequest) {
      throw new IndexOperationError(`${description} failed: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
