/**
 * @graphdex/datastore-core — Index definition factory
 *
 * Returns the correct IndexDefinition implementation based on runtime metadata.
 */

import { ConfigError } from '@graphdex/support';
import type { DatastoreClient } from '@graphdex/search';
import type { DatastoreConfig } from '../configuration/datastore-config.js';
import type { IndexDefinitionMetadata } from '../schema-artifacts.js';
import { Index } from './index.js';
import { RolloverIndexTemplate } from './rollover-index-template.js';

export type IndexDefinition = Index | RolloverIndexTemplate;

export interface BuildIndexDefinitionParams {
  name: string;
  metadata: IndexDefinitionMetadata;
  config: DatastoreConfig;
  datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;
}

/**
 * Create an index definition: a RolloverIndexTemplate when the metadata has a
 * rollover config, otherwise an Index.
 *
 * @throws ConfigError when the datastore settings have no entry for the index
 * @throws SchemaError when the rollover config is invalid
 *
 * @example
 * ```ts
 * const widgets = buildIndexDefinition({
 *   name: 'widgets',
 *   metadata: artifacts.indexDefinitionMetadataByName.get('widgets'),
 *   config: datastoreConfig,
 *   datastoreClientsByName,
 * });
 * widgets.indexNameForWrites(record); // "widgets_rollover__2020-04"
 * ```
 */
export function buildIndexDefinition(params: BuildIndexDefinitionParams): IndexDefinition {
  const { name, metadata, config, datastoreClientsByName } = params;

  const envIndexConfig = config.indexDefinitions.get(name);
  if (!envIndexConfig) {
    throw new ConfigError(
      `Configuration does not provide an index definition for \`${name}\`, ` +
        'but it is required so we can identify the datastore cluster(s) to query and index into.',
    );
  }

  const attributes = {
    name,
    routeWith: metadata.routeWith,
    defaultSortClauses: metadata.defaultSortClauses,
    currentSources: metadata.currentSources,
    fieldsByPath: metadata.fieldsByPath,
    envIndexConfig,
    definedClusters: new Set(config.clusters.keys()),
    datastoreClientsByName,
  };

  if (metadata.rollover) {
    return new RolloverIndexTemplate({
      ...attributes,
      timestampFieldPath: metadata.rollover.timestampFieldPath,
      frequency: metadata.rollover.frequency,
    });
  }

  return new Index(attributes);
}
