/**
 * Test helpers for building index definitions.
 */

import type { DatastoreClient } from '@graphdex/search';
import { DatastoreConfig } from '../configuration/datastore-config.js';
import { IndexDefinitionConfig, type RawIndexDefinitionConfig } from '../configuration/index-definition-config.js';
import { buildIndexDefinition, type IndexDefinition } from '../index-definition/factory.js';
import { Index } from '../index-definition/index.js';
import { RolloverIndexTemplate } from '../index-definition/rollover-index-template.js';
import type { IndexDefinitionMetadata } from '../schema-artifacts.js';

export interface DefinitionFixture {
  name?: string;
  metadata?: Partial<IndexDefinitionMetadata>;
  envConfig?: RawIndexDefinitionConfig;
  clusters?: string[];
  clients?: DatastoreClient[];
}

export function metadataFor(overrides: Partial<IndexDefinitionMetadata> = {}): IndexDefinitionMetadata {
  return {
    routeWith: 'id',
    rollover: null,
    defaultSortClauses: [],
    currentSources: new Set(['__self']),
    fieldsByPath: new Map(),
    ...overrides,
  };
}

export function definitionFor(fixture: DefinitionFixture = {}): IndexDefinition {
  const name = fixture.name ?? 'widgets';
  const clusters = fixture.clusters ?? ['main'];
  const config = new DatastoreConfig(
    new Map(clusters.map((cluster) => [cluster, { url: `http://${cluster}.test:9200`, settings: {} }] as const)),
    new Map([
      [name, IndexDefinitionConfig.fromSettings({ query_cluster: 'main', index_into_clusters: ['main'], ...fixture.envConfig })],
    ]),
  );

  return buildIndexDefinition({
    name,
    metadata: metadataFor(fixture.metadata),
    config,
    datastoreClientsByName: new Map((fixture.clients ?? []).map((client) => [client.clusterName, client] as const)),
  });
}

export function indexFor(fixture: DefinitionFixture = {}): Index {
  const definition = definitionFor(fixture);
  if (!(definition instanceof Index)) throw new Error(`Expected an Index but got ${definition}`);
  return definition;
}

export function templateFor(
  fixture: DefinitionFixture & { frequency?: string; timestampFieldPath?: string | null } = {},
): RolloverIndexTemplate {
  const definition = definitionFor({
    ...fixture,
    metadata: {
      rollover: {
        frequency: fixture.frequency ?? 'monthly',
        timestampFieldPath: fixture.timestampFieldPath === undefined ? 'created_at' : fixture.timestampFieldPath,
      },
      ...fixture.metadata,
    },
  });
  if (!(definition instanceof RolloverIndexTemplate)) {
    throw new Error(`Expected a RolloverIndexTemplate but got ${definition}`);
  }
  return definition;
}
