/**
 * Test helpers: datastore cores over in-memory clients.
 */

import { DatastoreConfig, DatastoreCore, parseSchemaArtifacts } from '@graphdex/datastore-core';
import type { MockDatastoreClient } from '@graphdex/search';
import type { PlainObject } from '@graphdex/support';
import type { ActionOutput } from '../cluster-configurator/action-reporter.js';
import {
  buildIndexDefinitionConfigurator,
  type IndexDefinitionConfigurator,
} from '../index-definition-configurator/index.js';

export const NOW = new Date('2020-04-23T18:25:43.511Z');

export class OutputCapture implements ActionOutput {
  readonly chunks: string[] = [];

  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export interface CoreFixture {
  clients: MockDatastoreClient[];
  /** Env index configs by definition name */
  indexDefinitions: PlainObject;
  /** `index_definitions_by_name` of the runtime metadata */
  runtimeMetadata: PlainObject;
  indices?: PlainObject;
  indexTemplates?: PlainObject;
  /** Persistent cluster settings configured for every cluster */
  clusterSettings?: PlainObject;
}

export function buildCore(fixture: CoreFixture): DatastoreCore {
  const config = DatastoreConfig.fromParsedSettings({
    datastore: {
      clusters: Object.fromEntries(
        fixture.clients.map((client) => [
          client.clusterName,
          { url: `http://${client.clusterName}.test:9200`, settings: fixture.clusterSettings ?? {} },
        ]),
      ),
      index_definitions: fixture.indexDefinitions,
    },
  });

  const schemaArtifacts = parseSchemaArtifacts(
    { index_definitions_by_name: fixture.runtimeMetadata },
    { indices: fixture.indices ?? {}, index_templates: fixture.indexTemplates ?? {} },
  );

  return new DatastoreCore({
    config,
    schemaArtifacts,
    datastoreClientsByName: new Map(fixture.clients.map((client) => [client.clusterName, client] as const)),
  });
}

/** A fresh configurator for one definition on the `main` cluster. */
export function configuratorFor(core: DatastoreCore, name: string, output = new OutputCapture()): IndexDefinitionConfigurator {
  const definition = core.indexDefinitionsByName.get(name);
  const client = core.datastoreClientsByName.get('main');
  if (!definition || !client) throw new Error(`No definition or client for ${name}`);

  return buildIndexDefinitionConfigurator({
    client,
    definition,
    schemaArtifacts: core.schemaArtifacts,
    output,
    clock: () => NOW,
  });
}

export const mainEnvConfig = { query_cluster: 'main', index_into_clusters: ['main'] };

export function widgetsConfig(
  properties: PlainObject = { id: { type: 'keyword' }, name: { type: 'keyword' } },
  settings: PlainObject = { 'index.number_of_shards': 1, 'index.number_of_replicas': 0 },
): PlainObject {
  return { mappings: { dynamic: 'strict', properties }, settings };
}

export function thingsTemplateConfig(
  properties: PlainObject = { id: { type: 'keyword' }, created_at: { type: 'date' } },
  settings: PlainObject = { 'index.number_of_shards': 2 },
): PlainObject {
  return {
    index_patterns: ['things_rollover__*'],
    template: { mappings: { dynamic: 'strict', properties }, settings },
  };
}

export const thingsMetadata = { rollover: { frequency: 'monthly', timestamp_field_path: 'created_at' } };

/** Operation and target of every write the client received. */
export function writesTo(client: MockDatastoreClient): Array<[string, string]> {
  return client.writes.map((write) => [write.operation, write.target]);
}
