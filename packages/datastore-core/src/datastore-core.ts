/**
 * @graphdex/datastore-core — Entry point
 *
 * Ties the datastore settings and schema artifacts together into datastore
 * clients and index definitions, both built lazily and keyed by name.
 */

import { config as env, type Env } from '@graphdex/config';
import { ElasticsearchDatastoreClient, type DatastoreClient } from '@graphdex/search';
import { ConfigSettingNotSetError } from '@graphdex/support';
import { DatastoreConfig, type ClusterDefinition } from './configuration/datastore-config.js';
import { buildIndexDefinition, type IndexDefinition } from './index-definition/factory.js';
import { loadSchemaArtifacts, type SchemaArtifacts } from './schema-artifacts.js';

export type DatastoreClientFactory = (
  clusterName: string,
  cluster: ClusterDefinition,
  config: DatastoreConfig,
) => DatastoreClient;

export interface DatastoreCoreOptions {
  config: DatastoreConfig;
  schemaArtifacts: SchemaArtifacts;
  /** Builds the client for each cluster (default: Elasticsearch) */
  clientFactory?: DatastoreClientFactory;
  /** Pre-built clients; takes precedence over `clientFactory` */
  datastoreClientsByName?: ReadonlyMap<string, DatastoreClient>;
}

/**
 * Default client factory: one Elasticsearch client per cluster.
 */
export const elasticsearchClientFactory: DatastoreClientFactory = (clusterName, cluster, config) =>
  new ElasticsearchDatastoreClient({
    clusterName,
    url: cluster.url,
    requestTimeoutMs: env.DATASTORE_REQUEST_TIMEOUT_MS,
    maxRetries: config.maxClientRetries,
    logTraffic: config.logTraffic,
  });

export class DatastoreCore {
  readonly config: DatastoreConfig;
  readonly schemaArtifacts: SchemaArtifacts;

  private readonly clientFactory: DatastoreClientFactory;
  private clients?: ReadonlyMap<string, DatastoreClient>;
  private definitions?: ReadonlyMap<string, IndexDefinition>;

  constructor(opts: DatastoreCoreOptions) {
    this.config = opts.config;
    this.schemaArtifacts = opts.schemaArtifacts;
    this.clientFactory = opts.clientFactory ?? elasticsearchClientFactory;
    this.clients = opts.datastoreClientsByName;
  }

  /**
   * Load settings and schema artifacts from the paths in the environment.
   *
   * @throws ConfigSettingNotSetError when either path is not set
   */
  static async fromEnv(source: Env = env): Promise<DatastoreCore> {
    if (!source.DATASTORE_SETTINGS_PATH) {
      throw new ConfigSettingNotSetError('DATASTORE_SETTINGS_PATH must be set to load datastore settings.');
    }
    if (!source.SCHEMA_ARTIFACTS_DIR) {
      throw new ConfigSettingNotSetError('SCHEMA_ARTIFACTS_DIR must be set to load schema artifacts.');
    }

    const [config, schemaArtifacts] = await Promise.all([
      DatastoreConfig.fromYamlFile(source.DATASTORE_SETTINGS_PATH),
      loadSchemaArtifacts(source.SCHEMA_ARTIFACTS_DIR),
    ]);

    return new DatastoreCore({ config, schemaArtifacts });
  }

  get datastoreClientsByName(): ReadonlyMap<string, DatastoreClient> {
    this.clients ??= new Map(
      [...this.config.clusters].map(([name, cluster]) => [name, this.clientFactory(name, cluster, this.config)] as const),
    );
    return this.clients;
  }

  get indexDefinitionsByName(): ReadonlyMap<string, IndexDefinition> {
    this.definitions ??= new Map(
      [...this.schemaArtifacts.indexDefinitionMetadataByName].map(([name, metadata]) => [
        name,
        buildIndexDefinition({
          name,
          metadata,
          config: this.config,
          datastoreClientsByName: this.datastoreClientsByName,
        }),
      ] as const),
    );
    return this.definitions;
  }

  /**
   * A copy of this core whose index definitions use the given clients.
   */
  withDatastoreClients(datastoreClientsByName: ReadonlyMap<string, DatastoreClient>): DatastoreCore {
    return new DatastoreCore({
      config: this.config,
      schemaArtifacts: this.schemaArtifacts,
      clientFactory: this.clientFactory,
      datastoreClientsByName,
    });
  }
}
