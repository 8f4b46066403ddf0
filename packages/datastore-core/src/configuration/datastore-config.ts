/**
 * @graphdex/datastore-core — Datastore settings
 *
 * Loaded from the `datastore` section of a YAML settings file:
 *
 * ```yaml
 * datastore:
 *   clusters:
 *     main:
 *       url: http://localhost:9200
 *       settings: {}
 *   index_definitions:
 *     widgets:
 *       query_cluster: main
 *       index_into_clusters: [main]
 *   log_traffic: false
 *   max_client_retries: 3
 * ```
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, isPlainObject, type PlainObject } from '@graphdex/support';
import { IndexDefinitionConfig } from './index-definition-config.js';
import { configErrorFrom } from './zod-errors.js';

const clusterDefinitionSchema = z
  .object({
    url: z.string().url(),
    settings: z.record(z.unknown()).default({}),
  })
  .strict();

const datastoreSettingsSchema = z
  .object({
    clusters: z.record(clusterDefinitionSchema).default({}),
    index_definitions: z.record(z.unknown()).default({}),
    log_traffic: z.boolean().default(false),
    max_client_retries: z.number().int().nonnegative().default(3),
  })
  .strict();

/**
 * Connection details and cluster-level settings for one datastore cluster.
 */
export interface ClusterDefinition {
  /** Cluster URL */
  url: string;
  /** Persistent cluster settings applied whenever maintenance mode changes */
  settings: PlainObject;
}

export class DatastoreConfig {
  constructor(
    readonly clusters: ReadonlyMap<string, ClusterDefinition>,
    readonly indexDefinitions: ReadonlyMap<string, IndexDefinitionConfig>,
    readonly logTraffic: boolean = false,
    readonly maxClientRetries: number = 3,
  ) {}

  /**
   * Build from a parsed settings document (the object holding `datastore`).
   *
   * @throws ConfigError when the section is missing or invalid
   */
  static fromParsedSettings(settings: unknown): DatastoreConfig {
    if (!isPlainObject(settings) || !isPlainObject(settings.datastore)) {
      throw new ConfigError('Settings are missing the `datastore` section.');
    }

    const result = datastoreSettingsSchema.safeParse(settings.datastore);
    if (!result.success) throw configErrorFrom(result.error, 'datastore settings');

    const indexDefinitions = new Map(
      Object.entries(result.data.index_definitions).map(([name, raw]) => [
        name,
        IndexDefinitionConfig.fromSettings(raw, name),
      ] as const),
    );

    return new DatastoreConfig(
      new Map(Object.entries(result.data.clusters)),
      indexDefinitions,
      result.data.log_traffic,
      result.data.max_client_retries,
    );
  }

  static fromYaml(source: string): DatastoreConfig {
    return DatastoreConfig.fromParsedSettings(yaml.parse(source));
  }

  static async fromYamlFile(path: string): Promise<DatastoreConfig> {
    return DatastoreConfig.fromYaml(await readFile(path, 'utf-8'));
  }
}
