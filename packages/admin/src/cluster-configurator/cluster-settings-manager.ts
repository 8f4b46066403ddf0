/**
 * @graphdex/admin — Index maintenance mode
 *
 * In index maintenance mode the datastore may not auto-create indices
 * (other than Kibana's), so index configuration can be changed without an
 * index being created from a stale template by concurrent indexing. Outside
 * of it, rollover indices are auto-created as records for new time buckets
 * arrive.
 *
 * The mode lives in a persistent cluster setting, so it holds across
 * processes; two processes toggling it at once are not guarded against.
 */

import { createLogger, type AppLogger } from '@graphdex/config';
import { maintenanceModeTransitionsTotal } from '@graphdex/observability';
import type { DatastoreClient, Settings } from '@graphdex/search';
import { ROLLOVER_INDEX_INFIX_MARKER, type DatastoreConfig } from '@graphdex/datastore-core';
import { ClusterOperationError, errorMessage } from '@graphdex/support';

const log = createLogger('admin:cluster-settings');

/** Targets every configured cluster. */
export const ALL_CLUSTERS: unique symbol = Symbol('ALL_CLUSTERS');

/** A cluster name, or {@link ALL_CLUSTERS}. */
export type ClusterSpec = string | typeof ALL_CLUSTERS;

export interface ClusterSettingsManagerOptions {
  datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;
  datastoreConfig: DatastoreConfig;
  logger?: AppLogger;
}

export class ClusterSettingsManager {
  private readonly datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;
  private readonly datastoreConfig: DatastoreConfig;
  private readonly logger: AppLogger;

  constructor(opts: ClusterSettingsManagerOptions) {
    this.datastoreClientsByName = opts.datastoreClientsByName;
    this.datastoreConfig = opts.datastoreConfig;
    this.logger = opts.logger ?? log;
  }

  /**
   * Disable index auto-creation. Idempotent.
   *
   * @throws ClusterOperationError for an unknown cluster name
   */
  async startIndexMaintenanceMode(target: ClusterSpec): Promise<void> {
    for (const clusterName of this.clusterNamesFor(target)) {
      const client = this.datastoreClientNamed(clusterName);
      await client.putPersistentClusterSettings(this.desiredClusterSettings(clusterName));
      maintenanceModeTransitionsTotal.inc({ cluster: clusterName, mode: 'start' });
      this.logger.info({ cluster: clusterName }, 'Index maintenance mode started');
    }
  }

  /**
   * Re-enable auto-creation of rollover indices. Idempotent.
   *
   * @throws ClusterOperationError for an unknown cluster name
   */
  async endIndexMaintenanceMode(target: ClusterSpec): Promise<void> {
    for (const clusterName of this.clusterNamesFor(target)) {
      const client = this.datastoreClientNamed(clusterName);
      await client.putPersistentClusterSettings(
        this.desiredClusterSettings(clusterName, [`*${ROLLOVER_INDEX_INFIX_MARKER}*`]),
      );
      maintenanceModeTransitionsTotal.inc({ cluster: clusterName, mode: 'end' });
      this.logger.info({ cluster: clusterName }, 'Index maintenance mode ended');
    }
  }

  /**
   * Run `fn` in index maintenance mode.
   *
   * When `fn` fails the mode is left on: resuming auto-creation after a
   * partial reconfiguration could create indices with the wrong settings.
   * Re-running is idempotent.
   *
   * @example
   * ```ts
   * await manager.inIndexMaintenanceMode(ALL_CLUSTERS, () => configurator.configure());
   * ```
   */
  async inIndexMaintenanceMode<T>(target: ClusterSpec, fn: () => Promise<T>): Promise<T> {
    await this.startIndexMaintenanceMode(target);

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.logger.warn(
        { err: error, clusters: this.clusterNamesFor(target) },
        `Not exiting index maintenance mode due to an error: ${errorMessage(error)}. ` +
          'Some manual cleanup may be required (although a retry should be idempotent).',
      );
      throw error;
    }

    await this.endIndexMaintenanceMode(target);
    return result;
  }

  private desiredClusterSettings(clusterName: string, autoCreateIndexPatterns: readonly string[] = []): Settings {
    return {
      // Kibana needs to create its own indices to be usable.
      'action.auto_create_index': ['.kibana*', ...autoCreateIndexPatterns].map((pattern) => `+${pattern}`).join(','),
      ...this.datastoreConfig.clusters.get(clusterName)?.settings,
    };
  }

  private datastoreClientNamed(clusterName: string): DatastoreClient {
    const client = this.datastoreClientsByName.get(clusterName);
    if (!client) {
      throw new ClusterOperationError(
        `Unknown datastore cluster name: \`${clusterName}\`. ` +
          `Valid cluster names: ${JSON.stringify([...this.datastoreClientsByName.keys()])}`,
      );
    }
    return client;
  }

  private clusterNamesFor(target: ClusterSpec): string[] {
    return target === ALL_CLUSTERS ? [...this.datastoreClientsByName.keys()] : [target];
  }
}
