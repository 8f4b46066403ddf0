/**
 * @graphdex/admin — Entry point
 */

import type { AppLogger } from '@graphdex/config';
import { DatastoreCore } from '@graphdex/datastore-core';
import { ClusterConfigurator } from './cluster-configurator/cluster-configurator.js';
import { ClusterSettingsManager } from './cluster-configurator/cluster-settings-manager.js';
import { DatastoreClientDryRunDecorator } from './datastore-client-dry-run-decorator.js';

export interface AdminOptions {
  clock?: () => Date;
  logger?: AppLogger;
  /** Set on instances whose datastore writes are no-ops */
  dryRun?: boolean;
}

/**
 * Datastore administration for one set of settings and schema artifacts.
 *
 * @example
 * ```ts
 * const admin = await Admin.fromEnv();
 * await admin.withDryRunDatastoreClients().clusterConfigurator.configureCluster(process.stdout);
 * ```
 */
export class Admin {
  private configurator?: ClusterConfigurator;
  private settingsManager?: ClusterSettingsManager;

  constructor(
    readonly datastoreCore: DatastoreCore,
    private readonly opts: AdminOptions = {},
  ) {}

  /** Build from `DATASTORE_SETTINGS_PATH` and `SCHEMA_ARTIFACTS_DIR`. */
  static async fromEnv(opts: AdminOptions = {}): Promise<Admin> {
    return new Admin(await DatastoreCore.fromEnv(), opts);
  }

  get dryRun(): boolean {
    return this.opts.dryRun ?? false;
  }

  get clusterConfigurator(): ClusterConfigurator {
    this.configurator ??= new ClusterConfigurator({
      datastoreClientsByName: this.datastoreCore.datastoreClientsByName,
      indexDefinitions: [...this.datastoreCore.indexDefinitionsByName.values()],
      schemaArtifacts: this.datastoreCore.schemaArtifacts,
      clusterSettingsManager: this.clusterSettingsManager,
      clock: this.opts.clock,
      dryRun: this.dryRun,
      logger: this.opts.logger,
    });
    return this.configurator;
  }

  get clusterSettingsManager(): ClusterSettingsManager {
    this.settingsManager ??= new ClusterSettingsManager({
      datastoreClientsByName: this.datastoreCore.datastoreClientsByName,
      datastoreConfig: this.datastoreCore.config,
      logger: this.opts.logger,
    });
    return this.settingsManager;
  }

  /** A copy of this admin whose datastore writes are no-ops. */
  withDryRunDatastoreClients(): Admin {
    const dryRunClients = new Map(
      [...this.datastoreCore.datastoreClientsByName].map(([name, client]) => [
        name,
        new DatastoreClientDryRunDecorator(client),
      ] as const),
    );

    return new Admin(this.datastoreCore.withDatastoreClients(dryRunClients), { ...this.opts, dryRun: true });
  }
}
