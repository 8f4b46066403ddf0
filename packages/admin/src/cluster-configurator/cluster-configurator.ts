/**
 * @graphdex/admin — Cluster configurator
 *
 * Configures every index definition on every cluster it is accessible on.
 * All known failure cases are validated up front so that nothing is written
 * unless every index definition can be configured.
 */

import { createLogger, type AppLogger } from '@graphdex/config';
import { clusterConfigurationDuration, withCorrelation } from '@graphdex/observability';
import type { DatastoreClient } from '@graphdex/search';
import type { IndexDefinition, SchemaArtifacts } from '@graphdex/datastore-core';
import { ConfigError, IndexOperationError } from '@graphdex/support';
import {
  buildIndexDefinitionConfigurator,
  type IndexDefinitionConfigurator,
} from '../index-definition-configurator/index.js';
import type { ActionOutput } from './action-reporter.js';
import { ALL_CLUSTERS, type ClusterSettingsManager } from './cluster-settings-manager.js';

const log = createLogger('admin:cluster-configurator');

export interface ClusterConfiguratorOptions {
  datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;
  indexDefinitions: readonly IndexDefinition[];
  schemaArtifacts: Pick<SchemaArtifacts, 'indices' | 'indexTemplates'>;
  clusterSettingsManager: ClusterSettingsManager;
  /** Source of "now" for the index created when a template has none */
  clock?: () => Date;
  /** Marks log lines and metrics of runs whose writes are no-ops */
  dryRun?: boolean;
  logger?: AppLogger;
}

export class ClusterConfigurator {
  private readonly opts: ClusterConfiguratorOptions;
  private readonly clock: () => Date;
  private readonly logger: AppLogger;
  private accessible?: IndexDefinition[];

  constructor(opts: ClusterConfiguratorOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? (() => new Date());
    this.logger = opts.logger ?? log;
  }

  /**
   * Validate, then configure every index definition inside index
   * maintenance mode on all clusters.
   *
   * @throws IndexOperationError listing every validation error
   */
  async configureCluster(output: ActionOutput): Promise<void> {
    await withCorrelation({ operation: 'configure_cluster', dryRun: this.opts.dryRun }, async () => {
      const endTimer = clusterConfigurationDuration.startTimer();
      let outcome = 'error';

      try {
        // Validation and configuration each get fresh configurators: both
        // memoize datastore reads.
        const errors: string[] = [];
        for (const configurator of this.indexDefinitionConfiguratorsFor(output)) {
          errors.push(...(await configurator.validate()));
        }

        if (errors.length > 0) {
          outcome = 'invalid';
          throw validationError(errors);
        }

        await this.opts.clusterSettingsManager.inIndexMaintenanceMode(ALL_CLUSTERS, async () => {
          for (const configurator of this.indexDefinitionConfiguratorsFor(output)) {
            await configurator.configure();
          }
        });

        outcome = 'success';
        this.logger.info({ indexDefinitions: this.opts.indexDefinitions.length }, 'Cluster configured');
      } finally {
        endTimer({ outcome });
      }
    });
  }

  /** Definitions with at least one accessible cluster. */
  accessibleIndexDefinitions(): IndexDefinition[] {
    this.accessible ??= this.opts.indexDefinitions.filter(
      (definition) => definition.allAccessibleClusterNames.length > 0,
    );
    return this.accessible;
  }

  private indexDefinitionConfiguratorsFor(output: ActionOutput): IndexDefinitionConfigurator[] {
    return this.opts.indexDefinitions.flatMap((definition) =>
      definition.allAccessibleClusterNames.map((clusterName) =>
        buildIndexDefinitionConfigurator({
          client: this.datastoreClientNamed(clusterName),
          definition,
          schemaArtifacts: this.opts.schemaArtifacts,
          output,
          clock: this.clock,
        }),
      ),
    );
  }

  private datastoreClientNamed(clusterName: string): DatastoreClient {
    const client = this.opts.datastoreClientsByName.get(clusterName);
    if (!client) throw new ConfigError(`No datastore client is available for cluster \`${clusterName}\`.`);
    return client;
  }
}

function validationError(errors: readonly string[]): IndexOperationError {
  const descriptions = errors.map((error, i) => `${i + 1}): ${error}`).join(`\n${'='.repeat(80)}\n\n`);
  return new IndexOperationError(`Got ${errors.length} validation error(s):\n\n${descriptions}`);
}
