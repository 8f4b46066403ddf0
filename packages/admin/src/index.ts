/**
 * @graphdex/admin — Datastore administration
 */

// Entry point
export { Admin } from './admin.js';
export type { AdminOptions } from './admin.js';

// Cluster configuration
export { ClusterConfigurator } from './cluster-configurator/cluster-configurator.js';
export type { ClusterConfiguratorOptions } from './cluster-configurator/cluster-configurator.js';
export { ClusterSettingsManager, ALL_CLUSTERS } from './cluster-configurator/cluster-settings-manager.js';
export type { ClusterSpec, ClusterSettingsManagerOptions } from './cluster-configurator/cluster-settings-manager.js';
export { ActionReporter } from './cluster-configurator/action-reporter.js';
export type { ActionOutput, ConfigurationAction } from './cluster-configurator/action-reporter.js';

// Index definition configurators
export {
  buildIndexDefinitionConfigurator,
  ForIndex,
  ForIndexTemplate,
} from './index-definition-configurator/index.js';
export type {
  BuildConfiguratorParams,
  IndexDefinitionConfigurator,
} from './index-definition-configurator/index.js';

// Dry run
export { DatastoreClientDryRunDecorator } from './datastore-client-dry-run-decorator.js';
