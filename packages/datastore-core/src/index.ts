/**
 * @graphdex/datastore-core — Datastore settings and index definitions
 *
 * Everything needed to know which index (or rollover index) a record or a
 * query goes to, and what configuration that index should have.
 */

// Entry point
export { DatastoreCore, elasticsearchClientFactory } from './datastore-core.js';
export type { DatastoreClientFactory, DatastoreCoreOptions } from './datastore-core.js';

// Configuration
export { DatastoreConfig } from './configuration/datastore-config.js';
export type { ClusterDefinition } from './configuration/datastore-config.js';
export {
  IndexDefinitionConfig,
  CustomTimestampRange,
  indexDefinitionConfigSchema,
} from './configuration/index-definition-config.js';
export type {
  IndexDefinitionConfigAttributes,
  RawIndexDefinitionConfig,
} from './configuration/index-definition-config.js';

// Schema artifacts
export {
  parseSchemaArtifacts,
  loadSchemaArtifacts,
  RUNTIME_METADATA_FILE,
  DATASTORE_CONFIG_FILE,
} from './schema-artifacts.js';
export type {
  SchemaArtifacts,
  IndexDefinitionMetadata,
  RolloverConfig,
  SortClause,
} from './schema-artifacts.js';

// Normalization
export { normalize, normalizeMappings, normalizeSettings, READ_ONLY_SETTINGS } from './index-config-normalizer.js';

// Index definitions
export { IndexDefinitionBase, recordedSources } from './index-definition/base.js';
export type {
  IndexDefinitionAttributes,
  RoutingOptions,
  RelatedRolloverIndicesOptions,
} from './index-definition/base.js';
export { Index } from './index-definition/index.js';
export { RolloverIndex } from './index-definition/rollover-index.js';
export { RolloverIndexTemplate } from './index-definition/rollover-index-template.js';
export type { RolloverFrequency, RolloverIndexTemplateAttributes } from './index-definition/rollover-index-template.js';
export { buildIndexDefinition } from './index-definition/factory.js';
export type { IndexDefinition, BuildIndexDefinitionParams } from './index-definition/factory.js';

// Constants
export {
  ROLLOVER_INDEX_INFIX_MARKER,
  LIST_COUNTS_FIELD,
  SELF_RELATIONSHIP_NAME,
  MAPPING_META_NAMESPACE,
} from './constants.js';
