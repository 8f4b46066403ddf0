/**
 * @graphdex/search — Datastore client abstraction
 *
 * Provides a unified interface for index and cluster administration,
 * with an Elasticsearch implementation and an in-memory mock.
 */

// Implementations
export { ElasticsearchDatastoreClient } from './elasticsearch-client.js';
export { MockDatastoreClient, type RecordedWrite } from './mock-client.js';

// Settings knowledge
export {
  STATIC_INDEX_SETTINGS,
  STATIC_INDEX_SETTING_PREFIXES,
  isStaticIndexSetting,
  flattenIndexSettings,
} from './index-settings.js';

// Types
export type {
  DatastoreClient,
  DatastoreClientConfig,
  ClusterSettings,
  IndexConfig,
  IndexTemplateConfig,
  Mappings,
  Settings,
} from './types.js';
