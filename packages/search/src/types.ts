/**
 * @graphdex/search — Datastore client type definitions
 */

/**
 * Index mappings as JSON (`properties`, `_meta`, `dynamic`, ...).
 */
export type Mappings = Record<string, unknown>;

/**
 * Index settings as JSON. Reads return flat dotted keys
 * (e.g. `index.number_of_shards`); writes accept nested or flat keys.
 */
export type Settings = Record<string, unknown>;

/**
 * Configuration of a concrete index, as read from or written to the datastore.
 */
export interface IndexConfig {
  /** Field mappings */
  mappings?: Mappings;
  /** Index settings */
  settings?: Settings;
}

/**
 * Configuration of an index template.
 */
export interface IndexTemplateConfig {
  /** Index name patterns the template applies to */
  index_patterns?: string[];
  /** Mappings and settings applied to matching indices on creation */
  template?: IndexConfig;
  /** Any other template attributes (priority, composed_of, ...) */
  [key: string]: unknown;
}

/**
 * Persistent and transient cluster settings, with flat dotted keys.
 */
export interface ClusterSettings {
  persistent: Settings;
  transient: Settings;
}

/**
 * Datastore admin client interface.
 *
 * All index and cluster administration goes through this interface, enabling
 * transparent switching between Elasticsearch, the in-memory mock and the
 * dry-run decorator. Requests the datastore rejects as invalid fail with
 * `BadDatastoreRequest`.
 */
export interface DatastoreClient {
  /** Name of the cluster this client talks to */
  readonly clusterName: string;

  /**
   * Get cluster settings with flat dotted keys.
   */
  getFlatClusterSettings(): Promise<ClusterSettings>;

  /**
   * Update persistent cluster settings. A `null` value resets a setting.
   */
  putPersistentClusterSettings(settings: Settings): Promise<void>;

  /**
   * Get an index template.
   *
   * @param name - Template name
   * @returns The template (settings flattened), or `{}` when it does not exist
   */
  getIndexTemplate(name: string): Promise<IndexTemplateConfig>;

  /**
   * Create or replace an index template.
   */
  putIndexTemplate(params: { name: string; body: IndexTemplateConfig }): Promise<void>;

  /**
   * Delete an index template. Missing templates are ignored.
   */
  deleteIndexTemplate(name: string): Promise<void>;

  /**
   * Get a concrete index.
   *
   * @param name - Index name
   * @returns The index (settings flattened), or `{}` when it does not exist
   */
  getIndex(name: string): Promise<IndexConfig>;

  /**
   * List the names of indices matching an index expression (wildcards allowed).
   */
  listIndicesMatching(expression: string): Promise<string[]>;

  /**
   * Create a concrete index.
   */
  createIndex(params: { index: string; body: IndexConfig }): Promise<void>;

  /**
   * Add fields to (or update field parameters of) an index mapping.
   */
  putIndexMapping(params: { index: string; body: Mappings }): Promise<void>;

  /**
   * Update dynamic index settings. A `null` value resets a setting.
   */
  putIndexSettings(params: { index: string; body: Settings }): Promise<void>;

  /**
   * Delete indices. Missing indices are ignored.
   */
  deleteIndices(...names: string[]): Promise<void>;
}

/**
 * Connection details for one datastore cluster.
 */
export interface DatastoreClientConfig {
  /** Cluster name (key in the datastore settings `clusters` map) */
  clusterName: string;
  /** Node URL (e.g., "http://localhost:9200") */
  url: string;
  /** Request timeout in milliseconds */
  requestTimeoutMs?: number;
  /** Maximum retries for failed requests */
  maxRetries?: number;
  /** Log every request and response at debug level */
  logTraffic?: boolean;
}
