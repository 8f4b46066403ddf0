/**
 * @graphdex/admin — Dry-run datastore client
 *
 * Forwards reads to the wrapped client and turns every write into a no-op.
 * Every method is listed explicitly; nothing is delegated wholesale.
 */

import type {
  ClusterSettings,
  DatastoreClient,
  IndexConfig,
  IndexTemplateConfig,
} from '@graphdex/search';

export class DatastoreClientDryRunDecorator implements DatastoreClient {
  constructor(private readonly wrapped: DatastoreClient) {}

  get clusterName(): string {
    return this.wrapped.clusterName;
  }

  // Cluster

  getFlatClusterSettings(): Promise<ClusterSettings> {
    return this.wrapped.getFlatClusterSettings();
  }

  async putPersistentClusterSettings(): Promise<void> {}

  // Index templates

  getIndexTemplate(name: string): Promise<IndexTemplateConfig> {
    return this.wrapped.getIndexTemplate(name);
  }

  async putIndexTemplate(): Promise<void> {}

  async deleteIndexTemplate(): Promise<void> {}

  // Indices

  getIndex(name: string): Promise<IndexConfig> {
    return this.wrapped.getIndex(name);
  }

  listIndicesMatching(expression: string): Promise<string[]> {
    return this.wrapped.listIndicesMatching(expression);
  }

  async createIndex(): Promise<void> {}

  async putIndexMapping(): Promise<void> {}

  async putIndexSettings(): Promise<void> {}

  async deleteIndices(): Promise<void> {}
}
