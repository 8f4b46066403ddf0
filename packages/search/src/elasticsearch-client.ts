/**
 * @graphdex/search — Elasticsearch 8.x client implementation
 *
 * Implements the DatastoreClient interface using the official
 * Elasticsearch JavaScript client.
 */

import { Client, errors, type DiagnosticResult } from '@elastic/elasticsearch';
import { createLogger } from '@graphdex/config';
import { BadDatastoreRequest } from '@graphdex/support';
import type {
  ClusterSettings,
  DatastoreClient,
  DatastoreClientConfig,
  IndexConfig,
  IndexTemplateConfig,
  Mappings,
  Settings,
} from './types.js';

const log = createLogger('search:elasticsearch');

/** Copy a typed response object into a plain JSON record. */
function toJson(value: object | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value ?? {}));
}

function isNotFound(error: unknown): boolean {
  return error instanceof errors.ResponseError && error.statusCode === 404;
}

export class ElasticsearchDatastoreClient implements DatastoreClient {
  readonly clusterName: string;
  private readonly client: Client;

  constructor(config: DatastoreClientConfig, client?: Client) {
    this.clusterName = config.clusterName;
    this.client =
      client ??
      new Client({
        node: config.url,
        ...(config.requestTimeoutMs !== undefined && { requestTimeout: config.requestTimeoutMs }),
        ...(config.maxRetries !== undefined && { maxRetries: config.maxRetries }),
      });

    if (config.logTraffic) {
      this.client.diagnostic.on('response', (err: errors.ElasticsearchClientError | null, result: DiagnosticResult | null) => {
        log.debug(
          {
            cluster: this.clusterName,
            method: result?.meta.request.params.method,
            path: result?.meta.request.params.path,
            statusCode: result?.statusCode,
            ...(err && { error: err.message }),
          },
          'datastore request',
        );
      });
    }
  }

  async getFlatClusterSettings(): Promise<ClusterSettings> {
    const response = await this.perform(() => this.client.cluster.getSettings({ flat_settings: true }));
    return { persistent: toJson(response.persistent), transient: toJson(response.transient) };
  }

  async putPersistentClusterSettings(settings: Settings): Promise<void> {
    await this.perform(() => this.client.cluster.putSettings({ persistent: settings }));
  }

  async getIndexTemplate(name: string): Promise<IndexTemplateConfig> {
    try {
      const response = await this.perform(() =>
        this.client.indices.getIndexTemplate({ name, flat_settings: true }),
      );
      const item = response.index_templates.find((candidate) => candidate.name === name);
      if (!item) return {};

      const { index_patterns, template, ...rest } = item.index_template;
      return {
        ...toJson(rest),
        index_patterns: typeof index_patterns === 'string' ? [index_patterns] : index_patterns,
        template: { mappings: toJson(template?.mappings), settings: toJson(template?.settings) },
      };
    } catch (error) {
      if (isNotFound(error)) return {};
      throw error;
    }
  }

  async putIndexTemplate(params: { name: string; body: IndexTemplateConfig }): Promise<void> {
    await this.request('PUT', `/_index_template/${encodeURIComponent(params.name)}`, params.body);
  }

  async deleteIndexTemplate(name: string): Promise<void> {
    await this.perform(() => this.client.indices.deleteIndexTemplate({ name }, { ignore: [404] }));
  }

  async getIndex(name: string): Promise<IndexConfig> {
    const response = await this.perform(() =>
      this.client.indices.get({ index: name, flat_settings: true, ignore_unavailable: true }),
    );
    const state = response[name];
    if (!state) return {};

    return { mappings: toJson(state.mappings), settings: toJson(state.settings) };
  }

  async listIndicesMatching(expression: string): Promise<string[]> {
    try {
      const rows = await this.perform(() =>
        this.client.cat.indices({ index: expression, format: 'json', h: 'index' }),
      );
      return rows.flatMap((row) => (row.index ? [row.index] : [])).sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async createIndex(params: { index: string; body: IndexConfig }): Promise<void> {
    await this.request('PUT', `/${encodeURIComponent(params.index)}`, { ...params.body });
  }

  async putIndexMapping(params: { index: string; body: Mappings }): Promise<void> {
    await this.request('PUT', `/${encodeURIComponent(params.index)}/_mapping`, params.body);
  }

  async putIndexSettings(params: { index: string; body: Settings }): Promise<void> {
    await this.request('PUT', `/${encodeURIComponent(params.index)}/_settings`, params.body);
  }

  async deleteIndices(...names: string[]): Promise<void> {
    if (names.length === 0) return;

    await this.perform(() =>
      this.client.indices.delete({ index: names, ignore_unavailable: true, allow_no_indices: true }),
    );
  }

  /**
   * Send a request whose body is already datastore JSON. Mappings and
   * settings pass through untouched.
   */
  private async request(method: 'PUT' | 'POST', path: string, body: Record<string, unknown>): Promise<void> {
    await this.perform(() => this.client.transport.request({ method, path, body }));
  }

  /**
   * Run a client call, translating rejected requests (4xx other than 404)
   * into BadDatastoreRequest.
   */
  private async perform<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (
        error instanceof errors.ResponseError &&
        error.statusCode !== undefined &&
        error.statusCode >= 400 &&
        error.statusCode < 500 &&
        error.statusCode !== 404
      ) {
        throw new BadDatastoreRequest(`[${this.clusterName}] ${error.message}`, error.statusCode, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
