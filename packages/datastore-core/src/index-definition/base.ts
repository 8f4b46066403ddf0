/**
 * @graphdex/datastore-core — Behaviour shared by every index definition
 */

import {
  ConfigError,
  fetchValueAtPath,
  flattenAndStringifyKeys,
  isPlainObject,
  type PlainObject,
} from '@graphdex/support';
import type { DatastoreClient, Mappings } from '@graphdex/search';
import type { IndexDefinitionConfig } from '../configuration/index-definition-config.js';
import type { SortClause } from '../schema-artifacts.js';
import { LIST_COUNTS_FIELD, MAPPING_META_NAMESPACE } from '../constants.js';
import type { RolloverIndex } from './rollover-index.js';

export interface IndexDefinitionAttributes {
  name: string;
  /** Field routing is based on; `"id"` means no custom routing */
  routeWith: string | null;
  defaultSortClauses: readonly SortClause[];
  currentSources: ReadonlySet<string>;
  fieldsByPath: ReadonlyMap<string, { source: string }>;
  envIndexConfig: IndexDefinitionConfig;
  /** Names of every cluster defined in the datastore settings */
  definedClusters: ReadonlySet<string>;
  datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;
}

export interface RoutingOptions {
  routeWithPath?: string | null;
  idPath?: string;
}

export interface RelatedRolloverIndicesOptions {
  /** Drop configured indices that do not exist in the datastore yet */
  onlyIfExists?: boolean;
}

export abstract class IndexDefinitionBase implements IndexDefinitionAttributes {
  readonly name: string;
  readonly routeWith: string | null;
  readonly defaultSortClauses: readonly SortClause[];
  readonly currentSources: ReadonlySet<string>;
  readonly fieldsByPath: ReadonlyMap<string, { source: string }>;
  readonly envIndexConfig: IndexDefinitionConfig;
  readonly definedClusters: ReadonlySet<string>;
  readonly datastoreClientsByName: ReadonlyMap<string, DatastoreClient>;

  private flattenedOverrides?: PlainObject;
  private couldHitIncompleteDocs?: boolean;
  private knownQueryRolloverIndices?: RolloverIndex[];
  private readonly listCountsPathsBySource = new Map<string, ReadonlySet<string>>();

  constructor(attrs: IndexDefinitionAttributes) {
    this.name = attrs.name;
    this.routeWith = attrs.routeWith;
    this.defaultSortClauses = attrs.defaultSortClauses;
    this.currentSources = attrs.currentSources;
    this.fieldsByPath = attrs.fieldsByPath;
    this.envIndexConfig = attrs.envIndexConfig;
    this.definedClusters = attrs.definedClusters;
    this.datastoreClientsByName = attrs.datastoreClientsByName;
  }

  abstract isRolloverIndexTemplate(): boolean;

  /** Index expression searches are sent to. */
  abstract indexExpressionForSearch(): string;

  /** Name of the concrete index the given record is written to. */
  abstract indexNameForWrites(record: PlainObject, opts?: { timestampFieldPath?: string | null }): string;

  abstract relatedRolloverIndices(
    client: DatastoreClient,
    opts?: RelatedRolloverIndicesOptions,
  ): Promise<RolloverIndex[]>;

  /** Current (normalized) mappings of this definition in the datastore. */
  abstract mappingsInDatastore(client: DatastoreClient): Promise<Mappings>;

  abstract deleteFromDatastore(client: DatastoreClient): Promise<void>;

  protected get attributes(): IndexDefinitionAttributes {
    return {
      name: this.name,
      routeWith: this.routeWith,
      defaultSortClauses: this.defaultSortClauses,
      currentSources: this.currentSources,
      fieldsByPath: this.fieldsByPath,
      envIndexConfig: this.envIndexConfig,
      definedClusters: this.definedClusters,
      datastoreClientsByName: this.datastoreClientsByName,
    };
  }

  /** Environment setting overrides as flat `index.*` keys. */
  get flattenedEnvSettingOverrides(): PlainObject {
    this.flattenedOverrides ??= flattenAndStringifyKeys(this.envIndexConfig.settingOverrides, 'index');
    return this.flattenedOverrides;
  }

  /**
   * Routing value for a record about to be indexed, or null when this
   * definition does not use custom routing. Records whose routing value is
   * in `ignoreRoutingValues` are routed by id instead.
   *
   * @throws ConfigError when custom routing is on but no route path is known
   * @throws MissingValueError when the record lacks the route or id field
   */
  routingValueForPreparedRecord(record: PlainObject, opts: RoutingOptions = {}): string | null {
    const { routeWithPath = this.routeWith, idPath = 'id' } = opts;
    if (!this.hasCustomRouting()) return null;

    if (routeWithPath === null) {
      throw new ConfigError(`\`${this}\` uses custom routing, but \`route_with_path\` is misconfigured (was \`null\`)`);
    }

    const routingValue = String(fetchValueAtPath(record, routeWithPath));
    if (!this.ignoredValuesForRouting.has(routingValue)) return routingValue;

    return String(fetchValueAtPath(record, idPath));
  }

  hasCustomRouting(): boolean {
    return this.routeWith !== 'id';
  }

  /**
   * Whether documents in this index may be missing fields because more than
   * one source populates them (now, or at any point recorded in `_meta`).
   */
  async searchesCouldHitIncompleteDocs(): Promise<boolean> {
    if (this.couldHitIncompleteDocs !== undefined) return this.couldHitIncompleteDocs;

    let result = this.currentSources.size > 1;
    if (!result) {
      const mappings = await this.mappingsInDatastore(this.datastoreClientFor(this.clusterToQuery));
      const sources = new Set([...recordedSources(mappings), ...this.currentSources]);
      result = sources.size > 1;
    }

    this.couldHitIncompleteDocs = result;
    return result;
  }

  get clusterToQuery(): string | null {
    return this.envIndexConfig.queryCluster;
  }

  /**
   * @throws ConfigError when `index_into_clusters` is not configured
   */
  get clustersToIndexInto(): readonly string[] {
    const clusters = this.envIndexConfig.indexIntoClusters;
    if (!clusters) {
      throw new ConfigError(`No \`index_into_clusters\` defined for ${this} in env_index_config`);
    }
    return clusters;
  }

  get useUpdatesForIndexing(): boolean {
    return this.envIndexConfig.useUpdatesForIndexing;
  }

  get ignoredValuesForRouting(): ReadonlySet<string> {
    return this.envIndexConfig.ignoreRoutingValues;
  }

  /** Configured clusters (index and query) that are defined, without duplicates. */
  get allAccessibleClusterNames(): string[] {
    const names = [...this.clustersToIndexInto, ...(this.clusterToQuery ? [this.clusterToQuery] : [])];
    return [...new Set(names)].filter((name) => this.definedClusters.has(name));
  }

  get accessibleClusterNamesToIndexInto(): string[] {
    return this.clustersToIndexInto.filter((name) => this.definedClusters.has(name));
  }

  accessibleFromQueries(): boolean {
    const cluster = this.clusterToQuery;
    return cluster !== null && this.definedClusters.has(cluster);
  }

  /** Related rollover indices that exist on the query cluster. */
  async knownRelatedQueryRolloverIndices(): Promise<RolloverIndex[]> {
    if (this.knownQueryRolloverIndices) return this.knownQueryRolloverIndices;

    const cluster = this.clusterToQuery;
    const indices = cluster
      ? await this.relatedRolloverIndices(this.datastoreClientFor(cluster), { onlyIfExists: true })
      : [];

    this.knownQueryRolloverIndices = indices;
    return indices;
  }

  /** Paths of `__counts` fields populated by the given source. */
  listCountsFieldPathsForSource(source: string): ReadonlySet<string> {
    let paths = this.listCountsPathsBySource.get(source);
    if (!paths) {
      paths = new Set(
        [...this.fieldsByPath]
          .filter(([path, field]) => field.source === source && path.split('.').includes(LIST_COUNTS_FIELD))
          .map(([path]) => path),
      );
      this.listCountsPathsBySource.set(source, paths);
    }
    return paths;
  }

  toString(): string {
    return `#<${this.constructor.name} ${this.name}>`;
  }

  protected datastoreClientFor(clusterName: string | null): DatastoreClient {
    const client = clusterName === null ? undefined : this.datastoreClientsByName.get(clusterName);
    if (!client) {
      throw new ConfigError(`No datastore client is available for cluster \`${String(clusterName)}\` (needed by ${this}).`);
    }
    return client;
  }
}

/** Sources recorded in a mapping's `_meta`. */
export function recordedSources(mappings: Mappings): string[] {
  const meta = mappings._meta;
  if (!isPlainObject(meta)) return [];
  const namespace = meta[MAPPING_META_NAMESPACE];
  if (!isPlainObject(namespace) || !Array.isArray(namespace.sources)) return [];
  return namespace.sources.filter((source): source is string => typeof source === 'string');
}
