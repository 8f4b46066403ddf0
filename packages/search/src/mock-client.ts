/**
 * @graphdex/search — In-memory mock datastore client
 *
 * Implements the DatastoreClient interface with an in-memory store.
 * Suitable for unit testing and development without Elasticsearch.
 *
 * Enforces the datastore rules that index configuration depends on:
 * field types are immutable, static settings cannot change on an
 * existing index, and an index name can only be created once. Every
 * write is recorded in `writes` so tests can assert on call order.
 */

import { BadDatastoreRequest, isPlainObject, type PlainObject } from '@graphdex/support';
import { flattenIndexSettings, isStaticIndexSetting } from './index-settings.js';
import type {
  ClusterSettings,
  DatastoreClient,
  IndexConfig,
  IndexTemplateConfig,
  Mappings,
  Settings,
} from './types.js';

/**
 * A write request received by the mock.
 */
export interface RecordedWrite {
  operation:
    | 'createIndex'
    | 'putIndexMapping'
    | 'putIndexSettings'
    | 'putIndexTemplate'
    | 'deleteIndexTemplate'
    | 'deleteIndices'
    | 'putPersistentClusterSettings';
  /** Index, template or cluster name the write targets */
  target: string;
  body?: unknown;
}

/**
 * Stored state of a single concrete index.
 */
interface MockIndex {
  mappings: Mappings;
  settings: Settings;
  readOnlySettings: Settings;
}

const clone = <T>(value: T): T => structuredClone(value);

function stringifySettingValue(value: unknown): unknown {
  if (value === null) return null;
  if (Array.isArray(value)) return value.map(stringifySettingValue);
  return String(value);
}

/** Flatten and stringify settings the way the datastore returns them. */
function storedSettings(settings: Settings | undefined): Settings {
  const stored: Settings = {};
  for (const [key, value] of Object.entries(flattenIndexSettings(settings ?? {}))) {
    if (value !== null) stored[key] = stringifySettingValue(value);
  }
  return stored;
}

function wildcardToRegExp(expression: string): RegExp {
  const escaped = expression.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

export class MockDatastoreClient implements DatastoreClient {
  /** Write requests received, in order */
  readonly writes: RecordedWrite[] = [];

  private readonly indices = new Map<string, MockIndex>();
  private readonly templates = new Map<string, IndexTemplateConfig>();
  private persistentSettings: Settings = {};
  private uuidCounter = 0;

  constructor(
    readonly clusterName: string = 'main',
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Forget recorded writes (state is kept). */
  clearWrites(): void {
    this.writes.length = 0;
  }

  async getFlatClusterSettings(): Promise<ClusterSettings> {
    return { persistent: clone(this.persistentSettings), transient: {} };
  }

  async putPersistentClusterSettings(settings: Settings): Promise<void> {
    this.record('putPersistentClusterSettings', this.clusterName, settings);

    const next = { ...this.persistentSettings };
    for (const [key, value] of Object.entries(settings)) {
      if (value === null) {
        delete next[key];
      } else {
        next[key] = stringifySettingValue(value);
      }
    }
    this.persistentSettings = next;
  }

  async getIndexTemplate(name: string): Promise<IndexTemplateConfig> {
    const template = this.templates.get(name);
    return template ? clone(template) : {};
  }

  async putIndexTemplate(params: { name: string; body: IndexTemplateConfig }): Promise<void> {
    this.record('putIndexTemplate', params.name, params.body);

    const { template, ...rest } = params.body;
    this.templates.set(params.name, {
      ...clone(rest),
      template: {
        mappings: clone(template?.mappings ?? {}),
        settings: storedSettings(template?.settings),
      },
    });
  }

  async deleteIndexTemplate(name: string): Promise<void> {
    this.record('deleteIndexTemplate', name);
    this.templates.delete(name);
  }

  async getIndex(name: string): Promise<IndexConfig> {
    const index = this.indices.get(name);
    if (!index) return {};

    return {
      mappings: clone(index.mappings),
      settings: { ...clone(index.settings), ...index.readOnlySettings },
    };
  }

  async listIndicesMatching(expression: string): Promise<string[]> {
    const patterns = expression.split(',').map(wildcardToRegExp);
    return [...this.indices.keys()].filter((name) => patterns.some((pattern) => pattern.test(name))).sort();
  }

  async createIndex(params: { index: string; body: IndexConfig }): Promise<void> {
    this.record('createIndex', params.index, params.body);

    if (this.indices.has(params.index)) {
      throw new BadDatastoreRequest(
        `resource_already_exists_exception: index [${params.index}] already exists`,
      );
    }

    this.uuidCounter += 1;
    this.indices.set(params.index, {
      mappings: clone(params.body.mappings ?? {}),
      settings: storedSettings(params.body.settings),
      readOnlySettings: {
        'index.uuid': `mock-uuid-${this.uuidCounter}`,
        'index.creation_date': String(this.clock().getTime()),
        'index.provided_name': params.index,
        'index.version.created': '8130099',
      },
    });
  }

  async putIndexMapping(params: { index: string; body: Mappings }): Promise<void> {
    this.record('putIndexMapping', params.index, params.body);
    const index = this.fetchIndex(params.index);

    const { properties, ...rest } = params.body;
    const currentProperties = isPlainObject(index.mappings.properties) ? index.mappings.properties : undefined;

    index.mappings = {
      ...index.mappings,
      ...clone(rest),
      ...(isPlainObject(properties) && {
        properties: mergeMappingProperties(currentProperties ?? {}, properties, ''),
      }),
    };
  }

  async putIndexSettings(params: { index: string; body: Settings }): Promise<void> {
    this.record('putIndexSettings', params.index, params.body);
    const index = this.fetchIndex(params.index);

    const updates = flattenIndexSettings(params.body);
    const staticChanges = Object.keys(updates).filter(
      (key) => isStaticIndexSetting(key) && stringifySettingValue(updates[key]) !== (index.settings[key] ?? null),
    );
    if (staticChanges.length > 0) {
      throw new BadDatastoreRequest(
        `illegal_argument_exception: Can't update non dynamic settings [[${staticChanges.join(', ')}]] for open indices [[${params.index}]]`,
      );
    }

    const next = { ...index.settings };
    for (const [key, value] of Object.entries(updates)) {
      if (value === null) {
        delete next[key];
      } else {
        next[key] = stringifySettingValue(value);
      }
    }
    index.settings = next;
  }

  async deleteIndices(...names: string[]): Promise<void> {
    this.record('deleteIndices', names.join(','));
    for (const name of names) this.indices.delete(name);
  }

  private fetchIndex(name: string): MockIndex {
    const index = this.indices.get(name);
    if (!index) {
      throw new BadDatastoreRequest(`index_not_found_exception: no such index [${name}]`, 404);
    }
    return index;
  }

  private record(operation: RecordedWrite['operation'], target: string, body?: unknown): void {
    this.writes.push({ operation, target, ...(body !== undefined && { body: clone(body) }) });
  }
}

/**
 * Merge new field mappings into existing ones. Fields absent from the
 * update are kept; a field present in both takes the update's parameters,
 * and its type must not change.
 */
function mergeMappingProperties(current: PlainObject, updates: PlainObject, path: string): PlainObject {
  const merged: PlainObject = { ...clone(current) };

  for (const [field, update] of Object.entries(updates)) {
    const existing = merged[field];
    const fieldPath = path ? `${path}.${field}` : field;

    if (!isPlainObject(existing) || !isPlainObject(update)) {
      merged[field] = clone(update);
      continue;
    }

    const existingType = existing.type ?? 'object';
    const updateType = update.type ?? 'object';
    if (existingType !== updateType) {
      throw new BadDatastoreRequest(
        `illegal_argument_exception: mapper [${fieldPath}] cannot be changed from type [${String(existingType)}] to [${String(updateType)}]`,
      );
    }

    const { properties: updateProperties, ...updateParams } = update;
    const existingProperties = isPlainObject(existing.properties) ? existing.properties : undefined;
    // Parameters the update leaves out revert to their defaults; sub-fields are kept.
    const properties = isPlainObject(updateProperties)
      ? mergeMappingProperties(existingProperties ?? {}, updateProperties, fieldPath)
      : existingProperties;
    merged[field] = { ...clone(updateParams), ...(properties && { properties }) };
  }

  return merged;
}
