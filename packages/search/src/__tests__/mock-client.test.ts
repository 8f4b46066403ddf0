/**
 * @graphdex/search — Mock datastore client tests
 *
 * Tests the in-memory mock implementation of the DatastoreClient interface.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BadDatastoreRequest } from '@graphdex/support';
import { MockDatastoreClient } from '../mock-client.js';

const widgetsConfig = {
  mappings: {
    properties: {
      id: { type: 'keyword' },
      name: { type: 'keyword' },
    },
  },
  settings: { 'index.number_of_shards': 2, 'index.refresh_interval': '1s' },
};

describe('MockDatastoreClient', () => {
  let client: MockDatastoreClient;

  beforeEach(() => {
    client = new MockDatastoreClient('main', () => new Date('2024-05-01T00:00:00Z'));
  });

  describe('createIndex and getIndex', () => {
    it('returns {} for a missing index', async () => {
      expect(await client.getIndex('widgets')).toEqual({});
    });

    it('stores stringified flat settings plus read-only settings', async () => {
      await client.createIndex({ index: 'widgets', body: widgetsConfig });

      expect(await client.getIndex('widgets')).toEqual({
        mappings: widgetsConfig.mappings,
        settings: {
          'index.number_of_shards': '2',
          'index.refresh_interval': '1s',
          'index.uuid': 'mock-uuid-1',
          'index.creation_date': String(new Date('2024-05-01T00:00:00Z').getTime()),
          'index.provided_name': 'widgets',
          'index.version.created': '8130099',
        },
      });
    });

    it('accepts nested settings without the index prefix', async () => {
      await client.createIndex({ index: 'widgets', body: { settings: { number_of_replicas: 0 } } });

      const { settings } = await client.getIndex('widgets');
      expect(settings?.['index.number_of_replicas']).toBe('0');
    });

    it('rejects creating an existing index', async () => {
      await client.createIndex({ index: 'widgets', body: widgetsConfig });

      await expect(client.createIndex({ index: 'widgets', body: widgetsConfig })).rejects.toThrow(BadDatastoreRequest);
    });
  });

  describe('putIndexMapping', () => {
    beforeEach(async () => {
      await client.createIndex({ index: 'widgets', body: widgetsConfig });
    });

    it('adds new fields and keeps existing ones', async () => {
      await client.putIndexMapping({
        index: 'widgets',
        body: { properties: { cost: { type: 'integer' } }, _meta: { ElasticGraph: { sources: ['__self'] } } },
      });

      expect((await client.getIndex('widgets')).mappings).toEqual({
        properties: {
          id: { type: 'keyword' },
          name: { type: 'keyword' },
          cost: { type: 'integer' },
        },
        _meta: { ElasticGraph: { sources: ['__self'] } },
      });
    });

    it('replaces the parameters of an existing field', async () => {
      await client.putIndexMapping({
        index: 'widgets',
        body: { properties: { name: { type: 'keyword', meta: { unit: 'chars' } } } },
      });
      await client.putIndexMapping({ index: 'widgets', body: { properties: { name: { type: 'keyword' } } } });

      expect((await client.getIndex('widgets')).mappings?.properties).toEqual({
        id: { type: 'keyword' },
        name: { type: 'keyword' },
      });
    });

    it('keeps the sub-fields of an object field the update leaves out', async () => {
      await client.putIndexMapping({
        index: 'widgets',
        body: { properties: { owner: { properties: { id: { type: 'keyword' } } } } },
      });
      await client.putIndexMapping({ index: 'widgets', body: { properties: { owner: { dynamic: 'strict' } } } });

      expect((await client.getIndex('widgets')).mappings?.properties).toHaveProperty('owner', {
        dynamic: 'strict',
        properties: { id: { type: 'keyword' } },
      });
    });

    it('rejects changing the type of a field', async () => {
      await expect(
        client.putIndexMapping({ index: 'widgets', body: { properties: { name: { type: 'text' } } } }),
      ).rejects.toThrow('mapper [name] cannot be changed from type [keyword] to [text]');
    });
  });

  describe('putIndexSettings', () => {
    beforeEach(async () => {
      await client.createIndex({ index: 'widgets', body: widgetsConfig });
    });

    it('updates dynamic settings and resets null ones', async () => {
      await client.putIndexSettings({
        index: 'widgets',
        body: { 'index.number_of_replicas': 2, 'index.refresh_interval': null },
      });

      const { settings } = await client.getIndex('widgets');
      expect(settings?.['index.number_of_replicas']).toBe('2');
      expect(settings).not.toHaveProperty(['index.refresh_interval']);
    });

    it('rejects changing a static setting', async () => {
      await expect(
        client.putIndexSettings({ index: 'widgets', body: { 'index.number_of_shards': 47 } }),
      ).rejects.toThrow("Can't update non dynamic settings [[index.number_of_shards]] for open indices [[widgets]]");
    });

    it('allows re-sending a static setting with its current value', async () => {
      await expect(
        client.putIndexSettings({ index: 'widgets', body: { 'index.number_of_shards': 2 } }),
      ).resolves.toBeUndefined();
    });
  });

  describe('index templates', () => {
    it('stores templates with flattened settings', async () => {
      await client.putIndexTemplate({
        name: 'events',
        body: {
          index_patterns: ['events_rollover__*'],
          template: { mappings: { properties: {} }, settings: { number_of_shards: 3 } },
        },
      });

      expect(await client.getIndexTemplate('events')).toEqual({
        index_patterns: ['events_rollover__*'],
        template: { mappings: { properties: {} }, settings: { 'index.number_of_shards': '3' } },
      });
    });

    it('returns {} for a missing template and deletes templates', async () => {
      await client.putIndexTemplate({ name: 'events', body: { index_patterns: ['events_rollover__*'] } });
      await client.deleteIndexTemplate('events');

      expect(await client.getIndexTemplate('events')).toEqual({});
    });
  });

  describe('listIndicesMatching and deleteIndices', () => {
    it('matches wildcard expressions', async () => {
      for (const index of ['events_rollover__2020-01', 'events_rollover__2020-02', 'events_log']) {
        await client.createIndex({ index, body: {} });
      }

      expect(await client.listIndicesMatching('events_rollover__*')).toEqual([
        'events_rollover__2020-01',
        'events_rollover__2020-02',
      ]);

      await client.deleteIndices('events_rollover__2020-01', 'missing');
      expect(await client.listIndicesMatching('events*')).toEqual(['events_log', 'events_rollover__2020-02']);
    });
  });

  describe('cluster settings and write log', () => {
    it('stores persistent settings and records writes', async () => {
      await client.putPersistentClusterSettings({ 'action.auto_create_index': '+.kibana*' });

      expect(await client.getFlatClusterSettings()).toEqual({
        persistent: { 'action.auto_create_index': '+.kibana*' },
        transient: {},
      });
      expect(client.writes).toEqual([
        {
          operation: 'putPersistentClusterSettings',
          target: 'main',
          body: { 'action.auto_create_index': '+.kibana*' },
        },
      ]);

      client.clearWrites();
      expect(client.writes).toEqual([]);
    });
  });
});
