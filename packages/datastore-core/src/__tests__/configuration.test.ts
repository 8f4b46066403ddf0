/**
 * @graphdex/datastore-core — Datastore settings parsing tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, ConfigSettingNotSetError } from '@graphdex/support';
import { DatastoreConfig } from '../configuration/datastore-config.js';
import { IndexDefinitionConfig } from '../configuration/index-definition-config.js';

const d = (iso: string): Date => new Date(iso);

describe('IndexDefinitionConfig.fromSettings', () => {
  it('applies defaults', () => {
    const config = IndexDefinitionConfig.fromSettings({});

    expect(config.queryCluster).toBeNull();
    expect(config.indexIntoClusters).toBeNull();
    expect(config.settingOverrides).toEqual({});
    expect(config.customTimestampRanges).toEqual([]);
    expect(config.useUpdatesForIndexing).toBe(true);
    expect([...config.ignoreRoutingValues]).toEqual([]);
  });

  it('rejects unknown keys', () => {
    expect(() => IndexDefinitionConfig.fromSettings({ query_clustr: 'main' }, 'widgets')).toThrow(
      'Invalid configuration for `widgets`:\n  - (root): unknown keys: query_clustr',
    );
  });

  it('rejects invalid override timestamps', () => {
    expect(() =>
      IndexDefinitionConfig.fromSettings({ setting_overrides_by_timestamp: { 'not-a-time': {} } }, 'things'),
    ).toThrow('Invalid timestamp in setting_overrides_by_timestamp of `things`: not-a-time');
  });

  // ─── Custom timestamp ranges ────────────────────────────────────────

  describe('custom_timestamp_ranges', () => {
    const withRanges = (...ranges: Array<Record<string, unknown>>) =>
      IndexDefinitionConfig.fromSettings({ custom_timestamp_ranges: ranges }, 'things');

    it('requires at least one boundary', () => {
      expect(() => withRanges({ index_name_suffix: 'old' })).toThrow(ConfigSettingNotSetError);
      expect(() => withRanges({ index_name_suffix: 'old' })).toThrow(
        'Custom timestamp range with suffix `old` lacks boundary definitions.',
      );
    });

    it('rejects two lower bounds', () => {
      expect(() =>
        withRanges({ index_name_suffix: 'old', gt: '2015-01-01', gte: '2015-01-01' }),
      ).toThrow('Custom timestamp range with suffix `old` is invalid: A time range cannot specify both `gt` and `gte`.');
    });

    it('rejects empty ranges', () => {
      expect(() => withRanges({ index_name_suffix: 'old', gte: '2020-01-02', lt: '2020-01-01' })).toThrow(
        'Custom timestamp range with suffix `old` is invalid: no timestamps exist in it.',
      );
    });

    it('rejects overlapping ranges', () => {
      expect(() =>
        withRanges(
          { index_name_suffix: 'a', lt: '2015-01-01' },
          { index_name_suffix: 'b', gte: '2014-06-01', lt: '2016-01-01' },
        ),
      ).toThrow(ConfigError);
      expect(() =>
        withRanges(
          { index_name_suffix: 'a', lt: '2015-01-01' },
          { index_name_suffix: 'b', gte: '2014-06-01', lt: '2016-01-01' },
        ),
      ).toThrow('Your configured `custom_timestamp_ranges` are not disjoint, as required (`a` overlaps `b`).');
    });

    it('finds the range containing a timestamp', () => {
      const config = withRanges(
        { index_name_suffix: 'before_2015', lt: '2015-01-01' },
        { index_name_suffix: 'y2015', gte: '2015-01-01', lte: '2015-12-31T23:59:59.999Z' },
      );

      expect(config.customTimestampRangeFor(d('2014-12-31T23:59:59.999Z'))?.indexNameSuffix).toBe('before_2015');
      expect(config.customTimestampRangeFor(d('2015-01-01T00:00:00Z'))?.indexNameSuffix).toBe('y2015');
      expect(config.customTimestampRangeFor(d('2016-01-01T00:00:00Z'))).toBeUndefined();
    });
  });

  it('drops only the environment overrides', () => {
    const config = IndexDefinitionConfig.fromSettings({
      query_cluster: 'main',
      setting_overrides: { number_of_shards: 3 },
      setting_overrides_by_timestamp: { '2020-01-01T00:00:00Z': { number_of_shards: 5 } },
      custom_timestamp_ranges: [{ index_name_suffix: 'old', lt: '2015-01-01' }],
    }).withoutEnvOverrides();

    expect(config.queryCluster).toBe('main');
    expect(config.settingOverrides).toEqual({});
    expect(config.settingOverridesByTimestamp.size).toBe(0);
    expect(config.customTimestampRanges).toEqual([]);
  });
});

describe('DatastoreConfig', () => {
  const settingsYaml = `
datastore:
  clusters:
    main:
      url: http://localhost:9200
      settings:
        cluster.max_shards_per_node: 2000
  index_definitions:
    widgets:
      query_cluster: main
      index_into_clusters: [main]
  log_traffic: true
`;

  it('parses the datastore section', () => {
    const config = DatastoreConfig.fromYaml(settingsYaml);

    expect(config.clusters.get('main')).toEqual({
      url: 'http://localhost:9200',
      settings: { 'cluster.max_shards_per_node': 2000 },
    });
    expect(config.indexDefinitions.get('widgets')?.indexIntoClusters).toEqual(['main']);
    expect(config.logTraffic).toBe(true);
    expect(config.maxClientRetries).toBe(3);
  });

  it('requires the datastore section', () => {
    expect(() => DatastoreConfig.fromYaml('other: {}')).toThrow('Settings are missing the `datastore` section.');
  });

  it('reports invalid cluster URLs by path', () => {
    expect(() => DatastoreConfig.fromYaml('datastore:\n  clusters:\n    main:\n      url: nope\n')).toThrow(
      /Invalid datastore settings:\n {2}- clusters\.main\.url: /,
    );
  });

  it('rejects unknown keys', () => {
    expect(() => DatastoreConfig.fromYaml('datastore:\n  extra: 1\n')).toThrow(
      'Invalid datastore settings:\n  - (root): unknown keys: extra',
    );
  });

  it('names the index definition whose config is invalid', () => {
    expect(() =>
      DatastoreConfig.fromYaml('datastore:\n  index_definitions:\n    widgets:\n      use_updates_for_indexing: maybe\n'),
    ).toThrow(/Invalid configuration for `widgets`:\n {2}- use_updates_for_indexing: /);
  });
});
