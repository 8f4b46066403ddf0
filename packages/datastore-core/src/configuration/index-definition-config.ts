/**
 * @graphdex/datastore-core — Per-environment index definition configuration
 *
 * Holds the settings from the datastore settings file that vary by
 * environment: which clusters an index lives on, setting overrides, and
 * custom timestamp ranges for rollover indices.
 */

import { z } from 'zod';
import {
  ConfigError,
  ConfigSettingNotSetError,
  InvalidValueError,
  TimeSet,
  parseIso8601,
  type PlainObject,
  type TimeRangeBounds,
} from '@graphdex/support';
import { configErrorFrom } from './zod-errors.js';

const timestampSchema = z.union([z.string(), z.date()]);
const settingsSchema = z.record(z.unknown());

const customTimestampRangeSchema = z
  .object({
    index_name_suffix: z.string().min(1),
    setting_overrides: settingsSchema.default({}),
    gt: timestampSchema.optional(),
    gte: timestampSchema.optional(),
    lt: timestampSchema.optional(),
    lte: timestampSchema.optional(),
  })
  .strict();

export const indexDefinitionConfigSchema = z
  .object({
    ignore_routing_values: z.array(z.string()).default([]),
    query_cluster: z.string().nullable().default(null),
    index_into_clusters: z.array(z.string()).nullable().default(null),
    setting_overrides: settingsSchema.default({}),
    setting_overrides_by_timestamp: z.record(settingsSchema).default({}),
    custom_timestamp_ranges: z.array(customTimestampRangeSchema).default([]),
    use_updates_for_indexing: z.boolean().default(true),
  })
  .strict();

export type RawIndexDefinitionConfig = z.input<typeof indexDefinitionConfigSchema>;

const BOUND_NAMES = ['gt', 'gte', 'lt', 'lte'] as const;

/**
 * A named time range whose records go to a dedicated rollover index
 * (`{template}_rollover__{indexNameSuffix}`) instead of the frequency-based one.
 */
export class CustomTimestampRange {
  readonly timeSet: TimeSet;

  constructor(
    readonly indexNameSuffix: string,
    readonly settingOverrides: PlainObject,
    bounds: TimeRangeBounds,
  ) {
    if (BOUND_NAMES.every((bound) => !bounds[bound])) {
      throw new ConfigSettingNotSetError(
        `Custom timestamp range with suffix \`${indexNameSuffix}\` lacks boundary definitions.`,
      );
    }

    try {
      this.timeSet = TimeSet.ofRange(bounds);
    } catch (error) {
      if (error instanceof InvalidValueError) {
        throw new ConfigError(`Custom timestamp range with suffix \`${indexNameSuffix}\` is invalid: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (this.timeSet.isEmpty()) {
      throw new ConfigError(
        `Custom timestamp range with suffix \`${indexNameSuffix}\` is invalid: no timestamps exist in it.`,
      );
    }
  }
}

export interface IndexDefinitionConfigAttributes {
  /** Routing values that are too hot to route on; records fall back to id routing */
  ignoreRoutingValues: ReadonlySet<string>;
  /** Cluster queries are sent to */
  queryCluster: string | null;
  /** Clusters records are indexed into */
  indexIntoClusters: readonly string[] | null;
  /** Index settings overriding the schema's settings in this environment */
  settingOverrides: PlainObject;
  /** ISO 8601 timestamp → setting overrides for the rollover index covering it */
  settingOverridesByTimestamp: ReadonlyMap<string, PlainObject>;
  /** Dedicated rollover indices for explicit time ranges; must be disjoint */
  customTimestampRanges: readonly CustomTimestampRange[];
  useUpdatesForIndexing: boolean;
}

export class IndexDefinitionConfig implements IndexDefinitionConfigAttributes {
  readonly ignoreRoutingValues: ReadonlySet<string>;
  readonly queryCluster: string | null;
  readonly indexIntoClusters: readonly string[] | null;
  readonly settingOverrides: PlainObject;
  readonly settingOverridesByTimestamp: ReadonlyMap<string, PlainObject>;
  readonly customTimestampRanges: readonly CustomTimestampRange[];
  readonly useUpdatesForIndexing: boolean;

  /**
   * @throws ConfigError when custom timestamp ranges overlap
   */
  constructor(attrs: IndexDefinitionConfigAttributes) {
    this.ignoreRoutingValues = new Set(attrs.ignoreRoutingValues);
    this.queryCluster = attrs.queryCluster;
    this.indexIntoClusters = attrs.indexIntoClusters;
    this.settingOverrides = attrs.settingOverrides;
    this.settingOverridesByTimestamp = attrs.settingOverridesByTimestamp;
    this.customTimestampRanges = attrs.customTimestampRanges;
    this.useUpdatesForIndexing = attrs.useUpdatesForIndexing;

    this.customTimestampRanges.forEach((range, i) => {
      for (const other of this.customTimestampRanges.slice(i + 1)) {
        if (range.timeSet.intersects(other.timeSet)) {
          throw new ConfigError(
            'Your configured `custom_timestamp_ranges` are not disjoint, as required ' +
              `(\`${range.indexNameSuffix}\` overlaps \`${other.indexNameSuffix}\`).`,
          );
        }
      }
    });
  }

  /**
   * Parse one entry of the settings file's `index_definitions` map.
   *
   * @throws ConfigError for unknown keys, invalid values or timestamps
   */
  static fromSettings(raw: unknown, name = 'index definition'): IndexDefinitionConfig {
    const result = indexDefinitionConfigSchema.safeParse(raw);
    if (!result.success) throw configErrorFrom(result.error, `configuration for \`${name}\``);
    const parsed = result.data;

    const settingOverridesByTimestamp = new Map<string, PlainObject>();
    for (const [timestamp, overrides] of Object.entries(parsed.setting_overrides_by_timestamp)) {
      parseTimestamp(timestamp, `setting_overrides_by_timestamp of \`${name}\``);
      settingOverridesByTimestamp.set(timestamp, overrides);
    }

    const customTimestampRanges = parsed.custom_timestamp_ranges.map((range) => {
      const bounds: TimeRangeBounds = {};
      for (const bound of BOUND_NAMES) {
        const value = range[bound];
        if (value !== undefined) {
          bounds[bound] = value instanceof Date ? value : parseTimestamp(value, `custom timestamp range \`${range.index_name_suffix}\``);
        }
      }
      return new CustomTimestampRange(range.index_name_suffix, range.setting_overrides, bounds);
    });

    return new IndexDefinitionConfig({
      ignoreRoutingValues: new Set(parsed.ignore_routing_values),
      queryCluster: parsed.query_cluster,
      indexIntoClusters: parsed.index_into_clusters,
      settingOverrides: parsed.setting_overrides,
      settingOverridesByTimestamp,
      customTimestampRanges,
      useUpdatesForIndexing: parsed.use_updates_for_indexing,
    });
  }

  with(changes: Partial<IndexDefinitionConfigAttributes>): IndexDefinitionConfig {
    return new IndexDefinitionConfig({ ...this.attributes(), ...changes });
  }

  /** The same config with every environment-specific override removed. */
  withoutEnvOverrides(): IndexDefinitionConfig {
    return this.with({ settingOverrides: {}, settingOverridesByTimestamp: new Map(), customTimestampRanges: [] });
  }

  /** First custom range (in declaration order) containing the timestamp. */
  customTimestampRangeFor(timestamp: Date): CustomTimestampRange | undefined {
    return this.customTimestampRanges.find((range) => range.timeSet.has(timestamp));
  }

  private attributes(): IndexDefinitionConfigAttributes {
    return {
      ignoreRoutingValues: this.ignoreRoutingValues,
      queryCluster: this.queryCluster,
      indexIntoClusters: this.indexIntoClusters,
      settingOverrides: this.settingOverrides,
      settingOverridesByTimestamp: this.settingOverridesByTimestamp,
      customTimestampRanges: this.customTimestampRanges,
      useUpdatesForIndexing: this.useUpdatesForIndexing,
    };
  }
}

function parseTimestamp(value: string, location: string): Date {
  try {
    return parseIso8601(value);
  } catch (error) {
    throw new ConfigError(`Invalid timestamp in ${location}: ${String(value)}`, { cause: error });
  }
}
