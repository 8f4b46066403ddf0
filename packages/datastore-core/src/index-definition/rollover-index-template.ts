/**
 * @graphdex/datastore-core — Rollover index template
 *
 * A template whose records are spread across concrete indices named
 * `{name}_rollover__{suffix}`, one per time bucket of the configured
 * frequency. Custom timestamp ranges from the environment config get
 * dedicated indices named after their suffix instead.
 */

import {
  SchemaError,
  TimeSet,
  advanceOneUnit,
  fetchValueAtPath,
  formatUtc,
  nestAtPath,
  toDate,
  utcDate,
  type PlainObject,
  type TimeUnit,
} from '@graphdex/support';
import type { DatastoreClient, Mappings } from '@graphdex/search';
import { ROLLOVER_INDEX_INFIX_MARKER } from '../constants.js';
import { normalizeMappings } from '../index-config-normalizer.js';
import { IndexDefinitionBase, type IndexDefinitionAttributes, type RelatedRolloverIndicesOptions } from './base.js';
import { Index } from './index.js';
import { RolloverIndex } from './rollover-index.js';

export type RolloverFrequency = 'hourly' | 'daily' | 'monthly' | 'yearly';

const SUFFIX_FORMATS_BY_FREQUENCY: Record<RolloverFrequency, string> = {
  hourly: '%Y-%m-%d-%H',
  daily: '%Y-%m-%d',
  monthly: '%Y-%m',
  yearly: '%Y',
};

const TIME_UNITS_BY_FREQUENCY: Record<RolloverFrequency, TimeUnit> = {
  hourly: 'hour',
  daily: 'day',
  monthly: 'month',
  yearly: 'year',
};

function isRolloverFrequency(value: string): value is RolloverFrequency {
  return Object.prototype.hasOwnProperty.call(SUFFIX_FORMATS_BY_FREQUENCY, value);
}

export interface RolloverIndexTemplateAttributes extends IndexDefinitionAttributes {
  timestampFieldPath: string | null;
  frequency: string;
}

export class RolloverIndexTemplate extends IndexDefinitionBase {
  readonly timestampFieldPath: string;
  readonly frequency: RolloverFrequency;

  private indicesToPreCreate?: RolloverIndex[];

  /**
   * @throws SchemaError when the timestamp field path is missing or the frequency is unknown
   */
  constructor(attrs: RolloverIndexTemplateAttributes) {
    super(attrs);

    const { timestampFieldPath, frequency } = attrs;
    if (!timestampFieldPath || !isRolloverFrequency(frequency)) {
      throw new SchemaError("Rollover index config 'timestamp_field' or 'frequency' is invalid.");
    }

    this.timestampFieldPath = timestampFieldPath;
    this.frequency = frequency;
  }

  isRolloverIndexTemplate(): boolean {
    return true;
  }

  indexExpressionForSearch(): string {
    return this.indexNameWithSuffix('*');
  }

  /**
   * Name of the concrete index the record belongs in, based on its timestamp.
   *
   * @throws MissingValueError when the record has no value at the timestamp path
   * @throws InvalidValueError when the value is not an ISO 8601 timestamp
   */
  indexNameForWrites(record: PlainObject, opts: { timestampFieldPath?: string | null } = {}): string {
    const path = opts.timestampFieldPath ?? this.timestampFieldPath;
    return this.indexNameWithSuffix(this.rolloverIndexSuffixFor(toDate(fetchValueAtPath(record, path))));
  }

  /**
   * Concrete indices related to this template: those found in the datastore
   * plus those the environment config asks to pre-create.
   *
   * A name both found and configured keeps its position in the datastore
   * listing but uses the configured time set and setting overrides.
   */
  async relatedRolloverIndices(
    client: DatastoreClient,
    opts: RelatedRolloverIndicesOptions = {},
  ): Promise<RolloverIndex[]> {
    const configuredByName = new Map(this.rolloverIndicesToPreCreate().map((index) => [index.name, index] as const));

    const related: RolloverIndex[] = [];
    const seen = new Set<string>();
    for (const name of await client.listIndicesMatching(this.indexExpressionForSearch())) {
      const index = configuredByName.get(name) ?? this.concreteRolloverIndexFor(name, {});
      if (index) {
        related.push(index);
        seen.add(name);
      }
    }

    if (!opts.onlyIfExists) {
      for (const [name, index] of configuredByName) {
        if (!seen.has(name)) related.push(index);
      }
    }

    return related;
  }

  /**
   * The rollover index a record with this timestamp would be written to.
   * Ad hoc setting overrides win over the environment's.
   *
   * Returns null when the index's time set cannot be inferred (the timestamp
   * falls in a custom range, whose suffix is not a date).
   */
  relatedRolloverIndexForTimestamp(timestamp: string | Date, settingOverrides: PlainObject = {}): RolloverIndex | null {
    const record = nestAtPath(this.timestampFieldPath, timestamp);
    return this.concreteRolloverIndexFor(this.indexNameForWrites(record), settingOverrides);
  }

  /**
   * Indices the environment config asks for explicitly: one per
   * `setting_overrides_by_timestamp` entry, then one per custom timestamp range.
   */
  rolloverIndicesToPreCreate(): RolloverIndex[] {
    if (this.indicesToPreCreate) return this.indicesToPreCreate;

    const withOverrides = [...this.envIndexConfig.settingOverridesByTimestamp].flatMap(([timestamp, overrides]) => {
      const index = this.relatedRolloverIndexForTimestamp(timestamp, overrides);
      return index ? [index] : [];
    });

    const forCustomRanges = this.envIndexConfig.customTimestampRanges.flatMap((range) => {
      const index = this.concreteRolloverIndexFor(
        this.indexNameWithSuffix(range.indexNameSuffix),
        range.settingOverrides,
        range.timeSet,
      );
      return index ? [index] : [];
    });

    this.indicesToPreCreate = [...withOverrides, ...forCustomRanges];
    return this.indicesToPreCreate;
  }

  /**
   * Time set covered by a frequency-named rollover index, or null when the
   * suffix does not match this template's frequency or is not a valid date.
   *
   * @example
   * ```ts
   * monthly.inferTimeSetFromIndexName('things_rollover__2020-04');
   * // [2020-04-01T00:00Z, 2020-05-01T00:00Z)
   * ```
   */
  inferTimeSetFromIndexName(indexName: string): TimeSet | null {
    const suffix = indexName.split(ROLLOVER_INDEX_INFIX_MARKER).pop() ?? '';
    const parts = suffix.split('-');
    const expectedCount = SUFFIX_FORMATS_BY_FREQUENCY[this.frequency].split('-').length;

    if (parts.length !== expectedCount || parts.some((part) => !/^\d+$/.test(part))) return null;

    const [year = 0, month, day, hour] = parts.map(Number);
    const lowerBound = utcDate(year, month, day, hour);
    if (!lowerBound) return null;

    const upperBound = advanceOneUnit(lowerBound, TIME_UNITS_BY_FREQUENCY[this.frequency]);
    return TimeSet.ofRange({ gte: lowerBound, lt: upperBound });
  }

  async mappingsInDatastore(client: DatastoreClient): Promise<Mappings> {
    const template = await client.getIndexTemplate(this.name);
    return normalizeMappings(template.template?.mappings ?? {});
  }

  async deleteFromDatastore(client: DatastoreClient): Promise<void> {
    await client.deleteIndexTemplate(this.name);
    await client.deleteIndices(...(await client.listIndicesMatching(this.indexExpressionForSearch())));
  }

  private rolloverIndexSuffixFor(timestamp: Date): string {
    const customRange = this.envIndexConfig.customTimestampRangeFor(timestamp);
    if (customRange) return customRange.indexNameSuffix;

    return formatUtc(timestamp, SUFFIX_FORMATS_BY_FREQUENCY[this.frequency]);
  }

  private concreteRolloverIndexFor(
    indexName: string,
    settingOverrides: PlainObject,
    timeSet: TimeSet | null = this.inferTimeSetFromIndexName(indexName),
  ): RolloverIndex | null {
    if (!timeSet) return null;

    const envIndexConfig = this.envIndexConfig.withoutEnvOverrides().with({
      settingOverrides: { ...this.envIndexConfig.settingOverrides, ...settingOverrides },
    });

    return new RolloverIndex(new Index({ ...this.attributes, name: indexName, envIndexConfig }), timeSet);
  }

  private indexNameWithSuffix(suffix: string): string {
    return `${this.name}${ROLLOVER_INDEX_INFIX_MARKER}${suffix}`;
  }
}
