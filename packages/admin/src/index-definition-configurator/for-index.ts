/**
 * @graphdex/admin — Configurator for a concrete index
 *
 * Creates the index when it is missing. Otherwise writes settings first
 * (the call the datastore is most likely to reject) and then mappings.
 * Fields missing from the desired mappings are reported but never removed.
 */

import { diffHashes } from '@graphdex/support';
import { isStaticIndexSetting, type DatastoreClient, type IndexConfig } from '@graphdex/search';
import { normalize, type Index } from '@graphdex/datastore-core';
import { ActionReporter, type ActionOutput } from '../cluster-configurator/action-reporter.js';
import {
  MAPPING_REMOVAL_NOTE,
  performWrite,
  planConfigChanges,
  staticSettingChangeError,
  typeChangeError,
  type ConfigChanges,
} from './config-changes.js';
import type { IndexDefinitionConfigurator } from './types.js';

interface IndexState {
  exists: boolean;
  current: Required<IndexConfig>;
  changes: ConfigChanges;
}

export class ForIndex implements IndexDefinitionConfigurator {
  private readonly reporter: ActionReporter;
  private state?: Promise<IndexState>;

  constructor(
    private readonly client: DatastoreClient,
    readonly index: Index,
    private readonly envAgnosticConfig: IndexConfig,
    output: ActionOutput,
  ) {
    this.reporter = new ActionReporter(output);
  }

  async validate(): Promise<string[]> {
    const { exists, changes } = await this.loadState();
    if (!exists) return [];

    const errors: string[] = [];
    if (changes.mappingTypeChanges.length > 0) {
      errors.push(typeChangeError(changes.mappingTypeChanges, this.index.name));
    }

    const staticChanges = Object.keys(changes.settingsUpdates).filter(isStaticIndexSetting);
    if (staticChanges.length > 0) {
      errors.push(staticSettingChangeError(staticChanges, this.index.name));
    }

    return errors;
  }

  async configure(): Promise<void> {
    const { exists, current, changes } = await this.loadState();
    if (!exists) return this.createIndex(changes);

    if (Object.keys(changes.settingsUpdates).length > 0) await this.updateSettings(current, changes);

    if (changes.hasMappingUpdates) {
      await this.updateMappings(current, changes);
    } else if (changes.mappingRemovals.length > 0) {
      this.reporter.reportNote(
        this.index.name,
        `Mappings for index \`${this.index.name}\` have fields that are no longer desired:\n` +
          `${changes.mappingRemovals.join('\n')}\n\n${MAPPING_REMOVAL_NOTE}`,
      );
    }
  }

  private async createIndex(changes: ConfigChanges): Promise<void> {
    const { name } = this.index;
    await performWrite(`Creating index \`${name}\``, () =>
      this.client.createIndex({ index: name, body: changes.desired }),
    );
    this.reporter.reportAction('create_index', name, `Created index: \`${name}\``);
  }

  private async updateSettings(current: Required<IndexConfig>, changes: ConfigChanges): Promise<void> {
    const { name } = this.index;
    await performWrite(`Updating settings of index \`${name}\``, () =>
      this.client.putIndexSettings({ index: name, body: changes.settingsUpdates }),
    );

    const diff = diffHashes(current.settings, changes.desired.settings) ?? '(no diff)';
    this.reporter.reportAction('update_index_settings', name, `Updated settings for index \`${name}\`:\n${diff}`);
  }

  private async updateMappings(current: Required<IndexConfig>, changes: ConfigChanges): Promise<void> {
    const { name } = this.index;
    await performWrite(`Updating mappings of index \`${name}\``, () =>
      this.client.putIndexMapping({ index: name, body: changes.mergedMappings }),
    );

    let description = `Updated mappings for index \`${name}\`:\n${diffHashes(current.mappings, changes.desired.mappings) ?? '(no diff)'}`;
    if (changes.mappingRemovals.length > 0) description += `\n\n${MAPPING_REMOVAL_NOTE}`;
    this.reporter.reportAction('update_index_mappings', name, description);
  }

  private loadState(): Promise<IndexState> {
    this.state ??= this.fetchState();
    return this.state;
  }

  private async fetchState(): Promise<IndexState> {
    const fetched = normalize(await this.client.getIndex(this.index.name));
    const current = { mappings: fetched.mappings ?? {}, settings: fetched.settings ?? {} };

    return {
      exists: Object.keys(fetched).length > 0,
      current,
      changes: planConfigChanges(current, this.envAgnosticConfig, this.index),
    };
  }
}
