/**
 * @graphdex/admin — Configurator for a rollover index template
 *
 * Configures every related rollover index first (creating the ones the
 * environment asks to pre-create) and only then writes the template, so no
 * index for a pre-created time bucket can be auto-created from the template
 * with the wrong settings. When no related index exists, one is created for
 * the current time so searches always have an index to hit.
 *
 * Templates accept static setting changes; they only affect indices created
 * afterwards.
 */

import { diffHashes } from '@graphdex/support';
import type { DatastoreClient, IndexConfig, IndexTemplateConfig } from '@graphdex/search';
import { normalize, type RolloverIndexTemplate } from '@graphdex/datastore-core';
import { ActionReporter, type ActionOutput } from '../cluster-configurator/action-reporter.js';
import {
  MAPPING_REMOVAL_NOTE,
  performWrite,
  planConfigChanges,
  typeChangeError,
  type ConfigChanges,
} from './config-changes.js';
import { ForIndex } from './for-index.js';
import type { IndexDefinitionConfigurator } from './types.js';

interface TemplateState {
  exists: boolean;
  currentParent: IndexTemplateConfig;
  desiredParent: IndexTemplateConfig;
  changes: ConfigChanges;
}

export class ForIndexTemplate implements IndexDefinitionConfigurator {
  private readonly reporter: ActionReporter;
  private state?: Promise<TemplateState>;
  private related?: Promise<ForIndex[]>;

  constructor(
    private readonly client: DatastoreClient,
    readonly indexTemplate: RolloverIndexTemplate,
    private readonly envAgnosticConfigParent: IndexTemplateConfig,
    private readonly output: ActionOutput,
    private readonly clock: () => Date,
  ) {
    this.reporter = new ActionReporter(output);
  }

  async validate(): Promise<string[]> {
    const errors: string[] = [];
    for (const configurator of await this.relatedIndexConfigurators()) {
      errors.push(...(await configurator.validate()));
    }

    const { exists, changes } = await this.loadState();
    if (exists && changes.mappingTypeChanges.length > 0) {
      errors.push(typeChangeError(changes.mappingTypeChanges, this.indexTemplate.name));
    }

    return errors;
  }

  async configure(): Promise<void> {
    for (const configurator of await this.relatedIndexConfigurators()) {
      await configurator.configure();
    }

    // The same call creates and replaces a template; there is no partial update.
    const state = await this.loadState();
    if (state.changes.hasMappingUpdates || Object.keys(state.changes.settingsUpdates).length > 0) {
      await this.putIndexTemplate(state);
    }
  }

  private async putIndexTemplate({ currentParent, desiredParent, changes }: TemplateState): Promise<void> {
    const { name } = this.indexTemplate;
    const body: IndexTemplateConfig = {
      ...desiredParent,
      template: { ...changes.desired, mappings: changes.mergedMappings },
    };

    await performWrite(`Writing index template \`${name}\``, () => this.client.putIndexTemplate({ name, body }));

    let description = `Updated index template: \`${name}\`:\n${diffHashes(currentParent, desiredParent) ?? '(no diff)'}`;
    if (changes.mappingRemovals.length > 0) description += `\n\n${MAPPING_REMOVAL_NOTE}`;
    this.reporter.reportAction('put_index_template', name, description);
  }

  private relatedIndexConfigurators(): Promise<ForIndex[]> {
    this.related ??= this.buildRelatedIndexConfigurators();
    return this.related;
  }

  private async buildRelatedIndexConfigurators(): Promise<ForIndex[]> {
    let indices = await this.indexTemplate.relatedRolloverIndices(this.client);
    if (indices.length === 0) {
      const forNow = this.indexTemplate.relatedRolloverIndexForTimestamp(this.clock());
      indices = forNow ? [forNow] : [];
    }

    const templateConfig = this.envAgnosticConfigParent.template ?? {};
    return indices.map((related) => new ForIndex(this.client, related.index, templateConfig, this.output));
  }

  private loadState(): Promise<TemplateState> {
    this.state ??= this.fetchState();
    return this.state;
  }

  private async fetchState(): Promise<TemplateState> {
    const fetched = await this.client.getIndexTemplate(this.indexTemplate.name);
    const currentParent: IndexTemplateConfig = fetched.template
      ? { ...fetched, template: normalize(fetched.template) }
      : fetched;

    const current: Required<IndexConfig> = {
      mappings: currentParent.template?.mappings ?? {},
      settings: currentParent.template?.settings ?? {},
    };
    const changes = planConfigChanges(current, this.envAgnosticConfigParent.template ?? {}, this.indexTemplate);

    return {
      exists: Object.keys(fetched).length > 0,
      currentParent,
      desiredParent: { ...this.envAgnosticConfigParent, template: changes.desired },
      changes,
    };
  }
}
