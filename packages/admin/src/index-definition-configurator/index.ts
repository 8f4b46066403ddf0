/**
 * @graphdex/admin — Index definition configurators
 */

import { SchemaError } from '@graphdex/support';
import type { DatastoreClient } from '@graphdex/search';
import { RolloverIndexTemplate, type IndexDefinition, type SchemaArtifacts } from '@graphdex/datastore-core';
import type { ActionOutput } from '../cluster-configurator/action-reporter.js';
import { ForIndex } from './for-index.js';
import { ForIndexTemplate } from './for-index-template.js';
import type { IndexDefinitionConfigurator } from './types.js';

export { ForIndex } from './for-index.js';
export { ForIndexTemplate } from './for-index-template.js';
export type { IndexDefinitionConfigurator } from './types.js';

export interface BuildConfiguratorParams {
  client: DatastoreClient;
  definition: IndexDefinition;
  /** Environment-agnostic configs from the schema artifacts */
  schemaArtifacts: Pick<SchemaArtifacts, 'indices' | 'indexTemplates'>;
  output: ActionOutput;
  clock: () => Date;
}

/**
 * Pick the configurator for a definition.
 *
 * @throws SchemaError when the schema artifacts have no config for the definition
 */
export function buildIndexDefinitionConfigurator(params: BuildConfiguratorParams): IndexDefinitionConfigurator {
  const { client, definition, schemaArtifacts, output, clock } = params;

  if (definition instanceof RolloverIndexTemplate) {
    const config = schemaArtifacts.indexTemplates.get(definition.name);
    if (!config) throw missingArtifactError(definition.name, 'index_templates');
    return new ForIndexTemplate(client, definition, config, output, clock);
  }

  const config = schemaArtifacts.indices.get(definition.name);
  if (!config) throw missingArtifactError(definition.name, 'indices');
  return new ForIndex(client, definition, config, output);
}

function missingArtifactError(name: string, section: string): SchemaError {
  return new SchemaError(`The schema artifacts have no \`${section}\` entry for index definition \`${name}\`.`);
}
