/**
 * @graphdex/datastore-core — A concrete (non-rollover) index definition
 */

import type { DatastoreClient, Mappings } from '@graphdex/search';
import { normalizeMappings } from '../index-config-normalizer.js';
import { IndexDefinitionBase } from './base.js';
import type { RolloverIndex } from './rollover-index.js';

export class Index extends IndexDefinitionBase {
  isRolloverIndexTemplate(): boolean {
    return false;
  }

  indexExpressionForSearch(): string {
    return this.name;
  }

  indexNameForWrites(): string {
    return this.name;
  }

  async relatedRolloverIndices(): Promise<RolloverIndex[]> {
    return [];
  }

  async mappingsInDatastore(client: DatastoreClient): Promise<Mappings> {
    const index = await client.getIndex(this.name);
    return normalizeMappings(index.mappings ?? {});
  }

  async deleteFromDatastore(client: DatastoreClient): Promise<void> {
    await client.deleteIndices(this.name);
  }
}
