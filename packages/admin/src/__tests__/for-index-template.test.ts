import { describe, it, expect, beforeEach } from 'vitest';
import { MockDatastoreClient } from '@graphdex/search';
import type { PlainObject } from '@graphdex/support';
import { MAPPING_REMOVAL_NOTE } from '../index-definition-configurator/config-changes.js';
import {
  OutputCapture,
  buildCore,
  configuratorFor,
  mainEnvConfig,
  thingsMetadata,
  thingsTemplateConfig,
  writesTo,
} from './helpers.js';

let client: MockDatastoreClient;

interface ThingsOptions {
  template?: PlainObject;
  envConfig?: PlainObject;
}

function thingsCore(opts: ThingsOptions = {}) {
  return buildCore({
    clients: [client],
    indexDefinitions: { things: opts.envConfig ?? mainEnvConfig },
    runtimeMetadata: { things: thingsMetadata },
    indexTemplates: { things: opts.template ?? thingsTemplateConfig() },
  });
}

async function configure(opts: ThingsOptions = {}, output = new OutputCapture()): Promise<void> {
  await configuratorFor(thingsCore(opts), 'things', output).configure();
}

async function validate(opts: ThingsOptions = {}): Promise<string[]> {
  return configuratorFor(thingsCore(opts), 'things').validate();
}

beforeEach(() => {
  client = new MockDatastoreClient('main');
});

// ─── Creation ───────────────────────────────────────────────────────────

describe('a template with no rollover indices yet', () => {
  it('creates the index for the current time before writing the template', async () => {
    await configure();

    expect(writesTo(client)).toEqual([
      ['createIndex', 'things_rollover__2020-04'],
      ['putIndexTemplate', 'things'],
    ]);
  });

  it('writes the template with normalized settings and recorded sources', async () => {
    await configure();

    expect(await client.getIndexTemplate('things')).toEqual({
      index_patterns: ['things_rollover__*'],
      template: {
        mappings: {
          dynamic: 'strict',
          properties: { id: { type: 'keyword' }, created_at: { type: 'date' } },
          _meta: { ElasticGraph: { sources: ['__self'] } },
        },
        settings: { 'index.number_of_shards': '2' },
      },
    });
  });

  it('writes nothing on a second run', async () => {
    await configure();
    client.clearWrites();

    await configure();

    expect(client.writes).toEqual([]);
  });
});

describe('pre-created rollover indices', () => {
  const envConfig = {
    ...mainEnvConfig,
    setting_overrides_by_timestamp: { '2020-01-01T00:00:00Z': { number_of_shards: 3 } },
    custom_timestamp_ranges: [
      { index_name_suffix: 'before_2015', lt: '2015-01-01T00:00:00Z', setting_overrides: { number_of_shards: 1 } },
    ],
  };

  it('creates configured indices before the template, and no index for now', async () => {
    await configure({ envConfig });

    expect(writesTo(client)).toEqual([
      ['createIndex', 'things_rollover__2020-01'],
      ['createIndex', 'things_rollover__before_2015'],
      ['putIndexTemplate', 'things'],
    ]);
    expect(await client.listIndicesMatching('things_rollover__*')).toEqual([
      'things_rollover__2020-01',
      'things_rollover__before_2015',
    ]);
  });

  it('applies the overrides of each configured index', async () => {
    await configure({ envConfig });

    const january = await client.getIndex('things_rollover__2020-01');
    const before2015 = await client.getIndex('things_rollover__before_2015');
    expect(january.settings?.['index.number_of_shards']).toBe('3');
    expect(before2015.settings?.['index.number_of_shards']).toBe('1');
  });

  it('writes nothing on a second run', async () => {
    await configure({ envConfig });
    client.clearWrites();

    await configure({ envConfig });

    expect(client.writes).toEqual([]);
  });
});

// ─── Updates ────────────────────────────────────────────────────────────

describe('updating an existing template', () => {
  beforeEach(async () => {
    await configure();
    client.clearWrites();
  });

  it('adds new fields to related indices before the template', async () => {
    await configure({
      template: thingsTemplateConfig({
        id: { type: 'keyword' },
        created_at: { type: 'date' },
        color: { type: 'keyword' },
      }),
    });

    expect(writesTo(client)).toEqual([
      ['putIndexMapping', 'things_rollover__2020-04'],
      ['putIndexTemplate', 'things'],
    ]);
    const { mappings } = await client.getIndex('things_rollover__2020-04');
    expect(mappings?.properties).toHaveProperty('color', { type: 'keyword' });
  });

  it('adds and then removes `meta` on related indices and the template', async () => {
    const withMeta = {
      template: thingsTemplateConfig({ id: { type: 'keyword', meta: { origin: 'upstream' } }, created_at: { type: 'date' } }),
    };
    const bothWrites = [
      ['putIndexMapping', 'things_rollover__2020-04'],
      ['putIndexTemplate', 'things'],
    ];

    await configure(withMeta);
    expect(writesTo(client)).toEqual(bothWrites);
    const { mappings } = await client.getIndex('things_rollover__2020-04');
    expect(mappings?.properties).toHaveProperty('id', { type: 'keyword', meta: { origin: 'upstream' } });

    client.clearWrites();
    await configure(withMeta);
    expect(client.writes).toEqual([]);

    await configure();
    expect(writesTo(client)).toEqual(bothWrites);
    const template = await client.getIndexTemplate('things');
    expect(template.template?.mappings?.properties).toHaveProperty('id', { type: 'keyword' });

    client.clearWrites();
    await configure();
    expect(client.writes).toEqual([]);
  });

  it('keeps removed fields in the template it writes', async () => {
    const output = new OutputCapture();
    await configure(
      { template: thingsTemplateConfig({ id: { type: 'keyword' }, color: { type: 'keyword' } }) },
      output,
    );

    const template = await client.getIndexTemplate('things');
    expect(template.template?.mappings).toEqual({
      dynamic: 'strict',
      properties: { id: { type: 'keyword' }, created_at: { type: 'date' }, color: { type: 'keyword' } },
      _meta: { ElasticGraph: { sources: ['__self'] } },
    });
    expect(output.text).toContain(`Updated index template: \`things\`:\n`);
    expect(output.text).toContain(MAPPING_REMOVAL_NOTE);
  });

  it('reports field type changes on related indices and the template', async () => {
    const errors = await validate({
      template: thingsTemplateConfig({ id: { type: 'keyword' }, created_at: { type: 'keyword' } }),
    });

    const message = (name: string) =>
      'The datastore does not support modifying the type of a field from an existing index definition. ' +
      `You are attempting to update type of fields (["properties.created_at.type"]) from the ${name} index definition.`;
    expect(errors).toEqual([message('things_rollover__2020-04'), message('things')]);
  });

  it('rejects a static setting change that would reach an existing index', async () => {
    const errors = await validate({ template: thingsTemplateConfig(undefined, { 'index.number_of_shards': 47 }) });

    expect(errors).toEqual([
      'The datastore does not support modifying static settings of an existing index. ' +
        'You are attempting to update static settings (["index.number_of_shards"]) of the things_rollover__2020-04 index.',
    ]);
  });
});

describe('a static setting change on the template alone', () => {
  // Pins the existing index's shard count so only future indices change.
  const envConfig = {
    ...mainEnvConfig,
    setting_overrides_by_timestamp: { '2020-04-01T00:00:00Z': { number_of_shards: 2 } },
  };

  it('is accepted and only rewrites the template', async () => {
    await configure({ envConfig });
    client.clearWrites();

    const changed = { envConfig, template: thingsTemplateConfig(undefined, { 'index.number_of_shards': 47 }) };
    expect(await validate(changed)).toEqual([]);

    await configure(changed);

    expect(writesTo(client)).toEqual([['putIndexTemplate', 'things']]);
    const template = await client.getIndexTemplate('things');
    expect(template.template?.settings).toEqual({ 'index.number_of_shards': '47' });
  });
});
