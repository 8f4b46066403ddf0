/**
 * @graphdex/datastore-core — Schema artifacts
 *
 * The schema toolchain dumps two files this package consumes:
 *
 * - `runtime_metadata.yaml`: routing, rollover, default sort and field
 *   sources of each index definition.
 * - `datastore_config.yaml`: the environment-agnostic mappings and settings
 *   of every index and index template.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { IndexConfig, IndexTemplateConfig } from '@graphdex/search';
import { SELF_RELATIONSHIP_NAME } from './constants.js';
import { configErrorFrom } from './configuration/zod-errors.js';

export const RUNTIME_METADATA_FILE = 'runtime_metadata.yaml';
export const DATASTORE_CONFIG_FILE = 'datastore_config.yaml';

const jsonObjectSchema = z.record(z.unknown());

const indexDefinitionMetadataSchema = z.object({
  route_with: z.string().nullable().default('id'),
  rollover: z
    .object({
      frequency: z.string(),
      timestamp_field_path: z.string().nullable().default(null),
    })
    .nullable()
    .default(null),
  default_sort_fields: z
    .array(z.object({ field_path: z.string(), direction: z.enum(['asc', 'desc']) }))
    .default([]),
  current_sources: z.array(z.string()).default([SELF_RELATIONSHIP_NAME]),
  fields_by_path: z.record(z.object({ source: z.string().default(SELF_RELATIONSHIP_NAME) })).default({}),
});

const runtimeMetadataSchema = z.object({
  index_definitions_by_name: z.record(indexDefinitionMetadataSchema).default({}),
});

const datastoreConfigSchema = z.object({
  indices: z
    .record(
      z.object({ mappings: jsonObjectSchema.default({}), settings: jsonObjectSchema.default({}) }).passthrough(),
    )
    .default({}),
  index_templates: z
    .record(
      z
        .object({
          index_patterns: z.array(z.string()),
          template: z.object({ mappings: jsonObjectSchema.default({}), settings: jsonObjectSchema.default({}) }),
        })
        .passthrough(),
    )
    .default({}),
});

/** Rollover configuration of an index definition. */
export interface RolloverConfig {
  /** `hourly`, `daily`, `monthly` or `yearly` (anything else is a schema error) */
  frequency: string;
  /** Dotted path of the timestamp field that selects the rollover index */
  timestampFieldPath: string | null;
}

export interface SortClause {
  [fieldPath: string]: { order: 'asc' | 'desc' };
}

/**
 * Runtime metadata of one index definition.
 */
export interface IndexDefinitionMetadata {
  routeWith: string | null;
  rollover: RolloverConfig | null;
  defaultSortClauses: SortClause[];
  currentSources: ReadonlySet<string>;
  /** Field path → the source (relationship) that populates it */
  fieldsByPath: ReadonlyMap<string, { source: string }>;
}

export interface SchemaArtifacts {
  indexDefinitionMetadataByName: ReadonlyMap<string, IndexDefinitionMetadata>;
  /** Environment-agnostic config of every concrete index */
  indices: ReadonlyMap<string, IndexConfig>;
  /** Environment-agnostic config of every rollover index template */
  indexTemplates: ReadonlyMap<string, IndexTemplateConfig>;
}

/**
 * Build schema artifacts from the two parsed documents.
 *
 * @throws ConfigError when either document does not match its schema
 */
export function parseSchemaArtifacts(runtimeMetadata: unknown, datastoreConfig: unknown): SchemaArtifacts {
  const metadata = runtimeMetadataSchema.safeParse(runtimeMetadata ?? {});
  if (!metadata.success) throw configErrorFrom(metadata.error, RUNTIME_METADATA_FILE);

  const config = datastoreConfigSchema.safeParse(datastoreConfig ?? {});
  if (!config.success) throw configErrorFrom(config.error, DATASTORE_CONFIG_FILE);

  const indexDefinitionMetadataByName = new Map<string, IndexDefinitionMetadata>();
  for (const [name, raw] of Object.entries(metadata.data.index_definitions_by_name)) {
    indexDefinitionMetadataByName.set(name, {
      routeWith: raw.route_with,
      rollover: raw.rollover && {
        frequency: raw.rollover.frequency,
        timestampFieldPath: raw.rollover.timestamp_field_path,
      },
      defaultSortClauses: raw.default_sort_fields.map((field) => ({
        [field.field_path]: { order: field.direction },
      })),
      currentSources: new Set(raw.current_sources),
      fieldsByPath: new Map(Object.entries(raw.fields_by_path)),
    });
  }

  return {
    indexDefinitionMetadataByName,
    indices: new Map(Object.entries(config.data.indices)),
    indexTemplates: new Map(Object.entries(config.data.index_templates)),
  };
}

/**
 * Load schema artifacts from a directory.
 */
export async function loadSchemaArtifacts(directory: string): Promise<SchemaArtifacts> {
  const [runtimeMetadata, datastoreConfig] = await Promise.all([
    readFile(join(directory, RUNTIME_METADATA_FILE), 'utf-8'),
    readFile(join(directory, DATASTORE_CONFIG_FILE), 'utf-8'),
  ]);

  return parseSchemaArtifacts(yaml.parse(runtimeMetadata), yaml.parse(datastoreConfig));
}
