/**
 * @graphdex/datastore-core — Shared naming constants
 */

/** Separates a rollover template's name from a concrete index's time suffix. */
export const ROLLOVER_INDEX_INFIX_MARKER = '_rollover__';

/** Name of the field holding list element counts in indexed documents. */
export const LIST_COUNTS_FIELD = '__counts';

/** Source name for fields populated by the indexed type itself. */
export const SELF_RELATIONSHIP_NAME = '__self';

/** Namespace under an index mapping's `_meta` where recorded state lives. */
export const MAPPING_META_NAMESPACE = 'ElasticGraph';
