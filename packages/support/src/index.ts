/**
 * @graphdex/support — Shared primitives
 */

export {
  GraphdexError,
  ConfigError,
  ConfigSettingNotSetError,
  SchemaError,
  IndexOperationError,
  BadDatastoreRequest,
  ClusterOperationError,
  MissingValueError,
  InvalidValueError,
  errorMessage,
} from './errors.js';
export type { GraphdexErrorOptions } from './errors.js';

export { TimeSet } from './time-set.js';
export type { TimeRangeBounds, TimeSetRange } from './time-set.js';

export { advanceOneUnit, daysInMonth, formatUtc, parseIso8601, toDate, utcDate } from './time-util.js';
export type { TimeUnit } from './time-util.js';

export {
  isPlainObject,
  flattenAndStringifyKeys,
  deepMerge,
  fetchValueAtPath,
  nestAtPath,
  deepEqual,
  objectAt,
} from './hash-util.js';
export type { PlainObject } from './hash-util.js';

export { diffHashes } from './hash-differ.js';
export type { DiffOptions } from './hash-differ.js';
