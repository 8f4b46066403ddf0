/**
 * @graphdex/support — Error taxonomy
 *
 * Every error raised by graphdex packages extends GraphdexError so callers
 * can catch the whole family with a single `instanceof` check.
 */

export interface GraphdexErrorOptions {
  /** Underlying error that triggered this one */
  cause?: unknown;
}

export class GraphdexError extends Error {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'GraphdexError';
  }
}

/** Invalid or incomplete configuration (settings file, env config, environment). */
export class ConfigError extends GraphdexError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** A required configuration setting was not provided. */
export class ConfigSettingNotSetError extends ConfigError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'ConfigSettingNotSetError';
  }
}

/** Invalid schema-derived metadata (e.g. a rollover config without a frequency). */
export class SchemaError extends GraphdexError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'SchemaError';
  }
}

/** A datastore index operation cannot be performed safely. */
export class IndexOperationError extends GraphdexError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'IndexOperationError';
  }
}

/** The datastore rejected a request as invalid (HTTP 4xx). */
export class BadDatastoreRequest extends GraphdexError {
  constructor(
    message: string,
    public readonly statusCode: number = 400,
    options?: GraphdexErrorOptions,
  ) {
    super(message, options);
    this.name = 'BadDatastoreRequest';
  }
}

/** A cluster-level operation was asked of an unknown or unusable cluster. */
export class ClusterOperationError extends GraphdexError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'ClusterOperationError';
  }
}

/** A value was looked up at a key path that is not present. */
export class MissingValueError extends GraphdexError {
  constructor(
    public readonly path: string,
    message: string = `No value at key path \`${path}\`.`,
  ) {
    super(message);
    this.name = 'MissingValueError';
  }
}

/** A value could not be parsed or is outside its allowed domain. */
export class InvalidValueError extends GraphdexError {
  constructor(message: string, options?: GraphdexErrorOptions) {
    super(message, options);
    this.name = 'InvalidValueError';
  }
}

/**
 * Extract a human readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
