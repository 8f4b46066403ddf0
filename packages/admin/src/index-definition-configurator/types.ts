/**
 * @graphdex/admin — Index definition configurator contract
 */

/**
 * Reconciles one index definition on one datastore cluster.
 *
 * `validate` never writes. `configure` assumes `validate` returned no
 * errors; callers use a fresh instance for each phase since both memoize
 * what they read from the datastore.
 */
export interface IndexDefinitionConfigurator {
  /** Human-readable problems that would make `configure` fail */
  validate(): Promise<string[]>;
  configure(): Promise<void>;
}
