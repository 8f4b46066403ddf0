/**
 * @graphdex/admin — Reports configuration actions
 *
 * Every change the configurators make (or would make, in a dry run) is
 * written to the operator's output stream, logged, and counted.
 */

import { createLogger, type AppLogger } from '@graphdex/config';
import { indexConfigurationActionsTotal } from '@graphdex/observability';

const log = createLogger('admin:index-configurator');

/** Where action descriptions are written; `process.stdout` fits. */
export interface ActionOutput {
  write(text: string): unknown;
}

export type ConfigurationAction =
  | 'create_index'
  | 'update_index_settings'
  | 'update_index_mappings'
  | 'put_index_template';

const SEPARATOR = '='.repeat(80);

export class ActionReporter {
  constructor(
    private readonly output: ActionOutput,
    private readonly logger: AppLogger = log,
  ) {}

  reportAction(action: ConfigurationAction, target: string, description: string): void {
    this.output.write(`${description}\n${SEPARATOR}\n`);
    indexConfigurationActionsTotal.inc({ action });
    this.logger.info({ action, target }, description.split('\n', 1)[0]);
  }

  /** Report something the operator should know about that required no write. */
  reportNote(target: string, description: string): void {
    this.output.write(`${description}\n${SEPARATOR}\n`);
    this.logger.info({ target }, description.split('\n', 1)[0]);
  }
}
