/**
 * Configure the datastore clusters from the settings and schema artifacts
 * named by DATASTORE_SETTINGS_PATH and SCHEMA_ARTIFACTS_DIR.
 *
 * Run with: npm run configure-datastore -- [--dry-run]
 */

import { createLogger } from '@graphdex/config';
import { errorMessage } from '@graphdex/support';
import { Admin } from '../admin.js';

const log = createLogger('admin:configure-datastore');

async function main(argv: readonly string[]): Promise<void> {
  const dryRun = argv.includes('--dry-run');
  const admin = await Admin.fromEnv();
  const target = dryRun ? admin.withDryRunDatastoreClients() : admin;

  if (dryRun) process.stdout.write('Dry run: no changes will be written to the datastore.\n');
  await target.clusterConfigurator.configureCluster(process.stdout);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  log.error({ err: error }, 'Datastore configuration failed');
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exitCode = 1;
});
