import minimist from 'minimist';

import {EquipmentAccessApplication} from './application';
import {ConfigurationUtils} from './utils/configuration-utils';

export async function migrate(argv: string[]) {
  const args = minimist(argv.slice(2));
  const existingSchema = args['rebuild'] ? 'drop' : 'alter';

  const config = ConfigurationUtils.buildConfiguration(
    args['profile'] ?? undefined,
  );
  if (!config.allowSchemaMigration) {
    throw new Error(
      `schema migration is not allowed on profile ${config.envName}`,
    );
  }

  console.log('Migrating schemas (%s existing schema)', existingSchema);

  const app = new EquipmentAccessApplication(config);
  await app.boot();
  await app.migrateSchema({
    existingSchema,
    models: ['Equipment', 'AccessSession', 'AuditLog', 'ResourceLock'],
  });
  console.log('done');

  // Connectors usually keep a pool of opened connections,
  // this keeps the process running even after all work is done.
  // We need to exit explicitly.
  process.exit(0);
}

migrate(process.argv).catch(err => {
  console.error('Cannot migrate database schema', err);
  process.exit(1);
});
