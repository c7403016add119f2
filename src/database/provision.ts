import { DatabaseClient } from './database.client';
import { SchemaProvisioner } from './schema-provisioner';
import { CustomLoggerService } from '../common/services/logger.service';
import { toError } from '../common/utils/to-error';

/**
 * `npm run db:provision`: creates the schema and sample data in the database
 * named by the POSTGRES_* variables.
 */
async function main(): Promise<void> {
  const logger = new CustomLoggerService();
  logger.setContext('Provision');

  const db = await DatabaseClient.initialize();

  try {
    const result = await new SchemaProvisioner(db).provision();

    if (result.status === 'conflict') {
      for (const conflict of result.conflicts) {
        logger.error(
          `Table ${conflict.table} is missing columns: ${conflict.missingColumns.join(', ')}`,
        );
      }
      logger.error('Resolve the schema conflicts manually, then run provisioning again');
      process.exitCode = 1;
      return;
    }

    logger.log('Schema applied; sample data inserted into empty tables only', {
      seededTables: result.seededTables,
    });
  } finally {
    await db.disconnect();
  }
}

main().catch((error: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('Provision');
  logger.logError(toError(error), { step: 'provision' });
  process.exitCode = 1;
});
