import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { config } from 'dotenv';
import { MigrationManager, workflowMigrations } from '../src/migrations.js';
import { logger } from '../src/logger.js';

config();

const databasePath = process.env.WORKFLOW_DB_PATH || './database/workflows.db';
const rollbackTo = process.argv.includes('--rollback')
  ? Number.parseInt(process.argv[process.argv.indexOf('--rollback') + 1] ?? '0', 10)
  : null;

mkdirSync(dirname(databasePath), { recursive: true });
const db = new Database(databasePath);
const manager = new MigrationManager(db);

try {
  if (rollbackTo !== null) {
    manager.rollback(workflowMigrations, rollbackTo);
    logger.success(`Rolled back to schema version ${rollbackTo}`);
  } else {
    const applied = manager.runPendingMigrations(workflowMigrations);
    logger.success(`Database migrations are up to date (${applied} applied)`);
  }
  const status = manager.getStatus(workflowMigrations);
  logger.info('Schema status', {
    current: status.current,
    latest: status.latest,
    pending: status.pending.map(migration => migration.name),
  }, 'MigrationScript');
} catch (error) {
  logger.error('Migration run failed', error instanceof Error ? error : undefined, 'MigrationScript');
  process.exitCode = 1;
} finally {
  db.close();
}
