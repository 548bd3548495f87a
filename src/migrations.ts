/**
 * Database migration system for managing schema versions
 */

import Database from 'better-sqlite3';
import { Logger } from './logger.js';

const logger = new Logger({ context: 'migrations' });

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
  down: (db: Database.Database) => void;
}

export interface MigrationStatus {
  current: number;
  latest: number;
  pending: Migration[];
  executed: Migration[];
}

export class MigrationManager {
  constructor(private readonly db: Database.Database) {
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  /**
   * Get the current schema version
   */
  getCurrentVersion(): number {
    const result = this.db.prepare(`
      SELECT MAX(version) as version FROM schema_migrations
    `).get() as { version: number | null };

    return result.version ?? 0;
  }

  /**
   * Run all pending migrations, each in its own transaction
   */
  runPendingMigrations(migrations: Migration[]): number {
    const currentVersion = this.getCurrentVersion();
    const pendingMigrations = migrations
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pendingMigrations.length === 0) {
      logger.debug('No pending migrations', { currentVersion });
      return 0;
    }

    logger.info(`Running ${pendingMigrations.length} migrations`, {
      from: currentVersion,
      to: pendingMigrations[pendingMigrations.length - 1].version
    });

    for (const migration of pendingMigrations) {
      try {
        const transaction = this.db.transaction(() => {
          migration.up(this.db);
          this.db.prepare(`
            INSERT INTO schema_migrations (version, name)
            VALUES (?, ?)
          `).run(migration.version, migration.name);
        });

        transaction();
        logger.debug(`Applied migration ${migration.version}: ${migration.name}`);
      } catch (error) {
        logger.error(
          `Migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error))
        );
        throw error;
      }
    }

    return pendingMigrations.length;
  }

  /**
   * Roll back to a specific version
   */
  rollback(migrations: Migration[], targetVersion: number): void {
    const currentVersion = this.getCurrentVersion();

    if (targetVersion >= currentVersion) {
      logger.warn('Target version is not behind current version', {
        current: currentVersion,
        target: targetVersion
      });
      return;
    }

    const toRollback = migrations
      .filter(m => m.version > targetVersion && m.version <= currentVersion)
      .sort((a, b) => b.version - a.version);

    logger.info(`Rolling back ${toRollback.length} migrations`, {
      from: currentVersion,
      to: targetVersion
    });

    for (const migration of toRollback) {
      try {
        const transaction = this.db.transaction(() => {
          migration.down(this.db);
          this.db.prepare(`
            DELETE FROM schema_migrations WHERE version = ?
          `).run(migration.version);
        });

        transaction();
        logger.debug(`Rolled back ${migration.version}: ${migration.name}`);
      } catch (error) {
        logger.error(
          `Rollback of migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error))
        );
        throw error;
      }
    }
  }

  getStatus(allMigrations: Migration[]): MigrationStatus {
    const current = this.getCurrentVersion();
    const latest = Math.max(...allMigrations.map(m => m.version), 0);
    const executed = allMigrations.filter(m => m.version <= current);
    const pending = allMigrations.filter(m => m.version > current);

    return { current, latest, pending, executed };
  }
}

/**
 * Schema of the workflow index.
 *
 * `workflows_fts` is a standalone FTS5 table whose rowid mirrors
 * `workflows.id`; the store writes both in one transaction.
 */
export const workflowMigrations: Migration[] = [
  {
    version: 1,
    name: 'workflows_and_fts',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS workflows (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          filename TEXT UNIQUE NOT NULL,
          path TEXT NOT NULL,
          name TEXT NOT NULL,
          folder TEXT NOT NULL DEFAULT '',
          workflow_id TEXT NOT NULL DEFAULT '',
          active INTEGER NOT NULL DEFAULT 0,
          description TEXT NOT NULL DEFAULT '',
          trigger_type TEXT NOT NULL,
          complexity TEXT NOT NULL,
          node_count INTEGER NOT NULL DEFAULT 0,
          integrations TEXT NOT NULL DEFAULT '[]',
          tags TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL DEFAULT '',
          updated_at TEXT NOT NULL DEFAULT '',
          file_hash TEXT NOT NULL,
          file_size INTEGER NOT NULL DEFAULT 0,
          analyzed_at TEXT NOT NULL
        );

        CREATE VIRTUAL TABLE IF NOT EXISTS workflows_fts USING fts5(
          filename,
          name,
          description,
          integrations,
          tags
        );
      `);
    },
    down: (db) => {
      db.exec(`
        DROP TABLE IF EXISTS workflows_fts;
        DROP TABLE IF EXISTS workflows;
      `);
    },
  },
  {
    version: 2,
    name: 'workflow_filter_indexes',
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_workflows_trigger_type ON workflows(trigger_type);
        CREATE INDEX IF NOT EXISTS idx_workflows_complexity ON workflows(complexity);
        CREATE INDEX IF NOT EXISTS idx_workflows_active ON workflows(active);
        CREATE INDEX IF NOT EXISTS idx_workflows_name ON workflows(name);
        CREATE INDEX IF NOT EXISTS idx_workflows_analyzed_at ON workflows(analyzed_at);
      `);
    },
    down: (db) => {
      db.exec(`
        DROP INDEX IF EXISTS idx_workflows_trigger_type;
        DROP INDEX IF EXISTS idx_workflows_complexity;
        DROP INDEX IF EXISTS idx_workflows_active;
        DROP INDEX IF EXISTS idx_workflows_name;
        DROP INDEX IF EXISTS idx_workflows_analyzed_at;
      `);
    },
  },
];
