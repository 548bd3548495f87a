/**
 * SQLite store for the workflow index
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { withStoreErrors } from './errors.js';
import { Logger } from './logger.js';
import { MigrationManager, workflowMigrations } from './migrations.js';
import { isComplexity, isTriggerType, WorkflowRecord } from './types.js';

const logger = new Logger({ context: 'database' });

/** Shape of a row in the `workflows` table. */
export interface WorkflowRow {
  id: number;
  filename: string;
  path: string;
  name: string;
  folder: string;
  workflow_id: string;
  active: number;
  description: string;
  trigger_type: string;
  complexity: string;
  node_count: number;
  integrations: string;
  tags: string;
  created_at: string;
  updated_at: string;
  file_hash: string;
  file_size: number;
  analyzed_at: string;
}

function parseJsonArray(value: string | null): string[] {
  if (!value) return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.map(entry => String(entry)) : [];
  } catch {
    logger.warn('Stored JSON array could not be parsed', { value });
    return [];
  }
}

export function rowToWorkflow(row: WorkflowRow): WorkflowRecord {
  return {
    filename: row.filename,
    path: row.path,
    name: row.name,
    folder: row.folder,
    workflowId: row.workflow_id,
    active: row.active === 1,
    triggerType: isTriggerType(row.trigger_type) ? row.trigger_type : 'Manual',
    complexity: isComplexity(row.complexity) ? row.complexity : 'low',
    nodeCount: row.node_count,
    integrations: parseJsonArray(row.integrations),
    tags: parseJsonArray(row.tags),
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    fileHash: row.file_hash,
    fileSize: row.file_size,
    analyzedAt: row.analyzed_at,
  };
}

/**
 * Owns the connection for its whole lifecycle: the constructor opens the
 * file and applies pending migrations, {@link close} releases it.
 *
 * Every write to `workflows` is paired with the matching write to
 * `workflows_fts` inside a single transaction, so readers never see a
 * record without its shadow row or the reverse.
 */
export class WorkflowDatabase {
  private db: Database.Database;
  private readonly statements: {
    upsert: Database.Statement;
    deleteFts: Database.Statement;
    insertFts: Database.Statement;
    deleteWorkflow: Database.Statement;
    byFilename: Database.Statement;
    hashByFilename: Database.Statement;
    allFilenames: Database.Statement;
    allWorkflows: Database.Statement;
  };

  constructor(dbPath: string = './database/workflows.db') {
    this.db = withStoreErrors('open', () => {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      return db;
    });

    withStoreErrors('migrate', () => {
      new MigrationManager(this.db).runPendingMigrations(workflowMigrations);
    });

    this.statements = withStoreErrors('prepare', () => ({
      upsert: this.db.prepare(`
        INSERT INTO workflows (
          filename, path, name, folder, workflow_id, active, description,
          trigger_type, complexity, node_count, integrations, tags,
          created_at, updated_at, file_hash, file_size, analyzed_at
        ) VALUES (
          @filename, @path, @name, @folder, @workflowId, @active, @description,
          @triggerType, @complexity, @nodeCount, @integrations, @tags,
          @createdAt, @updatedAt, @fileHash, @fileSize, @analyzedAt
        )
        ON CONFLICT(filename) DO UPDATE SET
          path = excluded.path,
          name = excluded.name,
          folder = excluded.folder,
          workflow_id = excluded.workflow_id,
          active = excluded.active,
          description = excluded.description,
          trigger_type = excluded.trigger_type,
          complexity = excluded.complexity,
          node_count = excluded.node_count,
          integrations = excluded.integrations,
          tags = excluded.tags,
          created_at = excluded.created_at,
          updated_at = excluded.updated_at,
          file_hash = excluded.file_hash,
          file_size = excluded.file_size,
          analyzed_at = excluded.analyzed_at
        RETURNING id
      `),
      deleteFts: this.db.prepare('DELETE FROM workflows_fts WHERE rowid = ?'),
      insertFts: this.db.prepare(`
        INSERT INTO workflows_fts (rowid, filename, name, description, integrations, tags)
        VALUES (?, ?, ?, ?, ?, ?)
      `),
      deleteWorkflow: this.db.prepare('DELETE FROM workflows WHERE filename = ? RETURNING id'),
      byFilename: this.db.prepare('SELECT * FROM workflows WHERE filename = ?'),
      hashByFilename: this.db.prepare('SELECT file_hash FROM workflows WHERE filename = ?'),
      allFilenames: this.db.prepare('SELECT filename FROM workflows ORDER BY filename'),
      allWorkflows: this.db.prepare('SELECT * FROM workflows ORDER BY name, filename'),
    }));
  }

  /**
   * Insert or replace the record keyed by filename, together with its shadow row.
   */
  upsertWorkflow(record: WorkflowRecord): number {
    const integrations = JSON.stringify(record.integrations);
    const tags = JSON.stringify(record.tags);

    const transaction = this.db.transaction(() => {
      const { id } = this.statements.upsert.get({
        filename: record.filename,
        path: record.path,
        name: record.name,
        folder: record.folder,
        workflowId: record.workflowId,
        active: record.active ? 1 : 0,
        description: record.description,
        triggerType: record.triggerType,
        complexity: record.complexity,
        nodeCount: record.nodeCount,
        integrations,
        tags,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
        fileHash: record.fileHash,
        fileSize: record.fileSize,
        analyzedAt: record.analyzedAt,
      }) as { id: number };

      this.statements.deleteFts.run(id);
      this.statements.insertFts.run(id, record.filename, record.name, record.description, integrations, tags);
      return id;
    });

    return withStoreErrors('upsert', () => transaction());
  }

  /**
   * Remove a record and its shadow row. Returns false when nothing matched.
   */
  deleteWorkflow(filename: string): boolean {
    const transaction = this.db.transaction(() => {
      const deleted = this.statements.deleteWorkflow.get(filename) as { id: number } | undefined;
      if (!deleted) return false;
      this.statements.deleteFts.run(deleted.id);
      return true;
    });

    return withStoreErrors('delete', () => transaction());
  }

  getWorkflowByFilename(filename: string): WorkflowRecord | null {
    return withStoreErrors('read', () => {
      const row = this.statements.byFilename.get(filename) as WorkflowRow | undefined;
      return row ? rowToWorkflow(row) : null;
    });
  }

  /**
   * Stored fingerprint for a filename, or null when it has never been indexed.
   */
  getFileHash(filename: string): string | null {
    return withStoreErrors('read', () => {
      const row = this.statements.hashByFilename.get(filename) as { file_hash: string } | undefined;
      return row?.file_hash ?? null;
    });
  }

  listFilenames(): string[] {
    return withStoreErrors('read', () =>
      (this.statements.allFilenames.all() as Array<{ filename: string }>).map(row => row.filename)
    );
  }

  /**
   * Every record, ordered by name.
   */
  getAllWorkflows(): WorkflowRecord[] {
    return withStoreErrors('read', () =>
      (this.statements.allWorkflows.all() as WorkflowRow[]).map(rowToWorkflow)
    );
  }

  /**
   * Row counts of the primary and shadow tables plus records lacking a shadow row.
   */
  getIndexIntegrity(): { workflows: number; shadows: number; missingShadows: number } {
    return withStoreErrors('read', () => {
      const counts = this.db.prepare(`
        SELECT
          (SELECT COUNT(*) FROM workflows) AS workflows,
          (SELECT COUNT(*) FROM workflows_fts) AS shadows,
          (SELECT COUNT(*) FROM workflows w
            WHERE NOT EXISTS (SELECT 1 FROM workflows_fts f WHERE f.rowid = w.id)) AS missingShadows
      `).get() as { workflows: number; shadows: number; missingShadows: number };
      return counts;
    });
  }

  close() {
    this.db.close();
  }

  /**
   * Return the shared sqlite handle for the search and analytics modules.
   */
  getRawHandle(): Database.Database {
    return this.db;
  }
}
