import { basename } from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import pLimit from 'p-limit';
import { WorkflowCorpus } from './corpus.js';
import { WorkflowDatabase } from './database.js';
import { Logger } from './logger.js';
import { AnalyzedWorkflow, IndexRunResult } from './types.js';
import { analyzeWorkflowFile } from './workflow-analyzer.js';

const logger = new Logger({ context: 'indexer' });

type AnalysisOutcome =
  | { ok: true; path: string; workflow: AnalyzedWorkflow }
  | { ok: false; path: string; error: Error };

export interface IndexerOptions {
  /** Files read and hashed in parallel. Writes stay sequential. */
  readConcurrency?: number;
  /** Delete records whose source file is no longer in the corpus. */
  prune?: boolean;
}

/**
 * Brings the index in line with the corpus.
 *
 * A file whose fingerprint matches the stored one is skipped unless the run
 * is forced. Each write is its own transaction and the loop yields to the
 * event loop after every record, so searches keep running between records
 * during a long pass. A file that fails to analyze or store is counted in
 * `errors` and the run continues.
 *
 * Records are keyed by basename. When two folders hold the same basename,
 * the first path in enumeration order is indexed and the later one is
 * counted as an error.
 *
 * Runs must not overlap; {@link ReindexRunner} serializes background runs.
 */
export class WorkflowIndexer {
  private readonly readConcurrency: number;
  private readonly prune: boolean;

  constructor(
    private readonly db: WorkflowDatabase,
    private readonly corpus: WorkflowCorpus,
    options: IndexerOptions = {}
  ) {
    this.readConcurrency = Math.max(1, options.readConcurrency ?? 12);
    this.prune = options.prune ?? true;
  }

  async indexCorpus(forceReindex: boolean = false): Promise<IndexRunResult> {
    const startedAt = Date.now();
    const files = await this.corpus.listFiles();
    const result: IndexRunResult = { processed: 0, skipped: 0, errors: 0, removed: 0, total: files.length };

    logger.info(`Indexing ${files.length} workflow files`, { root: this.corpus.rootPath, forceReindex });

    const readLimit = pLimit(this.readConcurrency);
    const outcomes = await Promise.all(
      files.map((path) => readLimit(() => this.analyze(path)))
    );

    const claimed = new Map<string, string>();

    for (const outcome of outcomes) {
      await yieldToEventLoop();

      if (!outcome.ok) {
        result.errors += 1;
        logger.warn('Skipping workflow that failed analysis', { path: outcome.path, error: outcome.error.message });
        continue;
      }

      const { workflow } = outcome;
      const owner = claimed.get(workflow.filename);
      if (owner !== undefined) {
        result.errors += 1;
        logger.warn('Skipping workflow whose filename is already indexed from another folder', {
          filename: workflow.filename,
          path: workflow.path,
          indexedPath: owner,
        });
        continue;
      }
      claimed.set(workflow.filename, workflow.path);

      try {
        const storedHash = this.db.getFileHash(workflow.filename);
        if (!forceReindex && storedHash !== null && storedHash === workflow.fileHash) {
          result.skipped += 1;
          continue;
        }

        this.db.upsertWorkflow({ ...workflow, analyzedAt: new Date().toISOString() });
        result.processed += 1;
      } catch (error) {
        result.errors += 1;
        logger.warn('Failed to store workflow', {
          path: workflow.path,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (this.prune) {
      const present = new Set(files.map((path) => basename(path)));
      for (const filename of this.db.listFilenames()) {
        if (present.has(filename)) continue;
        try {
          if (this.db.deleteWorkflow(filename)) {
            result.removed += 1;
          }
        } catch (error) {
          result.errors += 1;
          logger.warn('Failed to remove stale workflow', {
            filename,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    logger.info('Indexing complete', { ...result, durationMs: Date.now() - startedAt });
    return result;
  }

  private async analyze(path: string): Promise<AnalysisOutcome> {
    try {
      const workflow = await analyzeWorkflowFile(this.corpus.rootPath, path);
      return { ok: true, path, workflow };
    } catch (error) {
      return { ok: false, path, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}
