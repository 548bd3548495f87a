import { Logger } from './logger.js';
import { IndexRunResult } from './types.js';

const logger = new Logger({ context: 'reindex' });

export interface Reindexable {
  indexCorpus(forceReindex?: boolean): Promise<IndexRunResult>;
}

export interface ReindexStatus {
  running: boolean;
  startedAt: string | null;
  finishedAt: string | null;
  lastResult: IndexRunResult | null;
  lastError: string | null;
}

export type ReindexStartResult =
  | { started: true; alreadyRunning: false }
  | { started: false; alreadyRunning: true };

/**
 * Runs {@link Reindexable.indexCorpus} in the background, at most one pass at a time.
 */
export class ReindexRunner {
  private current: Promise<void> | null = null;
  private startedAt: string | null = null;
  private finishedAt: string | null = null;
  private lastResult: IndexRunResult | null = null;
  private lastError: string | null = null;

  constructor(private readonly target: Reindexable) {}

  start(forceReindex: boolean = false): ReindexStartResult {
    if (this.current) {
      logger.info('Reindex requested while a pass is running');
      return { started: false, alreadyRunning: true };
    }

    this.startedAt = new Date().toISOString();
    this.finishedAt = null;
    this.current = this.run(forceReindex);
    return { started: true, alreadyRunning: false };
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  /**
   * Resolves once the pass in flight (if any) has finished.
   */
  async waitForIdle(): Promise<void> {
    if (this.current) {
      await this.current;
    }
  }

  getStatus(): ReindexStatus {
    return {
      running: this.isRunning(),
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      lastResult: this.lastResult,
      lastError: this.lastError,
    };
  }

  private async run(forceReindex: boolean): Promise<void> {
    try {
      this.lastResult = await this.target.indexCorpus(forceReindex);
      this.lastError = null;
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      logger.error('Background reindex failed', error instanceof Error ? error : undefined);
    } finally {
      this.finishedAt = new Date().toISOString();
      this.current = null;
    }
  }
}
