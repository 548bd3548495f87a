/**
 * Entry point for callers of the workflow index: the HTTP adapter, the CLI
 * and the reindex runner all go through one catalog instance.
 */
import { AppConfig } from './config.js';
import { WorkflowCorpus } from './corpus.js';
import { WorkflowDatabase } from './database.js';
import { EMPTY_DIAGRAM, generateMermaidDiagram } from './diagram.js';
import { WorkflowIndexer } from './indexer.js';
import { Logger } from './logger.js';
import { WorkflowSearchService } from './search.js';
import { IndexRunResult, SearchOptions, SearchPage, WorkflowDetail, WorkflowRecord, WorkflowStats } from './types.js';
import { CategoryRule, DEFAULT_CATEGORY_RULES, WorkflowAnalytics } from './workflow-analytics.js';
import { normalizeWorkflowDocument } from './workflow-document.js';

const logger = new Logger({ context: 'catalog' });

export interface WorkflowCatalogOptions {
  corpusPath: string;
  dbPath: string;
  pattern?: string;
  readConcurrency?: number;
  prune?: boolean;
  defaultLimit?: number;
  maxLimit?: number;
  categoryRules?: CategoryRule[];
}

export class WorkflowCatalog {
  readonly corpus: WorkflowCorpus;
  private readonly db: WorkflowDatabase;
  private readonly indexer: WorkflowIndexer;
  private readonly searchService: WorkflowSearchService;
  private readonly analytics: WorkflowAnalytics;

  constructor(options: WorkflowCatalogOptions) {
    this.corpus = new WorkflowCorpus(options.corpusPath, { pattern: options.pattern });
    this.db = new WorkflowDatabase(options.dbPath);
    this.indexer = new WorkflowIndexer(this.db, this.corpus, {
      readConcurrency: options.readConcurrency,
      prune: options.prune,
    });
    this.searchService = new WorkflowSearchService(this.db, {
      defaultLimit: options.defaultLimit,
      maxLimit: options.maxLimit,
    });
    this.analytics = new WorkflowAnalytics(this.db, options.categoryRules ?? DEFAULT_CATEGORY_RULES);
  }

  static fromConfig(config: AppConfig): WorkflowCatalog {
    return new WorkflowCatalog({
      corpusPath: config.corpus.path,
      dbPath: config.database.path,
      pattern: config.corpus.pattern,
      readConcurrency: config.corpus.readConcurrency,
      prune: config.corpus.prune,
      defaultLimit: config.search.defaultLimit,
      maxLimit: config.search.maxLimit,
    });
  }

  indexCorpus(forceReindex: boolean = false): Promise<IndexRunResult> {
    return this.indexer.indexCorpus(forceReindex);
  }

  search(options: SearchOptions = {}): SearchPage {
    return this.searchService.search(options);
  }

  /**
   * Stored record plus the parsed source document, or null when nothing is indexed under the name.
   */
  async getByFilename(filename: string): Promise<WorkflowDetail | null> {
    const record = this.db.getWorkflowByFilename(filename);
    if (!record) return null;
    const rawWorkflow = await this.corpus.readDocument(record.path);
    return { ...record, rawWorkflow };
  }

  getRecord(filename: string): WorkflowRecord | null {
    return this.db.getWorkflowByFilename(filename);
  }

  getStats(): WorkflowStats {
    return this.analytics.getStats();
  }

  listIntegrations(): string[] {
    return this.analytics.listIntegrations();
  }

  listCategories(): Record<string, WorkflowRecord[]> {
    return this.analytics.listCategories();
  }

  categoryNames(): string[] {
    return this.analytics.categoryNames();
  }

  categoryMapping(): Record<string, string> {
    return this.analytics.categoryMapping();
  }

  searchByCategory(category: string, limit?: number, offset?: number): SearchPage {
    return this.analytics.searchByCategory(category, limit, offset);
  }

  /**
   * Mermaid flowchart for an indexed workflow; null when the record or its source is gone.
   */
  async getDiagram(filename: string): Promise<string | null> {
    const detail = await this.getByFilename(filename);
    if (!detail || detail.rawWorkflow === null) return null;

    try {
      const document = normalizeWorkflowDocument(detail.rawWorkflow);
      return generateMermaidDiagram(document.nodes, document.connections);
    } catch (error) {
      logger.warn('Source document has no usable node graph', {
        filename,
        error: error instanceof Error ? error.message : String(error),
      });
      return EMPTY_DIAGRAM;
    }
  }

  /**
   * Source text of an indexed workflow as read from the corpus.
   */
  async getRawDocument(filename: string): Promise<string | null> {
    const record = this.db.getWorkflowByFilename(filename);
    if (!record) return null;
    return this.corpus.readText(record.path);
  }

  getIndexIntegrity(): { workflows: number; shadows: number; missingShadows: number } {
    return this.db.getIndexIntegrity();
  }

  close(): void {
    this.db.close();
  }
}
