/**
 * Public surface of the workflow index
 */

export * from './types.js';
export { AppError, Logger, logger, handleError } from './logger.js';
export type { LogLevel, LogEntry, LoggerOptions } from './logger.js';
export { AnalysisError, NotFoundError, QueryBuildError, StoreError } from './errors.js';
export { ConfigManager, DEFAULT_CONFIG, getConfig } from './config.js';
export type { AppConfig } from './config.js';
export { WorkflowCatalog } from './workflow-catalog.js';
export type { WorkflowCatalogOptions } from './workflow-catalog.js';
export { WorkflowCorpus } from './corpus.js';
export { WorkflowDatabase } from './database.js';
export { WorkflowIndexer } from './indexer.js';
export { WorkflowSearchService, buildFtsQuery } from './search.js';
export { WorkflowAnalytics, DEFAULT_CATEGORY_RULES, OTHER_CATEGORY } from './workflow-analytics.js';
export type { CategoryRule } from './workflow-analytics.js';
export { ReindexRunner } from './reindex-runner.js';
export type { ReindexStatus, ReindexStartResult } from './reindex-runner.js';
export { analyzeWorkflowContent, analyzeWorkflowFile } from './workflow-analyzer.js';
export { generateMermaidDiagram } from './diagram.js';
export { createApiRouter, setupApi } from './api.js';
