#!/usr/bin/env node
/**
 * HTTP server for the workflow index
 */

import express from 'express';
import { config } from 'dotenv';
import { setupApi } from './api.js';
import { getConfig } from './config.js';
import { logger } from './logger.js';
import { ReindexRunner } from './reindex-runner.js';
import { WorkflowCatalog } from './workflow-catalog.js';

config();

const configManager = getConfig();
const validation = configManager.validate();
if (!validation.valid) {
  validation.errors.forEach(error => logger.error(`Invalid configuration: ${error}`));
  process.exit(1);
}

const appConfig = configManager.getAll();
logger.setMinLevel(appConfig.logLevel);

const catalog = WorkflowCatalog.fromConfig(appConfig);
const runner = new ReindexRunner(catalog);

const app = express();
setupApi(app, catalog, runner, { defaultPageSize: appConfig.search.defaultLimit });

const server = app.listen(appConfig.api.port, appConfig.api.host, () => {
  console.log(`\n🚀 Workflow index server running at http://${appConfig.api.host}:${appConfig.api.port}`);
  console.log(`\n📚 API endpoints:`);
  console.log(`   GET  /api/stats                         - Index statistics`);
  console.log(`   GET  /api/workflows?q=...               - Search (trigger, complexity, active_only, page, per_page)`);
  console.log(`   GET  /api/workflows/:filename           - Workflow detail with source document`);
  console.log(`   GET  /api/workflows/:filename/download  - Raw source file`);
  console.log(`   GET  /api/workflows/:filename/diagram   - Mermaid diagram`);
  console.log(`   POST /api/reindex                       - Start a background reindex`);
  console.log(`   GET  /api/reindex                       - Reindex status`);
  console.log(`   GET  /api/integrations                  - Integration list`);
  console.log(`   GET  /api/categories                    - Category sizes`);
  console.log(`   GET  /api/category-mappings             - Filename to category`);
  console.log(`   GET  /api/categories/:name/workflows    - Workflows in a category`);
});

const stats = catalog.getStats();
if (stats.total === 0) {
  logger.info('Index is empty; starting initial indexing pass');
  runner.start(false);
}

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('\n\n👋 Shutting down...');
  server.close();
  runner
    .waitForIdle()
    .then(() => {
      catalog.close();
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Shutdown failed', error instanceof Error ? error : undefined);
      process.exit(1);
    });
});
