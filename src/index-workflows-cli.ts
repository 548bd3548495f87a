#!/usr/bin/env node
/**
 * index-workflows-cli.ts - bring the workflow index up to date with the corpus.
 */

import { config } from 'dotenv';
import { getConfig } from './config.js';
import { logger } from './logger.js';
import { IndexRunResult, WorkflowStats } from './types.js';
import { WorkflowCatalog } from './workflow-catalog.js';

export interface CliOptions {
  force: boolean;
  statsOnly: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  return {
    force: argv.includes('--force'),
    statsOnly: argv.includes('--stats'),
    help: argv.includes('--help') || argv.includes('-h'),
  };
}

export function formatRunResult(result: IndexRunResult): string[] {
  return [
    `Total files:  ${result.total}`,
    `Processed:    ${result.processed}`,
    `Skipped:      ${result.skipped}`,
    `Removed:      ${result.removed}`,
    `Errors:       ${result.errors}`,
  ];
}

export function formatStats(stats: WorkflowStats): string[] {
  const lines = [
    `Workflows:    ${stats.total} (${stats.active} active, ${stats.inactive} inactive)`,
    `Nodes:        ${stats.totalNodes}`,
    `Integrations: ${stats.uniqueIntegrations}`,
    `Last indexed: ${stats.lastIndexed || 'never'}`,
  ];
  for (const [trigger, count] of Object.entries(stats.triggers)) {
    lines.push(`  trigger ${trigger}: ${count}`);
  }
  for (const [level, count] of Object.entries(stats.complexity)) {
    lines.push(`  complexity ${level}: ${count}`);
  }
  return lines;
}

function printUsage() {
  console.log(`
Usage:
  npm run index              Index new and changed workflow files
  npm run index -- --force   Re-analyze every file
  npm run stats              Print index statistics only

Environment:
  WORKFLOWS_DIR      Corpus directory (default: ./workflows)
  WORKFLOW_DB_PATH   Index database (default: ./database/workflows.db)
`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    printUsage();
    return 0;
  }

  const catalog = WorkflowCatalog.fromConfig(getConfig().getAll());
  try {
    if (!options.statsOnly) {
      console.log('🔄 Indexing workflows...\n');
      const result = await catalog.indexCorpus(options.force);
      formatRunResult(result).forEach(line => console.log(line));
      logger.success(`Indexed ${result.processed} of ${result.total} workflow files`);
    }

    console.log('\n📊 Index statistics:');
    formatStats(catalog.getStats()).forEach(line => console.log(line));
    return 0;
  } finally {
    catalog.close();
  }
}

const isDirectRun =
  process.argv[1] && process.argv[1].includes('index-workflows-cli');
if (isDirectRun) {
  config();
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Indexing failed', error instanceof Error ? error : undefined);
      process.exitCode = 1;
    });
}
