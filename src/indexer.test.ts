import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { WorkflowCorpus } from './corpus.js';
import { WorkflowDatabase } from './database.js';
import { WorkflowIndexer } from './indexer.js';
import { WorkflowSearchService } from './search.js';
import { AppError } from './logger.js';
import { createTestDir, makeWorkflow, plainNodes, removeTestDir, writeWorkflow } from './test-utils/workflow-fixtures.js';

describe('WorkflowIndexer', () => {
  let tempDir: string;
  let corpusDir: string;
  let db: WorkflowDatabase;
  let indexer: WorkflowIndexer;

  beforeEach(() => {
    tempDir = createTestDir('workflow-indexer');
    corpusDir = join(tempDir, 'workflows');

    writeWorkflow(corpusDir, '0001_slack_backup.json', makeWorkflow({ nodeTypes: ['n8n-nodes-base.slack'] }));
    writeWorkflow(
      corpusDir,
      '0002_telegram_notifier.json',
      makeWorkflow({ nodeTypes: ['n8n-nodes-base.telegram', ...plainNodes(6)] })
    );
    writeWorkflow(
      corpusDir,
      'team/0003_jira_sync.json',
      makeWorkflow({ nodeTypes: ['n8n-nodes-base.webhook', 'n8n-nodes-base.jira'] })
    );

    db = new WorkflowDatabase(join(tempDir, 'workflows.db'));
    indexer = new WorkflowIndexer(db, new WorkflowCorpus(corpusDir), { readConcurrency: 2 });
  });

  afterEach(() => {
    db.close();
    removeTestDir(tempDir);
  });

  it('indexes every file on the first run', async () => {
    const result = await indexer.indexCorpus();

    expect(result).toEqual({ processed: 3, skipped: 0, errors: 0, removed: 0, total: 3 });
    expect(db.listFilenames()).toEqual(['0001_slack_backup.json', '0002_telegram_notifier.json', '0003_jira_sync.json']);
    expect(db.getIndexIntegrity()).toEqual({ workflows: 3, shadows: 3, missingShadows: 0 });
  });

  it('records the corpus-relative path and folder', async () => {
    await indexer.indexCorpus();

    const nested = db.getWorkflowByFilename('0003_jira_sync.json');
    expect(nested?.path).toBe('team/0003_jira_sync.json');
    expect(nested?.folder).toBe('team');
    expect(nested?.triggerType).toBe('Webhook');
    expect(nested?.analyzedAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('skips unchanged files on the next run', async () => {
    await indexer.indexCorpus();
    const second = await indexer.indexCorpus(false);

    expect(second).toEqual({ processed: 0, skipped: 3, errors: 0, removed: 0, total: 3 });
  });

  it('reprocesses everything when forced', async () => {
    await indexer.indexCorpus();
    const forced = await indexer.indexCorpus(true);

    expect(forced).toEqual({ processed: 3, skipped: 0, errors: 0, removed: 0, total: 3 });
  });

  it('reprocesses exactly the file whose bytes changed', async () => {
    await indexer.indexCorpus();
    const before = db.getFileHash('0001_slack_backup.json');

    writeWorkflow(
      corpusDir,
      '0001_slack_backup.json',
      makeWorkflow({ nodeTypes: ['n8n-nodes-base.slack'], tags: ['nightly'] })
    );
    const result = await indexer.indexCorpus();

    expect(result).toEqual({ processed: 1, skipped: 2, errors: 0, removed: 0, total: 3 });
    expect(db.getFileHash('0001_slack_backup.json')).not.toBe(before);
    expect(db.getWorkflowByFilename('0001_slack_backup.json')?.tags).toEqual(['nightly']);
  });

  it('counts unreadable documents as errors and keeps going', async () => {
    writeFileSync(join(corpusDir, '0004_broken.json'), '{"nodes": [');
    writeFileSync(join(corpusDir, '0005_list.json'), '[1, 2]');

    const result = await indexer.indexCorpus();

    expect(result).toEqual({ processed: 3, skipped: 0, errors: 2, removed: 0, total: 5 });
    expect(db.getWorkflowByFilename('0004_broken.json')).toBeNull();
  });

  it('removes records whose files are gone', async () => {
    await indexer.indexCorpus();
    unlinkSync(join(corpusDir, '0001_slack_backup.json'));

    const result = await indexer.indexCorpus();

    expect(result).toEqual({ processed: 0, skipped: 2, errors: 0, removed: 1, total: 2 });
    expect(db.getWorkflowByFilename('0001_slack_backup.json')).toBeNull();
    expect(db.getIndexIntegrity()).toEqual({ workflows: 2, shadows: 2, missingShadows: 0 });
  });

  it('keeps stale records when pruning is off', async () => {
    const keeping = new WorkflowIndexer(db, new WorkflowCorpus(corpusDir), { prune: false });
    await keeping.indexCorpus();
    unlinkSync(join(corpusDir, '0001_slack_backup.json'));

    const result = await keeping.indexCorpus();

    expect(result.removed).toBe(0);
    expect(db.getWorkflowByFilename('0001_slack_backup.json')).not.toBeNull();
  });

  it('indexes only the first of two files sharing a basename', async () => {
    writeWorkflow(corpusDir, 'a/0001_dup.json', makeWorkflow({ nodeTypes: ['n8n-nodes-base.slack'] }));
    writeWorkflow(corpusDir, 'b/0001_dup.json', makeWorkflow({ nodeTypes: ['n8n-nodes-base.jira'] }));

    const first = await indexer.indexCorpus(false);
    const second = await indexer.indexCorpus(false);

    expect(first).toEqual({ processed: 4, skipped: 0, errors: 1, removed: 0, total: 5 });
    expect(second).toEqual({ processed: 0, skipped: 4, errors: 1, removed: 0, total: 5 });
    expect(db.getWorkflowByFilename('0001_dup.json')?.path).toBe('a/0001_dup.json');
  });

  it('lets searches run between record writes', async () => {
    const search = new WorkflowSearchService(db);
    const observed: number[] = [];
    let finished = false;

    const poll = () => {
      if (finished) return;
      observed.push(search.search({}).total);
      setImmediate(poll);
    };
    setImmediate(poll);

    const result = await indexer.indexCorpus();
    finished = true;

    expect(result.processed).toBe(3);
    expect(observed.some(total => total > 0 && total < 3)).toBe(true);
  });

  it('ignores files that do not match the pattern', async () => {
    writeFileSync(join(corpusDir, 'README.md'), '# notes');

    const result = await indexer.indexCorpus();
    expect(result.total).toBe(3);
  });

  it('rejects a corpus root that does not exist', async () => {
    const missing = new WorkflowIndexer(db, new WorkflowCorpus(join(tempDir, 'nowhere')));

    await expect(missing.indexCorpus()).rejects.toBeInstanceOf(AppError);
    await expect(missing.indexCorpus()).rejects.toMatchObject({ code: 'INVALID_CORPUS_PATH', statusCode: 400 });
  });
});
