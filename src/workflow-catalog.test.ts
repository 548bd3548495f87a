import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_CONFIG } from './config.js';
import { EMPTY_DIAGRAM } from './diagram.js';
import { createTestDir, makeWorkflow, removeTestDir, writeWorkflow } from './test-utils/workflow-fixtures.js';
import { analyzeWorkflowFile } from './workflow-analyzer.js';
import { WorkflowCatalog } from './workflow-catalog.js';

describe('WorkflowCatalog', () => {
  let tempDir: string;
  let corpusDir: string;
  let catalog: WorkflowCatalog;

  beforeEach(async () => {
    tempDir = createTestDir('workflow-catalog');
    corpusDir = join(tempDir, 'workflows');

    writeWorkflow(
      corpusDir,
      'ops/0001_gmail_digest.json',
      makeWorkflow({
        id: 'wf-1',
        active: true,
        nodeTypes: ['n8n-nodes-base.cron', 'n8n-nodes-base.gmail'],
        connections: { 'Node 1': { main: [[{ node: 'Node 2', type: 'main', index: 0 }]] } },
        tags: ['daily'],
      })
    );
    writeWorkflow(corpusDir, '0002_empty.json', makeWorkflow());

    catalog = new WorkflowCatalog({ corpusPath: corpusDir, dbPath: join(tempDir, 'workflows.db') });
    await catalog.indexCorpus();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    catalog.close();
    removeTestDir(tempDir);
  });

  it('returns the stored record with every field the analyzer derives', async () => {
    const standalone = await analyzeWorkflowFile(corpusDir, 'ops/0001_gmail_digest.json');
    const detail = await catalog.getByFilename('0001_gmail_digest.json');

    expect(detail).toMatchObject(standalone);
    expect(detail?.rawWorkflow).toMatchObject({ id: 'wf-1', active: true, tags: ['daily'] });
  });

  it('returns null for a filename that was never indexed', async () => {
    expect(await catalog.getByFilename('missing.json')).toBeNull();
    expect(catalog.getRecord('missing.json')).toBeNull();
    expect(await catalog.getDiagram('missing.json')).toBeNull();
    expect(await catalog.getRawDocument('missing.json')).toBeNull();
  });

  it('attaches a null document once the source is gone', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    unlinkSync(join(corpusDir, 'ops', '0001_gmail_digest.json'));

    const detail = await catalog.getByFilename('0001_gmail_digest.json');
    expect(detail?.name).toBe('Gmail Digest');
    expect(detail?.rawWorkflow).toBeNull();
    expect(await catalog.getDiagram('0001_gmail_digest.json')).toBeNull();
  });

  it('renders diagrams from the source document', async () => {
    expect(await catalog.getDiagram('0001_gmail_digest.json')).toBe(
      ['graph TD', '    Node_1["Node 1\\n(cron)"]', '    Node_2["Node 2\\n(gmail)"]', '    Node_1 --> Node_2'].join('\n')
    );
    expect(await catalog.getDiagram('0002_empty.json')).toBe(EMPTY_DIAGRAM);
  });

  it('falls back to the placeholder diagram when the source is no longer an object', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeFileSync(join(corpusDir, '0002_empty.json'), '[]');

    expect(await catalog.getDiagram('0002_empty.json')).toBe(EMPTY_DIAGRAM);
  });

  it('returns the raw source text', async () => {
    writeFileSync(join(corpusDir, '0002_empty.json'), '{"name": "edited"}');

    expect(await catalog.getRawDocument('0002_empty.json')).toBe('{"name": "edited"}');
  });

  it('delegates aggregate views', () => {
    expect(catalog.getStats().total).toBe(2);
    expect(catalog.listIntegrations()).toEqual(['Cron', 'Gmail']);
    expect(catalog.categoryMapping()).toEqual({
      '0001_gmail_digest.json': 'Communication',
      '0002_empty.json': 'Other',
    });
    expect(catalog.listCategories().Other.map(workflow => workflow.filename)).toEqual(['0002_empty.json']);
    expect(catalog.searchByCategory('Communication').total).toBe(1);
    expect(catalog.categoryNames()).toContain('Other');
    expect(catalog.getIndexIntegrity()).toEqual({ workflows: 2, shadows: 2, missingShadows: 0 });
  });

  it('builds from application config', async () => {
    const fromConfig = WorkflowCatalog.fromConfig({
      ...DEFAULT_CONFIG,
      corpus: { ...DEFAULT_CONFIG.corpus, path: corpusDir, pattern: 'ops/**/*.json' },
      database: { path: join(tempDir, 'configured.db') },
      search: { defaultLimit: 1, maxLimit: 5 },
    });

    try {
      const result = await fromConfig.indexCorpus();
      expect(result.total).toBe(1);
      expect(fromConfig.search({}).results).toHaveLength(1);
      expect(() => fromConfig.search({ limit: 6 })).toThrow('limit must be an integer between 1 and 5');
    } finally {
      fromConfig.close();
    }
  });
});
