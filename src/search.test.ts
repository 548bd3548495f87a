import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkflowDatabase } from './database.js';
import { QueryBuildError, StoreError } from './errors.js';
import { buildFtsQuery, WorkflowSearchService } from './search.js';
import { makeWorkflow, plainNodes, WorkflowFixture } from './test-utils/workflow-fixtures.js';
import { WorkflowRecord } from './types.js';
import { analyzeWorkflowContent } from './workflow-analyzer.js';

function record(filename: string, fixture: WorkflowFixture): WorkflowRecord {
  const content = Buffer.from(JSON.stringify(makeWorkflow(fixture)));
  return { ...analyzeWorkflowContent(filename, content), analyzedAt: '2024-03-01T00:00:00.000Z' };
}

describe('buildFtsQuery', () => {
  it('quotes phrases first and prefix-expands the remaining terms', () => {
    expect(buildFtsQuery('slack "google sheets" ba')).toBe('"google sheets" AND "slack"* AND "ba"*');
  });

  it('does not prefix-expand single characters', () => {
    expect(buildFtsQuery('t')).toBe('"t"');
    expect(buildFtsQuery('a - b')).toBe('"a" AND "b"');
  });

  it('returns null when nothing searchable remains', () => {
    expect(buildFtsQuery('')).toBeNull();
    expect(buildFtsQuery('   ')).toBeNull();
    expect(buildFtsQuery('!!! ***')).toBeNull();
    expect(buildFtsQuery('"" -')).toBeNull();
  });

  it('turns stripped characters into separators', () => {
    expect(buildFtsQuery('slack!backup')).toBe('"slack"* AND "backup"*');
  });

  it('keeps hyphens, apostrophes and non-ASCII letters inside terms', () => {
    expect(buildFtsQuery("o'reilly slack-bot café")).toBe('"o\'reilly"* AND "slack-bot"* AND "café"*');
  });

  it('treats an unbalanced quote as part of a term', () => {
    expect(buildFtsQuery('slack "backup')).toBe('"slack"* AND "backup"*');
  });

  it('neutralizes query syntax keywords by quoting them', () => {
    expect(buildFtsQuery('slack OR NOT')).toBe('"slack"* AND "OR"* AND "NOT"*');
  });
});

describe('WorkflowSearchService', () => {
  let db: WorkflowDatabase;
  let service: WorkflowSearchService;

  beforeEach(() => {
    db = new WorkflowDatabase(':memory:');
    service = new WorkflowSearchService(db);

    db.upsertWorkflow(record('0001_slack_backup.json', { active: true, nodeTypes: ['n8n-nodes-base.slack'] }));
    db.upsertWorkflow(
      record('0002_slack_alerts.json', { nodeTypes: ['n8n-nodes-base.webhook', 'n8n-nodes-base.slack'] })
    );
    db.upsertWorkflow(
      record('0003_telegram_notifier.json', {
        active: true,
        nodeTypes: ['n8n-nodes-base.telegram', 'n8n-nodes-base.scheduleTrigger', ...plainNodes(5)],
      })
    );
    db.upsertWorkflow(
      record('0004_google_sheets_sync.json', { nodeTypes: ['n8n-nodes-base.googleSheets', ...plainNodes(15)] })
    );
  });

  afterEach(() => {
    db.close();
  });

  const names = (options: Parameters<WorkflowSearchService['search']>[0]) =>
    service.search(options).results.map(result => result.name);

  it('requires every term to match', () => {
    const page = service.search({ query: 'slack backup' });
    expect(page.total).toBe(1);
    expect(page.results.map(result => result.filename)).toEqual(['0001_slack_backup.json']);
  });

  it('orders results by name', () => {
    expect(names({ query: 'slack' })).toEqual(['Slack Alerts', 'Slack Backup']);
  });

  it('matches prefixes of two or more characters', () => {
    expect(names({ query: 'telegr' })).toEqual(['Telegram Notifier']);
  });

  it('matches a single character only as a whole token', () => {
    expect(service.search({ query: 't' })).toEqual({ results: [], total: 0 });
  });

  it('matches quoted phrases', () => {
    expect(names({ query: '"google sheets"' })).toEqual(['Google Sheets Sync']);
  });

  it('treats punctuation-only input as match-all', () => {
    expect(service.search({ query: '!!!' }).total).toBe(4);
  });

  it('applies structured filters', () => {
    expect(names({ trigger: 'Webhook' })).toEqual(['Slack Alerts']);
    expect(names({ complexity: 'high' })).toEqual(['Google Sheets Sync']);
    expect(names({ complexity: 'medium', trigger: 'Scheduled' })).toEqual(['Telegram Notifier']);
    expect(names({ activeOnly: true })).toEqual(['Slack Backup', 'Telegram Notifier']);
    expect(names({ query: 'slack', activeOnly: true })).toEqual(['Slack Backup']);
    expect(names({ trigger: 'all', complexity: 'all' })).toHaveLength(4);
  });

  it('pages with a stable total', () => {
    const first = service.search({ limit: 2, offset: 0 });
    const second = service.search({ limit: 2, offset: 2 });

    expect(first.total).toBe(4);
    expect(second.total).toBe(4);
    expect(first.results.map(result => result.name)).toEqual(['Google Sheets Sync', 'Slack Alerts']);
    expect(second.results.map(result => result.name)).toEqual(['Slack Backup', 'Telegram Notifier']);
    expect(service.search({ limit: 2, offset: 4 })).toEqual({ results: [], total: 4 });
  });

  it('uses the configured default page size', () => {
    const small = new WorkflowSearchService(db, { defaultLimit: 3 });
    const page = small.search({});
    expect(page.results).toHaveLength(3);
    expect(page.total).toBe(4);
  });

  it('rejects unknown filters and bad paging before querying', () => {
    expect(() => service.search({ trigger: 'Cron' })).toThrow(QueryBuildError);
    expect(() => service.search({ complexity: 'extreme' })).toThrow(QueryBuildError);
    expect(() => service.search({ limit: 0 })).toThrow(QueryBuildError);
    expect(() => service.search({ limit: 101 })).toThrow(QueryBuildError);
    expect(() => service.search({ limit: 1.5 })).toThrow(QueryBuildError);
    expect(() => service.search({ offset: -1 })).toThrow(QueryBuildError);
  });

  it('reports the rejected value with the error', () => {
    try {
      service.search({ trigger: 'Cron' });
      expect.unreachable('search should reject the filter');
    } catch (error) {
      expect(error).toBeInstanceOf(QueryBuildError);
      expect(error instanceof QueryBuildError && error.code).toBe('INVALID_FILTER');
      expect(error instanceof QueryBuildError && error.context).toEqual({
        trigger: 'Cron',
        allowed: ['all', 'Manual', 'Webhook', 'Scheduled', 'Triggered'],
      });
    }
  });

  it('surfaces store failures instead of returning an empty page', () => {
    const closed = new WorkflowDatabase(':memory:');
    const closedService = new WorkflowSearchService(closed);
    closed.close();

    expect(() => closedService.search({ query: 'slack' })).toThrow(StoreError);
  });
});
