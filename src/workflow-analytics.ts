/**
 * Read-only aggregates over the workflow index: statistics, the integration
 * list and rule-based category buckets.
 */
import { WorkflowDatabase } from './database.js';
import { QueryBuildError, withStoreErrors } from './errors.js';
import { AppError } from './logger.js';
import { SearchPage, WorkflowRecord, WorkflowStats } from './types.js';

export interface CategoryRule {
  name: string;
  /** Case-insensitive substrings matched against integration names. */
  services: string[];
}

export const OTHER_CATEGORY = 'Other';

/**
 * Evaluated in order; a workflow lands in the first category any of its integrations matches.
 */
export const DEFAULT_CATEGORY_RULES: CategoryRule[] = [
  { name: 'Communication', services: ['Slack', 'Discord', 'Telegram', 'Mattermost', 'Teams', 'Email', 'Gmail'] },
  { name: 'CRM', services: ['HubSpot', 'Salesforce', 'Pipedrive', 'Copper', 'Zoho'] },
  { name: 'Data', services: ['GoogleSheets', 'Airtable', 'Mysql', 'Postgres', 'Mongo', 'Redis', 'Sqlite'] },
  { name: 'Development', services: ['GitHub', 'GitLab', 'Jira', 'Trello', 'Asana', 'Linear'] },
  { name: 'Marketing', services: ['Mailchimp', 'Sendinblue', 'Typeform', 'Webflow', 'GoogleAnalytics'] },
  { name: 'Storage', services: ['GoogleDrive', 'Dropbox', 'OneDrive', 'AwsS3', 'Box'] },
];

type CountRow = { count: number };

export class WorkflowAnalytics {
  private readonly rules: Array<{ name: string; needles: string[] }>;

  constructor(
    private readonly db: WorkflowDatabase,
    rules: CategoryRule[] = DEFAULT_CATEGORY_RULES
  ) {
    if (rules.some(rule => rule.name === OTHER_CATEGORY)) {
      throw new AppError(`"${OTHER_CATEGORY}" is reserved for uncategorized workflows`, 'INVALID_CATEGORY_RULES', 500);
    }
    this.rules = rules.map(rule => ({
      name: rule.name,
      needles: rule.services.map(service => service.toLowerCase()),
    }));
  }

  getStats(): WorkflowStats {
    const handle = this.db.getRawHandle();

    return withStoreErrors('stats', () => {
      const total = (handle.prepare('SELECT COUNT(*) AS count FROM workflows').get() as CountRow).count;
      const active = (handle.prepare('SELECT COUNT(*) AS count FROM workflows WHERE active = 1').get() as CountRow).count;

      const triggers: Record<string, number> = {};
      const triggerRows = handle
        .prepare('SELECT trigger_type AS value, COUNT(*) AS count FROM workflows GROUP BY trigger_type ORDER BY trigger_type')
        .all() as Array<{ value: string; count: number }>;
      for (const row of triggerRows) {
        triggers[row.value] = row.count;
      }

      const complexity: Record<string, number> = {};
      const complexityRows = handle
        .prepare('SELECT complexity AS value, COUNT(*) AS count FROM workflows GROUP BY complexity ORDER BY complexity')
        .all() as Array<{ value: string; count: number }>;
      for (const row of complexityRows) {
        complexity[row.value] = row.count;
      }

      const { totalNodes, lastIndexed } = handle
        .prepare('SELECT COALESCE(SUM(node_count), 0) AS totalNodes, MAX(analyzed_at) AS lastIndexed FROM workflows')
        .get() as { totalNodes: number; lastIndexed: string | null };

      return {
        total,
        active,
        inactive: total - active,
        triggers,
        complexity,
        totalNodes,
        uniqueIntegrations: this.listIntegrations().length,
        lastIndexed: lastIndexed ?? '',
      };
    });
  }

  /**
   * Sorted, de-duplicated union of every workflow's integrations.
   */
  listIntegrations(): string[] {
    const integrations = new Set<string>();
    for (const workflow of this.db.getAllWorkflows()) {
      workflow.integrations.forEach(integration => integrations.add(integration));
    }
    return Array.from(integrations).sort();
  }

  categoryNames(): string[] {
    return [...this.rules.map(rule => rule.name), OTHER_CATEGORY];
  }

  categorize(integrations: string[]): string {
    const lowered = integrations.map(integration => integration.toLowerCase());
    const match = this.rules.find(rule =>
      lowered.some(integration => rule.needles.some(needle => integration.includes(needle)))
    );
    return match?.name ?? OTHER_CATEGORY;
  }

  /**
   * Every category (including empty ones and "Other") with its workflows, ordered by name.
   */
  listCategories(): Record<string, WorkflowRecord[]> {
    const buckets: Record<string, WorkflowRecord[]> = {};
    for (const name of this.categoryNames()) {
      buckets[name] = [];
    }
    for (const workflow of this.db.getAllWorkflows()) {
      buckets[this.categorize(workflow.integrations)].push(workflow);
    }
    return buckets;
  }

  /**
   * filename -> assigned category.
   */
  categoryMapping(): Record<string, string> {
    const mappings: Record<string, string> = {};
    for (const workflow of this.db.getAllWorkflows()) {
      mappings[workflow.filename] = this.categorize(workflow.integrations);
    }
    return mappings;
  }

  searchByCategory(category: string, limit: number = 20, offset: number = 0): SearchPage {
    if (!this.categoryNames().includes(category)) {
      throw new QueryBuildError(`Unknown category: ${category}`, { category, allowed: this.categoryNames() });
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new QueryBuildError('limit must be a positive integer', { limit });
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new QueryBuildError('offset must be a non-negative integer', { offset });
    }

    const matching = this.db
      .getAllWorkflows()
      .filter(workflow => this.categorize(workflow.integrations) === category);

    return { results: matching.slice(offset, offset + limit), total: matching.length };
  }
}
