/**
 * Full-text search over the workflow index.
 *
 * Free text becomes an FTS5 expression in which every quoted phrase and
 * every remaining term must match (terms of two or more characters match
 * as prefixes). Structured filters are applied as exact predicates, and
 * results come back ordered by name so paging is stable.
 */
import { WorkflowDatabase, WorkflowRow, rowToWorkflow } from './database.js';
import { QueryBuildError, withStoreErrors } from './errors.js';
import { Logger } from './logger.js';
import {
  ALL_FILTER,
  Complexity,
  COMPLEXITY_LEVELS,
  isComplexity,
  isTriggerType,
  SearchOptions,
  SearchPage,
  TRIGGER_TYPES,
  TriggerType,
} from './types.js';

const logger = new Logger({ context: 'search' });

/** Characters kept from user input: letters, digits, underscore, whitespace, quotes, hyphens, apostrophes. */
const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}_\s"'-]/gu;
const WORD_CHARACTER = /[\p{L}\p{N}_]/u;
const QUOTED_PHRASE = /"([^"]+)"/g;
const MIN_PREFIX_LENGTH = 2;

export interface SearchServiceOptions {
  defaultLimit?: number;
  maxLimit?: number;
}

export interface ValidatedSearch {
  query: string;
  trigger: TriggerType | null;
  complexity: Complexity | null;
  activeOnly: boolean;
  limit: number;
  offset: number;
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '')}"`;
}

/**
 * Build the FTS5 MATCH expression for free text, or null when the input
 * carries no searchable term and every record should match.
 *
 * `slack "google sheets" ba` becomes `"google sheets" AND "slack"* AND "ba"*`.
 */
export function buildFtsQuery(text: string): string | null {
  let remaining = text.replace(DISALLOWED_CHARACTERS, ' ').trim();
  if (!remaining) return null;

  const phrases: string[] = [];
  for (const match of remaining.matchAll(QUOTED_PHRASE)) {
    if (WORD_CHARACTER.test(match[1])) {
      phrases.push(quote(match[1].trim()));
    }
  }
  remaining = remaining.replace(QUOTED_PHRASE, ' ');

  const terms = remaining
    .split(/\s+/)
    .map(term => term.replace(/"/g, ''))
    .filter(term => WORD_CHARACTER.test(term))
    .map(term => (term.length >= MIN_PREFIX_LENGTH ? `${quote(term)}*` : quote(term)));

  const allTerms = [...phrases, ...terms];
  return allTerms.length > 0 ? allTerms.join(' AND ') : null;
}

function parseFilter<T extends string>(
  value: string | undefined,
  name: string,
  allowed: readonly T[],
  guard: (candidate: unknown) => candidate is T
): T | null {
  if (value === undefined || value === ALL_FILTER) return null;
  if (guard(value)) return value;
  throw new QueryBuildError(`Invalid ${name} filter: ${value}`, {
    [name]: value,
    allowed: [ALL_FILTER, ...allowed],
  });
}

export class WorkflowSearchService {
  private readonly defaultLimit: number;
  private readonly maxLimit: number;

  constructor(
    private readonly db: WorkflowDatabase,
    options: SearchServiceOptions = {}
  ) {
    this.maxLimit = options.maxLimit ?? 100;
    this.defaultLimit = Math.min(options.defaultLimit ?? 20, this.maxLimit);
  }

  /**
   * Check filters and paging before anything touches the store.
   */
  validate(options: SearchOptions): ValidatedSearch {
    const limit = options.limit ?? this.defaultLimit;
    const offset = options.offset ?? 0;

    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxLimit) {
      throw new QueryBuildError(`limit must be an integer between 1 and ${this.maxLimit}`, { limit });
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new QueryBuildError('offset must be a non-negative integer', { offset });
    }

    return {
      query: options.query ?? '',
      trigger: parseFilter(options.trigger, 'trigger', TRIGGER_TYPES, isTriggerType),
      complexity: parseFilter(options.complexity, 'complexity', COMPLEXITY_LEVELS, isComplexity),
      activeOnly: options.activeOnly === true,
      limit,
      offset,
    };
  }

  search(options: SearchOptions = {}): SearchPage {
    const request = this.validate(options);
    const ftsQuery = buildFtsQuery(request.query);

    const whereParts: string[] = [];
    const whereParams: Array<string | number> = [];

    if (ftsQuery) {
      whereParts.push('workflows_fts MATCH ?');
      whereParams.push(ftsQuery);
    }
    if (request.trigger) {
      whereParts.push('w.trigger_type = ?');
      whereParams.push(request.trigger);
    }
    if (request.complexity) {
      whereParts.push('w.complexity = ?');
      whereParams.push(request.complexity);
    }
    if (request.activeOnly) {
      whereParts.push('w.active = 1');
    }

    const from = ftsQuery
      ? 'FROM workflows w JOIN workflows_fts ON workflows_fts.rowid = w.id'
      : 'FROM workflows w';
    const whereClause = whereParts.length > 0 ? `WHERE ${whereParts.join(' AND ')}` : '';

    logger.debug('Running workflow search', { ftsQuery, filters: whereParts.length });

    const handle = this.db.getRawHandle();
    return withStoreErrors('search', () => {
      const total = (
        handle.prepare(`SELECT COUNT(*) AS count ${from} ${whereClause}`).get(...whereParams) as { count: number }
      ).count;

      const rows = handle
        .prepare(`
          SELECT w.* ${from}
          ${whereClause}
          ORDER BY w.name ASC, w.filename ASC
          LIMIT ? OFFSET ?
        `)
        .all(...whereParams, request.limit, request.offset) as WorkflowRow[];

      return { results: rows.map(rowToWorkflow), total };
    });
  }
}
