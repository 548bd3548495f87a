/**
 * REST API endpoints for the workflow index
 */

import express, { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { NotFoundError, QueryBuildError } from './errors.js';
import { logger, AppError } from './logger.js';
import { ReindexRunner } from './reindex-runner.js';
import { ALL_FILTER, WorkflowRecord } from './types.js';
import { WorkflowCatalog } from './workflow-catalog.js';
import {
  ApiErrorResponse,
  ApiSuccessResponse,
  CategorySummary,
  PaginatedResponse,
  ReindexResponse,
  WorkflowDetailResponse,
  WorkflowSearchResponse,
} from './api-types.js';

export interface ApiOptions {
  /** Page size when `per_page` is absent. */
  defaultPageSize?: number;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void> | void;

const asyncHandler = (fn: AsyncRoute): RequestHandler => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => fn(req, res))
    .catch(next);
};

function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function parseIntParam(value: unknown, name: string, fallback: number): number {
  const raw = queryString(value);
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new QueryBuildError(`${name} must be an integer`, { [name]: raw });
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new QueryBuildError(`${name} is out of range`, { [name]: raw });
  }
  return parsed;
}

function parseBooleanParam(value: unknown): boolean {
  const raw = queryString(value)?.toLowerCase();
  return raw === 'true' || raw === '1';
}

function parsePage(value: unknown): number {
  const page = parseIntParam(value, 'page', 1);
  if (page < 1) {
    throw new QueryBuildError('page must be at least 1', { page });
  }
  return page;
}

function pageOffset(page: number, pageSize: number): number {
  const offset = (page - 1) * Math.max(pageSize, 0);
  if (!Number.isSafeInteger(offset)) {
    throw new QueryBuildError('page is out of range', { page });
  }
  return offset;
}

function paginated<T>(data: T[], page: number, pageSize: number, total: number): PaginatedResponse<T> {
  return {
    success: true,
    data,
    pagination: {
      page,
      pageSize,
      total,
      totalPages: Math.max(1, Math.ceil(total / pageSize)),
    },
    timestamp: new Date().toISOString(),
  };
}

function ok<T>(data: T): ApiSuccessResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

/**
 * Create REST API router
 */
export function createApiRouter(catalog: WorkflowCatalog, runner: ReindexRunner, options: ApiOptions = {}): Router {
  const router = Router();
  const defaultPageSize = options.defaultPageSize ?? 20;

  router.use(express.json());

  router.get(
    '/stats',
    asyncHandler((req, res) => {
      res.json(ok(catalog.getStats()));
    })
  );

  router.get(
    '/workflows',
    asyncHandler((req, res) => {
      const q = queryString(req.query.q) ?? '';
      const trigger = queryString(req.query.trigger) ?? ALL_FILTER;
      const complexity = queryString(req.query.complexity) ?? ALL_FILTER;
      const activeOnly = parseBooleanParam(req.query.active_only);
      const page = parsePage(req.query.page);
      const pageSize = parseIntParam(req.query.per_page, 'per_page', defaultPageSize);

      const result = catalog.search({
        query: q,
        trigger,
        complexity,
        activeOnly,
        limit: pageSize,
        offset: pageOffset(page, pageSize),
      });

      const response: WorkflowSearchResponse = {
        ...paginated(result.results, page, pageSize, result.total),
        query: { q, trigger, complexity, activeOnly },
      };
      res.json(response);
    })
  );

  router.get(
    '/workflows/:filename',
    asyncHandler(async (req, res) => {
      const detail = await catalog.getByFilename(req.params.filename);
      if (!detail) {
        throw new NotFoundError('Workflow', req.params.filename);
      }
      const response: WorkflowDetailResponse = ok(detail);
      res.json(response);
    })
  );

  router.get(
    '/workflows/:filename/download',
    asyncHandler(async (req, res) => {
      const filename = req.params.filename;
      const content = await catalog.getRawDocument(filename);
      if (content === null) {
        throw new NotFoundError('Workflow file', filename);
      }
      res.attachment(filename);
      res.type('application/json');
      res.send(content);
    })
  );

  router.get(
    '/workflows/:filename/diagram',
    asyncHandler(async (req, res) => {
      const diagram = await catalog.getDiagram(req.params.filename);
      if (diagram === null) {
        throw new NotFoundError('Workflow', req.params.filename);
      }
      res.json(ok({ diagram }));
    })
  );

  router.post(
    '/reindex',
    asyncHandler((req, res) => {
      const body: unknown = req.body;
      const force =
        parseBooleanParam(req.query.force) ||
        (typeof body === 'object' && body !== null && 'force' in body && body.force === true);

      const started = runner.start(force);
      const response: ReindexResponse = { ...started, status: runner.getStatus() };
      logger.info('Reindex requested', { force, started: started.started });
      res.status(started.started ? 202 : 409).json(response);
    })
  );

  router.get(
    '/reindex',
    asyncHandler((req, res) => {
      res.json(ok(runner.getStatus()));
    })
  );

  router.get(
    '/integrations',
    asyncHandler((req, res) => {
      const integrations = catalog.listIntegrations();
      res.json(ok({ integrations, count: integrations.length }));
    })
  );

  router.get(
    '/categories',
    asyncHandler((req, res) => {
      const categories: CategorySummary[] = Object.entries(catalog.listCategories()).map(
        ([name, workflows]: [string, WorkflowRecord[]]) => ({ name, count: workflows.length })
      );
      res.json(ok(categories));
    })
  );

  router.get(
    '/category-mappings',
    asyncHandler((req, res) => {
      res.json(ok(catalog.categoryMapping()));
    })
  );

  router.get(
    '/categories/:name/workflows',
    asyncHandler((req, res) => {
      const page = parsePage(req.query.page);
      const pageSize = parseIntParam(req.query.per_page, 'per_page', defaultPageSize);
      const result = catalog.searchByCategory(req.params.name, pageSize, pageOffset(page, pageSize));
      res.json(paginated(result.results, page, pageSize, result.total));
    })
  );

  /**
   * Error handling middleware
   */
  const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      const response: ApiErrorResponse = {
        error: err.message,
        code: err.code,
        statusCode: err.statusCode,
        details: err.context,
      };
      if (err.statusCode >= 500) {
        logger.error(`${req.method} ${req.originalUrl} failed`, err, 'api');
      }
      res.status(err.statusCode).json(response);
    } else {
      logger.error(
        `${req.method} ${req.originalUrl} failed`,
        err instanceof Error ? err : new Error(String(err)),
        'api'
      );
      const response: ApiErrorResponse = {
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
        statusCode: 500,
      };
      res.status(500).json(response);
    }
  };
  router.use(errorHandler);

  return router;
}

/**
 * Express middleware factory to attach API to app
 */
export function setupApi(
  app: express.Application,
  catalog: WorkflowCatalog,
  runner: ReindexRunner,
  options: ApiOptions = {}
): void {
  app.use('/api', createApiRouter(catalog, runner, options));

  logger.info('REST API endpoints configured');
}
