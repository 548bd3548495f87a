import { describe, expect, it } from 'vitest';
import { AnalysisError, NotFoundError, QueryBuildError, StoreError, withStoreErrors } from './errors.js';
import { AppError } from './logger.js';

describe('error taxonomy', () => {
  it('maps each error to its code and status', () => {
    const analysis = new AnalysisError('team/a.json', 'Unexpected end of JSON input');
    expect(analysis).toBeInstanceOf(AppError);
    expect(analysis.message).toBe('Failed to analyze team/a.json: Unexpected end of JSON input');
    expect([analysis.code, analysis.statusCode]).toEqual(['ANALYSIS_FAILED', 422]);

    const notFound = new NotFoundError('Workflow', 'missing.json');
    expect(notFound.message).toBe('Workflow not found: missing.json');
    expect([notFound.code, notFound.statusCode]).toEqual(['NOT_FOUND', 404]);

    const query = new QueryBuildError('Invalid trigger filter: Cron');
    expect([query.code, query.statusCode]).toEqual(['INVALID_FILTER', 400]);
  });

  it('keeps the driver error as the cause of a StoreError', () => {
    const cause = new Error('SQLITE_BUSY: database is locked');
    const error = new StoreError('upsert', cause);

    expect(error.message).toBe('Index store upsert failed: SQLITE_BUSY: database is locked');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ operation: 'upsert' });
  });
});

describe('withStoreErrors', () => {
  it('returns the value of a successful operation', () => {
    expect(withStoreErrors('read', () => 42)).toBe(42);
  });

  it('wraps driver exceptions', () => {
    expect(() =>
      withStoreErrors('read', () => {
        throw new TypeError('The database connection is not open');
      })
    ).toThrow(StoreError);
  });

  it('passes application errors through untouched', () => {
    const original = new QueryBuildError('bad limit');
    expect(() =>
      withStoreErrors('read', () => {
        throw original;
      })
    ).toThrow(original);
  });
});
