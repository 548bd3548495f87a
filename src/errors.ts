import { AppError } from './logger.js';

/**
 * A single workflow document could not be read, parsed or analyzed.
 * Indexing counts it and moves on to the next file.
 */
export class AnalysisError extends AppError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options: { cause?: unknown } = {}
  ) {
    super(`Failed to analyze ${filePath}: ${reason}`, 'ANALYSIS_FAILED', 422, { filePath });
    this.name = 'AnalysisError';
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The index store rejected a read or write.
 */
export class StoreError extends AppError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Index store ${operation} failed: ${reason}`, 'STORE_ERROR', 500, { operation });
    this.name = 'StoreError';
    this.cause = cause;
  }
}

/**
 * Raised by adapters that must turn a missing record into a response.
 * Store lookups themselves return null for a miss.
 */
export class NotFoundError extends AppError {
  constructor(resource: string, key: string) {
    super(`${resource} not found: ${key}`, 'NOT_FOUND', 404, { resource, key });
    this.name = 'NotFoundError';
  }
}

/**
 * A search was requested with filter or paging values outside the accepted set.
 */
export class QueryBuildError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_FILTER', 400, details);
    this.name = 'QueryBuildError';
  }
}

/**
 * Run a store operation, converting driver exceptions into StoreError.
 */
export function withStoreErrors<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new StoreError(operation, error);
  }
}
