/**
 * Response envelopes for the HTTP adapter
 */
import { ReindexStartResult, ReindexStatus } from './reindex-runner.js';
import { WorkflowDetail, WorkflowRecord } from './types.js';

/**
 * API error response format
 */
export interface ApiErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

/**
 * API success response format
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

/**
 * Paginated response format
 */
export interface PaginatedResponse<T> {
  success: true;
  data: T[];
  pagination: {
    page: number;
    pageSize: number;
    total: number;
    totalPages: number;
  };
  timestamp: string;
}

export interface WorkflowSearchResponse extends PaginatedResponse<WorkflowRecord> {
  query: {
    q: string;
    trigger: string;
    complexity: string;
    activeOnly: boolean;
  };
}

export type WorkflowDetailResponse = ApiSuccessResponse<WorkflowDetail>;

export interface CategorySummary {
  name: string;
  count: number;
}

export type ReindexResponse = ReindexStartResult & {
  status: ReindexStatus;
};
