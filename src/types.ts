/**
 * Core types for the workflow index
 */

export const TRIGGER_TYPES = ['Manual', 'Webhook', 'Scheduled', 'Triggered'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const COMPLEXITY_LEVELS = ['low', 'medium', 'high'] as const;
export type Complexity = (typeof COMPLEXITY_LEVELS)[number];

/** Sentinel accepted by search filters to disable the predicate. */
export const ALL_FILTER = 'all';
export type TriggerFilter = TriggerType | typeof ALL_FILTER;
export type ComplexityFilter = Complexity | typeof ALL_FILTER;

/**
 * One node entry of a workflow document, after boundary normalization
 */
export interface WorkflowNode {
  name: string;
  type: string;
}

export interface WorkflowConnectionTarget {
  node: string;
}

/**
 * Source node name -> output lanes -> targets, as stored under `connections.<node>.main`
 */
export type WorkflowConnections = Record<string, WorkflowConnectionTarget[][]>;

/**
 * A workflow document with every optional field defaulted
 */
export interface WorkflowDocument {
  id: string;
  name: string;
  description: string;
  active: boolean;
  nodes: WorkflowNode[];
  connections: WorkflowConnections;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Derived metadata for one indexed document
 */
export interface WorkflowRecord {
  filename: string;
  /** Corpus-relative POSIX path of the source file. */
  path: string;
  name: string;
  folder: string;
  workflowId: string;
  active: boolean;
  triggerType: TriggerType;
  complexity: Complexity;
  nodeCount: number;
  integrations: string[];
  tags: string[];
  description: string;
  createdAt: string;
  updatedAt: string;
  fileHash: string;
  fileSize: number;
  analyzedAt: string;
}

/** What the analyzer produces; the indexer stamps `analyzedAt`. */
export type AnalyzedWorkflow = Omit<WorkflowRecord, 'analyzedAt'>;

export interface WorkflowDetail extends WorkflowRecord {
  /** Parsed source document, or null when the file can no longer be read. */
  rawWorkflow: unknown;
}

export interface IndexRunResult {
  processed: number;
  skipped: number;
  errors: number;
  removed: number;
  total: number;
}

export interface SearchOptions {
  query?: string;
  trigger?: string;
  complexity?: string;
  activeOnly?: boolean;
  limit?: number;
  offset?: number;
}

export interface SearchPage {
  results: WorkflowRecord[];
  total: number;
}

export interface WorkflowStats {
  total: number;
  active: number;
  inactive: number;
  triggers: Record<string, number>;
  complexity: Record<string, number>;
  totalNodes: number;
  uniqueIntegrations: number;
  lastIndexed: string;
}

export function isTriggerType(value: unknown): value is TriggerType {
  return TRIGGER_TYPES.some((candidate) => candidate === value);
}

export function isComplexity(value: unknown): value is Complexity {
  return COMPLEXITY_LEVELS.some((candidate) => candidate === value);
}
