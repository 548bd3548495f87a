/**
 * Structural analysis of a single workflow document.
 *
 * Derives the searchable metadata stored per file: display name, trigger
 * classification, integration set, complexity tier and a one-line
 * description. Only the one file is read; the caller decides whether the
 * result is written.
 */
import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import { AnalysisError } from './errors.js';
import { AnalyzedWorkflow, Complexity, TriggerType, WorkflowDocument, WorkflowNode } from './types.js';
import { normalizeWorkflowDocument } from './workflow-document.js';

/** Names exporters assign to unnamed workflows. */
const PLACEHOLDER_NAME_PREFIXES = ['My workflow'];

/** Node-type segments that are built-in plumbing rather than external services. */
const NON_INTEGRATION_SEGMENTS = new Set(['core', 'base']);

const NAME_TERM_OVERRIDES: Record<string, string> = {
  http: 'HTTP',
  api: 'API',
  webhook: 'Webhook',
  automation: 'Automation',
  automate: 'Automate',
  scheduled: 'Scheduled',
  triggered: 'Triggered',
  manual: 'Manual',
};

const MAX_DESCRIBED_INTEGRATIONS = 3;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function stripJsonExtension(filename: string): string {
  return filename.replace(/\.json$/i, '');
}

/**
 * Turn `0042_slack_api_backup.json` into `Slack API Backup`.
 */
export function formatWorkflowName(filename: string): string {
  let parts = stripJsonExtension(filename)
    .split('_')
    .filter((part) => part.length > 0);

  if (parts.length > 1 && /^\d+$/.test(parts[0])) {
    parts = parts.slice(1);
  }

  return parts
    .map((part) => NAME_TERM_OVERRIDES[part.toLowerCase()] ?? capitalize(part))
    .join(' ');
}

/**
 * Prefer the document's own name unless it merely repeats the filename or is an exporter placeholder.
 */
export function resolveWorkflowName(documentName: string, filename: string): string {
  const trimmed = documentName.trim();
  const isMeaningful =
    trimmed.length > 0 &&
    trimmed !== stripJsonExtension(filename) &&
    !PLACEHOLDER_NAME_PREFIXES.some((prefix) => trimmed.startsWith(prefix));

  return isMeaningful ? trimmed : formatWorkflowName(filename);
}

export function classifyComplexity(nodeCount: number): Complexity {
  if (nodeCount <= 5) return 'low';
  if (nodeCount <= 15) return 'medium';
  return 'high';
}

function classifyNodeType(nodeType: string): TriggerType | null {
  if (nodeType.includes('webhook')) return 'Webhook';
  if (nodeType.includes('cron') || nodeType.includes('schedule')) return 'Scheduled';
  if (nodeType.includes('trigger')) return 'Triggered';
  return null;
}

function integrationFromNodeType(nodeType: string): string | null {
  const segment = nodeType.split('.')[1];
  if (!segment || NON_INTEGRATION_SEGMENTS.has(segment)) {
    return null;
  }
  return capitalize(segment);
}

/**
 * Scan node types for the trigger classification and the integration set.
 *
 * The last node that matches a trigger rule decides the classification, so
 * a webhook node followed by a schedule node yields `Scheduled`.
 */
export function analyzeNodes(nodes: WorkflowNode[]): { triggerType: TriggerType; integrations: string[] } {
  const integrations = new Set<string>();
  let triggerType: TriggerType = 'Manual';

  for (const node of nodes) {
    const integration = integrationFromNodeType(node.type);
    if (integration) {
      integrations.add(integration);
    }

    const classified = classifyNodeType(node.type);
    if (classified) {
      triggerType = classified;
    }
  }

  return { triggerType, integrations: Array.from(integrations).sort() };
}

/**
 * e.g. `Webhook workflow integrating Gmail, Slack, Trello, +2 more with 12 nodes (medium complexity)`.
 * Integrations are listed in the sorted order they arrive in.
 */
export function generateDescription(
  triggerType: TriggerType,
  integrations: string[],
  nodeCount: number,
  complexity: Complexity
): string {
  const parts = [`${triggerType} workflow`];

  if (integrations.length > 0) {
    const shown = integrations.slice(0, MAX_DESCRIBED_INTEGRATIONS);
    if (integrations.length > MAX_DESCRIBED_INTEGRATIONS) {
      shown.push(`+${integrations.length - MAX_DESCRIBED_INTEGRATIONS} more`);
    }
    parts.push(`integrating ${shown.join(', ')}`);
  }

  parts.push(`with ${nodeCount} nodes (${complexity} complexity)`);
  return parts.join(' ');
}

/**
 * First directory segment of a corpus-relative path, or '' for files at the root.
 */
export function deriveFolder(relativePath: string): string {
  const segments = relativePath.replace(/\\/g, '/').split('/').filter((segment) => segment.length > 0);
  return segments.length > 1 ? segments[0] : '';
}

export function computeContentHash(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Analyze already-loaded file content. `relativePath` is the POSIX path below the corpus root.
 */
export function analyzeWorkflowContent(relativePath: string, content: Buffer): AnalyzedWorkflow {
  const normalizedPath = relativePath.replace(/\\/g, '/');
  const filename = basename(normalizedPath);

  let document: WorkflowDocument;
  try {
    const text = content.toString('utf8').replace(/^\uFEFF/, '');
    document = normalizeWorkflowDocument(JSON.parse(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisError(normalizedPath, reason, { cause: error });
  }

  const nodeCount = document.nodes.length;
  const complexity = classifyComplexity(nodeCount);
  const { triggerType, integrations } = analyzeNodes(document.nodes);

  return {
    filename,
    path: normalizedPath,
    name: resolveWorkflowName(document.name, filename),
    folder: deriveFolder(normalizedPath),
    workflowId: document.id,
    active: document.active,
    triggerType,
    complexity,
    nodeCount,
    integrations,
    tags: document.tags,
    description: document.description || generateDescription(triggerType, integrations, nodeCount, complexity),
    createdAt: document.createdAt,
    updatedAt: document.updatedAt,
    fileHash: computeContentHash(content),
    fileSize: content.length,
  };
}

/**
 * Read and analyze one file of the corpus.
 */
export async function analyzeWorkflowFile(corpusRoot: string, relativePath: string): Promise<AnalyzedWorkflow> {
  let content: Buffer;
  try {
    content = await readFile(resolve(corpusRoot, relativePath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisError(relativePath, reason, { cause: error });
  }
  return analyzeWorkflowContent(relativePath, content);
}
