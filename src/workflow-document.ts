/**
 * Boundary normalization for loosely-structured workflow JSON.
 *
 * Source documents come from many exporters and omit or reshape fields
 * freely. {@link normalizeWorkflowDocument} is the single place that
 * decides defaults, so the analyzer and everything downstream work with a
 * fully-populated {@link WorkflowDocument}.
 */
import { WorkflowConnections, WorkflowConnectionTarget, WorkflowDocument, WorkflowNode } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function normalizeNode(value: unknown): WorkflowNode {
  if (!isRecord(value)) {
    return { name: '', type: '' };
  }
  return {
    name: asString(value.name),
    type: asString(value.type),
  };
}

/**
 * Tags are either plain strings or `{ id, name }` objects depending on the exporter.
 */
export function normalizeTag(tag: unknown): string {
  if (isRecord(tag)) {
    const name = asString(tag.name);
    if (name) return name;
    const id = asString(tag.id);
    return id || 'tag';
  }
  return typeof tag === 'string' ? tag : JSON.stringify(tag) ?? '';
}

function normalizeTargets(lane: unknown): WorkflowConnectionTarget[] {
  if (!Array.isArray(lane)) return [];
  return lane
    .filter(isRecord)
    .map((target) => ({ node: asString(target.node) }))
    .filter((target) => target.node.length > 0);
}

function normalizeConnections(value: unknown): WorkflowConnections {
  if (!isRecord(value)) return {};

  const connections: WorkflowConnections = {};
  for (const [source, outputs] of Object.entries(value)) {
    if (!isRecord(outputs) || !Array.isArray(outputs.main)) continue;
    connections[source] = outputs.main.map(normalizeTargets);
  }
  return connections;
}

/**
 * Fill every optional field of a parsed document with its default.
 * Throws when the top level is not a JSON object.
 */
export function normalizeWorkflowDocument(data: unknown): WorkflowDocument {
  if (!isRecord(data)) {
    throw new TypeError('workflow document must be a JSON object');
  }

  return {
    id: asString(data.id),
    name: asString(data.name).trim(),
    description: asString(data.description).trim(),
    active: data.active === true,
    nodes: Array.isArray(data.nodes) ? data.nodes.map(normalizeNode) : [],
    connections: normalizeConnections(data.connections),
    tags: Array.isArray(data.tags) ? data.tags.map(normalizeTag) : [],
    createdAt: asString(data.createdAt),
    updatedAt: asString(data.updatedAt),
  };
}
