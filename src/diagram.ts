/**
 * Mermaid flowchart rendering for a workflow's node graph
 */
import { WorkflowConnections, WorkflowNode } from './types.js';

export const EMPTY_DIAGRAM = 'graph TD\n    A[No nodes found]';

export function sanitizeNodeId(nodeName: string): string {
  return nodeName.replace(/[^a-zA-Z0-9]/g, '_').replace(/^_+|_+$/g, '');
}

function escapeLabel(value: string): string {
  return value.replace(/"/g, '#quot;');
}

/**
 * `graph TD` with one box per node (name plus the last segment of its type)
 * and one edge per `main` connection. Edges to unknown nodes still get an id.
 */
export function generateMermaidDiagram(nodes: WorkflowNode[], connections: WorkflowConnections): string {
  if (nodes.length === 0) {
    return EMPTY_DIAGRAM;
  }

  const ids = new Map<string, string>();
  const idFor = (name: string): string => {
    const existing = ids.get(name);
    if (existing) return existing;
    const id = sanitizeNodeId(name) || `node_${ids.size + 1}`;
    ids.set(name, id);
    return id;
  };

  const lines = ['graph TD'];
  for (const node of nodes) {
    const nodeType = node.type.split('.').pop() || 'unknown';
    lines.push(`    ${idFor(node.name)}["${escapeLabel(node.name)}\\n(${escapeLabel(nodeType)})"]`);
  }

  for (const [source, lanes] of Object.entries(connections)) {
    const sourceId = idFor(source);
    for (const lane of lanes) {
      for (const target of lane) {
        lines.push(`    ${sourceId} --> ${idFor(target.node)}`);
      }
    }
  }

  return lines.join('\n');
}
