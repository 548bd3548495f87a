import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';

export interface WorkflowFixture {
  id?: string;
  name?: string;
  description?: string;
  active?: boolean;
  nodeTypes?: string[];
  tags?: unknown[];
  connections?: Record<string, unknown>;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * Workflow JSON with one node per entry of `nodeTypes`, named `Node 1`, `Node 2`, ...
 */
export function makeWorkflow(fixture: WorkflowFixture = {}): Record<string, unknown> {
  const nodes = (fixture.nodeTypes ?? []).map((type, index) => ({
    name: `Node ${index + 1}`,
    type,
    parameters: {},
  }));

  const document: Record<string, unknown> = {
    id: fixture.id ?? '',
    name: fixture.name ?? '',
    active: fixture.active ?? false,
    nodes,
    connections: fixture.connections ?? {},
    tags: fixture.tags ?? [],
    createdAt: fixture.createdAt ?? '2024-01-01T00:00:00.000Z',
    updatedAt: fixture.updatedAt ?? '2024-01-02T00:00:00.000Z',
  };
  if (fixture.description !== undefined) {
    document.description = fixture.description;
  }
  return document;
}

/**
 * `count` nodes whose type names no integration and no trigger.
 */
export function plainNodes(count: number): string[] {
  return Array.from({ length: count }, () => 'builtin.core');
}

export function writeWorkflow(root: string, relativePath: string, document: unknown): string {
  const fullPath = join(root, relativePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, JSON.stringify(document, null, 2));
  return fullPath;
}

/**
 * Fresh directory under `.test-tmp/`.
 */
export function createTestDir(name: string): string {
  const dir = join(process.cwd(), '.test-tmp', name);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
