import type { DesignNode, NodeId } from '../types';
import type { Seed } from './ids';
import { cloneWithFreshIds, collectIds } from './ids';
import { documentTemplate, pageTemplate } from './templates';
import type { Tree } from './tree';
import { tree } from './tree';

export const SCHEMA_VERSION = 2;

export type Viewport =
  | { kind: 'fluid' }
  | { kind: 'device'; name: string; width: number; height: number; landscape: boolean };

export const viewports: readonly Viewport[] = [
  { kind: 'fluid' },
  { kind: 'device', name: 'Phone', width: 375, height: 812, landscape: false },
  { kind: 'device', name: 'Phone Large', width: 414, height: 896, landscape: false },
  { kind: 'device', name: 'Tablet', width: 768, height: 1024, landscape: false },
  { kind: 'device', name: 'Laptop', width: 1280, height: 800, landscape: true },
  { kind: 'device', name: 'Desktop', width: 1920, height: 1080, landscape: true },
];

/**
 * Unit of persistence and of undo/redo. `collapsedIds` is outline UI state
 * that travels with the tree so undo restores it too.
 */
export type DesignDocument = {
  readonly schemaVersion: number;
  /** Epoch milliseconds of the last change. */
  readonly updatedAt: number;
  readonly root: Tree<DesignNode>;
  readonly viewport: Viewport;
  readonly collapsedIds: Readonly<Record<NodeId, true>>;
};

export function createDocument(seed: Seed, now: number): [DesignDocument, Seed] {
  const [root, next] = cloneWithFreshIds(tree(documentTemplate().label, [pageTemplate()]), seed);
  return [
    {
      schemaVersion: SCHEMA_VERSION,
      updatedAt: now,
      root,
      viewport: { kind: 'fluid' },
      collapsedIds: {},
    },
    next,
  ];
}

export function isCollapsed(doc: DesignDocument, id: NodeId): boolean {
  return doc.collapsedIds[id] === true;
}

export function toggleCollapsed(doc: DesignDocument, id: NodeId): DesignDocument {
  const collapsedIds: Record<NodeId, true> = { ...doc.collapsedIds };
  if (collapsedIds[id]) delete collapsedIds[id];
  else collapsedIds[id] = true;
  return { ...doc, collapsedIds };
}

/** Drop collapse flags for ids no longer present in the tree. */
export function pruneCollapsed(doc: DesignDocument): DesignDocument {
  const present = new Set(collectIds(doc.root));
  const stale = Object.keys(doc.collapsedIds).filter((id) => !present.has(id));
  if (stale.length === 0) return doc;
  const collapsedIds: Record<NodeId, true> = {};
  for (const id of Object.keys(doc.collapsedIds)) if (present.has(id)) collapsedIds[id] = true;
  return { ...doc, collapsedIds };
}

export function withRoot(doc: DesignDocument, root: Tree<DesignNode>, now: number): DesignDocument {
  return pruneCollapsed({ ...doc, root, updatedAt: now });
}
