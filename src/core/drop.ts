import type { DesignNode, NodeId, NodeKind } from '../types';
import { appendChild, findById, fromTree, hasParent, insertAfter, insertBefore, remove, toTree } from './cursor';
import { canAppendChild, canInsertBeside } from './placement';
import type { Tree } from './tree';
import { flatten } from './tree';

export type DropPosition = 'into' | 'before' | 'after';

export type DropPositions = { into: boolean; before: boolean; after: boolean };

const nowhere: DropPositions = { into: false, before: false, after: false };

function positionsFor(target: DesignNode, targetHasParent: boolean, candidate: NodeKind): DropPositions {
  const beside = canInsertBeside(target.type.kind, targetHasParent, candidate);
  return { into: canAppendChild(target.type.kind, candidate), before: beside, after: beside };
}

function subtreeIds(t: Tree<DesignNode>, id: NodeId): Set<NodeId> {
  const at = findById(id, fromTree(t));
  return new Set(at ? flatten(at.focus).map((n) => n.id) : []);
}

/**
 * Where a node of kind `candidate` may land relative to `targetId`. When the
 * candidate is an existing node (`draggedId`), it cannot land on itself or
 * inside its own subtree.
 */
export function dropPositions(
  t: Tree<DesignNode>,
  targetId: NodeId,
  candidate: NodeKind,
  draggedId: NodeId | null = null,
): DropPositions {
  const target = findById(targetId, fromTree(t));
  if (!target) return nowhere;
  if (draggedId !== null && subtreeIds(t, draggedId).has(targetId)) return nowhere;
  return positionsFor(target.focus.label, hasParent(target), candidate);
}

/** Every node that accepts `candidate` in at least one position. */
export function dropTargets(
  t: Tree<DesignNode>,
  candidate: NodeKind,
  draggedId: NodeId | null = null,
): Record<NodeId, DropPositions> {
  const excluded = draggedId === null ? new Set<NodeId>() : subtreeIds(t, draggedId);
  const out: Record<NodeId, DropPositions> = {};
  const visit = (node: Tree<DesignNode>, nodeHasParent: boolean) => {
    if (excluded.has(node.label.id)) return;
    const positions = positionsFor(node.label, nodeHasParent, candidate);
    if (positions.into || positions.before || positions.after) out[node.label.id] = positions;
    for (const child of node.children) visit(child, true);
  };
  visit(t, false);
  return out;
}

/**
 * Place `subtree` at `position` relative to `targetId`, or `null` when the
 * placement rules reject it or the target is missing.
 */
export function placeSubtree(
  t: Tree<DesignNode>,
  subtree: Tree<DesignNode>,
  targetId: NodeId,
  position: DropPosition,
): Tree<DesignNode> | null {
  const target = findById(targetId, fromTree(t));
  if (!target) return null;
  const allowed = positionsFor(target.focus.label, hasParent(target), subtree.label.type.kind);
  if (!allowed[position]) return null;
  switch (position) {
    case 'into':
      return toTree(appendChild(subtree, target));
    case 'before':
      return toTree(insertBefore(subtree, target));
    case 'after':
      return toTree(insertAfter(subtree, target));
  }
}

/** Detach `draggedId` and place it relative to `targetId`; `null` if not allowed. */
export function moveSubtree(
  t: Tree<DesignNode>,
  draggedId: NodeId,
  targetId: NodeId,
  position: DropPosition,
): Tree<DesignNode> | null {
  const dragged = findById(draggedId, fromTree(t));
  if (!dragged || !hasParent(dragged)) return null;
  if (!dropPositions(t, targetId, dragged.focus.label.type.kind, draggedId)[position]) return null;
  return placeSubtree(toTree(remove(dragged)), dragged.focus, targetId, position);
}
