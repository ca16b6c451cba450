import { useMemo } from 'react';
import type { DesignNode, NodeId, NodeKind } from '../types';
import type { DropPositions } from '../core/drop';
import { dropTargets } from '../core/drop';
import { findById, fromTree } from '../core/cursor';
import type { Template } from '../core/templates';
import type { Tree } from '../core/tree';
import { useDesignerStore } from '../state/store';

export type DragSource = { kind: 'node'; id: NodeId } | { kind: 'template'; template: Template };

function sourceKind(root: Tree<DesignNode>, source: DragSource): NodeKind | null {
  if (source.kind === 'template') return source.template.label.type.kind;
  const at = findById(source.id, fromTree(root));
  return at ? at.focus.label.type.kind : null;
}

/**
 * Nodes a drag-and-drop controller may highlight for `source`, with the
 * positions each accepts. Empty while nothing is being dragged.
 */
export function useDropTargets(source: DragSource | null): Record<NodeId, DropPositions> {
  const root = useDesignerStore((s) => s.history.present.root);
  return useMemo(() => {
    if (!source) return {};
    const kind = sourceKind(root, source);
    if (kind === null) return {};
    return dropTargets(root, kind, source.kind === 'node' ? source.id : null);
  }, [root, source]);
}
