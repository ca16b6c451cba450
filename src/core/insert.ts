import type { DesignNode, NodeKind } from '../types';
import type { Cursor } from './cursor';
import { appendChild, hasParent, insertAfter, parent, root } from './cursor';
import { canAppendChild, canInsertBeside, isContainer } from './placement';
import type { Tree } from './tree';

/**
 * Place `subtree` relative to the focus and focus it.
 *
 * A container focus takes `subtree` as its last child. Any other focus gets
 * `subtree` inserted right after its parent. A focus without a parent anchors
 * on the root instead; since nothing goes beside the root, that case returns
 * the root cursor with the tree unchanged.
 */
export function insert(subtree: Tree<DesignNode>, c: Cursor<DesignNode>): Cursor<DesignNode> {
  if (isContainer(c.focus.label.type.kind)) return appendChild(subtree, c);
  const anchor = hasParent(c) ? parent(c) : root(c);
  return insertAfter(subtree, anchor);
}

/**
 * Whether `insert` would place a node of kind `candidate` at `c` without
 * breaking the placement rules. False whenever `insert` would be a no-op.
 */
export function canInsert(candidate: NodeKind, c: Cursor<DesignNode>): boolean {
  const focus = c.focus.label.type.kind;
  if (isContainer(focus)) return canAppendChild(focus, candidate);
  const [crumb] = c.crumbs;
  if (!crumb) return false;
  return canInsertBeside(crumb.label.type.kind, c.crumbs.length > 1, candidate);
}
