import type { Color, DesignNode, Inheritable, NodeId } from '../types';
import type { Cursor } from './cursor';
import { findById, fromTree, hasParent, parent } from './cursor';
import type { Tree } from './tree';

/**
 * Walk from the focus towards the root and return the first value set
 * locally. Falls back to `fallback` once the root has been checked.
 */
export function resolveInherited<T>(
  c: Cursor<DesignNode>,
  read: (node: DesignNode) => Inheritable<T>,
  fallback: T,
): T {
  let at = c;
  for (;;) {
    const setting = read(at.focus.label);
    if (setting.kind === 'local') return setting.value;
    if (!hasParent(at)) return fallback;
    at = parent(at);
  }
}

export function resolveFontFamily(c: Cursor<DesignNode>, fallback: string): string {
  return resolveInherited(c, (n) => n.fontFamily, fallback);
}

export function resolveFontColor(c: Cursor<DesignNode>, fallback: Color): Color {
  return resolveInherited(c, (n) => n.fontColor, fallback);
}

export function resolveFontSize(c: Cursor<DesignNode>, fallback: number): number {
  return resolveInherited(c, (n) => n.fontSize, fallback);
}

export function resolveFontWeight(c: Cursor<DesignNode>, fallback: number): number {
  return resolveInherited(c, (n) => n.fontWeight, fallback);
}

/** Resolve against the node with `id`; `null` when the id is not in `t`. */
export function resolveById<T>(
  t: Tree<DesignNode>,
  id: NodeId,
  read: (node: DesignNode) => Inheritable<T>,
  fallback: T,
): T | null {
  const at = findById(id, fromTree(t));
  return at ? resolveInherited(at, read, fallback) : null;
}
