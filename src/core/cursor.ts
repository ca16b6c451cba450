import type { Tree } from './tree';

/**
 * One step of the path back to the root: the parent's label plus the
 * siblings on either side of the focused subtree. `before` is nearest-first,
 * `after` is in document order.
 */
export type Crumb<T> = {
  readonly label: T;
  readonly before: readonly Tree<T>[];
  readonly after: readonly Tree<T>[];
};

/**
 * A position inside a tree. `crumbs[0]` is the immediate parent. No node
 * holds a reference to its parent, so every cursor is a plain value and
 * moving up rebuilds only the nodes on the path.
 */
export type Cursor<T> = {
  readonly focus: Tree<T>;
  readonly crumbs: readonly Crumb<T>[];
};

export function fromTree<T>(t: Tree<T>): Cursor<T> {
  return { focus: t, crumbs: [] };
}

export function label<T>(c: Cursor<T>): T {
  return c.focus.label;
}

export function focusedTree<T>(c: Cursor<T>): Tree<T> {
  return c.focus;
}

export function hasParent<T>(c: Cursor<T>): boolean {
  return c.crumbs.length > 0;
}

export function depth<T>(c: Cursor<T>): number {
  return c.crumbs.length;
}

function up<T>(c: Cursor<T>): Cursor<T> | null {
  const [crumb, ...rest] = c.crumbs;
  if (!crumb) return null;
  const children = [...crumb.before.slice().reverse(), c.focus, ...crumb.after];
  return { focus: { label: crumb.label, children }, crumbs: rest };
}

function childAt<T>(c: Cursor<T>, index: number): Cursor<T> | null {
  const children = c.focus.children;
  if (index < 0 || index >= children.length) return null;
  const crumb: Crumb<T> = {
    label: c.focus.label,
    before: children.slice(0, index).reverse(),
    after: children.slice(index + 1),
  };
  return { focus: children[index], crumbs: [crumb, ...c.crumbs] };
}

function sibling<T>(c: Cursor<T>, direction: 1 | -1): Cursor<T> | null {
  const [crumb, ...rest] = c.crumbs;
  if (!crumb) return null;
  if (direction === 1) {
    const [next, ...after] = crumb.after;
    if (!next) return null;
    return { focus: next, crumbs: [{ label: crumb.label, before: [c.focus, ...crumb.before], after }, ...rest] };
  }
  const [prev, ...before] = crumb.before;
  if (!prev) return null;
  return { focus: prev, crumbs: [{ label: crumb.label, before, after: [c.focus, ...crumb.after] }, ...rest] };
}

// Navigation. At a boundary each move returns the cursor it was given.

export function parent<T>(c: Cursor<T>): Cursor<T> {
  return up(c) ?? c;
}

export function firstChild<T>(c: Cursor<T>): Cursor<T> {
  return childAt(c, 0) ?? c;
}

export function lastChild<T>(c: Cursor<T>): Cursor<T> {
  return childAt(c, c.focus.children.length - 1) ?? c;
}

export function nextSibling<T>(c: Cursor<T>): Cursor<T> {
  return sibling(c, 1) ?? c;
}

export function previousSibling<T>(c: Cursor<T>): Cursor<T> {
  return sibling(c, -1) ?? c;
}

export function root<T>(c: Cursor<T>): Cursor<T> {
  let current = c;
  let next = up(current);
  while (next) {
    current = next;
    next = up(current);
  }
  return current;
}

export function toTree<T>(c: Cursor<T>): Tree<T> {
  return root(c).focus;
}

/**
 * Pre-order search starting at the root of `c`'s tree.
 * Returns `null` when no node matches.
 */
export function findFromRoot<T>(predicate: (label: T) => boolean, c: Cursor<T>): Cursor<T> | null {
  const search = (at: Cursor<T>): Cursor<T> | null => {
    if (predicate(at.focus.label)) return at;
    for (let i = 0; i < at.focus.children.length; i++) {
      const child = childAt(at, i);
      const found = child ? search(child) : null;
      if (found) return found;
    }
    return null;
  };
  return search(root(c));
}

export function findById<T extends { readonly id: string }>(id: string, c: Cursor<T>): Cursor<T> | null {
  return findFromRoot((l) => l.id === id, c);
}

// Mutation. Every operation returns a new cursor; trees reachable from the
// input cursor are left untouched.

export function replaceTree<T>(t: Tree<T>, c: Cursor<T>): Cursor<T> {
  return { focus: t, crumbs: c.crumbs };
}

export function mapLabel<T>(f: (l: T) => T, c: Cursor<T>): Cursor<T> {
  return replaceTree({ label: f(c.focus.label), children: c.focus.children }, c);
}

export function appendChild<T>(t: Tree<T>, c: Cursor<T>): Cursor<T> {
  const children = c.focus.children;
  const crumb: Crumb<T> = { label: c.focus.label, before: children.slice().reverse(), after: [] };
  return { focus: t, crumbs: [crumb, ...c.crumbs] };
}

/** No-op at the root, which has no siblings. */
export function insertBefore<T>(t: Tree<T>, c: Cursor<T>): Cursor<T> {
  const [crumb, ...rest] = c.crumbs;
  if (!crumb) return c;
  return {
    focus: t,
    crumbs: [{ label: crumb.label, before: crumb.before, after: [c.focus, ...crumb.after] }, ...rest],
  };
}

/** No-op at the root, which has no siblings. */
export function insertAfter<T>(t: Tree<T>, c: Cursor<T>): Cursor<T> {
  const [crumb, ...rest] = c.crumbs;
  if (!crumb) return c;
  return {
    focus: t,
    crumbs: [{ label: crumb.label, before: [c.focus, ...crumb.before], after: crumb.after }, ...rest],
  };
}

/**
 * Detach the focused subtree and focus its former parent.
 * Removing the root is not allowed and returns `c` unchanged.
 */
export function remove<T>(c: Cursor<T>): Cursor<T> {
  const [crumb, ...rest] = c.crumbs;
  if (!crumb) return c;
  const children = [...crumb.before.slice().reverse(), ...crumb.after];
  return { focus: { label: crumb.label, children }, crumbs: rest };
}
