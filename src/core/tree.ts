export type Tree<T> = {
  readonly label: T;
  readonly children: readonly Tree<T>[];
};

export function tree<T>(label: T, children: readonly Tree<T>[] = []): Tree<T> {
  return { label, children };
}

export function singleton<T>(label: T): Tree<T> {
  return { label, children: [] };
}

/** Labels in pre-order (parent before children, children left to right). */
export function flatten<T>(t: Tree<T>): T[] {
  const out: T[] = [];
  const visit = (node: Tree<T>) => {
    out.push(node.label);
    for (const child of node.children) visit(child);
  };
  visit(t);
  return out;
}

export function countNodes<T>(t: Tree<T>): number {
  return t.children.reduce((sum, child) => sum + countNodes(child), 1);
}

export function mapLabels<T, U>(f: (label: T) => U, t: Tree<T>): Tree<U> {
  return { label: f(t.label), children: t.children.map((child) => mapLabels(f, child)) };
}

/**
 * Bottom-up transform: children are folded first and their results are
 * handed to `f` together with the parent label.
 */
export function foldTree<T, R>(f: (label: T, children: R[]) => R, t: Tree<T>): R {
  return f(
    t.label,
    t.children.map((child) => foldTree(f, child)),
  );
}

export function structurallyEqual<T>(a: Tree<T>, b: Tree<T>, eq: (x: T, y: T) => boolean): boolean {
  if (!eq(a.label, b.label)) return false;
  if (a.children.length !== b.children.length) return false;
  return a.children.every((child, i) => structurallyEqual(child, b.children[i], eq));
}
