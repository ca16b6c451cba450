import type { Color, DesignNode } from '../types';
import type { Tree } from './tree';

/** Font values used where no ancestor sets one locally. */
export type RenderDefaults = {
  fontFamily?: string;
  fontSize?: number;
  fontColor?: Color;
  fontWeight?: number;
};

export const defaultRenderDefaults: Required<RenderDefaults> = {
  fontFamily: 'system-ui',
  fontSize: 16,
  fontColor: '#000000',
  fontWeight: 400,
};

/** A node paired with the font values it ends up with after inheritance. */
export type ResolvedNode = {
  node: DesignNode;
  fontFamily: string;
  fontSize: number;
  fontColor: Color;
  fontWeight: number;
};

/**
 * Read-only bottom-up transform for renderers and code generators. Font
 * values are resolved on the way down, so each node is resolved once instead
 * of walking back to the root per node.
 */
export function renderTree<R>(
  t: Tree<DesignNode>,
  render: (resolved: ResolvedNode, children: R[]) => R,
  defaults?: RenderDefaults,
): R {
  const inherited: Required<RenderDefaults> = { ...defaultRenderDefaults, ...(defaults ?? {}) };
  const visit = (node: Tree<DesignNode>, from: Required<RenderDefaults>): R => {
    const n = node.label;
    const resolved: ResolvedNode = {
      node: n,
      fontFamily: n.fontFamily.kind === 'local' ? n.fontFamily.value : from.fontFamily,
      fontSize: n.fontSize.kind === 'local' ? n.fontSize.value : from.fontSize,
      fontColor: n.fontColor.kind === 'local' ? n.fontColor.value : from.fontColor,
      fontWeight: n.fontWeight.kind === 'local' ? n.fontWeight.value : from.fontWeight,
    };
    const carried: Required<RenderDefaults> = {
      fontFamily: resolved.fontFamily,
      fontSize: resolved.fontSize,
      fontColor: resolved.fontColor,
      fontWeight: resolved.fontWeight,
    };
    return render(
      resolved,
      node.children.map((child) => visit(child, carried)),
    );
  };
  return visit(t, inherited);
}
