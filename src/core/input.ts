import type { BorderCorner, DesignNode, Padding, Shadow } from '../types';

export const MIN_LENGTH = 0;
export const MAX_LENGTH = 9999;
export const MAX_OFFSET = 9999;
export const MIN_SCALE = 0.1;
export const MAX_SCALE = 10;
export const MIN_FONT_SIZE = 1;
export const MAX_FONT_SIZE = 999;
export const MAX_TEXT_SPACING = 100;

export type Edge = 'top' | 'right' | 'bottom' | 'left';
export type Corner = 'topLeft' | 'topRight' | 'bottomRight' | 'bottomLeft';
export type ShadowField = 'offsetX' | 'offsetY' | 'size' | 'blur';

/**
 * Clamp a value into [min, max]. Non-finite input collapses to `min`.
 */
export function clamp(min: number, max: number, value: number): number {
  if (!Number.isFinite(value)) return min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/** Signed integer text, surrounding whitespace allowed. */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(trimmed)) return null;
  return Number.parseFloat(trimmed);
}

function lengthValue(text: string): number {
  return clamp(MIN_LENGTH, MAX_LENGTH, parseInteger(text) ?? 0);
}

/** Empty or unparseable text clears an optional bound. */
function optionalBound(text: string): number | null {
  const value = parseInteger(text);
  return value === null ? null : clamp(MIN_LENGTH, MAX_LENGTH, value);
}

export function applyWidth(text: string, node: DesignNode): DesignNode {
  return { ...node, width: { kind: 'fixed', value: lengthValue(text) } };
}

export function applyHeight(text: string, node: DesignNode): DesignNode {
  return { ...node, height: { kind: 'fixed', value: lengthValue(text) } };
}

export function applyWidthMin(text: string, node: DesignNode): DesignNode {
  return { ...node, widthMin: optionalBound(text) };
}

export function applyWidthMax(text: string, node: DesignNode): DesignNode {
  return { ...node, widthMax: optionalBound(text) };
}

export function applyHeightMin(text: string, node: DesignNode): DesignNode {
  return { ...node, heightMin: optionalBound(text) };
}

export function applyHeightMax(text: string, node: DesignNode): DesignNode {
  return { ...node, heightMax: optionalBound(text) };
}

export function applySpacingX(text: string, node: DesignNode): DesignNode {
  const x = lengthValue(text);
  const y = node.spacing.locked ? x : node.spacing.y;
  return { ...node, spacing: { ...node.spacing, x, y } };
}

export function applySpacingY(text: string, node: DesignNode): DesignNode {
  const y = lengthValue(text);
  const x = node.spacing.locked ? y : node.spacing.x;
  return { ...node, spacing: { ...node.spacing, x, y } };
}

function applyEdge(edges: Padding, edge: Edge, value: number): Padding {
  if (edges.locked) return { top: value, right: value, bottom: value, left: value, locked: true };
  return { ...edges, [edge]: value };
}

export function applyPadding(edge: Edge, text: string, node: DesignNode): DesignNode {
  return { ...node, padding: applyEdge(node.padding, edge, lengthValue(text)) };
}

export function applyBorderWidth(edge: Edge, text: string, node: DesignNode): DesignNode {
  return { ...node, border: { ...node.border, width: applyEdge(node.border.width, edge, lengthValue(text)) } };
}

export function applyBorderCorner(corner: Corner, text: string, node: DesignNode): DesignNode {
  const value = lengthValue(text);
  const current = node.border.corner;
  const next: BorderCorner = current.locked
    ? { topLeft: value, topRight: value, bottomRight: value, bottomLeft: value, locked: true }
    : { ...current, [corner]: value };
  return { ...node, border: { ...node.border, corner: next } };
}

export function applyOffsetX(text: string, node: DesignNode): DesignNode {
  const offsetX = clamp(-MAX_OFFSET, MAX_OFFSET, parseInteger(text) ?? 0);
  return { ...node, transformation: { ...node.transformation, offsetX } };
}

export function applyOffsetY(text: string, node: DesignNode): DesignNode {
  const offsetY = clamp(-MAX_OFFSET, MAX_OFFSET, parseInteger(text) ?? 0);
  return { ...node, transformation: { ...node.transformation, offsetY } };
}

export function applyRotation(text: string, node: DesignNode): DesignNode {
  const rotation = clamp(-360, 360, parseDecimal(text) ?? 0);
  return { ...node, transformation: { ...node.transformation, rotation } };
}

/** Unparseable scale falls back to 1 (identity), not 0. */
export function applyScale(text: string, node: DesignNode): DesignNode {
  const scale = clamp(MIN_SCALE, MAX_SCALE, parseDecimal(text) ?? 1);
  return { ...node, transformation: { ...node.transformation, scale } };
}

export function applyShadow(field: ShadowField, text: string, node: DesignNode): DesignNode {
  const value = parseInteger(text) ?? 0;
  // offsets may be negative, size and blur may not
  const next: Shadow =
    field === 'offsetX' || field === 'offsetY'
      ? { ...node.shadow, [field]: clamp(-MAX_OFFSET, MAX_OFFSET, value) }
      : { ...node.shadow, [field]: clamp(MIN_LENGTH, MAX_LENGTH, value) };
  return { ...node, shadow: next };
}

/** Empty text goes back to inheriting the size from the parent. */
export function applyFontSize(text: string, node: DesignNode): DesignNode {
  if (text.trim() === '') return { ...node, fontSize: { kind: 'inherit' } };
  const value = clamp(MIN_FONT_SIZE, MAX_FONT_SIZE, parseInteger(text) ?? 0);
  return { ...node, fontSize: { kind: 'local', value } };
}

export function applyLetterSpacing(text: string, node: DesignNode): DesignNode {
  return { ...node, letterSpacing: clamp(-MAX_TEXT_SPACING, MAX_TEXT_SPACING, parseDecimal(text) ?? 0) };
}

export function applyWordSpacing(text: string, node: DesignNode): DesignNode {
  return { ...node, wordSpacing: clamp(-MAX_TEXT_SPACING, MAX_TEXT_SPACING, parseDecimal(text) ?? 0) };
}

// Locking copies the first edge (top, x, top-left) onto the others.

export function setSpacingLock(locked: boolean, node: DesignNode): DesignNode {
  const { x, y } = node.spacing;
  return { ...node, spacing: { x, y: locked ? x : y, locked } };
}

function lockEdges(edges: Padding, locked: boolean): Padding {
  if (!locked) return { ...edges, locked };
  const v = edges.top;
  return { top: v, right: v, bottom: v, left: v, locked };
}

export function setPaddingLock(locked: boolean, node: DesignNode): DesignNode {
  return { ...node, padding: lockEdges(node.padding, locked) };
}

export function setBorderWidthLock(locked: boolean, node: DesignNode): DesignNode {
  return { ...node, border: { ...node.border, width: lockEdges(node.border.width, locked) } };
}

export function setBorderCornerLock(locked: boolean, node: DesignNode): DesignNode {
  const corner = node.border.corner;
  if (!locked) return { ...node, border: { ...node.border, corner: { ...corner, locked } } };
  const v = corner.topLeft;
  return {
    ...node,
    border: { ...node.border, corner: { topLeft: v, topRight: v, bottomRight: v, bottomLeft: v, locked } },
  };
}
