import type {
  Alignment,
  Background,
  BorderCorner,
  DesignNode,
  HeadingLevel,
  Inheritable,
  Length,
  NodeId,
  NodeType,
  Padding,
} from '../types';
import type { DesignDocument, Viewport } from './document';
import { SCHEMA_VERSION } from './document';
import { clamp, MAX_LENGTH, MIN_LENGTH } from './input';
import { canAppendChild } from './placement';
import { defaultNode } from './templates';
import type { Tree } from './tree';

export type DocumentLoadError =
  | { kind: 'invalid-json'; message: string }
  | { kind: 'missing-version' }
  | { kind: 'unsupported-version'; version: number }
  | { kind: 'invalid-structure'; reason: string };

export type LoadResult = { ok: true; document: DesignDocument } | { ok: false; error: DocumentLoadError };

type Json = Record<string, unknown>;

/** Upgrades a raw document from version `n` to `n + 1`. */
const migrations: Record<number, (raw: Json) => Json> = {
  // v1 kept collapsed outline entries as a list of ids
  1: (raw) => {
    const ids = Array.isArray(raw.collapsedIds) ? raw.collapsedIds : [];
    const collapsedIds: Record<string, true> = {};
    for (const id of ids) if (typeof id === 'string') collapsedIds[id] = true;
    return { ...raw, collapsedIds, schemaVersion: 2 };
  },
};

class StructureError extends Error {}

export function serializeDocument(doc: DesignDocument): string {
  return JSON.stringify(doc);
}

export function loadDocument(text: string): LoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return { ok: false, error: { kind: 'invalid-json', message: e instanceof Error ? e.message : String(e) } };
  }
  if (!isRecord(parsed)) return { ok: false, error: { kind: 'invalid-structure', reason: 'document is not an object' } };
  const version = parsed.schemaVersion;
  if (typeof version !== 'number') return { ok: false, error: { kind: 'missing-version' } };
  if (!Number.isInteger(version) || version < 1 || version > SCHEMA_VERSION) {
    return { ok: false, error: { kind: 'unsupported-version', version } };
  }

  let raw: Json = parsed;
  for (let v = version; v < SCHEMA_VERSION; v++) {
    const migrate = migrations[v];
    if (!migrate) return { ok: false, error: { kind: 'unsupported-version', version } };
    raw = migrate(raw);
  }

  try {
    return { ok: true, document: decodeDocument(raw) };
  } catch (e) {
    if (e instanceof StructureError) return { ok: false, error: { kind: 'invalid-structure', reason: e.message } };
    throw e;
  }
}

function decodeDocument(raw: Json): DesignDocument {
  const seen = new Set<NodeId>();
  const root = decodeTree(raw.root, seen);
  if (root.label.type.kind !== 'document') throw new StructureError('root is not a document node');
  const collapsedIds: Record<NodeId, true> = {};
  if (isRecord(raw.collapsedIds)) {
    for (const [id, flag] of Object.entries(raw.collapsedIds)) if (flag === true && seen.has(id)) collapsedIds[id] = true;
  }
  return {
    schemaVersion: SCHEMA_VERSION,
    updatedAt: num(raw.updatedAt, 0),
    root,
    viewport: decodeViewport(raw.viewport),
    collapsedIds,
  };
}

function decodeTree(raw: unknown, seen: Set<NodeId>): Tree<DesignNode> {
  if (!isRecord(raw) || !Array.isArray(raw.children)) throw new StructureError('malformed tree');
  const label = decodeNode(raw.label);
  if (seen.has(label.id)) throw new StructureError(`duplicate id ${label.id}`);
  seen.add(label.id);
  const children = raw.children.map((child: unknown) => decodeTree(child, seen));
  for (const child of children) {
    const kind = child.label.type.kind;
    if (!canAppendChild(label.type.kind, kind)) {
      throw new StructureError(`${kind} ${child.label.id} cannot be placed in ${label.type.kind} ${label.id}`);
    }
  }
  return { label, children };
}

function decodeNode(raw: unknown): DesignNode {
  if (!isRecord(raw)) throw new StructureError('malformed node');
  const id = raw.id;
  if (typeof id !== 'string' || id === '') throw new StructureError('node without id');
  const type = decodeNodeType(raw.type);
  if (!type) throw new StructureError(`node ${id} has an unknown type`);
  const d = defaultNode(type, str(raw.name, ''));
  const border: Json = isRecord(raw.border) ? raw.border : {};
  const shadow: Json = isRecord(raw.shadow) ? raw.shadow : {};
  const spacing: Json = isRecord(raw.spacing) ? raw.spacing : {};
  const transformation: Json = isRecord(raw.transformation) ? raw.transformation : {};
  return {
    ...d,
    id,
    width: decodeLength(raw.width, d.width),
    widthMin: bound(raw.widthMin),
    widthMax: bound(raw.widthMax),
    height: decodeLength(raw.height, d.height),
    heightMin: bound(raw.heightMin),
    heightMax: bound(raw.heightMax),
    spacing: {
      x: num(spacing.x, d.spacing.x),
      y: num(spacing.y, d.spacing.y),
      locked: bool(spacing.locked, d.spacing.locked),
    },
    padding: decodeEdges(raw.padding, d.padding),
    transformation: {
      offsetX: num(transformation.offsetX, d.transformation.offsetX),
      offsetY: num(transformation.offsetY, d.transformation.offsetY),
      rotation: num(transformation.rotation, d.transformation.rotation),
      scale: num(transformation.scale, d.transformation.scale),
    },
    border: {
      color: str(border.color, d.border.color),
      style: oneOf(border.style, ['solid', 'dashed', 'dotted'] as const, d.border.style),
      width: decodeEdges(border.width, d.border.width),
      corner: decodeCorners(border.corner, d.border.corner),
    },
    shadow: {
      offsetX: num(shadow.offsetX, d.shadow.offsetX),
      offsetY: num(shadow.offsetY, d.shadow.offsetY),
      size: num(shadow.size, d.shadow.size),
      blur: num(shadow.blur, d.shadow.blur),
      color: str(shadow.color, d.shadow.color),
      kind: oneOf(shadow.kind, ['inner', 'outer'] as const, d.shadow.kind),
    },
    background: decodeBackground(raw.background),
    fontFamily: decodeInheritable(raw.fontFamily, (v) => (typeof v === 'string' ? v : null)),
    fontColor: decodeInheritable(raw.fontColor, (v) => (typeof v === 'string' ? v : null)),
    fontSize: decodeInheritable(raw.fontSize, (v) => (typeof v === 'number' ? v : null)),
    fontWeight: decodeInheritable(raw.fontWeight, (v) => (typeof v === 'number' ? v : null)),
    letterSpacing: num(raw.letterSpacing, d.letterSpacing),
    wordSpacing: num(raw.wordSpacing, d.wordSpacing),
    textAlignment: oneOf(raw.textAlignment, ['left', 'center', 'right', 'justify'] as const, d.textAlignment),
    alignmentX: oneOf(raw.alignmentX, alignments, d.alignmentX),
    alignmentY: oneOf(raw.alignmentY, alignments, d.alignmentY),
    position: oneOf(raw.position, ['normal', 'inFront'] as const, d.position),
  };
}

const alignments: readonly Alignment[] = ['none', 'start', 'center', 'end', 'stretch'];

const headingLevels: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

function decodeNodeType(raw: unknown): NodeType | null {
  if (!isRecord(raw)) return null;
  const text = str(raw.text, '');
  const structural = oneOf(raw.kind, ['document', 'page', 'column', 'textColumn'] as const, null);
  if (structural) return { kind: structural };
  const labelled = oneOf(
    raw.kind,
    ['paragraph', 'text', 'button', 'checkbox', 'textField', 'textFieldMultiline', 'radio', 'option'] as const,
    null,
  );
  if (labelled) return { kind: labelled, text };
  switch (raw.kind) {
    case 'row':
      return { kind: 'row', wrapped: bool(raw.wrapped, false) };
    case 'heading':
      return { kind: 'heading', text, level: oneOf<HeadingLevel, HeadingLevel>(raw.level, headingLevels, 1) };
    case 'image': {
      const image: Json = isRecord(raw.image) ? raw.image : {};
      return {
        kind: 'image',
        image: {
          src: str(image.src, ''),
          description: str(image.description, ''),
          width: nullableNum(image.width),
          height: nullableNum(image.height),
          mimeType: typeof image.mimeType === 'string' ? image.mimeType : null,
        },
      };
    }
    default:
      return null;
  }
}

function decodeLength(raw: unknown, fallback: Length): Length {
  if (!isRecord(raw)) return fallback;
  switch (raw.kind) {
    case 'fixed':
      return { kind: 'fixed', value: num(raw.value, 0) };
    case 'fill':
      return { kind: 'fill', portion: num(raw.portion, 1) };
    case 'fit':
      return { kind: 'fit' };
    default:
      return fallback;
  }
}

function decodeEdges(raw: unknown, fallback: Padding): Padding {
  if (!isRecord(raw)) return fallback;
  return {
    top: num(raw.top, fallback.top),
    right: num(raw.right, fallback.right),
    bottom: num(raw.bottom, fallback.bottom),
    left: num(raw.left, fallback.left),
    locked: bool(raw.locked, fallback.locked),
  };
}

function decodeCorners(raw: unknown, fallback: BorderCorner): BorderCorner {
  if (!isRecord(raw)) return fallback;
  return {
    topLeft: num(raw.topLeft, fallback.topLeft),
    topRight: num(raw.topRight, fallback.topRight),
    bottomRight: num(raw.bottomRight, fallback.bottomRight),
    bottomLeft: num(raw.bottomLeft, fallback.bottomLeft),
    locked: bool(raw.locked, fallback.locked),
  };
}

function decodeBackground(raw: unknown): Background {
  if (!isRecord(raw)) return { kind: 'none' };
  if (raw.kind === 'solid' && typeof raw.color === 'string') return { kind: 'solid', color: raw.color };
  if (raw.kind === 'image' && typeof raw.url === 'string') return { kind: 'image', url: raw.url };
  return { kind: 'none' };
}

function decodeInheritable<T>(raw: unknown, decode: (value: unknown) => T | null): Inheritable<T> {
  if (!isRecord(raw) || raw.kind !== 'local') return { kind: 'inherit' };
  const value = decode(raw.value);
  return value === null ? { kind: 'inherit' } : { kind: 'local', value };
}

function decodeViewport(raw: unknown): Viewport {
  if (!isRecord(raw) || raw.kind !== 'device') return { kind: 'fluid' };
  return {
    kind: 'device',
    name: str(raw.name, ''),
    width: num(raw.width, 0),
    height: num(raw.height, 0),
    landscape: bool(raw.landscape, false),
  };
}

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function nullableNum(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function bound(value: unknown): number | null {
  const n = nullableNum(value);
  return n === null ? null : clamp(MIN_LENGTH, MAX_LENGTH, n);
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function oneOf<T, F>(value: unknown, options: readonly T[], fallback: F): T | F {
  return options.find((option) => option === value) ?? fallback;
}
