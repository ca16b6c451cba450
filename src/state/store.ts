import { create } from 'zustand';
import type { DesignNode, NodeId } from '../types';
import type { Cursor } from '../core/cursor';
import { findById, fromTree, hasParent, insertAfter, label, mapLabel, remove, toTree } from '../core/cursor';
import type { DesignDocument, Viewport } from '../core/document';
import { createDocument, toggleCollapsed, withRoot } from '../core/document';
import type { DropPosition } from '../core/drop';
import { moveSubtree, placeSubtree } from '../core/drop';
import type { History } from '../core/history';
import { applyEdit, createHistory, hasFuture, hasPast, redo, replacePresent, undo } from '../core/history';
import type { Seed } from '../core/ids';
import { cloneWithFreshIds, createSeed } from '../core/ids';
import { canInsert, insert } from '../core/insert';
import type { Template } from '../core/templates';
import { instantiate, pageTemplate } from '../core/templates';
import type { Tree } from '../core/tree';
import { structurallyEqual } from '../core/tree';

export type DesignerState = {
  /** Undo/redo stacks; `history.present` is the document being edited. */
  readonly history: History<DesignDocument>;
  /** Id stream. Lives outside `history` so undo never hands out an id twice. */
  readonly seed: Seed;
  readonly selectedId: NodeId | null;
  /** Subtree captured by copy/cut, ids still those of the source nodes. */
  readonly clipboard: Tree<DesignNode> | null;
  /** Present document at `beginEdit`; non-null while an edit is in progress. */
  readonly editBase: DesignDocument | null;
};

export type DesignerActions = {
  loadDocument: (doc: DesignDocument) => void;
  newDocument: () => void;
  select: (id: NodeId | null) => void;
  /** Stamp `template` and insert it at the selection (the root when nothing is selected). */
  insertTemplate: (template: Template) => void;
  addPage: () => void;
  /** Remove `id` and its subtree; the parent takes over the selection if it was on `id`. */
  removeNode: (id: NodeId) => void;
  removeSelected: () => void;
  duplicateSelected: () => void;
  // Drag and drop
  moveNode: (id: NodeId, targetId: NodeId, position: DropPosition) => void;
  dropTemplate: (template: Template, targetId: NodeId, position: DropPosition) => void;
  // Property edits
  updateNode: (id: NodeId, transform: (node: DesignNode) => DesignNode) => void;
  updateSelected: (transform: (node: DesignNode) => DesignNode) => void;
  renameNode: (id: NodeId, name: string) => void;
  /** Temporary/commit pattern: everything between begin and end is one history entry. */
  beginEdit: () => void;
  updateSelectedTemporary: (transform: (node: DesignNode) => DesignNode) => void;
  endEdit: () => void;
  // UI state carried by the document, not recorded on its own
  setViewport: (viewport: Viewport) => void;
  toggleCollapsed: (id: NodeId) => void;
  // Clipboard
  copySelected: () => void;
  cutSelected: () => void;
  pasteClipboard: () => void;
  // History
  undo: () => void;
  redo: () => void;
};

export type DesignerStore = DesignerState & DesignerActions;

const initialSeed = createSeed(Date.now());
const [initialDocument, seedAfterInitial] = createDocument(initialSeed, Date.now());
const initialSelectedId: NodeId | null = null;
const initialClipboard: Tree<DesignNode> | null = null;
const initialEditBase: DesignDocument | null = null;

/** Cursor on `id` in the present document, or `null`. */
function cursorAt(s: DesignerState, id: NodeId | null): Cursor<DesignNode> | null {
  if (id === null) return null;
  return findById(id, fromTree(s.history.present.root));
}

/**
 * Record `root` as one edit, or fold it into the present while an edit is in
 * progress. Selection is dropped if its node is gone.
 */
function commitRoot(s: DesignerState, root: Tree<DesignNode>, selectedId: NodeId | null): Partial<DesignerState> {
  const next = withRoot(s.history.present, root, Date.now());
  const history = s.editBase ? replacePresent(s.history, next) : applyEdit(s.history, next);
  const keep = selectedId !== null && findById(selectedId, fromTree(root)) ? selectedId : null;
  return { history, selectedId: keep };
}

function stillPresent(doc: DesignDocument, id: NodeId | null): NodeId | null {
  return id !== null && findById(id, fromTree(doc.root)) ? id : null;
}

export const useDesignerStore = create<DesignerStore>()((set, get) => ({
  history: createHistory(initialDocument),
  seed: seedAfterInitial,
  selectedId: initialSelectedId,
  clipboard: initialClipboard,
  editBase: initialEditBase,

  loadDocument: (doc) =>
    set({ history: createHistory(doc), selectedId: null, editBase: null }),

  newDocument: () =>
    set((s) => {
      const [doc, seed] = createDocument(s.seed, Date.now());
      return { history: createHistory(doc), seed, selectedId: null, editBase: null };
    }),

  select: (id) =>
    set((s) => ({ selectedId: stillPresent(s.history.present, id) })),

  insertTemplate: (template) =>
    set((s) => {
      const at = cursorAt(s, s.selectedId) ?? fromTree(s.history.present.root);
      const [subtree, seed] = instantiate(template, s.seed);
      if (!canInsert(subtree.label.type.kind, at)) return {};
      const placed = insert(subtree, at);
      return { ...commitRoot(s, toTree(placed), subtree.label.id), seed };
    }),

  addPage: () =>
    set((s) => {
      const [page, seed] = instantiate(pageTemplate(), s.seed);
      const rootId = s.history.present.root.label.id;
      const root = placeSubtree(s.history.present.root, page, rootId, 'into');
      if (!root) return {};
      return { ...commitRoot(s, root, page.label.id), seed };
    }),

  removeNode: (id) =>
    set((s) => {
      const at = cursorAt(s, id);
      if (!at || !hasParent(at)) return {};
      const removed = remove(at);
      const selectedId = s.selectedId === id ? label(removed).id : s.selectedId;
      return commitRoot(s, toTree(removed), selectedId);
    }),

  removeSelected: () => {
    const { selectedId, removeNode } = get();
    if (selectedId !== null) removeNode(selectedId);
  },

  duplicateSelected: () =>
    set((s) => {
      const at = cursorAt(s, s.selectedId);
      if (!at || !hasParent(at)) return {};
      const [copy, seed] = cloneWithFreshIds(at.focus, s.seed);
      const placed = insertAfter(copy, at);
      return { ...commitRoot(s, toTree(placed), copy.label.id), seed };
    }),

  moveNode: (id, targetId, position) =>
    set((s) => {
      const present = s.history.present.root;
      const root = moveSubtree(present, id, targetId, position);
      if (!root || structurallyEqual(root, present, (a, b) => a === b)) return {};
      return commitRoot(s, root, id);
    }),

  dropTemplate: (template, targetId, position) =>
    set((s) => {
      const [subtree, seed] = instantiate(template, s.seed);
      const root = placeSubtree(s.history.present.root, subtree, targetId, position);
      if (!root) return {};
      return { ...commitRoot(s, root, subtree.label.id), seed };
    }),

  updateNode: (id, transform) =>
    set((s) => {
      const at = cursorAt(s, id);
      if (!at) return {};
      const before = label(at);
      const after = transform(before);
      // ids are stamped only by the generator; kinds are fixed by placement
      if (after === before || after.id !== before.id || after.type.kind !== before.type.kind) return {};
      return commitRoot(s, toTree(mapLabel(() => after, at)), s.selectedId);
    }),

  updateSelected: (transform) => {
    const { selectedId, updateNode } = get();
    if (selectedId !== null) updateNode(selectedId, transform);
  },

  renameNode: (id, name) => get().updateNode(id, (node) => (node.name === name ? node : { ...node, name })),

  beginEdit: () =>
    set((s) => {
      if (s.editBase) return {};
      return { editBase: s.history.present };
    }),

  updateSelectedTemporary: (transform) => {
    if (!get().editBase) get().beginEdit();
    get().updateSelected(transform);
  },

  endEdit: () =>
    set((s) => {
      const base = s.editBase;
      if (!base) return {};
      if (s.history.present === base) return { editBase: null };
      // record the whole gesture as a single step from where it started
      return { history: applyEdit({ ...s.history, present: base }, s.history.present), editBase: null };
    }),

  setViewport: (viewport) =>
    set((s) => ({ history: replacePresent(s.history, { ...s.history.present, viewport }) })),

  toggleCollapsed: (id) =>
    set((s) => {
      if (!cursorAt(s, id)) return {};
      return { history: replacePresent(s.history, toggleCollapsed(s.history.present, id)) };
    }),

  copySelected: () =>
    set((s) => {
      const at = cursorAt(s, s.selectedId);
      if (!at || !hasParent(at)) return {};
      return { clipboard: at.focus };
    }),

  cutSelected: () => {
    get().copySelected();
    get().removeSelected();
  },

  pasteClipboard: () => {
    const clip = get().clipboard;
    if (clip) get().insertTemplate(clip);
  },

  undo: () =>
    set((s) => {
      if (s.editBase || !hasPast(s.history)) return {};
      const history = undo(s.history);
      return { history, selectedId: stillPresent(history.present, s.selectedId) };
    }),

  redo: () =>
    set((s) => {
      if (s.editBase || !hasFuture(s.history)) return {};
      const history = redo(s.history);
      return { history, selectedId: stillPresent(history.present, s.selectedId) };
    }),
}));

// Convenience hooks
export function useDocument(): DesignDocument {
  return useDesignerStore((s) => s.history.present);
}

export function useSelectedNode(): DesignNode | null {
  return useDesignerStore((s) => {
    const at = cursorAt(s, s.selectedId);
    return at ? label(at) : null;
  });
}

export function useCanUndo(): boolean {
  return useDesignerStore((s) => hasPast(s.history));
}

export function useCanRedo(): boolean {
  return useDesignerStore((s) => hasFuture(s.history));
}

export function useHistoryActions(): Pick<DesignerActions, 'undo' | 'redo' | 'beginEdit' | 'endEdit'> {
  return useDesignerStore((s) => ({
    undo: s.undo,
    redo: s.redo,
    beginEdit: s.beginEdit,
    endEdit: s.endEdit,
  }));
}

export function useEditActions(): Pick<
  DesignerActions,
  'insertTemplate' | 'addPage' | 'removeNode' | 'removeSelected' | 'duplicateSelected' | 'updateSelected' | 'renameNode'
> {
  return useDesignerStore((s) => ({
    insertTemplate: s.insertTemplate,
    addPage: s.addPage,
    removeNode: s.removeNode,
    removeSelected: s.removeSelected,
    duplicateSelected: s.duplicateSelected,
    updateSelected: s.updateSelected,
    renameNode: s.renameNode,
  }));
}
