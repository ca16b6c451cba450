import { describe, it, expect, beforeEach } from 'vitest';
import { findById, fromTree } from '../core/cursor';
import { createDocument } from '../core/document';
import { createHistory } from '../core/history';
import { createSeed } from '../core/ids';
import { applyWidthMin } from '../core/input';
import { columnTemplate, headingTemplate, optionTemplate, radioTemplate, rowTemplate, textTemplate } from '../core/templates';
import { foldTree } from '../core/tree';
import type { DesignNode } from '../types';
import { useDesignerStore } from './store';

function resetStore() {
  const [doc, seed] = createDocument(createSeed(1), 0);
  useDesignerStore.setState({ history: createHistory(doc), seed, selectedId: null, clipboard: null, editBase: null });
}

const state = () => useDesignerStore.getState();
const root = () => state().history.present.root;
const pageId = () => root().children[0].label.id;
const nodeById = (id: string): DesignNode | undefined => findById(id, fromTree(root()))?.focus.label;
const shape = () =>
  foldTree<DesignNode, string>((l, cs) => (cs.length ? `${l.type.kind}(${cs.join(' ')})` : l.type.kind), root());

function selectedIdOrThrow(): string {
  const id = state().selectedId;
  if (id === null) throw new Error('nothing selected');
  return id;
}

describe('Nodes: inserting templates', () => {
  beforeEach(() => resetStore());

  it('appends into a selected container and selects the new node', () => {
    const seedBefore = state().seed;
    state().select(pageId());
    state().insertTemplate(columnTemplate());

    expect(shape()).toBe('document(page(column))');
    const inserted = root().children[0].children[0].label;
    expect(state().selectedId).toBe(inserted.id);
    expect(state().seed).not.toEqual(seedBefore);
  });

  it('places content after the parent of a selected leaf', () => {
    state().select(pageId());
    state().insertTemplate(columnTemplate());
    state().insertTemplate(headingTemplate(1));
    expect(shape()).toBe('document(page(column(heading)))');

    state().insertTemplate(textTemplate());
    expect(shape()).toBe('document(page(column(heading) text))');
  });

  it('refuses placements the rules reject without touching history', () => {
    const before = state().history;

    // nothing selected: the document only takes pages
    state().insertTemplate(rowTemplate());
    expect(state().history).toBe(before);

    state().select(pageId());
    state().insertTemplate(optionTemplate());
    expect(state().history).toBe(before);

    // beside a leaf whose parent is a page
    state().insertTemplate(headingTemplate(1));
    const afterHeading = state().history;
    state().insertTemplate(textTemplate());
    expect(state().history).toBe(afterHeading);
    expect(shape()).toBe('document(page(heading))');
  });

  it('takes options into a radio', () => {
    state().select(pageId());
    state().insertTemplate(radioTemplate());
    state().insertTemplate(optionTemplate('Third'));
    expect(shape()).toBe('document(page(radio(option option option)))');
    expect(nodeById(selectedIdOrThrow())?.type).toEqual({ kind: 'option', text: 'Third' });
  });

  it('adds pages to the document', () => {
    state().addPage();
    expect(shape()).toBe('document(page page)');
    expect(state().selectedId).toBe(root().children[1].label.id);
  });
});

describe('Nodes: remove and duplicate', () => {
  beforeEach(() => resetStore());

  it('selects the parent after removing a node', () => {
    state().select(pageId());
    state().insertTemplate(columnTemplate());
    state().removeSelected();
    expect(shape()).toBe('document(page)');
    expect(state().selectedId).toBe(pageId());
  });

  it('removes a node by id without touching an unrelated selection', () => {
    state().addPage();
    const second = root().children[1].label.id;
    state().select(pageId());
    state().removeNode(second);
    expect(shape()).toBe('document(page)');
    expect(state().selectedId).toBe(pageId());
  });

  it('hands the selection to the parent when the selected node is removed by id', () => {
    state().select(pageId());
    state().insertTemplate(columnTemplate());
    state().removeNode(selectedIdOrThrow());
    expect(shape()).toBe('document(page)');
    expect(state().selectedId).toBe(pageId());
  });

  it('never removes the root', () => {
    state().select(root().label.id);
    const before = state().history;
    state().removeSelected();
    expect(state().history).toBe(before);
  });

  it('duplicates a subtree with fresh ids right after the original', () => {
    state().select(pageId());
    state().insertTemplate(radioTemplate());
    const original = root().children[0].children[0];
    state().duplicateSelected();

    expect(shape()).toBe('document(page(radio(option option) radio(option option)))');
    const copy = root().children[0].children[1];
    expect(state().selectedId).toBe(copy.label.id);
    expect(copy.label.id).not.toBe(original.label.id);
    expect(copy.children.map((c) => c.label.id)).not.toContain(original.children[0].label.id);
    expect(copy.children.map((c) => c.label.type)).toEqual(original.children.map((c) => c.label.type));
  });
});

describe('Nodes: property edits', () => {
  beforeEach(() => resetStore());

  it('applies field input to the selection', () => {
    state().select(pageId());
    state().insertTemplate(columnTemplate());
    const id = selectedIdOrThrow();
    state().updateSelected((n) => applyWidthMin('99999', n));
    expect(nodeById(id)?.widthMin).toBe(9999);
  });

  it('renames nodes and ignores no-op renames', () => {
    state().renameNode(pageId(), 'Landing');
    expect(nodeById(pageId())?.name).toBe('Landing');
    const before = state().history;
    state().renameNode(pageId(), 'Landing');
    expect(state().history).toBe(before);
  });

  it('ignores edits that change the id', () => {
    const before = state().history;
    state().updateNode(pageId(), (n) => ({ ...n, id: 'forged' }));
    expect(state().history).toBe(before);
  });

  it('ignores edits that change the node kind', () => {
    state().select(pageId());
    state().insertTemplate(columnTemplate());
    state().insertTemplate(headingTemplate(1));
    const column = root().children[0].children[0].label.id;
    const before = state().history;

    state().updateNode(pageId(), (n) => ({ ...n, type: { kind: 'heading', text: 'Oops', level: 1 } }));
    state().updateNode(column, (n) => ({ ...n, type: { kind: 'text', text: 'Oops' } }));
    expect(state().history).toBe(before);
    expect(shape()).toBe('document(page(column(heading)))');
  });

  it('accepts payload edits that keep the kind', () => {
    state().select(pageId());
    state().insertTemplate(headingTemplate(1));
    const id = selectedIdOrThrow();
    state().updateNode(id, (n) => ({ ...n, type: { kind: 'heading', text: 'Welcome', level: 2 } }));
    expect(nodeById(id)?.type).toEqual({ kind: 'heading', text: 'Welcome', level: 2 });
  });
});
