import { describe, it, expect } from 'vitest';
import { local } from '../types';
import { findById, fromTree, mapLabel, parent, toTree } from './cursor';
import { loadDocument, serializeDocument } from './codec';
import { createDocument, SCHEMA_VERSION, toggleCollapsed } from './document';
import { createSeed } from './ids';
import { insert } from './insert';
import { headingTemplate, imageTemplate, instantiate, radioTemplate } from './templates';

function sampleDocument() {
  const [doc, seed] = createDocument(createSeed(11), 1_700_000_000_000);
  const page = doc.root.children[0].label.id;
  const [heading, s1] = instantiate(headingTemplate(2), seed);
  const [radio, s2] = instantiate(radioTemplate(), s1);
  const [image] = instantiate(imageTemplate('https://example.com/cat.png'), s2);
  let c = findById(page, fromTree(doc.root));
  if (!c) throw new Error('fixture');
  c = insert(heading, c);
  c = mapLabel((l) => ({ ...l, fontColor: local('#ff0000'), widthMin: 40 }), c);
  c = insert(radio, parent(c));
  c = insert(image, parent(c));
  const root = toTree(c);
  return toggleCollapsed({ ...doc, root, viewport: { kind: 'device', name: 'Tablet', width: 768, height: 1024, landscape: false } }, page);
}

describe('document codec', () => {
  it('loads what it saves', () => {
    const doc = sampleDocument();
    const result = loadDocument(serializeDocument(doc));
    expect(result).toEqual({ ok: true, document: doc });
  });

  it('requires the schema version', () => {
    const doc = sampleDocument();
    const { schemaVersion: _dropped, ...rest } = doc;
    expect(_dropped).toBe(SCHEMA_VERSION);
    expect(loadDocument(JSON.stringify(rest))).toEqual({ ok: false, error: { kind: 'missing-version' } });
  });

  it('rejects documents written by a newer schema', () => {
    const text = JSON.stringify({ ...sampleDocument(), schemaVersion: SCHEMA_VERSION + 1 });
    expect(loadDocument(text)).toEqual({ ok: false, error: { kind: 'unsupported-version', version: SCHEMA_VERSION + 1 } });
  });

  it('reports unparseable text', () => {
    const result = loadDocument('{ not json');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('invalid-json');
  });

  it('migrates a version 1 document with a collapsed id list', () => {
    const doc = sampleDocument();
    const pageId = doc.root.children[0].label.id;
    const v1 = { ...doc, schemaVersion: 1, collapsedIds: [pageId, 'gone'] };
    const result = loadDocument(JSON.stringify(v1));
    expect(result).toEqual({ ok: true, document: { ...doc, collapsedIds: { [pageId]: true } } });
  });

  it('rejects a root that is not a document', () => {
    const doc = sampleDocument();
    const text = JSON.stringify({ ...doc, root: doc.root.children[0] });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: 'root is not a document node' },
    });
  });

  it('rejects duplicate ids', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [page, page] } });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: `duplicate id ${page.label.id}` },
    });
  });

  it('rejects unknown node kinds', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const bogus = { label: { ...page.label, id: 'x1', type: { kind: 'marquee' } }, children: [] };
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [{ ...page, children: [bogus] }] } });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: 'node x1 has an unknown type' },
    });
  });

  it('fills missing style fields with defaults', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const { padding: _padding, ...bare } = page.label;
    expect(_padding).toEqual(page.label.padding);
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [{ ...page, label: bare }] } });
    const result = loadDocument(text);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.root.children[0].label.padding).toEqual({ top: 0, right: 0, bottom: 0, left: 0, locked: false });
  });

  it('rejects nodes the placement rules would never put there', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const radio = page.children[1];
    const option = radio.children[0];
    const stray = { ...option, label: { ...option.label, id: 'o9' } };
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [{ ...page, children: [...page.children, stray] }] } });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: `option o9 cannot be placed in page ${page.label.id}` },
    });
  });

  it('rejects children under a leaf', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const [heading, ...rest] = page.children;
    const nested = { ...heading, children: [{ label: { ...heading.label, id: 'h9' }, children: [] }] };
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [{ ...page, children: [nested, ...rest] }] } });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: `heading h9 cannot be placed in heading ${heading.label.id}` },
    });
  });

  it('rejects a document child that is not a page', () => {
    const doc = sampleDocument();
    const heading = doc.root.children[0].children[0];
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [heading] } });
    expect(loadDocument(text)).toEqual({
      ok: false,
      error: { kind: 'invalid-structure', reason: `heading ${heading.label.id} cannot be placed in document ${doc.root.label.id}` },
    });
  });

  it('clamps size bounds into range', () => {
    const doc = sampleDocument();
    const page = doc.root.children[0];
    const label = { ...page.label, widthMin: 99999, heightMax: -3 };
    const text = JSON.stringify({ ...doc, root: { ...doc.root, children: [{ ...page, label }] } });
    const result = loadDocument(text);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const loaded = result.document.root.children[0].label;
    expect([loaded.widthMin, loaded.heightMax]).toEqual([9999, 0]);
  });
});
