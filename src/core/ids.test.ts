import { describe, it, expect } from 'vitest';
import type { DesignNode } from '../types';
import { cloneWithFreshIds, collectIds, createSeed, generateId } from './ids';
import type { Seed } from './ids';
import { defaultNode } from './templates';
import type { Tree } from './tree';
import { singleton, tree } from './tree';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const n = (id: string): DesignNode => ({ ...defaultNode({ kind: 'column' }, id), id });

function take(seed: Seed, count: number): [string[], Seed] {
  const out: string[] = [];
  let current = seed;
  for (let i = 0; i < count; i++) {
    const [id, next] = generateId(current);
    out.push(id);
    current = next;
  }
  return [out, current];
}

describe('generateId', () => {
  it('is deterministic for a given seed', () => {
    const [a, seedA] = generateId(createSeed(42));
    const [b, seedB] = generateId(createSeed(42));
    expect(a).toBe(b);
    expect(seedA).toEqual(seedB);
  });

  it('produces uuid v4 strings and advances the seed', () => {
    const seed = createSeed(7);
    const [id, next] = generateId(seed);
    expect(id).toMatch(UUID_V4);
    expect(next).not.toEqual(seed);
  });

  it('yields distinct ids along one seed stream', () => {
    const [ids] = take(createSeed(123), 500);
    expect(new Set(ids).size).toBe(500);
  });
});

describe('cloneWithFreshIds', () => {
  // a ── b ── c
  //   └─ d ── e
  const original: Tree<DesignNode> = tree(n('a'), [
    tree(n('b'), [singleton(n('c'))]),
    tree(n('d'), [singleton(n('e'))]),
  ]);

  it('gives every node of a 5-node subtree a new, distinct id', () => {
    const [clone] = cloneWithFreshIds(original, createSeed(99));
    const fresh = collectIds(clone);
    expect(fresh).toHaveLength(5);
    expect(new Set(fresh).size).toBe(5);
    for (const id of fresh) expect(collectIds(original)).not.toContain(id);
  });

  it('stamps ids in pre-order from the seed stream and returns the seed after the last one', () => {
    const seed = createSeed(5);
    const [clone, next] = cloneWithFreshIds(original, seed);
    const [expected, expectedNext] = take(seed, 5);
    expect(collectIds(clone)).toEqual(expected);
    expect(next).toEqual(expectedNext);
  });

  it('keeps everything but the ids', () => {
    const [clone] = cloneWithFreshIds(original, createSeed(1));
    expect(clone.children[1].children[0].label.name).toBe('e');
    expect(clone.children.map((c) => c.label.name)).toEqual(['b', 'd']);
    expect(original.label.id).toBe('a');
  });
});
