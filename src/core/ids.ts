import { v4 as uuidv4 } from 'uuid';
import type { NodeId } from '../types';
import type { Tree } from './tree';
import { flatten } from './tree';

/**
 * State of the id stream. Callers thread it through every operation that
 * stamps new ids and keep the returned seed for the next one.
 */
export type Seed = { readonly state: number };

export function createSeed(value: number): Seed {
  return { state: value >>> 0 };
}

// mulberry32 step
function nextWord(state: number): [number, number] {
  const nextState = (state + 0x6d2b79f5) | 0;
  let t = nextState;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return [(t ^ (t >>> 14)) >>> 0, nextState >>> 0];
}

export function generateId(seed: Seed): [NodeId, Seed] {
  const bytes: number[] = [];
  let state = seed.state;
  for (let i = 0; i < 4; i++) {
    const [word, next] = nextWord(state);
    state = next;
    bytes.push(word >>> 24, (word >>> 16) & 0xff, (word >>> 8) & 0xff, word & 0xff);
  }
  return [uuidv4({ random: bytes }), { state }];
}

/**
 * Copy `t` giving every node a new id. Nodes are visited in pre-order, each
 * exactly once.
 */
export function cloneWithFreshIds<T extends { readonly id: NodeId }>(t: Tree<T>, seed: Seed): [Tree<T>, Seed] {
  const [id, afterSelf] = generateId(seed);
  let current = afterSelf;
  const children: Tree<T>[] = [];
  for (const child of t.children) {
    const [cloned, next] = cloneWithFreshIds(child, current);
    children.push(cloned);
    current = next;
  }
  return [{ label: { ...t.label, id }, children }, current];
}

export function collectIds<T extends { readonly id: NodeId }>(t: Tree<T>): NodeId[] {
  return flatten(t).map((l) => l.id);
}
