import { describe, it, expect } from 'vitest';
import { applyEdit, createHistory, hasFuture, hasPast, redo, replacePresent, undo } from './history';

describe('history', () => {
  it('walks edit, undo and redo', () => {
    const start = createHistory('A');

    const edited = applyEdit(start, 'B');
    expect(edited).toEqual({ past: ['A'], present: 'B', future: [] });

    const undone = undo(edited);
    expect(undone).toEqual({ past: [], present: 'A', future: ['B'] });

    const redone = redo(undone);
    expect(redone).toEqual({ past: ['A'], present: 'B', future: [] });
  });

  it('treats undo and redo on empty stacks as no-ops', () => {
    const h = createHistory('A');
    expect(undo(h)).toBe(h);
    expect(redo(h)).toBe(h);
  });

  it('keeps past oldest-first and future nearest-first', () => {
    const h = applyEdit(applyEdit(applyEdit(createHistory(1), 2), 3), 4);
    expect(h.past).toEqual([1, 2, 3]);
    const back = undo(undo(h));
    expect(back.present).toBe(2);
    expect(back.future).toEqual([3, 4]);
  });

  it('drops the redo branch on a new edit', () => {
    const h = undo(applyEdit(createHistory('A'), 'B'));
    const branched = applyEdit(h, 'C');
    expect(branched).toEqual({ past: ['A'], present: 'C', future: [] });
    expect(hasFuture(branched)).toBe(false);
  });

  it('records nothing when the present is handed back unchanged', () => {
    const h = createHistory({ n: 1 });
    expect(applyEdit(h, h.present)).toBe(h);
  });

  it('replaces the present without a snapshot', () => {
    const h = applyEdit(createHistory('A'), 'B');
    const replaced = replacePresent(h, 'B*');
    expect(replaced).toEqual({ past: ['A'], present: 'B*', future: [] });
  });

  it('answers hasPast and hasFuture without changing the history', () => {
    const h = undo(applyEdit(createHistory('A'), 'B'));
    const snapshot = { past: [...h.past], present: h.present, future: [...h.future] };
    expect(hasPast(h)).toBe(false);
    expect(hasFuture(h)).toBe(true);
    expect(h).toEqual(snapshot);
  });
});
