/**
 * Linear snapshot history. `past` is oldest-first, `future` nearest-first:
 * `past[past.length - 1]` and `future[0]` are the states one step away.
 */
export type History<T> = {
  readonly past: readonly T[];
  readonly present: T;
  readonly future: readonly T[];
};

export function createHistory<T>(present: T): History<T> {
  return { past: [], present, future: [] };
}

/**
 * Record one completed edit. Any redo branch is dropped. Passing the current
 * present back in records nothing.
 */
export function applyEdit<T>(h: History<T>, next: T): History<T> {
  if (next === h.present) return h;
  return { past: [...h.past, h.present], present: next, future: [] };
}

/** Swap the present without recording it, for edits still in progress. */
export function replacePresent<T>(h: History<T>, next: T): History<T> {
  if (next === h.present) return h;
  return { ...h, present: next };
}

export function undo<T>(h: History<T>): History<T> {
  if (h.past.length === 0) return h;
  const past = h.past.slice(0, -1);
  const previous = h.past[h.past.length - 1];
  return { past, present: previous, future: [h.present, ...h.future] };
}

export function redo<T>(h: History<T>): History<T> {
  if (h.future.length === 0) return h;
  const [next, ...future] = h.future;
  return { past: [...h.past, h.present], present: next, future };
}

export function hasPast<T>(h: History<T>): boolean {
  return h.past.length > 0;
}

export function hasFuture<T>(h: History<T>): boolean {
  return h.future.length > 0;
}
