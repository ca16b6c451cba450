import type { NodeKind } from '../types';

/**
 * Kinds that take children through the combined insert. Radio is listed here
 * even though `containment` only lets Options into it.
 */
export function isContainer(kind: NodeKind): boolean {
  switch (kind) {
    case 'document':
    case 'page':
    case 'row':
    case 'column':
    case 'textColumn':
    case 'radio':
      return true;
    case 'heading':
    case 'paragraph':
    case 'text':
    case 'image':
    case 'button':
    case 'checkbox':
    case 'textField':
    case 'textFieldMultiline':
    case 'option':
      return false;
    default:
      return assertNever(kind);
  }
}

/** Whether a `candidate` may be dropped into a `container`. */
export function containment(container: NodeKind, candidate: NodeKind): boolean {
  switch (container) {
    case 'radio':
      return candidate === 'option';
    case 'document':
    case 'page':
    case 'row':
    case 'column':
    case 'textColumn':
      return candidate !== 'option';
    case 'heading':
    case 'paragraph':
    case 'text':
    case 'image':
    case 'button':
    case 'checkbox':
    case 'textField':
    case 'textFieldMultiline':
    case 'option':
      return false;
    default:
      return assertNever(container);
  }
}

/** Whether a `candidate` may be placed right before or after `neighbor`. */
export function sibling(neighbor: NodeKind, candidate: NodeKind): boolean {
  switch (neighbor) {
    case 'option':
      return candidate === 'option';
    case 'page':
      return candidate === 'page';
    case 'document':
    case 'row':
    case 'column':
    case 'textColumn':
    case 'heading':
    case 'paragraph':
    case 'text':
    case 'image':
    case 'button':
    case 'checkbox':
    case 'textField':
    case 'textFieldMultiline':
    case 'radio':
      return candidate !== 'option' && candidate !== 'page';
    default:
      return assertNever(neighbor);
  }
}

/**
 * `containment` plus the document shape: the Document holds Pages and
 * nothing else, and a Page lives directly under the Document.
 */
export function canAppendChild(parent: NodeKind, candidate: NodeKind): boolean {
  if (parent === 'document') return candidate === 'page';
  if (candidate === 'page') return false;
  return containment(parent, candidate);
}

/** `sibling` for a neighbor that has a parent; nothing goes beside the root. */
export function canInsertBeside(neighbor: NodeKind, neighborHasParent: boolean, candidate: NodeKind): boolean {
  return neighborHasParent && sibling(neighbor, candidate);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled node kind: ${String(value)}`);
}
