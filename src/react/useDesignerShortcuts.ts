import { useEffect } from 'react';
import type { RefObject } from 'react';
import { useDesignerStore } from '../state/store';

export type DesignerShortcutsOptions = {
  /** Ctrl/Cmd+Z */
  undo?: boolean;
  /** Ctrl/Cmd+Shift+Z and Ctrl/Cmd+Y */
  redo?: boolean;
  /** Delete / Backspace removes the selected node */
  remove?: boolean;
  /** Ctrl/Cmd+D */
  duplicate?: boolean;
  /** Ctrl/Cmd + C / X / V */
  clipboard?: boolean;
  escapeClearsSelection?: boolean;
};

const defaultOptions: Required<DesignerShortcutsOptions> = {
  undo: true,
  redo: true,
  remove: true,
  duplicate: true,
  clipboard: true,
  escapeClearsSelection: true,
};

function isTextInput(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  const tag = target.tagName.toLowerCase();
  if (tag === 'input' || tag === 'textarea' || tag === 'select') return true;
  return target.isContentEditable;
}

/**
 * Editor keyboard shortcuts on a host element. Keys pressed while typing in a
 * form field are left alone.
 * Usage:
 * const ref = useRef<HTMLDivElement>(null);
 * useDesignerShortcuts(ref, { clipboard: false });
 */
export function useDesignerShortcuts(ref: RefObject<HTMLElement>, options?: DesignerShortcutsOptions): void {
  const opts = { ...defaultOptions, ...(options ?? {}) };

  useEffect(() => {
    const el = ref.current;
    if (!el) return;

    function onKeyDown(e: KeyboardEvent) {
      if (isTextInput(e.target)) return;
      const s = useDesignerStore.getState();
      const mod = e.ctrlKey || e.metaKey;
      const key = e.key.toLowerCase();

      if (mod && !e.altKey) {
        if (opts.undo && key === 'z' && !e.shiftKey) {
          e.preventDefault();
          s.undo();
          return;
        }
        if (opts.redo && ((key === 'z' && e.shiftKey) || (key === 'y' && !e.shiftKey))) {
          e.preventDefault();
          s.redo();
          return;
        }
        if (e.shiftKey) return;
        if (opts.duplicate && key === 'd') {
          e.preventDefault();
          s.duplicateSelected();
          return;
        }
        if (opts.clipboard) {
          if (key === 'c' && s.selectedId !== null) {
            e.preventDefault();
            s.copySelected();
          } else if (key === 'x' && s.selectedId !== null) {
            e.preventDefault();
            s.cutSelected();
          } else if (key === 'v' && s.clipboard) {
            e.preventDefault();
            s.pasteClipboard();
          }
        }
        return;
      }

      if (opts.remove && (e.key === 'Delete' || e.key === 'Backspace') && s.selectedId !== null) {
        e.preventDefault();
        s.removeSelected();
        return;
      }

      if (opts.escapeClearsSelection && e.key === 'Escape' && s.selectedId !== null) {
        e.preventDefault();
        s.select(null);
      }
    }

    el.addEventListener('keydown', onKeyDown);
    return () => {
      el.removeEventListener('keydown', onKeyDown);
    };
  }, [
    ref,
    opts.undo,
    opts.redo,
    opts.remove,
    opts.duplicate,
    opts.clipboard,
    opts.escapeClearsSelection,
  ]);
}
