export * from './types';
export * from './core/tree';
export * from './core/cursor';
export * from './core/placement';
export * from './core/insert';
export * from './core/ids';
export * from './core/properties';
export * from './core/input';
export * from './core/templates';
export * from './core/document';
export * from './core/codec';
export * from './core/drop';
export * from './core/render';
export * as history from './core/history';
export type { History } from './core/history';
export * from './state/store';
export * from './react/useDesignerShortcuts';
export * from './react/useDropTargets';
