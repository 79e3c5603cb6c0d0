import type { RowTransition } from './row-animation';
import type { TreePath } from './tree-path';

export type NavigationChangeKind = 'replace' | 'descend' | 'ascend' | 'reselect';

export interface NavigationChange {
  kind: NavigationChangeKind;
  previousPath: TreePath;
  path: TreePath;
}

/** Navigation gesture named by a row tap, before it is applied. */
export type NavigationIntent =
  | { kind: 'ascend'; depth: number }
  | { kind: 'descend-root'; index: number }
  | { kind: 'descend'; index: number }
  | { kind: 'reselect' };

export type TreeSourceEvent =
  | { type: 'selection-changed'; path: TreePath; cause: NavigationChangeKind }
  | { type: 'reselect-current'; path: TreePath }
  | { type: 'transition'; change: NavigationChange; transition: RowTransition }
  | { type: 'reload'; path: TreePath };
