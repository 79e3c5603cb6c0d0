import type { TreePath } from './tree-path';
import type { ROW_ROLES, RowLocation, TREE_ZONES } from './tree-zone';

/** Direction a row slides in from or out to. */
export enum ROW_ANIMATIONS {
  TOP = 'top',
  BOTTOM = 'bottom',
  FADE = 'fade',
}

export type RowOperationKind = 'insert' | 'delete';

/**
 * Structural edit on one zone. Delete indices refer to the list before the batch,
 * insert indices to the list after it.
 */
export interface RowOperation {
  kind: RowOperationKind;
  zone: TREE_ZONES;
  rows: readonly number[];
  animation: ROW_ANIMATIONS;
}

/** A row updated in place after the structural edits commit. */
export interface RowRepaint {
  location: RowLocation;
  path: TreePath;
  role: ROW_ROLES;
  animation: 'cross-fade';
}

export interface RowTransition {
  operations: readonly RowOperation[];
  repaint: RowRepaint | null;
}

export const EMPTY_TRANSITION: RowTransition = Object.freeze({
  operations: Object.freeze([]),
  repaint: null,
});
