import { EMPTY_TRANSITION, ROW_ANIMATIONS } from '../types/row-animation';
import type { TreePath } from '../types/tree-path';
import type { NavigationChange } from '../types/tree-source-events';
import { ROW_ROLES, TREE_ZONES } from '../types/tree-zone';
import { displayedRowCounts } from './zone-layout';
import { applyTransitionCounts, reconcileTransition } from './zone-reconciler';

// root: [A, B, C]; A: [A1, A2]; A1: [x, y, z]; C: [C1]
const counts: Record<string, number> = { '': 3, '0': 2, '0/0': 3, '2': 1 };
const childCount = (path: TreePath) => counts[path.join('/')] ?? 0;

const change = (
  kind: NavigationChange['kind'],
  previousPath: TreePath,
  path: TreePath,
): NavigationChange => ({ kind, previousPath, path });

const reconcile = (next: NavigationChange) => reconcileTransition(next, { childCount });

describe('reconcileTransition', () => {
  it('collapses the root listing around the tapped item', () => {
    expect(reconcile(change('descend', [], [0]))).toEqual({
      operations: [
        { kind: 'insert', zone: TREE_ZONES.ANCESTORS, rows: [0], animation: ROW_ANIMATIONS.BOTTOM },
        { kind: 'delete', zone: TREE_ZONES.PIVOT, rows: [1, 2], animation: ROW_ANIMATIONS.FADE },
        { kind: 'insert', zone: TREE_ZONES.DESCENDANTS, rows: [0, 1], animation: ROW_ANIMATIONS.FADE },
      ],
      repaint: {
        location: { zone: TREE_ZONES.PIVOT, row: 0 },
        path: [0],
        role: ROW_ROLES.CURRENT,
        animation: 'cross-fade',
      },
    });
  });

  it('removes root items before the tapped one towards the top', () => {
    const transition = reconcile(change('descend', [], [2]));
    expect(transition?.operations).toEqual([
      { kind: 'insert', zone: TREE_ZONES.ANCESTORS, rows: [0], animation: ROW_ANIMATIONS.BOTTOM },
      { kind: 'delete', zone: TREE_ZONES.PIVOT, rows: [0, 1], animation: ROW_ANIMATIONS.TOP },
      { kind: 'insert', zone: TREE_ZONES.DESCENDANTS, rows: [0], animation: ROW_ANIMATIONS.FADE },
    ]);
  });

  it('swaps the children when descending inside a subtree', () => {
    expect(reconcile(change('descend', [0], [0, 0]))).toEqual({
      operations: [
        { kind: 'insert', zone: TREE_ZONES.ANCESTORS, rows: [1], animation: ROW_ANIMATIONS.BOTTOM },
        { kind: 'delete', zone: TREE_ZONES.DESCENDANTS, rows: [0, 1], animation: ROW_ANIMATIONS.FADE },
        { kind: 'insert', zone: TREE_ZONES.DESCENDANTS, rows: [0, 1, 2], animation: ROW_ANIMATIONS.FADE },
      ],
      repaint: {
        location: { zone: TREE_ZONES.PIVOT, row: 0 },
        path: [0, 0],
        role: ROW_ROLES.CURRENT,
        animation: 'cross-fade',
      },
    });
  });

  it('restores the root listing around the surviving pivot row', () => {
    expect(reconcile(change('ascend', [2], []))).toEqual({
      operations: [
        { kind: 'delete', zone: TREE_ZONES.ANCESTORS, rows: [0], animation: ROW_ANIMATIONS.BOTTOM },
        { kind: 'insert', zone: TREE_ZONES.PIVOT, rows: [0, 1], animation: ROW_ANIMATIONS.TOP },
        { kind: 'delete', zone: TREE_ZONES.DESCENDANTS, rows: [0], animation: ROW_ANIMATIONS.BOTTOM },
      ],
      repaint: {
        location: { zone: TREE_ZONES.PIVOT, row: 2 },
        path: [2],
        role: ROW_ROLES.ROOT,
        animation: 'cross-fade',
      },
    });
  });

  it('lands on an intermediate ancestor and repaints the pivot with it', () => {
    expect(reconcile(change('ascend', [0, 0, 1], [0]))).toEqual({
      operations: [
        { kind: 'delete', zone: TREE_ZONES.ANCESTORS, rows: [1, 2], animation: ROW_ANIMATIONS.BOTTOM },
        { kind: 'insert', zone: TREE_ZONES.DESCENDANTS, rows: [0, 1], animation: ROW_ANIMATIONS.FADE },
      ],
      repaint: {
        location: { zone: TREE_ZONES.PIVOT, row: 0 },
        path: [0],
        role: ROW_ROLES.CURRENT,
        animation: 'cross-fade',
      },
    });
  });

  it('produces no edits for a reselect', () => {
    expect(reconcile(change('reselect', [0], [0]))).toBe(EMPTY_TRANSITION);
  });

  it('leaves full replacement to a reload', () => {
    expect(reconcile(change('replace', [0], [2]))).toBeNull();
  });

  it('keeps row counts consistent with the layout of the new path', () => {
    const changes = [
      change('descend', [], [1]),
      change('descend', [0], [0, 1]),
      change('descend', [0, 0], [0, 0, 2]),
      change('ascend', [0, 0, 2], [0]),
      change('ascend', [0, 0], []),
      change('ascend', [2], []),
    ];
    for (const next of changes) {
      const transition = reconcile(next);
      expect(transition).not.toBeNull();
      if (!transition) {
        continue;
      }
      const before = displayedRowCounts({ path: next.previousPath, childCount });
      expect(applyTransitionCounts(before, transition)).toEqual(
        displayedRowCounts({ path: next.path, childCount }),
      );
    }
  });

  it('ascending to the root removes every ancestor and restores the other root items', () => {
    const previousPath = [0, 0, 1];
    const transition = reconcile(change('ascend', previousPath, []));
    const removedAncestors = transition?.operations
      .filter((op) => op.zone === TREE_ZONES.ANCESTORS && op.kind === 'delete')
      .flatMap((op) => op.rows);
    const insertedPivots = transition?.operations
      .filter((op) => op.zone === TREE_ZONES.PIVOT && op.kind === 'insert')
      .flatMap((op) => op.rows);

    expect(removedAncestors).toHaveLength(previousPath.length);
    expect(insertedPivots).toEqual([1, 2]);
    expect(insertedPivots).toHaveLength(childCount([]) - 1);
  });
});
