import {
  EMPTY_TRANSITION,
  ROW_ANIMATIONS,
  type RowOperation,
  type RowOperationKind,
  type RowRepaint,
  type RowTransition,
} from '../types/row-animation';
import { ROOT_PATH } from '../types/tree-path';
import type { NavigationChange } from '../types/tree-source-events';
import type { TreeSourceErrorHandler } from '../types/tree-source-errors';
import { ROW_ROLES, TREE_ZONES, ZONE_ORDER, type ZoneRowCounts } from '../types/tree-zone';
import { createPath, indexRange, pathsEqual } from '../utils/path-utils';
import type { ChildCountLookup } from './types';
import { assertNeverZone } from './zone-layout';

export interface ReconcileContext {
  childCount: ChildCountLookup;
  onError?: TreeSourceErrorHandler;
}

function span(
  zone: TREE_ZONES,
  kind: RowOperationKind,
  start: number,
  end: number,
  animation: ROW_ANIMATIONS,
): RowOperation[] {
  const rows = indexRange(start, end);
  return rows.length > 0 ? [{ kind, zone, rows, animation }] : [];
}

/**
 * Edits for a single zone. Ancestor rows are path prefixes, so that zone only grows or shrinks
 * at its tail. The pivot keeps one surviving row whenever it switches between the root listing
 * and the current item, so only its siblings are inserted or removed around it.
 */
function planZone(
  zone: TREE_ZONES,
  change: NavigationChange,
  ctx: ReconcileContext,
): RowOperation[] {
  const { previousPath, path } = change;

  switch (zone) {
    case TREE_ZONES.ANCESTORS:
      if (path.length < previousPath.length) {
        return span(zone, 'delete', path.length, previousPath.length, ROW_ANIMATIONS.BOTTOM);
      }
      return span(zone, 'insert', previousPath.length, path.length, ROW_ANIMATIONS.BOTTOM);

    case TREE_ZONES.PIVOT: {
      const leavingRoot = previousPath.length === 0 && path.length > 0;
      const enteringRoot = previousPath.length > 0 && path.length === 0;
      if (!leavingRoot && !enteringRoot) {
        return [];
      }
      const survivor = leavingRoot ? path[0] : previousPath[0];
      const total = ctx.childCount(ROOT_PATH);
      const kind: RowOperationKind = leavingRoot ? 'delete' : 'insert';
      return [
        ...span(zone, kind, 0, survivor, ROW_ANIMATIONS.TOP),
        ...span(zone, kind, survivor + 1, total, ROW_ANIMATIONS.FADE),
      ];
    }

    case TREE_ZONES.DESCENDANTS: {
      if (pathsEqual(previousPath, path)) {
        return [];
      }
      const removal =
        change.kind === 'ascend' ? ROW_ANIMATIONS.BOTTOM : ROW_ANIMATIONS.FADE;
      return [
        ...(previousPath.length > 0
          ? span(zone, 'delete', 0, ctx.childCount(previousPath), removal)
          : []),
        ...(path.length > 0
          ? span(zone, 'insert', 0, ctx.childCount(path), ROW_ANIMATIONS.FADE)
          : []),
      ];
    }

    default:
      return assertNeverZone(zone, ctx.onError);
  }
}

function planRepaint(change: NavigationChange): RowRepaint | null {
  const { previousPath, path } = change;
  if (pathsEqual(previousPath, path)) {
    return null;
  }
  if (path.length === 0) {
    const survivor = previousPath[0];
    return {
      location: { zone: TREE_ZONES.PIVOT, row: survivor },
      path: createPath([survivor]),
      role: ROW_ROLES.ROOT,
      animation: 'cross-fade',
    };
  }
  return {
    location: { zone: TREE_ZONES.PIVOT, row: 0 },
    path,
    role: ROW_ROLES.CURRENT,
    animation: 'cross-fade',
  };
}

/**
 * Row edits that turn the list displayed for `change.previousPath` into the list for
 * `change.path`, plus the pivot row to repaint once they commit.
 *
 * Returns `null` for a full replacement, which is reloaded rather than diffed.
 */
export function reconcileTransition(
  change: NavigationChange,
  ctx: ReconcileContext,
): RowTransition | null {
  if (change.kind === 'replace') {
    return null;
  }
  if (change.kind === 'reselect') {
    return EMPTY_TRANSITION;
  }

  return {
    operations: ZONE_ORDER.flatMap((zone) => planZone(zone, change, ctx)),
    repaint: planRepaint(change),
  };
}

/** Row counts after applying the transition to a list with `before` counts. */
export function applyTransitionCounts(
  before: ZoneRowCounts,
  transition: RowTransition,
): ZoneRowCounts {
  const after: ZoneRowCounts = { ...before };
  for (const operation of transition.operations) {
    const delta = operation.kind === 'insert' ? operation.rows.length : -operation.rows.length;
    after[operation.zone] += delta;
  }
  return after;
}
