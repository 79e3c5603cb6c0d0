import {
  type DisplayedRow,
  ROW_ROLES,
  type RowDescriptor,
  type RowLocation,
  TREE_ZONES,
  ZONE_ORDER,
  type ZoneRowCounts,
} from '../types/tree-zone';
import type { NavigationIntent } from '../types/tree-source-events';
import { type TreeSourceErrorHandler, failContract } from '../types/tree-source-errors';
import { appendIndex, createPath, formatPath, indexRange, truncatePath } from '../utils/path-utils';
import type { TreeLayoutContext } from './types';

/** Exhaustiveness guard for zone dispatch. */
export function assertNeverZone(zone: never, onError?: TreeSourceErrorHandler): never {
  return failContract(
    {
      scope: 'dispatch',
      reason: 'invalid-zone',
      message: `Invalid tree source zone: ${String(zone)}`,
    },
    onError,
  );
}

export function zoneRowCount(zone: TREE_ZONES, ctx: TreeLayoutContext): number {
  const { path, childCount } = ctx;
  switch (zone) {
    case TREE_ZONES.ANCESTORS:
      return path.length;
    case TREE_ZONES.PIVOT:
      return path.length === 0 ? childCount(path) : 1;
    case TREE_ZONES.DESCENDANTS:
      return path.length > 0 ? childCount(path) : 0;
    default:
      return assertNeverZone(zone, ctx.onError);
  }
}

export function displayedRowCounts(ctx: TreeLayoutContext): ZoneRowCounts {
  return {
    [TREE_ZONES.ANCESTORS]: zoneRowCount(TREE_ZONES.ANCESTORS, ctx),
    [TREE_ZONES.PIVOT]: zoneRowCount(TREE_ZONES.PIVOT, ctx),
    [TREE_ZONES.DESCENDANTS]: zoneRowCount(TREE_ZONES.DESCENDANTS, ctx),
  };
}

function assertRowInZone(location: RowLocation, ctx: TreeLayoutContext): void {
  const count = zoneRowCount(location.zone, ctx);
  if (!Number.isInteger(location.row) || location.row < 0 || location.row >= count) {
    failContract(
      {
        scope: 'dispatch',
        reason: 'row-out-of-range',
        path: ctx.path,
        index: location.row,
        message: `Row ${location.row} is outside the ${location.zone} zone (${count} rows) at ${formatPath(ctx.path)}`,
      },
      ctx.onError,
    );
  }
}

/**
 * The node and role a displayed row is painted with.
 *
 * Ancestor row `i` shows the prefix of length `i`, so row 0 is the tree root. Once descended,
 * the pivot row shows the selected node itself; its first-level branch is already listed
 * among the ancestors.
 */
export function describeRow(location: RowLocation, ctx: TreeLayoutContext): RowDescriptor {
  assertRowInZone(location, ctx);
  const { path } = ctx;

  switch (location.zone) {
    case TREE_ZONES.ANCESTORS:
      return { path: truncatePath(path, location.row), role: ROW_ROLES.UPWARD };
    case TREE_ZONES.PIVOT:
      return path.length === 0
        ? { path: createPath([location.row]), role: ROW_ROLES.ROOT }
        : { path, role: ROW_ROLES.CURRENT };
    case TREE_ZONES.DESCENDANTS:
      return { path: appendIndex(path, location.row), role: ROW_ROLES.DOWNWARD };
    default:
      return assertNeverZone(location.zone, ctx.onError);
  }
}

/** Maps a tapped row to the navigation gesture it names. */
export function resolveRowTap(location: RowLocation, ctx: TreeLayoutContext): NavigationIntent {
  assertRowInZone(location, ctx);

  switch (location.zone) {
    case TREE_ZONES.ANCESTORS:
      return { kind: 'ascend', depth: location.row };
    case TREE_ZONES.PIVOT:
      return ctx.path.length === 0
        ? { kind: 'descend-root', index: location.row }
        : { kind: 'reselect' };
    case TREE_ZONES.DESCENDANTS:
      return { kind: 'descend', index: location.row };
    default:
      return assertNeverZone(location.zone, ctx.onError);
  }
}

/** The whole displayed list in section order. */
export function snapshotRows(ctx: TreeLayoutContext): DisplayedRow[] {
  return ZONE_ORDER.flatMap((zone) =>
    indexRange(0, zoneRowCount(zone, ctx)).map((row) => ({
      zone,
      row,
      ...describeRow({ zone, row }, ctx),
    })),
  );
}
