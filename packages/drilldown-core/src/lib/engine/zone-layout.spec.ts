import { ROW_ROLES, TREE_ZONES } from '../types/tree-zone';
import { TreeSourceContractError } from '../types/tree-source-errors';
import type { TreePath } from '../types/tree-path';
import {
  describeRow,
  displayedRowCounts,
  resolveRowTap,
  snapshotRows,
  zoneRowCount,
} from './zone-layout';

// root: [A, B, C]; A: [A1, A2]; A1: [x, y, z]; C: [C1]
const counts: Record<string, number> = { '': 3, '0': 2, '0/0': 3, '2': 1 };
const childCount = (path: TreePath) => counts[path.join('/')] ?? 0;
const ctx = (path: TreePath) => ({ path, childCount });

describe('zone layout', () => {
  it('lists every root item in the pivot while the root is selected', () => {
    expect(displayedRowCounts(ctx([]))).toEqual({
      [TREE_ZONES.ANCESTORS]: 0,
      [TREE_ZONES.PIVOT]: 3,
      [TREE_ZONES.DESCENDANTS]: 0,
    });
  });

  it('shows one ancestor per depth and the children of the selection', () => {
    expect(displayedRowCounts(ctx([0, 0]))).toEqual({
      [TREE_ZONES.ANCESTORS]: 2,
      [TREE_ZONES.PIVOT]: 1,
      [TREE_ZONES.DESCENDANTS]: 3,
    });
  });

  it('shows as many descendant rows as the selection has children', () => {
    const paths: TreePath[] = [[0], [0, 0], [0, 1], [1], [2], [2, 0]];
    for (const path of paths) {
      expect(zoneRowCount(TREE_ZONES.DESCENDANTS, ctx(path))).toBe(childCount(path));
    }
  });

  it('describes the path and role painted on each row', () => {
    const layout = ctx([0, 0]);
    expect(describeRow({ zone: TREE_ZONES.ANCESTORS, row: 0 }, layout)).toEqual({
      path: [],
      role: ROW_ROLES.UPWARD,
    });
    expect(describeRow({ zone: TREE_ZONES.ANCESTORS, row: 1 }, layout)).toEqual({
      path: [0],
      role: ROW_ROLES.UPWARD,
    });
    expect(describeRow({ zone: TREE_ZONES.PIVOT, row: 0 }, layout)).toEqual({
      path: [0, 0],
      role: ROW_ROLES.CURRENT,
    });
    expect(describeRow({ zone: TREE_ZONES.DESCENDANTS, row: 2 }, layout)).toEqual({
      path: [0, 0, 2],
      role: ROW_ROLES.DOWNWARD,
    });
    expect(describeRow({ zone: TREE_ZONES.PIVOT, row: 2 }, ctx([]))).toEqual({
      path: [2],
      role: ROW_ROLES.ROOT,
    });
  });

  it('fails on rows outside their zone', () => {
    const onError = vi.fn();
    expect(() =>
      describeRow({ zone: TREE_ZONES.DESCENDANTS, row: 3 }, { ...ctx([0, 0]), onError }),
    ).toThrow(TreeSourceContractError);
    expect(onError).toHaveBeenCalledWith(
      expect.objectContaining({
        reason: 'row-out-of-range',
        message: 'Row 3 is outside the descendants zone (3 rows) at /0/0',
      }),
    );
    expect(() => resolveRowTap({ zone: TREE_ZONES.PIVOT, row: 1 }, ctx([0]))).toThrow(
      TreeSourceContractError,
    );
  });

  it('maps taps to navigation gestures', () => {
    expect(resolveRowTap({ zone: TREE_ZONES.ANCESTORS, row: 1 }, ctx([0, 0]))).toEqual({
      kind: 'ascend',
      depth: 1,
    });
    expect(resolveRowTap({ zone: TREE_ZONES.PIVOT, row: 0 }, ctx([0, 0]))).toEqual({
      kind: 'reselect',
    });
    expect(resolveRowTap({ zone: TREE_ZONES.DESCENDANTS, row: 1 }, ctx([0, 0]))).toEqual({
      kind: 'descend',
      index: 1,
    });
    expect(resolveRowTap({ zone: TREE_ZONES.PIVOT, row: 1 }, ctx([]))).toEqual({
      kind: 'descend-root',
      index: 1,
    });
  });

  it('snapshots the displayed list in section order', () => {
    expect(snapshotRows(ctx([0]))).toEqual([
      { zone: TREE_ZONES.ANCESTORS, row: 0, path: [], role: ROW_ROLES.UPWARD },
      { zone: TREE_ZONES.PIVOT, row: 0, path: [0], role: ROW_ROLES.CURRENT },
      { zone: TREE_ZONES.DESCENDANTS, row: 0, path: [0, 0], role: ROW_ROLES.DOWNWARD },
      { zone: TREE_ZONES.DESCENDANTS, row: 1, path: [0, 1], role: ROW_ROLES.DOWNWARD },
    ]);
  });
});
