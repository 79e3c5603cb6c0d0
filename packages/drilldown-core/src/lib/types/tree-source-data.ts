import type { TreePath } from './tree-path';
import type { ROW_ROLES } from './tree-zone';

/** Consumer contract supplying tree shape and row content. */
export interface TreeSourceDataSource<TRow> {
  /**
   * Number of children at the path; `0` for a leaf. Called for arbitrary paths, including the root,
   * and must return the same answer for a given tree snapshot.
   */
  childCount(path: TreePath): number;
  /**
   * Updates a row widget to show the node at `path`. Rows are reused across roles and paths,
   * so implementations must reset anything they set previously.
   */
  paint(row: TRow, path: TreePath, role: ROW_ROLES): void;
}

export interface TreeSourceDelegate {
  onSelectionChanged?(path: TreePath): void;
  /** The already-selected item was tapped again. */
  onReselectCurrent?(): void;
}
