import type { TreePath } from '../types/tree-path';
import type { TreeSourceDataSource } from '../types/tree-source-data';
import type { ROW_ROLES } from '../types/tree-zone';

export interface ObjectTreeItem<T> {
  id: string;
  name?: string;
  children?: T[];
}

export type ObjectTreePainter<T, TRow> = (
  row: TRow,
  item: T | null,
  role: ROW_ROLES,
  path: TreePath,
) => void;

/** Data source over an in-memory object tree. The root path paints with a `null` item. */
export class ObjectTreeSource<T extends ObjectTreeItem<T>, TRow>
  implements TreeSourceDataSource<TRow>
{
  constructor(
    private readonly roots: readonly T[],
    private readonly painter: ObjectTreePainter<T, TRow>,
  ) {}

  itemAt(path: TreePath): T | null {
    let children: readonly T[] | undefined = this.roots;
    let item: T | null = null;
    for (const index of path) {
      item = children?.[index] ?? null;
      if (!item) {
        return null;
      }
      children = item.children;
    }
    return item;
  }

  labelAt(path: TreePath): string {
    const item = this.itemAt(path);
    return item ? item.name ?? item.id : '';
  }

  childCount(path: TreePath): number {
    if (path.length === 0) {
      return this.roots.length;
    }
    return this.itemAt(path)?.children?.length ?? 0;
  }

  paint(row: TRow, path: TreePath, role: ROW_ROLES): void {
    this.painter(row, this.itemAt(path), role, path);
  }
}
