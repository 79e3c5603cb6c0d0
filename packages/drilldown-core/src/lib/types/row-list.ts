import type { RowOperation } from './row-animation';
import type { RowLocation, TREE_ZONES } from './tree-zone';

/** The single concrete row widget type. Rows are pooled and reused by `key`. */
export interface RowType<TRow> {
  key: string;
  create(): TRow;
}

/** What the list primitive asks of the widget that owns it. */
export interface RowListSource<TRow> {
  rowType(): RowType<TRow>;
  rowCount(zone: TREE_ZONES): number;
  configureRow(row: TRow, location: RowLocation): void;
  didSelectRow(location: RowLocation): void;
}

/** Scrolling list primitive: row reuse, batched insert/delete animation and in-place repaint. */
export interface RowListPrimitive<TRow> {
  setSource(source: RowListSource<TRow> | null): void;
  /** Drops every row and rebuilds all zones from the source. */
  reloadData(): void;
  /** Applies the operations as one atomic animation group. */
  performBatch(operations: readonly RowOperation[]): void;
  rowAt(location: RowLocation): TRow | undefined;
  animateRepaint(row: TRow, paint: () => void, durationMs: number): void;
  setRowHeight(height: number): void;
}
