import type { ROW_ANIMATIONS, RowOperation } from '../types/row-animation';
import type { RowListPrimitive, RowListSource } from '../types/row-list';
import { DEFAULT_TREE_SOURCE_CONFIG } from '../types/tree-source-config';
import { type TreeSourceErrorHandler, failContract } from '../types/tree-source-errors';
import { type RowLocation, TREE_ZONES, ZONE_ORDER } from '../types/tree-zone';

type ZoneRows<TRow> = Record<TREE_ZONES, TRow[]>;

function emptyZones<TRow>(): ZoneRows<TRow> {
  return {
    [TREE_ZONES.ANCESTORS]: [],
    [TREE_ZONES.PIVOT]: [],
    [TREE_ZONES.DESCENDANTS]: [],
  };
}

function rowsOf(operations: readonly RowOperation[], zone: TREE_ZONES, kind: RowOperation['kind']) {
  const entries = new Map<number, ROW_ANIMATIONS>();
  for (const operation of operations) {
    if (operation.zone === zone && operation.kind === kind) {
      operation.rows.forEach((row) => entries.set(row, operation.animation));
    }
  }
  return Array.from(entries.entries()).sort(([a], [b]) => a - b);
}

/**
 * Row model shared by list primitives: rows per zone, a reuse pool keyed by row type,
 * and batch application. Subclasses mirror the model through the mount hooks.
 */
export abstract class ZoneRowList<TRow extends object> implements RowListPrimitive<TRow> {
  protected source: RowListSource<TRow> | null = null;
  protected rowHeight = DEFAULT_TREE_SOURCE_CONFIG.rowHeight;

  private zones: ZoneRows<TRow> = emptyZones();
  private readonly pool = new Map<string, TRow[]>();
  private readonly rowKeys = new WeakMap<TRow, string>();

  constructor(protected readonly onError?: TreeSourceErrorHandler) {}

  protected abstract mountRow(
    row: TRow,
    location: RowLocation,
    animation: ROW_ANIMATIONS | null,
  ): void;

  /** Detaches a row; `done` returns it to the pool once any exit animation has finished. */
  protected abstract unmountRow(
    row: TRow,
    zone: TREE_ZONES,
    animation: ROW_ANIMATIONS | null,
    done: () => void,
  ): void;

  setSource(source: RowListSource<TRow> | null): void {
    this.source = source;
    this.reloadData();
  }

  setRowHeight(height: number): void {
    this.rowHeight = height;
  }

  rowsIn(zone: TREE_ZONES): readonly TRow[] {
    return this.zones[zone];
  }

  rowAt(location: RowLocation): TRow | undefined {
    return this.zones[location.zone][location.row];
  }

  locate(row: TRow): RowLocation | null {
    for (const zone of ZONE_ORDER) {
      const index = this.zones[zone].indexOf(row);
      if (index !== -1) {
        return { zone, row: index };
      }
    }
    return null;
  }

  get pooledCount(): number {
    let count = 0;
    this.pool.forEach((rows) => (count += rows.length));
    return count;
  }

  reloadData(): void {
    const previous = this.zones;
    this.zones = emptyZones();
    for (const zone of ZONE_ORDER) {
      previous[zone].forEach((row) => this.unmountRow(row, zone, null, () => this.recycle(row)));
    }

    const source = this.source;
    if (!source) {
      return;
    }
    for (const zone of ZONE_ORDER) {
      const count = source.rowCount(zone);
      for (let index = 0; index < count; index++) {
        const row = this.dequeue(source);
        this.zones[zone].push(row);
        source.configureRow(row, { zone, row: index });
        this.mountRow(row, { zone, row: index }, null);
      }
    }
  }

  /**
   * Applies deletes against the current indices, then inserts against the final indices,
   * zone by zone. Only inserted rows are configured; surviving rows keep their content.
   */
  performBatch(operations: readonly RowOperation[]): void {
    const source = this.source;
    if (!source || operations.length === 0) {
      return;
    }

    for (const zone of ZONE_ORDER) {
      const rows = this.zones[zone];

      for (const [index, animation] of rowsOf(operations, zone, 'delete').reverse()) {
        if (index >= rows.length) {
          this.mismatch(zone, `cannot delete row ${index} of ${rows.length}`);
        }
        const [removed] = rows.splice(index, 1);
        this.unmountRow(removed, zone, animation, () => this.recycle(removed));
      }

      const inserted: Array<[number, ROW_ANIMATIONS, TRow]> = [];
      for (const [index, animation] of rowsOf(operations, zone, 'insert')) {
        if (index > rows.length) {
          this.mismatch(zone, `cannot insert row ${index} into ${rows.length}`);
        }
        const row = this.dequeue(source);
        rows.splice(index, 0, row);
        inserted.push([index, animation, row]);
      }
      for (const [index, animation, row] of inserted.reverse()) {
        source.configureRow(row, { zone, row: index });
        this.mountRow(row, { zone, row: index }, animation);
      }

      const expected = source.rowCount(zone);
      if (rows.length !== expected) {
        this.mismatch(zone, `${rows.length} rows after batch, source reports ${expected}`);
      }
    }
  }

  animateRepaint(_row: TRow, paint: () => void, _durationMs: number): void {
    paint();
  }

  private dequeue(source: RowListSource<TRow>): TRow {
    const type = source.rowType();
    const row = this.pool.get(type.key)?.pop() ?? type.create();
    this.rowKeys.set(row, type.key);
    return row;
  }

  private recycle(row: TRow): void {
    const key = this.rowKeys.get(row);
    if (key === undefined) {
      return;
    }
    const rows = this.pool.get(key) ?? [];
    rows.push(row);
    this.pool.set(key, rows);
  }

  private mismatch(zone: TREE_ZONES, detail: string): never {
    return failContract(
      {
        scope: 'batch',
        reason: 'batch-mismatch',
        message: `Invalid batch update in the ${zone} zone: ${detail}`,
      },
      this.onError,
    );
  }
}

/** Headless list primitive. Rows change immediately; taps are simulated with `select`. */
export class MemoryRowList<TRow extends object> extends ZoneRowList<TRow> {
  select(location: RowLocation): void {
    this.source?.didSelectRow(location);
  }

  protected mountRow(): void {
    // nothing to mirror
  }

  protected unmountRow(
    _row: TRow,
    _zone: TREE_ZONES,
    _animation: ROW_ANIMATIONS | null,
    done: () => void,
  ): void {
    done();
  }
}
