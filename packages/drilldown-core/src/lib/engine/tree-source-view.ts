import { type Observable, Subject } from 'rxjs';

import type { RowListPrimitive, RowListSource, RowType } from '../types/row-list';
import type { RowTransition } from '../types/row-animation';
import { type TreeSourceConfig, mergeTreeSourceConfig } from '../types/tree-source-config';
import type { TreeSourceDataSource, TreeSourceDelegate } from '../types/tree-source-data';
import type { NavigationChange, NavigationIntent, TreeSourceEvent } from '../types/tree-source-events';
import { failContract } from '../types/tree-source-errors';
import type { TreePath } from '../types/tree-path';
import type { DisplayedRow, RowDescriptor, RowLocation, TREE_ZONES } from '../types/tree-zone';
import { NavigationState } from './navigation-state';
import type { TreeLayoutContext } from './types';
import { describeRow, resolveRowTap, snapshotRows, zoneRowCount } from './zone-layout';
import { reconcileTransition } from './zone-reconciler';

export interface TreeSourceViewOptions<TRow> {
  list: RowListPrimitive<TRow>;
  rowType: RowType<TRow>;
  dataSource?: TreeSourceDataSource<TRow> | null;
  delegate?: TreeSourceDelegate | null;
  config?: Partial<TreeSourceConfig>;
}

/**
 * List source handed to the primitive. Holds the view weakly; once the view is gone or
 * detached it reports an empty tree and ignores taps.
 */
export class TreeSourceListBridge<TRow extends object> implements RowListSource<TRow> {
  private viewRef: WeakRef<TreeSourceView<TRow>> | null;
  private lastRowType: RowType<TRow>;

  constructor(view: TreeSourceView<TRow>) {
    this.viewRef = new WeakRef(view);
    this.lastRowType = view.rowType;
  }

  get attached(): boolean {
    return this.view !== null;
  }

  detach(): void {
    this.viewRef = null;
  }

  rowType(): RowType<TRow> {
    const view = this.view;
    if (view) {
      this.lastRowType = view.rowType;
    }
    return this.lastRowType;
  }

  rowCount(zone: TREE_ZONES): number {
    return this.view?.rowCount(zone) ?? 0;
  }

  configureRow(row: TRow, location: RowLocation): void {
    this.view?.paintRow(row, location);
  }

  didSelectRow(location: RowLocation): void {
    this.view?.tapRow(location);
  }

  private get view(): TreeSourceView<TRow> | null {
    return this.viewRef?.deref() ?? null;
  }
}

export class TreeSourceView<TRow extends object> {
  private readonly list: RowListPrimitive<TRow>;
  private readonly bridge: TreeSourceListBridge<TRow>;
  private readonly navigation: NavigationState;
  private readonly events = new Subject<TreeSourceEvent>();
  private readonly config: TreeSourceConfig;
  private _dataSource: TreeSourceDataSource<TRow> | null = null;
  private _rowType: RowType<TRow>;

  readonly events$: Observable<TreeSourceEvent> = this.events.asObservable();

  constructor(options: TreeSourceViewOptions<TRow>) {
    this.config = mergeTreeSourceConfig(options.config);
    this.list = options.list;
    this._rowType = options.rowType;
    this.navigation = new NavigationState({
      delegate: options.delegate,
      onError: this.config.onError,
    });
    this.bridge = new TreeSourceListBridge(this);
    this.list.setRowHeight(this.config.rowHeight);
    this._dataSource = options.dataSource ?? null;
    this.navigation.childCount = this.childCountLookup();
    this.list.setSource(this.bridge);
  }

  get dataSource(): TreeSourceDataSource<TRow> | null {
    return this._dataSource;
  }

  set dataSource(value: TreeSourceDataSource<TRow> | null) {
    this._dataSource = value;
    this.navigation.childCount = this.childCountLookup();
    this.reloadData();
  }

  get delegate(): TreeSourceDelegate | null {
    return this.navigation.delegate;
  }

  set delegate(value: TreeSourceDelegate | null) {
    this.navigation.delegate = value;
  }

  get selection(): TreePath {
    return this.navigation.currentPath();
  }

  /** Full replacement: validated, reloaded, never diffed. */
  set selection(value: TreePath) {
    const change = this.navigation.setPath(value);
    this.events.next({ type: 'selection-changed', path: change.path, cause: change.kind });
    this.reloadData();
  }

  get rowHeight(): number {
    return this.config.rowHeight;
  }

  set rowHeight(value: number) {
    this.config.rowHeight = value;
    this.list.setRowHeight(value);
  }

  get rowType(): RowType<TRow> {
    return this._rowType;
  }

  set rowType(value: RowType<TRow>) {
    this._rowType = value;
    this.reloadData();
  }

  reloadData(): void {
    this.list.reloadData();
    this.events.next({ type: 'reload', path: this.selection });
  }

  rowCount(zone: TREE_ZONES): number {
    const ctx = this.layout();
    return ctx ? zoneRowCount(zone, ctx) : 0;
  }

  describeRow(location: RowLocation): RowDescriptor {
    const ctx = this.layout();
    if (!ctx) {
      return failContract(
        {
          scope: 'dispatch',
          reason: 'row-out-of-range',
          index: location.row,
          message: `Row ${location.row} requested in the ${location.zone} zone, but no data source is attached`,
        },
        this.config.onError,
      );
    }
    return describeRow(location, ctx);
  }

  snapshot(): DisplayedRow[] {
    const ctx = this.layout();
    return ctx ? snapshotRows(ctx) : [];
  }

  paintRow(row: TRow, location: RowLocation): void {
    const { path, role } = this.describeRow(location);
    this._dataSource?.paint(row, path, role);
  }

  /** Handles a tap on a displayed row. Ignored while no data source is attached. */
  tapRow(location: RowLocation): NavigationChange | null {
    const ctx = this.layout();
    if (!ctx) {
      return null;
    }
    return this.navigate(resolveRowTap(location, ctx));
  }

  descendInto(childIndex: number): NavigationChange {
    return this.navigate({ kind: 'descend', index: childIndex });
  }

  ascendTo(ancestorDepth: number): NavigationChange {
    return this.navigate({ kind: 'ascend', depth: ancestorDepth });
  }

  reselectCurrent(): NavigationChange {
    return this.navigate({ kind: 'reselect' });
  }

  /** Detaches from the list primitive and completes `events$`. */
  destroy(): void {
    this.bridge.detach();
    this.list.setSource(null);
    this.events.complete();
  }

  private navigate(intent: NavigationIntent): NavigationChange {
    const change = this.applyIntent(intent);

    if (change.kind === 'reselect') {
      this.events.next({ type: 'reselect-current', path: change.path });
      return change;
    }
    this.events.next({ type: 'selection-changed', path: change.path, cause: change.kind });

    const dataSource = this._dataSource;
    const transition = dataSource
      ? reconcileTransition(change, {
          childCount: (path) => dataSource.childCount(path),
          onError: this.config.onError,
        })
      : null;
    if (!transition) {
      this.reloadData();
      return change;
    }

    this.list.performBatch(transition.operations);
    this.events.next({ type: 'transition', change, transition });
    this.repaint(transition);
    return change;
  }

  private applyIntent(intent: NavigationIntent): NavigationChange {
    switch (intent.kind) {
      case 'ascend':
        return this.navigation.ascendTo(intent.depth);
      case 'descend-root':
      case 'descend':
        return this.navigation.descendInto(intent.index);
      case 'reselect':
        return this.navigation.reselectCurrent();
    }
  }

  private repaint(transition: RowTransition): void {
    const { repaint } = transition;
    const dataSource = this._dataSource;
    if (!repaint || !dataSource) {
      return;
    }
    const row = this.list.rowAt(repaint.location);
    if (!row) {
      return;
    }
    this.list.animateRepaint(
      row,
      () => dataSource.paint(row, repaint.path, repaint.role),
      this.config.animated ? this.config.repaintDurationMs : 0,
    );
  }

  private childCountLookup() {
    const dataSource = this._dataSource;
    return dataSource ? (path: TreePath) => dataSource.childCount(path) : null;
  }

  private layout(): TreeLayoutContext | null {
    const dataSource = this._dataSource;
    if (!dataSource) {
      return null;
    }
    return {
      path: this.selection,
      childCount: (path) => dataSource.childCount(path),
      onError: this.config.onError,
    };
  }
}
