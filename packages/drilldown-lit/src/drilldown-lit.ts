import { LitElement, type PropertyValues, css, html } from 'lit';
import { customElement, property } from 'lit/decorators.js';
import type { Subscription } from 'rxjs';
import {
  DEFAULT_TREE_SOURCE_CONFIG,
  ROOT_PATH,
  type NavigationChangeKind,
  ROW_ROLES,
  type RowType,
  TREE_ZONES,
  type TreePath,
  type TreeSourceConfig,
  type TreeSourceDataSource,
  type TreeSourceDelegate,
  type TreeSourceEvent,
  TreeSourceView,
  createPath,
  mergeTreeSourceConfig,
} from '@drilldown/core';

import { DomRowList, type ZoneContainers } from './dom-row-list';

export interface TreeSourceSelectionDetail {
  path: TreePath;
  cause: NavigationChangeKind;
}

function rowTypeFor(tag: string): RowType<HTMLElement> {
  return {
    key: tag,
    create: () => document.createElement(tag),
  };
}

@customElement('drill-tree-source')
export class DrillTreeSource extends LitElement {
  static styles = css`
    :host {
      display: block;
      height: 100%;
      width: 100%;
      overflow-y: auto;
      font-family: system-ui, sans-serif;
    }

    .row {
      display: flex;
      align-items: center;
      box-sizing: border-box;
      height: var(--row-height, 44px);
      padding: 0 16px;
      cursor: pointer;
      overflow: hidden;
    }

    .row[data-role='upward'] {
      color: rgba(0, 0, 0, 0.6);
    }

    .row[data-role='current'] {
      font-weight: 600;
      border-bottom: 1px solid #e0e0e0;
    }

    .row[data-role='downward'] {
      padding-left: 32px;
    }

    .row-repaint {
      animation: fade-in var(--repaint-duration, 330ms) ease-in-out;
    }

    .row-enter-top {
      animation: slide-from-top 250ms ease-out;
    }

    .row-enter-bottom {
      animation: slide-from-bottom 250ms ease-out;
    }

    .row-enter-fade {
      animation: fade-in 250ms ease-out;
    }

    .row-leave-top {
      animation: slide-from-top 250ms ease-in reverse forwards;
      pointer-events: none;
    }

    .row-leave-bottom {
      animation: slide-from-bottom 250ms ease-in reverse forwards;
      pointer-events: none;
    }

    .row-leave-fade {
      animation: fade-in 250ms ease-in reverse forwards;
      pointer-events: none;
    }

    @keyframes slide-from-top {
      from {
        height: 0;
        transform: translateY(-100%);
        opacity: 0;
      }
    }

    @keyframes slide-from-bottom {
      from {
        height: 0;
        transform: translateY(100%);
        opacity: 0;
      }
    }

    @keyframes fade-in {
      from {
        opacity: 0;
      }
    }
  `;

  @property({ attribute: false })
  dataSource: TreeSourceDataSource<HTMLElement> | null = null;

  @property({ attribute: false })
  delegate: TreeSourceDelegate | null = null;

  @property({ attribute: false })
  config: Partial<TreeSourceConfig> = {};

  /** Overrides `config.rowHeight` when set. */
  @property({ type: Number, attribute: 'row-height' })
  rowHeight?: number;

  /** Tag of the element used for every row. */
  @property({ attribute: 'row-tag' })
  rowTag = 'div';

  private view: TreeSourceView<HTMLElement> | null = null;
  private list: DomRowList | null = null;
  private subscription: Subscription | null = null;
  private pendingSelection: TreePath = ROOT_PATH;

  /** Rows are painted through this wrapper so styles can key off `data-role`. */
  private readonly paintingSource: TreeSourceDataSource<HTMLElement> = {
    childCount: (path) => this.dataSource?.childCount(path) ?? 0,
    paint: (row: HTMLElement, path: TreePath, role: ROW_ROLES) => {
      row.dataset.role = role;
      row.setAttribute('role', 'option');
      row.setAttribute('aria-selected', String(role === ROW_ROLES.CURRENT));
      this.dataSource?.paint(row, path, role);
    },
  };

  get selection(): TreePath {
    return this.view?.selection ?? this.pendingSelection;
  }

  /** Full replacement of the selected path; reloads every row. */
  set selection(value: TreePath) {
    if (this.view) {
      this.view.selection = value;
    } else {
      this.pendingSelection = createPath(value);
    }
  }

  disconnectedCallback(): void {
    super.disconnectedCallback();
    this.teardown();
  }

  connectedCallback(): void {
    super.connectedCallback();
    if (this.hasUpdated && !this.view) {
      this.requestUpdate();
    }
  }

  protected updated(changed: PropertyValues<this>): void {
    if (!this.view || changed.has('config')) {
      this.teardown();
      this.setup();
      return;
    }
    if (changed.has('dataSource')) {
      this.view.dataSource = this.dataSource ? this.paintingSource : null;
    }
    if (changed.has('delegate')) {
      this.view.delegate = this.delegate;
    }
    if (changed.has('rowHeight') && this.rowHeight !== undefined) {
      this.view.rowHeight = this.rowHeight;
    }
    if (changed.has('rowTag')) {
      this.view.rowType = rowTypeFor(this.rowTag);
    }
  }

  private setup(): void {
    const containers = this.zoneContainers();
    if (!containers) {
      return;
    }
    const config = mergeTreeSourceConfig({
      ...this.config,
      ...(this.rowHeight !== undefined ? { rowHeight: this.rowHeight } : {}),
    });
    this.list = new DomRowList(containers, {
      animated: config.animated,
      onError: config.onError,
    });
    this.view = new TreeSourceView<HTMLElement>({
      list: this.list,
      rowType: rowTypeFor(this.rowTag),
      dataSource: this.dataSource ? this.paintingSource : null,
      delegate: this.delegate,
      config,
    });
    this.subscription = this.view.events$.subscribe((event) => this.forward(event));
    if (this.pendingSelection.length > 0) {
      this.view.selection = this.pendingSelection;
    }
  }

  private teardown(): void {
    if (this.view) {
      this.pendingSelection = this.view.selection;
    }
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.view?.destroy();
    this.view = null;
    this.list?.disconnect();
    this.list = null;
  }

  private zoneContainers(): ZoneContainers | null {
    const find = (zone: TREE_ZONES) =>
      this.renderRoot.querySelector<HTMLElement>(`[data-zone="${zone}"]`);
    const ancestors = find(TREE_ZONES.ANCESTORS);
    const pivot = find(TREE_ZONES.PIVOT);
    const descendants = find(TREE_ZONES.DESCENDANTS);
    if (!ancestors || !pivot || !descendants) {
      return null;
    }
    return {
      [TREE_ZONES.ANCESTORS]: ancestors,
      [TREE_ZONES.PIVOT]: pivot,
      [TREE_ZONES.DESCENDANTS]: descendants,
    };
  }

  private forward(event: TreeSourceEvent): void {
    switch (event.type) {
      case 'selection-changed':
        this.dispatchEvent(
          new CustomEvent<TreeSourceSelectionDetail>('selection-change', {
            detail: { path: event.path, cause: event.cause },
            bubbles: true,
            composed: true,
          }),
        );
        break;
      case 'reselect-current':
        this.dispatchEvent(
          new CustomEvent('reselect-current', {
            detail: { path: event.path },
            bubbles: true,
            composed: true,
          }),
        );
        break;
      case 'transition':
        this.dispatchEvent(
          new CustomEvent('row-transition', {
            detail: { change: event.change, transition: event.transition },
          }),
        );
        break;
      case 'reload':
        break;
    }
  }

  render() {
    return html`
      <div
        class="container"
        role="listbox"
        aria-label=${this.config.ariaLabel ?? DEFAULT_TREE_SOURCE_CONFIG.ariaLabel}>
        <div class="zone" data-zone=${TREE_ZONES.ANCESTORS}></div>
        <div class="zone" data-zone=${TREE_ZONES.PIVOT}></div>
        <div class="zone" data-zone=${TREE_ZONES.DESCENDANTS}></div>
      </div>
    `;
  }
}

declare global {
  interface HTMLElementTagNameMap {
    'drill-tree-source': DrillTreeSource;
  }
}
