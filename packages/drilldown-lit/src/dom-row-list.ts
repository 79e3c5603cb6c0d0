import {
  type ROW_ANIMATIONS,
  type RowLocation,
  type TreeSourceErrorHandler,
  type TREE_ZONES,
  ZONE_ORDER,
  ZoneRowList,
} from '@drilldown/core';

export type ZoneContainers = Record<TREE_ZONES, HTMLElement>;

const ANIMATION_CLASS = /^row-(enter-|leave-|repaint$)/;

function clearAnimationClasses(row: HTMLElement): void {
  Array.from(row.classList)
    .filter((name) => ANIMATION_CLASS.test(name))
    .forEach((name) => row.classList.remove(name));
}

/** Runs `callback` once the row's own animation ends. */
function onAnimationEnd(row: HTMLElement, callback: () => void): void {
  const listener = (event: Event) => {
    if (event.target !== row) {
      return;
    }
    row.removeEventListener('animationend', listener);
    callback();
  };
  row.addEventListener('animationend', listener);
}

/**
 * List primitive over three zone containers. Inserted rows play a `row-enter-*` animation;
 * deleted rows leave the model at once and stay in the DOM until their `row-leave-*`
 * animation ends.
 */
export class DomRowList extends ZoneRowList<HTMLElement> {
  animated: boolean;

  private readonly clickListener = (event: Event) => this.handleClick(event);

  constructor(
    private readonly containers: ZoneContainers,
    options: { animated: boolean; onError?: TreeSourceErrorHandler },
  ) {
    super(options.onError);
    this.animated = options.animated;
    ZONE_ORDER.forEach((zone) => {
      containers[zone].addEventListener('click', this.clickListener);
    });
  }

  setRowHeight(height: number): void {
    super.setRowHeight(height);
    ZONE_ORDER.forEach((zone) => {
      this.containers[zone].style.setProperty('--row-height', `${height}px`);
    });
  }

  animateRepaint(row: HTMLElement, paint: () => void, durationMs: number): void {
    if (!this.animated || durationMs <= 0) {
      paint();
      return;
    }
    row.style.setProperty('--repaint-duration', `${durationMs}ms`);
    row.classList.add('row-repaint');
    onAnimationEnd(row, () => row.classList.remove('row-repaint'));
    paint();
  }

  disconnect(): void {
    ZONE_ORDER.forEach((zone) => {
      this.containers[zone].removeEventListener('click', this.clickListener);
    });
    this.setSource(null);
  }

  protected mountRow(
    row: HTMLElement,
    location: RowLocation,
    animation: ROW_ANIMATIONS | null,
  ): void {
    const container = this.containers[location.zone];
    const next = this.rowsIn(location.zone)[location.row + 1];
    clearAnimationClasses(row);
    row.classList.add('row');
    row.removeAttribute('aria-hidden');
    container.insertBefore(row, next && next.parentNode === container ? next : null);

    if (animation && this.animated) {
      const name = `row-enter-${animation}`;
      row.classList.add(name);
      onAnimationEnd(row, () => row.classList.remove(name));
    }
  }

  protected unmountRow(
    row: HTMLElement,
    _zone: TREE_ZONES,
    animation: ROW_ANIMATIONS | null,
    done: () => void,
  ): void {
    clearAnimationClasses(row);
    if (!animation || !this.animated) {
      row.remove();
      done();
      return;
    }
    row.classList.add(`row-leave-${animation}`);
    row.setAttribute('aria-hidden', 'true');
    onAnimationEnd(row, () => {
      row.remove();
      clearAnimationClasses(row);
      done();
    });
  }

  private handleClick(event: Event): void {
    for (const target of event.composedPath()) {
      if (!(target instanceof HTMLElement)) {
        continue;
      }
      const location = this.locate(target);
      if (location) {
        this.source?.didSelectRow(location);
        return;
      }
    }
  }
}
