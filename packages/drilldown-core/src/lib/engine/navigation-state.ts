import { ROOT_PATH, type TreePath } from '../types/tree-path';
import type { TreeSourceDelegate } from '../types/tree-source-data';
import type { NavigationChange } from '../types/tree-source-events';
import { type TreeSourceErrorHandler, failContract } from '../types/tree-source-errors';
import {
  appendIndex,
  createPath,
  formatPath,
  removeTrailingIndices,
  truncatePath,
} from '../utils/path-utils';
import type { ChildCountLookup } from './types';

export interface NavigationStateOptions {
  /** Child-count lookup; `null` while no data source is attached. */
  childCount?: ChildCountLookup | null;
  delegate?: TreeSourceDelegate | null;
  onError?: TreeSourceErrorHandler;
}

/**
 * Owns the selected path. Every mutator stores the new path, notifies the delegate,
 * then returns the change so the caller can reconcile the displayed rows.
 */
export class NavigationState {
  private path: TreePath = ROOT_PATH;

  childCount: ChildCountLookup | null;
  delegate: TreeSourceDelegate | null;
  onError?: TreeSourceErrorHandler;

  constructor(options: NavigationStateOptions = {}) {
    this.childCount = options.childCount ?? null;
    this.delegate = options.delegate ?? null;
    this.onError = options.onError;
  }

  currentPath(): TreePath {
    return this.path;
  }

  /** Full replacement. No diff is attempted; the caller reloads every zone. */
  setPath(indices: Iterable<number>): NavigationChange {
    const next = createPath(indices, this.onError);
    const childCount = this.childCount;
    if (childCount) {
      next.forEach((index, depth) => {
        const parent = truncatePath(next, depth);
        const count = childCount(parent);
        if (index >= count) {
          failContract(
            {
              scope: 'path',
              reason: 'index-out-of-range',
              path: next,
              index,
              message: `Path ${formatPath(next)} is invalid: ${formatPath(parent)} has ${count} children`,
            },
            this.onError,
          );
        }
      });
    }
    return this.commit('replace', next);
  }

  descendInto(childIndex: number): NavigationChange {
    const count = this.childCount ? this.childCount(this.path) : 0;
    if (!Number.isInteger(childIndex) || childIndex < 0 || childIndex >= count) {
      failContract(
        {
          scope: 'descend',
          reason: 'index-out-of-range',
          path: this.path,
          index: childIndex,
          message: `Cannot descend into child ${childIndex} of ${formatPath(this.path)} (${count} children)`,
        },
        this.onError,
      );
    }
    return this.commit('descend', appendIndex(this.path, childIndex));
  }

  ascendTo(ancestorDepth: number): NavigationChange {
    if (
      !Number.isInteger(ancestorDepth) ||
      ancestorDepth < 0 ||
      ancestorDepth >= this.path.length
    ) {
      failContract(
        {
          scope: 'ascend',
          reason: 'depth-out-of-range',
          path: this.path,
          index: ancestorDepth,
          message: `Cannot ascend to depth ${ancestorDepth} from ${formatPath(this.path)}`,
        },
        this.onError,
      );
    }
    return this.commit(
      'ascend',
      removeTrailingIndices(this.path, this.path.length - ancestorDepth),
    );
  }

  reselectCurrent(): NavigationChange {
    if (this.path.length === 0) {
      failContract(
        {
          scope: 'reselect',
          reason: 'not-descended',
          path: this.path,
          message: 'Cannot reselect the current item while the root is selected',
        },
        this.onError,
      );
    }
    this.delegate?.onReselectCurrent?.();
    return { kind: 'reselect', previousPath: this.path, path: this.path };
  }

  private commit(kind: NavigationChange['kind'], next: TreePath): NavigationChange {
    const previousPath = this.path;
    this.path = next;
    this.delegate?.onSelectionChanged?.(next);
    return { kind, previousPath, path: next };
  }
}
