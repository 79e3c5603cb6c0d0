import type { TreeSourceErrorHandler } from './tree-source-errors';

export interface TreeSourceConfig {
  /** Fixed height of every row in pixels. */
  rowHeight: number;
  /** Duration of the in-place cross-fade applied to the pivot row after a transition. */
  repaintDurationMs: number;
  /** Play insert/delete/repaint animations. When false, rows change immediately. */
  animated: boolean;
  /** Accessible label for the list container. */
  ariaLabel: string;
  /** Called with every contract violation before it is thrown. */
  onError?: TreeSourceErrorHandler;
}

export const DEFAULT_TREE_SOURCE_CONFIG: Readonly<TreeSourceConfig> = Object.freeze({
  rowHeight: 44,
  repaintDurationMs: 330,
  animated: true,
  ariaLabel: 'Tree',
});

export function mergeTreeSourceConfig(
  config?: Partial<TreeSourceConfig>,
): TreeSourceConfig {
  return {
    ...DEFAULT_TREE_SOURCE_CONFIG,
    ...config,
  };
}
