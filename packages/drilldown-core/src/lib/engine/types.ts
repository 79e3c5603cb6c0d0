import type { TreePath } from '../types/tree-path';
import type { TreeSourceErrorHandler } from '../types/tree-source-errors';

/** Child-count query against the data source, fixed for the duration of one transition. */
export type ChildCountLookup = (path: TreePath) => number;

export interface TreeLayoutContext {
  path: TreePath;
  childCount: ChildCountLookup;
  onError?: TreeSourceErrorHandler;
}
