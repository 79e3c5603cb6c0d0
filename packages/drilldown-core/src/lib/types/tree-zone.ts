import type { TreePath } from './tree-path';

/** The three display regions that make up the visible list, in section order. */
export enum TREE_ZONES {
  ANCESTORS = 'ancestors',
  PIVOT = 'pivot',
  DESCENDANTS = 'descendants',
}

export const ZONE_ORDER: readonly TREE_ZONES[] = Object.freeze([
  TREE_ZONES.ANCESTORS,
  TREE_ZONES.PIVOT,
  TREE_ZONES.DESCENDANTS,
]);

/** Purpose of a row when painted. Derived from its zone, never stored. */
export enum ROW_ROLES {
  /** A parent of the current selection. */
  UPWARD = 'upward',
  /** A root-level item while the root is selected. */
  ROOT = 'root',
  /** The current selection, once descended. */
  CURRENT = 'current',
  /** A child of the current selection. */
  DOWNWARD = 'downward',
}

export interface RowLocation {
  zone: TREE_ZONES;
  row: number;
}

export interface RowDescriptor {
  path: TreePath;
  role: ROW_ROLES;
}

export interface DisplayedRow extends RowLocation, RowDescriptor {}

export type ZoneRowCounts = Record<TREE_ZONES, number>;
