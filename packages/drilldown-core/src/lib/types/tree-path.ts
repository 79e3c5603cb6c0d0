/**
 * Location of a tree node as the child index chosen at each depth.
 * The empty path is the tree root.
 */
export type TreePath = readonly number[];

export const ROOT_PATH: TreePath = Object.freeze([]);
