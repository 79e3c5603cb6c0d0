import { ROOT_PATH, type TreePath } from '../types/tree-path';
import { type TreeSourceErrorHandler, failContract } from '../types/tree-source-errors';

export function isValidChildIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function createPath(
  indices: Iterable<number>,
  onError?: TreeSourceErrorHandler,
): TreePath {
  const path = Array.from(indices);
  path.forEach((index, depth) => {
    if (!isValidChildIndex(index)) {
      failContract(
        {
          scope: 'path',
          reason: 'invalid-index',
          path,
          index,
          message: `Path index ${index} at depth ${depth} is not a non-negative integer`,
        },
        onError,
      );
    }
  });
  return path.length === 0 ? ROOT_PATH : Object.freeze(path);
}

export function appendIndex(path: TreePath, index: number): TreePath {
  return createPath([...path, index]);
}

export function truncatePath(path: TreePath, length: number): TreePath {
  if (length >= path.length) {
    return path;
  }
  return createPath(path.slice(0, Math.max(0, length)));
}

export function removeTrailingIndices(path: TreePath, count: number): TreePath {
  if (count > path.length || count < 0) {
    failContract({
      scope: 'path',
      reason: 'depth-out-of-range',
      path,
      index: count,
      message: `Cannot remove ${count} indices from path ${formatPath(path)}`,
    });
  }
  return truncatePath(path, path.length - count);
}

export function pathsEqual(a: TreePath, b: TreePath): boolean {
  return a.length === b.length && a.every((index, depth) => index === b[depth]);
}

export function formatPath(path: TreePath): string {
  return `/${path.join('/')}`;
}

/** Half-open integer range `[start, end)`; empty when `end <= start`. */
export function indexRange(start: number, end: number): number[] {
  const result: number[] = [];
  for (let index = start; index < end; index++) {
    result.push(index);
  }
  return result;
}
