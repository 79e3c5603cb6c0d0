import type { TreePath } from './tree-path';

/** Description of a broken navigation contract. These are programming errors, never recovered. */
export interface TreeSourceViolation {
  scope: 'path' | 'descend' | 'ascend' | 'reselect' | 'dispatch' | 'batch';
  reason:
    | 'invalid-index'
    | 'index-out-of-range'
    | 'depth-out-of-range'
    | 'not-descended'
    | 'invalid-zone'
    | 'row-out-of-range'
    | 'batch-mismatch';
  path?: TreePath;
  index?: number;
  message: string;
}

export class TreeSourceContractError extends Error {
  readonly violation: TreeSourceViolation;

  constructor(violation: TreeSourceViolation) {
    super(violation.message);
    this.name = 'TreeSourceContractError';
    this.violation = violation;
  }
}

export type TreeSourceErrorHandler = (violation: TreeSourceViolation) => void;

/** Reports the violation to the handler, if any, then throws. */
export function failContract(
  violation: TreeSourceViolation,
  onError?: TreeSourceErrorHandler,
): never {
  onError?.(violation);
  throw new TreeSourceContractError(violation);
}
