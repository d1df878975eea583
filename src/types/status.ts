export type OperationState =
  | 'clean'
  | 'merge'
  | 'rebase'
  | 'cherry_pick'
  | 'bisect'
  | 'revert';

export const OPERATION_STATES: readonly OperationState[] = [
  'clean',
  'merge',
  'rebase',
  'cherry_pick',
  'bisect',
  'revert',
];

export interface StatusSnapshot {
  readonly branch: string;
  readonly staged: number;
  readonly modified: number;
  readonly untracked: number;
  readonly conflicted: number;
  readonly ahead: number;
  readonly behind: number;
  readonly stash: number;
  readonly state: OperationState;
}

/** Computes the current snapshot for a repository root. */
export type StatusProvider = (root: string) => Promise<StatusSnapshot>;
