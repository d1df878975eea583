import { InvalidSnapshotError } from '../lib/errors.js';
import { OPERATION_STATES, type OperationState, type StatusSnapshot } from '../types/status.js';

// ASCII unit separator: git refuses control characters in ref names.
export const FIELD_SEPARATOR = '\x1f';

const COUNT_FIELDS = ['staged', 'modified', 'untracked', 'conflicted', 'ahead', 'behind', 'stash'] as const;
const FIELD_COUNT = COUNT_FIELDS.length + 2;

/**
 * One newline-terminated record:
 * branch, staged, modified, untracked, conflicted, ahead, behind, stash, state.
 */
export function encodeSnapshot(snapshot: StatusSnapshot): string {
  if (snapshot.branch.includes(FIELD_SEPARATOR) || snapshot.branch.includes('\n')) {
    throw new InvalidSnapshotError(`branch contains a reserved character: ${JSON.stringify(snapshot.branch)}`);
  }
  const fields = [
    snapshot.branch,
    ...COUNT_FIELDS.map((key) => String(snapshot[key])),
    snapshot.state,
  ];
  return fields.join(FIELD_SEPARATOR) + '\n';
}

export function decodeSnapshot(raw: string): StatusSnapshot {
  if (!raw.endsWith('\n')) {
    throw new InvalidSnapshotError('record is not newline-terminated');
  }
  const fields = raw.slice(0, -1).split(FIELD_SEPARATOR);
  if (fields.length !== FIELD_COUNT) {
    throw new InvalidSnapshotError(`expected ${FIELD_COUNT} fields, got ${fields.length}`);
  }

  const [branch, staged, modified, untracked, conflicted, ahead, behind, stash, state] = fields;
  return {
    branch,
    staged: parseCount('staged', staged),
    modified: parseCount('modified', modified),
    untracked: parseCount('untracked', untracked),
    conflicted: parseCount('conflicted', conflicted),
    ahead: parseCount('ahead', ahead),
    behind: parseCount('behind', behind),
    stash: parseCount('stash', stash),
    state: parseState(state),
  };
}

function parseCount(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidSnapshotError(`${name} is not a non-negative integer: ${JSON.stringify(value)}`);
  }
  return Number(value);
}

function parseState(value: string): OperationState {
  const state = OPERATION_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new InvalidSnapshotError(`unknown operation state: ${JSON.stringify(value)}`);
  }
  return state;
}
