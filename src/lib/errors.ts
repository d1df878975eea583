export class GswError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'GswError';
  }
}

export class NotGitRepoError extends GswError {
  constructor(dir: string) {
    super(
      `Not a git repository: ${dir}`,
      'NOT_GIT_REPO',
    );
    this.name = 'NotGitRepoError';
  }
}

export class WatcherSetupError extends GswError {
  constructor(target: string, cause: string) {
    super(
      `Could not watch ${target}: ${cause}`,
      'WATCHER_SETUP',
    );
    this.name = 'WatcherSetupError';
  }
}

export class WatcherClosedError extends GswError {
  constructor() {
    super(
      'Watcher channel closed unexpectedly',
      'WATCHER_CLOSED',
    );
    this.name = 'WatcherClosedError';
  }
}

export class LeaderLockError extends GswError {
  constructor(lockPath: string, cause: string) {
    super(
      `Could not attempt leader lock at ${lockPath}: ${cause}`,
      'LEADER_LOCK',
    );
    this.name = 'LeaderLockError';
  }
}

export class StatusComputeError extends GswError {
  constructor(root: string, cause: string) {
    super(
      `Could not compute git status for ${root}: ${cause}`,
      'STATUS_COMPUTE',
    );
    this.name = 'StatusComputeError';
  }
}

export class InvalidConfigError extends GswError {
  constructor(key: string, value: unknown, expected = 'a non-negative number of milliseconds') {
    super(
      `Invalid value for ${key}: ${JSON.stringify(value)}. Expected ${expected}.`,
      'INVALID_CONFIG',
    );
    this.name = 'InvalidConfigError';
  }
}

export class InvalidSnapshotError extends GswError {
  constructor(reason: string) {
    super(`Invalid status record: ${reason}`, 'INVALID_SNAPSHOT');
    this.name = 'InvalidSnapshotError';
  }
}

/** The consumer of our stdout went away (EPIPE). Not a failure. */
export class OutputClosedError extends GswError {
  constructor(cause: string) {
    super(`Output closed: ${cause}`, 'OUTPUT_CLOSED', 0);
    this.name = 'OutputClosedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
