import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { createMemorySink, createSyntheticSource, makeSnapshot, type MemorySink, type SyntheticSource } from '../test-fixtures.js';
import type { StatusSnapshot } from '../types/status.js';

vi.mock('./state-file.js', () => ({
  readStateFile: vi.fn(),
}));

vi.mock('../lib/output.js', () => ({
  warn: vi.fn(),
  info: vi.fn(),
  outputError: vi.fn(),
}));

import { readStateFile } from './state-file.js';
import { warn } from '../lib/output.js';
import { runFollower, type FollowerOptions } from './follower.js';
import { WatcherClosedError } from '../lib/errors.js';
import type { LoopExit } from './leader.js';

const mockedReadStateFile = vi.mocked(readStateFile);
const mockedWarn = vi.mocked(warn);

const STATE_DIR = '/run/gsw';
const STATE_FILE = '/run/gsw/%2Frepo';

type Outcome = { exit: LoopExit } | { error: unknown };

const render = (s: StatusSnapshot): string => `${s.branch} +${s.staged}`;

async function advance(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await vi.advanceTimersByTimeAsync(0);
}

async function startFollower(
  overrides?: Partial<FollowerOptions> & { sink?: MemorySink },
): Promise<{ source: SyntheticSource; sink: MemorySink; outcome: Promise<Outcome> }> {
  const source = createSyntheticSource();
  const { sink = createMemorySink(), ...optionOverrides } = overrides ?? {};
  const options: FollowerOptions = {
    stateFile: STATE_FILE,
    debounceMs: 50,
    alwaysPrint: false,
    ...optionOverrides,
  };
  const outcome = runFollower(options, { source, sink, render }).then(
    (exit): Outcome => ({ exit }),
    (error: unknown): Outcome => ({ error }),
  );
  await advance(0);
  return { source, sink, outcome };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.clearAllMocks();
  mockedReadStateFile.mockResolvedValue(undefined);
});

afterEach(() => {
  vi.useRealTimers();
});

describe('runFollower', () => {
  test('given a published state, should emit it and watch only the state directory', async () => {
    mockedReadStateFile.mockResolvedValueOnce(makeSnapshot({ staged: 2 }));

    const { source, sink } = await startFollower();

    expect(mockedReadStateFile).toHaveBeenCalledWith(STATE_FILE);
    expect(sink.lines).toEqual(['main +2']);
    expect(source.subscriptions).toEqual([
      { target: STATE_DIR, options: { recursive: false }, closed: false },
    ]);

    source.end();
  });

  test('given no published state yet, should emit nothing until the leader publishes', async () => {
    const { source, sink } = await startFollower();
    expect(sink.lines).toEqual([]);

    mockedReadStateFile.mockResolvedValueOnce(makeSnapshot({ staged: 1 }));
    source.emit(STATE_FILE);
    await advance(50);

    expect(sink.lines).toEqual(['main +1']);

    source.end();
  });

  test('given changes to other files in the state directory, should not re-read', async () => {
    const { source } = await startFollower();

    source.emit(`${STATE_FILE}.lock`);
    source.emit(`${STATE_FILE}.1795214829`);
    source.emit('/run/gsw/%2Fother%2Frepo');
    await advance(200);

    expect(mockedReadStateFile).toHaveBeenCalledTimes(1);

    source.end();
  });

  test('given a republished identical state, should not emit it twice', async () => {
    mockedReadStateFile.mockResolvedValue(makeSnapshot({ staged: 1 }));

    const { source, sink } = await startFollower();
    source.emit(STATE_FILE);
    await advance(100);

    expect(mockedReadStateFile).toHaveBeenCalledTimes(2);
    expect(sink.lines).toEqual(['main +1']);

    source.end();
  });

  test('given alwaysPrint, should emit a republished identical state', async () => {
    mockedReadStateFile.mockResolvedValue(makeSnapshot({ staged: 1 }));

    const { source, sink } = await startFollower({ alwaysPrint: true });
    source.emit(STATE_FILE);
    await advance(100);

    expect(sink.lines).toEqual(['main +1', 'main +1']);

    source.end();
  });

  test('given a read that races the rename, should skip silently and pick up the next change', async () => {
    mockedReadStateFile
      .mockResolvedValueOnce(makeSnapshot())
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(makeSnapshot({ staged: 4 }));

    const { source, sink } = await startFollower();
    source.emit(STATE_FILE);
    await advance(100);
    expect(sink.lines).toEqual(['main +0']);

    source.emit(STATE_FILE);
    await advance(100);

    expect(sink.lines).toEqual(['main +0', 'main +4']);
    expect(mockedWarn).not.toHaveBeenCalled();

    source.end();
  });

  test('given a watcher error, should warn and keep following', async () => {
    const { source } = await startFollower();

    source.fail('EMFILE: too many open files');
    await advance(0);

    expect(mockedWarn).toHaveBeenCalledWith('watcher error: EMFILE: too many open files');
    expect(source.subscriptions[0]?.closed).toBe(false);

    source.end();
  });

  test('given the output closes, should stop cleanly', async () => {
    mockedReadStateFile
      .mockResolvedValueOnce(makeSnapshot())
      .mockResolvedValueOnce(makeSnapshot({ staged: 1 }));

    const { source, outcome } = await startFollower({ sink: createMemorySink({ closeAfter: 1 }) });
    source.emit(STATE_FILE);
    await advance(100);

    expect(await outcome).toEqual({ exit: 'output-closed' });
    expect(source.subscriptions[0]?.closed).toBe(true);
  });

  test('given the watcher stops delivering, should fail with WatcherClosedError', async () => {
    const { source, outcome } = await startFollower();

    source.end();

    const result = await outcome;
    expect('error' in result && result.error).toBeInstanceOf(WatcherClosedError);
  });
});
