export interface Config {
  /** Quiet period before a burst of notifications becomes one change. */
  debounceMs: number;
  /**
   * How long the leader waits and discards queued changes before recomputing.
   * Longer windows absorb more of git's own bookkeeping writes at the cost of
   * added latency per refresh.
   */
  drainMs: number;
  followerDebounceMs: number;
  alwaysPrint: boolean;
  format?: string;
  stateDir?: string;
}
