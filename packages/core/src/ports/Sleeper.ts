export interface Sleeper {
  /**
   * Resolves after `ms` milliseconds. Rejects with `signal.reason` as soon as the
   * signal aborts, including when it is already aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
