import type { Sleeper } from '@window-gate/core';

export class TimerSleeper implements Sleeper {
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
