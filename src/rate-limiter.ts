import { sleep } from './retry';

export interface RateLimiter {
  /** Resolves once at least the configured interval has passed since the previous grant. */
  acquire(): Promise<void>;
}

/**
 * Serialized "time of last request" gate: callers queue behind each other,
 * so two grants are never closer than `intervalMs`.
 */
export function createRateLimiter(intervalMs: number): RateLimiter {
  let lastGrant = 0;
  let queue: Promise<void> = Promise.resolve();

  return {
    acquire(): Promise<void> {
      const turn = queue.then(async () => {
        const wait = lastGrant + intervalMs - Date.now();
        if (wait > 0) await sleep(wait);
        lastGrant = Date.now();
      });
      queue = turn;
      return turn;
    },
  };
}
