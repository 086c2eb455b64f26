/**
 * Time source used by rate limiting, retries and settle delays.
 */
export interface Clock {
  /** Current time in milliseconds */
  now(): number;
  /** Suspends the caller for `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, Math.max(0, ms))),
};
