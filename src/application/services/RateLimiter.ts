import { Clock, systemClock } from '../../domain/shared/Clock';
import { Mutex } from '../../domain/shared/Mutex';
import { getLogger, Logger } from '../../infrastructure/logging';
import { RATE_LIMIT } from '../config/HarvestDefaults';

export interface RateLimiterOptions {
  /** Minimum gap between request starts in milliseconds */
  minDelayMs: number;
  /** Maximum request starts inside any trailing window */
  maxPerWindow: number;
  /** Window length in milliseconds (default: 60 seconds) */
  windowMs?: number;
}

/**
 * Throttles request start times with a sliding-window cap and a
 * minimum inter-request delay.
 *
 * Every `acquire()` runs its read-wait-record sequence while holding a
 * mutex, so concurrent callers are admitted one at a time in entry order.
 */
export class RateLimiter {
  private requestTimes: number[] = [];
  private readonly mutex = new Mutex();
  private readonly windowMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly clock: Clock = systemClock,
    logger?: Logger
  ) {
    if (options.maxPerWindow < 1) {
      throw new RangeError('maxPerWindow must be at least 1');
    }
    if (options.minDelayMs < 0) {
      throw new RangeError('minDelayMs must not be negative');
    }
    this.windowMs = options.windowMs ?? RATE_LIMIT.WINDOW_MS;
    this.logger = logger ?? getLogger('RateLimiter');
  }

  /**
   * Resolves once it is permissible to start a request.
   */
  async acquire(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      let now = this.clock.now();
      this.requestTimes = this.requestTimes.filter(t => t > now - this.windowMs);

      if (this.requestTimes.length >= this.options.maxPerWindow) {
        const oldest = Math.min(...this.requestTimes);
        const wait = Math.max(this.windowMs - (now - oldest), 0);
        this.logger.debug(`Request cap reached, waiting ${wait}ms`, {
          inWindow: this.requestTimes.length,
        });
        await this.clock.sleep(wait);
        now = this.clock.now();
      }

      if (this.requestTimes.length > 0) {
        const latest = Math.max(...this.requestTimes);
        const elapsed = now - latest;
        if (elapsed < this.options.minDelayMs) {
          await this.clock.sleep(this.options.minDelayMs - elapsed);
        }
      }

      this.requestTimes.push(this.clock.now());
    });
  }

  /**
   * Request start times currently inside the window, oldest first.
   */
  recordedTimes(): number[] {
    return [...this.requestTimes];
  }
}
