import { Clock, systemClock } from '../../domain/shared/Clock';
import { errorMessage } from '../../domain/errors/AppErrors';
import { getLogger, Logger } from '../../infrastructure/logging';

export interface RetryPolicyOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base delay for exponential backoff in milliseconds */
  baseDelayMs: number;
  /** Decides whether a failure is worth another attempt (default: always) */
  retryable?: (error: unknown) => boolean;
}

/**
 * Explicit retry policy with exponential backoff.
 *
 * Waits `baseDelayMs * 2^attempt` between attempts and rethrows the last
 * error once retries are exhausted or the error is not retryable.
 */
export class RetryPolicy {
  private readonly retryable: (error: unknown) => boolean;
  private readonly logger: Logger;

  constructor(
    private readonly options: RetryPolicyOptions,
    private readonly clock: Clock = systemClock,
    logger?: Logger
  ) {
    this.retryable = options.retryable ?? (() => true);
    this.logger = logger ?? getLogger('Retry');
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  /**
   * Delay before the retry that follows failed attempt `attempt` (0-based).
   */
  delayFor(attempt: number): number {
    return this.options.baseDelayMs * Math.pow(2, attempt);
  }

  async execute<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const attempts = this.options.maxRetries + 1;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const isLast = attempt + 1 >= attempts;
        if (isLast || !this.retryable(error)) {
          if (attempt > 0) {
            this.logger.error(`${operationName}: all ${attempt + 1} attempts failed`, {
              error: errorMessage(error),
            });
          }
          throw error;
        }

        const wait = this.delayFor(attempt);
        this.logger.warn(
          `${operationName}: attempt ${attempt + 1}/${attempts} failed, retrying in ${wait}ms`,
          { error: errorMessage(error) }
        );
        await this.clock.sleep(wait);
      }
    }
  }
}
