import { BrowserPort, PagePort } from '../ports/BrowserPort';
import { CapturedResponses } from '../../domain/extraction/CapturedResponses';
import { ExtractionResult } from '../../domain/extraction/ExtractionResult';
import { NavigationError, errorMessage } from '../../domain/errors/AppErrors';
import { Clock, systemClock } from '../../domain/shared/Clock';
import { getLogger, Logger } from '../../infrastructure/logging';
import { NAVIGATION } from '../config/HarvestDefaults';
import { ExtractionPipeline } from './ExtractionPipeline';
import { RateLimiter } from './RateLimiter';
import { RetryPolicy } from './RetryPolicy';

export interface PageFetcherOptions {
  /** Navigation timeout and extraction budget in milliseconds */
  timeoutMs: number;
  /** Pause after navigation in milliseconds */
  settleDelayMs?: number;
}

/**
 * Dependencies of the PageFetcher.
 */
export interface PageFetcherDeps {
  browser: BrowserPort;
  rateLimiter: RateLimiter;
  pipeline: ExtractionPipeline;
  retryPolicy: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Retry only failures that did not already exhaust the page timeout.
 */
export function isRetryableNavigationError(error: unknown): boolean {
  return error instanceof NavigationError && error.isRetryable;
}

/**
 * Owns the browser session and runs one rate-limited visit per URL.
 * Every navigation attempt, retries included, passes the rate limiter.
 *
 * Each visit gets its own page and its own captured-response set; the
 * response listener is detached and the page closed on every exit path.
 */
export class PageFetcher {
  private readonly browser: BrowserPort;
  private readonly rateLimiter: RateLimiter;
  private readonly pipeline: ExtractionPipeline;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly settleDelayMs: number;
  private initializing: Promise<void> | null = null;

  constructor(deps: PageFetcherDeps, options: PageFetcherOptions) {
    this.browser = deps.browser;
    this.rateLimiter = deps.rateLimiter;
    this.pipeline = deps.pipeline;
    this.retryPolicy = deps.retryPolicy;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? getLogger('Fetcher');
    this.timeoutMs = options.timeoutMs;
    this.settleDelayMs = options.settleDelayMs ?? NAVIGATION.SETTLE_DELAY_MS;
  }

  /**
   * Launches the browser once; concurrent callers share the same launch.
   */
  async initialize(): Promise<void> {
    if (this.browser.isReady()) {
      return;
    }
    if (!this.initializing) {
      this.logger.info('Initializing headless browser');
      this.initializing = this.browser
        .initialize()
        .then(() => this.logger.info('Browser initialized'))
        .finally(() => {
          this.initializing = null;
        });
    }
    await this.initializing;
  }

  /**
   * Releases all browser resources. Safe to call without initialize().
   */
  async cleanup(): Promise<void> {
    if (this.initializing) {
      await this.initializing.catch(error => {
        this.logger.debug('Browser launch failed before cleanup', { error: errorMessage(error) });
      });
    }
    await this.browser.close();
    this.logger.info('Browser closed');
  }

  /**
   * Visits `url` and returns the extracted download URL, if any.
   * Navigation and extraction failures are logged and turned into a no-result.
   */
  async fetchAndExtract(url: string): Promise<ExtractionResult> {
    await this.initialize();

    const captured = new CapturedResponses();
    let page: PagePort | null = null;
    let detach: (() => void) | null = null;

    try {
      page = await this.browser.newPage();
      detach = page.onResponse(response => {
        if (captured.record(response)) {
          this.logger.debug(`Intercepted response: ${response.url}`);
        }
      });

      this.logger.info(`Navigating to ${url}`);
      const startedAt = await this.navigate(page, url);
      await this.clock.sleep(this.settleDelayMs);

      return await this.pipeline.run({
        page,
        pageUrl: url,
        captured,
        timeoutMs: this.remainingBudget(startedAt),
      });
    } catch (error) {
      this.logger.error(`Error while processing ${url}`, { error: errorMessage(error) });
      return ExtractionResult.none(url);
    } finally {
      if (detach) {
        detach();
      }
      if (page) {
        await this.closePage(page, url);
      }
    }
  }

  /**
   * Navigates with retries and returns when the first attempt was admitted.
   */
  private async navigate(page: PagePort, url: string): Promise<number> {
    let startedAt: number | null = null;
    await this.retryPolicy.execute(async () => {
      await this.rateLimiter.acquire();
      if (startedAt === null) {
        startedAt = this.clock.now();
      }
      const result = await page.navigate(url, {
        waitUntil: 'networkidle',
        timeout: this.timeoutMs,
      });
      if (!result.success) {
        throw new NavigationError(url, result.error ?? 'unknown error', !result.timedOut);
      }
    }, `Navigate ${url}`);
    return startedAt ?? this.clock.now();
  }

  private remainingBudget(startedAt: number): number {
    const elapsed = this.clock.now() - startedAt;
    return Math.max(this.timeoutMs - elapsed, NAVIGATION.MIN_EXTRACTION_BUDGET_MS);
  }

  private async closePage(page: PagePort, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.logger.warn(`Failed to close page for ${url}`, { error: errorMessage(error) });
    }
  }
}
