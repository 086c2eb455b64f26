import { BrowserPort } from '../../application/ports/BrowserPort';
import { BatchHarvester } from '../../application/services/BatchHarvester';
import { ExtractionPipeline } from '../../application/services/ExtractionPipeline';
import { PageFetcher, isRetryableNavigationError } from '../../application/services/PageFetcher';
import { RateLimiter } from '../../application/services/RateLimiter';
import { RetryPolicy } from '../../application/services/RetryPolicy';
import { AppConfig } from '../../domain/config/AppConfig';
import { Clock, systemClock } from '../../domain/shared/Clock';
import { PlaywrightBrowserAdapter } from '../browser/PlaywrightBrowserAdapter';
import { IdmScriptWriter, ScriptPlatform, detectPlatform } from '../output/IdmScriptWriter';
import {
  CapturedResponseStrategy,
  EmbeddedFrameStrategy,
  MediaElementStrategy,
  StaticSelectorStrategy,
} from '../strategies';

export interface ApplicationContainer {
  config: AppConfig;
  browser: BrowserPort;
  fetcher: PageFetcher;
  harvester: BatchHarvester;
  scriptWriter: IdmScriptWriter;
}

/**
 * Replaceable collaborators, mainly for tests.
 */
export interface CompositionOverrides {
  browser?: BrowserPort;
  clock?: Clock;
  platform?: ScriptPlatform;
}

const SECONDS = 1000;

export class CompositionRoot {
  static initialize(config: AppConfig, overrides: CompositionOverrides = {}): ApplicationContainer {
    const clock = overrides.clock ?? systemClock;
    const timeoutMs = config.timeout * SECONDS;

    // 1. Infrastructure adapters
    const browser =
      overrides.browser ??
      new PlaywrightBrowserAdapter({
        headless: config.headless,
        timeout: timeoutMs,
      });

    // 2. Extraction strategies, in pipeline order
    const { downloadSelectors, popupSelectors, validityMarkers, embedHosts } = config.extraction;
    const pipeline = new ExtractionPipeline(
      [
        new StaticSelectorStrategy({ selectors: downloadSelectors, popupSelectors, validityMarkers }),
        new CapturedResponseStrategy(validityMarkers),
        new MediaElementStrategy(validityMarkers),
        new EmbeddedFrameStrategy(embedHosts),
      ],
      clock
    );

    // 3. Application services
    const rateLimiter = new RateLimiter(
      {
        minDelayMs: config.delayBetweenRequests * SECONDS,
        maxPerWindow: config.maxRequestsPerMinute,
      },
      clock
    );

    const retryPolicy = new RetryPolicy(
      {
        maxRetries: config.retry.maxRetries,
        baseDelayMs: config.retry.baseDelay * SECONDS,
        retryable: isRetryableNavigationError,
      },
      clock
    );

    const fetcher = new PageFetcher({ browser, rateLimiter, pipeline, retryPolicy, clock }, { timeoutMs });
    const harvester = new BatchHarvester(fetcher);
    const scriptWriter = new IdmScriptWriter(overrides.platform ?? detectPlatform());

    return {
      config,
      browser,
      fetcher,
      harvester,
      scriptWriter,
    };
  }
}
