import { ExtractionPipeline } from '../../../src/application/services/ExtractionPipeline';
import { PageFetcher, isRetryableNavigationError } from '../../../src/application/services/PageFetcher';
import { RateLimiter } from '../../../src/application/services/RateLimiter';
import { RetryPolicy } from '../../../src/application/services/RetryPolicy';
import { NavigationError } from '../../../src/domain/errors/AppErrors';
import { ExtractionStrategy, StrategyContext } from '../../../src/domain/strategies';
import { Logger } from '../../../src/infrastructure/logging';
import {
  CapturedResponseStrategy,
  EmbeddedFrameStrategy,
  MediaElementStrategy,
  StaticSelectorStrategy,
} from '../../../src/infrastructure/strategies';
import { FakeBrowser, fakeElement } from '../../helpers/FakeBrowser';
import { FakeClock } from '../../helpers/FakeClock';
import { recordingLogger, silentLogger } from '../../helpers/logging';

const PAGE_A = 'https://site.example/watch/a';
const PAGE_B = 'https://site.example/watch/b';

describe('PageFetcher', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  interface FetcherOverrides {
    strategies?: ExtractionStrategy[];
    settleDelayMs?: number;
    rateLimiter?: RateLimiter;
    pipelineLogger?: Logger;
  }

  const createFetcher = (browser: FakeBrowser, overrides: FetcherOverrides = {}): PageFetcher => {
    const pipeline = new ExtractionPipeline(
      overrides.strategies ?? [
        new CapturedResponseStrategy(undefined, silentLogger()),
        new MediaElementStrategy(undefined, silentLogger()),
      ],
      clock,
      overrides.pipelineLogger ?? silentLogger()
    );
    return new PageFetcher(
      {
        browser,
        rateLimiter:
          overrides.rateLimiter ?? new RateLimiter({ minDelayMs: 0, maxPerWindow: 100 }, clock, silentLogger()),
        pipeline,
        retryPolicy: new RetryPolicy(
          { maxRetries: 1, baseDelayMs: 1000, retryable: isRetryableNavigationError },
          clock,
          silentLogger()
        ),
        clock,
        logger: silentLogger('Fetcher'),
      },
      { timeoutMs: 15000, settleDelayMs: overrides.settleDelayMs ?? 2000 }
    );
  };

  const allStrategies = (): ExtractionStrategy[] => [
    new StaticSelectorStrategy({}, silentLogger()),
    new CapturedResponseStrategy(undefined, silentLogger()),
    new MediaElementStrategy(undefined, silentLogger()),
    new EmbeddedFrameStrategy(undefined, silentLogger()),
  ];

  describe('fetchAndExtract', () => {
    it('should extract a URL captured from network traffic', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: { responses: [{ url: 'https://x/y.m3u8', resourceType: 'xhr' }] },
      });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.downloadUrl).toBe('https://x/y.m3u8');
      expect(result.strategy).toBe('captured_response');
    });

    it('should navigate with networkidle and the page timeout', async () => {
      const browser = new FakeBrowser();
      const fetcher = createFetcher(browser);

      await fetcher.fetchAndExtract(PAGE_A);

      expect(browser.pages[0].navigations).toEqual([
        { url: PAGE_A, options: { waitUntil: 'networkidle', timeout: 15000 } },
      ]);
    });

    it('should ignore responses that are not capture candidates', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: { responses: [{ url: 'https://x/video/page', resourceType: 'document' }] },
      });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.isFound()).toBe(false);
    });

    it('should start every fetch with an empty captured set', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: { responses: [{ url: 'https://x/y.m3u8', resourceType: 'xhr' }] },
        [PAGE_B]: {},
      });
      const fetcher = createFetcher(browser);

      const first = await fetcher.fetchAndExtract(PAGE_A);
      const second = await fetcher.fetchAndExtract(PAGE_B);

      expect(first.downloadUrl).toBe('https://x/y.m3u8');
      expect(second.downloadUrl).toBeNull();
    });

    it('should keep captures of concurrent fetches apart', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: { responses: [{ url: 'https://x/a.m3u8', resourceType: 'xhr' }] },
        [PAGE_B]: { responses: [{ url: 'https://x/b.m3u8', resourceType: 'fetch' }] },
      });
      const fetcher = createFetcher(browser);

      const [a, b] = await Promise.all([fetcher.fetchAndExtract(PAGE_A), fetcher.fetchAndExtract(PAGE_B)]);

      expect(a.downloadUrl).toBe('https://x/a.m3u8');
      expect(b.downloadUrl).toBe('https://x/b.m3u8');
    });

    it('should close the page and detach the listener after a success', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: {
          elements: { video: [fakeElement({ attributes: { src: 'https://cdn.example.com/media/a.mp4' } })] },
        },
      });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.strategy).toBe('media_element');
      expect(browser.pages[0].closed).toBe(true);
      expect(browser.pages[0].listenerCount()).toBe(0);
    });

    it('should retry a failed navigation once and then give up', async () => {
      const failure = { success: false, error: 'net::ERR_CONNECTION_RESET', duration: 5 };
      const browser = new FakeBrowser({ [PAGE_A]: { navigation: [failure, failure] } });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.isFound()).toBe(false);
      expect(browser.pages[0].navigations).toHaveLength(2);
      expect(clock.sleeps).toEqual([1000]);
      expect(browser.pages[0].closed).toBe(true);
      expect(browser.pages[0].listenerCount()).toBe(0);
    });

    it('should extract after a retried navigation succeeds', async () => {
      const failure = { success: false, error: 'net::ERR_CONNECTION_RESET', duration: 5 };
      const browser = new FakeBrowser({
        [PAGE_A]: { navigation: [failure], responses: [{ url: 'https://x/y.m3u8', resourceType: 'media' }] },
      });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.downloadUrl).toBe('https://x/y.m3u8');
      expect(browser.pages[0].navigations).toHaveLength(2);
    });

    it('should pass every navigation attempt through the rate limiter', async () => {
      const failure = { success: false, error: 'net::ERR_CONNECTION_RESET', duration: 5 };
      const browser = new FakeBrowser({ [PAGE_A]: { navigation: [failure] } });
      const rateLimiter = new RateLimiter({ minDelayMs: 5000, maxPerWindow: 10 }, clock, silentLogger());
      const fetcher = createFetcher(browser, { rateLimiter });

      await fetcher.fetchAndExtract(PAGE_A);

      expect(browser.pages[0].navigations).toHaveLength(2);
      expect(rateLimiter.recordedTimes()).toEqual([0, 5000]);
      expect(clock.sleeps).toEqual([1000, 4000, 2000]);
    });

    it('should measure the extraction budget from the admitted navigation', async () => {
      const budgets: number[] = [];
      const recorder: ExtractionStrategy = {
        name: 'static_selector',
        description: 'records the budget',
        execute: async (context: StrategyContext) => {
          budgets.push(context.timeoutMs);
          return { strategy: 'static_selector', url: null, duration: 0 };
        },
      };
      const rateLimiter = new RateLimiter({ minDelayMs: 5000, maxPerWindow: 10 }, clock, silentLogger());
      const fetcher = createFetcher(new FakeBrowser(), { strategies: [recorder], rateLimiter });

      await fetcher.fetchAndExtract(PAGE_A);
      await fetcher.fetchAndExtract(PAGE_B);

      expect(rateLimiter.recordedTimes()).toEqual([0, 5000]);
      expect(budgets).toEqual([13000, 13000]);
    });

    it('should not retry a navigation timeout', async () => {
      const timeout = { success: false, error: 'Timeout 15000ms exceeded', timedOut: true, duration: 15000 };
      const browser = new FakeBrowser({ [PAGE_A]: { navigation: [timeout] } });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.isFound()).toBe(false);
      expect(browser.pages[0].navigations).toHaveLength(1);
    });

    it('should return no result and warn once when no strategy finds a link', async () => {
      const { logger, entries } = recordingLogger('Extraction');
      const browser = new FakeBrowser({ [PAGE_A]: {} });
      const fetcher = createFetcher(browser, { strategies: allStrategies(), pipelineLogger: logger });

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.isFound()).toBe(false);
      expect(result.strategy).toBeNull();
      expect(entries.filter(entry => entry.level === 'warn')).toEqual([
        expect.objectContaining({
          message: 'Could not find download URL using any extraction method',
          context: { page: PAGE_A },
        }),
      ]);
      expect(browser.pages[0].closed).toBe(true);
      expect(browser.pages[0].listenerCount()).toBe(0);
    });

    it('should prefer a static download link over a captured response', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: {
          elements: {
            'a.video-download': [fakeElement({ attributes: { href: 'https://cdn.example.com/files/clip.mp4' } })],
          },
          responses: [{ url: 'https://x/y.m3u8', resourceType: 'xhr' }],
        },
      });
      const fetcher = createFetcher(browser, { strategies: allStrategies() });

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.downloadUrl).toBe('https://cdn.example.com/files/clip.mp4');
      expect(result.strategy).toBe('static_selector');
    });

    it('should log the failure and return no result when a page cannot be opened', async () => {
      const browser = new FakeBrowser();
      browser.newPageError = new Error('Target closed');
      const { logger, entries } = recordingLogger('Fetcher');
      const fetcher = new PageFetcher(
        {
          browser,
          rateLimiter: new RateLimiter({ minDelayMs: 0, maxPerWindow: 10 }, clock, silentLogger()),
          pipeline: new ExtractionPipeline([], clock, silentLogger()),
          retryPolicy: new RetryPolicy({ maxRetries: 0, baseDelayMs: 0 }, clock, silentLogger()),
          clock,
          logger,
        },
        { timeoutMs: 15000 }
      );

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.isFound()).toBe(false);
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 'error',
          message: `Error while processing ${PAGE_A}`,
          context: { error: 'Target closed' },
        })
      );
    });

    it('should still return a result when closing the page fails', async () => {
      const browser = new FakeBrowser({
        [PAGE_A]: {
          responses: [{ url: 'https://x/y.m3u8', resourceType: 'xhr' }],
          closeError: new Error('Page already closed'),
        },
      });
      const fetcher = createFetcher(browser);

      const result = await fetcher.fetchAndExtract(PAGE_A);

      expect(result.downloadUrl).toBe('https://x/y.m3u8');
    });

    it('should hand the remaining budget to the extraction pipeline', async () => {
      const budgets: number[] = [];
      const probe: ExtractionStrategy = {
        name: 'static_selector',
        description: 'records the budget',
        execute: async (context: StrategyContext) => {
          budgets.push(context.timeoutMs);
          return { strategy: 'static_selector', url: null, duration: 0 };
        },
      };
      const browser = new FakeBrowser();

      await createFetcher(browser, { strategies: [probe], settleDelayMs: 2000 }).fetchAndExtract(PAGE_A);
      await createFetcher(browser, { strategies: [probe], settleDelayMs: 20000 }).fetchAndExtract(PAGE_B);

      expect(budgets).toEqual([13000, 1000]);
    });
  });

  describe('initialize', () => {
    it('should launch the browser once for concurrent fetches', async () => {
      const browser = new FakeBrowser();
      const fetcher = createFetcher(browser);

      await Promise.all([fetcher.fetchAndExtract(PAGE_A), fetcher.fetchAndExtract(PAGE_B)]);

      expect(browser.initializeCalls).toBe(1);
      expect(browser.pages).toHaveLength(2);
    });
  });

  describe('cleanup', () => {
    it('should close the browser', async () => {
      const browser = new FakeBrowser();
      const fetcher = createFetcher(browser);
      await fetcher.initialize();

      await fetcher.cleanup();

      expect(browser.closeCalls).toBe(1);
      expect(browser.isReady()).toBe(false);
    });

    it('should be safe without initialize', async () => {
      const browser = new FakeBrowser();

      await createFetcher(browser).cleanup();

      expect(browser.closeCalls).toBe(1);
      expect(browser.initializeCalls).toBe(0);
    });
  });
});

describe('isRetryableNavigationError', () => {
  it('should retry navigation failures that were not timeouts', () => {
    expect(isRetryableNavigationError(new NavigationError('https://a.example', 'reset'))).toBe(true);
    expect(isRetryableNavigationError(new NavigationError('https://a.example', 'timeout', false))).toBe(false);
    expect(isRetryableNavigationError(new Error('other'))).toBe(false);
  });
});
