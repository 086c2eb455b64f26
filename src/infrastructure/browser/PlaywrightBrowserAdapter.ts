import { chromium, errors, Browser, BrowserContext, ElementHandle, Page, Response } from 'playwright';
import {
  ActionResult,
  BrowserPort,
  ElementHandlePort,
  NavigateOptions,
  PagePort,
  ResponseListener,
  WaitForSelectorOptions,
} from '../../application/ports/BrowserPort';
import { BROWSER } from '../../application/config/HarvestDefaults';
import { SelectorError } from '../../domain/errors/AppErrors';

type DomHandle = ElementHandle<SVGElement | HTMLElement>;

/**
 * Configuration for the PlaywrightBrowserAdapter.
 */
export interface PlaywrightBrowserConfig {
  /** Run browser in headless mode */
  headless?: boolean;
  /** Default timeout for page actions in milliseconds */
  timeout?: number;
  /** Viewport width */
  viewportWidth?: number;
  /** Viewport height */
  viewportHeight?: number;
  /** User agent sent by every page */
  userAgent?: string;
}

const DEFAULT_CONFIG: Required<PlaywrightBrowserConfig> = {
  headless: true,
  timeout: 15000,
  viewportWidth: BROWSER.VIEWPORT_WIDTH,
  viewportHeight: BROWSER.VIEWPORT_HEIGHT,
  userAgent: BROWSER.USER_AGENT,
};

/**
 * Playwright element handle exposed through the ElementHandlePort.
 */
class PlaywrightElement implements ElementHandlePort {
  constructor(private readonly handle: DomHandle) {}

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async click(options: { timeout?: number } = {}): Promise<void> {
    await this.handle.click({ timeout: options.timeout });
  }

  async querySelectorAll(selector: string): Promise<ElementHandlePort[]> {
    const handles = await this.handle.$$(selector);
    return handles.map(handle => new PlaywrightElement(handle));
  }
}

/**
 * A single Playwright page exposed through the PagePort.
 */
export class PlaywrightPage implements PagePort {
  constructor(private readonly page: Page) {}

  async navigate(url: string, options: NavigateOptions = {}): Promise<ActionResult> {
    const startTime = Date.now();
    try {
      await this.page.goto(url, {
        waitUntil: options.waitUntil ?? 'networkidle',
        timeout: options.timeout,
      });
      return { success: true, duration: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        timedOut: error instanceof errors.TimeoutError,
        duration: Date.now() - startTime,
      };
    }
  }

  async waitForSelector(selector: string, options: WaitForSelectorOptions): Promise<ElementHandlePort | null> {
    try {
      const handle = await this.page.waitForSelector(selector, {
        state: options.state ?? 'visible',
        timeout: options.timeout,
      });
      return handle ? new PlaywrightElement(handle) : null;
    } catch (error) {
      throw new SelectorError(selector, error);
    }
  }

  async querySelector(selector: string): Promise<ElementHandlePort | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightElement(handle) : null;
  }

  async querySelectorAll(selector: string): Promise<ElementHandlePort[]> {
    const handles = await this.page.$$(selector);
    return handles.map(handle => new PlaywrightElement(handle));
  }

  onResponse(listener: ResponseListener): () => void {
    const handler = (response: Response): void => {
      listener({
        url: response.url(),
        resourceType: response.request().resourceType(),
      });
    };
    this.page.on('response', handler);
    return () => {
      this.page.off('response', handler);
    };
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

/**
 * Playwright implementation of the BrowserPort interface.
 * One chromium instance and one context are shared by every page.
 */
export class PlaywrightBrowserAdapter implements BrowserPort {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private config: Required<PlaywrightBrowserConfig>;

  constructor(config: PlaywrightBrowserConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Launches chromium and creates the shared context.
   */
  async initialize(): Promise<void> {
    if (this.context) {
      return;
    }

    this.browser = await chromium.launch({
      headless: this.config.headless,
    });

    this.context = await this.browser.newContext({
      viewport: {
        width: this.config.viewportWidth,
        height: this.config.viewportHeight,
      },
      userAgent: this.config.userAgent,
    });
  }

  /**
   * Closes the context and the browser.
   */
  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  isReady(): boolean {
    return this.browser !== null && this.context !== null;
  }

  async newPage(): Promise<PagePort> {
    if (!this.context) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.config.timeout);
    return new PlaywrightPage(page);
  }
}
