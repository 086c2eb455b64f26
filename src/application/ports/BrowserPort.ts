import { StrategyElement, StrategyPage } from '../../domain/strategies/ExtractionStrategy';

/**
 * Options for browser navigation.
 */
export interface NavigateOptions {
  /** Wait for navigation to complete */
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Options for waiting on a selector.
 */
export interface WaitForSelectorOptions {
  /** Timeout in milliseconds */
  timeout: number;
  /** Element state to wait for */
  state?: 'visible' | 'attached';
}

/**
 * Result of a browser action.
 */
export interface ActionResult {
  /** Whether the action succeeded */
  success: boolean;
  /** Error message if action failed */
  error?: string;
  /** Whether the failure was a timeout */
  timedOut?: boolean;
  /** Duration of the action in milliseconds */
  duration: number;
}

/**
 * A network response observed by a page.
 */
export interface NetworkResponse {
  /** Response URL */
  url: string;
  /** Resource kind of the originating request (document, xhr, fetch, media, ...) */
  resourceType: string;
}

export type ResponseListener = (response: NetworkResponse) => void;

/**
 * Handle to a DOM element on a page.
 */
export interface ElementHandlePort extends StrategyElement {
  querySelectorAll(selector: string): Promise<ElementHandlePort[]>;
}

/**
 * A single browser tab, owned by one fetch.
 */
export interface PagePort extends StrategyPage {
  /**
   * Navigates to the specified URL. Never rejects; failures are reported
   * through the result.
   */
  navigate(url: string, options?: NavigateOptions): Promise<ActionResult>;

  waitForSelector(selector: string, options: WaitForSelectorOptions): Promise<ElementHandlePort | null>;

  querySelector(selector: string): Promise<ElementHandlePort | null>;

  querySelectorAll(selector: string): Promise<ElementHandlePort[]>;

  /**
   * Subscribes to network responses on this page.
   * @returns A function that removes the listener
   */
  onResponse(listener: ResponseListener): () => void;

  /**
   * Closes the page and releases its resources.
   */
  close(): Promise<void>;
}

/**
 * Port interface for browser automation operations.
 * Defines the contract the fetcher depends on.
 */
export interface BrowserPort {
  /**
   * Launches the browser and creates the shared context.
   */
  initialize(): Promise<void>;

  /**
   * Closes the browser instance and releases resources.
   * Safe to call without a prior initialize().
   */
  close(): Promise<void>;

  /**
   * Checks if the browser is initialized and ready.
   */
  isReady(): boolean;

  /**
   * Opens a new page in the shared context.
   */
  newPage(): Promise<PagePort>;
}
