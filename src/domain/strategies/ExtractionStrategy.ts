import { CapturedResponses } from '../extraction/CapturedResponses';
import { StrategyName } from '../extraction/ExtractionResult';
import { Clock } from '../shared/Clock';

/**
 * Minimal element handle interface for strategies.
 * Keeps the domain layer independent from the application-level BrowserPort.
 */
export interface StrategyElement {
  /** Read an attribute value, or null if it is absent */
  getAttribute(name: string): Promise<string | null>;
  /** Click the element */
  click(options?: { timeout?: number }): Promise<void>;
  /** Query descendants of this element */
  querySelectorAll(selector: string): Promise<StrategyElement[]>;
}

/**
 * Minimal page interface for strategies.
 */
export interface StrategyPage {
  /** Wait for an element matching `selector` to reach `state` */
  waitForSelector(
    selector: string,
    options: { timeout: number; state?: 'visible' | 'attached' }
  ): Promise<StrategyElement | null>;
  /** First element matching `selector`, or null */
  querySelector(selector: string): Promise<StrategyElement | null>;
  /** All elements matching `selector` */
  querySelectorAll(selector: string): Promise<StrategyElement[]>;
}

/**
 * Minimal logging interface for strategies.
 */
export interface StrategyLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

/**
 * Everything a strategy may consult while looking for a download URL.
 */
export interface StrategyContext {
  /** Page being inspected */
  page: StrategyPage;
  /** URL of the page being inspected */
  pageUrl: string;
  /** Responses captured during this visit only */
  captured: CapturedResponses;
  /** Remaining time budget in milliseconds */
  timeoutMs: number;
  /** Clock used for settle delays */
  clock: Clock;
}

/**
 * Result returned by a strategy run.
 */
export interface StrategyResult {
  /** Strategy that ran */
  strategy: StrategyName;
  /** Valid URL found, or null */
  url: string | null;
  /** Error message if the strategy failed as a whole */
  error?: string;
  /** Execution duration in milliseconds */
  duration: number;
}

/**
 * Interface that all extraction strategies implement.
 */
export interface ExtractionStrategy {
  /** Unique name identifying this strategy */
  readonly name: StrategyName;

  /** Human-readable description of the heuristic */
  readonly description: string;

  /** Run the heuristic against a page; never rejects */
  execute(context: StrategyContext): Promise<StrategyResult>;
}
