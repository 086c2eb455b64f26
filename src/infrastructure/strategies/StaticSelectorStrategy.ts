import { BaseStrategy } from '../../domain/strategies/BaseStrategy';
import { StrategyContext, StrategyElement, StrategyLogger } from '../../domain/strategies/ExtractionStrategy';
import { isValidDownloadUrl } from '../../domain/extraction/DownloadUrl';
import { EXTRACTION, NAVIGATION } from '../../application/config/HarvestDefaults';
import { getLogger } from '../logging';

/**
 * Options for the StaticSelectorStrategy.
 */
export interface StaticSelectorOptions {
  /** Prioritized selectors to scan */
  selectors?: readonly string[];
  /** Selectors checked after clicking a control */
  popupSelectors?: readonly string[];
  /** Markers accepted by the validity predicate */
  validityMarkers?: readonly string[];
  /** Pause after a click before scanning popups, in milliseconds */
  clickSettleMs?: number;
}

/**
 * Whether a selector targets a control that may reveal a link when clicked.
 */
export function isClickableSelector(selector: string): boolean {
  return selector.includes('button');
}

/**
 * Scans a prioritized list of selectors for download buttons and media links.
 *
 * The time budget is split evenly across every configured selector, whether
 * or not the scan reaches it. A matched element is checked for `href`, then
 * `data-download-url`, then `data-video-url`; button selectors that yield
 * nothing are clicked and the popup selectors are scanned for a revealed link.
 */
export class StaticSelectorStrategy extends BaseStrategy {
  readonly name = 'static_selector';
  readonly description = 'Looks for explicit download buttons and media links on the page';

  private readonly selectors: readonly string[];
  private readonly popupSelectors: readonly string[];
  private readonly validityMarkers: readonly string[];
  private readonly clickSettleMs: number;

  constructor(options: StaticSelectorOptions = {}, logger: StrategyLogger = getLogger('Extraction')) {
    super(logger);
    this.selectors = options.selectors ?? EXTRACTION.DOWNLOAD_SELECTORS;
    this.popupSelectors = options.popupSelectors ?? EXTRACTION.POPUP_SELECTORS;
    this.validityMarkers = options.validityMarkers ?? EXTRACTION.VALIDITY_MARKERS;
    this.clickSettleMs = options.clickSettleMs ?? NAVIGATION.CLICK_SETTLE_DELAY_MS;
  }

  /**
   * Wait budget for each selector, given the total budget.
   */
  perSelectorTimeout(totalMs: number): number {
    if (this.selectors.length === 0) {
      return 0;
    }
    return Math.max(1, Math.floor(totalMs / this.selectors.length));
  }

  protected async extract(context: StrategyContext): Promise<string | null> {
    const timeout = this.perSelectorTimeout(context.timeoutMs);

    for (const selector of this.selectors) {
      this.logger.debug(`Trying selector: ${selector}`);

      const element = await this.attempt(
        () => context.page.waitForSelector(selector, { state: 'visible', timeout }),
        `Selector ${selector}`
      );
      if (!element) {
        continue;
      }

      const url = await this.firstAcceptedAttribute(element, EXTRACTION.LINK_ATTRIBUTES, value =>
        this.isValid(value)
      );
      if (url) {
        this.logger.info(`Found download link with selector ${selector}`, { url });
        return url;
      }

      if (isClickableSelector(selector)) {
        const revealed = await this.clickAndScan(element, selector, timeout, context);
        if (revealed) {
          return revealed;
        }
      }
    }

    this.logger.debug('No download link found with static selectors');
    return null;
  }

  private async clickAndScan(
    element: StrategyElement,
    selector: string,
    timeout: number,
    context: StrategyContext
  ): Promise<string | null> {
    this.logger.debug(`Clicking ${selector} to reveal a link`);
    const clicked = await this.attempt(async () => {
      await element.click({ timeout });
      return true;
    }, `Clicking ${selector}`);
    if (!clicked) {
      return null;
    }

    await context.clock.sleep(this.clickSettleMs);

    for (const popupSelector of this.popupSelectors) {
      const popup = await this.attempt(
        () => context.page.querySelector(popupSelector),
        `Popup selector ${popupSelector}`
      );
      if (!popup) {
        continue;
      }
      const href = await this.attempt(() => popup.getAttribute('href'), `Reading href of ${popupSelector}`);
      if (href !== null && this.isValid(href)) {
        this.logger.info(`Found revealed download link with selector ${popupSelector}`, { url: href });
        return href;
      }
    }
    return null;
  }

  private isValid(value: string): boolean {
    return isValidDownloadUrl(value, this.validityMarkers);
  }
}
