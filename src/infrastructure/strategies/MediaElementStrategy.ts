import { BaseStrategy } from '../../domain/strategies/BaseStrategy';
import { StrategyContext, StrategyLogger } from '../../domain/strategies/ExtractionStrategy';
import { isValidDownloadUrl } from '../../domain/extraction/DownloadUrl';
import { EXTRACTION } from '../../application/config/HarvestDefaults';
import { getLogger } from '../logging';

/**
 * Reads `src` of video elements and of their nested `source` children.
 */
export class MediaElementStrategy extends BaseStrategy {
  readonly name = 'media_element';
  readonly description = 'Reads sources of video elements on the page';

  constructor(
    private readonly validityMarkers: readonly string[] = EXTRACTION.VALIDITY_MARKERS,
    logger: StrategyLogger = getLogger('Extraction')
  ) {
    super(logger);
  }

  protected async extract(context: StrategyContext): Promise<string | null> {
    const videos = await context.page.querySelectorAll('video');
    const accept = (value: string): boolean => isValidDownloadUrl(value, this.validityMarkers);

    for (const video of videos) {
      const src = await this.firstAcceptedAttribute(video, ['src'], accept);
      if (src) {
        this.logger.info('Found video source', { url: src });
        return src;
      }

      const sources = (await this.attempt(() => video.querySelectorAll('source'), 'Listing source children')) ?? [];
      for (const source of sources) {
        const nested = await this.firstAcceptedAttribute(source, ['src'], accept);
        if (nested) {
          this.logger.info('Found video source', { url: nested });
          return nested;
        }
      }
    }
    return null;
  }
}
