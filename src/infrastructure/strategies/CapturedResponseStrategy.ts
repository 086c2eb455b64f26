import { BaseStrategy } from '../../domain/strategies/BaseStrategy';
import { StrategyContext, StrategyLogger } from '../../domain/strategies/ExtractionStrategy';
import {
  CAPTURED_VIDEO_PATTERNS,
  containsAny,
  isValidDownloadUrl,
} from '../../domain/extraction/DownloadUrl';
import { EXTRACTION } from '../../application/config/HarvestDefaults';
import { getLogger } from '../logging';

/**
 * Picks the first video-looking URL among the responses captured during the visit.
 */
export class CapturedResponseStrategy extends BaseStrategy {
  readonly name = 'captured_response';
  readonly description = 'Inspects network responses captured while the page loaded';

  constructor(
    private readonly validityMarkers: readonly string[] = EXTRACTION.VALIDITY_MARKERS,
    logger: StrategyLogger = getLogger('Extraction')
  ) {
    super(logger);
  }

  protected async extract(context: StrategyContext): Promise<string | null> {
    for (const url of context.captured.values()) {
      if (!containsAny(url, CAPTURED_VIDEO_PATTERNS)) {
        continue;
      }
      this.logger.info('Found potential video URL in captured response', { url });
      if (isValidDownloadUrl(url, this.validityMarkers)) {
        return url;
      }
    }
    return null;
  }
}
