import { BaseStrategy } from '../../domain/strategies/BaseStrategy';
import { StrategyContext, StrategyLogger } from '../../domain/strategies/ExtractionStrategy';
import { isEmbeddedVideoSource } from '../../domain/extraction/DownloadUrl';
import { EXTRACTION } from '../../application/config/HarvestDefaults';
import { getLogger } from '../logging';

/**
 * Returns the first iframe embedding a known video host.
 * Embed URLs rarely carry a media extension, so only the host allow-list applies.
 */
export class EmbeddedFrameStrategy extends BaseStrategy {
  readonly name = 'embedded_frame';
  readonly description = 'Looks for iframes embedding a known video host';

  constructor(
    private readonly embedHosts: readonly string[] = EXTRACTION.EMBED_HOSTS,
    logger: StrategyLogger = getLogger('Extraction')
  ) {
    super(logger);
  }

  protected async extract(context: StrategyContext): Promise<string | null> {
    const frames = await context.page.querySelectorAll('iframe');

    for (const frame of frames) {
      const src = await this.firstAcceptedAttribute(frame, ['src'], value =>
        isEmbeddedVideoSource(value, this.embedHosts)
      );
      if (src) {
        this.logger.info('Found iframe source', { url: src });
        return src;
      }
    }
    return null;
  }
}
