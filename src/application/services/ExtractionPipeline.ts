import { ExtractionResult } from '../../domain/extraction/ExtractionResult';
import { CapturedResponses } from '../../domain/extraction/CapturedResponses';
import { ExtractionStrategy, StrategyPage } from '../../domain/strategies/ExtractionStrategy';
import { Clock, systemClock } from '../../domain/shared/Clock';
import { getLogger, Logger } from '../../infrastructure/logging';

/**
 * Input for one pipeline run.
 */
export interface PipelineInput {
  /** Page being inspected */
  page: StrategyPage;
  /** URL of the page being inspected */
  pageUrl: string;
  /** Responses captured during this visit */
  captured: CapturedResponses;
  /** Time budget for the run in milliseconds */
  timeoutMs: number;
}

/**
 * Runs extraction strategies in a fixed order and returns the first match.
 */
export class ExtractionPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly strategies: readonly ExtractionStrategy[],
    private readonly clock: Clock = systemClock,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('Extraction');
  }

  /**
   * Strategy names in execution order.
   */
  getStrategyNames(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  async run(input: PipelineInput): Promise<ExtractionResult> {
    const context = {
      page: input.page,
      pageUrl: input.pageUrl,
      captured: input.captured,
      timeoutMs: input.timeoutMs,
      clock: this.clock,
    };

    for (const strategy of this.strategies) {
      const result = await strategy.execute(context);

      if (result.url) {
        this.logger.debug(`Strategy ${strategy.name} matched`, {
          page: input.pageUrl,
          duration: result.duration,
        });
        return ExtractionResult.found(input.pageUrl, result.url, strategy.name);
      }

      if (result.error) {
        this.logger.debug(`Strategy ${strategy.name} failed, continuing`, { error: result.error });
      }
    }

    this.logger.warn('Could not find download URL using any extraction method', {
      page: input.pageUrl,
    });
    return ExtractionResult.none(input.pageUrl);
  }
}
