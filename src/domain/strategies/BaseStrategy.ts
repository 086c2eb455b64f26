import { StrategyName } from '../extraction/ExtractionResult';
import {
  ExtractionStrategy,
  StrategyContext,
  StrategyElement,
  StrategyLogger,
  StrategyResult,
} from './ExtractionStrategy';

const silentLogger: StrategyLogger = {
  debug: () => undefined,
  info: () => undefined,
};

/**
 * Abstract base class for extraction strategies.
 * Contains failures so that one strategy can never abort the pipeline.
 */
export abstract class BaseStrategy implements ExtractionStrategy {
  abstract readonly name: StrategyName;
  abstract readonly description: string;

  protected readonly logger: StrategyLogger;

  constructor(logger: StrategyLogger = silentLogger) {
    this.logger = logger;
  }

  /**
   * The heuristic itself. Returns a valid URL or null.
   */
  protected abstract extract(context: StrategyContext): Promise<string | null>;

  /**
   * Execute the strategy with error containment and timing.
   */
  async execute(context: StrategyContext): Promise<StrategyResult> {
    const startTime = Date.now();

    try {
      const url = await this.extract(context);
      return {
        strategy: this.name,
        url,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Strategy ${this.name} failed`, { error: message });
      return {
        strategy: this.name,
        url: null,
        error: message,
        duration: Date.now() - startTime,
      };
    }
  }

  /**
   * Runs a per-element operation, treating any failure as "no match".
   */
  protected async attempt<T>(operation: () => Promise<T>, description: string): Promise<T | null> {
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`${description} failed`, { error: message });
      return null;
    }
  }

  /**
   * Reads `attributes` in order and returns the first value accepted by `accept`.
   */
  protected async firstAcceptedAttribute(
    element: StrategyElement,
    attributes: readonly string[],
    accept: (value: string) => boolean
  ): Promise<string | null> {
    for (const attribute of attributes) {
      const value = await this.attempt(() => element.getAttribute(attribute), `Reading ${attribute}`);
      if (value !== null && accept(value)) {
        return value;
      }
    }
    return null;
  }
}
