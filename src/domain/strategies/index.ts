export {
  ExtractionStrategy,
  StrategyContext,
  StrategyElement,
  StrategyLogger,
  StrategyPage,
  StrategyResult,
} from './ExtractionStrategy';
export { BaseStrategy } from './BaseStrategy';
