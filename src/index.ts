/**
 * Streaming-Page Link Harvester
 * Library entry point
 */

export { PlaywrightBrowserAdapter, PlaywrightPage } from './infrastructure/browser/PlaywrightBrowserAdapter';
export type {
  BrowserPort,
  PagePort,
  ElementHandlePort,
  NetworkResponse,
  ActionResult,
} from './application/ports/BrowserPort';
export { RateLimiter } from './application/services/RateLimiter';
export { RetryPolicy } from './application/services/RetryPolicy';
export { PageFetcher } from './application/services/PageFetcher';
export { ExtractionPipeline } from './application/services/ExtractionPipeline';
export { BatchHarvester, deduplicateLinks, formatDuration } from './application/services/BatchHarvester';
export type { HarvestReport } from './application/services/BatchHarvester';
export { ExtractionResult } from './domain/extraction/ExtractionResult';
export { CapturedResponses } from './domain/extraction/CapturedResponses';
export { isValidDownloadUrl, isEmbeddedVideoSource } from './domain/extraction/DownloadUrl';
export {
  StaticSelectorStrategy,
  CapturedResponseStrategy,
  MediaElementStrategy,
  EmbeddedFrameStrategy,
} from './infrastructure/strategies';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export { CompositionRoot } from './infrastructure/di/CompositionRoot';
export { runHarvestCommand } from './infrastructure/cli/HarvestCommand';
export { NavigationError, SelectorError, ConfigurationError } from './domain/errors/AppErrors';
