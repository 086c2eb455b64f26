import { ExtractionResult } from '../../domain/extraction/ExtractionResult';
import { errorMessage } from '../../domain/errors/AppErrors';
import { getLogger, Logger } from '../../infrastructure/logging';

/**
 * Anything that can turn a page URL into an extraction result.
 */
export interface PageExtractor {
  fetchAndExtract(url: string): Promise<ExtractionResult>;
}

/**
 * Summary of a batch run.
 */
export interface HarvestReport {
  /** Number of page URLs submitted */
  total: number;
  /** Number of pages that yielded a link (before deduplication) */
  resolved: number;
  /** Unique download links in first-seen order */
  links: string[];
  /** Page URLs that yielded nothing */
  missed: string[];
  /** Wall-clock duration in milliseconds */
  durationMs: number;
}

/**
 * Removes duplicates and empty entries, keeping the first occurrence of each link.
 */
export function deduplicateLinks(links: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const link of links) {
    if (link && !seen.has(link)) {
      seen.add(link);
      result.push(link);
    }
  }

  return result;
}

/**
 * Formats a duration as "1h 2m 3s", "2m 30s" or "45s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Fans page URLs out to concurrent fetches and collects unique download links.
 *
 * Request starts are paced by the fetcher's rate limiter; a failing URL only
 * ever shows up as a missing entry in the report.
 */
export class BatchHarvester {
  private readonly logger: Logger;

  constructor(
    private readonly extractor: PageExtractor,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('Harvester');
  }

  async harvest(urls: readonly string[]): Promise<HarvestReport> {
    const startedAt = Date.now();
    this.logger.info(`Found ${urls.length} URLs to process`);

    const results = await Promise.all(urls.map(url => this.processUrl(url)));

    const found: string[] = [];
    const missed: string[] = [];
    results.forEach((downloadUrl, index) => {
      if (downloadUrl) {
        found.push(downloadUrl);
      } else {
        missed.push(urls[index]);
      }
    });

    const links = deduplicateLinks(found);
    const durationMs = Date.now() - startedAt;
    this.logger.info(`Found ${links.length} unique download links in ${formatDuration(durationMs)}`, {
      resolved: found.length,
      missed: missed.length,
    });

    return {
      total: urls.length,
      resolved: found.length,
      links,
      missed,
      durationMs,
    };
  }

  private async processUrl(url: string): Promise<string | null> {
    this.logger.info(`Processing URL: ${url}`);
    try {
      const result = await this.extractor.fetchAndExtract(url);
      if (result.downloadUrl) {
        this.logger.info(`Found download URL: ${result.downloadUrl}`, {
          strategy: result.strategy,
        });
        return result.downloadUrl;
      }
      this.logger.warn(`No download URL found for: ${url}`);
      return null;
    } catch (error) {
      this.logger.error(`Error processing URL ${url}`, { error: errorMessage(error) });
      return null;
    }
  }
}
