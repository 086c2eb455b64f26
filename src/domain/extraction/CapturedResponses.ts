/**
 * Resource kinds whose responses are worth inspecting for media URLs.
 */
export const CAPTURED_RESOURCE_KINDS: readonly string[] = ['fetch', 'xhr', 'media'];

/**
 * URL fragments that make a response a capture candidate.
 */
export const CAPTURE_URL_MARKERS: readonly string[] = [
  'm3u8',
  'mpd',
  'video',
  'media',
  'stream',
  'mp4',
  'download',
];

/**
 * Minimal view of a network response observed during a page visit.
 */
export interface ObservedResponse {
  url: string;
  resourceType: string;
}

/**
 * Returns true when a response should be recorded for later analysis.
 */
export function shouldCaptureResponse(response: ObservedResponse): boolean {
  if (!CAPTURED_RESOURCE_KINDS.includes(response.resourceType)) {
    return false;
  }
  return CAPTURE_URL_MARKERS.some(marker => response.url.includes(marker));
}

/**
 * Set of response URLs observed during a single fetch.
 *
 * One instance is created per fetch and handed to the extraction pipeline;
 * it is never shared between concurrent fetches.
 */
export class CapturedResponses {
  private readonly urls = new Set<string>();

  /**
   * Records a URL. Returns false if it was already present.
   */
  add(url: string): boolean {
    if (this.urls.has(url)) {
      return false;
    }
    this.urls.add(url);
    return true;
  }

  /**
   * Records the response if it passes the capture filter.
   */
  record(response: ObservedResponse): boolean {
    return shouldCaptureResponse(response) && this.add(response.url);
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  /**
   * URLs in the order they were first observed.
   */
  values(): string[] {
    return Array.from(this.urls);
  }

  get size(): number {
    return this.urls.size;
  }

  isEmpty(): boolean {
    return this.urls.size === 0;
  }
}
