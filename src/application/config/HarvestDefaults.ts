/**
 * Harvest Constants and Configuration
 *
 * Centralizes the fixed timings and default selector lists
 * used by the fetcher and the extraction pipeline.
 */

import { DEFAULT_EMBED_HOSTS, DEFAULT_VALIDITY_MARKERS } from '../../domain/extraction/DownloadUrl';

/**
 * Rate limiting defaults.
 */
export const RATE_LIMIT = {
  /** Default minimum delay between request starts in seconds */
  DEFAULT_DELAY_SECONDS: 5,
  /** Default request cap per sliding window */
  DEFAULT_MAX_PER_MINUTE: 10,
  /** Sliding window length in milliseconds */
  WINDOW_MS: 60_000,
} as const;

/**
 * Navigation and timing defaults.
 */
export const NAVIGATION = {
  /** Default page timeout in seconds */
  DEFAULT_TIMEOUT_SECONDS: 15,
  /** Pause after navigation to admit late asynchronous requests */
  SETTLE_DELAY_MS: 2000,
  /** Pause after clicking a control before looking for revealed links */
  CLICK_SETTLE_DELAY_MS: 2000,
  /** Smallest budget handed to the extraction pipeline */
  MIN_EXTRACTION_BUDGET_MS: 1000,
} as const;

/**
 * Browser context defaults.
 */
export const BROWSER = {
  VIEWPORT_WIDTH: 1280,
  VIEWPORT_HEIGHT: 800,
  USER_AGENT:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/98.0.4758.102 Safari/537.36',
} as const;

/**
 * Retry configuration.
 */
export const RETRY = {
  /** Default max retries for navigation */
  DEFAULT_MAX_RETRIES: 1,
  /** Default base delay for retry backoff in seconds */
  DEFAULT_BASE_DELAY_SECONDS: 1,
} as const;

/**
 * Extraction defaults.
 */
export const EXTRACTION = {
  /** Prioritized selectors for the static selector scan */
  DOWNLOAD_SELECTORS: [
    'a.download-button',
    'a[data-download]',
    'a.video-download',
    "a[href*='download']",
    "a[href*='.mp4']",
    "a[href*='.m3u8']",
    "a[href*='.mpd']",
    'button.download-button',
    '[data-download-url]',
    '[data-video-url]',
  ],
  /** Selectors for links revealed after clicking a control */
  POPUP_SELECTORS: [
    'a.download-link',
    'a[download]',
    ".modal a[href*='.mp4']",
    ".popup a[href*='download']",
  ],
  /** Element attributes that may carry the link, in order */
  LINK_ATTRIBUTES: ['href', 'data-download-url', 'data-video-url'],
  VALIDITY_MARKERS: DEFAULT_VALIDITY_MARKERS,
  EMBED_HOSTS: DEFAULT_EMBED_HOSTS,
} as const;

/**
 * Output defaults.
 */
export const OUTPUT = {
  DEFAULT_OUTPUT_DIR: './out',
  DEFAULT_IDM_PATH: 'C:/Program Files (x86)/Internet Download Manager/IDMan.exe',
  DEFAULT_DOWNLOAD_DIR: 'C:/Downloads',
  LINKS_FILE: 'links.txt',
  WINDOWS_SCRIPT: 'idm_queue.bat',
  UNIX_SCRIPT: 'idm_queue.sh',
} as const;
