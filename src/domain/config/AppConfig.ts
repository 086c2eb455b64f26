/**
 * Domain Configuration Interfaces
 */

export interface RetryConfig {
  /** Navigation retries after the first attempt */
  maxRetries: number;
  /** Base backoff delay in seconds */
  baseDelay: number;
}

export interface ExtractionConfig {
  downloadSelectors: string[];
  popupSelectors: string[];
  validityMarkers: string[];
  embedHosts: string[];
}

export interface AppConfig {
  /** Minimum delay between request starts, in seconds */
  delayBetweenRequests: number;
  /** Request cap per trailing minute */
  maxRequestsPerMinute: number;
  /** Page timeout in seconds; also the selector budget */
  timeout: number;
  outputDir: string;
  idmPath: string;
  downloadDir: string;
  headless: boolean;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFile?: string;
  retry: RetryConfig;
  extraction: ExtractionConfig;
}
