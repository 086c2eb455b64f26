import { z } from 'zod';
import { EXTRACTION, NAVIGATION, OUTPUT, RATE_LIMIT, RETRY } from '../../application/config/HarvestDefaults';
import { parseLogLevel } from '../logging';

// Accepts DEBUG, INFO, WARNING and ERROR in any case.
const LogLevelSchema = z.preprocess(
  value => (typeof value === 'string' ? parseLogLevel(value) ?? value : value),
  z.enum(['debug', 'info', 'warn', 'error'])
);

const selectorList = (defaults: readonly string[]) =>
  z.array(z.string().min(1)).min(1).default([...defaults]);

export const RetrySchema = z
  .object({
    maxRetries: z.number().int().nonnegative().default(RETRY.DEFAULT_MAX_RETRIES),
    baseDelay: z.number().nonnegative().default(RETRY.DEFAULT_BASE_DELAY_SECONDS),
  })
  .strict();

export const ExtractionSchema = z
  .object({
    downloadSelectors: selectorList(EXTRACTION.DOWNLOAD_SELECTORS),
    popupSelectors: selectorList(EXTRACTION.POPUP_SELECTORS),
    validityMarkers: selectorList(EXTRACTION.VALIDITY_MARKERS),
    embedHosts: selectorList(EXTRACTION.EMBED_HOSTS),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    delayBetweenRequests: z.number().nonnegative().default(RATE_LIMIT.DEFAULT_DELAY_SECONDS),
    maxRequestsPerMinute: z.number().int().positive().default(RATE_LIMIT.DEFAULT_MAX_PER_MINUTE),
    timeout: z.number().positive().default(NAVIGATION.DEFAULT_TIMEOUT_SECONDS),
    outputDir: z.string().min(1).default(OUTPUT.DEFAULT_OUTPUT_DIR),
    idmPath: z.string().min(1).default(OUTPUT.DEFAULT_IDM_PATH),
    downloadDir: z.string().min(1).default(OUTPUT.DEFAULT_DOWNLOAD_DIR),
    headless: z.boolean().default(true),
    logLevel: LogLevelSchema.default('info'),
    logFile: z.string().min(1).optional(),
    retry: RetrySchema.default({}),
    extraction: ExtractionSchema.default({}),
  })
  .strict();

export type ParsedAppConfig = z.infer<typeof AppConfigSchema>;
