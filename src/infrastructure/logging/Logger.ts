/**
 * Structured Logger
 *
 * Leveled, categorized logging (DEBUG, INFO, WARN, ERROR) for the
 * harvester, with optional JSON output and an append-only log file.
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  minLevel: LogLevel;
  /** Whether to include timestamps (default: false) */
  includeTimestamp: boolean;
  /** Whether to use colors in console output (default: true) */
  useColors: boolean;
  /** Whether to output as JSON (default: false) */
  jsonOutput: boolean;
  /** File that receives a plain-text copy of every entry */
  logFile?: string;
  /** Custom log handler */
  customHandler?: (entry: LogEntry) => void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const CATEGORY_COLORS: Record<string, string> = {
  Harvester: '\x1b[35m', // Magenta
  Fetcher: '\x1b[34m', // Blue
  Extraction: '\x1b[32m', // Green
  RateLimiter: '\x1b[33m', // Yellow
  Retry: '\x1b[33m', // Yellow
  Browser: '\x1b[36m', // Cyan
  Output: '\x1b[90m', // Gray
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

/**
 * Maps user-facing level names (including WARNING) onto a LogLevel.
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return LOG_LEVELS.find(level => level === normalized) ?? null;
}

function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  return Object.entries(context)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

/**
 * Formats an entry the way it is written to the log file.
 */
export function formatFileLine(entry: LogEntry): string {
  const time = entry.timestamp.replace('T', ' ').split('.')[0];
  const contextStr = formatContext(entry.context);
  const suffix = contextStr ? ` (${contextStr})` : '';
  return `${time} - ${entry.category} - ${entry.level.toUpperCase()} - ${entry.message}${suffix}`;
}

/**
 * Structured logger with levels and categories.
 */
export class Logger {
  private config: LoggerConfig;
  private category: string;

  constructor(category: string, config: Partial<LoggerConfig> = {}) {
    this.category = category;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Set the minimum log level.
   */
  setLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context,
    };

    if (this.config.logFile) {
      fs.appendFileSync(this.config.logFile, `${formatFileLine(entry)}\n`, 'utf-8');
    }

    if (this.config.customHandler) {
      this.config.customHandler(entry);
      return;
    }

    if (this.config.jsonOutput) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(entry));
    } else {
      this.outputText(entry);
    }
  }

  private outputText(entry: LogEntry): void {
    const parts: string[] = [];
    const colors = this.config.useColors;

    if (this.config.includeTimestamp) {
      const time = entry.timestamp.split('T')[1].split('.')[0];
      parts.push(colors ? `${DIM}${time}${RESET}` : time);
    }

    const categoryColor = CATEGORY_COLORS[entry.category.split(':')[0]] ?? '\x1b[37m';
    parts.push(colors ? `${categoryColor}[${entry.category}]${RESET}` : `[${entry.category}]`);
    parts.push(entry.message);

    const contextStr = formatContext(entry.context);
    if (contextStr) {
      parts.push(colors ? `${DIM}(${contextStr})${RESET}` : `(${contextStr})`);
    }

    const output = parts.join(' ');
    const levelColor = LOG_COLORS[entry.level];

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(colors ? `${levelColor}${output}${RESET}` : output);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(colors ? `${levelColor}${output}${RESET}` : output);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(output);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

/**
 * Global logger configuration.
 */
let globalConfig: Partial<LoggerConfig> = {};

/**
 * Set global logger configuration.
 */
export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

export function getGlobalLoggerConfig(): Partial<LoggerConfig> {
  return { ...globalConfig };
}

/**
 * Get a logger for a category.
 */
export function getLogger(category: string): Logger {
  return new Logger(category, globalConfig);
}
