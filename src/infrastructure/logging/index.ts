export {
  Logger,
  LogLevel,
  LogEntry,
  LogContext,
  LoggerConfig,
  LOG_LEVELS,
  formatFileLine,
  getLogger,
  getGlobalLoggerConfig,
  parseLogLevel,
  setGlobalLoggerConfig,
} from './Logger';
