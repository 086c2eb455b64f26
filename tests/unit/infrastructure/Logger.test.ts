/* eslint-disable @typescript-eslint/no-unsafe-member-access */
/* eslint-disable @typescript-eslint/no-unsafe-assignment */
/* eslint-disable @typescript-eslint/no-unsafe-argument */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  Logger,
  formatFileLine,
  getLogger,
  parseLogLevel,
  setGlobalLoggerConfig,
} from '../../../src/infrastructure/logging';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    setGlobalLoggerConfig({});
  });

  describe('log levels', () => {
    it('should log info messages by default', () => {
      const logger = new Logger('Test');
      logger.info('Test message');

      expect(consoleSpy).toHaveBeenCalled();
    });

    it('should not log debug messages by default', () => {
      const logger = new Logger('Test');
      logger.debug('Debug message');

      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should log warn messages', () => {
      const logger = new Logger('Test');
      logger.warn('Warning message');

      expect(consoleWarnSpy).toHaveBeenCalled();
    });

    it('should log error messages', () => {
      const logger = new Logger('Test');
      logger.error('Error message');

      expect(consoleErrorSpy).toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const logger = new Logger('Test', { minLevel: 'warn' });
      logger.info('Info message');

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(logger.isLevelEnabled('error')).toBe(true);
    });
  });

  describe('context', () => {
    it('should include context in log output', () => {
      const logger = new Logger('Fetcher', { useColors: false });
      logger.info('Navigating', { url: 'https://site.example', attempt: 2 });

      expect(consoleSpy).toHaveBeenCalledWith('[Fetcher] Navigating (url=https://site.example attempt=2)');
    });
  });

  describe('JSON output', () => {
    it('should output JSON when configured', () => {
      const logger = new Logger('Test', { jsonOutput: true });
      logger.info('Test message', { key: 'value' });

      const output = consoleSpy.mock.calls[0][0];
      const parsed = JSON.parse(output);

      expect(parsed).toHaveProperty('level', 'info');
      expect(parsed).toHaveProperty('category', 'Test');
      expect(parsed.context).toHaveProperty('key', 'value');
    });
  });

  describe('custom handler', () => {
    it('should call custom handler instead of console', () => {
      const customHandler = jest.fn();
      const logger = new Logger('Test', { customHandler });

      logger.info('Test message');

      expect(customHandler).toHaveBeenCalledWith(
        expect.objectContaining({ level: 'info', category: 'Test', message: 'Test message' })
      );
      expect(consoleSpy).not.toHaveBeenCalled();
    });
  });

  describe('log file', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvester-log-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should append enabled entries to the file', () => {
      const logFile = path.join(tmpDir, 'run.log');
      const logger = new Logger('Harvester', { logFile, customHandler: jest.fn() });

      logger.debug('hidden');
      logger.warn('No download URL found', { page: 'https://site.example/1' });
      logger.info('done');

      const lines = fs.readFileSync(logFile, 'utf-8').split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0]).toMatch(
        /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - Harvester - WARN - No download URL found \(page=https:\/\/site\.example\/1\)$/
      );
      expect(lines[1]).toMatch(/ - Harvester - INFO - done$/);
      expect(lines[2]).toBe('');
    });
  });

  describe('getLogger', () => {
    it('should create logger with global config', () => {
      setGlobalLoggerConfig({ minLevel: 'debug' });
      const logger = getLogger('Test');

      logger.debug('Debug message');
      expect(consoleSpy).toHaveBeenCalled();
    });
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' error ')).toBe('error');
  });

  it('should map WARNING to warn', () => {
    expect(parseLogLevel('WARNING')).toBe('warn');
  });

  it('should return null for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeNull();
  });
});

describe('formatFileLine', () => {
  it('should format timestamp, category, level and context', () => {
    expect(
      formatFileLine({
        timestamp: '2026-01-02T03:04:05.678Z',
        level: 'warn',
        category: 'Fetcher',
        message: 'Slow page',
        context: { url: 'https://site.example' },
      })
    ).toBe('2026-01-02 03:04:05 - Fetcher - WARN - Slow page (url=https://site.example)');
  });
});
