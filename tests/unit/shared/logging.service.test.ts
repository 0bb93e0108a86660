/**
 * LoggingService Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  LoggingService,
  createLogger,
  getLogger,
  isLogLevel,
  setLogger,
} from '../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    const logger = new LoggingService('warning');

    logger.info('ignored');
    logger.warning('kept');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['kept']);
  });

  it('should keep only the most recent entries', () => {
    const logger = new LoggingService('debug', 2);

    logger.info('a');
    logger.info('b');
    logger.info('c');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['b', 'c']);
  });

  it('should filter recent entries by level', () => {
    const logger = new LoggingService('debug');

    logger.debug('d');
    logger.error('e', new Error('boom'));

    expect(logger.getRecentLogs(100, 'error').map((entry) => entry.message)).toEqual(['e']);
  });

  it('should write to stderr without an MCP server', () => {
    const logger = new LoggingService('debug');

    logger.info('hello');

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError.mock.calls[0][0]).toMatch(/^\[.+\] INFO {5}\[steel-web-loader\] hello$/);
  });

  it('should include context in console output', () => {
    const logger = new LoggingService('debug');

    logger.warning('slow', { ms: 1200 });

    expect(consoleError.mock.calls[0][0]).toContain('\n  Context: {"ms":1200}');
  });

  it('should forward entries to an attached MCP server', () => {
    const logger = new LoggingService('debug');
    const sendLoggingMessage = vi.fn().mockResolvedValue(undefined);
    logger.setMcpServer({ sendLoggingMessage });

    logger.notice('hello', { sessionId: 's1' });

    expect(sendLoggingMessage).toHaveBeenCalledWith({
      level: 'notice',
      logger: 'steel-web-loader',
      data: {
        message: 'hello',
        timestamp: expect.any(String),
        context: { sessionId: 's1' },
      },
    });
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('should change its minimum level', () => {
    const logger = new LoggingService('info');

    logger.setMinLevel('error');

    expect(logger.getMinLevel()).toBe('error');
  });
});

describe('createLogger', () => {
  let previous: LoggingService;

  beforeEach(() => {
    previous = getLogger();
  });

  afterEach(() => {
    setLogger(previous);
  });

  it('should log through the current global logger under its own name', () => {
    const global = new LoggingService('debug');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('SessionManager');
    setLogger(global);

    logger.info('Session created', { sessionId: 's1' });

    const [entry] = global.getRecentLogs();
    expect(entry.logger).toBe('SessionManager');
    expect(entry.message).toBe('Session created');
    expect(entry.context).toEqual({ sessionId: 's1' });
    vi.mocked(console.error).mockRestore();
  });
});

describe('isLogLevel', () => {
  it('should accept RFC 5424 level names only', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
