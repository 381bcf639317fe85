import { describe, it, expect, beforeEach } from 'vitest';
import {
  LoggingService,
  getLogger,
  isLogLevel,
  setLogger,
  type LogEntry,
} from '../../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let logger: LoggingService;
  let written: LogEntry[];

  beforeEach(() => {
    written = [];
    logger = new LoggingService('info', 3, 'test');
    logger.setSink((entry) => written.push(entry));
  });

  it('should drop entries below the minimum level', () => {
    logger.debug('hidden');
    logger.info('shown');

    expect(written.map((entry) => entry.message)).toEqual(['shown']);
  });

  it('should stamp entries with the logger name and context', () => {
    logger.warning('careful', { loc: '/a' });

    expect(written[0]).toMatchObject({
      level: 'warning',
      message: 'careful',
      logger: 'test',
      context: { loc: '/a' },
    });
  });

  it('should attach errors', () => {
    const error = new Error('boom');
    logger.error('failed', error);

    expect(written[0].error).toBe(error);
  });

  it('should keep a bounded ring of recent entries', () => {
    logger.info('1');
    logger.info('2');
    logger.info('3');
    logger.info('4');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['2', '3', '4']);
  });

  it('should filter recent entries by level', () => {
    logger.info('note');
    logger.error('bad');

    expect(logger.getRecentLogs(10, 'error').map((entry) => entry.message)).toEqual(['bad']);
  });

  it('should clear recent entries', () => {
    logger.info('note');
    logger.clearLogs();

    expect(logger.getRecentLogs()).toEqual([]);
  });

  it('should honour a changed minimum level', () => {
    logger.setMinLevel('error');
    logger.warning('hidden');
    logger.critical('shown');

    expect(written.map((entry) => entry.level)).toEqual(['critical']);
    expect(logger.getMinLevel()).toBe('error');
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('notice')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('global logger', () => {
  it('should return the instance installed with setLogger', () => {
    const previous = getLogger();
    const replacement = new LoggingService('emergency', 10, 'replacement');

    setLogger(replacement);
    expect(getLogger()).toBe(replacement);
    expect(getLogger().getLoggerName()).toBe('replacement');

    setLogger(previous);
  });
});
