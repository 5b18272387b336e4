import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, currentLogLevel, describeError } from '../utils/logger.js';

describe('Logger', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
    vi.restoreAllMocks();
  });

  it('falls back to info for unknown levels', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(currentLogLevel()).toBe('info');
    process.env.LOG_LEVEL = ' DEBUG ';
    expect(currentLogLevel()).toBe('debug');
  });

  it('drops lines below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('Crawler');

    logger.info('hidden');
    logger.success('hidden too');
    logger.warn('slow page', 3);

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Crawler] WARN: slow page', 3);
  });

  it('prints debug lines only at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    process.env.LOG_LEVEL = 'info';
    new Logger('Parser').debug('no match');
    process.env.LOG_LEVEL = 'debug';
    new Logger('Parser').debug('no match');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[Parser] DEBUG: no match');
  });

  it('prefixes child loggers and formats error causes', () => {
    process.env.LOG_LEVEL = 'info';
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('request failed', { cause: new Error('ECONNRESET') });

    new Logger('TourJobs').child('abc').error('Job crashed:', failure);

    expect(error).toHaveBeenCalledWith('[TourJobs:abc] ERROR: Job crashed: request failed <- ECONNRESET');
  });

  it('describes non-Error values', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(new Error('outer', { cause: 'inner' }))).toBe('outer <- inner');
  });
});
