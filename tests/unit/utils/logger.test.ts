import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });

  it('should write info with metadata to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'info', prefix: 'Test' });

    logger.info('Loaded JSON document', { bytes: 12 });

    expect(write).toHaveBeenCalledWith('[Test] INFO: Loaded JSON document {"bytes":12}\n');
  });

  it('should drop messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'warn' });

    logger.info('hidden');
    logger.debug('hidden');
    expect(write).not.toHaveBeenCalled();

    logger.setLevel('debug');
    logger.debug('shown');
    expect(logger.getLevel()).toBe('debug');
    expect(write).toHaveBeenCalledWith('[JsonSleuth] DEBUG: shown \n');
  });

  it('should send errors through console.error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger({ level: 'error' }).error('failed', { code: 1 });

    expect(error).toHaveBeenCalledWith('[JsonSleuth] ERROR:', 'failed', { code: 1 });
  });

  it('should send warnings through console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn', prefix: 'Test' });

    logger.warn('careful');
    logger.error('not captured by warn');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[Test] WARN:', 'careful', '');
  });
});
