import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@celltrace/core';
import { Logger, loadTrackerConfig } from '../src/index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadTrackerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadTrackerConfig({})).toEqual({ logLevel: 'info', logFormat: 'text', outputDir: '.' });
  });

  it('reads the environment', () => {
    expect(
      loadTrackerConfig({
        CELLTRACE_LOG_LEVEL: 'debug',
        CELLTRACE_LOG_FORMAT: 'json',
        CELLTRACE_OUTPUT_DIR: '/var/tmp/logs',
      })
    ).toEqual({ logLevel: 'debug', logFormat: 'json', outputDir: '/var/tmp/logs' });
  });

  it('treats blank variables as unset', () => {
    expect(loadTrackerConfig({ CELLTRACE_LOG_LEVEL: '  ' }).logLevel).toBe('info');
  });

  it('rejects unknown log levels', () => {
    expect(() => loadTrackerConfig({ CELLTRACE_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});

describe('Logger', () => {
  it('writes JSON lines with extra fields', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    new Logger({ format: 'json' }).info('Dumped a log', { entries: 2 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toMatchObject({
      level: 'info',
      msg: 'Dumped a log',
      entries: 2,
    });
  });

  it('drops messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: 'warn' });

    logger.debug('step recorded');
    logger.info('flushed');
    logger.warn('slow step');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toContain('WARN slow step');
  });

  it('adds child fields to every message', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    new Logger({ format: 'json' }).child({ logger: 'cellwise' }).error('write failed', { step: 3 });

    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toMatchObject({
      level: 'error',
      msg: 'write failed',
      logger: 'cellwise',
      step: 3,
    });
  });
});
