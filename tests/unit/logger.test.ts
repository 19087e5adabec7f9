import { afterEach, describe, expect, it, vi } from 'vitest';

import { LoggerService, parseLogLevel, type LogEntry } from '../../src/core/logger.js';

describe('LoggerService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers every entry to subscribers', () => {
    const logger = new LoggerService();
    logger.setLevel('silent');
    const entries: LogEntry[] = [];
    const unsubscribe = logger.subscribe((entry) => entries.push(entry));

    logger.debug('one');
    logger.error('two', { songId: 7 });
    unsubscribe();
    logger.info('three');

    expect(entries.map((entry) => [entry.level, entry.message, entry.context])).toEqual([
      ['debug', 'one', undefined],
      ['error', 'two', { songId: 7 }]
    ]);
  });

  it('prints to the console at or above its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new LoggerService();
    logger.setLevel('warn');

    logger.info('quiet');
    logger.warn('loud', { path: 'a.pro6' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] loud', { path: 'a.pro6' });
  });
});

describe('parseLogLevel', () => {
  it('maps configured names', () => {
    expect(parseLogLevel('WARNING')).toBe('warn');
    expect(parseLogLevel(' debug ')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
