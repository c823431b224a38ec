/**
 * Tests for utility functions
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { Crypto, Logger, isRecord, resolveLogLevel, truncate } from '../lib/utils';

describe('Crypto', () => {
  it('should generate consistent SHA256 hashes', () => {
    const hash1 = Crypto.sha256('test');
    const hash2 = Crypto.sha256('test');
    expect(hash1).toBe(hash2);
    expect(hash1).toHaveLength(64);
  });

  it('should generate distinct uuids', () => {
    expect(Crypto.uuid()).not.toBe(Crypto.uuid());
    expect(Crypto.uuid()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('truncate', () => {
  it('should leave short text alone', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('should cut long text with a suffix', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
  });
});

describe('isRecord', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('text')).toBe(false);
  });
});

describe('Logger', () => {
  const savedLevel = Logger.level;

  afterEach(() => {
    Logger.level = savedLevel;
    vi.restoreAllMocks();
  });

  it('should write one JSON line per entry', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    Logger.level = 'info';

    Logger.info('Feed processed', { episodes: 3 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'info', message: 'Feed processed', data: { episodes: 3 } });
  });

  it('should suppress entries below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    Logger.level = 'warn';

    Logger.info('hidden');
    Logger.debug('hidden');
    Logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should resolve log levels from the environment value', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel(undefined, 'error')).toBe('error');
    expect(resolveLogLevel('toString')).toBe('info');
  });
});
