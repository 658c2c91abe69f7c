import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolveConfig, updateConfig, defaultConfig, assertSeconds, MAX_TIMEOUT } from '../src/config';
import { createLogger } from '../src/debug';

describe('config', () => {
  it('merges user config with defaults', () => {
    const config = resolveConfig({ debug: true, generation: { timeout: 2000 } });
    expect(config.debug).toBe(true);
    expect(config.generation.timeout).toBe(2000);
    // Unspecified fields should have defaults
    expect(config.generation.backgroundTimeout).toBe(60_000);
    expect(config.fallback.mode).toBe('block');
    expect(config.headers.cacheStatus).toBe('x-stalewise-cache');
  });

  it('returns defaults when no user config provided', () => {
    expect(resolveConfig()).toEqual(defaultConfig);
  });

  it('ignores explicitly undefined fields', () => {
    const config = resolveConfig({ fallback: { mode: undefined } });
    expect(config.fallback.mode).toBe('block');
  });

  it('caches statuses below 500 by default', () => {
    const { shouldCache } = resolveConfig().generation;
    expect(shouldCache(200)).toBe(true);
    expect(shouldCache(404)).toBe(true);
    expect(shouldCache(500)).toBe(false);
  });

  it('applies updates without touching the original', () => {
    const config = resolveConfig();
    const updated = updateConfig(config, { debug: true, revalidate: { default: 30 } });
    expect(updated.debug).toBe(true);
    expect(updated.revalidate.default).toBe(30);
    // Other values should remain unchanged
    expect(updated.headers).toEqual(config.headers);
    expect(config.debug).toBe(false);
    expect(config.revalidate.default).toBeNull();
  });

  it('rejects invalid intervals', () => {
    expect(() => resolveConfig({ revalidate: { default: -1 } })).toThrow(RangeError);
    expect(() => resolveConfig({ generation: { timeout: 0 } })).toThrow(
      'generation.timeout must be a positive number of milliseconds up to 2147483647, got 0',
    );
    expect(() => updateConfig(resolveConfig(), { generation: { backgroundTimeout: Number.NaN } })).toThrow(RangeError);
  });

  it('rejects timeouts longer than a timer can wait', () => {
    expect(() => resolveConfig({ generation: { timeout: 3e9 } })).toThrow(
      'generation.timeout must be a positive number of milliseconds up to 2147483647, got 3000000000',
    );
    expect(() => resolveConfig({ generation: { backgroundTimeout: MAX_TIMEOUT + 1 } })).toThrow(RangeError);
    expect(resolveConfig({ generation: { timeout: MAX_TIMEOUT } }).generation.timeout).toBe(MAX_TIMEOUT);
  });

  it('accepts zero and null revalidation intervals', () => {
    expect(() => assertSeconds('revalidate', 0)).not.toThrow();
    expect(() => assertSeconds('revalidate', null)).not.toThrow();
    expect(() => assertSeconds('revalidate', Number.POSITIVE_INFINITY)).toThrow(
      'revalidate must be a non-negative number of seconds or null, got Infinity',
    );
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stays quiet unless debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger({ debug: false });
    logger.log('HIT: /about');
    logger.warn('SKIP CACHE: /about');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('prefixes messages when debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = createLogger({ debug: true });
    logger.log('HIT: /about');
    logger.log('MISS:', { key: '/users' });

    expect(log).toHaveBeenNthCalledWith(1, '[Stalewise]', 'HIT: /about');
    expect(log).toHaveBeenNthCalledWith(2, '[Stalewise]', 'MISS:', { key: '/users' });
  });

  it('always prints errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger({ debug: false }).error('Background generation failed', 'boom');

    expect(error).toHaveBeenCalledWith('[Stalewise]', 'Background generation failed', 'boom');
  });
});
