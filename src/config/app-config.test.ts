import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@utils/errors';
import { defaultEncodeConcurrency, loadConfig } from './app-config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.sourceDir).toBe(path.resolve('./data/sources'));
    expect(config.cache.root).toBe(path.resolve('./data/cache'));
    expect(config.cache.dbPath).toBe(path.join(path.resolve('./data/cache'), 'pixelcast.sqlite3'));
    expect(config.cache.maxArtifacts).toBe(60);
    expect(config.cache.maxBytes).toBe(256 * 1024 * 1024);
    expect(config.geometries.map((g) => g.tag)).toEqual(['32x32', '53x11', '16x16']);
    expect(config.stream.port).toBe(8766);
    expect(config.scheduler.scanIntervalMs).toBe(300_000);
    expect(config.scheduler.lockPath).toBe(path.join(path.resolve('./data/cache'), 'scheduler.lock'));
    expect(config.catalog.itemsPerPage).toBe(20);
    expect(config.encoder.version).toBe('rgb888-v1');
    expect(config.encoder.cropDetectSeconds).toBe(5);
    expect(config.logLevel).toBeNull();
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      TARGET_GEOMETRIES: '64x32, 64x32,8x8',
      CACHE_MAX_BYTES: '0',
      ITEMS_PER_PAGE: '5',
      STREAM_PORT: '',
      SCAN_INTERVAL_SECONDS: '2',
      ENCODE_CONCURRENCY: '3',
      LOG_LEVEL: 'debug',
    });

    expect(config.geometries.map((g) => g.tag)).toEqual(['64x32', '8x8']);
    expect(config.cache.maxBytes).toBeNull();
    expect(config.catalog.itemsPerPage).toBe(5);
    expect(config.stream.port).toBe(8766);
    expect(config.scheduler.scanIntervalMs).toBe(2_000);
    expect(config.encoder.concurrency).toBe(3);
    expect(config.logLevel).toBe('debug');
  });

  it('lists every invalid variable in one error', () => {
    expect(() => loadConfig({ STREAM_PORT: '70000', ITEMS_PER_PAGE: 'many' })).toThrow(
      /STREAM_PORT: .*; ITEMS_PER_PAGE: |ITEMS_PER_PAGE: .*; STREAM_PORT: /
    );
  });

  it('rejects a cache root equal to the source directory', () => {
    expect(() => loadConfig({ SOURCE_DIR: '/srv/media', CACHE_ROOT: '/srv/media/' })).toThrow(ConfigurationError);
  });

  it('rejects a bad geometry list', () => {
    expect(() => loadConfig({ TARGET_GEOMETRIES: '32by32' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TARGET_GEOMETRIES: ',' })).toThrow(ConfigurationError);
  });
});

describe('defaultEncodeConcurrency', () => {
  it('uses half the cores within 1..4', () => {
    expect(defaultEncodeConcurrency(1)).toBe(1);
    expect(defaultEncodeConcurrency(6)).toBe(3);
    expect(defaultEncodeConcurrency(32)).toBe(4);
  });
});
