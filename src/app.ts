/**
 * Application wiring
 *
 * Builds every service from a loaded configuration and starts them in
 * dependency order: cache store, pipeline, scheduler, stream server.
 * `stop()` tears them down in reverse. A storage failure in the scheduler
 * stops everything and is then reported through `onFatal`.
 *
 * Usage:
 *   const app = await startApp(loadConfig());
 *   await app.catalog.listSources({ sortBy: 'served', order: 'desc' });
 *   await app.stop();
 */

import type { AddressInfo } from 'node:net';
import type { AppConfig } from '@config/app-config';
import { CacheStore } from '@services/cache/cache-store';
import { CatalogService } from '@services/catalog/catalog-service';
import { createDecoderFactory } from '@services/codec/decoder-factory';
import { ConversionPipeline } from '@services/pipeline/conversion-pipeline';
import { ConversionScheduler } from '@services/scheduler/conversion-scheduler';
import { SchedulerLock } from '@services/scheduler/scheduler-lock';
import { SourceScanner } from '@services/scheduler/source-scanner';
import { StreamServer } from '@services/stream/stream-server';
import { getErrorMessage } from '@utils/errors';
import { logger } from '@utils/logger';

export interface RunningApp {
  config: AppConfig;
  store: CacheStore;
  scheduler: ConversionScheduler;
  server: StreamServer;
  catalog: CatalogService;
  address: AddressInfo;
  /** Idempotent */
  stop(): Promise<void>;
}

export interface StartAppOptions {
  /** Called after the app stopped itself on a storage failure */
  onFatal?: (error: unknown) => void;
}

/**
 * Open the cache, start the scheduler and listen for display clients.
 *
 * @throws StorageError when the metadata store cannot be opened
 * @throws StreamIOError when the stream port cannot be bound
 */
export async function startApp(config: AppConfig, options: StartAppOptions = {}): Promise<RunningApp> {
  const store = await CacheStore.open({
    root: config.cache.root,
    dbPath: config.cache.dbPath,
    capacity: { maxArtifacts: config.cache.maxArtifacts, maxBytes: config.cache.maxBytes },
    encoderVersion: config.encoder.version,
  });

  const pipeline = new ConversionPipeline({
    store,
    decoders: createDecoderFactory({
      maxFrames: config.encoder.maxFrames,
      decodeMaxDimension: config.encoder.decodeMaxDimension,
      ffmpegPath: config.encoder.ffmpegPath,
      ffprobePath: config.encoder.ffprobePath,
      videoFps: config.encoder.videoFps,
      cropDetectSeconds: config.encoder.cropDetectSeconds,
    }),
    encoderVersion: config.encoder.version,
    concurrency: config.encoder.concurrency,
    defaultFrameDurationMs: config.encoder.defaultFrameDurationMs,
    stillFrameDurationMs: config.encoder.stillFrameDurationMs,
  });

  const scheduler = new ConversionScheduler({
    store,
    converter: pipeline,
    scanner: new SourceScanner(config.sourceDir),
    lock: new SchedulerLock({ path: config.scheduler.lockPath }),
    geometries: config.geometries,
    encoderVersion: config.encoder.version,
    maxAttempts: config.scheduler.maxAttempts,
    retryBaseMs: config.scheduler.retryBaseMs,
    lockRetryMs: config.scheduler.lockRetryMs,
    scanIntervalMs: config.scheduler.scanIntervalMs,
    onFatal: (error) => {
      logger.error('app', 'Storage failure, shutting down', { error: getErrorMessage(error) });
      void stop()
        .catch((stopError: unknown) => {
          logger.error('app', 'Shutdown failed', { error: getErrorMessage(stopError) });
        })
        .finally(() => options.onFatal?.(error));
    },
  });

  const server = new StreamServer({
    ...config.stream,
    geometries: config.geometries,
    store,
    conversions: scheduler,
  });

  let address: AddressInfo;
  try {
    address = await server.listen();
  } catch (error) {
    await store.close();
    throw error;
  }

  const catalog = new CatalogService({
    store,
    scheduler,
    activity: server,
    itemsPerPage: config.catalog.itemsPerPage,
  });

  scheduler.start();
  logger.info('app', 'Started', {
    sourceDir: config.sourceDir,
    cacheRoot: config.cache.root,
    port: address.port,
    geometries: config.geometries.map((g) => g.tag),
    encoderVersion: config.encoder.version,
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      try {
        await server.close();
        await scheduler.stop();
      } finally {
        await store.close();
      }
      logger.info('app', 'Stopped');
    })();
    return stopping;
  };

  return { config, store, scheduler, server, catalog, address, stop };
}

