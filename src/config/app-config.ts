/**
 * Application configuration from environment variables
 *
 * Parsed once at startup with zod. Any invalid value raises a
 * `ConfigurationError` listing every offending variable, which the entry
 * point treats as fatal.
 *
 * Usage:
 *   import { loadConfig } from '@config/app-config';
 *   const config = loadConfig(process.env);
 *   config.stream.port; // 8766
 */

import path from 'node:path';
import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { parseGeometryList } from '@services/codec/geometry';
import type { TargetGeometry } from '@t/media-types';
import {
  DEFAULT_CROP_DETECT_SECONDS,
  DEFAULT_DECODE_MAX_DIMENSION,
  DEFAULT_FRAME_DURATION_MS,
  DEFAULT_GEOMETRIES,
  DEFAULT_MAX_FRAMES,
  DEFAULT_STREAM_PORT,
  DEFAULT_VIDEO_FPS,
  ENCODER_VERSION,
  STILL_FRAME_DURATION_MS,
} from '@utils/constants';
import { ConfigurationError } from '@utils/errors';

export interface AppConfig {
  sourceDir: string;
  cache: {
    root: string;
    dbPath: string;
    maxArtifacts: number;
    maxBytes: number | null;
  };
  geometries: TargetGeometry[];
  encoder: {
    version: string;
    ffmpegPath: string;
    ffprobePath: string;
    videoFps: number;
    cropDetectSeconds: number;
    maxFrames: number;
    decodeMaxDimension: number;
    defaultFrameDurationMs: number;
    stillFrameDurationMs: number;
    concurrency: number;
  };
  scheduler: {
    lockPath: string;
    scanIntervalMs: number;
    maxAttempts: number;
    retryBaseMs: number;
    lockRetryMs: number;
  };
  stream: {
    host: string;
    port: number;
    handshakeTimeoutMs: number;
    notReadyRetryMs: number;
    pendingWaitTimeoutMs: number;
    rotationDwellMs: number;
    outboundQueueFrames: number;
    activityLogSize: number;
  };
  catalog: {
    itemsPerPage: number;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error' | null;
}

type Env = Record<string, string | undefined>;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SOURCE_DIR: z.string().min(1).default('./data/sources'),
  CACHE_ROOT: z.string().min(1).default('./data/cache'),
  CACHE_DB_PATH: z.string().min(1).optional(),
  CACHE_MAX_ARTIFACTS: positiveInt(60),
  // 0 disables the byte bound
  CACHE_MAX_BYTES: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(256 * 1024 * 1024),
  TARGET_GEOMETRIES: z.string().default(DEFAULT_GEOMETRIES),
  ITEMS_PER_PAGE: positiveInt(20),
  STREAM_HOST: z.string().min(1).default('0.0.0.0'),
  STREAM_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_STREAM_PORT),
  SCHEDULER_LOCK_PATH: z.string().min(1).optional(),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  ENCODER_VERSION: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'letters, digits, dot, dash and underscore only')
    .default(ENCODER_VERSION),
  SCAN_INTERVAL_SECONDS: positiveInt(300),
  VIDEO_FPS: z.coerce.number().positive().max(60).default(DEFAULT_VIDEO_FPS),
  CROP_DETECT_SECONDS: z.coerce.number().int().min(0).max(60).default(DEFAULT_CROP_DETECT_SECONDS),
  MAX_FRAMES: positiveInt(DEFAULT_MAX_FRAMES),
  DECODE_MAX_DIMENSION: positiveInt(DEFAULT_DECODE_MAX_DIMENSION),
  DEFAULT_FRAME_DURATION_MS: positiveInt(DEFAULT_FRAME_DURATION_MS),
  STILL_FRAME_DURATION_MS: positiveInt(STILL_FRAME_DURATION_MS),
  ENCODE_CONCURRENCY: z.coerce.number().int().positive().max(16).optional(),
  JOB_MAX_ATTEMPTS: positiveInt(3),
  JOB_RETRY_BASE_MS: positiveInt(30_000),
  LOCK_RETRY_MS: positiveInt(1_000),
  HANDSHAKE_TIMEOUT_MS: positiveInt(10_000),
  NOT_READY_RETRY_MS: positiveInt(2_000),
  PENDING_WAIT_TIMEOUT_MS: positiveInt(60_000),
  ROTATION_DWELL_MS: positiveInt(30_000),
  OUTBOUND_QUEUE_FRAMES: positiveInt(4),
  ACTIVITY_LOG_SIZE: positiveInt(200),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/**
 * Default encode concurrency: half the cores, at least 1, at most 4.
 */
export function defaultEncodeConcurrency(cores: number = availableParallelism()): number {
  return Math.max(1, Math.min(4, Math.floor(cores / 2)));
}

/**
 * Build the configuration from an environment map.
 *
 * Empty strings count as unset so `FOO=` in a compose file falls back to the default.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const cacheRoot = path.resolve(e.CACHE_ROOT);
  const sourceDir = path.resolve(e.SOURCE_DIR);

  if (cacheRoot === sourceDir) {
    throw new ConfigurationError('CACHE_ROOT and SOURCE_DIR must be different directories');
  }

  return {
    sourceDir,
    cache: {
      root: cacheRoot,
      dbPath: path.resolve(e.CACHE_DB_PATH ?? path.join(cacheRoot, 'pixelcast.sqlite3')),
      maxArtifacts: e.CACHE_MAX_ARTIFACTS,
      maxBytes: e.CACHE_MAX_BYTES === 0 ? null : e.CACHE_MAX_BYTES,
    },
    geometries: parseGeometryList(e.TARGET_GEOMETRIES),
    encoder: {
      version: e.ENCODER_VERSION,
      ffmpegPath: e.FFMPEG_PATH,
      ffprobePath: e.FFPROBE_PATH,
      videoFps: e.VIDEO_FPS,
      cropDetectSeconds: e.CROP_DETECT_SECONDS,
      maxFrames: e.MAX_FRAMES,
      decodeMaxDimension: e.DECODE_MAX_DIMENSION,
      defaultFrameDurationMs: e.DEFAULT_FRAME_DURATION_MS,
      stillFrameDurationMs: e.STILL_FRAME_DURATION_MS,
      concurrency: e.ENCODE_CONCURRENCY ?? defaultEncodeConcurrency(),
    },
    scheduler: {
      lockPath: path.resolve(e.SCHEDULER_LOCK_PATH ?? path.join(cacheRoot, 'scheduler.lock')),
      scanIntervalMs: e.SCAN_INTERVAL_SECONDS * 1000,
      maxAttempts: e.JOB_MAX_ATTEMPTS,
      retryBaseMs: e.JOB_RETRY_BASE_MS,
      lockRetryMs: e.LOCK_RETRY_MS,
    },
    stream: {
      host: e.STREAM_HOST,
      port: e.STREAM_PORT,
      handshakeTimeoutMs: e.HANDSHAKE_TIMEOUT_MS,
      notReadyRetryMs: e.NOT_READY_RETRY_MS,
      pendingWaitTimeoutMs: e.PENDING_WAIT_TIMEOUT_MS,
      rotationDwellMs: e.ROTATION_DWELL_MS,
      outboundQueueFrames: e.OUTBOUND_QUEUE_FRAMES,
      activityLogSize: e.ACTIVITY_LOG_SIZE,
    },
    catalog: {
      itemsPerPage: e.ITEMS_PER_PAGE,
    },
    logLevel: e.LOG_LEVEL ?? null,
  };
}
