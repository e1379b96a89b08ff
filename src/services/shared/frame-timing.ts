/**
 * Frame Timing Utilities
 *
 * Per-frame duration resolution for decoded media and the frame-rate
 * arithmetic shared by the video decoder and the stream scheduler.
 *
 * Provides functions for:
 * - FPS ↔ frame duration conversion
 * - Native delay normalization (GIF minimum-delay clamping)
 * - Sequence duration totals
 */

import type { MediaKind } from '@t/media-types';
import { GIF_CLAMPED_DELAY_MS, GIF_MIN_DELAY_MS } from '@utils/constants';
import { logger } from '@utils/logger';

export interface FrameTimingOptions {
  /** Used when a frame has no native delay */
  defaultFrameDurationMs: number;
  /** Duration of the single frame of a still */
  stillFrameDurationMs: number;
}

/**
 * Convert a frame rate into a whole-millisecond frame duration.
 *
 * @throws Error if fps is not a positive number
 *
 * @example
 * fpsToFrameDurationMs(15); // 67
 * fpsToFrameDurationMs(30); // 33
 */
export function fpsToFrameDurationMs(fps: number): number {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new Error(`Invalid fps: ${fps}. Must be a positive number.`);
  }
  return Math.max(1, Math.round(1000 / fps));
}

/**
 * Normalize one native delay.
 *
 * Delays at or below 10 ms are replaced with 100 ms, the way browsers play
 * GIFs that ask for "as fast as possible". A missing or non-finite delay
 * yields the fallback.
 *
 * @example
 * normalizeFrameDelay(0, 66); // 100
 * normalizeFrameDelay(40, 66); // 40
 * normalizeFrameDelay(undefined, 66); // 66
 */
export function normalizeFrameDelay(delayMs: number | undefined, fallbackMs: number): number {
  if (delayMs === undefined || !Number.isFinite(delayMs)) {
    return fallbackMs;
  }
  if (delayMs <= GIF_MIN_DELAY_MS) {
    return GIF_CLAMPED_DELAY_MS;
  }
  return Math.round(delayMs);
}

/**
 * Resolve the duration of every frame of a decoded source.
 *
 * Stills get a single fixed duration regardless of what the decoder reported.
 *
 * @example
 * resolveFrameDurations('animated', 3, [0, 50, undefined], { defaultFrameDurationMs: 66, stillFrameDurationMs: 1000 });
 * // [100, 50, 66]
 */
export function resolveFrameDurations(
  kind: MediaKind,
  frameCount: number,
  delaysMs: readonly (number | undefined)[],
  options: FrameTimingOptions
): number[] {
  if (kind === 'still') {
    return [options.stillFrameDurationMs];
  }

  if (delaysMs.length !== frameCount) {
    logger.debug('codec', 'Delay count differs from frame count; padding with default', {
      frameCount,
      delayCount: delaysMs.length,
    });
  }

  const durations: number[] = [];
  for (let i = 0; i < frameCount; i++) {
    durations.push(normalizeFrameDelay(delaysMs[i], options.defaultFrameDurationMs));
  }
  return durations;
}

/**
 * Total play time of one pass over a duration list.
 */
export function totalDurationMs(durationsMs: readonly number[]): number {
  return durationsMs.reduce((sum, ms) => sum + ms, 0);
}
