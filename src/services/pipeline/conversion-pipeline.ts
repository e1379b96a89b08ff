/**
 * Conversion Pipeline
 *
 * Converts one source into every target geometry:
 *
 * 1. Decode once (decoder chosen by media kind)
 * 2. Encode each geometry through a bounded task pool
 * 3. Store each sequence through the cache store, one write at a time
 *
 * Geometries fail independently. A decode failure fails all of them with the
 * same reason. An abort stops geometries that have not been stored yet;
 * artifacts already stored stay valid.
 */

import type { CacheStore } from '@services/cache/cache-store';
import type { DecoderFactory } from '@services/codec/decoder-factory';
import { encodeFrameSequence } from '@services/codec/frame-codec';
import type { FrameTimingOptions } from '@services/shared/frame-timing';
import { TaskPool } from '@services/shared/task-pool';
import type { GeometryOutcome } from '@t/job-types';
import type { DecodedMedia, SourceMedia, TargetGeometry } from '@t/media-types';
import { classifyError } from '@utils/errors';
import { logger } from '@utils/logger';
import { throwIfAborted } from '@utils/with-timeout';

/**
 * What the scheduler needs from a pipeline. Tests substitute fakes.
 */
export interface SourceConverter {
  convert(
    source: SourceMedia,
    geometries: readonly TargetGeometry[],
    signal?: AbortSignal
  ): Promise<GeometryOutcome[]>;
}

export interface ConversionPipelineOptions extends FrameTimingOptions {
  store: CacheStore;
  decoders: DecoderFactory;
  encoderVersion: string;
  /** Geometries encoded at once */
  concurrency: number;
}

/**
 * Serializes async calls in submission order.
 */
class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}

export class ConversionPipeline implements SourceConverter {
  private readonly pool: TaskPool;
  private readonly writes = new WriteQueue();

  constructor(private readonly options: ConversionPipelineOptions) {
    this.pool = new TaskPool({ maxConcurrent: options.concurrency, name: 'encode' });
  }

  async convert(
    source: SourceMedia,
    geometries: readonly TargetGeometry[],
    signal?: AbortSignal
  ): Promise<GeometryOutcome[]> {
    const startedAt = performance.now();
    logger.info('pipeline', 'Starting conversion', {
      sourceId: source.id,
      filename: source.filename,
      kind: source.kind,
      geometries: geometries.map((g) => g.tag),
    });

    let decoded: DecodedMedia;
    try {
      throwIfAborted(signal, 'Conversion');
      decoded = await this.options.decoders.getDecoder(source.kind).decode(source.path, source.kind, signal);
    } catch (error) {
      const { type, reason } = classifyError(error);
      logger.error('pipeline', 'Decode failed', { sourceId: source.id, reason });
      return geometries.map((geometry) => ({
        geometry: geometry.tag,
        ok: false,
        reason,
        errorType: type,
      }));
    }

    logger.debug('pipeline', 'Source decoded', {
      sourceId: source.id,
      size: `${decoded.width}x${decoded.height}`,
      frames: decoded.frames.length,
    });

    const outcomes = await Promise.all(
      geometries.map((geometry) =>
        this.pool.execute(() => this.convertGeometry(source, decoded, geometry, signal))
      )
    );

    logger.performance('Conversion completed', {
      sourceId: source.id,
      durationMs: Math.round(performance.now() - startedAt),
      succeeded: outcomes.filter((o) => o.ok).length,
      failed: outcomes.filter((o) => !o.ok).length,
    });
    return outcomes;
  }

  private async convertGeometry(
    source: SourceMedia,
    decoded: DecodedMedia,
    geometry: TargetGeometry,
    signal?: AbortSignal
  ): Promise<GeometryOutcome> {
    try {
      throwIfAborted(signal, `Encoding ${geometry.tag}`);
      const sequence = await encodeFrameSequence(decoded, geometry, {
        defaultFrameDurationMs: this.options.defaultFrameDurationMs,
        stillFrameDurationMs: this.options.stillFrameDurationMs,
        signal,
      });

      const result = await this.writes.run(() => {
        throwIfAborted(signal, `Storing ${geometry.tag}`);
        return this.options.store.put({
          sourceId: source.id,
          geometry: geometry.tag,
          encoderVersion: this.options.encoderVersion,
          sequence,
        });
      });

      return {
        geometry: geometry.tag,
        ok: true,
        frameCount: result.metadata.frameCount,
        byteSize: result.metadata.byteSize,
        unchanged: result.status === 'unchanged',
      };
    } catch (error) {
      const { type, reason } = classifyError(error);
      logger.warn('pipeline', 'Geometry failed', {
        sourceId: source.id,
        geometry: geometry.tag,
        reason,
      });
      return { geometry: geometry.tag, ok: false, reason, errorType: type };
    }
  }
}
