/**
 * Decoder Factory
 *
 * Registry of decoder implementations keyed by media kind.
 *
 * Usage:
 * 1. Build the default set: const decoders = createDecoderFactory(config.encoder)
 * 2. Get a decoder: const decoder = decoders.getDecoder(source.kind)
 * 3. Decode: const media = await decoder.decode(source.path, source.kind, signal)
 *
 * Tests register their own decoders to avoid real files and executables.
 */

import type { MediaKind } from '@t/media-types';
import { ConfigurationError } from '@utils/errors';
import { logger } from '@utils/logger';
import type { DecodeLimits, MediaDecoder } from './decoder-interface';
import { ImageDecoder } from './image-decoder';
import { VideoDecoder, type VideoDecoderOptions } from './video-decoder';

export class DecoderFactory {
  private decoders = new Map<string, MediaDecoder>();

  /**
   * Register a decoder. Later registrations win for the kinds they cover.
   *
   * @example
   * factory.register(new ImageDecoder({ maxFrames: 900, decodeMaxDimension: 256 }));
   */
  register(decoder: MediaDecoder): this {
    if (this.decoders.has(decoder.name)) {
      logger.warn('codec', `Decoder ${decoder.name} already registered, overwriting`);
    }
    this.decoders.set(decoder.name, decoder);
    logger.debug('codec', `Registered decoder: ${decoder.name}`, { kinds: decoder.kinds });
    return this;
  }

  getAll(): MediaDecoder[] {
    return Array.from(this.decoders.values());
  }

  /**
   * Get the decoder for a media kind.
   *
   * @throws ConfigurationError when nothing handles the kind
   */
  getDecoder(kind: MediaKind): MediaDecoder {
    const candidates = this.getAll().filter((decoder) => decoder.kinds.includes(kind));
    const decoder = candidates.at(-1);
    if (!decoder) {
      throw new ConfigurationError(`No decoder registered for media kind '${kind}'`);
    }
    return decoder;
  }
}

export type DecoderFactoryOptions = DecodeLimits & Omit<VideoDecoderOptions, keyof DecodeLimits>;

/**
 * Factory with the sharp image decoder and the ffmpeg video decoder.
 */
export function createDecoderFactory(options: DecoderFactoryOptions): DecoderFactory {
  const limits: DecodeLimits = {
    maxFrames: options.maxFrames,
    decodeMaxDimension: options.decodeMaxDimension,
  };

  return new DecoderFactory()
    .register(new ImageDecoder(limits))
    .register(new VideoDecoder({ ...limits, ...options }));
}
