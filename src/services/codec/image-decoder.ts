import path from 'node:path';
import sharp from 'sharp';
import type { DecodedMedia, MediaKind } from '@t/media-types';
import { DecodeError, formatError } from '@utils/errors';
import { logger } from '@utils/logger';
import { throwIfAborted } from '@utils/with-timeout';
import type { DecodeLimits, MediaDecoder } from './decoder-interface';

const BLACK = { r: 0, g: 0, b: 0 };

/**
 * Map a sharp loop count onto a loop flag.
 *
 * 0 means "forever", 1 means "play once" and a missing count (no
 * application extension in the GIF) also plays once.
 */
export function resolveLoopFlag(loopCount: number | undefined): boolean {
  if (loopCount === undefined) {
    return false;
  }
  return loopCount !== 1;
}

/**
 * Still and animated image decoder backed by sharp (libvips)
 *
 * Multi-page images are read as one tall strip and split by page height.
 * Alpha is flattened onto black and every colour space is converted to
 * sRGB, so greyscale and CMYK sources come out as RGB888 too.
 *
 * Every page is pre-scaled to fit `decodeMaxDimension`; animated images are
 * also limited to `maxFrames` pages.
 */
export class ImageDecoder implements MediaDecoder {
  readonly name = 'sharp-image';
  readonly kinds: readonly MediaKind[] = ['still', 'animated'];

  constructor(private readonly limits: DecodeLimits) {}

  async decode(filePath: string, kind: MediaKind, signal?: AbortSignal): Promise<DecodedMedia> {
    throwIfAborted(signal, 'Image decode');
    const label = path.basename(filePath);

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(filePath).metadata();
    } catch (error) {
      throw new DecodeError(formatError(error, `Cannot read image ${label}`), { cause: error });
    }

    const totalPages = metadata.pages ?? 1;
    const pages = kind === 'still' ? 1 : Math.max(1, Math.min(totalPages, this.limits.maxFrames));

    if (totalPages > pages && kind !== 'still') {
      logger.warn('codec', 'Animation truncated to frame limit', {
        file: label,
        totalPages,
        kept: pages,
      });
    }

    const pipeline = sharp(filePath, { pages }).resize({
      width: this.limits.decodeMaxDimension,
      height: this.limits.decodeMaxDimension,
      fit: 'inside',
      withoutEnlargement: true,
      kernel: 'lanczos3',
    });

    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      decoded = await pipeline
        .flatten({ background: BLACK })
        .toColourspace('srgb')
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new DecodeError(formatError(error, `Cannot decode image ${label}`), { cause: error });
    }
    throwIfAborted(signal, 'Image decode');

    const { data, info } = decoded;
    if (info.channels !== 3) {
      throw new DecodeError(`Unexpected channel count ${info.channels} decoding ${label}`);
    }
    if (info.height % pages !== 0) {
      throw new DecodeError(`Image strip height ${info.height} is not a multiple of ${pages} pages`);
    }

    const frameHeight = info.height / pages;
    const frameBytes = info.width * frameHeight * 3;
    const frames: Buffer[] = [];
    for (let page = 0; page < pages; page++) {
      frames.push(data.subarray(page * frameBytes, (page + 1) * frameBytes));
    }

    if (frames.length === 0 || frameBytes === 0) {
      throw new DecodeError(`No frames decoded from ${label}`);
    }

    const delays = metadata.delay ?? [];
    const isAnimated = pages > 1;

    logger.debug('codec', 'Image decoded', {
      file: label,
      width: info.width,
      height: frameHeight,
      frames: frames.length,
    });

    return {
      kind: isAnimated ? 'animated' : 'still',
      width: info.width,
      height: frameHeight,
      frames,
      delaysMs: frames.map((_, index) => (isAnimated ? delays[index] : undefined)),
      loop: isAnimated ? resolveLoopFlag(metadata.loop) : true,
    };
  }
}
