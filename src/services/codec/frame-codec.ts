/**
 * Frame Codec
 *
 * Fits decoded frames into a target geometry: uniform scale with Lanczos,
 * centred on black (letterbox or pillarbox, never crop), RGB888 out.
 */

import sharp from 'sharp';
import { resolveFrameDurations, type FrameTimingOptions } from '@services/shared/frame-timing';
import type { DecodedMedia, FrameSequence, TargetGeometry } from '@t/media-types';
import { BYTES_PER_PIXEL, frameByteLength } from '@t/media-types';
import { DecodeError, formatError } from '@utils/errors';
import { throwIfAborted } from '@utils/with-timeout';
import { createGeometry } from './geometry';

export interface EncodeOptions extends FrameTimingOptions {
  signal?: AbortSignal;
}

/**
 * Fit one RGB888 frame into `width` × `height`.
 *
 * Frames already at the target size are copied through untouched.
 */
export async function fitFrame(
  frame: Buffer,
  sourceWidth: number,
  sourceHeight: number,
  width: number,
  height: number
): Promise<Buffer> {
  const expected = frameByteLength(sourceWidth, sourceHeight);
  if (frame.length !== expected) {
    throw new DecodeError(
      `Frame holds ${frame.length} bytes, expected ${expected} for ${sourceWidth}x${sourceHeight}`
    );
  }

  if (sourceWidth === width && sourceHeight === height) {
    return Buffer.from(frame);
  }

  const output = await sharp(frame, {
    raw: { width: sourceWidth, height: sourceHeight, channels: BYTES_PER_PIXEL },
  })
    .resize(width, height, {
      fit: 'contain',
      background: { r: 0, g: 0, b: 0 },
      kernel: 'lanczos3',
    })
    .removeAlpha()
    .raw()
    .toBuffer();

  if (output.length !== frameByteLength(width, height)) {
    throw new DecodeError(`Fitted frame has ${output.length} bytes for ${width}x${height}`);
  }
  return output;
}

/**
 * Encode decoded media into a fixed-size sequence for one geometry.
 *
 * Still images yield exactly one frame that loops with the still duration.
 * Other media keep their frame count; durations come from the native delays
 * or the default (see `resolveFrameDurations`).
 *
 * @throws ConfigurationError for an invalid geometry
 * @throws DecodeError when a frame cannot be resampled
 * @throws AbortedError when the signal fires between frames
 *
 * @example
 * const sequence = await encodeFrameSequence(decoded, parseGeometry('32x32'), {
 *   defaultFrameDurationMs: 66,
 *   stillFrameDurationMs: 1000,
 * });
 * sequence.frames[0].length; // 3072
 */
export async function encodeFrameSequence(
  decoded: DecodedMedia,
  geometry: TargetGeometry,
  options: EncodeOptions
): Promise<FrameSequence> {
  const { width, height } = createGeometry(geometry.width, geometry.height);

  if (decoded.frames.length === 0) {
    throw new DecodeError('Decoded media contains no frames');
  }

  const isStill = decoded.kind === 'still';
  const sourceFrames = isStill ? decoded.frames.slice(0, 1) : decoded.frames;
  const frames: Buffer[] = [];

  for (const frame of sourceFrames) {
    throwIfAborted(options.signal, `Encoding ${geometry.tag}`);
    try {
      frames.push(await fitFrame(frame, decoded.width, decoded.height, width, height));
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError(formatError(error, `Resampling to ${geometry.tag} failed`), {
        cause: error,
      });
    }
  }

  return {
    width,
    height,
    frames,
    durationsMs: resolveFrameDurations(decoded.kind, frames.length, decoded.delaysMs, options),
    loop: isStill ? true : decoded.loop,
  };
}
