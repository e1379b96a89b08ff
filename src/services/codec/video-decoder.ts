import path from 'node:path';
import { z } from 'zod';
import { buildCropDetectArgs, buildProbeArgs, buildRawDecodeArgs } from '@services/ffmpeg/args';
import {
  acceptCrop,
  buildDecodeFilter,
  CROPDETECT_FILTER,
  type CropArea,
  fitWithin,
  parseCropDetect,
} from '@services/ffmpeg/filters';
import { runProcess } from '@services/ffmpeg/process-runner';
import { fpsToFrameDurationMs } from '@services/shared/frame-timing';
import type { DecodedMedia, MediaKind } from '@t/media-types';
import { FFMPEG_DECODE_TIMEOUT_MS, FFPROBE_TIMEOUT_MS } from '@utils/constants';
import { AbortedError, DecodeError, formatError } from '@utils/errors';
import { logger } from '@utils/logger';
import { throwIfAborted } from '@utils/with-timeout';
import type { DecodeLimits, MediaDecoder } from './decoder-interface';

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
        avg_frame_rate: z.string().optional(),
        r_frame_rate: z.string().optional(),
      })
    )
    .min(1, 'no video stream'),
  format: z.object({ duration: z.string().optional() }).optional(),
});

export interface VideoProbe {
  width: number;
  height: number;
  /** null when the container reports none */
  frameRate: number | null;
  durationSeconds: number | null;
}

export interface VideoDecoderOptions extends DecodeLimits {
  ffmpegPath: string;
  ffprobePath: string;
  /** Sampling rate; lower source rates are kept as they are */
  videoFps: number;
  /** Seconds scanned for black borders before decoding; 0 skips the pass */
  cropDetectSeconds: number;
}

/**
 * Parse an ffprobe rational such as `30000/1001`.
 *
 * @example
 * parseFrameRate('30000/1001'); // 29.97002997002997
 * parseFrameRate('0/0'); // null
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const [numerator, denominator = '1'] = value.split('/');
  const rate = Number(numerator) / Number(denominator);
  return Number.isFinite(rate) && rate > 0 ? rate : null;
}

/**
 * Splits a raw rgb24 byte stream into fixed-size frames.
 * Stops collecting after `maxFrames`.
 */
export class FrameSplitter {
  private pending: Buffer = Buffer.alloc(0);
  readonly frames: Buffer[] = [];

  constructor(
    private readonly frameBytes: number,
    private readonly maxFrames: number
  ) {}

  push(chunk: Buffer): void {
    if (this.frames.length >= this.maxFrames) {
      return;
    }

    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    while (this.pending.length >= this.frameBytes && this.frames.length < this.maxFrames) {
      this.frames.push(Buffer.from(this.pending.subarray(0, this.frameBytes)));
      this.pending = this.pending.subarray(this.frameBytes);
    }
  }

  /** Bytes left over that did not make a whole frame */
  get remainder(): number {
    return this.pending.length;
  }
}

/**
 * Video decoder driving the ffprobe and ffmpeg executables
 *
 * Probes the first video stream, looks for black borders with cropdetect,
 * then decodes it to packed RGB24 on stdout at `min(videoFps, source rate)`,
 * cropped and pre-scaled so the long side is at most `decodeMaxDimension`.
 * Videos always loop.
 */
export class VideoDecoder implements MediaDecoder {
  readonly name = 'ffmpeg-video';
  readonly kinds: readonly MediaKind[] = ['video'];

  constructor(private readonly options: VideoDecoderOptions) {}

  async probe(filePath: string, signal?: AbortSignal): Promise<VideoProbe> {
    const label = path.basename(filePath);
    const result = await this.run(
      this.options.ffprobePath,
      buildProbeArgs(filePath),
      FFPROBE_TIMEOUT_MS,
      signal
    );

    if (result.code !== 0) {
      throw new DecodeError(`ffprobe failed for ${label}: ${result.stderr || `exit ${result.code}`}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout.toString('utf8'));
    } catch (error) {
      throw new DecodeError(formatError(error, `ffprobe returned invalid JSON for ${label}`));
    }

    const parsed = probeSchema.safeParse(json);
    if (!parsed.success) {
      throw new DecodeError(
        `No decodable video stream in ${label}: ${parsed.error.issues.map((i) => i.message).join(', ')}`
      );
    }

    const [stream] = parsed.data.streams;
    const duration = Number(parsed.data.format?.duration);
    return {
      width: stream.width,
      height: stream.height,
      frameRate: parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate),
      durationSeconds: Number.isFinite(duration) && duration > 0 ? duration : null,
    };
  }

  /**
   * Visible area of the video when it has black borders worth removing.
   * A failed or inconclusive pass keeps the full frame.
   */
  async detectCrop(filePath: string, probe: VideoProbe, signal?: AbortSignal): Promise<CropArea | null> {
    if (this.options.cropDetectSeconds <= 0) {
      return null;
    }

    const label = path.basename(filePath);
    const result = await this.run(
      this.options.ffmpegPath,
      buildCropDetectArgs(filePath, CROPDETECT_FILTER, this.options.cropDetectSeconds),
      FFMPEG_DECODE_TIMEOUT_MS,
      signal
    );
    if (result.code !== 0) {
      logger.warn('ffmpeg', 'Crop detection failed; keeping full frame', {
        file: label,
        exitCode: result.code,
      });
      return null;
    }

    const detected = parseCropDetect(result.stderr);
    const crop = acceptCrop(detected, probe.width, probe.height);
    logger.debug('ffmpeg', crop ? 'Cropping black borders' : 'No crop applied', {
      file: label,
      detected: detected ? `${detected.width}x${detected.height}+${detected.x}+${detected.y}` : null,
    });
    return crop;
  }

  async decode(filePath: string, _kind: MediaKind, signal?: AbortSignal): Promise<DecodedMedia> {
    throwIfAborted(signal, 'Video decode');
    const label = path.basename(filePath);
    const probe = await this.probe(filePath, signal);
    const crop = await this.detectCrop(filePath, probe, signal);

    const fps = Math.min(this.options.videoFps, probe.frameRate ?? this.options.videoFps);
    const size = fitWithin(
      crop?.width ?? probe.width,
      crop?.height ?? probe.height,
      this.options.decodeMaxDimension
    );
    const filter = buildDecodeFilter(fps, probe.width, probe.height, this.options.decodeMaxDimension, crop);
    const splitter = new FrameSplitter(size.width * size.height * 3, this.options.maxFrames);

    logger.info('ffmpeg', 'Decoding video', {
      file: label,
      source: `${probe.width}x${probe.height}`,
      crop: crop ? `${crop.width}x${crop.height}+${crop.x}+${crop.y}` : null,
      decode: `${size.width}x${size.height}`,
      fps,
      durationSeconds: probe.durationSeconds,
    });

    const result = await this.run(
      this.options.ffmpegPath,
      buildRawDecodeArgs(filePath, filter, this.options.maxFrames),
      FFMPEG_DECODE_TIMEOUT_MS,
      signal,
      (chunk) => splitter.push(chunk)
    );

    if (result.code !== 0) {
      throw new DecodeError(`ffmpeg failed for ${label}: ${result.stderr || `exit ${result.code}`}`);
    }
    if (splitter.frames.length === 0) {
      throw new DecodeError(`ffmpeg produced no frames for ${label}`);
    }
    if (splitter.remainder > 0) {
      logger.warn('ffmpeg', 'Discarding partial trailing frame', {
        file: label,
        bytes: splitter.remainder,
      });
    }

    const durationMs = fpsToFrameDurationMs(fps);
    return {
      kind: 'video',
      width: size.width,
      height: size.height,
      frames: splitter.frames,
      delaysMs: splitter.frames.map(() => durationMs),
      loop: true,
    };
  }

  private async run(
    command: string,
    args: string[],
    timeoutMs: number,
    signal: AbortSignal | undefined,
    onStdout?: (chunk: Buffer) => void
  ) {
    try {
      return await runProcess(command, args, { timeoutMs, signal, onStdout });
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      throw new DecodeError(formatError(error, `Cannot run ${path.basename(command)}`), {
        cause: error,
      });
    }
  }
}
