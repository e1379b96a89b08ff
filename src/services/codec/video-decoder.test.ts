import { describe, expect, it } from 'vitest';
import { DecodeError } from '@utils/errors';
import { FrameSplitter, parseFrameRate, VideoDecoder } from './video-decoder';

describe('parseFrameRate', () => {
  it('parses rationals', () => {
    expect(parseFrameRate('30/1')).toBe(30);
    expect(parseFrameRate('25')).toBe(25);
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
  });

  it('returns null for unknown rates', () => {
    expect(parseFrameRate('0/0')).toBeNull();
    expect(parseFrameRate(undefined)).toBeNull();
  });
});

describe('FrameSplitter', () => {
  it('splits chunks that straddle frame boundaries', () => {
    const splitter = new FrameSplitter(4, 10);

    splitter.push(Buffer.from([1, 1, 1]));
    splitter.push(Buffer.from([1, 2, 2, 2, 2, 3]));

    expect(splitter.frames.map((frame) => [...frame])).toEqual([
      [1, 1, 1, 1],
      [2, 2, 2, 2],
    ]);
    expect(splitter.remainder).toBe(1);
  });

  it('stops at the frame limit', () => {
    const splitter = new FrameSplitter(2, 2);
    splitter.push(Buffer.alloc(10));
    expect(splitter.frames).toHaveLength(2);
  });
});

describe('VideoDecoder', () => {
  it('reports a missing ffprobe executable as a decode error', async () => {
    const decoder = new VideoDecoder({
      ffmpegPath: '/nonexistent/ffmpeg',
      ffprobePath: '/nonexistent/ffprobe',
      videoFps: 15,
      cropDetectSeconds: 5,
      maxFrames: 10,
      decodeMaxDimension: 64,
    });

    await expect(decoder.decode('/nonexistent/clip.mp4', 'video')).rejects.toThrow(DecodeError);
  });

  it('skips crop detection when it is turned off', async () => {
    const decoder = new VideoDecoder({
      ffmpegPath: '/nonexistent/ffmpeg',
      ffprobePath: '/nonexistent/ffprobe',
      videoFps: 15,
      cropDetectSeconds: 0,
      maxFrames: 10,
      decodeMaxDimension: 64,
    });

    const probe = { width: 64, height: 48, frameRate: 25, durationSeconds: 2 };
    expect(await decoder.detectCrop('/nonexistent/clip.mp4', probe)).toBeNull();
  });

  it('reports a missing ffmpeg during crop detection as a decode error', async () => {
    const decoder = new VideoDecoder({
      ffmpegPath: '/nonexistent/ffmpeg',
      ffprobePath: '/nonexistent/ffprobe',
      videoFps: 15,
      cropDetectSeconds: 5,
      maxFrames: 10,
      decodeMaxDimension: 64,
    });

    await expect(
      decoder.detectCrop('/nonexistent/clip.mp4', { width: 64, height: 48, frameRate: 25, durationSeconds: 2 })
    ).rejects.toThrow(DecodeError);
  });
});
