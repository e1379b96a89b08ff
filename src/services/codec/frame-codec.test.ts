import { describe, expect, it } from 'vitest';
import type { DecodedMedia } from '@t/media-types';
import { AbortedError, ConfigurationError, DecodeError } from '@utils/errors';
import { encodeFrameSequence, fitFrame } from './frame-codec';
import { parseGeometry } from './geometry';

const timing = { defaultFrameDurationMs: 66, stillFrameDurationMs: 1000 };

function solidFrame(width: number, height: number, rgb: [number, number, number]): Buffer {
  const frame = Buffer.alloc(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    frame[i * 3] = rgb[0];
    frame[i * 3 + 1] = rgb[1];
    frame[i * 3 + 2] = rgb[2];
  }
  return frame;
}

function pixel(frame: Buffer, width: number, x: number, y: number): number[] {
  const offset = (y * width + x) * 3;
  return [frame[offset], frame[offset + 1], frame[offset + 2]];
}

describe('fitFrame', () => {
  it('letterboxes a wide frame onto black', async () => {
    const out = await fitFrame(solidFrame(4, 2, [255, 0, 0]), 4, 2, 4, 4);

    expect(out.length).toBe(48);
    expect(pixel(out, 4, 0, 0)).toEqual([0, 0, 0]);
    expect(pixel(out, 4, 1, 1)).toEqual([255, 0, 0]);
    expect(pixel(out, 4, 3, 3)).toEqual([0, 0, 0]);
  });

  it('upscales without cropping', async () => {
    const out = await fitFrame(solidFrame(8, 2, [255, 0, 0]), 8, 2, 16, 16);
    const [red, green] = pixel(out, 16, 8, 7);

    expect(out.length).toBe(16 * 16 * 3);
    expect(red).toBeGreaterThan(240);
    expect(green).toBeLessThan(16);
    expect(out.subarray(0, 16 * 3).every((byte) => byte === 0)).toBe(true);
  });

  it('copies frames already at the target size', async () => {
    const input = solidFrame(2, 2, [1, 2, 3]);
    const out = await fitFrame(input, 2, 2, 2, 2);

    expect(out.equals(input)).toBe(true);
    expect(out).not.toBe(input);
  });

  it('rejects frames of the wrong length', async () => {
    await expect(fitFrame(Buffer.alloc(5), 2, 2, 4, 4)).rejects.toThrow(DecodeError);
  });
});

describe('encodeFrameSequence', () => {
  it('encodes a still as one looping frame', async () => {
    const decoded: DecodedMedia = {
      kind: 'still',
      width: 2,
      height: 2,
      frames: [solidFrame(2, 2, [0, 0, 255])],
      delaysMs: [undefined],
      loop: false,
    };

    const sequence = await encodeFrameSequence(decoded, parseGeometry('4x4'), timing);

    expect(sequence.frames).toHaveLength(1);
    expect(sequence.durationsMs).toEqual([1000]);
    expect(sequence.loop).toBe(true);
    expect(sequence.frames[0].length).toBe(48);
  });

  it('keeps frame count, native delays and loop flag of animations', async () => {
    const decoded: DecodedMedia = {
      kind: 'animated',
      width: 4,
      height: 4,
      frames: [solidFrame(4, 4, [10, 10, 10]), solidFrame(4, 4, [20, 20, 20])],
      delaysMs: [0, 40],
      loop: false,
    };

    const sequence = await encodeFrameSequence(decoded, parseGeometry('4x4'), timing);

    expect(sequence.width).toBe(4);
    expect(sequence.height).toBe(4);
    expect(sequence.frames).toHaveLength(2);
    expect(sequence.durationsMs).toEqual([100, 40]);
    expect(sequence.loop).toBe(false);
  });

  it('rejects an invalid geometry', async () => {
    const decoded: DecodedMedia = {
      kind: 'still',
      width: 1,
      height: 1,
      frames: [Buffer.alloc(3)],
      delaysMs: [undefined],
      loop: true,
    };

    await expect(
      encodeFrameSequence(decoded, { tag: '0x8', width: 0, height: 8 }, timing)
    ).rejects.toThrow(ConfigurationError);
  });

  it('stops when the signal has fired', async () => {
    const decoded: DecodedMedia = {
      kind: 'animated',
      width: 1,
      height: 1,
      frames: [Buffer.alloc(3), Buffer.alloc(3)],
      delaysMs: [50, 50],
      loop: true,
    };
    const controller = new AbortController();
    controller.abort();

    await expect(
      encodeFrameSequence(decoded, parseGeometry('2x2'), { ...timing, signal: controller.signal })
    ).rejects.toThrow(AbortedError);
  });
});
