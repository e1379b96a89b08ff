import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import fse from 'fs-extra';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DecodeError } from '@utils/errors';
import { ImageDecoder, resolveLoopFlag } from './image-decoder';
import { detectMediaKind, isSupportedMediaFile } from './media-kind';

/** 4x4, a red then a green frame, 100 ms and 200 ms, loops forever */
const RED_GREEN_GIF = fileURLToPath(new URL('./__fixtures__/red-green.gif', import.meta.url));

let dir: string;

beforeEach(async () => {
  dir = await fse.mkdtemp(path.join(os.tmpdir(), 'pixelcast-image-'));
});

afterEach(async () => {
  await fse.remove(dir);
});

const decoder = new ImageDecoder({ maxFrames: 900, decodeMaxDimension: 256 });

describe('ImageDecoder', () => {
  it('decodes a PNG to RGB888', async () => {
    const file = path.join(dir, 'red.png');
    await sharp({ create: { width: 20, height: 10, channels: 3, background: { r: 255, g: 0, b: 0 } } })
      .png()
      .toFile(file);

    const decoded = await decoder.decode(file, 'still');

    expect(decoded.kind).toBe('still');
    expect(decoded.width).toBe(20);
    expect(decoded.height).toBe(10);
    expect(decoded.frames).toHaveLength(1);
    expect(decoded.frames[0].length).toBe(600);
    expect([...decoded.frames[0].subarray(0, 3)]).toEqual([255, 0, 0]);
    expect(decoded.loop).toBe(true);
  });

  it('flattens transparency onto black', async () => {
    const file = path.join(dir, 'clear.png');
    await sharp({
      create: { width: 4, height: 4, channels: 4, background: { r: 255, g: 255, b: 255, alpha: 0 } },
    })
      .png()
      .toFile(file);

    const decoded = await decoder.decode(file, 'still');

    expect(decoded.frames[0].length).toBe(48);
    expect(decoded.frames[0].every((byte) => byte === 0)).toBe(true);
  });

  it('pre-scales large stills to the decode bound', async () => {
    const file = path.join(dir, 'wide.png');
    await sharp({ create: { width: 512, height: 128, channels: 3, background: { r: 0, g: 255, b: 0 } } })
      .png()
      .toFile(file);

    const decoded = await decoder.decode(file, 'still');

    expect(decoded.width).toBe(256);
    expect(decoded.height).toBe(64);
  });

  it('reads every page of an animated GIF with its delays and loop flag', async () => {
    const decoded = await decoder.decode(RED_GREEN_GIF, 'animated');

    expect(decoded).toMatchObject({ kind: 'animated', width: 4, height: 4, delaysMs: [100, 200], loop: true });
    expect(decoded.frames).toHaveLength(2);
    expect([...decoded.frames[0].subarray(0, 3)]).toEqual([255, 0, 0]);
    expect([...decoded.frames[1].subarray(0, 3)]).toEqual([0, 255, 0]);
  });

  it('pre-scales animated images to the decode bound too', async () => {
    const bounded = new ImageDecoder({ maxFrames: 900, decodeMaxDimension: 2 });

    const decoded = await bounded.decode(RED_GREEN_GIF, 'animated');

    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(2);
    expect(decoded.frames.map((frame) => frame.length)).toEqual([12, 12]);
  });

  it('raises DecodeError for corrupt files', async () => {
    const file = path.join(dir, 'broken.gif');
    await fse.writeFile(file, 'definitely not a gif');

    await expect(decoder.decode(file, 'animated')).rejects.toThrow(DecodeError);
  });
});

describe('resolveLoopFlag', () => {
  it('treats 0 as infinite and 1 or missing as play once', () => {
    expect(resolveLoopFlag(0)).toBe(true);
    expect(resolveLoopFlag(3)).toBe(true);
    expect(resolveLoopFlag(1)).toBe(false);
    expect(resolveLoopFlag(undefined)).toBe(false);
  });
});

describe('media kind detection', () => {
  it('filters unsupported, hidden and temp files', () => {
    expect(isSupportedMediaFile('nyan.GIF')).toBe(true);
    expect(isSupportedMediaFile('clip.mp4')).toBe(true);
    expect(isSupportedMediaFile('notes.txt')).toBe(false);
    expect(isSupportedMediaFile('.hidden.gif')).toBe(false);
    expect(isSupportedMediaFile('upload.tmp-1234.gif')).toBe(false);
  });

  it('detects stills, videos and unreadable images', async () => {
    const png = path.join(dir, 'dot.png');
    await sharp({ create: { width: 2, height: 2, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .png()
      .toFile(png);
    const broken = path.join(dir, 'broken.gif');
    await fse.writeFile(broken, 'nope');

    expect(await detectMediaKind(png)).toBe('still');
    expect(await detectMediaKind(path.join(dir, 'clip.mp4'))).toBe('video');
    expect(await detectMediaKind(broken)).toBe('still');
    expect(await detectMediaKind(path.join(dir, 'readme.md'))).toBeNull();
  });
});
