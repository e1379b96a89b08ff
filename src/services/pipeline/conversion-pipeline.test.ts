import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheStore } from '@services/cache/cache-store';
import { DecoderFactory } from '@services/codec/decoder-factory';
import type { MediaDecoder } from '@services/codec/decoder-interface';
import { parseGeometryList } from '@services/codec/geometry';
import { ImageDecoder } from '@services/codec/image-decoder';
import type { CacheCapacity } from '@t/cache-types';
import type { DecodedMedia, MediaKind, SourceMedia } from '@t/media-types';
import { DecodeError } from '@utils/errors';
import { ConversionPipeline } from './conversion-pipeline';

const VERSION = 'test-v1';

class FakeDecoder implements MediaDecoder {
  readonly name = 'fake';
  readonly kinds: readonly MediaKind[] = ['still', 'animated', 'video'];
  calls = 0;

  constructor(private readonly result: DecodedMedia | Error) {}

  async decode(): Promise<DecodedMedia> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

function animation(frameCount: number): DecodedMedia {
  return {
    kind: 'animated',
    width: 8,
    height: 8,
    frames: Array.from({ length: frameCount }, (_, i) => Buffer.alloc(8 * 8 * 3, i * 20)),
    delaysMs: Array.from({ length: frameCount }, () => 40),
    loop: true,
  };
}

const source: SourceMedia = {
  id: 'f'.repeat(64),
  filename: 'spinner.gif',
  path: '/media/spinner.gif',
  kind: 'animated',
  byteSize: 4096,
  ingestedAt: 1_000,
};

let dir: string;
let store: CacheStore;

async function setup(
  decoder: MediaDecoder,
  capacity: CacheCapacity = { maxArtifacts: 10, maxBytes: null },
  media: SourceMedia = source
) {
  store = await CacheStore.open({
    root: path.join(dir, 'cache'),
    dbPath: path.join(dir, 'meta.sqlite3'),
    capacity,
    encoderVersion: VERSION,
  });
  await store.registerSource(media);

  return new ConversionPipeline({
    store,
    decoders: new DecoderFactory().register(decoder),
    encoderVersion: VERSION,
    concurrency: 2,
    defaultFrameDurationMs: 66,
    stillFrameDurationMs: 1000,
  });
}

beforeEach(async () => {
  dir = await fse.mkdtemp(path.join(os.tmpdir(), 'pixelcast-pipeline-'));
});

afterEach(async () => {
  await store.close();
  await fse.remove(dir);
});

describe('ConversionPipeline', () => {
  it('decodes once and stores one artifact per geometry', async () => {
    const decoder = new FakeDecoder(animation(10));
    const pipeline = await setup(decoder);

    const outcomes = await pipeline.convert(source, parseGeometryList('16x16,32x32'));

    expect(decoder.calls).toBe(1);
    expect(outcomes).toEqual([
      { geometry: '16x16', ok: true, frameCount: 10, byteSize: 14 + 40 + 10 * 768, unchanged: false },
      { geometry: '32x32', ok: true, frameCount: 10, byteSize: 14 + 40 + 10 * 3072, unchanged: false },
    ]);

    const lookup = await store.get(source.id, '32x32');
    expect(lookup.status).toBe('hit');
    if (lookup.status !== 'hit') return;
    expect(lookup.artifact.sequence.frames).toHaveLength(10);
    expect(lookup.artifact.sequence.frames.every((frame) => frame.length === 32 * 32 * 3)).toBe(true);
    expect(lookup.artifact.sequence.durationsMs).toEqual(Array(10).fill(40));
  });

  it('converts a real animated GIF into every geometry', async () => {
    const gif: SourceMedia = {
      ...source,
      filename: 'red-green.gif',
      path: fileURLToPath(new URL('../codec/__fixtures__/red-green.gif', import.meta.url)),
    };
    const decoder = new ImageDecoder({ maxFrames: 900, decodeMaxDimension: 256 });
    const pipeline = await setup(decoder, undefined, gif);

    const outcomes = await pipeline.convert(gif, parseGeometryList('2x2,8x4'));
    expect(outcomes.map((outcome) => [outcome.geometry, outcome.ok, outcome.frameCount])).toEqual([
      ['2x2', true, 2],
      ['8x4', true, 2],
    ]);

    for (const [geometry, width, height] of [['2x2', 2, 2], ['8x4', 8, 4]] as const) {
      const lookup = await store.get(gif.id, geometry);
      expect(lookup.status).toBe('hit');
      if (lookup.status !== 'hit') continue;
      const { sequence } = lookup.artifact;
      expect(sequence).toMatchObject({ width, height, durationsMs: [100, 200], loop: true });
      expect(sequence.frames.map((frame) => frame.length)).toEqual([width * height * 3, width * height * 3]);
    }

    const small = await store.get(gif.id, '2x2');
    if (small.status !== 'hit') return;
    expect([...small.artifact.sequence.frames[0].subarray(0, 3)]).toEqual([255, 0, 0]);
    expect([...small.artifact.sequence.frames[1].subarray(0, 3)]).toEqual([0, 255, 0]);
  });

  it('reports existing artifacts as unchanged on a second run', async () => {
    const pipeline = await setup(new FakeDecoder(animation(2)));

    await pipeline.convert(source, parseGeometryList('16x16'));
    const [outcome] = await pipeline.convert(source, parseGeometryList('16x16'));

    expect(outcome.ok).toBe(true);
    expect(outcome.unchanged).toBe(true);
  });

  it('fails every geometry with the decode reason', async () => {
    const pipeline = await setup(new FakeDecoder(new DecodeError('bad header')));

    const outcomes = await pipeline.convert(source, parseGeometryList('16x16,32x32'));

    expect(outcomes).toEqual([
      { geometry: '16x16', ok: false, reason: 'DecodeError: bad header', errorType: 'decode' },
      { geometry: '32x32', ok: false, reason: 'DecodeError: bad header', errorType: 'decode' },
    ]);
    expect(await store.listArtifacts()).toEqual([]);
  });

  it('isolates a geometry that does not fit the cache', async () => {
    const pipeline = await setup(new FakeDecoder(animation(10)), { maxArtifacts: 10, maxBytes: 10_000 });

    const [small, large] = await pipeline.convert(source, parseGeometryList('16x16,32x32'));

    expect(small.ok).toBe(true);
    expect(large.ok).toBe(false);
    expect(large.errorType).toBe('capacity');
    expect((await store.listArtifacts()).map((a) => a.geometry)).toEqual(['16x16']);
  });

  it('stores nothing once aborted', async () => {
    const pipeline = await setup(new FakeDecoder(animation(3)));
    const controller = new AbortController();
    controller.abort();

    const outcomes = await pipeline.convert(source, parseGeometryList('16x16'), controller.signal);

    expect(outcomes).toEqual([
      { geometry: '16x16', ok: false, reason: 'AbortedError: Conversion aborted', errorType: 'aborted' },
    ]);
    expect(await store.listArtifacts()).toEqual([]);
  });
});
