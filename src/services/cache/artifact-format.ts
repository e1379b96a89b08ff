/**
 * Artifact container
 *
 * Layout (all integers big-endian):
 *
 * | offset | size | field                         |
 * |--------|------|-------------------------------|
 * | 0      | 4    | magic `PXFA`                  |
 * | 4      | 1    | format version                |
 * | 5      | 1    | flags (bit 0: loop)           |
 * | 6      | 2    | width                         |
 * | 8      | 2    | height                        |
 * | 10     | 4    | frame count n                 |
 * | 14     | 4n   | frame durations (ms)          |
 * | 14+4n  | …    | n frames of width*height*3 B  |
 */

import type { FrameSequence } from '@t/media-types';
import { frameByteLength } from '@t/media-types';
import { ARTIFACT_FORMAT_VERSION, ARTIFACT_MAGIC } from '@utils/constants';
import { StorageError } from '@utils/errors';

const FIXED_HEADER_BYTES = 14;
const LOOP_FLAG = 0x01;

export function artifactByteSize(sequence: FrameSequence): number {
  const frameCount = sequence.frames.length;
  return (
    FIXED_HEADER_BYTES +
    frameCount * 4 +
    frameCount * frameByteLength(sequence.width, sequence.height)
  );
}

/**
 * Serialize a frame sequence into the container.
 *
 * @throws StorageError when the sequence is internally inconsistent
 */
export function serializeArtifact(sequence: FrameSequence): Buffer {
  const { width, height, frames, durationsMs } = sequence;
  const frameBytes = frameByteLength(width, height);

  if (frames.length === 0) {
    throw new StorageError('Cannot serialize an empty frame sequence');
  }
  if (durationsMs.length !== frames.length) {
    throw new StorageError(
      `Duration count ${durationsMs.length} does not match frame count ${frames.length}`
    );
  }

  const buffer = Buffer.alloc(artifactByteSize(sequence));
  buffer.write(ARTIFACT_MAGIC, 0, 'ascii');
  buffer.writeUInt8(ARTIFACT_FORMAT_VERSION, 4);
  buffer.writeUInt8(sequence.loop ? LOOP_FLAG : 0, 5);
  buffer.writeUInt16BE(width, 6);
  buffer.writeUInt16BE(height, 8);
  buffer.writeUInt32BE(frames.length, 10);

  let offset = FIXED_HEADER_BYTES;
  for (const duration of durationsMs) {
    buffer.writeUInt32BE(Math.max(1, Math.round(duration)), offset);
    offset += 4;
  }

  frames.forEach((frame, index) => {
    if (frame.length !== frameBytes) {
      throw new StorageError(`Frame ${index} has ${frame.length} bytes, expected ${frameBytes}`);
    }
    frame.copy(buffer, offset);
    offset += frameBytes;
  });

  return buffer;
}

/**
 * Parse a container back into a frame sequence. Frames are views into `buffer`.
 *
 * @throws StorageError for a wrong magic, version or length
 */
export function deserializeArtifact(buffer: Buffer): FrameSequence {
  if (buffer.length < FIXED_HEADER_BYTES || buffer.toString('ascii', 0, 4) !== ARTIFACT_MAGIC) {
    throw new StorageError('Not an artifact file');
  }

  const version = buffer.readUInt8(4);
  if (version !== ARTIFACT_FORMAT_VERSION) {
    throw new StorageError(`Unsupported artifact format version ${version}`);
  }

  const loop = (buffer.readUInt8(5) & LOOP_FLAG) !== 0;
  const width = buffer.readUInt16BE(6);
  const height = buffer.readUInt16BE(8);
  const frameCount = buffer.readUInt32BE(10);
  const frameBytes = frameByteLength(width, height);
  const expected = FIXED_HEADER_BYTES + frameCount * 4 + frameCount * frameBytes;

  if (frameCount === 0 || buffer.length !== expected) {
    throw new StorageError(`Artifact is ${buffer.length} bytes, header describes ${expected}`);
  }

  const durationsMs: number[] = [];
  let offset = FIXED_HEADER_BYTES;
  for (let i = 0; i < frameCount; i++) {
    durationsMs.push(buffer.readUInt32BE(offset));
    offset += 4;
  }

  const frames: Buffer[] = [];
  for (let i = 0; i < frameCount; i++) {
    frames.push(buffer.subarray(offset, offset + frameBytes));
    offset += frameBytes;
  }

  return { width, height, frames, durationsMs, loop };
}
