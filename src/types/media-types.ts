/**
 * Media Types
 *
 * Source media, target geometries and the frame sequences the codec produces.
 * Pixel data everywhere in the server is RGB888: one byte per channel, three
 * channels, row-major, top-left origin.
 */

/**
 * Kind of uploaded media
 *
 * - `still`: single-frame image (PNG, JPEG, single-page GIF/WebP)
 * - `animated`: multi-page image (animated GIF/WebP)
 * - `video`: anything decoded through ffmpeg
 */
export type MediaKind = 'still' | 'animated' | 'video';

/**
 * One uploaded file. Immutable once ingested; identified by the SHA-256 of
 * its bytes.
 */
export interface SourceMedia {
  /** Lowercase hex SHA-256 of the file bytes */
  id: string;
  /** Original filename (basename inside the source directory) */
  filename: string;
  /** Absolute path at ingestion time */
  path: string;
  kind: MediaKind;
  /** File size in bytes */
  byteSize: number;
  /** Milliseconds since epoch */
  ingestedAt: number;
}

/**
 * A display resolution the server converts into
 *
 * @example
 * const geometry: TargetGeometry = { tag: '32x32', width: 32, height: 32 };
 */
export interface TargetGeometry {
  /** `<width>x<height>` */
  tag: string;
  width: number;
  height: number;
}

/**
 * Decoder output, before fitting to any geometry
 *
 * Frames are RGB888 at `width` × `height` (the decode size, which may be a
 * pre-scaled version of the source).
 */
export interface DecodedMedia {
  kind: MediaKind;
  width: number;
  height: number;
  frames: Buffer[];
  /** Native per-frame delay, or undefined where the source carries none */
  delaysMs: (number | undefined)[];
  loop: boolean;
}

/**
 * Fixed-size frame sequence for one geometry
 */
export interface FrameSequence {
  width: number;
  height: number;
  /** Each exactly `width * height * 3` bytes */
  frames: Buffer[];
  /** Display duration per frame, same length as `frames` */
  durationsMs: number[];
  loop: boolean;
}

/** Bytes per pixel of the output format */
export const BYTES_PER_PIXEL = 3;

export function frameByteLength(width: number, height: number): number {
  return width * height * BYTES_PER_PIXEL;
}
