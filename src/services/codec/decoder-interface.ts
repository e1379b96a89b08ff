/**
 * Decoder Interface
 *
 * Decoders turn a source file into RGB888 frames at a decode size chosen by
 * the decoder (the source size, or a pre-scaled version of it). Fitting to a
 * target geometry happens afterwards in `frame-codec.ts`, once per geometry.
 *
 * Decoders are registered in `decoder-factory.ts` and selected by media kind.
 */

import type { DecodedMedia, MediaKind } from '@t/media-types';

/**
 * Common decoder contract
 *
 * Implementations throw `DecodeError` for unreadable or corrupt sources and
 * `AbortedError` when the signal fires.
 */
export interface MediaDecoder {
  /** Unique name, used in logs */
  readonly name: string;

  /** Media kinds this decoder handles */
  readonly kinds: readonly MediaKind[];

  decode(path: string, kind: MediaKind, signal?: AbortSignal): Promise<DecodedMedia>;
}

/**
 * Limits applied while decoding
 */
export interface DecodeLimits {
  /** Frames kept at most; later frames are dropped */
  maxFrames: number;
  /** Long side of the decode size */
  decodeMaxDimension: number;
}
