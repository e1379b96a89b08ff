/**
 * Stream Protocol
 *
 * Wire format between the stream server and display clients.
 *
 * Client → server: a single text line
 *   `STREAM:<w>:<h>:<from>-<to>[:<selector>]\n`
 * where either range bound may be empty and the selector (source id or name)
 * is optional.
 *
 * Server → client: framed messages, `u8 type` + `u32 BE payload length` + payload.
 *
 * | Type | Name      | Payload                                              |
 * |------|-----------|------------------------------------------------------|
 * | 0x01 | INFO      | UTF-8 `<w>:<h>:<from>-<to>:<name>:<frameCount>`      |
 * | 0x02 | FRAME     | u32 BE duration (ms) + `w*h*3` RGB888 bytes          |
 * | 0x03 | NOT_READY | UTF-8 reason; the artifact is being produced         |
 * | 0x04 | ERROR     | UTF-8 message; the server closes afterwards          |
 */

import path from 'node:path';
import type { StreamRequest } from '@t/stream-types';
import { StreamIOError } from '@utils/errors';

export const MessageType = {
  INFO: 0x01,
  FRAME: 0x02,
  NOT_READY: 0x03,
  ERROR: 0x04,
} as const;

export type MessageTypeCode = (typeof MessageType)[keyof typeof MessageType];

/** `u8 type` + `u32 length` */
export const MESSAGE_HEADER_BYTES = 5;

/** `u32 durationMs` at the start of a FRAME payload */
export const FRAME_DURATION_BYTES = 4;

export type HandshakeResult = { ok: true; request: StreamRequest } | { ok: false; reason: string };

const DIGITS = /^\d+$/;

function parseBound(raw: string): number | null {
  const trimmed = raw.trim();
  return DIGITS.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Parse a handshake line. Malformed range bounds fall back to the defaults
 * (from 0, to the end); a malformed verb or geometry rejects the line.
 *
 * @example
 * parseHandshake('STREAM:32:32:5-:nyan');
 * // { ok: true, request: { width: 32, height: 32, frameFrom: 5, frameTo: null, selector: 'nyan' } }
 * parseHandshake('HELLO'); // { ok: false, reason: 'Invalid command' }
 */
export function parseHandshake(line: string): HandshakeResult {
  const parts = line.trim().split(':');
  if (parts.length < 4 || parts[0] !== 'STREAM') {
    return { ok: false, reason: 'Invalid command' };
  }

  const width = parseBound(parts[1]);
  const height = parseBound(parts[2]);
  if (width === null || height === null || width === 0 || height === 0) {
    return { ok: false, reason: 'Invalid command' };
  }

  let frameFrom = 0;
  let frameTo: number | null = null;
  const range = parts[3];
  const dash = range.indexOf('-');
  if (dash >= 0) {
    frameFrom = parseBound(range.slice(0, dash)) ?? 0;
    frameTo = parseBound(range.slice(dash + 1));
  } else {
    frameFrom = parseBound(range) ?? 0;
  }

  const selector = parts.slice(4).join(':').trim();
  return {
    ok: true,
    request: {
      width,
      height,
      frameFrom,
      frameTo,
      selector: selector === '' ? null : selector,
    },
  };
}

/**
 * Clamp a requested range to an item of `frameCount` frames.
 *
 * - `to` missing or past the end becomes the last frame
 * - `from` out of range becomes 0
 * - `to` before `from` becomes the last frame
 *
 * @example
 * clampRange(5, null, 10); // { from: 5, to: 9 }
 * clampRange(12, 3, 10); // { from: 0, to: 3 }
 * clampRange(6, 2, 10); // { from: 6, to: 9 }
 */
export function clampRange(
  frameFrom: number,
  frameTo: number | null,
  frameCount: number
): { from: number; to: number } {
  const last = Math.max(0, frameCount - 1);
  let to = frameTo === null || frameTo > last ? last : frameTo;
  const from = frameFrom < 0 || frameFrom > last ? 0 : frameFrom;
  if (to < from) {
    to = last;
  }
  return { from, to };
}

/**
 * Name announced in INFO: the filename without extension, with the field
 * separator replaced.
 */
export function displayName(filename: string): string {
  return path.parse(filename).name.replace(/[:\r\n]/g, '_');
}

export function encodeMessage(type: MessageTypeCode, payload: Uint8Array): Buffer {
  const header = Buffer.alloc(MESSAGE_HEADER_BYTES);
  header.writeUInt8(type, 0);
  header.writeUInt32BE(payload.length, 1);
  return Buffer.concat([header, payload]);
}

export interface InfoMessage {
  width: number;
  height: number;
  from: number;
  to: number;
  name: string;
  frameCount: number;
}

export function encodeInfo(info: InfoMessage): Buffer {
  const text = `${info.width}:${info.height}:${info.from}-${info.to}:${info.name}:${info.frameCount}`;
  return encodeMessage(MessageType.INFO, Buffer.from(text, 'utf8'));
}

export function encodeFrame(durationMs: number, pixels: Uint8Array): Buffer {
  const header = Buffer.alloc(MESSAGE_HEADER_BYTES + FRAME_DURATION_BYTES);
  header.writeUInt8(MessageType.FRAME, 0);
  header.writeUInt32BE(FRAME_DURATION_BYTES + pixels.length, 1);
  header.writeUInt32BE(Math.max(0, Math.round(durationMs)), MESSAGE_HEADER_BYTES);
  return Buffer.concat([header, pixels]);
}

export function encodeNotReady(reason: string): Buffer {
  return encodeMessage(MessageType.NOT_READY, Buffer.from(reason, 'utf8'));
}

export function encodeError(message: string): Buffer {
  return encodeMessage(MessageType.ERROR, Buffer.from(message, 'utf8'));
}

/**
 * A decoded server message
 */
export type StreamMessage =
  | { type: 'info'; info: InfoMessage }
  | { type: 'frame'; durationMs: number; pixels: Buffer }
  | { type: 'not-ready'; reason: string }
  | { type: 'error'; message: string };

export function parseInfo(text: string): InfoMessage | null {
  const match = /^(\d+):(\d+):(\d+)-(\d+):(.*):(\d+)$/.exec(text);
  if (!match) {
    return null;
  }
  return {
    width: Number(match[1]),
    height: Number(match[2]),
    from: Number(match[3]),
    to: Number(match[4]),
    name: match[5],
    frameCount: Number(match[6]),
  };
}

/**
 * Incremental decoder for the server → client direction. Feed it socket
 * chunks; it returns every message completed so far.
 *
 * @example
 * const reader = new MessageReader();
 * socket.on('data', (chunk) => {
 *   for (const message of reader.push(chunk)) handle(message);
 * });
 */
export class MessageReader {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): StreamMessage[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const messages: StreamMessage[] = [];

    while (this.buffer.length >= MESSAGE_HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(1);
      const end = MESSAGE_HEADER_BYTES + length;
      if (this.buffer.length < end) break;

      const type = this.buffer.readUInt8(0);
      const payload = this.buffer.subarray(MESSAGE_HEADER_BYTES, end);
      this.buffer = this.buffer.subarray(end);
      messages.push(decodePayload(type, payload));
    }

    return messages;
  }

  /** Bytes received but not yet forming a whole message */
  get pending(): number {
    return this.buffer.length;
  }
}

function decodePayload(type: number, payload: Buffer): StreamMessage {
  switch (type) {
    case MessageType.INFO: {
      const info = parseInfo(payload.toString('utf8'));
      if (!info) {
        throw new StreamIOError(`Malformed INFO payload: ${payload.toString('utf8')}`);
      }
      return { type: 'info', info };
    }
    case MessageType.FRAME:
      return {
        type: 'frame',
        durationMs: payload.readUInt32BE(0),
        pixels: Buffer.from(payload.subarray(FRAME_DURATION_BYTES)),
      };
    case MessageType.NOT_READY:
      return { type: 'not-ready', reason: payload.toString('utf8') };
    case MessageType.ERROR:
      return { type: 'error', message: payload.toString('utf8') };
    default:
      throw new StreamIOError(`Unknown message type 0x${type.toString(16)}`);
  }
}
