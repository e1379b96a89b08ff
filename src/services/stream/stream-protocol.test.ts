import { describe, expect, it } from 'vitest';
import {
  clampRange,
  displayName,
  encodeError,
  encodeFrame,
  encodeInfo,
  encodeNotReady,
  MessageReader,
  parseHandshake,
  type StreamMessage,
} from './stream-protocol';

describe('parseHandshake', () => {
  it('parses geometry, range and selector', () => {
    expect(parseHandshake('STREAM:32:32:5-20:nyan\n')).toEqual({
      ok: true,
      request: { width: 32, height: 32, frameFrom: 5, frameTo: 20, selector: 'nyan' },
    });
  });

  it('accepts empty range bounds and a missing selector', () => {
    expect(parseHandshake('STREAM:53:11:-')).toEqual({
      ok: true,
      request: { width: 53, height: 11, frameFrom: 0, frameTo: null, selector: null },
    });
    expect(parseHandshake('STREAM:16:16:3-:')).toEqual({
      ok: true,
      request: { width: 16, height: 16, frameFrom: 3, frameTo: null, selector: null },
    });
  });

  it('treats a bare number as the start frame and garbage bounds as defaults', () => {
    expect(parseHandshake('STREAM:16:16:7')).toMatchObject({ request: { frameFrom: 7, frameTo: null } });
    expect(parseHandshake('STREAM:16:16:x-y')).toMatchObject({ request: { frameFrom: 0, frameTo: null } });
  });

  it('keeps colons inside the selector', () => {
    expect(parseHandshake('STREAM:16:16:-:a:b')).toMatchObject({ request: { selector: 'a:b' } });
  });

  it('rejects other verbs, short lines and bad geometry', () => {
    const invalid = { ok: false, reason: 'Invalid command' };
    expect(parseHandshake('HELLO')).toEqual(invalid);
    expect(parseHandshake('STREAM:32:32')).toEqual(invalid);
    expect(parseHandshake('STREAM:wide:32:-')).toEqual(invalid);
    expect(parseHandshake('STREAM:0:32:-')).toEqual(invalid);
  });
});

describe('clampRange', () => {
  it('fills a missing or oversized end with the last frame', () => {
    expect(clampRange(5, null, 10)).toEqual({ from: 5, to: 9 });
    expect(clampRange(0, 50, 10)).toEqual({ from: 0, to: 9 });
  });

  it('resets an out-of-range start to zero', () => {
    expect(clampRange(12, 3, 10)).toEqual({ from: 0, to: 3 });
  });

  it('extends an inverted range to the end', () => {
    expect(clampRange(6, 2, 10)).toEqual({ from: 6, to: 9 });
  });

  it('handles a single-frame item', () => {
    expect(clampRange(3, 8, 1)).toEqual({ from: 0, to: 0 });
  });
});

describe('message encoding', () => {
  it('frames a FRAME message as type, length, duration, pixels', () => {
    expect([...encodeFrame(40, Buffer.from([1, 2, 3]))]).toEqual([
      0x02, 0, 0, 0, 7, 0, 0, 0, 40, 1, 2, 3,
    ]);
  });

  it('encodes INFO as colon-separated text', () => {
    const message = encodeInfo({ width: 32, height: 32, from: 0, to: 9, name: 'nyan', frameCount: 10 });
    expect(message[0]).toBe(0x01);
    expect(message.readUInt32BE(1)).toBe(17);
    expect(message.subarray(5).toString('utf8')).toBe('32:32:0-9:nyan:10');
  });

  it('decodes messages split across arbitrary chunks', () => {
    const wire = Buffer.concat([
      encodeInfo({ width: 2, height: 1, from: 0, to: 0, name: 'dot', frameCount: 1 }),
      encodeFrame(66, Buffer.from([9, 8, 7, 6, 5, 4])),
      encodeNotReady('Converting'),
      encodeError('Bye'),
    ]);

    const reader = new MessageReader();
    const messages: StreamMessage[] = [];
    for (let offset = 0; offset < wire.length; offset += 3) {
      messages.push(...reader.push(wire.subarray(offset, offset + 3)));
    }

    expect(messages).toEqual([
      { type: 'info', info: { width: 2, height: 1, from: 0, to: 0, name: 'dot', frameCount: 1 } },
      { type: 'frame', durationMs: 66, pixels: Buffer.from([9, 8, 7, 6, 5, 4]) },
      { type: 'not-ready', reason: 'Converting' },
      { type: 'error', message: 'Bye' },
    ]);
    expect(reader.pending).toBe(0);
  });
});

describe('displayName', () => {
  it('drops the extension and the field separator', () => {
    expect(displayName('nyan.gif')).toBe('nyan');
    expect(displayName('12:30 clock.mp4')).toBe('12_30 clock');
  });
});
