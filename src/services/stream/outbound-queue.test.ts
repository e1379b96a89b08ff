import { Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { OutboundQueue } from './outbound-queue';

/** Holds every write until `open()` is called */
class ControlledSink extends Writable {
  readonly chunks: Buffer[] = [];
  private held: (() => void)[] = [];
  private flowing = false;

  constructor() {
    super({ highWaterMark: 1 });
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    if (this.flowing) {
      callback();
    } else {
      this.held.push(() => callback());
    }
  }

  open(): void {
    this.flowing = true;
    const held = this.held;
    this.held = [];
    held.forEach((release) => release());
  }

  written(): string[] {
    return this.chunks.map((chunk) => chunk.toString('utf8'));
  }
}

describe('OutboundQueue', () => {
  it('bounds frames, keeps control messages and writes in order', async () => {
    const sink = new ControlledSink();
    const queue = new OutboundQueue(sink, 2);

    queue.pushControl(Buffer.from('info'));
    expect(queue.pushFrame(Buffer.from('f1'))).toBe(true);
    expect(queue.pushFrame(Buffer.from('f2'))).toBe(true);
    expect(queue.pushFrame(Buffer.from('f3'))).toBe(false);
    queue.pushControl(Buffer.from('note'));
    expect(queue.depth).toBe(2);
    expect(sink.written()).toEqual(['info']);

    sink.open();
    await queue.flush();

    expect(sink.written()).toEqual(['info', 'f1', 'f2', 'note']);
    expect(queue.depth).toBe(0);
  });

  it('refuses control messages past the backlog limit', async () => {
    const sink = new ControlledSink();
    const queue = new OutboundQueue(sink, 4, 2);

    // The first one is handed to the sink at once and held there.
    expect(queue.pushControl(Buffer.from('c1'))).toBe(true);
    expect(queue.pushControl(Buffer.from('c2'))).toBe(true);
    expect(queue.pushControl(Buffer.from('c3'))).toBe(true);
    expect(queue.pushControl(Buffer.from('c4'))).toBe(false);

    sink.open();
    await queue.flush();
    expect(sink.written()).toEqual(['c1', 'c2', 'c3']);
    expect(queue.pushControl(Buffer.from('c5'))).toBe(true);
  });

  it('refuses everything once closed', () => {
    const queue = new OutboundQueue(new ControlledSink(), 4);
    queue.close();

    expect(queue.pushFrame(Buffer.from('f1'))).toBe(false);
    expect(queue.pushControl(Buffer.from('info'))).toBe(false);
    expect(queue.isClosed).toBe(true);
  });

  it('gives up when the socket goes away while stalled', async () => {
    const sink = new ControlledSink();
    const queue = new OutboundQueue(sink, 4);
    queue.pushControl(Buffer.from('info'));
    queue.pushFrame(Buffer.from('f1'));

    sink.destroy();
    await queue.flush();

    expect(queue.isClosed).toBe(true);
    expect(sink.written()).toEqual(['info']);
  });
});
