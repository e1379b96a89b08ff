import type { Writable } from 'node:stream';
import { OUTBOUND_CONTROL_LIMIT } from '@utils/constants';

interface OutboundEntry {
  data: Buffer;
  frame: boolean;
}

/**
 * Per-session outbound buffer between the pacing loop and the socket.
 *
 * Frames are bounded: when `maxFrames` are already waiting, a new frame is
 * refused and the caller counts it as dropped. Control messages (INFO,
 * NOT_READY, ERROR) are only refused past `maxControls` unsent ones, when
 * the client has stopped reading altogether. A single writer hands entries to the
 * socket in order and waits for `drain` whenever `write()` reports
 * back-pressure, so the pacing loop never blocks on a slow client.
 */
export class OutboundQueue {
  private readonly entries: OutboundEntry[] = [];
  private queuedFrames = 0;
  private queuedControls = 0;
  private writer: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly output: Writable,
    readonly maxFrames: number,
    readonly maxControls: number = OUTBOUND_CONTROL_LIMIT
  ) {}

  /**
   * @returns false when the frame was refused (queue full or closed)
   */
  pushFrame(data: Buffer): boolean {
    if (this.closed || this.queuedFrames >= this.maxFrames) {
      return false;
    }
    this.entries.push({ data, frame: true });
    this.queuedFrames++;
    this.kick();
    return true;
  }

  /**
   * @returns false when the message was refused (backlog full or closed)
   */
  pushControl(data: Buffer): boolean {
    if (this.closed || this.queuedControls >= this.maxControls) {
      return false;
    }
    this.entries.push({ data, frame: false });
    this.queuedControls++;
    this.kick();
    return true;
  }

  /** Frames waiting to be handed to the socket */
  get depth(): number {
    return this.queuedFrames;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once every entry queued so far was handed to the socket, or the
   * queue was closed.
   */
  async flush(): Promise<void> {
    while (this.writer) {
      await this.writer;
    }
  }

  /**
   * Stop writing and discard whatever is still queued.
   */
  close(): void {
    this.closed = true;
    this.entries.length = 0;
    this.queuedFrames = 0;
    this.queuedControls = 0;
  }

  private kick(): void {
    if (this.writer) return;
    this.writer = this.writeEntries().finally(() => {
      this.writer = null;
      if (this.entries.length > 0 && !this.closed) {
        this.kick();
      }
    });
  }

  private async writeEntries(): Promise<void> {
    for (;;) {
      const entry = this.entries.shift();
      if (!entry || this.closed) return;
      if (entry.frame) {
        this.queuedFrames--;
      } else {
        this.queuedControls--;
      }

      if (this.output.destroyed || this.output.writableEnded) {
        this.close();
        return;
      }
      if (!this.output.write(entry.data)) {
        await this.waitForDrain();
      }
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.output.off('drain', done);
        this.output.off('close', done);
        this.output.off('error', done);
        resolve();
      };
      this.output.on('drain', done);
      this.output.on('close', done);
      this.output.on('error', done);
    });
  }
}
