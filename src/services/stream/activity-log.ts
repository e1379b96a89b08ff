import type { StreamEvent } from '@t/stream-types';

/**
 * Fixed-size ring buffer of stream events. The oldest entry is overwritten
 * once the buffer is full.
 */
export class ActivityLog {
  private readonly entries: (StreamEvent | undefined)[];
  private next = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Activity log capacity must be a positive integer, got ${capacity}`);
    }
    this.entries = new Array<StreamEvent | undefined>(capacity).fill(undefined);
  }

  record(event: StreamEvent): void {
    this.entries[this.next] = event;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /**
   * Most recent events, newest first.
   */
  recent(limit = this.capacity): StreamEvent[] {
    const wanted = Math.max(0, Math.min(limit, this.count));
    const events: StreamEvent[] = [];
    for (let i = 1; i <= wanted; i++) {
      const event = this.entries[(this.next - i + this.capacity) % this.capacity];
      if (event) {
        events.push(event);
      }
    }
    return events;
  }

  get size(): number {
    return this.count;
  }
}
