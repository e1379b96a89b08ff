import { describe, expect, it } from 'vitest';
import type { StreamEvent } from '@t/stream-types';
import { ActivityLog } from './activity-log';

function event(n: number): StreamEvent {
  return { type: 'connect', at: n, sessionId: `s${n}`, remoteAddress: '127.0.0.1:4000' };
}

describe('ActivityLog', () => {
  it('returns the newest events first', () => {
    const log = new ActivityLog(5);
    [1, 2, 3].forEach((n) => log.record(event(n)));

    expect(log.recent().map((e) => e.at)).toEqual([3, 2, 1]);
    expect(log.recent(2).map((e) => e.at)).toEqual([3, 2]);
  });

  it('overwrites the oldest entries once full', () => {
    const log = new ActivityLog(3);
    [1, 2, 3, 4, 5].forEach((n) => log.record(event(n)));

    expect(log.size).toBe(3);
    expect(log.recent(10).map((e) => e.at)).toEqual([5, 4, 3]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new ActivityLog(0)).toThrow(RangeError);
  });
});
