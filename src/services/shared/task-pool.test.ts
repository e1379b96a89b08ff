import { describe, expect, it } from 'vitest';
import { getOptimalPoolSize, TaskPool } from './task-pool';

describe('getOptimalPoolSize', () => {
  it('uses half the cores, between 1 and 4', () => {
    expect(getOptimalPoolSize(1)).toBe(1);
    expect(getOptimalPoolSize(6)).toBe(3);
    expect(getOptimalPoolSize(32)).toBe(4);
  });
});

describe('TaskPool', () => {
  it('never runs more than maxConcurrent tasks', async () => {
    const pool = new TaskPool({ maxConcurrent: 2 });
    let active = 0;
    let peak = 0;

    const task = async (value: number) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return value * 2;
    };

    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => pool.execute(() => task(n))));

    expect(results).toEqual([2, 4, 6, 8, 10]);
    expect(peak).toBe(2);
    expect(pool.activeTasks).toBe(0);
  });

  it('frees the slot of a rejected task', async () => {
    const pool = new TaskPool({ maxConcurrent: 1 });

    await expect(pool.execute(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(pool.execute(() => Promise.resolve('next'))).resolves.toBe('next');
    expect(pool.queuedTasks).toBe(0);
  });
});
