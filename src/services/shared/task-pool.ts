import { availableParallelism } from 'node:os';
import { logger } from '@utils/logger';

export interface TaskPoolOptions {
  /** Maximum tasks running at once (default: getOptimalPoolSize()) */
  maxConcurrent?: number;
  /** Label used in log lines */
  name?: string;
}

/**
 * Calculate optimal pool size based on hardware
 *
 * sharp already runs libvips on its own thread pool, so half the cores is
 * enough to keep it busy without oversubscribing.
 *
 * @param hardwareConcurrency - Number of logical CPU cores
 * @returns Optimal number of concurrent tasks (capped at 4)
 */
export function getOptimalPoolSize(hardwareConcurrency: number = availableParallelism()): number {
  const baseConcurrency = Math.floor(hardwareConcurrency / 2);
  return Math.max(1, Math.min(baseConcurrency, 4));
}

/**
 * Bounded-concurrency executor for async tasks
 *
 * Tasks beyond the limit wait in FIFO order. A rejected task releases its
 * slot like a resolved one.
 *
 * @example
 * const pool = new TaskPool({ maxConcurrent: 2, name: 'encode' });
 * const results = await Promise.all(geometries.map((g) => pool.execute(() => encode(g))));
 */
export class TaskPool {
  private readonly maxConcurrent: number;
  private readonly name: string;
  private running = 0;
  private waiters: Array<() => void> = [];

  constructor(options: TaskPoolOptions = {}) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? getOptimalPoolSize());
    this.name = options.name ?? 'pool';
  }

  async execute<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();

    try {
      logger.debug('task-pool', `Executing task on ${this.name}`, {
        active: this.running,
        queued: this.waiters.length,
      });
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.maxConcurrent) {
      this.running++;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  private release(): void {
    this.running--;
    const next = this.waiters.shift();
    next?.();
  }

  get activeTasks(): number {
    return this.running;
  }

  get queuedTasks(): number {
    return this.waiters.length;
  }

  get poolSize(): number {
    return this.maxConcurrent;
  }
}
