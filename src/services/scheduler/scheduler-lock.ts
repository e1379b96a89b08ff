/**
 * Cross-process scheduler lock
 *
 * A lock file created with exclusive-create holds the owner's pid, a random
 * token, the hostname and the acquisition time as JSON. Only one live owner
 * may hold it. Two instances inside one process have the same pid but
 * different tokens and contend like separate processes.
 *
 * A lock whose pid is no longer running on this host is stale. Reclaiming it
 * renames it aside, checks the moved file is the one judged stale, and only
 * then deletes it; a file that turns out to be fresh is linked back.
 */

import os from 'node:os';
import path from 'node:path';
import fse from 'fs-extra';
import { z } from 'zod';
import { createId } from '@utils/create-id';
import { getErrorMessage, LockContentionError, StorageError } from '@utils/errors';
import { logger } from '@utils/logger';

const lockRecordSchema = z.object({
  pid: z.number().int().positive(),
  token: z.string().min(1),
  hostname: z.string(),
  acquiredAt: z.number(),
});

export type LockRecord = z.infer<typeof lockRecordSchema>;

export interface SchedulerLockOptions {
  path: string;
  /** Liveness probe, replaceable in tests */
  isProcessAlive?: (pid: number) => boolean;
  pid?: number;
  hostname?: string;
  now?: () => number;
  /** An unparsable lock younger than this is treated as being written */
  unreadableGraceMs?: number;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * `kill(pid, 0)` probe: ESRCH means gone, EPERM means alive but not ours.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
}

async function readRecord(filePath: string): Promise<LockRecord | null> {
  let raw: string;
  try {
    raw = await fse.readFile(filePath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  try {
    const parsed = lockRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class SchedulerLock {
  readonly token = createId();
  private held = false;
  private readonly pid: number;
  private readonly hostname: string;
  private readonly now: () => number;
  private readonly alive: (pid: number) => boolean;

  constructor(private readonly options: SchedulerLockOptions) {
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? os.hostname();
    this.now = options.now ?? Date.now;
    this.alive = options.isProcessAlive ?? isProcessAlive;
  }

  get path(): string {
    return this.options.path;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Try to take the lock once.
   *
   * @returns true when held (also when already held by this instance), false
   * when another live owner has it
   * @throws StorageError when the lock file cannot be written at all
   */
  async acquire(): Promise<boolean> {
    // Two rounds: the second runs after a stale lock was moved away.
    for (let round = 0; round < 2; round++) {
      if (await this.tryCreate()) {
        this.held = true;
        logger.debug('lock', 'Lock acquired', { path: this.path, pid: this.pid });
        return true;
      }

      const holder = await readRecord(this.path);
      if (holder?.token === this.token) {
        this.held = true;
        return true;
      }
      if (!(await this.isStale(holder))) {
        return false;
      }
      if (!(await this.reclaim(holder))) {
        return false;
      }
    }
    return false;
  }

  /**
   * Like `acquire`, but contention is an error.
   *
   * @throws LockContentionError naming the holder's pid
   */
  async acquireOrThrow(): Promise<void> {
    if (await this.acquire()) {
      return;
    }
    const holder = await this.readHolder();
    throw new LockContentionError(
      `Scheduler lock ${this.path} is held by pid ${holder?.pid ?? 'unknown'}`,
      holder?.pid ?? null
    );
  }

  /**
   * Remove the lock file if it still carries this instance's token.
   */
  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;

    const holder = await readRecord(this.path);
    if (holder?.token !== this.token) {
      logger.warn('lock', 'Lock was taken over before release', {
        path: this.path,
        holderPid: holder?.pid ?? null,
      });
      return;
    }

    await fse.remove(this.path);
    logger.debug('lock', 'Lock released', { path: this.path });
  }

  readHolder(): Promise<LockRecord | null> {
    return readRecord(this.path);
  }

  private async tryCreate(): Promise<boolean> {
    const record: LockRecord = {
      pid: this.pid,
      token: this.token,
      hostname: this.hostname,
      acquiredAt: this.now(),
    };

    try {
      await fse.ensureDir(path.dirname(this.path));
      await fse.writeFile(this.path, JSON.stringify(record), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return false;
      }
      throw new StorageError(`Cannot create lock file ${this.path}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async isStale(holder: LockRecord | null): Promise<boolean> {
    if (holder === null) {
      // Unparsable: either being written right now or left corrupt by a crash.
      const stat = await fse.stat(this.path).catch(() => null);
      if (stat === null) {
        return true;
      }
      return this.now() - stat.mtimeMs > (this.options.unreadableGraceMs ?? 5_000);
    }

    if (holder.hostname !== this.hostname) {
      return false;
    }
    return !this.alive(holder.pid);
  }

  /**
   * Move a stale lock aside. Returns true when the path is free again.
   */
  private async reclaim(expected: LockRecord | null): Promise<boolean> {
    const aside = `${this.path}.stale-${this.token}`;

    try {
      await fse.rename(this.path, aside);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }

    const moved = await readRecord(aside);
    if (moved?.token === expected?.token) {
      await fse.remove(aside);
      logger.warn('lock', 'Reclaimed stale scheduler lock', {
        path: this.path,
        stalePid: expected?.pid ?? null,
      });
      return true;
    }

    // Someone else replaced the stale lock in between: put theirs back.
    try {
      await fse.link(aside, this.path);
    } catch (error) {
      logger.warn('lock', 'Could not restore a lock moved during reclaim', {
        path: this.path,
        error: getErrorMessage(error),
      });
    }
    await fse.remove(aside);
    return false;
  }
}
