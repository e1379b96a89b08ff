/**
 * Conversion Scheduler
 *
 * Discovers sources, queues conversion jobs and runs them one at a time.
 * Every job runs under the cross-process scheduler lock, taken per job and
 * released right after, so schedulers in several processes can share one
 * cache without ever converting concurrently. Eligibility is re-evaluated
 * after the lock is taken.
 *
 * Job lifecycle:
 * - queued: new source, new encoder version, or an explicit request
 * - running: at most one per lock
 * - succeeded: every geometry stored
 * - failed: retried with exponential backoff while no geometry succeeded
 *   and attempts remain; partial failures are final
 *
 * Usage:
 *   const scheduler = new ConversionScheduler({ store, converter, scanner, lock, ...config });
 *   scheduler.start();          // scan + drain now and every scan interval
 *   scheduler.triggerScan();    // e.g. on SIGUSR1
 *   await scheduler.stop();     // aborts and re-queues the running job
 */

import fse from 'fs-extra';
import type { CacheStore } from '@services/cache/cache-store';
import type { SourceConverter } from '@services/pipeline/conversion-pipeline';
import type { ConversionJob, GeometryOutcome } from '@t/job-types';
import type { SourceMedia, TargetGeometry } from '@t/media-types';
import { classifyError, getErrorMessage, isFatalError } from '@utils/errors';
import { logger } from '@utils/logger';
import { sleep } from '@utils/with-timeout';
import { JobStore } from './job-store';
import type { SchedulerLock } from './scheduler-lock';
import type { SourceScanner } from './source-scanner';

export interface ConversionSchedulerOptions {
  store: CacheStore;
  converter: SourceConverter;
  scanner: SourceScanner;
  lock: SchedulerLock;
  geometries: readonly TargetGeometry[];
  encoderVersion: string;
  maxAttempts: number;
  retryBaseMs: number;
  lockRetryMs: number;
  scanIntervalMs: number;
  now?: () => number;
  /** Called once when a storage failure stops the scheduler */
  onFatal?: (error: unknown) => void;
}

export interface ScanSummary {
  discovered: number;
  registered: number;
  queued: number;
  removed: number;
  reclaimed: number;
}

/**
 * Outcome of `requestConversion`
 *
 * - `queued`: a job is (now) waiting or a retry is pending
 * - `running`: the source is being converted right now
 * - `failed`: conversion failed for good; only a forced request retries it
 * - `unknown-source`: no such source
 */
export type ConversionRequestResult = 'queued' | 'running' | 'failed' | 'unknown-source';

export interface ConversionRequest {
  /** Re-queue even after a final failure, resetting attempts */
  force?: boolean;
  /** Only re-queue when this geometry did not fail last time */
  geometry?: string;
}

interface DueJob {
  source: SourceMedia;
  job: ConversionJob | null;
}

export class ConversionScheduler {
  readonly jobs: JobStore;
  private readonly now: () => number;
  private current: { sourceId: string; controller: AbortController } | null = null;
  private cycle: Promise<void> | null = null;
  private rescanRequested = false;
  private timer: NodeJS.Timeout | null = null;
  private lifecycle = new AbortController();
  private started = false;

  constructor(private readonly options: ConversionSchedulerOptions) {
    this.jobs = new JobStore(options.store.database);
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Discovery
  // ==========================================================================

  /**
   * Register new sources, queue what needs converting, cascade deletion of
   * sources whose file is gone and reclaim orphaned cache files.
   *
   * Sources whose file could not be read this time are kept. Converted
   * sources that lost an artifact to eviction are queued again while the
   * geometry's share of the cache has room.
   */
  async scanOnce(): Promise<ScanSummary> {
    const { store, scanner } = this.options;
    const { files, skipped } = await scanner.scan();
    const unreadable = new Set(skipped);
    const known = new Map((await store.listSources()).map((source) => [source.id, source]));
    const seen = new Set<string>();
    let registered = 0;
    let queued = 0;

    for (const file of files) {
      seen.add(file.id);
      if (!known.has(file.id)) {
        registered++;
      }

      const source = await store.registerSource({
        id: file.id,
        filename: file.filename,
        path: file.path,
        kind: file.kind,
        byteSize: file.byteSize,
        ingestedAt: this.now(),
      });
      known.set(source.id, source);

      if (await this.enqueueIfNew(source.id)) {
        queued++;
      }
    }

    let removed = 0;
    for (const source of known.values()) {
      if (seen.has(source.id) || unreadable.has(source.path)) continue;
      logger.info('scheduler', 'Source file gone, removing', {
        sourceId: source.id,
        filename: source.filename,
      });
      await this.purge(source.id);
      removed++;
    }

    queued += await this.requeueEvicted();
    const reclaimed = await store.reclaimOrphans();
    const summary = { discovered: files.length, registered, queued, removed, reclaimed };
    logger.info('scheduler', 'Scan complete', summary);
    return summary;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run due jobs one at a time until none is left or the signal fires.
   * Waits for the lock between jobs as long as it takes.
   *
   * @returns Number of jobs run
   */
  async drain(signal: AbortSignal = this.lifecycle.signal): Promise<number> {
    let processed = 0;
    while (!signal.aborted) {
      const job = await this.runNext(true, signal);
      if (!job) break;
      processed++;
    }
    return processed;
  }

  /**
   * Run the next due job without waiting for the lock.
   *
   * @returns The finished job, or null when nothing was due
   * @throws LockContentionError when another live scheduler holds the lock
   */
  runOnce(): Promise<ConversionJob | null> {
    return this.runNext(false, this.lifecycle.signal);
  }

  /**
   * Begin periodic scanning: one cycle now, then every scan interval.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    if (this.lifecycle.signal.aborted) {
      this.lifecycle = new AbortController();
    }

    this.timer = setInterval(() => this.triggerScan(), this.options.scanIntervalMs);
    this.timer.unref();
    logger.info('scheduler', 'Scheduler started', {
      scanIntervalMs: this.options.scanIntervalMs,
      geometries: this.options.geometries.map((g) => g.tag),
    });
    this.triggerScan();
  }

  /**
   * Scan and drain as soon as possible. Coalesces with a cycle in progress.
   */
  triggerScan(): void {
    if (!this.started) {
      logger.debug('scheduler', 'Scan requested while stopped; ignoring');
      return;
    }
    if (this.cycle) {
      this.rescanRequested = true;
      return;
    }
    this.cycle = this.runCycle().finally(() => {
      this.cycle = null;
    });
  }

  /**
   * Stop scanning, abort the running conversion (it is re-queued) and wait
   * for everything to settle. The lock is released on the way out.
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.lifecycle.abort();
    this.current?.controller.abort();

    await this.cycle;
    await this.options.lock.release();
    logger.info('scheduler', 'Scheduler stopped');
  }

  runningJobs(): string[] {
    return this.current ? [this.current.sourceId] : [];
  }

  getJob(sourceId: string): Promise<ConversionJob | null> {
    return this.jobs.get(sourceId);
  }

  listJobs(): Promise<ConversionJob[]> {
    return this.jobs.list();
  }

  // ==========================================================================
  // Requests
  // ==========================================================================

  /**
   * Ask for a source to be (re)converted, e.g. after its artifact was evicted.
   */
  async requestConversion(
    sourceId: string,
    request: ConversionRequest = {}
  ): Promise<ConversionRequestResult> {
    const source = await this.options.store.getSource(sourceId);
    if (!source) {
      return 'unknown-source';
    }

    const job = await this.jobs.get(sourceId);
    if (job?.status === 'running') {
      return 'running';
    }
    if (job?.status === 'queued') {
      return 'queued';
    }

    if (!request.force && job && job.encoderVersion === this.options.encoderVersion) {
      if (job.status === 'failed' && job.nextAttemptAt !== null) {
        return 'queued';
      }
      const outcome =
        request.geometry === undefined
          ? undefined
          : job.outcomes.find((candidate) => candidate.geometry === request.geometry);
      const failedBefore =
        request.geometry === undefined ? job.status === 'failed' : outcome?.ok === false;
      if (failedBefore) {
        return 'failed';
      }
    }

    const now = this.now();
    await this.jobs.save({
      sourceId,
      status: 'queued',
      attempts: 0,
      encoderVersion: this.options.encoderVersion,
      outcomes: job?.outcomes ?? [],
      lastError: job?.lastError ?? null,
      createdAt: job?.createdAt ?? now,
      updatedAt: now,
      nextAttemptAt: null,
    });
    logger.info('scheduler', 'Conversion requested', {
      sourceId,
      force: request.force ?? false,
      geometry: request.geometry,
    });

    this.triggerScan();
    return 'queued';
  }

  /**
   * Delete a source: its files in the source directory, its artifacts and
   * its job. Aborts the source's conversion if it is running.
   *
   * @returns false for an unknown source
   */
  async deleteSource(sourceId: string): Promise<boolean> {
    const source = await this.options.store.getSource(sourceId);
    if (!source) {
      return false;
    }

    const { files } = await this.options.scanner.scan();
    for (const file of files) {
      if (file.id !== sourceId) continue;
      await fse.remove(file.path);
      this.options.scanner.forget(file.path);
      logger.info('scheduler', 'Deleted source file', { filename: file.filename });
    }

    await this.purge(sourceId);
    return true;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async runCycle(): Promise<void> {
    do {
      this.rescanRequested = false;
      try {
        await this.scanOnce();
        await this.drain(this.lifecycle.signal);
      } catch (error) {
        if (isFatalError(error)) {
          this.halt(error);
          return;
        }
        logger.error('scheduler', 'Scheduler cycle failed', { error: getErrorMessage(error) });
      }
    } while (this.rescanRequested && !this.lifecycle.signal.aborted);
  }

  private halt(error: unknown): void {
    logger.error('scheduler', 'Storage failure, scheduler stopped', { error: getErrorMessage(error) });
    this.started = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.lifecycle.abort();
    this.options.onFatal?.(error);
  }

  private async enqueueIfNew(sourceId: string): Promise<boolean> {
    const job = await this.jobs.get(sourceId);
    if (job && job.encoderVersion === this.options.encoderVersion) {
      return false;
    }

    const now = this.now();
    await this.jobs.save({
      sourceId,
      status: 'queued',
      attempts: 0,
      encoderVersion: this.options.encoderVersion,
      outcomes: [],
      lastError: null,
      createdAt: now,
      updatedAt: now,
      nextAttemptAt: null,
    });
    return true;
  }

  /**
   * Queue converted sources missing an artifact for a configured geometry,
   * in name order, up to an even per-geometry share of the
   * artifact bound. Geometries that failed for the source are left alone.
   */
  private async requeueEvicted(): Promise<number> {
    const { store, geometries, encoderVersion } = this.options;
    const share = Math.max(1, Math.floor(store.capacity.maxArtifacts / geometries.length));
    const jobs = new Map((await this.jobs.list()).map((job) => [job.sourceId, job]));
    const sources = await store.listSources();
    const wanted = new Map<string, ConversionJob>();

    for (const geometry of geometries) {
      const present = new Set(
        (await store.listArtifacts({ geometry: geometry.tag }))
          .filter((artifact) => artifact.encoderVersion === encoderVersion)
          .map((artifact) => artifact.sourceId)
      );
      let room = share - present.size;

      for (const source of sources) {
        if (room <= 0) break;
        if (present.has(source.id)) continue;

        const job = jobs.get(source.id);
        if (!job || job.encoderVersion !== encoderVersion) continue;
        if (job.status !== 'succeeded' && !(job.status === 'failed' && job.nextAttemptAt === null)) continue;
        if (job.outcomes.find((outcome) => outcome.geometry === geometry.tag)?.ok === false) continue;

        if (!wanted.has(source.id)) {
          wanted.set(source.id, job);
        }
        room--;
      }
    }

    const now = this.now();
    for (const job of wanted.values()) {
      await this.jobs.save({ ...job, status: 'queued', attempts: 0, updatedAt: now, nextAttemptAt: null });
      logger.info('scheduler', 'Artifact evicted, re-queued', { sourceId: job.sourceId });
    }
    return wanted.size;
  }

  private isDue(job: ConversionJob | null, now: number): boolean {
    if (!job || job.encoderVersion !== this.options.encoderVersion) {
      return true;
    }
    switch (job.status) {
      case 'queued':
        return true;
      case 'failed':
        return job.nextAttemptAt !== null && job.nextAttemptAt <= now;
      default:
        return false;
    }
  }

  private async nextDue(): Promise<DueJob | null> {
    const now = this.now();
    const jobs = new Map((await this.jobs.list()).map((job) => [job.sourceId, job]));

    for (const source of await this.options.store.listSources()) {
      const job = jobs.get(source.id) ?? null;
      if (this.isDue(job, now)) {
        return { source, job };
      }
    }
    return null;
  }

  private async waitForLock(signal: AbortSignal): Promise<boolean> {
    let waited = false;
    for (;;) {
      if (await this.options.lock.acquire()) {
        return true;
      }
      if (!waited) {
        const holder = await this.options.lock.readHolder();
        logger.info('lock', 'Scheduler lock busy, waiting', { holderPid: holder?.pid ?? null });
        waited = true;
      }
      if (!(await sleep(this.options.lockRetryMs, signal))) {
        return false;
      }
    }
  }

  /**
   * A job left running while this process runs nothing belongs to another
   * scheduler, or to one that crashed.
   */
  private async hasInterrupted(): Promise<boolean> {
    if (this.current) {
      return false;
    }
    return (await this.jobs.list()).some((job) => job.status === 'running');
  }

  private async runNext(wait: boolean, signal: AbortSignal): Promise<ConversionJob | null> {
    if (signal.aborted) {
      return null;
    }

    if (!(await this.nextDue())) {
      // At most an interrupted job is left; its holder keeps the lock while alive.
      if (!(await this.hasInterrupted()) || !(await this.options.lock.acquire())) {
        return null;
      }
    } else if (wait) {
      if (!(await this.waitForLock(signal))) {
        return null;
      }
    } else {
      await this.options.lock.acquireOrThrow();
    }

    try {
      const requeued = await this.jobs.requeueInterrupted(this.now());
      if (requeued > 0) {
        logger.warn('scheduler', 'Re-queued jobs interrupted by a previous owner', { requeued });
      }

      // Another scheduler may have run it while we waited.
      const due = await this.nextDue();
      if (!due || signal.aborted) {
        return null;
      }
      return await this.runJob(due.source, due.job);
    } finally {
      await this.options.lock.release();
    }
  }

  private async runJob(source: SourceMedia, previous: ConversionJob | null): Promise<ConversionJob> {
    const { store, converter, geometries, encoderVersion, maxAttempts, retryBaseMs } = this.options;
    const controller = new AbortController();
    const startedAt = this.now();
    const attempts =
      (previous && previous.encoderVersion === encoderVersion ? previous.attempts : 0) + 1;

    const running: ConversionJob = {
      sourceId: source.id,
      status: 'running',
      attempts,
      encoderVersion,
      outcomes: previous?.outcomes ?? [],
      lastError: previous?.lastError ?? null,
      createdAt: previous?.createdAt ?? startedAt,
      updatedAt: startedAt,
      nextAttemptAt: null,
    };
    await this.jobs.save(running);

    this.current = { sourceId: source.id, controller };
    logger.setActiveJob(source.id);
    logger.info('scheduler', 'Conversion started', {
      filename: source.filename,
      attempt: attempts,
      maxAttempts,
    });

    let outcomes: GeometryOutcome[];
    try {
      outcomes = await converter.convert(source, geometries, controller.signal);
    } catch (error) {
      const { type, reason } = classifyError(error);
      outcomes = geometries.map((g) => ({ geometry: g.tag, ok: false, reason, errorType: type }));
    } finally {
      logger.setActiveJob(null);
      this.current = null;
    }

    const finishedAt = this.now();
    const stillRegistered = (await store.getSource(source.id)) !== null;

    if (controller.signal.aborted) {
      const requeued: ConversionJob = {
        ...running,
        status: 'queued',
        attempts: attempts - 1,
        updatedAt: finishedAt,
      };
      if (stillRegistered) {
        await this.jobs.save(requeued);
      }
      logger.info('scheduler', 'Conversion aborted, re-queued', { sourceId: source.id });
      return requeued;
    }

    const failures = outcomes.filter((outcome) => !outcome.ok);
    const partial = failures.length > 0 && failures.length < outcomes.length;
    const status = failures.length === 0 ? 'succeeded' : 'failed';
    const retry = status === 'failed' && !partial && attempts < maxAttempts;

    const job: ConversionJob = {
      ...running,
      status,
      outcomes,
      lastError: failures[0]?.reason ?? null,
      updatedAt: finishedAt,
      nextAttemptAt: retry ? finishedAt + retryBaseMs * 2 ** (attempts - 1) : null,
    };
    if (stillRegistered) {
      await this.jobs.save(job);
    }

    const context = {
      sourceId: source.id,
      status,
      partial,
      attempts,
      nextAttemptAt: job.nextAttemptAt,
      lastError: job.lastError,
    };
    if (status === 'succeeded') {
      logger.info('scheduler', 'Conversion succeeded', context);
    } else {
      logger.warn('scheduler', 'Conversion failed', context);
    }
    return job;
  }

  private async purge(sourceId: string): Promise<void> {
    if (this.current?.sourceId === sourceId) {
      this.current.controller.abort();
    }
    await this.options.store.delete(sourceId);
    await this.jobs.delete(sourceId);
  }
}
