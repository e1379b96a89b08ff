/**
 * Catalog Service
 *
 * Read side for a listing UI: paged, searchable, sortable source listings
 * with cache and job state joined in, plus the delete and re-convert
 * requests the UI forwards to the scheduler.
 *
 * Usage:
 *   const catalog = new CatalogService({ store, scheduler, activity: server, itemsPerPage: 20 });
 *   const page = await catalog.listSources({ search: 'nyan', sortBy: 'served', order: 'desc' });
 *   await catalog.reconvert(page.items[0].source.id);
 */

import { z } from 'zod';
import type { CacheStore } from '@services/cache/cache-store';
import type {
  ConversionRequest,
  ConversionRequestResult,
} from '@services/scheduler/conversion-scheduler';
import type { ArtifactMetadata, CacheStats, SourceListing } from '@t/cache-types';
import type { ConversionJob, JobStatus } from '@t/job-types';
import { isPartialFailure } from '@t/job-types';
import type { SourceMedia } from '@t/media-types';
import type { SessionSnapshot, StreamEvent } from '@t/stream-types';
import { ConfigurationError } from '@utils/errors';
import { logger } from '@utils/logger';

export type CatalogSortKey = 'name' | 'size' | 'date' | 'served';
export type SortOrder = 'asc' | 'desc';

export interface CatalogQuery {
  /** 1-based; clamped to the last page */
  page?: number;
  pageSize?: number;
  /** Case-insensitive match on filename, or a source id prefix */
  search?: string;
  sortBy?: CatalogSortKey;
  order?: SortOrder;
}

export interface GeometryFailure {
  geometry: string;
  reason: string;
}

export interface CatalogItem {
  source: SourceMedia;
  /** Artifacts at the current encoder version */
  artifacts: ArtifactMetadata[];
  servedCount: number;
  lastServedAt: number | null;
  jobStatus: JobStatus | null;
  /** Failed for some geometries, converted for others */
  partial: boolean;
  attempts: number;
  nextAttemptAt: number | null;
  failures: GeometryFailure[];
  lastError: string | null;
}

export interface CatalogPage {
  items: CatalogItem[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
}

export interface CatalogOverview {
  cache: CacheStats;
  runningJobs: string[];
  failedJobs: number;
  sessions: SessionSnapshot[];
}

/**
 * The part of the scheduler the catalog drives
 */
export interface CatalogScheduler {
  listJobs(): Promise<ConversionJob[]>;
  runningJobs(): string[];
  deleteSource(sourceId: string): Promise<boolean>;
  requestConversion(sourceId: string, request?: ConversionRequest): Promise<ConversionRequestResult>;
}

/**
 * The part of the stream server the catalog reads
 */
export interface ActivitySource {
  sessions(): SessionSnapshot[];
  recentActivity(limit?: number): StreamEvent[];
}

export interface CatalogServiceOptions {
  store: CacheStore;
  scheduler: CatalogScheduler;
  /** Stream server; without one there are no sessions or events */
  activity?: ActivitySource;
  itemsPerPage: number;
}

const querySchema = z.object({
  page: z.number().int().positive().default(1),
  pageSize: z.number().int().positive().max(500).optional(),
  search: z.string().trim().optional(),
  sortBy: z.enum(['name', 'size', 'date', 'served']).default('name'),
  order: z.enum(['asc', 'desc']).default('asc'),
});

const comparators: Record<CatalogSortKey, (a: CatalogItem, b: CatalogItem) => number> = {
  name: (a, b) => a.source.filename.toLowerCase().localeCompare(b.source.filename.toLowerCase()),
  size: (a, b) => a.source.byteSize - b.source.byteSize,
  date: (a, b) => a.source.ingestedAt - b.source.ingestedAt,
  served: (a, b) => a.servedCount - b.servedCount,
};

function matchesSearch(source: SourceMedia, search: string): boolean {
  const needle = search.toLowerCase();
  return source.filename.toLowerCase().includes(needle) || source.id.startsWith(needle);
}

function latestServe(artifacts: ArtifactMetadata[]): number | null {
  let latest: number | null = null;
  for (const artifact of artifacts) {
    if (artifact.lastServedAt !== null && (latest === null || artifact.lastServedAt > latest)) {
      latest = artifact.lastServedAt;
    }
  }
  return latest;
}

export class CatalogService {
  constructor(private readonly options: CatalogServiceOptions) {}

  /**
   * One page of sources.
   *
   * @throws ConfigurationError for an invalid query (page 0, unknown sort key)
   *
   * @example
   * await catalog.listSources({ page: 2, sortBy: 'size', order: 'desc' });
   */
  async listSources(query: CatalogQuery = {}): Promise<CatalogPage> {
    const parsed = querySchema.safeParse(query);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid catalog query: ${details}`);
    }

    const { page, search, sortBy, order } = parsed.data;
    const pageSize = parsed.data.pageSize ?? this.options.itemsPerPage;

    const [listings, jobs] = await Promise.all([
      this.options.store.list(),
      this.options.scheduler.listJobs(),
    ]);
    const jobsBySource = new Map(jobs.map((job) => [job.sourceId, job]));

    const filtered =
      search === undefined || search === ''
        ? listings
        : listings.filter((listing) => matchesSearch(listing.source, search));

    const direction = order === 'asc' ? 1 : -1;
    const compare = comparators[sortBy];
    const items = filtered
      .map((listing) => this.toItem(listing, jobsBySource.get(listing.source.id)))
      .sort((a, b) => direction * compare(a, b) || a.source.id.localeCompare(b.source.id));

    const totalPages = Math.max(1, Math.ceil(items.length / pageSize));
    const current = Math.min(page, totalPages);
    const start = (current - 1) * pageSize;

    return {
      items: items.slice(start, start + pageSize),
      page: current,
      pageSize,
      totalItems: items.length,
      totalPages,
    };
  }

  /**
   * Delete a source with its files, artifacts and job.
   *
   * @returns false for an unknown source
   */
  async deleteSource(sourceId: string): Promise<boolean> {
    const deleted = await this.options.scheduler.deleteSource(sourceId);
    logger.info('catalog', deleted ? 'Source deleted' : 'Delete of unknown source', { sourceId });
    return deleted;
  }

  /**
   * Queue a source for conversion again, even if it failed before.
   */
  async reconvert(sourceId: string): Promise<ConversionRequestResult> {
    const result = await this.options.scheduler.requestConversion(sourceId, { force: true });
    logger.info('catalog', 'Re-conversion requested', { sourceId, result });
    return result;
  }

  /**
   * Recent stream events, newest first.
   */
  activityLog(limit?: number): StreamEvent[] {
    return this.options.activity?.recentActivity(limit) ?? [];
  }

  async overview(): Promise<CatalogOverview> {
    const [cache, jobs] = await Promise.all([
      this.options.store.stats(),
      this.options.scheduler.listJobs(),
    ]);

    return {
      cache,
      runningJobs: this.options.scheduler.runningJobs(),
      failedJobs: jobs.filter((job) => job.status === 'failed').length,
      sessions: this.options.activity?.sessions() ?? [],
    };
  }

  private toItem(listing: SourceListing, job: ConversionJob | undefined): CatalogItem {
    const artifacts = listing.artifacts.filter(
      (artifact) => artifact.encoderVersion === this.options.store.encoderVersion
    );
    const failures: GeometryFailure[] = [];
    for (const outcome of job?.outcomes ?? []) {
      if (!outcome.ok) {
        failures.push({ geometry: outcome.geometry, reason: outcome.reason ?? 'Unknown error' });
      }
    }

    return {
      source: listing.source,
      artifacts,
      servedCount: artifacts.reduce((sum, artifact) => sum + artifact.servedCount, 0),
      lastServedAt: latestServe(artifacts),
      jobStatus: job?.status ?? null,
      partial: job ? isPartialFailure(job) : false,
      attempts: job?.attempts ?? 0,
      nextAttemptAt: job?.nextAttemptAt ?? null,
      failures,
      lastError: job?.lastError ?? null,
    };
  }
}
