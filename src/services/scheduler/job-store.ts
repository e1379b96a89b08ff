import type { Kysely, Selectable } from 'kysely';
import { z } from 'zod';
import type { ConversionJobsTable, PixelcastDatabase } from '@services/cache/cache-database';
import type { ConversionJob, GeometryOutcome } from '@t/job-types';
import { getErrorMessage } from '@utils/errors';
import { logger } from '@utils/logger';

const outcomesSchema = z.array(
  z.object({
    geometry: z.string(),
    ok: z.boolean(),
    reason: z.string().optional(),
    errorType: z
      .enum([
        'decode',
        'configuration',
        'capacity',
        'lock-contention',
        'stream-io',
        'storage',
        'aborted',
        'general',
      ])
      .optional(),
    frameCount: z.number().optional(),
    byteSize: z.number().optional(),
    unchanged: z.boolean().optional(),
  })
);

function parseOutcomes(raw: string, sourceId: string): GeometryOutcome[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn('scheduler', 'Ignoring unreadable job outcomes', {
      sourceId,
      error: getErrorMessage(error),
    });
    return [];
  }

  const parsed = outcomesSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('scheduler', 'Ignoring malformed job outcomes', { sourceId });
    return [];
  }
  return parsed.data;
}

function toJob(row: Selectable<ConversionJobsTable>): ConversionJob {
  return {
    sourceId: row.source_id,
    status: row.status,
    attempts: row.attempts,
    encoderVersion: row.encoder_version,
    outcomes: parseOutcomes(row.outcomes, row.source_id),
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    nextAttemptAt: row.next_attempt_at,
  };
}

/**
 * Persistence of the latest conversion job per source
 */
export class JobStore {
  constructor(private readonly db: Kysely<PixelcastDatabase>) {}

  async get(sourceId: string): Promise<ConversionJob | null> {
    const row = await this.db
      .selectFrom('conversion_jobs')
      .selectAll()
      .where('source_id', '=', sourceId)
      .executeTakeFirst();
    return row ? toJob(row) : null;
  }

  async list(): Promise<ConversionJob[]> {
    const rows = await this.db
      .selectFrom('conversion_jobs')
      .selectAll()
      .orderBy('created_at', 'asc')
      .orderBy('source_id', 'asc')
      .execute();
    return rows.map(toJob);
  }

  async save(job: ConversionJob): Promise<void> {
    const values = {
      status: job.status,
      attempts: job.attempts,
      encoder_version: job.encoderVersion,
      outcomes: JSON.stringify(job.outcomes),
      last_error: job.lastError,
      updated_at: job.updatedAt,
      next_attempt_at: job.nextAttemptAt,
    };

    await this.db
      .insertInto('conversion_jobs')
      .values({ source_id: job.sourceId, created_at: job.createdAt, ...values })
      .onConflict((oc) => oc.column('source_id').doUpdateSet(values))
      .execute();
  }

  async delete(sourceId: string): Promise<void> {
    await this.db.deleteFrom('conversion_jobs').where('source_id', '=', sourceId).execute();
  }

  /**
   * Put jobs left `running` by a crashed owner back in the queue. Only the
   * lock holder may call this. Returns the number of jobs re-queued.
   */
  async requeueInterrupted(now: number): Promise<number> {
    const result = await this.db
      .updateTable('conversion_jobs')
      .set({ status: 'queued', updated_at: now, next_attempt_at: null })
      .where('status', '=', 'running')
      .executeTakeFirst();
    return Number(result.numUpdatedRows);
  }
}
