/**
 * Conversion job types
 */

import type { PixelcastErrorType } from '@utils/errors';

/**
 * Job lifecycle: queued → running → succeeded | failed.
 * A failed job with at least one successful geometry is partial.
 */
export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

/**
 * Result of converting one source for one geometry
 */
export interface GeometryOutcome {
  geometry: string;
  ok: boolean;
  /** Failure reason, `<ErrorName>: <message>` */
  reason?: string;
  errorType?: PixelcastErrorType;
  frameCount?: number;
  byteSize?: number;
  /** True when the artifact already existed and nothing was written */
  unchanged?: boolean;
}

export interface ConversionJob {
  sourceId: string;
  status: JobStatus;
  /** Attempts made at `encoderVersion` */
  attempts: number;
  encoderVersion: string;
  outcomes: GeometryOutcome[];
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
  /** When a failed job may run again; null when no retry is scheduled */
  nextAttemptAt: number | null;
}

export function isPartialFailure(job: ConversionJob): boolean {
  return job.status === 'failed' && job.outcomes.some((outcome) => outcome.ok);
}
