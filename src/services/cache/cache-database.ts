/**
 * Metadata database
 *
 * One SQLite file (WAL journal) shared by every process of a deployment.
 * `sources` and `artifacts` are written only by the cache store;
 * `conversion_jobs` only by the scheduler's job store.
 */

import path from 'node:path';
import Database from 'better-sqlite3';
import fse from 'fs-extra';
import { Kysely, SqliteDialect, type Generated } from 'kysely';
import type { MediaKind } from '@t/media-types';
import type { JobStatus } from '@t/job-types';
import { formatError, StorageError } from '@utils/errors';
import { logger } from '@utils/logger';

// ============================================================================
// Tables
// ============================================================================

/**
 * Ingested source files, keyed by content hash.
 */
export interface SourcesTable {
  /** Lowercase hex SHA-256 of the file bytes */
  id: string;
  filename: string;
  path: string;
  kind: MediaKind;
  byte_size: number;
  /** Epoch milliseconds */
  ingested_at: number;
}

/**
 * One row per stored artifact file.
 */
export interface ArtifactsTable {
  source_id: string;
  geometry: string;
  encoder_version: string;
  width: number;
  height: number;
  frame_count: number;
  /** 0 or 1 */
  loop: number;
  byte_size: number;
  /** Relative to the cache root */
  file_path: string;
  created_at: number;
  last_served_at: number | null;
  served_count: Generated<number>;
}

/**
 * Latest conversion job per source.
 */
export interface ConversionJobsTable {
  source_id: string;
  status: JobStatus;
  attempts: number;
  encoder_version: string;
  /** JSON array of GeometryOutcome */
  outcomes: string;
  last_error: string | null;
  created_at: number;
  updated_at: number;
  next_attempt_at: number | null;
}

export interface PixelcastDatabase {
  sources: SourcesTable;
  artifacts: ArtifactsTable;
  conversion_jobs: ConversionJobsTable;
}

// ============================================================================
// Open + migrate
// ============================================================================

async function migrate(db: Kysely<PixelcastDatabase>): Promise<void> {
  await db.schema
    .createTable('sources')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('filename', 'text', (col) => col.notNull())
    .addColumn('path', 'text', (col) => col.notNull())
    .addColumn('kind', 'text', (col) => col.notNull())
    .addColumn('byte_size', 'integer', (col) => col.notNull())
    .addColumn('ingested_at', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('artifacts')
    .ifNotExists()
    .addColumn('source_id', 'text', (col) => col.notNull())
    .addColumn('geometry', 'text', (col) => col.notNull())
    .addColumn('encoder_version', 'text', (col) => col.notNull())
    .addColumn('width', 'integer', (col) => col.notNull())
    .addColumn('height', 'integer', (col) => col.notNull())
    .addColumn('frame_count', 'integer', (col) => col.notNull())
    .addColumn('loop', 'integer', (col) => col.notNull())
    .addColumn('byte_size', 'integer', (col) => col.notNull())
    .addColumn('file_path', 'text', (col) => col.notNull())
    .addColumn('created_at', 'integer', (col) => col.notNull())
    .addColumn('last_served_at', 'integer')
    .addColumn('served_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addPrimaryKeyConstraint('artifacts_pk', ['source_id', 'geometry', 'encoder_version'])
    .addForeignKeyConstraint('artifacts_source_fk', ['source_id'], 'sources', ['id'], (fk) =>
      fk.onDelete('cascade')
    )
    .execute();

  await db.schema
    .createIndex('artifacts_geometry_idx')
    .ifNotExists()
    .on('artifacts')
    .column('geometry')
    .execute();

  await db.schema
    .createTable('conversion_jobs')
    .ifNotExists()
    .addColumn('source_id', 'text', (col) => col.primaryKey())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('attempts', 'integer', (col) => col.notNull())
    .addColumn('encoder_version', 'text', (col) => col.notNull())
    .addColumn('outcomes', 'text', (col) => col.notNull())
    .addColumn('last_error', 'text')
    .addColumn('created_at', 'integer', (col) => col.notNull())
    .addColumn('updated_at', 'integer', (col) => col.notNull())
    .addColumn('next_attempt_at', 'integer')
    .execute();
}

/**
 * Open (creating if needed) the metadata database and bring its schema up
 * to date.
 *
 * @throws StorageError when the file cannot be opened or migrated
 */
export async function openDatabase(dbPath: string): Promise<Kysely<PixelcastDatabase>> {
  let sqlite: Database.Database;
  try {
    await fse.ensureDir(path.dirname(dbPath));
    sqlite = new Database(dbPath);
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma('busy_timeout = 5000');
  } catch (error) {
    throw new StorageError(formatError(error, `Cannot open metadata store ${dbPath}`), {
      cause: error,
    });
  }

  const db = new Kysely<PixelcastDatabase>({
    dialect: new SqliteDialect({ database: sqlite }),
  });

  try {
    await migrate(db);
  } catch (error) {
    await db.destroy();
    throw new StorageError(formatError(error, `Cannot migrate metadata store ${dbPath}`), {
      cause: error,
    });
  }

  logger.debug('cache', 'Metadata store ready', { dbPath });
  return db;
}
