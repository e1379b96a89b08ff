/**
 * Cache Store
 *
 * Content-addressed, capacity-bounded artifact cache. Frame bytes live in
 * files under the cache root; metadata lives in SQLite. A row is only ever
 * inserted after its file has been renamed into place, so every row points
 * at a complete file. Files without a row (a crash between rename and
 * commit, or an interrupted write) are reclaimed at open.
 *
 * Eviction removes the least recently served artifact first. An artifact
 * that was never served counts from its creation time; ties go to the
 * oldest creation.
 *
 * Usage:
 *   const store = await CacheStore.open({ root, dbPath, capacity, encoderVersion });
 *   await store.registerSource(source);
 *   await store.put({ sourceId, geometry: '32x32', encoderVersion, sequence });
 *   const lookup = await store.get(sourceId, '32x32');
 *   if (lookup.status === 'hit') stream(lookup.artifact.sequence);
 */

import path from 'node:path';
import fse from 'fs-extra';
import { sql, type Kysely, type Selectable, type Transaction } from 'kysely';
import type {
  ArtifactKey,
  ArtifactMetadata,
  CacheCapacity,
  CacheLookup,
  CacheStats,
  FrameArtifact,
  PutResult,
  SourceListing,
} from '@t/cache-types';
import type { FrameSequence, SourceMedia } from '@t/media-types';
import { ARTIFACT_EXTENSION, TEMP_FILE_MARKER } from '@utils/constants';
import { createId } from '@utils/create-id';
import { CapacityError, getErrorMessage, StorageError } from '@utils/errors';
import { formatBytes } from '@utils/format-bytes';
import { logger } from '@utils/logger';
import { artifactByteSize, deserializeArtifact, serializeArtifact } from './artifact-format';
import {
  openDatabase,
  type ArtifactsTable,
  type PixelcastDatabase,
  type SourcesTable,
} from './cache-database';

type ArtifactRow = Selectable<ArtifactsTable>;
type SourceRow = Selectable<SourcesTable>;

interface PutTransactionResult {
  status: 'stored' | 'unchanged';
  row: ArtifactRow;
  /** Replaced and evicted rows, whose files go after commit */
  removed: ArtifactRow[];
  evicted: ArtifactRow[];
}

export interface CacheStoreOptions {
  /** Directory holding `<geometry>/<sourceId>.<encoderVersion>.frames` */
  root: string;
  dbPath: string;
  capacity: CacheCapacity;
  /** Encoder version `get` and `peek` look up */
  encoderVersion: string;
  /**
   * Files younger than this are never reclaimed as orphans, since another
   * process may be between rename and commit.
   */
  orphanGraceMs?: number;
  now?: () => number;
}

export interface ListArtifactsFilter {
  geometry?: string;
  sourceId?: string;
}

const DEFAULT_ORPHAN_GRACE_MS = 60_000;
const SOURCE_PREFIX_PATTERN = /^[0-9a-f]{8,63}$/;

function toSource(row: SourceRow): SourceMedia {
  return {
    id: row.id,
    filename: row.filename,
    path: row.path,
    kind: row.kind,
    byteSize: row.byte_size,
    ingestedAt: row.ingested_at,
  };
}

function toMetadata(row: ArtifactRow): ArtifactMetadata {
  return {
    sourceId: row.source_id,
    geometry: row.geometry,
    encoderVersion: row.encoder_version,
    width: row.width,
    height: row.height,
    frameCount: row.frame_count,
    loop: row.loop === 1,
    byteSize: row.byte_size,
    createdAt: row.created_at,
    lastServedAt: row.last_served_at,
    servedCount: row.served_count,
  };
}

function toKey(row: ArtifactRow): ArtifactKey {
  return {
    sourceId: row.source_id,
    geometry: row.geometry,
    encoderVersion: row.encoder_version,
  };
}

/**
 * Relative file path of an artifact under the cache root.
 *
 * @example
 * artifactRelativePath({ sourceId: 'ab12…', geometry: '32x32', encoderVersion: 'rgb888-v1' });
 * // '32x32/ab12….rgb888-v1.frames'
 */
export function artifactRelativePath(key: ArtifactKey): string {
  return path.join(key.geometry, `${key.sourceId}.${key.encoderVersion}${ARTIFACT_EXTENSION}`);
}

export class CacheStore {
  private readonly now: () => number;
  private readonly orphanGraceMs: number;
  private closed = false;

  private constructor(
    private readonly db: Kysely<PixelcastDatabase>,
    private readonly options: CacheStoreOptions
  ) {
    this.now = options.now ?? Date.now;
    this.orphanGraceMs = options.orphanGraceMs ?? DEFAULT_ORPHAN_GRACE_MS;
  }

  /**
   * Open the store, then repair rows without files and reclaim files
   * without rows.
   *
   * @throws StorageError when the metadata store cannot be opened
   */
  static async open(options: CacheStoreOptions): Promise<CacheStore> {
    try {
      await fse.ensureDir(options.root);
    } catch (error) {
      throw new StorageError(`Cannot create cache root ${options.root}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const db = await openDatabase(options.dbPath);
    const store = new CacheStore(db, options);

    const repaired = await store.repair();
    const reclaimed = await store.reclaimOrphans();
    const stats = await store.stats();

    logger.info('cache', 'Cache store opened', {
      root: options.root,
      artifacts: stats.artifactCount,
      size: formatBytes(stats.totalBytes),
      repaired,
      reclaimed,
    });
    return store;
  }

  /** Underlying database, shared with the scheduler's job store. */
  get database(): Kysely<PixelcastDatabase> {
    return this.db;
  }

  get encoderVersion(): string {
    return this.options.encoderVersion;
  }

  get capacity(): CacheCapacity {
    return this.options.capacity;
  }

  // ==========================================================================
  // Sources
  // ==========================================================================

  /**
   * Register a source. Registering the same content again only refreshes
   * its filename and path.
   */
  async registerSource(source: SourceMedia): Promise<SourceMedia> {
    await this.db
      .insertInto('sources')
      .values({
        id: source.id,
        filename: source.filename,
        path: source.path,
        kind: source.kind,
        byte_size: source.byteSize,
        ingested_at: source.ingestedAt,
      })
      .onConflict((oc) =>
        oc.column('id').doUpdateSet({ filename: source.filename, path: source.path })
      )
      .execute();

    const row = await this.db
      .selectFrom('sources')
      .selectAll()
      .where('id', '=', source.id)
      .executeTakeFirstOrThrow();
    return toSource(row);
  }

  async getSource(id: string): Promise<SourceMedia | null> {
    const row = await this.db.selectFrom('sources').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toSource(row) : null;
  }

  /**
   * Resolve a client selector: full id, id prefix (8+ hex digits), filename,
   * or filename without extension (case-insensitive).
   */
  async findSource(selector: string): Promise<SourceMedia | null> {
    const wanted = selector.trim();
    if (wanted === '') {
      return null;
    }

    const byId = await this.getSource(wanted.toLowerCase());
    if (byId) {
      return byId;
    }

    if (SOURCE_PREFIX_PATTERN.test(wanted.toLowerCase())) {
      const matches = await this.db
        .selectFrom('sources')
        .selectAll()
        .where('id', 'like', `${wanted.toLowerCase()}%`)
        .limit(2)
        .execute();
      if (matches.length === 1) {
        return toSource(matches[0]);
      }
    }

    const lower = wanted.toLowerCase();
    const rows = await this.db
      .selectFrom('sources')
      .selectAll()
      .orderBy('ingested_at', 'asc')
      .execute();
    const match =
      rows.find((row) => row.filename === wanted) ??
      rows.find((row) => row.filename.toLowerCase() === lower) ??
      rows.find((row) => path.parse(row.filename).name.toLowerCase() === lower);
    return match ? toSource(match) : null;
  }

  async listSources(): Promise<SourceMedia[]> {
    const rows = await this.db
      .selectFrom('sources')
      .selectAll()
      .orderBy('filename', 'asc')
      .orderBy('id', 'asc')
      .execute();
    return rows.map(toSource);
  }

  // ==========================================================================
  // Artifacts
  // ==========================================================================

  /**
   * Store an artifact.
   *
   * Idempotent: when a row for the same (source, geometry, encoder version)
   * exists, nothing is written and `unchanged` is returned. Rows of other
   * encoder versions for the same source and geometry are replaced.
   *
   * @throws CapacityError when the artifact cannot fit even in an empty cache
   * @throws StorageError when the source is unknown or the write fails
   */
  async put(artifact: FrameArtifact): Promise<PutResult> {
    this.assertOpen();
    const { capacity } = this.options;
    const byteSize = artifactByteSize(artifact.sequence);

    if (capacity.maxArtifacts < 1) {
      throw new CapacityError('Cache capacity allows no artifacts', byteSize, capacity.maxBytes);
    }
    if (capacity.maxBytes !== null && byteSize > capacity.maxBytes) {
      throw new CapacityError(
        `Artifact of ${formatBytes(byteSize)} exceeds cache capacity of ${formatBytes(capacity.maxBytes)}`,
        byteSize,
        capacity.maxBytes
      );
    }

    const existing = await this.findRow(artifact);
    if (existing) {
      if (await fse.pathExists(this.absolutePath(existing.file_path))) {
        return { status: 'unchanged', metadata: toMetadata(existing) };
      }
      logger.warn('cache', 'Artifact file missing, rewriting', toKey(existing));
      await this.deleteRow(this.db, toKey(existing));
    }

    const source = await this.getSource(artifact.sourceId);
    if (!source) {
      throw new StorageError(`Cannot store artifact for unknown source ${artifact.sourceId}`);
    }

    const relativePath = artifactRelativePath(artifact);
    const finalPath = this.absolutePath(relativePath);
    const tempPath = `${finalPath}${TEMP_FILE_MARKER}${createId()}`;
    const bytes = serializeArtifact(artifact.sequence);

    try {
      await fse.ensureDir(path.dirname(finalPath));
      await fse.writeFile(tempPath, bytes);
      await fse.rename(tempPath, finalPath);
    } catch (error) {
      await fse.remove(tempPath);
      throw new StorageError(`Cannot write artifact file: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const createdAt = this.now();
    const result = await this.db.transaction().execute(async (trx): Promise<PutTransactionResult> => {
      const raced = await this.findRow(artifact, trx);
      if (raced) {
        return { status: 'unchanged', row: raced, removed: [], evicted: [] };
      }

      const replaced = await trx
        .selectFrom('artifacts')
        .selectAll()
        .where('source_id', '=', artifact.sourceId)
        .where('geometry', '=', artifact.geometry)
        .where('encoder_version', '!=', artifact.encoderVersion)
        .execute();
      for (const row of replaced) {
        await this.deleteRow(trx, toKey(row));
      }

      const evicted = await this.evictFor(trx, byteSize);

      const row: ArtifactRow = {
        source_id: artifact.sourceId,
        geometry: artifact.geometry,
        encoder_version: artifact.encoderVersion,
        width: artifact.sequence.width,
        height: artifact.sequence.height,
        frame_count: artifact.sequence.frames.length,
        loop: artifact.sequence.loop ? 1 : 0,
        byte_size: byteSize,
        file_path: relativePath,
        created_at: createdAt,
        last_served_at: null,
        served_count: 0,
      };
      await trx.insertInto('artifacts').values(row).execute();

      return { status: 'stored', row, removed: [...replaced, ...evicted], evicted };
    });

    for (const row of result.removed) {
      await this.removeFile(row.file_path);
    }

    if (result.status === 'unchanged') {
      return { status: 'unchanged', metadata: toMetadata(result.row) };
    }

    if (result.evicted.length > 0) {
      logger.info('cache', 'Evicted least recently served artifacts', {
        evicted: result.evicted.map((row) => `${row.source_id.slice(0, 8)}@${row.geometry}`),
      });
    }
    logger.debug('cache', 'Artifact stored', {
      sourceId: artifact.sourceId,
      geometry: artifact.geometry,
      size: formatBytes(byteSize),
    });

    return {
      status: 'stored',
      metadata: toMetadata(result.row),
      evicted: result.evicted.map(toKey),
    };
  }

  /**
   * Load an artifact for serving and record the serve.
   *
   * A row whose file is missing or unreadable is dropped and reported as a miss.
   */
  async get(sourceId: string, geometry: string): Promise<CacheLookup> {
    this.assertOpen();
    const key: ArtifactKey = { sourceId, geometry, encoderVersion: this.options.encoderVersion };
    const row = await this.findRow(key);
    if (!row) {
      return { status: 'miss' };
    }

    let sequence: FrameSequence;
    try {
      sequence = deserializeArtifact(await fse.readFile(this.absolutePath(row.file_path)));
    } catch (error) {
      logger.warn('cache', 'Dropping unreadable artifact', {
        ...key,
        error: getErrorMessage(error),
      });
      await this.deleteRow(this.db, key);
      await this.removeFile(row.file_path);
      return { status: 'miss' };
    }

    const servedAt = this.now();
    await this.db
      .updateTable('artifacts')
      .set({ last_served_at: servedAt, served_count: sql<number>`served_count + 1` })
      .where('source_id', '=', sourceId)
      .where('geometry', '=', geometry)
      .where('encoder_version', '=', key.encoderVersion)
      .execute();

    return {
      status: 'hit',
      artifact: {
        metadata: {
          ...toMetadata(row),
          lastServedAt: servedAt,
          servedCount: row.served_count + 1,
        },
        sequence,
      },
    };
  }

  /**
   * Metadata of the current-version artifact, without recording a serve.
   */
  async peek(sourceId: string, geometry: string): Promise<ArtifactMetadata | null> {
    const row = await this.findRow({
      sourceId,
      geometry,
      encoderVersion: this.options.encoderVersion,
    });
    return row ? toMetadata(row) : null;
  }

  /**
   * Remove a source and every artifact of it. Returns false for an unknown id.
   */
  async delete(sourceId: string): Promise<boolean> {
    this.assertOpen();
    const removed = await this.db.transaction().execute(async (trx) => {
      const rows = await trx
        .selectFrom('artifacts')
        .selectAll()
        .where('source_id', '=', sourceId)
        .execute();
      await trx.deleteFrom('artifacts').where('source_id', '=', sourceId).execute();
      const deleted = await trx.deleteFrom('sources').where('id', '=', sourceId).executeTakeFirst();
      return { rows, existed: Number(deleted.numDeletedRows) > 0 };
    });

    for (const row of removed.rows) {
      await this.removeFile(row.file_path);
    }

    if (removed.existed) {
      logger.info('cache', 'Source deleted', {
        sourceId,
        artifacts: removed.rows.length,
      });
    }
    return removed.existed;
  }

  /**
   * Every source with its artifact metadata. No frame bytes are read.
   */
  async list(): Promise<SourceListing[]> {
    const sources = await this.listSources();
    const artifacts = await this.listArtifacts();
    const bySource = new Map<string, ArtifactMetadata[]>();

    for (const artifact of artifacts) {
      const list = bySource.get(artifact.sourceId) ?? [];
      list.push(artifact);
      bySource.set(artifact.sourceId, list);
    }

    return sources.map((source) => ({ source, artifacts: bySource.get(source.id) ?? [] }));
  }

  async listArtifacts(filter: ListArtifactsFilter = {}): Promise<ArtifactMetadata[]> {
    let query = this.db.selectFrom('artifacts').selectAll();
    if (filter.geometry !== undefined) {
      query = query.where('geometry', '=', filter.geometry);
    }
    if (filter.sourceId !== undefined) {
      query = query.where('source_id', '=', filter.sourceId);
    }

    const rows = await query
      .orderBy('source_id', 'asc')
      .orderBy('geometry', 'asc')
      .orderBy('encoder_version', 'asc')
      .execute();
    return rows.map(toMetadata);
  }

  async stats(): Promise<CacheStats> {
    const totals = await this.db
      .selectFrom('artifacts')
      .select([
        sql<number>`count(*)`.as('count'),
        sql<number>`coalesce(sum(byte_size), 0)`.as('bytes'),
      ])
      .executeTakeFirstOrThrow();
    const sources = await this.db
      .selectFrom('sources')
      .select(sql<number>`count(*)`.as('count'))
      .executeTakeFirstOrThrow();

    return {
      sourceCount: sources.count,
      artifactCount: totals.count,
      totalBytes: totals.bytes,
      maxArtifacts: this.options.capacity.maxArtifacts,
      maxBytes: this.options.capacity.maxBytes,
    };
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Delete temp files and artifact files that no row refers to.
   *
   * Only subdirectories of the root are scanned; files younger than the
   * grace period are left alone. Returns the number of files removed.
   */
  async reclaimOrphans(): Promise<number> {
    const rows = await this.db.selectFrom('artifacts').select('file_path').execute();
    const known = new Set(rows.map((row) => path.normalize(row.file_path)));
    const cutoff = this.now() - this.orphanGraceMs;
    let removed = 0;

    for (const dirName of await fse.readdir(this.options.root)) {
      const dir = path.join(this.options.root, dirName);
      const dirStat = await fse.stat(dir).catch(() => null);
      if (!dirStat?.isDirectory()) continue;

      for (const name of await fse.readdir(dir)) {
        const relative = path.join(dirName, name);
        const isTemp = name.includes(TEMP_FILE_MARKER);
        const isOrphan = name.endsWith(ARTIFACT_EXTENSION) && !known.has(relative);
        if (!isTemp && !isOrphan) continue;

        const filePath = path.join(dir, name);
        const stat = await fse.stat(filePath).catch(() => null);
        if (!stat || stat.mtimeMs > cutoff) continue;

        await fse.remove(filePath);
        removed++;
        logger.debug('cache', 'Reclaimed orphan file', { file: relative });
      }
    }

    if (removed > 0) {
      logger.info('cache', 'Reclaimed orphan files', { removed });
    }
    return removed;
  }

  /**
   * Drop rows whose file has disappeared. Returns the number of rows dropped.
   */
  async repair(): Promise<number> {
    const rows = await this.db.selectFrom('artifacts').selectAll().execute();
    let dropped = 0;

    for (const row of rows) {
      if (await fse.pathExists(this.absolutePath(row.file_path))) continue;
      await this.deleteRow(this.db, toKey(row));
      dropped++;
      logger.warn('cache', 'Artifact file missing, dropping row', toKey(row));
    }
    return dropped;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.db.destroy();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError('Cache store is closed');
    }
  }

  private absolutePath(relativePath: string): string {
    return path.join(this.options.root, relativePath);
  }

  private async findRow(
    key: ArtifactKey,
    db: Kysely<PixelcastDatabase> | Transaction<PixelcastDatabase> = this.db
  ): Promise<ArtifactRow | undefined> {
    return db
      .selectFrom('artifacts')
      .selectAll()
      .where('source_id', '=', key.sourceId)
      .where('geometry', '=', key.geometry)
      .where('encoder_version', '=', key.encoderVersion)
      .executeTakeFirst();
  }

  private async deleteRow(
    db: Kysely<PixelcastDatabase> | Transaction<PixelcastDatabase>,
    key: ArtifactKey
  ): Promise<void> {
    await db
      .deleteFrom('artifacts')
      .where('source_id', '=', key.sourceId)
      .where('geometry', '=', key.geometry)
      .where('encoder_version', '=', key.encoderVersion)
      .execute();
  }

  /**
   * Delete least recently served rows until one more artifact of `byteSize`
   * fits. Never-served rows go first, oldest first. Returns the removed rows; their files are unlinked after commit.
   */
  private async evictFor(
    trx: Transaction<PixelcastDatabase>,
    byteSize: number
  ): Promise<ArtifactRow[]> {
    const { maxArtifacts, maxBytes } = this.options.capacity;
    const evicted: ArtifactRow[] = [];

    for (;;) {
      const totals = await trx
        .selectFrom('artifacts')
        .select([
          sql<number>`count(*)`.as('count'),
          sql<number>`coalesce(sum(byte_size), 0)`.as('bytes'),
        ])
        .executeTakeFirstOrThrow();

      const overCount = totals.count + 1 > maxArtifacts;
      const overBytes = maxBytes !== null && totals.bytes + byteSize > maxBytes;
      if (!overCount && !overBytes) {
        return evicted;
      }

      const victim = await trx
        .selectFrom('artifacts')
        .selectAll()
        .orderBy(sql`coalesce(last_served_at, -1)`, 'asc')
        .orderBy('created_at', 'asc')
        .orderBy('source_id', 'asc')
        .orderBy('geometry', 'asc')
        .limit(1)
        .executeTakeFirst();
      if (!victim) {
        return evicted;
      }

      await this.deleteRow(trx, toKey(victim));
      evicted.push(victim);
    }
  }

  private async removeFile(relativePath: string): Promise<void> {
    try {
      await fse.remove(this.absolutePath(relativePath));
    } catch (error) {
      logger.warn('cache', 'Could not remove artifact file; it will be reclaimed later', {
        file: relativePath,
        error: getErrorMessage(error),
      });
    }
  }
}
