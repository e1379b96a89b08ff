import path from 'node:path';
import fse from 'fs-extra';
import { detectMediaKind, isSupportedMediaFile } from '@services/codec/media-kind';
import type { MediaKind } from '@t/media-types';
import { getErrorMessage } from '@utils/errors';
import { logger } from '@utils/logger';
import { computeContentHash } from './content-hash';

export interface ScannedFile {
  /** Content hash */
  id: string;
  filename: string;
  path: string;
  kind: MediaKind;
  byteSize: number;
  mtimeMs: number;
}

export interface ScanResult {
  files: ScannedFile[];
  /** Paths that could not be read this time; their sources are kept */
  skipped: string[];
}

interface HashCacheEntry {
  byteSize: number;
  mtimeMs: number;
  id: string;
  kind: MediaKind;
}

/**
 * Lists supported media in the source directory (not recursive).
 *
 * Hashes are memoized by (path, size, mtime), so a rescan only reads files
 * that changed.
 */
export class SourceScanner {
  private hashCache = new Map<string, HashCacheEntry>();

  constructor(readonly sourceDir: string) {}

  /**
   * @throws Error when the source directory cannot be read; callers must not
   * treat that as "every source was deleted"
   */
  async scan(): Promise<ScanResult> {
    await fse.ensureDir(this.sourceDir);
    const names = (await fse.readdir(this.sourceDir)).filter(isSupportedMediaFile).sort();
    const files: ScannedFile[] = [];
    const skipped: string[] = [];
    const live = new Set<string>();

    for (const filename of names) {
      const filePath = path.join(this.sourceDir, filename);
      try {
        const stat = await fse.stat(filePath);
        if (!stat.isFile()) continue;

        live.add(filePath);
        const entry = await this.identify(filePath, stat.size, stat.mtimeMs);
        files.push({
          id: entry.id,
          filename,
          path: filePath,
          kind: entry.kind,
          byteSize: stat.size,
          mtimeMs: stat.mtimeMs,
        });
      } catch (error) {
        live.add(filePath);
        skipped.push(filePath);
        logger.warn('scheduler', 'Skipping unreadable source file', {
          filename,
          error: getErrorMessage(error),
        });
      }
    }

    for (const cached of this.hashCache.keys()) {
      if (!live.has(cached)) {
        this.hashCache.delete(cached);
      }
    }

    return { files, skipped };
  }

  /**
   * Forget memoized hashes for a path, e.g. after deleting it.
   */
  forget(filePath: string): void {
    this.hashCache.delete(filePath);
  }

  private async identify(filePath: string, byteSize: number, mtimeMs: number): Promise<HashCacheEntry> {
    const cached = this.hashCache.get(filePath);
    if (cached && cached.byteSize === byteSize && cached.mtimeMs === mtimeMs) {
      return cached;
    }

    const id = await computeContentHash(filePath);
    const kind = (await detectMediaKind(filePath)) ?? 'still';
    const entry = { byteSize, mtimeMs, id, kind };
    this.hashCache.set(filePath, entry);
    logger.debug('scheduler', 'Hashed source file', {
      filename: path.basename(filePath),
      id: id.slice(0, 12),
      kind,
    });
    return entry;
  }
}
