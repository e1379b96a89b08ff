import type { CacheStore } from '@services/cache/cache-store';
import type { ArtifactMetadata, CachedArtifact } from '@t/cache-types';
import type { SourceMedia } from '@t/media-types';

/**
 * A cached artifact ready to play, with the source it was made from
 */
export interface PlaybackItem {
  source: SourceMedia;
  artifact: CachedArtifact;
}

/**
 * Result of resolving a client's selector
 *
 * - `ready`: artifact loaded (the serve is recorded)
 * - `missing`: known source, no artifact for the geometry (never converted,
 *   still converting, or evicted)
 * - `unknown`: no source matches the selector
 */
export type NamedLookup =
  | { status: 'ready'; item: PlaybackItem }
  | { status: 'missing'; source: SourceMedia }
  | { status: 'unknown' };

/**
 * Rotation order: least served first, then least recently served (never
 * served first), then source id for a stable order.
 */
export function compareRotation(a: ArtifactMetadata, b: ArtifactMetadata): number {
  if (a.servedCount !== b.servedCount) {
    return a.servedCount - b.servedCount;
  }
  const servedA = a.lastServedAt ?? -1;
  const servedB = b.lastServedAt ?? -1;
  if (servedA !== servedB) {
    return servedA - servedB;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

/**
 * Picks what a session plays next from the cache.
 */
export class ContentSelector {
  constructor(private readonly store: CacheStore) {}

  async lookupNamed(selector: string, geometry: string): Promise<NamedLookup> {
    const source = await this.store.findSource(selector);
    if (!source) {
      return { status: 'unknown' };
    }

    const lookup = await this.store.get(source.id, geometry);
    if (lookup.status === 'miss') {
      return { status: 'missing', source };
    }
    return { status: 'ready', item: { source, artifact: lookup.artifact } };
  }

  /**
   * Next rotation item for a geometry. `previousSourceId` is played again
   * only when it is the sole candidate.
   *
   * @returns null when nothing is cached for the geometry
   */
  async next(geometry: string, previousSourceId: string | null): Promise<PlaybackItem | null> {
    const candidates = (await this.store.listArtifacts({ geometry }))
      .filter((artifact) => artifact.encoderVersion === this.store.encoderVersion)
      .sort(compareRotation);

    const ordered =
      previousSourceId !== null && candidates.length > 1
        ? [
            ...candidates.filter((artifact) => artifact.sourceId !== previousSourceId),
            ...candidates.filter((artifact) => artifact.sourceId === previousSourceId),
          ]
        : candidates;

    for (const candidate of ordered) {
      const source = await this.store.getSource(candidate.sourceId);
      if (!source) continue;

      const lookup = await this.store.get(candidate.sourceId, geometry);
      if (lookup.status === 'hit') {
        return { source, artifact: lookup.artifact };
      }
    }
    return null;
  }
}
