/**
 * Cache Types
 *
 * Artifact identity, metadata rows and the lookup result returned by the
 * cache store. Kysely table shapes live beside the store in
 * `services/cache/cache-database.ts`.
 */

import type { FrameSequence, SourceMedia } from './media-types';

/**
 * Artifact identity. At most one artifact exists per triple.
 */
export interface ArtifactKey {
  sourceId: string;
  /** Geometry tag, e.g. `32x32` */
  geometry: string;
  encoderVersion: string;
}

/**
 * A converted frame sequence ready to be stored
 */
export interface FrameArtifact extends ArtifactKey {
  sequence: FrameSequence;
}

/**
 * Artifact metadata (no frame bytes)
 */
export interface ArtifactMetadata extends ArtifactKey {
  width: number;
  height: number;
  frameCount: number;
  loop: boolean;
  /** Serialized artifact size on disk */
  byteSize: number;
  createdAt: number;
  lastServedAt: number | null;
  servedCount: number;
}

/**
 * A cached artifact with its frames loaded
 */
export interface CachedArtifact {
  metadata: ArtifactMetadata;
  sequence: FrameSequence;
}

/**
 * Result of `CacheStore.get`. A miss is a normal outcome, not an error.
 */
export type CacheLookup = { status: 'hit'; artifact: CachedArtifact } | { status: 'miss' };

/**
 * Result of `CacheStore.put`
 *
 * - `stored`: written, possibly after evicting others
 * - `unchanged`: an artifact for the same triple already existed
 */
export type PutResult =
  | { status: 'stored'; metadata: ArtifactMetadata; evicted: ArtifactKey[] }
  | { status: 'unchanged'; metadata: ArtifactMetadata };

/**
 * One source with all its cached artifacts, as listed for the catalog
 */
export interface SourceListing {
  source: SourceMedia;
  artifacts: ArtifactMetadata[];
}

export interface CacheStats {
  sourceCount: number;
  artifactCount: number;
  totalBytes: number;
  maxArtifacts: number;
  maxBytes: number | null;
}

/**
 * Capacity bound. Either limit may be absent (null); at least one applies.
 */
export interface CacheCapacity {
  maxArtifacts: number;
  maxBytes: number | null;
}
