/**
 * Format bytes to human-readable string
 *
 * Binary units (1 KB = 1024 bytes), one decimal place. Used for cache
 * capacity logs and the catalog listing.
 *
 * @example
 * formatBytes(0)          // "0 B"
 * formatBytes(512)        // "512 B"
 * formatBytes(1536)       // "1.5 KB"
 * formatBytes(1048576)    // "1.0 MB"
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  if (i === 0) return `${bytes} B`;
  return `${(bytes / k ** i).toFixed(1)} ${sizes[i]}`;
}
