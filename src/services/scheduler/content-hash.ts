/**
 * Content hashing for source identity
 *
 * A source is identified by the SHA-256 of its bytes, so re-uploading the
 * same file under another name never converts it twice.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

/**
 * Compute the SHA-256 of a file, streaming it from disk.
 *
 * @returns Lowercase hex digest
 */
export async function computeContentHash(filePath: string): Promise<string> {
  const hash = createHash('sha256');

  await new Promise<void>((resolve, reject) => {
    createReadStream(filePath)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', resolve);
  });

  return hash.digest('hex');
}

/**
 * Compute the SHA-256 of an in-memory buffer.
 */
export function computeContentHashFromBuffer(buffer: Uint8Array): string {
  return createHash('sha256').update(buffer).digest('hex');
}
