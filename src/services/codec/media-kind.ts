import path from 'node:path';
import sharp from 'sharp';
import type { MediaKind } from '@t/media-types';
import { IMAGE_EXTENSIONS, TEMP_FILE_MARKER, VIDEO_EXTENSIONS } from '@utils/constants';
import { getErrorMessage } from '@utils/errors';
import { logger } from '@utils/logger';

export type MediaFamily = 'image' | 'video';

/**
 * Lowercased extension without the dot.
 *
 * @example
 * getExtension('/media/Nyan.GIF'); // 'gif'
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Decoder family by extension, or null for unsupported files.
 */
export function getMediaFamily(filePath: string): MediaFamily | null {
  const extension = getExtension(filePath);
  if (IMAGE_EXTENSIONS.includes(extension)) {
    return 'image';
  }
  if (VIDEO_EXTENSIONS.includes(extension)) {
    return 'video';
  }
  return null;
}

/**
 * True for files the scanner should pick up: a supported extension, not
 * hidden and not a temp file of an in-progress upload.
 */
export function isSupportedMediaFile(filename: string): boolean {
  const base = path.basename(filename);
  if (base.startsWith('.') || base.includes(TEMP_FILE_MARKER)) {
    return false;
  }
  return getMediaFamily(base) !== null;
}

/**
 * Detect the media kind of a supported file.
 *
 * Videos are recognized by extension. Images are `animated` when they carry
 * more than one page. An image whose header cannot be read is reported as
 * `still`; the decoder raises the real error when the job runs.
 */
export async function detectMediaKind(filePath: string): Promise<MediaKind | null> {
  const family = getMediaFamily(filePath);
  if (family === null) {
    return null;
  }
  if (family === 'video') {
    return 'video';
  }

  try {
    const metadata = await sharp(filePath).metadata();
    return (metadata.pages ?? 1) > 1 ? 'animated' : 'still';
  } catch (error) {
    logger.warn('codec', 'Could not read image header, assuming still', {
      filePath,
      error: getErrorMessage(error),
    });
    return 'still';
  }
}
