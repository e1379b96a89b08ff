import { MIN_CROP_FRACTION } from '@utils/constants';

/** Visible area of a frame, in source pixels */
export interface CropArea {
  width: number;
  height: number;
  x: number;
  y: number;
}

/** Border detection: pixels darker than 24/255 count as black */
export const CROPDETECT_FILTER = 'cropdetect=limit=24:round=2:reset=0';

const CROP_PATTERN = /crop=(\d+):(\d+):(\d+):(\d+)/g;

/**
 * Last `crop=w:h:x:y` suggestion in cropdetect's log output.
 */
export const parseCropDetect = (log: string): CropArea | null => {
  let last: CropArea | null = null;
  for (const match of log.matchAll(CROP_PATTERN)) {
    last = {
      width: Number(match[1]),
      height: Number(match[2]),
      x: Number(match[3]),
      y: Number(match[4]),
    };
  }
  return last;
};

/**
 * Keep a detected crop only when it removes something, stays inside the
 * frame and keeps at least MIN_CROP_FRACTION of each side.
 *
 * @example
 * acceptCrop({ width: 320, height: 180, x: 0, y: 30 }, 320, 240); // kept
 * acceptCrop({ width: 320, height: 240, x: 0, y: 0 }, 320, 240); // null
 */
export const acceptCrop = (crop: CropArea | null, width: number, height: number): CropArea | null => {
  if (!crop || (crop.width === width && crop.height === height)) {
    return null;
  }
  if (crop.x + crop.width > width || crop.y + crop.height > height) {
    return null;
  }
  if (crop.width < width * MIN_CROP_FRACTION || crop.height < height * MIN_CROP_FRACTION) {
    return null;
  }
  return crop;
};

/**
 * Build the video filter chain for raw frame extraction.
 *
 * Samples at `fps`, crops black borders when a crop is given, then scales so
 * the long side is at most `maxDimension` (never upscales). Odd sizes are
 * fine: rgb24 has no chroma subsampling.
 *
 * @example
 * buildDecodeFilter(15, 320, 240, 256); // 'fps=15,scale=256:192:flags=lanczos'
 * buildDecodeFilter(15, 64, 48, 256); // 'fps=15'
 * buildDecodeFilter(15, 64, 48, 256, { width: 64, height: 36, x: 0, y: 6 }); // 'fps=15,crop=64:36:0:6'
 */
export const buildDecodeFilter = (
  fps: number,
  width: number,
  height: number,
  maxDimension: number,
  crop: CropArea | null = null
): string => {
  const filters = [`fps=${fps}`];
  let visibleWidth = width;
  let visibleHeight = height;
  if (crop) {
    filters.push(`crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`);
    visibleWidth = crop.width;
    visibleHeight = crop.height;
  }

  const { width: outWidth, height: outHeight } = fitWithin(visibleWidth, visibleHeight, maxDimension);
  if (outWidth !== visibleWidth || outHeight !== visibleHeight) {
    filters.push(`scale=${outWidth}:${outHeight}:flags=lanczos`);
  }

  return filters.join(',');
};

/**
 * Scale a size down so its long side is at most `maxDimension`.
 * Each side stays at least 1 pixel.
 */
export const fitWithin = (
  width: number,
  height: number,
  maxDimension: number
): { width: number; height: number } => {
  const longSide = Math.max(width, height);
  if (longSide <= maxDimension) {
    return { width, height };
  }

  const ratio = maxDimension / longSide;
  return {
    width: Math.max(1, Math.round(width * ratio)),
    height: Math.max(1, Math.round(height * ratio)),
  };
};
