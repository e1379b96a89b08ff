import type { TargetGeometry } from '@t/media-types';
import { MAX_GEOMETRY_DIMENSION } from '@utils/constants';
import { ConfigurationError } from '@utils/errors';

const GEOMETRY_PATTERN = /^\s*(\d+)\s*[xX×]\s*(\d+)\s*$/;

export function geometryTag(width: number, height: number): string {
  return `${width}x${height}`;
}

/**
 * Validate a width/height pair and build its geometry.
 *
 * @throws ConfigurationError for zero, negative, fractional or oversized sides
 */
export function createGeometry(width: number, height: number): TargetGeometry {
  for (const [label, value] of [
    ['width', width],
    ['height', height],
  ] as const) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`Geometry ${label} must be a positive integer, got ${value}`);
    }
    if (value > MAX_GEOMETRY_DIMENSION) {
      throw new ConfigurationError(
        `Geometry ${label} ${value} exceeds the maximum of ${MAX_GEOMETRY_DIMENSION}`
      );
    }
  }

  return { tag: geometryTag(width, height), width, height };
}

/**
 * Parse a `<w>x<h>` tag.
 *
 * @example
 * parseGeometry('53x11'); // { tag: '53x11', width: 53, height: 11 }
 */
export function parseGeometry(tag: string): TargetGeometry {
  const match = GEOMETRY_PATTERN.exec(tag);
  if (!match) {
    throw new ConfigurationError(`Invalid geometry '${tag}', expected <width>x<height>`);
  }
  return createGeometry(Number(match[1]), Number(match[2]));
}

/**
 * Parse a comma-separated geometry list, dropping duplicates and keeping order.
 *
 * @example
 * parseGeometryList('32x32, 16x16,32x32').map((g) => g.tag); // ['32x32', '16x16']
 */
export function parseGeometryList(list: string): TargetGeometry[] {
  const seen = new Set<string>();
  const geometries: TargetGeometry[] = [];

  for (const part of list.split(',')) {
    if (part.trim() === '') continue;
    const geometry = parseGeometry(part);
    if (seen.has(geometry.tag)) continue;
    seen.add(geometry.tag);
    geometries.push(geometry);
  }

  if (geometries.length === 0) {
    throw new ConfigurationError('At least one target geometry must be configured');
  }
  return geometries;
}
