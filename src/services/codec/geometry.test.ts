import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@utils/errors';
import { createGeometry, parseGeometry, parseGeometryList } from './geometry';

describe('parseGeometry', () => {
  it('parses a tag', () => {
    expect(parseGeometry('53x11')).toEqual({ tag: '53x11', width: 53, height: 11 });
  });

  it('accepts upper-case X and surrounding spaces', () => {
    expect(parseGeometry(' 16X16 ').tag).toBe('16x16');
  });

  it('rejects malformed tags', () => {
    expect(() => parseGeometry('32')).toThrow(ConfigurationError);
    expect(() => parseGeometry('axb')).toThrow(ConfigurationError);
  });

  it('rejects zero-sized and oversized geometries', () => {
    expect(() => parseGeometry('0x16')).toThrow(ConfigurationError);
    expect(() => parseGeometry('2048x16')).toThrow(ConfigurationError);
  });
});

describe('createGeometry', () => {
  it('rejects fractional sides', () => {
    expect(() => createGeometry(1.5, 4)).toThrow('Geometry width must be a positive integer, got 1.5');
  });
});

describe('parseGeometryList', () => {
  it('keeps order and drops duplicates', () => {
    expect(parseGeometryList('32x32, 16x16,32x32,53x11').map((g) => g.tag)).toEqual([
      '32x32',
      '16x16',
      '53x11',
    ]);
  });

  it('rejects an empty list', () => {
    expect(() => parseGeometryList(' , ')).toThrow(ConfigurationError);
  });
});
