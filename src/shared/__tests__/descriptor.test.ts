import { parseDescriptor, toPositiveInt } from '../descriptor';
import { DescriptorFormatError } from '../errors';

describe('toPositiveInt', () => {
  it('should accept positive numbers and numeric strings', () => {
    expect(toPositiveInt(42)).toBe(42);
    expect(toPositiveInt('42')).toBe(42);
    expect(toPositiveInt(' 42 ')).toBe(42);
    expect(toPositiveInt(42.9)).toBe(42);
  });

  it('should reject everything else', () => {
    expect(toPositiveInt(0)).toBeUndefined();
    expect(toPositiveInt(-3)).toBeUndefined();
    expect(toPositiveInt(0.5)).toBeUndefined();
    expect(toPositiveInt('')).toBeUndefined();
    expect(toPositiveInt('abc')).toBeUndefined();
    expect(toPositiveInt('0x10')).toBeUndefined();
    expect(toPositiveInt('1e3')).toBeUndefined();
    expect(toPositiveInt('480.0')).toBeUndefined();
    expect(toPositiveInt(Infinity)).toBeUndefined();
    expect(toPositiveInt(null)).toBeUndefined();
    expect(toPositiveInt(undefined)).toBeUndefined();
    expect(toPositiveInt({})).toBeUndefined();
  });
});

describe('parseDescriptor', () => {
  it('should parse a minimal descriptor', () => {
    const descriptor = parseDescriptor({ width: 2000, height: 1500 });

    expect(descriptor.width).toBe(2000);
    expect(descriptor.height).toBe(1500);
    expect(descriptor.tileSpecs).toEqual([]);
    expect(descriptor.maxArea).toBeUndefined();
  });

  it('should coerce string dimensions', () => {
    const descriptor = parseDescriptor({ width: '640', height: '480' });
    expect(descriptor.width).toBe(640);
    expect(descriptor.height).toBe(480);
  });

  it('should parse advertised tiles and drop malformed entries', () => {
    const descriptor = parseDescriptor({
      width: 100,
      height: 100,
      tiles: [
        { width: 512, scaleFactors: [1, 2, 4] },
        'not a tile',
        null,
        { tileWidth: 256, tileHeight: '128', overlap: 2, scaleFactors: [2, 'x'] }
      ]
    });

    expect(descriptor.tileSpecs).toHaveLength(2);
    expect(descriptor.tileSpecs[0]).toEqual({ width: 512, scaleFactors: [1, 2, 4] });
    expect(descriptor.tileSpecs[1]).toEqual({
      tileWidth: 256,
      tileHeight: 128,
      overlap: 2,
      scaleFactors: [2]
    });
  });

  it('should ignore a tiles field that is not an array', () => {
    expect(parseDescriptor({ width: 10, height: 10, tiles: { width: 5 } }).tileSpecs).toEqual([]);
  });

  it('should read maxArea when it is a positive integer', () => {
    expect(parseDescriptor({ width: 10, height: 10, maxArea: 500000 }).maxArea).toBe(500000);
    expect(parseDescriptor({ width: 10, height: 10, maxArea: '500000' }).maxArea).toBe(500000);
    expect(parseDescriptor({ width: 10, height: 10, maxArea: -1 }).maxArea).toBeUndefined();
  });

  it('should reject descriptors without usable dimensions', () => {
    expect(() => parseDescriptor({ height: 10 })).toThrow(DescriptorFormatError);
    expect(() => parseDescriptor({ width: 10 })).toThrow(DescriptorFormatError);
    expect(() => parseDescriptor({ width: 0, height: 10 })).toThrow(DescriptorFormatError);
    expect(() => parseDescriptor({ width: 'wide', height: 10 })).toThrow(
      'Image descriptor has invalid dimensions: width="wide", height=10'
    );
  });

  it('should reject non-object bodies', () => {
    expect(() => parseDescriptor([1, 2])).toThrow('Image descriptor is not a JSON object');
    expect(() => parseDescriptor(null)).toThrow(DescriptorFormatError);
    expect(() => parseDescriptor('info')).toThrow(DescriptorFormatError);
  });
});
