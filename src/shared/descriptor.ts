import { DescriptorFormatError } from './errors';
import { ServiceDescriptor, TileSpec } from './types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a JSON value to a positive integer, truncating fractions.
 * Strings of decimal digits are accepted; anything else yields undefined.
 */
export function toPositiveInt(value: unknown): number | undefined {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    n = Number(value.trim());
  } else {
    return undefined;
  }
  if (!Number.isFinite(n)) return undefined;
  const truncated = Math.trunc(n);
  return truncated > 0 ? truncated : undefined;
}

function parseTileSpec(raw: unknown): TileSpec | null {
  if (!isObject(raw)) return null;

  const scaleFactors = Array.isArray(raw.scaleFactors)
    ? raw.scaleFactors.filter((sf): sf is number => typeof sf === 'number')
    : [];

  const overlap = typeof raw.overlap === 'number' && raw.overlap >= 0
    ? Math.trunc(raw.overlap)
    : undefined;

  return {
    width: toPositiveInt(raw.width),
    height: toPositiveInt(raw.height),
    tileWidth: toPositiveInt(raw.tileWidth),
    tileHeight: toPositiveInt(raw.tileHeight),
    overlap,
    scaleFactors
  };
}

/**
 * Parse an info.json body into a ServiceDescriptor.
 * Only width and height are required; malformed tile entries are dropped
 * and an unusable maxArea is ignored.
 */
export function parseDescriptor(json: unknown): ServiceDescriptor {
  if (!isObject(json)) {
    throw new DescriptorFormatError('Image descriptor is not a JSON object');
  }

  const width = toPositiveInt(json.width);
  const height = toPositiveInt(json.height);
  if (width === undefined || height === undefined) {
    throw new DescriptorFormatError(
      `Image descriptor has invalid dimensions: width=${JSON.stringify(json.width)}, height=${JSON.stringify(json.height)}`
    );
  }

  const tileSpecs = Array.isArray(json.tiles)
    ? json.tiles.map(parseTileSpec).filter((spec): spec is TileSpec => spec !== null)
    : [];

  return {
    width,
    height,
    tileSpecs,
    maxArea: toPositiveInt(json.maxArea)
  };
}
