import { TILE_CONFIG } from './config';
import { ServiceDescriptor, TileGeometry, TileSizePreference, TileSpec } from './types';

/**
 * Pick the advertised tile spec used for full-resolution requests:
 * the first one offering scale factor 1, else the first one.
 */
export function selectTileSpec(tileSpecs: TileSpec[]): TileSpec | undefined {
  return tileSpecs.find(spec => spec.scaleFactors.includes(1)) ?? tileSpecs[0];
}

/**
 * Shrink a tile so its area fits within the server's maxArea,
 * keeping the tile's aspect ratio.
 */
export function respectMaxArea(
  tileWidth: number,
  tileHeight: number,
  maxArea?: number
): { tileWidth: number; tileHeight: number } {
  const area = tileWidth * tileHeight;
  if (!maxArea || area <= maxArea) {
    return { tileWidth, tileHeight };
  }

  const scale = Math.sqrt(maxArea / area);
  return {
    tileWidth: Math.max(1, Math.floor(tileWidth * scale)),
    tileHeight: Math.max(1, Math.floor(tileHeight * scale))
  };
}

export function resolveTileGeometry(
  descriptor: ServiceDescriptor,
  preference: TileSizePreference = 'auto'
): TileGeometry {
  let tileWidth: number;
  let tileHeight: number;
  let overlap = 0;

  const spec = selectTileSpec(descriptor.tileSpecs);
  if (spec) {
    // Advertised tiles win over any user preference
    tileWidth = spec.width ?? spec.tileWidth ?? TILE_CONFIG.FALLBACK_TILE_WIDTH;
    tileHeight = spec.height ?? spec.tileHeight ?? tileWidth;
    overlap = spec.overlap ?? 0;
  } else {
    const size = preference === 'auto' ? TILE_CONFIG.DEFAULT_TILE_SIZE : preference;
    tileWidth = size;
    tileHeight = size;
  }

  return {
    ...respectMaxArea(tileWidth, tileHeight, descriptor.maxArea),
    overlap
  };
}
