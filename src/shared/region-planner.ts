import { regionUrl } from './service-url';
import { Region, RegionRequest, TileGeometry } from './types';

/**
 * Partition the image into row-major, non-overlapping regions.
 * Edge regions are clipped to the image bounds.
 */
export function planRegions(width: number, height: number, geometry: TileGeometry): Region[] {
  const { tileWidth, tileHeight } = geometry;
  if (tileWidth < 1 || tileHeight < 1) {
    throw new RangeError(`Invalid tile size ${tileWidth}x${tileHeight}`);
  }

  const regions: Region[] = [];
  for (let y = 0; y < height; y += tileHeight) {
    const h = Math.min(tileHeight, height - y);
    for (let x = 0; x < width; x += tileWidth) {
      regions.push({ x, y, width: Math.min(tileWidth, width - x), height: h });
    }
  }
  return regions;
}

export function buildRegionRequests(
  serviceUrl: string,
  width: number,
  height: number,
  geometry: TileGeometry
): RegionRequest[] {
  return planRegions(width, height, geometry).map(region => ({
    region,
    url: regionUrl(serviceUrl, region)
  }));
}

export function expectedRegionCount(width: number, height: number, geometry: TileGeometry): number {
  return Math.ceil(width / geometry.tileWidth) * Math.ceil(height / geometry.tileHeight);
}
