import type { Canvas } from './canvas';

// Tile geometry advertised by the server in info.json
export interface TileSpec {
  width?: number;
  height?: number;
  // Legacy field names used by some older servers
  tileWidth?: number;
  tileHeight?: number;
  overlap?: number;
  scaleFactors: number[];
}

export interface ServiceDescriptor {
  width: number;
  height: number;
  tileSpecs: TileSpec[];
  maxArea?: number;
}

export interface TileGeometry {
  tileWidth: number;
  tileHeight: number;
  overlap: number; // informational only, regions never overlap
}

export type TileSizePreference = 'auto' | number;

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RegionRequest {
  region: Region;
  url: string;
}

// Straight (non-premultiplied) RGBA pixels, row-major
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export type TileFetchResult =
  | { ok: true; request: RegionRequest; image: RgbaImage }
  | { ok: false; request: RegionRequest; error: Error };

export interface FailedRegion {
  region: Region;
  url: string;
  reason: string;
}

// tiff = lossless uncompressed, png = lossless compressed, jpg = lossy
export type OutputFormat = 'tiff' | 'png' | 'jpg';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['tiff', 'png', 'jpg'];

export interface DownloadRequest {
  url: string;
  destination: string;
  fileName: string;
  format: OutputFormat;
  tileSize: TileSizePreference;
  workers: number;
  retries?: number;
}

export interface DownloadListener {
  onProgress?: (percent: number) => void;
  onStatus?: (message: string) => void;
}

interface OutcomeCounts {
  // Final pixels; regions that never arrived stay transparent
  canvas: Canvas;
  totalRegions: number;
  succeeded: number;
  failedRegions: FailedRegion[];
  statusText: string;
  elapsedMs: number;
}

export type DownloadOutcome =
  | (OutcomeCounts & {
      status: 'completed';
      outputPath: string;
      width: number;
      height: number;
      format: OutputFormat;
    })
  | (OutcomeCounts & { status: 'cancelled' })
  | { status: 'failed'; error: Error; statusText: string; elapsedMs: number };
