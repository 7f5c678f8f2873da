import { DOWNLOAD_CONFIG, TILE_CONFIG } from './config';
import { DownloadRequest, OUTPUT_FORMATS, OutputFormat, TileSizePreference } from './types';

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Parse a tile size option: "auto" or a whole number of pixels.
 * Returns null when the text is neither.
 */
export function parseTileSizePreference(text: string): TileSizePreference | null {
  const value = text.trim().toLowerCase();
  if (value === 'auto') return 'auto';
  if (!/^\d+$/.test(value)) return null;
  return Number(value);
}

function isIntegerInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Collect every problem with a download request; an empty list means valid
 */
export function validateDownloadRequest(request: DownloadRequest): string[] {
  const problems: string[] = [];

  if (!request.url.trim()) {
    problems.push('Please enter a IIIF URL');
  }
  if (!request.destination.trim()) {
    problems.push('Please select a destination directory');
  }
  if (!request.fileName.trim()) {
    problems.push('Please enter a file name');
  }
  if (!isOutputFormat(request.format)) {
    problems.push(`Unsupported output format: ${String(request.format)}`);
  }
  if (
    request.tileSize !== 'auto' &&
    !isIntegerInRange(request.tileSize, TILE_CONFIG.MIN_TILE_SIZE, TILE_CONFIG.MAX_TILE_SIZE)
  ) {
    problems.push(
      `Tile size must be between ${TILE_CONFIG.MIN_TILE_SIZE} and ${TILE_CONFIG.MAX_TILE_SIZE} pixels`
    );
  }
  if (!isIntegerInRange(request.workers, DOWNLOAD_CONFIG.MIN_WORKERS, DOWNLOAD_CONFIG.MAX_WORKERS)) {
    problems.push(
      `Concurrent downloads must be between ${DOWNLOAD_CONFIG.MIN_WORKERS} and ${DOWNLOAD_CONFIG.MAX_WORKERS}`
    );
  }
  if (
    request.retries !== undefined &&
    !isIntegerInRange(request.retries, 0, DOWNLOAD_CONFIG.MAX_RETRIES)
  ) {
    problems.push(`Retries must be between 0 and ${DOWNLOAD_CONFIG.MAX_RETRIES}`);
  }

  return problems;
}

export function outputFileName(fileName: string, format: OutputFormat): string {
  return `${fileName.trim()}.${format}`;
}
