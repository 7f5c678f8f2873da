/**
 * Central configuration for the IIIF tile stitcher
 */

// HTTP configuration shared by descriptor and tile requests
export const HTTP_CONFIG = {
  HEADERS: {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
    'Accept': 'image/*,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
  },
  DESCRIPTOR_TIMEOUT: 30000,        // 30 second timeout for info.json
  TILE_TIMEOUT: 60000,              // 60 second timeout per tile (larger payloads)
} as const;


// Tile geometry and region request configuration
export const TILE_CONFIG = {
  DEFAULT_TILE_SIZE: 1024,          // Used when the server advertises no tiles
  FALLBACK_TILE_WIDTH: 512,         // Advertised tile spec without a usable width
  MIN_TILE_SIZE: 64,                // Smallest custom tile size accepted
  MAX_TILE_SIZE: 4096,              // Largest custom tile size accepted
  TRANSPORT_FORMAT: 'jpg',          // Most servers support it; tiles are re-encoded anyway
  TRANSPORT_QUALITY: 'default',
  DESCRIPTOR_FILE: 'info.json',
} as const;


// Tile request queue configuration
export const TILE_QUEUE_CONFIG = {
  maxConcurrent: 4,                 // Parallel tile fetches
  maxRetries: 0,                    // A failed tile is reported, not retried
  retryDelayBase: 1000,             // Base retry delay (1s)
  retryDelayMax: 30000,             // Maximum retry delay (30s)
  timeout: HTTP_CONFIG.TILE_TIMEOUT,
} as const;


// Download run configuration
export const DOWNLOAD_CONFIG = {
  MIN_WORKERS: 1,
  MAX_WORKERS: 16,
  DEFAULT_WORKERS: 4,
  MAX_RETRIES: 10,
  DEFAULT_FILE_NAME: 'downloaded_image',
  DEFAULT_FORMAT: 'tiff',
  PROGRESS_LOG_INTERVAL: 25,        // Log a progress line every 25 tiles
} as const;


// Output encoding configuration
export const ENCODER_CONFIG = {
  JPEG_QUALITY: 95,
  JPEG_OPTIMISE_CODING: true,       // Optimised Huffman tables
  PNG_COMPRESSION_LEVEL: 9,
  TIFF_COMPRESSION: 'none',
  FLATTEN_BACKGROUND: { r: 255, g: 255, b: 255 },
} as const;


// File logging for the request queue
export const LOGGING_CONFIG = {
  DEFAULT_LOG_DIR: 'logs',
  FILE_SUFFIX: 'tiles',
} as const;
