import { TILE_CONFIG } from './config';
import { Region } from './types';

const DESCRIPTOR_SUFFIX = `/${TILE_CONFIG.DESCRIPTOR_FILE}`;

/**
 * Reduce a user-supplied IIIF URL to the canonical image service base.
 *
 * Drops any query string or fragment, then repeatedly strips trailing
 * separators and a trailing `/info.json`, so the result never ends in either.
 */
export function normalizeServiceUrl(url: string): string {
  let base = url.trim().split(/[?#]/)[0];

  let previous: string;
  do {
    previous = base;
    base = base.replace(/\/+$/, '');
    if (base.endsWith(DESCRIPTOR_SUFFIX)) {
      base = base.slice(0, -DESCRIPTOR_SUFFIX.length);
    }
  } while (base !== previous);

  return base;
}

export function descriptorUrl(serviceUrl: string): string {
  return `${serviceUrl}${DESCRIPTOR_SUFFIX}`;
}

// {base}/{x},{y},{w},{h}/full/0/default.jpg
export function regionUrl(serviceUrl: string, region: Region): string {
  const { x, y, width, height } = region;
  const quality = TILE_CONFIG.TRANSPORT_QUALITY;
  const format = TILE_CONFIG.TRANSPORT_FORMAT;
  return `${serviceUrl}/${x},${y},${width},${height}/full/0/${quality}.${format}`;
}
