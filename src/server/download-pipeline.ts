import * as path from 'path';
import { CancellationToken } from '../shared/cancellation';
import { Canvas } from '../shared/canvas';
import { outputFileName, validateDownloadRequest } from '../shared/download-options';
import { InvalidOptionsError, errorMessage } from '../shared/errors';
import { LogSink, NoOpLogSink } from '../shared/log-sink';
import { buildRegionRequests } from '../shared/region-planner';
import { RequestQueueLogger } from '../shared/request-queue-logger';
import { normalizeServiceUrl } from '../shared/service-url';
import { resolveTileGeometry } from '../shared/tile-geometry';
import { DownloadListener, DownloadOutcome, DownloadRequest } from '../shared/types';
import { fetchDescriptor } from './descriptor-fetcher';
import { encodeImage, writeImage } from './image-codec';
import { fetchAllTiles } from './tile-fetcher';

export interface DownloadDependencies {
  listener?: DownloadListener;
  log?: LogSink;
  cancellation?: CancellationToken;
  queueLogger?: RequestQueueLogger;
}

/**
 * Run one download end to end: descriptor, geometry, regions, tiles,
 * encode, write. Never throws for a failed run; the failure is reported in
 * the outcome. Nothing is written unless every tile has been processed.
 */
export async function downloadImage(
  request: DownloadRequest,
  deps: DownloadDependencies = {}
): Promise<DownloadOutcome> {
  const log = deps.log ?? new NoOpLogSink();
  const listener = deps.listener ?? {};
  const startTime = Date.now();
  const elapsed = (): number => Date.now() - startTime;

  const setStatus = (message: string): string => {
    listener.onStatus?.(message);
    return message;
  };

  try {
    const problems = validateDownloadRequest(request);
    if (problems.length > 0) {
      throw new InvalidOptionsError(problems);
    }

    const serviceUrl = normalizeServiceUrl(request.url);
    setStatus('Getting image information...');
    log.emit(`Service URL: ${serviceUrl}`);

    const descriptor = await fetchDescriptor(serviceUrl);
    const { width, height } = descriptor;
    setStatus(`Image size: ${width} x ${height} pixels`);
    log.emit(`Image dimensions: ${width} x ${height}`);

    const geometry = resolveTileGeometry(descriptor, request.tileSize);
    log.emit(`Using tile size: ${geometry.tileWidth} x ${geometry.tileHeight} (overlap: ${geometry.overlap}px)`);
    if (descriptor.maxArea) {
      log.emit(`Respecting server maxArea: ${descriptor.maxArea}`);
    }

    setStatus('Preparing download URLs...');
    const regionRequests = buildRegionRequests(serviceUrl, width, height, geometry);
    log.emit(`Total tiles to download: ${regionRequests.length}`);
    setStatus(`Downloading ${regionRequests.length} tiles...`);

    const canvas = new Canvas(width, height);
    const tiles = await fetchAllTiles(regionRequests, canvas, {
      workers: request.workers,
      retries: request.retries,
      log,
      listener,
      cancellation: deps.cancellation,
      queueLogger: deps.queueLogger
    });

    if (tiles.status === 'cancelled') {
      const statusText = setStatus('Download cancelled');
      log.emit('Download was cancelled');
      return { ...tiles, status: 'cancelled', canvas, statusText, elapsedMs: elapsed() };
    }

    if (tiles.failedRegions.length > 0) {
      log.emit(`${tiles.failedRegions.length} of ${tiles.totalRegions} tiles failed and are left transparent`);
    }

    const outputPath = path.join(request.destination, outputFileName(request.fileName, request.format));
    setStatus('Saving image...');
    log.emit(`Saving to: ${outputPath}`);

    const bytes = await encodeImage(canvas, request.format);
    await writeImage(outputPath, bytes);

    const statusText = setStatus('Download complete!');
    listener.onProgress?.(100);
    log.emit(`Successfully saved to: ${outputPath}`);

    return {
      ...tiles,
      status: 'completed',
      canvas,
      outputPath,
      width,
      height,
      format: request.format,
      statusText,
      elapsedMs: elapsed()
    };
  } catch (caught) {
    const error = caught instanceof Error ? caught : new Error(errorMessage(caught));
    log.emit(`ERROR: ${error.message}`);
    const statusText = setStatus('Download failed');
    return { status: 'failed', error, statusText, elapsedMs: elapsed() };
  }
}

/**
 * One-paragraph summary of a completed run, for the front-end
 */
export function summarizeOutcome(outcome: DownloadOutcome): string {
  switch (outcome.status) {
    case 'completed': {
      const lines = [
        `Image saved to: ${outcome.outputPath}`,
        `Size: ${outcome.width} x ${outcome.height} pixels`,
        `Tiles: ${outcome.totalRegions}`,
        `Format: ${outcome.format.toUpperCase()}`
      ];
      if (outcome.failedRegions.length > 0) {
        lines.push(`Failed tiles: ${outcome.failedRegions.length}`);
      }
      return lines.join('\n');
    }
    case 'cancelled':
      return `Download cancelled after ${outcome.succeeded}/${outcome.totalRegions} tiles`;
    case 'failed':
      return `Download failed: ${outcome.error.message}`;
  }
}
