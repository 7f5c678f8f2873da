import { HTTP_CONFIG, DOWNLOAD_CONFIG, TILE_QUEUE_CONFIG } from '../shared/config';
import { CancellationToken } from '../shared/cancellation';
import { Canvas, cropTopLeft, describeRegion } from '../shared/canvas';
import { CompletionChannel } from '../shared/completion-channel';
import { TileFetchError, errorMessage } from '../shared/errors';
import { LogSink, NoOpLogSink } from '../shared/log-sink';
import { RequestQueue } from '../shared/request-queue';
import { RequestQueueLogger } from '../shared/request-queue-logger';
import {
  DownloadListener,
  FailedRegion,
  RegionRequest,
  RgbaImage,
  TileFetchResult
} from '../shared/types';
import { decodeTile } from './image-codec';

export interface TileFetchOptions {
  workers: number;
  retries?: number;
  timeout?: number;
  log?: LogSink;
  listener?: DownloadListener;
  cancellation?: CancellationToken;
  queueLogger?: RequestQueueLogger;
}

export interface TileRunResult {
  status: 'completed' | 'cancelled';
  totalRegions: number;
  succeeded: number;
  failedRegions: FailedRegion[];
}

/**
 * Fetch one region and return exactly region.width x region.height pixels
 */
export async function fetchTile(request: RegionRequest, signal?: AbortSignal): Promise<RgbaImage> {
  const response = await fetch(request.url, { headers: HTTP_CONFIG.HEADERS, signal });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trimEnd());
  }

  const decoded = await decodeTile(new Uint8Array(await response.arrayBuffer()));
  return cropTopLeft(decoded, request.region.width, request.region.height);
}

function toTileFetchError(error: unknown, request: RegionRequest): TileFetchError {
  if (error instanceof TileFetchError) return error;
  return new TileFetchError(
    `Tile ${describeRegion(request.region)} failed: ${errorMessage(error)}`,
    request.region,
    request.url,
    { cause: error }
  );
}

/**
 * Fetch every region through a bounded worker pool and paste each tile into
 * the canvas as it arrives.
 *
 * Results are consumed one at a time, so the counters and the canvas have a
 * single writer. A failure before any tile has succeeded aborts the run by
 * throwing; later failures are logged and leave their area transparent.
 * Cancellation is checked once per drained result; requests still in flight
 * finish but their results are dropped.
 */
export async function fetchAllTiles(
  requests: RegionRequest[],
  canvas: Canvas,
  options: TileFetchOptions
): Promise<TileRunResult> {
  const log = options.log ?? new NoOpLogSink();
  const total = requests.length;
  const channel = new CompletionChannel<TileFetchResult>();
  const queue = new RequestQueue<RgbaImage>({
    maxConcurrent: options.workers,
    maxRetries: options.retries ?? TILE_QUEUE_CONFIG.maxRetries,
    timeout: options.timeout ?? HTTP_CONFIG.TILE_TIMEOUT
  }, options.queueLogger);

  for (const request of requests) {
    void queue.add({
      execute: signal => fetchTile(request, signal),
      method: 'GET',
      url: request.url
    }).then(
      image => channel.push({ ok: true, request, image }),
      error => channel.push({ ok: false, request, error: toTileFetchError(error, request) })
    );
  }

  let succeeded = 0;
  const failedRegions: FailedRegion[] = [];

  const stop = (): void => {
    queue.clear();
    channel.close();
  };

  for (let drained = 0; drained < total; drained++) {
    const result = await channel.next();

    if (options.cancellation?.isCancellationRequested) {
      log.emit('Download cancelled by user');
      stop();
      return { status: 'cancelled', totalRegions: total, succeeded, failedRegions };
    }

    if (!result.ok) {
      log.emit(`Error downloading tile ${result.request.url}: ${errorMessage(result.error.cause ?? result.error)}`);
      if (succeeded === 0) {
        stop();
        throw result.error;
      }
      failedRegions.push({
        region: result.request.region,
        url: result.request.url,
        reason: errorMessage(result.error.cause ?? result.error)
      });
      continue;
    }

    canvas.composite(result.image, result.request.region);
    succeeded++;

    const progress = (succeeded / total) * 100;
    options.listener?.onProgress?.(progress);
    options.listener?.onStatus?.(`Downloaded ${succeeded}/${total} tiles`);

    if (succeeded % DOWNLOAD_CONFIG.PROGRESS_LOG_INTERVAL === 0 || succeeded === total) {
      log.emit(`Progress: ${succeeded}/${total} tiles (${progress.toFixed(1)}%)`);
    }
  }

  return { status: 'completed', totalRegions: total, succeeded, failedRegions };
}
