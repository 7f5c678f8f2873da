export * from './shared/types';
export * from './shared/errors';
export * from './shared/config';
export { normalizeServiceUrl, descriptorUrl, regionUrl } from './shared/service-url';
export { parseDescriptor } from './shared/descriptor';
export { resolveTileGeometry, respectMaxArea, selectTileSpec } from './shared/tile-geometry';
export { planRegions, buildRegionRequests, expectedRegionCount } from './shared/region-planner';
export { Canvas, cropTopLeft } from './shared/canvas';
export { CancellationToken } from './shared/cancellation';
export { ConsoleLogSink, NoOpLogSink, BufferedLogSink } from './shared/log-sink';
export type { LogSink } from './shared/log-sink';
export { RequestQueue } from './shared/request-queue';
export type { RequestQueueConfig } from './shared/request-queue';
export type { RequestQueueLogger, LogEntry } from './shared/request-queue-logger';
export {
  ConsoleRequestQueueLogger,
  NoOpRequestQueueLogger
} from './shared/request-queue-logger';
export { validateDownloadRequest, parseTileSizePreference } from './shared/download-options';
export { fetchDescriptor } from './server/descriptor-fetcher';
export { fetchTile, fetchAllTiles } from './server/tile-fetcher';
export type { TileRunResult, TileFetchOptions } from './server/tile-fetcher';
export { decodeTile, encodeImage, writeImage } from './server/image-codec';
export { FileRequestQueueLogger } from './server/file-request-queue-logger';
export { downloadImage, summarizeOutcome } from './server/download-pipeline';
export type { DownloadDependencies } from './server/download-pipeline';
