import { fetchAllTiles, fetchTile } from '../tile-fetcher';
import { CancellationToken } from '@/shared/cancellation';
import { Canvas } from '@/shared/canvas';
import { TileFetchError } from '@/shared/errors';
import { BufferedLogSink } from '@/shared/log-sink';
import { buildRegionRequests } from '@/shared/region-planner';
import { Region, RegionRequest } from '@/shared/types';
import {
  SERVICE_URL,
  delay,
  errorResponse,
  mockIiifServer,
  patternPixel,
  waitForAbort
} from './helpers/mock-iiif-server';

const WIDTH = 50;
const HEIGHT = 30;
const GEOMETRY = { tileWidth: 16, tileHeight: 16, overlap: 0 };

function requests(): RegionRequest[] {
  return buildRegionRequests(SERVICE_URL, WIDTH, HEIGHT, GEOMETRY);
}

function isFirstRegion(region: Region): boolean {
  return region.x === 0 && region.y === 0;
}

function expectRegionMatchesPattern(canvas: Canvas, region: Region): void {
  for (let y = region.y; y < region.y + region.height; y++) {
    for (let x = region.x; x < region.x + region.width; x++) {
      expect(canvas.getPixel(x, y)).toEqual(patternPixel(x, y));
    }
  }
}

function expectRegionTransparent(canvas: Canvas, region: Region): void {
  for (let y = region.y; y < region.y + region.height; y++) {
    for (let x = region.x; x < region.x + region.width; x++) {
      expect(canvas.getPixel(x, y)).toEqual([0, 0, 0, 0]);
    }
  }
}

describe('fetchTile', () => {
  let fetchSpy: jest.SpyInstance;

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should crop a tile the server returned too large', async () => {
    fetchSpy = mockIiifServer({ oversize: 5 });
    const region = { x: 16, y: 16, width: 16, height: 14 };

    const tile = await fetchTile({ region, url: `${SERVICE_URL}/16,16,16,14/full/0/default.jpg` });

    expect(tile.width).toBe(16);
    expect(tile.height).toBe(14);
    expect(Array.from(tile.data.subarray(0, 4))).toEqual(patternPixel(16, 16));
  });

  it('should fail on an error status', async () => {
    fetchSpy = mockIiifServer({ tile: () => errorResponse(403, 'Forbidden') });
    const region = { x: 0, y: 0, width: 16, height: 16 };

    await expect(fetchTile({ region, url: `${SERVICE_URL}/0,0,16,16/full/0/default.jpg` }))
      .rejects.toThrow('HTTP 403 Forbidden');
  });
});

describe('fetchAllTiles', () => {
  let fetchSpy: jest.SpyInstance;
  let log: BufferedLogSink;

  beforeEach(() => {
    log = new BufferedLogSink();
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should assemble every tile into the canvas', async () => {
    fetchSpy = mockIiifServer({});
    const canvas = new Canvas(WIDTH, HEIGHT);
    const onProgress = jest.fn();
    const onStatus = jest.fn();

    const result = await fetchAllTiles(requests(), canvas, {
      workers: 3,
      log,
      listener: { onProgress, onStatus }
    });

    expect(result).toEqual({ status: 'completed', totalRegions: 8, succeeded: 8, failedRegions: [] });
    expectRegionMatchesPattern(canvas, { x: 0, y: 0, width: WIDTH, height: HEIGHT });
    expect(fetchSpy).toHaveBeenCalledTimes(8);
    expect(onProgress).toHaveBeenCalledTimes(8);
    expect(onProgress).toHaveBeenLastCalledWith(100);
    expect(onStatus).toHaveBeenLastCalledWith('Downloaded 8/8 tiles');
    expect(log.lines).toEqual(['Progress: 8/8 tiles (100.0%)']);
  });

  it('should refuse a worker count that is not a whole number', async () => {
    fetchSpy = mockIiifServer({});

    await expect(fetchAllTiles(requests(), new Canvas(WIDTH, HEIGHT), { workers: NaN }))
      .rejects.toThrow(RangeError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should crop oversized tiles before compositing', async () => {
    fetchSpy = mockIiifServer({ oversize: 7 });
    const canvas = new Canvas(WIDTH, HEIGHT);

    const result = await fetchAllTiles(requests(), canvas, { workers: 4 });

    expect(result.succeeded).toBe(8);
    expectRegionMatchesPattern(canvas, { x: 0, y: 0, width: WIDTH, height: HEIGHT });
  });

  it('should skip a tile that fails after others have succeeded', async () => {
    fetchSpy = mockIiifServer({
      tile: async region => {
        if (!isFirstRegion(region)) return undefined;
        await delay(200);
        return errorResponse(500, 'Internal Server Error');
      }
    });
    const canvas = new Canvas(WIDTH, HEIGHT);
    const all = requests();

    const result = await fetchAllTiles(all, canvas, { workers: 8, log });

    expect(result.status).toBe('completed');
    expect(result.succeeded).toBe(7);
    expect(result.failedRegions).toEqual([{
      region: { x: 0, y: 0, width: 16, height: 16 },
      url: `${SERVICE_URL}/0,0,16,16/full/0/default.jpg`,
      reason: 'HTTP 500 Internal Server Error'
    }]);
    expect(log.lines).toContain(
      `Error downloading tile ${SERVICE_URL}/0,0,16,16/full/0/default.jpg: HTTP 500 Internal Server Error`
    );
    expectRegionTransparent(canvas, all[0].region);
    all.slice(1).forEach(({ region }) => expectRegionMatchesPattern(canvas, region));
  });

  it('should abort when the first completed fetch fails', async () => {
    fetchSpy = mockIiifServer({
      tile: async region => {
        if (isFirstRegion(region)) return errorResponse(404, 'Not Found');
        await delay(100);
        return undefined;
      }
    });
    const canvas = new Canvas(WIDTH, HEIGHT);

    const error = await fetchAllTiles(requests(), canvas, { workers: 8, log }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TileFetchError);
    expect(error).toMatchObject({
      message: 'Tile 0,0,16,16 failed: HTTP 404 Not Found',
      region: { x: 0, y: 0, width: 16, height: 16 }
    });
    expect(canvas.data.every(byte => byte === 0)).toBe(true);

    // Let the in-flight requests finish; their results are dropped
    await delay(300);
    expect(canvas.data.every(byte => byte === 0)).toBe(true);
  });

  it('should abort on a systemic failure with a single worker', async () => {
    fetchSpy = mockIiifServer({ tile: () => errorResponse(401, 'Unauthorized') });
    const canvas = new Canvas(WIDTH, HEIGHT);

    await expect(fetchAllTiles(requests(), canvas, { workers: 1 }))
      .rejects.toThrow('Tile 0,0,16,16 failed: HTTP 401 Unauthorized');
    // At most the request started alongside the failure is sent; the rest are cleared
    expect(fetchSpy.mock.calls.length).toBeLessThanOrEqual(2);
  });

  it('should treat a timed-out tile like any other failure', async () => {
    fetchSpy = mockIiifServer({
      tile: (region, signal) => (isFirstRegion(region) ? waitForAbort(signal) : undefined)
    });
    const canvas = new Canvas(32, 16);
    const twoTiles = buildRegionRequests(SERVICE_URL, 32, 16, GEOMETRY);

    const result = await fetchAllTiles(twoTiles, canvas, { workers: 2, timeout: 100 });

    expect(result.succeeded).toBe(1);
    expect(result.failedRegions).toHaveLength(1);
    expect(result.failedRegions[0].reason).toBe('Request timeout');
  });

  it('should stop compositing once cancelled', async () => {
    fetchSpy = mockIiifServer({});
    const canvas = new Canvas(WIDTH, HEIGHT);
    const cancellation = new CancellationToken();
    const all = requests();

    const result = await fetchAllTiles(all, canvas, {
      workers: 1,
      log,
      cancellation,
      listener: { onProgress: () => cancellation.cancel() }
    });

    expect(result).toEqual({ status: 'cancelled', totalRegions: 8, succeeded: 1, failedRegions: [] });
    expect(log.lines).toEqual(['Download cancelled by user']);
    // Only requests already in flight were sent; the queued ones were cleared
    expect(fetchSpy.mock.calls.length).toBeLessThanOrEqual(3);
    expectRegionMatchesPattern(canvas, all[0].region);
    all.slice(1).forEach(({ region }) => expectRegionTransparent(canvas, region));
  });

  it('should report cancellation before any tile lands', async () => {
    fetchSpy = mockIiifServer({});
    const canvas = new Canvas(WIDTH, HEIGHT);
    const cancellation = new CancellationToken();
    cancellation.cancel();

    const result = await fetchAllTiles(requests(), canvas, { workers: 2, cancellation });

    expect(result.status).toBe('cancelled');
    expect(result.succeeded).toBe(0);
    expect(canvas.data.every(byte => byte === 0)).toBe(true);
  });
});
