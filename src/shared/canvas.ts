import { Region, RgbaImage } from './types';

const CHANNELS = 4;

export function createRgbaImage(width: number, height: number): RgbaImage {
  return { width, height, data: new Uint8Array(width * height * CHANNELS) };
}

/**
 * Take the top-left width x height of an image. Pixels outside the source
 * (when it is smaller than requested) come out fully transparent.
 */
export function cropTopLeft(image: RgbaImage, width: number, height: number): RgbaImage {
  if (image.width === width && image.height === height) {
    return image;
  }

  const cropped = createRgbaImage(width, height);
  const copyWidth = Math.min(width, image.width) * CHANNELS;
  const copyHeight = Math.min(height, image.height);

  for (let row = 0; row < copyHeight; row++) {
    const srcStart = row * image.width * CHANNELS;
    cropped.data.set(image.data.subarray(srcStart, srcStart + copyWidth), row * width * CHANNELS);
  }
  return cropped;
}

/**
 * The output image all tiles are pasted into. Starts fully transparent.
 */
export class Canvas implements RgbaImage {
  readonly data: Uint8Array;

  constructor(readonly width: number, readonly height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid canvas size ${width}x${height}`);
    }
    this.data = new Uint8Array(width * height * CHANNELS);
  }

  /**
   * Paste a decoded tile at the region's offset using source-over blending.
   * Opaque tile pixels replace the canvas pixel outright.
   */
  composite(tile: RgbaImage, region: Region): void {
    if (tile.width !== region.width || tile.height !== region.height) {
      throw new Error(
        `Tile is ${tile.width}x${tile.height} but region ${describeRegion(region)} needs ${region.width}x${region.height}`
      );
    }
    if (region.x < 0 || region.y < 0 ||
        region.x + region.width > this.width || region.y + region.height > this.height) {
      throw new Error(`Region ${describeRegion(region)} lies outside the ${this.width}x${this.height} canvas`);
    }

    const src = tile.data;
    const dst = this.data;

    for (let row = 0; row < tile.height; row++) {
      let s = row * tile.width * CHANNELS;
      let d = ((region.y + row) * this.width + region.x) * CHANNELS;

      for (let col = 0; col < tile.width; col++, s += CHANNELS, d += CHANNELS) {
        const srcAlpha = src[s + 3];
        if (srcAlpha === 255) {
          dst[d] = src[s];
          dst[d + 1] = src[s + 1];
          dst[d + 2] = src[s + 2];
          dst[d + 3] = 255;
        } else if (srcAlpha > 0) {
          blendPixel(src, s, dst, d);
        }
      }
    }
  }

  getPixel(x: number, y: number): [number, number, number, number] {
    const i = (y * this.width + x) * CHANNELS;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  get byteLength(): number {
    return this.data.byteLength;
  }
}

// Straight-alpha source-over
function blendPixel(src: Uint8Array, s: number, dst: Uint8Array, d: number): void {
  const sa = src[s + 3] / 255;
  const da = dst[d + 3] / 255;
  const outAlpha = sa + da * (1 - sa);

  for (let c = 0; c < 3; c++) {
    const value = (src[s + c] * sa + dst[d + c] * da * (1 - sa)) / outAlpha;
    dst[d + c] = Math.round(value);
  }
  dst[d + 3] = Math.round(outAlpha * 255);
}

export function describeRegion(region: Region): string {
  return `${region.x},${region.y},${region.width},${region.height}`;
}
