import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { ENCODER_CONFIG } from '../shared/config';
import { EncodeError, errorMessage } from '../shared/errors';
import { isOutputFormat } from '../shared/download-options';
import { OutputFormat, RgbaImage } from '../shared/types';

/**
 * Decode a tile response body (any format sharp reads) to 4-channel sRGB
 */
export async function decodeTile(bytes: Uint8Array): Promise<RgbaImage> {
  const { data, info } = await sharp(bytes)
    .toColourspace('srgb')
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Decoded tile has ${info.channels} channels, expected 4`);
  }
  return { width: info.width, height: info.height, data };
}

/**
 * Encode the finished canvas. jpg is flattened onto white first because
 * JPEG has no alpha channel.
 */
export async function encodeImage(image: RgbaImage, format: OutputFormat): Promise<Buffer> {
  if (!isOutputFormat(format)) {
    throw new EncodeError(`Unsupported output format: ${String(format)}`);
  }

  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 4 },
    limitInputPixels: false
  });

  try {
    switch (format) {
      case 'tiff':
        return await pipeline
          .tiff({ compression: ENCODER_CONFIG.TIFF_COMPRESSION })
          .toBuffer();
      case 'png':
        return await pipeline
          .png({ compressionLevel: ENCODER_CONFIG.PNG_COMPRESSION_LEVEL })
          .toBuffer();
      case 'jpg':
        return await pipeline
          .flatten({ background: ENCODER_CONFIG.FLATTEN_BACKGROUND })
          .jpeg({
            quality: ENCODER_CONFIG.JPEG_QUALITY,
            optimiseCoding: ENCODER_CONFIG.JPEG_OPTIMISE_CODING
          })
          .toBuffer();
    }
  } catch (error) {
    throw new EncodeError(`Failed to encode ${format.toUpperCase()}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Write encoded bytes, creating the destination directory if needed
 */
export async function writeImage(outputPath: string, bytes: Uint8Array): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, bytes);
  } catch (error) {
    throw new EncodeError(`Failed to write ${outputPath}: ${errorMessage(error)}`, { cause: error });
  }
}
