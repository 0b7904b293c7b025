/**
 * Conversions between RasterImage and sharp pipelines.
 */

import sharp from 'sharp';
import { DecodeError } from '../exceptions';
import { RasterImage, type Dimensions } from '../models/image';

/**
 * Resampling kernel used for every scaling operation.
 */
export const RESAMPLE_KERNEL = sharp.kernel.lanczos3;

/**
 * Open a raster as a sharp pipeline.
 */
export function toSharp(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: RasterImage.CHANNELS },
  });
}

/**
 * Run a pipeline and read the result back as an RGB raster.
 */
export async function fromSharp(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline
    .removeAlpha()
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== RasterImage.CHANNELS) {
    throw new Error(`Expected ${RasterImage.CHANNELS} channels, got ${info.channels}`);
  }

  // Copy out of the Buffer pool so the raster owns its bytes
  return { width: info.width, height: info.height, data: new Uint8Array(data) };
}

/**
 * Decode encoded image bytes (JPEG, PNG, WebP, GIF, ...) to RGB.
 *
 * @throws {DecodeError} If the bytes are not a decodable image
 */
export async function decodeImage(bytes: Uint8Array): Promise<RasterImage> {
  try {
    return await fromSharp(sharp(bytes).toColourspace('srgb'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`Could not decode image (${bytes.length} bytes): ${detail}`);
  }
}

/**
 * Encode a raster as PNG.
 */
export async function encodePng(image: RasterImage): Promise<Buffer> {
  return toSharp(image).png().toBuffer();
}

/**
 * Resize to exactly `size`, ignoring aspect ratio.
 */
export async function resample(image: RasterImage, size: Dimensions): Promise<RasterImage> {
  if (image.width === size.width && image.height === size.height) {
    return RasterImage.clone(image);
  }
  return fromSharp(
    toSharp(image).resize(size.width, size.height, { fit: 'fill', kernel: RESAMPLE_KERNEL })
  );
}

/**
 * Scale to fill `size` and center-crop the overflow.
 */
export async function cover(image: RasterImage, size: Dimensions): Promise<RasterImage> {
  if (image.width === size.width && image.height === size.height) {
    return RasterImage.clone(image);
  }
  return fromSharp(
    toSharp(image).resize(size.width, size.height, {
      fit: 'cover',
      position: 'centre',
      kernel: RESAMPLE_KERNEL,
    })
  );
}

/**
 * Rotate counter-clockwise by a multiple of 90 degrees.
 */
export async function rotate(image: RasterImage, degrees: number): Promise<RasterImage> {
  const angle = ((degrees % 360) + 360) % 360;
  if (angle === 0) {
    return RasterImage.clone(image);
  }
  // sharp rotates clockwise
  return fromSharp(toSharp(image).rotate(360 - angle));
}

/**
 * 3x3 smoothing filter. Edge rows and columns are copied from the source
 * unfiltered.
 */
export async function smooth(image: RasterImage): Promise<RasterImage> {
  const filtered = await fromSharp(
    toSharp(image).convolve({
      width: 3,
      height: 3,
      kernel: [1, 1, 1, 1, 5, 1, 1, 1, 1],
      scale: 13,
    })
  );
  return keepBorder(filtered, image);
}

function keepBorder(filtered: RasterImage, source: RasterImage): RasterImage {
  const { width, height } = source;
  const stride = width * RasterImage.CHANNELS;
  const data = filtered.data;

  for (let y = 0; y < height; y++) {
    const row = y * stride;
    if (y === 0 || y === height - 1) {
      data.set(source.data.subarray(row, row + stride), row);
      continue;
    }
    const last = row + stride - RasterImage.CHANNELS;
    data.set(source.data.subarray(row, row + RasterImage.CHANNELS), row);
    data.set(source.data.subarray(last, last + RasterImage.CHANNELS), last);
  }
  return filtered;
}
