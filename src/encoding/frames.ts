/**
 * Frame encoding for panels that take packed pixel data.
 */

import { ConfigurationError } from '../exceptions';
import { RasterImage } from '../models/image';
import { toSharp } from '../imaging/raster';

/**
 * Pixel layouts a frame sink can be fed.
 */
export enum FrameFormat {
  /** 1 bit per pixel, MSB first, 1 = white */
  MONO = 'mono',
  /** 2 bits per pixel, MSB first, 0 = black .. 3 = white */
  GRAY4 = 'gray4',
  /** Raw 24-bit RGB */
  RGB = 'rgb',
}

/**
 * Single-channel image of palette indices.
 */
export interface PaletteFrame {
  width: number;
  height: number;
  indices: Uint8Array;
}

export function parseFrameFormat(value: unknown): FrameFormat {
  const match = Object.values(FrameFormat).find((f) => f === value);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported frame format: ${JSON.stringify(value)} ` +
        `(expected one of ${Object.values(FrameFormat).join(', ')})`
    );
  }
  return match;
}

async function toGray(image: RasterImage, threshold?: number): Promise<PaletteFrame> {
  let pipeline = toSharp(image).greyscale();
  if (threshold !== undefined) {
    pipeline = pipeline.threshold(threshold);
  }
  const { data, info } = await pipeline
    .extractChannel(0)
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, indices: new Uint8Array(data) };
}

/**
 * Threshold to black (0) and white (1).
 */
export async function quantizeMono(image: RasterImage, threshold: number = 128): Promise<PaletteFrame> {
  const gray = await toGray(image, threshold);
  return { ...gray, indices: gray.indices.map((v) => (v > 0 ? 1 : 0)) };
}

/**
 * Reduce to four gray levels (0 = black, 3 = white).
 */
export async function quantizeGray4(image: RasterImage): Promise<PaletteFrame> {
  const gray = await toGray(image);
  return { ...gray, indices: gray.indices.map((v) => v >> 6) };
}

/**
 * Pack palette indices at 1 bit per pixel, rows padded to a byte.
 */
export function encode1bpp(frame: PaletteFrame): Uint8Array {
  const { width, height, indices } = frame;
  const bytesPerRow = Math.ceil(width / 8);
  const output = new Uint8Array(bytesPerRow * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (indices[y * width + x] > 0) {
        output[y * bytesPerRow + (x >> 3)] |= 0x80 >> (x % 8);
      }
    }
  }
  return output;
}

/**
 * Pack palette indices at 2 bits per pixel, rows padded to a byte.
 */
export function encode2bpp(frame: PaletteFrame): Uint8Array {
  const { width, height, indices } = frame;
  const bytesPerRow = Math.ceil(width / 4);
  const output = new Uint8Array(bytesPerRow * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const shift = (3 - (x % 4)) * 2;
      output[y * bytesPerRow + (x >> 2)] |= (indices[y * width + x] & 0x03) << shift;
    }
  }
  return output;
}

/**
 * Encode a raster for a frame sink.
 *
 * @param image - Final rendered image, already at panel resolution
 * @param format - Target pixel layout
 * @returns Frame bytes
 */
export async function encodeFrame(image: RasterImage, format: FrameFormat): Promise<Uint8Array> {
  switch (format) {
    case FrameFormat.MONO:
      return encode1bpp(await quantizeMono(image));
    case FrameFormat.GRAY4:
      return encode2bpp(await quantizeGray4(image));
    case FrameFormat.RGB:
      return image.data.slice();
  }
}
