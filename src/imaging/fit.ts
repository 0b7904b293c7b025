/**
 * Fit resolution: reconcile a source image with a fixed target canvas.
 */

import { ConfigurationError } from '../exceptions';
import { FitPreserve, FitStrategy, Orientation } from '../models/enums';
import { FitConfig } from '../models/fit';
import { RasterImage, type Dimensions, type Rgb } from '../models/image';
import { WHITE } from './color';
import { cover, resample } from './raster';

/**
 * @throws {ConfigurationError} Unless both dimensions are positive integers
 */
export function validateTargetSize(size: Dimensions): void {
  const { width, height } = size;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ConfigurationError(
      `Target size must be positive integers, got ${width}x${height}`
    );
  }
}

/**
 * Largest size with the source's aspect ratio that fits inside `target`.
 */
export function containSize(source: Dimensions, target: Dimensions): Dimensions {
  const sourceRatio = source.width / source.height;
  const targetRatio = target.width / target.height;

  if (sourceRatio > targetRatio) {
    const height = Math.max(1, Math.round((source.height / source.width) * target.width));
    return { width: target.width, height };
  }
  if (sourceRatio < targetRatio) {
    const width = Math.max(1, Math.round((source.width / source.height) * target.height));
    return { width, height: target.height };
  }
  return { ...target };
}

/**
 * Scale to fit entirely inside `size` and center on a filled canvas.
 */
export async function letterbox(
  image: RasterImage,
  size: Dimensions,
  background: Rgb = WHITE
): Promise<RasterImage> {
  validateTargetSize(size);

  const fitted = await resample(image, containSize(image, size));
  const left = Math.floor((size.width - fitted.width) / 2);
  const top = Math.floor((size.height - fitted.height) / 2);

  return RasterImage.paste(RasterImage.filled(size, background), fitted, left, top);
}

/**
 * Center-crop to the target ratio keeping the full width or height, then
 * scale to the target size.
 */
async function preserveAxis(
  image: RasterImage,
  size: Dimensions,
  axis: FitPreserve.WIDTH | FitPreserve.HEIGHT
): Promise<RasterImage> {
  const targetRatio = size.width / size.height;

  if (axis === FitPreserve.WIDTH) {
    const cropHeight = Math.min(image.height, Math.max(1, Math.floor(image.width / targetRatio)));
    const top = Math.max(0, Math.floor((image.height - cropHeight) / 2));
    const cropped = RasterImage.crop(image, {
      left: 0,
      top,
      width: image.width,
      height: cropHeight,
    });
    return resample(cropped, size);
  }

  const cropWidth = Math.min(image.width, Math.max(1, Math.floor(image.height * targetRatio)));
  const left = Math.max(0, Math.floor((image.width - cropWidth) / 2));
  const cropped = RasterImage.crop(image, {
    left,
    top: 0,
    width: cropWidth,
    height: image.height,
  });
  return resample(cropped, size);
}

/**
 * Orientation- and aspect-aware choice between letterbox, cover and stretch.
 *
 * | orientation | source          | result    |
 * |-------------|-----------------|-----------|
 * | horizontal  | portrait        | letterbox |
 * | horizontal  | landscape/square| cover     |
 * | vertical    | portrait        | cover     |
 * | vertical    | landscape/square| stretch   |
 */
async function smartFit(
  image: RasterImage,
  size: Dimensions,
  orientation: Orientation,
  background: Rgb
): Promise<RasterImage> {
  const portrait = RasterImage.isPortrait(image);

  if (orientation === Orientation.VERTICAL) {
    return portrait ? cover(image, size) : resample(image, size);
  }
  return portrait ? letterbox(image, size, background) : cover(image, size);
}

/**
 * Transform an image to exactly `targetSize`.
 *
 * `preserve` (width or height) takes precedence over `strategy`. Unknown
 * strategies fall back to cover. All scaling uses the Lanczos kernel.
 *
 * @param image - Source image
 * @param targetSize - Output size
 * @param fitConfig - Strategy and preserve settings
 * @param orientation - Panel orientation, used by the smart strategy
 * @param background - Padding color for letterboxed output
 * @returns Image sized exactly to `targetSize`
 * @throws {ConfigurationError} If the target size is not positive
 */
export async function resolveFit(
  image: RasterImage,
  targetSize: Dimensions,
  fitConfig: FitConfig = FitConfig.DEFAULT,
  orientation: Orientation = Orientation.HORIZONTAL,
  background: Rgb = WHITE
): Promise<RasterImage> {
  validateTargetSize(targetSize);

  const { strategy, preserve } = fitConfig;

  if (preserve === FitPreserve.WIDTH || preserve === FitPreserve.HEIGHT) {
    return preserveAxis(image, targetSize, preserve);
  }

  switch (strategy) {
    case FitStrategy.SMART:
      return smartFit(image, targetSize, orientation, background);

    case FitStrategy.CONTAIN:
      return letterbox(image, targetSize, background);

    case FitStrategy.STRETCH:
      return resample(image, targetSize);

    case FitStrategy.COVER:
    case FitStrategy.DEFAULT:
    default:
      return cover(image, targetSize);
  }
}
