/**
 * Brightness, contrast, saturation and sharpness adjustments.
 *
 * Each stage interpolates between a degenerate version of the current image
 * and the image itself: `out = degenerate + factor * (current - degenerate)`.
 * A factor of 1 returns the current image, 0 returns the degenerate one and
 * values above 1 extrapolate away from it.
 */

import { ConfigurationError } from '../exceptions';
import { EnhancementSettings } from '../models/enhancement';
import { RasterImage } from '../models/image';
import { smooth } from './raster';

type Stage = keyof EnhancementSettings;

/**
 * ITU-R 601 luma of one pixel.
 */
function luma(r: number, g: number, b: number): number {
  return Math.round((r * 299 + g * 587 + b * 114) / 1000);
}

function blend(degenerate: Uint8Array, current: Uint8Array, factor: number): Uint8Array {
  const out = new Uint8Array(current.length);
  for (let i = 0; i < current.length; i++) {
    const value = degenerate[i] + factor * (current[i] - degenerate[i]);
    out[i] = Math.min(255, Math.max(0, Math.round(value)));
  }
  return out;
}

/**
 * Uniform gray at the image's mean luma.
 */
function meanGray(image: RasterImage): Uint8Array {
  const { data } = image;
  const pixels = image.width * image.height;
  let total = 0;
  for (let i = 0; i < data.length; i += RasterImage.CHANNELS) {
    total += luma(data[i], data[i + 1], data[i + 2]);
  }
  const mean = pixels > 0 ? Math.round(total / pixels) : 0;
  return new Uint8Array(data.length).fill(mean);
}

/**
 * Per-pixel luma replicated into all three channels.
 */
function grayscale(image: RasterImage): Uint8Array {
  const { data } = image;
  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i += RasterImage.CHANNELS) {
    const l = luma(data[i], data[i + 1], data[i + 2]);
    out[i] = l;
    out[i + 1] = l;
    out[i + 2] = l;
  }
  return out;
}

async function degenerateFor(stage: Stage, image: RasterImage): Promise<Uint8Array> {
  switch (stage) {
    case 'brightness':
      return new Uint8Array(image.data.length);
    case 'contrast':
      return meanGray(image);
    case 'saturation':
      return grayscale(image);
    case 'sharpness':
      return (await smooth(image)).data;
  }
}

function validateFactor(stage: Stage, factor: number): void {
  if (!Number.isFinite(factor) || factor < 0) {
    throw new ConfigurationError(`Invalid ${stage} factor: ${factor} (expected a non-negative number)`);
  }
}

/**
 * Apply one adjustment relative to the current image.
 */
export async function applyStage(
  image: RasterImage,
  stage: Stage,
  factor: number = 1.0
): Promise<RasterImage> {
  validateFactor(stage, factor);
  if (factor === 1) {
    return RasterImage.clone(image);
  }

  const degenerate = await degenerateFor(stage, image);
  return {
    width: image.width,
    height: image.height,
    data: blend(degenerate, image.data, factor),
  };
}

/**
 * Apply brightness, contrast, saturation and sharpness, in that order.
 *
 * Omitted settings default to 1.0 (no change); each stage works on the
 * previous stage's output.
 *
 * @throws {ConfigurationError} For negative or non-finite factors
 */
export async function enhanceImage(
  image: RasterImage,
  settings: EnhancementSettings = {}
): Promise<RasterImage> {
  let current = image;
  for (const stage of EnhancementSettings.KEYS) {
    const factor = settings[stage] ?? 1.0;
    if (factor !== 1) {
      console.debug(`Applying ${stage} x${factor}`);
    }
    current = await applyStage(current, stage, factor);
  }
  return current;
}
