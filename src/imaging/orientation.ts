/**
 * Orientation normalization.
 */

import { ConfigurationError } from '../exceptions';
import type { RasterImage } from '../models/image';
import { Orientation, Rotation } from '../models/enums';
import { rotate } from './raster';

/**
 * Validate an orientation value from configuration.
 *
 * @throws {ConfigurationError} For anything other than horizontal/vertical
 */
export function parseOrientation(value: unknown): Orientation {
  if (value === Orientation.HORIZONTAL || value === Orientation.VERTICAL) {
    return value;
  }
  throw new ConfigurationError(
    `Unsupported orientation: ${JSON.stringify(value)} (expected 'horizontal' or 'vertical')`
  );
}

/**
 * Rotation angle for an orientation, compounded by 180° when inverted.
 */
export function orientationAngle(orientation: Orientation, inverted: boolean = false): Rotation {
  const base = orientation === Orientation.VERTICAL ? Rotation.ROTATE_90 : Rotation.ROTATE_0;
  if (!inverted) {
    return base;
  }
  return base === Rotation.ROTATE_90 ? Rotation.ROTATE_270 : Rotation.ROTATE_180;
}

/**
 * Rotate an image into the panel's logical orientation.
 *
 * The canvas expands to fit the rotated content, so a vertical orientation
 * swaps width and height.
 *
 * @param image - Source image
 * @param orientation - 'horizontal' (0°) or 'vertical' (90° counter-clockwise)
 * @param inverted - Add a further 180°
 * @throws {ConfigurationError} For an unknown orientation
 */
export async function normalizeOrientation(
  image: RasterImage,
  orientation: Orientation | string,
  inverted: boolean = false
): Promise<RasterImage> {
  const angle = orientationAngle(parseOrientation(orientation), inverted);
  return rotate(image, angle);
}
