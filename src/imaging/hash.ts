/**
 * Raster content hashing.
 */

import { createHash } from 'crypto';
import type { RasterImage } from '../models/image';

/**
 * SHA-256 over the RGB bytes, hex encoded.
 */
export function computeImageHash(image: RasterImage): string {
  return createHash('sha256').update(image.data).digest('hex');
}
