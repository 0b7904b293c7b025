/**
 * Shared fixtures for tests.
 */

import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RasterImage, type Rgb } from '../models/image';

export const RED: Rgb = { r: 255, g: 0, b: 0 };
export const BLUE: Rgb = { r: 0, g: 0, b: 255 };

export function solid(width: number, height: number, color: Rgb = RED): RasterImage {
  return RasterImage.filled({ width, height }, color);
}

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'inkframe-'));
}

export const ALBUM_URL = 'https://www.icloud.com/sharedalbum/#B2D5xyz';
