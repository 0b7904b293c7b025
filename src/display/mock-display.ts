/**
 * Display driver that writes frames to disk instead of a panel.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { DeviceConfig } from '../config/device-config';
import { readOptionalString } from '../config/readers';
import type { RasterImage } from '../models/image';
import { encodePng } from '../imaging/raster';
import type { DisplayDriver } from './driver';

export class MockDisplay implements DisplayDriver {
  readonly name = 'mock';

  /** Number of images shown since construction */
  shownCount = 0;

  constructor(readonly outputDir: string) {}

  /**
   * Output directory from `mock_output_dir`, or a `mock` directory beside
   * the current image file.
   */
  static fromConfig(config: DeviceConfig): MockDisplay {
    const dir = readOptionalString(config, 'mock_output_dir');
    return new MockDisplay(dir ?? join(dirname(config.currentImageFile), 'mock'));
  }

  get latestPath(): string {
    return join(this.outputDir, 'latest.png');
  }

  async show(image: RasterImage): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(this.latestPath, await encodePng(image));
    this.shownCount++;
    console.log(`Mock display: wrote ${image.width}x${image.height} frame to ${this.latestPath}`);
  }
}
