/**
 * Shared album as an image source for the display.
 */

import type { DeviceConfig } from '../config/device-config';
import { readOrientation } from '../config/readers';
import type { SettingsStore } from '../config/settings-store';
import { Orientation } from '../models/enums';
import type { Dimensions, RasterImage } from '../models/image';
import { resolveBackground } from '../imaging/color';
import { RotationEngine } from '../rotation/engine';
import { ImageFetcher } from './image-fetcher';

/**
 * Canvas size for a source image: the panel resolution, turned on its side
 * for vertical panels.
 */
export function sourceDimensions(config: DeviceConfig): Dimensions {
  const { width, height } = config.getResolution();
  return readOrientation(config) === Orientation.VERTICAL
    ? { width: height, height: width }
    : { width, height };
}

export class AlbumPhotoSource {
  private readonly engine: RotationEngine;
  private readonly fetcher: ImageFetcher;

  constructor(options: { engine?: RotationEngine; fetcher?: ImageFetcher } = {}) {
    this.engine = options.engine ?? new RotationEngine();
    this.fetcher = options.fetcher ?? new ImageFetcher();
  }

  /**
   * Pick the next album photo and return it letterboxed to the panel.
   *
   * Uses `album_url`, `photos` and `backgroundColor` from the settings.
   */
  async generateImage(settings: SettingsStore, config: DeviceConfig): Promise<RasterImage> {
    const { url } = await this.engine.runCycle(settings);

    const dimensions = sourceDimensions(config);
    console.debug(`Target render dimensions ${dimensions.width}x${dimensions.height}`);

    const background = resolveBackground(settings.get('backgroundColor'));
    return this.fetcher.fetchAndFit(url, dimensions, background);
  }
}
