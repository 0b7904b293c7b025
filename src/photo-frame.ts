/**
 * Photo frame: one refresh pulls the next album photo and shows it.
 */

import { AlbumPhotoSource } from './album/photo-source';
import type { DeviceConfig } from './config/device-config';
import type { SettingsStore } from './config/settings-store';
import { DisplayOrchestrator } from './display/orchestrator';
import type { RasterImage } from './models/image';

export interface PhotoFrameOptions {
  config: DeviceConfig;
  settings: SettingsStore;
  source?: AlbumPhotoSource;
  orchestrator?: DisplayOrchestrator;
}

/**
 * Shared-album photo frame.
 *
 * Each `refresh()` runs one rotation cycle and one render. An external
 * scheduler calls it; refreshes must not overlap.
 *
 * @example
 * ```typescript
 * const frame = new PhotoFrame({
 *   config: JsonDeviceConfig.load('device.json'),
 *   settings: JsonFileSettingsStore.open('album.json'),
 * });
 * await frame.refresh();
 * ```
 */
export class PhotoFrame {
  private readonly source: AlbumPhotoSource;
  private readonly orchestrator: DisplayOrchestrator;

  constructor(private readonly options: PhotoFrameOptions) {
    this.source = options.source ?? new AlbumPhotoSource();
    this.orchestrator = options.orchestrator ?? DisplayOrchestrator.fromConfig(options.config);
  }

  /**
   * Show the next photo.
   *
   * @returns The frame that was shown
   */
  async refresh(): Promise<RasterImage> {
    const { config, settings } = this.options;
    const started = Date.now();

    const image = await this.source.generateImage(settings, config);
    const shown = await this.orchestrator.render(
      image,
      settings.get('photo_fit'),
      settings.get('backgroundColor')
    );

    console.log(`Refresh complete in ${((Date.now() - started) / 1000).toFixed(1)}s`);
    return shown;
  }
}
