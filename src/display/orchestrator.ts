/**
 * Render pipeline: orientation, fit, inversion, enhancement, persist, show.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ConfigurationError } from '../exceptions';
import type { DeviceConfig } from '../config/device-config';
import { readEnhancement, readFlag, readOrientation } from '../config/readers';
import { FitConfig } from '../models/fit';
import type { RasterImage } from '../models/image';
import { Rotation } from '../models/enums';
import { resolveBackground } from '../imaging/color';
import { enhanceImage } from '../imaging/enhance';
import { resolveFit } from '../imaging/fit';
import { computeImageHash } from '../imaging/hash';
import { normalizeOrientation } from '../imaging/orientation';
import { encodePng, rotate } from '../imaging/raster';
import type { DisplayDriver, DriverRegistry } from './driver';
import { createDisplayDriver } from './drivers';

/**
 * Turns an arbitrary image into the panel's final frame and hands it to
 * the active display driver.
 *
 * @example
 * ```typescript
 * const config = JsonDeviceConfig.load('device.json');
 * const orchestrator = DisplayOrchestrator.fromConfig(config);
 * await orchestrator.render(image, { strategy: 'smart' }, '#000000');
 * ```
 */
export class DisplayOrchestrator {
  private lastHash: string | null = null;

  constructor(
    private readonly config: DeviceConfig,
    private readonly driver: DisplayDriver | null
  ) {}

  /**
   * Build an orchestrator with the driver named by `display_type`.
   *
   * @throws {ConfigurationError} For an unsupported display type
   */
  static fromConfig(config: DeviceConfig, registry?: DriverRegistry): DisplayOrchestrator {
    return new DisplayOrchestrator(config, createDisplayDriver(config, registry));
  }

  /**
   * Render an image to the display.
   *
   * Steps, in order: resolve the background color (invalid colors fall back
   * to white), rotate to the configured orientation, fit to the panel
   * resolution, apply `inverted_image`, apply `image_settings`, write the
   * result to `currentImageFile`, then call the driver.
   *
   * @param image - Source image
   * @param photoFit - Fit settings, `{ strategy, preserve }` or `{ fit: {...} }`
   * @param backgroundColor - Padding color for letterboxed fits
   * @returns The image that was shown
   * @throws {ConfigurationError} If no driver is configured, or on invalid
   *   orientation or resolution
   */
  async render(
    image: RasterImage,
    photoFit?: unknown,
    backgroundColor?: unknown
  ): Promise<RasterImage> {
    if (!this.driver) {
      throw new ConfigurationError('No valid display driver configured');
    }

    const background = resolveBackground(backgroundColor);
    const orientation = readOrientation(this.config);
    const resolution = this.config.getResolution();

    console.debug(
      `Render start: source=${image.width}x${image.height} ` +
        `resolution=${resolution.width}x${resolution.height} orientation=${orientation}`
    );

    let frame = await normalizeOrientation(image, orientation);
    console.debug(`Post-orientation size ${frame.width}x${frame.height}`);

    const fitConfig = FitConfig.fromSettings(photoFit);
    console.debug(`Fit config strategy=${fitConfig.strategy} preserve=${fitConfig.preserve}`);
    frame = await resolveFit(frame, resolution, fitConfig, orientation, background);
    console.debug(`Post-fit size ${frame.width}x${frame.height}`);

    if (readFlag(this.config, 'inverted_image')) {
      frame = await rotate(frame, Rotation.ROTATE_180);
      console.debug('Applied inverted_image rotation');
    }

    frame = await enhanceImage(frame, readEnhancement(this.config));

    const hash = computeImageHash(frame);
    if (hash === this.lastHash) {
      console.log('Rendered frame unchanged since last render');
    }
    this.lastHash = hash;

    const target = this.config.currentImageFile;
    console.log(`Saving image to ${target}`);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, await encodePng(frame));

    await this.driver.show(frame);
    return frame;
  }
}
