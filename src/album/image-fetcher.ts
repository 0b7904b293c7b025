/**
 * Download a photo and letterbox it onto a panel-sized canvas.
 */

import type { Dimensions, RasterImage, Rgb } from '../models/image';
import { WHITE } from '../imaging/color';
import { letterbox, validateTargetSize } from '../imaging/fit';
import { decodeImage } from '../imaging/raster';
import { HttpTransport } from './http';

export class ImageFetcher {
  private readonly transport: HttpTransport;

  constructor(options: { transport?: HttpTransport } = {}) {
    this.transport = options.transport ?? new HttpTransport();
  }

  /**
   * Download, decode and fit an image without cropping.
   *
   * @param url - Resolved download URL
   * @param targetSize - Canvas size
   * @param background - Padding color
   * @throws {TransportError} If the download fails or times out
   * @throws {DecodeError} If the payload is not an image
   * @throws {ConfigurationError} If the target size is not positive
   */
  async fetchAndFit(
    url: string,
    targetSize: Dimensions,
    background: Rgb = WHITE
  ): Promise<RasterImage> {
    validateTargetSize(targetSize);

    const bytes = await this.transport.getBytes(url);
    console.debug(`Downloaded ${bytes.length} bytes`);

    const decoded = await decodeImage(bytes);
    const fitted = await letterbox(decoded, targetSize, background);
    console.debug(
      `Fitted ${decoded.width}x${decoded.height} photo onto ` +
        `${targetSize.width}x${targetSize.height} canvas`
    );
    return fitted;
  }
}
