/**
 * Display driver that writes encoded frames to a device node or file.
 *
 * A panel daemon (or a kernel framebuffer) picks the frame up from there.
 */

import { writeFile } from 'fs/promises';
import { ConfigurationError } from '../exceptions';
import type { DeviceConfig } from '../config/device-config';
import { readFlag, readOptionalString } from '../config/readers';
import type { RasterImage } from '../models/image';
import { compressFrame } from '../encoding/compression';
import { encodeFrame, FrameFormat, parseFrameFormat } from '../encoding/frames';
import type { DisplayDriver } from './driver';

export interface FrameSinkOptions {
  /** Where frames are written */
  path: string;

  /** Pixel layout the panel expects */
  format: FrameFormat;

  /** Deflate frames before writing (default: false) */
  compress?: boolean;
}

export class FrameSinkDisplay implements DisplayDriver {
  constructor(
    readonly name: string,
    private readonly options: FrameSinkOptions
  ) {}

  /**
   * Build from `framebuffer_path`, `framebuffer_format` and
   * `framebuffer_compress`.
   *
   * @param name - Driver name for logs
   * @param defaultFormat - Used when `framebuffer_format` is unset
   * @throws {ConfigurationError} If `framebuffer_path` is missing
   */
  static fromConfig(
    config: DeviceConfig,
    name: string,
    defaultFormat: FrameFormat
  ): FrameSinkDisplay {
    const path = readOptionalString(config, 'framebuffer_path');
    if (!path) {
      throw new ConfigurationError(`Display type '${name}' requires framebuffer_path`);
    }
    const format = parseFrameFormat(config.getConfig('framebuffer_format', defaultFormat));
    return new FrameSinkDisplay(name, {
      path,
      format,
      compress: readFlag(config, 'framebuffer_compress'),
    });
  }

  get format(): FrameFormat {
    return this.options.format;
  }

  async show(image: RasterImage): Promise<void> {
    const { path, format, compress = false } = this.options;

    const frame = await encodeFrame(image, format);
    const payload = compress ? compressFrame(frame) : frame;

    await writeFile(path, payload);
    console.log(
      `${this.name}: wrote ${image.width}x${image.height} ${format} frame ` +
        `(${payload.length} bytes${compress ? ', compressed' : ''}) to ${path}`
    );
  }
}
