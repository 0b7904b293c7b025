/**
 * Device configuration.
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { ConfigurationError } from '../exceptions';
import type { Dimensions } from '../models/image';

/**
 * Read access to the device settings the display pipeline needs.
 */
export interface DeviceConfig {
  /** Panel resolution as mounted (before orientation) */
  getResolution(): Dimensions;

  /** Raw configuration value, or `defaultValue` when the key is unset */
  getConfig(key: string, defaultValue?: unknown): unknown;

  /** Where the last rendered image is written */
  readonly currentImageFile: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseResolution(value: unknown): Dimensions {
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((v) => Number.isInteger(v) && v > 0)
  ) {
    return { width: Number(value[0]), height: Number(value[1]) };
  }
  throw new ConfigurationError(
    `Invalid resolution ${JSON.stringify(value)} (expected [width, height] positive integers)`
  );
}

/**
 * DeviceConfig backed by a JSON object.
 *
 * Recognized keys: `resolution` ([width, height], required),
 * `current_image_file`, `display_type`, `orientation`, `inverted_image`,
 * `image_settings`, plus driver-specific keys.
 *
 * @example
 * ```typescript
 * const config = JsonDeviceConfig.load('/etc/inkframe/device.json');
 * const { width, height } = config.getResolution();
 * ```
 */
export class JsonDeviceConfig implements DeviceConfig {
  private readonly resolution: Dimensions;
  readonly currentImageFile: string;

  /**
   * @param values - Parsed configuration object
   * @param baseDir - Directory relative paths resolve against
   */
  constructor(
    private readonly values: Record<string, unknown>,
    baseDir: string = process.cwd()
  ) {
    this.resolution = parseResolution(values.resolution);

    const imageFile = values.current_image_file ?? 'current_image.png';
    if (typeof imageFile !== 'string') {
      throw new ConfigurationError('current_image_file must be a string path');
    }
    this.currentImageFile = resolve(baseDir, imageFile);
  }

  /**
   * Load configuration from a JSON file.
   *
   * @throws {ConfigurationError} If the file is missing, unreadable or invalid
   */
  static load(path: string): JsonDeviceConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Could not read device config ${path}: ${detail}`);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Device config ${path} must contain a JSON object`);
    }
    console.log(`Loaded device config from ${path}`);
    return new JsonDeviceConfig(parsed, dirname(resolve(path)));
  }

  getResolution(): Dimensions {
    return { ...this.resolution };
  }

  getConfig(key: string, defaultValue?: unknown): unknown {
    const value = this.values[key];
    return value === undefined || value === null ? defaultValue : value;
  }
}
