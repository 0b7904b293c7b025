/**
 * Display driver capability and registry.
 */

import { ConfigurationError } from '../exceptions';
import type { DeviceConfig } from '../config/device-config';
import type { RasterImage } from '../models/image';

/**
 * Anything that can put a final, panel-sized image on screen.
 *
 * Color-depth reduction for limited panels is the driver's job.
 */
export interface DisplayDriver {
  readonly name: string;
  show(image: RasterImage): Promise<void>;
}

export type DriverFactory = (config: DeviceConfig) => DisplayDriver;

interface DriverEntry {
  label: string;
  matches: (displayType: string) => boolean;
  create: DriverFactory;
}

/**
 * Named driver constructors, chosen by the `display_type` config value.
 *
 * Entries match either an exact tag or a pattern covering a panel family.
 * The first registered match wins.
 */
export class DriverRegistry {
  private readonly entries: DriverEntry[] = [];

  /**
   * @param match - Exact display type, or a RegExp for a family of types
   * @param create - Constructor for the driver
   */
  register(match: string | RegExp, create: DriverFactory): this {
    const matches =
      typeof match === 'string'
        ? (displayType: string) => displayType === match
        : (displayType: string) => match.test(displayType);
    this.entries.push({ label: String(match), matches, create });
    return this;
  }

  /**
   * @throws {ConfigurationError} If no entry matches
   */
  resolve(displayType: string): DriverFactory {
    const entry = this.entries.find((e) => e.matches(displayType));
    if (!entry) {
      throw new ConfigurationError(
        `Unsupported display type: '${displayType}' ` +
          `(known: ${this.entries.map((e) => e.label).join(', ')})`
      );
    }
    return entry.create;
  }

  /**
   * Create the driver named by the config's `display_type`.
   *
   * @param defaultType - Used when `display_type` is unset
   * @throws {ConfigurationError} For an unknown or non-string display type
   */
  create(config: DeviceConfig, defaultType: string = 'mock'): DisplayDriver {
    const displayType = config.getConfig('display_type', defaultType);
    if (typeof displayType !== 'string') {
      throw new ConfigurationError(`display_type must be a string, got ${JSON.stringify(displayType)}`);
    }
    const driver = this.resolve(displayType)(config);
    console.log(`Using display driver '${driver.name}' for display type '${displayType}'`);
    return driver;
  }
}
