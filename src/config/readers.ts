/**
 * Typed readers over loosely-typed configuration values.
 */

import { ConfigurationError } from '../exceptions';
import { EnhancementSettings } from '../models/enhancement';
import { Orientation } from '../models/enums';
import { parseOrientation } from '../imaging/orientation';
import type { DeviceConfig } from './device-config';

export function readOrientation(config: DeviceConfig): Orientation {
  return parseOrientation(config.getConfig('orientation', Orientation.HORIZONTAL));
}

/**
 * Booleans may be stored as true/false or as the strings "true"/"false".
 */
export function readFlag(config: DeviceConfig, key: string): boolean {
  const value = config.getConfig(key, false);
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false' || value === '') {
    return false;
  }
  throw new ConfigurationError(`${key} must be a boolean, got ${JSON.stringify(value)}`);
}

export function readEnhancement(config: DeviceConfig): EnhancementSettings {
  return EnhancementSettings.fromSettings(config.getConfig('image_settings', {}));
}

export function readOptionalString(config: DeviceConfig, key: string): string | undefined {
  const value = config.getConfig(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${key} must be a string, got ${JSON.stringify(value)}`);
  }
  return value;
}
