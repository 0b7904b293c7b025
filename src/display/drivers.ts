/**
 * Built-in display drivers.
 */

import type { DeviceConfig } from '../config/device-config';
import { FrameFormat } from '../encoding/frames';
import { DriverRegistry, type DisplayDriver } from './driver';
import { FrameSinkDisplay } from './frame-sink-display';
import { MockDisplay } from './mock-display';

/**
 * Registry with `mock`, `inky` (24-bit frames) and the `epd*in*` panel
 * family (1-bit frames).
 */
export function createDefaultRegistry(): DriverRegistry {
  return new DriverRegistry()
    .register('mock', (config) => MockDisplay.fromConfig(config))
    .register('inky', (config) => FrameSinkDisplay.fromConfig(config, 'inky', FrameFormat.RGB))
    .register(/^epd.*in.*$/, (config) => FrameSinkDisplay.fromConfig(config, 'epd', FrameFormat.MONO));
}

/**
 * Create the driver for a device's `display_type` (default `mock`).
 *
 * @throws {ConfigurationError} For an unsupported display type
 */
export function createDisplayDriver(
  config: DeviceConfig,
  registry: DriverRegistry = createDefaultRegistry()
): DisplayDriver {
  return registry.create(config);
}
