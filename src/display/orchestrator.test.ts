import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { JsonDeviceConfig } from '../config/device-config';
import { ConfigurationError } from '../exceptions';
import { RasterImage, type Rgb } from '../models/image';
import { decodeImage } from '../imaging/raster';
import { BLUE, RED, solid, tempDir } from '../testing/fixtures';
import { MockDisplay } from './mock-display';
import { DisplayOrchestrator } from './orchestrator';

const WHITE: Rgb = { r: 255, g: 255, b: 255 };
const WARM: Rgb = { r: 200, g: 100, b: 50 };

function setup(values: Record<string, unknown> = {}) {
  const dir = tempDir();
  const config = new JsonDeviceConfig({ resolution: [16, 9], ...values }, dir);
  const driver = new MockDisplay(join(dir, 'mock'));
  return { dir, config, driver, orchestrator: new DisplayOrchestrator(config, driver) };
}

describe('DisplayOrchestrator.render', () => {
  it('fails without a driver and writes nothing', async () => {
    const dir = tempDir();
    const config = new JsonDeviceConfig({ resolution: [16, 9] }, dir);
    const orchestrator = new DisplayOrchestrator(config, null);

    await expect(orchestrator.render(solid(4, 4))).rejects.toThrow('No valid display driver configured');
    await expect(orchestrator.render(solid(4, 4))).rejects.toThrow(ConfigurationError);
    expect(existsSync(config.currentImageFile)).toBe(false);
  });

  it('renders at the panel resolution and shows the frame', async () => {
    const { config, driver, orchestrator } = setup();

    const frame = await orchestrator.render(solid(40, 30));

    expect(RasterImage.dimensions(frame)).toEqual({ width: 16, height: 9 });
    expect(driver.shownCount).toBe(1);
    expect(existsSync(driver.latestPath)).toBe(true);

    const saved = await decodeImage(new Uint8Array(await readFile(config.currentImageFile)));
    expect(RasterImage.dimensions(saved)).toEqual({ width: 16, height: 9 });
    expect(RasterImage.pixelAt(saved, 8, 4)).toEqual(RasterImage.pixelAt(frame, 8, 4));
  });

  it('keeps the panel resolution in vertical orientation', async () => {
    const { orchestrator } = setup({ orientation: 'vertical' });
    const frame = await orchestrator.render(solid(30, 20));
    expect(RasterImage.dimensions(frame)).toEqual({ width: 16, height: 9 });
  });

  it('rejects an unknown orientation', async () => {
    const { orchestrator, driver } = setup({ orientation: 'diagonal' });
    await expect(orchestrator.render(solid(16, 9))).rejects.toThrow(ConfigurationError);
    expect(driver.shownCount).toBe(0);
  });

  it('pads with white when the background color is invalid', async () => {
    const { orchestrator } = setup();

    const frame = await orchestrator.render(solid(9, 9, RED), { strategy: 'contain' }, 'not-a-color');

    // 9x9 content centered on a 16x9 canvas starts at column 3
    expect(RasterImage.pixelAt(frame, 0, 4)).toEqual(WHITE);
    expect(RasterImage.pixelAt(frame, 2, 4)).toEqual(WHITE);
    expect(RasterImage.pixelAt(frame, 3, 4)).toEqual(RED);
    expect(RasterImage.pixelAt(frame, 11, 4)).toEqual(RED);
    expect(RasterImage.pixelAt(frame, 12, 4)).toEqual(WHITE);
  });

  it('pads with the requested background color', async () => {
    const { orchestrator } = setup();
    const frame = await orchestrator.render(solid(9, 9, RED), { fit: { strategy: 'contain' } }, '#0000ff');
    expect(RasterImage.pixelAt(frame, 0, 4)).toEqual(BLUE);
  });

  it('turns the frame upside down when inverted_image is set', async () => {
    const { orchestrator } = setup({ inverted_image: true });
    const halves = RasterImage.paste(solid(16, 9, RED), solid(8, 9, BLUE), 8, 0);

    const frame = await orchestrator.render(halves);

    expect(RasterImage.pixelAt(frame, 0, 0)).toEqual(BLUE);
    expect(RasterImage.pixelAt(frame, 15, 8)).toEqual(RED);
  });

  it('applies image_settings after fitting', async () => {
    const { orchestrator } = setup({ image_settings: { brightness: 0.5 } });
    const frame = await orchestrator.render(solid(16, 9, WARM));
    expect(RasterImage.pixelAt(frame, 5, 5)).toEqual({ r: 100, g: 50, b: 25 });
  });
});
