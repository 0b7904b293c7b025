import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../exceptions';
import { RasterImage, type Rgb } from '../models/image';
import { applyStage, enhanceImage } from './enhance';

function solid(color: Rgb, width = 4, height = 4): RasterImage {
  return RasterImage.filled({ width, height }, color);
}

/**
 * 2x1 image: black then the given gray.
 */
function blackAnd(level: number): RasterImage {
  return RasterImage.paste(
    solid({ r: 0, g: 0, b: 0 }, 2, 1),
    solid({ r: level, g: level, b: level }, 1, 1),
    1,
    0
  );
}

describe('enhanceImage', () => {
  it('is a no-op with every factor at 1.0', async () => {
    const source = RasterImage.paste(solid({ r: 12, g: 200, b: 99 }), solid({ r: 250, g: 3, b: 77 }, 2, 2), 1, 1);
    const out = await enhanceImage(source, { brightness: 1, contrast: 1, saturation: 1, sharpness: 1 });
    expect(out.data).toEqual(source.data);
    expect(out.data).not.toBe(source.data);
  });

  it('treats omitted settings as 1.0', async () => {
    const source = solid({ r: 40, g: 80, b: 120 });
    const out = await enhanceImage(source);
    expect(out.data).toEqual(source.data);
  });

  it('scales brightness', async () => {
    const out = await enhanceImage(solid({ r: 200, g: 100, b: 50 }), { brightness: 0.5 });
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual({ r: 100, g: 50, b: 25 });
  });

  it('clamps brightened values', async () => {
    const out = await enhanceImage(solid({ r: 200, g: 100, b: 50 }), { brightness: 2 });
    expect(RasterImage.pixelAt(out, 3, 3)).toEqual({ r: 255, g: 200, b: 100 });
  });

  it('collapses to the mean gray at zero contrast', async () => {
    const out = await enhanceImage(blackAnd(255), { contrast: 0 });
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual({ r: 128, g: 128, b: 128 });
    expect(RasterImage.pixelAt(out, 1, 0)).toEqual({ r: 128, g: 128, b: 128 });
  });

  it('collapses to luma at zero saturation', async () => {
    const out = await enhanceImage(solid({ r: 255, g: 0, b: 0 }), { saturation: 0 });
    expect(RasterImage.pixelAt(out, 2, 2)).toEqual({ r: 76, g: 76, b: 76 });
  });

  it('applies stages in order, each on the previous output', async () => {
    // brightness first: [0, 255] -> mean 128 -> contrast 0.5 gives [64, 192]
    // contrast first would give [75, 225]
    const out = await enhanceImage(blackAnd(200), { brightness: 1.5, contrast: 0.5 });
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual({ r: 64, g: 64, b: 64 });
    expect(RasterImage.pixelAt(out, 1, 0)).toEqual({ r: 192, g: 192, b: 192 });
  });

  it('leaves flat regions alone when sharpening', async () => {
    const out = await enhanceImage(solid({ r: 120, g: 120, b: 120 }, 5, 5), { sharpness: 2 });
    expect(out.width).toBe(5);
    expect(out.height).toBe(5);
    expect(RasterImage.pixelAt(out, 2, 2)).toEqual({ r: 120, g: 120, b: 120 });
  });

  it('smooths interior pixels and keeps the border at sharpness 0', async () => {
    const source = RasterImage.paste(
      solid({ r: 120, g: 120, b: 120 }, 5, 5),
      solid({ r: 250, g: 250, b: 250 }, 1, 1),
      0,
      0
    );

    const out = await enhanceImage(source, { sharpness: 0 });

    expect(RasterImage.pixelAt(out, 0, 0)).toEqual({ r: 250, g: 250, b: 250 });
    expect(RasterImage.pixelAt(out, 1, 0)).toEqual({ r: 120, g: 120, b: 120 });
    expect(RasterImage.pixelAt(out, 0, 1)).toEqual({ r: 120, g: 120, b: 120 });
    // (250 + 7 * 120 + 5 * 120) / 13
    expect(RasterImage.pixelAt(out, 1, 1)).toEqual({ r: 130, g: 130, b: 130 });
    expect(RasterImage.pixelAt(out, 2, 2)).toEqual({ r: 120, g: 120, b: 120 });
  });

  it('rejects negative factors', async () => {
    await expect(enhanceImage(solid({ r: 1, g: 2, b: 3 }), { contrast: -1 })).rejects.toThrow(ConfigurationError);
  });
});

describe('applyStage', () => {
  it('rejects non-finite factors', async () => {
    await expect(applyStage(solid({ r: 1, g: 2, b: 3 }), 'brightness', Number.NaN)).rejects.toThrow(
      ConfigurationError
    );
  });
});
