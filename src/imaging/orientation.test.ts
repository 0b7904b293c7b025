import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../exceptions';
import { Orientation, Rotation } from '../models/enums';
import { RasterImage, type Rgb } from '../models/image';
import { rotate } from '.';
import { normalizeOrientation, orientationAngle, parseOrientation } from './orientation';

const A: Rgb = { r: 10, g: 20, b: 30 };
const B: Rgb = { r: 200, g: 150, b: 100 };

/**
 * 2x1 image: A on the left, B on the right.
 */
function pair(): RasterImage {
  return RasterImage.paste(RasterImage.filled({ width: 2, height: 1 }, A), RasterImage.filled({ width: 1, height: 1 }, B), 1, 0);
}

describe('orientationAngle', () => {
  it('maps orientations to angles', () => {
    expect(orientationAngle(Orientation.HORIZONTAL)).toBe(Rotation.ROTATE_0);
    expect(orientationAngle(Orientation.VERTICAL)).toBe(Rotation.ROTATE_90);
  });

  it('adds 180 degrees when inverted', () => {
    expect(orientationAngle(Orientation.HORIZONTAL, true)).toBe(Rotation.ROTATE_180);
    expect(orientationAngle(Orientation.VERTICAL, true)).toBe(Rotation.ROTATE_270);
  });
});

describe('parseOrientation', () => {
  it('rejects unknown orientations', () => {
    expect(() => parseOrientation('diagonal')).toThrow(ConfigurationError);
    expect(() => parseOrientation(undefined)).toThrow(ConfigurationError);
  });
});

describe('normalizeOrientation', () => {
  it('leaves horizontal images untouched', async () => {
    const source = pair();
    const out = await normalizeOrientation(source, Orientation.HORIZONTAL);
    expect(out.data).toEqual(source.data);
  });

  it('expands the canvas for vertical orientation', async () => {
    const out = await normalizeOrientation(RasterImage.filled({ width: 40, height: 20 }, A), 'vertical');
    expect(out.width).toBe(20);
    expect(out.height).toBe(40);
  });

  it('rotates counter-clockwise for vertical orientation', async () => {
    const out = await normalizeOrientation(pair(), Orientation.VERTICAL);
    expect(out.width).toBe(1);
    expect(out.height).toBe(2);
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual(B);
    expect(RasterImage.pixelAt(out, 0, 1)).toEqual(A);
  });

  it('turns inverted horizontal images upside down', async () => {
    const out = await normalizeOrientation(pair(), Orientation.HORIZONTAL, true);
    expect(out.width).toBe(2);
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual(B);
    expect(RasterImage.pixelAt(out, 1, 0)).toEqual(A);
  });

  it('rejects unknown orientations', async () => {
    await expect(normalizeOrientation(pair(), 'sideways')).rejects.toThrow(ConfigurationError);
  });
});

describe('rotate', () => {
  it('turns 270 degrees counter-clockwise, the left pixel ending on top', async () => {
    const out = await rotate(pair(), Rotation.ROTATE_270);
    expect(RasterImage.dimensions(out)).toEqual({ width: 1, height: 2 });
    expect(RasterImage.pixelAt(out, 0, 0)).toEqual(A);
    expect(RasterImage.pixelAt(out, 0, 1)).toEqual(B);
  });

  it('treats full turns as no rotation', async () => {
    const source = pair();
    const out = await rotate(source, 360);
    expect(out.data).toEqual(source.data);
  });
});
