import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../exceptions';
import { RasterImage } from '../models/image';
import { compressFrame, decompressFrame } from './compression';
import { encode1bpp, encode2bpp, encodeFrame, FrameFormat, parseFrameFormat, quantizeGray4 } from './frames';

const BLACK = { r: 0, g: 0, b: 0 };
const WHITE = { r: 255, g: 255, b: 255 };

describe('encode1bpp', () => {
  it('packs MSB first and pads rows to a byte', () => {
    const frame = {
      width: 10,
      height: 1,
      indices: new Uint8Array([1, 0, 1, 0, 0, 0, 0, 0, 1, 1]),
    };
    expect([...encode1bpp(frame)]).toEqual([0xa0, 0xc0]);
  });
});

describe('encode2bpp', () => {
  it('packs four pixels per byte', () => {
    const frame = { width: 5, height: 1, indices: new Uint8Array([3, 2, 1, 0, 3]) };
    expect([...encode2bpp(frame)]).toEqual([0xe4, 0xc0]);
  });
});

describe('encodeFrame', () => {
  it('thresholds to 1-bit with white as 1', async () => {
    const image = RasterImage.paste(
      RasterImage.filled({ width: 8, height: 1 }, WHITE),
      RasterImage.filled({ width: 4, height: 1 }, BLACK),
      0,
      0
    );
    expect([...(await encodeFrame(image, FrameFormat.MONO))]).toEqual([0x0f]);
  });

  it('passes RGB frames through as a copy', async () => {
    const image = RasterImage.filled({ width: 1, height: 1 }, { r: 1, g: 2, b: 3 });
    const frame = await encodeFrame(image, FrameFormat.RGB);
    frame[0] = 99;
    expect([...image.data]).toEqual([1, 2, 3]);
  });

  it('maps black and white to the ends of the gray scale', async () => {
    const image = RasterImage.paste(
      RasterImage.filled({ width: 2, height: 1 }, WHITE),
      RasterImage.filled({ width: 1, height: 1 }, BLACK),
      0,
      0
    );
    expect([...(await quantizeGray4(image)).indices]).toEqual([0, 3]);
  });
});

describe('parseFrameFormat', () => {
  it('accepts known formats', () => {
    expect(parseFrameFormat('gray4')).toBe(FrameFormat.GRAY4);
  });

  it('rejects unknown formats', () => {
    expect(() => parseFrameFormat('cmyk')).toThrow(ConfigurationError);
  });
});

describe('compressFrame', () => {
  it('inflates back to the original frame', () => {
    const frame = new Uint8Array(64).fill(0xaa);
    const compressed = compressFrame(frame);
    expect(compressed.length).toBeLessThan(frame.length);
    expect([...decompressFrame(compressed)]).toEqual([...frame]);
  });

  it('returns the input at level 0', () => {
    const frame = new Uint8Array([1, 2, 3]);
    expect(compressFrame(frame, 0)).toBe(frame);
  });
});
