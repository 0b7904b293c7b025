/**
 * In-memory raster model.
 */

/**
 * Width and height in pixels.
 */
export interface Dimensions {
  width: number;
  height: number;
}

/**
 * 8-bit RGB color.
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Packed 24-bit RGB raster.
 *
 * Pixels are stored row-major, three bytes per pixel, so
 * `data.length === width * height * 3`.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export namespace RasterImage {
  export const CHANNELS = 3;

  /**
   * Create a raster filled with a single color.
   */
  export function filled(size: Dimensions, color: Rgb): RasterImage {
    const data = new Uint8Array(size.width * size.height * CHANNELS);
    for (let i = 0; i < data.length; i += CHANNELS) {
      data[i] = color.r;
      data[i + 1] = color.g;
      data[i + 2] = color.b;
    }
    return { width: size.width, height: size.height, data };
  }

  export function clone(image: RasterImage): RasterImage {
    return { width: image.width, height: image.height, data: image.data.slice() };
  }

  export function dimensions(image: RasterImage): Dimensions {
    return { width: image.width, height: image.height };
  }

  /**
   * Read one pixel.
   */
  export function pixelAt(image: RasterImage, x: number, y: number): Rgb {
    const i = (y * image.width + x) * CHANNELS;
    return { r: image.data[i], g: image.data[i + 1], b: image.data[i + 2] };
  }

  /**
   * Copy `source` onto `canvas` with its top-left corner at (left, top).
   * Pixels falling outside the canvas are dropped.
   */
  export function paste(canvas: RasterImage, source: RasterImage, left: number, top: number): RasterImage {
    const out = clone(canvas);
    for (let y = 0; y < source.height; y++) {
      const ty = top + y;
      if (ty < 0 || ty >= out.height) {
        continue;
      }
      const x0 = Math.max(0, -left);
      const x1 = Math.min(source.width, out.width - left);
      if (x1 <= x0) {
        continue;
      }
      const srcStart = (y * source.width + x0) * CHANNELS;
      const srcEnd = (y * source.width + x1) * CHANNELS;
      out.data.set(source.data.subarray(srcStart, srcEnd), (ty * out.width + left + x0) * CHANNELS);
    }
    return out;
  }

  /**
   * Cut a rectangle out of an image. The box must lie inside the image.
   */
  export function crop(
    image: RasterImage,
    box: { left: number; top: number; width: number; height: number }
  ): RasterImage {
    const data = new Uint8Array(box.width * box.height * CHANNELS);
    const rowBytes = box.width * CHANNELS;
    for (let y = 0; y < box.height; y++) {
      const start = ((box.top + y) * image.width + box.left) * CHANNELS;
      data.set(image.data.subarray(start, start + rowBytes), y * rowBytes);
    }
    return { width: box.width, height: box.height, data };
  }

  export function isPortrait(size: Dimensions): boolean {
    return size.height > size.width;
  }
}
