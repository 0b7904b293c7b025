/**
 * Imaging layer exports.
 */

export * from './color';
export * from './fit';
export * from './orientation';
export * from './enhance';
export * from './hash';
export { decodeImage, encodePng, rotate } from './raster';
