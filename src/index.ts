/**
 * inkframe - image fitting and shared-album photo rotation for e-ink frames
 *
 * Main entry point exporting the public API.
 */

// Top-level frame
export { PhotoFrame, type PhotoFrameOptions } from './photo-frame';

// Layers
export * from './models';
export * from './imaging';
export * from './encoding';
export * from './display';
export * from './album';
export * from './rotation';
export * from './config';

// Exceptions
export * from './exceptions';
