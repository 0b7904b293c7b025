/**
 * Enums for display and fit configuration.
 */

/**
 * Logical panel orientation.
 */
export enum Orientation {
  HORIZONTAL = 'horizontal',
  VERTICAL = 'vertical',
}

/**
 * How a source aspect ratio is reconciled with the target canvas.
 *
 * COVER is an alias of DEFAULT (center-crop to fill).
 */
export enum FitStrategy {
  DEFAULT = 'default',
  COVER = 'cover',
  CONTAIN = 'contain',
  STRETCH = 'stretch',
  SMART = 'smart',
}

/**
 * Axis kept intact when cropping to the target ratio.
 */
export enum FitPreserve {
  NONE = 'none',
  WIDTH = 'width',
  HEIGHT = 'height',
}

/**
 * Rotation angles in degrees (counter-clockwise).
 */
export enum Rotation {
  ROTATE_0 = 0,
  ROTATE_90 = 90,
  ROTATE_180 = 180,
  ROTATE_270 = 270,
}
