/**
 * Rotation layer exports.
 */

export * from './random';
export * from './engine';
