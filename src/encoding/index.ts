/**
 * Frame encoding exports.
 */

export * from './frames';
export * from './compression';
