/**
 * Display layer exports.
 */

export * from './driver';
export * from './drivers';
export * from './mock-display';
export * from './frame-sink-display';
export * from './orchestrator';
