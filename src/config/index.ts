/**
 * Configuration layer exports.
 */

export * from './device-config';
export * from './settings-store';
export * from './readers';
