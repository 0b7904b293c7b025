/**
 * Shared album layer exports.
 */

export * from './base62';
export * from './stream-identity';
export * from './http';
export * from './client';
export * from './image-fetcher';
export * from './photo-source';
