/**
 * Models layer exports.
 */

export * from './enums';
export * from './image';
export * from './fit';
export * from './enhancement';
export * from './pool';
export * from './stream';
