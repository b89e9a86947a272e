/**
 * Domain model exports.
 */

export * from './attachment';
export * from './compute-server';
export * from './errors';
export * from './guards';
export * from './identity';
export * from './image';
export * from './volume';
