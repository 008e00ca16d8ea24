/**
 * Type Exports
 */

export * from './result.js';
export * from './memory.js';
export * from './embedding.js';
export * from './errors.js';
