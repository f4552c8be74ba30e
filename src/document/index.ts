/**
 * Document model barrel
 */

export * from './types.js';
export * from './tags.js';
export * from './accessors.js';
export * from './parser.js';
export * from './metadata.js';
