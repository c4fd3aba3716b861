/**
 * Configuration exports barrel file.
 */
export * from './schema.js';
export * from './loader.js';
