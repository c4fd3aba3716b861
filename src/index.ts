/**
 * routemark - compiles route markers in handler doc comments into a
 * route registration module.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Markers
export * from './core/markers/index.js';

// Scanning and extraction
export * from './core/scanner/index.js';
export * from './core/extraction/index.js';

// Assembly
export * from './core/assembly/index.js';

// Hooks
export * from './core/hooks/index.js';

// Generation
export * from './core/generation/index.js';
export * from './core/post-validation/index.js';

// Pipeline
export * from './core/pipeline/index.js';

// Runtime contract
export type * from './runtime/contract.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
