/**
 * Code generation exports.
 */
export * from './types.js';
export * from './ir.js';
export { escapeString, formatKey, isIdentifier } from './escape.js';
export { printModule, printExpr } from './printer.js';
export { minifySource } from './minifier.js';
export {
  GENERATED_HEADER,
  OUTPUT_DIR_NAME,
  buildModule,
  renderModule,
  writeGeneratedFile,
  type BuildOptions,
  type WriteResult,
} from './generator.js';
