export * from './types.js';
export { SourceScanner, leadingComment, normalizeCommentLine, packageNameFor } from './scanner.js';
