/**
 * Types produced by the source scanner.
 */
import type { SchemaFieldEntry } from '../../runtime/contract.js';

/**
 * `function` covers function declarations and function-valued variables;
 * `structure` covers interfaces, classes and type aliases.
 */
export type DeclarationKind = 'function' | 'structure';

/**
 * One normalized line of a doc comment, delimiters stripped.
 */
export interface CommentLine {
  text: string;
  /** 1-based source line */
  line: number;
}

export interface ScannedDeclaration {
  kind: DeclarationKind;
  name: string;
  /**
   * Name the module exports the declaration under: `default` for a
   * default export, the alias for `export { a as b }`. Null when not exported.
   */
  exportName: string | null;
  /** 1-based line of the declaration itself, comments excluded */
  line: number;
  comment: CommentLine[];
  /** Property members, for structures */
  fields: SchemaFieldEntry[];
}

export interface ScannedFile {
  filePath: string;
  /** Path relative to the scanned root, forward slashes */
  relativePath: string;
  packageName: string;
  declarations: ScannedDeclaration[];
}

export interface ScanOptions {
  include: string[];
  exclude: string[];
  /** Marker names the pre-check looks for; declarations mentioning none are skipped */
  markerNames: string[];
}

export interface ScanResult {
  rootDir: string;
  files: ScannedFile[];
  /** Number of source files parsed, including those without candidate declarations */
  filesScanned: number;
}
