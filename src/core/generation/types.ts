/**
 * Generation context and output options.
 */
import type { RouteMetadata, SchemaMetadata } from '../assembly/types.js';

/**
 * A namespace import of the generated module: `import * as alias from 'specifier'`.
 */
export interface ImportSpec {
  alias: string;
  specifier: string;
  /** Absolute path of the handler file this import binds, if any */
  sourceFile?: string;
}

/**
 * Everything the generator needs, built once per run and threaded through
 * the pre-generation hooks.
 */
export interface GenerationContext {
  packageName: string;
  routes: ReadonlyArray<Readonly<RouteMetadata>>;
  schemas: SchemaMetadata[];
  imports: ImportSpec[];
  /** Free-form values hooks may share with each other */
  metadata: Record<string, unknown>;
  /** ISO-8601 timestamp */
  generatedAt: string;
}

export type OutputStyle = 'verbose' | 'minified';

export interface GenerateOptions {
  entryPoint: string;
  style: OutputStyle;
}
