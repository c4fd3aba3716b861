/**
 * Configuration schema for `.routemark.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't apply inner defaults, so undefined/null
 * is preprocessed to {} and parsed by the inner schema.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Which source files are scanned for markers. */
export const HandlersSchema = z.object({
  include: z.array(z.string()).default(['**/*.ts', '**/*.tsx', '**/*.mts']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/*.d.ts',
    '**/*.test.ts',
    '**/*.spec.ts',
    '.routemark/**',
  ]),
});

/** How handler modules are imported by the generated file. */
export const ImportStyleSchema = z.enum(['relative', 'package']);

/** Code generation settings. */
export const GenerationSchema = z.object({
  /** Output file, relative to the project root */
  output: z.string().default('.routemark/routes.generated.ts'),
  /** Target package name recorded in generatedMetadata */
  package_name: z.string().min(1).default('routes'),
  /** Module the generated code imports middleware factories and registry types from */
  runtime_module: z.string().min(1).default('@routemark/runtime'),
  import_style: ImportStyleSchema.default('relative'),
  /** Name of the generated startup function */
  entry_point: z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be a valid identifier').default('initializeRoutes'),
});

/** Production output settings. */
export const ProdSchema = z.object({
  /** Re-parse and structurally check the generated file */
  validate: z.boolean().default(true),
  /** Emit whitespace-minimized output */
  minify: z.boolean().default(false),
});

export const DevSchema = z.object({
  verbose: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  handlers: withDefaults(HandlersSchema),
  generation: withDefaults(GenerationSchema),
  prod: withDefaults(ProdSchema),
  dev: withDefaults(DevSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type HandlersConfig = z.infer<typeof HandlersSchema>;
export type GenerationConfig = z.infer<typeof GenerationSchema>;
export type ImportStyle = z.infer<typeof ImportStyleSchema>;
