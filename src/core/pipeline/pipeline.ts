/**
 * End-to-end compiler pipeline:
 * scan → extract/validate → assemble → hooks → generate → post-validate.
 */
import * as path from 'node:path';
import { MultipleValidationError, type ValidationError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { assembleRoute, assembleSchema } from '../assembly/assembler.js';
import { GroupRegistry } from '../assembly/group-registry.js';
import type { RouteMetadata, SchemaMetadata } from '../assembly/types.js';
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { extractMarkers } from '../extraction/extractor.js';
import { renderModule, writeGeneratedFile } from '../generation/generator.js';
import type { GenerationContext } from '../generation/types.js';
import { createDefaultHookPipeline } from '../hooks/builtins.js';
import type { HookPipeline } from '../hooks/pipeline.js';
import { createDefaultMarkerRegistry } from '../markers/builtins.js';
import type { MarkerRegistry } from '../markers/registry.js';
import { validateGeneratedFile } from '../post-validation/validator.js';
import { SourceScanner } from '../scanner/scanner.js';

export interface ParseOptions {
  registry?: MarkerRegistry;
  groups?: GroupRegistry;
  include?: string[];
  exclude?: string[];
  logger?: Logger;
}

export interface ParseStats {
  filesScanned: number;
  declarations: number;
  routes: number;
  schemas: number;
}

export interface ParseResult {
  routes: RouteMetadata[];
  schemas: SchemaMetadata[];
  stats: ParseStats;
}

/**
 * Scan `rootDir` and assemble every route and schema record.
 *
 * Throws MultipleValidationError carrying every declaration-level error
 * of the scan, or SystemError when the scan itself fails.
 */
export function parseDirectory(rootDir: string, options: ParseOptions = {}): ParseResult {
  const registry = options.registry ?? createDefaultMarkerRegistry();
  const groups = options.groups ?? new GroupRegistry();
  const defaults = getDefaultConfig().handlers;
  const log = options.logger ?? defaultLogger;

  const scanner = new SourceScanner({
    include: options.include ?? defaults.include,
    exclude: options.exclude ?? defaults.exclude,
    markerNames: registry.names(),
  });
  const scan = scanner.scan(rootDir);

  const routes: RouteMetadata[] = [];
  const schemas: SchemaMetadata[] = [];
  const errors: ValidationError[] = [];
  let declarations = 0;

  for (const file of scan.files) {
    for (const declaration of file.declarations) {
      declarations++;
      const extraction = extractMarkers(declaration, file.relativePath, registry);
      if (extraction.errors.length > 0) {
        errors.push(...extraction.errors);
        continue;
      }

      const route = assembleRoute(declaration, extraction.markers, { file, registry, groups, logger: log });
      if (route) routes.push(route);

      const schema = assembleSchema(declaration, extraction.markers, { file, registry });
      if (schema) schemas.push(schema);
    }
  }

  if (errors.length > 0) {
    throw new MultipleValidationError(errors);
  }

  log.debug(`Scanned ${scan.filesScanned} file(s) under ${scan.rootDir}`, {
    declarations,
    routes: routes.length,
    schemas: schemas.length,
  });

  return {
    routes,
    schemas,
    stats: {
      filesScanned: scan.filesScanned,
      declarations,
      routes: routes.length,
      schemas: schemas.length,
    },
  };
}

export interface GenerateRoutesOptions {
  /** Directory scanned for handlers */
  rootDir: string;
  /** Base for relative paths in the config and for the package.json search; default cwd */
  projectRoot?: string;
  config?: Config;
  /** Overrides `generation.output` */
  outputPath?: string;
  registry?: MarkerRegistry;
  groups?: GroupRegistry;
  hooks?: HookPipeline;
  logger?: Logger;
  now?: () => Date;
}

export interface GenerationResult {
  outputPath: string;
  routes: ReadonlyArray<Readonly<RouteMetadata>>;
  schemas: SchemaMetadata[];
  routesCount: number;
  websocketsCount: number;
  middlewaresCount: number;
  proxiesCount: number;
  validated: boolean;
}

/**
 * Run the whole pipeline and write the generated module.
 */
export function generateRoutes(options: GenerateRoutesOptions): GenerationResult {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const config = options.config ?? getDefaultConfig();
  const log = options.logger ?? defaultLogger;
  const registry = options.registry ?? createDefaultMarkerRegistry();
  const outputPath = path.resolve(projectRoot, options.outputPath ?? config.generation.output);
  const rootDir = path.resolve(projectRoot, options.rootDir);

  const { routes, schemas } = parseDirectory(rootDir, {
    registry,
    groups: options.groups,
    include: config.handlers.include,
    exclude: config.handlers.exclude,
    logger: log,
  });

  const hooks =
    options.hooks ??
    createDefaultHookPipeline({
      logger: log,
      outputPath,
      runtimeModule: config.generation.runtime_module,
      importStyle: config.generation.import_style,
      entryPoint: config.generation.entry_point,
      cwd: projectRoot,
    });

  hooks.runPostParse(routes);
  const frozen = freezeRoutes(routes);

  const context: GenerationContext = {
    packageName: config.generation.package_name,
    routes: frozen,
    schemas,
    imports: [],
    metadata: {},
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
  };
  hooks.runPreGeneration(context);

  const content = renderModule(context, {
    entryPoint: config.generation.entry_point,
    runtimeModule: config.generation.runtime_module,
    style: config.prod.minify ? 'minified' : 'verbose',
  });
  const written = writeGeneratedFile(outputPath, content);
  if (written.gitignorePath) {
    log.debug(`Created ${written.gitignorePath}`);
  }

  if (config.prod.validate) {
    validateGeneratedFile(written.outputPath, {
      entryPoint: config.generation.entry_point,
      requireRegistrations: frozen.length > 0,
    });
    log.debug('Generated file passed structural validation');
  }

  const stats = countStats(frozen);
  log.info(
    `Code generated: ${frozen.length} routes, ${stats.websockets} websockets, ` +
      `${stats.middlewares} middlewares, ${stats.proxies} proxies processed`
  );

  return {
    outputPath: written.outputPath,
    routes: frozen,
    schemas,
    routesCount: frozen.length,
    websocketsCount: stats.websockets,
    middlewaresCount: stats.middlewares,
    proxiesCount: stats.proxies,
    validated: config.prod.validate,
  };
}

function freezeRoutes(routes: RouteMetadata[]): ReadonlyArray<Readonly<RouteMetadata>> {
  for (const route of routes) {
    Object.freeze(route.markers);
    Object.freeze(route.middlewareCalls);
    Object.freeze(route.middlewareInfo);
    Object.freeze(route.tags);
    Object.freeze(route.parameters);
    Object.freeze(route.responses);
    Object.freeze(route.webSocketHandlers);
    Object.freeze(route);
  }
  return Object.freeze([...routes]);
}

function countStats(routes: ReadonlyArray<Readonly<RouteMetadata>>): {
  websockets: number;
  middlewares: number;
  proxies: number;
} {
  let websockets = 0;
  let middlewares = 0;
  let proxies = 0;
  for (const route of routes) {
    websockets += route.webSocketHandlers.length;
    middlewares += route.middlewareCalls.length;
    proxies += route.markers.filter((marker) => marker.name === 'Proxy').length;
  }
  return { websockets, middlewares, proxies };
}
