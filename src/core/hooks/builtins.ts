/**
 * Built-in hooks: route logging and handler import resolution.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { HookError, ErrorCodes } from '../../utils/errors.js';
import { findUpSync, readFileSync, toPosixPath } from '../../utils/file-system.js';
import type { Logger } from '../../utils/logger.js';
import type { ImportStyle } from '../config/schema.js';
import { isWebSocketOnly } from '../assembly/types.js';
import { isReservedWord } from '../generation/escape.js';
import { declaredIdentifiers } from '../generation/generator.js';
import type { ImportSpec } from '../generation/types.js';
import { HookPipeline, type PostParseHook, type PreGenerationHook } from './pipeline.js';

/** Alias the generated module binds the runtime module to. */
export const RUNTIME_ALIAS = 'runtime';

/**
 * Logs one debug line per assembled route.
 */
export function createRouteLoggingHook(log: Logger): PostParseHook {
  return (routes) => {
    log.debug(`${routes.length} route(s) assembled`);
    for (const route of routes) {
      if (isWebSocketOnly(route)) {
        log.debug(`WebSocket ${route.funcName} [${route.webSocketHandlers.join(', ')}] (${route.fileName})`);
      } else {
        log.debug(`${route.method} ${route.path} -> ${route.funcName} (${route.fileName})`);
      }
    }
  };
}

export interface ImportResolutionOptions {
  /** Absolute path of the generated file */
  outputPath: string;
  runtimeModule: string;
  importStyle: ImportStyle;
  /** Name of the generated startup function */
  entryPoint: string;
  /** Start of the upward package.json search for the package style */
  cwd: string;
}

const PackageJsonSchema = z.object({
  name: z.string().min(1),
});

/**
 * Adds the runtime import and one namespace import per handler file.
 */
export function createImportResolutionHook(options: ImportResolutionOptions): PreGenerationHook {
  return (context) => {
    const taken = new Set([
      ...declaredIdentifiers(options.entryPoint),
      ...context.imports.map((imp) => imp.alias),
    ]);
    const specifiers = new Set(context.imports.map((imp) => imp.specifier));

    const add = (spec: ImportSpec): void => {
      if (specifiers.has(spec.specifier)) return;
      specifiers.add(spec.specifier);
      taken.add(spec.alias);
      context.imports.push(spec);
    };

    if (!specifiers.has(options.runtimeModule)) {
      add({ alias: uniqueAlias(RUNTIME_ALIAS, taken), specifier: options.runtimeModule });
    }

    const resolvePackage = options.importStyle === 'package' ? packageResolver(options.cwd) : null;

    const seenFiles = new Set<string>();
    for (const route of context.routes) {
      if (seenFiles.has(route.filePath)) continue;
      seenFiles.add(route.filePath);

      const specifier = resolvePackage
        ? resolvePackage(route.filePath)
        : relativeSpecifier(path.dirname(options.outputPath), route.filePath);

      add({
        alias: uniqueAlias(aliasFor(route.fileName), taken),
        specifier,
        sourceFile: route.filePath,
      });
    }
  };
}

/**
 * Import specifier of `filePath` from a module in `fromDir`.
 */
export function relativeSpecifier(fromDir: string, filePath: string): string {
  let relative = toPosixPath(path.relative(fromDir, filePath));
  if (!relative.startsWith('.')) {
    relative = `./${relative}`;
  }
  return toRuntimeExtension(relative);
}

function packageResolver(cwd: string): (filePath: string) => string {
  const manifestPath = findUpSync('package.json', cwd);
  if (!manifestPath) {
    throw new HookError(
      ErrorCodes.MODULE_DECLARATION_NOT_FOUND,
      `No package.json found from ${cwd} upward; cannot build package-qualified imports`,
      { cwd }
    );
  }

  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(manifestPath)));
  if (!parsed.success) {
    throw new HookError(
      ErrorCodes.MODULE_DECLARATION_NOT_FOUND,
      `${manifestPath} has no package name`,
      { manifestPath }
    );
  }

  const packageDir = path.dirname(manifestPath);
  const packageName = parsed.data.name;
  return (filePath) =>
    toRuntimeExtension(`${packageName}/${toPosixPath(path.relative(packageDir, filePath))}`);
}

/**
 * `.ts`/`.tsx` become `.js`, `.mts` becomes `.mjs`.
 */
export function toRuntimeExtension(specifier: string): string {
  return specifier.replace(/\.mts$/, '.mjs').replace(/\.tsx?$/, '.js');
}

/**
 * Identifier derived from a relative file path, e.g. `users/handlers.ts`
 * becomes `users_handlers` and `delete.ts` becomes `delete_`.
 */
export function aliasFor(relativePath: string): string {
  const base = relativePath.replace(/\.[cm]?tsx?$/, '');
  let alias = base.replace(/[^A-Za-z0-9_$]+/g, '_').replace(/^_+|_+$/g, '');
  if (alias === '') alias = 'handlers';
  if (/^[0-9]/.test(alias)) alias = `_${alias}`;
  if (isReservedWord(alias)) alias = `${alias}_`;
  return alias;
}

function uniqueAlias(alias: string, taken: Set<string>): string {
  if (!taken.has(alias)) return alias;
  let n = 2;
  while (taken.has(`${alias}_${n}`)) n++;
  return `${alias}_${n}`;
}

export interface DefaultHookOptions extends ImportResolutionOptions {
  logger: Logger;
}

/**
 * A pipeline with the route logging and import resolution hooks.
 */
export function createDefaultHookPipeline(options: DefaultHookOptions): HookPipeline {
  return new HookPipeline()
    .addPostParseHook('route-logging', createRouteLoggingHook(options.logger))
    .addPreGenerationHook('import-resolution', createImportResolutionHook(options));
}
