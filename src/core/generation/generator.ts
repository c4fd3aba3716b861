/**
 * Builds the route registration module from a generation context and
 * writes it to disk.
 */
import * as path from 'node:path';
import { GenerationError, ErrorCodes } from '../../utils/errors.js';
import { fileExistsSync, writeFileSync } from '../../utils/file-system.js';
import type { GroupInfo, MiddlewareInfo, ParameterInfo, ResponseInfo, SchemaEntry } from '../../runtime/contract.js';
import { isWebSocketOnly, type RouteMetadata } from '../assembly/types.js';
import {
  arr,
  bool,
  call,
  ident,
  member,
  num,
  obj,
  str,
  type Expr,
  type ModuleIR,
  type Statement,
} from './ir.js';
import { minifySource } from './minifier.js';
import { printModule } from './printer.js';
import type { GenerateOptions, GenerationContext } from './types.js';

export const GENERATED_HEADER = 'Code generated by routemark; DO NOT EDIT.';

/** Directory name the default output lives in. */
export const OUTPUT_DIR_NAME = '.routemark';

const REGISTRY_PARAM = 'registry';
const METADATA_CONST = 'generatedMetadata';
const SCHEMAS_CONST = 'generatedSchemas';

/**
 * Names the generated module binds besides its imports. Import aliases
 * must avoid them.
 */
export function declaredIdentifiers(entryPoint: string): string[] {
  return [REGISTRY_PARAM, METADATA_CONST, SCHEMAS_CONST, entryPoint];
}

export interface BuildOptions {
  entryPoint: string;
  runtimeModule: string;
}

/**
 * Build the module IR. Every route's handler file must have a resolved
 * import in `context.imports`.
 */
export function buildModule(context: GenerationContext, options: BuildOptions): ModuleIR {
  const runtimeImport = context.imports.find(
    (imp) => imp.specifier === options.runtimeModule && imp.sourceFile === undefined
  );
  if (!runtimeImport) {
    throw new GenerationError(
      ErrorCodes.UNRESOLVED_RUNTIME_IMPORT,
      `No import resolved for runtime module '${options.runtimeModule}'`,
      { runtimeModule: options.runtimeModule }
    );
  }
  const runtime = ident(runtimeImport.alias);

  const aliasByFile = new Map<string, string>();
  for (const imp of context.imports) {
    if (imp.sourceFile !== undefined) {
      aliasByFile.set(imp.sourceFile, imp.alias);
    }
  }

  const registry = ident(REGISTRY_PARAM);
  const body: Statement[] = [];

  for (const route of context.routes) {
    const alias = aliasByFile.get(route.filePath);
    if (alias === undefined) {
      throw new GenerationError(
        ErrorCodes.UNRESOLVED_HANDLER_IMPORT,
        `No import resolved for ${route.fileName} (handler '${route.funcName}')`,
        { fileName: route.fileName, funcName: route.funcName }
      );
    }
    const handler = member(ident(alias), route.exportName);

    if (isWebSocketOnly(route)) {
      for (const messageType of route.webSocketHandlers) {
        body.push({
          kind: 'expression',
          expression: call(member(registry, 'registerWebSocketHandler'), [str(messageType), handler]),
        });
      }
      body.push({
        kind: 'expression',
        expression: call(member(registry, 'registerRoute'), [
          routeEntry(route, 'WS', `/ws/${route.funcName}`, call(member(runtime, 'webSocketHandlerWrapper'), [handler]), arr([])),
        ]),
      });
    } else {
      body.push({
        kind: 'expression',
        expression: call(member(registry, 'registerRoute'), [
          routeEntry(
            route,
            route.method,
            route.path,
            handler,
            arr(route.middlewareCalls.map((mw) => call(member(runtime, mw.factory), [arr(mw.args.map(str))])))
          ),
        ]),
      });
    }
  }

  body.push({ kind: 'return', expression: registry });

  const registryType = `${runtimeImport.alias}.RouteRegistry`;

  return {
    header: [GENERATED_HEADER],
    imports: [...context.imports],
    constants: [
      {
        name: METADATA_CONST,
        value: obj([
          ['routesCount', num(context.routes.length)],
          ['generatedAt', str(context.generatedAt)],
          ['packageName', str(context.packageName)],
        ]),
      },
      {
        name: SCHEMAS_CONST,
        type: `${runtimeImport.alias}.SchemaEntry[]`,
        value: arr(context.schemas.map(schemaEntry)),
      },
    ],
    entryPoint: {
      name: options.entryPoint,
      parameter: { name: REGISTRY_PARAM, type: registryType },
      returnType: registryType,
      body,
    },
  };
}

/**
 * Render the generated module source in the requested style.
 */
export function renderModule(context: GenerationContext, options: GenerateOptions & BuildOptions): string {
  const source = printModule(buildModule(context, options), options.style);
  return options.style === 'minified' ? minifySource(source) : source;
}

export interface WriteResult {
  outputPath: string;
  gitignorePath: string | null;
}

/**
 * Write the generated module, creating directories. When the output lives
 * under a `.routemark` directory, a `.gitignore` excluding its contents is
 * created there if missing.
 */
export function writeGeneratedFile(outputPath: string, content: string): WriteResult {
  const absolute = path.resolve(outputPath);
  try {
    writeFileSync(absolute, content);

    const outputDir = findOutputDir(path.dirname(absolute));
    let gitignorePath: string | null = null;
    if (outputDir) {
      const candidate = path.join(outputDir, '.gitignore');
      if (!fileExistsSync(candidate)) {
        writeFileSync(candidate, '*\n');
        gitignorePath = candidate;
      }
    }
    return { outputPath: absolute, gitignorePath };
  } catch (error) {
    throw new GenerationError(
      ErrorCodes.WRITE_FAILED,
      `Failed to write ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      { outputPath: absolute }
    );
  }
}

function findOutputDir(dir: string): string | null {
  let current = dir;
  for (;;) {
    if (path.basename(current) === OUTPUT_DIR_NAME) return current;
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function routeEntry(
  route: Readonly<RouteMetadata>,
  method: string,
  routePath: string,
  handler: Expr,
  middlewares: Expr
): Expr {
  return obj([
    ['method', str(method)],
    ['path', str(routePath)],
    ['handler', handler],
    ['middlewares', middlewares],
    ['funcName', str(route.funcName)],
    ['packageName', str(route.packageName)],
    ['fileName', str(route.fileName)],
    ['description', route.description ? str(route.description) : undefined],
    ['summary', route.summary ? str(route.summary) : undefined],
    ['tags', route.tags.length > 0 ? arr(route.tags.map(str)) : undefined],
    ['middlewareInfo', route.middlewareInfo.length > 0 ? arr(route.middlewareInfo.map(middlewareInfoExpr)) : undefined],
    ['parameters', route.parameters.length > 0 ? arr(route.parameters.map(parameterExpr)) : undefined],
    ['responses', route.responses.length > 0 ? arr(route.responses.map(responseExpr)) : undefined],
    ['group', route.group ? groupExpr(route.group) : undefined],
    ['webSocketHandlers', route.webSocketHandlers.length > 0 ? arr(route.webSocketHandlers.map(str)) : undefined],
  ]);
}

function middlewareInfoExpr(info: MiddlewareInfo): Expr {
  return obj([
    ['name', str(info.name)],
    ['args', obj(Object.entries(info.args).map(([key, value]) => [key, str(value)] as const))],
    ['order', num(info.order)],
    ['description', str(info.description)],
  ]);
}

function parameterExpr(param: ParameterInfo): Expr {
  return obj([
    ['name', str(param.name)],
    ['type', str(param.type)],
    ['location', str(param.location)],
    ['required', bool(param.required)],
    ['description', str(param.description)],
    ['example', str(param.example)],
  ]);
}

function responseExpr(response: ResponseInfo): Expr {
  return obj([
    ['code', str(response.code)],
    ['description', str(response.description)],
    ['type', str(response.type)],
    ['example', str(response.example)],
  ]);
}

function groupExpr(group: GroupInfo): Expr {
  return obj([
    ['name', str(group.name)],
    ['prefix', str(group.prefix)],
    ['description', str(group.description)],
  ]);
}

function schemaEntry(schema: SchemaEntry): Expr {
  return obj([
    ['name', str(schema.name)],
    ['description', str(schema.description)],
    ['packageName', str(schema.packageName)],
    ['fileName', str(schema.fileName)],
    [
      'fields',
      arr(
        schema.fields.map((field) =>
          obj([
            ['name', str(field.name)],
            ['type', str(field.type)],
            ['required', bool(field.required)],
            ['description', str(field.description)],
          ])
        )
      ),
    ],
  ]);
}
