/**
 * Reduces a declaration's markers to a route record or a schema record.
 * Assembly never fails: markers were validated during extraction.
 */
import type { ParameterInfo, ResponseInfo } from '../../runtime/contract.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { isHttpMethod } from '../markers/builtins.js';
import type { MarkerRegistry } from '../markers/registry.js';
import type { MarkerInstance } from '../markers/types.js';
import type { ScannedDeclaration, ScannedFile } from '../scanner/types.js';
import { applyPrefix, type GroupRegistry } from './group-registry.js';
import type { RouteMetadata, SchemaMetadata } from './types.js';

export interface AssemblyContext {
  file: ScannedFile;
  registry: MarkerRegistry;
  groups: GroupRegistry;
  logger?: Logger;
}

/**
 * Build the route record for a function declaration, or null when its
 * markers bind neither a route nor websocket message types.
 */
export function assembleRoute(
  declaration: ScannedDeclaration,
  markers: readonly MarkerInstance[],
  context: AssemblyContext
): RouteMetadata | null {
  if (declaration.kind !== 'function') return null;

  const { file, registry, groups } = context;
  const log = context.logger ?? defaultLogger;

  const route: RouteMetadata = {
    method: '',
    path: '',
    funcName: declaration.name,
    exportName: declaration.exportName ?? declaration.name,
    packageName: file.packageName,
    fileName: file.relativePath,
    filePath: file.filePath,
    line: declaration.line,
    markers: [...markers],
    middlewareCalls: [],
    middlewareInfo: [],
    description: '',
    summary: '',
    tags: [],
    parameters: [],
    responses: [],
    webSocketHandlers: [],
  };

  let bound = false;

  for (const marker of markers) {
    const definition = registry.lookup(marker.name);
    if (!definition) continue;

    switch (definition.role) {
      case 'route': {
        const [method, routePath] = marker.args;
        if (isHttpMethod(method)) {
          route.method = method;
          route.path = routePath;
          bound = true;
        }
        break;
      }

      case 'behavior':
      case 'websocket': {
        if (definition.factory) {
          const descriptor = definition.factory(marker.args);
          route.middlewareCalls.push({ factory: descriptor.factory, args: descriptor.args });
          route.middlewareInfo.push({
            name: definition.name,
            args: parseArgsToMap(marker.args),
            order: route.middlewareInfo.length,
            description: descriptor.description ?? definition.description ?? `Middleware ${definition.name}`,
          });
        }
        if (definition.role === 'websocket') {
          for (const arg of marker.args) {
            const messageType = arg.replace(/^["'\s]+|["'\s]+$/g, '');
            if (messageType && !route.webSocketHandlers.includes(messageType)) {
              route.webSocketHandlers.push(messageType);
              bound = true;
            }
          }
        }
        break;
      }

      case 'group': {
        const name = marker.args[0];
        route.group =
          groups.get(name) ??
          groups.register(
            name,
            marker.args[1] ?? name.toLowerCase(),
            marker.args[2] ?? `Group ${name}`
          );
        break;
      }

      case 'param': {
        const param = parseParameterInfo(marker.args);
        if (param.name) {
          route.parameters.push(param);
        } else {
          log.warn(`Skipping @${marker.name} without a name on ${declaration.name}`, { raw: marker.raw });
        }
        break;
      }

      case 'response': {
        const response = parseResponseInfo(marker.args);
        if (response.code && response.description) {
          route.responses.push(response);
        } else {
          log.debug(`Skipping incomplete @${marker.name} on ${declaration.name}`, { raw: marker.raw });
        }
        break;
      }

      case 'description':
        route.description = marker.args.join(', ');
        break;

      case 'summary':
        route.summary = marker.args.join(', ');
        break;

      case 'tag':
        for (const tag of marker.args) {
          addTag(route.tags, tag);
        }
        break;

      case 'schema':
        break;
    }
  }

  if (!bound) return null;

  if (route.group) {
    const { prefix, name } = route.group;
    if (route.path) {
      route.path = applyPrefix(prefix, route.path);
    }
    addTag(route.tags, name);
  }

  return route;
}

/**
 * Build the schema record for a structure declaration carrying a schema
 * marker, or null.
 */
export function assembleSchema(
  declaration: ScannedDeclaration,
  markers: readonly MarkerInstance[],
  context: Pick<AssemblyContext, 'file' | 'registry'>
): SchemaMetadata | null {
  if (declaration.kind !== 'structure') return null;

  const schemaMarker = markers.find(
    (marker) => context.registry.lookup(marker.name)?.role === 'schema'
  );
  if (!schemaMarker) return null;

  const descriptionMarker = markers.filter(
    (marker) => context.registry.lookup(marker.name)?.role === 'description'
  ).pop();

  return {
    name: declaration.name,
    description: descriptionMarker?.args.join(', ') ?? schemaMarker.args.join(', '),
    packageName: context.file.packageName,
    fileName: context.file.relativePath,
    fields: declaration.fields.map((field) => ({ ...field })),
  };
}

/**
 * `key=value` arguments become entries; a bare argument is stored as `value`.
 */
export function parseArgsToMap(args: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    const pair = splitKeyValue(arg);
    if (pair) {
      result[pair[0]] = pair[1];
    } else {
      result.value = trimQuotes(arg);
    }
  }
  return result;
}

export function parseParameterInfo(args: readonly string[]): ParameterInfo {
  const param: ParameterInfo = {
    name: '',
    type: '',
    location: '',
    required: false,
    description: '',
    example: '',
  };
  for (const arg of args) {
    const pair = splitKeyValue(arg);
    if (!pair) continue;
    const [key, value] = pair;
    switch (key) {
      case 'name':
        param.name = value;
        break;
      case 'type':
        param.type = value;
        break;
      case 'location':
        param.location = value;
        break;
      case 'required':
        param.required = value === 'true';
        break;
      case 'description':
        param.description = value;
        break;
      case 'example':
        param.example = value;
        break;
    }
  }
  return param;
}

export function parseResponseInfo(args: readonly string[]): ResponseInfo {
  const response: ResponseInfo = { code: '', description: '', type: '', example: '' };
  args.forEach((arg, index) => {
    const pair = splitKeyValue(arg);
    if (!pair) {
      if (index === 0) response.code = trimQuotes(arg);
      return;
    }
    const [key, value] = pair;
    switch (key) {
      case 'code':
        response.code = value;
        break;
      case 'description':
        response.description = value;
        break;
      case 'type':
        response.type = value;
        break;
      case 'example':
        response.example = value;
        break;
    }
  });
  return response;
}

function splitKeyValue(arg: string): [string, string] | null {
  const index = arg.indexOf('=');
  if (index === -1) return null;
  return [arg.slice(0, index).trim(), trimQuotes(arg.slice(index + 1).trim())];
}

function trimQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

function addTag(tags: string[], tag: string): void {
  if (tag && !tags.includes(tag)) {
    tags.push(tag);
  }
}
