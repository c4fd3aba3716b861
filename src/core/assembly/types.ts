/**
 * Route and schema records handed from assembly to code generation.
 */
import type {
  GroupInfo,
  HttpMethod,
  MiddlewareInfo,
  ParameterInfo,
  ResponseInfo,
  SchemaEntry,
  SchemaFieldEntry,
} from '../../runtime/contract.js';
import type { MarkerInstance } from '../markers/types.js';

/**
 * A middleware call in the generated module: `runtime.<factory>(...args)`.
 */
export interface MiddlewareCall {
  factory: string;
  args: string[];
}

export interface RouteMetadata {
  /** Empty for websocket-only records */
  method: HttpMethod | '';
  /** Empty for websocket-only records; group prefix already applied */
  path: string;
  funcName: string;
  /** Name the handler module exports the function under */
  exportName: string;
  packageName: string;
  /** Relative to the scanned root, forward slashes */
  fileName: string;
  filePath: string;
  line: number;
  markers: MarkerInstance[];
  middlewareCalls: MiddlewareCall[];
  middlewareInfo: MiddlewareInfo[];
  description: string;
  summary: string;
  tags: string[];
  parameters: ParameterInfo[];
  responses: ResponseInfo[];
  group?: GroupInfo;
  webSocketHandlers: string[];
}

export type SchemaMetadata = SchemaEntry;
export type FieldMetadata = SchemaFieldEntry;

/**
 * True for a handler bound only to websocket message types.
 */
export function isWebSocketOnly(route: Pick<RouteMetadata, 'method' | 'path'>): boolean {
  return route.method === '' && route.path === '';
}
