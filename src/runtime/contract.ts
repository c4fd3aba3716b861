/**
 * Invocation signatures the generated module relies on.
 *
 * routemark does not implement a runtime. A host runtime module (the
 * configured `runtime_module`) exports a `RouteRegistry` implementation,
 * one factory per behavior marker (`createAuthMiddleware`, ...) and
 * `webSocketHandlerWrapper`, all matching the types below.
 */

/** HTTP methods accepted by `@Route`, plus the documentation-only `WS`. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'OPTIONS' | 'HEAD';
export type RouteMethod = HttpMethod | 'WS';

export interface ParameterInfo {
  name: string;
  /** string, number, boolean, ... */
  type: string;
  /** query, path, body, header */
  location: string;
  required: boolean;
  description: string;
  example: string;
}

export interface ResponseInfo {
  /** Status code as written, e.g. "200" */
  code: string;
  description: string;
  /** Schema type name */
  type: string;
  example: string;
}

export interface GroupInfo {
  name: string;
  prefix: string;
  description: string;
}

export interface MiddlewareInfo {
  name: string;
  args: Record<string, string>;
  /** Position in the route's middleware chain */
  order: number;
  description: string;
}

/**
 * Registration record passed to `RouteRegistry.registerRoute`.
 * `Handler` and `Middleware` are whatever the host framework uses.
 */
export interface RouteEntry<Handler = unknown, Middleware = unknown> {
  method: RouteMethod;
  path: string;
  handler: Handler;
  middlewares: Middleware[];
  funcName: string;
  packageName: string;
  fileName: string;
  description?: string;
  summary?: string;
  tags?: string[];
  middlewareInfo?: MiddlewareInfo[];
  parameters?: ParameterInfo[];
  responses?: ResponseInfo[];
  group?: GroupInfo;
  webSocketHandlers?: string[];
}

export interface RouteRegistry<Handler = unknown, Middleware = unknown> {
  registerRoute(entry: RouteEntry<Handler, Middleware>): void;
  registerWebSocketHandler(messageType: string, handler: Handler): void;
}

/**
 * A behavior factory: receives the marker's raw argument list and returns
 * a request-handling wrapper for the host framework.
 */
export type MiddlewareFactory<Middleware = unknown> = (args: string[]) => Middleware;

/** Documentation record for an `@Schema` declaration. */
export interface SchemaEntry {
  name: string;
  description: string;
  packageName: string;
  fileName: string;
  fields: SchemaFieldEntry[];
}

export interface SchemaFieldEntry {
  name: string;
  type: string;
  required: boolean;
  description: string;
}
