/**
 * Built-in marker definitions and the startup function that registers them.
 */
import { ErrorCodes } from '../../utils/errors.js';
import type { HttpMethod } from '../../runtime/contract.js';
import { MarkerRegistry } from './registry.js';
import type { BehaviorDescriptor, DomainViolation, MarkerDefinition } from './types.js';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'PATCH',
  'OPTIONS',
  'HEAD',
];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * Behavior markers: [name, description]. Each expands to a call of the
 * runtime export `create<Name>Middleware`.
 */
const BEHAVIOR_MARKERS: ReadonlyArray<readonly [string, string]> = [
  ['Auth', 'Authentication and authorization middleware'],
  ['Cache', 'Response cache middleware'],
  ['CacheByURL', 'Response cache keyed by URL'],
  ['CacheByUser', 'Response cache keyed by user'],
  ['CacheByEndpoint', 'Response cache keyed by endpoint'],
  ['RateLimit', 'Rate limiting middleware'],
  ['RateLimitByIP', 'Rate limiting keyed by client IP'],
  ['RateLimitByUser', 'Rate limiting keyed by user'],
  ['RateLimitByEndpoint', 'Rate limiting keyed by endpoint'],
  ['Metrics', 'Request metrics collection middleware'],
  ['Prometheus', 'Prometheus metrics endpoint'],
  ['HealthCheck', 'Health check endpoint'],
  ['CacheStats', 'Cache statistics endpoint'],
  ['InvalidateCache', 'Cache invalidation middleware'],
  ['WebSocketStats', 'WebSocket statistics middleware'],
  ['TracingStats', 'Tracing statistics endpoint'],
  ['TraceMiddleware', 'Request tracing middleware'],
  ['HealthCheckWithTracing', 'Traced health check endpoint'],
  ['InstrumentedHandler', 'Handler instrumentation middleware'],
  ['OpenAPIJSON', 'OpenAPI document as JSON'],
  ['OpenAPIYAML', 'OpenAPI document as YAML'],
  ['SwaggerUI', 'Swagger UI page'],
  ['Validate', 'Request validation middleware'],
  ['ValidateJSON', 'JSON body validation middleware'],
  ['ValidateQuery', 'Query string validation middleware'],
  ['ValidateParams', 'Path parameter validation middleware'],
  ['Proxy', 'Reverse proxy middleware with service discovery and load balancing'],
  ['Security', 'Network access restriction middleware'],
  ['CORS', 'Cross-Origin Resource Sharing middleware'],
  ['Telemetry', 'Telemetry span middleware'],
];

/** Arguments a factory receives when the marker is written without any. */
const FACTORY_DEFAULTS: Readonly<Record<string, readonly string[]>> = {
  Cache: ['duration=5m'],
  RateLimit: ['limit=100', 'window=1m'],
};

export function factoryName(markerName: string): string {
  return `create${markerName}Middleware`;
}

/**
 * Build the factory for a behavior marker. Empty argument lists fall back
 * to the marker's defaults, if it has any.
 */
export function behaviorFactory(
  markerName: string,
  description: string
): (args: string[]) => BehaviorDescriptor {
  const defaults = FACTORY_DEFAULTS[markerName] ?? [];
  return (args) => ({
    factory: factoryName(markerName),
    args: args.length > 0 ? [...args] : [...defaults],
    description,
  });
}

function validateRoute(args: string[]): DomainViolation[] {
  const violations: DomainViolation[] = [];
  const [method, routePath] = args;

  if (!isHttpMethod(method)) {
    violations.push({
      code: ErrorCodes.INVALID_HTTP_METHOD,
      message: `Invalid HTTP method '${method}'. Valid methods: ${HTTP_METHODS.join(', ')}`,
    });
  }
  if (!routePath.startsWith('/')) {
    violations.push({
      code: ErrorCodes.INVALID_PATH,
      message: `Route path '${routePath}' must start with '/'`,
    });
  }
  return violations;
}

const DOCUMENTATION_MARKERS: MarkerDefinition[] = [
  {
    name: 'Group',
    role: 'group',
    arity: { min: 1, max: 3, usage: 'name, prefix, description' },
    description: 'Route group with a shared path prefix',
  },
  {
    name: 'Param',
    role: 'param',
    arity: { min: 1 },
    description: 'Request parameter documentation',
  },
  {
    name: 'Response',
    role: 'response',
    arity: { min: 1, usage: 'status code' },
    description: 'Response documentation',
  },
  {
    name: 'Description',
    role: 'description',
    arity: { min: 1 },
    description: 'Route description',
  },
  {
    name: 'Summary',
    role: 'summary',
    arity: { min: 1 },
    description: 'Route summary',
  },
  {
    name: 'Tag',
    role: 'tag',
    arity: { min: 1 },
    description: 'Documentation tag',
  },
  {
    name: 'Schema',
    role: 'schema',
    arity: { min: 0 },
    description: 'Documented data structure',
  },
];

/**
 * Register every built-in marker on `registry`.
 */
export function registerBuiltinMarkers(registry: MarkerRegistry): MarkerRegistry {
  registry.register({
    name: 'Route',
    role: 'route',
    arity: { min: 2, max: 2, usage: 'method, path' },
    validate: validateRoute,
    description: 'HTTP route binding',
  });

  for (const [name, description] of BEHAVIOR_MARKERS) {
    registry.register({
      name,
      role: 'behavior',
      arity: { min: 0 },
      factory: behaviorFactory(name, description),
      description,
    });
  }

  registry.register({
    name: 'WebSocket',
    role: 'websocket',
    arity: { min: 0 },
    factory: behaviorFactory('WebSocket', 'WebSocket upgrade middleware'),
    description: 'WebSocket upgrade and message-type bindings',
  });

  for (const definition of DOCUMENTATION_MARKERS) {
    registry.register(definition);
  }

  return registry;
}

/**
 * A fresh registry holding the built-in markers.
 */
export function createDefaultMarkerRegistry(): MarkerRegistry {
  return registerBuiltinMarkers(new MarkerRegistry());
}
