/**
 * Marker registry exports.
 */
export * from './types.js';
export { MarkerRegistry } from './registry.js';
export {
  HTTP_METHODS,
  isHttpMethod,
  factoryName,
  behaviorFactory,
  registerBuiltinMarkers,
  createDefaultMarkerRegistry,
} from './builtins.js';
