/**
 * Tests for the built-in marker set.
 */
import { describe, it, expect } from 'vitest';
import {
  HTTP_METHODS,
  isHttpMethod,
  factoryName,
  behaviorFactory,
  createDefaultMarkerRegistry,
} from '../../../../src/core/markers/builtins.js';

describe('isHttpMethod', () => {
  it('should accept the seven methods', () => {
    for (const method of HTTP_METHODS) {
      expect(isHttpMethod(method)).toBe(true);
    }
    expect(HTTP_METHODS).toHaveLength(7);
  });

  it('should be case-sensitive', () => {
    expect(isHttpMethod('get')).toBe(false);
    expect(isHttpMethod('FETCH')).toBe(false);
  });
});

describe('behaviorFactory', () => {
  it('should name the runtime factory after the marker', () => {
    expect(factoryName('RateLimitByIP')).toBe('createRateLimitByIPMiddleware');
  });

  it('should pass explicit arguments through', () => {
    const factory = behaviorFactory('Cache', 'Response cache middleware');

    expect(factory(['duration=1h'])).toEqual({
      factory: 'createCacheMiddleware',
      args: ['duration=1h'],
      description: 'Response cache middleware',
    });
  });

  it('should fall back to Cache defaults', () => {
    expect(behaviorFactory('Cache', '')([]).args).toEqual(['duration=5m']);
  });

  it('should fall back to RateLimit defaults', () => {
    expect(behaviorFactory('RateLimit', '')([]).args).toEqual(['limit=100', 'window=1m']);
  });

  it('should produce no arguments for markers without defaults', () => {
    expect(behaviorFactory('Auth', '')([]).args).toEqual([]);
  });
});

describe('createDefaultMarkerRegistry', () => {
  const registry = createDefaultMarkerRegistry();

  it('should register Route first', () => {
    expect(registry.names()[0]).toBe('Route');
    expect(registry.lookup('Route')?.arity).toEqual({ min: 2, max: 2, usage: 'method, path' });
  });

  it('should register the behavior markers with factories', () => {
    for (const name of ['Auth', 'Cache', 'RateLimit', 'CORS', 'Proxy', 'Telemetry']) {
      const definition = registry.lookup(name);
      expect(definition?.role).toBe('behavior');
      expect(definition?.factory).toBeDefined();
    }
  });

  it('should register WebSocket with its own role', () => {
    const definition = registry.lookup('WebSocket');

    expect(definition?.role).toBe('websocket');
    expect(definition?.factory?.(['chat']).factory).toBe('createWebSocketMiddleware');
  });

  it('should register the documentation markers', () => {
    expect(registry.lookup('Group')?.arity).toEqual({ min: 1, max: 3, usage: 'name, prefix, description' });
    expect(registry.lookup('Param')?.role).toBe('param');
    expect(registry.lookup('Response')?.role).toBe('response');
    expect(registry.lookup('Schema')?.arity.min).toBe(0);
  });

  it('should hold 39 markers', () => {
    expect(registry.size).toBe(39);
  });

  describe('Route validation', () => {
    const validate = registry.lookup('Route')?.validate;

    it('should accept a valid binding', () => {
      expect(validate?.(['GET', '/users/{id}'])).toEqual([]);
    });

    it('should reject an unknown method', () => {
      expect(validate?.(['FETCH', '/users'])).toEqual([
        {
          code: 'INVALID_HTTP_METHOD',
          message: "Invalid HTTP method 'FETCH'. Valid methods: GET, POST, PUT, DELETE, PATCH, OPTIONS, HEAD",
        },
      ]);
    });

    it('should reject a relative path', () => {
      expect(validate?.(['GET', 'users'])).toEqual([
        { code: 'INVALID_PATH', message: "Route path 'users' must start with '/'" },
      ]);
    });
  });
});
