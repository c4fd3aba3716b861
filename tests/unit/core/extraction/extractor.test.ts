/**
 * Tests for marker extraction and validation.
 */
import { describe, it, expect } from 'vitest';
import { extractMarkers, checkArity, producesRecord } from '../../../../src/core/extraction/extractor.js';
import { createDefaultMarkerRegistry } from '../../../../src/core/markers/builtins.js';
import { MarkerRegistry } from '../../../../src/core/markers/registry.js';
import type { ScannedDeclaration } from '../../../../src/core/scanner/types.js';

const registry = createDefaultMarkerRegistry();

function declaration(comment: string[], overrides: Partial<ScannedDeclaration> = {}): ScannedDeclaration {
  return {
    kind: 'function',
    name: 'getUser',
    exportName: 'getUser',
    line: comment.length + 1,
    comment: comment.map((text, i) => ({ text, line: i + 1 })),
    fields: [],
    ...overrides,
  };
}

describe('extractMarkers', () => {
  it('should return nothing for a comment without markers', () => {
    expect(extractMarkers(declaration(['Just a helper.']), 'users.ts', registry)).toEqual({
      markers: [],
      errors: [],
    });
  });

  it('should extract markers in comment order', () => {
    const result = extractMarkers(
      declaration(['@Route("GET", "/users/{id}")', '@Auth', '@Cache(duration=1h)']),
      'users.ts',
      registry
    );

    expect(result.errors).toEqual([]);
    expect(result.markers).toEqual([
      { name: 'Route', raw: '@Route("GET", "/users/{id}")', args: ['GET', '/users/{id}'], line: 1 },
      { name: 'Auth', raw: '@Auth', args: [], line: 2 },
      { name: 'Cache', raw: '@Cache(duration=1h)', args: ['duration=1h'], line: 3 },
    ]);
  });

  it('should ignore a bare marker name mentioned in prose', () => {
    const result = extractMarkers(
      declaration(['@Route("GET", "/stats")', 'Results are cached, see @Metrics dashboard', '@Auth']),
      'users.ts',
      registry
    );

    expect(result.errors).toEqual([]);
    expect(result.markers.map((m) => m.name)).toEqual(['Route', 'Auth']);
  });

  it('should accept a marker with arguments after prose', () => {
    const result = extractMarkers(
      declaration(['@Route("GET", "/stats")', 'Cached for an hour: @Cache(duration=1h)']),
      'users.ts',
      registry
    );

    expect(result.markers.map((m) => [m.name, m.args])).toEqual([
      ['Route', ['GET', '/stats']],
      ['Cache', ['duration=1h']],
    ]);
  });

  it('should accept unquoted route arguments', () => {
    const result = extractMarkers(declaration(['@Route(POST, /users)']), 'users.ts', registry);

    expect(result.markers[0].args).toEqual(['POST', '/users']);
  });

  it('should skip unregistered names', () => {
    const result = extractMarkers(declaration(['@Deprecated', '@Custom("x")']), 'users.ts', registry);

    expect(result.markers).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('should report exactly one error for an invalid method', () => {
    const result = extractMarkers(declaration(['@Route("FETCH", "/users")']), 'api/users.ts', registry);

    expect(result.markers).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('INVALID_HTTP_METHOD');
    expect(result.errors[0].message).toBe(
      "api/users.ts:1 - Invalid HTTP method 'FETCH'. Valid methods: GET, POST, PUT, DELETE, PATCH, OPTIONS, HEAD"
    );
  });

  it('should report exactly one error for a relative path', () => {
    const result = extractMarkers(declaration(['@Route("GET", "users")']), 'users.ts', registry);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].message).toBe("users.ts:1 - Route path 'users' must start with '/'");
  });

  it('should report a wrong argument count', () => {
    const result = extractMarkers(declaration(['@Route("GET")']), 'users.ts', registry);

    expect(result.errors.map((e) => e.message)).toEqual([
      'users.ts:1 - @Route requires exactly 2 arguments (method, path), found 1',
    ]);
  });

  it('should report empty arguments', () => {
    const result = extractMarkers(declaration(['@Tag("a",,"b")']), 'users.ts', registry);

    expect(result.errors[0].code).toBe('INVALID_ARGUMENTS');
    expect(result.errors[0].message).toBe('users.ts:1 - Error in @Tag arguments: empty argument found');
  });

  it('should stop at the first syntax violation', () => {
    const result = extractMarkers(
      declaration(['@Route', '@Tag("x)']),
      'users.ts',
      registry
    );

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('MALFORMED_MARKER');
  });

  it('should reject a second route marker', () => {
    const result = extractMarkers(
      declaration(['@Route("GET", "/a")', '@Route("POST", "/b")']),
      'users.ts',
      registry
    );

    expect(result.markers).toHaveLength(1);
    expect(result.errors[0].message).toBe("users.ts:2 - 'getUser' already has a @Route marker");
  });

  it('should require route handlers to be exported', () => {
    const result = extractMarkers(
      declaration(['@Route("GET", "/a")'], { exportName: null, name: 'hidden' }),
      'users.ts',
      registry
    );

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('HANDLER_NOT_EXPORTED');
    expect(result.errors[0].message).toBe("users.ts:2 - Handler 'hidden' must be exported to be registered");
  });

  it('should not require export for structures', () => {
    const result = extractMarkers(
      declaration(['@Schema'], { kind: 'structure', exportName: null, name: 'User' }),
      'models.ts',
      registry
    );

    expect(result.errors).toEqual([]);
    expect(result.markers.map((m) => m.name)).toEqual(['Schema']);
  });

  it('should honor a definition pattern', () => {
    const custom = new MarkerRegistry();
    custom.register({ name: 'Tag', role: 'tag', arity: { min: 1 }, pattern: /^@Tag\("[a-z]+"\)$/ });

    const result = extractMarkers(declaration(['@Tag("users") @Tag("Admins")']), 'users.ts', custom);

    expect(result.markers.map((m) => m.args)).toEqual([['users']]);
  });
});

describe('checkArity', () => {
  const definition = (min: number, max?: number) => ({
    name: 'X',
    role: 'tag' as const,
    arity: { min, max },
  });

  it('should accept counts in range', () => {
    expect(checkArity(definition(1, 3), 2)).toBeNull();
    expect(checkArity(definition(0), 9)).toBeNull();
  });

  it('should describe the expected count', () => {
    expect(checkArity(definition(1), 0)).toBe('@X requires at least 1 argument, found 0');
    expect(checkArity(definition(1, 3), 4)).toBe('@X requires between 1 and 3 arguments, found 4');
  });
});

describe('producesRecord', () => {
  it('should count websocket markers only with message types', () => {
    const ws = { name: 'WebSocket', raw: '@WebSocket', args: [], line: 1 };

    expect(producesRecord([ws], registry)).toBe(false);
    expect(producesRecord([{ ...ws, args: ['chat'] }], registry)).toBe(true);
  });
});
