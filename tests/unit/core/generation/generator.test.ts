/**
 * Tests for the route module generator.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  GENERATED_HEADER,
  buildModule,
  renderModule,
  writeGeneratedFile,
} from '../../../../src/core/generation/generator.js';
import type { GenerationContext } from '../../../../src/core/generation/types.js';
import type { RouteMetadata } from '../../../../src/core/assembly/types.js';
import { validateGeneratedSource } from '../../../../src/core/post-validation/validator.js';
import { GenerationError } from '../../../../src/utils/errors.js';

const RUNTIME = '@routemark/runtime';
const options = { entryPoint: 'initializeRoutes', runtimeModule: RUNTIME };

function route(overrides: Partial<RouteMetadata> = {}): RouteMetadata {
  const funcName = overrides.funcName ?? 'GetUser';
  return {
    method: 'GET',
    path: '/users/{id}',
    funcName,
    exportName: funcName,
    packageName: 'users',
    fileName: 'users.ts',
    filePath: '/p/users.ts',
    line: 3,
    markers: [],
    middlewareCalls: [],
    middlewareInfo: [],
    description: '',
    summary: '',
    tags: [],
    parameters: [],
    responses: [],
    webSocketHandlers: [],
    ...overrides,
  };
}

function context(routes: RouteMetadata[]): GenerationContext {
  return {
    packageName: 'routes',
    routes,
    schemas: [],
    imports: [
      { alias: 'runtime', specifier: RUNTIME },
      { alias: 'users', specifier: './users.js', sourceFile: '/p/users.ts' },
    ],
    metadata: {},
    generatedAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('renderModule', () => {
  it('should render a documented route', () => {
    const source = renderModule(
      context([
        route({
          description: 'Fetch one user',
          parameters: [
            { name: 'id', type: 'string', location: 'path', required: true, description: 'User ID', example: '' },
          ],
        }),
      ]),
      { ...options, style: 'verbose' }
    );

    expect(source).toBe(
      [
        `// ${GENERATED_HEADER}`,
        '',
        'import * as runtime from "@routemark/runtime";',
        'import * as users from "./users.js";',
        '',
        'export const generatedMetadata = {',
        '  routesCount: 1,',
        '  generatedAt: "2024-01-01T00:00:00.000Z",',
        '  packageName: "routes",',
        '};',
        '',
        'export const generatedSchemas: runtime.SchemaEntry[] = [];',
        '',
        'export function initializeRoutes(registry: runtime.RouteRegistry): runtime.RouteRegistry {',
        '  registry.registerRoute({',
        '    method: "GET",',
        '    path: "/users/{id}",',
        '    handler: users.GetUser,',
        '    middlewares: [],',
        '    funcName: "GetUser",',
        '    packageName: "users",',
        '    fileName: "users.ts",',
        '    description: "Fetch one user",',
        '    parameters: [',
        '      {',
        '        name: "id",',
        '        type: "string",',
        '        location: "path",',
        '        required: true,',
        '        description: "User ID",',
        '        example: "",',
        '      },',
        '    ],',
        '  });',
        '  return registry;',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should emit middleware calls in marker order', () => {
    const source = renderModule(
      context([
        route({
          middlewareCalls: [
            { factory: 'createAuthMiddleware', args: [] },
            { factory: 'createCacheMiddleware', args: ['duration=5m'] },
          ],
        }),
      ]),
      { ...options, style: 'verbose' }
    );

    expect(source.split('\n')).toContain(
      '    middlewares: [runtime.createAuthMiddleware([]), runtime.createCacheMiddleware(["duration=5m"])],'
    );
  });

  it('should register websocket-only handlers and a documentation route', () => {
    const source = renderModule(
      context([
        route({
          method: '',
          path: '',
          funcName: 'HandleChat',
          middlewareCalls: [{ factory: 'createWebSocketMiddleware', args: ['chat', 'typing'] }],
          webSocketHandlers: ['chat', 'typing'],
        }),
      ]),
      { ...options, style: 'minified' }
    );

    const lines = source.split('\n');
    expect(lines).toContain('registry.registerWebSocketHandler("chat",users.HandleChat);');
    expect(lines).toContain('registry.registerWebSocketHandler("typing",users.HandleChat);');
    expect(lines).toContain(
      'registry.registerRoute({method:"WS",path:"/ws/HandleChat",handler:runtime.webSocketHandlerWrapper(users.HandleChat),' +
        'middlewares:[],funcName:"HandleChat",packageName:"users",' +
        'fileName:"users.ts",webSocketHandlers:["chat","typing"]});'
    );
  });

  it('should escape hostile text so the output still parses', () => {
    const hostile = 'He said "hi"\\ \n */ ${x} `tick` \u2028';
    const source = renderModule(
      context([route({ description: hostile, summary: hostile, tags: [hostile] })]),
      { ...options, style: 'verbose' }
    );

    const result = validateGeneratedSource(source, 'routes.generated.ts', { entryPoint: 'initializeRoutes' });

    expect(result.registrations).toBe(1);
    expect(source).toContain(`description: ${JSON.stringify(hostile).replace('\u2028', '\\u2028')},`);
  });

  it('should produce valid output in both styles', () => {
    for (const style of ['verbose', 'minified'] as const) {
      const source = renderModule(context([route()]), { ...options, style });

      expect(validateGeneratedSource(source, 'out.ts', { entryPoint: 'initializeRoutes' })).toEqual({
        filePath: 'out.ts',
        imports: 2,
        registrations: 1,
      });
    }
  });
});

describe('buildModule', () => {
  it('should fail when the runtime import is missing', () => {
    const ctx = context([route()]);
    ctx.imports = ctx.imports.filter((imp) => imp.specifier !== RUNTIME);

    expect(() => buildModule(ctx, options)).toThrow(GenerationError);
    expect(() => buildModule(ctx, options)).toThrow("No import resolved for runtime module '@routemark/runtime'");
  });

  it('should fail when a handler file has no import', () => {
    const ctx = context([route({ filePath: '/p/orders.ts', fileName: 'orders.ts', funcName: 'ListOrders' })]);

    expect(() => buildModule(ctx, options)).toThrow("No import resolved for orders.ts (handler 'ListOrders')");
  });

  it('should describe schemas in a typed constant', () => {
    const ctx = context([]);
    ctx.schemas.push({
      name: 'User',
      description: 'Account',
      packageName: 'users',
      fileName: 'users.ts',
      fields: [{ name: 'id', type: 'string', required: true, description: '' }],
    });

    const ir = buildModule(ctx, options);

    expect(ir.constants[1].name).toBe('generatedSchemas');
    expect(ir.constants[1].type).toBe('runtime.SchemaEntry[]');
    expect(ir.entryPoint.body).toEqual([{ kind: 'return', expression: { kind: 'identifier', name: 'registry' } }]);
  });
});

describe('writeGeneratedFile', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'routemark-gen-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should create the output directory and a .gitignore inside .routemark', () => {
    const output = join(root, '.routemark', 'routes.generated.ts');

    const result = writeGeneratedFile(output, 'x;\n');

    expect(readFileSync(output, 'utf-8')).toBe('x;\n');
    expect(result.gitignorePath).toBe(join(root, '.routemark', '.gitignore'));
    expect(readFileSync(join(root, '.routemark', '.gitignore'), 'utf-8')).toBe('*\n');
  });

  it('should keep an existing .gitignore', () => {
    mkdirSync(join(root, '.routemark'));
    writeFileSync(join(root, '.routemark', '.gitignore'), 'custom\n');

    const result = writeGeneratedFile(join(root, '.routemark', 'out.ts'), 'x;\n');

    expect(result.gitignorePath).toBeNull();
    expect(readFileSync(join(root, '.routemark', '.gitignore'), 'utf-8')).toBe('custom\n');
  });

  it('should not create a .gitignore elsewhere', () => {
    const result = writeGeneratedFile(join(root, 'src', 'routes.ts'), 'x;\n');

    expect(result.gitignorePath).toBeNull();
    expect(existsSync(join(root, 'src', '.gitignore'))).toBe(false);
  });

  it('should wrap write failures', () => {
    writeFileSync(join(root, 'blocker'), '');

    expect(() => writeGeneratedFile(join(root, 'blocker', 'out.ts'), 'x;\n')).toThrow(GenerationError);
  });
});
