/**
 * Tests for the generate command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { applyOverrides, createGenerateCommand } from '../../../../src/cli/commands/generate.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { MultipleValidationError, ValidationError, ConfigError } from '../../../../src/utils/errors.js';

vi.mock('../../../../src/core/config/loader.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/core/config/loader.js')>();
  return {
    ...actual,
    loadConfig: vi.fn().mockImplementation(async () => actual.getDefaultConfig()),
  };
});

vi.mock('../../../../src/core/pipeline/pipeline.js', () => ({
  generateRoutes: vi.fn(),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    success: vi.fn(),
    fail: vi.fn(),
  },
}));

import { loadConfig } from '../../../../src/core/config/loader.js';
import { generateRoutes } from '../../../../src/core/pipeline/pipeline.js';
import { logger } from '../../../../src/utils/logger.js';

const result = {
  outputPath: '/project/.routemark/routes.generated.ts',
  routes: [],
  schemas: [],
  routesCount: 0,
  websocketsCount: 0,
  middlewaresCount: 0,
  proxiesCount: 0,
  validated: true,
};

describe('generate command', () => {
  let processExitSpy: MockInstance<typeof process.exit>;
  let processCwdSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(generateRoutes).mockReturnValue(result);
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue('/project');
  });

  afterEach(() => {
    processExitSpy.mockRestore();
    processCwdSpy.mockRestore();
  });

  describe('createGenerateCommand', () => {
    it('should create a command with correct name', () => {
      expect(createGenerateCommand().name()).toBe('generate');
    });

    it('should register its options', () => {
      const names = createGenerateCommand().options.map((opt) => opt.long);

      expect(names).toEqual([
        '--root',
        '--output',
        '--package',
        '--config',
        '--minify',
        '--no-validate',
        '--import-style',
        '--verbose',
      ]);
    });
  });

  describe('action', () => {
    it('should run the pipeline from the working directory', async () => {
      await createGenerateCommand().parseAsync(['node', 'test', '--root', 'src']);

      expect(loadConfig).toHaveBeenCalledWith('/project', undefined);
      expect(generateRoutes).toHaveBeenCalledWith({
        rootDir: 'src',
        projectRoot: '/project',
        config: getDefaultConfig(),
      });
      expect(logger.success).toHaveBeenCalledWith('Generated .routemark/routes.generated.ts');
      expect(logger.success).toHaveBeenCalledWith('Generated file passed validation');
      expect(logger.setLevel).toHaveBeenCalledWith('info');
    });

    it('should pass flag overrides to the pipeline', async () => {
      await createGenerateCommand().parseAsync([
        'node', 'test', '--minify', '--no-validate', '--package', 'api', '--verbose',
      ]);

      const [call] = vi.mocked(generateRoutes).mock.calls;
      expect(call[0].config?.prod).toEqual({ minify: true, validate: false });
      expect(call[0].config?.generation.package_name).toBe('api');
      expect(logger.setLevel).toHaveBeenCalledWith('debug');
    });

    it('should list validation errors and exit with 1', async () => {
      vi.mocked(generateRoutes).mockImplementation(() => {
        throw new MultipleValidationError([
          new ValidationError('INVALID_HTTP_METHOD', 'a.ts', 2, "Invalid HTTP method 'FETCH'"),
          new ValidationError('INVALID_PATH', 'b.ts', 4, "Route path 'x' must start with '/'"),
        ]);
      });

      await expect(createGenerateCommand().parseAsync(['node', 'test'])).rejects.toThrow('process.exit called');

      expect(logger.fail).toHaveBeenCalledWith("a.ts:2 - Invalid HTTP method 'FETCH' [INVALID_HTTP_METHOD]");
      expect(logger.fail).toHaveBeenCalledWith("b.ts:4 - Route path 'x' must start with '/' [INVALID_PATH]");
      expect(logger.error).toHaveBeenCalledWith('2 validation error(s) found');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should reject an unknown import style', async () => {
      await expect(
        createGenerateCommand().parseAsync(['node', 'test', '--import-style', 'absolute'])
      ).rejects.toThrow('process.exit called');

      expect(generateRoutes).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid import style 'absolute': expected relative or package [CONFIG_LOAD_ERROR]"
      );
    });
  });
});

describe('applyOverrides', () => {
  it('should leave the config alone without flags', () => {
    const config = getDefaultConfig();

    expect(applyOverrides(config, { root: '.', validate: true })).toEqual(config);
  });

  it('should let flags win over the config file', () => {
    const config = getDefaultConfig();

    const merged = applyOverrides(config, {
      root: '.',
      validate: true,
      output: 'gen/routes.ts',
      importStyle: 'package',
    });

    expect(merged.generation.output).toBe('gen/routes.ts');
    expect(merged.generation.import_style).toBe('package');
  });

  it('should keep minify on when the config asks for it', () => {
    const config = getDefaultConfig();
    config.prod.minify = true;

    expect(applyOverrides(config, { root: '.', validate: true }).prod.minify).toBe(true);
  });

  it('should throw ConfigError for an invalid style', () => {
    expect(() => applyOverrides(getDefaultConfig(), { root: '.', validate: true, importStyle: 'x' })).toThrow(
      ConfigError
    );
  });
});
