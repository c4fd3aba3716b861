/**
 * generate command - scan handlers and write the route registration module.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { ImportStyleSchema, type Config } from '../../core/config/schema.js';
import { generateRoutes } from '../../core/pipeline/pipeline.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { applyVerbosity, reportFailure } from '../report.js';

interface GenerateCommandOptions {
  root: string;
  output?: string;
  package?: string;
  config?: string;
  minify?: boolean;
  validate: boolean;
  importStyle?: string;
  verbose?: boolean;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate the route registration module from handler markers')
    .option('-r, --root <dir>', 'Directory to scan for handlers', '.')
    .option('-o, --output <file>', 'Output file (overrides generation.output)')
    .option('-p, --package <name>', 'Package name recorded in the generated metadata')
    .option('-c, --config <path>', 'Path to config file')
    .option('--minify', 'Emit minified output')
    .option('--no-validate', 'Skip structural validation of the generated file')
    .option('--import-style <style>', 'Handler import style: relative or package')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: GenerateCommandOptions) => {
      try {
        const projectRoot = process.cwd();
        const loaded = await loadConfig(projectRoot, options.config);
        const config = applyOverrides(loaded, options);
        applyVerbosity(options.verbose || config.dev.verbose);

        const result = generateRoutes({
          rootDir: options.root,
          projectRoot,
          config,
        });

        logger.success(`Generated ${path.relative(projectRoot, result.outputPath) || result.outputPath}`);
        if (result.validated) {
          logger.success('Generated file passed validation');
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}

/**
 * Command-line flags take precedence over the config file.
 */
export function applyOverrides(config: Config, options: GenerateCommandOptions): Config {
  let importStyle = config.generation.import_style;
  if (options.importStyle !== undefined) {
    const parsed = ImportStyleSchema.safeParse(options.importStyle);
    if (!parsed.success) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Invalid import style '${options.importStyle}': expected relative or package`,
        { importStyle: options.importStyle }
      );
    }
    importStyle = parsed.data;
  }

  return {
    ...config,
    generation: {
      ...config.generation,
      output: options.output ?? config.generation.output,
      package_name: options.package ?? config.generation.package_name,
      import_style: importStyle,
    },
    prod: {
      minify: options.minify === true || config.prod.minify,
      validate: options.validate && config.prod.validate,
    },
  };
}
