/**
 * check command - validate markers without generating anything.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { isWebSocketOnly } from '../../core/assembly/types.js';
import { parseDirectory } from '../../core/pipeline/pipeline.js';
import { logger } from '../../utils/logger.js';
import { applyVerbosity, reportFailure } from '../report.js';

interface CheckCommandOptions {
  root: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Scan handlers and report marker errors')
    .option('-r, --root <dir>', 'Directory to scan for handlers', '.')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: CheckCommandOptions) => {
      try {
        const config = await loadConfig(process.cwd(), options.config);
        applyVerbosity(options.verbose || config.dev.verbose);

        const { routes, schemas } = parseDirectory(options.root, {
          include: config.handlers.include,
          exclude: config.handlers.exclude,
        });

        for (const route of routes) {
          const binding = isWebSocketOnly(route)
            ? `${chalk.magenta('WS')} [${route.webSocketHandlers.join(', ')}]`
            : `${chalk.cyan(route.method)} ${route.path}`;
          console.log(`  ${binding} ${chalk.dim(`${route.funcName} (${route.fileName}:${route.line})`)}`);
        }
        logger.success(`${routes.length} route(s), ${schemas.length} schema(s) found`);
      } catch (error) {
        reportFailure(error);
      }
    });
}
