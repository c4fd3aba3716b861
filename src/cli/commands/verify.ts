/**
 * verify command - structural validation of an existing generated file.
 */
import { Command } from 'commander';
import { validateGeneratedFile } from '../../core/post-validation/validator.js';
import { logger } from '../../utils/logger.js';
import { reportFailure } from '../report.js';

interface VerifyCommandOptions {
  entryPoint: string;
}

export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Check that a generated file parses and registers its routes')
    .argument('<file>', 'Generated module to check')
    .option('-e, --entry-point <name>', 'Name of the startup function', 'initializeRoutes')
    .action(async (file: string, options: VerifyCommandOptions) => {
      try {
        const result = validateGeneratedFile(file, { entryPoint: options.entryPoint });
        logger.success(`${file}: ${result.registrations} registration(s), ${result.imports} import(s)`);
      } catch (error) {
        reportFailure(error);
      }
    });
}
