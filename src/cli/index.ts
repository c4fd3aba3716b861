/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createGenerateCommand } from './commands/generate.js';
import { createCheckCommand } from './commands/check.js';
import { createVerifyCommand } from './commands/verify.js';
import { createMarkersCommand } from './commands/markers.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('routemark')
    .description('Compile route markers in handler doc comments into a registration module')
    .version(VERSION);
  [createGenerateCommand, createCheckCommand, createVerifyCommand, createMarkersCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
