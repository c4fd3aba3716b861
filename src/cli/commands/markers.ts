/**
 * markers command - list the registered markers.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { createDefaultMarkerRegistry } from '../../core/markers/builtins.js';
import type { MarkerArity } from '../../core/markers/types.js';

interface MarkersCommandOptions {
  json?: boolean;
}

export function createMarkersCommand(): Command {
  return new Command('markers')
    .description('List the markers the compiler recognizes')
    .option('--json', 'Output as JSON')
    .action((options: MarkersCommandOptions) => {
      const definitions = createDefaultMarkerRegistry().all();

      if (options.json) {
        console.log(JSON.stringify(
          definitions.map((d) => ({ name: d.name, role: d.role, arity: d.arity, description: d.description ?? '' })),
          null,
          2
        ));
        return;
      }

      const width = Math.max(...definitions.map((d) => d.name.length)) + 1;
      for (const d of definitions) {
        console.log(
          `  ${chalk.bold(`@${d.name}`.padEnd(width + 1))} ${chalk.cyan(d.role.padEnd(11))} ${formatArity(d.arity).padEnd(6)} ${chalk.dim(d.description ?? '')}`
        );
      }
    });
}

export function formatArity({ min, max }: MarkerArity): string {
  if (max === undefined) return `${min}+`;
  return min === max ? `${min}` : `${min}-${max}`;
}
