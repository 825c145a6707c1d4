/**
 * Template Command
 *
 * Write header-only CSV files for the five tables into the data directory.
 *
 * Usage:
 *   site-content template [--data <dir>] [--force]
 */

import type { Command } from 'commander';

import { EXIT_CODES, getGlobalContext, type ExitCode } from '../lib/context.js';
import { writeTemplates } from '../lib/template.js';

interface TemplateCommandOptions {
  readonly force?: boolean;
}

/**
 * Register the template command
 */
export function registerTemplateCommand(parent: Command): void {
  parent
    .command('template')
    .description('Write header-only CSV files for every table')
    .option('--data <dir>', 'Directory to write the CSV files into')
    .option('--force', 'Overwrite existing files')
    .action(async (options: TemplateCommandOptions) => {
      process.exitCode = await executeTemplate(options);
    });
}

export async function executeTemplate(options: TemplateCommandOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();

  logger.commandStart('template', { data: config.paths.data });

  const results = await writeTemplates(config.paths.data, { force: options.force });
  for (const result of results) {
    if (result.status === 'written') {
      logger.info('Wrote template', { table: result.table, path: result.path });
    } else {
      logger.warn('Exists; skipped (use --force to overwrite)', { path: result.path });
    }
  }

  logger.commandEnd(true, { written: results.filter((r) => r.status === 'written').length });
  return EXIT_CODES.SUCCESS;
}
