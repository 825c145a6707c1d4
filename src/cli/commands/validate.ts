/**
 * Validate Command
 *
 * Load the five tables, run every validation phase and print the grouped
 * report. Nothing is written.
 *
 * Usage:
 *   site-content validate [options]
 *
 * Options:
 *   --source <kind>       Table source: local|remote
 *   --data <dir>          CSV directory for the local source
 *   --check-urls          Probe external image URLs (only when no other errors)
 *   --probe-timeout <ms>  Per-URL probe timeout
 *   --format <fmt>        Output format: text|json (default: text)
 */

import type { Command } from 'commander';

import { convertContent } from '../../transformation/pipeline.js';
import { EXIT_CODES, exitCodeFor, getGlobalContext, type ExitCode } from '../lib/context.js';
import { formatDuration } from '../lib/logger.js';
import { createTableSource } from '../lib/sync.js';
import { formatReport, type OutputFormat } from '../lib/validation-report.js';
import { parseOutputFormat, parsePositiveInt, parseSourceKind } from './options.js';

interface ValidateOptions {
  readonly format: OutputFormat;
}

/**
 * Register the validate command
 */
export function registerValidateCommand(parent: Command): void {
  parent
    .command('validate')
    .description('Validate the content tables and print the report')
    .option('--source <kind>', 'Table source: local|remote', parseSourceKind)
    .option('--data <dir>', 'CSV directory for the local source')
    .option('--check-urls', 'Probe external image URLs when static checks pass')
    .option('--probe-timeout <ms>', 'Per-URL probe timeout in milliseconds', parsePositiveInt)
    .option('-f, --format <fmt>', 'Output format: text|json', parseOutputFormat, 'text')
    .action(async (options: ValidateOptions) => {
      process.exitCode = await executeValidate(options);
    });
}

/**
 * Execute the validate command
 */
export async function executeValidate(options: ValidateOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  const format: OutputFormat = config.json ? 'json' : options.format;
  const started = Date.now();

  logger.commandStart('validate', {
    source: config.source.kind,
    checkUrls: config.probe.enabled,
  });

  try {
    const source = createTableSource(config);
    logger.debug('Loading tables', { origin: source.origin });
    const raw = await source.load();

    const result = await convertContent(raw, {
      rules: config.rules,
      origin: source.origin,
      probe: { enabled: config.probe.enabled, timeoutMs: config.probe.timeout },
    });

    console.log(
      formatReport(result.report, format, result.sitesWithoutSubLocations, {
        color: format === 'text' && process.stdout.isTTY === true,
      })
    );

    logger.commandEnd(result.ok, {
      errors: result.report.errorCount,
      elapsed: formatDuration(Date.now() - started),
    });
    return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.VALIDATION_ERRORS;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.commandEnd(false);
    return exitCodeFor(error);
  }
}
