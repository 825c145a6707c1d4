/**
 * Sync Command
 *
 * Validate the content tables and, only when the report passes, write the
 * denormalized document to every configured output path.
 *
 * Usage:
 *   site-content sync [options]
 *
 * Options:
 *   --source <kind>       Table source: local|remote
 *   --data <dir>          CSV directory for the local source
 *   --output <path...>    Output paths (replaces the configured list)
 *   --check-urls          Probe external image URLs (only when no other errors)
 *   --probe-timeout <ms>  Per-URL probe timeout
 */

import type { Command } from 'commander';

import { ContentValidationError } from '../../core/errors.js';
import { EXIT_CODES, exitCodeFor, getGlobalContext, type ExitCode } from '../lib/context.js';
import { formatDuration } from '../lib/logger.js';
import { createTableSource, syncContent } from '../lib/sync.js';
import { formatReport } from '../lib/validation-report.js';
import { parsePositiveInt, parseSourceKind } from './options.js';

/**
 * Register the sync command
 */
export function registerSyncCommand(parent: Command): void {
  parent
    .command('sync')
    .description('Validate and write the content document to every output path')
    .option('--source <kind>', 'Table source: local|remote', parseSourceKind)
    .option('--data <dir>', 'CSV directory for the local source')
    .option('-o, --output <path...>', 'Output paths (replaces the configured list)')
    .option('--check-urls', 'Probe external image URLs when static checks pass')
    .option('--probe-timeout <ms>', 'Per-URL probe timeout in milliseconds', parsePositiveInt)
    .action(async () => {
      process.exitCode = await executeSync();
    });
}

/**
 * Execute the sync command
 */
export async function executeSync(): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  const started = Date.now();

  logger.commandStart('sync', {
    source: config.source.kind,
    outputs: config.paths.outputs.length,
  });

  try {
    const source = createTableSource(config);
    const result = await syncContent(source, config.paths.outputs, {
      rules: config.rules,
      probe: { enabled: config.probe.enabled, timeoutMs: config.probe.timeout },
    });

    for (const path of result.written) {
      logger.info('Wrote content document', { path, sites: result.document.sites.length });
    }
    if (config.json) {
      console.log(
        JSON.stringify(
          {
            status: 'pass',
            written: result.written,
            sites: result.document.sites.length,
            lastUpdated: result.document.lastUpdated,
          },
          null,
          2
        )
      );
    }

    logger.commandEnd(true, { elapsed: formatDuration(Date.now() - started) });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof ContentValidationError) {
      const format = config.json ? 'json' : 'text';
      console.log(
        formatReport(error.report, format, [], {
          color: format === 'text' && process.stdout.isTTY === true,
        })
      );
      logger.warn('Nothing written', { errors: error.report.errorCount });
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    logger.commandEnd(false, { elapsed: formatDuration(Date.now() - started) });
    return exitCodeFor(error);
  }
}
