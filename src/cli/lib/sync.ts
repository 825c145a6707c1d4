/**
 * Content Sync
 *
 * Load → convert → write. The document is staged for every output path
 * before any is replaced, and only when validation passes; a failed run
 * leaves the existing files untouched.
 *
 * @module cli/lib/sync
 */

import { ContentValidationError } from '../../core/errors.js';
import type { ContentDocument } from '../../core/types.js';
import { atomicWriteFiles } from '../../core/utils/atomic-write.js';
import { convertContent, type ConvertOptions } from '../../transformation/pipeline.js';
import type { GroupedReport } from '../../validators/report.js';
import { LocalCsvSource, RemoteSheetSource, type TableSource } from './table-source.js';
import type { CLIConfig } from './config.js';

export interface SyncResult {
  readonly document: ContentDocument;
  readonly report: GroupedReport;
  /** Absolute paths written, in config order */
  readonly written: readonly string[];
  readonly sitesWithoutSubLocations: readonly string[];
}

/**
 * Build the table source named by the config
 */
export function createTableSource(config: CLIConfig): TableSource {
  if (config.source.kind === 'remote') {
    const { spreadsheetId, sheets } = config.source;
    if (spreadsheetId === null || sheets === null) {
      throw new Error('Remote source requires source.spreadsheetId and source.sheets');
    }
    return new RemoteSheetSource({
      spreadsheetId,
      sheets,
      timeoutMs: config.source.timeout,
    });
  }
  return new LocalCsvSource(config.paths.data);
}

/**
 * Validate the source and write the document to every output
 *
 * @throws SourceEmptyError if the Sites table is empty
 * @throws ContentValidationError if any validation error was found
 */
export async function syncContent(
  source: TableSource,
  outputs: readonly string[],
  options: ConvertOptions = {}
): Promise<SyncResult> {
  const raw = await source.load();
  const result = await convertContent(raw, { origin: source.origin, ...options });

  if (!result.ok) {
    throw new ContentValidationError(result.report);
  }

  const json = `${JSON.stringify(result.document, null, 2)}\n`;
  await atomicWriteFiles(outputs.map((path) => ({ path, data: json })));

  return {
    document: result.document,
    report: result.report,
    written: [...outputs],
    sitesWithoutSubLocations: result.sitesWithoutSubLocations,
  };
}
