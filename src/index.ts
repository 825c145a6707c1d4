/**
 * Site Content Sync
 *
 * Validation and denormalization of the five site content tables into the
 * app's nested content document.
 *
 * @example
 * ```typescript
 * import { LocalCsvSource, convertContent } from 'site-content-sync';
 *
 * const raw = await new LocalCsvSource('./data').load();
 * const result = await convertContent(raw);
 * if (result.ok) console.log(result.document.sites.length);
 * ```
 *
 * @module site-content-sync
 */

// Core
export * from './core/types.js';
export * from './core/config.js';
export * from './core/errors.js';
export { atomicWriteFile, atomicWriteFiles, atomicWriteJSON } from './core/utils/atomic-write.js';
export type { StagedFile } from './core/utils/atomic-write.js';
export { Logger, logger, createLogger } from './core/utils/logger.js';

// Row parsing
export {
  TABLE_COLUMNS,
  parseTables,
  parseNumber,
  reportRow,
  type ParsedTables,
} from './schemas/rows.js';

// Validation
export * from './validators/index.js';

// Transformation
export {
  DOCUMENT_VERSION,
  denormalize,
  groupCards,
  parseImageNames,
  type DenormalizeOptions,
} from './transformation/denormalizer.js';
export {
  convertContent,
  countRows,
  type ConversionResult,
  type ConvertOptions,
} from './transformation/pipeline.js';

// Sources and publishing
export {
  LocalCsvSource,
  RemoteSheetSource,
  TABLE_FILES,
  parseCsv,
  sheetCsvUrl,
  type RemoteSheetOptions,
  type TableSource,
  type TextFetchLike,
} from './cli/lib/table-source.js';
export { syncContent, createTableSource, type SyncResult } from './cli/lib/sync.js';
export { writeTemplates, templateCsv } from './cli/lib/template.js';
export { formatReport, formatText, formatJson, type OutputFormat } from './cli/lib/validation-report.js';
