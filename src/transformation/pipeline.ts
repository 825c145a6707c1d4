/**
 * Conversion Pipeline
 *
 * Source tables → parse → validate → denormalize. Either the full dataset
 * converts or nothing does: the denormalizer is never entered while
 * validation errors exist.
 *
 * ARCHITECTURE:
 * - Table origin is opaque (CSV directory, sheet export, in-memory rows)
 * - Fatal only for an empty/missing Sites table; every other problem is
 *   returned in the report
 */

import { DEFAULT_CONTENT_RULES, type ContentRules } from '../core/config.js';
import { SourceEmptyError } from '../core/errors.js';
import type { ContentDocument, ContentTables, RawTables, TableName } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { parseTables } from '../schemas/rows.js';
import { groupErrors, type GroupedReport } from '../validators/report.js';
import { validateContent, type ValidationOptions } from '../validators/index.js';
import { denormalize } from './denormalizer.js';

const logger = createLogger({ module: 'pipeline' });

export interface ConvertOptions extends ValidationOptions {
  readonly rules?: ContentRules;
  /** Describes the source in the empty-source error */
  readonly origin?: string;
  readonly now?: () => Date;
}

export type ConversionResult =
  | {
      readonly ok: true;
      readonly document: ContentDocument;
      readonly report: GroupedReport;
      readonly tables: ContentTables;
      readonly sitesWithoutSubLocations: readonly string[];
    }
  | {
      readonly ok: false;
      readonly report: GroupedReport;
      readonly sitesWithoutSubLocations: readonly string[];
    };

/**
 * Row counts per table, for logging
 */
export function countRows(raw: RawTables): Record<TableName, number> {
  return {
    Sites: raw.Sites?.length ?? 0,
    SubLocations: raw.SubLocations?.length ?? 0,
    Cards: raw.Cards?.length ?? 0,
    Tips: raw.Tips?.length ?? 0,
    ArabicPhrases: raw.ArabicPhrases?.length ?? 0,
  };
}

/**
 * Validate and convert raw tables
 *
 * @throws SourceEmptyError if the Sites table is missing or empty
 */
export async function convertContent(
  raw: RawTables,
  options: ConvertOptions = {}
): Promise<ConversionResult> {
  const rules = options.rules ?? DEFAULT_CONTENT_RULES;

  if (raw.Sites === undefined || raw.Sites.length === 0) {
    throw new SourceEmptyError('Sites', options.origin ?? 'source');
  }

  logger.debug('Row counts', countRows(raw));

  const parsed = parseTables(raw);
  const validation = await validateContent(parsed.tables, rules, parsed.errors, options);
  const report = groupErrors(validation.errors);

  if (validation.sitesWithoutSubLocations.length > 0) {
    logger.info('Sites without sub-locations (allowed)', {
      sites: validation.sitesWithoutSubLocations,
    });
  }

  if (!report.passed) {
    logger.warn('Validation failed; no document produced', { errors: report.errorCount });
    return {
      ok: false,
      report,
      sitesWithoutSubLocations: validation.sitesWithoutSubLocations,
    };
  }

  const document = denormalize(parsed.tables, { now: options.now });
  logger.info('Converted content', { sites: document.sites.length, probed: validation.probed });

  return {
    ok: true,
    document,
    report,
    tables: parsed.tables,
    sitesWithoutSubLocations: validation.sitesWithoutSubLocations,
  };
}
