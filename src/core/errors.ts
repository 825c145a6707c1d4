/**
 * Site Content Error Types
 *
 * Validation findings are plain data (see ValidationError in types.ts) and
 * are never thrown. The classes here cover the few conditions that stop a
 * run: an empty source, a source that cannot be read, and a sync attempted
 * on content that failed validation.
 */

import type { TableName } from './types.js';
import type { GroupedReport } from '../validators/report.js';

/**
 * Error thrown when the primary table has no rows at all
 *
 * Raised before validation starts; there is nothing to validate.
 */
export class SourceEmptyError extends Error {
  constructor(
    public readonly table: TableName,
    public readonly origin: string
  ) {
    super(`No ${table} rows found in ${origin}`);
    this.name = 'SourceEmptyError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SourceEmptyError);
    }
  }
}

/**
 * Error thrown when a table source cannot be read (missing directory,
 * unreadable file, failed sheet export)
 */
export class TableSourceError extends Error {
  constructor(
    message: string,
    public readonly table: TableName | null,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TableSourceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TableSourceError);
    }
  }
}

/**
 * Error thrown by syncContent when validation fails and nothing was written
 *
 * RECOVERY:
 * - Fix the listed rows in the spreadsheet
 * - Re-run `site-content validate` until the report passes
 */
export class ContentValidationError extends Error {
  constructor(public readonly report: GroupedReport) {
    super(`Content validation failed with ${report.errorCount} error(s)`);
    this.name = 'ContentValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContentValidationError);
    }
  }

  /**
   * Get formatted summary of the first few failures per table
   */
  getSummary(limit = 3): string {
    const lines: string[] = [`${this.message}:`, ''];

    for (const group of this.report.groups) {
      lines.push(`  ${group.table}: ${group.errors.length} error(s)`);
      for (const error of group.errors.slice(0, limit)) {
        lines.push(`    - Row ${error.row} [${error.field}] ${error.message}`);
      }
      if (group.errors.length > limit) {
        lines.push(`    ... and ${group.errors.length - limit} more`);
      }
    }

    return lines.join('\n');
  }
}
