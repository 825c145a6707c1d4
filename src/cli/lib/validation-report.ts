/**
 * Validation Report Formatter
 *
 * Renders a grouped validation report for the terminal or as JSON.
 * Text output has one section per table with `Row N [field]: message`
 * lines; JSON output is the report plus a timestamp and summary counts.
 */

import type { TableName } from '../../core/types.js';
import type { GroupedReport } from '../../validators/report.js';

// =============================================================================
// Types
// =============================================================================

export type OutputFormat = 'text' | 'json';

export interface FormatOptions {
  /** Use ANSI colours */
  readonly color?: boolean;
  /** Timestamp source for JSON output */
  readonly now?: () => Date;
}

export interface ReportJson {
  readonly timestamp: string;
  readonly status: 'pass' | 'fail';
  readonly errorCount: number;
  readonly summary: Readonly<Partial<Record<TableName, number>>>;
  readonly groups: GroupedReport['groups'];
  readonly sitesWithoutSubLocations: readonly string[];
}

// =============================================================================
// Status Icons (ASCII-safe for CI compatibility)
// =============================================================================

const STATUS_ICONS = {
  pass: '[PASS]',
  fail: '[FAIL]',
} as const;

const STATUS_COLORS = {
  pass: '\x1b[32m', // green
  fail: '\x1b[31m', // red
} as const;

const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

// =============================================================================
// Formatters
// =============================================================================

/**
 * Format report as text sections
 */
export function formatText(
  report: GroupedReport,
  sitesWithoutSubLocations: readonly string[] = [],
  options: FormatOptions = {}
): string {
  const color = options.color ?? false;
  const status = report.passed ? 'pass' : 'fail';
  const paint = (code: string, text: string): string => (color ? `${code}${text}${RESET}` : text);

  const lines: string[] = [];

  const headline = report.passed
    ? 'Content validation passed'
    : `Content validation failed with ${report.errorCount} error(s)`;
  lines.push(`${paint(STATUS_COLORS[status], STATUS_ICONS[status])} ${headline}`);

  for (const group of report.groups) {
    lines.push('');
    lines.push(paint(BOLD, `${group.table} (${group.errors.length})`));
    for (const error of group.errors) {
      lines.push(`  Row ${error.row} [${error.field}]: ${error.message}`);
    }
  }

  if (sitesWithoutSubLocations.length > 0) {
    lines.push('');
    lines.push(`Sites without sub-locations: ${sitesWithoutSubLocations.join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * Build the JSON form of a report
 */
export function toReportJson(
  report: GroupedReport,
  sitesWithoutSubLocations: readonly string[] = [],
  options: FormatOptions = {}
): ReportJson {
  const now = options.now ?? (() => new Date());
  const summary: Partial<Record<TableName, number>> = {};
  for (const group of report.groups) {
    summary[group.table] = group.errors.length;
  }

  return {
    timestamp: now().toISOString(),
    status: report.passed ? 'pass' : 'fail',
    errorCount: report.errorCount,
    summary,
    groups: report.groups,
    sitesWithoutSubLocations,
  };
}

export function formatJson(
  report: GroupedReport,
  sitesWithoutSubLocations: readonly string[] = [],
  options: FormatOptions = {}
): string {
  return JSON.stringify(toReportJson(report, sitesWithoutSubLocations, options), null, 2);
}

/**
 * Format report in the requested format
 */
export function formatReport(
  report: GroupedReport,
  format: OutputFormat,
  sitesWithoutSubLocations: readonly string[] = [],
  options: FormatOptions = {}
): string {
  switch (format) {
    case 'json':
      return formatJson(report, sitesWithoutSubLocations, options);
    case 'text':
      return formatText(report, sitesWithoutSubLocations, options);
  }
}
