/**
 * Validation Report
 *
 * Groups the flat error list by table in display order and decides
 * pass/fail. There is no partial success: the report passes only when
 * the error list is empty.
 */

import { TABLE_NAMES, type TableName, type ValidationError } from '../core/types.js';

export interface TableErrorGroup {
  readonly table: TableName;
  /** Errors in discovery order */
  readonly errors: readonly ValidationError[];
}

export interface GroupedReport {
  readonly passed: boolean;
  readonly errorCount: number;
  /** Only tables with at least one error, in display order */
  readonly groups: readonly TableErrorGroup[];
}

export function groupErrors(errors: readonly ValidationError[]): GroupedReport {
  const groups: TableErrorGroup[] = [];

  for (const table of TABLE_NAMES) {
    const tableErrors = errors.filter((error) => error.table === table);
    if (tableErrors.length > 0) {
      groups.push({ table, errors: tableErrors });
    }
  }

  return {
    passed: errors.length === 0,
    errorCount: errors.length,
    groups,
  };
}
