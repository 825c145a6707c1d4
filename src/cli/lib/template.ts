/**
 * Workbook Template
 *
 * Writes one header-only CSV per table into the data directory, in the
 * column order the parser expects. Existing files are kept unless
 * `force` is set.
 *
 * @module cli/lib/template
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import Papa from 'papaparse';

import { TABLE_NAMES, type TableName } from '../../core/types.js';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { TABLE_COLUMNS } from '../../schemas/rows.js';
import { TABLE_FILES } from './table-source.js';

export interface TemplateOptions {
  /** Overwrite existing table files */
  readonly force?: boolean;
}

export interface TemplateFileResult {
  readonly table: TableName;
  readonly path: string;
  readonly status: 'written' | 'skipped';
}

/**
 * Header line for one table, ending in exactly one newline
 */
export function templateCsv(table: TableName): string {
  const header = Papa.unparse({ fields: [...TABLE_COLUMNS[table]], data: [] }, { newline: '\n' });
  return `${header.replace(/\n+$/, '')}\n`;
}

export async function writeTemplates(
  dataDir: string,
  options: TemplateOptions = {}
): Promise<TemplateFileResult[]> {
  const results: TemplateFileResult[] = [];

  for (const table of TABLE_NAMES) {
    const path = join(dataDir, TABLE_FILES[table]);

    if (existsSync(path) && !options.force) {
      results.push({ table, path, status: 'skipped' });
      continue;
    }

    await atomicWriteFile(path, templateCsv(table));
    results.push({ table, path, status: 'written' });
  }

  return results;
}
