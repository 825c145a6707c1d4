/**
 * Table Sources
 *
 * Providers of `table name → rows` for the conversion pipeline:
 * - LocalCsvSource: one CSV file per table in a data directory
 * - RemoteSheetSource: published spreadsheet tabs via the CSV export URL
 *
 * Both return raw field maps; typing and validation happen downstream.
 * A missing table file reads as an empty table (the pipeline decides
 * whether that is fatal).
 *
 * @module cli/lib/table-source
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import Papa from 'papaparse';

import { TableSourceError } from '../../core/errors.js';
import { TABLE_NAMES, type RawTables, type TableName } from '../../core/types.js';
import { createLogger } from '../../core/utils/logger.js';

const logger = createLogger({ module: 'table-source' });

// ============================================================================
// Types
// ============================================================================

export interface TableSource {
  /** Human description used in logs and errors */
  readonly origin: string;
  load(): Promise<RawTables>;
}

/**
 * CSV file name per table in a local data directory
 */
export const TABLE_FILES: Readonly<Record<TableName, string>> = {
  Sites: '1_sites.csv',
  SubLocations: '2_sublocations.csv',
  Cards: '3_cards.csv',
  Tips: '4_tips.csv',
  ArabicPhrases: '5_arabicphrases.csv',
};

// ============================================================================
// CSV Parsing
// ============================================================================

/**
 * Parse CSV text with a header row into field maps
 *
 * Blank lines are skipped; a leading byte-order mark is dropped.
 */
export function parseCsv(text: string, label = 'csv'): Record<string, string>[] {
  const result = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  if (result.errors.length > 0) {
    logger.warn('CSV parse issues', {
      source: label,
      issues: result.errors.slice(0, 5).map((e) => `row ${e.row ?? '?'}: ${e.message}`),
    });
  }

  return result.data;
}

// ============================================================================
// Local CSV Directory
// ============================================================================

export class LocalCsvSource implements TableSource {
  readonly origin: string;
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = resolve(dataDir);
    this.origin = this.dataDir;
  }

  async load(): Promise<RawTables> {
    if (!existsSync(this.dataDir)) {
      throw new TableSourceError(`Data directory not found: ${this.dataDir}`, null);
    }

    const tables: RawTables = {};

    for (const table of TABLE_NAMES) {
      const filePath = join(this.dataDir, TABLE_FILES[table]);

      if (!existsSync(filePath)) {
        logger.warn('Table file missing; treating as empty', { table, file: filePath });
        tables[table] = [];
        continue;
      }

      let text: string;
      try {
        text = await readFile(filePath, 'utf-8');
      } catch (error) {
        throw new TableSourceError(`Cannot read ${filePath}`, table, error);
      }

      tables[table] = parseCsv(text, filePath);
      logger.debug('Loaded table', { table, rows: tables[table]?.length ?? 0 });
    }

    return tables;
  }
}

// ============================================================================
// Remote Spreadsheet Export
// ============================================================================

export type TextFetchLike = (
  input: string,
  init: { readonly method: string; readonly signal: AbortSignal }
) => Promise<{ readonly ok: boolean; readonly status: number; text(): Promise<string> }>;

export interface RemoteSheetOptions {
  readonly spreadsheetId: string;
  /** Tab id (gid) per table */
  readonly sheets: Readonly<Record<TableName, number>>;
  readonly timeoutMs: number;
  readonly fetch?: TextFetchLike;
}

/**
 * CSV export URL for one spreadsheet tab
 */
export function sheetCsvUrl(spreadsheetId: string, gid: number): string {
  return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(spreadsheetId)}/gviz/tq?tqx=out:csv&gid=${gid}`;
}

export class RemoteSheetSource implements TableSource {
  readonly origin: string;

  constructor(private readonly options: RemoteSheetOptions) {
    this.origin = `spreadsheet ${options.spreadsheetId}`;
  }

  async load(): Promise<RawTables> {
    const tables: RawTables = {};

    for (const table of TABLE_NAMES) {
      tables[table] = await this.fetchTable(table);
    }

    return tables;
  }

  private async fetchTable(table: TableName): Promise<Record<string, string>[]> {
    const url = sheetCsvUrl(this.options.spreadsheetId, this.options.sheets[table]);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const fetchImpl: TextFetchLike = this.options.fetch ?? fetch;
      const response = await fetchImpl(url, { method: 'GET', signal: controller.signal });

      if (!response.ok) {
        throw new TableSourceError(`Fetching ${table} failed: HTTP ${response.status}`, table);
      }

      const rows = parseCsv(await response.text(), `${table} sheet`);
      logger.debug('Fetched table', { table, rows: rows.length });
      return rows;
    } catch (error) {
      if (error instanceof TableSourceError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new TableSourceError(`Fetching ${table} failed: ${reason}`, table, error);
    } finally {
      clearTimeout(timeout);
    }
  }
}
