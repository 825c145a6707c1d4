/**
 * Row Parsing Schemas
 *
 * Converts untyped field maps from a table source into typed records
 * using Zod. Every cell is normalised to a trimmed string; numeric columns
 * become NumericCell values carrying both the source text and the parsed
 * number. Rows that are not field maps become `parse` errors.
 *
 * Parsing never rejects a row for bad content: blank or malformed values
 * are left for the row validators, which report them in their fixed order.
 */

import { z } from 'zod';
import type {
  CardRecord,
  ContentTables,
  NumericCell,
  PhraseRecord,
  RawTables,
  SiteRecord,
  SubLocationRecord,
  TableName,
  TipRecord,
  ValidationError,
} from '../core/types.js';

// ============================================================================
// Cell Schemas
// ============================================================================

/**
 * Any scalar cell → trimmed string (absent and null become '')
 */
export const CellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()])
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse trimmed cell text as a finite decimal number, or null
 *
 * Hex, binary and exponent forms are rejected so `0x1` and `1e0` never
 * read as order 1.
 */
export function parseNumber(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export const NumericCellSchema = CellSchema.transform(
  (text): NumericCell => ({ text, value: parseNumber(text) })
);

// ============================================================================
// Row Schemas
// ============================================================================

type RowSchema<T> = z.ZodType<Omit<T, 'row'>, z.ZodTypeDef, unknown>;

export const SiteRowSchema: RowSchema<SiteRecord> = z.object({
  id: CellSchema,
  name: CellSchema,
  arabicName: CellSchema,
  era: CellSchema,
  tourismType: CellSchema,
  placeType: CellSchema,
  city: CellSchema,
  shortDescription: CellSchema,
  latitude: NumericCellSchema,
  longitude: NumericCellSchema,
  imageNames: CellSchema,
  estimatedDuration: CellSchema,
  bestTimeToVisit: CellSchema,
});

export const SubLocationRowSchema: RowSchema<SubLocationRecord> = z.object({
  id: CellSchema,
  siteId: CellSchema,
  name: CellSchema,
  arabicName: CellSchema,
  shortDescription: CellSchema,
  imageName: CellSchema,
  order: NumericCellSchema,
});

export const CardRowSchema: RowSchema<CardRecord> = z
  .object({
    id: CellSchema,
    subLocationId: CellSchema,
    order: NumericCellSchema,
    type: CellSchema,
    imageUrl: CellSchema,
    content: CellSchema,
    funFact: CellSchema,
    quizQuestion: CellSchema,
    quizOption1: CellSchema,
    quizOption2: CellSchema,
    quizOption3: CellSchema,
    quizOption4: CellSchema,
    quizCorrectAnswer: NumericCellSchema,
    quizExplanation: CellSchema,
  })
  .transform(
    (row): Omit<CardRecord, 'row'> => ({
      id: row.id,
      subLocationId: row.subLocationId,
      order: row.order,
      type: row.type,
      imageUrl: row.imageUrl,
      content: row.content,
      funFact: row.funFact,
      quizQuestion: row.quizQuestion,
      quizOptions: [row.quizOption1, row.quizOption2, row.quizOption3, row.quizOption4],
      quizCorrectAnswer: row.quizCorrectAnswer,
      quizExplanation: row.quizExplanation,
    })
  );

export const TipRowSchema: RowSchema<TipRecord> = z.object({
  id: CellSchema,
  siteId: CellSchema,
  order: NumericCellSchema,
  tip: CellSchema,
});

export const PhraseRowSchema: RowSchema<PhraseRecord> = z.object({
  id: CellSchema,
  siteId: CellSchema,
  english: CellSchema,
  arabic: CellSchema,
  pronunciation: CellSchema,
});

/**
 * Column headers per table, in sheet order
 */
export const TABLE_COLUMNS: Readonly<Record<TableName, readonly string[]>> = {
  Sites: [
    'id',
    'name',
    'arabicName',
    'era',
    'tourismType',
    'placeType',
    'city',
    'shortDescription',
    'latitude',
    'longitude',
    'imageNames',
    'estimatedDuration',
    'bestTimeToVisit',
  ],
  SubLocations: ['id', 'siteId', 'name', 'arabicName', 'shortDescription', 'imageName', 'order'],
  Cards: [
    'id',
    'subLocationId',
    'order',
    'type',
    'imageUrl',
    'content',
    'funFact',
    'quizQuestion',
    'quizOption1',
    'quizOption2',
    'quizOption3',
    'quizOption4',
    'quizCorrectAnswer',
    'quizExplanation',
  ],
  Tips: ['id', 'siteId', 'order', 'tip'],
  ArabicPhrases: ['id', 'siteId', 'english', 'arabic', 'pronunciation'],
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Report row number for a source index (header occupies row 1)
 */
export function reportRow(index: number): number {
  return index + 2;
}

function parseTable<T>(
  table: TableName,
  rows: readonly unknown[] | undefined,
  schema: RowSchema<T>,
  errors: ValidationError[]
): Array<Omit<T, 'row'> & { readonly row: number }> {
  const records: Array<Omit<T, 'row'> & { readonly row: number }> = [];

  (rows ?? []).forEach((raw, index) => {
    const row = reportRow(index);
    const result = schema.safeParse(raw);

    if (!result.success) {
      for (const issue of result.error.errors) {
        errors.push({
          table,
          row,
          field: issue.path.length > 0 ? issue.path.join('.') : '(row)',
          message: `Unreadable row: ${issue.message}`,
          kind: 'parse',
        });
      }
      return;
    }

    records.push({ ...result.data, row });
  });

  return records;
}

export interface ParsedTables {
  readonly tables: ContentTables;
  readonly errors: readonly ValidationError[];
}

/**
 * Parse all five raw tables into typed records
 *
 * A missing table parses as empty. Row numbers follow source positions,
 * including rows that failed to parse.
 */
export function parseTables(raw: RawTables): ParsedTables {
  const errors: ValidationError[] = [];

  const tables: ContentTables = {
    sites: parseTable<SiteRecord>('Sites', raw.Sites, SiteRowSchema, errors),
    subLocations: parseTable<SubLocationRecord>(
      'SubLocations',
      raw.SubLocations,
      SubLocationRowSchema,
      errors
    ),
    cards: parseTable<CardRecord>('Cards', raw.Cards, CardRowSchema, errors),
    tips: parseTable<TipRecord>('Tips', raw.Tips, TipRowSchema, errors),
    phrases: parseTable<PhraseRecord>('ArabicPhrases', raw.ArabicPhrases, PhraseRowSchema, errors),
  };

  return { tables, errors };
}
