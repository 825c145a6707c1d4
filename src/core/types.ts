/**
 * Site Content Core Types
 *
 * Typed records for the five content tables, the uniform validation error
 * model, and the nested document shape the mobile app decodes.
 *
 * TYPE SAFETY: Raw rows are untyped field maps; everything downstream of
 * `parseTables` works with the records declared here.
 *
 * @module core/types
 */

// ============================================================================
// Tables
// ============================================================================

/**
 * Table names in display (and validation) order
 */
export const TABLE_NAMES = [
  'Sites',
  'SubLocations',
  'Cards',
  'Tips',
  'ArabicPhrases',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

/**
 * A single untyped row as produced by a table source (CSV, sheet export)
 */
export type RawRow = Readonly<Record<string, unknown>>;

/**
 * Opaque provider output: table name to list of field maps
 */
export type RawTables = Partial<Record<TableName, readonly unknown[]>>;

/**
 * Numeric column after parsing. `value` is null when the cell is blank
 * or not a finite number; `text` keeps the trimmed source for messages.
 */
export interface NumericCell {
  readonly text: string;
  readonly value: number | null;
}

/**
 * Fields shared by every parsed record
 */
interface RecordBase {
  /** Report row number (source index + 2 for the header row) */
  readonly row: number;
  readonly id: string;
}

export interface SiteRecord extends RecordBase {
  readonly name: string;
  readonly arabicName: string;
  readonly era: string;
  readonly tourismType: string;
  readonly placeType: string;
  readonly city: string;
  readonly shortDescription: string;
  readonly latitude: NumericCell;
  readonly longitude: NumericCell;
  /** Comma-separated image names as entered */
  readonly imageNames: string;
  readonly estimatedDuration: string;
  readonly bestTimeToVisit: string;
}

export interface SubLocationRecord extends RecordBase {
  readonly siteId: string;
  readonly name: string;
  readonly arabicName: string;
  readonly shortDescription: string;
  readonly imageName: string;
  readonly order: NumericCell;
}

export interface CardRecord extends RecordBase {
  readonly subLocationId: string;
  readonly order: NumericCell;
  readonly type: string;
  readonly imageUrl: string;
  readonly content: string;
  readonly funFact: string;
  readonly quizQuestion: string;
  readonly quizOptions: readonly [string, string, string, string];
  /** 1-based index into quizOptions */
  readonly quizCorrectAnswer: NumericCell;
  readonly quizExplanation: string;
}

export interface TipRecord extends RecordBase {
  readonly siteId: string;
  readonly order: NumericCell;
  readonly tip: string;
}

export interface PhraseRecord extends RecordBase {
  readonly siteId: string;
  readonly english: string;
  readonly arabic: string;
  readonly pronunciation: string;
}

/**
 * Snapshot of all five tables after row parsing
 */
export interface ContentTables {
  readonly sites: readonly SiteRecord[];
  readonly subLocations: readonly SubLocationRecord[];
  readonly cards: readonly CardRecord[];
  readonly tips: readonly TipRecord[];
  readonly phrases: readonly PhraseRecord[];
}

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * Taxonomy tag for a validation finding. All findings are errors; the
 * kind only says which rule produced it.
 */
export type ValidationErrorKind =
  | 'parse'
  | 'missing'
  | 'duplicate-id'
  | 'foreign-key'
  | 'enum'
  | 'format'
  | 'bounds'
  | 'length'
  | 'script'
  | 'quiz'
  | 'order'
  | 'orphan'
  | 'duplicate-content'
  | 'quality'
  | 'unreachable';

export interface ValidationError {
  readonly table: TableName;
  readonly row: number;
  readonly field: string;
  readonly message: string;
  readonly kind: ValidationErrorKind;
}

// ============================================================================
// Output Document
// ============================================================================

export interface QuizQuestion {
  readonly id: string;
  readonly question: string;
  readonly options: readonly string[];
  /** 0-based */
  readonly correctAnswerIndex: number;
  readonly explanation: string;
  readonly funFact: string | null;
}

export interface StoryCard {
  readonly id: string;
  readonly type: string;
  readonly imageName: string | null;
  readonly content: string | null;
  readonly funFact: string | null;
  readonly quizQuestion: QuizQuestion | null;
}

export interface SubLocation {
  readonly id: string;
  readonly name: string;
  readonly arabicName: string;
  readonly shortDescription: string;
  readonly imageName: string | null;
  readonly storyCards: readonly StoryCard[];
}

export interface ArabicPhrase {
  readonly english: string;
  readonly arabic: string;
  readonly pronunciation: string;
}

export interface VisitInfo {
  readonly estimatedDuration: string;
  readonly bestTimeToVisit: string;
  readonly tips: readonly string[];
  readonly arabicPhrases: readonly ArabicPhrase[];
}

export interface Site {
  readonly id: string;
  readonly name: string;
  readonly arabicName: string;
  readonly era: string;
  readonly tourismType: string;
  readonly placeType: string;
  readonly city: string;
  readonly shortDescription: string;
  readonly coordinates: {
    readonly latitude: number;
    readonly longitude: number;
  };
  readonly imageNames: readonly string[];
  readonly subLocations: readonly SubLocation[];
  readonly visitInfo: VisitInfo;
  readonly isUnlocked: true;
}

export interface ContentDocument {
  readonly version: string;
  /** ISO-8601 generation timestamp */
  readonly lastUpdated: string;
  readonly sites: readonly Site[];
}
