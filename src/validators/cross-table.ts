/**
 * Cross-Table Checker
 *
 * Checks that need the whole dataset rather than one row:
 * - sub-locations with no cards (orphans, reported)
 * - sites with no sub-locations (collected, NOT reported; a site page
 *   without sub-locations is acceptable content)
 * - duplicate card content
 * - card-type quality (quiz cards need a question, text cards need text)
 * - quiz answer targets, re-checked; an error already raised by the row
 *   validators is not repeated
 */

import type { ContentRules } from '../core/config.js';
import type { CardRecord, ContentTables, ValidationError } from '../core/types.js';
import { isNonEmpty } from './field-validators.js';
import { emptyAnswerTargetMessage } from './row-validators.js';

export interface CrossTableResult {
  readonly errors: readonly ValidationError[];
  /** Site ids with no sub-locations, in site order */
  readonly sitesWithoutSubLocations: readonly string[];
}

/**
 * Sub-locations that no card references
 */
export function findOrphanSubLocations(tables: ContentTables): ValidationError[] {
  const withCards = new Set(tables.cards.map((card) => card.subLocationId));

  return tables.subLocations
    .filter((subLocation) => isNonEmpty(subLocation.id) && !withCards.has(subLocation.id))
    .map((subLocation): ValidationError => ({
      table: 'SubLocations',
      row: subLocation.row,
      field: 'id',
      message: `Sub-location '${subLocation.id}' has no cards`,
      kind: 'orphan',
    }));
}

export function findSitesWithoutSubLocations(tables: ContentTables): string[] {
  const withSubLocations = new Set(tables.subLocations.map((subLocation) => subLocation.siteId));

  return tables.sites
    .filter((site) => isNonEmpty(site.id) && !withSubLocations.has(site.id))
    .map((site) => site.id);
}

/**
 * Cards repeating another card's opening text
 *
 * Only content longer than `duplicateContent.minLength` takes part; the
 * key is the lowercased first `keyLength` characters.
 */
export function findDuplicateContent(
  cards: readonly CardRecord[],
  rules: ContentRules
): ValidationError[] {
  const { minLength, keyLength } = rules.duplicateContent;
  const firstRowByKey = new Map<string, number>();
  const errors: ValidationError[] = [];

  for (const card of cards) {
    // code points, as checkLength counts them
    const characters = [...card.content];
    if (characters.length <= minLength) continue;

    const key = characters.slice(0, keyLength).join('').toLowerCase();
    const firstRow = firstRowByKey.get(key);

    if (firstRow === undefined) {
      firstRowByKey.set(key, card.row);
      continue;
    }

    errors.push({
      table: 'Cards',
      row: card.row,
      field: 'content',
      message: `Duplicate content (same text as row ${firstRow})`,
      kind: 'duplicate-content',
    });
  }

  return errors;
}

/**
 * Card type against the fields it needs to render
 */
export function findCardQualityIssues(cards: readonly CardRecord[]): ValidationError[] {
  const errors: ValidationError[] = [];

  const issue = (card: CardRecord, field: string, message: string): void => {
    errors.push({ table: 'Cards', row: card.row, field, message, kind: 'quality' });
  };

  for (const card of cards) {
    switch (card.type) {
      case 'quiz':
        if (!isNonEmpty(card.quizQuestion)) {
          issue(card, 'quizQuestion', `Quiz card '${card.id}' has no quizQuestion`);
        }
        break;
      case 'intro':
      case 'story':
        if (!isNonEmpty(card.content)) {
          issue(card, 'content', `${card.type} card '${card.id}' has no content`);
        }
        break;
      case 'fact':
        if (!isNonEmpty(card.funFact) && !isNonEmpty(card.content)) {
          issue(card, 'funFact', `Fact card '${card.id}' has neither funFact nor content`);
        }
        break;
    }
  }

  return errors;
}

/**
 * Quiz answers pointing at blank options, skipping ones already reported
 */
export function findEmptyAnswerTargets(
  cards: readonly CardRecord[],
  reported: readonly ValidationError[]
): ValidationError[] {
  const seen = new Set(
    reported
      .filter((error) => error.table === 'Cards' && error.field === 'quizCorrectAnswer')
      .map((error) => `${error.row}:${error.message}`)
  );
  const errors: ValidationError[] = [];

  for (const card of cards) {
    if (!isNonEmpty(card.quizQuestion)) continue;

    const message = emptyAnswerTargetMessage(card);
    if (message === null || seen.has(`${card.row}:${message}`)) continue;

    errors.push({ table: 'Cards', row: card.row, field: 'quizCorrectAnswer', message, kind: 'quiz' });
  }

  return errors;
}

/**
 * Run every cross-table check
 *
 * @param tables - Parsed tables
 * @param previous - Errors from earlier phases (used to avoid repeats)
 */
export function checkCrossTable(
  tables: ContentTables,
  rules: ContentRules,
  previous: readonly ValidationError[] = []
): CrossTableResult {
  return {
    errors: [
      ...findOrphanSubLocations(tables),
      ...findDuplicateContent(tables.cards, rules),
      ...findCardQualityIssues(tables.cards),
      ...findEmptyAnswerTargets(tables.cards, previous),
    ],
    sitesWithoutSubLocations: findSitesWithoutSubLocations(tables),
  };
}
