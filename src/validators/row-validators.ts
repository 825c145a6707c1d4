/**
 * Row Validators
 *
 * Per-table rule sets. Each validator walks its table in source order and
 * runs every independent check for a row, in a fixed order:
 *
 *   1. required fields
 *   2. duplicate id
 *   3. enum / range / script checks
 *   4. foreign keys
 *   5. length bounds (maxima, then quality minima)
 *   6. quiz structure (cards only)
 *
 * Nothing short-circuits: a row with five problems yields five errors.
 * Foreign keys are checked against the id set of an already validated
 * parent table, so tables must be validated parent first.
 */

import type { ContentRules } from '../core/config.js';
import type {
  CardRecord,
  ContentTables,
  NumericCell,
  PhraseRecord,
  SiteRecord,
  SubLocationRecord,
  TableName,
  TipRecord,
  ValidationError,
  ValidationErrorKind,
} from '../core/types.js';
import {
  checkCoordinate,
  checkLength,
  containsScriptCharacters,
  isEnumMember,
  isInteger,
  isNonEmpty,
  looksLikeUrlOrImageRef,
} from './field-validators.js';

// ============================================================================
// Types
// ============================================================================

export interface TableValidation {
  readonly errors: readonly ValidationError[];
  /** Every non-empty id seen in the table */
  readonly ids: ReadonlySet<string>;
}

export interface RowValidationResult {
  readonly errors: readonly ValidationError[];
  readonly siteIds: ReadonlySet<string>;
  readonly subLocationIds: ReadonlySet<string>;
  readonly cardIds: ReadonlySet<string>;
}

// ============================================================================
// Error Collector
// ============================================================================

/**
 * Accumulates errors and ids for one table
 */
class TableCollector {
  readonly errors: ValidationError[] = [];
  private readonly firstRowById = new Map<string, number>();

  constructor(private readonly table: TableName) {}

  add(row: number, field: string, kind: ValidationErrorKind, message: string): void {
    this.errors.push({ table: this.table, row, field, message, kind });
  }

  requireFields(row: number, fields: Readonly<Record<string, string>>): void {
    for (const [field, value] of Object.entries(fields)) {
      if (!isNonEmpty(value)) {
        this.add(row, field, 'missing', `Missing required field '${field}'`);
      }
    }
  }

  /**
   * Record an id; reports every repeat against the first occurrence
   */
  trackId(row: number, id: string): void {
    if (!isNonEmpty(id)) return;

    const firstRow = this.firstRowById.get(id);
    if (firstRow !== undefined) {
      this.add(row, 'id', 'duplicate-id', `Duplicate id '${id}' (first used at row ${firstRow})`);
      return;
    }
    this.firstRowById.set(id, row);
  }

  checkEnum(row: number, field: string, value: string, allowed: ReadonlySet<string>): void {
    if (!isNonEmpty(value) || isEnumMember(value, allowed)) return;
    this.add(
      row,
      field,
      'enum',
      `Invalid ${field} '${value}'. Must be one of: ${[...allowed].join(', ')}`
    );
  }

  checkInteger(row: number, field: string, cell: NumericCell): void {
    if (cell.text === '' || isInteger(cell.value)) return;
    this.add(row, field, 'format', `${field} '${cell.text}' must be an integer`);
  }

  checkScript(row: number, field: string, value: string, rules: ContentRules): void {
    if (!isNonEmpty(value) || containsScriptCharacters(value, rules.arabicRanges)) return;
    this.add(row, field, 'script', `${field} '${value}' must contain Arabic characters`);
  }

  checkForeignKey(
    row: number,
    field: string,
    value: string,
    parentTable: TableName,
    parentIds: ReadonlySet<string>
  ): void {
    if (!isNonEmpty(value) || parentIds.has(value)) return;
    this.add(row, field, 'foreign-key', `${field} '${value}' does not match any ${parentTable} id`);
  }

  checkLength(
    row: number,
    field: string,
    value: string,
    bounds: { readonly min?: number; readonly max?: number }
  ): void {
    if (!isNonEmpty(value)) return;

    const result = checkLength(value, bounds);
    if (result.valid) return;

    const adjective = result.reason === 'too-long' ? 'too long' : 'too short';
    const relation = result.reason === 'too-long' ? 'max' : 'min';
    this.add(
      row,
      field,
      'length',
      `${field} is ${adjective} (${result.length} characters, ${relation} ${result.limit})`
    );
  }

  get ids(): ReadonlySet<string> {
    return new Set(this.firstRowById.keys());
  }
}

// ============================================================================
// Sites
// ============================================================================

export function validateSites(
  sites: readonly SiteRecord[],
  rules: ContentRules
): TableValidation {
  const collector = new TableCollector('Sites');

  for (const site of sites) {
    const { row } = site;

    collector.requireFields(row, {
      id: site.id,
      name: site.name,
      arabicName: site.arabicName,
      era: site.era,
      tourismType: site.tourismType,
      placeType: site.placeType,
      city: site.city,
      shortDescription: site.shortDescription,
      latitude: site.latitude.text,
      longitude: site.longitude.text,
    });

    collector.trackId(row, site.id);

    collector.checkEnum(row, 'era', site.era, rules.eras);
    collector.checkEnum(row, 'tourismType', site.tourismType, rules.tourismTypes);
    collector.checkEnum(row, 'placeType', site.placeType, rules.placeTypes);
    collector.checkEnum(row, 'city', site.city, rules.cities);

    if (site.latitude.text !== '' && site.longitude.text !== '') {
      const coordinate = checkCoordinate(site.latitude.value, site.longitude.value, rules.bounds);
      if (!coordinate.valid) {
        switch (coordinate.reason) {
          case 'not-a-number': {
            const cell = coordinate.field === 'latitude' ? site.latitude : site.longitude;
            collector.add(row, coordinate.field, 'format', `${coordinate.field} '${cell.text}' is not a number`);
            break;
          }
          case 'out-of-range': {
            const limit = coordinate.field === 'latitude' ? 90 : 180;
            const cell = coordinate.field === 'latitude' ? site.latitude : site.longitude;
            collector.add(
              row,
              coordinate.field,
              'format',
              `${coordinate.field} ${cell.text} is out of range [-${limit}, ${limit}]`
            );
            break;
          }
          case 'outside-bounds':
            collector.add(
              row,
              'coordinates',
              'bounds',
              `Coordinates (${site.latitude.text}, ${site.longitude.text}) are outside ${rules.boundsLabel}`
            );
            break;
        }
      }
    }

    collector.checkScript(row, 'arabicName', site.arabicName, rules);

    collector.checkLength(row, 'shortDescription', site.shortDescription, {
      max: rules.lengths.shortDescriptionMax,
    });
    collector.checkLength(row, 'shortDescription', site.shortDescription, {
      min: rules.lengths.shortDescriptionMin,
    });
  }

  return { errors: collector.errors, ids: collector.ids };
}

// ============================================================================
// Sub-locations
// ============================================================================

export function validateSubLocations(
  subLocations: readonly SubLocationRecord[],
  siteIds: ReadonlySet<string>,
  rules: ContentRules
): TableValidation {
  const collector = new TableCollector('SubLocations');

  for (const subLocation of subLocations) {
    const { row } = subLocation;

    collector.requireFields(row, {
      id: subLocation.id,
      siteId: subLocation.siteId,
      name: subLocation.name,
      arabicName: subLocation.arabicName,
    });

    collector.trackId(row, subLocation.id);

    collector.checkScript(row, 'arabicName', subLocation.arabicName, rules);
    collector.checkInteger(row, 'order', subLocation.order);

    collector.checkForeignKey(row, 'siteId', subLocation.siteId, 'Sites', siteIds);

    collector.checkLength(row, 'shortDescription', subLocation.shortDescription, {
      max: rules.lengths.shortDescriptionMax,
    });
  }

  return { errors: collector.errors, ids: collector.ids };
}

// ============================================================================
// Cards
// ============================================================================

function checkQuiz(collector: TableCollector, card: CardRecord, rules: ContentRules): void {
  const { row } = card;

  card.quizOptions.forEach((option, index) => {
    if (!isNonEmpty(option)) {
      collector.add(
        row,
        `quizOption${index + 1}`,
        'quiz',
        `quizOption${index + 1} is required when quizQuestion is set`
      );
    }
  });

  const answer = card.quizCorrectAnswer;
  let answerIndex: number | null = null;

  if (answer.text === '') {
    collector.add(row, 'quizCorrectAnswer', 'quiz', 'quizCorrectAnswer is required when quizQuestion is set');
  } else if (!isInteger(answer.value)) {
    collector.add(row, 'quizCorrectAnswer', 'quiz', `quizCorrectAnswer '${answer.text}' must be an integer`);
  } else if (answer.value < 1 || answer.value > rules.quizOptionCount) {
    collector.add(
      row,
      'quizCorrectAnswer',
      'quiz',
      `quizCorrectAnswer ${answer.value} must be between 1 and ${rules.quizOptionCount}`
    );
  } else {
    answerIndex = answer.value;
  }

  if (!isNonEmpty(card.quizExplanation)) {
    collector.add(row, 'quizExplanation', 'quiz', 'quizExplanation is required when quizQuestion is set');
  }

  if (answerIndex !== null) {
    const message = emptyAnswerTargetMessage(card);
    if (message !== null) {
      collector.add(row, 'quizCorrectAnswer', 'quiz', message);
    }
  }
}

/**
 * Message for a correct-answer index that points at a blank option, or
 * null when the target option has text (or the index is unusable)
 */
export function emptyAnswerTargetMessage(card: CardRecord): string | null {
  const value = card.quizCorrectAnswer.value;
  if (!isInteger(value)) return null;

  const option = card.quizOptions[value - 1];
  if (option === undefined || isNonEmpty(option)) return null;

  return `quizCorrectAnswer ${value} points to an empty option`;
}

/**
 * Report the second and later cards that reuse an order value within the
 * same sub-location
 */
function checkOrderUniqueness(collector: TableCollector, cards: readonly CardRecord[]): void {
  const firstRowByKey = new Map<string, Map<number, number>>();

  for (const card of cards) {
    const order = card.order.value;
    if (!isNonEmpty(card.subLocationId) || !isInteger(order)) continue;

    let orders = firstRowByKey.get(card.subLocationId);
    if (orders === undefined) {
      orders = new Map();
      firstRowByKey.set(card.subLocationId, orders);
    }

    const firstRow = orders.get(order);
    if (firstRow !== undefined) {
      collector.add(
        card.row,
        'order',
        'order',
        `order ${order} is already used by row ${firstRow} in sub-location '${card.subLocationId}'`
      );
    } else {
      orders.set(order, card.row);
    }
  }
}

export function validateCards(
  cards: readonly CardRecord[],
  subLocationIds: ReadonlySet<string>,
  rules: ContentRules
): TableValidation {
  const collector = new TableCollector('Cards');

  for (const card of cards) {
    const { row } = card;

    collector.requireFields(row, {
      id: card.id,
      subLocationId: card.subLocationId,
      order: card.order.text,
      type: card.type,
    });

    collector.trackId(row, card.id);

    collector.checkEnum(row, 'type', card.type, rules.cardTypes);
    collector.checkInteger(row, 'order', card.order);
    if (!looksLikeUrlOrImageRef(card.imageUrl, rules.imageExtensions)) {
      collector.add(row, 'imageUrl', 'format', `imageUrl '${card.imageUrl}' is not a URL or image file name`);
    }

    collector.checkForeignKey(row, 'subLocationId', card.subLocationId, 'SubLocations', subLocationIds);

    collector.checkLength(row, 'content', card.content, { max: rules.lengths.cardContentMax });
    collector.checkLength(row, 'content', card.content, { min: rules.lengths.cardContentMin });

    if (isNonEmpty(card.quizQuestion)) {
      checkQuiz(collector, card, rules);
    }
  }

  checkOrderUniqueness(collector, cards);

  return { errors: collector.errors, ids: collector.ids };
}

// ============================================================================
// Tips & Phrases
// ============================================================================

export function validateTips(
  tips: readonly TipRecord[],
  siteIds: ReadonlySet<string>,
  rules: ContentRules
): TableValidation {
  const collector = new TableCollector('Tips');

  for (const tip of tips) {
    const { row } = tip;

    collector.requireFields(row, { id: tip.id, siteId: tip.siteId, tip: tip.tip });
    collector.trackId(row, tip.id);
    collector.checkInteger(row, 'order', tip.order);
    collector.checkForeignKey(row, 'siteId', tip.siteId, 'Sites', siteIds);
    collector.checkLength(row, 'tip', tip.tip, { max: rules.lengths.tipMax });
    collector.checkLength(row, 'tip', tip.tip, { min: rules.lengths.tipMin });
  }

  return { errors: collector.errors, ids: collector.ids };
}

export function validatePhrases(
  phrases: readonly PhraseRecord[],
  siteIds: ReadonlySet<string>,
  rules: ContentRules
): TableValidation {
  const collector = new TableCollector('ArabicPhrases');

  for (const phrase of phrases) {
    const { row } = phrase;

    collector.requireFields(row, {
      id: phrase.id,
      siteId: phrase.siteId,
      english: phrase.english,
      arabic: phrase.arabic,
      pronunciation: phrase.pronunciation,
    });
    collector.trackId(row, phrase.id);
    collector.checkScript(row, 'arabic', phrase.arabic, rules);
    collector.checkForeignKey(row, 'siteId', phrase.siteId, 'Sites', siteIds);
  }

  return { errors: collector.errors, ids: collector.ids };
}

// ============================================================================
// All Tables
// ============================================================================

/**
 * Validate all tables, parents before children
 */
export function validateRows(tables: ContentTables, rules: ContentRules): RowValidationResult {
  const sites = validateSites(tables.sites, rules);
  const subLocations = validateSubLocations(tables.subLocations, sites.ids, rules);
  const cards = validateCards(tables.cards, subLocations.ids, rules);
  const tips = validateTips(tables.tips, sites.ids, rules);
  const phrases = validatePhrases(tables.phrases, sites.ids, rules);

  return {
    errors: [
      ...sites.errors,
      ...subLocations.errors,
      ...cards.errors,
      ...tips.errors,
      ...phrases.errors,
    ],
    siteIds: sites.ids,
    subLocationIds: subLocations.ids,
    cardIds: cards.ids,
  };
}
