/**
 * Denormalizer
 *
 * Joins the five flat tables into the nested, site-centric document the
 * app decodes. DETERMINISTIC: same tables + same `now` → identical output.
 *
 * Validation is a precondition. Blank or malformed numbers that slip
 * through fall back to 0 (order, coordinates) or answer 1 rather than
 * failing the run.
 */

import type {
  ArabicPhrase,
  CardRecord,
  ContentDocument,
  ContentTables,
  QuizQuestion,
  Site,
  SiteRecord,
  StoryCard,
  SubLocation,
} from '../core/types.js';

export const DOCUMENT_VERSION = '1.0';

const DEFAULT_CARD_TYPE = 'story';

export interface DenormalizeOptions {
  /** Timestamp source for `lastUpdated` */
  readonly now?: () => Date;
}

/**
 * Append to a keyed list, creating it on first use
 */
function pushTo<T>(map: Map<string, T[]>, key: string, value: T): void {
  const list = map.get(key);
  if (list === undefined) {
    map.set(key, [value]);
  } else {
    list.push(value);
  }
}

function orNull(value: string): string | null {
  return value === '' ? null : value;
}

/**
 * Split a comma-separated list, trimming entries and dropping blanks
 */
export function parseImageNames(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function toQuiz(card: CardRecord): QuizQuestion | null {
  if (card.quizQuestion === '') return null;

  return {
    id: `q_${card.id}`,
    question: card.quizQuestion,
    options: [...card.quizOptions],
    // source is 1-based
    correctAnswerIndex: (card.quizCorrectAnswer.value ?? 1) - 1,
    explanation: card.quizExplanation,
    funFact: null,
  };
}

function toStoryCard(card: CardRecord): StoryCard {
  return {
    id: card.id,
    type: card.type === '' ? DEFAULT_CARD_TYPE : card.type,
    imageName: orNull(card.imageUrl),
    content: orNull(card.content),
    funFact: orNull(card.funFact),
    quizQuestion: toQuiz(card),
  };
}

/**
 * Cards grouped by sub-location, each group stably sorted by order
 */
export function groupCards(cards: readonly CardRecord[]): Map<string, StoryCard[]> {
  const grouped = new Map<string, CardRecord[]>();
  for (const card of cards) {
    pushTo(grouped, card.subLocationId, card);
  }

  const result = new Map<string, StoryCard[]>();
  for (const [subLocationId, group] of grouped) {
    // Array.prototype.sort is stable: equal orders keep source order
    const sorted = [...group].sort((a, b) => (a.order.value ?? 0) - (b.order.value ?? 0));
    result.set(subLocationId, sorted.map(toStoryCard));
  }
  return result;
}

function toSite(
  site: SiteRecord,
  subLocationsBySite: ReadonlyMap<string, SubLocation[]>,
  tipsBySite: ReadonlyMap<string, string[]>,
  phrasesBySite: ReadonlyMap<string, ArabicPhrase[]>
): Site {
  return {
    id: site.id,
    name: site.name,
    arabicName: site.arabicName,
    era: site.era,
    tourismType: site.tourismType,
    placeType: site.placeType,
    city: site.city,
    shortDescription: site.shortDescription,
    coordinates: {
      latitude: site.latitude.value ?? 0,
      longitude: site.longitude.value ?? 0,
    },
    imageNames: parseImageNames(site.imageNames),
    subLocations: subLocationsBySite.get(site.id) ?? [],
    visitInfo: {
      estimatedDuration: site.estimatedDuration,
      bestTimeToVisit: site.bestTimeToVisit,
      tips: tipsBySite.get(site.id) ?? [],
      arabicPhrases: phrasesBySite.get(site.id) ?? [],
    },
    isUnlocked: true,
  };
}

/**
 * Build the nested content document
 */
export function denormalize(
  tables: ContentTables,
  options: DenormalizeOptions = {}
): ContentDocument {
  // tips and phrases keep source order
  const tipsBySite = new Map<string, string[]>();
  for (const tip of tables.tips) {
    pushTo(tipsBySite, tip.siteId, tip.tip);
  }

  const phrasesBySite = new Map<string, ArabicPhrase[]>();
  for (const phrase of tables.phrases) {
    pushTo(phrasesBySite, phrase.siteId, {
      english: phrase.english,
      arabic: phrase.arabic,
      pronunciation: phrase.pronunciation,
    });
  }

  const cardsBySubLocation = groupCards(tables.cards);

  const subLocationsBySite = new Map<string, SubLocation[]>();
  for (const subLocation of tables.subLocations) {
    pushTo(subLocationsBySite, subLocation.siteId, {
      id: subLocation.id,
      name: subLocation.name,
      arabicName: subLocation.arabicName,
      shortDescription: subLocation.shortDescription,
      imageName: orNull(subLocation.imageName),
      storyCards: cardsBySubLocation.get(subLocation.id) ?? [],
    });
  }

  const now = options.now ?? (() => new Date());

  return {
    version: DOCUMENT_VERSION,
    lastUpdated: now().toISOString(),
    sites: tables.sites.map((site) =>
      toSite(site, subLocationsBySite, tipsBySite, phrasesBySite)
    ),
  };
}
