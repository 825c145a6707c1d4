/**
 * Row Validator Tests
 *
 * Tables are built from raw fixtures through parseTables so row numbers
 * match what a source would report.
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_CONTENT_RULES as rules } from '../../../core/config.js';
import type { RawTables } from '../../../core/types.js';
import { parseTables } from '../../../schemas/rows.js';
import {
  validateCards,
  validatePhrases,
  validateRows,
  validateSites,
  validateSubLocations,
  validateTips,
} from '../../../validators/row-validators.js';
import {
  phraseRow,
  quizCardRow,
  siteRow,
  storyCardRow,
  subLocationRow,
  tipRow,
  validRawTables,
} from '../../fixtures/content.js';

const parse = (raw: RawTables) => parseTables(raw).tables;

describe('validateRows', () => {
  it('accepts the valid dataset', () => {
    const result = validateRows(parse(validRawTables()), rules);

    expect(result.errors).toEqual([]);
    expect([...result.siteIds]).toEqual(['giza']);
    expect([...result.subLocationIds]).toEqual(['great_pyramid']);
    expect([...result.cardIds]).toEqual(['c1', 'c2']);
  });

  it('orders errors by table: sites, sub-locations, cards, tips, phrases', () => {
    const result = validateRows(
      parse(
        validRawTables({
          Sites: [siteRow({ era: 'Bronze Age' })],
          ArabicPhrases: [phraseRow({ arabic: 'shukran' })],
          Tips: [tipRow({ tip: 'Hat.' })],
        })
      ),
      rules
    );

    expect(result.errors.map((e) => e.table)).toEqual(['Sites', 'Tips', 'ArabicPhrases']);
  });
});

describe('validateSites', () => {
  it('reports a repeated id once, at the second row', () => {
    const { errors } = validateSites(parse({ Sites: [siteRow(), siteRow()] }).sites, rules);

    expect(errors).toEqual([
      {
        table: 'Sites',
        row: 3,
        field: 'id',
        message: "Duplicate id 'giza' (first used at row 2)",
        kind: 'duplicate-id',
      },
    ]);
  });

  it('reports a point outside Egypt', () => {
    const { errors } = validateSites(
      parse({ Sites: [siteRow({ latitude: '51.5', longitude: '-0.12' })] }).sites,
      rules
    );

    expect(errors).toEqual([
      {
        table: 'Sites',
        row: 2,
        field: 'coordinates',
        message: 'Coordinates (51.5, -0.12) are outside Egypt',
        kind: 'bounds',
      },
    ]);
  });

  it('reports non-numeric and out-of-range coordinates as format errors', () => {
    const notNumber = validateSites(parse({ Sites: [siteRow({ latitude: 'north' })] }).sites, rules);
    expect(notNumber.errors).toEqual([
      {
        table: 'Sites',
        row: 2,
        field: 'latitude',
        message: "latitude 'north' is not a number",
        kind: 'format',
      },
    ]);

    const outOfRange = validateSites(parse({ Sites: [siteRow({ longitude: '200' })] }).sites, rules);
    expect(outOfRange.errors).toEqual([
      {
        table: 'Sites',
        row: 2,
        field: 'longitude',
        message: 'longitude 200 is out of range [-180, 180]',
        kind: 'format',
      },
    ]);
  });

  it('reports blank coordinates as missing only', () => {
    const { errors } = validateSites(parse({ Sites: [siteRow({ latitude: '' })] }).sites, rules);

    expect(errors).toEqual([
      {
        table: 'Sites',
        row: 2,
        field: 'latitude',
        message: "Missing required field 'latitude'",
        kind: 'missing',
      },
    ]);
  });

  it('lists the allowed values for an unknown era', () => {
    const { errors } = validateSites(parse({ Sites: [siteRow({ era: 'Bronze Age' })] }).sites, rules);

    expect(errors).toHaveLength(1);
    expect(errors[0]?.message).toBe(
      "Invalid era 'Bronze Age'. Must be one of: Pre-Dynastic, Old Kingdom, Middle Kingdom, New Kingdom, Late Period, Ptolemaic, Roman, Islamic, Modern"
    );
    expect(errors[0]?.kind).toBe('enum');
  });

  it('requires Arabic script in arabicName', () => {
    const { errors } = validateSites(
      parse({ Sites: [siteRow({ arabicName: 'Giza Pyramids' })] }).sites,
      rules
    );

    expect(errors).toEqual([
      {
        table: 'Sites',
        row: 2,
        field: 'arabicName',
        message: "arabicName 'Giza Pyramids' must contain Arabic characters",
        kind: 'script',
      },
    ]);
  });

  it('applies short description bounds', () => {
    const short = validateSites(
      parse({ Sites: [siteRow({ shortDescription: 'Too short' })] }).sites,
      rules
    );
    expect(short.errors.map((e) => e.message)).toEqual([
      'shortDescription is too short (9 characters, min 20)',
    ]);

    const long = validateSites(
      parse({ Sites: [siteRow({ shortDescription: 'x'.repeat(201) })] }).sites,
      rules
    );
    expect(long.errors.map((e) => e.message)).toEqual([
      'shortDescription is too long (201 characters, max 200)',
    ]);
  });

  it('does not stop at the first problem in a row', () => {
    const { errors } = validateSites(
      parse({ Sites: [siteRow({ name: '', city: 'Paris', arabicName: 'Giza' })] }).sites,
      rules
    );

    expect(errors.map((e) => [e.field, e.kind])).toEqual([
      ['name', 'missing'],
      ['city', 'enum'],
      ['arabicName', 'script'],
    ]);
  });
});

describe('validateSubLocations', () => {
  it('flags a siteId only when the parent id is absent', () => {
    const subLocations = parse({ SubLocations: [subLocationRow({ siteId: 'karnak' })] }).subLocations;

    expect(validateSubLocations(subLocations, new Set(['giza']), rules).errors).toEqual([
      {
        table: 'SubLocations',
        row: 2,
        field: 'siteId',
        message: "siteId 'karnak' does not match any Sites id",
        kind: 'foreign-key',
      },
    ]);
    expect(validateSubLocations(subLocations, new Set(['giza', 'karnak']), rules).errors).toEqual([]);
  });

  it('requires a whole-number order when one is given', () => {
    const { errors } = validateSubLocations(
      parse({ SubLocations: [subLocationRow({ order: '1.5' })] }).subLocations,
      new Set(['giza']),
      rules
    );

    expect(errors.map((e) => e.message)).toEqual(["order '1.5' must be an integer"]);
  });
});

describe('validateCards', () => {
  const subLocationIds = new Set(['great_pyramid']);
  const cards = (...rows: Record<string, string>[]) => parse({ Cards: rows }).cards;

  it('rejects unknown card types and image references', () => {
    const { errors } = validateCards(
      cards(storyCardRow({ type: 'video', imageUrl: 'intro photo' })),
      subLocationIds,
      rules
    );

    expect(errors.map((e) => e.message)).toEqual([
      "Invalid type 'video'. Must be one of: intro, story, fact, quiz, image",
      "imageUrl 'intro photo' is not a URL or image file name",
    ]);
  });

  it('reports the out-of-range answer', () => {
    const { errors } = validateCards(cards(quizCardRow({ quizCorrectAnswer: '5' })), subLocationIds, rules);

    expect(errors).toEqual([
      {
        table: 'Cards',
        row: 2,
        field: 'quizCorrectAnswer',
        message: 'quizCorrectAnswer 5 must be between 1 and 4',
        kind: 'quiz',
      },
    ]);
  });

  it('reports a non-integer answer', () => {
    const { errors } = validateCards(cards(quizCardRow({ quizCorrectAnswer: 'two' })), subLocationIds, rules);

    expect(errors.map((e) => e.message)).toEqual(["quizCorrectAnswer 'two' must be an integer"]);
  });

  it('reports a blank option and an answer pointing at it', () => {
    const { errors } = validateCards(
      cards(quizCardRow({ quizOption3: '', quizCorrectAnswer: '3' })),
      subLocationIds,
      rules
    );

    expect(errors.map((e) => [e.field, e.message])).toEqual([
      ['quizOption3', 'quizOption3 is required when quizQuestion is set'],
      ['quizCorrectAnswer', 'quizCorrectAnswer 3 points to an empty option'],
    ]);
  });

  it('requires an answer and explanation once a question is set', () => {
    const { errors } = validateCards(
      cards(quizCardRow({ quizCorrectAnswer: '', quizExplanation: '' })),
      subLocationIds,
      rules
    );

    expect(errors.map((e) => e.message)).toEqual([
      'quizCorrectAnswer is required when quizQuestion is set',
      'quizExplanation is required when quizQuestion is set',
    ]);
  });

  it('skips quiz checks for cards without a question', () => {
    const { errors } = validateCards(cards(storyCardRow()), subLocationIds, rules);

    expect(errors).toEqual([]);
  });

  it('reports a repeated order within a sub-location', () => {
    const { errors } = validateCards(
      cards(storyCardRow(), quizCardRow({ order: '1' })),
      subLocationIds,
      rules
    );

    expect(errors).toEqual([
      {
        table: 'Cards',
        row: 3,
        field: 'order',
        message: "order 1 is already used by row 2 in sub-location 'great_pyramid'",
        kind: 'order',
      },
    ]);
  });

  it('allows the same order in different sub-locations', () => {
    const { errors } = validateCards(
      cards(storyCardRow(), quizCardRow({ order: '1', subLocationId: 'sphinx' })),
      new Set(['great_pyramid', 'sphinx']),
      rules
    );

    expect(errors).toEqual([]);
  });

  it('flags a subLocationId only when the parent id is absent', () => {
    const { errors } = validateCards(
      cards(storyCardRow({ subLocationId: 'sphinx' })),
      subLocationIds,
      rules
    );

    expect(errors.map((e) => e.message)).toEqual([
      "subLocationId 'sphinx' does not match any SubLocations id",
    ]);
  });

  it('applies content bounds', () => {
    const { errors } = validateCards(
      cards(storyCardRow({ content: 'Too short.' })),
      subLocationIds,
      rules
    );

    expect(errors.map((e) => e.message)).toEqual(['content is too short (10 characters, min 20)']);
  });
});

describe('validateTips', () => {
  it('applies tip bounds and foreign keys', () => {
    const { errors } = validateTips(
      parse({ Tips: [tipRow({ tip: 'x'.repeat(151) }), tipRow({ id: 't2', siteId: 'karnak' })] }).tips,
      new Set(['giza']),
      rules
    );

    expect(errors.map((e) => [e.row, e.message])).toEqual([
      [2, 'tip is too long (151 characters, max 150)'],
      [3, "siteId 'karnak' does not match any Sites id"],
    ]);
  });
});

describe('validatePhrases', () => {
  it('requires every field and Arabic script', () => {
    const { errors } = validatePhrases(
      parse({ ArabicPhrases: [phraseRow({ pronunciation: '', arabic: 'shukran' })] }).phrases,
      new Set(['giza']),
      rules
    );

    expect(errors.map((e) => [e.field, e.kind])).toEqual([
      ['pronunciation', 'missing'],
      ['arabic', 'script'],
    ]);
  });
});
