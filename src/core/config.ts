/**
 * Content Rules Configuration
 *
 * Closed vocabularies, length limits, geographic bounds and script ranges
 * used by every validator. Rules are an immutable value passed into the
 * validators; nothing reads them from process-wide state.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Inclusive Unicode code point range
 */
export interface CodePointRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Inclusive latitude/longitude box
 */
export interface BoundingBox {
  readonly minLatitude: number;
  readonly maxLatitude: number;
  readonly minLongitude: number;
  readonly maxLongitude: number;
}

/**
 * Length limits for free-text fields (characters, after trimming)
 */
export interface LengthLimits {
  readonly shortDescriptionMax: number;
  readonly shortDescriptionMin: number;
  readonly cardContentMax: number;
  readonly cardContentMin: number;
  readonly tipMax: number;
  readonly tipMin: number;
}

/**
 * Duplicate-content detector settings
 */
export interface DuplicateContentRules {
  /** Only cards with content longer than this are compared */
  readonly minLength: number;
  /** Number of leading characters (lowercased) used as the key */
  readonly keyLength: number;
}

export interface ContentRules {
  readonly eras: ReadonlySet<string>;
  readonly tourismTypes: ReadonlySet<string>;
  readonly placeTypes: ReadonlySet<string>;
  readonly cities: ReadonlySet<string>;
  readonly cardTypes: ReadonlySet<string>;
  readonly bounds: BoundingBox;
  /** Human label for the bounding box, used in messages */
  readonly boundsLabel: string;
  readonly arabicRanges: readonly CodePointRange[];
  readonly imageExtensions: readonly string[];
  readonly lengths: LengthLimits;
  readonly duplicateContent: DuplicateContentRules;
  readonly quizOptionCount: number;
}

/**
 * Overrides accepted by createContentRules. Vocabularies are given as
 * plain arrays.
 */
export interface ContentRulesOverrides {
  readonly eras?: readonly string[];
  readonly tourismTypes?: readonly string[];
  readonly placeTypes?: readonly string[];
  readonly cities?: readonly string[];
  readonly cardTypes?: readonly string[];
  readonly bounds?: Partial<BoundingBox>;
  readonly boundsLabel?: string;
  readonly arabicRanges?: readonly CodePointRange[];
  readonly imageExtensions?: readonly string[];
  readonly lengths?: Partial<LengthLimits>;
  readonly duplicateContent?: Partial<DuplicateContentRules>;
}

// ============================================================================
// Defaults
// ============================================================================

export const ERAS = [
  'Pre-Dynastic',
  'Old Kingdom',
  'Middle Kingdom',
  'New Kingdom',
  'Late Period',
  'Ptolemaic',
  'Roman',
  'Islamic',
  'Modern',
] as const;

export const TOURISM_TYPES = ['Pharaonic', 'Greco-Roman', 'Coptic', 'Islamic', 'Modern'] as const;

export const PLACE_TYPES = [
  'Pyramid',
  'Temple',
  'Tomb',
  'Museum',
  'Mosque',
  'Church',
  'Fortress',
  'Market',
  'Monument',
  'Ruins',
] as const;

export const CITIES = [
  'Cairo',
  'Giza',
  'Luxor',
  'Aswan',
  'Alexandria',
  'Sinai',
  'Fayoum',
  'Dahab',
  'Hurghada',
  'Sharm El Sheikh',
] as const;

export const CARD_TYPES = ['intro', 'story', 'fact', 'quiz', 'image'] as const;

/**
 * Egypt, mainland plus Sinai
 */
export const EGYPT_BOUNDS: BoundingBox = {
  minLatitude: 22.0,
  maxLatitude: 31.7,
  minLongitude: 24.7,
  maxLongitude: 36.9,
};

/**
 * Arabic, Arabic Supplement, Arabic Extended-A, Presentation Forms-A/B
 */
export const ARABIC_RANGES: readonly CodePointRange[] = [
  { start: 0x0600, end: 0x06ff },
  { start: 0x0750, end: 0x077f },
  { start: 0x08a0, end: 0x08ff },
  { start: 0xfb50, end: 0xfdff },
  { start: 0xfe70, end: 0xfeff },
];

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif', '.heic'] as const;

export const DEFAULT_LENGTH_LIMITS: LengthLimits = {
  shortDescriptionMax: 200,
  shortDescriptionMin: 20,
  cardContentMax: 500,
  cardContentMin: 20,
  tipMax: 150,
  tipMin: 10,
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Build an immutable rules value from defaults plus overrides
 *
 * @param overrides - Partial replacements; nested objects merge shallowly
 */
export function createContentRules(overrides: ContentRulesOverrides = {}): ContentRules {
  return Object.freeze({
    eras: new Set(overrides.eras ?? ERAS),
    tourismTypes: new Set(overrides.tourismTypes ?? TOURISM_TYPES),
    placeTypes: new Set(overrides.placeTypes ?? PLACE_TYPES),
    cities: new Set(overrides.cities ?? CITIES),
    cardTypes: new Set(overrides.cardTypes ?? CARD_TYPES),
    bounds: Object.freeze({ ...EGYPT_BOUNDS, ...overrides.bounds }),
    boundsLabel: overrides.boundsLabel ?? 'Egypt',
    arabicRanges: Object.freeze([...(overrides.arabicRanges ?? ARABIC_RANGES)]),
    imageExtensions: Object.freeze([...(overrides.imageExtensions ?? IMAGE_EXTENSIONS)]),
    lengths: Object.freeze({ ...DEFAULT_LENGTH_LIMITS, ...overrides.lengths }),
    duplicateContent: Object.freeze({
      minLength: 50,
      keyLength: 100,
      ...overrides.duplicateContent,
    }),
    quizOptionCount: 4,
  });
}

export const DEFAULT_CONTENT_RULES: ContentRules = createContentRules();
