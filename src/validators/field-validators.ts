/**
 * Field Validators
 *
 * Atomic, side-effect-free checks used by the row validators. Simple
 * predicates return booleans; checks with more than one failure mode
 * return a tagged result.
 */

import type { BoundingBox, CodePointRange } from '../core/config.js';

export function isNonEmpty(text: string | null | undefined): text is string {
  return typeof text === 'string' && text.trim().length > 0;
}

export function isInRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

export function isEnumMember(value: string, allowed: ReadonlySet<string>): boolean {
  return allowed.has(value);
}

/**
 * True if any code point of `text` falls inside one of the ranges
 */
export function containsScriptCharacters(
  text: string,
  ranges: readonly CodePointRange[]
): boolean {
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) continue;
    if (ranges.some((range) => codePoint >= range.start && codePoint <= range.end)) {
      return true;
    }
  }
  return false;
}

/**
 * Blank, an http(s) URL, or a name ending in a known image extension
 */
export function looksLikeUrlOrImageRef(
  text: string,
  imageExtensions: readonly string[]
): boolean {
  if (text === '') return true;
  if (text.startsWith('http://') || text.startsWith('https://')) return true;

  const lower = text.toLowerCase();
  return imageExtensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

export function isInteger(value: number | null): value is number {
  return value !== null && Number.isInteger(value);
}

// ============================================================================
// Tagged Checks
// ============================================================================

export type LengthCheck =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: 'too-long' | 'too-short'; readonly limit: number; readonly length: number };

/**
 * Check text length against optional bounds. Length counts code points.
 */
export function checkLength(
  text: string,
  bounds: { readonly min?: number; readonly max?: number }
): LengthCheck {
  const length = [...text].length;

  if (bounds.max !== undefined && length > bounds.max) {
    return { valid: false, reason: 'too-long', limit: bounds.max, length };
  }
  if (bounds.min !== undefined && length < bounds.min) {
    return { valid: false, reason: 'too-short', limit: bounds.min, length };
  }
  return { valid: true };
}

export type CoordinateCheck =
  | { readonly valid: true }
  | {
      readonly valid: false;
      readonly reason: 'not-a-number' | 'out-of-range' | 'outside-bounds';
      readonly field: 'latitude' | 'longitude' | 'coordinates';
    };

/**
 * Check a coordinate pair: numeric, within WGS84 ranges, then inside the
 * expected bounding box
 */
export function checkCoordinate(
  latitude: number | null,
  longitude: number | null,
  bounds: BoundingBox
): CoordinateCheck {
  if (latitude === null) {
    return { valid: false, reason: 'not-a-number', field: 'latitude' };
  }
  if (longitude === null) {
    return { valid: false, reason: 'not-a-number', field: 'longitude' };
  }
  if (!isInRange(latitude, -90, 90)) {
    return { valid: false, reason: 'out-of-range', field: 'latitude' };
  }
  if (!isInRange(longitude, -180, 180)) {
    return { valid: false, reason: 'out-of-range', field: 'longitude' };
  }
  if (
    !isInRange(latitude, bounds.minLatitude, bounds.maxLatitude) ||
    !isInRange(longitude, bounds.minLongitude, bounds.maxLongitude)
  ) {
    return { valid: false, reason: 'outside-bounds', field: 'coordinates' };
  }
  return { valid: true };
}
