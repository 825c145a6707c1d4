/**
 * Field Validator Tests
 */

import { describe, it, expect } from 'vitest';

import { ARABIC_RANGES, EGYPT_BOUNDS, IMAGE_EXTENSIONS } from '../../../core/config.js';
import {
  checkCoordinate,
  checkLength,
  containsScriptCharacters,
  isEnumMember,
  isInRange,
  isInteger,
  isNonEmpty,
  looksLikeUrlOrImageRef,
} from '../../../validators/field-validators.js';

describe('isNonEmpty', () => {
  it('rejects blank and whitespace-only values', () => {
    expect(isNonEmpty('')).toBe(false);
    expect(isNonEmpty('   ')).toBe(false);
    expect(isNonEmpty(null)).toBe(false);
    expect(isNonEmpty(undefined)).toBe(false);
  });

  it('accepts text', () => {
    expect(isNonEmpty(' giza ')).toBe(true);
  });
});

describe('isInRange / isEnumMember / isInteger', () => {
  it('treats range bounds as inclusive', () => {
    expect(isInRange(-90, -90, 90)).toBe(true);
    expect(isInRange(90.0001, -90, 90)).toBe(false);
    expect(isInRange(Number.NaN, -90, 90)).toBe(false);
  });

  it('matches enum members exactly', () => {
    const allowed = new Set(['Cairo', 'Giza']);
    expect(isEnumMember('Giza', allowed)).toBe(true);
    expect(isEnumMember('giza', allowed)).toBe(false);
  });

  it('accepts whole numbers only', () => {
    expect(isInteger(3)).toBe(true);
    expect(isInteger(2.5)).toBe(false);
    expect(isInteger(null)).toBe(false);
  });
});

describe('containsScriptCharacters', () => {
  it('detects Arabic letters', () => {
    expect(containsScriptCharacters('الجيزة', ARABIC_RANGES)).toBe(true);
    expect(containsScriptCharacters('Giza الجيزة', ARABIC_RANGES)).toBe(true);
  });

  it('rejects Latin-only text', () => {
    expect(containsScriptCharacters('Giza', ARABIC_RANGES)).toBe(false);
  });

  it('detects presentation forms', () => {
    expect(containsScriptCharacters('\uFEFB', ARABIC_RANGES)).toBe(true);
  });
});

describe('looksLikeUrlOrImageRef', () => {
  it('accepts blank values, URLs and image file names', () => {
    expect(looksLikeUrlOrImageRef('', IMAGE_EXTENSIONS)).toBe(true);
    expect(looksLikeUrlOrImageRef('https://images.test/giza.jpg', IMAGE_EXTENSIONS)).toBe(true);
    expect(looksLikeUrlOrImageRef('http://images.test/giza', IMAGE_EXTENSIONS)).toBe(true);
    expect(looksLikeUrlOrImageRef('Giza_Intro.JPG', IMAGE_EXTENSIONS)).toBe(true);
    expect(looksLikeUrlOrImageRef('sphinx.heic', IMAGE_EXTENSIONS)).toBe(true);
  });

  it('rejects other text', () => {
    expect(looksLikeUrlOrImageRef('giza.bmp', IMAGE_EXTENSIONS)).toBe(false);
    expect(looksLikeUrlOrImageRef('giza photo', IMAGE_EXTENSIONS)).toBe(false);
  });
});

describe('checkLength', () => {
  it('reports the maximum before the minimum', () => {
    expect(checkLength('abcdef', { min: 10, max: 5 })).toEqual({
      valid: false,
      reason: 'too-long',
      limit: 5,
      length: 6,
    });
  });

  it('reports text below the minimum', () => {
    expect(checkLength('abc', { min: 5 })).toEqual({
      valid: false,
      reason: 'too-short',
      limit: 5,
      length: 3,
    });
  });

  it('counts code points, not UTF-16 units', () => {
    expect(checkLength('a😀', { max: 2 })).toEqual({ valid: true });
    expect(checkLength('شكرا', { min: 4, max: 4 })).toEqual({ valid: true });
  });
});

describe('checkCoordinate', () => {
  it('accepts a point inside the bounds', () => {
    expect(checkCoordinate(29.9792, 31.1342, EGYPT_BOUNDS)).toEqual({ valid: true });
  });

  it('reports a missing number for the failing axis', () => {
    expect(checkCoordinate(null, 31, EGYPT_BOUNDS)).toEqual({
      valid: false,
      reason: 'not-a-number',
      field: 'latitude',
    });
    expect(checkCoordinate(29, null, EGYPT_BOUNDS)).toEqual({
      valid: false,
      reason: 'not-a-number',
      field: 'longitude',
    });
  });

  it('reports values outside WGS84 ranges', () => {
    expect(checkCoordinate(95, 31, EGYPT_BOUNDS)).toEqual({
      valid: false,
      reason: 'out-of-range',
      field: 'latitude',
    });
    expect(checkCoordinate(29, 200, EGYPT_BOUNDS)).toEqual({
      valid: false,
      reason: 'out-of-range',
      field: 'longitude',
    });
  });

  it('reports a valid point outside the bounding box', () => {
    expect(checkCoordinate(51.5, -0.12, EGYPT_BOUNDS)).toEqual({
      valid: false,
      reason: 'outside-bounds',
      field: 'coordinates',
    });
  });
});
