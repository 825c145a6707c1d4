/**
 * Content Validation Pipeline
 *
 * Runs the validation phases in order:
 *
 *   1. row parsing errors (from parseTables)
 *   2. row validators, parent tables first
 *   3. cross-table checks
 *   4. image URL probe, ONLY when phases 1-3 produced no errors and
 *      probing is enabled
 *
 * Phases 1-3 are synchronous and pure; only the probe touches the network.
 */

import type { ContentRules } from '../core/config.js';
import type { ContentTables, ValidationError } from '../core/types.js';
import { validateRows } from './row-validators.js';
import { checkCrossTable } from './cross-table.js';
import { probeImageUrls, type FetchLike } from './url-probe.js';

export * from './field-validators.js';
export * from './row-validators.js';
export * from './cross-table.js';
export * from './url-probe.js';
export * from './report.js';

export interface StaticValidationResult {
  readonly errors: readonly ValidationError[];
  readonly sitesWithoutSubLocations: readonly string[];
}

export interface ValidationOptions {
  readonly probe?: {
    readonly enabled: boolean;
    readonly timeoutMs: number;
    readonly fetch?: FetchLike;
  };
}

export interface ValidationResult extends StaticValidationResult {
  /** Whether the URL probe phase ran */
  readonly probed: boolean;
}

/**
 * Phases 2-3: row validators then cross-table checks
 *
 * @param parseErrors - Phase 1 errors, placed first in the result
 */
export function validateStatic(
  tables: ContentTables,
  rules: ContentRules,
  parseErrors: readonly ValidationError[] = []
): StaticValidationResult {
  const rows = validateRows(tables, rules);
  const previous = [...parseErrors, ...rows.errors];
  const cross = checkCrossTable(tables, rules, previous);

  return {
    errors: [...previous, ...cross.errors],
    sitesWithoutSubLocations: cross.sitesWithoutSubLocations,
  };
}

/**
 * All phases, including the gated URL probe
 */
export async function validateContent(
  tables: ContentTables,
  rules: ContentRules,
  parseErrors: readonly ValidationError[] = [],
  options: ValidationOptions = {}
): Promise<ValidationResult> {
  const staticResult = validateStatic(tables, rules, parseErrors);

  const probe = options.probe;
  if (probe === undefined || !probe.enabled || staticResult.errors.length > 0) {
    return { ...staticResult, probed: false };
  }

  const unreachable = await probeImageUrls(tables.cards, {
    timeoutMs: probe.timeoutMs,
    fetch: probe.fetch,
  });

  return {
    errors: unreachable,
    sitesWithoutSubLocations: staticResult.sitesWithoutSubLocations,
    probed: true,
  };
}
