/**
 * Image URL Probe
 *
 * Existence check for every external image URL referenced by cards.
 * Requests run one at a time with a per-URL timeout; a non-2xx status,
 * timeout or connection failure becomes an `unreachable` error on every
 * card row that references the URL. There are no retries.
 */

import type { CardRecord, ValidationError } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'url-probe' });

export type FetchLike = (
  input: string,
  init: { readonly method: string; readonly signal: AbortSignal }
) => Promise<{ readonly ok: boolean; readonly status: number }>;

export interface UrlProbeOptions {
  /** Per-URL timeout in milliseconds */
  readonly timeoutMs: number;
  /** Defaults to global fetch */
  readonly fetch?: FetchLike;
}

type ProbeOutcome = { readonly reachable: true } | { readonly reachable: false; readonly reason: string };

export function isExternalUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

async function probeUrl(url: string, options: UrlProbeOptions): Promise<ProbeOutcome> {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchImpl(url, { method: 'HEAD', signal: controller.signal });
    if (response.ok) {
      return { reachable: true };
    }
    return { reachable: false, reason: `HTTP ${response.status}` };
  } catch (error) {
    if (controller.signal.aborted) {
      return { reachable: false, reason: `timed out after ${options.timeoutMs}ms` };
    }
    return { reachable: false, reason: error instanceof Error ? error.message : 'network error' };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Probe card image URLs sequentially
 *
 * Each distinct URL is requested once, in first-reference order.
 */
export async function probeImageUrls(
  cards: readonly CardRecord[],
  options: UrlProbeOptions
): Promise<ValidationError[]> {
  const rowsByUrl = new Map<string, number[]>();

  for (const card of cards) {
    if (!isExternalUrl(card.imageUrl)) continue;
    const rows = rowsByUrl.get(card.imageUrl) ?? [];
    rows.push(card.row);
    rowsByUrl.set(card.imageUrl, rows);
  }

  logger.info('Probing image URLs', { urls: rowsByUrl.size });

  const errors: ValidationError[] = [];

  for (const [url, rows] of rowsByUrl) {
    const outcome = await probeUrl(url, options);
    if (outcome.reachable) {
      logger.debug('URL reachable', { url });
      continue;
    }

    logger.warn('URL unreachable', { url, reason: outcome.reason });
    for (const row of rows) {
      errors.push({
        table: 'Cards',
        row,
        field: 'imageUrl',
        message: `Image URL ${url} is unreachable (${outcome.reason})`,
        kind: 'unreachable',
      });
    }
  }

  return errors;
}
