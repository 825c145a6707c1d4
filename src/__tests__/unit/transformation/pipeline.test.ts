/**
 * Conversion Pipeline Tests
 *
 * The URL probe runs against an injected fetch; nothing leaves the process.
 */

import { describe, it, expect } from 'vitest';

import { SourceEmptyError } from '../../../core/errors.js';
import { convertContent, countRows } from '../../../transformation/pipeline.js';
import type { FetchLike } from '../../../validators/url-probe.js';
import {
  FIXED_NOW,
  quizCardRow,
  siteRow,
  storyCardRow,
  validRawTables,
} from '../../fixtures/content.js';

function recordingFetch(status: number): { fetch: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const fetch: FetchLike = async (input) => {
    calls.push(input);
    return { ok: status >= 200 && status < 300, status };
  };
  return { fetch, calls };
}

describe('countRows', () => {
  it('counts every table, treating missing ones as empty', () => {
    expect(countRows({ Sites: [siteRow()], Cards: [storyCardRow(), quizCardRow()] })).toEqual({
      Sites: 1,
      SubLocations: 0,
      Cards: 2,
      Tips: 0,
      ArabicPhrases: 0,
    });
  });
});

describe('convertContent', () => {
  it('fails fast when the Sites table is empty or missing', async () => {
    await expect(convertContent({ Sites: [] })).rejects.toBeInstanceOf(SourceEmptyError);
    await expect(convertContent({}, { origin: './data' })).rejects.toThrow(
      'No Sites rows found in ./data'
    );
  });

  it('produces the document for clean content', async () => {
    const result = await convertContent(validRawTables(), { now: FIXED_NOW });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.report).toEqual({ passed: true, errorCount: 0, groups: [] });
    expect(result.document.lastUpdated).toBe('2026-01-15T10:00:00.000Z');
    expect(result.document.sites.map((site) => site.id)).toEqual(['giza']);
  });

  it('produces no document when any error exists', async () => {
    const result = await convertContent(
      validRawTables({ Sites: [siteRow({ latitude: '51.5', longitude: '-0.12' })] })
    );

    expect(result.ok).toBe(false);
    expect('document' in result).toBe(false);
    expect(result.report.errorCount).toBe(1);
    expect(result.report.groups[0]?.table).toBe('Sites');
  });

  it('reports a repeated site id once and produces no document', async () => {
    const result = await convertContent(validRawTables({ Sites: [siteRow(), siteRow()] }));

    expect(result.ok).toBe(false);
    expect(result.report.groups).toEqual([
      {
        table: 'Sites',
        errors: [
          {
            table: 'Sites',
            row: 3,
            field: 'id',
            message: "Duplicate id 'giza' (first used at row 2)",
            kind: 'duplicate-id',
          },
        ],
      },
    ]);
  });

  it('reports sites without sub-locations without failing', async () => {
    const result = await convertContent(
      validRawTables({ Sites: [siteRow(), siteRow({ id: 'karnak' })] })
    );

    expect(result.ok).toBe(true);
    expect(result.sitesWithoutSubLocations).toEqual(['karnak']);
  });

  describe('image URL probe', () => {
    const withRemoteImage = () =>
      validRawTables({
        Cards: [
          storyCardRow({ imageUrl: 'https://images.test/giza.jpg' }),
          quizCardRow({ imageUrl: 'https://images.test/giza.jpg' }),
        ],
      });

    it('reports an unreachable URL on every card that uses it', async () => {
      const { fetch, calls } = recordingFetch(404);

      const result = await convertContent(withRemoteImage(), {
        probe: { enabled: true, timeoutMs: 1000, fetch },
      });

      expect(calls).toEqual(['https://images.test/giza.jpg']);
      expect(result.ok).toBe(false);
      expect(result.report.groups).toEqual([
        {
          table: 'Cards',
          errors: [
            {
              table: 'Cards',
              row: 2,
              field: 'imageUrl',
              message: 'Image URL https://images.test/giza.jpg is unreachable (HTTP 404)',
              kind: 'unreachable',
            },
            {
              table: 'Cards',
              row: 3,
              field: 'imageUrl',
              message: 'Image URL https://images.test/giza.jpg is unreachable (HTTP 404)',
              kind: 'unreachable',
            },
          ],
        },
      ]);
    });

    it('passes when every URL answers', async () => {
      const { fetch } = recordingFetch(200);

      const result = await convertContent(withRemoteImage(), {
        probe: { enabled: true, timeoutMs: 1000, fetch },
      });

      expect(result.ok).toBe(true);
    });

    it('does not probe when static checks found errors', async () => {
      const { fetch, calls } = recordingFetch(404);
      const raw = withRemoteImage();
      raw.Sites = [siteRow({ city: 'Paris' })];

      const result = await convertContent(raw, {
        probe: { enabled: true, timeoutMs: 1000, fetch },
      });

      expect(calls).toEqual([]);
      expect(result.report.errorCount).toBe(1);
    });

    it('does not probe when disabled', async () => {
      const { fetch, calls } = recordingFetch(404);

      const result = await convertContent(withRemoteImage(), {
        probe: { enabled: false, timeoutMs: 1000, fetch },
      });

      expect(calls).toEqual([]);
      expect(result.ok).toBe(true);
    });

    it('reports a timeout', async () => {
      const hanging: FetchLike = (_input, init) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        });

      const result = await convertContent(
        validRawTables({ Cards: [storyCardRow({ imageUrl: 'https://images.test/slow.jpg' }), quizCardRow()] }),
        { probe: { enabled: true, timeoutMs: 20, fetch: hanging } }
      );

      expect(result.report.groups[0]?.errors.map((e) => e.message)).toEqual([
        'Image URL https://images.test/slow.jpg is unreachable (timed out after 20ms)',
      ]);
    });

    it('reports a connection failure with its message', async () => {
      const failing: FetchLike = async () => {
        throw new Error('getaddrinfo ENOTFOUND images.test');
      };

      const result = await convertContent(
        validRawTables({ Cards: [storyCardRow({ imageUrl: 'https://images.test/a.jpg' }), quizCardRow()] }),
        { probe: { enabled: true, timeoutMs: 1000, fetch: failing } }
      );

      expect(result.report.groups[0]?.errors.map((e) => e.message)).toEqual([
        'Image URL https://images.test/a.jpg is unreachable (getaddrinfo ENOTFOUND images.test)',
      ]);
    });
  });
});
