/**
 * Content Sync Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ContentValidationError } from '../../../core/errors.js';
import type { RawTables } from '../../../core/types.js';
import { syncContent } from '../../../cli/lib/sync.js';
import type { TableSource } from '../../../cli/lib/table-source.js';
import { FIXED_NOW, siteRow, tipRow, validRawTables } from '../../fixtures/content.js';

function memorySource(raw: RawTables): TableSource {
  return { origin: 'memory', load: async () => raw };
}

describe('syncContent', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'site-content-sync-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the same document to every output', async () => {
    const outputs = [join(dir, 'content', 'site_content.json'), join(dir, 'Resources', 'site_content.json')];

    const result = await syncContent(memorySource(validRawTables()), outputs, { now: FIXED_NOW });

    expect(result.written).toEqual(outputs);
    const first = readFileSync(outputs[0] ?? '', 'utf-8');
    const second = readFileSync(outputs[1] ?? '', 'utf-8');
    expect(second).toBe(first);
    expect(first).toBe(`${JSON.stringify(result.document, null, 2)}\n`);
    expect(result.document.lastUpdated).toBe('2026-01-15T10:00:00.000Z');
  });

  it('writes nothing and throws with the report when validation fails', async () => {
    const output = join(dir, 'site_content.json');
    const raw = validRawTables({
      Sites: [siteRow({ era: 'Bronze Age' })],
      Tips: [tipRow({ siteId: 'karnak' })],
    });

    const error = await syncContent(memorySource(raw), [output]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContentValidationError);
    expect(existsSync(output)).toBe(false);
    if (!(error instanceof ContentValidationError)) return;
    expect(error.message).toBe('Content validation failed with 2 error(s)');
    expect(error.report.groups.map((g) => g.table)).toEqual(['Sites', 'Tips']);
    expect(error.getSummary().split('\n')).toEqual([
      'Content validation failed with 2 error(s):',
      '',
      '  Sites: 1 error(s)',
      "    - Row 2 [era] Invalid era 'Bronze Age'. Must be one of: Pre-Dynastic, Old Kingdom, Middle Kingdom, New Kingdom, Late Period, Ptolemaic, Roman, Islamic, Modern",
      '  Tips: 1 error(s)',
      "    - Row 2 [siteId] siteId 'karnak' does not match any Sites id",
    ]);
  });

  it('replaces no output when a later output cannot be written', async () => {
    const first = join(dir, 'site_content.json');
    writeFileSync(first, 'previous\n');
    writeFileSync(join(dir, 'blocker'), 'not a directory');
    const second = join(dir, 'blocker', 'site_content.json');

    await expect(
      syncContent(memorySource(validRawTables()), [first, second], { now: FIXED_NOW })
    ).rejects.toThrow();

    expect(readFileSync(first, 'utf-8')).toBe('previous\n');
    expect(readdirSync(dir).sort()).toEqual(['blocker', 'site_content.json']);
  });
});
