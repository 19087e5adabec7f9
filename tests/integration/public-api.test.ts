import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  convertLyricsToDocument,
  loadMappingTable,
  lookupLabel,
  readSlideDocument,
  resolveSettings
} from '../../src/public/index.js';

const SWEDISH_LYRICS = `{\\rtf1\\ansi\\ansicpg1252\\uc1
{\\fonttbl{\\f0\\fnil Arial;}}
\\f0 Vers 1\\par
K\\u228?rlek som aldrig tar slut\\par
\\par
Refr\\u228?ng\\par
Halleluja (x2)\\par
}`;

const SONG = { id: 11, title: 'Kärlek', author: 'Test Author', referenceNumber: '555' };

describe('public API', () => {
  it('converts marked lyrics with the default mappings', () => {
    const outcome = convertLyricsToDocument(SONG, SWEDISH_LYRICS);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }

    const read = readSlideDocument(outcome.value);
    expect(read.groups.map((group) => [group.name, group.slides.map((slide) => slide.plainText)])).toEqual([
      ['Verse 1', ['Kärlek som aldrig tar slut']],
      ['Chorus', ['Halleluja']]
    ]);
  });

  it('writes the configured font into the rich encodings', () => {
    const settings = resolveSettings({ export: { changeFont: true, font: { family: 'Georgia', size: 40 } } });
    const outcome = convertLyricsToDocument(SONG, SWEDISH_LYRICS, { settings });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }

    const slide = readSlideDocument(outcome.value).groups[0]?.slides[0];
    expect(slide?.rtfData).toContain('{\\f4\\fcharset0 Georgia;}');
    expect(slide?.flowData).toContain('FontFamily="Georgia" FontSize="40"');
  });

  it('surfaces parser fallbacks as song diagnostics', () => {
    const outcome = convertLyricsToDocument(SONG, '{\\rtf1 Hello\\par}}');

    expect(outcome.ok).toBe(true);
    expect(outcome.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity, diagnostic.context])).toEqual([
      ['RTF_PRIMARY_FAILED', 'warning', { songId: 11, songTitle: 'Kärlek' }]
    ]);
  });

  it('loads a mapping table, creating the document on first use', async () => {
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'public-api-'));
    try {
      const table = await loadMappingTable(path.join(workDir, 'section_mappings.yaml'));

      expect(lookupLabel(table, 'Refräng')).toBe('Chorus');
      expect(table.numberFormat).toBe('{section_name} {number}');
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  });
});
