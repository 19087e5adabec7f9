import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  convertLyricsToDocument,
  createMappingTable,
  exportLyrics,
  exportSong,
  normalizeSongRecord,
  readSlideDocument
} from '../../src/public/index.js';

const LYRICS = '{\\rtf1 verse\\par Amazing grace\\par \\par chorus\\par I once was lost\\par}';
const SONG = { id: 1, title: 'Amazing Grace', author: 'J. Newton' };
const FIXED_CLOCK = { now: () => new Date(Date.UTC(2024, 2, 3, 4, 5, 6)) };

describe('lyrics to slide document', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'convert-export-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('writes one group per marked section', async () => {
    const table = createMappingTable({ verse: 'Verse', chorus: 'Chorus' });
    const outcome = await exportLyrics(SONG, LYRICS, workDir, { ...FIXED_CLOCK, table });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }
    expect(outcome.value).toBe(path.join(workDir, 'Amazing Grace.pro6'));

    const read = readSlideDocument(await readFile(outcome.value, 'utf8'));
    expect(read.title).toBe('Amazing Grace');
    expect(read.attributes.CCLIAuthor).toBe('J. Newton');
    expect(read.attributes.lastDateUsed).toBe('2024-03-03T04:05:06+00:00');
    expect(read.groups.map((group) => [group.name, group.slides.map((slide) => slide.plainText)])).toEqual([
      ['Verse', ['Amazing grace']],
      ['Chorus', ['I once was lost']]
    ]);
  });

  it('uses the default mappings when no table is given', () => {
    const outcome = convertLyricsToDocument(SONG, LYRICS, FIXED_CLOCK);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }
    expect(readSlideDocument(outcome.value).groups.map((group) => group.name)).toEqual(['Verse', 'Chorus']);
  });

  it('rejects songs without lyrics and writes nothing', async () => {
    const empty = await exportLyrics(SONG, '', workDir);
    const blank = await exportLyrics(SONG, '{\\rtf1 \\par \\par}', workDir);

    expect(empty).toMatchObject({ ok: false, reason: "No lyric content to export for 'Amazing Grace'" });
    expect(blank.ok).toBe(false);
    expect(await readdir(workDir)).toEqual([]);
  });

  it('rejects sections without content', async () => {
    const outcome = await exportSong(normalizeSongRecord(SONG), [{ type: 'verse', content: '  ' }], workDir);

    expect(outcome.ok).toBe(false);
    expect(outcome.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['EXPORT_NO_CONTENT']);
    expect(await readdir(workDir)).toEqual([]);
  });

  it('reports write failures with the target path', async () => {
    const blocked = path.join(workDir, 'not-a-directory');
    await exportSong(normalizeSongRecord({ id: 9, title: 'blocked' }), [{ type: 'verse', content: 'x' }], workDir, {
      targetPath: blocked
    });

    const outcome = await exportSong(normalizeSongRecord(SONG), [{ type: 'verse', content: 'Line' }], blocked);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) {
      return;
    }
    expect(outcome.reason.startsWith("Failed to export 'Amazing Grace': ")).toBe(true);
    expect(outcome.diagnostics[0]?.code).toBe('EXPORT_WRITE_FAILED');
    expect(outcome.diagnostics[0]?.context?.path).toBe(path.join(blocked, 'Amazing Grace.pro6'));
  });
});
