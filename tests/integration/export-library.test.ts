import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  convertSong,
  defaultMappingTable,
  exportLibrary,
  InMemorySongLibrary,
  normalizeSongRecord,
  readSlideDocument,
  resolveSettings,
  type LyricSource
} from '../../src/public/index.js';

const library = new InMemorySongLibrary([
  { song: { id: 2, title: 'beta' }, lyrics: '{\\rtf1 Chorus\\par Sing it\\par}' },
  { song: { id: 1, title: 'Alpha', referenceNumber: 101 }, lyrics: '{\\rtf1 Vers 1\\par First\\par}' },
  { song: { id: 3, title: 'Gamma' }, lyrics: null }
]);

describe('InMemorySongLibrary', () => {
  it('lists normalized songs by title', async () => {
    const songs = await library.listSongs();

    expect(songs.map((song) => song.title)).toEqual(['Alpha', 'beta', 'Gamma']);
    expect(songs[0]?.referenceNumber).toBe('101');
    expect(songs[1]?.author).toBe('');
  });

  it('returns null for unknown songs', async () => {
    expect(await library.getLyrics(99)).toBeNull();
  });
});

describe('convertSong', () => {
  it('parses, cleans and segments lyrics', () => {
    const outcome = convertSong(
      normalizeSongRecord({ id: 5, title: 'Song' }),
      '{\\rtf1 vers 2\\par \\u246?ver\\par}',
      { table: defaultMappingTable() }
    );

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }
    expect(outcome.value.plainText).toBe('Vers 2\nÖver');
    expect(outcome.value.sections).toEqual([{ type: 'Verse 2', content: 'Över' }]);
    expect(outcome.value.hasSections).toBe(true);
  });

  it('tags diagnostics with the song', () => {
    const outcome = convertSong(normalizeSongRecord({ id: 6, title: 'Silent' }), '', { table: defaultMappingTable() });

    expect(outcome).toMatchObject({ ok: false, reason: 'no-content' });
    expect(outcome.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.context])).toEqual([
      ['RTF_EMPTY', { songId: 6, songTitle: 'Silent' }],
      ['CONVERT_NO_LYRICS', { songId: 6, songTitle: 'Silent' }]
    ]);
  });
});

describe('exportLibrary', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'export-library-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('exports every song with lyrics and reports the rest as skippable', async () => {
    const result = await exportLibrary(library, library, workDir, { table: defaultMappingTable() });

    expect(result.successes).toEqual([path.join(workDir, 'Alpha.pro6'), path.join(workDir, 'beta.pro6')]);
    expect(result.failures).toEqual([
      { songId: 3, songTitle: 'Gamma', message: "No lyric content to export for 'Gamma'", skippable: true }
    ]);
    expect(result.cancelled).toBe(false);

    const alpha = readSlideDocument(await readFile(path.join(workDir, 'Alpha.pro6'), 'utf8'));
    expect(alpha.groups.map((group) => group.name)).toEqual(['Verse 1']);
    expect(alpha.attributes.CCLISongNumber).toBe('101');
  });

  it('counts songs without lyrics in the progress total', async () => {
    const progress: [number, number, string][] = [];

    await exportLibrary(library, library, workDir, {
      table: defaultMappingTable(),
      onProgress: (current, total, label) => progress.push([current, total, label])
    });

    expect(progress).toEqual([
      [0, 3, 'Alpha'],
      [1, 3, 'beta'],
      [3, 3, 'Export complete']
    ]);
  });

  it('exports only the selected songs', async () => {
    const result = await exportLibrary(library, library, workDir, { table: defaultMappingTable(), songIds: [2] });

    expect(result.successes).toEqual([path.join(workDir, 'beta.pro6')]);
    expect(result.failures).toEqual([]);
  });

  it('applies advanced detection from the settings', async () => {
    const repeated = new InMemorySongLibrary([
      { song: { id: 1, title: 'Repeat' }, lyrics: '{\\rtf1 One line\\par\\par Same\\par\\par Two line\\par\\par Same}' }
    ]);
    const settings = resolveSettings({ processing: { advancedDetection: true } });

    await exportLibrary(repeated, repeated, workDir, { table: defaultMappingTable(), settings });

    const read = readSlideDocument(await readFile(path.join(workDir, 'Repeat.pro6'), 'utf8'));
    expect(read.groups.map((group) => group.name)).toEqual(['Verse', 'Chorus', 'Verse', 'Chorus']);
  });

  it('records a failing lyric lookup and carries on', async () => {
    const failingLyrics: LyricSource = {
      getLyrics: async (songId) => {
        if (songId === 1) {
          throw new Error('lookup failed');
        }
        return library.getLyrics(songId);
      }
    };

    const result = await exportLibrary(library, failingLyrics, workDir, { table: defaultMappingTable(), songIds: [1, 2] });

    expect(result.failures).toEqual([
      { songId: 1, songTitle: 'Alpha', message: "Failed to read lyrics for 'Alpha': lookup failed", skippable: false }
    ]);
    expect(result.successes).toEqual([path.join(workDir, 'beta.pro6')]);
  });
});
