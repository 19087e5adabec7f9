import type { Diagnostic } from '../core/diagnostics.js';
import { Logger } from '../core/logger.js';
import { errorMessage } from '../core/result.js';
import { DEFAULT_SETTINGS } from '../core/settings.js';
import type { SongRecord } from '../core/song.js';
import { exportBatch, type BatchFailure, type BatchItem, type BatchOptions, type BatchResult } from '../export/export-batch.js';
import { createMappingTable, type SectionMappingTable } from '../sections/mapping-table.js';
import { convertSong } from './convert-song.js';
import type { LyricSource, SongSource } from './song-library.js';

/**
 * Progress counts every selected song, so `total` includes songs rejected
 * before export; those indexes are passed over without a call.
 */
export interface LibraryExportOptions extends BatchOptions {
  table: SectionMappingTable;
  /** Export only these songs, in library order. */
  songIds?: readonly (number | string)[];
}

export interface LibraryExportResult extends BatchResult {
  /** Parse and conversion diagnostics for every song considered. */
  diagnostics: Diagnostic[];
}

/**
 * Convert and export songs from a library. The mapping table and settings
 * are copied once up front; later changes by the caller do not affect a
 * running export.
 */
export async function exportLibrary(
  songSource: SongSource,
  lyricSource: LyricSource,
  destinationDir: string,
  options: LibraryExportOptions
): Promise<LibraryExportResult> {
  const settings = structuredClone(options.settings ?? DEFAULT_SETTINGS);
  const table = createMappingTable(options.table.entries, options.table);
  const songs = selectSongs(await songSource.listSongs(), options.songIds);

  Logger.info('Starting library export', { songs: songs.length, destination: destinationDir });

  const items: BatchItem[] = [];
  // Library index of each batch item.
  const positions: number[] = [];
  const conversionFailures: BatchFailure[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const [index, song] of songs.entries()) {
    try {
      const converted = convertSong(song, await lyricSource.getLyrics(song.id), { table, settings });
      diagnostics.push(...converted.diagnostics);

      if (converted.ok) {
        items.push({ song, sections: converted.value.sections });
        positions.push(index);
      } else {
        conversionFailures.push({
          songId: song.id,
          songTitle: song.title,
          message: `No lyric content to export for '${song.title}'`,
          skippable: true
        });
      }
    } catch (error) {
      const message = `Failed to read lyrics for '${song.title}': ${errorMessage(error)}`;
      Logger.error('Lyric lookup failed', { songId: song.id, songTitle: song.title, error: message });
      conversionFailures.push({ songId: song.id, songTitle: song.title, message, skippable: false });
    }
  }

  const { onProgress } = options;
  const batch = await exportBatch(items, destinationDir, {
    ...options,
    settings,
    onProgress: onProgress
      ? (current, _total, label) => onProgress(positions[current] ?? songs.length, songs.length, label)
      : undefined
  });
  Logger.info('Library export finished', {
    exported: batch.successes.length,
    failed: batch.failures.length + conversionFailures.length,
    skipped: batch.skipped.length
  });

  return { ...batch, failures: [...conversionFailures, ...batch.failures], diagnostics };
}

function selectSongs(songs: SongRecord[], songIds: readonly (number | string)[] | undefined): SongRecord[] {
  if (!songIds) {
    return songs;
  }

  const wanted = new Set(songIds);
  return songs.filter((song) => wanted.has(song.id));
}
