import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createDiagnostic, type DiagnosticContext } from '../core/diagnostics.js';
import { Logger } from '../core/logger.js';
import { fail, succeed, type StageResult } from '../core/result.js';
import { DEFAULT_SETTINGS, type ExportSettings } from '../core/settings.js';
import type { Section, SongRecord } from '../core/song.js';
import { deriveFilename } from './filename.js';
import { serializeSlideDocument } from './pro6-xml.js';
import { buildSlideDocument, hasExportableContent, type DocumentBuildOptions } from './slide-document.js';
import { describeWriteError } from './write-errors.js';

/** Diagnostic code for a song with nothing to put on a slide. */
export const NO_CONTENT_CODE = 'EXPORT_NO_CONTENT';
export const WRITE_FAILED_CODE = 'EXPORT_WRITE_FAILED';

export interface ExportOptions extends DocumentBuildOptions {
  settings?: ExportSettings;
  /** Write here instead of the derived filename inside the destination. */
  targetPath?: string;
}

/** Written file path, or a user-facing failure message. */
export type ExportOutcome = StageResult<string, string>;

/**
 * Export one song to a slide document file.
 * Songs without non-blank section content are rejected before anything is written.
 */
export async function exportSong(
  song: SongRecord,
  sections: readonly Section[],
  destinationDir: string,
  options: ExportOptions = {}
): Promise<ExportOutcome> {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const context: DiagnosticContext = { songId: song.id, songTitle: song.title };

  if (!hasExportableContent(sections)) {
    const message = `No lyric content to export for '${song.title}'`;
    Logger.warn('Song has no content to export', { songId: song.id, songTitle: song.title });
    return fail(message, [createDiagnostic(NO_CONTENT_CODE, 'warning', message, context)]);
  }

  const targetPath = options.targetPath ?? path.join(destinationDir, deriveFilename(song, settings));

  try {
    const xml = serializeSlideDocument(buildSlideDocument(song, sections, settings, options));
    await mkdir(path.dirname(targetPath), { recursive: true });
    await writeFile(targetPath, xml, 'utf8');
  } catch (error) {
    const message = `Failed to export '${song.title}': ${describeWriteError(error)}`;
    Logger.error('Song export failed', { songId: song.id, songTitle: song.title, path: targetPath, error: message });
    return fail(message, [createDiagnostic(WRITE_FAILED_CODE, 'error', message, { ...context, path: targetPath })]);
  }

  Logger.debug('Exported song', { songId: song.id, path: targetPath });
  return succeed(targetPath);
}
