import { createDiagnostic, type Diagnostic, type DiagnosticContext } from '../core/diagnostics.js';
import { fail, succeed, type StageResult } from '../core/result.js';
import { DEFAULT_SETTINGS, type ExportSettings } from '../core/settings.js';
import type { Section, SongRecord } from '../core/song.js';
import { parseRichText } from '../parser/rtf-parser.js';
import { detectSections } from '../sections/detect-sections.js';
import type { SectionMappingTable } from '../sections/mapping-table.js';
import { cleanText } from '../text/normalize-text.js';

/** Song ready for export: normalized text split into typed sections. */
export interface ConvertedSong {
  song: SongRecord;
  plainText: string;
  sections: Section[];
  /** True when markers or the repetition heuristic produced real sections. */
  hasSections: boolean;
}

export interface ConversionContext {
  table: SectionMappingTable;
  settings?: ExportSettings;
}

export type ConversionOutcome = StageResult<ConvertedSong, 'no-content'>;

export const NO_LYRICS_CODE = 'CONVERT_NO_LYRICS';

/** Parse, clean and segment one song's lyric body. */
export function convertSong(
  song: SongRecord,
  rawLyrics: string | null | undefined,
  context: ConversionContext
): ConversionOutcome {
  const settings = context.settings ?? DEFAULT_SETTINGS;
  const songContext: DiagnosticContext = { songId: song.id, songTitle: song.title };

  const parsed = parseRichText(rawLyrics);
  const diagnostics = parsed.diagnostics.map((diagnostic) => withContext(diagnostic, songContext));
  if (!parsed.ok || !parsed.value.hasContent) {
    return fail('no-content', [...diagnostics, noLyrics(song, songContext)]);
  }

  const plainText = cleanText(parsed.value.plainText, true, settings.processing.removeChords);
  if (!plainText) {
    return fail('no-content', [...diagnostics, noLyrics(song, songContext)]);
  }

  const mode = settings.processing.advancedDetection ? 'advanced' : 'standard';
  const { sections, hasSections } = detectSections(plainText, context.table, mode);

  return succeed({ song, plainText, sections, hasSections }, diagnostics);
}

function withContext(diagnostic: Diagnostic, context: DiagnosticContext): Diagnostic {
  return { ...diagnostic, context: { ...context, ...diagnostic.context } };
}

function noLyrics(song: SongRecord, context: DiagnosticContext): Diagnostic {
  return createDiagnostic(NO_LYRICS_CODE, 'warning', `No lyric content to export for '${song.title}'`, context);
}
