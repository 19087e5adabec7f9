import type { Diagnostic } from '../core/diagnostics.js';
import { fail, succeed, type StageResult } from '../core/result.js';
import { DEFAULT_SETTINGS, type ExportSettings } from '../core/settings.js';
import { normalizeSongRecord, type RawSongRecord } from '../core/song.js';
import { exportSong, type ExportOutcome } from '../export/export-song.js';
import { serializeSlideDocument } from '../export/pro6-xml.js';
import { buildSlideDocument, type DocumentBuildOptions } from '../export/slide-document.js';
import { DEFAULT_SECTION_MAPPINGS } from '../sections/lexicons.js';
import { loadMappingDocument, mappingTableFromDocument } from '../sections/mapping-document.js';
import { createMappingTable, type SectionMappingTable } from '../sections/mapping-table.js';
import { convertSong } from '../pipeline/convert-song.js';

/** Options shared by the one-call conversion helpers. */
export interface ConvertOptions extends DocumentBuildOptions {
  /** Defaults to the built-in English mappings. */
  table?: SectionMappingTable;
  settings?: ExportSettings;
}

/** Serialized slide document plus conversion diagnostics. */
export type ConvertResult = StageResult<string, 'no-content'>;

/** Mapping table built from the default section mappings. */
export function defaultMappingTable(): SectionMappingTable {
  return createMappingTable(DEFAULT_SECTION_MAPPINGS);
}

/** Load (creating or migrating as needed) a mapping document and build its table. */
export async function loadMappingTable(filePath: string): Promise<SectionMappingTable> {
  const { document } = await loadMappingDocument(filePath);
  return mappingTableFromDocument(document);
}

/** Convert one rich-text lyric body straight to slide document XML. */
export function convertLyricsToDocument(
  song: RawSongRecord,
  rawLyrics: string | null | undefined,
  options: ConvertOptions = {}
): ConvertResult {
  const record = normalizeSongRecord(song);
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const converted = convertSong(record, rawLyrics, { table: options.table ?? defaultMappingTable(), settings });
  if (!converted.ok) {
    return converted;
  }

  const xml = serializeSlideDocument(buildSlideDocument(record, converted.value.sections, settings, options));
  return succeed(xml, converted.diagnostics);
}

/** Convert one rich-text lyric body and write it into `destinationDir`. */
export async function exportLyrics(
  song: RawSongRecord,
  rawLyrics: string | null | undefined,
  destinationDir: string,
  options: ConvertOptions = {}
): Promise<ExportOutcome> {
  const record = normalizeSongRecord(song);
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const converted = convertSong(record, rawLyrics, { table: options.table ?? defaultMappingTable(), settings });
  if (!converted.ok) {
    return fail(`No lyric content to export for '${record.title}'`, converted.diagnostics);
  }

  const written = await exportSong(record, converted.value.sections, destinationDir, { ...options, settings });
  return mergeDiagnostics(written, converted.diagnostics);
}

function mergeDiagnostics(outcome: ExportOutcome, earlier: Diagnostic[]): ExportOutcome {
  return { ...outcome, diagnostics: [...earlier, ...outcome.diagnostics] };
}
