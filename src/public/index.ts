export * from './api.js';

export type { Diagnostic, DiagnosticContext, DiagnosticSeverity } from '../core/diagnostics.js';
export { Logger, LoggerService, parseLogLevel, type LogEntry, type LogLevel, type LogListener } from '../core/logger.js';
export type { StageFailure, StageResult, StageSuccess } from '../core/result.js';
export {
  applyLoggingSettings,
  DEFAULT_SETTINGS,
  loadSettings,
  parseSettingsDocument,
  formatSettingsDocument,
  resolveSettings,
  saveSettings,
  SettingsError,
  type DuplicateAction,
  type ExportSettings,
  type SettingsOverrides
} from '../core/settings.js';
export { normalizeSongRecord, sortSongsByTitle, type ParsedText, type RawSongRecord, type Section, type SongRecord } from '../core/song.js';

export { parse, parseRichText, RichTextParser, type ParseOutcome } from '../parser/rtf-parser.js';
export { XmlParseError } from '../parser/xml-ast.js';
export { cleanText, TextCleaner, type CleaningStats, type CleanTextOptions } from '../text/normalize-text.js';

export { detectSections, type DetectionMode, type SectionDetection } from '../sections/detect-sections.js';
export {
  autoPopulateMappings,
  availableSourceLanguages,
  availableTargetLanguages,
  DEFAULT_SECTION_MAPPINGS,
  selectLanguages,
  validateLanguageSelection,
  type LanguageSelection
} from '../sections/lexicons.js';
export {
  createDefaultMappingDocument,
  loadMappingDocument,
  MappingDocumentError,
  saveMappingDocument,
  mappingTableFromDocument,
  type MappingDocument
} from '../sections/mapping-document.js';
export { createMappingTable, lookupLabel, type SectionMappingTable } from '../sections/mapping-table.js';
export { formatSectionLabel, sectionColor } from '../sections/section-labels.js';

export {
  exportBatch,
  summarizeBatch,
  type BatchOptions,
  type BatchResult,
  type DuplicateDecision,
  type DuplicateResolver,
  type ProgressListener
} from '../export/export-batch.js';
export { exportSong, type ExportOptions, type ExportOutcome } from '../export/export-song.js';
export { deriveFilename, sanitizeFilename } from '../export/filename.js';
export { serializeSlideDocument } from '../export/pro6-xml.js';
export { readSlideDocument, type ReadSlideDocument } from '../export/read-pro6.js';
export { buildSlideDocument, type SlideDocument } from '../export/slide-document.js';

export { convertSong, type ConvertedSong, type ConversionContext } from '../pipeline/convert-song.js';
export { exportLibrary, type LibraryExportOptions, type LibraryExportResult } from '../pipeline/export-library.js';
export { InMemorySongLibrary, type LyricSource, type SongSource } from '../pipeline/song-library.js';
