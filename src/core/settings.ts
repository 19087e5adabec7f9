import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { Logger, parseLogLevel } from './logger.js';
import { compareVersions } from './versions.js';
import {
  isRecord,
  readOptionalBoolean,
  readOptionalEnum,
  readOptionalPositiveInteger,
  readOptionalRecord,
  readOptionalString,
  type FieldErrorFactory
} from './yaml-fields.js';

/** Schema version written into every saved settings document. */
export const SETTINGS_SCHEMA_VERSION = '1.2.0';

/** Stored duplicate-file policy; `ask` defers to the caller's prompt. */
export type DuplicateAction = 'ask' | 'skip' | 'overwrite' | 'rename';

export const DUPLICATE_ACTIONS: readonly DuplicateAction[] = ['ask', 'skip', 'overwrite', 'rename'];

/** Font used by the rich-text and flow encodings when font changes are enabled. */
export interface FontSettings {
  family: string;
  size: number;
  /** `#RRGGBB`. */
  color: string;
}

const FONT_COLOR = /^#[0-9A-Fa-f]{6}$/;

/** How section content is broken into slides. */
export interface SlideSettings {
  maxLinesPerSlide: number;
  autoBreakLongLines: boolean;
}

export interface ExportFileSettings {
  includeCcliInFilename: boolean;
  includeAuthorInFilename: boolean;
  overwriteExisting: boolean;
  preserveFormatting: boolean;
  changeFont: boolean;
  fileExtension: string;
  font: FontSettings;
  slides: SlideSettings;
}

export interface DuplicateHandlingSettings {
  defaultAction: DuplicateAction;
  renamePattern: string;
  rememberChoice: boolean;
}

export interface ProcessingSettings {
  removeChords: boolean;
  advancedDetection: boolean;
}

/** Immutable settings snapshot handed to the pipeline at call time. */
export interface ExportSettings {
  version: string;
  export: ExportFileSettings;
  duplicateHandling: DuplicateHandlingSettings;
  processing: ProcessingSettings;
  logging: { level: string };
}

/** Partial settings accepted by `resolveSettings`. */
export type SettingsOverrides = {
  [K in keyof ExportSettings]?: ExportSettings[K] extends object
    ? { [P in keyof ExportSettings[K]]?: ExportSettings[K][P] extends object ? Partial<ExportSettings[K][P]> : ExportSettings[K][P] }
    : ExportSettings[K];
};

export const DEFAULT_SETTINGS: ExportSettings = deepFreeze<ExportSettings>({
  version: SETTINGS_SCHEMA_VERSION,
  export: {
    includeCcliInFilename: false,
    includeAuthorInFilename: false,
    overwriteExisting: false,
    preserveFormatting: true,
    changeFont: false,
    fileExtension: '.pro6',
    font: {
      family: 'Arial',
      size: 48,
      color: '#FFFFFF'
    },
    slides: {
      maxLinesPerSlide: 4,
      autoBreakLongLines: true
    }
  },
  duplicateHandling: {
    defaultAction: 'ask',
    renamePattern: '{name}_{number}',
    rememberChoice: false
  },
  processing: {
    removeChords: false,
    advancedDetection: false
  },
  logging: {
    level: 'info'
  }
});

/** Validation error for a malformed settings document. */
export class SettingsError extends Error {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(filePath ? `Settings error in ${filePath}: ${message}` : `Settings error: ${message}`);
    this.name = 'SettingsError';
    this.filePath = filePath;
  }
}

/** Outcome of loading settings from disk. */
export interface SettingsLoadResult {
  settings: ExportSettings;
  created: boolean;
  migrated: boolean;
}

/** Merge overrides over the defaults into a frozen snapshot. */
export function resolveSettings(overrides: SettingsOverrides = {}, base: ExportSettings = DEFAULT_SETTINGS): ExportSettings {
  const color = overrides.export?.font?.color;
  if (color !== undefined && !FONT_COLOR.test(color)) {
    throw new SettingsError(`'color' must look like '#FFFFFF', got '${color}'`);
  }

  return deepFreeze<ExportSettings>({
    version: overrides.version ?? base.version,
    export: {
      ...base.export,
      ...overrides.export,
      font: { ...base.export.font, ...overrides.export?.font },
      slides: { ...base.export.slides, ...overrides.export?.slides }
    },
    duplicateHandling: { ...base.duplicateHandling, ...overrides.duplicateHandling },
    processing: { ...base.processing, ...overrides.processing },
    logging: { ...base.logging, ...overrides.logging }
  });
}

/**
 * Parse a YAML settings document. Missing groups and keys take their
 * defaults; present keys must have the right type.
 */
export function parseSettingsDocument(yamlText: string, filePath?: string): ExportSettings {
  const fail: FieldErrorFactory = (message) => new SettingsError(message, filePath);

  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText);
  } catch (error) {
    throw fail(error instanceof Error ? error.message : 'invalid YAML');
  }

  if (parsed === null || parsed === undefined) {
    return DEFAULT_SETTINGS;
  }

  if (!isRecord(parsed)) {
    throw fail('settings must be a YAML mapping');
  }

  const exportGroup = readOptionalRecord(parsed, 'export', fail) ?? {};
  const font = readOptionalRecord(exportGroup, 'font', fail) ?? {};
  const slides = readOptionalRecord(exportGroup, 'slides', fail) ?? {};
  const duplicates = readOptionalRecord(parsed, 'duplicate_handling', fail) ?? {};
  const processing = readOptionalRecord(parsed, 'processing', fail) ?? {};
  const logging = readOptionalRecord(parsed, 'logging', fail) ?? {};

  const fileExtension = readOptionalString(exportGroup, 'file_extension', fail);
  if (fileExtension !== undefined && !/^\.[A-Za-z0-9]+$/.test(fileExtension)) {
    throw fail("'file_extension' must look like '.pro6'");
  }

  const fontColor = readOptionalString(font, 'color', fail);
  if (fontColor !== undefined && !FONT_COLOR.test(fontColor)) {
    throw fail("'color' must look like '#FFFFFF'");
  }

  const defaults = DEFAULT_SETTINGS;
  return deepFreeze<ExportSettings>({
    version: readOptionalString(parsed, 'version', fail) ?? '1.0.0',
    export: {
      includeCcliInFilename:
        readOptionalBoolean(exportGroup, 'include_ccli_in_filename', fail) ?? defaults.export.includeCcliInFilename,
      includeAuthorInFilename:
        readOptionalBoolean(exportGroup, 'include_author_in_filename', fail) ?? defaults.export.includeAuthorInFilename,
      overwriteExisting: readOptionalBoolean(exportGroup, 'overwrite_existing', fail) ?? defaults.export.overwriteExisting,
      preserveFormatting:
        readOptionalBoolean(exportGroup, 'preserve_formatting', fail) ?? defaults.export.preserveFormatting,
      changeFont: readOptionalBoolean(exportGroup, 'change_font', fail) ?? defaults.export.changeFont,
      fileExtension: fileExtension ?? defaults.export.fileExtension,
      font: {
        family: readOptionalString(font, 'family', fail) ?? defaults.export.font.family,
        size: readOptionalPositiveInteger(font, 'size', fail) ?? defaults.export.font.size,
        color: fontColor ?? defaults.export.font.color
      },
      slides: {
        maxLinesPerSlide:
          readOptionalPositiveInteger(slides, 'max_lines_per_slide', fail) ?? defaults.export.slides.maxLinesPerSlide,
        autoBreakLongLines:
          readOptionalBoolean(slides, 'auto_break_long_lines', fail) ?? defaults.export.slides.autoBreakLongLines
      }
    },
    duplicateHandling: {
      defaultAction:
        readOptionalEnum(duplicates, 'default_action', DUPLICATE_ACTIONS, fail) ?? defaults.duplicateHandling.defaultAction,
      renamePattern: readOptionalString(duplicates, 'rename_pattern', fail) ?? defaults.duplicateHandling.renamePattern,
      rememberChoice: readOptionalBoolean(duplicates, 'remember_choice', fail) ?? defaults.duplicateHandling.rememberChoice
    },
    processing: {
      removeChords: readOptionalBoolean(processing, 'remove_chords', fail) ?? defaults.processing.removeChords,
      advancedDetection:
        readOptionalBoolean(processing, 'advanced_detection', fail) ?? defaults.processing.advancedDetection
    },
    logging: {
      level: readOptionalString(logging, 'level', fail) ?? defaults.logging.level
    }
  });
}

/** Serialize settings to the YAML document layout. */
export function formatSettingsDocument(settings: ExportSettings): string {
  return stringifyYaml({
    version: settings.version,
    export: {
      include_ccli_in_filename: settings.export.includeCcliInFilename,
      include_author_in_filename: settings.export.includeAuthorInFilename,
      overwrite_existing: settings.export.overwriteExisting,
      preserve_formatting: settings.export.preserveFormatting,
      change_font: settings.export.changeFont,
      file_extension: settings.export.fileExtension,
      font: { ...settings.export.font },
      slides: {
        max_lines_per_slide: settings.export.slides.maxLinesPerSlide,
        auto_break_long_lines: settings.export.slides.autoBreakLongLines
      }
    },
    duplicate_handling: {
      default_action: settings.duplicateHandling.defaultAction,
      rename_pattern: settings.duplicateHandling.renamePattern,
      remember_choice: settings.duplicateHandling.rememberChoice
    },
    processing: {
      remove_chords: settings.processing.removeChords,
      advanced_detection: settings.processing.advancedDetection
    },
    logging: { ...settings.logging }
  });
}

/** Point the process logger's console level at the configured one. */
export function applyLoggingSettings(settings: ExportSettings): void {
  Logger.setLevel(parseLogLevel(settings.logging.level));
}

/**
 * Load settings from `filePath` and apply their log level. A missing file
 * is created with defaults; an older schema version is upgraded and
 * written back.
 */
export async function loadSettings(filePath: string): Promise<SettingsLoadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      await saveSettings(filePath, DEFAULT_SETTINGS);
      applyLoggingSettings(DEFAULT_SETTINGS);
      Logger.info('Created default settings', { path: filePath });
      return { settings: DEFAULT_SETTINGS, created: true, migrated: false };
    }
    throw error;
  }

  const settings = parseSettingsDocument(raw, filePath);
  applyLoggingSettings(settings);
  if (compareVersions(settings.version, SETTINGS_SCHEMA_VERSION) < 0) {
    Logger.info('Migrating settings', { path: filePath, from: settings.version, to: SETTINGS_SCHEMA_VERSION });
    const migrated = resolveSettings({ version: SETTINGS_SCHEMA_VERSION }, settings);
    await saveSettings(filePath, migrated);
    return { settings: migrated, created: false, migrated: true };
  }

  return { settings, created: false, migrated: false };
}

/** Write settings, stamping the current schema version. */
export async function saveSettings(filePath: string, settings: ExportSettings): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const stamped = resolveSettings({ version: SETTINGS_SCHEMA_VERSION }, settings);
  await writeFile(filePath, formatSettingsDocument(stamped), 'utf8');
}

/** Font family, size and color used by text encodings for these settings. */
export function effectiveFont(settings: ExportSettings): FontSettings {
  if (settings.export.preserveFormatting && settings.export.changeFont) {
    return { ...settings.export.font };
  }

  return { ...DEFAULT_TEXT_FONT };
}

/** Fixed text font used when font changes are disabled. */
export const DEFAULT_TEXT_FONT: Readonly<FontSettings> = Object.freeze({ family: 'Arial', size: 60, color: '#FFFFFF' });

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}
