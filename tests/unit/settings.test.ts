import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Logger } from '../../src/core/logger.js';
import {
  DEFAULT_SETTINGS,
  effectiveFont,
  formatSettingsDocument,
  loadSettings,
  parseSettingsDocument,
  resolveSettings,
  SettingsError
} from '../../src/core/settings.js';
import { compareVersions } from '../../src/core/versions.js';

describe('settings documents', () => {
  it('uses the defaults for an empty document', () => {
    expect(parseSettingsDocument('')).toBe(DEFAULT_SETTINGS);
  });

  it('fills missing keys from the defaults', () => {
    const settings = parseSettingsDocument(
      [
        'export:',
        '  include_ccli_in_filename: true',
        '  slides:',
        '    max_lines_per_slide: 2',
        'duplicate_handling:',
        '  default_action: rename',
        ''
      ].join('\n')
    );

    expect(settings.version).toBe('1.0.0');
    expect(settings.export.includeCcliInFilename).toBe(true);
    expect(settings.export.slides).toEqual({ maxLinesPerSlide: 2, autoBreakLongLines: true });
    expect(settings.duplicateHandling.defaultAction).toBe('rename');
    expect(settings.export.fileExtension).toBe('.pro6');
  });

  it('rejects fields of the wrong type', () => {
    expect(() => parseSettingsDocument('duplicate_handling:\n  default_action: maybe\n')).toThrow(
      "Settings error: 'default_action' must be one of 'ask', 'skip', 'overwrite', 'rename'"
    );
    expect(() => parseSettingsDocument('export:\n  file_extension: pro6\n')).toThrow(SettingsError);
    expect(() => parseSettingsDocument('export:\n  font:\n    size: 0\n')).toThrow(SettingsError);
  });

  it('round-trips through YAML', () => {
    const settings = resolveSettings({ export: { overwriteExisting: true, font: { family: 'Georgia' } } });
    expect(parseSettingsDocument(formatSettingsDocument(settings))).toEqual(settings);
  });

  it('merges overrides into a frozen snapshot', () => {
    const settings = resolveSettings({ export: { font: { size: 40 } }, processing: { removeChords: true } });

    expect(settings.export.font).toEqual({ family: 'Arial', size: 40, color: '#FFFFFF' });
    expect(settings.processing).toEqual({ removeChords: true, advancedDetection: false });
    expect(Object.isFrozen(settings.export.font)).toBe(true);
  });

  it('uses the configured font only when font changes are enabled', () => {
    const custom = { export: { font: { family: 'Georgia', size: 40, color: '#FFD700' } } };
    const fixed = { family: 'Arial', size: 60, color: '#FFFFFF' };

    expect(effectiveFont(DEFAULT_SETTINGS)).toEqual(fixed);
    expect(effectiveFont(resolveSettings(custom))).toEqual(fixed);
    expect(effectiveFont(resolveSettings({ export: { ...custom.export, changeFont: true } }))).toEqual({
      family: 'Georgia',
      size: 40,
      color: '#FFD700'
    });
  });

  it('rejects font colors that are not #RRGGBB', () => {
    expect(() => parseSettingsDocument('export:\n  font:\n    color: white\n')).toThrow(SettingsError);
    expect(() => resolveSettings({ export: { font: { color: '#FFF' } } })).toThrow(SettingsError);
    expect(parseSettingsDocument("export:\n  font:\n    color: '#00ff00'\n").export.font.color).toBe('#00ff00');
  });
});

describe('loadSettings', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'settings-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('creates a default settings file', async () => {
    const filePath = path.join(workDir, 'settings.yaml');

    const first = await loadSettings(filePath);
    const second = await loadSettings(filePath);

    expect(first).toEqual({ settings: DEFAULT_SETTINGS, created: true, migrated: false });
    expect(second).toEqual({ settings: DEFAULT_SETTINGS, created: false, migrated: false });
  });

  it('migrates an older file and writes it back', async () => {
    const filePath = path.join(workDir, 'settings.yaml');
    await writeFile(filePath, 'version: 1.0.0\nprocessing:\n  advanced_detection: true\n', 'utf8');

    const loaded = await loadSettings(filePath);

    expect(loaded.migrated).toBe(true);
    expect(loaded.settings.version).toBe('1.2.0');
    expect(loaded.settings.processing.advancedDetection).toBe(true);
    expect(parseSettingsDocument(await readFile(filePath, 'utf8')).version).toBe('1.2.0');
  });

  it('applies the configured log level', async () => {
    const filePath = path.join(workDir, 'settings.yaml');
    await writeFile(filePath, 'version: 1.2.0\nlogging:\n  level: WARNING\n', 'utf8');

    await loadSettings(filePath);

    expect(Logger.level).toBe('warn');
    Logger.setLevel('info');
  });
});

describe('compareVersions', () => {
  it('compares dotted versions numerically', () => {
    expect(compareVersions('1.2', '1.2.0')).toBe(0);
    expect(compareVersions('1.10.0', '1.9.9')).toBe(1);
    expect(compareVersions('1.0.0', '1.1.0')).toBe(-1);
  });
});
