import { access } from 'node:fs/promises';
import path from 'node:path';

import { Logger } from '../core/logger.js';
import { errorMessage } from '../core/result.js';
import { DEFAULT_SETTINGS, isNotFound, type DuplicateAction, type ExportSettings } from '../core/settings.js';
import type { Section, SongRecord } from '../core/song.js';
import { applyRenamePattern, cleanFilenamePart, deriveFilename, UNTITLED_FILENAME } from './filename.js';
import { exportSong, NO_CONTENT_CODE, type ExportOptions } from './export-song.js';

/** What to do when the target file already exists. */
export type DuplicatePolicy = DuplicateAction;

/** Answer from the duplicate-file prompt. */
export interface DuplicateDecision {
  action: 'skip' | 'overwrite' | 'rename' | 'rename-custom' | 'cancel';
  /** Base name for `rename-custom`, without extension. */
  customName?: string;
  /** Reuse this decision for the remaining duplicates in the batch. */
  applyToAll?: boolean;
}

/** Synchronous prompt; `remaining` counts songs not yet exported, including this one. */
export type DuplicateResolver = (existingPath: string, remaining: number) => DuplicateDecision;

/**
 * Called before each song starts with its 0-based index and title, then
 * once with `(total, total, 'Export complete')` (or the cancelled label).
 */
export type ProgressListener = (current: number, total: number, label: string) => void;

export interface BatchItem {
  song: SongRecord;
  sections: readonly Section[];
}

export interface BatchFailure {
  songId: number | string;
  songTitle: string;
  message: string;
  /** No content to export; not an error in the song itself. */
  skippable: boolean;
}

export interface BatchResult {
  successes: string[];
  failures: BatchFailure[];
  /** Target paths left alone because a file was already there. */
  skipped: string[];
  cancelled: boolean;
}

export interface BatchOptions extends Omit<ExportOptions, 'targetPath'> {
  /** Overrides the policy derived from settings. */
  duplicatePolicy?: DuplicatePolicy;
  resolveDuplicate?: DuplicateResolver;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

export const EXPORT_COMPLETE_LABEL = 'Export complete';
export const EXPORT_CANCELLED_LABEL = 'Export cancelled';

/** Policy in force for a batch: explicit option, then overwrite flag, then the stored default. */
export function duplicatePolicyFor(settings: ExportSettings, override?: DuplicatePolicy): DuplicatePolicy {
  if (override) {
    return override;
  }
  return settings.export.overwriteExisting ? 'overwrite' : settings.duplicateHandling.defaultAction;
}

/**
 * Export songs one after another. A failing song is recorded and the
 * batch moves on; cancellation is checked between songs only.
 */
export async function exportBatch(
  items: readonly BatchItem[],
  destinationDir: string,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const policy = duplicatePolicyFor(settings, options.duplicatePolicy);
  const result: BatchResult = { successes: [], failures: [], skipped: [], cancelled: false };
  const total = items.length;
  let remembered: DuplicateDecision | undefined;

  for (const [index, item] of items.entries()) {
    if (options.signal?.aborted) {
      Logger.info('Batch export cancelled', { exported: result.successes.length, remaining: total - index });
      result.cancelled = true;
      break;
    }

    const { song } = item;
    options.onProgress?.(index, total, song.title);

    try {
      const initialPath = path.join(destinationDir, deriveFilename(song, settings));
      let targetPath = initialPath;

      if (await fileExists(initialPath)) {
        const decision = remembered ?? decideDuplicate(policy, initialPath, total - index, options.resolveDuplicate);
        if (!remembered && (decision.applyToAll || settings.duplicateHandling.rememberChoice)) {
          remembered = decision;
        }

        if (decision.action === 'cancel') {
          Logger.info('Batch export cancelled at duplicate', { songId: song.id, path: initialPath });
          result.cancelled = true;
          break;
        }

        if (decision.action === 'skip') {
          Logger.info('Skipped existing file', { songId: song.id, songTitle: song.title, path: initialPath });
          result.skipped.push(initialPath);
          continue;
        }

        if (decision.action === 'rename') {
          const baseName = path.basename(initialPath, settings.export.fileExtension);
          targetPath = await nextFreePath(destinationDir, baseName, settings, false);
        } else if (decision.action === 'rename-custom') {
          const baseName = cleanFilenamePart(decision.customName ?? '') || UNTITLED_FILENAME;
          targetPath = await nextFreePath(destinationDir, baseName, settings, true);
        }
      }

      const outcome = await exportSong(song, item.sections, destinationDir, { ...options, settings, targetPath });
      if (outcome.ok) {
        result.successes.push(outcome.value);
      } else {
        result.failures.push({
          songId: song.id,
          songTitle: song.title,
          message: outcome.reason,
          skippable: outcome.diagnostics.some((diagnostic) => diagnostic.code === NO_CONTENT_CODE)
        });
      }
    } catch (error) {
      const message = `Unexpected error exporting '${song.title}': ${errorMessage(error)}`;
      Logger.error('Unexpected batch export error', { songId: song.id, songTitle: song.title, error: message });
      result.failures.push({ songId: song.id, songTitle: song.title, message, skippable: false });
    }
  }

  options.onProgress?.(total, total, result.cancelled ? EXPORT_CANCELLED_LABEL : EXPORT_COMPLETE_LABEL);
  return result;
}

/**
 * Short human summary: counts, then at most `maxMessages` failure
 * messages with a note about the rest.
 */
export function summarizeBatch(result: BatchResult, maxMessages = 5): string {
  const lines = [`Exported ${result.successes.length} song(s).`];

  if (result.skipped.length > 0) {
    lines.push(`Skipped ${result.skipped.length} existing file(s).`);
  }

  if (result.failures.length > 0) {
    lines.push(`Failed to export ${result.failures.length} song(s):`);
    for (const failure of result.failures.slice(0, maxMessages)) {
      lines.push(`- ${failure.message}`);
    }
    if (result.failures.length > maxMessages) {
      lines.push(`...and ${result.failures.length - maxMessages} more (see log for details).`);
    }
  }

  if (result.cancelled) {
    lines.push('Export was cancelled before all songs were processed.');
  }

  return lines.join('\n');
}

function decideDuplicate(
  policy: DuplicatePolicy,
  existingPath: string,
  remaining: number,
  resolve: DuplicateResolver | undefined
): DuplicateDecision {
  if (policy !== 'ask') {
    return { action: policy };
  }

  if (!resolve) {
    Logger.warn('No duplicate prompt available, skipping existing file', { path: existingPath });
    return { action: 'skip' };
  }

  return resolve(existingPath, remaining);
}

/**
 * First free target for `baseName`: the plain name when `tryPlain` is set
 * and free, else the rename pattern with the smallest free n from 1.
 */
async function nextFreePath(
  destinationDir: string,
  baseName: string,
  settings: ExportSettings,
  tryPlain: boolean
): Promise<string> {
  const extension = settings.export.fileExtension;
  const plain = path.join(destinationDir, `${baseName}${extension}`);
  if (tryPlain && !(await fileExists(plain))) {
    return plain;
  }

  for (let number = 1; ; number += 1) {
    const candidate = path.join(
      destinationDir,
      `${applyRenamePattern(settings.duplicateHandling.renamePattern, baseName, number)}${extension}`
    );
    if (!(await fileExists(candidate))) {
      return candidate;
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}
