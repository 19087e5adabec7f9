import type { ExportSettings } from '../core/settings.js';
import type { SongRecord } from '../core/song.js';

/** Name used when a title sanitizes to nothing. */
export const UNTITLED_FILENAME = 'Untitled_Song';

/** In code points. */
export const MAX_FILENAME_LENGTH = 200;

/**
 * Make one filename component safe for common filesystems.
 * Returns `''` when nothing usable remains.
 */
export function cleanFilenamePart(value: string): string {
  const cleaned = value
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, ' ');

  return trimSpacesAndDots(Array.from(trimSpacesAndDots(cleaned)).slice(0, MAX_FILENAME_LENGTH).join(''));
}

/** Sanitize a song title into a base filename, never empty. */
export function sanitizeFilename(title: string): string {
  return cleanFilenamePart(title) || UNTITLED_FILENAME;
}

/** Filename for a song: title, optional `_<ccli>` and `_<author>`, then the extension. */
export function deriveFilename(song: SongRecord, settings: ExportSettings): string {
  const parts = [sanitizeFilename(song.title)];

  if (settings.export.includeCcliInFilename) {
    const ccli = cleanFilenamePart(song.referenceNumber);
    if (ccli) {
      parts.push(ccli);
    }
  }

  if (settings.export.includeAuthorInFilename) {
    const author = cleanFilenamePart(song.author);
    if (author) {
      parts.push(author);
    }
  }

  return `${parts.join('_')}${settings.export.fileExtension}`;
}

/** Expand a rename pattern such as `{name}_{number}`. */
export function applyRenamePattern(pattern: string, name: string, number: number): string {
  return pattern.replaceAll('{name}', name).replaceAll('{number}', String(number));
}

function trimSpacesAndDots(value: string): string {
  return value.replace(/^[ .]+|[ .]+$/g, '');
}
