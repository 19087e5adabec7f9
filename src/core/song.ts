/** Song metadata as supplied by the song library source. */
export interface SongRecord {
  id: number | string;
  title: string;
  author: string;
  copyright: string;
  /** Publisher or rights administrator. */
  publisher: string;
  /** CCLI song number; empty when the song has none. */
  referenceNumber: string;
  description: string;
  tags: string;
}

/** Loosely-shaped record as read from storage, before normalization. */
export interface RawSongRecord {
  id: number | string;
  title?: string | null;
  author?: string | null;
  copyright?: string | null;
  publisher?: string | null;
  referenceNumber?: string | number | null;
  description?: string | null;
  tags?: string | null;
}

/** Plain text recovered from a rich-text lyric body. */
export interface ParsedText {
  plainText: string;
  /** Right-trimmed lines; blank lines are kept. */
  lines: string[];
  hasContent: boolean;
}

/** One typed song section in document order. */
export interface Section {
  /** Canonical label, optionally followed by ` N`. */
  type: string;
  content: string;
}

/** Section type emitted when no marker applies. */
export const DEFAULT_SECTION_TYPE = 'verse';

/** Normalize absent metadata fields to empty strings. */
export function normalizeSongRecord(raw: RawSongRecord): SongRecord {
  return {
    id: raw.id,
    title: raw.title ?? '',
    author: raw.author ?? '',
    copyright: raw.copyright ?? '',
    publisher: raw.publisher ?? '',
    referenceNumber: raw.referenceNumber === null || raw.referenceNumber === undefined ? '' : String(raw.referenceNumber),
    description: raw.description ?? '',
    tags: raw.tags ?? ''
  };
}

/** Order songs by title, ignoring case; equal titles keep their input order. */
export function sortSongsByTitle(songs: readonly SongRecord[]): SongRecord[] {
  return songs
    .map((song, index) => ({ song, index, key: song.title.toLowerCase() }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : a.index - b.index))
    .map((entry) => entry.song);
}
