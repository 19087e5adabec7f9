import { normalizeSongRecord, sortSongsByTitle, type RawSongRecord, type SongRecord } from '../core/song.js';

/** Supplies song metadata records. */
export interface SongSource {
  listSongs(): Promise<SongRecord[]>;
}

/** Supplies the rich-text lyric body for a song id; `null` when there is none. */
export interface LyricSource {
  getLyrics(songId: number | string): Promise<string | null>;
}

export interface LibraryEntry {
  song: RawSongRecord;
  lyrics?: string | null;
}

/** Song and lyric source held in memory, listed in title order. */
export class InMemorySongLibrary implements SongSource, LyricSource {
  private readonly songs: SongRecord[];
  private readonly lyrics = new Map<number | string, string | null>();

  constructor(entries: readonly LibraryEntry[] = []) {
    this.songs = sortSongsByTitle(entries.map((entry) => normalizeSongRecord(entry.song)));
    for (const entry of entries) {
      this.lyrics.set(entry.song.id, entry.lyrics ?? null);
    }
  }

  async listSongs(): Promise<SongRecord[]> {
    return this.songs.map((song) => ({ ...song }));
  }

  async getLyrics(songId: number | string): Promise<string | null> {
    return this.lyrics.get(songId) ?? null;
  }
}
