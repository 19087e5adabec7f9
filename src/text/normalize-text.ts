import { collapseBlankLines, normalizeLineEndings, rightTrimLines } from './lines.js';

/** Character counts from the most recent `TextCleaner.clean` call. */
export interface CleaningStats {
  originalLength: number;
  cleanedLength: number;
  charactersRemoved: number;
}

/** Options for one normalization call. */
export interface CleanTextOptions {
  /** Apply lyric transforms (repetition marks, spacing, capitalization). */
  forSong?: boolean;
  /** Drop chord annotations; only honored with `forSong`. */
  removeChords?: boolean;
}

const CONTROL_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['\u0000', ''],
  ['\u000b', '\n'],
  ['\u000c', '\n'],
  ['\u00a0', ' '],
  ['\u2028', '\n'],
  ['\u2029', '\n\n']
];

const PUNCTUATION_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['\u201c', '"'],
  ['\u201d', '"'],
  ['\u2018', "'"],
  ['\u2019', "'"],
  ['\u2013', '-'],
  ['\u2014', '-'],
  ['\u2026', '...']
];

const CHORD = String.raw`\[?[A-G][#b]?(?:maj|min|m|dim|aug|sus|add)?[0-9]*\]?`;
const BRACKETED_CHORD = new RegExp(String.raw`\[${CHORD}\]`, 'g');
const PARENTHESIZED_CHORD = new RegExp(String.raw`\(${CHORD}\)`, 'g');
const LEADING_CHORD = new RegExp(String.raw`^${CHORD}[ \t]+`, 'gm');

const REPETITION_MARKS: readonly RegExp[] = [/\(x\d+\)/gim, /\(\d+x\)/gim, /\[x\d+\]/gim, /\[\d+x\]/gim, /(?:x\d+)+$/gim];

/**
 * Normalize recovered lyric text. Total: never throws, `''` for empty input.
 * The result is a fixed point, so cleaning it again changes nothing.
 */
export function cleanText(text: string, forSong = true, removeChords = false): string {
  if (!text) {
    return '';
  }

  // A later step can expose input for an earlier one, so repeat until stable.
  let current = text;
  let next = cleanOnce(current, forSong, removeChords);
  while (next !== current) {
    current = next;
    next = cleanOnce(current, forSong, removeChords);
  }
  return current;
}

/** Stateful cleaner that records how much the last call removed. */
export class TextCleaner {
  private lastStats: CleaningStats = { originalLength: 0, cleanedLength: 0, charactersRemoved: 0 };
  private readonly forSong: boolean;
  private readonly removeChords: boolean;

  constructor(options: CleanTextOptions = {}) {
    this.forSong = options.forSong ?? true;
    this.removeChords = this.forSong && (options.removeChords ?? false);
  }

  public clean(text: string): string {
    const cleaned = cleanText(text, this.forSong, this.removeChords);
    this.lastStats = {
      originalLength: text.length,
      cleanedLength: cleaned.length,
      charactersRemoved: text.length - cleaned.length
    };
    return cleaned;
  }

  public get stats(): CleaningStats {
    return { ...this.lastStats };
  }
}

function cleanOnce(text: string, forSong: boolean, removeChords: boolean): string {
  let out = removeResidualMarkup(text);
  out = substituteControls(out);
  out = normalizeWhitespace(out);
  out = rightTrimLines(collapseBlankLines(out));
  out = replaceAll(out, PUNCTUATION_SUBSTITUTIONS).trim();

  if (!forSong) {
    return out;
  }

  if (removeChords) {
    out = removeChordNotations(out);
  }
  out = removeRepetitionMarks(out);
  out = fixLyricSpacing(out);
  out = capitalizeLines(out);

  return rightTrimLines(collapseBlankLines(normalizeWhitespace(out))).trim();
}

function removeResidualMarkup(text: string): string {
  return text
    .replace(/\\[a-z]+\d*/g, '')
    .replace(/\{[^}]*\}/g, '')
    .replace(/\\'[0-9a-f]{2}/g, '')
    .replaceAll('\\{', '{')
    .replaceAll('\\}', '}')
    .replace(/\\{2,}/g, '\\');
}

function substituteControls(text: string): string {
  const substituted = replaceAll(normalizeLineEndings(text), CONTROL_SUBSTITUTIONS);
  return substituted.replace(/[\u0000-\u0008\u000b-\u001f]/g, '');
}

function normalizeWhitespace(text: string): string {
  return text.replaceAll('\t', '  ').replace(/ {2,}/g, ' ');
}

/** Strip `[C]`, `(Am7)` and chords leading a line. */
export function removeChordNotations(text: string): string {
  return text.replace(BRACKETED_CHORD, '').replace(PARENTHESIZED_CHORD, '').replace(LEADING_CHORD, '');
}

/** Strip `(x2)`, `(2x)`, `[x2]`, `[2x]` and a trailing run of `x2`. */
export function removeRepetitionMarks(text: string): string {
  return REPETITION_MARKS.reduce((out, pattern) => out.replace(pattern, ''), text);
}

function fixLyricSpacing(text: string): string {
  return text
    .replace(/([.!?])(\p{L})/gu, '$1 $2')
    .replace(/\([^\S\n]+/g, '(')
    .replace(/[^\S\n]+\)/g, ')');
}

function capitalizeLines(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      const start = line.search(/\S/);
      if (start < 0) {
        return line;
      }
      return line.slice(0, start) + line.charAt(start).toUpperCase() + line.slice(start + 1);
    })
    .join('\n');
}

function replaceAll(text: string, pairs: ReadonlyArray<readonly [string, string]>): string {
  return pairs.reduce((out, [from, to]) => out.replaceAll(from, to), text);
}
