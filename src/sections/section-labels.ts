/** Display names for known section types. */
const DISPLAY_NAMES: ReadonlyMap<string, string> = new Map([
  ['verse', 'Verse'],
  ['chorus', 'Chorus'],
  ['bridge', 'Bridge'],
  ['pre-chorus', 'Pre-Chorus'],
  ['intro', 'Intro'],
  ['outro', 'Outro'],
  ['ending', 'Ending'],
  ['tag', 'Tag'],
  ['interlude', 'Interlude'],
  ['vamp', 'Vamp']
]);

const TYPE_ALIASES: ReadonlyMap<string, string> = new Map([
  ['refrain', 'chorus'],
  ['prechorus', 'pre-chorus'],
  ['pre chorus', 'pre-chorus']
]);

/** Group colors as `r g b a` with components in 0..1. */
const SECTION_COLORS: ReadonlyMap<string, string> = new Map([
  ['verse', '0 0 1 1'],
  ['chorus', '1 0 0.2 1'],
  ['bridge', '0.4 0.8 1 1'],
  ['pre-chorus', '0.5 0 0.5 1'],
  ['intro', '0.5 0.5 0.5 1'],
  ['outro', '0.5 0.5 0.5 1'],
  ['ending', '0.5 0.5 0.5 1'],
  ['tag', '1 0.5 0 1'],
  ['interlude', '0 0.6 0 1']
]);

export const DEFAULT_SECTION_COLOR = '0 0 0 1';

/** A section type split into its base name and optional number. */
export interface SectionTypeParts {
  base: string;
  number?: string;
}

export function splitSectionType(type: string): SectionTypeParts {
  const trimmed = type.trim().replace(/\s+/g, ' ');
  const match = /^(.*?)\s*(\d+)$/.exec(trimmed);
  if (match?.[1] && match[2]) {
    return { base: match[1], number: match[2] };
  }
  return { base: trimmed };
}

/** Lowercased base type with aliases resolved, e.g. `Refrain 2` -> `chorus`. */
export function canonicalSectionType(type: string): string {
  const base = splitSectionType(type).base.toLowerCase();
  return TYPE_ALIASES.get(base) ?? base;
}

/**
 * Display name for a section type. Known types get their canonical
 * spelling, others are title-cased; a trailing number is kept.
 */
export function formatSectionLabel(type: string): string {
  const { base, number } = splitSectionType(type);
  const name = DISPLAY_NAMES.get(canonicalSectionType(base)) ?? titleCase(base);
  return number ? `${name} ${number}` : name;
}

export function sectionColor(type: string): string {
  return SECTION_COLORS.get(canonicalSectionType(type)) ?? DEFAULT_SECTION_COLOR;
}

function titleCase(value: string): string {
  return value
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
