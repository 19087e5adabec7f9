import { Logger } from '../core/logger.js';
import { DEFAULT_SECTION_TYPE, type Section } from '../core/song.js';
import { formatNumberedLabel, type SectionMappingTable } from './mapping-table.js';

/** `standard` reads marker lines only; `advanced` adds repetition heuristics. */
export type DetectionMode = 'standard' | 'advanced';

export interface SectionDetection {
  sections: Section[];
  hasSections: boolean;
}

/** A recognized marker line. */
export interface MarkerMatch {
  label: string;
  number?: string;
}

/**
 * Partition normalized lyric text into typed sections.
 *
 * Text before the first marker becomes a `verse` section, and empty
 * sections are dropped. Advanced mode only applies when the marker pass
 * finds nothing beyond a single default verse.
 */
export function detectSections(
  text: string,
  table: SectionMappingTable,
  mode: DetectionMode = 'standard'
): SectionDetection {
  const standard = detectByMarkers(text, table);
  if (mode === 'standard' || standard.hasSections) {
    return standard;
  }

  const heuristic = detectByRepetition(text);
  if (heuristic.length === 0) {
    return standard;
  }

  Logger.debug('Detected sections by repetition', { sections: heuristic.length });
  return { sections: heuristic, hasSections: true };
}

function detectByMarkers(text: string, table: SectionMappingTable): SectionDetection {
  if (!text.trim()) {
    return { sections: [], hasSections: false };
  }

  const sections: Section[] = [];
  let currentType: string | undefined;
  let buffer: string[] = [];

  const flush = (): void => {
    const content = buffer.join('\n').trim();
    if (content) {
      sections.push({ type: currentType ?? DEFAULT_SECTION_TYPE, content });
    }
    buffer = [];
  };

  for (const line of text.split('\n')) {
    const marker = matchMarkerLine(line, table);
    if (marker) {
      flush();
      currentType = formatNumberedLabel(table, marker.label, marker.number);
    } else {
      buffer.push(line);
    }
  }
  flush();

  if (sections.length === 0) {
    Logger.debug('No section markers found, using a single verse');
    sections.push({ type: DEFAULT_SECTION_TYPE, content: text.trim() });
  }

  const first = sections[0];
  const hasSections = sections.length > 1 || (first !== undefined && first.type !== DEFAULT_SECTION_TYPE);
  return { sections, hasSections };
}

/**
 * Recognize a marker line: the exact key, the key followed by a number
 * (`vers 2`, `verse2`), or the key followed by a colon.
 */
export function matchMarkerLine(line: string, table: SectionMappingTable): MarkerMatch | undefined {
  const candidate = line.trim().toLowerCase();
  if (!candidate) {
    return undefined;
  }

  const exact = table.entries.get(candidate);
  if (exact !== undefined) {
    return { label: exact };
  }

  for (const [key, label] of table.entries) {
    if (!candidate.startsWith(key)) {
      continue;
    }

    const rest = candidate.slice(key.length);
    const numbered = /^\s*(\d+)$/.exec(rest);
    if (numbered?.[1]) {
      return { label, number: numbered[1] };
    }

    if (rest.startsWith(':')) {
      const number = /^:\s*(\d+)$/.exec(rest)?.[1];
      return number ? { label, number } : { label };
    }
  }

  return undefined;
}

/**
 * Label blank-line paragraphs as `chorus` (the most repeated, when it
 * repeats) or `verse`. Ties go to the paragraph that appears first.
 * Returns nothing when there are fewer than two paragraphs.
 */
function detectByRepetition(text: string): Section[] {
  const paragraphs = text
    .split('\n\n')
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);

  if (paragraphs.length < 2) {
    return [];
  }

  const counts = new Map<string, number>();
  for (const paragraph of paragraphs) {
    counts.set(paragraph, (counts.get(paragraph) ?? 0) + 1);
  }

  let chorus: string | undefined;
  let best = 1;
  for (const [paragraph, count] of counts) {
    if (count > best) {
      chorus = paragraph;
      best = count;
    }
  }

  return paragraphs.map((paragraph) => ({
    type: paragraph === chorus ? 'chorus' : DEFAULT_SECTION_TYPE,
    content: paragraph
  }));
}
