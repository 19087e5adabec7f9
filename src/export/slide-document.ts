import { randomUUID } from 'node:crypto';

import { effectiveFont, type ExportSettings, type SlideSettings } from '../core/settings.js';
import type { Section, SongRecord } from '../core/song.js';
import { formatSectionLabel, sectionColor } from '../sections/section-labels.js';
import { encodeSlideText, type TextEncodings } from './text-encodings.js';

export const CANVAS_WIDTH = 1920;
export const CANVAS_HEIGHT = 1080;
export const TEXT_PADDING = 20;

/** Text box placement: `{x y z width height}` on the canvas. */
export interface TextBounds {
  x: number;
  y: number;
  z: number;
  width: number;
  height: number;
}

export interface SlideTextElement {
  uuid: string;
  bounds: TextBounds;
  encodings: TextEncodings;
}

export interface Slide {
  uuid: string;
  text: SlideTextElement;
}

export interface SlideGroup {
  uuid: string;
  name: string;
  color: string;
  slides: Slide[];
}

/** Song metadata carried on the document root. */
export interface DocumentMetadata {
  title: string;
  author: string;
  copyright: string;
  publisher: string;
  ccliNumber: string;
  notes: string;
}

/** In-memory slide document, one group per non-empty section. */
export interface SlideDocument {
  width: number;
  height: number;
  /** `YYYY-MM-DDTHH:mm:ss+00:00` in UTC. */
  lastDateUsed: string;
  metadata: DocumentMetadata;
  groups: SlideGroup[];
}

/** Injectable clock and id source; defaults are the wall clock and random UUIDs. */
export interface DocumentBuildOptions {
  now?: () => Date;
  newId?: () => string;
}

/** True when at least one section has non-blank content. */
export function hasExportableContent(sections: readonly Section[]): boolean {
  return sections.some((section) => section.content.trim().length > 0);
}

/** Canvas shrunk by `padding` on every side. */
export function textBounds(width: number, height: number, padding: number = TEXT_PADDING): TextBounds {
  return { x: padding, y: padding, z: 0, width: width - padding * 2, height: height - padding * 2 };
}

/**
 * Break section content into slide texts: first at blank lines, then,
 * when auto-breaking is on, into runs of at most `maxLinesPerSlide` lines.
 */
export function splitIntoSlides(content: string, settings: SlideSettings): string[] {
  const chunks: string[][] = [];
  let current: string[] = [];

  for (const line of content.split('\n')) {
    if (line.trim()) {
      current.push(line.trimEnd());
    } else if (current.length > 0) {
      chunks.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    chunks.push(current);
  }

  const max = settings.maxLinesPerSlide;
  return chunks.flatMap((chunk) => {
    if (!settings.autoBreakLongLines || chunk.length <= max) {
      return [chunk.join('\n')];
    }

    const pieces: string[] = [];
    for (let start = 0; start < chunk.length; start += max) {
      pieces.push(chunk.slice(start, start + max).join('\n'));
    }
    return pieces;
  });
}

export function formatLastDateUsed(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

/** Assemble the slide document tree for one song. */
export function buildSlideDocument(
  song: SongRecord,
  sections: readonly Section[],
  settings: ExportSettings,
  options: DocumentBuildOptions = {}
): SlideDocument {
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? (() => randomUUID().toUpperCase());
  const font = effectiveFont(settings);
  const bounds = textBounds(CANVAS_WIDTH, CANVAS_HEIGHT);

  const groups = sections
    .filter((section) => section.content.trim().length > 0)
    .map(
      (section): SlideGroup => ({
        uuid: newId(),
        name: formatSectionLabel(section.type),
        color: sectionColor(section.type),
        slides: splitIntoSlides(section.content, settings.export.slides).map(
          (text): Slide => ({
            uuid: newId(),
            text: { uuid: newId(), bounds, encodings: encodeSlideText(text, font) }
          })
        )
      })
    );

  return {
    width: CANVAS_WIDTH,
    height: CANVAS_HEIGHT,
    lastDateUsed: formatLastDateUsed(now()),
    metadata: {
      title: song.title,
      author: song.author,
      copyright: song.copyright,
      publisher: song.publisher,
      ccliNumber: song.referenceNumber,
      notes: song.description
    },
    groups
  };
}
