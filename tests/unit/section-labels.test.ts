import { describe, expect, it } from 'vitest';

import {
  canonicalSectionType,
  DEFAULT_SECTION_COLOR,
  formatSectionLabel,
  sectionColor,
  splitSectionType
} from '../../src/sections/section-labels.js';

describe('section labels', () => {
  it('splits a trailing number off the type', () => {
    expect(splitSectionType('Verse 2')).toEqual({ base: 'Verse', number: '2' });
    expect(splitSectionType('verse2')).toEqual({ base: 'verse', number: '2' });
    expect(splitSectionType('Chorus')).toEqual({ base: 'Chorus' });
    expect(splitSectionType('12')).toEqual({ base: '12' });
  });

  it('resolves aliases to canonical types', () => {
    expect(canonicalSectionType('Refrain 2')).toBe('chorus');
    expect(canonicalSectionType('Pre Chorus')).toBe('pre-chorus');
    expect(canonicalSectionType('VERSE')).toBe('verse');
  });

  it('formats display labels', () => {
    expect(formatSectionLabel('chorus')).toBe('Chorus');
    expect(formatSectionLabel('verse 3')).toBe('Verse 3');
    expect(formatSectionLabel('refrain')).toBe('Chorus');
    expect(formatSectionLabel('prechorus')).toBe('Pre-Chorus');
    expect(formatSectionLabel('special SONG')).toBe('Special Song');
  });

  it('colors groups by canonical type', () => {
    expect(sectionColor('Verse')).toBe('0 0 1 1');
    expect(sectionColor('Chorus 2')).toBe('1 0 0.2 1');
    expect(sectionColor('Vamp')).toBe(DEFAULT_SECTION_COLOR);
  });
});
