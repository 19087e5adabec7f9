import { describe, expect, it } from 'vitest';

import { detectSections, matchMarkerLine } from '../../src/sections/detect-sections.js';
import { createMappingTable } from '../../src/sections/mapping-table.js';

const table = createMappingTable({
  vers: 'Verse',
  verse: 'Verse',
  chorus: 'Chorus',
  'refräng': 'Chorus',
  bridge: 'Bridge'
});

describe('matchMarkerLine', () => {
  it('matches exact, numbered and colon markers', () => {
    expect(matchMarkerLine('  Chorus ', table)).toEqual({ label: 'Chorus' });
    expect(matchMarkerLine('Vers 2', table)).toEqual({ label: 'Verse', number: '2' });
    expect(matchMarkerLine('verse2', table)).toEqual({ label: 'Verse', number: '2' });
    expect(matchMarkerLine('Chorus:', table)).toEqual({ label: 'Chorus' });
    expect(matchMarkerLine('Verse: 3', table)).toEqual({ label: 'Verse', number: '3' });
  });

  it('ignores lyric lines that merely start with a key', () => {
    expect(matchMarkerLine('Versatile words', table)).toBeUndefined();
    expect(matchMarkerLine('Chorus of angels', table)).toBeUndefined();
    expect(matchMarkerLine('   ', table)).toBeUndefined();
  });
});

describe('detectSections', () => {
  it('splits text at marker lines', () => {
    const text = 'Vers 1\nLine a\nLine b\n\nRefräng\nLine c\n\nVers 2\nLine d';

    expect(detectSections(text, table)).toEqual({
      sections: [
        { type: 'Verse 1', content: 'Line a\nLine b' },
        { type: 'Chorus', content: 'Line c' },
        { type: 'Verse 2', content: 'Line d' }
      ],
      hasSections: true
    });
  });

  it('puts text before the first marker in a verse', () => {
    expect(detectSections('Opening line\nChorus\nSing', table).sections).toEqual([
      { type: 'verse', content: 'Opening line' },
      { type: 'Chorus', content: 'Sing' }
    ]);
  });

  it('drops numbers when the table does not preserve them', () => {
    const plain = createMappingTable({ vers: 'Verse' }, { preserveNumbers: false });

    expect(detectSections('Vers 2\nLine', plain)).toEqual({
      sections: [{ type: 'Verse', content: 'Line' }],
      hasSections: true
    });
  });

  it('returns one verse for text without markers', () => {
    expect(detectSections('Just words\nMore words', table)).toEqual({
      sections: [{ type: 'verse', content: 'Just words\nMore words' }],
      hasSections: false
    });
  });

  it('returns nothing for blank text', () => {
    expect(detectSections('  \n ', table)).toEqual({ sections: [], hasSections: false });
  });

  describe('advanced mode', () => {
    const empty = createMappingTable({});

    it('labels the most repeated paragraph as the chorus', () => {
      const text = 'Verse one\n\nSame chorus\n\nVerse two\n\nSame chorus';

      expect(detectSections(text, empty, 'advanced')).toEqual({
        sections: [
          { type: 'verse', content: 'Verse one' },
          { type: 'chorus', content: 'Same chorus' },
          { type: 'verse', content: 'Verse two' },
          { type: 'chorus', content: 'Same chorus' }
        ],
        hasSections: true
      });
    });

    it('breaks ties by first appearance', () => {
      const types = detectSections('A\n\nB\n\nB\n\nA', empty, 'advanced').sections.map((section) => section.type);
      expect(types).toEqual(['chorus', 'verse', 'verse', 'chorus']);
    });

    it('labels every paragraph a verse when nothing repeats', () => {
      const types = detectSections('A\n\nB', empty, 'advanced').sections.map((section) => section.type);
      expect(types).toEqual(['verse', 'verse']);
    });

    it('keeps the single verse for one paragraph', () => {
      expect(detectSections('Only one', empty, 'advanced')).toEqual({
        sections: [{ type: 'verse', content: 'Only one' }],
        hasSections: false
      });
    });

    it('keeps marker results when markers are present', () => {
      const text = 'Chorus\nSing\n\nSing';
      expect(detectSections(text, table, 'advanced').sections).toEqual([{ type: 'Chorus', content: 'Sing\n\nSing' }]);
    });
  });
});
