import { describe, expect, it } from 'vitest';

import {
  createMappingTable,
  formatNumberedLabel,
  lookupLabel,
  mappingTableToRecord
} from '../../src/sections/mapping-table.js';

describe('section mapping table', () => {
  it('normalizes keys and skips empty ones', () => {
    const table = createMappingTable({ ' Vers ': 'Verse', '': 'Nothing', Chorus: 'Chorus' });

    expect(mappingTableToRecord(table)).toEqual({ vers: 'Verse', chorus: 'Chorus' });
    expect(lookupLabel(table, 'VERS')).toBe('Verse');
    expect(lookupLabel(table, 'bridge')).toBeUndefined();
  });

  it('accepts entry pairs and lets later keys win', () => {
    const table = createMappingTable([
      ['verse', 'Verse'],
      ['VERSE', 'Strophe']
    ]);

    expect(lookupLabel(table, 'verse')).toBe('Strophe');
    expect(table.entries.size).toBe(1);
  });

  it('is frozen', () => {
    const table = createMappingTable({ verse: 'Verse' });
    expect(Object.isFrozen(table)).toBe(true);
  });

  it('formats numbered labels with the configured template', () => {
    const table = createMappingTable({ vers: 'Verse' });
    const custom = createMappingTable({ vers: 'Verse' }, { numberFormat: '{section_name}-{number}' });
    const plain = createMappingTable({ vers: 'Verse' }, { preserveNumbers: false });

    expect(formatNumberedLabel(table, 'Verse', '2')).toBe('Verse 2');
    expect(formatNumberedLabel(table, 'Verse')).toBe('Verse');
    expect(formatNumberedLabel(custom, 'Verse', '2')).toBe('Verse-2');
    expect(formatNumberedLabel(plain, 'Verse', '2')).toBe('Verse');
  });
});
