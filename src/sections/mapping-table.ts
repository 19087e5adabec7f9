/** Default template for numbered section labels. */
export const DEFAULT_NUMBER_FORMAT = '{label} {number}';

/** How marker numbers carry into section labels. */
export interface NumberRules {
  preserveNumbers: boolean;
  /** Template with `{label}` (or `{section_name}`) and `{number}`. */
  numberFormat: string;
}

/**
 * Read-only snapshot of marker term to canonical label mappings.
 * Keys are trimmed and lowercased; a batch holds one snapshot throughout.
 */
export interface SectionMappingTable extends NumberRules {
  readonly entries: ReadonlyMap<string, string>;
}

export type MappingEntries = Iterable<readonly [string, string]> | Readonly<Record<string, string>>;

/** Build an immutable mapping table. Later duplicate keys replace earlier ones. */
export function createMappingTable(entries: MappingEntries, rules: Partial<NumberRules> = {}): SectionMappingTable {
  const map = new Map<string, string>();
  for (const [term, label] of toPairs(entries)) {
    const key = term.trim().toLowerCase();
    if (key) {
      map.set(key, label);
    }
  }

  return Object.freeze({
    entries: map,
    preserveNumbers: rules.preserveNumbers ?? true,
    numberFormat: rules.numberFormat ?? DEFAULT_NUMBER_FORMAT
  });
}

/** Case-insensitive lookup of a marker term. */
export function lookupLabel(table: SectionMappingTable, term: string): string | undefined {
  return table.entries.get(term.trim().toLowerCase());
}

/** Label for a marker, with the number applied per the table's rules. */
export function formatNumberedLabel(table: SectionMappingTable, label: string, number?: string): string {
  if (!number || !table.preserveNumbers) {
    return label;
  }

  return table.numberFormat
    .replaceAll('{label}', label)
    .replaceAll('{section_name}', label)
    .replaceAll('{number}', number)
    .trim();
}

/** Plain-object copy of the table entries, in insertion order. */
export function mappingTableToRecord(table: SectionMappingTable): Record<string, string> {
  return Object.fromEntries(table.entries);
}

function toPairs(entries: MappingEntries): Iterable<readonly [string, string]> {
  if (isIterable(entries)) {
    return entries;
  }
  return Object.entries(entries);
}

function isIterable(value: MappingEntries): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
