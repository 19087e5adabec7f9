import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { Logger } from '../core/logger.js';
import { isNotFound } from '../core/settings.js';
import { compareVersions } from '../core/versions.js';
import {
  isRecord,
  readOptionalBoolean,
  readOptionalRecord,
  readOptionalString,
  readOptionalStringArray,
  readOptionalStringMap,
  type FieldErrorFactory
} from '../core/yaml-fields.js';
import { DEFAULT_SECTION_MAPPINGS } from './lexicons.js';
import { createMappingTable, type SectionMappingTable } from './mapping-table.js';

export const MAPPING_DOCUMENT_VERSION = '1.2.0';

const DEFAULT_LABEL_FORMAT = '{section_name} {number}';

const DEFAULT_NOTES: readonly string[] = [
  'Maps section marker words found in lyrics to slide group names',
  "Numbers are preserved: 'vers 1' becomes 'Verse 1'",
  'Matching ignores case'
];

/** Editable, versioned section mapping document. */
export interface MappingDocument {
  version: string;
  sectionMappings: Record<string, string>;
  numberRules: {
    preserveNumbers: boolean;
    format: string;
  };
  notes: string[];
}

export interface MappingDocumentLoadResult {
  document: MappingDocument;
  created: boolean;
  migrated: boolean;
}

/** Validation error for a malformed mapping document. */
export class MappingDocumentError extends Error {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(filePath ? `Mapping document error in ${filePath}: ${message}` : `Mapping document error: ${message}`);
    this.name = 'MappingDocumentError';
    this.filePath = filePath;
  }
}

export function createDefaultMappingDocument(): MappingDocument {
  return {
    version: MAPPING_DOCUMENT_VERSION,
    sectionMappings: { ...DEFAULT_SECTION_MAPPINGS },
    numberRules: { preserveNumbers: true, format: DEFAULT_LABEL_FORMAT },
    notes: [...DEFAULT_NOTES]
  };
}

/** Parse a YAML mapping document; keys are lowercased on the way in. */
export function parseMappingDocument(yamlText: string, filePath?: string): MappingDocument {
  const fail: FieldErrorFactory = (message) => new MappingDocumentError(message, filePath);

  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText);
  } catch (error) {
    throw fail(error instanceof Error ? error.message : 'invalid YAML');
  }

  if (!isRecord(parsed)) {
    throw fail('mapping document must be a YAML mapping');
  }

  const rules = readOptionalRecord(parsed, 'number_mapping_rules', fail) ?? {};
  const mappings = readOptionalStringMap(parsed, 'section_mappings', fail) ?? {};

  return {
    version: readOptionalString(parsed, 'version', fail) ?? '1.0.0',
    sectionMappings: Object.fromEntries(
      Object.entries(mappings).map(([term, label]) => [term.trim().toLowerCase(), label])
    ),
    numberRules: {
      preserveNumbers: readOptionalBoolean(rules, 'preserve_numbers', fail) ?? true,
      format: readOptionalString(rules, 'format', fail) ?? DEFAULT_LABEL_FORMAT
    },
    notes: readOptionalStringArray(parsed, 'notes', fail) ?? []
  };
}

export function formatMappingDocument(document: MappingDocument): string {
  return stringifyYaml({
    version: document.version,
    section_mappings: document.sectionMappings,
    number_mapping_rules: {
      preserve_numbers: document.numberRules.preserveNumbers,
      format: document.numberRules.format
    },
    notes: document.notes
  });
}

/**
 * Bring an older document up to the current version.
 * Documents from before 1.1.0 also receive the default notes when they have none.
 */
export function migrateMappingDocument(document: MappingDocument): MappingDocument {
  if (compareVersions(document.version, MAPPING_DOCUMENT_VERSION) >= 0) {
    return document;
  }

  const needsNotes = compareVersions(document.version, '1.1.0') < 0 && document.notes.length === 0;
  const notes = needsNotes ? [...DEFAULT_NOTES] : document.notes;
  return { ...document, version: MAPPING_DOCUMENT_VERSION, notes };
}

/**
 * Load the mapping document, writing the defaults on first run and
 * rewriting it after a migration.
 */
export async function loadMappingDocument(filePath: string): Promise<MappingDocumentLoadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      const document = createDefaultMappingDocument();
      await saveMappingDocument(filePath, document);
      Logger.info('Created default section mappings', { path: filePath });
      return { document, created: true, migrated: false };
    }
    throw error;
  }

  const document = parseMappingDocument(raw, filePath);
  const migrated = migrateMappingDocument(document);
  if (migrated !== document) {
    Logger.info('Migrated section mappings', { path: filePath, from: document.version, to: migrated.version });
    await saveMappingDocument(filePath, migrated);
    return { document: migrated, created: false, migrated: true };
  }

  return { document, created: false, migrated: false };
}

export async function saveMappingDocument(filePath: string, document: MappingDocument): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatMappingDocument({ ...document, version: MAPPING_DOCUMENT_VERSION }), 'utf8');
}

/** Snapshot a document as the read-only table the segmenter consumes. */
export function mappingTableFromDocument(document: MappingDocument): SectionMappingTable {
  return createMappingTable(document.sectionMappings, {
    preserveNumbers: document.numberRules.preserveNumbers,
    numberFormat: document.numberRules.format
  });
}
