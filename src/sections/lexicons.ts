import lexiconData from '../../data/section-lexicons.json' with { type: 'json' };

import { Logger } from '../core/logger.js';

/** Marker vocabulary per source language, term to English label. */
export const SOURCE_LEXICONS: Readonly<Record<string, Readonly<Record<string, string>>>> = lexiconData.sources;

/** Section names offered for each target language. */
export const TARGET_SECTION_NAMES: Readonly<Record<string, readonly string[]>> = lexiconData.targets;

/** Mappings written into a fresh mapping document. */
export const DEFAULT_SECTION_MAPPINGS: Readonly<Record<string, string>> = lexiconData.defaultMappings;

export const DEFAULT_TARGET_LANGUAGE = 'english';

/** Languages the marker vocabulary is drawn from, and the language labels are written in. */
export interface LanguageSelection {
  sourceLanguages: string[];
  targetLanguage: string;
}

export function availableSourceLanguages(): string[] {
  return Object.keys(SOURCE_LEXICONS);
}

export function availableTargetLanguages(): string[] {
  return Object.keys(TARGET_SECTION_NAMES);
}

/**
 * Normalize a language selection. Unknown source languages are dropped;
 * an unknown target falls back to English.
 */
export function selectLanguages(sourceLanguages: readonly string[], targetLanguage: string): LanguageSelection {
  const sources = sourceLanguages
    .map((language) => language.toLowerCase())
    .filter((language) => Object.hasOwn(SOURCE_LEXICONS, language));

  let target = targetLanguage.toLowerCase();
  if (!Object.hasOwn(TARGET_SECTION_NAMES, target)) {
    Logger.warn('Unknown target language, using English', { targetLanguage });
    target = DEFAULT_TARGET_LANGUAGE;
  }

  return { sourceLanguages: sources, targetLanguage: target };
}

export function targetSectionNames(selection: LanguageSelection): readonly string[] {
  return TARGET_SECTION_NAMES[selection.targetLanguage] ?? [];
}

/**
 * Merge the source lexicons in selection order; the first language to
 * define a term wins. Lexicon labels are English, so other targets get none.
 */
export function autoPopulateMappings(selection: LanguageSelection): Record<string, string> {
  if (selection.targetLanguage !== DEFAULT_TARGET_LANGUAGE) {
    Logger.info('Automatic mappings are only available for English targets', {
      targetLanguage: selection.targetLanguage
    });
    return {};
  }

  const mappings: Record<string, string> = {};
  for (const language of selection.sourceLanguages) {
    for (const [term, label] of Object.entries(SOURCE_LEXICONS[language] ?? {})) {
      const key = term.toLowerCase();
      if (!Object.hasOwn(mappings, key)) {
        mappings[key] = label;
      }
    }
  }

  Logger.info('Populated section mappings', { count: Object.keys(mappings).length });
  return mappings;
}

/** Every marker term known to the selected source languages. */
export function sourceTerms(selection: LanguageSelection): Set<string> {
  const terms = new Set<string>();
  for (const language of selection.sourceLanguages) {
    Object.keys(SOURCE_LEXICONS[language] ?? {}).forEach((term) => terms.add(term));
  }
  return terms;
}

/** Problems that make a selection unusable; empty when valid. */
export function validateLanguageSelection(
  selection: LanguageSelection,
  mappings: Readonly<Record<string, string>>
): string[] {
  const issues: string[] = [];

  if (selection.sourceLanguages.length === 0) {
    issues.push('No source languages selected');
  }

  if (!selection.targetLanguage) {
    issues.push('No target language selected');
  }

  if (selection.targetLanguage !== DEFAULT_TARGET_LANGUAGE && Object.keys(mappings).length === 0) {
    issues.push('Non-English target requires manual mappings');
  }

  if (selection.targetLanguage === DEFAULT_TARGET_LANGUAGE) {
    const unmapped = [...sourceTerms(selection)].filter((term) => !Object.hasOwn(mappings, term));
    if (unmapped.length > 0) {
      Logger.warn('Unmapped source terms', { terms: unmapped });
    }
  }

  return issues;
}
