import { createDiagnostic, type Diagnostic } from '../core/diagnostics.js';
import { Logger } from '../core/logger.js';
import { errorMessage, fail, succeed, type StageResult } from '../core/result.js';
import type { ParsedText } from '../core/song.js';
import { collapseBlankLines, normalizeLineEndings, rightTrimLines, splitLines } from '../text/lines.js';
import { reduceRichTextManually } from './rtf-fallback.js';
import { reduceRichText } from './rtf-reduce.js';
import { replaceUnicodeEscapes } from './unicode-escapes.js';

/** Why a lyric body produced no parsed text. */
export type ParseFailureReason = 'empty' | 'failed';

/** Tagged outcome of parsing one lyric body. */
export type ParseOutcome = StageResult<ParsedText, ParseFailureReason>;

/**
 * Parse a rich-text lyric body into plain text and lines.
 *
 * Blank or absent input is `empty`, not an error. The tokenizing reducer runs
 * first; if it throws, the pattern-based reducer takes over. A failure in
 * both is reported as `failed`.
 */
export function parseRichText(raw: string | null | undefined): ParseOutcome {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return fail('empty', [createDiagnostic('RTF_EMPTY', 'info', 'No lyric content to parse.')]);
  }

  const diagnostics: Diagnostic[] = [];
  const reportUndecodable = (escape: string): void => {
    diagnostics.push(createDiagnostic('RTF_UNDECODABLE_ESCAPE', 'warning', `Cannot decode Unicode escape ${escape}.`));
  };

  let reduced: string;
  try {
    reduced = reduceRichText(raw);
  } catch (primaryError) {
    Logger.warn('Rich-text reduction failed, using manual reduction', { error: errorMessage(primaryError) });
    diagnostics.push(
      createDiagnostic('RTF_PRIMARY_FAILED', 'warning', `Falling back to manual reduction: ${errorMessage(primaryError)}`)
    );

    try {
      reduced = reduceRichTextManually(raw, reportUndecodable);
    } catch (fallbackError) {
      Logger.error('Rich-text parsing failed', { error: errorMessage(fallbackError) });
      diagnostics.push(createDiagnostic('RTF_PARSE_FAILED', 'error', errorMessage(fallbackError)));
      return fail('failed', diagnostics);
    }
  }

  const plainText = cleanParsedText(replaceUnicodeEscapes(reduced, reportUndecodable));
  const lines = splitLines(plainText);
  Logger.debug('Parsed rich text', { lines: lines.length });

  return succeed(
    {
      plainText,
      lines,
      hasContent: plainText.trim().length > 0
    },
    diagnostics
  );
}

/** Tidy reduced text: drop leftover control words and normalize lines. */
export function cleanParsedText(text: string): string {
  const withoutArtifacts = text.replace(/\\[a-z]+\d*/g, '');
  return rightTrimLines(collapseBlankLines(normalizeLineEndings(withoutArtifacts))).trim();
}

/**
 * Stateful parser facade that keeps the message of the last failure.
 * `parse` returns `null` for both empty and failed input.
 */
export class RichTextParser {
  private lastErrorMessage: string | undefined;

  public get lastError(): string | undefined {
    return this.lastErrorMessage;
  }

  public parse(raw: string | null | undefined): ParsedText | null {
    const outcome = parseRichText(raw);
    if (outcome.ok) {
      return outcome.value;
    }

    if (outcome.reason === 'failed') {
      this.lastErrorMessage = outcome.diagnostics.find((diagnostic) => diagnostic.severity === 'error')?.message;
    }
    return null;
  }
}

/** Parse with a throwaway parser; `null` means no usable content. */
export function parse(raw: string | null | undefined): ParsedText | null {
  return new RichTextParser().parse(raw);
}
