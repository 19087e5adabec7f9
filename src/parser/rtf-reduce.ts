import { decodeUnicodeCode } from './unicode-escapes.js';

/** Raised when the markup's group structure cannot be followed. */
export class RichTextStructureError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (offset ${offset})`);
    this.name = 'RichTextStructureError';
    this.offset = offset;
  }
}

/** Destinations whose whole group is skipped. */
const IGNORED_DESTINATIONS: ReadonlySet<string> = new Set([
  'annotation',
  'author',
  'colortbl',
  'comment',
  'company',
  'creatim',
  'datastore',
  'doccomm',
  'field',
  'fldinst',
  'fonttbl',
  'footer',
  'footerf',
  'footerl',
  'footerr',
  'footnote',
  'generator',
  'header',
  'headerf',
  'headerl',
  'headerr',
  'info',
  'keywords',
  'latentstyles',
  'listoverridetable',
  'listtable',
  'listtext',
  'object',
  'objdata',
  'operator',
  'pict',
  'printim',
  'revtbl',
  'revtim',
  'rsidtbl',
  'shpinst',
  'stylesheet',
  'subject',
  'themedata',
  'title',
  'xmlnstext'
]);

/** Control words that stand for text. */
const TEXT_WORDS: ReadonlyMap<string, string> = new Map([
  ['par', '\n'],
  ['line', '\n'],
  ['row', '\n'],
  ['sect', '\n\n'],
  ['page', '\n\n'],
  ['tab', '\t'],
  ['cell', '|'],
  ['nestcell', '|'],
  ['emdash', '\u2014'],
  ['endash', '\u2013'],
  ['emspace', '\u2003'],
  ['enspace', '\u2002'],
  ['qmspace', '\u2005'],
  ['bullet', '\u2022'],
  ['lquote', '\u2018'],
  ['rquote', '\u2019'],
  ['ldblquote', '\u201c'],
  ['rdblquote', '\u201d']
]);

const TOKEN_PATTERN = /\\([a-z]{1,32})(-?\d{1,10})?[ ]?|\\'([0-9a-f]{2})|\\([^a-z])|([{}])|[\r\n]+|([\s\S])/gi;

/** Group state saved on `{` and restored on `}`. */
interface GroupState {
  ucSkip: number;
  ignorable: boolean;
}

/**
 * Reduce rich-text markup to plain text.
 *
 * Source line breaks are insignificant; paragraphs come only from control
 * words. `\uN` escapes go through the override table and skip the next
 * `ucSkip` fallback characters. Throws `RichTextStructureError` when a group
 * closes that was never opened.
 */
export function reduceRichText(markup: string): string {
  const stack: GroupState[] = [];
  const out: string[] = [];
  const hexDecoder = new TextDecoder('windows-1252');

  let ucSkip = 1;
  let ignorable = false;
  let pendingSkip = 0;
  let pendingHex: number[] = [];

  const flushHex = (): void => {
    if (pendingHex.length > 0) {
      out.push(hexDecoder.decode(Uint8Array.from(pendingHex)));
      pendingHex = [];
    }
  };

  for (const match of markup.matchAll(TOKEN_PATTERN)) {
    const [, word, arg, hex, symbol, brace, literal] = match;

    if (hex === undefined) {
      flushHex();
    }

    if (brace !== undefined) {
      pendingSkip = 0;
      if (brace === '{') {
        stack.push({ ucSkip, ignorable });
        continue;
      }

      const restored = stack.pop();
      if (!restored) {
        throw new RichTextStructureError('Unbalanced group close', match.index ?? 0);
      }
      ({ ucSkip, ignorable } = restored);
      continue;
    }

    if (symbol !== undefined) {
      pendingSkip = 0;
      if (symbol === '*') {
        ignorable = true;
      } else if (!ignorable) {
        out.push(controlSymbolText(symbol));
      }
      continue;
    }

    if (word !== undefined) {
      pendingSkip = 0;
      const name = word.toLowerCase();
      if (IGNORED_DESTINATIONS.has(name)) {
        ignorable = true;
      } else if (ignorable) {
        continue;
      } else if (name === 'uc') {
        ucSkip = Number.parseInt(arg ?? '1', 10);
      } else if (name === 'u') {
        const code = Number.parseInt(arg ?? '', 10);
        out.push(Number.isNaN(code) ? '' : (decodeUnicodeCode(code) ?? ''));
        pendingSkip = ucSkip;
      } else {
        const text = TEXT_WORDS.get(name);
        if (text !== undefined) {
          out.push(text);
        }
      }
      continue;
    }

    if (hex !== undefined) {
      if (pendingSkip > 0) {
        pendingSkip -= 1;
      } else if (!ignorable) {
        pendingHex.push(Number.parseInt(hex, 16));
      }
      continue;
    }

    if (literal !== undefined) {
      if (pendingSkip > 0) {
        pendingSkip -= 1;
      } else if (!ignorable) {
        out.push(literal);
      }
    }
  }

  flushHex();
  return out.join('');
}

/** Text for a `\` + non-letter control symbol. */
function controlSymbolText(symbol: string): string {
  switch (symbol) {
    case '{':
    case '}':
    case '\\':
      return symbol;
    case '~':
      return '\u00a0';
    case '_':
      return '\u2011';
    case '\n':
    case '\r':
      return '\n';
    default:
      return '';
  }
}
