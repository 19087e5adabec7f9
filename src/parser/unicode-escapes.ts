/**
 * Characters the lyric source writes at specific `\uN` codes.
 *
 * This table wins over plain code-point conversion. Code 180 is used by the
 * source both for an acute accent and as a stray apostrophe; the accent is
 * kept unconditionally.
 */
export const UNICODE_OVERRIDES: ReadonlyMap<number, string> = new Map([
  [228, 'ä'],
  [229, 'å'],
  [246, 'ö'],
  [180, '´'],
  [8217, "'"],
  [8220, '"'],
  [8221, '"'],
  [8211, '–'],
  [8212, '—']
]);

const MAX_CODE_POINT = 0x10ffff;

/**
 * Resolve one `\uN` argument to text.
 * Negative arguments are signed 16-bit values and get 65536 added.
 * Returns `undefined` when the code cannot name a character.
 */
export function decodeUnicodeCode(code: number): string | undefined {
  const override = UNICODE_OVERRIDES.get(code);
  if (override !== undefined) {
    return override;
  }

  const corrected = code < 0 ? code + 65536 : code;
  if (!Number.isInteger(corrected) || corrected < 0 || corrected > MAX_CODE_POINT) {
    return undefined;
  }

  return String.fromCodePoint(corrected);
}

const UNICODE_ESCAPE_PATTERN = /\\u(-?\d+)\??/g;

/**
 * Replace literal `\uN?` / `\uN` escapes left in text.
 * Escapes that do not decode stay as written and are reported to `onUndecodable`.
 */
export function replaceUnicodeEscapes(text: string, onUndecodable?: (escape: string) => void): string {
  return text.replace(UNICODE_ESCAPE_PATTERN, (escape: string, digits: string) => {
    const decoded = decodeUnicodeCode(Number.parseInt(digits, 10));
    if (decoded === undefined) {
      onUndecodable?.(escape);
      return escape;
    }
    return decoded;
  });
}

/**
 * Encode text for a `\ansicpg1252` rich-text body: ASCII passes through,
 * everything else becomes `\uN?` with N as a signed 16-bit value.
 */
export function encodeUnicodeEscapes(text: string): string {
  let out = '';
  for (let index = 0; index < text.length; index += 1) {
    const unit = text.charCodeAt(index);
    if (unit < 0x80) {
      out += text.charAt(index);
      continue;
    }

    const signed = unit > 0x7fff ? unit - 0x10000 : unit;
    out += `\\u${signed}?`;
  }
  return out;
}
