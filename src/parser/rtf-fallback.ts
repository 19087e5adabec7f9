import { replaceUnicodeEscapes } from './unicode-escapes.js';

// Private-use placeholders that keep escaped literals out of the stripping passes.
const BACKSLASH = '\ue000';
const OPEN_BRACE = '\ue001';
const CLOSE_BRACE = '\ue002';

/**
 * Pattern-based reduction used when the tokenizing reducer gives up.
 * Works on unbalanced markup at the cost of dropping some text that sits
 * inside unknown groups.
 */
export function reduceRichTextManually(markup: string, onUndecodable?: (escape: string) => void): string {
  let text = markup
    .replace(/\\\\/g, BACKSLASH)
    .replace(/\\\{/g, OPEN_BRACE)
    .replace(/\\\}/g, CLOSE_BRACE);

  text = replaceUnicodeEscapes(text, onUndecodable);
  text = text.replace(/\\'([0-9a-fA-F]{2})/g, (_escape: string, hex: string) => decodeWindows1252(hex));

  text = text.trim().replace(/^\{\\rtf\d* ?/, '').replace(/\}$/, '');

  text = text.replace(/\\(?:par|line)(?![a-z])(?:-?\d+)? ?/g, '\n');

  text = text
    .replace(/\{\\fonttbl[^}]*\}/g, '')
    .replace(/\{\\colortbl[^}]*\}/g, '')
    .replace(/\{\\[^}]*\}/g, '')
    .replace(/\\[a-z]+-?\d* ?/g, '')
    .replace(/[{}]/g, '');

  return text.replaceAll(OPEN_BRACE, '{').replaceAll(CLOSE_BRACE, '}').replaceAll(BACKSLASH, '\\');
}

const windows1252 = new TextDecoder('windows-1252');

function decodeWindows1252(hex: string): string {
  return windows1252.decode(Uint8Array.of(Number.parseInt(hex, 16)));
}
