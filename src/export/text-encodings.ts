import { encodeUnicodeEscapes } from '../parser/unicode-escapes.js';
import { normalizeLineEndings } from '../text/lines.js';

/** Font family, point size and `#RRGGBB` color written into the rich encodings. */
export interface TextFont {
  family: string;
  size: number;
  color: string;
}

/** The four parallel payloads carried by a slide text element, all base64. */
export interface TextEncodings {
  plainText: string;
  rtfData: string;
  winFlowData: string;
  winFontData: string;
}

const FLOW_NAMESPACE = 'http://schemas.microsoft.com/winfx/2006/xaml/presentation';

/** Font metadata blob; identical for every text element. */
export const FONT_DATA_XML =
  '<?xml version="1.0" encoding="utf-16"?>' +
  '<RVFont xmlns:i="http://www.w3.org/2001/XMLSchema-instance" ' +
  'xmlns="http://schemas.datacontract.org/2004/07/ProPresenter.Common">' +
  '<Kerning>0</Kerning><LineSpacing>0</LineSpacing>' +
  '<OutlineColor xmlns:d2p1="http://schemas.datacontract.org/2004/07/System.Windows.Media">' +
  '<d2p1:A>255</d2p1:A><d2p1:B>0</d2p1:B><d2p1:G>0</d2p1:G><d2p1:R>0</d2p1:R>' +
  '<d2p1:ScA>1</d2p1:ScA><d2p1:ScB>0</d2p1:ScB><d2p1:ScG>0</d2p1:ScG><d2p1:ScR>0</d2p1:ScR>' +
  '</OutlineColor><OutlineWidth>0</OutlineWidth><Variants>Normal</Variants></RVFont>';

/** `FONT_DATA_XML` as stored: UTF-8 bytes, base64. */
export const FONT_DATA_BASE64 = encodeBase64(FONT_DATA_XML);

export function encodeBase64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

export function decodeBase64(payload: string): string {
  return Buffer.from(payload, 'base64').toString('utf8');
}

/** Convert any line ending style to CRLF. */
export function toCrlf(text: string): string {
  return normalizeLineEndings(text).replace(/\n/g, '\r\n');
}

/** Escape rich-text specials; non-ASCII becomes `\uN?`. */
export function escapeRichText(text: string): string {
  return encodeUnicodeEscapes(text.replace(/[\\{}]/g, (special) => `\\${special}`));
}

export function escapeXmlText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Rich-text body: four font slots (f4 carries the configured family),
 * text in color table slot 2, one centered paragraph per non-blank line.
 * Sizes are in half-points.
 */
export function buildRtfDocument(content: string, font: TextFont): string {
  const halfPoints = font.size * 2;
  const paragraphs = contentLines(content)
    .map((line) => `{\\cf2\\ltrch ${escapeRichText(line)}}\\li0\\sa0\\sb0\\fi0\\qc\\par`)
    .join('\r\n');

  return (
    '{\\rtf1\\prortf1\\ansi\\ansicpg1252\\uc1\\htmautsp\\deff2' +
    '{\\fonttbl{\\f0\\fcharset0 Times New Roman;}{\\f2\\fcharset0 Georgia;}{\\f3\\fcharset0 Arial;}' +
    `{\\f4\\fcharset0 ${escapeRichText(font.family)};}}` +
    `{\\colortbl;\\red0\\green0\\blue0;${rtfColor(font.color)}}` +
    '\\loch\\hich\\dbch\\pard\\slleading0\\plain\\ltrpar\\itap0' +
    `{\\lang1033\\fs${halfPoints}\\f3\\cf1 \\cf1\\qc` +
    `{\\fs${halfPoints}\\f4 ${paragraphs}}\r\n}}`
  );
}

/** Flow document with one centered paragraph per non-blank line. */
export function buildFlowDocument(content: string, font: TextFont): string {
  const family = escapeXmlText(font.family);
  const paragraphs = contentLines(content)
    .map(
      (line) =>
        `<Paragraph Margin="0,0,0,0" TextAlignment="Center" FontFamily="${family}" FontSize="${font.size}">` +
        `<Run FontFamily="${family}" FontSize="${font.size}" Foreground="${flowColor(font.color)}" ` +
        'Block.TextAlignment="Center">' +
        `${escapeXmlText(line)}</Run></Paragraph>`
    )
    .join('');

  return (
    `<FlowDocument TextAlignment="Center" PagePadding="5,0,5,0" AllowDrop="True" xmlns="${FLOW_NAMESPACE}">` +
    `${paragraphs}</FlowDocument>`
  );
}

/** Encode one slide's text in all four representations. */
export function encodeSlideText(content: string, font: TextFont): TextEncodings {
  return {
    plainText: encodeBase64(toCrlf(content)),
    rtfData: encodeBase64(buildRtfDocument(content, font)),
    winFlowData: encodeBase64(buildFlowDocument(content, font)),
    winFontData: FONT_DATA_BASE64
  };
}

function rtfColor(color: string): string {
  const channel = (start: number): number => Number.parseInt(color.slice(start, start + 2), 16);
  return `\\red${channel(1)}\\green${channel(3)}\\blue${channel(5)};`;
}

/** `#RRGGBB` as an opaque `#AARRGGBB` brush. */
function flowColor(color: string): string {
  return `#FF${color.slice(1).toUpperCase()}`;
}

function contentLines(content: string): string[] {
  return normalizeLineEndings(content)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
