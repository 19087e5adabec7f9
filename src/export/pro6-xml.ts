import { XMLBuilder, XMLParser } from 'fast-xml-parser';

import { parseXmlToAst, walkXml } from '../parser/xml-ast.js';
import type { Slide, SlideDocument, SlideGroup, TextBounds } from './slide-document.js';

/** Element to serialize; string children are text. */
export interface XmlElementSpec {
  name: string;
  attributes?: Record<string, string>;
  children?: XmlChild[];
}

export type XmlChild = XmlElementSpec | string;

/** fast-xml-parser's `preserveOrder` node shape. */
type OrderedNode = Record<string, unknown>;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="no"?>';

const VERSION_NUMBER = '600';
const CREATOR_CODE = '1349676880';

const ATTRIBUTE_PREFIX = '@_';

const compactBuilder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressBooleanAttributes: false,
  suppressEmptyNode: false,
  format: false
});

const prettyBuilder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressBooleanAttributes: false,
  suppressEmptyNode: true,
  format: true,
  indentBy: '  '
});

const orderedParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true
});

const SELF_CLOSING_TAG = /<([A-Za-z_][\w:.-]*)((?:\s+[^\s=/>]+\s*=\s*"[^"]*")*)\s*\/>/g;

/** Rewrite every `<tag .../>` into `<tag ...></tag>`. */
export function expandSelfClosingTags(xml: string): string {
  return xml.replace(SELF_CLOSING_TAG, (_tag: string, name: string, attributes: string) => `<${name}${attributes}></${name}>`);
}

/** Re-indent compact XML. The printer collapses empty elements, so expand them again. */
export function prettyPrintXml(xml: string): string {
  const parsed: unknown = orderedParser.parse(xml);
  return expandSelfClosingTags(buildString(prettyBuilder, parsed).trim());
}

/** Serialize an element tree without whitespace between elements. */
export function buildCompactXml(root: XmlElementSpec): string {
  return buildString(compactBuilder, [toOrderedNode(root)]);
}

/**
 * Serialize a slide document. Empty containers keep explicit open and
 * close tags before and after pretty printing; the result is re-read to
 * confirm it is well formed.
 */
export function serializeSlideDocument(document: SlideDocument): string {
  const compact = expandSelfClosingTags(buildCompactXml(slideDocumentElement(document)));
  const xml = `${XML_DECLARATION}\n${prettyPrintXml(compact)}\n`;

  const selfClosing = walkXml(parseXmlToAst(xml)).filter((node) => node.selfClosing);
  if (selfClosing.length > 0) {
    throw new Error(`Serialized document has self-closing elements: ${selfClosing.map((node) => node.path).join(', ')}`);
  }

  return xml;
}

/** Element tree for a slide document. */
export function slideDocumentElement(document: SlideDocument): XmlElementSpec {
  const { metadata } = document;
  const hasCcli = metadata.ccliNumber.trim().length > 0;

  return {
    name: 'RVPresentationDocument',
    attributes: {
      height: String(document.height),
      width: String(document.width),
      versionNumber: VERSION_NUMBER,
      docType: '0',
      creatorCode: CREATOR_CODE,
      lastDateUsed: document.lastDateUsed,
      usedCount: '0',
      category: 'Song',
      resourcesDirectory: '',
      backgroundColor: '0 0 0 1',
      drawingBackgroundColor: 'false',
      notes: metadata.notes,
      artist: metadata.author,
      author: metadata.author,
      album: '',
      CCLIDisplay: hasCcli ? 'true' : 'false',
      CCLIArtistCredits: metadata.author,
      CCLISongTitle: metadata.title,
      CCLIPublisher: metadata.publisher,
      CCLICopyrightYear: '',
      CCLICopyright: metadata.copyright,
      CCLIAuthor: metadata.author,
      CCLISongNumber: metadata.ccliNumber,
      CCLILicenseNumber: '',
      chordChartPath: ''
    },
    children: [
      {
        name: 'RVTimeline',
        attributes: {
          timeOffset: '0',
          duration: '0',
          selectedMediaTrackIndex: '0',
          loop: 'false',
          rvXMLIvarName: 'timeline'
        },
        children: [ivarArray('timeCues'), ivarArray('mediaTracks')]
      },
      ivarArray('groups', document.groups.map(groupElement)),
      ivarArray('arrangements')
    ]
  };
}

function groupElement(group: SlideGroup): XmlElementSpec {
  return {
    name: 'RVSlideGrouping',
    attributes: { name: group.name, uuid: group.uuid, color: group.color },
    children: [ivarArray('slides', group.slides.map(slideElement))]
  };
}

function slideElement(slide: Slide): XmlElementSpec {
  const { text } = slide;

  return {
    name: 'RVDisplaySlide',
    attributes: {
      backgroundColor: '0 0 0 1',
      highlightColor: '',
      drawingBackgroundColor: 'false',
      enabled: 'true',
      hotKey: '',
      label: '',
      notes: '',
      UUID: slide.uuid,
      chordChartPath: ''
    },
    children: [
      ivarArray('cues'),
      ivarArray('displayElements', [
        {
          name: 'RVTextElement',
          attributes: {
            displayName: 'Default',
            UUID: text.uuid,
            typeID: '0',
            displayDelay: '0',
            locked: 'false',
            persistent: 'false',
            fromTemplate: 'false',
            opacity: '1',
            source: '',
            bezelRadius: '0',
            rotation: '0',
            drawingFill: 'false',
            drawingShadow: 'false',
            drawingStroke: 'false',
            fillColor: '1 1 1 0',
            adjustsHeightToFit: 'false',
            verticalAlignment: '0',
            revealType: '0'
          },
          children: [
            { name: 'RVRect3D', attributes: { rvXMLIvarName: 'position' }, children: [formatBounds(text.bounds)] },
            { name: 'shadow', attributes: { rvXMLIvarName: 'shadow' }, children: ['0|0 0 0 0.3333333432674408|{4, -4}'] },
            { name: 'dictionary', attributes: { rvXMLIvarName: 'stroke' } },
            ivarString('PlainText', text.encodings.plainText),
            ivarString('RTFData', text.encodings.rtfData),
            ivarString('WinFlowData', text.encodings.winFlowData),
            ivarString('WinFontData', text.encodings.winFontData)
          ]
        }
      ])
    ]
  };
}

export function formatBounds(bounds: TextBounds): string {
  return `{${bounds.x} ${bounds.y} ${bounds.z} ${bounds.width} ${bounds.height}}`;
}

function ivarArray(ivarName: string, children: XmlChild[] = []): XmlElementSpec {
  return { name: 'array', attributes: { rvXMLIvarName: ivarName }, children };
}

function ivarString(ivarName: string, value: string): XmlElementSpec {
  return { name: 'NSString', attributes: { rvXMLIvarName: ivarName }, children: [value] };
}

function toOrderedNode(child: XmlChild): OrderedNode {
  if (typeof child === 'string') {
    return { '#text': child };
  }

  const node: OrderedNode = { [child.name]: (child.children ?? []).map(toOrderedNode) };
  if (child.attributes) {
    node[':@'] = Object.fromEntries(
      Object.entries(child.attributes).map(([key, value]) => [`${ATTRIBUTE_PREFIX}${key}`, value])
    );
  }
  return node;
}

function buildString(builder: XMLBuilder, nodes: unknown): string {
  const xml: unknown = builder.build(nodes);
  if (typeof xml !== 'string') {
    throw new TypeError('XML builder returned a non-string result');
  }
  return xml;
}
