import { parseXmlToAst, type XmlNode } from '../parser/xml-ast.js';
import { attribute, childrenOf, childWithAttribute, firstChild, parseOptionalInt } from '../parser/xml-utils.js';
import { decodeBase64 } from './text-encodings.js';

/** Decoded view of one slide in a written document. */
export interface ReadSlide {
  uuid: string;
  plainText: string;
  rtfData: string;
  flowData: string;
  position: string;
}

export interface ReadSlideGroup {
  uuid: string;
  name: string;
  color: string;
  slides: ReadSlide[];
}

/** Summary of a serialized slide document, with payloads decoded. */
export interface ReadSlideDocument {
  width?: number;
  height?: number;
  title: string;
  ccliDisplay: boolean;
  attributes: Record<string, string>;
  groups: ReadSlideGroup[];
}

/** Read a serialized slide document back into plain values. */
export function readSlideDocument(xml: string, sourceName?: string): ReadSlideDocument {
  const root = parseXmlToAst(xml, sourceName);
  const groups = childrenOf(ivarArray(root, 'groups'), 'RVSlideGrouping').map(readGroup);

  return {
    width: parseOptionalInt(attribute(root, 'width')),
    height: parseOptionalInt(attribute(root, 'height')),
    title: attribute(root, 'CCLISongTitle') ?? '',
    ccliDisplay: attribute(root, 'CCLIDisplay') === 'true',
    attributes: root.attributes,
    groups
  };
}

function readGroup(group: XmlNode): ReadSlideGroup {
  return {
    uuid: attribute(group, 'uuid') ?? '',
    name: attribute(group, 'name') ?? '',
    color: attribute(group, 'color') ?? '',
    slides: childrenOf(ivarArray(group, 'slides'), 'RVDisplaySlide').map(readSlide)
  };
}

function readSlide(slide: XmlNode): ReadSlide {
  const element = firstChild(ivarArray(slide, 'displayElements'), 'RVTextElement');
  const payload = (ivarName: string): string => {
    const node = childWithAttribute(element, 'NSString', 'rvXMLIvarName', ivarName);
    return node ? decodeBase64(node.text.trim()) : '';
  };

  return {
    uuid: attribute(slide, 'UUID') ?? '',
    plainText: payload('PlainText'),
    rtfData: payload('RTFData'),
    flowData: payload('WinFlowData'),
    position: childWithAttribute(element, 'RVRect3D', 'rvXMLIvarName', 'position')?.text.trim() ?? ''
  };
}

function ivarArray(node: XmlNode | undefined, ivarName: string): XmlNode | undefined {
  return childWithAttribute(node, 'array', 'rvXMLIvarName', ivarName);
}
