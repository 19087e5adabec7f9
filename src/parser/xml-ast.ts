import { SaxesParser, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Immutable element node read back from serialized XML. */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
  location: XmlLocation;
  /** XPath-like position, e.g. `/root[1]/array[2]`. */
  path: string;
  /** Written as `<name/>` rather than an open/close pair. */
  selfClosing: boolean;
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

interface MutableXmlNode extends XmlNode {
  children: MutableXmlNode[];
  childNameCount: Map<string, number>;
}

/**
 * Parse XML into a lightweight AST with locations and sibling-indexed paths.
 * Throws `XmlParseError` on the first well-formedness error.
 */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  const parser = new SaxesParser({ position: true, fileName: sourceName });

  let root: MutableXmlNode | undefined;
  const stack: MutableXmlNode[] = [];
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;

  parser.on('error', (error) => {
    parseError ??= new XmlParseError(error.message, { line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({ line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentag', (tag) => {
    const parent = stack.at(-1);
    const node: MutableXmlNode = {
      name: tag.name,
      attributes: toAttributeMap(tag),
      children: [],
      text: '',
      location: openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 },
      path: buildPath(parent, tag.name),
      selfClosing: tag.isSelfClosing,
      childNameCount: new Map<string, number>()
    };

    if (parent) {
      parent.children.push(node);
    } else {
      root = node;
    }

    stack.push(node);
  });

  parser.on('text', (text) => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  });

  parser.on('closetag', () => {
    stack.pop();
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!root) {
    throw new XmlParseError('No XML root element found');
  }

  return freezeNode(root);
}

/** Every element in document order, root first. */
export function walkXml(node: XmlNode): XmlNode[] {
  return [node, ...node.children.flatMap(walkXml)];
}

function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(tag.attributes)) {
    out[key] = typeof value === 'string' ? value : value.value;
  }
  return out;
}

function buildPath(parent: MutableXmlNode | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}

function freezeNode(node: MutableXmlNode): XmlNode {
  return {
    name: node.name,
    attributes: node.attributes,
    children: node.children.map(freezeNode),
    text: node.text,
    location: node.location,
    path: node.path,
    selfClosing: node.selfClosing
  };
}
