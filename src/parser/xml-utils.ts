import type { XmlNode } from './xml-ast.js';

/** Return first child matching `name`, if present. */
export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node?.children.find((child) => child.name === name);
}

/** Return all children matching `name`. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  return node?.children.filter((child) => child.name === name) ?? [];
}

/** First child named `name` whose `key` attribute equals `value`. */
export function childWithAttribute(
  node: XmlNode | undefined,
  name: string,
  key: string,
  value: string
): XmlNode | undefined {
  return node?.children.find((child) => child.name === name && child.attributes[key] === value);
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** Parse base-10 integer values with `undefined` on failure. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
