/**
 * XML parsing and building utilities
 *
 * Uses fast-xml-parser in preserve-order mode so that a parsed WordprocessingML
 * part can be mutated and written back without reordering siblings, trimming
 * text or coercing attribute values.
 */

import {
  XMLParser,
  XMLBuilder,
  XMLValidator,
  type X2jOptions,
  type XmlBuilderOptions,
} from 'fast-xml-parser';
import { DocumentFormatError } from './errors';

const PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',

  textNodeName: '#text',
  cdataPropName: '#cdata',
  commentPropName: '#comment',

  preserveOrder: true,
  removeNSPrefix: false,

  // Values stay strings: w:id="007" must round-trip as written
  parseTagValue: false,
  parseAttributeValue: false,

  // Run text is significant whitespace
  trimValues: false,

  // htmlEntities also decodes numeric references (&#8217;, &#x4E2D;)
  processEntities: true,
  htmlEntities: true,
  allowBooleanAttributes: true,
};

const BUILDER_OPTIONS: Partial<XmlBuilderOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  cdataPropName: '#cdata',
  commentPropName: '#comment',
  preserveOrder: true,
  format: false,
  suppressEmptyNode: false,
  suppressBooleanAttributes: false,
};

const parser = new XMLParser(PARSER_OPTIONS);
const builder = new XMLBuilder(BUILDER_OPTIONS);

/**
 * XML node representation from fast-xml-parser with preserveOrder: true
 *
 * Structure: { tagName: [...children], ':@': { '@_attrName': 'value' } }
 * Text nodes: { '#text': 'content' }
 */
export interface XmlNode {
  [tagName: string]: XmlNode[] | XmlAttributes | string | undefined;
  ':@'?: XmlAttributes;
  '#text'?: string;
}

export interface XmlAttributes {
  [attrName: string]: string;
}

/**
 * Parse an XML string into preserve-order nodes.
 *
 * The input is validated first; fast-xml-parser is lenient and would otherwise
 * hand back a partial tree for truncated or unbalanced markup.
 *
 * @param partName Used in the error message only
 */
export function parseXml(xml: string, partName = 'xml'): XmlNode[] {
  const validation = XMLValidator.validate(xml, { allowBooleanAttributes: true });
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new DocumentFormatError(
      'INVALID_XML',
      `Malformed XML in ${partName} at line ${line}, column ${col}: ${msg}`
    );
  }
  return parser.parse(xml);
}

/**
 * Build an XML string from nodes.
 * The ?xml declaration node is dropped; addXmlDeclaration writes it separately.
 */
export function buildXml(nodes: XmlNode | XmlNode[]): string {
  const nodeArray = Array.isArray(nodes) ? nodes : [nodes];
  const filteredNodes = nodeArray.filter((node) => !('?xml' in node));
  return builder.build(filteredNodes);
}

/**
 * Get the tag name of an XML node (first key that isn't :@ or #text)
 */
export function getTagName(node: XmlNode): string | null {
  for (const key of Object.keys(node)) {
    if (key !== ':@' && key !== '#text') {
      return key;
    }
  }
  return null;
}

export function getChildren(node: XmlNode): XmlNode[] {
  const tagName = getTagName(node);
  if (!tagName) return [];
  const children = node[tagName];
  return Array.isArray(children) ? children : [];
}

/**
 * Replace the child list of an element node. Text nodes are left untouched.
 */
export function setChildren(node: XmlNode, children: XmlNode[]): void {
  const tagName = getTagName(node);
  if (tagName) {
    node[tagName] = children;
  }
}

export function getAttributes(node: XmlNode): XmlAttributes {
  return node[':@'] ?? {};
}

export function getAttribute(node: XmlNode, name: string): string | undefined {
  return getAttributes(node)[`@_${name}`];
}

export function setAttribute(node: XmlNode, name: string, value: string): void {
  const attrs: XmlAttributes = node[':@'] ?? {};
  attrs[`@_${name}`] = value;
  node[':@'] = attrs;
}

/**
 * Get text content of an XML node (recursive)
 */
export function getTextContent(node: XmlNode): string {
  if (typeof node['#text'] === 'string') {
    return node['#text'];
  }

  let text = '';
  for (const child of getChildren(node)) {
    text += getTextContent(child);
  }
  return text;
}

/**
 * Concatenate the text of every descendant element named `tagName`,
 * in document order, without descending into `skip` elements.
 */
export function collectText(
  node: XmlNode,
  tagName: string,
  skip: ReadonlySet<string> = new Set()
): string {
  const tag = getTagName(node);
  if (tag === tagName) {
    return getTextContent(node);
  }
  if (tag && skip.has(tag)) {
    return '';
  }
  let text = '';
  for (const child of getChildren(node)) {
    text += collectText(child, tagName, skip);
  }
  return text;
}

export function findChild(node: XmlNode, tagName: string): XmlNode | null {
  return getChildren(node).find((child) => getTagName(child) === tagName) ?? null;
}

/**
 * Clone an XML node (deep copy)
 */
export function cloneNode(node: XmlNode): XmlNode {
  return JSON.parse(JSON.stringify(node));
}

export function addXmlDeclaration(xml: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n${xml}`;
}
