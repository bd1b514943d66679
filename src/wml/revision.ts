/**
 * Revision markup generation for Word documents
 *
 * Creates w:ins (insertion) and w:del (deletion) elements with tracking
 * attributes (author, date, id) taken from the revision being projected.
 */

import {
  cloneNode,
  getTagName,
  getChildren,
  getAttributes,
  getTextContent,
  type XmlNode,
} from '../core/xml';
import { WML, REVISION_ATTRS } from '../core/namespaces';
import { createTextElement } from './run-model';

/**
 * Tracking attributes written on a revision marker
 */
export interface MarkerAttributes {
  author: string;
  /** ISO 8601 */
  date: string;
  /** Decimal revision id */
  id: string;
}

function markerAttributes(marker: MarkerAttributes): Record<string, string> {
  return {
    [`@_${REVISION_ATTRS.author}`]: marker.author,
    [`@_${REVISION_ATTRS.id}`]: marker.id,
    [`@_${REVISION_ATTRS.date}`]: marker.date,
  };
}

/**
 * Hands out w:id values that do not collide with ids already present in a
 * part. A preferred id is kept when it is a free decimal number.
 */
export class RevisionIdAllocator {
  private readonly used = new Set<string>();
  private next: number;

  constructor(nodes: XmlNode | XmlNode[]) {
    const nodeArray = Array.isArray(nodes) ? nodes : [nodes];
    let maxId = 0;

    const walk = (node: XmlNode): void => {
      const id = getAttributes(node)[`@_${REVISION_ATTRS.id}`];
      if (id !== undefined) {
        this.used.add(id);
        const numeric = parseInt(id, 10);
        if (!isNaN(numeric) && numeric > maxId) {
          maxId = numeric;
        }
      }
      for (const child of getChildren(node)) {
        walk(child);
      }
    };

    for (const node of nodeArray) {
      walk(node);
    }

    this.next = maxId + 1;
  }

  allocate(preferred?: string): string {
    if (preferred !== undefined && /^\d+$/.test(preferred) && !this.used.has(preferred)) {
      this.used.add(preferred);
      return preferred;
    }
    while (this.used.has(String(this.next))) {
      this.next++;
    }
    const id = String(this.next++);
    this.used.add(id);
    return id;
  }
}

/**
 * Create a w:ins element wrapping content (typically w:r elements)
 */
export function createInsertion(content: XmlNode | XmlNode[], marker: MarkerAttributes): XmlNode {
  const children = Array.isArray(content) ? content : [content];

  return {
    [WML.insertion]: children.map(cloneNode),
    ':@': markerAttributes(marker),
  };
}

/**
 * Create a w:del element wrapping content. Text inside is converted to
 * w:delText, which is how Word stores deleted characters.
 */
export function createDeletion(content: XmlNode | XmlNode[], marker: MarkerAttributes): XmlNode {
  const children = Array.isArray(content) ? content : [content];

  return {
    [WML.deletion]: children.map((child) => convertToDeletedContent(cloneNode(child))),
    ':@': markerAttributes(marker),
  };
}

/**
 * Convert content for deletion (w:t -> w:delText), recursively
 */
function convertToDeletedContent(node: XmlNode): XmlNode {
  const tagName = getTagName(node);

  if (tagName === WML.text) {
    return createTextElement(WML.deletedText, getTextContent(node), getAttributes(node));
  }

  if (tagName) {
    const children = getChildren(node);
    if (children.length > 0) {
      node[tagName] = children.map((child) => convertToDeletedContent(child));
    }
  }

  return node;
}

/**
 * Create a run (w:r) with one w:t, copying `properties` (a w:rPr) verbatim
 */
export function createRun(text: string, properties?: XmlNode | null): XmlNode {
  const children: XmlNode[] = [];

  if (properties) {
    children.push(cloneNode(properties));
  }

  children.push(createTextElement(WML.text, text));

  return {
    [WML.run]: children,
  };
}
