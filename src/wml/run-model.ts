/**
 * Run model: a paragraph seen as an ordered list of text runs.
 *
 * A run is a w:r that is either a direct child of the paragraph or nested in
 * a top-level wrapper: revision marks, hyperlinks and the inline containers
 * listed in INLINE_CONTAINERS, to any depth. Its text is the concatenation of
 * its direct w:t children; deleted text (w:delText) is not part of the current
 * text. Joining the runs' texts in order gives the paragraph's current text
 * with no separators.
 */

import {
  cloneNode,
  getChildren,
  getTagName,
  getTextContent,
  getAttributes,
  type XmlAttributes,
  type XmlNode,
} from '../core/xml';
import { WML, XML_SPACE } from '../core/namespaces';

export interface Run {
  /** The w:r element */
  readonly node: XmlNode;
  /** Index, among the paragraph's children, of the run or of its wrapper */
  readonly childIndex: number;
  /** Outermost enclosing wrapper, null for a direct child of the paragraph */
  readonly wrapper: XmlNode | null;
  readonly text: string;
  /** The run's w:rPr, copied verbatim whenever the run is split */
  readonly formatting: XmlNode | null;
  readonly isInsertion: boolean;
  readonly isDeletion: boolean;
  /** Offset of the run's first character in the paragraph text */
  readonly start: number;
}

export interface ParagraphRuns {
  readonly paragraph: XmlNode;
  readonly runs: readonly Run[];
  readonly text: string;
}

const INSERTION_WRAPPERS = new Set<string>([WML.insertion, WML.moveTo]);
const DELETION_WRAPPERS = new Set<string>([WML.deletion, WML.moveFrom]);

/**
 * Elements whose runs belong to the paragraph text. Anything else between
 * runs (bookmarks, proofing marks, property containers) carries no text.
 */
export const INLINE_CONTAINERS: ReadonlySet<string> = new Set<string>([
  WML.insertion,
  WML.moveTo,
  WML.deletion,
  WML.moveFrom,
  WML.hyperlink,
  WML.smartTag,
  WML.customXml,
  WML.simpleField,
  WML.structuredTag,
  WML.structuredTagContent,
]);

function isInlineContainer(tagName: string | null): tagName is string {
  return tagName !== null && INLINE_CONTAINERS.has(tagName);
}

/**
 * Text of a w:r element: its direct w:t children only
 */
export function getRunText(run: XmlNode): string {
  let text = '';
  for (const child of getChildren(run)) {
    if (getTagName(child) === WML.text) {
      text += getTextContent(child);
    }
  }
  return text;
}

export function getRunFormatting(run: XmlNode): XmlNode | null {
  return getChildren(run).find((child) => getTagName(child) === WML.runProperties) ?? null;
}

/**
 * Whether a w:t holding `text` needs xml:space="preserve" to keep its
 * leading or trailing whitespace.
 */
export function needsSpacePreserve(text: string): boolean {
  return text !== text.trim();
}

/**
 * Build a text element (w:t or w:delText), carrying over `baseAttrs` and
 * adding xml:space="preserve" when the text needs it.
 */
export function createTextElement(tagName: string, text: string, baseAttrs?: XmlAttributes): XmlNode {
  const attrs: XmlAttributes = { ...baseAttrs };
  if (needsSpacePreserve(text)) {
    attrs[`@_${XML_SPACE}`] = 'preserve';
  }

  const node: XmlNode = { [tagName]: [{ '#text': text }] };
  if (Object.keys(attrs).length > 0) {
    node[':@'] = attrs;
  }
  return node;
}

export function readParagraphRuns(paragraph: XmlNode): ParagraphRuns {
  const runs: Run[] = [];
  let offset = 0;

  // revisionTag: the nearest enclosing w:ins/w:del/w:moveTo/w:moveFrom
  const pushRun = (node: XmlNode, childIndex: number, wrapper: XmlNode | null, revisionTag: string | null) => {
    const text = getRunText(node);
    runs.push({
      node,
      childIndex,
      wrapper,
      text,
      formatting: getRunFormatting(node),
      isInsertion: revisionTag !== null && INSERTION_WRAPPERS.has(revisionTag),
      isDeletion: revisionTag !== null && DELETION_WRAPPERS.has(revisionTag),
      start: offset,
    });
    offset += text.length;
  };

  const visitContainer = (container: XmlNode, childIndex: number, wrapper: XmlNode, revisionTag: string | null) => {
    for (const inner of getChildren(container)) {
      const tagName = getTagName(inner);
      if (tagName === WML.run) {
        pushRun(inner, childIndex, wrapper, revisionTag);
      } else if (isInlineContainer(tagName)) {
        const isRevision = INSERTION_WRAPPERS.has(tagName) || DELETION_WRAPPERS.has(tagName);
        visitContainer(inner, childIndex, wrapper, isRevision ? tagName : revisionTag);
      }
    }
  };

  getChildren(paragraph).forEach((child, childIndex) => {
    const tagName = getTagName(child);
    if (tagName === WML.run) {
      pushRun(child, childIndex, null, null);
    } else if (isInlineContainer(tagName)) {
      const isRevision = INSERTION_WRAPPERS.has(tagName) || DELETION_WRAPPERS.has(tagName);
      visitContainer(child, childIndex, child, isRevision ? tagName : null);
    }
  });

  return {
    paragraph,
    runs,
    text: runs.map((run) => run.text).join(''),
  };
}

/**
 * Copy of a run restricted to the characters [from, to) of its text.
 *
 * The w:rPr is copied verbatim. w:t children are cut to the range. Content
 * with no width (tabs, breaks, drawings, field characters) stays with the
 * slice that covers its position; content at the very end of the run goes to
 * the non-empty slice ending there.
 */
export function sliceRun(run: XmlNode, from: number, to: number): XmlNode {
  const length = getRunText(run).length;
  const sliced: XmlNode[] = [];
  let position = 0;

  const ownsPosition = (pos: number): boolean =>
    (from <= pos && pos < to) ||
    (pos === length && to === length && (from < to || length === 0));

  for (const child of getChildren(run)) {
    const tagName = getTagName(child);

    if (tagName === null) {
      // inter-element whitespace
      continue;
    }

    if (tagName === WML.runProperties) {
      sliced.push(cloneNode(child));
      continue;
    }

    if (tagName === WML.text) {
      const text = getTextContent(child);
      const segment = text.slice(
        Math.max(0, from - position),
        Math.max(0, to - position)
      );
      if (segment.length > 0) {
        sliced.push(createTextElement(WML.text, segment, getAttributes(child)));
      }
      position += text.length;
      continue;
    }

    if (ownsPosition(position)) {
      sliced.push(cloneNode(child));
    }
  }

  const node: XmlNode = { [WML.run]: sliced };
  const attrs = getAttributes(run);
  if (Object.keys(attrs).length > 0) {
    node[':@'] = { ...attrs };
  }
  return node;
}

/**
 * Whether a run node holds anything besides its properties
 */
export function hasRunContent(run: XmlNode): boolean {
  return getChildren(run).some((child) => {
    const tagName = getTagName(child);
    return tagName !== null && tagName !== WML.runProperties;
  });
}
