/**
 * Revision record extraction
 *
 * Reads the tracked insertions and deletions of a Word document's body
 * paragraphs, along with each paragraph's text before and after its changes.
 *
 * For each body paragraph the walk keeps two strings:
 * - original: unmarked text + deleted text (w:delText under w:del)
 * - current:  unmarked text + inserted text (w:t under w:ins)
 *
 * Text is read the way the run model reads it: direct w:t / w:delText
 * children of runs, reached through the paragraph's inline containers.
 *
 * Every outermost w:ins / w:del (and w:moveTo / w:moveFrom) becomes one record.
 * Markers nested inside another marker add to the outer one.
 */

import { getTagName, getChildren, getTextContent, getAttribute, type XmlNode } from '../core/xml';
import { WML, REVISION_ATTRS } from '../core/namespaces';
import { numericContentId } from '../core/hash';
import {
  RevisionKind,
  type RevisionRecord,
  type ParagraphContext,
  type ExtractionResult,
} from '../types';
import { getBodyParagraphs, type WordDocument } from './document';
import { INLINE_CONTAINERS } from './run-model';

export interface ExtractOptions {
  /** Author for markers without w:author (default: "Unknown") */
  defaultAuthor?: string;
  /** Date for markers without w:date (default: core `modified`, else now) */
  defaultDate?: string;
}

const MARKER_KINDS: ReadonlyMap<string, RevisionKind> = new Map([
  [WML.insertion, RevisionKind.Insertion],
  [WML.moveTo, RevisionKind.Insertion],
  [WML.deletion, RevisionKind.Deletion],
  [WML.moveFrom, RevisionKind.Deletion],
]);

interface OpenMarker {
  kind: RevisionKind;
  element: XmlNode;
  text: string;
  originalOffset: number;
}

interface ParagraphScan {
  original: string;
  current: string;
  markers: OpenMarker[];
}

function scanParagraph(paragraph: XmlNode): ParagraphScan {
  const scan: ParagraphScan = { original: '', current: '', markers: [] };

  const readRun = (run: XmlNode, open: OpenMarker | null): void => {
    for (const child of getChildren(run)) {
      const tagName = getTagName(child);
      if (tagName === WML.text) {
        const text = getTextContent(child);
        if (open === null) {
          scan.original += text;
          scan.current += text;
        } else if (open.kind === RevisionKind.Insertion) {
          scan.current += text;
          open.text += text;
        }
      } else if (tagName === WML.deletedText && open !== null && open.kind === RevisionKind.Deletion) {
        const text = getTextContent(child);
        scan.original += text;
        open.text += text;
      }
    }
  };

  const visit = (node: XmlNode, open: OpenMarker | null): void => {
    const tagName = getTagName(node);
    if (tagName === WML.run) {
      readRun(node, open);
      return;
    }
    if (tagName === null || !INLINE_CONTAINERS.has(tagName)) return;

    const kind = MARKER_KINDS.get(tagName);
    if (kind !== undefined && open === null) {
      const marker: OpenMarker = { kind, element: node, text: '', originalOffset: scan.original.length };
      for (const child of getChildren(node)) {
        visit(child, marker);
      }
      scan.markers.push(marker);
      return;
    }

    for (const child of getChildren(node)) {
      visit(child, open);
    }
  };

  for (const child of getChildren(paragraph)) {
    visit(child, null);
  }

  return scan;
}

/**
 * Extract every text revision from the document body, in document order.
 * Pure read: the document is not modified.
 */
export function extractRevisions(doc: WordDocument, options: ExtractOptions = {}): ExtractionResult {
  const defaultAuthor = options.defaultAuthor ?? 'Unknown';
  const defaultDate = options.defaultDate ?? doc.coreProperties?.modified ?? new Date().toISOString();

  const records: RevisionRecord[] = [];
  const paragraphs: ParagraphContext[] = [];

  getBodyParagraphs(doc).forEach((paragraph, paragraphIndex) => {
    const scan = scanParagraph(paragraph);
    if (scan.original.trim() === '' && scan.current.trim() === '') {
      return;
    }

    paragraphs.push({
      paragraphIndex,
      originalText: scan.original,
      currentText: scan.current,
    });

    let ordinal = 0;
    for (const marker of scan.markers) {
      if (marker.text.trim() === '') continue;

      const id =
        getAttribute(marker.element, REVISION_ATTRS.id) ??
        numericContentId(`${marker.kind}:${paragraphIndex}:${ordinal}:${marker.text}`);

      records.push({
        kind: marker.kind,
        text: marker.text,
        author: getAttribute(marker.element, REVISION_ATTRS.author) ?? defaultAuthor,
        date: getAttribute(marker.element, REVISION_ATTRS.date) ?? defaultDate,
        id,
        paragraphIndex,
        originalContext: scan.original,
        currentContext: scan.current,
        originalOffset: marker.originalOffset,
      });
      ordinal++;
    }
  });

  const insertions = records.filter((record) => record.kind === RevisionKind.Insertion).length;

  return {
    records,
    paragraphs,
    summary: {
      insertions,
      deletions: records.length - insertions,
      total: records.length,
    },
  };
}
