/**
 * Insertion and deletion application
 *
 * Each function takes a target paragraph and writes one revision marker into
 * it. Failures come back as values; the paragraph is untouched whenever the
 * result is not `ok`.
 */

import { getChildren, setChildren, type XmlNode } from '../core/xml';
import { silentLogger, type Logger } from '../core/logger';
import type { ApplyResult } from '../types';
import { readParagraphRuns } from './run-model';
import { locateSpan, locatePosition } from './span-locator';
import { spliceRuns, extractSpanRuns } from './run-splicer';
import { createInsertion, createDeletion, createRun, type MarkerAttributes } from './revision';

/**
 * Insert `text` at character `position` of the paragraph's current text as a
 * tracked insertion. The new run takes the formatting of the run hosting the
 * position. Positions outside the text are clamped.
 *
 * A paragraph without runs gets the marker appended as its only run content.
 */
export function applyInsertion(
  paragraph: XmlNode,
  text: string,
  position: number,
  marker: MarkerAttributes,
  logger: Logger = silentLogger
): ApplyResult {
  if (text.length === 0) {
    return { ok: false, reason: 'empty-target', message: 'Insertion text is empty' };
  }

  const paragraphRuns = readParagraphRuns(paragraph);
  const located = locatePosition(paragraphRuns.runs, position);

  if (located === null) {
    logger.warn(`Paragraph has no runs; appending insertion ${marker.id}`);
    setChildren(paragraph, [...getChildren(paragraph), createInsertion(createRun(text), marker)]);
    return { ok: true, appended: true };
  }

  const { runs } = paragraphRuns;
  const host = runs[located.runIndex];
  const insertion = createInsertion(createRun(text, host.formatting), marker);
  const atStart = located.offset === 0;
  const atEnd = located.offset === host.text.length;

  if (!atStart && !atEnd) {
    const result = spliceRuns(
      paragraphRuns,
      {
        startRun: located.runIndex,
        startOffset: located.offset,
        endRun: located.runIndex,
        endOffset: located.offset,
        clamped: false,
      },
      [insertion]
    );
    return result.ok ? { ok: true, appended: false } : result;
  }

  // On a run boundary the marker goes beside the host, or beside its wrapper
  // when the host is the wrapper's first (or last) run.
  if (host.wrapper !== null) {
    const sibling = atStart ? runs[located.runIndex - 1] : runs[located.runIndex + 1];
    if (sibling !== undefined && sibling.childIndex === host.childIndex) {
      return {
        ok: false,
        reason: 'revision-overlap',
        message: `Insertion point ${position} falls inside existing revision markup`,
      };
    }
  }

  const children = getChildren(paragraph);
  const at = atStart ? host.childIndex : host.childIndex + 1;
  setChildren(paragraph, [...children.slice(0, at), insertion, ...children.slice(at)]);

  return { ok: true, appended: false };
}

/**
 * Mark the first occurrence of `target` in the paragraph's current text as a
 * tracked deletion. Each covered run slice keeps its own formatting inside
 * the w:del.
 */
export function applyDeletion(
  paragraph: XmlNode,
  target: string,
  marker: MarkerAttributes,
  logger: Logger = silentLogger
): ApplyResult {
  if (target.length === 0) {
    return { ok: false, reason: 'empty-target', message: 'Deletion target is empty' };
  }

  const paragraphRuns = readParagraphRuns(paragraph);
  const span = locateSpan(paragraphRuns.runs, target);
  if (span === null) {
    return {
      ok: false,
      reason: 'not-found',
      message: `Text to delete not found in paragraph: "${target}"`,
    };
  }

  if (span.clamped) {
    logger.warn(`Deletion span for "${target}" clamped to the end of the paragraph`);
  }

  const deletion = createDeletion(extractSpanRuns(paragraphRuns, span), marker);
  const result = spliceRuns(paragraphRuns, span, [deletion]);

  return result.ok ? { ok: true, appended: false } : result;
}
