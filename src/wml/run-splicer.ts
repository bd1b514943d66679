/**
 * Run Splicer - isolates a located span into its own content.
 *
 * The paragraph's child list is rebuilt from slices of the old one rather than
 * edited in place while walking it:
 *
 *   [children before start] [before-run?] [kept zero-width siblings]
 *   [replacement...] [after-run?] [children after end]
 *
 * Only the runs in [startRun, endRun] are replaced; every other child keeps
 * its identity, so formatting outside the span is untouched.
 */

import { collectText, getChildren, getTagName, setChildren, type XmlNode } from '../core/xml';
import { WML } from '../core/namespaces';
import { sliceRun, hasRunContent, type ParagraphRuns, type Run } from './run-model';
import type { Span } from './span-locator';

export type SpliceResult =
  | { ok: true; removedRuns: number; insertedNodes: number }
  | { ok: false; reason: 'revision-overlap'; message: string };

function coveredRuns(paragraphRuns: ParagraphRuns, span: Span): readonly Run[] {
  return paragraphRuns.runs.slice(span.startRun, span.endRun + 1);
}

/**
 * The covered part of each run in the span, as standalone run copies that
 * keep their own formatting. Used to build the content of a deletion marker.
 */
export function extractSpanRuns(paragraphRuns: ParagraphRuns, span: Span): XmlNode[] {
  const pieces: XmlNode[] = [];

  coveredRuns(paragraphRuns, span).forEach((run, i) => {
    const runIndex = span.startRun + i;
    const from = runIndex === span.startRun ? span.startOffset : 0;
    const to = runIndex === span.endRun ? span.endOffset : run.text.length;
    const piece = sliceRun(run.node, from, to);
    if (hasRunContent(piece)) {
      pieces.push(piece);
    }
  });

  return pieces;
}

/**
 * Replace the span with `replacement`, keeping the text before and after it
 * in copies of the boundary runs.
 *
 * A zero-length span (start == end inside one run) splits that run and puts
 * the replacement between the halves.
 *
 * Runs nested in an existing revision mark, hyperlink or other inline
 * container cannot be split here, and a sibling inside the span that holds
 * text cannot be moved ahead of the replacement. Such spans are refused with
 * `revision-overlap` and nothing is changed.
 */
export function spliceRuns(
  paragraphRuns: ParagraphRuns,
  span: Span,
  replacement: readonly XmlNode[]
): SpliceResult {
  const covered = coveredRuns(paragraphRuns, span);
  const nested = covered.find((run) => run.wrapper !== null);
  if (nested) {
    return {
      ok: false,
      reason: 'revision-overlap',
      message: `Span overlaps existing ${getTagName(nested.wrapper ?? nested.node)} markup`,
    };
  }

  const startRun = paragraphRuns.runs[span.startRun];
  const endRun = paragraphRuns.runs[span.endRun];
  const children = getChildren(paragraphRuns.paragraph);

  // Bookmarks, proofing marks and similar zero-width siblings inside the span
  const between = children
    .slice(startRun.childIndex + 1, endRun.childIndex)
    .filter((child) => getTagName(child) !== WML.run);
  const textual = between.find((child) => collectText(child, WML.text) !== '');
  if (textual) {
    return {
      ok: false,
      reason: 'revision-overlap',
      message: `Span crosses text inside ${getTagName(textual)}`,
    };
  }

  const rebuilt: XmlNode[] = children.slice(0, startRun.childIndex);

  if (span.startOffset > 0) {
    rebuilt.push(sliceRun(startRun.node, 0, span.startOffset));
  }

  rebuilt.push(...between, ...replacement);

  const after = sliceRun(endRun.node, span.endOffset, endRun.text.length);
  const hasAfter = span.endOffset < endRun.text.length || hasRunContent(after);
  if (hasAfter) {
    rebuilt.push(after);
  }

  rebuilt.push(...children.slice(endRun.childIndex + 1));

  setChildren(paragraphRuns.paragraph, rebuilt);

  return {
    ok: true,
    removedRuns: covered.length,
    insertedNodes: replacement.length + (span.startOffset > 0 ? 1 : 0) + (hasAfter ? 1 : 0),
  };
}
