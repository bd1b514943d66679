/**
 * Span Locator - maps character ranges of a paragraph's text onto its runs.
 */

/**
 * Anything with run text. The locator only needs lengths and content, so it
 * works on the run model as well as on plain test fixtures.
 */
export interface TextRun {
  readonly text: string;
}

/**
 * A contiguous range of paragraph text as run index + intra-run offset pairs.
 * `endOffset` is exclusive.
 */
export interface Span {
  startRun: number;
  startOffset: number;
  endRun: number;
  endOffset: number;
  /**
   * No run boundary matched the end of the range and the span was clamped to
   * the end of the last run. Only happens when run lengths and the searched
   * text disagree; callers log it.
   */
  clamped: boolean;
}

export interface RunPosition {
  runIndex: number;
  offset: number;
}

/**
 * Find the first occurrence of `needle` (exact, case-sensitive) in the
 * concatenated run text and express it as a span.
 */
export function locateSpan(runs: readonly TextRun[], needle: string): Span | null {
  if (needle.length === 0) return null;

  const text = runs.map((run) => run.text).join('');
  const start = text.indexOf(needle);
  if (start === -1) return null;

  return spanForRange(runs, start, start + needle.length);
}

/**
 * Convert the non-empty character range [start, end) into a span.
 *
 * The start run is the one whose text contains `start`; the end run is the
 * first run at or after it whose text reaches `end`. Empty runs never anchor
 * either end.
 */
export function spanForRange(runs: readonly TextRun[], start: number, end: number): Span | null {
  if (runs.length === 0 || end <= start) return null;

  let position = 0;
  let startRun = -1;
  let startOffset = 0;

  for (let i = 0; i < runs.length; i++) {
    const runStart = position;
    const runEnd = position + runs[i].text.length;

    if (startRun === -1 && runStart <= start && start < runEnd) {
      startRun = i;
      startOffset = start - runStart;
    }

    if (startRun !== -1 && runStart < end && end <= runEnd) {
      return { startRun, startOffset, endRun: i, endOffset: end - runStart, clamped: false };
    }

    position = runEnd;
  }

  if (startRun === -1) return null;

  const lastRun = runs.length - 1;
  return {
    startRun,
    startOffset,
    endRun: lastRun,
    endOffset: runs[lastRun].text.length,
    clamped: true,
  };
}

/**
 * Resolve a character position (clamped to the text) to the first run whose
 * range [start, end] includes it. A position on a boundary between two runs
 * therefore resolves to the end of the earlier run.
 */
export function locatePosition(runs: readonly TextRun[], position: number): RunPosition | null {
  if (runs.length === 0) return null;

  const total = runs.reduce((sum, run) => sum + run.text.length, 0);
  const target = Math.max(0, Math.min(position, total));

  let runStart = 0;
  for (let i = 0; i < runs.length; i++) {
    const runEnd = runStart + runs[i].text.length;
    if (runStart <= target && target <= runEnd) {
      return { runIndex: i, offset: target - runStart };
    }
    runStart = runEnd;
  }

  return null;
}
