/**
 * Revision projection
 *
 * Copies the tracked changes of a source document onto a target document
 * that carries none, paragraph by paragraph:
 *
 *   extract records -> for each record: match -> locate -> splice
 *
 * Each record ends either Spliced or Failed. A failed record is reported and
 * counted; it never stops the run. Only unreadable input is fatal, and it is
 * detected before any record is processed.
 */

import { MatcherError, errorMessage } from '../core/errors';
import { silentLogger, type Logger } from '../core/logger';
import type { XmlNode } from '../core/xml';
import {
  RevisionKind,
  type ApplyResult,
  type ExtractionSummary,
  type ProgressReporter,
  type RecordFailureReason,
  type RecordOutcome,
  type RecordState,
  type RevisionRecord,
} from '../types';
import type { RevisionMatch, SemanticMatcher } from '../matching/types';
import { loadWordDocument, saveWordDocument, getBodyParagraphs } from './document';
import { extractRevisions } from './revision-extractor';
import { readParagraphRuns } from './run-model';
import { RevisionIdAllocator, type MarkerAttributes } from './revision';
import { applyInsertion, applyDeletion } from './revision-apply';

export type DocumentInput = Buffer | Uint8Array | ArrayBuffer;

export interface ProjectOptions {
  matcher: SemanticMatcher;
  /** Progress sink; called synchronously at each checkpoint */
  report?: ProgressReporter;
  logger?: Logger;
  /** Matches scoring below this are rejected (default: 0.5) */
  minScore?: number;
  /** Bound on one matcher call (default: 60000) */
  matcherTimeoutMs?: number;
  /** Author for source markers without one */
  defaultAuthor?: string;
  /** Date for source markers without one */
  defaultDate?: string;
}

export interface ProjectionResult {
  /** The target package with the revisions applied */
  document: Buffer;
  recordsFound: number;
  applied: number;
  failed: number;
  outcomes: RecordOutcome[];
  summary: ExtractionSummary;
}

function asBuffer(data: DocumentInput): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function groupByParagraph(records: readonly RevisionRecord[]): Map<number, RevisionRecord[]> {
  const groups = new Map<number, RevisionRecord[]>();
  for (const record of records) {
    const group = groups.get(record.paragraphIndex);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.paragraphIndex, [record]);
    }
  }
  return groups;
}

async function matchWithTimeout(
  matcher: SemanticMatcher,
  record: RevisionRecord,
  candidates: readonly string[],
  timeoutMs: number
): Promise<RevisionMatch | null> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new MatcherError('TIMEOUT', `Matcher ${matcher.name} did not answer within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([matcher.match(record, candidates, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function describeRecord(record: RevisionRecord): string {
  const kind = record.kind === RevisionKind.Insertion ? 'insertion' : 'deletion';
  const preview = record.text.length > 30 ? `${record.text.slice(0, 30)}...` : record.text;
  return `${kind} "${preview}"`;
}

class Projection {
  private readonly paragraphs: XmlNode[];
  private readonly ids: RevisionIdAllocator;

  constructor(
    mainDocument: XmlNode[],
    paragraphs: XmlNode[],
    private readonly options: Required<Pick<ProjectOptions, 'matcher' | 'minScore' | 'matcherTimeoutMs'>>,
    private readonly logger: Logger
  ) {
    this.paragraphs = paragraphs;
    this.ids = new RevisionIdAllocator(mainDocument);
  }

  async project(record: RevisionRecord): Promise<RecordOutcome> {
    // Texts are re-read for every record so earlier splices are visible
    const candidates = this.paragraphs.map((paragraph) => readParagraphRuns(paragraph).text);

    let match: RevisionMatch | null;
    try {
      match = await matchWithTimeout(this.options.matcher, record, candidates, this.options.matcherTimeoutMs);
    } catch (error) {
      const timedOut = error instanceof MatcherError && error.code === 'TIMEOUT';
      return this.fail(record, 'Extracted', timedOut ? 'matcher-timeout' : 'matcher-unavailable', errorMessage(error));
    }

    if (match === null) {
      return this.fail(record, 'Extracted', 'no-candidate', 'No matching target paragraph');
    }
    if (match.paragraphIndex < 0 || match.paragraphIndex >= this.paragraphs.length) {
      return this.fail(
        record,
        'Extracted',
        'no-candidate',
        `Matcher chose paragraph ${match.paragraphIndex} of ${this.paragraphs.length}`
      );
    }
    if (match.kind !== record.kind) {
      return this.fail(record, 'Extracted', 'no-candidate', `Matcher answered with a ${match.kind} for a ${record.kind}`);
    }
    if (match.score !== undefined && match.score < this.options.minScore) {
      return this.fail(
        record,
        'Extracted',
        'low-confidence',
        `Match score ${match.score.toFixed(2)} is below ${this.options.minScore}`,
        match.paragraphIndex
      );
    }

    const paragraph = this.paragraphs[match.paragraphIndex];
    const marker: MarkerAttributes = {
      author: record.author,
      date: record.date,
      id: this.ids.allocate(record.id),
    };

    const result: ApplyResult =
      match.kind === RevisionKind.Insertion
        ? applyInsertion(paragraph, match.text, match.offset, marker, this.logger)
        : applyDeletion(paragraph, match.substring, marker, this.logger);

    if (!result.ok) {
      const failedFrom = result.reason === 'revision-overlap' ? 'Located' : 'Matched';
      return this.fail(record, failedFrom, result.reason, result.message, match.paragraphIndex);
    }

    this.logger.debug(`Revision ${record.id} spliced into target paragraph ${match.paragraphIndex} as ${marker.id}`);
    return { state: 'Spliced', record, targetParagraphIndex: match.paragraphIndex };
  }

  private fail(
    record: RevisionRecord,
    failedFrom: Exclude<RecordState, 'Spliced' | 'Failed'>,
    reason: RecordFailureReason,
    message: string,
    targetParagraphIndex?: number
  ): RecordOutcome {
    this.logger.warn(`Revision ${record.id} failed after ${failedFrom} (${reason}): ${message}`);
    return { state: 'Failed', record, failedFrom, reason, message, targetParagraphIndex };
  }
}

/**
 * Project every tracked change of `source` onto `target`.
 *
 * Both inputs are .docx packages. Invalid input throws DocumentFormatError
 * before any matcher call. When the source has no revisions the target is
 * returned unchanged and the matcher is never called.
 */
export async function projectRevisions(
  source: DocumentInput,
  target: DocumentInput,
  options: ProjectOptions
): Promise<ProjectionResult> {
  const logger = options.logger ?? silentLogger;
  const report = (message: string): void => {
    try {
      options.report?.(message);
    } catch (error) {
      logger.error(`Progress reporter failed: ${errorMessage(error)}`);
    }
  };

  report('Step 1/3: Analyzing source document for tracked changes...');
  const sourceDoc = await loadWordDocument(source);
  const targetDoc = await loadWordDocument(target);

  const extraction = extractRevisions(sourceDoc, {
    defaultAuthor: options.defaultAuthor,
    defaultDate: options.defaultDate,
  });
  const { records, summary } = extraction;

  if (records.length === 0) {
    report('Complete: No tracked changes found in the source document.');
    report('Applied 0 of 0 revisions; 0 failed.');
    return {
      document: asBuffer(target),
      recordsFound: 0,
      applied: 0,
      failed: 0,
      outcomes: [],
      summary,
    };
  }

  report(`Found ${summary.total} total changes: ${summary.insertions} insertions, ${summary.deletions} deletions.`);
  report('Step 2/3: Matching content and applying changes...');

  const projection = new Projection(
    targetDoc.mainDocument,
    getBodyParagraphs(targetDoc),
    {
      matcher: options.matcher,
      minScore: options.minScore ?? 0.5,
      matcherTimeoutMs: options.matcherTimeoutMs ?? 60000,
    },
    logger
  );

  const outcomes: RecordOutcome[] = [];
  for (const [paragraphIndex, group] of groupByParagraph(records)) {
    report(`Processing paragraph ${paragraphIndex + 1} with ${group.length} changes...`);

    for (const record of group) {
      const outcome = await projection.project(record);
      outcomes.push(outcome);
      if (outcome.state === 'Failed') {
        report(`Warning: Could not apply ${describeRecord(record)}: ${outcome.message}`);
      }
    }
  }

  const applied = outcomes.filter((outcome) => outcome.state === 'Spliced').length;
  const failed = outcomes.length - applied;

  report('Finalizing document...');
  const document = await saveWordDocument(targetDoc);

  report('Step 3/3: Document processing complete!');
  report(`Applied ${applied} of ${records.length} revisions; ${failed} failed.`);

  return {
    document,
    recordsFound: records.length,
    applied,
    failed,
    outcomes,
    summary,
  };
}
