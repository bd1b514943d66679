/**
 * Core type definitions for revision projection
 */

// ============================================================================
// Revision Records
// ============================================================================

/**
 * Kinds of inline revision that can be projected
 */
export enum RevisionKind {
  Insertion = 'Insertion',
  Deletion = 'Deletion',
}

interface RevisionRecordFields {
  /** Inserted or deleted text, surrounding whitespace included */
  readonly text: string;
  readonly author: string;
  /** ISO 8601 timestamp */
  readonly date: string;
  /** Decimal revision id (w:id), or a stable content-derived one */
  readonly id: string;
  /** Zero-based position of the owning w:body paragraph in the source */
  readonly paragraphIndex: number;
  /** Paragraph text before the change (deleted text in, inserted text out) */
  readonly originalContext: string;
  /** Paragraph text after the change (inserted text in, deleted text out) */
  readonly currentContext: string;
  /** Character position of the change inside originalContext */
  readonly originalOffset: number;
}

export interface InsertionRecord extends RevisionRecordFields {
  readonly kind: RevisionKind.Insertion;
}

export interface DeletionRecord extends RevisionRecordFields {
  readonly kind: RevisionKind.Deletion;
}

/**
 * One inline change found in the source document
 */
export type RevisionRecord = InsertionRecord | DeletionRecord;

/**
 * Reconstructed text of one source paragraph
 */
export interface ParagraphContext {
  paragraphIndex: number;
  originalText: string;
  currentText: string;
}

export interface ExtractionSummary {
  insertions: number;
  deletions: number;
  total: number;
}

export interface ExtractionResult {
  records: RevisionRecord[];
  paragraphs: ParagraphContext[];
  summary: ExtractionSummary;
}

// ============================================================================
// Per-record outcomes
// ============================================================================

/**
 * Why a record could not be applied. None of these abort a projection run.
 */
export type RecordFailureReason =
  | 'no-candidate'
  | 'low-confidence'
  | 'matcher-unavailable'
  | 'matcher-timeout'
  | 'empty-target'
  | 'not-found'
  | 'revision-overlap';

export interface ApplyFailure {
  ok: false;
  reason: RecordFailureReason;
  message: string;
}

export interface ApplySuccess {
  ok: true;
  /** True when the run list could not be split and the marker was appended */
  appended: boolean;
}

export type ApplyResult = ApplySuccess | ApplyFailure;

/**
 * Record lifecycle: Extracted -> Matched -> Located -> Spliced | Failed
 */
export type RecordState = 'Extracted' | 'Matched' | 'Located' | 'Spliced' | 'Failed';

export type RecordOutcome =
  | {
      state: 'Spliced';
      record: RevisionRecord;
      targetParagraphIndex: number;
    }
  | {
      state: 'Failed';
      record: RevisionRecord;
      /** Last state reached before failing */
      failedFrom: Exclude<RecordState, 'Spliced' | 'Failed'>;
      reason: RecordFailureReason;
      message: string;
      targetParagraphIndex?: number;
    };

/**
 * One-argument progress sink. Called synchronously; must not block.
 */
export type ProgressReporter = (message: string) => void;
