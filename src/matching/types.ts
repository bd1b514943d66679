/**
 * Semantic matcher contract
 *
 * A matcher decides where in the target document a source revision belongs.
 * The projector treats it as a black box: it gets the record plus the current
 * text of every target body paragraph, and answers with a paragraph index and
 * what to insert (and where) or what to delete.
 */

import type { RevisionKind, RevisionRecord } from '../types';

export interface InsertionMatch {
  kind: RevisionKind.Insertion;
  paragraphIndex: number;
  /** Text to insert into the target paragraph */
  text: string;
  /** Character position in the target paragraph's current text */
  offset: number;
  /** Confidence in 0..1; absent means the matcher does not score */
  score?: number;
}

export interface DeletionMatch {
  kind: RevisionKind.Deletion;
  paragraphIndex: number;
  /** Exact text of the target paragraph to mark as deleted */
  substring: string;
  score?: number;
}

export type RevisionMatch = InsertionMatch | DeletionMatch;

export interface MatchOptions {
  /** Aborted when the projector's per-call timeout expires */
  signal?: AbortSignal;
}

export interface SemanticMatcher {
  /** Name used in log lines */
  readonly name: string;

  /**
   * Resolve a record against the target paragraphs. Returns null when no
   * candidate fits. May throw MatcherError.
   */
  match(
    record: RevisionRecord,
    candidates: readonly string[],
    options?: MatchOptions
  ): Promise<RevisionMatch | null>;

  /** Release any held resources */
  close?(): Promise<void>;
}
