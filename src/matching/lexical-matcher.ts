/**
 * Lexical matcher
 *
 * Deterministic matcher for targets written in the same language as the
 * source: paragraphs are compared by character-bigram overlap (Dice
 * coefficient) with the record's original paragraph text.
 */

import { RevisionKind, type RevisionRecord } from '../types';
import type { RevisionMatch, SemanticMatcher } from './types';

/** Characters of surrounding original text used to find an insertion point */
const ANCHOR_LENGTH = 16;

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Dice coefficient over character bigrams, in 0..1
 */
export function bigramSimilarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const gramsA = bigrams(a);
  const gramsB = bigrams(b);

  let overlap = 0;
  for (const [gram, count] of gramsA) {
    overlap += Math.min(count, gramsB.get(gram) ?? 0);
  }

  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/**
 * Position in `candidate` that corresponds to the insertion point of the
 * record, found by locating the original text just before it, or failing
 * that, just after it.
 */
export function findInsertionOffset(record: RevisionRecord, candidate: string): number | null {
  const original = record.originalContext;
  const point = record.originalOffset;

  const before = original.slice(Math.max(0, point - ANCHOR_LENGTH), point);
  if (before.length === 0) {
    return 0;
  }
  const beforeAt = candidate.indexOf(before);
  if (beforeAt !== -1) {
    return beforeAt + before.length;
  }

  const after = original.slice(point, point + ANCHOR_LENGTH);
  if (after.length === 0) {
    return candidate.length;
  }
  const afterAt = candidate.indexOf(after);
  if (afterAt !== -1) {
    return afterAt;
  }

  return null;
}

export class LexicalMatcher implements SemanticMatcher {
  readonly name = 'lexical';

  async match(record: RevisionRecord, candidates: readonly string[]): Promise<RevisionMatch | null> {
    let bestIndex = -1;
    let bestScore = 0;

    candidates.forEach((candidate, index) => {
      if (candidate.trim() === '') return;
      const score = bigramSimilarity(record.originalContext, candidate);
      if (score > bestScore) {
        bestScore = score;
        bestIndex = index;
      }
    });

    if (bestIndex === -1) {
      return null;
    }

    if (record.kind === RevisionKind.Deletion) {
      return {
        kind: RevisionKind.Deletion,
        paragraphIndex: bestIndex,
        substring: record.text,
        score: bestScore,
      };
    }

    const offset = findInsertionOffset(record, candidates[bestIndex]);
    if (offset === null) {
      return null;
    }

    return {
      kind: RevisionKind.Insertion,
      paragraphIndex: bestIndex,
      text: record.text,
      offset,
      score: bestScore,
    };
  }
}
