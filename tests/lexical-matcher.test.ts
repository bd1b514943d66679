import { describe, it, expect } from 'vitest';
import { LexicalMatcher, bigramSimilarity, findInsertionOffset } from '../src/matching/lexical-matcher';
import { RevisionKind } from '../src/types';
import { insertionRecord, deletionRecord } from './fixtures';

describe('bigramSimilarity', () => {
  it('scores shared bigrams with the Dice coefficient', () => {
    // night: ni ig gh ht / nacht: na ac ch ht
    expect(bigramSimilarity('night', 'nacht')).toBe(0.25);
  });

  it('handles identical, empty and one-character strings', () => {
    expect(bigramSimilarity('same', 'same')).toBe(1);
    expect(bigramSimilarity('', 'text')).toBe(0);
    expect(bigramSimilarity('a', 'a')).toBe(1);
    expect(bigramSimilarity('a', 'ab')).toBe(0);
  });
});

describe('findInsertionOffset', () => {
  it('places the text after the preceding original text', () => {
    const record = insertionRecord({ originalContext: 'The quick fox jumps', originalOffset: 10 });

    expect(findInsertionOffset(record, 'Yes. The quick fox jumps')).toBe(15);
  });

  it('falls back to the following original text', () => {
    const record = insertionRecord({ originalContext: 'AAAA world peace', originalOffset: 5 });

    expect(findInsertionOffset(record, 'Greeting world peace')).toBe(9);
  });

  it('uses the paragraph edges when an anchor is empty', () => {
    expect(findInsertionOffset(insertionRecord({ originalContext: 'abc', originalOffset: 0 }), 'xyz')).toBe(0);
    expect(findInsertionOffset(insertionRecord({ originalContext: 'abc', originalOffset: 3 }), 'xyz')).toBe(3);
  });

  it('returns null when neither anchor is found', () => {
    const record = insertionRecord({ originalContext: 'abc def', originalOffset: 4 });

    expect(findInsertionOffset(record, 'ab de')).toBeNull();
  });
});

describe('LexicalMatcher', () => {
  const matcher = new LexicalMatcher();
  const candidates = ['', 'Completely different text', 'The quick fox jumps!'];

  it('matches a deletion to the most similar paragraph', async () => {
    const record = deletionRecord({ text: 'jumps', originalContext: 'The quick fox jumps' });
    const match = await matcher.match(record, candidates);

    expect(match).toMatchObject({ kind: RevisionKind.Deletion, paragraphIndex: 2, substring: 'jumps' });
    // 18 shared bigrams out of 18 + 19
    expect(match?.score).toBeCloseTo(36 / 37);
  });

  it('matches an insertion with its offset in the target', async () => {
    const record = insertionRecord({
      text: 'brown ',
      originalContext: 'The quick fox jumps',
      originalOffset: 10,
    });

    expect(await matcher.match(record, candidates)).toMatchObject({
      kind: RevisionKind.Insertion,
      paragraphIndex: 2,
      text: 'brown ',
      offset: 10,
    });
  });

  it('prefers the first paragraph on a tie', async () => {
    const record = deletionRecord({ text: 'same', originalContext: 'same text' });

    expect(await matcher.match(record, ['same text', 'same text'])).toMatchObject({ paragraphIndex: 0 });
  });

  it('returns null without a usable candidate', async () => {
    const record = deletionRecord({ text: 'x', originalContext: 'something' });

    expect(await matcher.match(record, ['', '   '])).toBeNull();
    expect(await matcher.match(record, ['zzz'])).toBeNull();
  });

  it('returns null when an insertion point cannot be placed', async () => {
    const record = insertionRecord({ text: 'new ', originalContext: 'abc def', originalOffset: 4 });

    expect(await matcher.match(record, ['ab de'])).toBeNull();
  });
});
