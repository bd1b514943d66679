import { describe, it, expect, vi } from 'vitest';
import { applyInsertion, applyDeletion } from '../src/wml/revision-apply';
import { readParagraphRuns, getRunText } from '../src/wml/run-model';
import { getChildren, getTagName, getTextContent, getAttributes, collectText, type XmlNode } from '../src/core/xml';
import { silentLogger } from '../src/core/logger';
import type { MarkerAttributes } from '../src/wml/revision';
import { parseParagraph, run } from './docx-test-data';

const MARKER: MarkerAttributes = { author: 'Alice', date: '2024-03-01T09:00:00Z', id: '1' };
const BOLD = '<w:rPr><w:b/></w:rPr>';
const ITALIC = '<w:rPr><w:i/></w:rPr>';

function childTags(node: XmlNode): (string | null)[] {
  return getChildren(node).map((child) => getTagName(child));
}

function childOf(node: XmlNode, tagName: string): XmlNode {
  const found = getChildren(node).find((child) => getTagName(child) === tagName);
  if (!found) throw new Error(`no ${tagName}`);
  return found;
}

describe('applyInsertion', () => {
  it('splits the host run and copies its formatting', () => {
    const p = parseParagraph(run('Hello world', BOLD));

    expect(applyInsertion(p, 'big ', 6, MARKER)).toEqual({ ok: true, appended: false });
    expect(childTags(p)).toEqual(['w:r', 'w:ins', 'w:r']);

    const ins = getChildren(p)[1];
    expect(getAttributes(ins)).toEqual({
      '@_w:author': 'Alice',
      '@_w:id': '1',
      '@_w:date': '2024-03-01T09:00:00Z',
    });
    const insertedRun = childOf(ins, 'w:r');
    expect(getRunText(insertedRun)).toBe('big ');
    expect(childTags(childOf(insertedRun, 'w:rPr'))).toEqual(['w:b']);
    expect(readParagraphRuns(p).text).toBe('Hello big world');
  });

  it('inserts at the start of the paragraph before the first run', () => {
    const p = parseParagraph(run('world'));

    applyInsertion(p, 'Hello ', 0, MARKER);

    expect(childTags(p)).toEqual(['w:ins', 'w:r']);
    expect(readParagraphRuns(p).text).toBe('Hello world');
  });

  it('inserts on a run boundary without splitting', () => {
    const first = '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Hello </w:t></w:r>';
    const p = parseParagraph(first + run('world', ITALIC));
    const [, second] = getChildren(p);

    applyInsertion(p, 'big ', 6, MARKER);

    expect(childTags(p)).toEqual(['w:r', 'w:ins', 'w:r']);
    expect(getChildren(p)[2]).toBe(second);
    // boundary positions belong to the earlier run
    expect(childTags(childOf(childOf(getChildren(p)[1], 'w:r'), 'w:rPr'))).toEqual(['w:b']);
  });

  it('clamps positions past the end', () => {
    const p = parseParagraph(run('Hello'));

    expect(applyInsertion(p, '!', 50, MARKER)).toEqual({ ok: true, appended: false });
    expect(readParagraphRuns(p).text).toBe('Hello!');
  });

  it('appends to a paragraph without runs', () => {
    const p = parseParagraph('<w:pPr/>');
    const logger = { ...silentLogger, warn: vi.fn() };

    expect(applyInsertion(p, 'New text', 0, MARKER, logger)).toEqual({ ok: true, appended: true });
    expect(childTags(p)).toEqual(['w:pPr', 'w:ins']);
    expect(readParagraphRuns(p).text).toBe('New text');
    expect(logger.warn).toHaveBeenCalledWith('Paragraph has no runs; appending insertion 1');
  });

  it('refuses a position inside an existing insertion', () => {
    const p = parseParagraph(run('ab') + '<w:ins w:id="7"><w:r><w:t>cd</w:t></w:r></w:ins>');
    const before = JSON.stringify(p);

    expect(applyInsertion(p, 'X', 3, MARKER)).toMatchObject({ ok: false, reason: 'revision-overlap' });
    expect(JSON.stringify(p)).toBe(before);
  });

  it('refuses a boundary between two runs of one wrapper', () => {
    const p = parseParagraph('<w:ins w:id="7"><w:r><w:t>ab</w:t></w:r><w:r><w:t>cd</w:t></w:r></w:ins>');

    expect(applyInsertion(p, 'X', 2, MARKER)).toEqual({
      ok: false,
      reason: 'revision-overlap',
      message: 'Insertion point 2 falls inside existing revision markup',
    });
  });

  it('places the marker beside a wrapper on its outer boundary', () => {
    const p = parseParagraph(run('ab') + '<w:ins w:id="7"><w:r><w:t>cd</w:t></w:r></w:ins>');

    expect(applyInsertion(p, 'X', 4, MARKER)).toEqual({ ok: true, appended: false });
    expect(childTags(p)).toEqual(['w:r', 'w:ins', 'w:ins']);
    expect(getAttributes(getChildren(p)[2])['@_w:id']).toBe('1');
  });

  it('rejects empty text', () => {
    expect(applyInsertion(parseParagraph(run('a')), '', 0, MARKER)).toMatchObject({
      ok: false,
      reason: 'empty-target',
    });
  });
});

describe('applyDeletion', () => {
  it('wraps a span crossing runs, keeping each run formatting', () => {
    const p = parseParagraph(run('Hello ', BOLD) + run('world', ITALIC));

    expect(applyDeletion(p, 'lo wo', MARKER)).toEqual({ ok: true, appended: false });
    expect(childTags(p)).toEqual(['w:r', 'w:del', 'w:r']);
    expect(readParagraphRuns(p).text).toBe('Helrld');

    const del = getChildren(p)[1];
    const deletedRuns = getChildren(del);
    expect(deletedRuns.map((r) => childTags(r))).toEqual([
      ['w:rPr', 'w:delText'],
      ['w:rPr', 'w:delText'],
    ]);

    const firstDelText = childOf(deletedRuns[0], 'w:delText');
    expect(getTextContent(firstDelText)).toBe('lo ');
    expect(getAttributes(firstDelText)['@_xml:space']).toBe('preserve');
    expect(getTextContent(childOf(deletedRuns[1], 'w:delText'))).toBe('wo');
    expect(childTags(childOf(deletedRuns[0], 'w:rPr'))).toEqual(['w:b']);
    expect(childTags(childOf(deletedRuns[1], 'w:rPr'))).toEqual(['w:i']);
  });

  it('keeps original text recoverable from the deletion', () => {
    const p = parseParagraph(run('Hello ', BOLD) + run('world', ITALIC));

    applyDeletion(p, 'lo wo', MARKER);

    expect(collectText(getChildren(p)[1], 'w:delText')).toBe('lo wo');
  });

  it('marks only the first occurrence', () => {
    const p = parseParagraph(run('ab ab'));

    applyDeletion(p, 'ab', MARKER);

    expect(childTags(p)).toEqual(['w:del', 'w:r']);
    expect(readParagraphRuns(p).text).toBe(' ab');
  });

  it('reports text that is not in the paragraph', () => {
    const p = parseParagraph(run('Hello'));
    const before = JSON.stringify(p);

    expect(applyDeletion(p, 'bye', MARKER)).toEqual({
      ok: false,
      reason: 'not-found',
      message: 'Text to delete not found in paragraph: "bye"',
    });
    expect(JSON.stringify(p)).toBe(before);
  });

  it('refuses text already inside a revision', () => {
    const p = parseParagraph(run('ab') + '<w:ins w:id="7"><w:r><w:t>cd</w:t></w:r></w:ins>');

    expect(applyDeletion(p, 'bc', MARKER)).toMatchObject({ ok: false, reason: 'revision-overlap' });
  });

  it('refuses a span reaching into an inline container and keeps the text order', () => {
    const p = parseParagraph(
      run('Meet on ') + '<w:smartTag w:element="date"><w:r><w:t>May 5</w:t></w:r></w:smartTag>' + run(' at noon')
    );
    const before = JSON.stringify(p);

    expect(applyDeletion(p, 'on May', MARKER)).toEqual({
      ok: false,
      reason: 'revision-overlap',
      message: 'Span overlaps existing w:smartTag markup',
    });
    expect(JSON.stringify(p)).toBe(before);
    expect(readParagraphRuns(p).text).toBe('Meet on May 5 at noon');
  });

  it('deletes text beside an inline container without moving it', () => {
    const p = parseParagraph(
      run('Meet on ') + '<w:smartTag w:element="date"><w:r><w:t>May 5</w:t></w:r></w:smartTag>' + run(' at noon')
    );

    expect(applyDeletion(p, ' at', MARKER)).toEqual({ ok: true, appended: false });
    expect(childTags(p)).toEqual(['w:r', 'w:smartTag', 'w:del', 'w:r']);
    expect(readParagraphRuns(p).text).toBe('Meet on May 5 noon');
  });

  it('rejects an empty target', () => {
    expect(applyDeletion(parseParagraph(run('a')), '', MARKER)).toMatchObject({
      ok: false,
      reason: 'empty-target',
    });
  });

  it('leaves the run text unchanged in the deleted copy', () => {
    const p = parseParagraph(run('Hello'));

    applyDeletion(p, 'Hello', MARKER);

    expect(childTags(p)).toEqual(['w:del']);
    expect(getRunText(getChildren(getChildren(p)[0])[0])).toBe('');
  });
});
