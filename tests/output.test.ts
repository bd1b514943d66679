import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeDocumentAtomic } from '../src/core/output';

describe('writeDocumentAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'projector-output-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the file and leaves no temporary file behind', async () => {
    const target = join(dir, 'result.docx');

    await writeDocumentAtomic(target, Buffer.from('payload'));

    expect(await readFile(target, 'utf8')).toBe('payload');
    expect(await readdir(dir)).toEqual(['result.docx']);
  });

  it('replaces an existing file', async () => {
    const target = join(dir, 'result.docx');
    await writeFile(target, 'old');

    await writeDocumentAtomic(target, Buffer.from('new'));

    expect(await readFile(target, 'utf8')).toBe('new');
  });

  it('fails for a missing directory without creating anything', async () => {
    await expect(writeDocumentAtomic(join(dir, 'missing', 'result.docx'), Buffer.from('x'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('removes the temporary file when the rename fails', async () => {
    const occupied = join(dir, 'occupied');
    await mkdir(occupied);
    await writeFile(join(occupied, 'inside'), 'x');

    await expect(writeDocumentAtomic(occupied, Buffer.from('x'))).rejects.toBeInstanceOf(Error);
    expect(await readdir(dir)).toEqual(['occupied']);
  });
});
