/**
 * Tests for the document scanner
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join, dirname } from 'node:path';
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { scanDocuments, buildGlobPattern } from '../scanner.js';
import { FileNotFoundError } from '../../errors/index.js';

describe('scanDocuments', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'grantkb-scan-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(relativePath: string, content = ''): void {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  it('finds supported documents at any depth, sorted by path', async () => {
    createFile('proposal.txt', 'hello');
    createFile('budget/2024.xlsx');
    createFile('attachments/letters/support.pdf');
    createFile('photo.png');

    const documents = await scanDocuments(tempDir);

    expect(documents.map((d) => d.relativePath)).toEqual([
      'attachments/letters/support.pdf',
      'budget/2024.xlsx',
      'proposal.txt',
    ]);
  });

  it('reports size, extension and mtime', async () => {
    createFile('notes.md', 'abc');

    const [doc] = await scanDocuments(tempDir);

    expect(doc).toMatchObject({ relativePath: 'notes.md', extension: 'md', size: 3 });
    expect(doc?.path).toBe(join(tempDir, 'notes.md'));
    expect(Number.isInteger(doc?.mtimeMs)).toBe(true);
  });

  it('matches extensions case-insensitively and lower-cases them', async () => {
    createFile('Budget.PDF');

    const documents = await scanDocuments(tempDir);

    expect(documents.map((d) => [d.relativePath, d.extension])).toEqual([['Budget.PDF', 'pdf']]);
  });

  it('skips Office lock files and OS metadata', async () => {
    createFile('~$proposal.docx');
    createFile('proposal.docx');
    createFile('.DS_Store');

    const documents = await scanDocuments(tempDir);

    expect(documents.map((d) => d.relativePath)).toEqual(['proposal.docx']);
  });

  it('honours .grantkbignore and configured patterns', async () => {
    createFile('.grantkbignore', '# old versions\narchive/\n');
    createFile('archive/v1.txt');
    createFile('drafts/v2.txt');
    createFile('final.txt');

    const documents = await scanDocuments(tempDir, { additionalIgnorePatterns: ['drafts/'] });

    expect(documents.map((d) => d.relativePath)).toEqual(['final.txt']);
  });

  it('restricts to the given extensions', async () => {
    createFile('a.txt');
    createFile('b.pdf');

    const documents = await scanDocuments(tempDir, { extensions: ['txt'] });

    expect(documents.map((d) => d.relativePath)).toEqual(['a.txt']);
  });

  it('returns nothing for an empty extension list', async () => {
    createFile('a.txt');

    expect(await scanDocuments(tempDir, { extensions: [] })).toEqual([]);
  });

  it('throws FileNotFoundError for a missing root', async () => {
    await expect(scanDocuments(join(tempDir, 'missing'))).rejects.toThrow(FileNotFoundError);
  });

  it('does not call onError for readable files', async () => {
    const onError = vi.fn();
    createFile('a.txt');

    await scanDocuments(tempDir, { onError });

    expect(onError).not.toHaveBeenCalled();
  });
});

describe('buildGlobPattern', () => {
  it('uses a brace list for several extensions', () => {
    expect(buildGlobPattern(['pdf', 'TXT'])).toBe('**/*.{pdf,txt}');
    expect(buildGlobPattern(['md'])).toBe('**/*.md');
  });
});
