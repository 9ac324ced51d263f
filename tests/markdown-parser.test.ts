import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseMarkdown, readMarkdownIntents, toSyncIntents } from '../src/core/markdown-parser.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

describe('parseMarkdown', () => {
  it('should parse a checked line', () => {
    expect(parseMarkdown('- [x] **ENG-1**: Fix bug *[Done]* <!-- id:abc123 -->')).toEqual([
      { id: 'abc123', completed: true },
    ]);
  });

  it('should parse an unchecked line', () => {
    expect(parseMarkdown('- [ ] **ENG-2**: Write docs *[Todo]* <!-- id:def456 -->')).toEqual([
      { id: 'def456', completed: false },
    ]);
  });

  it('should skip a line without an id comment', () => {
    expect(parseMarkdown('- [x] **ENG-1**: Fix bug *[Done]*')).toEqual([]);
  });

  it('should return records in document order, ignoring headings and prose', () => {
    const text = [
      '# My Issues',
      '',
      '*Generated: 2026-10-19 08:05:03*',
      '',
      '## Started',
      '',
      '- [ ] **ENG-3**: Third *[In Progress]* <!-- id:c -->',
      '- [x] **ENG-1**: First *[In Progress]* <!-- id:a -->',
      'Some note the user typed',
      '- [ ] **ENG-2**: lost its marker',
      '',
      '## Completed',
      '',
      '- [x] **ENG-4**: Fourth *[Done]* <!-- id:d -->',
      '',
    ].join('\n');

    expect(parseMarkdown(text)).toEqual([
      { id: 'c', completed: false },
      { id: 'a', completed: true },
      { id: 'd', completed: true },
    ]);
  });

  it('should read the box at the start of the line, not checkbox text in the title', () => {
    expect(parseMarkdown('- [ ] **ENG-5**: Render - [x] boxes *[Todo]* <!-- id:r1 -->')).toEqual([
      { id: 'r1', completed: false },
    ]);
    expect(parseMarkdown('- [x] **ENG-6**: Parse - [ ] items *[Done]* <!-- id:r2 -->')).toEqual([
      { id: 'r2', completed: true },
    ]);
  });

  it('should accept an indented checkbox', () => {
    expect(parseMarkdown('  - [x] nested <!-- id:n1 -->')).toEqual([{ id: 'n1', completed: true }]);
  });

  it('should ignore a checkbox that does not start the line', () => {
    expect(parseMarkdown('Note: - [x] not a task <!-- id:q1 -->')).toEqual([]);
  });

  it('should not span lines', () => {
    expect(parseMarkdown('- [x] title\n<!-- id:zz -->')).toEqual([]);
  });

  it('should treat an upper-case X as no checkbox', () => {
    expect(parseMarkdown('- [X] **ENG-1**: Fix *[Done]* <!-- id:up -->')).toEqual([]);
  });

  it('should accept any non-whitespace id token', () => {
    expect(parseMarkdown('- [ ] t <!-- id:9f1c-22:ab/x -->')).toEqual([
      { id: '9f1c-22:ab/x', completed: false },
    ]);
  });

  it('should handle CRLF line endings', () => {
    const text = '- [x] a <!-- id:one -->\r\n- [ ] b <!-- id:two -->\r\n';
    expect(parseMarkdown(text)).toEqual([
      { id: 'one', completed: true },
      { id: 'two', completed: false },
    ]);
  });

  it('should be repeatable on the same input', () => {
    const text = '- [x] a <!-- id:one -->';
    expect(parseMarkdown(text)).toEqual(parseMarkdown(text));
  });
});

describe('toSyncIntents', () => {
  it('should keep the first position and the last value of a repeated id', () => {
    const intents = toSyncIntents([
      { id: 'a', completed: false },
      { id: 'b', completed: true },
      { id: 'a', completed: true },
    ]);
    expect([...intents.entries()]).toEqual([['a', true], ['b', true]]);
  });
});

describe('readMarkdownIntents', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'task-header-parse-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read and parse a file', async () => {
    const filePath = join(tempDir, 'my-issues.md');
    await writeFile(filePath, '- [x] **ENG-1**: Fix bug *[Done]* <!-- id:abc123 -->\n');

    expect(await readMarkdownIntents(filePath)).toEqual([{ id: 'abc123', completed: true }]);
  });

  it('should return an empty list for a missing file', async () => {
    expect(await readMarkdownIntents(join(tempDir, 'gone.md'))).toEqual([]);
  });
});
