import { readFile } from 'node:fs/promises';
import type { IntentRecord, SyncIntents } from '../types/sync.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * A list checkbox (`- [ ]` / `- [x]`, lower-case x only) at the start of a line,
 * then any text on that line, then `<!-- id:<token> -->`. Checkbox-like text
 * later on the line (an issue title) is never read as the box.
 * Group 1 is the box state, group 2 the issue id.
 */
const CHECKBOX_LINE = /^[ \t]*- \[([ x])\][^\n]*?<!-- id:(\S+) -->/gm;

/**
 * Extract `{ id, completed }` pairs in document order. Lines whose id comment
 * was removed are not trackable and produce nothing.
 */
export function parseMarkdown(text: string): IntentRecord[] {
  const records: IntentRecord[] = [];
  for (const match of text.matchAll(CHECKBOX_LINE)) {
    records.push({ id: match[2], completed: match[1] === 'x' });
  }
  return records;
}

/**
 * Read and parse a markdown file. A missing or unreadable file means no intents.
 */
export async function readMarkdownIntents(filePath: string): Promise<IntentRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    logger.debug(`Could not read ${filePath}: ${getErrorMessage(err)}`);
    return [];
  }
  return parseMarkdown(content);
}

/**
 * Collapse records into one intent per issue. A repeated id keeps its first
 * position and takes the value of its last checkbox.
 */
export function toSyncIntents(records: readonly IntentRecord[]): SyncIntents {
  const intents: SyncIntents = new Map();
  for (const record of records) {
    intents.set(record.id, record.completed);
  }
  return intents;
}
