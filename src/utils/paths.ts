import { homedir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';
import { CONFIG_FILE_NAME } from '../constants.js';

export function getConfigPath(): string {
  return process.env.TASK_HEADER_CONFIG ?? join(homedir(), CONFIG_FILE_NAME);
}

/**
 * Lock file guarding sync cycles of one markdown file:
 *   /notes/my-issues.md -> /notes/.my-issues.md.lock
 */
export function getLockFilePath(markdownPath: string): string {
  const absolute = resolve(markdownPath);
  return join(dirname(absolute), `.${basename(absolute)}.lock`);
}
