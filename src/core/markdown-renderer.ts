import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { STATE_TYPES, DONE_STATE_TYPES, FALLBACK_STATE_TYPE, MY_ISSUES_FILE } from '../constants.js';
import type { Issue, StateType } from '../types/linear.js';
import { logger } from '../utils/logger.js';

export interface IssueSection {
  category: StateType;
  issues: Issue[];
}

/**
 * Partition issues into the fixed category order. Empty categories are dropped,
 * issues keep their input order inside a category.
 */
export function groupIssuesByState(issues: readonly Issue[]): IssueSection[] {
  const buckets = new Map<StateType, Issue[]>(STATE_TYPES.map((type): [StateType, Issue[]] => [type, []]));

  for (const issue of issues) {
    const category = issue.state?.type ?? FALLBACK_STATE_TYPE;
    const bucket = buckets.get(category) ?? buckets.get(FALLBACK_STATE_TYPE);
    bucket?.push(issue);
  }

  return STATE_TYPES
    .map(category => ({ category, issues: buckets.get(category) ?? [] }))
    .filter(section => section.issues.length > 0);
}

/**
 * `- [x] **ENG-1**: Title *[Done]* <!-- id:abc -->`
 *
 * The trailing comment is what the parser reads back; everything before it is
 * display text.
 */
export function formatIssueLine(issue: Issue, category: StateType): string {
  const checkbox = DONE_STATE_TYPES.has(category) ? '- [x]' : '- [ ]';
  const stateName = issue.state?.name ?? 'Unknown';
  return `${checkbox} **${issue.identifier}**: ${issue.title} *[${stateName}]* <!-- id:${issue.id} -->`;
}

export function renderMarkdown(
  title: string,
  issues: readonly Issue[],
  description: string = '',
  generatedAt: Date = new Date(),
): string {
  const lines: string[] = [
    `# ${title}`,
    '',
    `*Generated: ${formatTimestamp(generatedAt)}*`,
    '',
  ];

  if (description) {
    lines.push(description, '');
  }

  lines.push('---', '');

  for (const section of groupIssuesByState(issues)) {
    lines.push(`## ${capitalize(section.category)}`, '');
    for (const issue of section.issues) {
      lines.push(formatIssueLine(issue, section.category));
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Lowercase, then replace everything outside [A-Za-z0-9_-] with "_".
 * "Core Infra!!" -> "core_infra__"
 */
export function sanitizeFileName(name: string): string {
  return name.toLowerCase().replace(/[^A-Za-z0-9_-]/g, '_');
}

export function getMyIssuesPath(outputDir: string): string {
  return resolve(join(outputDir, MY_ISSUES_FILE));
}

export function getNamedIssuesPath(outputDir: string, name: string): string {
  return resolve(join(outputDir, `issues-${sanitizeFileName(name)}.md`));
}

export async function writeMyIssuesMarkdown(outputDir: string, issues: readonly Issue[]): Promise<string> {
  const content = renderMarkdown('My Issues', issues, 'All issues assigned to me');
  return writeMarkdown(getMyIssuesPath(outputDir), content);
}

export async function writeTeamIssuesMarkdown(
  outputDir: string,
  teamName: string,
  issues: readonly Issue[],
): Promise<string> {
  const content = renderMarkdown(`Issues: ${teamName}`, issues, `All issues for team ${teamName}`);
  return writeMarkdown(getNamedIssuesPath(outputDir, teamName), content);
}

export async function writeProjectIssuesMarkdown(
  outputDir: string,
  projectName: string,
  issues: readonly Issue[],
): Promise<string> {
  const content = renderMarkdown(`Issues: ${projectName}`, issues, `All issues for project ${projectName}`);
  return writeMarkdown(getNamedIssuesPath(outputDir, projectName), content);
}

async function writeMarkdown(filePath: string, content: string): Promise<string> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  logger.debug(`Wrote ${filePath}`);
  return filePath;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
