import { saveConfig } from '../core/config-store.js';
import type { Issue } from '../types/linear.js';
import { ConfigurationError, TransportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createClient, loadContext } from './context.js';

/**
 * One-line text shown in the header: `ENG-12: Fix login [In Progress]`.
 */
export function formatHeaderText(issue: Issue): string {
  return `${issue.identifier}: ${issue.title} [${issue.state?.name ?? 'Unknown'}]`;
}

export function formatCustomTaskText(text: string): string {
  return `Custom Task: ${text} [Active]`;
}

/**
 * Print the header text: the selected issue, else the custom task. Returns
 * null when neither is set.
 */
export async function currentShowCommand(): Promise<string | null> {
  const { config } = await loadContext();
  let text: string;
  if (config.currentIssueId) {
    text = formatHeaderText(await createClient(config).getIssue(config.currentIssueId));
  } else if (config.customTask) {
    text = formatCustomTaskText(config.customTask);
  } else {
    logger.dim('No current issue. Select one with `task-header current set <id>`.');
    return null;
  }
  logger.info(text);
  return text;
}

export async function currentSetCommand(issueId: string): Promise<Issue> {
  const { config, configPath } = await loadContext();
  const issue = await createClient(config).getIssue(issueId);
  await saveConfig({ ...config, currentIssueId: issue.id, customTask: null }, configPath);
  logger.success(formatHeaderText(issue));
  return issue;
}

/**
 * Show free text in the header instead of a tracker issue.
 */
export async function currentCustomCommand(text: string): Promise<string> {
  const task = text.trim();
  if (!task) {
    throw new ConfigurationError('Please enter a task description');
  }
  const { config, configPath } = await loadContext();
  await saveConfig({ ...config, currentIssueId: null, customTask: task }, configPath);
  const headerText = formatCustomTaskText(task);
  logger.success(headerText);
  return headerText;
}

export async function currentClearCommand(): Promise<void> {
  const { config, configPath } = await loadContext();
  await saveConfig({ ...config, currentIssueId: null, customTask: null }, configPath);
  logger.info('Current issue cleared.');
}

/**
 * Move the current issue to the workflow state named `stateName` (case-insensitive).
 */
export async function currentMoveCommand(stateName: string): Promise<Issue> {
  const { config } = await loadContext();
  if (!config.currentIssueId) {
    throw new ConfigurationError('No current issue. Select one with `task-header current set <id>`.');
  }
  const client = createClient(config);
  const issue = await client.getIssue(config.currentIssueId);
  if (!issue.team) {
    throw new TransportError(`Issue ${issue.identifier} has no team`);
  }

  const states = await client.getWorkflowStates(issue.team.id);
  const needle = stateName.toLowerCase();
  const target = states.find(s => s.name.toLowerCase() === needle);
  if (!target) {
    throw new ConfigurationError(
      `Team ${issue.team.name} has no state "${stateName}". Available: ${states.map(s => s.name).join(', ')}`,
    );
  }

  const result = await client.updateIssueState(issue.id, target.id);
  if (!result.success) {
    throw new TransportError(`Linear rejected moving ${issue.identifier} to "${target.name}"`);
  }
  const updated = result.issue ?? issue;
  logger.success(formatHeaderText(updated));
  return updated;
}
