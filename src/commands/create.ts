import type { Issue } from '../types/linear.js';
import { TransportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createClient, loadContext, resolveTeam } from './context.js';

export async function createCommand(options: { team: string; title: string; description?: string }): Promise<Issue> {
  const { config } = await loadContext();
  const client = createClient(config);
  const team = await resolveTeam(client, options.team);

  const result = await client.createIssue(team.id, options.title, options.description ?? '');
  if (!result.success || !result.issue) {
    throw new TransportError(`Linear did not create the issue in team ${team.name}`);
  }

  logger.success(`Created ${result.issue.identifier}: ${result.issue.title}`);
  return result.issue;
}
