import { logger } from '../utils/logger.js';
import { createClient, loadContext } from './context.js';

export async function teamsCommand(): Promise<void> {
  const { config } = await loadContext();
  const teams = await createClient(config).getTeams();

  if (teams.length === 0) {
    logger.warn('No teams visible to this API key.');
    return;
  }
  for (const team of teams) {
    logger.info(`${team.key.padEnd(8)} ${team.name.padEnd(24)} ${team.id}`);
  }
}
