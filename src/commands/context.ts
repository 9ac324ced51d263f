import { loadConfig, resolveApiKey } from '../core/config-store.js';
import { LinearClient } from '../core/linear-client.js';
import type { AppConfig } from '../types/config.js';
import type { Team } from '../types/linear.js';
import { ConfigurationError } from '../utils/errors.js';
import { getConfigPath } from '../utils/paths.js';

export interface CommandContext {
  config: AppConfig;
  configPath: string;
}

export async function loadContext(): Promise<CommandContext> {
  const configPath = getConfigPath();
  const config = await loadConfig(configPath);
  return { config, configPath };
}

/**
 * Tracker client for the configured API key. Throws ConfigurationError when
 * no key is set, before anything goes over the network.
 */
export function createClient(config: AppConfig): LinearClient {
  return new LinearClient({ apiKey: resolveApiKey(config) });
}

/**
 * Find a team by id, key (case-insensitive) or name (case-insensitive).
 */
export async function resolveTeam(client: LinearClient, ref: string): Promise<Team> {
  const teams = await client.getTeams();
  const needle = ref.toLowerCase();
  const team =
    teams.find(t => t.id === ref) ??
    teams.find(t => t.key.toLowerCase() === needle) ??
    teams.find(t => t.name.toLowerCase() === needle);
  if (!team) {
    throw new ConfigurationError(`No team matches "${ref}". Run \`task-header teams\` to list teams.`);
  }
  return team;
}
