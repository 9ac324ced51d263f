import type { Project } from '../types/linear.js';
import { logger } from '../utils/logger.js';
import { createClient, loadContext, resolveTeam } from './context.js';

export async function projectsCommand(options: { team: string }): Promise<Project[]> {
  const { config } = await loadContext();
  const client = createClient(config);
  const team = await resolveTeam(client, options.team);
  const projects = await client.getTeamProjects(team.id);

  if (projects.length === 0) {
    logger.warn(`No projects in team ${team.name}.`);
    return projects;
  }
  for (const project of projects) {
    const progress = `${Math.round(project.progress * 100)}%`;
    logger.info(`${project.name.padEnd(28)} ${project.state.padEnd(10)} ${progress.padStart(4)}  ${project.id}`);
  }
  return projects;
}
