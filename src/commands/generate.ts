import {
  writeMyIssuesMarkdown,
  writeProjectIssuesMarkdown,
  writeTeamIssuesMarkdown,
} from '../core/markdown-renderer.js';
import { DEFAULT_ISSUE_LIMIT } from '../constants.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createClient, loadContext, resolveTeam } from './context.js';

export interface GenerateOptions {
  team?: string;
  project?: string;
  limit?: number;
  out?: string;
}

/**
 * Fetch issues (mine, a team's or a project's) and write the checklist file.
 * Returns the written path.
 */
export async function generateCommand(options: GenerateOptions): Promise<string> {
  const { config } = await loadContext();
  const client = createClient(config);
  const outputDir = options.out ?? config.markdownOutputDir;
  const limit = options.limit ?? DEFAULT_ISSUE_LIMIT;

  let filePath: string;
  if (options.project) {
    if (!options.team) {
      throw new ConfigurationError('--project needs --team to look the project up');
    }
    const team = await resolveTeam(client, options.team);
    const needle = options.project.toLowerCase();
    const projects = await client.getTeamProjects(team.id);
    const project = projects.find(p => p.id === options.project) ?? projects.find(p => p.name.toLowerCase() === needle);
    if (!project) {
      throw new ConfigurationError(`No project "${options.project}" in team ${team.name}`);
    }
    const issues = await client.getProjectIssues(project.id, limit);
    filePath = await writeProjectIssuesMarkdown(outputDir, project.name, issues);
    logger.info(`Fetched ${issues.length} issue(s) for project ${project.name}`);
  } else if (options.team) {
    const team = await resolveTeam(client, options.team);
    const issues = await client.getTeamIssues(team.id, limit);
    filePath = await writeTeamIssuesMarkdown(outputDir, team.name, issues);
    logger.info(`Fetched ${issues.length} issue(s) for team ${team.name}`);
  } else {
    const issues = await client.getMyIssues(limit);
    filePath = await writeMyIssuesMarkdown(outputDir, issues);
    logger.info(`Fetched ${issues.length} issue(s) assigned to you`);
  }

  logger.success(`Wrote ${filePath}`);
  return filePath;
}
