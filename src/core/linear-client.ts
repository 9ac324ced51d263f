import { z } from 'zod';
import { runGraphQL } from '../utils/graphql.js';
import { withRetry } from '../utils/retry.js';
import { ConfigurationError, TransportError } from '../utils/errors.js';
import {
  STATE_TYPES,
  FALLBACK_STATE_TYPE,
  DEFAULT_ISSUE_LIMIT,
  MAX_RETRIES,
  BASE_RETRY_DELAY_MS,
} from '../constants.js';
import type {
  Issue,
  IssueMutationResult,
  IssueRepository,
  Project,
  Team,
  Viewer,
  WorkflowState,
} from '../types/linear.js';

// Unknown remote categories (e.g. "triage") collapse into the fallback here, once.
const stateTypeSchema = z.enum(STATE_TYPES).catch(FALLBACK_STATE_TYPE);

const issueStateSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: stateTypeSchema,
});

const workflowStateSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: stateTypeSchema,
  color: z.string().default(''),
  position: z.number().default(0),
});

export const issueSchema = z.object({
  id: z.string(),
  identifier: z.string(),
  title: z.string(),
  description: z.string().nullable().default(null),
  priority: z.number().default(0),
  state: issueStateSchema.nullable().default(null),
  assignee: z.object({ id: z.string(), name: z.string() }).nullable().default(null),
  team: z.object({ id: z.string(), name: z.string(), key: z.string() }).nullable().default(null),
  project: z.object({ id: z.string(), name: z.string() }).nullable().default(null),
  createdAt: z.string().default(''),
  updatedAt: z.string().default(''),
});

const teamSchema = z.object({
  id: z.string(),
  name: z.string(),
  key: z.string(),
  description: z.string().nullable().default(null),
});

const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable().default(null),
  state: z.string().default(''),
  progress: z.number().default(0),
});

const mutationSchema = z.object({
  success: z.boolean(),
  issue: issueSchema.nullable().default(null),
});

const nodes = <T extends z.ZodTypeAny>(item: T) => z.object({ nodes: z.array(item) });

const ISSUE_FIELDS = `
  id
  identifier
  title
  description
  priority
  state { id name type }
  assignee { id name }
  team { id name key }
  project { id name }
  createdAt
  updatedAt
`;

export interface LinearClientOptions {
  apiKey: string;
  url?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * IssueRepository backed by the Linear GraphQL API.
 */
export class LinearClient implements IssueRepository {
  private readonly apiKey: string;
  private readonly url?: string;
  private readonly timeoutMs?: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: LinearClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('Linear API key is not configured. Run: task-header config set apiKey <key>');
    }
    this.apiKey = options.apiKey;
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? BASE_RETRY_DELAY_MS;
  }

  async getViewer(): Promise<Viewer> {
    const data = await this.query('Get viewer', `
      query {
        viewer { id name email }
      }
    `, undefined, z.object({ viewer: z.object({ id: z.string(), name: z.string(), email: z.string() }) }));
    return data.viewer;
  }

  async getTeams(): Promise<Team[]> {
    const data = await this.query('Get teams', `
      query {
        teams { nodes { id name key description } }
      }
    `, undefined, z.object({ teams: nodes(teamSchema) }));
    return data.teams.nodes;
  }

  async getTeamProjects(teamId: string): Promise<Project[]> {
    const data = await this.query('Get team projects', `
      query($teamId: String!) {
        team(id: $teamId) {
          projects { nodes { id name description state progress } }
        }
      }
    `, { teamId }, z.object({ team: z.object({ projects: nodes(projectSchema) }) }));
    return data.team.projects.nodes;
  }

  async getIssue(id: string): Promise<Issue> {
    const data = await this.query('Get issue', `
      query($issueId: String!) {
        issue(id: $issueId) { ${ISSUE_FIELDS} }
      }
    `, { issueId: id }, z.object({ issue: issueSchema.nullable() }));
    if (!data.issue) {
      throw new TransportError(`Issue not found: ${id}`);
    }
    return data.issue;
  }

  async getWorkflowStates(teamId: string): Promise<WorkflowState[]> {
    const data = await this.query('Get workflow states', `
      query($teamId: String!) {
        team(id: $teamId) {
          states { nodes { id name type color position } }
        }
      }
    `, { teamId }, z.object({ team: z.object({ states: nodes(workflowStateSchema) }) }));
    return data.team.states.nodes;
  }

  async getMyIssues(limit: number = DEFAULT_ISSUE_LIMIT): Promise<Issue[]> {
    const data = await this.query('Get my issues', `
      query($first: Int!) {
        viewer {
          assignedIssues(first: $first, orderBy: updatedAt) { nodes { ${ISSUE_FIELDS} } }
        }
      }
    `, { first: limit }, z.object({ viewer: z.object({ assignedIssues: nodes(issueSchema) }) }));
    return data.viewer.assignedIssues.nodes;
  }

  async getTeamIssues(teamId: string, limit: number = DEFAULT_ISSUE_LIMIT): Promise<Issue[]> {
    const data = await this.query('Get team issues', `
      query($teamId: String!, $first: Int!) {
        team(id: $teamId) {
          issues(first: $first, orderBy: updatedAt) { nodes { ${ISSUE_FIELDS} } }
        }
      }
    `, { teamId, first: limit }, z.object({ team: z.object({ issues: nodes(issueSchema) }) }));
    return data.team.issues.nodes;
  }

  async getProjectIssues(projectId: string, limit: number = DEFAULT_ISSUE_LIMIT): Promise<Issue[]> {
    const data = await this.query('Get project issues', `
      query($projectId: String!, $first: Int!) {
        project(id: $projectId) {
          issues(first: $first, orderBy: updatedAt) { nodes { ${ISSUE_FIELDS} } }
        }
      }
    `, { projectId, first: limit }, z.object({ project: z.object({ issues: nodes(issueSchema) }) }));
    return data.project.issues.nodes;
  }

  async updateIssueState(issueId: string, stateId: string): Promise<IssueMutationResult> {
    // Setting the same stateId twice is harmless, so this mutation may be retried.
    const data = await this.query('Update issue state', `
      mutation($issueId: String!, $stateId: String!) {
        issueUpdate(id: $issueId, input: { stateId: $stateId }) {
          success
          issue { ${ISSUE_FIELDS} }
        }
      }
    `, { issueId, stateId }, z.object({ issueUpdate: mutationSchema }));
    return data.issueUpdate;
  }

  async createIssue(teamId: string, title: string, description: string = ''): Promise<IssueMutationResult> {
    const data = await this.query('Create issue', `
      mutation($teamId: String!, $title: String!, $description: String) {
        issueCreate(input: { teamId: $teamId, title: $title, description: $description }) {
          success
          issue { ${ISSUE_FIELDS} }
        }
      }
    `, { teamId, title, description }, z.object({ issueCreate: mutationSchema }), { retry: false });
    return data.issueCreate;
  }

  private async query<T>(
    label: string,
    document: string,
    variables: Record<string, unknown> | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { retry?: boolean } = {},
  ): Promise<T> {
    const attempt = async (): Promise<T> => {
      const data = await runGraphQL(document, variables, {
        apiKey: this.apiKey,
        url: this.url,
        timeoutMs: this.timeoutMs,
      });
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        throw new TransportError(`Unexpected Linear API response (${label}): ${parsed.error.message}`);
      }
      return parsed.data;
    };

    if (options.retry === false) {
      return attempt();
    }
    return withRetry(attempt, label, this.maxRetries, this.retryDelayMs);
  }
}
