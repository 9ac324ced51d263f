/** Workflow-state categories shared by every team's pipeline. */
export type StateType = 'backlog' | 'unstarted' | 'started' | 'completed' | 'canceled';

export interface WorkflowState {
  id: string;
  name: string;
  type: StateType;
  color: string;
  position: number;
}

/** State as embedded in an issue payload. */
export interface IssueState {
  id: string;
  name: string;
  type: StateType;
}

export interface UserRef {
  id: string;
  name: string;
}

export interface TeamRef {
  id: string;
  name: string;
  key: string;
}

export interface ProjectRef {
  id: string;
  name: string;
}

/**
 * Snapshot of a tracker issue. `id` is the join key for every sync operation;
 * `identifier` (e.g. "ENG-123") is display only.
 */
export interface Issue {
  id: string;
  identifier: string;
  title: string;
  description: string | null;
  priority: number;
  state: IssueState | null;
  assignee: UserRef | null;
  team: TeamRef | null;
  project: ProjectRef | null;
  createdAt: string;
  updatedAt: string;
}

export interface Team {
  id: string;
  name: string;
  key: string;
  description: string | null;
}

export interface Project {
  id: string;
  name: string;
  description: string | null;
  state: string;
  progress: number;
}

export interface Viewer {
  id: string;
  name: string;
  email: string;
}

export interface IssueMutationResult {
  success: boolean;
  issue: Issue | null;
}

/**
 * Capabilities the sync core needs from the remote tracker. Every method
 * rejects with a TransportError when the remote call fails.
 */
export interface IssueRepository {
  getIssue(id: string): Promise<Issue>;
  getWorkflowStates(teamId: string): Promise<WorkflowState[]>;
  updateIssueState(issueId: string, stateId: string): Promise<IssueMutationResult>;
  getMyIssues(limit?: number): Promise<Issue[]>;
  getTeamIssues(teamId: string, limit?: number): Promise<Issue[]>;
  getProjectIssues(projectId: string, limit?: number): Promise<Issue[]>;
  createIssue(teamId: string, title: string, description?: string): Promise<IssueMutationResult>;
}
