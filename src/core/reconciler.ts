import { DONE_STATE_TYPES } from '../constants.js';
import type { IssueRepository, StateType, WorkflowState } from '../types/linear.js';
import type { IntentRecord, ReconcileOptions, ReconcileResult, SyncIntents } from '../types/sync.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { pMap } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { toSyncIntents } from './markdown-parser.js';

type IssueOutcome =
  | { kind: 'updated' }
  | { kind: 'unchanged' }
  | { kind: 'skipped'; reason: string }
  | { kind: 'failed'; error: string };

/**
 * First state of the requested category in the order the tracker returned
 * them. A team with several "completed" states always gets the first one.
 */
export function findStateOfType(states: readonly WorkflowState[], type: StateType): WorkflowState | undefined {
  return states.find(state => state.type === type);
}

/**
 * Compare each intent with the issue's live state and move the issues whose
 * checkbox disagrees. Failures are contained per issue.
 */
export async function reconcileIntents(
  client: IssueRepository | null | undefined,
  intents: SyncIntents | readonly IntentRecord[],
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  if (!client) {
    throw new ConfigurationError('Linear client not configured');
  }

  const wanted = intents instanceof Map ? intents : toSyncIntents(intents);
  const entries = [...wanted.entries()];

  // Workflow states per team, for this cycle only.
  const statesByTeam = new Map<string, Promise<WorkflowState[]>>();
  const loadStates = (teamId: string): Promise<WorkflowState[]> => {
    let pending = statesByTeam.get(teamId);
    if (!pending) {
      pending = client.getWorkflowStates(teamId);
      statesByTeam.set(teamId, pending);
      // A failed lookup is not cached: the next issue of the team tries again.
      void pending.catch(() => statesByTeam.delete(teamId));
    }
    return pending;
  };

  const reconcileOne = async ([issueId, shouldBeCompleted]: [string, boolean]): Promise<IssueOutcome> => {
    try {
      const issue = await client.getIssue(issueId);
      const isCompleted = issue.state !== null && DONE_STATE_TYPES.has(issue.state.type);

      if (shouldBeCompleted === isCompleted) {
        return { kind: 'unchanged' };
      }

      if (!issue.team) {
        return { kind: 'failed', error: `Issue ${issue.identifier} has no team` };
      }

      const targetType: StateType = shouldBeCompleted ? 'completed' : 'unstarted';
      const states = await loadStates(issue.team.id);
      const target = findStateOfType(states, targetType);
      if (!target) {
        return { kind: 'skipped', reason: `team ${issue.team.name} has no ${targetType} state` };
      }

      const result = await client.updateIssueState(issueId, target.id);
      if (!result.success) {
        return { kind: 'failed', error: `Linear rejected the update to "${target.name}"` };
      }

      logger.success(`${issue.identifier}: ${issue.state?.name ?? 'Unknown'} -> ${target.name}`);
      return { kind: 'updated' };
    } catch (err) {
      return { kind: 'failed', error: getErrorMessage(err) };
    }
  };

  const outcomes = await pMap(entries, reconcileOne, options.concurrency ?? 1);

  const result: ReconcileResult = { updated: 0, unchanged: 0, skipped: 0, errors: [] };
  outcomes.forEach((outcome, i) => {
    const issueId = entries[i][0];
    switch (outcome.kind) {
      case 'updated':
        result.updated++;
        break;
      case 'unchanged':
        result.unchanged++;
        break;
      case 'skipped':
        result.skipped++;
        logger.debug(`Skipped ${issueId}: ${outcome.reason}`);
        break;
      case 'failed':
        result.errors.push({ issueId, error: outcome.error });
        logger.error(`Error updating issue ${issueId}: ${outcome.error}`);
        break;
    }
  });

  return result;
}

/**
 * Number of issues actually transitioned.
 */
export async function reconcile(
  client: IssueRepository | null | undefined,
  intents: SyncIntents | readonly IntentRecord[],
  options?: ReconcileOptions,
): Promise<number> {
  const result = await reconcileIntents(client, intents, options);
  return result.updated;
}
