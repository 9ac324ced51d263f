import { describe, it, expect, vi } from 'vitest';
import { findStateOfType, reconcile, reconcileIntents } from '../src/core/reconciler.js';
import { ConfigurationError } from '../src/utils/errors.js';
import type { WorkflowState } from '../src/types/linear.js';
import { DEFAULT_STATES, FakeRepository, TEAM, makeIssue } from './helpers/fake-repository.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

describe('reconcile', () => {
  it('should mark an unchecked-remote issue done when the box is checked', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'started')]);

    const count = await reconcile(repo, [{ id: 'a', completed: true }]);

    expect(count).toBe(1);
    expect(repo.updates).toEqual([{ issueId: 'a', stateId: 'st-done' }]);
  });

  it('should reopen a completed issue when the box is unchecked', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'completed')]);

    const count = await reconcile(repo, [{ id: 'a', completed: false }]);

    expect(count).toBe(1);
    expect(repo.updates).toEqual([{ issueId: 'a', stateId: 'st-todo' }]);
  });

  it('should treat canceled as completed', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'canceled')]);

    expect(await reconcile(repo, [{ id: 'a', completed: true }])).toBe(0);
    expect(await reconcile(repo, [{ id: 'a', completed: false }])).toBe(1);
    expect(repo.updates).toEqual([{ issueId: 'a', stateId: 'st-todo' }]);
  });

  it('should do nothing when the intent already matches', async () => {
    const repo = new FakeRepository([
      makeIssue('a', 'ENG-1', 'completed'),
      makeIssue('b', 'ENG-2', 'backlog'),
    ]);

    const result = await reconcileIntents(repo, [
      { id: 'a', completed: true },
      { id: 'b', completed: false },
    ]);

    expect(result).toEqual({ updated: 0, unchanged: 2, skipped: 0, errors: [] });
    expect(repo.calls).toEqual(['getIssue:a', 'getIssue:b']);
  });

  it('should be idempotent across cycles', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'unstarted')]);
    const intents = [{ id: 'a', completed: true }];

    expect(await reconcile(repo, intents)).toBe(1);
    expect(await reconcile(repo, intents)).toBe(0);
    expect(repo.updates).toHaveLength(1);
  });

  it('should keep going when one issue fails', async () => {
    const repo = new FakeRepository([
      makeIssue('a', 'ENG-1', 'unstarted'),
      makeIssue('b', 'ENG-2', 'unstarted'),
      makeIssue('c', 'ENG-3', 'unstarted'),
    ]);
    repo.failUpdateFor.add('b');

    const result = await reconcileIntents(repo, [
      { id: 'a', completed: true },
      { id: 'b', completed: true },
      { id: 'c', completed: true },
    ]);

    expect(result.updated).toBe(2);
    expect(result.errors).toEqual([{ issueId: 'b', error: 'update failed for b' }]);
    expect(repo.updates.map(u => u.issueId)).toEqual(['a', 'c']);
  });

  it('should count an issue whose fetch fails as an error', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'unstarted')]);
    repo.failGetFor.add('a');

    const result = await reconcileIntents(repo, [
      { id: 'a', completed: true },
      { id: 'missing', completed: true },
    ]);

    expect(result.updated).toBe(0);
    expect(result.errors).toEqual([
      { issueId: 'a', error: 'network down for a' },
      { issueId: 'missing', error: 'Issue not found: missing' },
    ]);
  });

  it('should not count an update the tracker rejected', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'started')]);
    repo.rejectUpdateFor.add('a');

    const result = await reconcileIntents(repo, [{ id: 'a', completed: true }]);

    expect(result.updated).toBe(0);
    expect(result.errors).toEqual([{ issueId: 'a', error: 'Linear rejected the update to "Done"' }]);
  });

  it('should report an issue with no team', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'started', { team: null })]);

    const result = await reconcileIntents(repo, [{ id: 'a', completed: true }]);

    expect(result.errors).toEqual([{ issueId: 'a', error: 'Issue ENG-1 has no team' }]);
    expect(repo.calls).toEqual(['getIssue:a']);
  });

  it('should skip an issue whose team has no completed state', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'started')]);
    repo.statesByTeam.set(TEAM.id, DEFAULT_STATES.filter(s => s.type !== 'completed'));

    const result = await reconcileIntents(repo, [{ id: 'a', completed: true }]);

    expect(result).toEqual({ updated: 0, unchanged: 0, skipped: 1, errors: [] });
    expect(repo.updates).toEqual([]);
  });

  it('should skip a reopen when the team has no unstarted state', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'completed')]);
    repo.statesByTeam.set(TEAM.id, DEFAULT_STATES.filter(s => s.type !== 'unstarted'));

    expect(await reconcile(repo, [{ id: 'a', completed: false }])).toBe(0);
    expect(repo.updates).toEqual([]);
  });

  it('should fetch workflow states once per team per cycle', async () => {
    const repo = new FakeRepository([
      makeIssue('a', 'ENG-1', 'unstarted'),
      makeIssue('b', 'ENG-2', 'started'),
    ]);

    await reconcile(repo, [{ id: 'a', completed: true }, { id: 'b', completed: true }]);
    await reconcile(repo, [{ id: 'a', completed: false }]);

    expect(repo.calls.filter(c => c.startsWith('getWorkflowStates'))).toHaveLength(2);
  });

  it('should accept an intent map', async () => {
    const repo = new FakeRepository([makeIssue('a', 'ENG-1', 'unstarted')]);
    expect(await reconcile(repo, new Map([['a', true]]))).toBe(1);
  });

  it('should isolate failures when running in parallel', async () => {
    const issues = ['a', 'b', 'c', 'd'].map((id, i) => makeIssue(id, `ENG-${i + 1}`, 'unstarted'));
    const repo = new FakeRepository(issues);
    repo.failUpdateFor.add('c');

    const result = await reconcileIntents(
      repo,
      issues.map(i => ({ id: i.id, completed: true })),
      { concurrency: 3 },
    );

    expect(result.updated).toBe(3);
    expect(result.errors.map(e => e.issueId)).toEqual(['c']);
  });

  it('should fail with a configuration error when no client is attached', async () => {
    await expect(reconcile(null, [{ id: 'a', completed: true }])).rejects.toBeInstanceOf(ConfigurationError);
    await expect(reconcile(undefined, [])).rejects.toThrow('Linear client not configured');
  });
});

describe('findStateOfType', () => {
  it('should return the first matching state in list order', () => {
    const states: WorkflowState[] = [
      { id: 'todo', name: 'Todo', type: 'unstarted', color: '', position: 0 },
      { id: 'shipped', name: 'Shipped', type: 'completed', color: '', position: 2 },
      { id: 'done', name: 'Done', type: 'completed', color: '', position: 1 },
    ];
    expect(findStateOfType(states, 'completed')?.id).toBe('shipped');
    expect(findStateOfType(states, 'started')).toBeUndefined();
  });
});
