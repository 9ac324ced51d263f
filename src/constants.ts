import type { StateType } from './types/linear.js';

// Section order of generated markdown files. Fixed so regenerations diff cleanly.
export const STATE_TYPES = ['backlog', 'unstarted', 'started', 'completed', 'canceled'] as const satisfies readonly StateType[];

// Categories rendered as checked boxes
export const DONE_STATE_TYPES: ReadonlySet<StateType> = new Set<StateType>(['completed', 'canceled']);

// Category used for issues with no state or a state type we do not know
export const FALLBACK_STATE_TYPE: StateType = 'unstarted';

export const LINEAR_API_URL = 'https://api.linear.app/graphql';

// Per-call timeout for tracker requests (ms)
export const REQUEST_TIMEOUT_MS = 30_000;

// Default page size for issue list queries
export const DEFAULT_ISSUE_LIMIT = 50;

export const MY_ISSUES_FILE = 'my-issues.md';

export const CONFIG_FILE_NAME = '.linear-task-header.json';

// Default debounce interval for watch mode (ms)
export const DEFAULT_DEBOUNCE_MS = 500;

// Max retry attempts for API calls
export const MAX_RETRIES = 3;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 1000;

export const LOCK_STALE_MS = 2 * 60 * 1000;
export const LOCK_POLL_INTERVAL_MS = 1000;
export const LOCK_MAX_WAIT_MS = 30 * 1000;
