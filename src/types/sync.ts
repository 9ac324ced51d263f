/** One checkbox line recovered from a markdown file. */
export interface IntentRecord {
  id: string;
  completed: boolean;
}

/** Desired completion per issue id for one sync cycle. */
export type SyncIntents = Map<string, boolean>;

export interface ReconcileResult {
  updated: number;
  unchanged: number;
  skipped: number;
  errors: Array<{ issueId: string; error: string }>;
}

export interface ReconcileOptions {
  /** Issues reconciled in parallel. Defaults to 1 (sequential). */
  concurrency?: number;
}
