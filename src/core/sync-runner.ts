import { resolve } from 'node:path';
import type { IssueRepository } from '../types/linear.js';
import type { ReconcileResult } from '../types/sync.js';
import { ConfigurationError } from '../utils/errors.js';
import { withLock, type LockOptions } from '../utils/lock.js';
import { getLockFilePath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import { readMarkdownIntents, toSyncIntents } from './markdown-parser.js';
import { reconcileIntents } from './reconciler.js';

export interface SyncRunnerOptions {
  client: IssueRepository | null | undefined;
  concurrency?: number;
  lock?: LockOptions;
}

/**
 * Runs read -> parse -> reconcile cycles one at a time.
 *
 * Requests for a file that already has a cycle waiting (queued, not started)
 * share that cycle's result. A request arriving while a cycle is running is
 * queued behind it, so edits made during a sync are still picked up.
 */
export class SyncRunner {
  private readonly client: IssueRepository | null | undefined;
  private readonly concurrency?: number;
  private readonly lockOptions?: LockOptions;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly queued = new Map<string, Promise<ReconcileResult>>();

  constructor(options: SyncRunnerOptions) {
    this.client = options.client;
    this.concurrency = options.concurrency;
    this.lockOptions = options.lock;
  }

  run(filePath: string): Promise<ReconcileResult> {
    const target = resolve(filePath);
    const waiting = this.queued.get(target);
    if (waiting) {
      logger.debug(`Sync of ${target} already queued`);
      return waiting;
    }

    const cycle = this.tail.then(() => {
      this.queued.delete(target);
      return this.syncOnce(target);
    });
    this.queued.set(target, cycle);
    this.tail = cycle.catch(() => undefined);
    return cycle;
  }

  /** Resolves once every cycle queued so far has finished. */
  async idle(): Promise<void> {
    await this.tail;
  }

  private async syncOnce(target: string): Promise<ReconcileResult> {
    const client = this.client;
    if (!client) {
      throw new ConfigurationError('Linear client not configured');
    }

    return withLock(getLockFilePath(target), async () => {
      const intents = toSyncIntents(await readMarkdownIntents(target));
      logger.debug(`Parsed ${intents.size} checkbox(es) from ${target}`);
      return reconcileIntents(client, intents, { concurrency: this.concurrency });
    }, this.lockOptions);
  }
}
