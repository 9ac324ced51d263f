import { dirname, resolve } from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { DEFAULT_DEBOUNCE_MS } from '../constants.js';
import type { AppConfig } from '../types/config.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { SyncRunner } from './sync-runner.js';

export type SyncedCallback = (count: number) => void;

export interface MarkdownWatcherOptions {
  runner: SyncRunner;
  /** Read once per `watch()` call. */
  config: Pick<AppConfig, 'syncOnEdit'>;
  debounceMs?: number;
}

/**
 * Watches one markdown file and pushes its edits back to the tracker.
 *
 * The parent directory is observed (editors often replace files on save) and
 * events for any other file in it are ignored. Bursts of writes collapse into
 * one sync after `debounceMs` of quiet.
 */
export class MarkdownWatcher {
  private readonly runner: SyncRunner;
  private readonly config: Pick<AppConfig, 'syncOnEdit'>;
  private readonly debounceMs: number;
  private watcher: FSWatcher | null = null;
  private target: string | null = null;
  private onSynced?: SyncedCallback;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;

  constructor(options: MarkdownWatcherOptions) {
    this.runner = options.runner;
    this.config = options.config;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  get isWatching(): boolean {
    return this.watcher !== null;
  }

  get watchedPath(): string | null {
    return this.target;
  }

  /**
   * Start watching `filePath`, replacing any earlier watch. Calls that overlap
   * (not awaited) settle on the last one; the others create nothing.
   */
  async watch(filePath: string, onSynced?: SyncedCallback): Promise<void> {
    const generation = ++this.generation;
    await this.close();
    if (generation !== this.generation) return;

    if (!this.config.syncOnEdit) {
      logger.info('Sync on edit is disabled, not watching.');
      return;
    }

    const target = resolve(filePath);
    const watcher = chokidar.watch(dirname(target), {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: { stabilityThreshold: 200 },
    });

    watcher.on('change', (changedPath: string) => {
      if (resolve(changedPath) === target) {
        logger.debug(`Markdown file modified: ${changedPath}`);
        this.scheduleSync();
      }
    });
    watcher.on('error', (err: unknown) => {
      logger.error(`Watcher error: ${getErrorMessage(err)}`);
    });

    this.watcher = watcher;
    this.target = target;
    this.onSynced = onSynced;
    logger.info(`Watching ${target}`);
  }

  /** Stop watching. Also cancels a `watch` call still in progress. */
  async unwatch(): Promise<void> {
    this.generation++;
    await this.close();
  }

  private async close(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    const watcher = this.watcher;
    this.watcher = null;
    this.target = null;
    this.onSynced = undefined;

    if (watcher) {
      await watcher.close();
      logger.debug('Watcher closed');
    }
  }

  private scheduleSync(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.runSync();
    }, this.debounceMs);
  }

  private async runSync(): Promise<void> {
    const target = this.target;
    const generation = this.generation;
    if (!target) return;

    try {
      const result = await this.runner.run(target);
      logger.info(`Synced ${result.updated} issue(s) to Linear`);
      if (result.errors.length > 0) {
        logger.warn(`${result.errors.length} error(s) during sync`);
      }
      // The watch this sync belonged to may have ended while it ran.
      if (generation === this.generation) {
        this.onSynced?.(result.updated);
      }
    } catch (err) {
      logger.error(`Error syncing ${target}: ${getErrorMessage(err)}`);
    }
  }
}
